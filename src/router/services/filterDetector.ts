/**
 * Filter detection
 *
 * Extracts place criteria from question text. Categories are tried in
 * priority order and the first hit wins:
 *   region specials -> main island -> municipality -> multi-location ->
 *   province -> project location
 * Multi-location is still checked after a municipality hit, and a province
 * named next to a municipality is picked up with it.
 */

import { FUZZY_THRESHOLDS } from '../constants';
import { debugBranch } from '../helpers/debug';
import { escapeRegExp } from '../helpers/fuzzyMatch';
import { normalizeLguText, stripDiacritics, titleCase } from '../helpers/placeNames';
import { mentionsCar, mentionsNcr } from '../helpers/regions';
import type { FilterSpec } from '../../types';
import type { Dataset, MunicipalityEntry, ProvinceEntry } from './dataset';

const ISLANDS = ['luzon', 'visayas', 'mindanao'] as const;

function containsPhrase(haystack: string, phrase: string): boolean {
  return phrase !== '' && new RegExp(`\\b${escapeRegExp(phrase)}\\b`).test(haystack);
}

function detectRegion(p: string, question: string): FilterSpec | null {
  const sub = p.match(/region\s*(?:iv-?|4)?\s*[–-]?\s*([ab])\b/);
  if (sub) return { region: sub[1] === 'a' ? 'iv-a' : 'iv-b' };

  if (mentionsNcr(p)) return { region: 'National Capital Region' };
  if (mentionsCar(p)) return { region: 'Cordillera Administrative Region' };

  // "Davao" alone is ambiguous between the city, four provinces and the region
  if (/\bdavao\b/.test(p)) {
    if (/\bdavao\s*,?\s*city\b/.test(p)) return { municipality: 'Davao City' };
    const province = p.match(/davao\s+(del\s+norte|del\s+sur|de\s+oro|occidental|oriental)/);
    if (province) return { province: titleCase(province[0].replace(/\s+/g, ' ')) };
    if (p.includes('region') || !question.includes(',')) return { region: 'Davao Region' };
  }

  const region = p.match(/region\s*([0-9ivx]+)\b/);
  if (region) return { region: region[1] };
  return null;
}

function resolveCityPattern(question: string, municipalities: readonly string[]): string | null {
  const byLower = new Map(municipalities.map(m => [m.trim().toLowerCase(), m]));
  for (const match of question.matchAll(/([a-zA-Z][a-zA-Z\s.'&-]{0,60}?)\s*,?\s*\bcity\b/gi)) {
    const words = match[1].trim().split(/\s+/);
    // Try the shortest name ending right before "city" first
    for (let take = 1; take <= words.length; take++) {
      const candidate = `${words.slice(words.length - take).join(' ')} city`.toLowerCase();
      const hit = byLower.get(candidate);
      if (hit !== undefined) return hit;
    }
  }
  return null;
}

function resolveByPhrase<T extends { norm: string; canonical: string }>(pNorm: string, entries: readonly T[]): string | null {
  for (const entry of entries) {
    if (containsPhrase(pNorm, entry.norm)) return entry.canonical;
  }
  return null;
}

/**
 * Rank municipalities by how many of their significant tokens appear in the
 * question; tokens earlier in the name weigh more.
 */
function resolveByTokenOverlap(pNorm: string, entries: readonly MunicipalityEntry[]): string | null {
  const questionTokens = new Set(pNorm.split(' '));
  let best: string | null = null;
  let bestScore = 0;
  for (const entry of entries) {
    const parts = entry.norm.split(' ');
    let score = 0;
    for (const token of entry.tokens) {
      if (!questionTokens.has(token)) continue;
      const pos = parts.indexOf(token);
      score += pos < 10 ? 10 - pos : 1;
    }
    if (score > bestScore) {
      bestScore = score;
      best = entry.canonical;
    }
  }
  return best;
}

function resolveApproximate<T extends { norm: string; canonical: string }>(
  dataset: Dataset,
  pNorm: string,
  entries: readonly T[],
  cutoff: number
): string | null {
  if (!dataset.matcher || entries.length === 0) return null;
  const hit = dataset.matcher.extractOne(pNorm, entries.map(e => e.norm), cutoff);
  return hit ? entries[hit.index].canonical : null;
}

function coResolveProvince(pNorm: string, municipality: string, provinces: readonly ProvinceEntry[]): string | null {
  const municipalityNorm = normalizeLguText(municipality);
  for (const entry of provinces) {
    if (municipalityNorm.includes(entry.norm)) continue;
    if (containsPhrase(pNorm, entry.norm)) return entry.canonical;
  }
  return null;
}

/**
 * "in X, Y or Z" -> canonical place names. Fragments that match no known
 * municipality or province are dropped.
 */
function detectMultiLocation(p: string, dataset: Dataset): string[] {
  const match = stripDiacritics(p).match(/\bin\s+([a-z\s,/]+)(?:\?|$)/);
  if (!match) return [];
  const fragments = match[1]
    .split(/\s*(?:,|\/|\band\b|\bor\b)\s*/)
    .map(item => item.trim())
    .filter(Boolean);

  const vocab = dataset.vocabulary();
  const choices = [...vocab.municipalities, ...vocab.provinces];
  const folded = choices.map(choice => stripDiacritics(choice.toLowerCase()));

  const places: string[] = [];
  for (const fragment of fragments) {
    let index = folded.indexOf(fragment);
    if (index < 0 && dataset.matcher) {
      const hit = dataset.matcher.extractOne(fragment, folded, FUZZY_THRESHOLDS.MULTI_LOCATION);
      index = hit ? hit.index : -1;
    }
    if (index >= 0 && !places.includes(choices[index])) places.push(choices[index]);
  }
  return places;
}

function detectMunicipality(question: string, pNorm: string, dataset: Dataset): FilterSpec | null {
  const vocab = dataset.vocabulary();
  const entries = vocab.municipalityEntries;

  const withProvince = (municipality: string, step: string): FilterSpec => {
    debugBranch(`filters:municipality:${step}`, municipality);
    const province = coResolveProvince(pNorm, municipality, vocab.provinceEntries);
    return province ? { municipality, province } : { municipality };
  };

  const city = resolveCityPattern(question, vocab.municipalities);
  if (city) return withProvince(city, 'city-suffix');

  const phrase = resolveByPhrase(pNorm, entries);
  if (phrase) return withProvince(phrase, 'phrase');

  const overlap = resolveByTokenOverlap(pNorm, entries);
  if (overlap) return withProvince(overlap, 'token-overlap');

  const approximate = resolveApproximate(dataset, pNorm, entries, FUZZY_THRESHOLDS.MUNICIPALITY);
  if (approximate) return withProvince(approximate, 'approximate');

  return null;
}

/**
 * Detect place filters in a (normalized) question
 */
export function detectFilters(question: string, dataset: Dataset): FilterSpec {
  const p = question.toLowerCase();
  const pNorm = normalizeLguText(question);
  const columns = dataset.columns;

  const region = detectRegion(p, question);
  if (region) {
    debugBranch('filters:region', region);
    return region;
  }

  if (columns.role('mainIsland') !== null) {
    const island = ISLANDS.find(name => p.includes(name));
    if (island) return { main_island: island };
  }

  let filters: FilterSpec = {};

  if (columns.role('municipality') !== null) {
    filters = detectMunicipality(question, pNorm, dataset) ?? {};
  }

  const hasPlaceColumns = columns.role('municipality') !== null || columns.role('province') !== null;
  const multi = hasPlaceColumns ? detectMultiLocation(p, dataset) : [];
  if (multi.length >= 2) {
    debugBranch('filters:multi-location', multi);
    return { multi_locations: multi };
  }
  if (filters.municipality) return filters;

  if (columns.role('province') !== null) {
    const vocab = dataset.vocabulary();
    const province =
      resolveByPhrase(pNorm, vocab.provinceEntries) ??
      resolveApproximate(dataset, pNorm, vocab.provinceEntries, FUZZY_THRESHOLDS.PROVINCE);
    if (province) return { province };
  }

  if (multi.length === 1) return { multi_locations: multi };

  if (columns.role('projectLocation') !== null) {
    const location = dataset.vocabulary().projectLocations.find(loc => p.includes(loc.toLowerCase()));
    if (location) return { project_location: location };
  }

  return {};
}

export function hasPlaceFilter(filters: FilterSpec): boolean {
  return Boolean(
    filters.municipality ||
      filters.province ||
      filters.region ||
      filters.main_island ||
      filters.project_location ||
      (filters.multi_locations && filters.multi_locations.length > 0)
  );
}
