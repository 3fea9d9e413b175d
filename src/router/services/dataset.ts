/**
 * Dataset snapshot + vocabulary index
 *
 * Rows are frozen at creation. Everything derived from the rows that the
 * matchers need (place names, contractor names, normalized lookups) lives in a
 * VocabularyIndex that is built once per snapshot.
 */

import { RESULT_LIMITS } from '../constants';
import { ColumnResolver } from '../helpers/columns';
import { defaultMatcher, type ApproximateMatcher } from '../helpers/fuzzyMatch';
import { normalizeLguText } from '../helpers/placeNames';
import type { CellValue, ProjectRecord } from '../../types';

export interface MunicipalityEntry {
  norm: string;
  /** Normalized tokens of 5+ characters */
  tokens: string[];
  canonical: string;
}

export interface ProvinceEntry {
  norm: string;
  canonical: string;
}

export interface VocabularyIndex {
  municipalities: string[];
  provinces: string[];
  contractors: string[];
  /** Longest first */
  projectLocations: string[];
  /** Longest normalized name first */
  municipalityEntries: MunicipalityEntry[];
  /** Longest normalized name first */
  provinceEntries: ProvinceEntry[];
  /** Lowercased place names and their significant tokens */
  locationTerms: string[];
  /** Lowercased contractor name tokens of 4+ characters */
  contractorTerms: string[];
}

export interface Dataset {
  readonly rows: readonly ProjectRecord[];
  readonly version: string;
  readonly columns: ColumnResolver;
  readonly matcher: ApproximateMatcher | null;
  vocabulary(): VocabularyIndex;
}

export interface DatasetOptions {
  /** Explicit version tag; computed from the rows when omitted */
  version?: string;
  /** Approximate matcher; pass null to run without one */
  matcher?: ApproximateMatcher | null;
}

const ISLANDS = ['luzon', 'visayas', 'mindanao'];
const LOCATION_STOPWORDS = new Set(['city', 'of', 'municipality', 'province', 'metropolitan']);

// Keyed by the frozen rows, so two snapshots never share an index
let vocabularyCache = new WeakMap<readonly ProjectRecord[], VocabularyIndex>();

export function cellText(value: CellValue): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

function hashRows(columns: readonly string[], rows: readonly ProjectRecord[]): string {
  let hash = 0;
  const feed = (text: string) => {
    for (let i = 0; i < text.length; i++) {
      hash = ((hash << 5) - hash) + text.charCodeAt(i);
      hash = hash & hash;
    }
  };
  feed(columns.join('|'));
  for (const row of rows) {
    for (const col of columns) feed(`${cellText(row[col])}\u0001`);
  }
  return `${rows.length}-${(hash >>> 0).toString(36)}`;
}

function collectColumns(rows: readonly ProjectRecord[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }
  return [...seen];
}

function uniqueValues(rows: readonly ProjectRecord[], column: string | null): string[] {
  if (column === null) return [];
  const seen = new Set<string>();
  for (const row of rows) {
    const text = cellText(row[column]);
    if (text) seen.add(text);
  }
  return [...seen];
}

function byLengthDesc<T>(items: T[], key: (item: T) => string): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => key(b.item).length - key(a.item).length || a.index - b.index)
    .map(({ item }) => item);
}

function buildVocabulary(rows: readonly ProjectRecord[], columns: ColumnResolver): VocabularyIndex {
  const municipalities = uniqueValues(rows, columns.role('municipality'));
  const provinces = uniqueValues(rows, columns.role('province'));
  const contractors = uniqueValues(rows, columns.role('contractor'));
  const projectLocations = byLengthDesc(uniqueValues(rows, columns.role('projectLocation')), loc => loc);

  const municipalityEntries = byLengthDesc(
    municipalities
      .map(canonical => {
        const norm = normalizeLguText(canonical);
        return { norm, tokens: norm.split(' ').filter(t => t.length >= RESULT_LIMITS.SIGNIFICANT_TOKEN_LENGTH), canonical };
      })
      .filter(entry => entry.norm !== ''),
    entry => entry.norm
  );

  const provinceEntries = byLengthDesc(
    provinces
      .map(canonical => ({ norm: normalizeLguText(canonical), canonical }))
      .filter(entry => entry.norm !== ''),
    entry => entry.norm
  );

  const locationTerms = new Set<string>(ISLANDS);
  for (const place of [...municipalities, ...provinces]) {
    const lower = place.toLowerCase();
    locationTerms.add(lower);
    for (const token of lower.match(/[\p{L}\p{N}_]{5,}/gu) ?? []) {
      if (!LOCATION_STOPWORDS.has(token)) locationTerms.add(token);
    }
  }

  const contractorTerms = new Set<string>();
  for (const name of contractors.slice(0, RESULT_LIMITS.MAX_CONTRACTOR_VOCAB)) {
    for (const token of name.toLowerCase().match(/[\p{L}\p{N}_]{4,}/gu) ?? []) {
      contractorTerms.add(token);
    }
  }

  return {
    municipalities,
    provinces,
    contractors,
    projectLocations,
    municipalityEntries,
    provinceEntries,
    locationTerms: [...locationTerms],
    contractorTerms: [...contractorTerms],
  };
}

/**
 * Build a frozen dataset snapshot. Rows are copied and frozen; the caller's
 * array is not touched.
 */
export function createDataset(rows: readonly ProjectRecord[], options: DatasetOptions = {}): Dataset {
  const frozenRows = Object.freeze(rows.map(row => Object.freeze({ ...row })));
  const matcher = options.matcher === undefined ? defaultMatcher : options.matcher;
  const columns = new ColumnResolver(collectColumns(frozenRows), matcher);
  const version = options.version ?? hashRows(columns.columns, frozenRows);

  return Object.freeze({
    rows: frozenRows,
    version,
    columns,
    matcher,
    vocabulary(): VocabularyIndex {
      const cached = vocabularyCache.get(frozenRows);
      if (cached) return cached;
      const built = buildVocabulary(frozenRows, columns);
      vocabularyCache.set(frozenRows, built);
      return built;
    },
  });
}

/** Drop every cached vocabulary */
export function clearVocabularyCache(): void {
  vocabularyCache = new WeakMap();
}
