/**
 * Region helpers
 *
 * Region values arrive as digits ("2"), roman numerals ("ii"), prefixed forms
 * ("Region 2") or aliases ("NCR", "Cordillera Administrative Region"). All of
 * them expand to one pattern set so every spelling selects the same rows.
 */

import { titleCase } from './placeNames';

export const ROMAN_MAP: Readonly<Record<string, string>> = {
  '1': 'i', '2': 'ii', '3': 'iii', '4': 'iv', '5': 'v',
  '6': 'vi', '7': 'vii', '8': 'viii', '9': 'ix', '10': 'x',
  '11': 'xi', '12': 'xii', '13': 'xiii', '14': 'xiv', '15': 'xv',
  '16': 'xvi', '17': 'xvii', '18': 'xviii',
};

const DIGIT_BY_ROMAN: Readonly<Record<string, string>> = Object.fromEntries(
  Object.entries(ROMAN_MAP).map(([digit, roman]) => [roman, digit])
);

export const NCR_ALIASES = ['national capital region', 'ncr', 'metro manila', 'metropolitan manila'] as const;
export const CAR_ALIASES = ['cordillera administrative region', 'cordillera', 'car'] as const;

const NCR_PATTERN = /\b(ncr|national capital region|metro manila|metropolitan manila)\b/;
const CAR_PATTERN = /\b(car|cordillera)\b/;

export function isNcrAlias(value: string): boolean {
  const wanted = value.trim().toLowerCase();
  return NCR_ALIASES.some(alias => alias === wanted);
}

export function isCarAlias(value: string): boolean {
  const wanted = value.trim().toLowerCase();
  return CAR_ALIASES.some(alias => alias === wanted);
}

export function mentionsNcr(text: string): boolean {
  return NCR_PATTERN.test(text.toLowerCase());
}

export function mentionsCar(text: string): boolean {
  return CAR_PATTERN.test(text.toLowerCase());
}

function subRegion(token: string): 'a' | 'b' | null {
  const m = token.match(/^(?:iv|4)\s*-?\s*([ab])$/);
  if (!m) return null;
  return m[1] === 'a' ? 'a' : 'b';
}

/**
 * Expand a region value into lowercase match patterns. Patterns starting with
 * "region " match by prefix; all others match the whole cell.
 */
export function regionPatterns(value: string): string[] {
  let pat = value.trim().toLowerCase();
  const prefixed = pat.match(/^region\s*([0-9ivx]+(?:\s*-?\s*[ab])?)$/);
  if (prefixed) pat = prefixed[1];

  const patterns: string[] = [];
  const sub = subRegion(pat);

  if (/^\d+$/.test(pat)) {
    patterns.push(`region ${ROMAN_MAP[pat] ?? pat}`, `region ${pat}`);
  } else if (pat in DIGIT_BY_ROMAN) {
    patterns.push(`region ${pat}`, `region ${DIGIT_BY_ROMAN[pat]}`);
  } else if (sub === null) {
    patterns.push(pat);
  }

  if (pat === '4' || pat === 'iv') {
    patterns.push('region iv-a', 'region iv-b', 'region 4-a', 'region 4-b', 'calabarzon', 'mimaropa');
  }
  if (sub === 'a') {
    patterns.push('region iv-a', 'region 4-a', 'calabarzon');
  }
  if (sub === 'b') {
    patterns.push('region iv-b', 'region 4-b', 'mimaropa');
  }
  if (isNcrAlias(pat)) {
    patterns.push(...NCR_ALIASES);
  }
  if (isCarAlias(pat)) {
    patterns.push(...CAR_ALIASES);
  }
  if (pat === 'davao region') {
    patterns.push('region xi', 'region 11');
  }

  return [...new Set(patterns)];
}

/**
 * Test one region cell against one pattern. Prefix patterns stop at a word
 * boundary so "region i" does not select "region ii".
 */
export function matchesRegionPattern(cell: string, pattern: string): boolean {
  const text = cell.trim().toLowerCase();
  if (!pattern.startsWith('region ')) return text === pattern;
  if (!text.startsWith(pattern)) return false;
  const next = text.charAt(pattern.length);
  return next === '' || !/[a-z0-9]/.test(next);
}

/**
 * Human-friendly region label:
 *   "2" -> "Region II", "iv-a" -> "Region IV-A", "ncr" -> "NCR"
 */
export function displayRegion(value: string): string {
  const s = value.trim().toLowerCase();
  if (mentionsNcr(s)) return 'NCR';
  if (mentionsCar(s)) return 'CAR';

  const bare = s.replace(/^region\s*/, '');
  const sub = subRegion(bare);
  if (sub === 'a') return 'Region IV-A';
  if (sub === 'b') return 'Region IV-B';

  if (/^\d+$/.test(bare)) return `Region ${(ROMAN_MAP[bare] ?? bare).toUpperCase()}`;
  if (bare in DIGIT_BY_ROMAN) return `Region ${bare.toUpperCase()}`;
  if (s.startsWith('region') && /^[0-9ivx\-ab]+$/.test(bare)) return `Region ${bare.toUpperCase()}`;

  return titleCase(s);
}
