/**
 * Fuzzy String Matching Utilities
 * Handles typos, common misspellings and approximate place/contractor names
 */

import typoTable from '../data/typos.json';

// Levenshtein distance calculation (edit distance)
export function levenshteinDistance(str1: string, str2: string): number {
  const m = str1.length;
  const n = str2.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      if (str1[i - 1] === str2[j - 1]) {
        dp[i][j] = dp[i - 1][j - 1];
      } else {
        dp[i][j] = Math.min(
          dp[i - 1][j] + 1,      // deletion
          dp[i][j - 1] + 1,      // insertion
          dp[i - 1][j - 1] + 1   // substitution
        );
      }
    }
  }

  return dp[m][n];
}

// Calculate similarity ratio (0-1, where 1 is exact match)
export function similarityRatio(str1: string, str2: string): number {
  const distance = levenshteinDistance(str1.toLowerCase(), str2.toLowerCase());
  const maxLen = Math.max(str1.length, str2.length);
  return maxLen === 0 ? 1 : 1 - (distance / maxLen);
}

function tokenize(text: string): string[] {
  return text.toLowerCase().split(/\s+/).filter(Boolean);
}

export function tokenSortRatio(str1: string, str2: string): number {
  const a = tokenize(str1).sort().join(' ');
  const b = tokenize(str2).sort().join(' ');
  return similarityRatio(a, b);
}

/**
 * Best similarity of the shorter string against every run of the same number
 * of words inside the longer one.
 */
export function partialTokenRatio(str1: string, str2: string): number {
  const [shorter, longer] = str1.length <= str2.length ? [str1, str2] : [str2, str1];
  const shortTokens = tokenize(shorter);
  const longTokens = tokenize(longer);
  if (shortTokens.length === 0 || longTokens.length === 0) return 0;

  const needle = shortTokens.join(' ');
  const width = Math.min(shortTokens.length, longTokens.length);
  let best = 0;
  for (let start = 0; start + width <= longTokens.length; start++) {
    const window = longTokens.slice(start, start + width).join(' ');
    best = Math.max(best, similarityRatio(needle, window));
    if (best === 1) break;
  }
  return best;
}

/**
 * Weighted similarity: plain ratio for strings of similar length, otherwise the
 * best of ratio, scaled partial ratio and scaled token-sort ratio.
 */
export function weightedRatio(str1: string, str2: string): number {
  const a = str1.trim().toLowerCase();
  const b = str2.trim().toLowerCase();
  if (!a || !b) return 0;

  const base = similarityRatio(a, b);
  const lengthRatio = Math.max(a.length, b.length) / Math.min(a.length, b.length);
  const sorted = tokenSortRatio(a, b) * 0.95;

  if (lengthRatio < 1.5) return Math.max(base, sorted);

  const partialScale = lengthRatio < 8 ? 0.9 : 0.6;
  return Math.max(base, partialTokenRatio(a, b) * partialScale, sorted * partialScale);
}

export interface FuzzyHit {
  choice: string;
  score: number;
  index: number;
}

/**
 * Approximate matching capability. Components receive `ApproximateMatcher | null`;
 * null means approximate matching is unavailable and callers fall back to
 * exact and substring strategies.
 */
export interface ApproximateMatcher {
  score(query: string, choice: string): number;
  extractOne(query: string, choices: readonly string[], cutoff: number): FuzzyHit | null;
}

export function createMatcher(scorer: (a: string, b: string) => number = weightedRatio): ApproximateMatcher {
  return {
    score: scorer,
    extractOne(query, choices, cutoff) {
      let best: FuzzyHit | null = null;
      for (let index = 0; index < choices.length; index++) {
        const score = scorer(query, choices[index]);
        if (best === null || score > best.score) best = { choice: choices[index], score, index };
      }
      return best !== null && best.score >= cutoff ? best : null;
    },
  };
}

export const defaultMatcher: ApproximateMatcher = createMatcher();

// Build ordered lookup for misspelling correction (multi-word entries included)
const MISSPELLING_RULES: Array<{ pattern: RegExp; correct: string }> = [];
for (const [correct, misspellings] of Object.entries(typoTable)) {
  for (const misspelling of misspellings) {
    MISSPELLING_RULES.push({
      pattern: new RegExp(`\\b${escapeRegExp(misspelling)}\\b`, 'gi'),
      correct,
    });
  }
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Correct known misspellings in text (whole words, case-insensitive)
 */
export function correctKnownMisspellings(text: string): string {
  let corrected = text;
  for (const { pattern, correct } of MISSPELLING_RULES) {
    corrected = corrected.replace(pattern, correct);
  }
  return corrected;
}
