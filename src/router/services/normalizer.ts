/**
 * Question normalizer
 *
 * Corrects spelling noise before any matching runs:
 *   1. known misspellings (typo table)
 *   2. approximate match against core question keywords
 *   3. approximate match against the dataset vocabulary, in tiers
 *   4. known misspellings again
 *
 * Steps 2 and 3 need an approximate matcher; without one only the typo table
 * is applied. Whitespace and surrounding punctuation are kept as written.
 */

import { FUZZY_THRESHOLDS } from '../constants';
import { debugBranch } from '../helpers/debug';
import { toError } from '../helpers/errorHandling';
import { correctKnownMisspellings, type ApproximateMatcher } from '../helpers/fuzzyMatch';
import type { VocabularyIndex } from './dataset';

export const CORE_KEYWORDS = [
  'budget', 'approved', 'total', 'trend', 'contractor', 'contractors',
  'region', 'municipality', 'province', 'project', 'projects',
  'count', 'highest', 'lowest', 'top', 'by', 'year',
  'how', 'many', 'what', 'which', 'where', 'who',
  'in', 'of', 'the', 'has', 'have', 'with',
] as const;

const CORE_SET: ReadonlySet<string> = new Set(CORE_KEYWORDS);

const PUNCTUATION = '.,!?;:';

interface TokenParts {
  lead: string;
  word: string;
  trail: string;
}

function splitToken(token: string): TokenParts {
  let start = 0;
  let end = token.length;
  while (start < end && PUNCTUATION.includes(token[start])) start++;
  while (end > start && PUNCTUATION.includes(token[end - 1])) end--;
  return { lead: token.slice(0, start), word: token.slice(start, end), trail: token.slice(end) };
}

function lengthDrift(a: string, b: string): number {
  return Math.abs(a.length - b.length) / Math.max(a.length, b.length);
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Apply `correct` to every word of the text. `correct` receives the lowercased
 * word and returns a replacement or null to keep the original.
 */
function mapWords(text: string, correct: (raw: string) => string | null): string {
  return text
    .split(/(\s+)/)
    .map(token => {
      if (!token || /^\s+$/.test(token)) return token;
      const { lead, word, trail } = splitToken(token);
      const raw = word.toLowerCase();
      if (raw.length < 2) return token;
      const replacement = correct(raw);
      if (replacement === null || replacement === raw) return token;
      const cased = /^[A-Z]/.test(word) ? capitalize(replacement) : replacement;
      return lead + cased + trail;
    })
    .join('');
}

function correctCoreKeywords(text: string, matcher: ApproximateMatcher): string {
  return mapWords(text, raw => {
    if (CORE_SET.has(raw)) return null;
    const hit = matcher.extractOne(raw, CORE_KEYWORDS, FUZZY_THRESHOLDS.CORE_KEYWORD);
    if (!hit) return null;
    // Keep short words from turning into long ones and the reverse
    return lengthDrift(raw, hit.choice) < FUZZY_THRESHOLDS.MAX_LENGTH_DRIFT ? hit.choice : null;
  });
}

function correctFromVocabulary(text: string, vocab: VocabularyIndex, matcher: ApproximateMatcher): string {
  const locationSet = new Set(vocab.locationTerms);
  const contractorSet = new Set(vocab.contractorTerms);

  return mapWords(text, raw => {
    if (CORE_SET.has(raw) || locationSet.has(raw) || contractorSet.has(raw)) return null;

    const core = matcher.extractOne(raw, CORE_KEYWORDS, FUZZY_THRESHOLDS.VOCAB_CORE);
    if (core) return core.choice;

    if (raw.length < 4) return null;

    const place = matcher.extractOne(raw, vocab.locationTerms, FUZZY_THRESHOLDS.VOCAB_LOCATION);
    if (place && lengthDrift(raw, place.choice) < FUZZY_THRESHOLDS.MAX_LENGTH_DRIFT) return place.choice;

    const contractor = matcher.extractOne(raw, vocab.contractorTerms, FUZZY_THRESHOLDS.VOCAB_CONTRACTOR);
    return contractor ? contractor.choice : null;
  });
}

/**
 * Normalize a question. Never throws; an already-correct question comes back
 * unchanged.
 */
export function normalizeQuestion(
  question: string,
  vocab: VocabularyIndex | null,
  matcher: ApproximateMatcher | null
): string {
  let text = correctKnownMisspellings(question);
  if (matcher) {
    try {
      text = correctCoreKeywords(text, matcher);
      if (vocab) text = correctFromVocabulary(text, vocab, matcher);
    } catch (error) {
      // Approximate passes are optional; keep what the typo table produced
      debugBranch('normalizer:matcher-failed', toError(error).message);
    }
  }
  return correctKnownMisspellings(text);
}
