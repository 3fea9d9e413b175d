/**
 * Intent classification
 *
 * Maps a normalized question to one ParsedIntent. Rules are evaluated in the
 * order of INTENT_RULES and the first one whose `matches` holds and whose
 * `extract` returns an intent wins. Keyword families overlap ("highest budget"
 * vs "contractor with the highest budget"), so the order matters.
 */

import { parseTimeFilters } from '../helpers/dateParser';
import { debugBranch, debugIntent } from '../helpers/debug';
import type { ActionTag, FilterSpec, LookupAction, ParsedIntent } from '../../types';
import type { Dataset } from './dataset';
import { detectFilters, hasPlaceFilter } from './filterDetector';

export interface RuleContext {
  /** Question as written (after normalization) */
  question: string;
  /** Lowercased question */
  p: string;
  dataset: Dataset;
  now: Date;
}

export type IntentDraft = Omit<ParsedIntent, 'rule'>;

export interface IntentRule {
  name: string;
  action: ActionTag;
  matches(ctx: RuleContext): boolean;
  /** Returns null when the rule matched but has nothing to act on */
  extract(ctx: RuleContext): IntentDraft | null;
}

// Project ids carry at least one digit: "p00549881vs", "abc-123"
const PROJECT_ID = '([a-z](?=[a-z0-9-]*\\d)[a-z0-9-]{5,19})';

const HIGHEST_KEYWORDS = ['highest approved budget', 'max approved budget', 'highest budget', 'max budget', 'largest budget', 'biggest budget'];
const LOWEST_KEYWORDS = ['lowest approved budget', 'min approved budget', 'minimum approved budget', 'lowest budget', 'minimum budget', 'least budget'];
const TOTAL_KEYWORDS = ['total budget', 'sum', 'overall budget', 'cost', 'total cost', 'total approved budget'];
const PAGINATION_PHRASES = new Set(['more', 'more projects', 'show more', '5 more', '5 more projects']);
const NAME_STOPWORDS = new Set([
  'how', 'many', 'what', 'which', 'who', 'where', 'when', 'is', 'are', 'the', 'does', 'do', 'have', 'has',
  'of', 'projects', 'project', 'in', 'for', 'by', 'from', 'contractor', 'there', 'total',
]);

export function parseTopN(text: string): number | undefined {
  const m = text.toLowerCase().match(/\btop\s+(\d{1,3})\b/);
  if (!m) return undefined;
  const n = parseInt(m[1], 10);
  return n > 0 ? n : undefined;
}

/**
 * Resolve a contractor mention against dataset values by containment in
 * either direction. First hit in dataset order wins.
 */
export function resolveContractor(query: string, dataset: Dataset): string | null {
  const q = query.trim().toLowerCase();
  if (!q) return null;
  for (const name of dataset.vocabulary().contractors) {
    const lower = name.toLowerCase();
    if (lower.includes(q) || q.includes(lower)) return name;
  }
  return null;
}

function findContractorContaining(query: string, dataset: Dataset): string | null {
  const q = query.trim().toLowerCase();
  if (!q) return null;
  return dataset.vocabulary().contractors.find(name => name.toLowerCase().includes(q)) ?? null;
}

function budgetColumn(ctx: RuleContext): string | null {
  return ctx.dataset.columns.role('budget');
}

function withPlaceAndTime(ctx: RuleContext, action: ActionTag, extra: Partial<IntentDraft> = {}): IntentDraft {
  return {
    action,
    filters: detectFilters(ctx.question, ctx.dataset),
    time: parseTimeFilters(ctx.question, ctx.now),
    column: null,
    ...extra,
  };
}

function lookup(action: LookupAction, projectId: string): IntentDraft {
  return { action, filters: { project_id: projectId }, time: {}, column: null };
}

function stripEndPunctuation(p: string): string {
  return p.trim().replace(/[?.!]+$/, '').trim();
}

/** "how many ..." questions that name a contractor instead of a place */
function contractorFromCountQuestion(ctx: RuleContext): string | null {
  const { p, dataset } = ctx;

  const direct = p.match(/how many projects\s+contractor\s+(.+?)\s+have\b/);
  if (direct) {
    const hit = findContractorContaining(direct[1].replace(/[.,;:!?]+$/, ''), dataset);
    if (hit) return hit;
  }

  const patterns = [
    /how many projects.*contractor.*have\s+(.+)$/,
    /how many projects.*does\s+(.+?)\s+have/,
    /how many projects.*by\s+(.+)$/,
    /how many projects.*from\s+(.+)$/,
    /how many projects\s+(.+?)\s+(?:does|do)\s+have/,
    /contractor\s+have\s+(.+?)(?:\?|$)/,
  ];
  for (const pattern of patterns) {
    const m = p.match(pattern);
    if (!m) continue;
    const name = m[1]
      .replace(/\b(contractor|company|corp|inc|ltd|does|have)\b/gi, '')
      .trim()
      .replace(/[.,;:!?]+$/, '')
      .trim();
    return findContractorContaining(name, dataset);
  }
  return null;
}

/** Runs of capitalised words ("ALPHA BUILDERS", "Bravo Engineering") */
function contractorFromCapitalisedRun(question: string, dataset: Dataset): string | null {
  const words = question.split(/\s+/).filter(Boolean);
  const isNameWord = (word: string) => {
    const clean = word.replace(/[.,;:!?]+$/, '');
    if (!clean || NAME_STOPWORDS.has(clean.toLowerCase())) return false;
    return (clean === clean.toUpperCase() && /[A-Z]/.test(clean)) || (/^[A-Z]/.test(clean) && clean.length > 2);
  };
  for (let i = 0; i < words.length; i++) {
    if (!isNameWord(words[i])) continue;
    const run: string[] = [];
    for (let j = i; j < words.length && isNameWord(words[j]); j++) {
      run.push(words[j].replace(/[.,;:!?]+$/, ''));
    }
    const hit = findContractorContaining(run.join(' '), dataset);
    if (hit) return hit;
  }
  return null;
}

function extractCount(ctx: RuleContext): IntentDraft {
  const { p, question, dataset } = ctx;
  let filters: FilterSpec = detectFilters(question, dataset);

  if (p.includes('contractor') && !hasPlaceFilter(filters)) {
    const contractor = contractorFromCountQuestion(ctx);
    if (contractor) filters = { contractor };
  }

  if (Object.keys(filters).length === 0 && dataset.columns.role('contractor') !== null) {
    const contractor = contractorFromCapitalisedRun(question, dataset);
    if (contractor) filters = { contractor };
  }

  if (Object.keys(filters).length === 0) {
    const trailing = p.match(/\bin\s+([a-z\s-]+)$/);
    const place = trailing ? trailing[1].trim() : '';
    // "in the dataset" names no place
    if (place && !place.startsWith('the ')) filters = { project_location: place };
  }

  return { action: 'count', filters, time: parseTimeFilters(question, ctx.now), column: null };
}

export const INTENT_RULES: readonly IntentRule[] = [
  {
    name: 'top-projects-for-contractor',
    action: 'top_projects_by_contractor_budget',
    matches: ({ p }) =>
      /top\s+\d+\s+(?:projects?\s+)?(?:with\s+the\s+|by\s+)?(?:highest\s+)?(?:approved\s+)?budgets?\s+(?:of|for|by)\s+.+$/.test(p),
    extract: ctx => {
      const m = ctx.p.match(/budgets?\s+(?:of|for|by)\s+(.+)$/);
      const query = m ? m[1].replace(/[. ,;!?]+$/, '') : '';
      const contractor = resolveContractor(query, ctx.dataset);
      return {
        action: 'top_projects_by_contractor_budget',
        filters: contractor ? { contractor } : {},
        time: parseTimeFilters(ctx.question, ctx.now),
        column: budgetColumn(ctx),
        top_n: parseTopN(ctx.question) ?? 5,
      };
    },
  },
  {
    name: 'contractor-highest-total-budget',
    action: 'contractor_max_total_budget',
    matches: ({ p }) => p.includes('contractor') && /highest\s+(?:total\s+)?(?:approved\s+)?budget/.test(p),
    extract: ctx => withPlaceAndTime(ctx, 'contractor_max_total_budget', { column: budgetColumn(ctx) }),
  },
  {
    name: 'highest-budget',
    action: 'max',
    matches: ({ p }) => HIGHEST_KEYWORDS.some(k => p.includes(k)),
    extract: ctx => withPlaceAndTime(ctx, 'max', { column: budgetColumn(ctx), top_n: parseTopN(ctx.question) ?? 1 }),
  },
  {
    name: 'lowest-budget',
    action: 'min',
    matches: ({ p }) => LOWEST_KEYWORDS.some(k => p.includes(k)),
    extract: ctx => withPlaceAndTime(ctx, 'min', { column: budgetColumn(ctx), top_n: parseTopN(ctx.question) ?? 1 }),
  },
  {
    name: 'list-projects-in-place',
    action: 'top_projects_by_location_budget',
    matches: ({ p }) =>
      (/\blist\b/.test(p) && p.includes('project') && /\bin\b/.test(p)) ||
      /list all .*projects/.test(p) ||
      /\bshow\b.*\bprojects?\s+in\b/.test(p) ||
      /give me all\s+\d+\s+projects\s+in/.test(p),
    extract: ctx => {
      const draft = withPlaceAndTime(ctx, 'top_projects_by_location_budget', { column: budgetColumn(ctx) });
      if (!hasPlaceFilter(draft.filters)) return null;
      const all = ctx.p.match(/give me all\s+(\d+)\s+projects/);
      if (all) return { ...draft, top_n: parseInt(all[1], 10), force_all: true };
      return { ...draft, top_n: parseTopN(ctx.question) ?? 5 };
    },
  },
  {
    name: 'pagination-follow-up',
    action: 'more_projects',
    matches: ({ p }) => {
      const bare = stripEndPunctuation(p);
      return (
        /^(yes|yeah|yep|sure|ok|okay|please)$/.test(bare) ||
        PAGINATION_PHRASES.has(bare) ||
        /(\d+)\s+more\s+projects?/.test(p) ||
        (/give me all\s+(\d+)\s+projects/.test(p) && !p.includes('in '))
      );
    },
    extract: ({ p }) => {
      const m = p.match(/(\d+)\s+more\s+projects?/) ?? p.match(/give me all\s+(\d+)\s+projects/);
      const count = m ? parseInt(m[1], 10) : undefined;
      return { action: 'more_projects', filters: {}, time: {}, column: null, count: count && count > 0 ? count : undefined };
    },
  },
  {
    name: 'count',
    action: 'count',
    // "top 5 contractors by number of projects" and "most number of projects" are rankings
    matches: ({ p }) =>
      p.includes('how many') ||
      (p.includes('number of') && !/top\s+\d+\s+contr/.test(p) && !/(?:most|highest|largest)\s+number\s+of/.test(p)),
    extract: extractCount,
  },
  {
    name: 'top-contractors-by-budget',
    action: 'top_contractors',
    matches: ({ p }) => /top\s+\d+\s+contr[a-z]*ors?.*?\s+by\s+(?:total\s+)?budg[a-z]*/.test(p),
    extract: ctx => withPlaceAndTime(ctx, 'top_contractors', { column: budgetColumn(ctx), top_n: parseTopN(ctx.question) ?? 5 }),
  },
  {
    name: 'top-contractors-by-count',
    action: 'top_contractors_by_count',
    matches: ({ p }) => /top\s+\d+\s+contr[a-z]*ors?.*?\s+by\s+(?:number\s+of\s+projects|project\s+count|projects)/.test(p),
    extract: ctx => withPlaceAndTime(ctx, 'top_contractors_by_count', { top_n: parseTopN(ctx.question) ?? 10 }),
  },
  {
    name: 'contractor-most-projects',
    action: 'contractor_max_count',
    matches: ({ p }) =>
      /which\s+contractor\s+(?:has|with)\s+(?:the\s+)?(?:most|highest|largest)\s+(?:number\s+of\s+)?projects?/.test(p) ||
      /who\s+is\s+the\s+contractor\s+with\s+(?:the\s+)?(?:most|highest|largest)\s+(?:number\s+of\s+)?projects?/.test(p) ||
      (p.includes('contractor') && /highest\s+number\s+of\s+projects?/.test(p)),
    extract: ctx => withPlaceAndTime(ctx, 'contractor_max_count'),
  },
  {
    name: 'total-budget',
    action: 'sum',
    // Leaves "which municipality ... highest total budget" and "cost of <id>" to later rules
    matches: ({ p }) =>
      TOTAL_KEYWORDS.some(k => p.includes(k)) &&
      !/which\s+municipality.*highest\s+total\s+budget/.test(p) &&
      !new RegExp(`\\bcost\\s+of\\s+(?:project\\s+)?${PROJECT_ID}`).test(p),
    extract: ctx => withPlaceAndTime(ctx, 'sum', { column: budgetColumn(ctx) }),
  },
  {
    name: 'trend-by-year',
    action: 'trend_by_year',
    matches: ({ p }) => /(trend|by year|per year)/.test(p),
    extract: ctx => withPlaceAndTime(ctx, 'trend_by_year', { column: budgetColumn(ctx) }),
  },
  {
    name: 'municipality-highest-total',
    action: 'municipality_max_total',
    matches: ({ p }) => /which\s+municipality.*highest\s+total\s+budget/.test(p),
    extract: ctx => withPlaceAndTime(ctx, 'municipality_max_total', { column: budgetColumn(ctx) }),
  },
  {
    name: 'project-id-lookup',
    action: 'lookup',
    matches: ({ p }) => /(project\s*id|projectid)\s*[a-z0-9-]+/.test(p),
    extract: ({ p }) => {
      const m = p.match(/(?:project\s*id|projectid)\s*([a-z0-9-]+)/);
      return m ? lookup('lookup', m[1]) : null;
    },
  },
  fieldLookup('contractor-lookup', 'contractor_lookup', new RegExp(`who is the contractor.*?${PROJECT_ID}(?:\\s|$)`)),
  fieldLookup('budget-lookup', 'budget_lookup', new RegExp(`what is the budget.*?${PROJECT_ID}(?:\\s|$)`)),
  fieldLookup('start-date-lookup', 'start_date_lookup', new RegExp(`when did.*?${PROJECT_ID}.*start`)),
  fieldLookup('completion-lookup', 'completion_lookup', new RegExp(`when.*?${PROJECT_ID}.*(?:complet|finish)`)),
  fieldLookup('location-lookup', 'location_lookup', new RegExp(`(?:where is|what is the location).*?${PROJECT_ID}(?:\\s|$)`)),
  fieldLookup(
    'project-detail-lookup',
    'lookup',
    new RegExp(`(?:what is the cost|who is the consultant|what is the status|details? (?:of|for)|tell me about).*?${PROJECT_ID}(?:\\s|$)`)
  ),
  {
    name: 'bare-project-id',
    action: 'lookup',
    matches: ({ p }) => new RegExp(`^${PROJECT_ID}$`).test(stripEndPunctuation(p)),
    extract: ({ p }) => lookup('lookup', stripEndPunctuation(p)),
  },
];

function fieldLookup(name: string, action: LookupAction, pattern: RegExp): IntentRule {
  return {
    name,
    action,
    matches: ({ p }) => pattern.test(stripEndPunctuation(p)),
    extract: ({ p }) => {
      const m = stripEndPunctuation(p).match(pattern);
      return m ? lookup(action, m[1]) : null;
    },
  };
}

const UNKNOWN: IntentDraft = { action: 'unknown', filters: {}, time: {}, column: null };

/**
 * Classify a (normalized) question. Never throws; unmatched input is 'unknown'.
 */
export function classifyIntent(question: string, dataset: Dataset, now: Date = new Date()): ParsedIntent {
  const ctx: RuleContext = { question, p: question.toLowerCase(), dataset, now };

  for (const rule of INTENT_RULES) {
    if (!rule.matches(ctx)) continue;
    const draft = rule.extract(ctx);
    if (!draft) {
      debugBranch(`${rule.name} (declined)`);
      continue;
    }
    const intent: ParsedIntent = { ...draft, rule: rule.name };
    debugIntent(intent);
    return intent;
  }

  return { ...UNKNOWN, rule: 'unknown' };
}
