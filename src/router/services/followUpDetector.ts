/**
 * Context-Aware Follow-Up Handling
 *
 * Rewrites short or ambiguous questions with entities remembered from earlier
 * turns, and extracts the entities a turn establishes.
 *
 * Examples:
 * Q1: "How many projects are in Tuguegarao City?"
 * Q2: "What is the total budget?" -> "What is the total budget in Tuguegarao City"
 *
 * Q1: "What is the highest budget?" (answer names Project ID P00012)
 * Q2: "who is the contractor" -> "who is the contractor of P00012"
 */

import type { ConversationContext, ParsedIntent } from '../../types';

/** Project ids carry a digit; plain long words are not ids */
const ID_LIKE = /\b(?=[a-z0-9-]*\d)[a-z][a-z0-9-]{5,19}\b/i;

const PRONOUN_PATTERNS = ['that contractor', 'this contractor', 'the contractor', 'that company', 'this company'];

const BARE_CONTRACTOR = new Set(['who is the contractor', 'what is the contractor', 'contractor']);
const BARE_LISTING = new Set(['show me', 'list them', 'list', 'show them', 'show']);
const BARE_BUDGET = new Set(['what is the budget', 'budget', 'how much', 'what is the cost']);
const BARE_WHERE = new Set(['where is it', 'location', 'where']);

const PAGINATION_REPLY = /^(?:yes|yeah|yep|sure|ok|okay|please|more|more projects|show more|\d+ more(?: projects?)?|give me all \d+ projects)$/;

const EXPLICIT_FILTER_WORDS = [' in ', ' from ', ' by ', ' at ', ' for ', 'region', 'city', 'municipality', 'province'];

const SIMPLE_FOLLOW_UPS = [
  'what is the highest budget',
  'what is the total budget',
  'what is the average',
  'show top',
  'who is the contractor',
  'how much',
  'what is the cost',
];

const NEW_TOPIC_PREFIXES = ['show me', 'list', 'find', 'search', 'how many projects', 'count projects', 'tell me about', 'what about'];

const LOCATION_CHANGE_PATTERNS = [/\bin\s+(?:a\s+different|another|other)\s+/, /switch\s+to/, /change\s+to/, /instead\s+of/];

function bare(question: string): string {
  return question.toLowerCase().trim().replace(/[?.!]+$/, '').trim();
}

function regionPhrase(region: string): string {
  return /^\d+$/.test(region) ? `region ${region}` : region;
}

/**
 * Enhance a question with remembered entities when it does not carry its own
 */
export function applyContextToQuestion(question: string, context: ConversationContext): string {
  const q = bare(question);

  // Project lookups stand alone
  if (ID_LIKE.test(question) || q.includes('project id') || q.includes('projectid')) return question;
  // Paging replies continue the last listing as asked
  if (PAGINATION_REPLY.test(q)) return question;

  if (context.last_project_id) {
    const pid = context.last_project_id;
    if (BARE_CONTRACTOR.has(q)) return `who is the contractor of ${pid}`;
    if (BARE_BUDGET.has(q)) return `what is the budget of ${pid}`;
    if (BARE_WHERE.has(q)) return `where is ${pid}`;
  }

  if (context.contractor && PRONOUN_PATTERNS.some(pattern => q.includes(pattern))) {
    let enhanced = question;
    for (const pattern of PRONOUN_PATTERNS) {
      enhanced = enhanced.replace(new RegExp(pattern, 'gi'), `contractor ${context.contractor}`);
    }
    return enhanced;
  }

  if (BARE_LISTING.has(q)) {
    if (context.municipality) return `show me top 5 projects in ${context.municipality}`;
    if (context.province) return `show me top 5 projects in ${context.province}`;
    if (context.region) return `show me top 5 projects in ${regionPhrase(context.region)}`;
    if (context.last_project_id) return `show me details of ${context.last_project_id}`;
  }

  const padded = ` ${q} `;
  if (EXPLICIT_FILTER_WORDS.some(word => padded.includes(word))) return question;

  const parts = [question.trim().replace(/\?+$/, '')];
  if (context.municipality) parts.push(`in ${context.municipality}`);
  else if (context.province) parts.push(`in ${context.province}`);
  else if (context.region) parts.push(`in ${regionPhrase(context.region)}`);
  else if (context.project_location) parts.push(`in ${context.project_location}`);

  if (context.contractor && /contractor|company|who/.test(q)) parts.push(`for contractor ${context.contractor}`);
  if (context.year !== undefined && /year|when|date/.test(q)) parts.push(`in ${context.year}`);

  return parts.length > 1 ? parts.join(' ') : question;
}

/**
 * True when the question starts a new topic and remembered entities should go
 */
export function shouldClearContext(question: string): boolean {
  const q = question.toLowerCase().trim();

  if (ID_LIKE.test(question)) return false;
  const b = bare(question);
  if ([BARE_CONTRACTOR, BARE_LISTING, BARE_BUDGET, BARE_WHERE].some(set => set.has(b))) return false;
  if (['project id', 'who is the contractor of', 'what is the budget of'].some(p => q.includes(p))) return false;
  if (SIMPLE_FOLLOW_UPS.some(p => q.includes(p))) return false;

  if (/\b(?:in|from)\s+(?:region|province|city|municipality|cebu|manila|quezon)/.test(q)) return true;
  if (NEW_TOPIC_PREFIXES.some(prefix => q.startsWith(prefix))) return true;
  return LOCATION_CHANGE_PATTERNS.some(pattern => pattern.test(q));
}

/**
 * Entities a classified question establishes
 */
export function extractContext(intent: ParsedIntent): ConversationContext {
  const context: ConversationContext = {};
  const { filters, time } = intent;

  if (filters.municipality) context.municipality = filters.municipality;
  if (filters.province) context.province = filters.province;
  if (filters.region) context.region = filters.region;
  if (filters.contractor) context.contractor = filters.contractor;
  if (filters.project_location) context.project_location = filters.project_location;
  if (filters.main_island) context.main_island = filters.main_island;

  if (time.year !== undefined) context.year = time.year;
  if (time.year_range) context.year_range = time.year_range;

  if (intent.action !== 'unknown' && intent.action !== 'more_projects') context.last_action = intent.action;
  if (intent.column) context.last_column = intent.column;
  if (intent.top_n !== undefined) context.last_top_n = intent.top_n;

  return context;
}

const ANSWER_PROJECT_ID = /[Pp]roject\s+(?:ID:?\s+)?([A-Z0-9]{6,20})\b/;
const ANSWER_CONTRACTOR_SENTENCE = /contractor.*?is\s+([A-Z][A-Z\s/\-&.,()]+?)(?:\.|$)/im;
const ANSWER_CONTRACTOR_FIELD = /^Contractor:\s*(.+)$/m;

/**
 * Entities named in an answer: the first project id, and for lookups the
 * contractor
 */
export function extractFromAnswer(answer: string, intent: ParsedIntent): ConversationContext {
  const context: ConversationContext = {};

  if (intent.action === 'lookup' || intent.action === 'contractor_lookup') {
    const match = answer.match(ANSWER_CONTRACTOR_FIELD) ?? answer.match(ANSWER_CONTRACTOR_SENTENCE);
    const name = match ? match[1].replace(/\s*\(FORMERLY:.*?\)\s*$/i, '').trim() : '';
    if (name) context.contractor = name;
  }

  const pid = answer.match(ANSWER_PROJECT_ID);
  if (pid) context.last_project_id = pid[1];

  return context;
}

/**
 * One-line description of the remembered entities:
 *   "Tuguegarao City, Region 2, Contractor: ALPHA BUILDERS, 2023"
 */
export function contextSummary(context: ConversationContext): string {
  const parts: string[] = [];
  if (context.municipality) parts.push(context.municipality);
  else if (context.province) parts.push(context.province);

  if (context.region) {
    const upper = context.region.toUpperCase();
    if (upper === 'NCR' || upper === 'NATIONAL CAPITAL REGION') parts.push('NCR');
    else if (upper === 'CAR' || upper === 'CORDILLERA') parts.push('CAR');
    else parts.push(`Region ${context.region}`);
  }

  if (context.contractor) parts.push(`Contractor: ${context.contractor}`);

  if (context.year !== undefined) parts.push(String(context.year));
  else if (context.year_range) parts.push(`${context.year_range[0]}-${context.year_range[1]}`);

  return parts.length > 0 ? parts.join(', ') : 'No active context';
}
