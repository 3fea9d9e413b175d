/**
 * Response Formatter
 *
 * Message templates and the small rendering helpers they share: money,
 * place phrases, time phrases and listing lines.
 */

import { CURRENCY_SYMBOL, DATASET_NOUN } from '../constants';
import { displayMunicipality, titleCase } from '../helpers/placeNames';
import { displayRegion } from '../helpers/regions';
import type { FilterSpec, PagedRow, PaginationMode, ParsedIntent, TimeSpec } from '../../types';

const MONEY = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export const UNKNOWN_MESSAGE = "Sorry — I couldn't understand the question.";
export const NO_MORE_MESSAGE =
  "There are no more projects to show for the last location. You can ask for another place or specify a contractor.";
export const APOLOGY_MESSAGE = 'Sorry, something went wrong while answering that question. Please try again.';

/** 1234567.5 -> "₱1,234,567.50" */
export function formatMoney(value: number): string {
  return `${CURRENCY_SYMBOL}${MONEY.format(value)}`;
}

/**
 * Place fragments in display order: municipality, province, region, island,
 * project location, multi-location list
 */
export function placeParts(filters: FilterSpec): string[] {
  const parts: string[] = [];
  if (filters.municipality) parts.push(displayMunicipality(filters.municipality));
  if (filters.province) parts.push(filters.province);
  if (filters.region) parts.push(displayRegion(filters.region));
  if (filters.main_island) parts.push(titleCase(filters.main_island));
  if (filters.project_location) parts.push(filters.project_location);
  if (filters.multi_locations && filters.multi_locations.length > 0) parts.push(filters.multi_locations.join(' or '));
  return parts;
}

/** " in Quezon City, Region II" or "" */
export function placeContext(filters: FilterSpec): string {
  const parts = placeParts(filters);
  return parts.length > 0 ? ` in ${parts.join(', ')}` : '';
}

export function timeParts(time: TimeSpec): string[] {
  const bits: string[] = [];
  if (time.completed_year !== undefined) bits.push(`completed in ${time.completed_year}`);
  if (time.year !== undefined) bits.push(`in ${time.year}`);
  if (time.year_range) bits.push(`between ${time.year_range[0]} and ${time.year_range[1]}`);
  if (time.status) bits.push(time.status);
  return bits;
}

/** " in 2023", " between 2021 and 2022, ongoing" or "" */
export function timeContext(time: TimeSpec): string {
  const bits = timeParts(time);
  return bits.length > 0 ? ` ${bits.join(', ')}` : '';
}

function projectNoun(n: number): string {
  return n === 1 ? DATASET_NOUN.replace(/projects$/, 'project') : DATASET_NOUN;
}

export function countMessage(n: number, filters: FilterSpec, time: TimeSpec): string {
  const noun = projectNoun(n);
  if (filters.contractor) return `${filters.contractor} has ${n} ${noun}${timeContext(time)}.`;
  const verb = n === 1 ? 'There is' : 'There are';
  const place = placeContext(filters);
  const when = timeContext(time);
  if (!place && !when) return `${verb} ${n} ${noun} in the dataset.`;
  return `${verb} ${n} ${noun}${place}${when}.`;
}

export function sumMessage(total: number, filters: FilterSpec, time: TimeSpec): string {
  const place = placeContext(filters);
  const when = timeContext(time);
  if (!place && !when) return `The total approved budget for all projects is ${formatMoney(total)}.`;
  return `The total approved budget${place}${when} is ${formatMoney(total)}.`;
}

export function notFoundMessage(filters: FilterSpec, time: TimeSpec, suggestions: readonly string[] = []): string {
  if (filters.contractor) return `I couldn't find any ${DATASET_NOUN} for contractor ${filters.contractor}.`;
  const base = `I couldn't find any ${DATASET_NOUN}${placeContext(filters)}${timeContext(time)}.`;
  return suggestions.length > 0 ? `${base} Did you mean: ${suggestions.join(', ')}?` : base;
}

export function missingColumnsMessage(roles: readonly string[]): string {
  return `I couldn't find the required column(s) (${roles.join(', ')}) in the dataset.`;
}

/**
 * One listing line. Location listings show contractor and amount, contractor
 * listings show title and amount.
 */
export function renderPageLine(mode: PaginationMode, row: PagedRow): string {
  const amount = row.amount !== null ? formatMoney(row.amount) : null;
  if (mode === 'contractor') {
    const display = [row.label, amount].filter((part): part is string => Boolean(part)).join(' — ');
    return `- ${row.projectId}: ${display}`;
  }
  return amount !== null ? `- ${row.projectId} — ${row.label} — ${amount}` : `- ${row.projectId} — ${row.label}`;
}

export function moreProjectsTail(pageSize: number): string {
  return `\n\nWould you like ${pageSize} more projects?`;
}

export function morePageMessage(
  mode: PaginationMode,
  headerContext: string,
  rows: readonly PagedRow[],
  remaining: number,
  pageSize: number
): string {
  const header = `More projects${headerContext ? ` ${headerContext}` : ''}:`;
  const lines = rows.map(row => renderPageLine(mode, row));
  return `${header}\n${lines.join('\n')}${remaining > 0 ? moreProjectsTail(pageSize) : ''}`;
}

const PLANS: Partial<Record<ParsedIntent['action'], (intent: ParsedIntent) => string>> = {
  max: ({ top_n }) => `find the highest approved budget${top_n && top_n > 1 ? ` (top ${top_n})` : ''}`,
  min: ({ top_n }) => `find the lowest approved budget${top_n && top_n > 1 ? ` (top ${top_n})` : ''}`,
  sum: () => 'compute the total approved budget',
  count: () => 'count the number of projects',
  top_contractors: ({ top_n }) => `find top ${top_n ?? 5} contractors by total budget`,
  top_contractors_by_count: ({ top_n }) => `find top ${top_n ?? 10} contractors by number of projects`,
  trend_by_year: () => 'show total budget by year (trend)',
  municipality_max_total: () => 'identify the municipality with the highest total budget in the specified region/area',
};

const CLARIFYING_QUESTIONS = [
  '- Do you want a specific year or range (e.g., 2023 or between 2021 and 2022)?',
  '- How many results should I return (e.g., top 3)?',
  '- Should I focus on approved budget or contract cost?',
  '- Is this limited to certain locations or contractors?',
];

/**
 * Describe what would be computed instead of computing it
 */
export function clarifyMessage(intent: ParsedIntent): string {
  const plan = PLANS[intent.action]?.(intent) ?? `perform action '${intent.action}'`;
  const places = placeParts(intent.filters);
  const where = places.length > 0 ? `, in ${places.join(', ')}` : '';
  const when = timeContext(intent.time);
  return `Clarification needed: I plan to: ${plan}${where}${when}.\n${CLARIFYING_QUESTIONS.join('\n')}`;
}
