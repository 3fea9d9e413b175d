/**
 * Aggregation Engine
 *
 * Executes a ParsedIntent against a dataset and renders the answer. Listing
 * actions register their full ordering with the session's pagination cursor.
 */

import { RESULT_LIMITS, type ColumnRole } from '../constants';
import { hasTimeSpec } from '../helpers/dateParser';
import { debugFilters } from '../helpers/debug';
import { displayMunicipality, normalizeLguText, titleCase } from '../helpers/placeNames';
import projectFields from '../data/projectFields.json';
import type { CellValue, FilterSpec, PagedRow, ParsedIntent, ProjectRecord } from '../../types';
import { cellText, type Dataset } from './dataset';
import { applyFilters, applyTimeFilters, missingFilterColumns, projectYear } from './filterApplier';
import type { PaginationCursor } from './pagination';
import {
  countMessage,
  formatMoney,
  missingColumnsMessage,
  moreProjectsTail,
  morePageMessage,
  NO_MORE_MESSAGE,
  notFoundMessage,
  placeContext,
  placeParts,
  renderPageLine,
  sumMessage,
  timeContext,
  UNKNOWN_MESSAGE,
} from './responseFormatter';

type Rows = readonly ProjectRecord[];

export interface AggregationOptions {
  pageSize?: number;
  now?: Date;
}

interface Scored {
  row: ProjectRecord;
  amount: number;
}

const BUDGET_LOOKUP_COLUMNS = [
  'approved_budget_num',
  'approvedbudgetforcontract',
  'approved_budget',
  'approved budget for contract',
  'budget',
  'contractcost',
  'contract_amount',
  'contractamount',
  'amount',
];
const START_DATE_COLUMNS = ['startdate', 'start_date', 'datestarted', 'commencement_date'];
const COMPLETION_COLUMNS = ['actualcompletiondate', 'actual_completion', 'datecompleted', 'completion_date'];
const FIELD_MAPPINGS: ReadonlyArray<[string, readonly string[]]> = Object.entries(projectFields);
const MONEY_FIELDS = new Set(['Approved Budget', 'Contract Amount']);

const DECIMAL_AMOUNT = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Budget cell as a number. Blank and non-decimal cells ("n/a", "0x10", "1e3") are null, never zero.
 */
export function toAmount(value: CellValue): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const text = cellText(value).replace(/[₱,\s]/g, '');
  if (!DECIMAL_AMOUNT.test(text)) return null;
  const num = Number(text);
  return Number.isFinite(num) ? num : null;
}

function scoreRows(rows: Rows, budgetCol: string): Scored[] {
  const scored: Scored[] = [];
  for (const row of rows) {
    const amount = toAmount(row[budgetCol]);
    if (amount !== null) scored.push({ row, amount });
  }
  return scored;
}

/**
 * Extreme rows by budget. A single row is the first one in dataset order
 * holding the extreme; for top_n > 1 rows tied with the last one are kept.
 */
export function extremeRows(rows: Rows, budgetCol: string, direction: 'max' | 'min', topN = 1): Scored[] {
  const scored = scoreRows(rows, budgetCol);
  if (scored.length === 0) return [];
  const better = (a: number, b: number) => (direction === 'max' ? a > b : a < b);

  if (topN <= 1) {
    let best = scored[0];
    for (const item of scored) {
      if (better(item.amount, best.amount)) best = item;
    }
    return [best];
  }

  const sorted = scored.slice().sort((a, b) => (direction === 'max' ? b.amount - a.amount : a.amount - b.amount));
  const head = sorted.slice(0, topN);
  const boundary = head[head.length - 1].amount;
  return head.concat(sorted.slice(topN).filter(item => item.amount === boundary));
}

/**
 * Group rows by a key and reduce each group. Groups keep first-seen order;
 * rows with an empty key are skipped.
 */
export function groupBy<T>(rows: Rows, key: (row: ProjectRecord) => string, reduce: (acc: T, row: ProjectRecord) => T, initial: () => T): Map<string, T> {
  const groups = new Map<string, T>();
  for (const row of rows) {
    const k = key(row);
    if (!k) continue;
    groups.set(k, reduce(groups.get(k) ?? initial(), row));
  }
  return groups;
}

/** Entries sorted descending by value; equal values keep first-seen order */
export function rankDescending(groups: Map<string, number>): Array<[string, number]> {
  return [...groups.entries()].sort((a, b) => b[1] - a[1]);
}

/** Every key sharing the maximum value */
export function winners(groups: Map<string, number>): { names: string[]; value: number } | null {
  const ranked = rankDescending(groups);
  if (ranked.length === 0) return null;
  const value = ranked[0][1];
  return { names: ranked.filter(([, v]) => v === value).map(([k]) => k), value };
}

function sumByContractor(rows: Rows, contractorCol: string, budgetCol: string): Map<string, number> {
  const groups = new Map<string, number>();
  for (const { row, amount } of scoreRows(rows, budgetCol)) {
    const name = cellText(row[contractorCol]);
    if (name) groups.set(name, (groups.get(name) ?? 0) + amount);
  }
  return groups;
}

function countByContractor(rows: Rows, contractorCol: string): Map<string, number> {
  return groupBy(rows, row => cellText(row[contractorCol]), acc => acc + 1, () => 0);
}

function projectIdOf(row: ProjectRecord, dataset: Dataset): string {
  const idCol = dataset.columns.projectIdColumn();
  const text = idCol !== null ? cellText(row[idCol]) : '';
  return text || 'N/A';
}

/** First non-empty of municipality, province, legislative district, project location */
function rowLocation(row: ProjectRecord, dataset: Dataset): string {
  const roles: ColumnRole[] = ['municipality', 'province', 'legislativeDistrict', 'projectLocation'];
  for (const role of roles) {
    const col = dataset.columns.role(role);
    const text = col !== null ? cellText(row[col]) : '';
    if (text) return displayMunicipality(text);
  }
  return 'Unknown Location';
}

/**
 * Up to five known municipalities whose normalized name contains the missing
 * place's normalized name
 */
export function suggestPlaces(dataset: Dataset, filters: FilterSpec): string[] {
  const target = normalizeLguText(filters.municipality ?? filters.province ?? '');
  if (!target) return [];
  return dataset
    .vocabulary()
    .municipalities.filter(name => normalizeLguText(name).includes(target))
    .slice(0, RESULT_LIMITS.MAX_SUGGESTIONS)
    .map(displayMunicipality);
}

function hasFilter(filters: FilterSpec): boolean {
  return Object.values(filters).some(value => (Array.isArray(value) ? value.length > 0 : Boolean(value)));
}

// ─── Lookups ────────────────────────────────────────────────────────

function findProject(dataset: Dataset, projectId: string): ProjectRecord | null | 'no-id-column' {
  const idCol = dataset.columns.projectIdColumn();
  if (idCol === null) return 'no-id-column';
  const wanted = projectId.trim().toLowerCase();
  return dataset.rows.find(row => cellText(row[idCol]).toLowerCase() === wanted) ?? null;
}

function firstPresent(row: ProjectRecord, dataset: Dataset, candidates: readonly string[]): [string, string] | null {
  for (const candidate of candidates) {
    const col = dataset.columns.exact(candidate);
    if (col === null) continue;
    const text = cellText(row[col]);
    if (text) return [col, text];
  }
  return null;
}

function budgetLookup(row: ProjectRecord, dataset: Dataset, pid: string): string {
  for (const candidate of BUDGET_LOOKUP_COLUMNS) {
    const col = dataset.columns.exact(candidate);
    if (col === null) continue;
    const value = row[col];
    const text = cellText(value);
    if (!text) continue;
    if (typeof value === 'number') return `The approved budget for Project ID ${pid} is ${formatMoney(value)}.`;

    const digits = text.replace(/[^0-9.-]/g, '');
    const parsed = Number(digits);
    if (digits && !/^[.-]+$/.test(digits) && Number.isFinite(parsed)) {
      return `The approved budget for Project ID ${pid} is ${formatMoney(parsed)} (parsed from column '${col}').`;
    }
    return `The approved budget for Project ID ${pid} is ${text} (from column '${col}').`;
  }

  // No budget column: the largest number found anywhere in the record
  let best: [string, number] | null = null;
  for (const col of dataset.columns.columns) {
    for (const match of cellText(row[col]).match(/\d[\d,]*(?:\.\d+)?/g) ?? []) {
      const num = Number(match.replace(/,/g, ''));
      if (Number.isFinite(num) && (best === null || num > best[1])) best = [col, num];
    }
  }
  if (best) {
    return (
      `I couldn't find a dedicated budget column for Project ID ${pid}, ` +
      `but found a numeric value in column '${best[0]}': ${formatMoney(best[1])}. ` +
      'This may be an inferred value — please verify against the source data.'
    );
  }
  return `Budget information is not available for Project ID ${pid} in the dataset.`;
}

function locationLookup(row: ProjectRecord, dataset: Dataset, pid: string): string {
  const labelled: Array<[string, ColumnRole]> = [
    ['Municipality', 'municipality'],
    ['Province', 'province'],
    ['Legislative District', 'legislativeDistrict'],
  ];
  const info: string[] = [];
  for (const [label, role] of labelled) {
    const col = dataset.columns.role(role);
    const text = col !== null ? cellText(row[col]) : '';
    if (text) info.push(`${label}: ${text}`);
  }
  if (info.length === 0) {
    const col = dataset.columns.role('projectLocation');
    const text = col !== null ? cellText(row[col]) : '';
    if (text) info.push(text);
  }
  return info.length > 0
    ? `Project ID ${pid} is located in ${info.join(', ')}.`
    : `Location information is not available for Project ID ${pid}.`;
}

function projectDetails(row: ProjectRecord, dataset: Dataset, pid: string): string {
  const lines = ['=== PROJECT INFORMATION ===', `Project ID: ${pid}`];
  const covered = new Set<string>();
  const idCol = dataset.columns.projectIdColumn();
  if (idCol !== null) covered.add(idCol);

  for (const [label, candidates] of FIELD_MAPPINGS) {
    for (const candidate of candidates) {
      const col = dataset.columns.exact(candidate);
      if (col !== null) covered.add(col);
    }
    const hit = firstPresent(row, dataset, candidates);
    if (!hit) continue;
    const value = row[hit[0]];
    lines.push(`${label}: ${MONEY_FIELDS.has(label) && typeof value === 'number' ? formatMoney(value) : hit[1]}`);
  }

  lines.push('\n=== ADDITIONAL INFORMATION ===');
  const extra = dataset.columns.columns.filter(col => !covered.has(col) && cellText(row[col]) !== '');
  for (const col of extra) {
    lines.push(`${titleCase(col.replace(/_/g, ' '))}: ${cellText(row[col])}`);
  }
  if (extra.length === 0) lines.push('No additional information available');
  return lines.join('\n');
}

function runLookup(intent: ParsedIntent, dataset: Dataset): string {
  const projectId = intent.filters.project_id ?? '';
  const pid = projectId.toUpperCase();
  const found = findProject(dataset, projectId);
  if (found === 'no-id-column') return "I couldn't find a project ID column in the dataset.";
  if (found === null) return `I couldn't find any project with ID ${pid}.`;

  switch (intent.action) {
    case 'contractor_lookup': {
      const col = dataset.columns.role('contractor');
      const text = col !== null ? cellText(found[col]) : '';
      return text
        ? `The contractor for Project ID ${pid} is ${text}.`
        : `Contractor information is not available for Project ID ${pid}.`;
    }
    case 'budget_lookup':
      return budgetLookup(found, dataset, pid);
    case 'start_date_lookup': {
      const hit = firstPresent(found, dataset, START_DATE_COLUMNS);
      return hit ? `Project ID ${pid} started on ${hit[1]}.` : `Start date information is not available for Project ID ${pid}.`;
    }
    case 'completion_lookup': {
      const hit = firstPresent(found, dataset, COMPLETION_COLUMNS);
      return hit
        ? `Project ID ${pid} was completed on ${hit[1]}.`
        : `Completion date information is not available for Project ID ${pid}.`;
    }
    case 'location_lookup':
      return locationLookup(found, dataset, pid);
    default:
      return projectDetails(found, dataset, pid);
  }
}

// ─── Listings ───────────────────────────────────────────────────────

function listByLocation(intent: ParsedIntent, rows: Rows, dataset: Dataset, budgetCol: string, cursor: PaginationCursor, pageSize: number): string {
  const sorted = scoreRows(rows, budgetCol).sort((a, b) => b.amount - a.amount);
  if (sorted.length === 0) return 'No projects with a valid approved budget were found for that location.';

  const contractorCol = dataset.columns.role('contractor');
  const prepared: PagedRow[] = sorted.map(({ row, amount }) => ({
    projectId: projectIdOf(row, dataset),
    label: (contractorCol !== null ? cellText(row[contractorCol]) : '') || 'Unknown Contractor',
    amount,
  }));

  const requested = intent.top_n ?? pageSize;
  const forceAll = intent.force_all === true;
  const header = placeContext(intent.filters).trim();
  const page = cursor.start('location', intent.filters, prepared, header, forceAll ? requested : Math.min(requested, pageSize));

  const title = `Top ${page.rows.length} projects by approved budget${header ? ` ${header}` : ''}${timeContext(intent.time)}:`;
  const lines = page.rows.map(row => renderPageLine('location', row));
  const tail = !forceAll && page.remaining > 0 ? moreProjectsTail(pageSize) : '';
  return `${title}\n${lines.join('\n')}${tail}`;
}

function listByContractor(intent: ParsedIntent, rows: Rows, dataset: Dataset, budgetCol: string, cursor: PaginationCursor, pageSize: number): string {
  const contractor = intent.filters.contractor ?? '';
  const titleCol = dataset.columns.role('projectTitle');
  const sorted = scoreRows(rows, budgetCol).sort((a, b) => b.amount - a.amount);
  if (sorted.length === 0) return `I couldn't find any projects for contractor ${contractor}.`;

  const prepared: PagedRow[] = sorted.map(({ row, amount }) => ({
    projectId: projectIdOf(row, dataset),
    label: titleCol !== null ? cellText(row[titleCol]) : '',
    amount,
  }));

  const requested = intent.top_n ?? 5;
  const place = placeContext({ ...intent.filters, contractor: undefined });
  const page = cursor.start('contractor', { contractor }, prepared, place.trim() || `for ${contractor}`, Math.min(requested, pageSize));

  const title = `Top ${page.rows.length} projects with the highest approved budget for ${contractor}${place}${timeContext(intent.time)}:`;
  const lines = page.rows.map(row => renderPageLine('contractor', row));
  const tail = page.remaining > 0 ? moreProjectsTail(pageSize) : '';
  return `${title}\n${lines.join('\n')}${tail}`;
}

// ─── Entry point ────────────────────────────────────────────────────

const REQUIRED_ROLES: Partial<Record<ParsedIntent['action'], ColumnRole[]>> = {
  sum: ['budget'],
  max: ['budget'],
  min: ['budget'],
  top_contractors: ['contractor', 'budget'],
  top_contractors_by_count: ['contractor'],
  contractor_max_total_budget: ['contractor', 'budget'],
  contractor_max_count: ['contractor'],
  top_projects_by_location_budget: ['budget'],
  top_projects_by_contractor_budget: ['contractor', 'budget'],
  trend_by_year: ['budget'],
  municipality_max_total: ['municipality', 'budget'],
};

/** "projectLocation" -> "project location" */
function columnLabel(role: ColumnRole): string {
  return role.replace(/[A-Z]/g, letter => ` ${letter.toLowerCase()}`);
}

function column(dataset: Dataset, role: ColumnRole): string {
  return dataset.columns.role(role) ?? role;
}

/**
 * Answer an intent. `cursor` is the asking session's pagination cursor.
 */
export function runAggregation(intent: ParsedIntent, dataset: Dataset, cursor: PaginationCursor, options: AggregationOptions = {}): string {
  const pageSize = options.pageSize ?? RESULT_LIMITS.DEFAULT_PAGE_SIZE;
  const { action, filters, time } = intent;

  if (action === 'unknown') return UNKNOWN_MESSAGE;

  if (action === 'more_projects') {
    const state = cursor.current();
    const page = cursor.next(intent.count ?? pageSize);
    if (!page) return NO_MORE_MESSAGE;
    return morePageMessage(state.mode, state.headerContext, page.rows, page.remaining, pageSize);
  }

  if (filters.project_id !== undefined) return runLookup(intent, dataset);

  const missing = [
    ...(REQUIRED_ROLES[action] ?? []).filter(role => dataset.columns.role(role) === null),
    ...missingFilterColumns(dataset, filters),
  ].map(columnLabel);
  if (action === 'trend_by_year' && dataset.columns.role('startDate') === null && dataset.columns.role('fundingYear') === null) {
    missing.push('start date or funding year');
  }
  if (missing.length > 0) return missingColumnsMessage(missing);

  if (action === 'top_projects_by_contractor_budget' && !filters.contractor) {
    return 'Please specify a contractor name to list their top projects by approved budget.';
  }

  const rows = applyTimeFilters(dataset, applyFilters(dataset, filters), time, options.now);
  debugFilters(filters, time, rows.length);

  if ((hasFilter(filters) || hasTimeSpec(time)) && rows.length === 0) {
    return notFoundMessage(filters, time, suggestPlaces(dataset, filters));
  }

  const scope = `${placeContext(filters)}${timeContext(time)}`;
  const budgetCol = intent.column ?? column(dataset, 'budget');

  switch (action) {
    case 'count':
      return countMessage(rows.length, filters, time);

    case 'sum': {
      const scored = scoreRows(rows, budgetCol);
      const places = filters.multi_locations ?? [];
      if (places.length > 0) return sumByLocation(scored, places, dataset);
      return sumMessage(scored.reduce((acc, item) => acc + item.amount, 0), filters, time);
    }

    case 'max':
    case 'min': {
      const topN = intent.top_n ?? 1;
      const picked = extremeRows(rows, budgetCol, action, topN);
      if (picked.length === 0) return `I couldn't find any projects with a valid approved budget${placeContext(filters)}.`;
      const word = action === 'max' ? 'highest' : 'lowest';
      if (topN > 1) {
        const lines = picked.map(({ row, amount }) => `- ${projectIdOf(row, dataset)} in ${rowLocation(row, dataset)}: ${formatMoney(amount)}`);
        return `Top ${topN} ${word} budgets${scope}:\n${lines.join('\n')}`;
      }
      const [{ row, amount }] = picked;
      const parts = placeParts(filters);
      const lead = parts.length > 0 ? `In ${parts.join(', ')}: ` : '';
      return `${lead}The project with the ${word} approved budget is Project ID ${projectIdOf(row, dataset)} in ${rowLocation(row, dataset)} with ${formatMoney(amount)}.`;
    }

    case 'top_contractors': {
      const topN = intent.top_n ?? 5;
      const ranked = rankDescending(sumByContractor(rows, column(dataset, 'contractor'), budgetCol)).slice(0, topN);
      const lines = ranked.map(([name, total]) => `- ${name}: ${formatMoney(total)}`);
      return `Top ${topN} contractors by total budget${scope}:\n${lines.length > 0 ? lines.join('\n') : 'No contractor data found.'}`;
    }

    case 'top_contractors_by_count': {
      const topN = intent.top_n ?? 10;
      const ranked = rankDescending(countByContractor(rows, column(dataset, 'contractor'))).slice(0, topN);
      const lines = ranked.map(([name, n]) => `- ${name}: ${n} project(s)`);
      return `Top ${topN} contractors by number of projects${scope}:\n${lines.length > 0 ? lines.join('\n') : 'No contractor data found.'}`;
    }

    case 'contractor_max_total_budget': {
      const top = winners(sumByContractor(rows, column(dataset, 'contractor'), budgetCol));
      if (!top) return 'No contractor data found.';
      if (top.names.length === 1) {
        return `The contractor with the highest total approved budget${scope} is ${top.names[0]} with ${formatMoney(top.value)}.`;
      }
      return `There is a tie for the highest total approved budget${scope}: ${top.names.join(', ')} with ${formatMoney(top.value)} each.`;
    }

    case 'contractor_max_count': {
      const top = winners(countByContractor(rows, column(dataset, 'contractor')));
      if (!top) return 'No contractor data found.';
      if (top.names.length === 1) {
        return `The contractor with the highest number of projects${scope} is ${top.names[0]} with ${top.value} project(s).`;
      }
      return `There is a tie for the highest number of projects${scope}: ${top.names.join(', ')} with ${top.value} project(s) each.`;
    }

    case 'top_projects_by_location_budget':
      return listByLocation(intent, rows, dataset, budgetCol, cursor, pageSize);

    case 'top_projects_by_contractor_budget':
      return listByContractor(intent, rows, dataset, budgetCol, cursor, pageSize);

    case 'trend_by_year': {
      const byYear = new Map<number, number>();
      for (const { row, amount } of scoreRows(rows, budgetCol)) {
        const year = projectYear(row, dataset.columns);
        if (year !== null) byYear.set(year, (byYear.get(year) ?? 0) + amount);
      }
      const lines = [...byYear.entries()].sort((a, b) => a[0] - b[0]).map(([year, total]) => `- ${year}: ${formatMoney(total)}`);
      return `Total approved budget by year${scope}:\n${lines.length > 0 ? lines.join('\n') : 'No yearly data available'}`;
    }

    case 'municipality_max_total': {
      const muniCol = column(dataset, 'municipality');
      const totals = new Map<string, number>();
      for (const { row, amount } of scoreRows(rows, budgetCol)) {
        const name = cellText(row[muniCol]);
        if (name) totals.set(name, (totals.get(name) ?? 0) + amount);
      }
      const ranked = rankDescending(totals);
      if (ranked.length === 0) return 'No municipalities found for that area.';
      const [name, total] = ranked[0];
      return `The municipality with the highest total approved budget${scope} is ${displayMunicipality(name)} with ${formatMoney(total)}.`;
    }

    default:
      return UNKNOWN_MESSAGE;
  }
}

/**
 * Per-location subtotals. Each row counts toward the first listed place its
 * municipality or province contains.
 */
function sumByLocation(scored: readonly Scored[], places: readonly string[], dataset: Dataset): string {
  const muniCol = dataset.columns.role('municipality');
  const provCol = dataset.columns.role('province');
  const totals = new Map<string, number>();

  for (const { row, amount } of scored) {
    const muni = muniCol !== null ? cellText(row[muniCol]).toLowerCase() : '';
    const prov = provCol !== null ? cellText(row[provCol]).toLowerCase() : '';
    const place = places.find(p => {
      const wanted = p.trim().toLowerCase();
      return muni.includes(wanted) || prov.includes(wanted);
    });
    if (place !== undefined) totals.set(place, (totals.get(place) ?? 0) + amount);
  }

  const lines = rankDescending(totals).map(([place, total]) => `- ${displayMunicipality(place)}: ${formatMoney(total)}`);
  return `Total approved budget by location:\n${lines.length > 0 ? lines.join('\n') : 'No matching locations.'}`;
}
