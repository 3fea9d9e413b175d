/**
 * Filter & time application
 *
 * Narrows dataset rows to the ones matching a FilterSpec and a TimeSpec.
 * Always returns a new array; rows themselves are shared and frozen.
 */

import { numericYear, parseDateValue, yearOf } from '../helpers/dateParser';
import { isNcrAlias, matchesRegionPattern, NCR_ALIASES, regionPatterns } from '../helpers/regions';
import type { ColumnRole } from '../constants';
import type { CellValue, FilterSpec, ProjectRecord, TimeSpec } from '../../types';
import { cellText, type Dataset } from './dataset';
import type { ColumnResolver } from '../helpers/columns';

type Rows = readonly ProjectRecord[];

const TEXT_FILTERS: ReadonlyArray<[keyof FilterSpec, ColumnRole]> = [
  ['municipality', 'municipality'],
  ['province', 'province'],
  ['project_location', 'projectLocation'],
  ['contractor', 'contractor'],
];

function lower(value: CellValue): string {
  return cellText(value).toLowerCase();
}

function applyMultiLocation(rows: Rows, places: readonly string[], columns: ColumnResolver): Rows {
  const muniCol = columns.role('municipality');
  const provCol = columns.role('province');
  if (muniCol === null && provCol === null) return rows;
  const wanted = places.map(place => place.trim().toLowerCase());
  return rows.filter(row =>
    (muniCol !== null && wanted.some(place => lower(row[muniCol]).includes(place))) ||
    (provCol !== null && wanted.some(place => lower(row[provCol]).includes(place)))
  );
}

function applyRegion(rows: Rows, value: string, columns: ColumnResolver): Rows {
  const regionCol = columns.role('region');
  if (regionCol === null) return rows;
  const patterns = regionPatterns(value);

  // Metro Manila rows often carry the alias only in province or office text
  const aliasCols = isNcrAlias(value)
    ? [columns.role('province'), columns.role('districtOffice')].filter((col): col is string => col !== null)
    : [];

  return rows.filter(row => {
    const cell = cellText(row[regionCol]);
    if (patterns.some(pattern => matchesRegionPattern(cell, pattern))) return true;
    return aliasCols.some(col => {
      const text = lower(row[col]);
      return NCR_ALIASES.some(alias => text.includes(alias));
    });
  });
}

/**
 * Exact trimmed case-insensitive match; containment only when nothing matched
 * exactly. Numeric cells compare by value.
 */
function applyTextFilter(rows: Rows, column: string, value: string): Rows {
  const wanted = value.trim().toLowerCase();
  const asNumber = Number(wanted);
  const exact = rows.filter(row => {
    const cell = row[column];
    if (typeof cell === 'number') return wanted !== '' && cell === asNumber;
    return lower(cell) === wanted;
  });
  if (exact.length > 0) return exact;
  return rows.filter(row => typeof row[column] !== 'number' && lower(row[column]).includes(wanted));
}

function textFilterColumn(columns: ColumnResolver, key: keyof FilterSpec, role: ColumnRole): string | null {
  return columns.role(role) ?? (columns.has(key) ? key : null);
}

/**
 * Roles of the text filters in `filters` that no dataset column can serve
 */
export function missingFilterColumns(dataset: Dataset, filters: FilterSpec): ColumnRole[] {
  return TEXT_FILTERS.filter(([key, role]) => {
    const value = filters[key];
    return typeof value === 'string' && value !== '' && textFilterColumn(dataset.columns, key, role) === null;
  }).map(([, role]) => role);
}

export function applyFilters(dataset: Dataset, filters: FilterSpec, source: Rows = dataset.rows): Rows {
  const columns = dataset.columns;
  let out: Rows = source.slice();

  if (filters.multi_locations && filters.multi_locations.length > 0) {
    out = applyMultiLocation(out, filters.multi_locations, columns);
  }

  if (filters.region) {
    out = applyRegion(out, filters.region, columns);
  }

  if (filters.main_island) {
    const islandCol = columns.role('mainIsland');
    const wanted = filters.main_island.toLowerCase();
    if (islandCol !== null) out = out.filter(row => lower(row[islandCol]) === wanted);
  }

  for (const [key, role] of TEXT_FILTERS) {
    const value = filters[key];
    if (typeof value !== 'string' || value === '') continue;
    // Filters on columns the dataset lacks are skipped
    const column = textFilterColumn(columns, key, role);
    if (column === null) continue;
    out = applyTextFilter(out, column, value);
  }

  return out;
}

/**
 * Year a project belongs to: its start date, else its funding year
 */
export function projectYear(row: ProjectRecord, columns: ColumnResolver): number | null {
  const startCol = columns.role('startDate');
  const fromStart = startCol !== null ? yearOf(row[startCol]) : null;
  if (fromStart !== null) return fromStart;
  const yearCol = columns.role('fundingYear');
  return yearCol !== null ? numericYear(row[yearCol]) : null;
}

export function applyTimeFilters(dataset: Dataset, rows: Rows, time: TimeSpec, now: Date = new Date()): Rows {
  const columns = dataset.columns;
  const completionCol = columns.role('completionDate');
  let out: Rows = rows.slice();

  if (time.completed_year !== undefined && completionCol !== null) {
    const year = time.completed_year;
    out = out.filter(row => yearOf(row[completionCol]) === year);
  }

  if (time.year !== undefined) {
    const year = time.year;
    out = out.filter(row => projectYear(row, columns) === year);
  }

  if (time.year_range) {
    const [from, to] = time.year_range;
    out = out.filter(row => {
      const year = projectYear(row, columns);
      return year !== null && year >= from && year <= to;
    });
  }

  if (time.status && completionCol !== null) {
    const cutoff = now.getTime();
    out = out.filter(row => {
      const completed = parseDateValue(row[completionCol]);
      if (time.status === 'ongoing') return completed === null || completed.getTime() > cutoff;
      return completed !== null && completed.getTime() <= cutoff;
    });
  }

  return out;
}
