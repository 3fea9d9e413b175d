/**
 * Date Parser Utility
 *
 * Handles the time qualifiers a question can carry:
 * - Year ranges (between 2021 and 2023)
 * - Single years (in 2023, for 2024)
 * - Completion years (completed in 2022)
 * - Relative years (last year, this year)
 * - Status keywords (ongoing, completed)
 *
 * Also parses the date cells of project records.
 */

import type { CellValue, TimeSpec } from '../../types';

/**
 * Parse time qualifiers from question text.
 * A year range returns immediately; other qualifiers combine.
 */
export function parseTimeFilters(text: string, now: Date = new Date()): TimeSpec {
  const lowerText = text.toLowerCase();
  const filters: TimeSpec = {};

  const rangeMatch = lowerText.match(/between\s+(\d{4})\s+and\s+(\d{4})/);
  if (rangeMatch) {
    const a = parseInt(rangeMatch[1], 10);
    const b = parseInt(rangeMatch[2], 10);
    filters.year_range = [Math.min(a, b), Math.max(a, b)];
    return filters;
  }

  // "completed in 2022" names the completion year only
  const yearMatch = lowerText.match(/(?<!completed\s+)\b(?:in|for)\s+(\d{4})\b/);
  if (yearMatch) {
    filters.year = parseInt(yearMatch[1], 10);
  }

  const completedMatch = lowerText.match(/completed\s+in\s+(\d{4})/);
  if (completedMatch) {
    filters.completed_year = parseInt(completedMatch[1], 10);
  }

  if (lowerText.includes('last year')) {
    filters.year = now.getFullYear() - 1;
  }
  if (lowerText.includes('this year')) {
    filters.year = now.getFullYear();
  }

  if (/\bongoing\b/.test(lowerText)) {
    filters.status = 'ongoing';
  }
  if (/\bcompleted\b/.test(lowerText) && filters.completed_year === undefined) {
    filters.status = 'completed';
  }

  return filters;
}

export function hasTimeSpec(filters: TimeSpec): boolean {
  return (
    filters.year !== undefined ||
    filters.year_range !== undefined ||
    filters.completed_year !== undefined ||
    filters.status !== undefined
  );
}

/**
 * Parse a date cell. Empty or unparseable values give null.
 */
export function parseDateValue(value: CellValue): Date | null {
  if (value === null || value === undefined) return null;
  const text = String(value).trim();
  if (!text) return null;
  const time = Date.parse(text);
  return Number.isNaN(time) ? null : new Date(time);
}

/**
 * Calendar year of a date cell. ISO-prefixed strings are read directly so the
 * result does not depend on the local timezone.
 */
export function yearOf(value: CellValue): number | null {
  if (value === null || value === undefined) return null;
  const text = String(value).trim();
  const iso = text.match(/^(\d{4})-\d{2}-\d{2}/);
  if (iso) return parseInt(iso[1], 10);
  const parsed = parseDateValue(text);
  return parsed ? parsed.getFullYear() : null;
}

/**
 * Numeric year from a funding-year style cell ("2022", 2022, "2022.0")
 */
export function numericYear(value: CellValue): number | null {
  if (value === null || value === undefined) return null;
  const num = typeof value === 'number' ? value : Number(String(value).trim());
  if (!Number.isFinite(num) || String(value).trim() === '') return null;
  return Math.trunc(num);
}
