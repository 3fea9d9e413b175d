/**
 * Date Parser - Unit Tests
 *
 * Time qualifiers in questions and date cells in records.
 * Current date for testing: 2024-06-30
 */

import { describe, it, expect } from 'vitest';
import { hasTimeSpec, numericYear, parseDateValue, parseTimeFilters, yearOf } from '../dateParser';

const NOW = new Date('2024-06-30T00:00:00Z');

describe('Date Parser - parseTimeFilters', () => {
  describe('year ranges', () => {
    it('should parse "between 2021 and 2023"', () => {
      expect(parseTimeFilters('projects between 2021 and 2023', NOW)).toEqual({ year_range: [2021, 2023] });
    });

    it('should order reversed bounds', () => {
      expect(parseTimeFilters('between 2023 and 2021', NOW)).toEqual({ year_range: [2021, 2023] });
    });

    it('should ignore other qualifiers once a range is found', () => {
      expect(parseTimeFilters('ongoing projects between 2021 and 2022', NOW)).toEqual({ year_range: [2021, 2022] });
    });
  });

  describe('single years', () => {
    it('should parse "in 2023"', () => {
      expect(parseTimeFilters('total budget in 2023', NOW)).toEqual({ year: 2023 });
    });

    it('should parse "for 2024"', () => {
      expect(parseTimeFilters('budget for 2024', NOW)).toEqual({ year: 2024 });
    });

    it('should not read a non-year number', () => {
      expect(parseTimeFilters('top 10 projects in 20', NOW)).toEqual({});
    });
  });

  describe('completion years and status', () => {
    it('should parse "completed in 2022" as the completion year only', () => {
      expect(parseTimeFilters('projects completed in 2022', NOW)).toEqual({ completed_year: 2022 });
    });

    it('should combine a start year with a completion year', () => {
      expect(parseTimeFilters('projects in 2022 completed in 2023', NOW)).toEqual({ year: 2022, completed_year: 2023 });
    });

    it('should detect ongoing', () => {
      expect(parseTimeFilters('how many ongoing projects', NOW)).toEqual({ status: 'ongoing' });
    });

    it('should detect completed without a year', () => {
      expect(parseTimeFilters('how many completed projects in 2023', NOW)).toEqual({ year: 2023, status: 'completed' });
    });
  });

  describe('relative years', () => {
    it('should resolve "last year" against the clock', () => {
      expect(parseTimeFilters('projects started last year', NOW)).toEqual({ year: 2023 });
    });

    it('should resolve "this year" against the clock', () => {
      expect(parseTimeFilters('budget this year', NOW)).toEqual({ year: 2024 });
    });
  });

  it('should return no filters for plain questions', () => {
    const filters = parseTimeFilters('how many projects are there', NOW);
    expect(filters).toEqual({});
    expect(hasTimeSpec(filters)).toBe(false);
  });
});

describe('Date Parser - cell values', () => {
  it('should read the year of ISO dates without timezone drift', () => {
    expect(yearOf('2023-01-01')).toBe(2023);
    expect(yearOf('2021-12-31T23:00:00+08:00')).toBe(2021);
  });

  it('should return null for empty and unparseable cells', () => {
    expect(yearOf('')).toBeNull();
    expect(yearOf(null)).toBeNull();
    expect(parseDateValue('not a date')).toBeNull();
    expect(parseDateValue(undefined)).toBeNull();
  });

  it('should parse funding-year cells', () => {
    expect(numericYear(2022)).toBe(2022);
    expect(numericYear('2022')).toBe(2022);
    expect(numericYear('2022.0')).toBe(2022);
    expect(numericYear('')).toBeNull();
    expect(numericYear('n/a')).toBeNull();
  });
});
