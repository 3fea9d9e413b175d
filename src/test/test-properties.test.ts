/**
 * Properties that hold across datasets: region spellings, counts, pagination
 * and repeatability
 */

import { describe, it, expect } from 'vitest';
import { createDataset, resolve } from '../router';
import { ROMAN_MAP } from '../router/helpers/regions';
import { runAggregation } from '../router/services/aggregations';
import { applyFilters } from '../router/services/filterApplier';
import { normalizeQuestion } from '../router/services/normalizer';
import { PaginationCursor } from '../router/services/pagination';
import { NO_MORE_MESSAGE } from '../router/services/responseFormatter';
import { QuerySession } from '../router/services/sessionRegistry';
import type { ParsedIntent, ProjectRecord } from '../types';
import { fixtureDataset } from './fixtures/dataset';

const intent = (input: Partial<ParsedIntent> & Pick<ParsedIntent, 'action'>): ParsedIntent => ({
  rule: 'test',
  filters: {},
  time: {},
  column: null,
  ...input,
});

function moneyValue(text: string): number {
  return Number(text.replace(/[₱,]/g, ''));
}

describe('region spellings', () => {
  const regions = createDataset(
    Object.entries(ROMAN_MAP).map(([digit, roman]) => ({
      project_id: `R${digit}`,
      region: `Region ${roman.toUpperCase()}`,
      approved_budget_num: 100,
    })),
    { matcher: null }
  );

  it.each(Object.entries(ROMAN_MAP))('region %s selects the same rows in every spelling', (digit, roman) => {
    const ids = (region: string) => applyFilters(regions, { region }).map(row => row.project_id);
    expect(ids(digit)).toEqual([`R${digit}`]);
    expect(ids(roman)).toEqual([`R${digit}`]);
    expect(ids(`region ${digit}`)).toEqual([`R${digit}`]);
    expect(ids(`Region ${roman.toUpperCase()}`)).toEqual([`R${digit}`]);
  });

  it('sums Region II rows under region 2', () => {
    const rows: ProjectRecord[] = [
      { project_id: 'A', region: 'Region II', approved_budget_num: 100 },
      { project_id: 'B', region: 'Region II', approved_budget_num: 200 },
      { project_id: 'C', region: 'Region II', approved_budget_num: 300 },
      { project_id: 'D', region: 'Region III', approved_budget_num: 999 },
    ];
    const dataset = createDataset(rows, { matcher: null });
    expect(runAggregation(intent({ action: 'sum', filters: { region: '2' } }), dataset, new PaginationCursor())).toBe(
      'The total approved budget in Region II is ₱600.00.'
    );
  });
});

describe('counts', () => {
  it('counts every row when no filter applies', () => {
    const rows: ProjectRecord[] = Array.from({ length: 9 }, (_, i) => ({ project_id: `N${i + 1}`, approved_budget_num: 1000 }));
    const dataset = createDataset(rows, { matcher: null });
    expect(resolve('how many projects are there', dataset)).toBe('There are 9 flood control projects in the dataset.');
  });
});

describe('multi-location sums', () => {
  it('splits the total of the selected rows into per-place subtotals', () => {
    const dataset = fixtureDataset();
    const places = ['TUGUEGARAO CITY', 'CITY OF ILAGAN'];
    const answer = runAggregation(intent({ action: 'sum', filters: { multi_locations: places } }), dataset, new PaginationCursor());

    const subtotals = answer
      .split('\n')
      .slice(1)
      .map(line => moneyValue(line.slice(line.lastIndexOf(': ') + 2)));
    const total = applyFilters(dataset, { multi_locations: places }).reduce(
      (acc, row) => acc + (typeof row.approved_budget_num === 'number' ? row.approved_budget_num : 0),
      0
    );

    expect(subtotals).toEqual([15_000_000, 13_400_000]);
    expect(subtotals.reduce((a, b) => a + b, 0)).toBe(total);
  });
});

describe('pagination', () => {
  it('pages twelve rows as 5, 5, 2 and then stops', () => {
    const rows = Array.from({ length: 12 }, (_, i) => ({ projectId: `Q${i + 1}`, label: 'X', amount: 12 - i }));
    const session = new QuerySession('s1');
    session.cursor.start('location', {}, rows, '', 0);

    const sizes = [1, 2, 3].map(() => session.cursor.next(5)?.rows.length);
    expect(sizes).toEqual([5, 5, 2]);

    const dataset = createDataset([], { matcher: null });
    expect(runAggregation(intent({ action: 'more_projects' }), dataset, session.cursor)).toBe(NO_MORE_MESSAGE);
  });
});

describe('repeatability', () => {
  it('normalizes an already normalized question to itself', () => {
    const dataset = fixtureDataset();
    const once = normalizeQuestion('how many projects in tuguegaro city', dataset.vocabulary(), dataset.matcher);
    expect(normalizeQuestion(once, dataset.vocabulary(), dataset.matcher)).toBe(once);
  });

  it('gives the same answer to the same question twice', () => {
    const dataset = fixtureDataset();
    const session = new QuerySession('s1');
    const question = 'Which contractor has the highest total budget?';
    expect(resolve(question, dataset, { session })).toBe(resolve(question, dataset, { session }));
  });
});
