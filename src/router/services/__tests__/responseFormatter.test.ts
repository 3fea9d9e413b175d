import { describe, it, expect } from 'vitest';
import {
  clarifyMessage,
  countMessage,
  formatMoney,
  morePageMessage,
  notFoundMessage,
  placeContext,
  renderPageLine,
  sumMessage,
  timeContext,
} from '../responseFormatter';

describe('responseFormatter', () => {
  it('formats money with two decimals and grouping', () => {
    expect(formatMoney(1234567.5)).toBe('₱1,234,567.50');
    expect(formatMoney(0)).toBe('₱0.00');
  });

  describe('place and time phrases', () => {
    it('renders places in display form', () => {
      expect(placeContext({ municipality: 'CITY OF ILAGAN', region: '2' })).toBe(' in Ilagan City, Region II');
      expect(placeContext({ multi_locations: ['TUGUEGARAO CITY', 'CEBU CITY'] })).toBe(' in TUGUEGARAO CITY or CEBU CITY');
      expect(placeContext({})).toBe('');
    });

    it('renders time qualifiers', () => {
      expect(timeContext({ year_range: [2021, 2022] })).toBe(' between 2021 and 2022');
      expect(timeContext({ year: 2023, status: 'ongoing' })).toBe(' in 2023, ongoing');
      expect(timeContext({})).toBe('');
    });
  });

  describe('countMessage', () => {
    it('uses the singular for one project', () => {
      expect(countMessage(1, {}, {})).toBe('There is 1 flood control project in the dataset.');
    });

    it('describes the whole dataset', () => {
      expect(countMessage(9, {}, {})).toBe('There are 9 flood control projects in the dataset.');
    });

    it('names the place and time', () => {
      expect(countMessage(2, { municipality: 'CEBU CITY' }, { year: 2023 })).toBe(
        'There are 2 flood control projects in Cebu City in 2023.'
      );
    });

    it('names the contractor', () => {
      expect(countMessage(3, { contractor: 'ALPHA BUILDERS' }, { year: 2022 })).toBe(
        'ALPHA BUILDERS has 3 flood control projects in 2022.'
      );
    });
  });

  it('renders totals', () => {
    expect(sumMessage(600, {}, {})).toBe('The total approved budget for all projects is ₱600.00.');
    expect(sumMessage(600, { region: '2' }, {})).toBe('The total approved budget in Region II is ₱600.00.');
  });

  describe('notFoundMessage', () => {
    it('offers suggestions when there are any', () => {
      expect(notFoundMessage({ municipality: 'ILAGAN' }, { year: 2020 }, ['Ilagan City'])).toBe(
        "I couldn't find any flood control projects in Ilagan in 2020. Did you mean: Ilagan City?"
      );
    });

    it('names a missing contractor', () => {
      expect(notFoundMessage({ contractor: 'ZULU' }, {})).toBe("I couldn't find any flood control projects for contractor ZULU.");
    });
  });

  describe('listing lines', () => {
    it('renders location listing lines', () => {
      expect(renderPageLine('location', { projectId: 'P1', label: 'ALPHA BUILDERS', amount: 100 })).toBe(
        '- P1 — ALPHA BUILDERS — ₱100.00'
      );
      expect(renderPageLine('location', { projectId: 'P1', label: 'ALPHA BUILDERS', amount: null })).toBe('- P1 — ALPHA BUILDERS');
    });

    it('renders contractor listing lines with or without a title', () => {
      expect(renderPageLine('contractor', { projectId: 'P1', label: 'Dike', amount: 100 })).toBe('- P1: Dike — ₱100.00');
      expect(renderPageLine('contractor', { projectId: 'P1', label: '', amount: 100 })).toBe('- P1: ₱100.00');
    });

    it('offers another page only while rows remain', () => {
      const rows = [{ projectId: 'P1', label: 'ALPHA BUILDERS', amount: 100 }];
      expect(morePageMessage('location', 'in Region II', rows, 3, 5)).toBe(
        'More projects in Region II:\n- P1 — ALPHA BUILDERS — ₱100.00\n\nWould you like 5 more projects?'
      );
      expect(morePageMessage('location', '', rows, 0, 5)).toBe('More projects:\n- P1 — ALPHA BUILDERS — ₱100.00');
    });
  });

  describe('clarifyMessage', () => {
    it('describes the plan and asks the clarifying questions', () => {
      const message = clarifyMessage({
        action: 'max',
        rule: 'highest-budget',
        filters: { municipality: 'CEBU CITY' },
        time: { year: 2023 },
        column: 'approved_budget_num',
        top_n: 3,
      });
      const lines = message.split('\n');
      expect(lines[0]).toBe('Clarification needed: I plan to: find the highest approved budget (top 3), in Cebu City in 2023.');
      expect(lines).toHaveLength(5);
    });

    it('falls back to the action tag for actions without a plan', () => {
      const message = clarifyMessage({ action: 'contractor_max_count', rule: 'contractor-most-projects', filters: {}, time: {}, column: null });
      expect(message.split('\n')[0]).toBe("Clarification needed: I plan to: perform action 'contractor_max_count'.");
    });
  });
});
