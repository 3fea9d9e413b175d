import { describe, it, expect } from 'vitest';
import { ColumnResolver } from '../columns';
import { defaultMatcher } from '../fuzzyMatch';

describe('ColumnResolver', () => {
  it('resolves a role by normalized name', () => {
    const columns = new ColumnResolver(['Project_ID', 'Approved Budget For Contract', 'Municipality'], null);
    expect(columns.role('budget')).toBe('Approved Budget For Contract');
    expect(columns.role('municipality')).toBe('Municipality');
  });

  it('falls back to substring matches', () => {
    const columns = new ColumnResolver(['contractor_name_full'], null);
    expect(columns.role('contractor')).toBe('contractor_name_full');
  });

  it('uses the approximate matcher only when one is given', () => {
    expect(new ColumnResolver(['municpality'], defaultMatcher).role('municipality')).toBe('municpality');
    expect(new ColumnResolver(['municpality'], null).role('municipality')).toBeNull();
  });

  it('looks up exact normalized names', () => {
    const columns = new ColumnResolver(['Approved Budget For Contract'], null);
    expect(columns.exact('approved_budget_for_contract')).toBe('Approved Budget For Contract');
    expect(columns.exact('budget')).toBeNull();
  });

  describe('projectIdColumn', () => {
    it('prefers canonical names', () => {
      expect(new ColumnResolver(['name', 'ProjectID'], null).projectIdColumn()).toBe('ProjectID');
    });

    it('finds a column naming both project and id', () => {
      expect(new ColumnResolver(['name', 'contract_project_id_no'], null).projectIdColumn()).toBe('contract_project_id_no');
    });

    it('falls back to the first column', () => {
      expect(new ColumnResolver(['name', 'value'], null).projectIdColumn()).toBe('name');
      expect(new ColumnResolver([], null).projectIdColumn()).toBeNull();
    });
  });
});
