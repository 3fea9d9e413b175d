import { describe, it, expect } from 'vitest';
import { cellText, clearVocabularyCache, createDataset } from '../dataset';
import { fixtureDataset } from '../../../test/fixtures/dataset';

describe('createDataset', () => {
  it('copies and freezes the rows', () => {
    const source = [{ project_id: 'A1', municipality: 'CEBU CITY' }];
    const dataset = createDataset(source, { matcher: null });

    expect(dataset.rows[0]).not.toBe(source[0]);
    expect(Object.isFrozen(dataset.rows)).toBe(true);
    expect(Object.isFrozen(dataset.rows[0])).toBe(true);
  });

  it('derives the version from the rows', () => {
    const a = createDataset([{ project_id: 'A1', approved_budget_num: 100 }], { matcher: null });
    const same = createDataset([{ project_id: 'A1', approved_budget_num: 100 }], { matcher: null });
    const changed = createDataset([{ project_id: 'A1', approved_budget_num: 200 }], { matcher: null });

    expect(same.version).toBe(a.version);
    expect(changed.version).not.toBe(a.version);
    expect(createDataset([], { version: 'v7' }).version).toBe('v7');
  });
});

describe('vocabulary', () => {
  it('lists distinct places in first-seen order', () => {
    expect(fixtureDataset().vocabulary().municipalities).toEqual([
      'TUGUEGARAO CITY',
      'CITY OF ILAGAN',
      'CEBU CITY',
      'DAVAO CITY',
      'CITY OF MANILA',
    ]);
  });

  it('is built once per snapshot', () => {
    const dataset = fixtureDataset();
    const first = dataset.vocabulary();
    expect(dataset.vocabulary()).toBe(first);

    clearVocabularyCache();
    expect(dataset.vocabulary()).not.toBe(first);
  });

  it('never shares an index between snapshots with the same version tag', () => {
    const a = createDataset([{ project_id: 'A1', municipality: 'A' }], { version: 'v1', matcher: null });
    const b = createDataset([{ project_id: 'B1', municipality: 'B' }], { version: 'v1', matcher: null });
    expect(a.vocabulary().municipalities).toEqual(['A']);
    expect(b.vocabulary().municipalities).toEqual(['B']);
  });
});

describe('cellText', () => {
  it('renders cells as trimmed text', () => {
    expect(cellText(null)).toBe('');
    expect(cellText(' CEBU CITY ')).toBe('CEBU CITY');
    expect(cellText(2022)).toBe('2022');
  });
});
