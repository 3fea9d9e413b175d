/**
 * Column resolution
 *
 * One place that maps a logical column role to an actual dataset column:
 * exact normalized name, then substring, then approximate match.
 */

import { COLUMN_CANDIDATES, FUZZY_THRESHOLDS, PROJECT_ID_COLUMNS, type ColumnRole } from '../constants';
import type { ApproximateMatcher } from './fuzzyMatch';

function normKey(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

export class ColumnResolver {
  private readonly normalized: Map<string, string>;
  private readonly roleCache = new Map<ColumnRole, string | null>();

  constructor(
    readonly columns: readonly string[],
    private readonly matcher: ApproximateMatcher | null
  ) {
    this.normalized = new Map();
    for (const col of columns) {
      const key = normKey(col);
      if (!this.normalized.has(key)) this.normalized.set(key, col);
    }
  }

  has(column: string): boolean {
    return this.columns.includes(column);
  }

  /**
   * First column matching any candidate, or null
   */
  find(candidates: readonly string[]): string | null {
    // 1) exact normalized match
    for (const cand of candidates) {
      const hit = this.normalized.get(normKey(cand));
      if (hit !== undefined) return hit;
    }

    // 2) substring match on normalized names
    for (const cand of candidates) {
      const key = normKey(cand);
      if (!key) continue;
      const hit = this.columns.find(col => normKey(col).includes(key));
      if (hit !== undefined) return hit;
    }

    // 3) approximate match
    if (this.matcher) {
      const keys = this.columns.map(normKey);
      for (const cand of candidates) {
        const query = normKey(cand);
        if (!query) continue;
        const best = this.matcher.extractOne(query, keys, FUZZY_THRESHOLDS.COLUMN_NAME);
        if (best) return this.columns[best.index];
      }
    }

    return null;
  }

  /** Column whose normalized name equals the candidate's, or null */
  exact(candidate: string): string | null {
    return this.normalized.get(normKey(candidate)) ?? null;
  }

  role(role: ColumnRole): string | null {
    const cached = this.roleCache.get(role);
    if (cached !== undefined) return cached;
    const resolved = this.find(COLUMN_CANDIDATES[role]);
    this.roleCache.set(role, resolved);
    return resolved;
  }

  /**
   * Project identifier column: canonical names, then any column containing
   * both "project" and "id", then the first column.
   */
  projectIdColumn(): string | null {
    for (const name of PROJECT_ID_COLUMNS) {
      if (this.columns.includes(name)) return name;
    }
    const combined = this.columns.find(col => {
      const lower = col.toLowerCase();
      return lower.includes('project') && lower.includes('id');
    });
    if (combined !== undefined) return combined;
    return this.columns.length > 0 ? this.columns[0] : null;
  }
}
