/**
 * Pagination cursor over the last listing shown in a session.
 * A new listing replaces the cursor; "more" advances it.
 */

import type { FilterSpec, PagedRow, PaginationMode, PaginationState } from '../../types';

export interface PageSlice {
  rows: PagedRow[];
  /** Rows still unseen after this slice */
  remaining: number;
}

function emptyState(): PaginationState {
  return { mode: 'none', filters: {}, rows: [], offset: 0, headerContext: '' };
}

export class PaginationCursor {
  private state: PaginationState = emptyState();

  /**
   * Replace the cursor with a new ordered list and consume its first `shown`
   * rows.
   */
  start(mode: PaginationMode, filters: FilterSpec, rows: readonly PagedRow[], headerContext: string, shown: number): PageSlice {
    const offset = Math.min(Math.max(0, shown), rows.length);
    this.state = { mode, filters: { ...filters }, rows: rows.slice(), offset, headerContext };
    return { rows: rows.slice(0, offset), remaining: rows.length - offset };
  }

  /** Next `count` rows, or null when nothing is left */
  next(count: number): PageSlice | null {
    const { rows, offset } = this.state;
    if (rows.length === 0 || offset >= rows.length) return null;
    const take = rows.slice(offset, offset + Math.max(1, Math.trunc(count)));
    this.state = { ...this.state, offset: offset + take.length };
    return { rows: take, remaining: rows.length - this.state.offset };
  }

  current(): Readonly<PaginationState> {
    return this.state;
  }

  reset(): void {
    this.state = emptyState();
  }
}
