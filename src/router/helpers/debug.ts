/**
 * Debug logging helpers for router
 */

import { getConfig } from '../../config';
import type { FilterSpec, ParsedIntent, TimeSpec } from '../../types';

function debugEnabled(): boolean {
  return getConfig().debug;
}

export function debugBranch(ruleName: string, params?: unknown): void {
  if (!debugEnabled()) return;
  console.log(`[Router] Branch: ${ruleName}`, params ?? '');
}

export function debugNormalized(original: string, normalized: string): void {
  if (!debugEnabled() || original === normalized) return;
  console.log('[Router] Normalized:', { original, normalized });
}

export function debugIntent(intent: ParsedIntent): void {
  if (!debugEnabled()) return;
  console.log('[Router] Intent:', {
    action: intent.action,
    rule: intent.rule,
    top_n: intent.top_n,
  });
}

export function debugFilters(filters: FilterSpec, time: TimeSpec, rows: number): void {
  if (!debugEnabled()) return;
  console.log('[Router] Filters:', { filters, time, rows });
}
