/**
 * Loads project records from the Supabase projects table in pages
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { getConfig } from '../../config';
import { ContextualError, withTimeout } from '../helpers/errorHandling';
import { getSupabaseClient } from '../../utils/supabase';
import type { CellValue, ProjectRecord } from '../../types';
import { createDataset, type Dataset, type DatasetOptions } from './dataset';

export interface LoadOptions {
  client?: SupabaseClient;
  table?: string;
  /** Rows per request */
  batchSize?: number;
  timeoutMs?: number;
}

function toCell(value: unknown): CellValue {
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'boolean') return String(value);
  return null;
}

/**
 * Scalar columns only; nested json values are dropped
 */
export function toProjectRecord(raw: unknown): ProjectRecord | null {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return null;
  const record: Record<string, CellValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'object' && value !== null) continue;
    record[key] = toCell(value);
  }
  return record;
}

export async function loadProjectsFromSupabase(options: LoadOptions = {}): Promise<ProjectRecord[]> {
  const client = options.client ?? getSupabaseClient();
  const table = options.table ?? getConfig().projectsTable;
  const batchSize = options.batchSize ?? 1000;
  const timeoutMs = options.timeoutMs ?? 15000;

  const records: ProjectRecord[] = [];
  for (let from = 0; ; from += batchSize) {
    const { data, error } = await withTimeout(
      client.from(table).select('*').range(from, from + batchSize - 1),
      timeoutMs,
      `Loading ${table} timed out`
    );
    if (error) {
      throw new ContextualError(`Failed to load ${table}: ${error.message}`, {
        operation: 'loadProjectsFromSupabase',
        additionalInfo: { table, from },
      });
    }
    const batch: unknown[] = data ?? [];
    for (const raw of batch) {
      const record = toProjectRecord(raw);
      if (record) records.push(record);
    }
    if (batch.length < batchSize) break;
  }
  return records;
}

export async function loadDatasetFromSupabase(options: LoadOptions = {}, datasetOptions: DatasetOptions = {}): Promise<Dataset> {
  return createDataset(await loadProjectsFromSupabase(options), datasetOptions);
}
