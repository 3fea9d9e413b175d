/**
 * Shared test dataset: sixteen projects across Region II (Tuguegarao City and
 * City of Ilagan), Cebu City, Davao City and Manila.
 */

import { createDataset, type Dataset, type DatasetOptions } from '../../router/services/dataset';
import type { ProjectRecord } from '../../types';
import projects from './projects.json';

export const FIXTURE_ROWS: readonly ProjectRecord[] = projects;

export function fixtureDataset(options: DatasetOptions = {}): Dataset {
  return createDataset(FIXTURE_ROWS, options);
}

/** Fixed clock for status filters: mid-2024 */
export const FIXED_NOW = new Date('2024-06-30T00:00:00Z');
