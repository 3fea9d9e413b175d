/**
 * Router Constants
 *
 * Centralized thresholds and column-name candidates used by the matching,
 * filtering and aggregation steps.
 */

// ═══════════════════════════════════════════════════════════════════
// APPROXIMATE MATCH THRESHOLDS (similarity 0-1)
// ═══════════════════════════════════════════════════════════════════

export const FUZZY_THRESHOLDS = {
  /** Normalizer pass over the fixed core keyword set */
  CORE_KEYWORD: 0.85,

  /** Dynamic vocabulary pass: core keywords tier */
  VOCAB_CORE: 0.82,

  /** Dynamic vocabulary pass: location token tier */
  VOCAB_LOCATION: 0.82,

  /** Dynamic vocabulary pass: contractor token tier */
  VOCAB_CONTRACTOR: 0.7,

  /** Corrections whose length differs by this ratio or more are rejected */
  MAX_LENGTH_DRIFT: 0.5,

  /** Whole-question match against municipality names */
  MUNICIPALITY: 0.87,

  /** Whole-question match against province names */
  PROVINCE: 0.88,

  /** Each fragment of a multi-location list */
  MULTI_LOCATION: 0.7,

  /** Column-name resolution */
  COLUMN_NAME: 0.85,
} as const;

// ═══════════════════════════════════════════════════════════════════
// RESULT SIZES
// ═══════════════════════════════════════════════════════════════════

export const RESULT_LIMITS = {
  /** Rows shown for a listing before "Would you like 5 more projects?" */
  DEFAULT_PAGE_SIZE: 5,

  /** "Did you mean" suggestions on an empty result */
  MAX_SUGGESTIONS: 5,

  /** Contractor names fed into the normalizer vocabulary */
  MAX_CONTRACTOR_VOCAB: 8000,

  /** Minimum token length for municipality token-overlap scoring */
  SIGNIFICANT_TOKEN_LENGTH: 5,
} as const;

// ═══════════════════════════════════════════════════════════════════
// COLUMN CANDIDATES
// ═══════════════════════════════════════════════════════════════════

export const COLUMN_CANDIDATES = {
  region: ['region'],
  province: ['province'],
  municipality: ['municipality', 'city'],
  mainIsland: ['main_island', 'mainisland', 'main island'],
  projectLocation: ['project_location', 'location', 'site_location'],
  contractor: ['contractor', 'contractor_name', 'winning_contractor'],
  districtOffice: ['district_engineering_office', 'district engineering office'],
  legislativeDistrict: ['legislative_district', 'legislativedistrict'],
  budget: [
    'approved_budget_num',
    'approved_budget_for_contract',
    'approvedbudgetforcontract',
    'approved_budget',
    'budget',
    'contractcost',
    'approved budget for contract',
  ],
  startDate: ['start_date_parsed', 'startdate_parsed', 'start_date', 'startdate'],
  completionDate: [
    'completion_date_parsed',
    'actualcompletiondate_parsed',
    'completion_date',
    'actual_completion_date',
    'actualcompletiondate',
  ],
  fundingYear: ['funding_year', 'year'],
  projectTitle: ['project_title', 'project_name', 'projecttitle'],
} as const;

export type ColumnRole = keyof typeof COLUMN_CANDIDATES;

/** Checked verbatim, in order, before any heuristic id-column search */
export const PROJECT_ID_COLUMNS = [
  'projectid',
  'project_id',
  'ProjectID',
  'Project_ID',
  'project_number',
  'projectnumber',
  'id',
  'ID',
] as const;

export const CURRENCY_SYMBOL = '₱';

export const DATASET_NOUN = 'flood control projects';
