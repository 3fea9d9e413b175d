export type CellValue = string | number | null | undefined;

/** One row of the project table. Column names come from the ingestion step. */
export type ProjectRecord = Readonly<Record<string, CellValue>>;

export type TimeStatus = 'ongoing' | 'completed';

export interface FilterSpec {
  municipality?: string;
  province?: string;
  region?: string;
  main_island?: string;
  project_location?: string;
  contractor?: string;
  multi_locations?: string[];
  project_id?: string;
}

export interface TimeSpec {
  year?: number;
  year_range?: [number, number];
  completed_year?: number;
  status?: TimeStatus;
}

export type LookupAction =
  | 'lookup'
  | 'contractor_lookup'
  | 'budget_lookup'
  | 'start_date_lookup'
  | 'completion_lookup'
  | 'location_lookup';

export type ActionTag =
  | 'count'
  | 'sum'
  | 'max'
  | 'min'
  | 'top_contractors'
  | 'top_contractors_by_count'
  | 'contractor_max_total_budget'
  | 'contractor_max_count'
  | 'top_projects_by_location_budget'
  | 'top_projects_by_contractor_budget'
  | 'trend_by_year'
  | 'municipality_max_total'
  | 'more_projects'
  | LookupAction
  | 'unknown';

export interface ParsedIntent {
  action: ActionTag;
  /** Name of the classifier rule that produced this intent */
  rule: string;
  filters: FilterSpec;
  time: TimeSpec;
  column: string | null;
  top_n?: number;
  force_all?: boolean;
  /** Page size requested by a pagination follow-up */
  count?: number;
}

export type PaginationMode = 'location' | 'contractor' | 'none';

export interface PagedRow {
  projectId: string;
  label: string;
  amount: number | null;
}

export interface PaginationState {
  mode: PaginationMode;
  filters: FilterSpec;
  rows: PagedRow[];
  offset: number;
  headerContext: string;
}

export interface ConversationContext {
  municipality?: string;
  province?: string;
  region?: string;
  main_island?: string;
  project_location?: string;
  contractor?: string;
  year?: number;
  year_range?: [number, number];
  last_action?: ActionTag;
  last_column?: string;
  last_top_n?: number;
  last_project_id?: string;
}

export type ContextKey = keyof ConversationContext;

/** Per-session entity memory. Writes for one session must be applied in order. */
export interface ContextStore {
  get(sessionId: string): Promise<ConversationContext>;
  merge(sessionId: string, context: ConversationContext): Promise<void>;
  clear(sessionId: string, keys?: ContextKey[]): Promise<void>;
}

export interface TurnLogEntry {
  sessionId: string;
  timestamp: string;
  question: string;
  answer: string;
  extractedContext: ConversationContext | null;
}

/** Append-only conversation log. Callers never await its outcome for the answer. */
export interface TurnLogSink {
  log(entry: TurnLogEntry): Promise<void>;
}
