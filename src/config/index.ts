/**
 * Runtime configuration
 *
 * Everything is read from the environment. Values are resolved on each call so
 * tests can override them with vi.stubEnv.
 */

function getEnvVar(key: string): string | undefined {
  const value = process.env[key];
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

function getIntVar(key: string, fallback: number): number {
  const raw = getEnvVar(key);
  if (raw === undefined) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function getFlag(key: string): boolean {
  const raw = getEnvVar(key);
  return raw !== undefined && ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

export interface RouterConfig {
  supabaseUrl?: string;
  supabaseKey?: string;
  projectsTable: string;
  pageSize: number;
  sessionTtlMs: number;
  requireConfirm: boolean;
  logRoutes: boolean;
  failureLogPath: string;
  debug: boolean;
}

export function getConfig(): RouterConfig {
  return {
    supabaseUrl: getEnvVar('SUPABASE_URL'),
    supabaseKey: getEnvVar('SUPABASE_ANON_KEY'),
    projectsTable: getEnvVar('PROJECTS_TABLE') ?? 'projects',
    pageSize: getIntVar('PAGE_SIZE', 5),
    sessionTtlMs: getIntVar('SESSION_TTL_MS', 30 * 60 * 1000),
    requireConfirm: getFlag('REQUIRE_CONFIRM'),
    logRoutes: getFlag('LOG_ROUTES'),
    failureLogPath: getEnvVar('FAILURE_LOG_PATH') ?? 'failures.log',
    debug: getFlag('DEBUG') || process.env.NODE_ENV === 'development',
  };
}
