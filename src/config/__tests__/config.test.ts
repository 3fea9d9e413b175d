import { describe, it, expect, afterEach, vi } from 'vitest';
import { getConfig } from '../index';

describe('getConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('falls back to defaults', () => {
    vi.stubEnv('PAGE_SIZE', '');
    vi.stubEnv('PROJECTS_TABLE', '');
    vi.stubEnv('REQUIRE_CONFIRM', '');
    vi.stubEnv('SESSION_TTL_MS', '');

    const config = getConfig();
    expect(config.pageSize).toBe(5);
    expect(config.projectsTable).toBe('projects');
    expect(config.sessionTtlMs).toBe(30 * 60 * 1000);
    expect(config.requireConfirm).toBe(false);
  });

  it('parses numbers and flags', () => {
    vi.stubEnv('PAGE_SIZE', '10');
    vi.stubEnv('SESSION_TTL_MS', 'soon');
    vi.stubEnv('REQUIRE_CONFIRM', 'Yes');
    vi.stubEnv('PROJECTS_TABLE', ' flood_projects ');

    const config = getConfig();
    expect(config.pageSize).toBe(10);
    expect(config.sessionTtlMs).toBe(30 * 60 * 1000);
    expect(config.requireConfirm).toBe(true);
    expect(config.projectsTable).toBe('flood_projects');
  });

  it('rejects non-positive sizes', () => {
    vi.stubEnv('PAGE_SIZE', '0');
    expect(getConfig().pageSize).toBe(5);
  });
});
