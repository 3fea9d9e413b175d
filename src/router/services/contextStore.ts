/**
 * Conversation context persistence
 *
 * ContextStore keeps the last-seen entities per session; TurnLogSink keeps
 * an append-only log of question/answer turns. Each has an in-memory and a
 * Supabase implementation. Writes for one session are applied in call order.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { ContextualError, withTimeout } from '../helpers/errorHandling';
import type { ActionTag, ContextKey, ContextStore, ConversationContext, TurnLogEntry, TurnLogSink } from '../../types';

const DEFAULT_TIMEOUT_MS = 5000;

const ACTION_TAGS = [
  'count', 'sum', 'max', 'min', 'top_contractors', 'top_contractors_by_count',
  'contractor_max_total_budget', 'contractor_max_count', 'top_projects_by_location_budget',
  'top_projects_by_contractor_budget', 'trend_by_year', 'municipality_max_total', 'more_projects',
  'lookup', 'contractor_lookup', 'budget_lookup', 'start_date_lookup', 'completion_lookup',
  'location_lookup', 'unknown',
] as const satisfies readonly ActionTag[];

const STRING_KEYS = [
  'municipality', 'province', 'region', 'main_island', 'project_location',
  'contractor', 'last_column', 'last_project_id',
] as const;

/**
 * Runs tasks one after another per key. A failed task does not block the
 * ones queued behind it.
 */
export class SessionQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return result;
  }
}

function isActionTag(value: unknown): value is ActionTag {
  return ACTION_TAGS.some(tag => tag === value);
}

function isYear(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Keep only the known context fields with the right shapes
 */
export function parseContext(value: unknown): ConversationContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  const source = new Map(Object.entries(value));
  const context: ConversationContext = {};

  for (const key of STRING_KEYS) {
    const field = source.get(key);
    if (typeof field === 'string' && field !== '') context[key] = field;
  }

  const year = source.get('year');
  if (isYear(year)) context.year = year;

  const range = source.get('year_range');
  if (Array.isArray(range) && range.length === 2 && isYear(range[0]) && isYear(range[1])) {
    context.year_range = [range[0], range[1]];
  }

  const topN = source.get('last_top_n');
  if (isYear(topN)) context.last_top_n = topN;

  const action = source.get('last_action');
  if (isActionTag(action)) context.last_action = action;

  return context;
}

function without(context: ConversationContext, keys?: readonly ContextKey[]): ConversationContext {
  if (!keys) return {};
  const next: ConversationContext = { ...context };
  for (const key of keys) delete next[key];
  return next;
}

// ─── In-memory ──────────────────────────────────────────────────────

export class InMemoryContextStore implements ContextStore {
  private contexts = new Map<string, ConversationContext>();
  private queue = new SessionQueue();

  async get(sessionId: string): Promise<ConversationContext> {
    return this.queue.run(sessionId, async () => ({ ...this.contexts.get(sessionId) }));
  }

  async merge(sessionId: string, context: ConversationContext): Promise<void> {
    await this.queue.run(sessionId, async () => {
      this.contexts.set(sessionId, { ...this.contexts.get(sessionId), ...context });
    });
  }

  async clear(sessionId: string, keys?: ContextKey[]): Promise<void> {
    await this.queue.run(sessionId, async () => {
      const next = without(this.contexts.get(sessionId) ?? {}, keys);
      if (Object.keys(next).length === 0) this.contexts.delete(sessionId);
      else this.contexts.set(sessionId, next);
    });
  }
}

export class InMemoryTurnLog implements TurnLogSink {
  readonly entries: TurnLogEntry[] = [];

  async log(entry: TurnLogEntry): Promise<void> {
    this.entries.push({ ...entry });
  }

  forSession(sessionId: string): TurnLogEntry[] {
    return this.entries.filter(entry => entry.sessionId === sessionId);
  }
}

// ─── Supabase ───────────────────────────────────────────────────────

export interface SupabaseAdapterOptions {
  table?: string;
  timeoutMs?: number;
}

/**
 * Context rows in `context_store` (session_id primary key, context jsonb,
 * updated_at timestamptz)
 */
export class SupabaseContextStore implements ContextStore {
  private readonly table: string;
  private readonly timeoutMs: number;
  private queue = new SessionQueue();

  constructor(private readonly client: SupabaseClient, options: SupabaseAdapterOptions = {}) {
    this.table = options.table ?? 'context_store';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async get(sessionId: string): Promise<ConversationContext> {
    return this.queue.run(sessionId, () => this.read(sessionId));
  }

  async merge(sessionId: string, context: ConversationContext): Promise<void> {
    await this.queue.run(sessionId, async () => {
      const current = await this.read(sessionId);
      await this.write(sessionId, { ...current, ...context });
    });
  }

  async clear(sessionId: string, keys?: ContextKey[]): Promise<void> {
    await this.queue.run(sessionId, async () => {
      if (!keys) {
        const { error } = await withTimeout(
          this.client.from(this.table).delete().eq('session_id', sessionId),
          this.timeoutMs,
          'Context delete timed out'
        );
        if (error) throw this.failure('clear', sessionId, error.message);
        return;
      }
      const current = await this.read(sessionId);
      await this.write(sessionId, without(current, keys));
    });
  }

  private async read(sessionId: string): Promise<ConversationContext> {
    const { data, error } = await withTimeout(
      this.client.from(this.table).select('context').eq('session_id', sessionId).limit(1),
      this.timeoutMs,
      'Context read timed out'
    );
    if (error) throw this.failure('get', sessionId, error.message);
    const row: unknown = data && data.length > 0 ? data[0] : null;
    if (typeof row !== 'object' || row === null) return {};
    return parseContext(new Map(Object.entries(row)).get('context'));
  }

  private async write(sessionId: string, context: ConversationContext): Promise<void> {
    const { error } = await withTimeout(
      this.client
        .from(this.table)
        .upsert({ session_id: sessionId, context, updated_at: new Date().toISOString() }, { onConflict: 'session_id' }),
      this.timeoutMs,
      'Context write timed out'
    );
    if (error) throw this.failure('merge', sessionId, error.message);
  }

  private failure(operation: string, sessionId: string, message: string): ContextualError {
    return new ContextualError(`Context store ${operation} failed: ${message}`, {
      operation: `contextStore.${operation}`,
      sessionId,
    });
  }
}

/**
 * Turn rows in `conversations`
 */
export class SupabaseTurnLog implements TurnLogSink {
  private readonly table: string;
  private readonly timeoutMs: number;

  constructor(private readonly client: SupabaseClient, options: SupabaseAdapterOptions = {}) {
    this.table = options.table ?? 'conversations';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async log(entry: TurnLogEntry): Promise<void> {
    const { error } = await withTimeout(
      this.client.from(this.table).insert({
        session_id: entry.sessionId,
        timestamp: entry.timestamp,
        question: entry.question,
        answer: entry.answer,
        extracted_context: entry.extractedContext,
      }),
      this.timeoutMs,
      'Turn log insert timed out'
    );
    if (error) {
      throw new ContextualError(`Turn log insert failed: ${error.message}`, {
        operation: 'turnLog.log',
        sessionId: entry.sessionId,
        question: entry.question,
      });
    }
  }
}
