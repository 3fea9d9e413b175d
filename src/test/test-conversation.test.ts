/**
 * End-to-end conversations through resolve / resolveWithContext
 */

import fs from 'fs';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  GREETING_MESSAGE,
  HELP_MESSAGE,
  InMemoryContextStore,
  InMemoryTurnLog,
  SessionRegistry,
  resolve,
  resolveWithContext,
  type ContextDeps,
} from '../router';
import { NO_MORE_MESSAGE, UNKNOWN_MESSAGE } from '../router/services/responseFormatter';
import type { ContextStore, ConversationContext, TurnLogSink } from '../types';
import { FIXED_NOW, fixtureDataset } from './fixtures/dataset';

const dataset = fixtureDataset();

class BrokenContextStore implements ContextStore {
  async get(): Promise<ConversationContext> {
    throw new Error('store offline');
  }

  async merge(): Promise<void> {
    throw new Error('store offline');
  }

  async clear(): Promise<void> {
    throw new Error('store offline');
  }
}

class BrokenTurnLog implements TurnLogSink {
  async log(): Promise<void> {
    throw new Error('log offline');
  }
}

function loggedActions(spy: { mock: { calls: unknown[][] } }): unknown[] {
  return spy.mock.calls.map(call => {
    const entry: unknown = JSON.parse(String(call[1]));
    return typeof entry === 'object' && entry !== null ? new Map(Object.entries(entry)).get('action') : undefined;
  });
}

describe('resolve', () => {
  it('answers a single question', () => {
    expect(resolve('How many projects are in Tuguegarao City?', dataset, { now: FIXED_NOW })).toBe(
      'There are 7 flood control projects in Tuguegarao City.'
    );
  });

  it('answers unrelated questions with the fixed message', () => {
    expect(resolve('tell me a joke', dataset)).toBe(UNKNOWN_MESSAGE);
  });

  it('describes the plan when confirmation is required', () => {
    const answer = resolve('What is the total budget in Tuguegarao City?', dataset, { requireConfirm: true });
    expect(answer.split('\n')[0]).toBe('Clarification needed: I plan to: compute the total approved budget, in Tuguegarao City.');
    expect(answer.split('\n')[1]).toBe('- Do you want a specific year or range (e.g., 2023 or between 2021 and 2022)?');
  });

  it('still answers project lookups when confirmation is required', () => {
    expect(resolve('who is the contractor of P00012', dataset, { requireConfirm: true })).toBe(
      'The contractor for Project ID P00012 is ALPHA BUILDERS.'
    );
  });
});

describe('resolveWithContext', () => {
  let deps: ContextDeps;
  let store: InMemoryContextStore;
  let turnLog: InMemoryTurnLog;

  beforeEach(() => {
    store = new InMemoryContextStore();
    turnLog = new InMemoryTurnLog();
    deps = { dataset, sessions: new SessionRegistry(), contextStore: store, turnLog, now: FIXED_NOW };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('answers greetings and help without touching the context', async () => {
    expect(await resolveWithContext('Hello there', 's1', deps)).toBe(GREETING_MESSAGE);
    expect(await resolveWithContext('What can you do?', 's1', deps)).toBe(HELP_MESSAGE);
    expect(await store.get('s1')).toEqual({});
  });

  it('carries the place into a follow-up question', async () => {
    expect(await resolveWithContext('How many projects are in Tuguegarao City?', 's1', deps)).toBe(
      'There are 7 flood control projects in Tuguegarao City.'
    );
    expect(await store.get('s1')).toMatchObject({ municipality: 'TUGUEGARAO CITY', last_action: 'count' });

    expect(await resolveWithContext('What is the total budget?', 's1', deps)).toBe(
      'The total approved budget in Tuguegarao City is ₱15,000,000.00.'
    );
  });

  it('follows up on the project named in the last answer', async () => {
    expect(await resolveWithContext('who is the contractor of P00012', 's1', deps)).toBe(
      'The contractor for Project ID P00012 is ALPHA BUILDERS.'
    );
    expect(await store.get('s1')).toMatchObject({ contractor: 'ALPHA BUILDERS', last_project_id: 'P00012' });

    expect(await resolveWithContext('budget', 's1', deps)).toBe('The approved budget for Project ID P00012 is ₱1,250,000.00.');
  });

  it('pages through a listing', async () => {
    const first = await resolveWithContext('list projects in Tuguegarao City', 's1', deps);
    const lines = first.split('\n');
    expect(lines[0]).toBe('Top 5 projects by approved budget in Tuguegarao City:');
    expect(lines.slice(1, 6).map(line => line.split(' — ')[0])).toEqual([
      '- P00005',
      '- P00003',
      '- P00002',
      '- P00007',
      '- P00004',
    ]);
    expect(first.endsWith('\n\nWould you like 5 more projects?')).toBe(true);

    expect(await resolveWithContext('more', 's1', deps)).toBe(
      'More projects in Tuguegarao City:\n' +
        '- P00001 — ALPHA BUILDERS — ₱1,000,000.00\n' +
        '- P00006 — BRAVO ENGINEERING — ₱800,000.00'
    );
    expect(await resolveWithContext('more', 's1', deps)).toBe(NO_MORE_MESSAGE);
  });

  it('keeps pagination per session', async () => {
    await resolveWithContext('list projects in Tuguegarao City', 's1', deps);
    expect(await resolveWithContext('more', 's2', deps)).toBe(NO_MORE_MESSAGE);
  });

  it('logs every turn with the context it extracted', async () => {
    await resolveWithContext('Hi', 's1', deps);
    await resolveWithContext('How many projects are in Tuguegarao City?', 's1', deps);

    const entries = turnLog.forSession('s1');
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({ question: 'Hi', answer: GREETING_MESSAGE, extractedContext: null });
    expect(entries[1].answer).toBe('There are 7 flood control projects in Tuguegarao City.');
    expect(entries[1].extractedContext).toMatchObject({ municipality: 'TUGUEGARAO CITY', last_action: 'count' });
  });

  it('answers without context when the store fails', async () => {
    const append = vi.spyOn(fs, 'appendFileSync').mockImplementation(() => undefined);
    deps = { ...deps, contextStore: new BrokenContextStore() };

    expect(await resolveWithContext('How many projects are in Tuguegarao City?', 's1', deps)).toBe(
      'There are 7 flood control projects in Tuguegarao City.'
    );
    expect(loggedActions(append)).toEqual(['contextStore.clear', 'contextStore.get', 'contextStore.merge']);
  });

  it('records a failed turn log without failing the answer', async () => {
    const append = vi.spyOn(fs, 'appendFileSync').mockImplementation(() => undefined);
    deps = { ...deps, turnLog: new BrokenTurnLog() };

    expect(await resolveWithContext('Hi', 's1', deps)).toBe(GREETING_MESSAGE);
    await vi.waitFor(() => expect(loggedActions(append)).toEqual(['turnLog']));
  });
});
