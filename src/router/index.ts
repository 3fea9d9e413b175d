/**
 * Router Module - Main Entry Point
 *
 * Flow:
 * 1. Normalize spelling (services/normalizer.ts)
 * 2. Classify intent, detect place and time filters (services/intent.ts)
 * 3. Filter rows and aggregate (services/aggregations.ts)
 * 4. Render the answer (services/responseFormatter.ts)
 *
 * resolveWithContext wraps this with per-session context: greeting/help
 * shortcuts, topic-change clearing, question rewriting from remembered
 * entities, and context extraction from the question and the answer.
 */

import { getConfig } from '../config';
import { debugBranch, debugNormalized } from './helpers/debug';
import { toError } from './helpers/errorHandling';
import { generateCorrelationId, logFailure, logRoute } from '../utils/simpleLogger';
import type { ContextStore, ConversationContext, ParsedIntent, TurnLogSink } from '../types';
import { runAggregation } from './services/aggregations';
import type { Dataset } from './services/dataset';
import { applyContextToQuestion, extractContext, extractFromAnswer, shouldClearContext } from './services/followUpDetector';
import { classifyIntent } from './services/intent';
import { normalizeQuestion } from './services/normalizer';
import { APOLOGY_MESSAGE, clarifyMessage } from './services/responseFormatter';
import { QuerySession, type SessionRegistry } from './services/sessionRegistry';

export interface ResolveOptions {
  /** Session owning the pagination cursor; a throwaway one when omitted */
  session?: QuerySession;
  now?: Date;
  pageSize?: number;
  /** Describe the plan instead of answering (defaults to REQUIRE_CONFIRM) */
  requireConfirm?: boolean;
}

export interface ContextDeps extends Omit<ResolveOptions, 'session'> {
  dataset: Dataset;
  sessions: SessionRegistry;
  contextStore: ContextStore;
  turnLog?: TurnLogSink;
}

interface Turn {
  answer: string;
  intent: ParsedIntent | null;
}

const GREETING = /^(?:hello|hi|hey|greetings|good morning|good afternoon|good evening)\b/;

const HELP_PATTERNS = [
  /what questions can you answer/,
  /what can you do/,
  /what can i ask/,
  /\bhelp\b/,
  /\bcapabilities\b/,
  /what are you capable of/,
  /show me examples/,
  /sample questions/,
];

export const GREETING_MESSAGE = [
  "👋 Hi! I'm the flood control projects assistant.",
  '',
  'I can help you analyze public-works flood control projects across the Philippines.',
  '',
  'Ask me about:',
  '• Project counts and locations',
  '• Budget totals and trends',
  '• Top contractors',
  '• Specific project details',
  '',
  "Type 'what questions can you answer?' to see examples!",
].join('\n');

export const HELP_MESSAGE = [
  '📊 Here are some questions I can answer:',
  '',
  'PROJECT COUNTS:',
  '• How many flood control projects are there?',
  '• How many projects are in Region III?',
  '• How many projects does a contractor have?',
  '',
  'BUDGET ANALYTICS:',
  '• What is the total budget for all projects?',
  '• Show the budget trend by year',
  '• What is the highest budget in Cebu?',
  '',
  'CONTRACTOR RANKINGS:',
  '• Which contractor has the highest total budget?',
  '• Top 10 contractors by number of projects',
  '• Top 5 projects by budget for a contractor',
  '',
  'PROJECT DETAILS:',
  '• List projects in Metro Manila',
  '• Who is the contractor of a project ID?',
  '',
  "💡 TIP: I remember context! Ask about a city, then follow up with 'What is the total budget?' " +
    "and I'll know you mean that city.",
].join('\n');

const NO_PLAN_ACTIONS = new Set<ParsedIntent['action']>([
  'unknown',
  'more_projects',
  'lookup',
  'contractor_lookup',
  'budget_lookup',
  'start_date_lookup',
  'completion_lookup',
  'location_lookup',
]);

/**
 * Normalize and classify a question without executing it
 */
export function classify(question: string, dataset: Dataset, now: Date = new Date()): ParsedIntent {
  const vocabulary = dataset.matcher ? dataset.vocabulary() : null;
  const normalized = normalizeQuestion(question, vocabulary, dataset.matcher);
  debugNormalized(question, normalized);
  return classifyIntent(normalized, dataset, now);
}

function answerTurn(question: string, dataset: Dataset, options: ResolveOptions): Turn {
  const correlationId = generateCorrelationId();
  const startTime = performance.now();
  const session = options.session ?? new QuerySession('ephemeral');

  try {
    const config = getConfig();
    const now = options.now ?? new Date();
    const intent = classify(question, dataset, now);

    const answer =
      (options.requireConfirm ?? config.requireConfirm) && !NO_PLAN_ACTIONS.has(intent.action)
        ? clarifyMessage(intent)
        : runAggregation(intent, dataset, session.cursor, { pageSize: options.pageSize ?? config.pageSize, now });

    logRoute({
      correlationId,
      question: question.substring(0, 100),
      action: intent.action,
      rule: intent.rule,
      latency_ms: performance.now() - startTime,
    });
    return { answer, intent };
  } catch (error) {
    const err = toError(error);
    logFailure({
      correlationId,
      question: question.substring(0, 200),
      sessionId: options.session?.id,
      error: err.message,
      stack: err.stack,
    });
    return { answer: APOLOGY_MESSAGE, intent: null };
  }
}

/**
 * Answer one question. Listing and "more" questions read and advance the
 * session's pagination cursor. Never throws.
 */
export function resolve(question: string, dataset: Dataset, options: ResolveOptions = {}): string {
  return answerTurn(question, dataset, options).answer;
}

function shortcut(question: string): string | null {
  const q = question.toLowerCase().trim();
  if (GREETING.test(q)) return GREETING_MESSAGE;
  if (HELP_PATTERNS.some(pattern => pattern.test(q))) return HELP_MESSAGE;
  return null;
}

/**
 * Run a context-store call; on failure log it and carry on with `fallback`
 */
async function guarded<T>(operation: string, sessionId: string, question: string, call: () => Promise<T>, fallback: T): Promise<T> {
  try {
    return await call();
  } catch (error) {
    const err = toError(error);
    logFailure({
      correlationId: generateCorrelationId(),
      question: question.substring(0, 200),
      sessionId,
      action: operation,
      error: err.message,
      stack: err.stack,
    });
    return fallback;
  }
}

function recordTurn(deps: ContextDeps, sessionId: string, question: string, answer: string, extractedContext: ConversationContext | null): void {
  if (!deps.turnLog) return;
  deps.turnLog
    .log({ sessionId, timestamp: new Date().toISOString(), question, answer, extractedContext })
    .catch((error: unknown) => {
      const err = toError(error);
      logFailure({ correlationId: generateCorrelationId(), question: question.substring(0, 200), sessionId, action: 'turnLog', error: err.message });
    });
}

/**
 * Answer one question within a conversation. Never rejects.
 */
export async function resolveWithContext(question: string, sessionId: string, deps: ContextDeps): Promise<string> {
  const quick = shortcut(question);
  if (quick !== null) {
    debugBranch('shortcut');
    recordTurn(deps, sessionId, question, quick, null);
    return quick;
  }

  const { contextStore } = deps;

  if (shouldClearContext(question)) {
    debugBranch('context:clear');
    await guarded('contextStore.clear', sessionId, question, () => contextStore.clear(sessionId), undefined);
  }

  const context = await guarded('contextStore.get', sessionId, question, () => contextStore.get(sessionId), {});
  const rewritten = Object.keys(context).length > 0 ? applyContextToQuestion(question, context) : question;
  if (rewritten !== question) debugBranch('context:rewrite', { question, rewritten });

  const { answer, intent } = answerTurn(rewritten, deps.dataset, {
    session: deps.sessions.get(sessionId),
    now: deps.now,
    pageSize: deps.pageSize,
    requireConfirm: deps.requireConfirm,
  });

  let extracted: ConversationContext | null = null;
  if (intent) {
    extracted = { ...extractContext(intent), ...extractFromAnswer(answer, intent) };
    if (Object.keys(extracted).length > 0) {
      const update = extracted;
      await guarded('contextStore.merge', sessionId, question, () => contextStore.merge(sessionId, update), undefined);
    } else {
      extracted = null;
    }
  }

  recordTurn(deps, sessionId, question, answer, extracted);
  return answer;
}

export { createDataset, clearVocabularyCache } from './services/dataset';
export type { Dataset, DatasetOptions } from './services/dataset';
export { SessionRegistry, QuerySession } from './services/sessionRegistry';
export { InMemoryContextStore, InMemoryTurnLog, SupabaseContextStore, SupabaseTurnLog } from './services/contextStore';
export { loadProjectsFromSupabase, loadDatasetFromSupabase } from './services/projectLoader';
export { contextSummary } from './services/followUpDetector';
export { INTENT_RULES } from './services/intent';
