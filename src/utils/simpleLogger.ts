/**
 * Simple logger for tracking failures and answered questions
 * Failures go to a JSON-lines file for manual review
 */

import fs from 'fs';
import path from 'path';
import { getConfig } from '../config';

export interface FailureLog {
  timestamp: string;
  correlationId: string;
  question: string;
  sessionId?: string;
  action?: string;
  error?: string;
  stack?: string;
}

/**
 * Generate a correlation ID
 * Format: timestamp-randomString (e.g., 1731628800123-abc123xyz)
 */
export function generateCorrelationId(): string {
  const timestamp = Date.now();
  const random = Math.random().toString(36).substring(2, 11);
  return `${timestamp}-${random}`;
}

/**
 * Log a failure. Never throws.
 */
export function logFailure(data: Omit<FailureLog, 'timestamp'>): void {
  const timestamp = new Date().toISOString();
  const logEntry = JSON.stringify({ timestamp, ...data }) + '\n';

  const logPath = path.resolve(process.cwd(), getConfig().failureLogPath);

  try {
    fs.appendFileSync(logPath, logEntry);
  } catch (error) {
    // Don't crash if logging fails
    console.error(`[Logger] Failed to write to ${logPath}:`, error);
  }
}

/**
 * Log an answered question (enabled with LOG_ROUTES)
 */
export function logRoute(data: {
  correlationId: string;
  question: string;
  action: string;
  rule: string;
  latency_ms: number;
}): void {
  if (!getConfig().logRoutes) return;
  console.log(JSON.stringify({
    event: 'route_success',
    timestamp: new Date().toISOString(),
    ...data,
  }));
}
