/**
 * Error Handling Utilities
 * Provides timeout handling and error context management
 */

export interface ErrorContext {
  operation: string;
  question?: string;
  action?: string;
  sessionId?: string;
  additionalInfo?: Record<string, unknown>;
}

/**
 * Enhanced error class with context
 */
export class ContextualError extends Error {
  constructor(
    message: string,
    public context: ErrorContext,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'ContextualError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Execute function with timeout
 */
export async function withTimeout<T>(
  promise: PromiseLike<T>,
  timeoutMs: number,
  errorMessage: string = 'Operation timed out'
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new Error(`${errorMessage} (after ${timeoutMs}ms)`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([Promise.resolve(promise), timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}
