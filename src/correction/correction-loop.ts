/**
 * Self-correcting execution loop.
 *
 * Runs an operation through an executor; on failure, asks a correction
 * provider for a replacement and tries again, up to maxRetries times.
 * Every executed attempt after the first is recorded, and so is every
 * failed one.
 */

import type {
  AttemptRecorder,
  CorrectionAttempt,
  CorrectionContext,
  CorrectionOutcome,
  CorrectionProvider,
  OperationExecutor,
} from '../types/index.js';
import { getConfig } from '../config/index.js';
import { InvalidArgumentError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const log = createLogger('correction-loop');

const OPENING_FENCE = /^```(?:[A-Za-z0-9_-]*[ \t]*\r?\n)?/;
const CLOSING_FENCE = /\r?\n?```\s*$/;

/**
 * Remove a surrounding markdown code fence (```sql ... ``` or ``` ... ```)
 * and trim the result.
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }
  return trimmed.replace(OPENING_FENCE, '').replace(CLOSING_FENCE, '').trim();
}

function validateMaxRetries(maxRetries: number): number {
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new InvalidArgumentError('maxRetries must be a non-negative integer', { maxRetries });
  }
  return maxRetries;
}

export interface CorrectionLoopOptions {
  maxRetries?: number;
}

export class CorrectionLoop<T> {
  private readonly maxRetries: number;

  constructor(
    private readonly executor: OperationExecutor<T>,
    private readonly corrector: CorrectionProvider,
    private readonly recorder: AttemptRecorder,
    options: CorrectionLoopOptions = {}
  ) {
    this.maxRetries = validateMaxRetries(options.maxRetries ?? getConfig().correctionMaxRetries);
  }

  /**
   * Execute `initialOperation`, correcting and retrying on failure.
   * When every attempt fails the last execution error is rethrown as is.
   */
  async executeWithCorrection(
    id: string,
    initialOperation: string,
    context: CorrectionContext,
    maxRetries: number = this.maxRetries
  ): Promise<CorrectionOutcome<T>> {
    const retries = validateMaxRetries(maxRetries);
    let operation = initialOperation;
    let lastError: string | null = null;

    for (let attempt = 1; attempt <= retries + 1; attempt++) {
      let result: T;
      try {
        result = await this.executor.execute(operation);
      } catch (error) {
        const message = errorMessage(error);
        lastError = message;
        await this.record({ id, attempt, operation, errorMessage: message, success: false });

        if (attempt > retries) {
          log.error({ id, attempt, err: error }, 'Operation failed, retries exhausted');
          throw error;
        }
        log.warn({ id, attempt, error: message }, 'Operation failed, requesting correction');

        try {
          const proposal = await this.corrector.proposeCorrection({
            id,
            question: context.question,
            context: context.context,
            previousOperation: operation,
            errorMessage: message,
          });
          operation = stripCodeFences(proposal);
        } catch (correctionError) {
          log.error({ id, attempt, err: correctionError }, 'Correction provider failed');
          throw error;
        }
        continue;
      }

      if (attempt > 1) {
        await this.record({ id, attempt, operation, errorMessage: lastError, success: true });
        log.info({ id, attempt }, 'Operation succeeded after correction');
      }
      return { operation, result, attempts: attempt };
    }

    // The loop either returns or throws on its final attempt.
    throw new Error('Correction loop exited without a result');
  }

  private async record(attempt: Omit<CorrectionAttempt, 'timestamp'>): Promise<void> {
    try {
      await this.recorder.record({ ...attempt, timestamp: new Date() });
    } catch (error) {
      log.error({ id: attempt.id, attempt: attempt.attempt, err: error }, 'Failed to record attempt');
    }
  }
}

/**
 * Attempt recorder that keeps everything in memory, optionally capped.
 */
export class InMemoryAttemptLog implements AttemptRecorder {
  private readonly attempts: CorrectionAttempt[] = [];

  constructor(private readonly limit: number = Number.POSITIVE_INFINITY) {}

  record(attempt: CorrectionAttempt): Promise<void> {
    this.attempts.push(attempt);
    if (this.attempts.length > this.limit) {
      this.attempts.splice(0, this.attempts.length - this.limit);
    }
    return Promise.resolve();
  }

  list(id?: string): CorrectionAttempt[] {
    return id === undefined
      ? [...this.attempts]
      : this.attempts.filter((attempt) => attempt.id === id);
  }

  clear(): void {
    this.attempts.length = 0;
  }
}
