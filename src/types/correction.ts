/**
 * Runs an operation (typically a SQL statement) and returns its result.
 * Any rejection counts as a failed attempt; transient and permanent
 * failures are treated the same.
 */
export interface OperationExecutor<T> {
  execute(operation: string): Promise<T>;
}

export interface CorrectionRequest {
  /** Caller-supplied id of the query or session being repaired */
  id: string;
  question: string;
  /** Schema or other context the corrector needs */
  context: string;
  previousOperation: string;
  errorMessage: string;
}

/**
 * Oracle that proposes a replacement for a failing operation.
 */
export interface CorrectionProvider {
  proposeCorrection(request: CorrectionRequest): Promise<string>;
}

/**
 * One durable record per executed attempt.
 */
export interface CorrectionAttempt {
  id: string;
  attempt: number;
  operation: string;
  errorMessage: string | null;
  success: boolean;
  timestamp: Date;
}

export interface AttemptRecorder {
  record(attempt: CorrectionAttempt): Promise<void>;
}

export interface CorrectionContext {
  question: string;
  context: string;
}

export interface CorrectionOutcome<T> {
  operation: string;
  result: T;
  /** Number of executor invocations it took */
  attempts: number;
}
