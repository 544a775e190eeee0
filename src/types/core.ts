/**
 * Core types shared across modelctl
 */

/**
 * Result type - simple discriminated union for error handling at I/O boundaries
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Create a success result
 */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result
 */
export const Failure = <T>(error: string): Result<T> => ({ ok: false, error });

// ===== PROGRESS =====

export type BatchOperation = 'import' | 'delete' | 'verify';

export interface ProgressUpdate {
  operation: BatchOperation;
  /** 1-based position in the batch */
  index: number;
  total: number;
  name: string;
  status: 'starting' | 'completed' | 'failed';
  message?: string;
}

export interface ProgressEmitter {
  emit(update: ProgressUpdate): void;
}
