import type { FeedbackKind } from '../types/feedback.js';

/**
 * Error taxonomy for the learning engine.
 *
 * Feedback callers never see ValidationError or DuplicateFeedbackError thrown:
 * the ingester turns them into an explicit status. StorageUnavailableError is
 * always thrown, since the caller must not assume learning was applied.
 */

export type EngineErrorCode =
  | 'VALIDATION'
  | 'DUPLICATE_FEEDBACK'
  | 'STORAGE_UNAVAILABLE'
  | 'CORRUPT_RECORD'
  | 'JOB_ALREADY_RUNNING';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
    this.code = code;
  }
}

/**
 * Rating out of range, missing field, unknown source.
 */
export class ValidationError extends EngineError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('VALIDATION', message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class DuplicateFeedbackError extends EngineError {
  readonly kind: FeedbackKind;
  readonly key: string;

  constructor(kind: FeedbackKind, key: string) {
    super('DUPLICATE_FEEDBACK', `Feedback for ${kind} "${key}" was already recorded`);
    this.name = 'DuplicateFeedbackError';
    this.kind = kind;
    this.key = key;
  }
}

/**
 * The store could not be read or written. Nothing from the failed operation
 * was committed.
 */
export class StorageUnavailableError extends EngineError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('STORAGE_UNAVAILABLE', `Storage unavailable during ${operation}: ${detail}`, { cause });
    this.name = 'StorageUnavailableError';
    this.operation = operation;
  }
}

export type CorruptEntity = 'pattern' | 'keyword' | 'source';

/**
 * A persisted record whose fields contradict each other, e.g. a zero
 * sample count with a non-zero urgency sum.
 */
export class CorruptRecordError extends EngineError {
  readonly entity: CorruptEntity;
  readonly key: string;
  readonly reason: string;

  constructor(entity: CorruptEntity, key: string, reason: string) {
    super('CORRUPT_RECORD', `Corrupt ${entity} record "${key}": ${reason}`);
    this.name = 'CorruptRecordError';
    this.entity = entity;
    this.key = key;
    this.reason = reason;
  }
}

export class JobAlreadyRunningError extends EngineError {
  readonly job: string;
  readonly pid: number;

  constructor(job: string, pid: number) {
    super('JOB_ALREADY_RUNNING', `Job "${job}" is already running (PID: ${String(pid)})`);
    this.name = 'JobAlreadyRunningError';
    this.job = job;
    this.pid = pid;
  }
}
