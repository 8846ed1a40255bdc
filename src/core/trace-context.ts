/**
 * Run context for batch jobs.
 *
 * Every job run (daily collection, weekly digest, feedback session) executes
 * inside an AsyncLocalStorage context so that all log lines it produces carry
 * the same runId without threading it through every call.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RunContext {
  /** Unique ID of this run */
  runId: string;
  /** Logical job name */
  job: string;
  /** When the run started */
  startedAt: Date;
}

const asyncLocalStorage = new AsyncLocalStorage<RunContext>();

/**
 * Run a function inside a run context.
 * Descendant async operations inherit the context.
 */
export function withRunContext<T>(context: RunContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Current run context, or undefined outside any job.
 */
export function getRunContext(): RunContext | undefined {
  return asyncLocalStorage.getStore();
}

export function createRunContext(job: string, now: Date = new Date()): RunContext {
  return {
    runId: `${job}_${randomUUID().slice(0, 8)}`,
    job,
    startedAt: now,
  };
}
