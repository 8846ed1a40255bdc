import type { Logger } from '../types/logger.js';
import type { JobLock, JobName } from './job-lock.js';
import { createRunContext, withRunContext } from './trace-context.js';

/**
 * Run a job under its lock and inside a fresh run context, so every log line
 * it writes carries the same runId. The lock is released however fn ends.
 */
export async function runJob<T>(
  deps: { lock: JobLock; logger: Logger },
  job: JobName,
  fn: () => Promise<T> | T
): Promise<T> {
  const handle = deps.lock.acquire(job);
  const context = createRunContext(job);

  try {
    return await withRunContext(context, async () => {
      deps.logger.info({ job }, 'Job started');
      try {
        const result = await fn();
        deps.logger.info({ job, durationMs: Date.now() - context.startedAt.getTime() }, 'Job finished');
        return result;
      } catch (error) {
        deps.logger.error(
          { job, error: error instanceof Error ? error.message : String(error) },
          'Job failed'
        );
        throw error;
      }
    });
  } finally {
    handle.release();
  }
}
