import { closeSync, mkdirSync, openSync, readFileSync, unlinkSync, writeSync } from 'node:fs';
import { join } from 'node:path';
import type { Logger } from '../types/logger.js';
import { JobAlreadyRunningError } from './errors.js';

/**
 * Batch jobs that may not overlap with themselves. Different jobs may run at
 * the same time.
 */
export type JobName = 'daily_collection' | 'weekly_digest' | 'feedback_session';

export const JOB_NAMES: readonly JobName[] = ['daily_collection', 'weekly_digest', 'feedback_session'];

export interface LockHandle {
  job: JobName;
  path: string;
  release(): void;
}

export interface JobLockOptions {
  /** PID written into lock files (default: this process) */
  pid?: number;
  /** Liveness check for the PID found in an existing lock */
  isProcessAlive?: (pid: number) => boolean;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Signal 0 checks existence without touching the process. EPERM means it
 * exists under another user.
 */
export function processExists(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return isErrnoException(error) && error.code === 'EPERM';
  }
}

/**
 * JobLock - per-job PID lock files under one directory.
 *
 * acquire() never waits: if a live process holds the lock it throws
 * JobAlreadyRunningError. A lock left behind by a dead process is removed
 * with a warning and taken over.
 */
export class JobLock {
  private readonly lockDir: string;
  private readonly logger: Logger;
  private readonly pid: number;
  private readonly isProcessAlive: (pid: number) => boolean;

  constructor(lockDir: string, logger: Logger, options: JobLockOptions = {}) {
    this.lockDir = lockDir;
    this.logger = logger.child({ component: 'job-lock' });
    this.pid = options.pid ?? process.pid;
    this.isProcessAlive = options.isProcessAlive ?? processExists;
  }

  lockPath(job: JobName): string {
    return join(this.lockDir, `${job}.lock`);
  }

  acquire(job: JobName): LockHandle {
    mkdirSync(this.lockDir, { recursive: true });
    const path = this.lockPath(job);

    if (!this.tryCreate(path)) {
      const holder = this.readHolder(path);
      if (holder !== null && this.isProcessAlive(holder)) {
        throw new JobAlreadyRunningError(job, holder);
      }

      this.logger.warn({ job, path, stalePid: holder }, 'Removing stale lock file');
      unlinkSync(path);

      if (!this.tryCreate(path)) {
        // Another process took over the stale lock first.
        throw new JobAlreadyRunningError(job, this.readHolder(path) ?? 0);
      }
    }

    this.logger.debug({ job, path }, 'Lock acquired');

    let released = false;
    return {
      job,
      path,
      release: () => {
        if (released) return;
        released = true;
        try {
          unlinkSync(path);
        } catch (error) {
          if (!isErrnoException(error) || error.code !== 'ENOENT') throw error;
        }
        this.logger.debug({ job, path }, 'Lock released');
      },
    };
  }

  /**
   * PID recorded in a lock file, or null if there is none or it is unreadable.
   */
  readHolder(path: string): number | null {
    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return null;
      throw error;
    }
    const pid = Number.parseInt(content.trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  }

  private tryCreate(path: string): boolean {
    let fd: number;
    try {
      fd = openSync(path, 'wx');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') return false;
      throw error;
    }
    try {
      writeSync(fd, String(this.pid));
    } finally {
      closeSync(fd);
    }
    return true;
  }
}
