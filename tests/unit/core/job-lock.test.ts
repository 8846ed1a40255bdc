import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { JobLock } from '../../../src/core/job-lock.js';
import { runJob } from '../../../src/core/job-runner.js';
import { getRunContext } from '../../../src/core/trace-context.js';
import { JobAlreadyRunningError } from '../../../src/core/errors.js';
import { createMockLogger, type MockLogger } from '../../helpers/factories.js';

describe('JobLock', () => {
  let dir: string;
  let logger: MockLogger;
  let alive: Set<number>;

  const createLock = (pid: number) =>
    new JobLock(dir, logger, { pid, isProcessAlive: (p) => alive.has(p) });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'job-lock-'));
    logger = createMockLogger();
    alive = new Set();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the PID into the lock file and removes it on release', () => {
    const handle = createLock(1001).acquire('weekly_digest');

    expect(readFileSync(join(dir, 'weekly_digest.lock'), 'utf-8')).toBe('1001');
    handle.release();
    expect(existsSync(join(dir, 'weekly_digest.lock'))).toBe(false);
    handle.release();
  });

  it('refuses a job held by a live process', () => {
    alive.add(4242);
    createLock(4242).acquire('weekly_digest');

    expect(() => createLock(1001).acquire('weekly_digest')).toThrow(
      'Job "weekly_digest" is already running (PID: 4242)'
    );
    expect(() => createLock(1001).acquire('weekly_digest')).toThrow(JobAlreadyRunningError);
  });

  it('lets different jobs run at the same time', () => {
    alive.add(4242);
    createLock(4242).acquire('weekly_digest');

    expect(createLock(1001).acquire('daily_collection').job).toBe('daily_collection');
  });

  it('takes over a lock left by a dead process', () => {
    writeFileSync(join(dir, 'feedback_session.lock'), '4242');

    createLock(1001).acquire('feedback_session');

    expect(readFileSync(join(dir, 'feedback_session.lock'), 'utf-8')).toBe('1001');
    expect(logger.messages('warn')).toEqual(['Removing stale lock file']);
  });

  it('treats an unreadable PID as stale', () => {
    writeFileSync(join(dir, 'feedback_session.lock'), 'garbage');

    expect(createLock(1001).acquire('feedback_session').job).toBe('feedback_session');
  });
});

describe('runJob', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'run-job-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('runs inside a run context named after the job', async () => {
    const logger = createMockLogger();
    const lock = new JobLock(dir, logger);

    const runId = await runJob({ lock, logger }, 'daily_collection', () => getRunContext()?.runId);

    expect(runId).toMatch(/^daily_collection_/);
    expect(logger.messages('info')).toEqual(['Job started', 'Job finished']);
    expect(existsSync(lock.lockPath('daily_collection'))).toBe(false);
  });

  it('releases the lock when the job throws', async () => {
    const logger = createMockLogger();
    const lock = new JobLock(dir, logger);

    await expect(
      runJob({ lock, logger }, 'weekly_digest', () => {
        throw new Error('collector offline');
      })
    ).rejects.toThrow('collector offline');

    expect(logger.messages('error')).toEqual(['Job failed']);
    expect(existsSync(lock.lockPath('weekly_digest'))).toBe(false);
  });
});
