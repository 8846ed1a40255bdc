#!/usr/bin/env node
/**
 * adaptive-urgency command line.
 *
 *   adaptive-urgency report                 learned state as JSON
 *   adaptive-urgency summary [days]         feedback received in the last days (default 7)
 *   adaptive-urgency decay                  run a pattern confidence decay pass
 *   adaptive-urgency score <file.json>      score an array of headlines (or collector items with `title`)
 *   adaptive-urgency digest <file.json>     register a delivered digest
 *   adaptive-urgency feedback <file.json>   ingest {digests, articles, falsePositives, missedSignals}
 */

import 'dotenv/config';

import { readFile } from 'node:fs/promises';
import { createContainerAsync, type Container } from './core/container.js';
import { runJob } from './core/job-runner.js';
import { EngineError } from './core/errors.js';
import { applyFeedbackBatch, feedbackBatchSchema, scoreBatchSchema, scoreHeadlines } from './jobs/batch.js';
import { digestRegistrationSchema, parseInput } from './learning/schemas.js';

const USAGE = 'Usage: adaptive-urgency <report|summary [days]|decay|score <file>|digest <file>|feedback <file>>';

function print(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

async function readJson(path: string | undefined): Promise<unknown> {
  if (!path) {
    throw new Error(`Missing input file\n${USAGE}`);
  }
  const content = await readFile(path, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`${path} is not valid JSON: ${message}`);
  }
}

async function run(container: Container, command: string | undefined, arg: string | undefined): Promise<void> {
  const { engine, logger, jobLock } = container;
  const deps = { lock: jobLock, logger };

  switch (command) {
    case 'report':
      print(engine.intelligenceReport());
      return;

    case 'summary': {
      const days = arg === undefined ? 7 : Number(arg);
      if (!Number.isInteger(days) || days <= 0) {
        throw new Error(`days must be a positive whole number, got "${String(arg)}"`);
      }
      print(engine.feedbackSummary(days));
      return;
    }

    case 'decay':
      print(await runJob(deps, 'daily_collection', () => engine.decay()));
      return;

    case 'score': {
      const items = parseInput(scoreBatchSchema, await readJson(arg));
      print(await runJob(deps, 'daily_collection', () => scoreHeadlines(engine, items, logger)));
      return;
    }

    case 'digest': {
      const registration = parseInput(digestRegistrationSchema, await readJson(arg));
      const entries = await runJob(deps, 'weekly_digest', () => engine.registerDigest(registration));
      print({ digestId: registration.digestId, entries });
      return;
    }

    case 'feedback': {
      const batch = parseInput(feedbackBatchSchema, await readJson(arg));
      print(await runJob(deps, 'feedback_session', () => applyFeedbackBatch(engine, batch, logger)));
      return;
    }

    default:
      throw new Error(USAGE);
  }
}

async function main(): Promise<void> {
  const [command, arg] = process.argv.slice(2);
  const container = await createContainerAsync();

  try {
    await run(container, command, arg);
  } catch (error) {
    if (error instanceof EngineError) {
      container.logger.error({ code: error.code }, error.message);
    }
    throw error;
  } finally {
    container.shutdown();
  }
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
