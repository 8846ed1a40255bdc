import type { Logger } from '../types/logger.js';
import { createLogger } from './logger.js';
import { JobLock } from './job-lock.js';
import { type MergedConfig, createConfigLoader } from '../config/index.js';
import { type LearningStore, createLearningStore, createSqliteRepositories } from '../storage/index.js';
import type { LearningRepositories } from '../ports/repositories.js';
import type { Clock } from '../learning/types.js';
import { type UrgencyEngine, createUrgencyEngine } from '../learning/urgency-engine.js';

/**
 * Everything a job or command needs, wired once per process.
 */
export interface Container {
  /** Loaded configuration */
  config: MergedConfig;
  /** Application logger */
  logger: Logger;
  /** SQLite store holding all learned state */
  store: LearningStore;
  repos: LearningRepositories;
  /** Public learning surface */
  engine: UrgencyEngine;
  /** Per-job PID locks */
  jobLock: JobLock;
  /** Close the store; safe to call twice */
  shutdown: () => void;
}

export interface ContainerOptions {
  /** Use this logger instead of building one from config.logging */
  logger?: Logger;
  clock?: Clock;
}

/**
 * Create the container from an already loaded configuration.
 */
export function createContainer(config: MergedConfig, options: ContainerOptions = {}): Container {
  const logger: Logger =
    options.logger ??
    createLogger({
      logDir: config.logging.logDir,
      maxFiles: config.logging.maxFiles,
      level: config.logging.level,
      pretty: config.logging.pretty,
      toFile: config.logging.toFile,
    });

  const store = createLearningStore(config.storage.dbPath, {
    busyTimeoutMs: config.storage.busyTimeoutMs,
    logger,
  });
  const repos = createSqliteRepositories(store);

  const engine = createUrgencyEngine({
    repos,
    logger,
    config: config.learning,
    clock: options.clock,
  });

  const jobLock = new JobLock(config.paths.locks, logger);

  logger.debug({ dbPath: store.path, schemaVersion: store.getSchemaVersion() }, 'Container ready');

  return {
    config,
    logger,
    store,
    repos,
    engine,
    jobLock,
    shutdown: () => {
      store.close();
      logger.debug('Store closed');
    },
  };
}

/**
 * Load configuration (file + environment), then create the container.
 * Config warnings are logged once the logger exists.
 */
export async function createContainerAsync(
  options: ContainerOptions & { configPath?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<Container> {
  const loader = createConfigLoader(options.configPath, options.env);
  const config = await loader.load();
  const container = createContainer(config, options);

  for (const warning of loader.getWarnings()) {
    container.logger.warn(warning);
  }
  if (loader.getLoadedConfigFile()) {
    container.logger.debug({ configPath: config.paths.config }, 'Config file loaded');
  }

  return container;
}
