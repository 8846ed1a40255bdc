/**
 * adaptive-urgency - learns which news headlines are urgent from user feedback.
 *
 * Library entry point. The command line lives in cli.ts.
 */

export * from './learning/index.js';
export * from './config/index.js';
export * from './storage/index.js';

export type { Logger } from './types/logger.js';
export type { HeadlineInput, EconomicSnapshot, UrgencyLevel } from './types/headline.js';
export { urgencyLevel } from './types/headline.js';
export type {
  FeedbackKind,
  FeedbackRecord,
  ArticleFeedback,
  ArticleFeedbackType,
  DigestFeedback,
  DigestFeedbackType,
  FalsePositiveReport,
  MissedSignalReport,
  IngestResult,
  IngestStatus,
} from './types/feedback.js';
export type { LearningRepositories } from './ports/repositories.js';

export {
  EngineError,
  ValidationError,
  DuplicateFeedbackError,
  StorageUnavailableError,
  CorruptRecordError,
  JobAlreadyRunningError,
} from './core/errors.js';
export type { EngineErrorCode } from './core/errors.js';
export { createLogger } from './core/logger.js';
export type { LoggerConfig } from './core/logger.js';
export { JobLock, JOB_NAMES } from './core/job-lock.js';
export type { JobName, LockHandle } from './core/job-lock.js';
export { runJob } from './core/job-runner.js';
export { createContainer, createContainerAsync } from './core/container.js';
export type { Container, ContainerOptions } from './core/container.js';
