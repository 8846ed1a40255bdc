/**
 * Storage module exports.
 */

export type { LearningStoreConfig } from './learning-store.js';
export { LearningStore, createLearningStore, SCHEMA_VERSION, IN_MEMORY } from './learning-store.js';
export { createSqliteRepositories } from './repositories.js';
export { SqlitePatternRepo } from './pattern-repo.js';
export { SqliteKeywordRepo } from './keyword-repo.js';
export { SqliteSourceRepo } from './source-repo.js';
export { SqliteFeedbackRepo } from './feedback-repo.js';
export { SqlitePredictionRepo } from './prediction-repo.js';
export { SqliteDigestRepo } from './digest-repo.js';
