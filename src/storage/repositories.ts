import type { LearningRepositories } from '../ports/repositories.js';
import type { LearningStore } from './learning-store.js';
import { SqlitePatternRepo } from './pattern-repo.js';
import { SqliteKeywordRepo } from './keyword-repo.js';
import { SqliteSourceRepo } from './source-repo.js';
import { SqliteFeedbackRepo } from './feedback-repo.js';
import { SqlitePredictionRepo } from './prediction-repo.js';
import { SqliteDigestRepo } from './digest-repo.js';

/**
 * Build every repository over one store, sharing its transaction boundary.
 */
export function createSqliteRepositories(store: LearningStore): LearningRepositories {
  return store.read('prepare-statements', () => ({
    patterns: new SqlitePatternRepo(store.db),
    keywords: new SqliteKeywordRepo(store.db),
    sources: new SqliteSourceRepo(store.db),
    feedback: new SqliteFeedbackRepo(store.db),
    predictions: new SqlitePredictionRepo(store.db),
    digests: new SqliteDigestRepo(store.db),
    transaction: <T>(operation: string, fn: () => T): T => store.transaction(operation, fn),
    read: <T>(operation: string, fn: () => T): T => store.read(operation, fn),
  }));
}
