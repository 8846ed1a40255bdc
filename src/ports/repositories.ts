/**
 * Repository Ports
 *
 * The learning logic talks to storage only through these interfaces, which
 * keeps SQL out of the trackers and lets tests wrap or fake a single
 * repository. Implementations must be synchronous so that the ingester can
 * group calls to several repositories into one store transaction.
 */

import type {
  DigestEntry,
  KeywordWeight,
  Pattern,
  PredictionRecord,
  SourceReliability,
} from '../learning/types.js';
import type { FeedbackKind, FeedbackRecord } from '../types/feedback.js';

export interface PatternRepo {
  get(signature: string): Pattern | null;
  /** Patterns sharing a marker/shape key (near-match candidates) */
  findByShape(shapeKey: string): Pattern[];
  save(pattern: Pattern): void;
  setConfidence(signature: string, confidence: number): void;
  all(): Pattern[];
  count(): number;
}

export interface KeywordRepo {
  get(term: string): KeywordWeight | null;
  getMany(terms: readonly string[]): KeywordWeight[];
  save(keyword: KeywordWeight): void;
  all(): KeywordWeight[];
  count(): number;
}

export interface SourceRepo {
  get(source: string, contentType: string): SourceReliability | null;
  save(record: SourceReliability): void;
  all(): SourceReliability[];
}

export interface FeedbackRepo {
  exists(kind: FeedbackKind, key: string): boolean;
  insert(record: FeedbackRecord): void;
  /** Records created at or after since, oldest first */
  since(since: Date): FeedbackRecord[];
}

export interface PredictionRepo {
  insert(record: PredictionRecord): void;
  get(predictionId: string): PredictionRecord | null;
  /** Unresolved predictions for a headline from a source, newest first */
  findUnresolved(headline: string, source: string, from: Date, to: Date): PredictionRecord[];
  resolve(predictionId: string, realizedScore: number, error: number, resolvedAt: Date): void;
  /** Resolved predictions whose prediction time falls in [since, until] */
  resolvedBetween(since: Date, until: Date): PredictionRecord[];
}

export interface DigestRepo {
  exists(digestId: string): boolean;
  insertEntries(entries: readonly DigestEntry[]): void;
  entries(digestId: string): DigestEntry[];
}

/**
 * Everything the engine persists, plus the transaction boundary.
 */
export interface LearningRepositories {
  patterns: PatternRepo;
  keywords: KeywordRepo;
  sources: SourceRepo;
  feedback: FeedbackRepo;
  predictions: PredictionRepo;
  digests: DigestRepo;
  /** Run fn atomically across all repositories */
  transaction<T>(operation: string, fn: () => T): T;
  /** Run a read, mapping driver failures to StorageUnavailableError */
  read<T>(operation: string, fn: () => T): T;
}
