import type { Logger } from '../types/logger.js';
import type { SourceRepo } from '../ports/repositories.js';
import type { Clock, SourceLearningConfig, SourceReliability } from './types.js';
import { DEFAULT_LEARNING_CONFIG, NEUTRAL_RELIABILITY, clamp, systemClock } from './types.js';
import { QuarantineLog, isValidDate } from './quarantine.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Canonical source key: "https://www.Reuters.com/" -> "reuters.com",
 * "Bloomberg Markets" -> "bloomberg_markets".
 */
export function normalizeSource(source: string): string {
  return source
    .trim()
    .toLowerCase()
    .replace(/^[a-z][a-z0-9+.-]*:\/\//, '')
    .replace(/^www\./, '')
    .replace(/\/+$/, '')
    .replace(/\s+/g, '_');
}

export function normalizeContentType(contentType: string): string {
  return contentType.trim().toLowerCase();
}

/**
 * Reliability as seen at a point in time.
 */
export interface SourceReading {
  source: string;
  contentType: string;
  /** Effective reliability after staleness decay and floor */
  reliability: number;
  /** Stored value before decay, null if never recorded */
  storedReliability: number | null;
  sampleCount: number;
  /** Why the neutral value was reported, if it was */
  neutralReason: 'unseen' | 'insufficient_samples' | 'quarantined' | null;
}

export interface SourceReliabilityTrackerOptions {
  clock?: Clock;
  quarantine?: QuarantineLog;
}

/**
 * SourceReliabilityTracker - how far to trust each (source, content type).
 *
 * Each resolved outcome pulls reliability toward 1 - |predicted - realized| / 10.
 * Reads decay the stored value toward neutral with idle time, so a source
 * that stops producing feedback drifts back to 0.5.
 */
export class SourceReliabilityTracker {
  private readonly repo: SourceRepo;
  private readonly logger: Logger;
  private readonly config: SourceLearningConfig;
  private readonly clock: Clock;
  private readonly quarantine: QuarantineLog;

  constructor(
    repo: SourceRepo,
    logger: Logger,
    config: SourceLearningConfig = DEFAULT_LEARNING_CONFIG.sources,
    options: SourceReliabilityTrackerOptions = {}
  ) {
    this.repo = repo;
    this.logger = logger.child({ component: 'source-tracker' });
    this.config = config;
    this.clock = options.clock ?? systemClock;
    this.quarantine = options.quarantine ?? new QuarantineLog(this.logger);
  }

  /**
   * Whether feedback from this source is accepted. An empty knownSources list
   * accepts everything.
   */
  isKnown(source: string): boolean {
    const { knownSources } = this.config;
    if (knownSources.length === 0) return true;
    const key = normalizeSource(source);
    return knownSources.some((known) => normalizeSource(known) === key);
  }

  inspect(record: SourceReliability): string | null {
    if (!Number.isFinite(record.reliability) || record.reliability < 0 || record.reliability > 1) {
      return 'reliability outside 0-1';
    }
    if (!Number.isFinite(record.sampleCount) || record.sampleCount < 0) {
      return 'invalid sample count';
    }
    if (!isValidDate(record.lastUpdated)) {
      return 'unreadable last_updated';
    }
    return null;
  }

  /**
   * Fold one resolved prediction into the source's reliability.
   * Returns null when the stored record is quarantined.
   */
  recordOutcome(
    source: string,
    contentType: string,
    predictedScore: number,
    realizedScore: number,
    weightMultiplier = 1
  ): SourceReliability | null {
    const key = normalizeSource(source);
    const type = normalizeContentType(contentType);
    const existing = this.repo.get(key, type);
    if (existing && !this.isHealthy(existing)) {
      return null;
    }

    const accuracy = clamp(1 - Math.abs(predictedScore - realizedScore) / 10, 0, 1);
    const rate = Math.min(1, this.config.learningRate * weightMultiplier);
    const previous = existing?.reliability ?? NEUTRAL_RELIABILITY;

    const record: SourceReliability = {
      source: key,
      contentType: type,
      reliability: clamp(previous * (1 - rate) + accuracy * rate, 0, 1),
      sampleCount: (existing?.sampleCount ?? 0) + 1,
      lastUpdated: this.clock(),
    };
    this.repo.save(record);

    this.logger.debug(
      {
        source: key,
        contentType: type,
        accuracy: accuracy.toFixed(3),
        reliability: record.reliability.toFixed(3),
        sampleCount: record.sampleCount,
      },
      'Source reliability updated'
    );

    return record;
  }

  /**
   * Effective reliability, 0-1. Unseen sources and sources with fewer than
   * minSamples outcomes are neutral.
   */
  reliability(source: string, contentType: string): number {
    return this.read(source, contentType).reliability;
  }

  read(source: string, contentType: string): SourceReading {
    const key = normalizeSource(source);
    const type = normalizeContentType(contentType);
    const record = this.repo.get(key, type);

    if (!record) {
      return this.neutral(key, type, null, 0, 'unseen');
    }
    if (!this.isHealthy(record)) {
      return this.neutral(key, type, null, 0, 'quarantined');
    }
    return this.evaluate(record);
  }

  /**
   * Readings for every sound stored record, sorted by source then type.
   */
  readAll(): { readings: SourceReading[]; quarantined: number } {
    let quarantined = 0;
    const readings: SourceReading[] = [];
    for (const record of this.repo.all()) {
      if (this.isHealthy(record)) {
        readings.push(this.evaluate(record));
      } else {
        quarantined++;
      }
    }
    readings.sort((a, b) => a.source.localeCompare(b.source) || a.contentType.localeCompare(b.contentType));
    return { readings, quarantined };
  }

  private evaluate(record: SourceReliability): SourceReading {
    if (record.sampleCount < this.config.minSamples) {
      return this.neutral(
        record.source,
        record.contentType,
        record.reliability,
        record.sampleCount,
        'insufficient_samples'
      );
    }

    const idleDays = Math.max(0, this.clock().getTime() - record.lastUpdated.getTime()) / DAY_MS;
    const decayed =
      NEUTRAL_RELIABILITY +
      (record.reliability - NEUTRAL_RELIABILITY) * Math.exp(-this.config.decayRatePerDay * idleDays);

    return {
      source: record.source,
      contentType: record.contentType,
      reliability: clamp(decayed, this.config.reliabilityFloor, 1),
      storedReliability: record.reliability,
      sampleCount: record.sampleCount,
      neutralReason: null,
    };
  }

  private neutral(
    source: string,
    contentType: string,
    storedReliability: number | null,
    sampleCount: number,
    neutralReason: NonNullable<SourceReading['neutralReason']>
  ): SourceReading {
    return {
      source,
      contentType,
      reliability: NEUTRAL_RELIABILITY,
      storedReliability,
      sampleCount,
      neutralReason,
    };
  }

  private isHealthy(record: SourceReliability): boolean {
    const reason = this.inspect(record);
    if (reason === null) return true;
    this.quarantine.report('source', `${record.source}/${record.contentType}`, reason);
    return false;
  }
}
