import type { Logger } from '../types/logger.js';
import type { CorruptEntity } from '../core/errors.js';
import { CorruptRecordError } from '../core/errors.js';

/**
 * Remembers which corrupt records this process has already reported, so a
 * bad row read on every prediction produces one warning rather than many.
 *
 * Corrupt rows stay in the store untouched for inspection; callers simply
 * skip them.
 */
export class QuarantineLog {
  private readonly logger: Logger;
  private readonly seen = new Map<string, CorruptRecordError>();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  report(entity: CorruptEntity, key: string, reason: string): CorruptRecordError {
    const id = `${entity}:${key}`;
    const existing = this.seen.get(id);
    if (existing) {
      return existing;
    }

    const error = new CorruptRecordError(entity, key, reason);
    this.seen.set(id, error);
    this.logger.warn({ entity, key, reason }, 'Quarantined corrupt record');
    return error;
  }

  list(): CorruptRecordError[] {
    return [...this.seen.values()];
  }
}

export function isValidDate(date: Date): boolean {
  return Number.isFinite(date.getTime());
}
