import { z } from 'zod';
import { toIsoDate } from '../core/dates';
import { MilestoneTag } from '../core/types';
import { childLogger } from '../utils/logger';
import { readJsonFile, writeJsonFileAtomic } from './json-file';

const logger = childLogger('notification-ledger');

/** Recorded for keys whose stored date is not a string. */
export const UNKNOWN_SENT_DATE = 'unknown';

// Every key survives loading; a non-string value loses only its date.
const ledgerFileSchema = z.record(z.string(), z.unknown()).transform((raw) => {
  const sent: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      sent[key] = value;
    } else {
      logger.warn({ key, value }, 'ledger entry has no date string; keeping the key');
      sent[key] = UNKNOWN_SENT_DATE;
    }
  }
  return sent;
});

export function notificationKey(title: string, dateString: string, tag: MilestoneTag): string {
  return `${title}_${dateString}_${tag}`;
}

/**
 * Persisted set of milestone keys that have already been notified, each with
 * the date it was recorded. Grows monotonically. Writes are batched: call
 * `save()` once the pass is done.
 */
export class NotificationLedger {
  private readonly sent: Map<string, string>;
  private dirty = false;

  constructor(private readonly filePath: string, initial: Readonly<Record<string, string>> = {}) {
    this.sent = new Map(Object.entries(initial));
  }

  static load(filePath: string): NotificationLedger {
    return new NotificationLedger(filePath, readJsonFile<Record<string, string>>(filePath, {}, ledgerFileSchema, logger));
  }

  hasSent(key: string): boolean {
    return this.sent.has(key);
  }

  /** Records the key; a key that is already present keeps its first date. */
  markSent(key: string, date: Date): boolean {
    if (this.sent.has(key)) return false;
    this.sent.set(key, toIsoDate(date));
    this.dirty = true;
    return true;
  }

  sentOn(key: string): string | undefined {
    return this.sent.get(key);
  }

  get size(): number {
    return this.sent.size;
  }

  get hasUnsavedChanges(): boolean {
    return this.dirty;
  }

  save(): void {
    writeJsonFileAtomic(this.filePath, Object.fromEntries(this.sent));
    this.dirty = false;
    logger.debug({ filePath: this.filePath, keys: this.sent.size }, 'ledger saved');
  }
}
