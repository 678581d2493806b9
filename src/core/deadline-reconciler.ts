import { SheetSource } from '../api/sheet-client';
import { NotificationLedger, notificationKey } from '../store/notification-ledger';
import { Logger, childLogger } from '../utils/logger';
import { AliasTable, matchRecipients, toDueRow } from './assignments';
import { addDays, isSameDay, utcToday } from './dates';
import { errorMessage } from './errors';
import { DIFFICULTY_SLOTS, DifficultySlot, MILESTONES } from './types';

/**
 * Capability to reach a recipient. Membership is re-checked before every send
 * so people who left all configured servers are not messaged.
 */
export interface RecipientGateway {
  isPoolMember(identity: string): Promise<boolean>;
  sendDirect(identity: string, content: string): Promise<void>;
}

export interface AliasSource {
  listAll(): AliasTable;
}

export interface ReconcilerDeps {
  sheet: SheetSource;
  registry: AliasSource;
  ledger: NotificationLedger;
  gateway: RecipientGateway;
  clock?: () => Date;
  logger?: Logger;
}

export interface MilestoneOutcome {
  key: string;
  sent: string[];
  skipped: string[];
  failed: string[];
}

export type PassReport =
  | { status: 'fetch-failed'; error: string }
  | {
      status: 'completed';
      today: Date;
      rowsScanned: number;
      milestones: MilestoneOutcome[];
      ledgerSaved: boolean;
    };

export function formatReminder(leadDays: number, title: string, slots: Iterable<DifficultySlot>, dateString: string): string {
  return [
    `⏰ 納期通知 (${leadDays}日前)`,
    title,
    `担当:${[...slots].join(' / ')}`,
    `納期:${dateString}`,
  ].join('\n');
}

function sortSlots(slots: Set<DifficultySlot>): DifficultySlot[] {
  return DIFFICULTY_SLOTS.filter((slot) => slots.has(slot));
}

/**
 * Sends the 3-week and 2-week reminders for in-progress rows. A milestone
 * fires only on its exact day and is recorded in the ledger after one attempt,
 * whatever the individual sends did.
 */
export class DeadlineReconciler {
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(private readonly deps: ReconcilerDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger ?? childLogger('reconciler');
  }

  async runPass(): Promise<PassReport> {
    const fetched = await this.deps.sheet.fetchRows();
    if (!fetched.ok) {
      this.logger.warn({ error: fetched.error }, 'No data fetched for deadline check; skipping this run');
      return { status: 'fetch-failed', error: fetched.error };
    }

    const today = utcToday(this.clock());
    const aliases = this.deps.registry.listAll();
    const milestones: MilestoneOutcome[] = [];

    for (const row of fetched.rows) {
      const due = toDueRow(row);
      if (!due) continue;

      const recipients = matchRecipients(row, aliases);
      if (recipients.size === 0) continue;

      for (const { leadDays, tag } of MILESTONES) {
        if (!isSameDay(today, addDays(due.target, -leadDays))) continue;
        const key = notificationKey(due.title, due.dateString, tag);
        if (this.deps.ledger.hasSent(key)) continue;

        const outcome: MilestoneOutcome = { key, sent: [], skipped: [], failed: [] };
        for (const [identity, slots] of recipients) {
          await this.notify(identity, formatReminder(leadDays, due.title, sortSlots(slots), due.dateString), outcome);
        }
        this.deps.ledger.markSent(key, today);
        milestones.push(outcome);
        this.logger.info(
          { key, sent: outcome.sent.length, skipped: outcome.skipped.length, failed: outcome.failed.length },
          'milestone processed'
        );
      }
    }

    const ledgerSaved = this.saveLedger();
    return { status: 'completed', today, rowsScanned: fetched.rows.length, milestones, ledgerSaved };
  }

  private async notify(identity: string, content: string, outcome: MilestoneOutcome): Promise<void> {
    try {
      if (!(await this.deps.gateway.isPoolMember(identity))) {
        this.logger.info({ identity }, 'recipient is not in any configured server; skipping');
        outcome.skipped.push(identity);
        return;
      }
      await this.deps.gateway.sendDirect(identity, content);
      outcome.sent.push(identity);
      this.logger.info({ identity }, 'DM sent');
    } catch (err) {
      outcome.failed.push(identity);
      this.logger.warn({ identity, error: errorMessage(err) }, 'Failed to send DM');
    }
  }

  private saveLedger(): boolean {
    if (!this.deps.ledger.hasUnsavedChanges) return false;
    try {
      this.deps.ledger.save();
      return true;
    } catch (err) {
      this.logger.error({ err }, 'could not persist notification ledger');
      return false;
    }
  }
}
