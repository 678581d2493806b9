import { parseSheetDate } from './dates';
import {
  Assignment,
  DIFFICULTY_SLOTS,
  DifficultySlot,
  FIELD,
  IN_PROGRESS_STATUSES,
  TaskRow,
  cell,
  titleOf,
} from './types';

/** alias name → identities holding it */
export type AliasTable = Readonly<Record<string, readonly string[]>>;

export interface DueRow {
  row: TaskRow;
  title: string;
  dateString: string;
  target: Date;
}

/**
 * Returns the row with its parsed target date when it is in progress and
 * carries a real date; null otherwise.
 */
export function toDueRow(row: TaskRow): DueRow | null {
  const status = cell(row, FIELD.status).trim();
  if (!IN_PROGRESS_STATUSES.has(status)) return null;

  const dateString = cell(row, FIELD.targetDate).trim();
  if (!dateString) return null;
  const target = parseSheetDate(dateString);
  if (!target) return null;

  return { row, title: titleOf(row), dateString, target };
}

/**
 * Slots whose text contains at least one of the given alias names.
 * Matching is substring containment, so a short alias also matches any
 * longer name that contains it.
 */
export function matchedSlots(row: TaskRow, aliases: readonly string[]): DifficultySlot[] {
  return DIFFICULTY_SLOTS.filter((slot) => {
    const text = cell(row, slot).trim();
    return aliases.some((alias) => alias !== '' && text.includes(alias));
  });
}

/**
 * identity → slots it was matched through, over every alias in the table.
 * Slots keep sheet order.
 */
export function matchRecipients(row: TaskRow, table: AliasTable): Map<string, Set<DifficultySlot>> {
  const recipients = new Map<string, Set<DifficultySlot>>();
  for (const slot of DIFFICULTY_SLOTS) {
    const text = cell(row, slot).trim();
    if (!text) continue;
    for (const [alias, identities] of Object.entries(table)) {
      if (alias === '' || !text.includes(alias)) continue;
      for (const identity of identities) {
        const slots = recipients.get(identity) ?? new Set<DifficultySlot>();
        slots.add(slot);
        recipients.set(identity, slots);
      }
    }
  }
  return recipients;
}

/** In-progress, dated rows assigned to any of the given aliases. */
export function collectAssignments(rows: readonly TaskRow[], aliases: readonly string[]): Assignment[] {
  const assignments: Assignment[] = [];
  if (aliases.length === 0) return assignments;

  for (const row of rows) {
    const due = toDueRow(row);
    if (!due) continue;
    const slots = matchedSlots(row, aliases);
    if (slots.length === 0) continue;
    assignments.push({ title: due.title, slots, dateString: due.dateString, target: due.target });
  }
  return assignments;
}
