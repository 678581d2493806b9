import {
  DEFAULT_STATUS,
  DIFFICULTY_SLOTS,
  FIELD,
  TaskRow,
  UNASSIGNED_STATUS,
  cell,
} from '../../core/types';

export const MAX_LISTED = 25;
export const DEFAULT_COUNT = 10;
export const SEARCH_LIMIT = 10;

export interface GetFilter {
  status?: string | null;
  count?: number | null;
  includeUnassigned?: boolean | null;
  charter?: string | null;
}

function isListable(row: TaskRow): boolean {
  return Boolean(row[FIELD.title]) && Boolean(row[FIELD.composer]);
}

function anySlotContains(row: TaskRow, text: string): boolean {
  return DIFFICULTY_SLOTS.some((slot) => cell(row, slot).includes(text));
}

export function clampCount(count: number | null | undefined): number {
  if (count === null || count === undefined || !Number.isFinite(count)) return DEFAULT_COUNT;
  return Math.min(MAX_LISTED, Math.max(1, Math.trunc(count)));
}

/** Rows for `/get`: the last `count` rows of one status, optionally narrowed by charter. */
export function filterForGet(rows: readonly TaskRow[], filter: GetFilter = {}): TaskRow[] {
  const status = filter.status || DEFAULT_STATUS;
  const charter = filter.charter?.trim();

  let selected = rows.filter((row) => isListable(row) && row[FIELD.status] === status);
  if (!filter.includeUnassigned) {
    selected = selected.filter((row) => row[FIELD.status] !== UNASSIGNED_STATUS);
  }
  if (charter) {
    selected = selected.filter((row) => anySlotContains(row, charter));
  }
  return selected.slice(-clampCount(filter.count));
}

/** Rows for `/search`: keyword in title, composer or any slot; first matches win. */
export function searchRows(rows: readonly TaskRow[], keyword: string, limit: number = SEARCH_LIMIT): TaskRow[] {
  return rows
    .filter(
      (row) =>
        isListable(row) &&
        (cell(row, FIELD.title).includes(keyword) ||
          cell(row, FIELD.composer).includes(keyword) ||
          anySlotContains(row, keyword))
    )
    .slice(0, limit);
}
