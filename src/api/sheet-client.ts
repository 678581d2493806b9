import { z } from 'zod';
import { errorMessage } from '../core/errors';
import { TaskRow } from '../core/types';
import { childLogger } from '../utils/logger';

const logger = childLogger('sheet');

export const DEFAULT_SHEET_TIMEOUT_MS = 10_000;

export type SheetResult =
  | { ok: true; rows: TaskRow[] }
  | { ok: false; error: string };

export interface SheetSource {
  fetchRows(): Promise<SheetResult>;
}

// Cells arrive as strings, numbers or null depending on how the sheet was typed.
const cellSchema = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .optional()
  .transform((value) => (value === null || value === undefined ? undefined : String(value)));

const rowSchema = z.record(z.string(), z.unknown()).transform((raw) => {
  const row: Record<string, string | undefined> = {};
  for (const [column, value] of Object.entries(raw)) {
    const parsed = cellSchema.safeParse(value);
    if (parsed.success && parsed.data !== undefined) row[column] = parsed.data;
  }
  return row;
});

/** Keep only the object items of a sheet payload, with their cells stringified. */
export function parseSheetPayload(payload: unknown): TaskRow[] {
  if (!Array.isArray(payload)) {
    logger.warn({ type: typeof payload }, 'sheet payload is not an array; treating as zero rows');
    return [];
  }
  const rows: TaskRow[] = [];
  for (const item of payload) {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) continue;
    const parsed = rowSchema.safeParse(item);
    if (parsed.success) rows.push(parsed.data);
  }
  return rows;
}

/**
 * One time-bounded GET of the sheet endpoint. Never throws and never
 * retries: transport errors, timeouts, non-2xx statuses and unreadable bodies
 * all come back as `{ ok: false }`.
 */
export async function fetchSheetRows(url: string, timeoutMs: number = DEFAULT_SHEET_TIMEOUT_MS): Promise<SheetResult> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    const error = `request failed: ${errorMessage(err)}`;
    logger.warn({ err }, `Failed to fetch sheet data: ${error}`);
    return { ok: false, error };
  }

  if (!response.ok) {
    const error = `HTTP ${response.status}`;
    logger.warn({ status: response.status }, `Sheet API error: ${error}`);
    return { ok: false, error };
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (err) {
    const error = `invalid body: ${errorMessage(err)}`;
    logger.warn({ err }, `Sheet API returned an unreadable body`);
    return { ok: false, error };
  }

  return { ok: true, rows: parseSheetPayload(payload) };
}

export class HttpSheetSource implements SheetSource {
  constructor(private readonly url: string, private readonly timeoutMs: number = DEFAULT_SHEET_TIMEOUT_MS) {}

  fetchRows(): Promise<SheetResult> {
    return fetchSheetRows(this.url, this.timeoutMs);
  }
}
