import { SheetSource } from '../api/sheet-client';
import { collectAssignments } from './assignments';
import { Assignment } from './types';

export interface IdentityAliases {
  aliasesFor(identity: string): string[];
}

export type OwnDeadlines =
  | { kind: 'no-aliases' }
  | { kind: 'fetch-failed'; error: string }
  | { kind: 'none'; aliases: string[] }
  | { kind: 'found'; aliases: string[]; assignments: Assignment[] };

/**
 * The requester's in-progress assignments, without lead-time filtering or
 * ledger bookkeeping: every call reports the full current list.
 */
export async function checkOwnDeadlines(
  identity: string,
  registry: IdentityAliases,
  sheet: SheetSource
): Promise<OwnDeadlines> {
  const aliases = registry.aliasesFor(identity);
  if (aliases.length === 0) return { kind: 'no-aliases' };

  const fetched = await sheet.fetchRows();
  if (!fetched.ok) return { kind: 'fetch-failed', error: fetched.error };

  const assignments = collectAssignments(fetched.rows, aliases);
  if (assignments.length === 0) return { kind: 'none', aliases };
  return { kind: 'found', aliases, assignments };
}
