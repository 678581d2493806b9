import { z } from 'zod';
import { AliasTable } from '../core/assignments';
import { RegistryError } from '../core/errors';
import { childLogger } from '../utils/logger';
import { readJsonFile, writeJsonFileAtomic } from './json-file';

const logger = childLogger('alias-registry');

const IDENTITY = /^\d{1,20}$/;

export function isIdentity(value: string): boolean {
  return IDENTITY.test(value);
}

// Older files stored identities as JSON numbers; only exact (safe) integers are kept.
const identitySchema = z.union([
  z.string().regex(IDENTITY),
  z.number().int().nonnegative().safe().transform((n) => String(n)),
]);

const registryFileSchema = z
  .record(z.string(), z.unknown())
  .transform((raw) => {
    const table: Record<string, string[]> = {};
    for (const [name, entry] of Object.entries(raw)) {
      const values = Array.isArray(entry) ? entry : [entry];
      const identities: string[] = [];
      for (const value of values) {
        const parsed = identitySchema.safeParse(value);
        if (parsed.success && !identities.includes(parsed.data)) {
          identities.push(parsed.data);
        } else if (!parsed.success) {
          logger.warn({ name, value }, 'dropping invalid identity from registry file');
        }
      }
      if (name.trim() && identities.length > 0) {
        table[name] = identities;
      } else {
        logger.warn({ name }, 'dropping empty alias entry from registry file');
      }
    }
    return table;
  });

export type AddResult = 'added' | 'unchanged';
export type RemoveResult = 'removed' | 'not-associated';

/**
 * Persisted alias name → identities mapping. Every state-changing call
 * rewrites the whole file atomically before the new state becomes visible.
 */
export class AliasRegistry {
  private entries: Map<string, string[]>;

  constructor(private readonly filePath: string, initial: AliasTable = {}) {
    this.entries = new Map(Object.entries(initial).map(([name, ids]) => [name, [...ids]]));
  }

  static load(filePath: string): AliasRegistry {
    const table = readJsonFile<Record<string, string[]>>(filePath, {}, registryFileSchema, logger);
    return new AliasRegistry(filePath, table);
  }

  addAlias(name: string, identity: string): AddResult {
    const alias = normalizeName(name);
    assertIdentity(identity);

    const current = this.entries.get(alias) ?? [];
    if (current.includes(identity)) return 'unchanged';

    const next = new Map(this.entries);
    next.set(alias, [...current, identity]);
    this.commit(next);
    logger.info({ alias, identity }, 'alias added');
    return 'added';
  }

  removeAlias(name: string, identity: string): RemoveResult {
    const alias = name.trim();
    const current = this.entries.get(alias);
    if (!current || !current.includes(identity)) return 'not-associated';

    const next = new Map(this.entries);
    const remaining = current.filter((id) => id !== identity);
    if (remaining.length === 0) {
      next.delete(alias);
    } else {
      next.set(alias, remaining);
    }
    this.commit(next);
    logger.info({ alias, identity, purged: remaining.length === 0 }, 'alias removed');
    return 'removed';
  }

  aliasesFor(identity: string): string[] {
    const names: string[] = [];
    for (const [name, identities] of this.entries) {
      if (identities.includes(identity)) names.push(name);
    }
    return names;
  }

  listAll(): AliasTable {
    const table: Record<string, readonly string[]> = {};
    for (const [name, identities] of this.entries) table[name] = [...identities];
    return table;
  }

  /** identity → alias names (sorted), identities in first-seen order */
  byIdentity(): Map<string, string[]> {
    const users = new Map<string, string[]>();
    for (const [name, identities] of this.entries) {
      for (const identity of identities) {
        const names = users.get(identity) ?? [];
        names.push(name);
        users.set(identity, names);
      }
    }
    for (const names of users.values()) names.sort();
    return users;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get size(): number {
    return this.entries.size;
  }

  private commit(next: Map<string, string[]>): void {
    writeJsonFileAtomic(this.filePath, Object.fromEntries(next));
    this.entries = next;
  }
}

function normalizeName(name: string): string {
  const alias = name.trim();
  if (!alias) {
    throw new RegistryError('Alias name must not be blank', 'REGISTRY_INVALID_NAME');
  }
  return alias;
}

function assertIdentity(identity: string): void {
  if (!isIdentity(identity)) {
    throw new RegistryError(`Not a valid user id: ${identity}`, 'REGISTRY_INVALID_IDENTITY', { identity });
  }
}
