import fs from 'fs';
import path from 'path';
import { RegistryError } from '../core/errors';
import { AliasRegistry } from '../store/alias-registry';
import { tempDir } from './helpers';

describe('AliasRegistry', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = tempDir();
    file = path.join(dir, 'charter_users.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const onDisk = () => JSON.parse(fs.readFileSync(file, 'utf8'));

  it('adds names and identities idempotently and persists them', () => {
    const registry = AliasRegistry.load(file);

    expect(registry.addAlias('veal', '111')).toBe('added');
    expect(registry.addAlias('veal', '111')).toBe('unchanged');
    expect(registry.addAlias('veal', '222')).toBe('added');

    expect(registry.listAll()).toEqual({ veal: ['111', '222'] });
    expect(onDisk()).toEqual({ veal: ['111', '222'] });
  });

  it('does not rewrite the file when nothing changed', () => {
    const registry = AliasRegistry.load(file);
    registry.addAlias('veal', '111');
    fs.writeFileSync(file, '{"sentinel": ["1"]}', 'utf8');

    registry.addAlias('veal', '111');

    expect(onDisk()).toEqual({ sentinel: ['1'] });
  });

  it('purges a name once its last identity is removed', () => {
    const registry = AliasRegistry.load(file);
    registry.addAlias('veal', '111');

    expect(registry.removeAlias('veal', '111')).toBe('removed');
    expect(registry.has('veal')).toBe(false);
    expect(registry.listAll()).toEqual({});
    expect(onDisk()).toEqual({});
  });

  it('keeps the name while other identities remain', () => {
    const registry = AliasRegistry.load(file);
    registry.addAlias('veal', '111');
    registry.addAlias('veal', '222');

    registry.removeAlias('veal', '111');

    expect(registry.listAll()).toEqual({ veal: ['222'] });
  });

  it('reports pairs that are not associated', () => {
    const registry = AliasRegistry.load(file);
    registry.addAlias('veal', '111');

    expect(registry.removeAlias('veal', '999')).toBe('not-associated');
    expect(registry.removeAlias('moss', '111')).toBe('not-associated');
    expect(registry.listAll()).toEqual({ veal: ['111'] });
  });

  it('finds every alias held by an identity', () => {
    const registry = AliasRegistry.load(file);
    registry.addAlias('veal', '111');
    registry.addAlias('moss', '222');
    registry.addAlias('fern', '111');

    expect(registry.aliasesFor('111')).toEqual(['veal', 'fern']);
    expect(registry.aliasesFor('333')).toEqual([]);
    expect([...registry.byIdentity()]).toEqual([
      ['111', ['fern', 'veal']],
      ['222', ['moss']],
    ]);
  });

  it('trims names and rejects blank names or malformed identities', () => {
    const registry = AliasRegistry.load(file);

    expect(registry.addAlias('  veal ', '111')).toBe('added');
    expect(registry.listAll()).toEqual({ veal: ['111'] });
    expect(() => registry.addAlias('   ', '111')).toThrow(RegistryError);
    expect(() => registry.addAlias('moss', 'abc')).toThrow(RegistryError);
  });

  it('survives a restart', () => {
    AliasRegistry.load(file).addAlias('veal', '111');
    expect(AliasRegistry.load(file).aliasesFor('111')).toEqual(['veal']);
  });

  it('reads numeric identities from older files and drops unusable entries', () => {
    fs.writeFileSync(file, JSON.stringify({ veal: [111, '222', 'x', 111], moss: ['bad'], '': ['333'] }), 'utf8');

    expect(AliasRegistry.load(file).listAll()).toEqual({ veal: ['111', '222'] });
  });

  it('keeps valid aliases when another entry has the wrong type', () => {
    const raw = JSON.stringify({ veal: ['111'], moss: '222', fern: { id: '333' }, oak: null });
    fs.writeFileSync(file, raw, 'utf8');

    const registry = AliasRegistry.load(file);

    expect(registry.listAll()).toEqual({ veal: ['111'], moss: ['222'] });
    expect(fs.readFileSync(file, 'utf8')).toBe(raw);
  });

  it('recovers from a corrupt file', () => {
    fs.writeFileSync(file, 'not json', 'utf8');
    const registry = AliasRegistry.load(file);

    expect(registry.listAll()).toEqual({});
    registry.addAlias('veal', '111');
    expect(AliasRegistry.load(file).listAll()).toEqual({ veal: ['111'] });
  });
});
