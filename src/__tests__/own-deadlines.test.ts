import { checkOwnDeadlines } from '../core/own-deadlines';
import { StubSheet, buildRow } from './helpers';

const registry = (aliases: Record<string, string[]>) => ({
  aliasesFor: (identity: string) => aliases[identity] ?? [],
});

describe('checkOwnDeadlines', () => {
  it('reports no aliases without touching the sheet', async () => {
    const sheet = StubSheet.rows([buildRow({ Sp: 'veal' })]);

    expect(await checkOwnDeadlines('111', registry({}), sheet)).toEqual({ kind: 'no-aliases' });
    expect(sheet.calls).toBe(0);
  });

  it('passes fetch failures through', async () => {
    const result = await checkOwnDeadlines('111', registry({ '111': ['veal'] }), StubSheet.failing('HTTP 503'));
    expect(result).toEqual({ kind: 'fetch-failed', error: 'HTTP 503' });
  });

  it('reports none when nothing in progress matches', async () => {
    const sheet = StubSheet.rows([
      buildRow({ Sp: 'veal', ステータス: '完了' }),
      buildRow({ Sp: 'moss' }),
      buildRow({ Sp: 'veal', 本収録日: 'TBD' }),
    ]);

    expect(await checkOwnDeadlines('111', registry({ '111': ['veal'] }), sheet)).toEqual({
      kind: 'none',
      aliases: ['veal'],
    });
  });

  it('lists every in-progress assignment regardless of lead time', async () => {
    const sheet = StubSheet.rows([
      buildRow({ 曲名: 'Starfall', Sp: 'veal', Wt: 'fern' }),
      buildRow({ 曲名: 'Far Away', ステータス: '優先作業', 本収録日: '2027/01/05', Am: 'veal' }),
      buildRow({ 曲名: 'Other', Sm: 'moss' }),
    ]);

    const result = await checkOwnDeadlines('111', registry({ '111': ['veal', 'fern'] }), sheet);

    expect(result.kind).toBe('found');
    if (result.kind !== 'found') return;
    expect(result.assignments.map((a) => [a.title, a.slots, a.dateString])).toEqual([
      ['Starfall', ['Sp', 'Wt'], '2026/03/22'],
      ['Far Away', ['Am'], '2027/01/05'],
    ]);
    expect(result.assignments[1]?.target.toISOString()).toBe('2027-01-05T00:00:00.000Z');
  });
});
