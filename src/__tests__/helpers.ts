import fs from 'fs';
import os from 'os';
import path from 'path';
import { SheetResult, SheetSource } from '../api/sheet-client';
import { RecipientGateway } from '../core/deadline-reconciler';
import { TaskRow } from '../core/types';

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'chart-bot-'));
}

export function buildRow(overrides: Record<string, string | undefined> = {}): TaskRow {
  return {
    曲名: 'Starfall',
    作曲者: 'Composer A',
    ステータス: '作業中',
    本収録日: '2026/03/22',
    Sp: '',
    Sm: '',
    Am: '',
    Wt: '',
    ...overrides,
  };
}

export class StubSheet implements SheetSource {
  public calls = 0;
  constructor(private result: SheetResult) {}

  static rows(rows: TaskRow[]): StubSheet {
    return new StubSheet({ ok: true, rows });
  }

  static failing(error = 'request failed: ECONNREFUSED'): StubSheet {
    return new StubSheet({ ok: false, error });
  }

  async fetchRows(): Promise<SheetResult> {
    this.calls++;
    return this.result;
  }
}

export class FakeGateway implements RecipientGateway {
  public sent: Array<{ identity: string; content: string }> = [];
  public members: Set<string>;
  public blocked = new Set<string>();

  constructor(members: string[] = []) {
    this.members = new Set(members);
  }

  async isPoolMember(identity: string): Promise<boolean> {
    return this.members.has(identity);
  }

  async sendDirect(identity: string, content: string): Promise<void> {
    if (this.blocked.has(identity)) {
      throw new Error('Cannot send messages to this user');
    }
    this.sent.push({ identity, content });
  }
}
