import pino from 'pino';
import fs from 'fs';
import path from 'path';
import pretty from 'pino-pretty';
import { Transform } from 'stream';
import { z } from 'zod';

const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';
const LOG_FILE = process.env.LOG_FILE;
const LOG_PRETTY = String(process.env.LOG_PRETTY ?? 'false') === 'true';
const NODE_ENV = process.env.NODE_ENV ?? 'production';

const LEVEL_LABELS: Record<number, string> = {
  10: 'TRACE',
  20: 'DEBUG',
  30: 'INFO',
  40: 'WARN',
  50: 'ERROR',
  60: 'FATAL',
};

const LogRecord = z.object({
  time: z.union([z.string(), z.number()]).optional(),
  level: z.number().optional(),
  msg: z.string().optional(),
  component: z.string().optional(),
});

/**
 * Render one pino JSON line as `[YYYY-MM-DD HH:MM:SS.mmm] LEVEL: msg`.
 * Lines that are not JSON pass through unchanged.
 */
export function formatFileLine(raw: string): string {
  try {
    const parsed = LogRecord.safeParse(JSON.parse(raw));
    if (!parsed.success) return raw;
    const record = parsed.data;
    const iso = new Date(record.time ?? Date.now()).toISOString();
    // 2025-08-19T15:44:16.472Z -> 2025-08-19 15:44:16.472
    const ts = iso.replace('T', ' ').replace('Z', '').slice(0, 23);
    const label = LEVEL_LABELS[record.level ?? 30] ?? 'INFO';
    const scope = record.component ? ` [${record.component}]` : '';
    return `[${ts}] ${label}${scope}: ${record.msg ?? ''}\n`;
  } catch {
    return raw;
  }
}

const consoleStream = LOG_PRETTY
  ? pretty({
      colorize: true,
      singleLine: true,
      translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
      ignore: 'pid,env,hostname',
    })
  : process.stdout;

function createFileStream(file: string): NodeJS.WritableStream | null {
  try {
    const dir = path.dirname(file);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const toText = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        callback(null, formatFileLine(chunk.toString()));
      },
    });
    toText.pipe(fs.createWriteStream(file, { flags: 'a' }));
    return toText;
  } catch (err) {
    process.stderr.write(`[logger] cannot open ${file}: ${String(err)}\n`);
    return null;
  }
}

const streams: pino.StreamEntry[] = [{ level: 'trace', stream: consoleStream }];
const fileStream = LOG_FILE ? createFileStream(LOG_FILE) : null;
if (fileStream) streams.push({ level: 'trace', stream: fileStream });

export const log = pino(
  {
    level: LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
      env: NODE_ENV,
    },
  },
  pino.multistream(streams)
);

export type Logger = pino.Logger;

export function childLogger(component: string): Logger {
  return log.child({ component });
}

export default log;
