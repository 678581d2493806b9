import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { StateFileError, errorMessage } from '../core/errors';
import { Logger, childLogger } from '../utils/logger';

const defaultLogger = childLogger('state-file');

export type StateSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Write `data` as pretty JSON next to `filePath` and rename it into place, so
 * readers see either the previous file or the complete new one.
 */
export function writeJsonFileAtomic(filePath: string, data: unknown): void {
  const tempPath = `${filePath}.tmp`;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(tempPath, JSON.stringify(data, null, 2), 'utf8');
    fs.renameSync(tempPath, filePath);
  } catch (err) {
    try {
      if (fs.existsSync(tempPath)) fs.unlinkSync(tempPath);
    } catch (cleanupErr) {
      defaultLogger.warn({ err: cleanupErr, tempPath }, 'could not remove temp file');
    }
    throw new StateFileError(`Failed to write ${filePath}: ${errorMessage(err)}`, filePath, err);
  }
}

function recover<T>(filePath: string, fallback: T, reason: string, logger: Logger): T {
  logger.warn({ filePath, reason }, 'state file unusable; resetting to default');
  try {
    writeJsonFileAtomic(filePath, fallback);
  } catch (err) {
    logger.error({ err, filePath }, 'could not rewrite state file with default');
  }
  return fallback;
}

/**
 * Load a JSON state file. A missing, empty, unparsable or schema-violating
 * file yields `fallback`, which is also written back to disk. Never throws
 * for bad content.
 */
export function readJsonFile<T>(filePath: string, fallback: T, schema: StateSchema<T>, logger: Logger = defaultLogger): T {
  if (!fs.existsSync(filePath)) {
    logger.info({ filePath }, 'state file not found; creating with default');
    return recover(filePath, fallback, 'missing', logger);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8').trim();
  } catch (err) {
    logger.error({ err, filePath }, 'could not read state file; using default');
    return fallback;
  }
  if (!content) return recover(filePath, fallback, 'empty', logger);

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return recover(filePath, fallback, `invalid JSON: ${errorMessage(err)}`, logger);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return recover(filePath, fallback, `unexpected shape: ${result.error.issues[0]?.message ?? 'unknown'}`, logger);
  }
  return result.data;
}
