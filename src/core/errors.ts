/**
 * Error classes shared across the bot. Each carries a stable code so log
 * lines can be grouped without parsing messages.
 */

export type ErrorCode =
  | 'CONFIG_MISSING'
  | 'CONFIG_INVALID'
  | 'STATE_FILE_WRITE'
  | 'REGISTRY_INVALID_NAME'
  | 'REGISTRY_INVALID_IDENTITY';

export class BotError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, context?: Record<string, unknown>) {
    super(message);
    this.name = 'BotError';
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

export class ConfigError extends BotError {
  constructor(message: string, code: 'CONFIG_MISSING' | 'CONFIG_INVALID' = 'CONFIG_MISSING', context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'ConfigError';
  }
}

export class StateFileError extends BotError {
  public readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, 'STATE_FILE_WRITE', { filePath, cause: cause instanceof Error ? cause.message : String(cause) });
    this.name = 'StateFileError';
    this.filePath = filePath;
  }
}

export class RegistryError extends BotError {
  constructor(message: string, code: 'REGISTRY_INVALID_NAME' | 'REGISTRY_INVALID_IDENTITY', context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'RegistryError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
