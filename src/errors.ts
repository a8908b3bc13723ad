// ── Error codes ─────────────────────────────────────────────────

export type ErrorCode =
  | 'OPERATION_FAILED'
  | 'INVALID_PARAMETER'
  | 'NO_SUCH_TARGET'
  | 'LOOKUP_TIMED_OUT'
  | 'PARSE_ERROR'
  | 'TOPIC_UNAVAILABLE'
  | 'NOT_IMPLEMENTED'
  | 'PLUGIN_LOAD_FAILED'
  | 'CONFIG_UNREADABLE';

/** Base class for every failure the bot core reports by code. */
export class BotError extends Error {
  constructor(readonly code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The remote side denied or rejected a protocol action (no op, channel protection, ...). */
export class OperationFailedError extends BotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('OPERATION_FAILED', message, options);
  }
}

/** A mode parameter the remote side or the op provider could not make sense of. */
export class InvalidParameterError extends BotError {
  constructor(message: string) {
    super('INVALID_PARAMETER', message);
  }
}

export class NoSuchTargetError extends BotError {
  constructor(readonly nick: string) {
    super('NO_SUCH_TARGET', `No such nick: ${nick}`);
  }
}

export class LookupTimedOutError extends BotError {
  constructor(readonly nick: string) {
    super('LOOKUP_TIMED_OUT', `Lookup of ${nick} timed out`);
  }
}

export class ParseError extends BotError {
  constructor(message: string) {
    super('PARSE_ERROR', message);
  }
}

export class TopicIndexError extends ParseError {
  constructor(readonly partCount: number) {
    super(`There are only ${partCount} topic parts. Remember indexes start at 0`);
  }
}

export class TopicUnavailableError extends BotError {
  constructor(readonly channel: string, message = `Could not determine current topic of ${channel}`) {
    super('TOPIC_UNAVAILABLE', message);
  }
}

export class NotImplementedError extends BotError {
  constructor(message: string) {
    super('NOT_IMPLEMENTED', message);
  }
}

export class PluginLoadError extends BotError {
  constructor(readonly pluginName: string, message: string, options?: { cause?: unknown }) {
    super('PLUGIN_LOAD_FAILED', message, options);
  }
}

export class ConfigurationUnreadableError extends BotError {
  constructor(readonly file: string, options?: { cause?: unknown }) {
    super('CONFIG_UNREADABLE', `Configuration file ${file} exists but could not be parsed`, options);
  }
}

/** Narrow an unknown caught value to a BotError, optionally of a given code. */
export function isBotError(err: unknown, code?: ErrorCode): err is BotError {
  return err instanceof BotError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
