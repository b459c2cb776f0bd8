// MARK: - Error Taxonomy
// Typed failures shared by the ingestion path, the reset job and startup

export type JournalBotErrorCode =
  | 'DUPLICATE_MESSAGE'
  | 'STORE_UNAVAILABLE'
  | 'ACCESS_CALL_FAILED'
  | 'CHANNEL_NOT_RECORDED'
  | 'CONFIG_INVALID';

export class JournalBotError extends Error {
  readonly code: JournalBotErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: JournalBotErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/**
 * The platform message id was already ingested. Reported, never fatal.
 */
export class DuplicateMessageError extends JournalBotError {
  readonly messageId: string;

  constructor(messageId: string) {
    super('DUPLICATE_MESSAGE', `Message ${messageId} was already recorded`, { messageId });
    this.messageId = messageId;
  }
}

export class StoreUnavailableError extends JournalBotError {
  constructor(operation: string, cause?: unknown) {
    super('STORE_UNAVAILABLE', `Journal store unavailable during ${operation}`, {
      operation,
      cause: cause === undefined ? undefined : describeError(cause).message,
    });
  }
}

export type AccessAction = 'grant' | 'revoke';

export class AccessCallFailedError extends JournalBotError {
  readonly action: AccessAction;
  readonly attempts: number;

  constructor(action: AccessAction, attempts: number, cause?: unknown) {
    const reason = cause === undefined ? 'unknown error' : describeError(cause).message;
    super('ACCESS_CALL_FAILED', `Shared channel ${action} failed after ${attempts} attempt(s): ${reason}`, {
      action,
      attempts,
    });
    this.action = action;
    this.attempts = attempts;
  }
}

export class ConfigInvalidError extends JournalBotError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${problems.join('; ')}`, { problems });
    this.problems = problems;
  }
}

/**
 * Normalizes anything thrown into loggable fields
 */
export function describeError(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  return { message: String(error) };
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(describeError(error).message);
}
