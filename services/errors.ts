export type LedgerErrorCode =
  | 'NO_CURRENT_MIGRATION'
  | 'DIRTY_STATE'
  | 'MIGRATION_ALREADY_EXISTS'
  | 'MIGRATION_NOT_FOUND'
  | 'LOCK_ACQUIRE_ABORTED'
  | 'STORE_FAULT';

const DEFAULT_MESSAGES: Record<LedgerErrorCode, string> = {
  NO_CURRENT_MIGRATION: 'no current migration',
  DIRTY_STATE: 'dirty migration found',
  MIGRATION_ALREADY_EXISTS: 'migration already exists',
  MIGRATION_NOT_FOUND: 'migration not found',
  LOCK_ACQUIRE_ABORTED: 'lock acquisition aborted',
  STORE_FAULT: 'store fault',
};

export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details?: Record<string, unknown>;
  /** False only for store faults: every other code is an expected ledger state. */
  public readonly isOperational: boolean;

  constructor(
    code: LedgerErrorCode,
    message: string = DEFAULT_MESSAGES[code],
    options: { cause?: unknown; details?: Record<string, unknown> } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'LedgerError';
    this.code = code;
    this.details = options.details;
    this.isOperational = code !== 'STORE_FAULT';
  }
}

export function isLedgerError(err: unknown, code?: LedgerErrorCode): err is LedgerError {
  if (!(err instanceof LedgerError)) return false;
  return code === undefined || err.code === code;
}

export function noCurrentMigration(): LedgerError {
  return new LedgerError('NO_CURRENT_MIGRATION');
}

export function dirtyState(dirtyIds: string[]): LedgerError {
  return new LedgerError('DIRTY_STATE', `dirty migration found: ${dirtyIds.join(', ')}`, {
    details: { dirtyIds },
  });
}

export function migrationAlreadyExists(id: string): LedgerError {
  return new LedgerError('MIGRATION_ALREADY_EXISTS', `migration already exists: ${id}`, { details: { id } });
}

export function migrationNotFound(id: string): LedgerError {
  return new LedgerError('MIGRATION_NOT_FOUND', `migration not found: ${id}`, { details: { id } });
}

/** Wraps a store failure, prefixing the operation that hit it (e.g. "failed to add migration"). */
export function storeFault(context: string, cause: unknown, details?: Record<string, unknown>): LedgerError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new LedgerError('STORE_FAULT', `${context}: ${reason}`, { cause, details });
}
