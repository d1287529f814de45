/**
 * Key-value table abstraction the ledger and the lock are written against.
 *
 * Every item has a string primary key `id`. The only atomic primitive relied
 * on is a single-item write guarded by an existence precondition on that key.
 */

export type StoreValue = string | number | boolean | null;

export type StoreItem = { id: string } & Record<string, StoreValue>;

/** `absent`: the key must not exist yet. `present`: the key must already exist. */
export type KeyCondition = 'absent' | 'present';

export type WriteOutcome = 'ok' | 'precondition-failed';

export type CreateTableOutcome = 'created' | 'exists';

export type StoreOperation =
  | 'scan'
  | 'insert'
  | 'update'
  | 'delete'
  | 'listTables'
  | 'createTable'
  | 'deleteTable';

export interface KeyValueStore {
  /** Every item of the table, in no guaranteed order. */
  scan(table: string): Promise<StoreItem[]>;
  insert(table: string, item: StoreItem, options: { condition: 'absent' }): Promise<WriteOutcome>;
  /** Sets the given attributes; the key itself cannot be changed. */
  update(
    table: string,
    id: string,
    changes: Record<string, StoreValue>,
    options: { condition: 'present' }
  ): Promise<WriteOutcome>;
  /** Unconditional when no condition is given; deleting a missing key is then still `ok`. */
  delete(table: string, id: string, options?: { condition?: 'present' }): Promise<WriteOutcome>;
  listTables(): Promise<string[]>;
  createTable(table: string): Promise<CreateTableOutcome>;
  deleteTable(table: string): Promise<void>;
}

/** A backend failure other than a failed precondition. */
export class StoreError extends Error {
  public readonly operation: StoreOperation;
  public readonly table?: string;

  constructor(operation: StoreOperation, message: string, options: { table?: string; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'StoreError';
    this.operation = operation;
    this.table = options.table;
  }
}
