import {
  StoreError,
  type CreateTableOutcome,
  type KeyValueStore,
  type StoreItem,
  type StoreValue,
  type WriteOutcome,
} from './store.js';

/**
 * In-process KeyValueStore. Each call checks and writes within one synchronous
 * step, which gives the same single-item atomicity the remote stores provide.
 */
export class MemoryStore implements KeyValueStore {
  private readonly tables = new Map<string, Map<string, StoreItem>>();

  private table(operation: 'scan' | 'insert' | 'update' | 'delete', name: string): Map<string, StoreItem> {
    const table = this.tables.get(name);
    if (!table) {
      throw new StoreError(operation, `table not found: ${name}`, { table: name });
    }
    return table;
  }

  async scan(table: string): Promise<StoreItem[]> {
    return [...this.table('scan', table).values()].map((item) => ({ ...item }));
  }

  async insert(table: string, item: StoreItem, _options: { condition: 'absent' }): Promise<WriteOutcome> {
    const rows = this.table('insert', table);
    if (rows.has(item.id)) return 'precondition-failed';
    rows.set(item.id, { ...item });
    return 'ok';
  }

  async update(
    table: string,
    id: string,
    changes: Record<string, StoreValue>,
    _options: { condition: 'present' }
  ): Promise<WriteOutcome> {
    const rows = this.table('update', table);
    const existing = rows.get(id);
    if (!existing) return 'precondition-failed';
    rows.set(id, { ...existing, ...changes, id });
    return 'ok';
  }

  async delete(table: string, id: string, options: { condition?: 'present' } = {}): Promise<WriteOutcome> {
    const removed = this.table('delete', table).delete(id);
    if (!removed && options.condition === 'present') return 'precondition-failed';
    return 'ok';
  }

  async listTables(): Promise<string[]> {
    return [...this.tables.keys()];
  }

  async createTable(table: string): Promise<CreateTableOutcome> {
    if (this.tables.has(table)) return 'exists';
    this.tables.set(table, new Map());
    return 'created';
  }

  async deleteTable(table: string): Promise<void> {
    if (!this.tables.delete(table)) {
      throw new StoreError('deleteTable', `table not found: ${table}`, { table });
    }
  }
}
