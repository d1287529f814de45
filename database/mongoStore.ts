import mongoose from 'mongoose';
import {
  StoreError,
  type CreateTableOutcome,
  type KeyValueStore,
  type StoreItem,
  type StoreOperation,
  type StoreValue,
  type WriteOutcome,
} from './store.js';

// Server error codes, see https://www.mongodb.com/docs/manual/reference/error-codes/
const DUPLICATE_KEY = 11000;
const NAMESPACE_EXISTS = 48;

function mongoServerErrorCode(err: unknown): number | string | undefined {
  return err instanceof mongoose.mongo.MongoServerError ? err.code : undefined;
}

export function isDuplicateKeyError(err: unknown): boolean {
  return mongoServerErrorCode(err) === DUPLICATE_KEY;
}

export function isNamespaceExistsError(err: unknown): boolean {
  return mongoServerErrorCode(err) === NAMESPACE_EXISTS;
}

type MongoDocument = mongoose.mongo.Document;

/** The part of a driver `Collection` the store calls. */
export interface MongoCollectionLike {
  find(filter: MongoDocument): { toArray(): Promise<MongoDocument[]> };
  insertOne(doc: MongoDocument): Promise<unknown>;
  updateOne(filter: MongoDocument, update: MongoDocument): Promise<{ matchedCount: number }>;
  deleteOne(filter: MongoDocument): Promise<{ deletedCount: number }>;
}

/** The part of a driver `Db` the store calls; `mongoose.connection.db` satisfies it. */
export interface MongoDbLike {
  collection(name: string): MongoCollectionLike;
  listCollections(filter: MongoDocument, options: { nameOnly: true }): { toArray(): Promise<Array<{ name: string }>> };
  createCollection(name: string): Promise<unknown>;
  dropCollection(name: string): Promise<unknown>;
}

/** Anything exposing the driver handle the way `mongoose.connection` does. */
export type MongoConnectionLike = { readonly db?: MongoDbLike };

/**
 * KeyValueStore over MongoDB collections. The item key lives in `_id`, so the
 * unique `_id` index turns `insertOne` into the "key absent" conditional write
 * and filtered `updateOne` / `deleteOne` into the "key present" ones.
 */
export class MongoStore implements KeyValueStore {
  constructor(private readonly connection: MongoConnectionLike = mongoose.connection) {}

  private db(operation: StoreOperation, table?: string): MongoDbLike {
    const db = this.connection.db;
    if (!db) {
      throw new StoreError(operation, 'MongoDB connection is not ready (missing connection.db)', { table });
    }
    return db;
  }

  async scan(table: string): Promise<StoreItem[]> {
    const db = this.db('scan', table);
    try {
      const docs = await db.collection(table).find({}).toArray();
      return docs.map((doc) => {
        const { _id, ...attributes } = doc;
        return { ...attributes, id: String(_id) };
      });
    } catch (err) {
      throw new StoreError('scan', `scan of ${table} failed`, { table, cause: err });
    }
  }

  async insert(table: string, item: StoreItem, _options: { condition: 'absent' }): Promise<WriteOutcome> {
    const db = this.db('insert', table);
    const { id, ...attributes } = item;
    try {
      await db.collection(table).insertOne({ ...attributes, _id: id });
      return 'ok';
    } catch (err) {
      if (isDuplicateKeyError(err)) return 'precondition-failed';
      throw new StoreError('insert', `insert into ${table} failed`, { table, cause: err });
    }
  }

  async update(
    table: string,
    id: string,
    changes: Record<string, StoreValue>,
    _options: { condition: 'present' }
  ): Promise<WriteOutcome> {
    const db = this.db('update', table);
    const $set: Record<string, StoreValue> = {};
    for (const [key, value] of Object.entries(changes)) {
      if (key === 'id' || key === '_id') continue;
      $set[key] = value;
    }
    try {
      const result = await db.collection(table).updateOne({ _id: id }, { $set });
      return result.matchedCount === 0 ? 'precondition-failed' : 'ok';
    } catch (err) {
      throw new StoreError('update', `update of ${table} failed`, { table, cause: err });
    }
  }

  async delete(table: string, id: string, options: { condition?: 'present' } = {}): Promise<WriteOutcome> {
    const db = this.db('delete', table);
    try {
      const result = await db.collection(table).deleteOne({ _id: id });
      if (result.deletedCount === 0 && options.condition === 'present') return 'precondition-failed';
      return 'ok';
    } catch (err) {
      throw new StoreError('delete', `delete from ${table} failed`, { table, cause: err });
    }
  }

  async listTables(): Promise<string[]> {
    const db = this.db('listTables');
    try {
      const collections = await db.listCollections({}, { nameOnly: true }).toArray();
      return collections.map((c) => c.name);
    } catch (err) {
      throw new StoreError('listTables', 'listing collections failed', { cause: err });
    }
  }

  async createTable(table: string): Promise<CreateTableOutcome> {
    const db = this.db('createTable', table);
    try {
      await db.createCollection(table);
      return 'created';
    } catch (err) {
      if (isNamespaceExistsError(err)) return 'exists';
      throw new StoreError('createTable', `creating collection ${table} failed`, { table, cause: err });
    }
  }

  async deleteTable(table: string): Promise<void> {
    const db = this.db('deleteTable', table);
    try {
      await db.dropCollection(table);
    } catch (err) {
      throw new StoreError('deleteTable', `dropping collection ${table} failed`, { table, cause: err });
    }
  }
}
