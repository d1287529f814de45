import { setTimeout as sleep } from 'node:timers/promises';
import type { TargetOptions } from '../config/options.js';
import { lockLog } from '../config/logger.js';
import type { KeyValueStore, WriteOutcome } from '../database/store.js';
import { LedgerError, storeFault } from './errors.js';

export type AcquireOptions = {
  /** Checked before every attempt and while waiting; an attempt already sent still completes. */
  signal?: AbortSignal;
};

/**
 * Returned by a successful acquisition. A handle releases at most once: a
 * second call does not touch the store, so it cannot delete a lock that
 * another runner took in the meantime.
 *
 * Nothing identifies the holder in the stored item, so a different handle
 * for the same key (e.g. one kept from an earlier run) can still delete the
 * current holder's lock.
 */
export class LockHandle {
  private released = false;

  constructor(
    private readonly store: KeyValueStore,
    readonly lockTableName: string,
    readonly lockId: string
  ) {}

  get isReleased(): boolean {
    return this.released;
  }

  async release(): Promise<void> {
    if (this.released) {
      lockLog.warn('Lock handle already released; not deleting the lock again', {
        table: this.lockTableName,
        lockId: this.lockId,
      });
      return;
    }

    try {
      await this.store.delete(this.lockTableName, this.lockId);
    } catch (err) {
      lockLog.error('Releasing migration lock failed', { table: this.lockTableName, lockId: this.lockId, error: err });
      throw storeFault('failed to release migration lock', err, { lockId: this.lockId });
    }
    this.released = true;
    lockLog.info('Migration lock released', { lockId: this.lockId });
  }
}

/**
 * Advisory lock on a single item: present means held, absent means free.
 * Acquisition polls a conditional insert until it succeeds; there is no
 * lease, so a holder that dies without releasing blocks everyone until an
 * operator deletes the item.
 */
export class MigrationLock {
  constructor(
    private readonly store: KeyValueStore,
    private readonly options: Pick<TargetOptions, 'lockTableName' | 'lockId' | 'pollIntervalMs'>
  ) {}

  private aborted(attempts: number, reason: unknown): LedgerError {
    return new LedgerError('LOCK_ACQUIRE_ABORTED', `lock acquisition aborted after ${attempts} attempt(s)`, {
      cause: reason,
      details: { lockId: this.options.lockId, attempts },
    });
  }

  /** Waits until the lock is free and takes it. Contention only delays; it never fails the call. */
  async acquire({ signal }: AcquireOptions = {}): Promise<LockHandle> {
    const { lockTableName, lockId, pollIntervalMs } = this.options;
    let attempts = 0;

    while (true) {
      if (signal?.aborted) {
        throw this.aborted(attempts, signal.reason);
      }

      attempts++;
      let outcome: WriteOutcome;
      try {
        outcome = await this.store.insert(lockTableName, { id: lockId }, { condition: 'absent' });
      } catch (err) {
        lockLog.error('Lock attempt failed', { table: lockTableName, lockId, attempts, error: err });
        throw storeFault('failed to lock before migrating', err, { lockId });
      }

      if (outcome === 'ok') {
        lockLog.info('Migration lock acquired', { lockId, attempts });
        return new LockHandle(this.store, lockTableName, lockId);
      }

      if (attempts === 1) {
        lockLog.info('Migration lock is held elsewhere, waiting', { lockId, pollIntervalMs });
      }

      try {
        await sleep(pollIntervalMs, undefined, { signal });
      } catch (err) {
        if (signal?.aborted) {
          throw this.aborted(attempts, signal.reason);
        }
        throw err;
      }
    }
  }

  /** Whether the lock item is present right now. Informational only; it may change immediately after. */
  async isHeld(): Promise<boolean> {
    try {
      const items = await this.store.scan(this.options.lockTableName);
      return items.some((item) => item.id === this.options.lockId);
    } catch (err) {
      lockLog.error('Reading migration lock failed', { table: this.options.lockTableName, error: err });
      throw storeFault('failed to read migration lock', err, { lockId: this.options.lockId });
    }
  }

  /**
   * Deletes the lock item whoever holds it. Meant for operators clearing the
   * lock of a runner that died without releasing.
   */
  async forceRelease(): Promise<void> {
    lockLog.warn('Force-releasing migration lock', { lockId: this.options.lockId });
    await new LockHandle(this.store, this.options.lockTableName, this.options.lockId).release();
  }

  /** Runs `fn` while holding the lock and releases it afterwards, whatever `fn` did. */
  async withLock<T>(fn: () => Promise<T>, options: AcquireOptions = {}): Promise<T> {
    const handle = await this.acquire(options);
    let result: T;
    try {
      result = await fn();
    } catch (err) {
      try {
        await handle.release();
      } catch (releaseErr) {
        lockLog.error('Releasing the lock after a failed run also failed', { lockId: handle.lockId, error: releaseErr });
      }
      throw err;
    }
    await handle.release();
    return result;
  }
}
