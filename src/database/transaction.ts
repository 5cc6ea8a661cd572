import { Database } from 'sqlite';
import { KeyedMutex } from '../utils/KeyedMutex';

// One sqlite connection carries one transaction at a time
const connectionLocks = new WeakMap<Database, KeyedMutex>();

function lockFor(db: Database): KeyedMutex {
  let lock = connectionLocks.get(db);
  if (!lock) {
    lock = new KeyedMutex();
    connectionLocks.set(db, lock);
  }
  return lock;
}

/**
 * Run `work` inside BEGIN IMMEDIATE / COMMIT, rolling back on any error.
 * Calls on the same connection are serialized.
 */
export async function withTransaction<T>(db: Database, work: () => Promise<T>): Promise<T> {
  return lockFor(db).runExclusive('tx', async () => {
    await db.exec('BEGIN IMMEDIATE TRANSACTION;');
    try {
      const result = await work();
      await db.exec('COMMIT;');
      return result;
    } catch (error) {
      await db.exec('ROLLBACK;');
      throw error;
    }
  });
}
