import type { Database } from 'firebase-admin/database';
import { database } from '../firebase/admin';
import { StoreWriteFailureError } from '../utils/errors';
import { pruneUndefinedDeep } from '../utils/prune';
import type { OverwriteStore } from './types';

export class RealtimeOverwriteStore implements OverwriteStore {
  private readonly db: () => Database;

  constructor(db?: Database) {
    this.db = db ? () => db : database;
  }

  async put(path: string, document: unknown): Promise<void> {
    try {
      await this.db().ref(path).set(pruneUndefinedDeep(document));
    } catch (error) {
      throw new StoreWriteFailureError(`Realtime Database rejected write to ${path}`, { path }, { cause: error });
    }
  }

  async readValue(path: string): Promise<unknown> {
    try {
      const snapshot = await this.db().ref(path).get();
      const value: unknown = snapshot.val();
      return value;
    } catch (error) {
      throw new StoreWriteFailureError(`Realtime Database read of ${path} failed`, { path }, { cause: error });
    }
  }
}
