import type { Firestore } from 'firebase-admin/firestore';
import { firestore } from '../firebase/admin';
import { StoreWriteFailureError } from '../utils/errors';
import { pruneUndefinedDeep } from '../utils/prune';
import type { DocumentStore } from './types';

export class FirestoreDocumentStore implements DocumentStore {
  private readonly db: () => Firestore;

  constructor(db?: Firestore) {
    this.db = db ? () => db : firestore;
  }

  async setDocument(collectionPath: string, documentId: string, document: Record<string, unknown>): Promise<void> {
    const docRef = this.db().collection(collectionPath).doc(documentId);
    const data = pruneUndefinedDeep(document);
    try {
      await docRef.set(isPlainRecord(data) ? data : {});
    } catch (error) {
      throw new StoreWriteFailureError(`Firestore rejected write to ${collectionPath}/${documentId}`, {
        collectionPath,
        documentId,
      }, { cause: error });
    }
  }

  async getDocument(collectionPath: string, documentId: string): Promise<Record<string, unknown> | null> {
    try {
      const snapshot = await this.db().collection(collectionPath).doc(documentId).get();
      return snapshot.exists ? snapshot.data() ?? null : null;
    } catch (error) {
      throw new StoreWriteFailureError(`Firestore read of ${collectionPath}/${documentId} failed`, {
        collectionPath,
        documentId,
      }, { cause: error });
    }
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
