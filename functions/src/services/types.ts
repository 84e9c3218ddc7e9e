/** Path-addressed store whose writes replace the value at `path` wholesale. */
export interface OverwriteStore {
  put(path: string, document: unknown): Promise<void>;
  readValue(path: string): Promise<unknown>;
}

/** Collection/document store whose writes upsert a whole document by id. */
export interface DocumentStore {
  setDocument(collectionPath: string, documentId: string, document: Record<string, unknown>): Promise<void>;
  getDocument(collectionPath: string, documentId: string): Promise<Record<string, unknown> | null>;
}

export interface PushMessage {
  topic: string;
  title: string;
  body: string;
  data: { link: string };
}

export interface NotificationSender {
  /** Resolves with the provider's message id once the push is accepted. */
  send(message: PushMessage): Promise<string>;
}
