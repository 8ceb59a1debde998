export type StoredDocument = Record<string, unknown>;

/** Minimal read access to the document database, one collection at a time. */
export interface DocumentStore {
  isConnected(): boolean;
  findAll(collection: string): Promise<StoredDocument[]>;
  count(collection: string): Promise<number>;
  close(): Promise<void>;
}

export const DOCUMENT_STORE = Symbol('DOCUMENT_STORE');
