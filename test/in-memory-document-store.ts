import { DocumentStore, StoredDocument } from '../src/record-source/document-store';

/**
 * DocumentStore held in memory. Collections listed in `failing` reject every
 * read, which stands in for a broken query.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private readonly failing = new Set<string>();

  constructor(
    private readonly collections: Record<string, StoredDocument[]> = {},
    private connected = true,
  ) {}

  failOn(collection: string): this {
    this.failing.add(collection);
    return this;
  }

  disconnect(): this {
    this.connected = false;
    return this;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async findAll(collection: string): Promise<StoredDocument[]> {
    if (this.failing.has(collection)) throw new Error(`query on ${collection} failed`);
    return [...(this.collections[collection] ?? [])];
  }

  async count(collection: string): Promise<number> {
    if (this.failing.has(collection)) throw new Error(`count on ${collection} failed`);
    return (this.collections[collection] ?? []).length;
  }

  async close(): Promise<void> {
    this.connected = false;
  }
}
