import { Connection, ConnectionStates } from 'mongoose';
import { DocumentStore, StoredDocument } from './document-store';

/**
 * DocumentStore over a mongoose connection. Documents are read through the
 * native collection API since the dashboard collections are schemaless.
 */
export class MongoDocumentStore implements DocumentStore {
  constructor(private readonly connection: Connection) {}

  isConnected(): boolean {
    return this.connection.readyState === ConnectionStates.connected;
  }

  async findAll(collection: string): Promise<StoredDocument[]> {
    return this.connection.collection(collection).find({}).toArray();
  }

  async count(collection: string): Promise<number> {
    return this.connection.collection(collection).countDocuments({});
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}
