import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createConnection } from 'mongoose';
import { AppLogger } from '../app.logger';
import { DOCUMENT_STORE, DocumentStore } from './document-store';
import { MongoDocumentStore } from './mongo-document-store';

/**
 * Opens the MongoDB connection in the background. Without MONGO_URI, or when
 * the URI is rejected, the store is null and every read degrades to empty.
 */
export const documentStoreProvider: Provider = {
  provide: DOCUMENT_STORE,
  useFactory: (configService: ConfigService, logger: AppLogger): DocumentStore | null => {
    const uri = configService.get<string>('MONGO_URI');
    if (!uri) {
      logger.warn('MONGO_URI is not set, dashboards will show empty data', 'RecordSource');
      return null;
    }

    try {
      const connection = createConnection(uri, {
        dbName: configService.get<string>('MONGO_DB_NAME'),
        bufferCommands: false,
        serverSelectionTimeoutMS: Number(configService.get('MONGO_SERVER_SELECTION_TIMEOUT_MS', 5000)),
      });
      void connection.asPromise().then(
        () => logger.log(`Connected to document store ${connection.name}`, 'RecordSource'),
        (error: unknown) =>
          logger.error(
            `Document store connection failed: ${error instanceof Error ? error.message : String(error)}`,
            undefined,
            'RecordSource',
          ),
      );
      return new MongoDocumentStore(connection);
    } catch (error) {
      logger.error(
        `Document store init error: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        'RecordSource',
      );
      return null;
    }
  },
  inject: [ConfigService, AppLogger],
};
