import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { AppLogger } from '../app.logger';
import { SourceRecord } from '../analytics/table';
import { FetchError, Result, err, mapResult, ok, tryAsync, unwrapOr } from '../common/result';
import { DOCUMENT_STORE, DocumentStore } from './document-store';
import { normalizeDocument } from './normalize';

@Injectable()
export class RecordSourceService implements OnModuleDestroy {
  constructor(
    @Inject(DOCUMENT_STORE) private readonly store: DocumentStore | null,
    private readonly logger: AppLogger,
  ) {}

  async onModuleDestroy() {
    if (this.store) await this.store.close();
  }

  async fetchResult(collection: string): Promise<Result<SourceRecord[]>> {
    const store = this.available(collection);
    if (!store.ok) return store;
    const db = store.value;

    const result = mapResult(
      await tryAsync(collection, () => db.findAll(collection)),
      (docs) => docs.map(normalizeDocument),
    );
    if (result.ok) {
      this.logger.debug(`Loaded ${result.value.length} records from ${collection}`, 'RecordSource');
    } else {
      this.report(result.error);
    }
    return result;
  }

  async countResult(collection: string): Promise<Result<number>> {
    const store = this.available(collection);
    if (!store.ok) return store;
    const db = store.value;

    const result = await tryAsync(collection, () => db.count(collection));
    if (!result.ok) this.report(result.error);
    return result;
  }

  /** Every record currently in `collection`, or none when the store fails. */
  async fetch(collection: string): Promise<SourceRecord[]> {
    return unwrapOr(await this.fetchResult(collection), []);
  }

  /** Document count for `collection`, 0 when the store fails. */
  async count(collection: string): Promise<number> {
    return unwrapOr(await this.countResult(collection), 0);
  }

  private available(collection: string): Result<DocumentStore> {
    if (!this.store) {
      return err(new FetchError('source-unavailable', 'document store is not configured', collection));
    }
    if (!this.store.isConnected()) {
      return err(new FetchError('source-unavailable', 'document store is not connected', collection));
    }
    return ok(this.store);
  }

  private report(error: FetchError) {
    this.logger.warn(`Error fetching ${error.collection ?? 'collection'}: ${error.message}`, 'RecordSource');
  }
}
