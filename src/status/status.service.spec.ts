import { Test } from '@nestjs/testing';
import { AppLogger } from '../app.logger';
import { DOCUMENT_STORE } from '../record-source/document-store';
import { InMemoryDocumentStore } from '../../test/in-memory-document-store';
import { RecordSourceService } from '../record-source/record-source.service';
import { StatusService } from './status.service';

async function createService(store: InMemoryDocumentStore | null) {
  const moduleRef = await Test.createTestingModule({
    providers: [StatusService, RecordSourceService, AppLogger, { provide: DOCUMENT_STORE, useValue: store }],
  }).compile();
  moduleRef.get(AppLogger).setLogLevels([]);
  return moduleRef.get(StatusService);
}

const seeded = () =>
  new InMemoryDocumentStore({
    ghl_contacts: [{ _id: 'c1' }, { _id: 'c2' }, { _id: 'c3' }],
    ghl_opportunities: [{ _id: 'o1' }, { _id: 'o2' }],
    ghl_pipelines: [{ _id: 'p1' }],
  });

describe('StatusService', () => {
  it('returns the four counts', async () => {
    const service = await createService(seeded());
    await expect(service.getStats()).resolves.toEqual({ contacts: 3, opportunities: 2, pipelines: 1, users: 0 });
  });

  it('reports a failed count as 0 in the API and as a dash on the page', async () => {
    const service = await createService(seeded().failOn('ghl_opportunities'));

    await expect(service.getStats()).resolves.toEqual({ contacts: 3, opportunities: 0, pipelines: 1, users: 0 });

    const page = await service.getPage(30, new Date(2026, 2, 1, 9, 5, 0));
    expect(page.cards).toEqual([
      { label: 'Total Contacts', value: '3' },
      { label: 'Opportunities', value: '—' },
      { label: 'Pipelines', value: '1' },
      { label: 'Users', value: '0' },
    ]);
    expect(page.lastUpdate).toBe('2026-03-01 09:05:00');
  });

  it('shows dashes everywhere without a store', async () => {
    const service = await createService(null);
    const page = await service.getPage(30);
    expect(page.cards.map((c) => c.value)).toEqual(['—', '—', '—', '—']);
    await expect(service.getStats()).resolves.toEqual({ contacts: 0, opportunities: 0, pipelines: 0, users: 0 });
  });
});
