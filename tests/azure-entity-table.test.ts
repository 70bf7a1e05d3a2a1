import type { TransactionAction } from '@azure/data-tables';
import { AzureEntityTable, buildFilter, type TableClientLike } from '../src/server/lib/azure-entity-table';
import { BatchLimitError, type TableEntity } from '../src/server/lib/entity-table';

type ListOptions = { queryOptions: { filter?: string; select?: string[] } };

function statusError(statusCode: number) {
  return Object.assign(new Error(`status ${statusCode}`), { statusCode });
}

class FakeTableClient implements TableClientLike {
  transactions: TransactionAction[][] = [];
  listCalls: ListOptions[] = [];
  stored: object[] = [];
  failWith: number | null = null;

  async createTable(): Promise<void> {
    if (this.failWith) throw statusError(this.failWith);
  }

  async getEntity(partitionKey: string, rowKey: string): Promise<object> {
    const found = this.stored.find((e) => 'partitionKey' in e && e.partitionKey === partitionKey && 'rowKey' in e && e.rowKey === rowKey);
    if (!found) throw statusError(404);
    return found;
  }

  async upsertEntity(): Promise<void> {}

  async submitTransaction(actions: TransactionAction[]): Promise<void> {
    if (this.failWith) throw statusError(this.failWith);
    this.transactions.push(actions);
  }

  async deleteEntity(): Promise<void> {
    if (this.failWith) throw statusError(this.failWith);
  }

  async *listEntities(options: ListOptions): AsyncGenerator<object> {
    this.listCalls.push(options);
    yield* this.stored;
  }
}

function entity(rowKey: string, properties: TableEntity['properties'] = {}): TableEntity {
  return { partitionKey: 'proj|main', rowKey, properties };
}

async function collect(iter: AsyncIterable<TableEntity>): Promise<TableEntity[]> {
  const out: TableEntity[] = [];
  for await (const e of iter) out.push(e);
  return out;
}

describe('buildFilter', () => {
  it('escapes every value through the odata helper', () => {
    expect(
      buildFilter({
        partitionKey: "o'brien|main",
        equals: { ProjectKey: "o'brien", Branch: 'main' },
        range: { property: 'ObservedAt', gte: '2024-01-01T00:00:00.000Z', lte: '2024-02-01T00:00:00.000Z' },
      }),
    ).toBe(
      "PartitionKey eq 'o''brien|main' and ProjectKey eq 'o''brien' and Branch eq 'main' and " +
        "ObservedAt ge '2024-01-01T00:00:00.000Z' and ObservedAt le '2024-02-01T00:00:00.000Z'",
    );
  });

  it('keeps a value containing filter syntax inside its quotes', () => {
    expect(
      buildFilter({ partitionKey: 'p|main', equals: { ProjectKey: 'p', Branch: "main or ProjectKey ne ''" } }),
    ).toBe("PartitionKey eq 'p|main' and ProjectKey eq 'p' and Branch eq 'main or ProjectKey ne '''''");
  });

  it('filters on the partition alone when nothing else is given', () => {
    expect(buildFilter({ partitionKey: 'METADATA_PROJECTS' })).toBe("PartitionKey eq 'METADATA_PROJECTS'");
  });

  it('refuses property names that could alter the expression', () => {
    expect(() => buildFilter({ partitionKey: 'p', equals: { 'Value or true': 'x' } })).toThrow(
      'Invalid property name in filter: Value or true',
    );
  });
});

describe('AzureEntityTable', () => {
  it('treats an existing table as created', async () => {
    const client = new FakeTableClient();
    client.failWith = 409;
    await expect(new AzureEntityTable(client).ensureTable()).resolves.toBeUndefined();
  });

  it('propagates other table creation failures', async () => {
    const client = new FakeTableClient();
    client.failWith = 403;
    await expect(new AzureEntityTable(client).ensureTable()).rejects.toThrow('status 403');
  });

  it('strips service fields from point reads and maps 404 to null', async () => {
    const client = new FakeTableClient();
    client.stored.push({
      partitionKey: 'proj|main',
      rowKey: 'r1',
      etag: 'W/"1"',
      timestamp: '2024-03-01T00:00:00Z',
      'odata.etag': 'W/"1"',
      ProjectKey: 'proj',
      Value: 3,
    });
    const table = new AzureEntityTable(client);

    expect(await table.getEntity('proj|main', 'r1')).toEqual(entity('r1', { ProjectKey: 'proj', Value: 3 }));
    expect(await table.getEntity('proj|main', 'missing')).toBeNull();
  });

  it('submits a batch as one transaction of replace upserts', async () => {
    const client = new FakeTableClient();
    await new AzureEntityTable(client).submitBatch('proj|main', [entity('r1', { Value: 1 }), entity('r2', { Value: 2 })]);

    expect(client.transactions).toEqual([
      [
        ['upsert', { partitionKey: 'proj|main', rowKey: 'r1', Value: 1 }, 'Replace'],
        ['upsert', { partitionKey: 'proj|main', rowKey: 'r2', Value: 2 }, 'Replace'],
      ],
    ]);
  });

  it('refuses batches over the entity limit before calling the service', async () => {
    const client = new FakeTableClient();
    const entities = Array.from({ length: 101 }, (_, i) => entity(`r${i}`));
    await expect(new AzureEntityTable(client).submitBatch('proj|main', entities)).rejects.toBeInstanceOf(BatchLimitError);
    expect(client.transactions).toEqual([]);
  });

  it('refuses batches that span partitions', async () => {
    const client = new FakeTableClient();
    await expect(
      new AzureEntityTable(client).submitBatch('proj|main', [{ partitionKey: 'other|main', rowKey: 'r1', properties: {} }]),
    ).rejects.toThrow('Batch for partition proj|main contains an entity of other|main');
  });

  it('maps a 413 from the service to BatchLimitError', async () => {
    const client = new FakeTableClient();
    client.failWith = 413;
    await expect(new AzureEntityTable(client).submitBatch('proj|main', [entity('r1')])).rejects.toBeInstanceOf(
      BatchLimitError,
    );
  });

  it('passes filter and projection to the service', async () => {
    const client = new FakeTableClient();
    client.stored.push({ partitionKey: 'proj|main', rowKey: 'r1', ProjectKey: 'proj', etag: 'x' });

    const rows = await collect(
      new AzureEntityTable(client).queryEntities({
        partitionKey: 'proj|main',
        equals: { ProjectKey: 'proj' },
        select: ['ProjectKey'],
      }),
    );

    expect(client.listCalls).toEqual([
      { queryOptions: { filter: "PartitionKey eq 'proj|main' and ProjectKey eq 'proj'", select: ['ProjectKey'] } },
    ]);
    expect(rows).toEqual([entity('r1', { ProjectKey: 'proj' })]);
  });

  it('scans without a filter', async () => {
    const client = new FakeTableClient();
    await collect(new AzureEntityTable(client).listEntities());
    expect(client.listCalls).toEqual([{ queryOptions: {} }]);
  });

  it('ignores deletes of missing entities', async () => {
    const client = new FakeTableClient();
    client.failWith = 404;
    await expect(new AzureEntityTable(client).deleteEntity('proj|main', 'gone')).resolves.toBeUndefined();
  });
});
