import { TableClient, odata, type TransactionAction } from '@azure/data-tables';
import {
  BatchLimitError,
  assertBatch,
  type EntityQuery,
  type EntityTable,
  type EntityValue,
  type TableEntity,
} from './entity-table';

type AzureEntity = { partitionKey: string; rowKey: string; [property: string]: EntityValue };

type ListOptions = { queryOptions: { filter?: string; select?: string[] } };

/** The part of `TableClient` this adapter calls. */
export interface TableClientLike {
  createTable(): Promise<void>;
  getEntity(partitionKey: string, rowKey: string): Promise<object>;
  upsertEntity(entity: AzureEntity, mode: 'Replace'): Promise<unknown>;
  submitTransaction(actions: TransactionAction[]): Promise<unknown>;
  deleteEntity(partitionKey: string, rowKey: string): Promise<unknown>;
  listEntities(options: ListOptions): AsyncIterable<object>;
}

// Service-managed fields that are not part of an entity's property bag.
const SYSTEM_FIELDS = new Set(['partitionKey', 'rowKey', 'etag', 'timestamp', 'odata.etag', 'odata.metadata']);

const PROPERTY_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function propertyName(name: string): string {
  if (!PROPERTY_NAME.test(name)) throw new Error(`Invalid property name in filter: ${name}`);
  return name;
}

// The operator stays inside the template so `odata` sees it and quotes the value.
function comparison(prop: string, op: 'eq' | 'ge' | 'le', value: string): string {
  const name = propertyName(prop);
  switch (op) {
    case 'eq':
      return name + odata` eq ${value}`;
    case 'ge':
      return name + odata` ge ${value}`;
    case 'le':
      return name + odata` le ${value}`;
  }
}

/** OData filter for a query; every value goes through the `odata` escaper. */
export function buildFilter(query: EntityQuery): string {
  const parts = [odata`PartitionKey eq ${query.partitionKey}`];
  for (const [prop, value] of Object.entries(query.equals ?? {})) {
    parts.push(comparison(prop, 'eq', value));
  }
  if (query.range) {
    const { property, gte, lte } = query.range;
    if (gte !== undefined) parts.push(comparison(property, 'ge', gte));
    if (lte !== undefined) parts.push(comparison(property, 'le', lte));
  }
  return parts.join(' and ');
}

function statusCodeOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return undefined;
}

function toTableEntity(raw: object): TableEntity | null {
  let partitionKey: string | null = null;
  let rowKey: string | null = null;
  const properties: Record<string, EntityValue> = {};

  for (const [key, value] of Object.entries(raw)) {
    if (key === 'partitionKey' && typeof value === 'string') partitionKey = value;
    else if (key === 'rowKey' && typeof value === 'string') rowKey = value;
    else if (SYSTEM_FIELDS.has(key)) continue;
    else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      properties[key] = value;
    }
  }

  if (partitionKey === null || rowKey === null) return null;
  return { partitionKey, rowKey, properties };
}

function toAzureEntity(entity: TableEntity): AzureEntity {
  return { ...entity.properties, partitionKey: entity.partitionKey, rowKey: entity.rowKey };
}

export class AzureEntityTable implements EntityTable {
  readonly provider = 'azure' as const;

  constructor(private readonly client: TableClientLike) {}

  static fromConnectionString(connectionString: string, tableName: string): AzureEntityTable {
    return new AzureEntityTable(TableClient.fromConnectionString(connectionString, tableName));
  }

  async ensureTable(): Promise<void> {
    try {
      await this.client.createTable();
    } catch (err) {
      if (statusCodeOf(err) !== 409) throw err;
    }
  }

  async getEntity(partitionKey: string, rowKey: string): Promise<TableEntity | null> {
    try {
      return toTableEntity(await this.client.getEntity(partitionKey, rowKey));
    } catch (err) {
      if (statusCodeOf(err) === 404) return null;
      throw err;
    }
  }

  async upsertEntity(entity: TableEntity): Promise<void> {
    await this.client.upsertEntity(toAzureEntity(entity), 'Replace');
  }

  async submitBatch(partitionKey: string, entities: readonly TableEntity[]): Promise<void> {
    assertBatch(partitionKey, entities);
    if (entities.length === 0) return;

    const actions: TransactionAction[] = entities.map((e): TransactionAction => ['upsert', toAzureEntity(e), 'Replace']);
    try {
      await this.client.submitTransaction(actions);
    } catch (err) {
      if (statusCodeOf(err) === 413) {
        throw new BatchLimitError(`Table service rejected a batch of ${entities.length} entities as too large`);
      }
      throw err;
    }
  }

  async deleteEntity(partitionKey: string, rowKey: string): Promise<void> {
    try {
      await this.client.deleteEntity(partitionKey, rowKey);
    } catch (err) {
      if (statusCodeOf(err) !== 404) throw err;
    }
  }

  async *queryEntities(query: EntityQuery): AsyncGenerator<TableEntity> {
    const select = query.select ? [...query.select] : undefined;
    for await (const raw of this.client.listEntities({ queryOptions: { filter: buildFilter(query), select } })) {
      const entity = toTableEntity(raw);
      if (entity) yield entity;
    }
  }

  async *listEntities(select?: readonly string[]): AsyncGenerator<TableEntity> {
    const queryOptions = select ? { select: [...select] } : {};
    for await (const raw of this.client.listEntities({ queryOptions })) {
      const entity = toTableEntity(raw);
      if (entity) yield entity;
    }
  }
}
