/**
 * Minimal key-value table contract the metrics store is written against.
 *
 * Entities are addressed by (partitionKey, rowKey) and carry a flat bag of
 * primitive properties. Providers: Azure Table Storage, PostgreSQL, memory.
 */

export type EntityValue = string | number | boolean;

export type TableEntity = {
  partitionKey: string;
  rowKey: string;
  properties: Record<string, EntityValue>;
};

export type EntityQuery = {
  partitionKey: string;
  /** Property equality filters, AND-ed with the partition filter. */
  equals?: Record<string, string>;
  /** Inclusive string range on one property (ISO timestamps sort lexically). */
  range?: { property: string; gte?: string; lte?: string };
  /** Properties to return; keys are always returned. */
  select?: readonly string[];
};

/** Largest number of entities a provider accepts in one transactional batch. */
export const MAX_BATCH_ENTITIES = 100;

export interface EntityTable {
  readonly provider: 'azure' | 'postgres' | 'memory';
  ensureTable(): Promise<void>;
  getEntity(partitionKey: string, rowKey: string): Promise<TableEntity | null>;
  upsertEntity(entity: TableEntity): Promise<void>;
  /** Upserts up to MAX_BATCH_ENTITIES entities of one partition atomically. */
  submitBatch(partitionKey: string, entities: readonly TableEntity[]): Promise<void>;
  deleteEntity(partitionKey: string, rowKey: string): Promise<void>;
  queryEntities(query: EntityQuery): AsyncIterable<TableEntity>;
  /** Full-table scan. Only administrative rebuilds use it. */
  listEntities(select?: readonly string[]): AsyncIterable<TableEntity>;
}

export function pickProperties(
  properties: Record<string, EntityValue>,
  select: readonly string[] | undefined,
): Record<string, EntityValue> {
  if (!select) return { ...properties };
  const out: Record<string, EntityValue> = {};
  for (const key of select) {
    const v = properties[key];
    if (v !== undefined) out[key] = v;
  }
  return out;
}

export function matchesQuery(entity: TableEntity, query: EntityQuery): boolean {
  if (entity.partitionKey !== query.partitionKey) return false;
  for (const [prop, expected] of Object.entries(query.equals ?? {})) {
    if (entity.properties[prop] !== expected) return false;
  }
  if (query.range) {
    const v = entity.properties[query.range.property];
    if (typeof v !== 'string') return false;
    if (query.range.gte !== undefined && v < query.range.gte) return false;
    if (query.range.lte !== undefined && v > query.range.lte) return false;
  }
  return true;
}

export function assertBatch(partitionKey: string, entities: readonly TableEntity[]): void {
  if (entities.length > MAX_BATCH_ENTITIES) {
    throw new BatchLimitError(`Batch of ${entities.length} entities exceeds the limit of ${MAX_BATCH_ENTITIES}`);
  }
  for (const e of entities) {
    if (e.partitionKey !== partitionKey) {
      throw new Error(`Batch for partition ${partitionKey} contains an entity of ${e.partitionKey}`);
    }
  }
}

/** Raised by providers when a batch breaks the per-request entity limit. */
export class BatchLimitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BatchLimitError';
  }
}
