import {
  assertBatch,
  matchesQuery,
  pickProperties,
  type EntityQuery,
  type EntityTable,
  type TableEntity,
} from './entity-table';

/** In-process table used for demo mode. Ordering follows the real stores: by partition, then row. */
export class MemoryEntityTable implements EntityTable {
  readonly provider = 'memory' as const;
  private readonly partitions = new Map<string, Map<string, TableEntity>>();

  async ensureTable(): Promise<void> {}

  async getEntity(partitionKey: string, rowKey: string): Promise<TableEntity | null> {
    const entity = this.partitions.get(partitionKey)?.get(rowKey);
    return entity ? clone(entity) : null;
  }

  async upsertEntity(entity: TableEntity): Promise<void> {
    let partition = this.partitions.get(entity.partitionKey);
    if (!partition) {
      partition = new Map();
      this.partitions.set(entity.partitionKey, partition);
    }
    partition.set(entity.rowKey, clone(entity));
  }

  async submitBatch(partitionKey: string, entities: readonly TableEntity[]): Promise<void> {
    assertBatch(partitionKey, entities);
    for (const entity of entities) await this.upsertEntity(entity);
  }

  async deleteEntity(partitionKey: string, rowKey: string): Promise<void> {
    this.partitions.get(partitionKey)?.delete(rowKey);
  }

  async *queryEntities(query: EntityQuery): AsyncGenerator<TableEntity> {
    const partition = this.partitions.get(query.partitionKey);
    if (!partition) return;
    for (const rowKey of [...partition.keys()].sort()) {
      const entity = partition.get(rowKey);
      if (!entity || !matchesQuery(entity, query)) continue;
      yield { ...entity, properties: pickProperties(entity.properties, query.select) };
    }
  }

  async *listEntities(select?: readonly string[]): AsyncGenerator<TableEntity> {
    for (const partitionKey of [...this.partitions.keys()].sort()) {
      const partition = this.partitions.get(partitionKey);
      if (!partition) continue;
      for (const rowKey of [...partition.keys()].sort()) {
        const entity = partition.get(rowKey);
        if (entity) yield { ...entity, properties: pickProperties(entity.properties, select) };
      }
    }
  }

  size(): number {
    let n = 0;
    for (const partition of this.partitions.values()) n += partition.size;
    return n;
  }
}

function clone(entity: TableEntity): TableEntity {
  return { partitionKey: entity.partitionKey, rowKey: entity.rowKey, properties: { ...entity.properties } };
}
