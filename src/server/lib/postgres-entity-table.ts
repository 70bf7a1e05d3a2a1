import { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { and, asc, eq, gt, sql, type SQL } from 'drizzle-orm';
import {
  qualityMetricEntities,
  type InsertQualityMetricEntity,
  type QualityMetricEntityRow,
} from '../../schema/quality-metrics';
import {
  assertBatch,
  pickProperties,
  type EntityQuery,
  type EntityTable,
  type TableEntity,
} from './entity-table';

const PAGE_SIZE = 1000;

const t = qualityMetricEntities;

function toEntity(row: QualityMetricEntityRow, select?: readonly string[]): TableEntity {
  return {
    partitionKey: row.partitionKey,
    rowKey: row.rowKey,
    properties: pickProperties(row.properties, select),
  };
}

/** Filter for a query. Property values are bound parameters, never spliced into the SQL text. */
export function buildWhere(query: EntityQuery): SQL {
  const parts: SQL[] = [eq(t.partitionKey, query.partitionKey)];
  for (const [prop, value] of Object.entries(query.equals ?? {})) {
    parts.push(sql`${t.properties} ->> ${prop} = ${value}`);
  }
  if (query.range) {
    const { property, gte, lte } = query.range;
    if (gte !== undefined) parts.push(sql`${t.properties} ->> ${property} >= ${gte}`);
    if (lte !== undefined) parts.push(sql`${t.properties} ->> ${property} <= ${lte}`);
  }
  return sql.join(parts, sql` and `);
}

/**
 * Table-store semantics on PostgreSQL: one row per (partition, row) key with a
 * jsonb property bag. Batches run in one transaction; reads page by row key.
 */
export class PostgresEntityTable implements EntityTable {
  readonly provider = 'postgres' as const;

  constructor(private readonly db: NodePgDatabase) {}

  static fromConnectionString(connectionString: string): PostgresEntityTable {
    return new PostgresEntityTable(drizzle(new Pool({ connectionString })));
  }

  async ensureTable(): Promise<void> {
    await this.db.execute(sql`
      CREATE TABLE IF NOT EXISTS quality_metric_entities (
        partition_key varchar(1024) NOT NULL,
        row_key varchar(1024) NOT NULL,
        properties jsonb NOT NULL,
        updated_at timestamp NOT NULL DEFAULT now(),
        PRIMARY KEY (partition_key, row_key)
      )
    `);
  }

  async getEntity(partitionKey: string, rowKey: string): Promise<TableEntity | null> {
    const rows = await this.db
      .select()
      .from(t)
      .where(and(eq(t.partitionKey, partitionKey), eq(t.rowKey, rowKey)))
      .limit(1);
    return rows.length ? toEntity(rows[0]) : null;
  }

  async upsertEntity(entity: TableEntity): Promise<void> {
    await this.upsertRows(this.db, [entity]);
  }

  async submitBatch(partitionKey: string, entities: readonly TableEntity[]): Promise<void> {
    assertBatch(partitionKey, entities);
    if (entities.length === 0) return;
    await this.db.transaction(async (tx) => {
      await this.upsertRows(tx, entities);
    });
  }

  private async upsertRows(db: Pick<NodePgDatabase, 'insert'>, entities: readonly TableEntity[]) {
    const now = new Date();
    const rows = entities.map(
      (e): InsertQualityMetricEntity => ({
        partitionKey: e.partitionKey,
        rowKey: e.rowKey,
        properties: e.properties,
        updatedAt: now,
      }),
    );
    await db
      .insert(t)
      .values(rows)
      .onConflictDoUpdate({
        target: [t.partitionKey, t.rowKey],
        set: { properties: sql`excluded.properties`, updatedAt: now },
      });
  }

  async deleteEntity(partitionKey: string, rowKey: string): Promise<void> {
    await this.db.delete(t).where(and(eq(t.partitionKey, partitionKey), eq(t.rowKey, rowKey)));
  }

  async *queryEntities(query: EntityQuery): AsyncGenerator<TableEntity> {
    const where = buildWhere(query);
    let after: string | null = null;
    for (;;) {
      const rows: QualityMetricEntityRow[] = await this.db
        .select()
        .from(t)
        .where(after === null ? where : and(where, gt(t.rowKey, after)))
        .orderBy(asc(t.rowKey))
        .limit(PAGE_SIZE);
      for (const row of rows) yield toEntity(row, query.select);
      if (rows.length < PAGE_SIZE) return;
      after = rows[rows.length - 1].rowKey;
    }
  }

  async *listEntities(select?: readonly string[]): AsyncGenerator<TableEntity> {
    let after: { partitionKey: string; rowKey: string } | null = null;
    for (;;) {
      const rows: QualityMetricEntityRow[] = await this.db
        .select()
        .from(t)
        .where(after === null ? undefined : sql`(${t.partitionKey}, ${t.rowKey}) > (${after.partitionKey}, ${after.rowKey})`)
        .orderBy(asc(t.partitionKey), asc(t.rowKey))
        .limit(PAGE_SIZE);
      for (const row of rows) yield toEntity(row, select);
      if (rows.length < PAGE_SIZE) return;
      const last = rows[rows.length - 1];
      after = { partitionKey: last.partitionKey, rowKey: last.rowKey };
    }
  }
}
