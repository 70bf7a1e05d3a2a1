import { pgTable, varchar, timestamp, jsonb, primaryKey } from 'drizzle-orm/pg-core';
import { type InferSelectModel, type InferInsertModel } from 'drizzle-orm';
import type { EntityValue } from '../server/lib/entity-table';

// ─────────────────────────────────────────────────────────────────────────────
// TABLES
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Quality Metric Entities
 * Key-value rows mirroring the table-store model: one row per (partition, row)
 * key pair with a flat property bag. Metric rows and the metadata partition
 * live side by side, exactly as they do in Azure Table Storage.
 */
export const qualityMetricEntities = pgTable(
  'quality_metric_entities',
  {
    partitionKey: varchar('partition_key', { length: 1024 }).notNull(),
    rowKey: varchar('row_key', { length: 1024 }).notNull(),
    properties: jsonb('properties').$type<Record<string, EntityValue>>().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.partitionKey, table.rowKey] }),
  }),
);

// ─────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────

export type QualityMetricEntityRow = InferSelectModel<typeof qualityMetricEntities>;
export type InsertQualityMetricEntity = InferInsertModel<typeof qualityMetricEntities>;
