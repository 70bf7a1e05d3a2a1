import type { AppConfig } from './config';
import { AzureEntityTable } from './azure-entity-table';
import type { EntityTable } from './entity-table';
import { ConfigError } from './errors';
import type { Logger } from './log';
import { MemoryEntityTable } from './memory-entity-table';
import { MetricsStore } from './metrics-store';
import { PostgresEntityTable } from './postgres-entity-table';

/** Pick the entity table for the configured provider. Fails fast on missing secrets. */
export function createEntityTable(config: AppConfig): EntityTable {
  const { storage } = config;
  switch (storage.provider) {
    case 'azure':
      if (!storage.azureConnectionString) {
        throw new ConfigError('Missing AZURE_STORAGE_CONNECTION_STRING for the azure storage provider');
      }
      return AzureEntityTable.fromConnectionString(storage.azureConnectionString, storage.tableName);
    case 'postgres':
      if (!storage.databaseUrl) throw new ConfigError('Missing DATABASE_URL for the postgres storage provider');
      return PostgresEntityTable.fromConnectionString(storage.databaseUrl);
    case 'memory':
      return new MemoryEntityTable();
  }
}

export async function createMetricsStore(
  config: AppConfig,
  options: { table?: EntityTable; logger?: Logger } = {},
): Promise<MetricsStore> {
  const store = new MetricsStore(options.table ?? createEntityTable(config), {
    batchSize: config.storage.batchSize,
    maxRetrievalRows: config.storage.maxRetrievalRows,
    maxProjects: config.storage.maxProjects,
    logger: options.logger,
  });
  await store.initialize();
  return store;
}
