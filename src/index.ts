export * from './server/lib/errors';
export * from './server/lib/keys';
export * from './server/lib/metric-definitions';
export * from './server/lib/records';
export * from './server/lib/retry';
export * from './server/lib/entity-table';
export { AzureEntityTable, type TableClientLike } from './server/lib/azure-entity-table';
export { PostgresEntityTable } from './server/lib/postgres-entity-table';
export { MemoryEntityTable } from './server/lib/memory-entity-table';
export * from './server/lib/metrics-store';
export * from './server/lib/sonarcloud-client';
export type { RemoteBranch, RemoteProject } from './server/lib/sonarcloud.schema';
export * from './server/lib/config';
export * from './server/lib/storage-factory';
export * from './server/lib/sync';
export { generateDemoRecords, DEMO_PROJECTS, DEMO_METRICS } from './server/lib/demo-data';
export { consoleLogger, silentLogger, type Logger } from './server/lib/log';
