import {
  StorageCapacityError,
  StorageReadError,
  StorageWriteError,
  ValidationError,
  errorMessage,
} from './errors';
import { BatchLimitError, MAX_BATCH_ENTITIES, type EntityTable, type TableEntity } from './entity-table';
import { dataRowKey, deriveKeys, type DerivedKeys } from './keys';
import { consoleLogger, type Logger } from './log';
import { REQUIRED_COVERAGE_METRICS, isMetricKey, type MetricKey } from './metric-definitions';
import type { MetricRecord, MetricRow, ProjectIdentity } from './records';

export const METADATA_PARTITION = 'METADATA_PROJECTS';
export const INDEX_STATUS_ROW = 'INDEX_STATUS';

export const DEFAULT_MAX_RETRIEVAL_ROWS = 10_000;
export const DEFAULT_MAX_PROJECTS = 5_000;

const DAY_MS = 24 * 60 * 60 * 1000;

// Stored property names.
const PROJECT = 'ProjectKey';
const BRANCH = 'Branch';
const METRIC = 'Metric';
const VALUE = 'Value';
const OBSERVED_AT = 'ObservedAt';
const DATE = 'Date';
const FIRST_SEEN_AT = 'FirstSeenAt';
const SOURCE = 'Source';

const ROW_COLUMNS = [PROJECT, BRANCH, METRIC, VALUE, OBSERVED_AT] as const;
const INDEX_COLUMNS = [PROJECT, BRANCH, FIRST_SEEN_AT, SOURCE] as const;

export type IndexSource = 'write' | 'backfill' | 'rebuild';

export type ProjectIndexEntry = {
  rowKey: string;
  projectId: string;
  branch: string;
  firstSeenAt: string | null;
  source: IndexSource | null;
};

export type WriteResult = {
  written: number;
  partitions: number;
  /** Identities whose index entry was created by this write. */
  indexed: ProjectIdentity[];
};

export type ReadResult = {
  rows: MetricRow[];
  truncated: boolean;
};

export type ProjectList = {
  projects: ProjectIndexEntry[];
  truncated: boolean;
};

export type CoverageReport = {
  hasCoverage: boolean;
  recordCount: number;
  distinctDates: number;
  latestDate: string | null;
  daysSinceLatest: number | null;
  missingMetrics: MetricKey[];
  reason: string;
};

export type RebuildResult = {
  scanned: number;
  identities: number;
  created: number;
  pruned: number;
  /** Rows whose stored partition is not the one their identity derives to (written under an older key scheme). */
  skipped: number;
};

export type MetricsStoreOptions = {
  batchSize?: number;
  maxRetrievalRows?: number;
  maxProjects?: number;
  logger?: Logger;
  now?: () => Date;
};

type PartitionGroup = {
  identity: ProjectIdentity;
  keys: DerivedKeys;
  entities: Map<string, TableEntity>;
};

function isIndexSource(v: unknown): v is IndexSource {
  return v === 'write' || v === 'backfill' || v === 'rebuild';
}

/**
 * Metric history persisted in a key-value table, plus a metadata partition
 * indexing every (project, branch) identity that has data.
 *
 * The index is derived from the data: an entry is written only after its data
 * batches were acknowledged, created lazily when a read meets data without
 * one, and can be rebuilt from a full scan.
 */
export class MetricsStore {
  private readonly batchSize: number;
  private readonly maxRetrievalRows: number;
  private readonly maxProjects: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly table: EntityTable,
    options: MetricsStoreOptions = {},
  ) {
    this.batchSize = options.batchSize ?? MAX_BATCH_ENTITIES;
    if (!Number.isInteger(this.batchSize) || this.batchSize < 1 || this.batchSize > MAX_BATCH_ENTITIES) {
      throw new ValidationError(`batchSize must be an integer between 1 and ${MAX_BATCH_ENTITIES}`);
    }
    this.maxRetrievalRows = options.maxRetrievalRows ?? DEFAULT_MAX_RETRIEVAL_ROWS;
    this.maxProjects = options.maxProjects ?? DEFAULT_MAX_PROJECTS;
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? (() => new Date());
  }

  get provider(): EntityTable['provider'] {
    return this.table.provider;
  }

  async initialize(): Promise<void> {
    await this.table.ensureTable();
  }

  async writeBatch(records: readonly MetricRecord[]): Promise<WriteResult> {
    // Validate everything before the first write.
    const groups = new Map<string, PartitionGroup>();
    for (const record of records) {
      const keys = deriveKeys(record.projectId, record.branch);
      const entity = this.toEntity(record, keys);
      let group = groups.get(keys.partitionKey);
      if (!group) {
        group = { identity: { projectId: record.projectId, branch: record.branch }, keys, entities: new Map() };
        groups.set(keys.partitionKey, group);
      }
      group.entities.set(entity.rowKey, entity);
    }

    let written = 0;
    const indexed: ProjectIdentity[] = [];

    for (const group of groups.values()) {
      const { partitionKey } = group.keys;
      const entities = [...group.entities.values()];

      for (let i = 0; i < entities.length; i += this.batchSize) {
        const chunk = entities.slice(i, i + this.batchSize);
        try {
          await this.table.submitBatch(partitionKey, chunk);
        } catch (err) {
          const progress = { completed: written, failedPartition: partitionKey };
          const label = `${group.identity.projectId} / ${group.identity.branch}`;
          if (err instanceof BatchLimitError) {
            throw new StorageCapacityError(`Batch for ${label} exceeded the store limit: ${err.message}`, progress, {
              cause: err,
            });
          }
          throw new StorageWriteError(`Failed to write metrics for ${label}: ${errorMessage(err)}`, progress, {
            cause: err,
          });
        }
        written += chunk.length;
      }

      try {
        if (await this.ensureIndexEntry(group.identity, group.keys, 'write')) indexed.push(group.identity);
      } catch (err) {
        throw new StorageWriteError(
          `Metrics for ${group.identity.projectId} / ${group.identity.branch} were written but indexing failed: ${errorMessage(err)}`,
          { completed: written, failedPartition: partitionKey },
          { cause: err },
        );
      }
    }

    return { written, partitions: groups.size, indexed };
  }

  /**
   * Rows of one identity observed within [since, until], at most `maxRows`
   * (clamped to the configured ceiling). Filters on the original identity as
   * well as the derived partition.
   */
  async readRange(projectId: string, branch: string, since: Date, until: Date, maxRows?: number): Promise<ReadResult> {
    const keys = deriveKeys(projectId, branch);
    if (Number.isNaN(since.getTime()) || Number.isNaN(until.getTime())) {
      throw new ValidationError('since and until must be valid dates');
    }
    if (since > until) throw new ValidationError('since must not be after until');
    const limit = this.resolveLimit(maxRows);

    const rows: MetricRow[] = [];
    let truncated = false;
    try {
      for await (const entity of this.table.queryEntities({
        partitionKey: keys.partitionKey,
        equals: { [PROJECT]: projectId, [BRANCH]: branch },
        range: { property: OBSERVED_AT, gte: since.toISOString(), lte: until.toISOString() },
        select: ROW_COLUMNS,
      })) {
        const row = toRow(entity, projectId, branch);
        if (!row) continue;
        if (rows.length === limit) {
          truncated = true;
          break;
        }
        rows.push(row);
      }
    } catch (err) {
      throw new StorageReadError(`Failed to read metrics for ${projectId} / ${branch}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (truncated) {
      this.logger.warn(`Result limit of ${limit} rows reached for ${projectId} / ${branch}; results truncated`);
    }

    if (rows.length > 0) {
      try {
        await this.ensureIndexEntry({ projectId, branch }, keys, 'backfill');
      } catch (err) {
        this.logger.warn(`Could not backfill index entry for ${projectId} / ${branch}: ${errorMessage(err)}`);
      }
    }

    return { rows, truncated };
  }

  /**
   * Known identities, read from the metadata partition. The first call on a
   * table whose index was never built backfills it from one full scan, so
   * identities written before the index existed are listed as well. Every
   * later call reads the metadata partition only.
   */
  async listKnownProjects(): Promise<ProjectList> {
    const projects: ProjectIndexEntry[] = [];
    let truncated = false;
    try {
      await this.ensureIndexBuilt();
      for await (const entity of this.table.queryEntities({ partitionKey: METADATA_PARTITION, select: INDEX_COLUMNS })) {
        const entry = toIndexEntry(entity);
        if (!entry) continue;
        if (projects.length === this.maxProjects) {
          truncated = true;
          break;
        }
        projects.push(entry);
      }
    } catch (err) {
      throw new StorageReadError(`Failed to list known projects: ${errorMessage(err)}`, { cause: err });
    }

    if (truncated) {
      this.logger.warn(`Project limit of ${this.maxProjects} reached; project list is incomplete`);
    }

    projects.sort((a, b) => a.projectId.localeCompare(b.projectId) || a.branch.localeCompare(b.branch));
    return { projects, truncated };
  }

  /** Deletes the identity's metric rows. Its index entry is kept. */
  async deleteProjectData(projectId: string, branch: string): Promise<number> {
    const keys = deriveKeys(projectId, branch);

    const rowKeys: string[] = [];
    try {
      for await (const entity of this.table.queryEntities({
        partitionKey: keys.partitionKey,
        equals: { [PROJECT]: projectId, [BRANCH]: branch },
        select: [PROJECT, BRANCH],
      })) {
        if (entity.properties[PROJECT] === projectId && entity.properties[BRANCH] === branch) rowKeys.push(entity.rowKey);
      }
    } catch (err) {
      throw new StorageReadError(`Failed to list metrics of ${projectId} / ${branch}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    let deleted = 0;
    for (const rowKey of rowKeys) {
      try {
        await this.table.deleteEntity(keys.partitionKey, rowKey);
      } catch (err) {
        throw new StorageWriteError(
          `Failed to delete metrics of ${projectId} / ${branch}: ${errorMessage(err)}`,
          { completed: deleted, failedPartition: keys.partitionKey },
          { cause: err },
        );
      }
      deleted++;
    }
    return deleted;
  }

  /**
   * Whether stored history is recent and complete enough to serve a window of
   * `days` without refetching.
   */
  async checkDataCoverage(projectId: string, branch: string, days: number, now: Date = this.now()): Promise<CoverageReport> {
    if (!Number.isInteger(days) || days < 1) throw new ValidationError('days must be a positive integer');

    const since = new Date(now.getTime() - days * DAY_MS);
    const { rows } = await this.readRange(projectId, branch, since, now);
    if (rows.length === 0) {
      return {
        hasCoverage: false,
        recordCount: 0,
        distinctDates: 0,
        latestDate: null,
        daysSinceLatest: null,
        missingMetrics: [...REQUIRED_COVERAGE_METRICS],
        reason: 'No stored data found',
      };
    }

    const dates = new Set(rows.map((r) => r.observedAt.slice(0, 10)));
    const latest = rows.reduce((max, r) => (r.observedAt > max ? r.observedAt : max), rows[0].observedAt);
    const daysSinceLatest = Math.floor((now.getTime() - Date.parse(latest)) / DAY_MS);
    const present = new Set<MetricKey>(rows.map((r) => r.metric));
    const missingMetrics = REQUIRED_COVERAGE_METRICS.filter((m) => !present.has(m));
    const requiredDates = Math.max(1, Math.floor(days / 10));
    const latestDate = latest.slice(0, 10);

    return {
      hasCoverage: daysSinceLatest < 2 && dates.size >= requiredDates && missingMetrics.length === 0,
      recordCount: rows.length,
      distinctDates: dates.size,
      latestDate,
      daysSinceLatest,
      missingMetrics,
      reason: `Data coverage: ${rows.length} records over ${dates.size} day(s), latest: ${latestDate}`,
    };
  }

  /**
   * Recreate the metadata partition from a full scan of the table and record
   * the INDEX_STATUS row. Runs on demand, and once from `listKnownProjects`
   * when that row is missing.
   */
  async rebuildIndex(options: { prune?: boolean } = {}): Promise<RebuildResult> {
    const identities = new Map<string, { identity: ProjectIdentity; keys: DerivedKeys }>();
    let scanned = 0;
    let skipped = 0;

    for await (const entity of this.table.listEntities([PROJECT, BRANCH])) {
      if (entity.partitionKey === METADATA_PARTITION) continue;
      scanned++;
      const projectId = entity.properties[PROJECT];
      const branch = entity.properties[BRANCH];
      if (typeof projectId !== 'string' || typeof branch !== 'string' || !projectId || !branch) {
        skipped++;
        continue;
      }
      let keys: DerivedKeys;
      try {
        keys = deriveKeys(projectId, branch);
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        skipped++;
        continue;
      }
      if (keys.partitionKey !== entity.partitionKey) {
        skipped++;
        continue;
      }
      identities.set(keys.rowKey, { identity: { projectId, branch }, keys });
    }

    let created = 0;
    for (const { identity, keys } of identities.values()) {
      if (await this.ensureIndexEntry(identity, keys, 'rebuild')) created++;
    }

    let pruned = 0;
    if (options.prune) {
      const stale: string[] = [];
      for await (const entity of this.table.queryEntities({ partitionKey: METADATA_PARTITION, select: [PROJECT] })) {
        if (entity.rowKey !== INDEX_STATUS_ROW && !identities.has(entity.rowKey)) stale.push(entity.rowKey);
      }
      for (const rowKey of stale) {
        await this.table.deleteEntity(METADATA_PARTITION, rowKey);
        pruned++;
      }
    }

    await this.table.upsertEntity({
      partitionKey: METADATA_PARTITION,
      rowKey: INDEX_STATUS_ROW,
      properties: { LastRebuiltAt: this.now().toISOString(), Identities: identities.size },
    });

    if (skipped > 0) this.logger.warn(`Index rebuild skipped ${skipped} row(s) stored under keys that no longer derive`);
    return { scanned, identities: identities.size, created, pruned, skipped };
  }

  private async ensureIndexBuilt(): Promise<void> {
    if (await this.table.getEntity(METADATA_PARTITION, INDEX_STATUS_ROW)) return;
    this.logger.info('Metadata index has never been built; backfilling it from stored data');
    const result = await this.rebuildIndex();
    if (result.created > 0) this.logger.info(`Backfilled ${result.created} index entry(ies) from ${result.scanned} row(s)`);
  }

  /** Creates the identity's index entry if it is absent. Returns whether it was created. */
  private async ensureIndexEntry(identity: ProjectIdentity, keys: DerivedKeys, source: IndexSource): Promise<boolean> {
    const existing = await this.table.getEntity(METADATA_PARTITION, keys.rowKey);
    if (
      existing &&
      existing.properties[PROJECT] === identity.projectId &&
      existing.properties[BRANCH] === identity.branch
    ) {
      return false;
    }

    await this.table.upsertEntity({
      partitionKey: METADATA_PARTITION,
      rowKey: keys.rowKey,
      properties: {
        [PROJECT]: identity.projectId,
        [BRANCH]: identity.branch,
        [FIRST_SEEN_AT]: this.now().toISOString(),
        [SOURCE]: source,
      },
    });
    if (source === 'backfill') {
      this.logger.info(`Backfilled index entry for ${identity.projectId} / ${identity.branch}`);
    }
    return true;
  }

  private resolveLimit(maxRows: number | undefined): number {
    if (maxRows === undefined) return this.maxRetrievalRows;
    if (!Number.isInteger(maxRows) || maxRows < 1) throw new ValidationError('maxRows must be a positive integer');
    return Math.min(maxRows, this.maxRetrievalRows);
  }

  private toEntity(record: MetricRecord, keys: DerivedKeys): TableEntity {
    if (!isMetricKey(record.metric)) throw new ValidationError(`Unknown metric: ${String(record.metric)}`);
    if (typeof record.value !== 'number' || !Number.isFinite(record.value)) {
      throw new ValidationError(`Metric ${record.metric} has a non-finite value`);
    }
    if (!(record.observedAt instanceof Date) || Number.isNaN(record.observedAt.getTime())) {
      throw new ValidationError(`Metric ${record.metric} has an invalid observation time`);
    }

    const observedAt = record.observedAt.toISOString();
    return {
      partitionKey: keys.partitionKey,
      rowKey: dataRowKey(record.observedAt, record.metric),
      properties: {
        [PROJECT]: record.projectId,
        [BRANCH]: record.branch,
        [METRIC]: record.metric,
        [VALUE]: record.value,
        [OBSERVED_AT]: observedAt,
        [DATE]: observedAt.slice(0, 10),
      },
    };
  }
}

function toRow(entity: TableEntity, projectId: string, branch: string): MetricRow | null {
  const p = entity.properties;
  // A row of another identity in the same partition is never returned.
  if (p[PROJECT] !== projectId || p[BRANCH] !== branch) return null;
  const metric = p[METRIC];
  const value = p[VALUE];
  const observedAt = p[OBSERVED_AT];
  if (!isMetricKey(metric) || typeof value !== 'number' || typeof observedAt !== 'string') return null;
  return { projectId, branch, metric, value, observedAt };
}

function toIndexEntry(entity: TableEntity): ProjectIndexEntry | null {
  const projectId = entity.properties[PROJECT];
  const branch = entity.properties[BRANCH];
  if (typeof projectId !== 'string' || typeof branch !== 'string') return null;
  const firstSeenAt = entity.properties[FIRST_SEEN_AT];
  const source = entity.properties[SOURCE];
  return {
    rowKey: entity.rowKey,
    projectId,
    branch,
    firstSeenAt: typeof firstSeenAt === 'string' ? firstSeenAt : null,
    source: isIndexSource(source) ? source : null,
  };
}
