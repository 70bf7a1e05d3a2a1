import {
  FetchAbortedError,
  FetchFailedError,
  QualityMetricsError,
  RemoteRequestError,
  ValidationError,
  errorMessage,
  type QualityMetricsErrorCode,
} from './errors';
import { consoleLogger, type Logger } from './log';
import type { MetricsStore } from './metrics-store';
import type { MetricRecord, MetricRow } from './records';
import type { MetricsSource } from './sonarcloud-client';

const DAY_MS = 24 * 60 * 60 * 1000;

// Records buffered from the fetcher before each writeBatch call.
const WRITE_CHUNK_RECORDS = 1000;

export type SyncRequest = {
  projectId: string;
  branch: string;
  days: number;
  force?: boolean;
  maxRows?: number;
  now?: Date;
  signal?: AbortSignal;
};

export type SyncSuccess = {
  ok: true;
  projectId: string;
  branch: string;
  source: 'cache' | 'remote';
  /** Cached rows returned because the remote fetch failed. */
  stale: boolean;
  rows: MetricRow[];
  truncated: boolean;
  fetched: number;
  written: number;
  warning?: string;
};

export type SyncFailureCode = QualityMetricsErrorCode | 'unexpected';

export type SyncFailure = {
  ok: false;
  projectId: string;
  branch: string;
  code: SyncFailureCode;
  reason: string;
};

export type SyncResult = SyncSuccess | SyncFailure;

export type SyncDeps = {
  store: MetricsStore;
  /** Null when remote fetching is not configured. */
  source: MetricsSource | null;
  logger?: Logger;
};

/** Human-readable explanation for the presentation layer. Never includes transport detail. */
export function describeFailure(err: unknown): string {
  if (err instanceof FetchAbortedError) return 'Sync was cancelled';
  if (err instanceof FetchFailedError) {
    return `The analysis service did not respond after ${err.attempts} attempt(s); try again later`;
  }
  if (err instanceof RemoteRequestError) {
    if (err.status === 401 || err.status === 403) return 'The analysis service rejected the configured token';
    if (err.status === 404) return 'Project or branch not found on the analysis service';
    return 'The analysis service returned an unexpected response';
  }
  if (err instanceof ValidationError) return err.message;
  if (err instanceof QualityMetricsError) {
    if (err.code === 'storage_read') return 'Stored metrics could not be read';
    if (err.code === 'storage_write' || err.code === 'storage_capacity') return 'Fetched metrics could not be stored';
  }
  return 'Unexpected error';
}

export function failureCodeOf(err: unknown): SyncFailureCode {
  return err instanceof QualityMetricsError ? err.code : 'unexpected';
}

function isRemoteFailure(err: unknown): boolean {
  return err instanceof FetchFailedError || err instanceof RemoteRequestError;
}

/**
 * One fetch-then-store-then-read cycle for a (project, branch) identity.
 *
 * Stored history that already covers the window is served without a remote
 * call unless `force` is set. When the fetch fails and the store holds rows
 * for the window, those rows come back marked stale.
 */
export async function syncProject(deps: SyncDeps, request: SyncRequest): Promise<SyncResult> {
  const { store, source } = deps;
  const logger = deps.logger ?? consoleLogger;
  const { projectId, branch, days, maxRows } = request;
  const now = request.now ?? new Date();
  const label = `${projectId} / ${branch}`;
  const fail = (code: SyncFailureCode, reason: string): SyncFailure => ({ ok: false, projectId, branch, code, reason });

  if (!Number.isInteger(days) || days < 1) return fail('validation', 'days must be a positive integer');
  const since = new Date(now.getTime() - days * DAY_MS);

  try {
    if (!request.force) {
      const coverage = await store.checkDataCoverage(projectId, branch, days, now);
      if (coverage.hasCoverage) {
        const cached = await store.readRange(projectId, branch, since, now, maxRows);
        logger.info(`Serving ${cached.rows.length} cached row(s) for ${label}: ${coverage.reason}`);
        return { ok: true, projectId, branch, source: 'cache', stale: false, fetched: 0, written: 0, ...cached };
      }
    }

    if (!source) {
      const cached = await store.readRange(projectId, branch, since, now, maxRows);
      if (cached.rows.length === 0) return fail('config', 'Remote fetching is not configured and no stored data was found');
      return {
        ok: true,
        projectId,
        branch,
        source: 'cache',
        stale: true,
        fetched: 0,
        written: 0,
        warning: 'Remote fetching is not configured; showing stored data',
        ...cached,
      };
    }

    let fetched = 0;
    let written = 0;
    try {
      let buffer: MetricRecord[] = [];
      for await (const record of source.fetchMetrics(projectId, branch, since, now, { signal: request.signal })) {
        buffer.push(record);
        fetched++;
        if (buffer.length >= WRITE_CHUNK_RECORDS) {
          written += (await store.writeBatch(buffer)).written;
          buffer = [];
        }
      }
      if (buffer.length > 0) written += (await store.writeBatch(buffer)).written;
    } catch (err) {
      if (!isRemoteFailure(err)) throw err;
      logger.warn(`Fetching metrics for ${label} failed: ${errorMessage(err)}`);
      const reason = describeFailure(err);
      const cached = await store.readRange(projectId, branch, since, now, maxRows);
      if (cached.rows.length === 0) return fail(failureCodeOf(err), reason);
      return { ok: true, projectId, branch, source: 'cache', stale: true, fetched, written, warning: reason, ...cached };
    }

    logger.info(`Fetched ${fetched} record(s) for ${label}; stored ${written}`);
    const result = await store.readRange(projectId, branch, since, now, maxRows);
    return { ok: true, projectId, branch, source: 'remote', stale: false, fetched, written, ...result };
  } catch (err) {
    logger.error(`Sync of ${label} failed: ${errorMessage(err)}`);
    return fail(failureCodeOf(err), describeFailure(err));
  }
}
