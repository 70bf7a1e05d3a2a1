import type { z } from 'zod';
import { RemoteRequestError, ValidationError, errorMessage } from './errors';
import { consoleLogger, type Logger } from './log';
import { METRIC_KEYS, isMetricKey, parseMetricValue, type MetricKey } from './metric-definitions';
import type { MetricRecord } from './records';
import { DEFAULT_RETRY_POLICY, TransientError, withRetry, type RetryPolicy, type Sleep } from './retry';
import {
  componentMeasuresSchema,
  projectBranchesSchema,
  projectsSearchSchema,
  searchHistorySchema,
  type RemoteBranch,
  type RemoteProject,
} from './sonarcloud.schema';

export const DEFAULT_SONARCLOUD_URL = 'https://sonarcloud.io/api';
export const DEFAULT_TIMEOUT_MS = 30_000;

const PROJECTS_PAGE_SIZE = 500;
const HISTORY_PAGE_SIZE = 1000;

export type FetchLike = (
  url: string,
  init: { method: 'GET'; headers: Record<string, string>; signal: AbortSignal },
) => Promise<Response>;

export type SonarCloudClientOptions = {
  token: string;
  baseUrl?: string;
  timeoutMs?: number;
  retry?: RetryPolicy;
  fetch?: FetchLike;
  sleep?: Sleep;
  random?: () => number;
  logger?: Logger;
};

export type RequestOptions = {
  signal?: AbortSignal;
};

export type OrganizationSummary = {
  totalProjects: number;
  projectsWithData: number;
  totalBugs: number;
  totalVulnerabilities: number;
  totalCodeSmells: number;
  avgCoverage: number;
};

/** Fetcher surface the sync cycle depends on. */
export interface MetricsSource {
  fetchMetrics(
    projectId: string,
    branch: string,
    since: Date,
    until: Date,
    options?: RequestOptions & { metrics?: readonly MetricKey[] },
  ): AsyncIterable<MetricRecord>;
}

function stripTrailingSlash(url: string) {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** The service reports offsets as +0000; Date only reliably parses +00:00. */
export function parseRemoteDate(raw: string): Date | null {
  const normalized = raw.trim().replace(/([+-]\d{2})(\d{2})$/, '$1:$2');
  const d = new Date(normalized);
  return Number.isNaN(d.getTime()) ? null : d;
}

function parseRetryAfter(header: string | null): number | null {
  if (!header) return null;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const at = Date.parse(header);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - Date.now());
}

/**
 * Client for a SonarCloud-compatible web API.
 *
 * Every request is bearer-authenticated and bounded by `timeoutMs`. Timeouts,
 * 429, 5xx and network failures are retried with backoff; other 4xx answers
 * and malformed bodies fail at once.
 */
export class SonarCloudClient implements MetricsSource {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly fetchImpl: FetchLike;
  private readonly sleep?: Sleep;
  private readonly random?: () => number;
  private readonly logger: Logger;

  constructor(options: SonarCloudClientOptions) {
    if (!options.token.trim()) throw new ValidationError('SonarCloud token is required');
    this.token = options.token.trim();
    this.baseUrl = stripTrailingSlash(options.baseUrl || DEFAULT_SONARCLOUD_URL);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep;
    this.random = options.random;
    this.logger = options.logger ?? consoleLogger;
  }

  private async request<S extends z.ZodTypeAny>(
    endpoint: string,
    params: Record<string, string>,
    schema: S,
    signal?: AbortSignal,
  ): Promise<z.output<S>> {
    const url = `${this.baseUrl}/${endpoint}?${new URLSearchParams(params).toString()}`;

    return withRetry(
      async () => {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeoutMs);
        try {
          const res = await this.fetchImpl(url, {
            method: 'GET',
            headers: { Authorization: `Bearer ${this.token}`, Accept: 'application/json' },
            signal: controller.signal,
          });

          if (res.status === 429 || res.status >= 500) {
            await res.text().catch(() => '');
            throw new TransientError(
              `${endpoint} responded ${res.status}`,
              res.status === 429 ? parseRetryAfter(res.headers.get('retry-after')) : null,
            );
          }
          if (!res.ok) {
            const body = await res.text().catch(() => '');
            throw new RemoteRequestError(`${endpoint} responded ${res.status}: ${body.slice(0, 200)}`, res.status);
          }

          const text = await res.text();
          let json: unknown;
          try {
            json = JSON.parse(text);
          } catch (err) {
            throw new RemoteRequestError(`Malformed JSON from ${endpoint}`, res.status, { cause: err });
          }
          const parsed = schema.safeParse(json);
          if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new RemoteRequestError(
              `Unexpected response from ${endpoint}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid body'}`,
              res.status,
            );
          }
          return parsed.data;
        } catch (err) {
          if (err instanceof TransientError || err instanceof RemoteRequestError) throw err;
          if (controller.signal.aborted) {
            throw new TransientError(`${endpoint} timed out after ${this.timeoutMs} ms`, null, { cause: err });
          }
          throw new TransientError(`Network error calling ${endpoint}: ${errorMessage(err)}`, null, { cause: err });
        } finally {
          clearTimeout(timer);
        }
      },
      {
        policy: this.retry,
        signal,
        sleep: this.sleep,
        random: this.random,
        onRetry: ({ attempt, delayMs, error }) =>
          this.logger.warn(`${endpoint} attempt ${attempt} failed (${error.message}); retrying in ${delayMs} ms`),
      },
    );
  }

  async listProjects(organization: string, options: RequestOptions = {}): Promise<RemoteProject[]> {
    const projects: RemoteProject[] = [];
    for (let page = 1; ; page++) {
      const body = await this.request(
        'projects/search',
        { organization, qualifiers: 'TRK', ps: String(PROJECTS_PAGE_SIZE), p: String(page) },
        projectsSearchSchema,
        options.signal,
      );
      projects.push(...body.components);
      const total = body.paging?.total ?? 0;
      if (page * PROJECTS_PAGE_SIZE >= total) break;
    }
    return projects;
  }

  async listBranches(projectId: string, options: RequestOptions = {}): Promise<RemoteBranch[]> {
    const body = await this.request('project_branches/list', { project: projectId }, projectBranchesSchema, options.signal);
    return body.branches;
  }

  /**
   * Metric history over [since, until], one page per request. A page's records
   * are yielded only once the whole page arrived, so a retried request never
   * produces the same observation twice.
   */
  async *fetchMetrics(
    projectId: string,
    branch: string,
    since: Date,
    until: Date,
    options: RequestOptions & { metrics?: readonly MetricKey[] } = {},
  ): AsyncGenerator<MetricRecord> {
    const metrics = options.metrics ?? METRIC_KEYS;

    for (let page = 1; ; page++) {
      const body = await this.request(
        'measures/search_history',
        {
          component: projectId,
          branch,
          metrics: metrics.join(','),
          from: isoDate(since),
          to: isoDate(until),
          ps: String(HISTORY_PAGE_SIZE),
          p: String(page),
        },
        searchHistorySchema,
        options.signal,
      );

      const records: MetricRecord[] = [];
      for (const measure of body.measures) {
        if (!isMetricKey(measure.metric)) continue;
        for (const point of measure.history) {
          const value = parseMetricValue(measure.metric, point.value);
          const observedAt = parseRemoteDate(point.date);
          if (value === null || observedAt === null) continue;
          records.push({ projectId, branch, metric: measure.metric, value, observedAt });
        }
      }
      yield* records;

      const total = body.paging?.total ?? 0;
      if (page * HISTORY_PAGE_SIZE >= total) break;
    }
  }

  async getCurrentMeasures(
    projectId: string,
    branch?: string,
    options: RequestOptions = {},
  ): Promise<Partial<Record<MetricKey, number>>> {
    const params: Record<string, string> = { component: projectId, metricKeys: METRIC_KEYS.join(',') };
    if (branch && branch.trim()) params.branch = branch.trim();

    const body = await this.request('measures/component', params, componentMeasuresSchema, options.signal);
    const measures: Partial<Record<MetricKey, number>> = {};
    for (const m of body.component.measures) {
      if (!isMetricKey(m.metric)) continue;
      const value = parseMetricValue(m.metric, m.value);
      if (value !== null) measures[m.metric] = value;
    }
    return measures;
  }

  async getOrganizationSummary(organization: string, options: RequestOptions = {}): Promise<OrganizationSummary> {
    const projects = await this.listProjects(organization, options);
    const summary: OrganizationSummary = {
      totalProjects: projects.length,
      projectsWithData: 0,
      totalBugs: 0,
      totalVulnerabilities: 0,
      totalCodeSmells: 0,
      avgCoverage: 0,
    };

    let coverageSum = 0;
    let coverageCount = 0;
    for (const project of projects) {
      const measures = await this.getCurrentMeasures(project.key, undefined, options);
      if (Object.keys(measures).length === 0) continue;
      summary.projectsWithData++;
      summary.totalBugs += measures.bugs ?? 0;
      summary.totalVulnerabilities += measures.vulnerabilities ?? 0;
      summary.totalCodeSmells += measures.code_smells ?? 0;
      if (measures.coverage !== undefined && measures.coverage > 0) {
        coverageSum += measures.coverage;
        coverageCount++;
      }
    }
    if (coverageCount > 0) summary.avgCoverage = coverageSum / coverageCount;
    return summary;
  }
}
