import type { MetricKey } from './metric-definitions';

/** One measurement of one metric for a (project, branch) identity. */
export type MetricRecord = {
  projectId: string;
  branch: string;
  metric: MetricKey;
  value: number;
  observedAt: Date;
};

/** Tabular row handed to the presentation layer. */
export type MetricRow = {
  projectId: string;
  branch: string;
  metric: MetricKey;
  value: number;
  observedAt: string;
};

export type ProjectIdentity = {
  projectId: string;
  branch: string;
};

export const DEFAULT_BRANCH = 'main';

export function toMetricRow(record: MetricRecord): MetricRow {
  return {
    projectId: record.projectId,
    branch: record.branch,
    metric: record.metric,
    value: record.value,
    observedAt: record.observedAt.toISOString(),
  };
}
