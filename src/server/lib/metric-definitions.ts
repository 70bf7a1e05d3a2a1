export const METRIC_KEYS = [
  'coverage',
  'duplicated_lines_density',
  'bugs',
  'reliability_rating',
  'vulnerabilities',
  'security_rating',
  'security_hotspots',
  'security_review_rating',
  'security_hotspots_reviewed',
  'code_smells',
  'sqale_rating',
  'major_violations',
  'minor_violations',
  'violations',
] as const;

export type MetricKey = (typeof METRIC_KEYS)[number];

export type MetricUnit = 'percent' | 'count' | 'rating';

export type MetricDefinition = {
  label: string;
  unit: MetricUnit;
  category: 'coverage' | 'reliability' | 'security' | 'maintainability';
  integer: boolean;
};

export const METRIC_DEFINITIONS: Record<MetricKey, MetricDefinition> = {
  coverage: { label: 'Coverage', unit: 'percent', category: 'coverage', integer: false },
  duplicated_lines_density: { label: 'Duplicated lines', unit: 'percent', category: 'maintainability', integer: false },
  bugs: { label: 'Bugs', unit: 'count', category: 'reliability', integer: true },
  reliability_rating: { label: 'Reliability rating', unit: 'rating', category: 'reliability', integer: false },
  vulnerabilities: { label: 'Vulnerabilities', unit: 'count', category: 'security', integer: true },
  security_rating: { label: 'Security rating', unit: 'rating', category: 'security', integer: false },
  security_hotspots: { label: 'Security hotspots', unit: 'count', category: 'security', integer: true },
  security_review_rating: { label: 'Security review rating', unit: 'rating', category: 'security', integer: false },
  security_hotspots_reviewed: { label: 'Hotspots reviewed', unit: 'percent', category: 'security', integer: false },
  code_smells: { label: 'Code smells', unit: 'count', category: 'maintainability', integer: true },
  sqale_rating: { label: 'Maintainability rating', unit: 'rating', category: 'maintainability', integer: false },
  major_violations: { label: 'Major issues', unit: 'count', category: 'maintainability', integer: true },
  minor_violations: { label: 'Minor issues', unit: 'count', category: 'maintainability', integer: true },
  violations: { label: 'Issues', unit: 'count', category: 'maintainability', integer: true },
};

// Metrics a cached window must contain before it is trusted instead of refetched.
export const REQUIRED_COVERAGE_METRICS: readonly MetricKey[] = [
  'vulnerabilities',
  'security_hotspots',
  'duplicated_lines_density',
  'security_rating',
  'reliability_rating',
];

const METRIC_KEY_SET: ReadonlySet<string> = new Set(METRIC_KEYS);

export function isMetricKey(value: unknown): value is MetricKey {
  return typeof value === 'string' && METRIC_KEY_SET.has(value);
}

/**
 * Parse a metric value as reported by the analysis service ("12", "85.3", "1.0").
 * Counts are truncated to integers; anything non-numeric yields null.
 */
export function parseMetricValue(metric: MetricKey, raw: unknown): number | null {
  if (raw === null || raw === undefined) return null;
  const str = typeof raw === 'number' ? String(raw) : typeof raw === 'string' ? raw.trim() : '';
  if (!str) return null;
  const n = Number(str);
  if (!Number.isFinite(n)) return null;
  return METRIC_DEFINITIONS[metric].integer ? Math.trunc(n) : n;
}
