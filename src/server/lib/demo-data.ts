import type { MetricKey } from './metric-definitions';
import { DEFAULT_BRANCH, type MetricRecord } from './records';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEMO_PROJECTS = [
  { key: 'demo-project-alpha', name: 'Frontend Web Application' },
  { key: 'demo-project-beta', name: 'Backend API' },
  { key: 'demo-project-gamma', name: 'Mobile App' },
] as const;

export const DEMO_METRICS = [
  'vulnerabilities',
  'security_hotspots',
  'bugs',
  'duplicated_lines_density',
  'coverage',
  'security_rating',
  'reliability_rating',
  'sqale_rating',
  'code_smells',
  'violations',
  'major_violations',
  'minor_violations',
] as const satisfies readonly MetricKey[];

type DemoMetric = (typeof DEMO_METRICS)[number];

export type DemoOptions = {
  days?: number;
  now?: Date;
  seed?: number;
};

// mulberry32
function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function normal(random: () => number, stddev: number): number {
  const u = 1 - random();
  const v = random();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v) * stddev;
}

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

/**
 * Synthetic daily history for the demo projects on the default branch: a
 * baseline per project that drifts on a slow wave, quieter on weekends.
 * The same seed and `now` always produce the same records.
 */
export function generateDemoRecords(options: DemoOptions = {}): MetricRecord[] {
  const days = options.days ?? 90;
  const now = options.now ?? new Date();
  const random = seededRandom(options.seed ?? 42);
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());

  const records: MetricRecord[] = [];
  for (const project of DEMO_PROJECTS) {
    const baseVulnerabilities = 5 + Math.floor(random() * 15);
    const baseHotspots = 20 + Math.floor(random() * 30);
    const baseBugs = 10 + Math.floor(random() * 20);
    const baseDuplication = 2 + random() * 13;

    for (let i = 0; i < days; i++) {
      const observedAt = new Date(today - (days - 1 - i) * DAY_MS);
      let drift = Math.sin(i / 10) * 5 + normal(random, 2);
      const weekday = observedAt.getUTCDay();
      if (weekday === 0 || weekday === 6) drift *= 0.1;

      const vulnerabilities = Math.max(0, Math.trunc(baseVulnerabilities + drift));
      const bugs = Math.max(0, Math.trunc(baseBugs + drift));
      const duplication = Math.max(0, baseDuplication + drift / 5);

      const values: Record<DemoMetric, number> = {
        vulnerabilities,
        security_hotspots: Math.max(0, Math.trunc(baseHotspots + drift * 2)),
        bugs,
        duplicated_lines_density: round1(duplication),
        coverage: round1(Math.max(50, Math.min(100, 85 + normal(random, 3)))),
        security_rating: vulnerabilities === 0 ? 1 : round1(Math.min(5, 1 + vulnerabilities / 5)),
        reliability_rating: bugs === 0 ? 1 : round1(Math.min(5, 1 + bugs / 10)),
        sqale_rating: round1(Math.max(1, Math.min(5, 1 + duplication / 5))),
        code_smells: Math.max(0, Math.trunc(100 + drift * 10)),
        violations: Math.max(0, Math.trunc(150 + drift * 15)),
        major_violations: Math.max(0, Math.trunc(30 + drift * 5)),
        minor_violations: Math.max(0, Math.trunc(120 + drift * 10)),
      };

      for (const metric of DEMO_METRICS) {
        records.push({ projectId: project.key, branch: DEFAULT_BRANCH, metric, value: values[metric], observedAt });
      }
    }
  }
  return records;
}
