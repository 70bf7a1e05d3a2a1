import { DEMO_METRICS, DEMO_PROJECTS, generateDemoRecords } from '../src/server/lib/demo-data';
import { METRIC_DEFINITIONS } from '../src/server/lib/metric-definitions';

const now = new Date('2024-03-10T15:30:00Z');

describe('generateDemoRecords', () => {
  const records = generateDemoRecords({ now });

  it('covers 90 days of every demo metric for each demo project', () => {
    expect(records).toHaveLength(DEMO_PROJECTS.length * 90 * DEMO_METRICS.length);
    expect(new Set(records.map((r) => r.projectId))).toEqual(
      new Set(['demo-project-alpha', 'demo-project-beta', 'demo-project-gamma']),
    );
    expect(new Set(records.map((r) => r.branch))).toEqual(new Set(['main']));
  });

  it('places one observation per day at midnight UTC, ending today', () => {
    const days = [...new Set(records.map((r) => r.observedAt.toISOString()))].sort();
    expect(days).toHaveLength(90);
    expect(days[0]).toBe('2023-12-12T00:00:00.000Z');
    expect(days[89]).toBe('2024-03-10T00:00:00.000Z');
  });

  it('is reproducible for a seed', () => {
    expect(generateDemoRecords({ now, days: 5, seed: 7 })).toEqual(generateDemoRecords({ now, days: 5, seed: 7 }));
    const values = (seed: number) => generateDemoRecords({ now, days: 5, seed }).map((r) => r.value);
    expect(values(7)).not.toEqual(values(8));
  });

  it('keeps values in the range of each metric', () => {
    for (const r of records) {
      const def = METRIC_DEFINITIONS[r.metric];
      expect(Number.isFinite(r.value)).toBe(true);
      expect(r.value).toBeGreaterThanOrEqual(0);
      if (def.integer) expect(Number.isInteger(r.value)).toBe(true);
      if (def.unit === 'percent') expect(r.value).toBeLessThanOrEqual(100);
      if (def.unit === 'rating') {
        expect(r.value).toBeGreaterThanOrEqual(1);
        expect(r.value).toBeLessThanOrEqual(5);
      }
    }
  });
});
