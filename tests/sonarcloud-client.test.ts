import { FetchAbortedError, FetchFailedError, RemoteRequestError, ValidationError } from '../src/server/lib/errors';
import { silentLogger } from '../src/server/lib/log';
import type { MetricRecord } from '../src/server/lib/records';
import { SonarCloudClient, parseRemoteDate, type FetchLike } from '../src/server/lib/sonarcloud-client';

type Call = { url: URL; headers: Record<string, string> };

function json(body: unknown, status = 200, headers: Record<string, string> = {}) {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json', ...headers } });
}

// Never answers; rejects once the client's timeout aborts the request.
function hang(signal: AbortSignal): Promise<Response> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('The operation was aborted')), { once: true });
  });
}

function scripted(steps: Array<(signal: AbortSignal) => Promise<Response>>) {
  const calls: Call[] = [];
  let i = 0;
  const fetch: FetchLike = (url, init) => {
    calls.push({ url: new URL(url), headers: init.headers });
    const step = steps[Math.min(i, steps.length - 1)];
    i++;
    return step(init.signal);
  };
  return { fetch, calls };
}

function client(fetch: FetchLike, waits: number[] = []) {
  return new SonarCloudClient({
    token: 'test-secret',
    baseUrl: 'https://sonar.test/api/',
    timeoutMs: 5,
    retry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 },
    fetch,
    sleep: async (ms) => void waits.push(ms),
    random: () => 0,
    logger: silentLogger,
  });
}

async function collect(iter: AsyncIterable<MetricRecord>): Promise<MetricRecord[]> {
  const out: MetricRecord[] = [];
  for await (const r of iter) out.push(r);
  return out;
}

const since = new Date('2024-03-01T00:00:00Z');
const until = new Date('2024-03-03T00:00:00Z');

const historyPage = {
  paging: { pageIndex: 1, pageSize: 1000, total: 3 },
  measures: [
    {
      metric: 'coverage',
      history: [
        { date: '2024-03-01T10:00:00+0000', value: '81.5' },
        { date: '2024-03-02T10:00:00+0000' },
      ],
    },
    { metric: 'bugs', history: [{ date: '2024-03-01T10:00:00+0000', value: '3' }] },
    { metric: 'ncloc', history: [{ date: '2024-03-01T10:00:00+0000', value: '1200' }] },
  ],
};

describe('SonarCloudClient', () => {
  it('requires a token', () => {
    expect(() => new SonarCloudClient({ token: '  ' })).toThrow(ValidationError);
  });

  it('sends the bearer token and the history query', async () => {
    const { fetch, calls } = scripted([async () => json(historyPage)]);
    await collect(client(fetch).fetchMetrics('my-org_api', 'develop', since, until, { metrics: ['coverage', 'bugs'] }));

    expect(calls).toHaveLength(1);
    const { url, headers } = calls[0];
    expect(url.origin + url.pathname).toBe('https://sonar.test/api/measures/search_history');
    expect(url.searchParams.get('component')).toBe('my-org_api');
    expect(url.searchParams.get('branch')).toBe('develop');
    expect(url.searchParams.get('metrics')).toBe('coverage,bugs');
    expect(url.searchParams.get('from')).toBe('2024-03-01');
    expect(url.searchParams.get('to')).toBe('2024-03-03');
    expect(url.searchParams.get('ps')).toBe('1000');
    expect(url.searchParams.get('p')).toBe('1');
    expect(headers.Authorization).toBe('Bearer test-secret');
  });

  it('maps history points to records and skips points without a value', async () => {
    const { fetch } = scripted([async () => json(historyPage)]);
    const records = await collect(client(fetch).fetchMetrics('proj', 'main', since, until));

    expect(records).toEqual([
      { projectId: 'proj', branch: 'main', metric: 'coverage', value: 81.5, observedAt: new Date('2024-03-01T10:00:00Z') },
      { projectId: 'proj', branch: 'main', metric: 'bugs', value: 3, observedAt: new Date('2024-03-01T10:00:00Z') },
    ]);
  });

  it('returns the result once after timing out twice', async () => {
    const waits: number[] = [];
    const { fetch, calls } = scripted([hang, hang, async () => json(historyPage)]);
    const records = await collect(client(fetch, waits).fetchMetrics('proj', 'main', since, until));

    expect(calls).toHaveLength(3);
    expect(waits).toEqual([50, 100]);
    expect(records).toHaveLength(2);
    expect(new Set(records.map((r) => `${r.metric}@${r.observedAt.toISOString()}`)).size).toBe(2);
  });

  it('waits for Retry-After on 429', async () => {
    const waits: number[] = [];
    const { fetch } = scripted([
      async () => json({ errors: [] }, 429, { 'retry-after': '0.4' }),
      async () => json({ branches: [{ name: 'main', isMain: true }] }),
    ]);
    const branches = await client(fetch, waits).listBranches('proj');
    expect(waits).toEqual([400]);
    expect(branches).toEqual([{ name: 'main', isMain: true }]);
  });

  it('retries 5xx and fails with FetchFailedError when attempts run out', async () => {
    const { fetch, calls } = scripted([async () => json({}, 503)]);
    const err = await client(fetch).listBranches('proj').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FetchFailedError);
    expect(calls).toHaveLength(3);
  });

  it('fails at once on other 4xx answers', async () => {
    const { fetch, calls } = scripted([async () => json({ errors: [{ msg: 'Component not found' }] }, 404)]);
    const err = await client(fetch).listBranches('missing').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RemoteRequestError);
    if (!(err instanceof RemoteRequestError)) return;
    expect(err.status).toBe(404);
    expect(calls).toHaveLength(1);
  });

  it('treats a malformed body as a request error', async () => {
    const { fetch, calls } = scripted([async () => new Response('<html>', { status: 200 })]);
    await expect(client(fetch).listBranches('proj')).rejects.toThrow('Malformed JSON from project_branches/list');
    expect(calls).toHaveLength(1);
  });

  it('rejects a body of the wrong shape', async () => {
    const { fetch } = scripted([async () => json({ branches: [{ isMain: true }] })]);
    await expect(client(fetch).listBranches('proj')).rejects.toBeInstanceOf(RemoteRequestError);
  });

  it('reads every page of history', async () => {
    const page = (p: number) => ({
      paging: { pageIndex: p, pageSize: 1000, total: 1500 },
      measures: [{ metric: 'bugs', history: [{ date: `2024-03-0${p}T00:00:00+0000`, value: String(p) }] }],
    });
    const { fetch, calls } = scripted([async () => json(page(1)), async () => json(page(2))]);
    const records = await collect(client(fetch).fetchMetrics('proj', 'main', since, until));

    expect(calls.map((c) => c.url.searchParams.get('p'))).toEqual(['1', '2']);
    expect(records.map((r) => r.value)).toEqual([1, 2]);
  });

  it('pages through organization projects', async () => {
    const components = (n: number, offset: number) =>
      Array.from({ length: n }, (_, i) => ({ key: `proj-${offset + i}`, name: `Project ${offset + i}` }));
    const { fetch, calls } = scripted([
      async () => json({ paging: { total: 502 }, components: components(500, 0) }),
      async () => json({ paging: { total: 502 }, components: components(2, 500) }),
    ]);
    const projects = await client(fetch).listProjects('my-org');

    expect(projects).toHaveLength(502);
    expect(projects[501]).toEqual({ key: 'proj-501', name: 'Project 501' });
    expect(calls[0].url.searchParams.get('organization')).toBe('my-org');
    expect(calls[1].url.searchParams.get('p')).toBe('2');
  });

  it('reads current measures', async () => {
    const { fetch, calls } = scripted([
      async () =>
        json({
          component: {
            key: 'proj',
            measures: [
              { metric: 'coverage', value: '72.4' },
              { metric: 'code_smells', value: '18' },
              { metric: 'bugs' },
            ],
          },
        }),
    ]);
    const measures = await client(fetch).getCurrentMeasures('proj', 'main');
    expect(measures).toEqual({ coverage: 72.4, code_smells: 18 });
    expect(calls[0].url.searchParams.get('branch')).toBe('main');
  });

  it('stops retrying when the caller aborts during backoff', async () => {
    const controller = new AbortController();
    const { fetch, calls } = scripted([async () => json({}, 500)]);
    const c = new SonarCloudClient({
      token: 'test-secret',
      fetch,
      retry: { maxAttempts: 5, baseDelayMs: 10, maxDelayMs: 10 },
      sleep: async () => controller.abort(),
      logger: silentLogger,
    });
    await expect(c.listBranches('proj', { signal: controller.signal })).rejects.toBeInstanceOf(FetchAbortedError);
    expect(calls).toHaveLength(1);
  });
});

describe('parseRemoteDate', () => {
  it('accepts offsets without a colon', () => {
    expect(parseRemoteDate('2024-03-01T10:00:00+0100')?.toISOString()).toBe('2024-03-01T09:00:00.000Z');
  });

  it('returns null for garbage', () => {
    expect(parseRemoteDate('yesterday')).toBeNull();
  });
});
