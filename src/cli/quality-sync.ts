/**
 * quality-sync
 *
 * Fetches metric history for one or more (project, branch) identities into the
 * configured table store. Also seeds demo data and rebuilds the metadata index.
 *
 * Examples:
 *   SONARCLOUD_TOKEN=... quality-sync --project my-org_api --branch develop --days 60
 *   SONARCLOUD_TOKEN=... quality-sync --all --force
 *   QUALITY_METRICS_STORAGE_PROVIDER=memory quality-sync --seed-demo
 *   quality-sync --rebuild-index --prune
 */

import { loadConfig, requireSonarToken, type AppConfig } from '../server/lib/config';
import { generateDemoRecords } from '../server/lib/demo-data';
import { consoleLogger, type Logger } from '../server/lib/log';
import type { MetricsStore } from '../server/lib/metrics-store';
import { DEFAULT_BRANCH, type ProjectIdentity } from '../server/lib/records';
import { SonarCloudClient, type MetricsSource } from '../server/lib/sonarcloud-client';
import { createMetricsStore } from '../server/lib/storage-factory';
import { syncProject } from '../server/lib/sync';

export type SyncArgs = {
  projects: ProjectIdentity[];
  all: boolean;
  days: number | null;
  force: boolean;
  seedDemo: boolean;
  rebuildIndex: boolean;
  prune: boolean;
};

export function parseArgs(argv: string[]): SyncArgs {
  const out: SyncArgs = {
    projects: [],
    all: false,
    days: null,
    force: false,
    seedDemo: false,
    rebuildIndex: false,
    prune: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    const next = () => {
      const v = argv[i + 1];
      if (!v || v.startsWith('--')) throw new Error(`Missing value for ${a}`);
      i++;
      return v;
    };

    if (a === '--project') out.projects.push({ projectId: next(), branch: DEFAULT_BRANCH });
    else if (a === '--branch') {
      const last = out.projects[out.projects.length - 1];
      if (!last) throw new Error('--branch must follow --project');
      last.branch = next();
    } else if (a === '--all') out.all = true;
    else if (a === '--days') {
      const raw = next();
      const days = Number(raw);
      if (!Number.isInteger(days) || days < 1) throw new Error(`Invalid --days: ${raw}`);
      out.days = days;
    } else if (a === '--force') out.force = true;
    else if (a === '--seed-demo') out.seedDemo = true;
    else if (a === '--rebuild-index') out.rebuildIndex = true;
    else if (a === '--prune') out.prune = true;
    else throw new Error(`Unknown arg: ${a}`);
  }

  if (out.prune && !out.rebuildIndex) throw new Error('--prune requires --rebuild-index');
  return out;
}

export type MainDeps = {
  config?: AppConfig;
  store?: MetricsStore;
  source?: MetricsSource;
  logger?: Logger;
  now?: Date;
};

/** Runs the requested steps in order: seed, rebuild, sync. Resolves to the process exit code. */
export async function main(argv: string[] = process.argv.slice(2), deps: MainDeps = {}): Promise<number> {
  const args = parseArgs(argv);
  const logger = deps.logger ?? consoleLogger;
  const config = deps.config ?? loadConfig();

  const targets: ProjectIdentity[] = [...args.projects];
  if (args.all) {
    if (config.sync.projects.length === 0) throw new Error('--all given but quality-metrics.yaml lists no sync.projects');
    targets.push(...config.sync.projects);
  }
  if (!args.seedDemo && !args.rebuildIndex && targets.length === 0) {
    throw new Error('Nothing to do. Pass --project <key>, --all, --seed-demo or --rebuild-index');
  }

  const store = deps.store ?? (await createMetricsStore(config, { logger }));
  logger.info(`Using ${store.provider} storage`);

  if (args.seedDemo) {
    const records = generateDemoRecords({ now: deps.now });
    const result = await store.writeBatch(records);
    logger.info(`Seeded ${result.written} demo record(s) across ${result.partitions} project(s)`);
  }

  if (args.rebuildIndex) {
    const result = await store.rebuildIndex({ prune: args.prune });
    logger.info(
      `Index rebuilt: ${result.identities} identities from ${result.scanned} row(s); created ${result.created}, pruned ${result.pruned}`,
    );
  }

  if (targets.length === 0) return 0;

  const source =
    deps.source ??
    new SonarCloudClient({
      token: requireSonarToken(config),
      baseUrl: config.sonarcloud.baseUrl,
      timeoutMs: config.sonarcloud.timeoutMs,
      retry: config.sonarcloud.retry,
      logger,
    });

  let failures = 0;
  for (const target of targets) {
    const result = await syncProject(
      { store, source, logger },
      {
        projectId: target.projectId,
        branch: target.branch,
        days: args.days ?? config.sync.defaultDays,
        force: args.force,
        now: deps.now,
      },
    );
    if (!result.ok) {
      failures++;
      logger.error(`${target.projectId} / ${target.branch}: ${result.reason}`);
      continue;
    }
    const note = result.stale ? ` (stale: ${result.warning ?? 'remote fetch failed'})` : '';
    logger.info(
      `${target.projectId} / ${target.branch}: ${result.rows.length} row(s) from ${result.source}${result.truncated ? ', truncated' : ''}${note}`,
    );
  }

  return failures > 0 ? 1 : 0;
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((err) => {
      console.error(err instanceof Error ? err.message : err);
      process.exit(1);
    });
}
