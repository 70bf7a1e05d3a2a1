import fs from 'node:fs';
import path from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from './errors';
import { MAX_BATCH_ENTITIES } from './entity-table';
import { DEFAULT_MAX_PROJECTS, DEFAULT_MAX_RETRIEVAL_ROWS } from './metrics-store';
import { DEFAULT_BRANCH, type ProjectIdentity } from './records';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry';
import { DEFAULT_SONARCLOUD_URL, DEFAULT_TIMEOUT_MS } from './sonarcloud-client';

export const CONFIG_FILE_NAME = 'quality-metrics.yaml';

export type StorageProvider = 'azure' | 'postgres' | 'memory';

// Shape of quality-metrics.yaml. Secrets are never read from the file.
const fileSchema = z
  .object({
    sonarcloud: z
      .object({
        base_url: z.string().url().optional(),
        organization: z.string().min(1).optional(),
        timeout_ms: z.number().int().positive().optional(),
        retry: z
          .object({
            max_attempts: z.number().int().min(1).max(10).optional(),
            base_delay_ms: z.number().int().min(0).optional(),
            max_delay_ms: z.number().int().min(0).optional(),
          })
          .optional(),
      })
      .optional(),
    storage: z
      .object({
        provider: z.enum(['azure', 'postgres', 'memory']).optional(),
        table_name: z
          .string()
          .regex(/^[A-Za-z][A-Za-z0-9]{2,62}$/, 'table_name must be 3-63 alphanumeric characters starting with a letter')
          .optional(),
        batch_size: z.number().int().min(1).max(MAX_BATCH_ENTITIES).optional(),
        max_retrieval_rows: z.number().int().positive().optional(),
        max_projects: z.number().int().positive().optional(),
      })
      .optional(),
    sync: z
      .object({
        default_days: z.number().int().min(1).max(3650).optional(),
        projects: z
          .array(
            z.object({
              key: z.string().min(1),
              branch: z.string().min(1).optional(),
            }),
          )
          .optional(),
      })
      .optional(),
  })
  .strict();

export type AppConfig = {
  sonarcloud: {
    baseUrl: string;
    organization: string | null;
    token: string | null;
    timeoutMs: number;
    retry: RetryPolicy;
  };
  storage: {
    provider: StorageProvider;
    tableName: string;
    batchSize: number;
    maxRetrievalRows: number;
    maxProjects: number;
    azureConnectionString: string | null;
    databaseUrl: string | null;
  };
  sync: {
    defaultDays: number;
    projects: ProjectIdentity[];
  };
  serviceToken: string | null;
};

type Env = Record<string, string | undefined>;

function envValue(env: Env, name: string): string | null {
  const v = String(env[name] || '').trim();
  return v ? v : null;
}

function readConfigFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, 'utf8');
  try {
    return yaml.load(raw) ?? {};
  } catch (err) {
    throw new ConfigError(`Could not parse ${filePath}`, { cause: err });
  }
}

export function parseConfig(input: unknown, env: Env = process.env): AppConfig {
  const parsed = fileSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? issue.path.join('.') : 'config';
    throw new ConfigError(`Invalid configuration at ${where}: ${issue ? issue.message : 'unknown error'}`);
  }
  const file = parsed.data;

  const providerOverride = envValue(env, 'QUALITY_METRICS_STORAGE_PROVIDER');
  let provider: StorageProvider = file.storage?.provider ?? 'azure';
  if (providerOverride) {
    const p = z.enum(['azure', 'postgres', 'memory']).safeParse(providerOverride);
    if (!p.success) throw new ConfigError(`Unsupported storage provider: '${providerOverride}'`);
    provider = p.data;
  }

  const retry = file.sonarcloud?.retry;
  const retryPolicy: RetryPolicy = {
    maxAttempts: retry?.max_attempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    baseDelayMs: retry?.base_delay_ms ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: retry?.max_delay_ms ?? DEFAULT_RETRY_POLICY.maxDelayMs,
  };
  if (retryPolicy.maxDelayMs < retryPolicy.baseDelayMs) {
    throw new ConfigError('Invalid configuration at sonarcloud.retry: max_delay_ms is below base_delay_ms');
  }

  return {
    sonarcloud: {
      baseUrl: file.sonarcloud?.base_url ?? DEFAULT_SONARCLOUD_URL,
      organization: envValue(env, 'SONARCLOUD_ORGANIZATION') ?? file.sonarcloud?.organization ?? null,
      token: envValue(env, 'SONARCLOUD_TOKEN'),
      timeoutMs: file.sonarcloud?.timeout_ms ?? DEFAULT_TIMEOUT_MS,
      retry: retryPolicy,
    },
    storage: {
      provider,
      tableName: file.storage?.table_name ?? 'SonarCloudMetrics',
      batchSize: file.storage?.batch_size ?? MAX_BATCH_ENTITIES,
      maxRetrievalRows: file.storage?.max_retrieval_rows ?? DEFAULT_MAX_RETRIEVAL_ROWS,
      maxProjects: file.storage?.max_projects ?? DEFAULT_MAX_PROJECTS,
      azureConnectionString: envValue(env, 'AZURE_STORAGE_CONNECTION_STRING'),
      databaseUrl: envValue(env, 'DATABASE_URL'),
    },
    sync: {
      defaultDays: file.sync?.default_days ?? 30,
      projects: (file.sync?.projects ?? []).map((p) => ({ projectId: p.key, branch: p.branch ?? DEFAULT_BRANCH })),
    },
    serviceToken: envValue(env, 'QUALITY_METRICS_SERVICE_TOKEN'),
  };
}

/**
 * Load `quality-metrics.yaml` from the working directory (or the path in
 * QUALITY_METRICS_CONFIG) and overlay environment variables. A missing file
 * means defaults.
 */
export function loadConfig(options: { cwd?: string; env?: Env } = {}): AppConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const filePath = envValue(env, 'QUALITY_METRICS_CONFIG') ?? path.join(cwd, CONFIG_FILE_NAME);
  return parseConfig(readConfigFile(path.resolve(cwd, filePath)), env);
}

export function requireSonarToken(config: AppConfig): string {
  if (!config.sonarcloud.token) throw new ConfigError('Missing SONARCLOUD_TOKEN');
  return config.sonarcloud.token;
}
