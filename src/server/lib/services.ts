import { loadConfig, type AppConfig } from './config';
import { consoleLogger, type Logger } from './log';
import type { MetricsStore } from './metrics-store';
import { SonarCloudClient } from './sonarcloud-client';
import { createMetricsStore } from './storage-factory';

export type QualityServices = {
  config: AppConfig;
  store: MetricsStore;
  /** Null when no SONARCLOUD_TOKEN is configured; the API then serves cached data only. */
  client: SonarCloudClient | null;
  logger: Logger;
};

let services: Promise<QualityServices> | null = null;

export async function buildQualityServices(config: AppConfig, logger: Logger = consoleLogger): Promise<QualityServices> {
  const store = await createMetricsStore(config, { logger });
  const client = config.sonarcloud.token
    ? new SonarCloudClient({
        token: config.sonarcloud.token,
        baseUrl: config.sonarcloud.baseUrl,
        timeoutMs: config.sonarcloud.timeoutMs,
        retry: config.sonarcloud.retry,
        logger,
      })
    : null;
  return { config, store, client, logger };
}

/** Process-wide services for the route handlers, built from the environment on first use. */
export function getQualityServices(): Promise<QualityServices> {
  if (!services) {
    services = buildQualityServices(loadConfig()).catch((err: unknown) => {
      services = null;
      throw err;
    });
  }
  return services;
}

export function setQualityServices(next: QualityServices | null): void {
  services = next ? Promise.resolve(next) : null;
}
