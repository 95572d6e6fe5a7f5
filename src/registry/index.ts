import type { Logger } from 'pino';
import { LifecycleError } from '../api/errors.js';
import type { ServiceConfig } from '../config/loader.js';
import { InMemoryRegistry } from './in-memory-registry.js';
import { MlflowRegistryClient } from './mlflow-registry-client.js';
import type { RegistryClient } from './registry-client.js';

export { InMemoryRegistry } from './in-memory-registry.js';
export { MlflowRegistryClient, MlflowHttpError } from './mlflow-registry-client.js';
export { NotFound, buildAliasTable, type RegistryClient } from './registry-client.js';

/**
 * Build the registry adapter selected by `registry.kind`.
 */
export function createRegistryClient(config: ServiceConfig['registry'], logger: Logger): RegistryClient {
  switch (config.kind) {
    case 'memory':
      return new InMemoryRegistry({ metricName: config.metricName });
    case 'mlflow':
      if (!config.trackingUri) {
        throw new LifecycleError('ConfigError', 'registry.tracking_uri is required for the mlflow registry');
      }
      return new MlflowRegistryClient({
        trackingUri: config.trackingUri,
        metricName: config.metricName,
        requestTimeoutMs: config.requestTimeoutMs,
        retry: config.retry,
        logger,
      });
  }
}
