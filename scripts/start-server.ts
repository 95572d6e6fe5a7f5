#!/usr/bin/env node
/**
 * Server Startup Script
 *
 * Serves predictions over HTTP and, when monitor.enabled is set, runs the
 * retrain monitor in the same process.
 */

import { getServiceConfig, initializeConfig } from '../src/config/loader.js';
import { LifecycleApplication } from '../src/services/application.js';
import { createLogger, createRootLogger } from '../src/utils/logger.js';
import { installShutdownHandlers } from './lib/shutdown.js';

async function main(): Promise<void> {
  initializeConfig({ configPath: process.env.LIFECYCLE_CONFIG });
  const config = getServiceConfig();
  const root = createRootLogger(config.logLevel, config.serviceName);
  const logger = createLogger('ServerCLI', root);

  const app = await LifecycleApplication.create({ config, logger: root });
  installShutdownHandlers(app, logger);

  await app.start({ server: true, monitor: config.monitor.enabled });

  const address = app.server.getAddress();
  logger.info(
    {
      port: address?.port ?? config.serving.port,
      modelName: config.registry.modelName,
      monitor: config.monitor.enabled,
      endpoints: ['POST /predict', 'GET /health', 'GET /model/info', 'POST /retrain'],
    },
    'Model server is ready'
  );
}

main().catch((error: unknown) => {
  console.error('Failed to start model server:', error);
  process.exit(1);
});
