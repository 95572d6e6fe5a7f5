#!/usr/bin/env node
/**
 * Request retraining by writing the signal file the monitor polls for.
 *
 * Usage: request-retrain [reason]
 */

import { getServiceConfig, initializeConfig } from '../src/config/loader.js';
import { SignalFile } from '../src/retrain/signal-file.js';
import { createLogger, createRootLogger } from '../src/utils/logger.js';

async function main(): Promise<void> {
  initializeConfig({ configPath: process.env.LIFECYCLE_CONFIG });
  const config = getServiceConfig();
  const root = createRootLogger(config.logLevel, config.serviceName);
  const logger = createLogger('RequestRetrainCLI', root);

  const reason = process.argv.slice(2).join(' ').trim() || `requested at ${new Date().toISOString()}`;
  const signalFile = new SignalFile({ path: config.monitor.signalFilePath, logger });

  await signalFile.write(reason);
  logger.info({ path: signalFile.path, reason }, 'Retraining signal written');
}

main().catch((error: unknown) => {
  console.error('Failed to write retrain signal:', error instanceof Error ? error.message : error);
  process.exit(1);
});
