#!/usr/bin/env node
/**
 * Register a trained model version and run the promotion decision.
 *
 * Usage: register-model <artifactRef> <metric> [runId]
 */

import { z } from 'zod';
import { getServiceConfig, initializeConfig } from '../src/config/loader.js';
import { zodErrorToLifecycleError } from '../src/api/errors.js';
import { PromotionEngine } from '../src/promotion/promotion-engine.js';
import { createRegistryClient } from '../src/registry/index.js';
import { createLogger, createRootLogger } from '../src/utils/logger.js';

const ArgsSchema = z.object({
  artifactRef: z.string().min(1, 'artifactRef is required'),
  metric: z.coerce.number().finite(),
  runId: z.string().min(1).optional(),
});

async function main(): Promise<void> {
  const [artifactRef, metric, runId] = process.argv.slice(2);
  const parsed = ArgsSchema.safeParse({ artifactRef, metric, runId });
  if (!parsed.success) {
    console.error('Usage: register-model <artifactRef> <metric> [runId]');
    throw zodErrorToLifecycleError(parsed.error);
  }

  initializeConfig({ configPath: process.env.LIFECYCLE_CONFIG });
  const config = getServiceConfig();
  const root = createRootLogger(config.logLevel, config.serviceName);
  const logger = createLogger('RegisterCLI', root);

  if (config.registry.kind === 'memory') {
    logger.warn('registry.kind is memory: the registration only lives in this process');
  }

  const engine = new PromotionEngine({
    registry: createRegistryClient(config.registry, createLogger('RegistryClient', root)),
    metricName: config.registry.metricName,
    logger: createLogger('PromotionEngine', root),
  });

  const outcome = await engine.registerAndDecide(config.registry.modelName, parsed.data.artifactRef, parsed.data.metric, {
    runId: parsed.data.runId,
  });

  console.log(JSON.stringify(outcome, null, 2));
}

main().catch((error: unknown) => {
  console.error('Registration failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
