/**
 * Promotion Engine
 *
 * Registers a freshly trained version and decides, by strict comparison of
 * its metric against the current production metric, whether it takes the
 * `production` alias or is parked as `challenger`.
 *
 * Each call performs exactly one alias mutation. A registry failure after
 * registration leaves the new version without an alias, which is a valid
 * inert state; nothing is rolled back.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { LifecycleError } from '../api/errors.js';
import type { RegistryClient } from '../registry/registry-client.js';
import type { LifecycleMetrics } from '../telemetry/otel.js';
import type { ModelAlias } from '../types/registry.js';

/**
 * Baseline used when no version holds `production` (or it has no metric),
 * so the first registered model with a positive metric is promoted.
 */
export const NO_PRODUCTION_BASELINE = 0;

export interface PromotionDecision {
  newMetric: number;
  baselineMetric: number;
  promoted: boolean;
}

export interface PromotionOutcome {
  modelName: string;
  version: number;
  promoted: boolean;
  alias: ModelAlias;
  decision: PromotionDecision;
}

export interface RegisterOptions {
  runId?: string;
  description?: string;
}

export interface PromotionEngineConfig {
  registry: RegistryClient;
  logger: Logger;
  /** Label used in generated version descriptions (default: 'accuracy') */
  metricName?: string;
  metrics?: LifecycleMetrics;
}

export type PromotionEngineEvents = {
  promotionDecided: (outcome: PromotionOutcome) => void;
};

/**
 * Strictly greater promotes; a tie keeps the incumbent.
 */
export function decidePromotion(newMetric: number, baselineMetric: number): PromotionDecision {
  return {
    newMetric,
    baselineMetric,
    promoted: newMetric > baselineMetric,
  };
}

export class PromotionEngine extends EventEmitter<PromotionEngineEvents> {
  private readonly registry: RegistryClient;
  private readonly logger: Logger;
  private readonly metricName: string;
  private readonly metrics?: LifecycleMetrics;

  constructor(config: PromotionEngineConfig) {
    super();
    this.registry = config.registry;
    this.logger = config.logger;
    this.metricName = config.metricName ?? 'accuracy';
    this.metrics = config.metrics;
  }

  /**
   * Metric of the version holding `production`, or NO_PRODUCTION_BASELINE.
   *
   * @throws {LifecycleError} RegistryUnavailable
   */
  public async currentProductionMetric(modelName: string): Promise<number> {
    const production = await this.registry.getVersionByAlias(modelName, 'production');

    if (production.err) {
      this.logger.info({ modelName }, 'No production model found, using baseline 0.0');
      return NO_PRODUCTION_BASELINE;
    }

    return production.val.metric ?? NO_PRODUCTION_BASELINE;
  }

  /**
   * Register, compare against production, assign one alias.
   *
   * @throws {LifecycleError} InvalidParams for bad input, RegistryUnavailable
   *   when the store cannot be reached
   */
  public async registerAndDecide(
    modelName: string,
    artifactRef: string,
    metric: number,
    options: RegisterOptions = {}
  ): Promise<PromotionOutcome> {
    this.validate(modelName, artifactRef, metric);

    const registered = await this.registry.registerVersion({
      modelName,
      artifactRef,
      metric,
      runId: options.runId,
      description: options.description ?? `${this.metricName}: ${metric.toFixed(4)}`,
    });

    this.logger.info({ modelName, version: registered.version, metric }, 'Registered model version');

    const baselineMetric = await this.currentProductionMetric(modelName);
    const decision = decidePromotion(metric, baselineMetric);
    const alias: ModelAlias = decision.promoted ? 'production' : 'challenger';

    await this.registry.setAlias(modelName, alias, registered.version);

    if (decision.promoted) {
      this.logger.info(
        { modelName, version: registered.version, metric, baselineMetric },
        'New model promoted to production'
      );
    } else {
      this.logger.info(
        { modelName, version: registered.version, metric, baselineMetric },
        'New model not better than production, set as challenger'
      );
    }

    const outcome: PromotionOutcome = {
      modelName,
      version: registered.version,
      promoted: decision.promoted,
      alias,
      decision,
    };

    this.metrics?.promotionDecisions.add(1, { promoted: String(decision.promoted) });
    this.emit('promotionDecided', outcome);

    return outcome;
  }

  private validate(modelName: string, artifactRef: string, metric: number): void {
    if (modelName.trim().length === 0) {
      throw new LifecycleError('InvalidParams', 'Model name must not be empty');
    }
    if (artifactRef.trim().length === 0) {
      throw new LifecycleError('InvalidParams', 'Artifact reference must not be empty', { modelName });
    }
    if (!Number.isFinite(metric)) {
      throw new LifecycleError('InvalidParams', `Metric must be a finite number, got ${metric}`, { modelName });
    }
  }
}
