/**
 * Model Service (serving layer)
 *
 * Prediction, health and model-info over the ServingState, with the
 * production alias of the registry as the single source of truth for what
 * gets served.
 *
 * Responsibilities:
 * - Lazily load the production model on first use
 * - Coalesce concurrent loads into one registry fetch
 * - Hot-swap on reload(); keep serving the old snapshot when a reload fails
 * - Degrade health/model-info instead of failing
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { LifecycleError, toLifecycleError } from '../api/errors.js';
import { buildAliasTable, type RegistryClient } from '../registry/registry-client.js';
import type { AliasTable, ModelVersion } from '../types/registry.js';
import type { LifecycleMetrics } from '../telemetry/otel.js';
import { lazyLog } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { ModelLoader } from './model-loader.js';
import { ServingState, type ServingSnapshot } from './serving-state.js';

export interface ModelServiceConfig {
  modelName: string;
  registry: RegistryClient;
  loader: ModelLoader;
  /** Number of features every input vector must have */
  featureCount: number;
  /** Upper bound on the load attempted by health() */
  healthLoadTimeoutMs: number;
  logger: Logger;
  state?: ServingState;
  metrics?: LifecycleMetrics;
  clock?: () => number;
}

export interface Prediction {
  label: number;
  /** Version that produced the label */
  version: number;
}

export interface HealthReport {
  status: 'healthy';
  loaded: boolean;
  available: boolean;
  version: number | null;
  modelName: string;
}

export interface ProductionModelInfo {
  available: true;
  modelName: string;
  production: {
    version: number;
    artifactRef: string;
    runId: string | null;
    metric: number | null;
    description: string;
    createdAt: number;
  };
  metrics: Record<string, number>;
  params: Record<string, string>;
  aliases: AliasTable;
  versionCount: number;
  servedVersion: number | null;
}

export interface NoProductionModelInfo {
  available: false;
  modelName: string;
  message: string;
  servedVersion: number | null;
}

export type ModelInfoReport = ProductionModelInfo | NoProductionModelInfo;

export type ModelServiceEvents = {
  modelLoaded: (snapshot: ServingSnapshot, previousVersion: number | null) => void;
  reloadFailed: (error: LifecycleError) => void;
};

export class ModelService extends EventEmitter<ModelServiceEvents> {
  private readonly modelName: string;
  private readonly registry: RegistryClient;
  private readonly loader: ModelLoader;
  private readonly featureCount: number;
  private readonly healthLoadTimeoutMs: number;
  private readonly logger: Logger;
  private readonly state: ServingState;
  private readonly metrics?: LifecycleMetrics;
  private readonly clock: () => number;

  private inFlightLoad: Promise<ServingSnapshot> | null = null;

  constructor(config: ModelServiceConfig) {
    super();
    this.modelName = config.modelName;
    this.registry = config.registry;
    this.loader = config.loader;
    this.featureCount = config.featureCount;
    this.healthLoadTimeoutMs = config.healthLoadTimeoutMs;
    this.logger = config.logger;
    this.state = config.state ?? new ServingState();
    this.metrics = config.metrics;
    this.clock = config.clock ?? Date.now;
  }

  public getModelName(): string {
    return this.modelName;
  }

  /**
   * Warm-up load at startup. Absence of a production model is not an error.
   */
  public async start(): Promise<boolean> {
    const loaded = await this.reload();
    if (!loaded) {
      this.logger.warn({ modelName: this.modelName }, 'No model loaded at startup; will retry on first request');
    }
    return loaded;
  }

  /**
   * Classify one feature vector with the snapshot current at call time.
   *
   * @throws {LifecycleError} InvalidParams for a malformed vector,
   *   ModelUnavailable when nothing is loaded and loading fails
   */
  public async predict(features: readonly number[]): Promise<Prediction> {
    this.validateFeatures(features);

    let snapshot = this.state.get();
    if (!snapshot) {
      try {
        snapshot = await this.loadProduction(false);
      } catch (error) {
        const cause = toLifecycleError(error, 'ModelUnavailable');
        this.metrics?.predictionErrors.add(1, { code: 'ModelUnavailable' });
        throw new LifecycleError('ModelUnavailable', 'Model not available. Please train the model first.', {
          modelName: this.modelName,
          cause: cause.code,
          reason: cause.message,
        });
      }
    }

    const label = snapshot.model.predict(features);
    this.metrics?.predictionRequests.add(1, { version: String(snapshot.version) });
    lazyLog(this.logger, 'debug', () => ({ version: snapshot.version, features, label }), 'Prediction served');

    return { label, version: snapshot.version };
  }

  /**
   * Liveness plus model availability. Attempts a bounded load when nothing
   * is loaded yet; never throws.
   */
  public async health(): Promise<HealthReport> {
    let available = this.state.isLoaded();

    if (!available) {
      try {
        await withTimeout(this.loadProduction(false), this.healthLoadTimeoutMs, 'health check model load');
        available = true;
      } catch (error) {
        lazyLog(
          this.logger,
          'debug',
          () => ({ error: toLifecycleError(error, 'ModelUnavailable').message }),
          'Health check could not load a model'
        );
      }
    }

    return {
      status: 'healthy',
      loaded: this.state.isLoaded(),
      available,
      version: this.state.get()?.version ?? null,
      modelName: this.modelName,
    };
  }

  /**
   * Registry view of the model. A missing production version or an
   * unreachable registry yields `{ available: false }` rather than an error.
   */
  public async modelInfo(): Promise<ModelInfoReport> {
    const servedVersion = this.state.get()?.version ?? null;

    try {
      const production = await this.registry.getVersionByAlias(this.modelName, 'production');
      if (production.err) {
        return {
          available: false,
          modelName: this.modelName,
          message: 'No production model registered',
          servedVersion,
        };
      }

      const version = production.val;
      const versions = await this.registry.listVersions(this.modelName);
      const run = version.runId ? await this.registry.getRunData(version.runId) : undefined;

      return {
        available: true,
        modelName: this.modelName,
        production: {
          version: version.version,
          artifactRef: version.artifactRef,
          runId: version.runId ?? null,
          metric: version.metric,
          description: version.description,
          createdAt: version.createdAt,
        },
        metrics: run?.ok ? run.val.metrics : {},
        params: run?.ok ? run.val.params : {},
        aliases: buildAliasTable(versions),
        versionCount: versions.length,
        servedVersion,
      };
    } catch (error) {
      const lifecycleError = toLifecycleError(error, 'RegistryUnavailable');
      this.logger.warn({ error: lifecycleError.message }, 'Model info unavailable');
      return {
        available: false,
        modelName: this.modelName,
        message: lifecycleError.message,
        servedVersion,
      };
    }
  }

  /**
   * Re-fetch the production version and swap it in.
   *
   * @returns false when the fetch or load failed; the previous snapshot
   *   (if any) keeps serving
   */
  public async reload(): Promise<boolean> {
    try {
      await this.loadProduction(true);
      return true;
    } catch (error) {
      const lifecycleError = toLifecycleError(error, 'ModelUnavailable');
      this.metrics?.modelReloads.add(1, { outcome: 'failed' });
      this.logger.warn(
        {
          modelName: this.modelName,
          servedVersion: this.state.get()?.version ?? null,
          code: lifecycleError.code,
          error: lifecycleError.message,
        },
        'Model reload failed; keeping current model'
      );
      this.emit('reloadFailed', lifecycleError);
      return false;
    }
  }

  public getSnapshot(): ServingSnapshot | null {
    return this.state.get();
  }

  /**
   * Shared entry point for every load.
   *
   * `fresh = false` joins a load already in flight. `fresh = true` (reload)
   * must observe registry state newer than the call, so it queues behind
   * the in-flight load instead of reusing its result.
   */
  private loadProduction(fresh: boolean): Promise<ServingSnapshot> {
    const pending = this.inFlightLoad;
    if (pending && !fresh) {
      return pending;
    }

    const start = pending
      ? pending.then(
          () => undefined,
          // The earlier load's callers receive its failure; here it only orders the next fetch
          () => undefined
        )
      : Promise.resolve();

    const load: Promise<ServingSnapshot> = start
      .then(() => this.fetchAndLoad())
      .finally(() => {
        if (this.inFlightLoad === load) {
          this.inFlightLoad = null;
        }
      });

    this.inFlightLoad = load;
    return load;
  }

  private async fetchAndLoad(): Promise<ServingSnapshot> {
    const startedAt = this.clock();
    const production = await this.registry.getVersionByAlias(this.modelName, 'production');

    if (production.err) {
      throw new LifecycleError('ModelUnavailable', `No production version registered for ${this.modelName}`, {
        modelName: this.modelName,
      });
    }

    const version: ModelVersion = production.val;
    const current = this.state.get();
    if (current && current.version === version.version && current.artifactRef === version.artifactRef) {
      lazyLog(this.logger, 'debug', () => ({ version: version.version }), 'Production version unchanged');
      return current;
    }

    const model = await this.loader.load(version);
    if (model.featureCount !== this.featureCount) {
      throw new LifecycleError(
        'ModelUnavailable',
        `Model ${this.modelName} v${version.version} expects ${model.featureCount} features, service accepts ${this.featureCount}`,
        { version: version.version }
      );
    }

    const published = this.state.swap({
      model,
      modelName: this.modelName,
      version: version.version,
      artifactRef: version.artifactRef,
      loadedAt: this.clock(),
    });

    const durationMs = this.clock() - startedAt;
    this.metrics?.modelReloads.add(1, { outcome: 'loaded' });
    this.metrics?.modelLoadDuration.record(durationMs);
    this.logger.info(
      {
        modelName: this.modelName,
        version: version.version,
        previousVersion: current?.version ?? null,
        metric: version.metric,
        durationMs,
      },
      'Model loaded'
    );
    this.emit('modelLoaded', published, current?.version ?? null);

    return published;
  }

  private validateFeatures(features: readonly number[]): void {
    if (features.length !== this.featureCount) {
      throw new LifecycleError('InvalidParams', `Expected ${this.featureCount} features, got ${features.length}`, {
        expected: this.featureCount,
        received: features.length,
      });
    }

    const invalidIndex = features.findIndex((value) => !Number.isFinite(value));
    if (invalidIndex !== -1) {
      throw new LifecycleError('InvalidParams', `Feature at index ${invalidIndex} is not a finite number`, {
        index: invalidIndex,
      });
    }
  }
}
