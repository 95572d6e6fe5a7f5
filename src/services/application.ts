import type { Logger } from 'pino';
import { ApiServer } from '../api/server.js';
import { toLifecycleError } from '../api/errors.js';
import type { ServiceConfig } from '../config/loader.js';
import { PromotionEngine } from '../promotion/promotion-engine.js';
import { createRegistryClient } from '../registry/index.js';
import type { RegistryClient } from '../registry/registry-client.js';
import { CommandJobRunner, type JobRunner } from '../retrain/job-runner.js';
import { RetrainCoordinator } from '../retrain/retrain-coordinator.js';
import { RetrainMonitor } from '../retrain/retrain-monitor.js';
import { SignalFile } from '../retrain/signal-file.js';
import { JsonModelLoader, type ModelLoader } from '../serving/model-loader.js';
import { ModelService } from '../serving/model-service.js';
import { TelemetryManager } from '../telemetry/otel.js';
import { FEATURE_NAMES } from '../types/schemas/prediction.js';
import { createLogger, getRootLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

export interface LifecycleApplicationOptions {
  config: ServiceConfig;
  logger?: Logger;
  registry?: RegistryClient;
  loader?: ModelLoader;
  jobRunner?: JobRunner;
  /** Upper bound on waiting for an in-flight monitor iteration at shutdown */
  shutdownTimeoutMs?: number;
}

export interface StartOptions {
  /** default: true */
  server?: boolean;
  /** default: monitor.enabled */
  monitor?: boolean;
}

/**
 * Composition root: builds every component from configuration and owns
 * their start/stop order.
 */
export class LifecycleApplication {
  public readonly registry: RegistryClient;
  public readonly modelService: ModelService;
  public readonly promotionEngine: PromotionEngine;
  public readonly coordinator: RetrainCoordinator;
  public readonly monitor: RetrainMonitor;
  public readonly signalFile: SignalFile;
  public readonly server: ApiServer;

  private readonly config: ServiceConfig;
  private readonly logger: Logger;
  private readonly telemetry: TelemetryManager;
  private readonly shutdownTimeoutMs: number;

  private startPromise: Promise<void> | null = null;
  private shutdownPromise: Promise<void> | null = null;
  private monitorStarted = false;
  private serverStarted = false;

  private constructor(options: LifecycleApplicationOptions, telemetry: TelemetryManager) {
    const { config } = options;
    const logger = options.logger ?? getRootLogger();
    const metrics = telemetry.getMetrics();

    this.config = config;
    this.logger = createLogger('LifecycleApplication', logger);
    this.telemetry = telemetry;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 10_000;

    this.registry = options.registry ?? createRegistryClient(config.registry, createLogger('RegistryClient', logger));

    this.modelService = new ModelService({
      modelName: config.registry.modelName,
      registry: this.registry,
      loader: options.loader ?? new JsonModelLoader({ artifactRoot: config.serving.artifactRoot }),
      featureCount: FEATURE_NAMES.length,
      healthLoadTimeoutMs: config.serving.healthLoadTimeoutMs,
      logger: createLogger('ModelService', logger),
      metrics,
    });

    this.promotionEngine = new PromotionEngine({
      registry: this.registry,
      metricName: config.registry.metricName,
      logger: createLogger('PromotionEngine', logger),
      metrics,
    });

    this.coordinator = new RetrainCoordinator({
      jobRunner:
        options.jobRunner ?? new CommandJobRunner({ jobs: config.jobs, logger: createLogger('JobRunner', logger) }),
      target: this.modelService,
      jobName: config.monitor.jobName,
      jobTimeoutMs: config.monitor.jobTimeoutMs,
      logger: createLogger('RetrainCoordinator', logger),
      metrics,
    });

    this.signalFile = new SignalFile({
      path: config.monitor.signalFilePath,
      logger: createLogger('SignalFile', logger),
    });

    this.monitor = new RetrainMonitor({
      signalFile: this.signalFile,
      coordinator: this.coordinator,
      checkIntervalMs: config.monitor.checkIntervalMs,
      logger: createLogger('RetrainMonitor', logger),
      metrics,
    });

    this.server = new ApiServer(
      this.modelService,
      this.coordinator,
      { port: config.serving.port, bindAddress: config.serving.bindAddress },
      createLogger('ApiServer', logger)
    );
  }

  /**
   * Build the application. Telemetry starts first so every component is
   * created with its instruments.
   */
  public static async create(options: LifecycleApplicationOptions): Promise<LifecycleApplication> {
    const logger = options.logger ?? getRootLogger();
    const telemetry = new TelemetryManager({
      enabled: options.config.telemetry.enabled,
      serviceName: options.config.telemetry.serviceName,
      prometheusPort: options.config.telemetry.prometheusPort,
      logger: createLogger('Telemetry', logger),
    });

    if (options.config.telemetry.enabled) {
      await telemetry.start();
    }

    return new LifecycleApplication(options, telemetry);
  }

  public async start(options: StartOptions = {}): Promise<void> {
    if (this.shutdownPromise) {
      throw new Error('Application is shutting down');
    }
    if (!this.startPromise) {
      this.startPromise = this.doStart(options);
    }
    return this.startPromise;
  }

  public async shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.doShutdown();
    }
    return this.shutdownPromise;
  }

  private async doStart(options: StartOptions): Promise<void> {
    const withServer = options.server ?? true;
    const withMonitor = options.monitor ?? this.config.monitor.enabled;

    this.logger.info(
      { modelName: this.config.registry.modelName, registry: this.config.registry.kind, withServer, withMonitor },
      'Starting model lifecycle service'
    );

    if (withServer) {
      await this.modelService.start();
      await this.server.start();
      this.serverStarted = true;
    }

    if (withMonitor) {
      this.monitor.start();
      this.monitorStarted = true;
    }
  }

  private async doShutdown(): Promise<void> {
    this.logger.info('Shutting down model lifecycle service');

    await this.startPromise?.then(
      () => undefined,
      (error: unknown) => {
        this.logger.warn({ error: toLifecycleError(error, 'ConfigError').message }, 'Startup had failed before shutdown');
      }
    );

    if (this.monitorStarted) {
      try {
        await withTimeout(this.monitor.stop(), this.shutdownTimeoutMs, 'monitor stop');
      } catch (error) {
        this.logger.warn({ error: toLifecycleError(error, 'Timeout').message }, 'Monitor iteration still running at shutdown');
      }
    }

    if (this.serverStarted) {
      await this.server.stop();
    }

    await this.telemetry.shutdown();
  }
}
