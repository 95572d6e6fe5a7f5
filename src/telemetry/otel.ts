/**
 * OpenTelemetry metrics for the lifecycle service.
 *
 * Counters and histograms are exported through a Prometheus scrape
 * endpoint. Components receive `LifecycleMetrics` only when telemetry is
 * started; with telemetry disabled they receive `undefined` and skip
 * instrumentation.
 *
 * @module telemetry/otel
 */

import type { Counter, Histogram, Meter } from '@opentelemetry/api';
import { MeterProvider } from '@opentelemetry/sdk-metrics';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import type { Logger } from 'pino';

export interface TelemetryConfig {
  enabled: boolean;
  /** default: 'model-lifecycle-serving' */
  serviceName?: string;
  /** default: 9464 */
  prometheusPort?: number;
  logger?: Logger;
}

/**
 * Instruments recorded by the lifecycle components.
 */
export interface LifecycleMetrics {
  // Serving
  predictionRequests: Counter;
  predictionErrors: Counter;
  modelReloads: Counter;
  modelLoadDuration: Histogram;

  // Retraining
  retrainRequests: Counter;
  retrainJobs: Counter;
  retrainJobDuration: Histogram;
  signalsProcessed: Counter;

  // Promotion
  promotionDecisions: Counter;
}

export class TelemetryManager {
  private readonly enabled: boolean;
  private readonly serviceName: string;
  private readonly prometheusPort: number;
  private readonly logger?: Logger;
  private meterProvider: MeterProvider | null = null;
  private prometheusExporter: PrometheusExporter | null = null;
  private _metrics: LifecycleMetrics | null = null;

  constructor(config: TelemetryConfig) {
    this.enabled = config.enabled;
    this.serviceName = config.serviceName || 'model-lifecycle-serving';
    this.prometheusPort = config.prometheusPort ?? 9464;
    this.logger = config.logger;
  }

  /**
   * Instruments; throws before start().
   */
  public get metrics(): LifecycleMetrics {
    if (!this._metrics) {
      throw new Error('TelemetryManager not started. Call start() first.');
    }
    return this._metrics;
  }

  /**
   * Instruments when started, otherwise undefined.
   */
  public getMetrics(): LifecycleMetrics | undefined {
    return this._metrics ?? undefined;
  }

  public isStarted(): boolean {
    return this._metrics !== null;
  }

  /**
   * Start the Prometheus exporter and create the instruments.
   *
   * @throws {Error} if telemetry is disabled
   */
  public async start(): Promise<void> {
    if (!this.enabled) {
      throw new Error('Telemetry is disabled. Set telemetry.enabled: true in config.');
    }

    if (this._metrics) {
      this.logger?.warn('TelemetryManager already started');
      return;
    }

    try {
      this.prometheusExporter = new PrometheusExporter({ port: this.prometheusPort });
      this.meterProvider = new MeterProvider({ readers: [this.prometheusExporter] });

      const meter = this.meterProvider.getMeter(this.serviceName, '0.1.0');
      this._metrics = TelemetryManager.createMetrics(meter);

      this.logger?.info(
        { serviceName: this.serviceName, endpoint: `http://localhost:${this.prometheusPort}/metrics` },
        'Prometheus metrics available'
      );
    } catch (error) {
      this.logger?.error({ error }, 'Failed to start telemetry');
      throw error;
    }
  }

  /**
   * Flush and stop exporting.
   */
  public async shutdown(): Promise<void> {
    if (!this._metrics) {
      return;
    }

    try {
      // Shuts down its readers, which stops the exporter's HTTP server
      await this.meterProvider?.shutdown();
      this.logger?.info('OpenTelemetry metrics shut down');
    } finally {
      this._metrics = null;
      this.meterProvider = null;
      this.prometheusExporter = null;
    }
  }

  private static createMetrics(meter: Meter): LifecycleMetrics {
    return {
      predictionRequests: meter.createCounter('prediction_requests', {
        description: 'Total prediction requests served',
        unit: '1',
      }),
      predictionErrors: meter.createCounter('prediction_errors', {
        description: 'Prediction requests that failed, by error code',
        unit: '1',
      }),
      modelReloads: meter.createCounter('model_reloads', {
        description: 'Model (re)load attempts, by outcome',
        unit: '1',
      }),
      modelLoadDuration: meter.createHistogram('model_load_duration_ms', {
        description: 'Time to fetch and load the production model',
        unit: 'ms',
      }),
      retrainRequests: meter.createCounter('model_retrain_requests', {
        description: 'Retrain requests, by source',
        unit: '1',
      }),
      retrainJobs: meter.createCounter('model_retrain_jobs', {
        description: 'Retrain jobs executed, by outcome',
        unit: '1',
      }),
      retrainJobDuration: meter.createHistogram('model_retrain_job_duration_ms', {
        description: 'Wall-clock time of retrain jobs',
        unit: 'ms',
      }),
      signalsProcessed: meter.createCounter('retrain_signals_processed', {
        description: 'Retrain signal artifacts claimed by the monitor',
        unit: '1',
      }),
      promotionDecisions: meter.createCounter('promotion_decisions', {
        description: 'Promotion decisions, by result',
        unit: '1',
      }),
    };
  }
}
