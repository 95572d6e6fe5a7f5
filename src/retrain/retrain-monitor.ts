/**
 * Retrain Trigger Monitor
 *
 * Polls for the retrain signal artifact at a fixed interval. When the
 * signal is present it is claimed and deleted, the retrain job runs through
 * the shared coordinator, and the served model is reloaded whatever the job
 * outcome. Errors are contained to one iteration; the loop only ends on
 * stop().
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { toLifecycleError, type LifecycleError } from '../api/errors.js';
import type { LifecycleMetrics } from '../telemetry/otel.js';
import type { RetrainCoordinator, RetrainRunResult } from './retrain-coordinator.js';
import type { RetrainSignal, SignalFile } from './signal-file.js';

export type PollResult = 'idle' | 'processed' | 'failed';

export interface RetrainMonitorConfig {
  signalFile: SignalFile;
  coordinator: RetrainCoordinator;
  checkIntervalMs: number;
  logger: Logger;
  metrics?: LifecycleMetrics;
}

export type RetrainMonitorEvents = {
  signalDetected: (signal: RetrainSignal) => void;
  signalProcessed: (signal: RetrainSignal, result: RetrainRunResult) => void;
  iterationFailed: (error: LifecycleError) => void;
};

const DEFAULT_REASON = 'retrain signal';

export class RetrainMonitor extends EventEmitter<RetrainMonitorEvents> {
  private readonly signalFile: SignalFile;
  private readonly coordinator: RetrainCoordinator;
  private readonly checkIntervalMs: number;
  private readonly logger: Logger;
  private readonly metrics?: LifecycleMetrics;

  private active = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  /** Bumped on every start; a loop from an earlier start stops rescheduling */
  private generation = 0;

  constructor(config: RetrainMonitorConfig) {
    super();
    this.signalFile = config.signalFile;
    this.coordinator = config.coordinator;
    this.checkIntervalMs = config.checkIntervalMs;
    this.logger = config.logger;
    this.metrics = config.metrics;
  }

  public isActive(): boolean {
    return this.active;
  }

  public start(): void {
    if (this.active) {
      this.logger.warn('Retrain monitor already running');
      return;
    }

    this.active = true;
    const generation = ++this.generation;
    this.logger.info(
      { signalFile: this.signalFile.path, checkIntervalMs: this.checkIntervalMs },
      'Starting retraining monitor'
    );

    const pending = this.inFlight;
    if (!pending) {
      this.scheduleNext(generation, 0);
      return;
    }

    // Restarted while the previous loop's iteration is still running
    const resumed = pending.then(() => {
      if (this.inFlight === resumed) {
        this.inFlight = null;
      }
      this.scheduleNext(generation, 0);
    });
    this.inFlight = resumed;
  }

  /**
   * Stop polling and wait for the iteration in flight, if any.
   */
  public async stop(): Promise<void> {
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.logger.info('Retraining monitor stopped');
  }

  /**
   * One monitor iteration. Never rejects.
   */
  public async pollOnce(): Promise<PollResult> {
    try {
      if (!(await this.signalFile.exists())) {
        return 'idle';
      }

      const signal = await this.signalFile.claim();
      if (!signal) {
        // Claimed by another monitor between the check and the claim
        return 'idle';
      }

      this.metrics?.signalsProcessed.add(1);
      this.logger.info({ path: signal.path, payload: signal.payload }, 'Retraining signal detected');
      if (signal.readError) {
        this.logger.warn({ code: signal.readError.code, error: signal.readError.message }, 'Signal content unreadable');
      }
      this.emit('signalDetected', signal);

      const result = await this.coordinator.runNow(signal.payload || DEFAULT_REASON, 'signal');
      this.emit('signalProcessed', signal, result);

      return 'processed';
    } catch (error) {
      const lifecycleError = toLifecycleError(error, 'SignalReadError');
      this.logger.error({ code: lifecycleError.code, error: lifecycleError.message }, 'Error in monitor iteration');
      this.emit('iterationFailed', lifecycleError);
      return 'failed';
    }
  }

  private scheduleNext(generation: number, delayMs: number): void {
    if (!this.active || generation !== this.generation) {
      return;
    }
    this.timer = setTimeout(() => this.tick(generation), delayMs);
  }

  private tick(generation: number): void {
    this.timer = null;
    const iteration = this.pollOnce().then(() => {
      if (this.inFlight === iteration) {
        this.inFlight = null;
      }
      this.scheduleNext(generation, this.checkIntervalMs);
    });
    this.inFlight = iteration;
  }
}
