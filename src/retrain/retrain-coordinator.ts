/**
 * Retrain Coordinator
 *
 * Single-flight execution of "run the retrain job, then reload the served
 * model", shared by the signal monitor and the HTTP `/retrain` endpoint.
 *
 * - At most one job runs at a time.
 * - A request arriving while a job runs becomes the follow-up: one more run
 *   started right after the current one. Any further overlapping requests
 *   join that same follow-up.
 * - Every run ends with a reload, whatever the job outcome.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { LifecycleMetrics } from '../telemetry/otel.js';
import { outcomeToError, type JobOutcome, type JobRunner } from './job-runner.js';

export type RetrainSource = 'signal' | 'api' | 'manual';

export interface Reloadable {
  reload(): Promise<boolean>;
}

export interface RetrainRunResult {
  /** Every request the run served, in arrival order */
  reasons: string[];
  outcome: JobOutcome;
  reloaded: boolean;
}

export interface RetrainRequestAck {
  accepted: true;
  /** true when the request waits behind a running job */
  queued: boolean;
}

export interface RetrainCoordinatorConfig {
  jobRunner: JobRunner;
  target: Reloadable;
  jobName: string;
  jobTimeoutMs: number;
  logger: Logger;
  metrics?: LifecycleMetrics;
}

export type RetrainCoordinatorEvents = {
  retrainStarted: (reasons: readonly string[]) => void;
  retrainFinished: (result: RetrainRunResult) => void;
};

interface FollowUp {
  reasons: string[];
  promise: Promise<RetrainRunResult>;
}

export class RetrainCoordinator extends EventEmitter<RetrainCoordinatorEvents> {
  private readonly jobRunner: JobRunner;
  private readonly target: Reloadable;
  private readonly jobName: string;
  private readonly jobTimeoutMs: number;
  private readonly logger: Logger;
  private readonly metrics?: LifecycleMetrics;

  private running: Promise<RetrainRunResult> | null = null;
  private followUp: FollowUp | null = null;

  constructor(config: RetrainCoordinatorConfig) {
    super();
    this.jobRunner = config.jobRunner;
    this.target = config.target;
    this.jobName = config.jobName;
    this.jobTimeoutMs = config.jobTimeoutMs;
    this.logger = config.logger;
    this.metrics = config.metrics;
  }

  public isRunning(): boolean {
    return this.running !== null;
  }

  public hasPendingFollowUp(): boolean {
    return this.followUp !== null;
  }

  /**
   * Enqueue a retrain and return immediately.
   */
  public request(reason: string, source: RetrainSource = 'api'): RetrainRequestAck {
    const { promise, queued } = this.schedule(reason, source);

    promise.catch((error: unknown) => {
      this.logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Retrain run failed');
    });

    return { accepted: true, queued };
  }

  /**
   * Enqueue a retrain and wait for the run that serves it. Never rejects:
   * job failures are reported in the outcome.
   */
  public runNow(reason: string, source: RetrainSource = 'manual'): Promise<RetrainRunResult> {
    return this.schedule(reason, source).promise;
  }

  /**
   * Resolves once no run is active or queued.
   */
  public async idle(): Promise<void> {
    while (this.running || this.followUp) {
      await (this.followUp?.promise ?? this.running);
    }
  }

  private schedule(reason: string, source: RetrainSource): { promise: Promise<RetrainRunResult>; queued: boolean } {
    this.metrics?.retrainRequests.add(1, { source });

    if (this.followUp) {
      this.followUp.reasons.push(reason);
      this.logger.info({ reason, source, pending: this.followUp.reasons.length }, 'Retrain request joined pending follow-up');
      return { promise: this.followUp.promise, queued: true };
    }

    const current = this.running;
    if (!current) {
      return { promise: this.startRun([reason]), queued: false };
    }

    const reasons = [reason];
    const promise = current.then(() => this.startRun(reasons));
    this.followUp = { reasons, promise };
    this.logger.info({ reason, source }, 'Retrain already running; follow-up queued');

    return { promise, queued: true };
  }

  private startRun(reasons: string[]): Promise<RetrainRunResult> {
    if (this.followUp?.reasons === reasons) {
      this.followUp = null;
    }

    const run = this.execute(reasons).finally(() => {
      if (this.running === run) {
        this.running = null;
      }
    });
    this.running = run;

    return run;
  }

  private async execute(reasons: string[]): Promise<RetrainRunResult> {
    this.logger.info({ jobName: this.jobName, reasons }, 'Starting model retraining');
    this.emit('retrainStarted', reasons);

    let outcome: JobOutcome;
    try {
      outcome = await this.jobRunner.trigger(this.jobName, { timeoutMs: this.jobTimeoutMs });
    } catch (error) {
      outcome = {
        status: 'failed',
        exitCode: null,
        reason: error instanceof Error ? error.message : String(error),
        durationMs: 0,
      };
    }

    this.metrics?.retrainJobs.add(1, { outcome: outcome.status });
    this.metrics?.retrainJobDuration.record(outcome.durationMs);

    const failure = outcomeToError(this.jobName, outcome);
    if (failure) {
      this.logger.error({ code: failure.code, ...failure.details }, failure.message);
    }

    let reloaded = false;
    try {
      reloaded = await this.target.reload();
    } catch (error) {
      this.logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Reload after retraining failed');
    }

    this.logger.info({ jobName: this.jobName, outcome: outcome.status, reloaded }, 'Retrain run finished');

    const result: RetrainRunResult = { reasons: [...reasons], outcome, reloaded };
    this.emit('retrainFinished', result);
    return result;
  }
}
