/**
 * Job Runner
 *
 * Starts a named retraining job and reports how it ended. Job definitions
 * are static configuration (`jobs.<name>`), resolved when the runner is
 * built; no request data ever reaches the command line.
 *
 * On timeout the job is abandoned, not killed: the outcome is reported as
 * `timed_out` and the process is left to finish (its exit is still logged).
 */

import { execa } from 'execa';
import type { Logger } from 'pino';
import { LifecycleError } from '../api/errors.js';
import { withTimeout } from '../utils/timeout.js';

export interface JobDefinition {
  command: string;
  args: string[];
  cwd: string;
}

export type JobOutcome =
  | { status: 'succeeded'; durationMs: number }
  | { status: 'failed'; exitCode: number | null; reason: string; durationMs: number }
  | { status: 'timed_out'; timeoutMs: number; durationMs: number };

export interface TriggerOptions {
  timeoutMs: number;
}

export interface JobRunner {
  trigger(jobName: string, options: TriggerOptions): Promise<JobOutcome>;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  failed: boolean;
}

/**
 * Runs a command to completion. Must resolve (not reject) for a non-zero
 * exit; rejection is reserved for failures to start.
 */
export type CommandExecutor = (command: string, args: readonly string[], options: { cwd: string }) => Promise<CommandResult>;

export const OUTPUT_TAIL_LENGTH = 500;

export function outputTail(output: string, length = OUTPUT_TAIL_LENGTH): string {
  return output.length > length ? output.slice(-length) : output;
}

export const execaExecutor: CommandExecutor = async (command, args, { cwd }) => {
  const result = await execa(command, [...args], { cwd, reject: false, stdin: 'ignore' });
  return {
    exitCode: typeof result.exitCode === 'number' ? result.exitCode : null,
    stdout: result.stdout,
    stderr: result.stderr,
    failed: result.failed,
  };
};

/**
 * Outcome as the error a caller can rethrow, or null on success.
 */
export function outcomeToError(jobName: string, outcome: JobOutcome): LifecycleError | null {
  switch (outcome.status) {
    case 'succeeded':
      return null;
    case 'failed':
      return new LifecycleError('RetrainJobFailed', `Job ${jobName} failed: ${outcome.reason}`, {
        jobName,
        exitCode: outcome.exitCode,
      });
    case 'timed_out':
      return new LifecycleError('RetrainJobTimedOut', `Job ${jobName} timed out after ${outcome.timeoutMs}ms`, {
        jobName,
        timeoutMs: outcome.timeoutMs,
      });
  }
}

export interface CommandJobRunnerConfig {
  jobs: Record<string, JobDefinition>;
  logger: Logger;
  executor?: CommandExecutor;
  clock?: () => number;
}

export class CommandJobRunner implements JobRunner {
  private readonly jobs: ReadonlyMap<string, Readonly<JobDefinition>>;
  private readonly logger: Logger;
  private readonly executor: CommandExecutor;
  private readonly clock: () => number;
  /** Timed-out runs whose process may still be alive, by job name */
  private readonly abandoned = new Map<string, Promise<void>>();

  constructor(config: CommandJobRunnerConfig) {
    this.jobs = new Map(
      Object.entries(config.jobs).map(([name, job]) => [name, Object.freeze({ ...job, args: [...job.args] })])
    );
    this.logger = config.logger;
    this.executor = config.executor ?? execaExecutor;
    this.clock = config.clock ?? Date.now;
  }

  public hasJob(jobName: string): boolean {
    return this.jobs.has(jobName);
  }

  public async trigger(jobName: string, options: TriggerOptions): Promise<JobOutcome> {
    const startedAt = this.clock();
    const job = this.jobs.get(jobName);

    if (!job) {
      this.logger.error({ jobName }, 'Unknown job');
      return { status: 'failed', exitCode: null, reason: `Unknown job: ${jobName}`, durationMs: 0 };
    }

    const previous = this.abandoned.get(jobName);
    if (previous) {
      this.logger.warn({ jobName }, 'Waiting for a timed-out run of the job to exit');
      try {
        await withTimeout(previous, options.timeoutMs, `earlier run of job ${jobName}`);
      } catch (error) {
        const reason = `Job ${jobName} is still running from an earlier trigger`;
        this.logger.error(
          { jobName, error: error instanceof Error ? error.message : String(error) },
          'Timed-out run did not exit; not starting another'
        );
        return { status: 'failed', exitCode: null, reason, durationMs: this.clock() - startedAt };
      }
    }

    this.logger.info({ jobName, command: job.command, args: job.args, cwd: job.cwd }, 'Starting job');

    const execution = this.executor(job.command, job.args, { cwd: job.cwd });

    let result: CommandResult;
    try {
      result = await withTimeout(execution, options.timeoutMs, `job ${jobName}`);
    } catch (error) {
      const durationMs = this.clock() - startedAt;

      if (error instanceof LifecycleError && error.code === 'Timeout') {
        this.logger.error({ jobName, timeoutMs: options.timeoutMs }, 'Job timed out; no longer tracking it');
        this.logAbandonedCompletion(jobName, execution);
        return { status: 'timed_out', timeoutMs: options.timeoutMs, durationMs };
      }

      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error({ jobName, error: reason }, 'Job could not be started');
      return { status: 'failed', exitCode: null, reason, durationMs };
    }

    const durationMs = this.clock() - startedAt;

    if (!result.failed && result.exitCode === 0) {
      this.logger.info({ jobName, durationMs, output: outputTail(result.stdout) }, 'Job completed successfully');
      return { status: 'succeeded', durationMs };
    }

    this.logger.error(
      { jobName, exitCode: result.exitCode, durationMs, error: outputTail(result.stderr) },
      'Job failed'
    );
    return {
      status: 'failed',
      exitCode: result.exitCode,
      reason: result.exitCode === null ? 'process did not exit normally' : `exit code ${result.exitCode}`,
      durationMs,
    };
  }

  private logAbandonedCompletion(jobName: string, execution: Promise<CommandResult>): void {
    const settled = execution.then(
      (result) => {
        this.logger.warn({ jobName, exitCode: result.exitCode }, 'Abandoned job finished');
      },
      (error: unknown) => {
        this.logger.warn(
          { jobName, error: error instanceof Error ? error.message : String(error) },
          'Abandoned job failed'
        );
      }
    );
    this.abandoned.set(jobName, settled);
    void settled.finally(() => {
      if (this.abandoned.get(jobName) === settled) {
        this.abandoned.delete(jobName);
      }
    });
  }
}
