/**
 * Job Runner Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  CommandJobRunner,
  outcomeToError,
  outputTail,
  type CommandExecutor,
  type CommandResult,
  type JobDefinition,
} from '../../../src/retrain/job-runner.js';
import { deferred, silentLogger } from '../../helpers/fixtures.js';

const TRAIN_JOB: JobDefinition = { command: 'python', args: ['train.py', '--quick'], cwd: '/srv/train' };

function result(overrides: Partial<CommandResult> = {}): CommandResult {
  return { exitCode: 0, stdout: '', stderr: '', failed: false, ...overrides };
}

function createRunner(executor: CommandExecutor, jobs: Record<string, JobDefinition> = { train: TRAIN_JOB }) {
  let now = 1000;
  const clock = (): number => now;
  const advance = (ms: number): void => {
    now += ms;
  };
  const runner = new CommandJobRunner({ jobs, logger: silentLogger(), executor, clock });
  return { runner, advance };
}

describe('CommandJobRunner', () => {
  it('reports success for exit code 0', async () => {
    let advance: (ms: number) => void = () => undefined;
    const executor = vi.fn<CommandExecutor>(async () => {
      advance(250);
      return result({ stdout: 'accuracy=0.97' });
    });
    const created = createRunner(executor);
    advance = created.advance;

    const outcome = await created.runner.trigger('train', { timeoutMs: 1000 });

    expect(outcome).toEqual({ status: 'succeeded', durationMs: 250 });
    expect(executor).toHaveBeenCalledWith('python', ['train.py', '--quick'], { cwd: '/srv/train' });
  });

  it('reports a non-zero exit as a failure', async () => {
    const { runner } = createRunner(async () => result({ exitCode: 2, failed: true, stderr: 'boom' }));

    expect(await runner.trigger('train', { timeoutMs: 1000 })).toEqual({
      status: 'failed',
      exitCode: 2,
      reason: 'exit code 2',
      durationMs: 0,
    });
  });

  it('reports a process killed by a signal as a failure', async () => {
    const { runner } = createRunner(async () => result({ exitCode: null, failed: true }));

    expect(await runner.trigger('train', { timeoutMs: 1000 })).toMatchObject({
      status: 'failed',
      exitCode: null,
      reason: 'process did not exit normally',
    });
  });

  it('reports a command that cannot start as a failure', async () => {
    const { runner } = createRunner(async () => {
      throw new Error('spawn python ENOENT');
    });

    expect(await runner.trigger('train', { timeoutMs: 1000 })).toEqual({
      status: 'failed',
      exitCode: null,
      reason: 'spawn python ENOENT',
      durationMs: 0,
    });
  });

  it('reports an unknown job without running anything', async () => {
    const executor = vi.fn<CommandExecutor>(async () => result());
    const { runner } = createRunner(executor);

    expect(await runner.trigger('evaluate', { timeoutMs: 1000 })).toEqual({
      status: 'failed',
      exitCode: null,
      reason: 'Unknown job: evaluate',
      durationMs: 0,
    });
    expect(executor).not.toHaveBeenCalled();
  });

  it('stops waiting for a job that outlives its timeout', async () => {
    const execution = deferred<CommandResult>();
    const { runner } = createRunner(() => execution.promise);

    const outcome = await runner.trigger('train', { timeoutMs: 20 });
    execution.resolve(result());

    expect(outcome).toEqual({ status: 'timed_out', timeoutMs: 20, durationMs: 0 });
  });

  it('does not start the job again while a timed-out run is still alive', async () => {
    const stuck = deferred<CommandResult>();
    const executor = vi.fn<CommandExecutor>(() => stuck.promise);
    const { runner } = createRunner(executor);

    expect(await runner.trigger('train', { timeoutMs: 20 })).toMatchObject({ status: 'timed_out' });
    const second = await runner.trigger('train', { timeoutMs: 20 });

    expect(second).toEqual({
      status: 'failed',
      exitCode: null,
      reason: 'Job train is still running from an earlier trigger',
      durationMs: 0,
    });
    expect(executor).toHaveBeenCalledTimes(1);
    stuck.resolve(result());
  });

  it('starts the job once the timed-out run exits', async () => {
    const stuck = deferred<CommandResult>();
    const executor = vi.fn<CommandExecutor>().mockReturnValueOnce(stuck.promise).mockResolvedValue(result());
    const { runner } = createRunner(executor);

    await runner.trigger('train', { timeoutMs: 20 });
    const second = runner.trigger('train', { timeoutMs: 1000 });
    stuck.resolve(result({ exitCode: 1, failed: true }));

    expect(await second).toEqual({ status: 'succeeded', durationMs: 0 });
    expect(executor).toHaveBeenCalledTimes(2);
  });

  it('runs the job as configured even if the source definition changes later', async () => {
    const jobs = { train: { command: 'python', args: ['train.py'], cwd: '.' } };
    const executor = vi.fn<CommandExecutor>(async () => result());
    const { runner } = createRunner(executor, jobs);

    jobs.train.args.push('--delete-everything');
    await runner.trigger('train', { timeoutMs: 1000 });

    expect(executor).toHaveBeenCalledWith('python', ['train.py'], { cwd: '.' });
    expect(runner.hasJob('train')).toBe(true);
    expect(runner.hasJob('evaluate')).toBe(false);
  });
});

describe('outcomeToError', () => {
  it('maps outcomes to lifecycle errors', () => {
    expect(outcomeToError('train', { status: 'succeeded', durationMs: 5 })).toBeNull();

    expect(
      outcomeToError('train', { status: 'failed', exitCode: 1, reason: 'exit code 1', durationMs: 5 })
    ).toMatchObject({ code: 'RetrainJobFailed', message: 'Job train failed: exit code 1' });

    expect(outcomeToError('train', { status: 'timed_out', timeoutMs: 600000, durationMs: 600000 })).toMatchObject({
      code: 'RetrainJobTimedOut',
      message: 'Job train timed out after 600000ms',
    });
  });
});

describe('outputTail', () => {
  it('keeps only the end of long output', () => {
    expect(outputTail('short')).toBe('short');
    expect(outputTail('abcdefgh', 3)).toBe('fgh');
    expect(outputTail('x'.repeat(600))).toHaveLength(500);
  });
});
