/**
 * Retrain signal artifact.
 *
 * Presence of the file at `path` means "retraining requested"; its content
 * is a free-text reason. Consumption is a claim: the file is renamed to a
 * private claim path first, so two monitors polling the same directory can
 * never both take the same signal, and the claimed file is deleted before
 * any job starts.
 */

import { randomUUID } from 'node:crypto';
import { access, mkdir, readFile, rename, rm, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import { LifecycleError } from '../api/errors.js';

export interface RetrainSignal {
  path: string;
  /** null when the content could not be read */
  payload: string | null;
  detectedAt: number;
  readError?: LifecycleError;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = Reflect.get(error, 'code');
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface SignalFileOptions {
  path: string;
  logger: Logger;
  clock?: () => number;
}

export class SignalFile {
  public readonly path: string;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(options: SignalFileOptions) {
    this.path = options.path;
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
  }

  public async exists(): Promise<boolean> {
    try {
      await access(this.path);
      return true;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return false;
      }
      throw new LifecycleError('SignalReadError', `Cannot check signal file: ${errorMessage(error)}`, {
        path: this.path,
      });
    }
  }

  /**
   * Take ownership of the signal and remove it.
   *
   * @returns the claimed signal, or null when there is none (or another
   *   process claimed it first)
   * @throws {LifecycleError} SignalReadError when the signal cannot be
   *   removed; the caller must not start a job in that case
   */
  public async claim(): Promise<RetrainSignal | null> {
    const detectedAt = this.clock();
    const claimPath = `${this.path}.${process.pid}.${randomUUID()}.claimed`;

    try {
      await rename(this.path, claimPath);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }

      // Rename refused (e.g. read-only parent): deleting it is the claim
      this.logger.warn({ path: this.path, error: errorMessage(error) }, 'Could not rename signal file, deleting it');
      return this.claimByUnlink(detectedAt, error);
    }

    let payload: string | null = null;
    let readError: LifecycleError | undefined;
    try {
      payload = (await readFile(claimPath, 'utf8')).trim();
    } catch (error) {
      readError = new LifecycleError('SignalReadError', `Cannot read signal file: ${errorMessage(error)}`, {
        path: this.path,
      });
    }

    try {
      await unlink(claimPath);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw new LifecycleError('SignalReadError', `Cannot remove claimed signal file: ${errorMessage(error)}`, {
          path: claimPath,
        });
      }
    }

    return { path: this.path, payload, detectedAt, readError };
  }

  /**
   * Create the signal atomically (temp file + rename). An existing signal is
   * replaced, which still means exactly one pending request.
   */
  public async write(payload: string): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tempPath = `${this.path}.${process.pid}.${randomUUID()}.tmp`;
    await writeFile(tempPath, payload, 'utf8');
    try {
      await rename(tempPath, this.path);
    } catch (error) {
      this.logger.error({ path: this.path, error: errorMessage(error) }, 'Failed to publish retrain signal');
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  private async claimByUnlink(detectedAt: number, renameError: unknown): Promise<RetrainSignal | null> {
    let payload: string | null = null;
    let readError: LifecycleError | undefined;
    try {
      payload = (await readFile(this.path, 'utf8')).trim();
    } catch (error) {
      readError = new LifecycleError('SignalReadError', `Cannot read signal file: ${errorMessage(error)}`, {
        path: this.path,
      });
    }

    try {
      await unlink(this.path);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw new LifecycleError('SignalReadError', `Cannot remove signal file: ${errorMessage(error)}`, {
        path: this.path,
        renameError: errorMessage(renameError),
      });
    }

    return { path: this.path, payload, detectedAt, readError };
  }
}
