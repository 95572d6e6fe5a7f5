/**
 * Shared test fixtures: silent loggers, linear model artifacts and temp dirs.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pino, type Logger } from 'pino';
import type { LinearArtifact } from '../../src/serving/model-loader.js';

export const MODEL_NAME = 'iris-classifier';

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Decides on petal_length only:
 * class 0 score = 2.5 - petal_length, class 1 score = 0, class 2 score = petal_length - 5
 * petal_length 1.4 -> 0, 4.0 -> 1, 6.0 -> 2
 */
export const PETAL_ARTIFACT: LinearArtifact = {
  kind: 'linear',
  featureNames: ['sepal_length', 'sepal_width', 'petal_length', 'petal_width'],
  classes: [0, 1, 2],
  weights: [
    [0, 0, -1, 0],
    [0, 0, 0, 0],
    [0, 0, 1, 0],
  ],
  bias: [2.5, 0, -5],
};

/**
 * Predicts class 2 for every input.
 */
export const CONSTANT_ARTIFACT: LinearArtifact = {
  kind: 'linear',
  featureNames: ['sepal_length', 'sepal_width', 'petal_length', 'petal_width'],
  classes: [0, 1, 2],
  weights: [
    [0, 0, 0, 0],
    [0, 0, 0, 0],
    [0, 0, 0, 0],
  ],
  bias: [0, 0, 1],
};

export const SETOSA = [5.1, 3.5, 1.4, 0.2];
export const VERSICOLOR = [6.0, 2.9, 4.0, 1.3];
export const VIRGINICA = [6.7, 3.1, 6.0, 2.3];

export async function createTempDir(prefix = 'lifecycle-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeArtifact(dir: string, fileName: string, artifact: unknown): Promise<string> {
  const path = join(dir, fileName);
  await writeFile(path, JSON.stringify(artifact), 'utf8');
  return path;
}

/**
 * Promise with its resolve handle exposed, for holding a fake operation open.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
