/**
 * Model loading
 *
 * The serving layer only depends on `ModelLoader`. `JsonModelLoader` reads
 * a linear classifier stored as JSON so the server runs end to end without
 * a training stack; other artifact formats plug in behind the same interface.
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { LifecycleError, zodErrorToLifecycleError } from '../api/errors.js';
import type { ModelVersion } from '../types/registry.js';

/**
 * A loaded, immutable classifier
 */
export interface Classifier {
  readonly featureCount: number;
  /**
   * Class label for one feature vector. Must be pure: same input, same label.
   */
  predict(features: readonly number[]): number;
}

export interface ModelLoader {
  load(version: ModelVersion): Promise<Classifier>;
}

export const LinearArtifactSchema = z
  .object({
    kind: z.literal('linear'),
    featureNames: z.array(z.string().min(1)).min(1),
    classes: z.array(z.number().int()).min(1),
    /** One row per class, one column per feature */
    weights: z.array(z.array(z.number())),
    bias: z.array(z.number()),
  })
  .superRefine((artifact, ctx) => {
    if (artifact.weights.length !== artifact.classes.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['weights'],
        message: `Expected ${artifact.classes.length} weight rows, got ${artifact.weights.length}`,
      });
    }
    artifact.weights.forEach((row, index) => {
      if (row.length !== artifact.featureNames.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['weights', index],
          message: `Expected ${artifact.featureNames.length} weights, got ${row.length}`,
        });
      }
    });
    if (artifact.bias.length !== artifact.classes.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['bias'],
        message: `Expected ${artifact.classes.length} bias terms, got ${artifact.bias.length}`,
      });
    }
  });

export type LinearArtifact = z.infer<typeof LinearArtifactSchema>;

/**
 * Arg-max of W·x + b. Ties go to the first class.
 */
export class LinearClassifier implements Classifier {
  public readonly featureCount: number;
  private readonly classes: readonly number[];
  private readonly weights: readonly (readonly number[])[];
  private readonly bias: readonly number[];

  constructor(artifact: LinearArtifact) {
    this.featureCount = artifact.featureNames.length;
    this.classes = Object.freeze([...artifact.classes]);
    this.weights = Object.freeze(artifact.weights.map((row) => Object.freeze([...row])));
    this.bias = Object.freeze([...artifact.bias]);
  }

  predict(features: readonly number[]): number {
    let bestIndex = 0;
    let bestScore = Number.NEGATIVE_INFINITY;

    this.weights.forEach((row, classIndex) => {
      let score = this.bias[classIndex] ?? 0;
      for (let i = 0; i < row.length; i++) {
        score += (row[i] ?? 0) * (features[i] ?? 0);
      }
      if (score > bestScore) {
        bestScore = score;
        bestIndex = classIndex;
      }
    });

    return this.classes[bestIndex] ?? this.classes[0] ?? 0;
  }
}

export interface JsonModelLoaderOptions {
  /** Base directory for relative artifact references */
  artifactRoot: string;
}

export class JsonModelLoader implements ModelLoader {
  private readonly artifactRoot: string;

  constructor(options: JsonModelLoaderOptions) {
    this.artifactRoot = resolve(options.artifactRoot);
  }

  /**
   * Resolve `file://` URLs, absolute paths and paths relative to the
   * artifact root. Other schemes (e.g. `runs:/`) are not readable here.
   */
  resolvePath(artifactRef: string): string {
    if (artifactRef.startsWith('file://')) {
      return fileURLToPath(artifactRef);
    }
    if (/^[a-z][a-z0-9+.-]*:\//i.test(artifactRef)) {
      throw new LifecycleError('ModelUnavailable', `Unsupported artifact reference: ${artifactRef}`, { artifactRef });
    }
    return isAbsolute(artifactRef) ? artifactRef : resolve(this.artifactRoot, artifactRef);
  }

  async load(version: ModelVersion): Promise<Classifier> {
    const path = this.resolvePath(version.artifactRef);

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf8'));
    } catch (error) {
      throw new LifecycleError(
        'ModelUnavailable',
        `Cannot read model artifact for ${version.modelName} v${version.version}: ${error instanceof Error ? error.message : String(error)}`,
        { path, version: version.version }
      );
    }

    const parsed = LinearArtifactSchema.safeParse(raw);
    if (!parsed.success) {
      const validation = zodErrorToLifecycleError(parsed.error);
      throw new LifecycleError('ModelUnavailable', `Invalid model artifact at ${path}: ${validation.message}`, {
        path,
        version: version.version,
        ...validation.details,
      });
    }

    return new LinearClassifier(parsed.data);
  }
}
