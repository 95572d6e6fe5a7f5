/**
 * Model Registry Types
 *
 * Shapes exchanged with the external versioned model store.
 */

/**
 * Named markers a version can carry. A version with no alias is inert
 * (the `none` alias).
 */
export type ModelAlias = 'production' | 'challenger';

export const MODEL_ALIASES: readonly ModelAlias[] = ['production', 'challenger'];

/**
 * One registered version of a model
 */
export interface ModelVersion {
  modelName: string;
  /** Monotonic per model name, starting at 1 */
  version: number;
  /** Location of the trained artifact */
  artifactRef: string;
  /** Experiment run that produced the artifact */
  runId?: string;
  /** Quality metric (e.g. accuracy in [0,1]); null when the store has none */
  metric: number | null;
  aliases: ModelAlias[];
  /** ms since epoch */
  createdAt: number;
  description: string;
}

/**
 * Metrics and parameters logged by the run that produced a version
 */
export interface RunData {
  runId: string;
  metrics: Record<string, number>;
  params: Record<string, string>;
}

export interface RegisterVersionRequest {
  modelName: string;
  artifactRef: string;
  metric: number;
  runId?: string;
  description?: string;
}

/**
 * alias -> version number
 */
export type AliasTable = Partial<Record<ModelAlias, number>>;
