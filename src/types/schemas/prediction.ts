/**
 * HTTP request schemas
 *
 * @module schemas/prediction
 */

import { z } from 'zod';

/**
 * Input feature order expected by every served model
 */
export const FEATURE_NAMES = ['sepal_length', 'sepal_width', 'petal_length', 'petal_width'] as const;

const finiteNumber = z.number().finite();

export const PredictRequestSchema = z.object({
  sepal_length: finiteNumber,
  sepal_width: finiteNumber,
  petal_length: finiteNumber,
  petal_width: finiteNumber,
});

export type PredictRequest = z.infer<typeof PredictRequestSchema>;

export const RetrainRequestSchema = z
  .object({
    reason: z.string().trim().min(1).max(500).optional(),
  })
  .default({});

export type RetrainRequest = z.infer<typeof RetrainRequestSchema>;

export function toFeatureVector(request: PredictRequest): number[] {
  return FEATURE_NAMES.map((name) => request[name]);
}
