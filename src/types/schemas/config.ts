/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating config/runtime.yaml after environment
 * sections and environment variables have been applied.
 *
 * @module schemas/config
 */

import { z } from 'zod';

export const ENVIRONMENTS = ['production', 'development', 'test'] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

export const ServiceSectionSchema = z.object({
  name: z.string().min(1, 'Service name cannot be empty'),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
});

/**
 * Registry retry configuration
 */
export const RetryConfigSchema = z
  .object({
    max_attempts: z.number().int().min(1, 'must be >= 1'),
    initial_delay_ms: z.number().int().min(0, 'must be >= 0'),
    max_delay_ms: z.number().int().positive('must be positive'),
    backoff_multiplier: z.number().min(1, 'must be >= 1'),
    retryable_errors: z.array(z.string()),
    jitter: z.number().min(0).max(1).optional(),
  })
  .refine((data) => data.max_delay_ms >= data.initial_delay_ms, {
    message: 'must be >= initial_delay_ms',
    path: ['max_delay_ms'],
  });

export const RegistryConfigSchema = z
  .object({
    kind: z.enum(['mlflow', 'memory']),
    tracking_uri: z.string().optional(),
    model_name: z.string().min(1, 'Model name cannot be empty'),
    metric_name: z.string().min(1, 'Metric name cannot be empty'),
    request_timeout_ms: z.number().int().positive('must be positive'),
    retry: RetryConfigSchema,
  })
  .refine((data) => data.kind !== 'mlflow' || (data.tracking_uri !== undefined && data.tracking_uri.length > 0), {
    message: 'is required when kind is mlflow',
    path: ['tracking_uri'],
  });

export const ServingConfigSchema = z.object({
  port: z.number().int().min(0).max(65535, 'must be a valid port'),
  bind_address: z.string().min(1),
  artifact_root: z.string().min(1, 'Artifact root cannot be empty'),
  health_load_timeout_ms: z.number().int().positive('must be positive'),
});

export const MonitorConfigSchema = z.object({
  enabled: z.boolean(),
  signal_file_path: z.string().min(1, 'Signal file path cannot be empty'),
  check_interval_ms: z.number().int().positive('must be positive'),
  job_name: z.string().min(1),
  job_timeout_ms: z.number().int().positive('must be positive'),
});

export const JobConfigSchema = z.object({
  command: z.string().min(1, 'Command cannot be empty'),
  args: z.array(z.string()).default([]),
  cwd: z.string().default('.'),
});

export const TelemetryConfigSchema = z.object({
  enabled: z.boolean(),
  service_name: z.string().min(1),
  prometheus_port: z.number().int().min(1).max(65535, 'must be a valid port'),
});

export const RuntimeConfigSchema = z
  .object({
    service: ServiceSectionSchema,
    logging: LoggingConfigSchema,
    registry: RegistryConfigSchema,
    serving: ServingConfigSchema,
    monitor: MonitorConfigSchema,
    jobs: z.record(JobConfigSchema),
    telemetry: TelemetryConfigSchema,
  })
  .refine((data) => data.jobs[data.monitor.job_name] !== undefined, {
    message: 'must name a job defined under jobs',
    path: ['monitor', 'job_name'],
  });

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
