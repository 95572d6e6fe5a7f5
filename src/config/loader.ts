/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides,
 * then environment variables, then validates the result.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { LifecycleError } from '../api/errors.js';
import type { RetryConfig } from '../utils/retry.js';
import type { LogLevel } from '../utils/logger.js';
import { ENVIRONMENTS, RuntimeConfigSchema, type Environment, type RuntimeConfig } from '../types/schemas/config.js';

export type { Environment, RuntimeConfig };

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects; arrays and scalars from `source` replace.
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

interface EnvOverride {
  variable: string;
  path: readonly [string, string];
  numeric?: boolean;
}

/**
 * Applied in order, so REGISTRY_URI wins over MLFLOW_TRACKING_URI.
 */
export const ENV_OVERRIDES: readonly EnvOverride[] = [
  { variable: 'MLFLOW_TRACKING_URI', path: ['registry', 'tracking_uri'] },
  { variable: 'REGISTRY_URI', path: ['registry', 'tracking_uri'] },
  { variable: 'REGISTRY_KIND', path: ['registry', 'kind'] },
  { variable: 'MODEL_NAME', path: ['registry', 'model_name'] },
  { variable: 'SIGNAL_FILE_PATH', path: ['monitor', 'signal_file_path'] },
  { variable: 'CHECK_INTERVAL_MS', path: ['monitor', 'check_interval_ms'], numeric: true },
  { variable: 'PORT', path: ['serving', 'port'], numeric: true },
  { variable: 'LOG_LEVEL', path: ['logging', 'level'] },
];

function applyEnvOverrides(config: PlainObject, env: NodeJS.ProcessEnv): PlainObject {
  let output = config;

  for (const override of ENV_OVERRIDES) {
    const raw = env[override.variable];
    if (raw === undefined || raw === '') {
      continue;
    }

    const [section, field] = override.path;
    // Non-numeric input becomes NaN and is reported by validation
    const value = override.numeric ? Number(raw) : raw;
    output = deepMerge(output, { [section]: { [field]: value } });
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function resolveEnvironment(value: string | undefined): Environment {
  return ENVIRONMENTS.find((environment) => environment === value) ?? 'development';
}

export interface LoadConfigOptions {
  configPath?: string;
  environment?: Environment;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load, merge and validate configuration.
 *
 * @throws {LifecycleError} ConfigError for a missing or unparsable file and
 *   for invalid values (message lists every offending field)
 */
export function loadConfig(options: LoadConfigOptions = {}): RuntimeConfig {
  const env = options.env ?? process.env;
  const finalPath = options.configPath || join(findPackageRoot(), 'config', 'runtime.yaml');

  let document: unknown;
  try {
    document = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (isPlainObject(error) && error.code === 'ENOENT') {
      throw new LifecycleError('ConfigError', `Configuration file not found: ${finalPath}`, { path: finalPath });
    }
    throw new LifecycleError(
      'ConfigError',
      `Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`,
      { path: finalPath }
    );
  }

  if (!isPlainObject(document)) {
    throw new LifecycleError('ConfigError', `Configuration root must be a mapping: ${finalPath}`, { path: finalPath });
  }

  const environment = options.environment ?? resolveEnvironment(env.NODE_ENV);
  const { environments, ...base } = document;

  let merged: PlainObject = base;
  if (isPlainObject(environments)) {
    const section = environments[environment];
    if (isPlainObject(section)) {
      merged = deepMerge(base, section);
    }
  }

  merged = applyEnvOverrides(merged, env);

  return validateConfig(merged);
}

export function validateConfig(config: unknown): RuntimeConfig {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new LifecycleError('ConfigError', `Configuration validation failed:\n${errors.join('\n')}`, {
      issues: errors,
    });
  }
  return parseResult.data;
}

/**
 * Global configuration instance
 */
let globalConfig: RuntimeConfig | null = null;

export function initializeConfig(options: LoadConfigOptions = {}): RuntimeConfig {
  globalConfig = loadConfig(options);
  return globalConfig;
}

export function getConfig(): RuntimeConfig {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

export interface JobSettings {
  command: string;
  args: string[];
  cwd: string;
}

/**
 * camelCase view consumed by the application wiring
 */
export interface ServiceConfig {
  serviceName: string;
  logLevel: LogLevel;
  registry: {
    kind: 'mlflow' | 'memory';
    trackingUri?: string;
    modelName: string;
    metricName: string;
    requestTimeoutMs: number;
    retry: Omit<RetryConfig, 'signal' | 'onRetry'>;
  };
  serving: {
    port: number;
    bindAddress: string;
    artifactRoot: string;
    healthLoadTimeoutMs: number;
  };
  monitor: {
    enabled: boolean;
    signalFilePath: string;
    checkIntervalMs: number;
    jobName: string;
    jobTimeoutMs: number;
  };
  jobs: Record<string, JobSettings>;
  telemetry: {
    enabled: boolean;
    serviceName: string;
    prometheusPort: number;
  };
}

export function toServiceConfig(config: RuntimeConfig): ServiceConfig {
  const jobs: Record<string, JobSettings> = {};
  for (const [name, job] of Object.entries(config.jobs)) {
    jobs[name] = { command: job.command, args: [...job.args], cwd: job.cwd };
  }

  return {
    serviceName: config.service.name,
    logLevel: config.logging.level,
    registry: {
      kind: config.registry.kind,
      trackingUri: config.registry.tracking_uri,
      modelName: config.registry.model_name,
      metricName: config.registry.metric_name,
      requestTimeoutMs: config.registry.request_timeout_ms,
      retry: {
        maxAttempts: config.registry.retry.max_attempts,
        initialDelayMs: config.registry.retry.initial_delay_ms,
        maxDelayMs: config.registry.retry.max_delay_ms,
        backoffMultiplier: config.registry.retry.backoff_multiplier,
        retryableErrors: [...config.registry.retry.retryable_errors],
        jitter: config.registry.retry.jitter,
      },
    },
    serving: {
      port: config.serving.port,
      bindAddress: config.serving.bind_address,
      artifactRoot: config.serving.artifact_root,
      healthLoadTimeoutMs: config.serving.health_load_timeout_ms,
    },
    monitor: {
      enabled: config.monitor.enabled,
      signalFilePath: config.monitor.signal_file_path,
      checkIntervalMs: config.monitor.check_interval_ms,
      jobName: config.monitor.job_name,
      jobTimeoutMs: config.monitor.job_timeout_ms,
    },
    jobs,
    telemetry: {
      enabled: config.telemetry.enabled,
      serviceName: config.telemetry.service_name,
      prometheusPort: config.telemetry.prometheus_port,
    },
  };
}

/**
 * Service configuration from the global config
 */
export function getServiceConfig(): ServiceConfig {
  return toServiceConfig(getConfig());
}
