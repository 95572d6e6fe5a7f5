/**
 * MLflow Registry Client
 *
 * REST adapter for an MLflow-compatible tracking server
 * (`/api/2.0/mlflow/...`). Every request carries a deadline and transient
 * failures are retried with backoff; a request that still fails surfaces as
 * `RegistryUnavailable`. Missing resources map to `Err(NotFound)`.
 *
 * The quality metric of a version is written as a version tag
 * (`metric.<metricName>`) when the version is created. Versions without the
 * tag fall back to the metric logged on the run that produced them.
 *
 * Creates are not idempotent: they are retried only on failures that prove
 * the request never reached the server.
 *
 * @example
 * ```typescript
 * const registry = new MlflowRegistryClient({
 *   trackingUri: 'http://mlflow:5000',
 *   metricName: 'accuracy',
 *   requestTimeoutMs: 5000,
 *   retry: { maxAttempts: 3, initialDelayMs: 200, maxDelayMs: 2000, backoffMultiplier: 2, retryableErrors: ['HTTP_5XX'] },
 *   logger,
 * });
 * const production = await registry.getVersionByAlias('iris-classifier', 'production');
 * ```
 */

import { z } from 'zod';
import { Ok, Err, type Result } from 'ts-results';
import type { Logger } from 'pino';
import { LifecycleError, createRegistryUnavailableError, toLifecycleError } from '../api/errors.js';
import { retryWithBackoff, type RetryConfig } from '../utils/retry.js';
import {
  MODEL_ALIASES,
  type ModelAlias,
  type ModelVersion,
  type RegisterVersionRequest,
  type RunData,
} from '../types/registry.js';
import { NotFound, type RegistryClient } from './registry-client.js';

export interface MlflowRegistryClientConfig {
  trackingUri: string;
  metricName: string;
  requestTimeoutMs: number;
  retry: Omit<RetryConfig, 'signal' | 'onRetry'>;
  logger: Logger;
  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch;
}

const ErrorBodySchema = z.object({
  error_code: z.string().optional(),
  message: z.string().optional(),
});

const KeyValueSchema = z.object({ key: z.string(), value: z.string() });

const MlflowModelVersionSchema = z.object({
  name: z.string(),
  version: z.coerce.number().int().positive(),
  source: z.string().optional(),
  run_id: z.string().optional(),
  creation_timestamp: z.coerce.number().optional(),
  description: z.string().optional(),
  aliases: z.array(z.string()).optional(),
  tags: z.array(KeyValueSchema).optional(),
});

type MlflowModelVersion = z.infer<typeof MlflowModelVersionSchema>;

const ModelVersionResponseSchema = z.object({ model_version: MlflowModelVersionSchema });

const SearchModelVersionsResponseSchema = z.object({
  model_versions: z.array(MlflowModelVersionSchema).optional(),
  next_page_token: z.string().optional(),
});

const GetRunResponseSchema = z.object({
  run: z.object({
    info: z.object({ run_id: z.string() }),
    data: z.object({
      metrics: z.array(z.object({ key: z.string(), value: z.coerce.number() })).optional(),
      params: z.array(KeyValueSchema).optional(),
    }),
  }),
});

const AnyResponseSchema = z.object({}).passthrough();

/**
 * Non-2xx response from the tracking server. `status` feeds the retry
 * tokens (HTTP_503, HTTP_5XX).
 */
export class MlflowHttpError extends Error {
  public readonly status: number;
  public readonly errorCode?: string;

  constructor(status: number, message: string, errorCode?: string) {
    super(message);
    this.name = 'MlflowHttpError';
    this.status = status;
    this.errorCode = errorCode;
  }
}

/**
 * Failures raised before any byte reached the server
 */
const NOT_SENT_ERRORS = ['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN'];

interface RequestOptions<T> {
  method: 'GET' | 'POST';
  path: string;
  /** false for creates: a timeout or 5xx may have been committed */
  idempotent?: boolean;
  query?: Record<string, string>;
  body?: Record<string, unknown>;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

function isNotFoundResponse(status: number, errorCode?: string, message?: string): boolean {
  if (status === 404 || errorCode === 'RESOURCE_DOES_NOT_EXIST') {
    return true;
  }
  // Unknown aliases come back as INVALID_PARAMETER_VALUE "... alias x not found."
  return errorCode === 'INVALID_PARAMETER_VALUE' && /not found/i.test(message ?? '');
}

function toModelAliases(aliases: readonly string[] | undefined): ModelAlias[] {
  return MODEL_ALIASES.filter((alias) => aliases?.includes(alias) ?? false);
}

export class MlflowRegistryClient implements RegistryClient {
  private readonly baseUrl: string;
  private readonly config: MlflowRegistryClientConfig;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(config: MlflowRegistryClientConfig) {
    this.config = config;
    this.baseUrl = `${config.trackingUri.replace(/\/+$/, '')}/api/2.0/mlflow`;
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.logger = config.logger;
  }

  async getVersionByAlias(modelName: string, alias: ModelAlias): Promise<Result<ModelVersion, NotFound>> {
    const response = await this.request({
      method: 'GET',
      path: 'registered-models/alias',
      query: { name: modelName, alias },
      schema: ModelVersionResponseSchema,
    });

    if (response.err) {
      return Err(new NotFound('Model alias', `${modelName}@${alias}`));
    }

    return Ok(await this.toModelVersion(response.val.model_version));
  }

  async getRunData(runId: string): Promise<Result<RunData, NotFound>> {
    const response = await this.request({
      method: 'GET',
      path: 'runs/get',
      query: { run_id: runId },
      schema: GetRunResponseSchema,
    });

    if (response.err) {
      return Err(new NotFound('Run', runId));
    }

    const { data } = response.val.run;
    const metrics: Record<string, number> = {};
    for (const metric of data.metrics ?? []) {
      metrics[metric.key] = metric.value;
    }
    const params: Record<string, string> = {};
    for (const param of data.params ?? []) {
      params[param.key] = param.value;
    }

    return Ok({ runId, metrics, params });
  }

  async registerVersion(request: RegisterVersionRequest): Promise<ModelVersion> {
    await this.ensureRegisteredModel(request.modelName);

    const body: Record<string, unknown> = {
      name: request.modelName,
      source: request.artifactRef,
    };
    if (request.runId) {
      body.run_id = request.runId;
    }
    if (request.description) {
      body.description = request.description;
    }
    body.tags = [{ key: this.metricTagKey(), value: String(request.metric) }];

    const response = await this.request({
      method: 'POST',
      path: 'model-versions/create',
      idempotent: false,
      body,
      schema: ModelVersionResponseSchema,
    });

    if (response.err) {
      throw createRegistryUnavailableError(`Registered model disappeared while creating a version: ${request.modelName}`, {
        modelName: request.modelName,
      });
    }

    const created = response.val.model_version;
    this.logger.info({ modelName: created.name, version: created.version }, 'Registered model version');

    // The metric is known to the caller; no need to read it back from the run.
    return {
      ...this.mapVersion(created, request.metric),
      aliases: [],
    };
  }

  async setAlias(modelName: string, alias: ModelAlias, version: number): Promise<void> {
    const response = await this.request({
      method: 'POST',
      path: 'registered-models/alias',
      body: { name: modelName, alias, version: String(version) },
      schema: AnyResponseSchema,
    });

    if (response.err) {
      throw new LifecycleError('InvalidParams', `Cannot set alias '${alias}': ${modelName} v${version} not found`, {
        modelName,
        alias,
        version,
      });
    }
  }

  async listVersions(modelName: string): Promise<ModelVersion[]> {
    const collected: MlflowModelVersion[] = [];
    let pageToken: string | undefined;

    do {
      const query: Record<string, string> = {
        filter: `name='${modelName.replace(/'/g, "\\'")}'`,
        max_results: '200',
      };
      if (pageToken) {
        query.page_token = pageToken;
      }

      const response = await this.request({
        method: 'GET',
        path: 'model-versions/search',
        query,
        schema: SearchModelVersionsResponseSchema,
      });

      if (response.err) {
        return [];
      }

      collected.push(...(response.val.model_versions ?? []));
      pageToken = response.val.next_page_token || undefined;
    } while (pageToken);

    const versions = await Promise.all(collected.map((entry) => this.toModelVersion(entry)));
    return versions.sort((a, b) => a.version - b.version);
  }

  private async ensureRegisteredModel(modelName: string): Promise<void> {
    const existing = await this.request({
      method: 'GET',
      path: 'registered-models/get',
      query: { name: modelName },
      schema: AnyResponseSchema,
    });

    if (existing.ok) {
      return;
    }

    this.logger.info({ modelName }, 'Creating registered model');
    await this.request({
      method: 'POST',
      path: 'registered-models/create',
      idempotent: false,
      body: { name: modelName },
      schema: AnyResponseSchema,
    });
  }

  private metricTagKey(): string {
    return `metric.${this.config.metricName}`;
  }

  private async toModelVersion(entry: MlflowModelVersion): Promise<ModelVersion> {
    const tagged = Number(entry.tags?.find((tag) => tag.key === this.metricTagKey())?.value);
    if (Number.isFinite(tagged)) {
      return this.mapVersion(entry, tagged);
    }

    let metric: number | null = null;
    if (entry.run_id) {
      const run = await this.getRunData(entry.run_id);
      if (run.ok) {
        metric = run.val.metrics[this.config.metricName] ?? null;
      }
    }

    return this.mapVersion(entry, metric);
  }

  private mapVersion(entry: MlflowModelVersion, metric: number | null): ModelVersion {
    return {
      modelName: entry.name,
      version: entry.version,
      artifactRef: entry.source ?? '',
      runId: entry.run_id || undefined,
      metric,
      aliases: toModelAliases(entry.aliases),
      createdAt: entry.creation_timestamp ?? 0,
      description: entry.description ?? '',
    };
  }

  /**
   * Issue one API call with deadline + retry.
   *
   * @returns Ok(parsed body), Err(NotFound) for a missing resource
   * @throws LifecycleError RegistryUnavailable for anything else
   */
  private async request<T>(options: RequestOptions<T>): Promise<Result<T, NotFound>> {
    const url = new URL(`${this.baseUrl}/${options.path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const retryableErrors =
      options.idempotent === false
        ? this.config.retry.retryableErrors.filter((token) => NOT_SENT_ERRORS.includes(token.toUpperCase()))
        : this.config.retry.retryableErrors;

    try {
      return await retryWithBackoff(() => this.send(url, options), {
        ...this.config.retry,
        retryableErrors,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn(
            { path: options.path, attempt, delayMs, error: error instanceof Error ? error.message : String(error) },
            'Registry request failed, retrying'
          );
        },
      });
    } catch (error) {
      const lifecycleError = toLifecycleError(error, 'RegistryUnavailable');
      this.logger.error({ path: options.path, error: lifecycleError.message }, 'Registry request failed');
      throw createRegistryUnavailableError(`Registry unavailable: ${lifecycleError.message}`, {
        path: options.path,
        trackingUri: this.config.trackingUri,
      });
    }
  }

  private async send<T>(url: URL, options: RequestOptions<T>): Promise<Result<T, NotFound>> {
    const response = await this.fetchImpl(url, {
      method: options.method,
      headers: options.body ? { 'Content-Type': 'application/json' } : undefined,
      body: options.body ? JSON.stringify(options.body) : undefined,
      signal: AbortSignal.timeout(this.config.requestTimeoutMs),
    });

    const text = await response.text();
    const payload: unknown = text.length > 0 ? JSON.parse(text) : {};

    if (!response.ok) {
      const errorBody = ErrorBodySchema.safeParse(payload);
      const errorCode = errorBody.success ? errorBody.data.error_code : undefined;
      const message = errorBody.success ? errorBody.data.message : undefined;

      if (isNotFoundResponse(response.status, errorCode, message)) {
        return Err(new NotFound(options.path, url.search));
      }

      throw new MlflowHttpError(
        response.status,
        `MLflow ${options.method} ${options.path} failed with HTTP ${response.status}${message ? `: ${message}` : ''}`,
        errorCode
      );
    }

    const parsed = options.schema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(`Unexpected MLflow response for ${options.path}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
    }

    return Ok(parsed.data);
  }
}
