/**
 * Process-local registry.
 *
 * Aliases live in one map per model (alias -> version), so a single alias
 * can never point at two versions and moving it is one assignment: no
 * caller can observe a state with zero or two holders. Every method body
 * runs without awaiting, which keeps each operation atomic on the event
 * loop.
 */

import { Ok, Err, type Result } from 'ts-results';
import { LifecycleError } from '../api/errors.js';
import type { ModelAlias, ModelVersion, RegisterVersionRequest, RunData } from '../types/registry.js';
import { NotFound, type RegistryClient } from './registry-client.js';

export interface InMemoryRegistryOptions {
  /** Metric key recorded on the run created for each registration */
  metricName?: string;
  clock?: () => number;
}

interface StoredVersion {
  version: number;
  artifactRef: string;
  runId: string;
  metric: number;
  createdAt: number;
  description: string;
}

interface StoredModel {
  versions: StoredVersion[];
  aliases: Map<ModelAlias, number>;
}

export class InMemoryRegistry implements RegistryClient {
  private readonly models = new Map<string, StoredModel>();
  private readonly runs = new Map<string, RunData>();
  private readonly metricName: string;
  private readonly clock: () => number;
  private runCounter = 0;

  constructor(options: InMemoryRegistryOptions = {}) {
    this.metricName = options.metricName ?? 'accuracy';
    this.clock = options.clock ?? Date.now;
  }

  async getVersionByAlias(modelName: string, alias: ModelAlias): Promise<Result<ModelVersion, NotFound>> {
    const model = this.models.get(modelName);
    const versionNumber = model?.aliases.get(alias);
    const stored = versionNumber === undefined ? undefined : model?.versions[versionNumber - 1];

    if (!model || !stored) {
      return Err(new NotFound('Model alias', `${modelName}@${alias}`));
    }

    return Ok(this.toModelVersion(modelName, model, stored));
  }

  async getRunData(runId: string): Promise<Result<RunData, NotFound>> {
    const run = this.runs.get(runId);
    if (!run) {
      return Err(new NotFound('Run', runId));
    }
    return Ok({ runId, metrics: { ...run.metrics }, params: { ...run.params } });
  }

  async registerVersion(request: RegisterVersionRequest): Promise<ModelVersion> {
    let model = this.models.get(request.modelName);
    if (!model) {
      model = { versions: [], aliases: new Map() };
      this.models.set(request.modelName, model);
    }

    const runId = request.runId ?? `local-run-${++this.runCounter}`;
    const existingRun = this.runs.get(runId);
    this.runs.set(runId, {
      runId,
      metrics: { ...existingRun?.metrics, [this.metricName]: request.metric },
      params: { ...existingRun?.params },
    });

    const stored: StoredVersion = {
      version: model.versions.length + 1,
      artifactRef: request.artifactRef,
      runId,
      metric: request.metric,
      createdAt: this.clock(),
      description: request.description ?? '',
    };
    model.versions.push(stored);

    return this.toModelVersion(request.modelName, model, stored);
  }

  async setAlias(modelName: string, alias: ModelAlias, version: number): Promise<void> {
    const model = this.models.get(modelName);
    if (!model || !model.versions[version - 1]) {
      throw new LifecycleError('InvalidParams', `Cannot set alias '${alias}': ${modelName} v${version} does not exist`, {
        modelName,
        alias,
        version,
      });
    }

    model.aliases.set(alias, version);
  }

  async listVersions(modelName: string): Promise<ModelVersion[]> {
    const model = this.models.get(modelName);
    if (!model) {
      return [];
    }
    return model.versions.map((stored) => this.toModelVersion(modelName, model, stored));
  }

  /**
   * Attach parameters/metrics to a run (what the training job logs).
   */
  recordRun(runId: string, data: Partial<Omit<RunData, 'runId'>>): void {
    const existing = this.runs.get(runId);
    this.runs.set(runId, {
      runId,
      metrics: { ...existing?.metrics, ...data.metrics },
      params: { ...existing?.params, ...data.params },
    });
  }

  private toModelVersion(modelName: string, model: StoredModel, stored: StoredVersion): ModelVersion {
    const aliases: ModelAlias[] = [];
    for (const [alias, version] of model.aliases) {
      if (version === stored.version) {
        aliases.push(alias);
      }
    }

    return {
      modelName,
      version: stored.version,
      artifactRef: stored.artifactRef,
      runId: stored.runId,
      metric: stored.metric,
      aliases,
      createdAt: stored.createdAt,
      description: stored.description,
    };
  }
}
