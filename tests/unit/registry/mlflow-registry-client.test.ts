/**
 * MLflow Registry Client Tests
 *
 * Runs against an in-process fake of the MLflow REST API behind a mocked fetch.
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { MlflowRegistryClient } from '../../../src/registry/mlflow-registry-client.js';
import { PromotionEngine } from '../../../src/promotion/promotion-engine.js';
import { NotFound } from '../../../src/registry/registry-client.js';
import { LifecycleError } from '../../../src/api/errors.js';
import { MODEL_NAME, silentLogger } from '../../helpers/fixtures.js';

interface FakeVersion {
  name: string;
  version: string;
  source: string;
  run_id?: string;
  creation_timestamp: string;
  description?: string;
  aliases: string[];
  tags?: FakeTag[];
}

interface FakeTag {
  key: string;
  value: string;
}

interface FakeRun {
  metrics: Record<string, number>;
  params: Record<string, string>;
}

const BASE = 'http://mlflow.test:5000/api/2.0/mlflow';

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function notFound(message: string): Response {
  return json({ error_code: 'RESOURCE_DOES_NOT_EXIST', message }, 404);
}

/**
 * Minimal MLflow model registry: registered models, versions, aliases, runs.
 */
class FakeMlflow {
  readonly models = new Set<string>();
  readonly versions: FakeVersion[] = [];
  readonly runs = new Map<string, FakeRun>();
  pageSize = 200;
  /** Commit the next version create, then answer with this status */
  failAfterCreate: number | null = null;

  handle(url: URL, init?: RequestInit): Response {
    const path = url.pathname.replace('/api/2.0/mlflow/', '');
    const method = init?.method ?? 'GET';
    const body: Record<string, string> = typeof init?.body === 'string' ? JSON.parse(init.body) : {};
    const tags: FakeTag[] = typeof init?.body === 'string' ? (JSON.parse(init.body).tags ?? []) : [];
    const query = url.searchParams;

    if (method === 'GET' && path === 'registered-models/alias') {
      const found = this.versions.find(
        (version) => version.name === query.get('name') && version.aliases.includes(query.get('alias') ?? '')
      );
      return found
        ? json({ model_version: found })
        : json({ error_code: 'INVALID_PARAMETER_VALUE', message: `Registered model alias ${query.get('alias')} not found.` }, 400);
    }

    if (method === 'POST' && path === 'registered-models/alias') {
      const target = this.versions.find((version) => version.name === body.name && version.version === body.version);
      if (!target) {
        return notFound(`Model version ${body.version} not found`);
      }
      for (const version of this.versions) {
        version.aliases = version.aliases.filter((alias) => alias !== body.alias);
      }
      target.aliases.push(body.alias ?? '');
      return json({});
    }

    if (method === 'GET' && path === 'runs/get') {
      const runId = query.get('run_id') ?? '';
      const run = this.runs.get(runId);
      if (!run) {
        return notFound(`Run '${runId}' not found`);
      }
      return json({
        run: {
          info: { run_id: runId },
          data: {
            metrics: Object.entries(run.metrics).map(([key, value]) => ({ key, value, step: 0, timestamp: 0 })),
            params: Object.entries(run.params).map(([key, value]) => ({ key, value })),
          },
        },
      });
    }

    if (method === 'GET' && path === 'registered-models/get') {
      const name = query.get('name') ?? '';
      return this.models.has(name) ? json({ registered_model: { name } }) : notFound(`Registered Model with name=${name} not found`);
    }

    if (method === 'POST' && path === 'registered-models/create') {
      this.models.add(body.name ?? '');
      return json({ registered_model: { name: body.name } });
    }

    if (method === 'POST' && path === 'model-versions/create') {
      const version: FakeVersion = {
        name: body.name ?? '',
        version: String(this.versions.filter((entry) => entry.name === body.name).length + 1),
        source: body.source ?? '',
        run_id: body.run_id,
        creation_timestamp: '1700000000000',
        description: body.description,
        aliases: [],
        tags,
      };
      this.versions.push(version);
      if (this.failAfterCreate !== null) {
        const status = this.failAfterCreate;
        this.failAfterCreate = null;
        return json({ error_code: 'INTERNAL_ERROR', message: 'upstream reset' }, status);
      }
      return json({ model_version: version });
    }

    if (method === 'GET' && path === 'model-versions/search') {
      const offset = Number(query.get('page_token') ?? '0');
      const matching = this.versions.filter((version) => `name='${version.name}'` === query.get('filter')).reverse();
      const page = matching.slice(offset, offset + this.pageSize);
      const next = offset + this.pageSize < matching.length ? String(offset + this.pageSize) : undefined;
      return json({ model_versions: page, ...(next ? { next_page_token: next } : {}) });
    }

    return json({ error_code: 'ENDPOINT_NOT_FOUND', message: `No route for ${method} ${path}` }, 404);
  }
}

describe('MlflowRegistryClient', () => {
  let server: FakeMlflow;
  let fetchImpl: Mock<typeof fetch>;
  let client: MlflowRegistryClient;

  function requestedPaths(): string[] {
    return fetchImpl.mock.calls.map(([input, init]) => {
      const url = new URL(String(input));
      return `${init?.method ?? 'GET'} ${url.pathname.replace('/api/2.0/mlflow/', '')}`;
    });
  }

  beforeEach(() => {
    server = new FakeMlflow();
    fetchImpl = vi.fn<typeof fetch>(async (input, init) => server.handle(new URL(String(input)), init));
    client = new MlflowRegistryClient({
      trackingUri: 'http://mlflow.test:5000/',
      metricName: 'accuracy',
      requestTimeoutMs: 1000,
      retry: {
        maxAttempts: 3,
        initialDelayMs: 1,
        maxDelayMs: 2,
        backoffMultiplier: 2,
        retryableErrors: ['ECONNREFUSED', 'TIMEOUT', 'HTTP_5XX'],
      },
      logger: silentLogger(),
      fetchImpl,
    });
  });

  describe('getVersionByAlias', () => {
    it('maps an unknown alias to NotFound', async () => {
      const result = await client.getVersionByAlias(MODEL_NAME, 'production');

      expect(result.err).toBe(true);
      if (result.err) {
        expect(result.val).toBeInstanceOf(NotFound);
        expect(result.val.key).toBe(`${MODEL_NAME}@production`);
      }
    });

    it('reads the metric from the run that produced the version', async () => {
      server.runs.set('run-1', { metrics: { accuracy: 0.93, f1: 0.91 }, params: {} });
      server.versions.push({
        name: MODEL_NAME,
        version: '4',
        source: 'models/v4.json',
        run_id: 'run-1',
        creation_timestamp: '1700000000000',
        description: 'accuracy: 0.9300',
        aliases: ['production'],
      });

      const result = await client.getVersionByAlias(MODEL_NAME, 'production');

      expect(result.ok && result.val).toEqual({
        modelName: MODEL_NAME,
        version: 4,
        artifactRef: 'models/v4.json',
        runId: 'run-1',
        metric: 0.93,
        aliases: ['production'],
        createdAt: 1_700_000_000_000,
        description: 'accuracy: 0.9300',
      });
      expect(String(fetchImpl.mock.calls[0]?.[0])).toBe(
        `${BASE}/registered-models/alias?name=${MODEL_NAME}&alias=production`
      );
    });

    it('reports a null metric when the run is gone', async () => {
      server.versions.push({
        name: MODEL_NAME,
        version: '1',
        source: 'models/v1.json',
        run_id: 'deleted-run',
        creation_timestamp: '1',
        aliases: ['production'],
      });

      const result = await client.getVersionByAlias(MODEL_NAME, 'production');

      expect(result.ok && result.val.metric).toBeNull();
    });
  });

  describe('registerVersion', () => {
    it('creates the registered model on first registration', async () => {
      const version = await client.registerVersion({
        modelName: MODEL_NAME,
        artifactRef: 'models/v1.json',
        metric: 0.9,
        runId: 'run-1',
        description: 'accuracy: 0.9000',
      });

      expect(version).toEqual({
        modelName: MODEL_NAME,
        version: 1,
        artifactRef: 'models/v1.json',
        runId: 'run-1',
        metric: 0.9,
        aliases: [],
        createdAt: 1_700_000_000_000,
        description: 'accuracy: 0.9000',
      });
      expect(requestedPaths()).toEqual([
        'GET registered-models/get',
        'POST registered-models/create',
        'POST model-versions/create',
      ]);
      expect(server.versions[0]?.tags).toEqual([{ key: 'metric.accuracy', value: '0.9' }]);
    });

    it('keeps the metric of a version registered without a run', async () => {
      await client.registerVersion({ modelName: MODEL_NAME, artifactRef: 'models/v1.json', metric: 0.9 });
      await client.setAlias(MODEL_NAME, 'production', 1);

      const production = await client.getVersionByAlias(MODEL_NAME, 'production');

      expect(production.ok && production.val.metric).toBe(0.9);
      expect(requestedPaths()).not.toContain('GET runs/get');
    });

    it('does not retry a create the server may already have committed', async () => {
      server.models.add(MODEL_NAME);
      server.failAfterCreate = 502;

      await expect(
        client.registerVersion({ modelName: MODEL_NAME, artifactRef: 'models/v1.json', metric: 0.9 })
      ).rejects.toMatchObject({
        code: 'RegistryUnavailable',
        message: 'Registry unavailable: MLflow POST model-versions/create failed with HTTP 502: upstream reset',
      });
      expect(server.versions).toHaveLength(1);
      expect(requestedPaths()).toEqual(['GET registered-models/get', 'POST model-versions/create']);
    });

    it('retries a create that never reached the server', async () => {
      server.models.add(MODEL_NAME);
      fetchImpl
        .mockImplementationOnce(async (input, init) => server.handle(new URL(String(input)), init))
        .mockRejectedValueOnce(
          new TypeError('fetch failed', { cause: Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }) })
        );

      const version = await client.registerVersion({ modelName: MODEL_NAME, artifactRef: 'models/v1.json', metric: 0.9 });

      expect(version.version).toBe(1);
      expect(server.versions).toHaveLength(1);
      expect(requestedPaths()).toEqual([
        'GET registered-models/get',
        'POST model-versions/create',
        'POST model-versions/create',
      ]);
    });

    it('skips model creation when it already exists', async () => {
      server.models.add(MODEL_NAME);

      await client.registerVersion({ modelName: MODEL_NAME, artifactRef: 'models/v1.json', metric: 0.9 });

      expect(requestedPaths()).toEqual(['GET registered-models/get', 'POST model-versions/create']);
    });
  });

  describe('promotion against the tracking server', () => {
    it('parks a worse model as challenger when versions carry no run', async () => {
      const engine = new PromotionEngine({ registry: client, logger: silentLogger() });

      const first = await engine.registerAndDecide(MODEL_NAME, 'models/v1.json', 0.9);
      const second = await engine.registerAndDecide(MODEL_NAME, 'models/v2.json', 0.85);

      expect(first.promoted).toBe(true);
      expect(second.decision).toEqual({ newMetric: 0.85, baselineMetric: 0.9, promoted: false });
      expect(second.alias).toBe('challenger');
      expect(server.versions.map((version) => version.aliases)).toEqual([['production'], ['challenger']]);
    });
  });

  describe('setAlias', () => {
    it('moves the alias to the requested version', async () => {
      await client.registerVersion({ modelName: MODEL_NAME, artifactRef: 'models/v1.json', metric: 0.9 });
      await client.registerVersion({ modelName: MODEL_NAME, artifactRef: 'models/v2.json', metric: 0.95 });

      await client.setAlias(MODEL_NAME, 'production', 1);
      await client.setAlias(MODEL_NAME, 'production', 2);

      expect(server.versions.map((version) => version.aliases)).toEqual([[], ['production']]);
      const lastCall = fetchImpl.mock.calls.at(-1);
      expect(lastCall?.[1]?.body).toBe(JSON.stringify({ name: MODEL_NAME, alias: 'production', version: '2' }));
    });

    it('rejects a version the registry does not know', async () => {
      await expect(client.setAlias(MODEL_NAME, 'challenger', 7)).rejects.toMatchObject({
        code: 'InvalidParams',
        message: `Cannot set alias 'challenger': ${MODEL_NAME} v7 not found`,
      });
    });
  });

  describe('listVersions', () => {
    it('follows page tokens and sorts by version', async () => {
      server.pageSize = 2;
      for (const source of ['a', 'b', 'c']) {
        await client.registerVersion({ modelName: MODEL_NAME, artifactRef: source, metric: 0.5 });
      }
      fetchImpl.mockClear();

      const versions = await client.listVersions(MODEL_NAME);

      expect(versions.map((version) => version.version)).toEqual([1, 2, 3]);
      expect(versions.map((version) => version.artifactRef)).toEqual(['a', 'b', 'c']);
      expect(requestedPaths()).toEqual(['GET model-versions/search', 'GET model-versions/search']);
    });
  });

  describe('transport failures', () => {
    it('retries a 5xx response and then succeeds', async () => {
      fetchImpl.mockResolvedValueOnce(json({ error_code: 'INTERNAL_ERROR', message: 'busy' }, 503));

      const result = await client.getVersionByAlias(MODEL_NAME, 'production');

      expect(result.err).toBe(true);
      expect(fetchImpl).toHaveBeenCalledTimes(2);
    });

    it('retries a refused connection', async () => {
      fetchImpl.mockRejectedValueOnce(
        new TypeError('fetch failed', { cause: Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }) })
      );

      const result = await client.getVersionByAlias(MODEL_NAME, 'production');

      expect(result.err).toBe(true);
      expect(fetchImpl).toHaveBeenCalledTimes(2);
    });

    it('raises RegistryUnavailable once attempts are exhausted', async () => {
      fetchImpl.mockImplementation(async () => json({ error_code: 'INTERNAL_ERROR', message: 'boom' }, 500));

      const error: unknown = await client.getVersionByAlias(MODEL_NAME, 'production').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LifecycleError);
      expect(error).toMatchObject({
        code: 'RegistryUnavailable',
        message: 'Registry unavailable: MLflow GET registered-models/alias failed with HTTP 500: boom',
      });
      expect(fetchImpl).toHaveBeenCalledTimes(3);
    });

    it('does not retry a client error', async () => {
      fetchImpl.mockImplementation(async () => json({ error_code: 'PERMISSION_DENIED', message: 'nope' }, 403));

      await expect(client.listVersions(MODEL_NAME)).rejects.toMatchObject({ code: 'RegistryUnavailable' });
      expect(fetchImpl).toHaveBeenCalledTimes(1);
    });
  });
});
