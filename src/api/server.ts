/**
 * API Server
 *
 * REST API server with Express.js exposing the serving layer and the
 * retrain trigger.
 */

import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Logger } from 'pino';
import type { ModelService, ModelInfoReport } from '../serving/model-service.js';
import type { RetrainCoordinator } from '../retrain/retrain-coordinator.js';
import { PredictRequestSchema, RetrainRequestSchema, toFeatureVector } from '../types/schemas/prediction.js';
import { LifecycleError, httpStatusFor, zodErrorToLifecycleError } from './errors.js';

export interface ApiServerConfig {
  port: number;
  bindAddress: string;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const RETRAIN_STARTED_MESSAGE =
  'Model retraining has been started in the background. The new model will be used for predictions once training is complete.';

function isBodyParseError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';
}

function toModelInfoBody(report: ModelInfoReport): Record<string, unknown> {
  if (!report.available) {
    return {
      available: false,
      model_name: report.modelName,
      message: report.message,
      served_version: report.servedVersion,
    };
  }

  return {
    available: true,
    model_name: report.modelName,
    version: report.production.version,
    artifact_ref: report.production.artifactRef,
    run_id: report.production.runId,
    metric: report.production.metric,
    description: report.production.description,
    created_at: report.production.createdAt,
    metrics: report.metrics,
    params: report.params,
    aliases: report.aliases,
    version_count: report.versionCount,
    served_version: report.servedVersion,
  };
}

/**
 * API Server
 *
 * - POST /predict
 * - GET /health
 * - GET /model/info
 * - POST /retrain
 *
 * @example
 * ```typescript
 * const server = new ApiServer(modelService, coordinator, { port: 8000, bindAddress: '0.0.0.0' }, logger);
 * await server.start();
 * ```
 */
export class ApiServer {
  private readonly app: Application;
  private server?: Server;
  private readonly modelService: ModelService;
  private readonly coordinator: RetrainCoordinator;
  private readonly config: ApiServerConfig;
  private readonly logger: Logger;

  constructor(modelService: ModelService, coordinator: RetrainCoordinator, config: ApiServerConfig, logger: Logger) {
    this.modelService = modelService;
    this.coordinator = coordinator;
    this.config = config;
    this.logger = logger;

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  public getApp(): Application {
    return this.app;
  }

  /**
   * Bound address once started (port is resolved when configured as 0)
   */
  public getAddress(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  private setupMiddleware(): void {
    this.app.use(
      cors({
        origin: '*',
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type'],
      })
    );

    this.app.use(express.json({ limit: '16kb' }));

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.logger.debug({ method: req.method, path: req.path }, 'HTTP request');
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/health', this.wrap(this.handleHealth));
    this.app.post('/predict', this.wrap(this.handlePredict));
    this.app.get('/model/info', this.wrap(this.handleModelInfo));
    this.app.post('/retrain', this.wrap(this.handleRetrain));
  }

  private setupErrorHandling(): void {
    this.app.use((req: Request, res: Response) => {
      res.status(404).json({
        error: 'NotFound',
        message: `Route ${req.method} ${req.path} not found`,
      });
    });

    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      const error = isBodyParseError(err)
        ? new LifecycleError('InvalidParams', 'Request body is not valid JSON')
        : err instanceof LifecycleError
          ? err
          : null;

      if (!error) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error({ method: req.method, path: req.path, error: message }, 'Unhandled API error');
        res.status(500).json({ error: 'InternalError', message });
        return;
      }

      const status = httpStatusFor(error);
      const context = { method: req.method, path: req.path, code: error.code, error: error.message };
      if (status >= 500) {
        this.logger.error(context, 'API error');
      } else {
        this.logger.debug(context, 'Rejected request');
      }

      res.status(status).json({ error: error.code, message: error.message });
    });
  }

  /**
   * Route async handlers' rejections to the error middleware.
   */
  private wrap(handler: AsyncHandler): (req: Request, res: Response, next: NextFunction) => void {
    return (req, res, next) => {
      handler.call(this, req, res).catch(next);
    };
  }

  private async handleHealth(_req: Request, res: Response): Promise<void> {
    const health = await this.modelService.health();
    res.json({
      status: health.status,
      model_loaded: health.loaded,
      model_available: health.available,
      model_version: health.version,
      model_name: health.modelName,
    });
  }

  private async handlePredict(req: Request, res: Response): Promise<void> {
    const parsed = PredictRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw zodErrorToLifecycleError(parsed.error);
    }

    const prediction = await this.modelService.predict(toFeatureVector(parsed.data));
    res.json({ prediction: prediction.label, model_version: prediction.version });
  }

  private async handleModelInfo(_req: Request, res: Response): Promise<void> {
    const report = await this.modelService.modelInfo();
    res.json(toModelInfoBody(report));
  }

  private async handleRetrain(req: Request, res: Response): Promise<void> {
    // Always accepted; the reason is informational only
    const parsed = RetrainRequestSchema.safeParse(req.body);
    const reason = (parsed.success ? parsed.data.reason : undefined) ?? 'api request';

    const ack = this.coordinator.request(reason, 'api');
    this.logger.info({ queued: ack.queued }, 'Retrain requested over HTTP');

    res.status(202).json({
      status: 'retraining_started',
      message: RETRAIN_STARTED_MESSAGE,
      queued: ack.queued,
    });
  }

  async start(): Promise<void> {
    const { port, bindAddress } = this.config;

    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, bindAddress, () => {
        const actualPort = this.getAddress()?.port ?? port;
        this.logger.info({ port: actualPort, bindAddress }, 'API server started');
        resolve();
      });

      server.on('error', (error) => {
        this.logger.error({ error: error.message }, 'Server error');
        reject(error);
      });

      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      this.logger.warn('Server not running');
      return;
    }

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          this.logger.error({ error: error.message }, 'Failed to stop server');
          reject(error);
        } else {
          this.logger.info('API server stopped');
          this.server = undefined;
          resolve();
        }
      });
    });
  }

  isRunning(): boolean {
    return this.server !== undefined;
  }
}
