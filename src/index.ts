/**
 * model-lifecycle-serving
 *
 * Registration and promotion of classifier versions, hot-swapped serving of
 * the production version, and signal-driven retraining.
 */

export { LifecycleApplication, type LifecycleApplicationOptions, type StartOptions } from './services/application.js';

export {
  PromotionEngine,
  decidePromotion,
  NO_PRODUCTION_BASELINE,
  type PromotionDecision,
  type PromotionOutcome,
  type RegisterOptions,
} from './promotion/promotion-engine.js';

export {
  ModelService,
  type Prediction,
  type HealthReport,
  type ModelInfoReport,
} from './serving/model-service.js';
export { ServingState, type ServingSnapshot } from './serving/serving-state.js';
export {
  JsonModelLoader,
  LinearClassifier,
  LinearArtifactSchema,
  type Classifier,
  type ModelLoader,
  type LinearArtifact,
} from './serving/model-loader.js';

export {
  createRegistryClient,
  InMemoryRegistry,
  MlflowRegistryClient,
  MlflowHttpError,
  NotFound,
  buildAliasTable,
  type RegistryClient,
} from './registry/index.js';

export { RetrainMonitor, type PollResult } from './retrain/retrain-monitor.js';
export { RetrainCoordinator, type RetrainRunResult, type RetrainSource } from './retrain/retrain-coordinator.js';
export { CommandJobRunner, type JobRunner, type JobOutcome, type JobDefinition } from './retrain/job-runner.js';
export { SignalFile, type RetrainSignal } from './retrain/signal-file.js';

export { ApiServer, type ApiServerConfig } from './api/server.js';
export { LifecycleError, toLifecycleError, type LifecycleErrorCode } from './api/errors.js';

export {
  loadConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  getServiceConfig,
  toServiceConfig,
  type ServiceConfig,
  type RuntimeConfig,
} from './config/loader.js';

export { TelemetryManager, type LifecycleMetrics } from './telemetry/otel.js';
export { createLogger, createRootLogger } from './utils/logger.js';

export type { ModelVersion, ModelAlias, RunData, AliasTable } from './types/registry.js';
