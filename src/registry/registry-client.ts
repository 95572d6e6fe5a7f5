/**
 * Registry Client contract
 *
 * The minimal surface the lifecycle core needs from an external versioned
 * model store. "Not found" is a value (`Err(NotFound)`), never an exception;
 * exceptions are reserved for an unreachable store (`RegistryUnavailable`).
 */

import type { Result } from 'ts-results';
import type {
  AliasTable,
  ModelAlias,
  ModelVersion,
  RegisterVersionRequest,
  RunData,
} from '../types/registry.js';

export class NotFound extends Error {
  public readonly resource: string;
  public readonly key: string;

  constructor(resource: string, key: string) {
    super(`${resource} not found: ${key}`);
    this.name = 'NotFound';
    this.resource = resource;
    this.key = key;
  }
}

export interface RegistryClient {
  /**
   * Version currently holding `alias`, or NotFound when no version does
   * (or the model itself is unknown).
   */
  getVersionByAlias(modelName: string, alias: ModelAlias): Promise<Result<ModelVersion, NotFound>>;

  getRunData(runId: string): Promise<Result<RunData, NotFound>>;

  /**
   * Register a new version with no alias.
   */
  registerVersion(request: RegisterVersionRequest): Promise<ModelVersion>;

  /**
   * Point `alias` at `version`, revoking it from the previous holder in the
   * same step.
   */
  setAlias(modelName: string, alias: ModelAlias, version: number): Promise<void>;

  /**
   * All versions, ascending by version number. Empty for an unknown model.
   */
  listVersions(modelName: string): Promise<ModelVersion[]>;
}

export function buildAliasTable(versions: readonly ModelVersion[]): AliasTable {
  const table: AliasTable = {};
  for (const version of versions) {
    for (const alias of version.aliases) {
      table[alias] = version.version;
    }
  }
  return table;
}
