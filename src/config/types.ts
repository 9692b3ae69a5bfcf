import { DeploymentConfig } from '../types';

// Configuration-specific types
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export type ConfigFormat = 'json' | 'yaml';

/**
 * Durable home of a DeploymentConfig between runs.
 */
export interface ConfigStore {
  readonly path: string;
  exists(): Promise<boolean>;
  load(): Promise<DeploymentConfig>;
  save(config: DeploymentConfig): Promise<void>;
}
