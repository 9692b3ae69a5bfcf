import { ConfigMissingError } from '../errors';
import { DeploymentConfig } from '../types';
import { ConfigStore } from './types';

/**
 * ConfigStore that keeps the configuration in memory; nothing touches disk.
 * Backs dry runs and tests.
 */
export class MemoryConfigStore implements ConfigStore {
  readonly path: string;
  readonly saved: DeploymentConfig[] = [];
  private current?: DeploymentConfig;

  constructor(initial?: DeploymentConfig, path = '<memory>') {
    this.path = path;
    this.current = initial ? structuredClone(initial) : undefined;
  }

  async exists(): Promise<boolean> {
    return this.current !== undefined;
  }

  async load(): Promise<DeploymentConfig> {
    if (!this.current) {
      throw new ConfigMissingError(this.path);
    }
    return structuredClone(this.current);
  }

  async save(config: DeploymentConfig): Promise<void> {
    this.current = structuredClone(config);
    this.saved.push(structuredClone(config));
  }
}
