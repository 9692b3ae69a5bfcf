import { DependencyUnsatisfiedError, toProviderError } from '../errors';
import { DeploymentConfig, Logger, ProvisionResult, ResourceKind } from '../types';
import { retryWithBackoff, RetryOptions } from './retry';
import { CloudResourceClient, ProvisionerOptions, ResourceProvisioner } from './types';

type StringField = {
  [K in keyof DeploymentConfig]-?: DeploymentConfig[K] extends string | undefined ? K : never;
}[keyof DeploymentConfig];

/**
 * Shared plumbing for the per-kind provisioners: dependency checks and
 * retried provider calls.
 */
export abstract class BaseProvisioner implements ResourceProvisioner {
  abstract readonly kind: ResourceKind;
  protected readonly logger: Logger;
  private readonly retryOptions: RetryOptions;

  constructor(protected readonly client: CloudResourceClient, options: ProvisionerOptions = {}) {
    this.logger = options.logger ?? console;
    this.retryOptions = options.retry ?? {};
  }

  abstract ensure(config: DeploymentConfig): Promise<ProvisionResult>;

  /**
   * Read the string fields this step depends on.
   * @throws DependencyUnsatisfiedError naming every absent field
   */
  protected requireFields<F extends StringField>(config: DeploymentConfig, fields: readonly F[]): Record<F, string> {
    const missing: string[] = [];
    const values: Partial<Record<F, string>> = {};

    for (const field of fields) {
      const value = config[field];
      if (typeof value === 'string' && value.length > 0) {
        values[field] = value;
      } else {
        missing.push(field);
      }
    }

    if (missing.length > 0 || !isComplete(values, fields)) {
      throw new DependencyUnsatisfiedError(this.kind, missing);
    }

    return values;
  }

  /**
   * Run one provider call, classifying its failures and retrying the transient ones
   */
  protected call<T>(action: string, fn: () => Promise<T>): Promise<T> {
    return retryWithBackoff(async () => {
      try {
        return await fn();
      } catch (error) {
        throw toProviderError(error, action);
      }
    }, { logger: this.logger, ...this.retryOptions, label: `${this.kind}:${action}` });
  }
}

function isComplete<F extends string>(values: Partial<Record<F, string>>, fields: readonly F[]): values is Record<F, string> {
  return fields.every(field => typeof values[field] === 'string');
}
