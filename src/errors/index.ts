import { ResourceKind } from '../types';

export type ErrorCode =
  | 'CONFIG_MISSING'
  | 'CONFIG_INVALID'
  | 'CONFIG_SAVE_FAILED'
  | 'DEPENDENCY_UNSATISFIED'
  | 'TRANSIENT_PROVIDER_ERROR'
  | 'PERMANENT_PROVIDER_ERROR'
  | 'UNEXPECTED_ERROR';

export interface ProvisioningErrorOptions {
  cause?: unknown;
  remediation?: string;
}

/**
 * Base class for every error hackstack raises on purpose.
 */
export class ProvisioningError extends Error {
  readonly code: ErrorCode;
  readonly remediation?: string;

  constructor(message: string, code: ErrorCode, options: ProvisioningErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.remediation = options.remediation;
  }
}

export class ConfigMissingError extends ProvisioningError {
  constructor(readonly path: string) {
    super(`Configuration file not found: ${path}`, 'CONFIG_MISSING', {
      remediation: 'Run `hackstack init` to create a configuration file'
    });
  }
}

export class ConfigInvalidError extends ProvisioningError {
  constructor(readonly path: string, readonly violations: string[]) {
    super(`Invalid configuration in ${path}:\n${violations.join('\n')}`, 'CONFIG_INVALID', {
      remediation: 'Fix the listed fields or re-run `hackstack init`'
    });
  }
}

export class ConfigSaveError extends ProvisioningError {
  constructor(readonly path: string, cause: unknown) {
    super(`Could not save configuration to ${path}: ${errorName(cause)}: ${errorMessage(cause)}`, 'CONFIG_SAVE_FAILED', {
      cause,
      remediation: 'Make sure the configuration file is writable, then re-run to resume from this step'
    });
  }
}

export class DependencyUnsatisfiedError extends ProvisioningError {
  constructor(readonly step: ResourceKind, readonly missingFields: string[]) {
    super(
      `Step "${step}" cannot run: missing ${missingFields.join(', ')}`,
      'DEPENDENCY_UNSATISFIED',
      { remediation: 'Run the earlier provisioning steps first, or set the missing fields in the configuration' }
    );
  }
}

export class TransientProviderError extends ProvisioningError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TRANSIENT_PROVIDER_ERROR', {
      cause,
      remediation: 'Retry the command; the provider reported a temporary failure'
    });
  }
}

export class PermanentProviderError extends ProvisioningError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PERMANENT_PROVIDER_ERROR', {
      cause,
      remediation: 'Check the resource names, region, credentials and account quotas'
    });
  }
}

/** A failure that did not come from the provider, such as a bug in hackstack itself */
export class UnexpectedError extends ProvisioningError {
  constructor(message: string, cause?: unknown) {
    super(message, 'UNEXPECTED_ERROR', {
      cause,
      remediation: 'Re-run with --verbose to see the full error'
    });
  }
}

/**
 * Transient AWS errors worth retrying.
 */
const TRANSIENT_ERROR_NAMES = new Set([
  'ThrottlingException',
  'Throttling',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'ProvisionedThroughputExceededException',
  'ServiceUnavailable',
  'ServiceUnavailableException',
  'InternalFailure',
  'InternalServerError',
  'InternalError',
  'OperationAbortedException',
  'ResourceInUseException',
  'ResourceConflictException',
  'TimeoutError',
  'RequestTimeout',
  'NetworkingError',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN'
]);

export function errorName(error: unknown): string {
  if (typeof error === 'object' && error !== null) {
    if ('name' in error && typeof error.name === 'string' && error.name !== 'Error') {
      return error.name;
    }
    if ('code' in error && typeof error.code === 'string') {
      return error.code;
    }
  }
  return 'Error';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function httpStatusCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && '$metadata' in error) {
    const metadata = error.$metadata;
    if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata) {
      return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
    }
  }
  return undefined;
}

/** Returns true for errors that are likely transient and safe to retry. */
export function isTransientAwsError(error: unknown): boolean {
  const name = errorName(error);
  if (TRANSIENT_ERROR_NAMES.has(name)) return true;

  const status = httpStatusCode(error);
  if (status !== undefined && (status === 429 || (status >= 500 && status < 600))) return true;

  const message = errorMessage(error);
  if (message.includes('ECONNRESET') || message.includes('ETIMEDOUT')) return true;

  // A freshly created IAM role takes a few seconds to become assumable by Lambda
  return name === 'InvalidParameterValueException' && message.includes('cannot be assumed');
}

/**
 * Maps any error raised by a provider call onto the provider error taxonomy.
 * Errors that are already ProvisioningErrors pass through unchanged.
 */
export function toProviderError(error: unknown, action: string): ProvisioningError {
  if (error instanceof ProvisioningError) {
    return error;
  }

  const message = `${action} failed: ${errorName(error)}: ${errorMessage(error)}`;
  return isTransientAwsError(error)
    ? new TransientProviderError(message, error)
    : new PermanentProviderError(message, error);
}

/**
 * Errors that are not ProvisioningErrors were not classified by a provider
 * call, so they are reported as unexpected rather than as provider failures.
 */
export function asProvisioningError(error: unknown, action: string): ProvisioningError {
  if (error instanceof ProvisioningError) {
    return error;
  }
  return new UnexpectedError(`${action} failed: ${errorMessage(error)}`, error);
}

export function isProvisioningError(error: unknown): error is ProvisioningError {
  return error instanceof ProvisioningError;
}
