import { basename } from 'path';
import { DeploymentConfig, ProvisionResult } from '../types';
import { BaseProvisioner } from './base-provisioner';
import { FunctionSpec } from './types';

export const DEFAULT_FUNCTION_RUNTIME = 'nodejs20.x';
export const DEFAULT_FUNCTION_HANDLER = 'index.handler';
export const DEFAULT_FUNCTION_TIMEOUT = 30;
export const DEFAULT_FUNCTION_MEMORY = 128;
/** Package path used when the configuration names none, relative to the working directory */
export const DEFAULT_FUNCTION_PACKAGE = 'function.zip';

/**
 * Object key the function package is uploaded under in the storage bucket
 */
export function packageKey(functionName: string, packagePath: string): string {
  return `functions/${functionName}/${basename(packagePath)}`;
}

/**
 * Ensures the stack's function exists and runs the current package. Needs the
 * table (bound into the function environment) and the bucket (which holds the
 * uploaded package). An existing function gets its settings and code updated.
 */
export class FunctionProvisioner extends BaseProvisioner {
  readonly kind = 'function' as const;

  async ensure(config: DeploymentConfig): Promise<ProvisionResult> {
    const {
      function_name: functionName,
      table_name: tableName,
      storage_bucket_name: bucketName
    } = this.requireFields(config, ['function_name', 'table_name', 'storage_bucket_name']);

    const existing = await this.call('findResource', () => this.client.findResource('function', functionName));

    const packagePath = config.function_package ?? DEFAULT_FUNCTION_PACKAGE;

    const key = packageKey(functionName, packagePath);
    this.logger.log(`Uploading ${packagePath} to s3://${bucketName}/${key}`);
    await this.call('uploadObject', () => this.client.uploadObject(bucketName, key, packagePath));

    const spec: FunctionSpec = {
      name: functionName,
      runtime: config.function_runtime ?? DEFAULT_FUNCTION_RUNTIME,
      handler: config.function_handler ?? DEFAULT_FUNCTION_HANDLER,
      timeout: config.function_timeout ?? DEFAULT_FUNCTION_TIMEOUT,
      memorySize: config.function_memory ?? DEFAULT_FUNCTION_MEMORY,
      roleArn: config.function_role_arn,
      code: { bucket: bucketName, key },
      environment: {
        ...config.function_environment,
        TABLE_NAME: tableName,
        STORAGE_BUCKET_NAME: bucketName
      },
      access: { tableName, bucketName },
      tags: config.tags
    };

    if (existing) {
      this.logger.log(`Function ${functionName} found, updating it`);
      const identifier = await this.call('updateFunction', () => this.client.updateFunction(spec));
      return this.result(identifier, true);
    }

    this.logger.log(`Function ${functionName} not found, creating a new one`);
    const identifier = await this.call('createFunction', () => this.client.createFunction(spec));

    return this.result(identifier, false);
  }

  private result(identifier: string, alreadyExisted: boolean): ProvisionResult {
    return {
      resourceKind: this.kind,
      identifier,
      alreadyExisted,
      outputs: { function_arn_or_id: identifier }
    };
  }
}
