// Provisioning-specific types
import { DeploymentConfig, Logger, ProvisionResult, ResourceKind } from '../types';
import { RetryOptions } from './retry';

export interface StorageResourceSpec {
  kind: 'storage';
  name: string;
  region: string;
  tags?: Record<string, string>;
}

export interface TableKeySchema {
  partitionKey: { name: string; type: 'S' | 'N' | 'B' };
  sortKey?: { name: string; type: 'S' | 'N' | 'B' };
}

export interface TableResourceSpec {
  kind: 'table';
  name: string;
  keySchema: TableKeySchema;
  tags?: Record<string, string>;
}

export interface ApiResourceSpec {
  kind: 'api';
  name: string;
  description?: string;
  tags?: Record<string, string>;
}

export type ResourceSpec = StorageResourceSpec | TableResourceSpec | ApiResourceSpec;

export interface FunctionSpec {
  name: string;
  runtime: string;
  handler: string;
  timeout: number;
  memorySize: number;
  /** Execution role; when absent the client provides one */
  roleArn?: string;
  code: { bucket: string; key: string };
  environment: Record<string, string>;
  /** Resources the execution role must be allowed to reach */
  access: { tableName: string; bucketName: string };
  tags?: Record<string, string>;
}

export interface RouteSpec {
  method: string;
  path: string;
}

/**
 * Capabilities the provisioners need from a cloud provider.
 * Any implementation can be swapped in without touching the provisioners.
 */
export interface CloudResourceClient {
  /** Existence check: the identifier of the named resource, or null when it does not exist */
  findResource(kind: ResourceKind, name: string): Promise<string | null>;
  createResource(spec: ResourceSpec): Promise<string>;
  createFunction(spec: FunctionSpec): Promise<string>;
  /** Apply the spec's settings and code to an existing function */
  updateFunction(spec: FunctionSpec): Promise<string>;
  /** Bind a route of the API to the target function */
  createRoute(apiId: string, route: RouteSpec, targetIdentifier: string): Promise<void>;
  /** Deploy the API to a stage and return its public URL */
  publishApi(apiId: string, stageName: string): Promise<string>;
  uploadObject(bucket: string, key: string, filePath: string): Promise<void>;
}

export interface ResourceProvisioner {
  readonly kind: ResourceKind;
  ensure(config: DeploymentConfig): Promise<ProvisionResult>;
}

export interface ProvisionerOptions {
  logger?: Logger;
  retry?: RetryOptions;
}

export type ProvisionerSet = Record<ResourceKind, ResourceProvisioner>;
