// Core type definitions for hackstack

export type ResourceKind = 'storage' | 'table' | 'function' | 'api';

/** Fixed provisioning order; each step may depend on the outputs of earlier ones. */
export const DEPLOYMENT_STEPS: readonly ResourceKind[] = ['storage', 'table', 'function', 'api'];

export interface DeploymentConfig {
  stack_name: string;
  region: string;
  aws_profile?: string;

  // Derived names
  storage_bucket_name?: string;
  table_name?: string;
  function_name?: string;
  api_name?: string;

  // Function settings
  function_package?: string;
  function_role_arn?: string;
  function_runtime?: string;
  function_handler?: string;
  function_timeout?: number;
  function_memory?: number;
  function_environment?: Record<string, string>;

  // API settings
  api_routes?: string[];
  api_stage?: string;

  tags?: Record<string, string>;

  // Identifiers written back by the provisioning steps
  storage_bucket_arn?: string;
  table_arn?: string;
  function_arn_or_id?: string;
  api_id?: string;
  api_endpoint?: string;
}

export type ConfigPatch = Partial<DeploymentConfig>;

export interface Endpoint {
  type: 'api';
  url: string;
  description: string;
}

export interface ProvisionResult {
  resourceKind: ResourceKind;
  identifier: string;
  alreadyExisted: boolean;
  outputs: ConfigPatch;
  endpoint?: Endpoint;
}

export interface DeploymentError {
  code: string;
  message: string;
  details?: unknown;
  remediation?: string;
}

export interface DeploymentMetadata {
  deploymentId: string;
  timestamp: Date;
  duration?: number;
  region: string;
  stackName: string;
}

export type Logger = Pick<Console, 'log' | 'warn'>;
