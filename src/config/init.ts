import { v4 as uuidv4 } from 'uuid';
import { DeploymentConfig } from '../types';
import { ResourceNamingService } from './naming';

export const DEFAULT_REGION = 'us-east-1';

export interface InitOptions {
  stackName?: string;
  region?: string;
  awsProfile?: string;
  functionPackage?: string;
  functionRoleArn?: string;
}

/**
 * Build a new configuration, or fill the missing fields of an existing one.
 * Fields already present are never overwritten.
 */
export function initializeConfig(
  existing: DeploymentConfig | undefined,
  options: InitOptions = {},
  naming: ResourceNamingService = new ResourceNamingService()
): DeploymentConfig {
  const config: DeploymentConfig = {
    ...existing,
    stack_name: existing?.stack_name ?? options.stackName ?? `hack-${uuidv4().slice(0, 8)}`,
    region: existing?.region ?? options.region ?? DEFAULT_REGION
  };

  if (config.aws_profile === undefined && options.awsProfile) {
    config.aws_profile = options.awsProfile;
  }
  if (config.function_package === undefined && options.functionPackage) {
    config.function_package = options.functionPackage;
  }
  if (config.function_role_arn === undefined && options.functionRoleArn) {
    config.function_role_arn = options.functionRoleArn;
  }

  return naming.deriveNames(config);
}
