import { ApiProvisioner } from './api-provisioner';
import { FunctionProvisioner } from './function-provisioner';
import { StorageProvisioner } from './storage-provisioner';
import { TableProvisioner } from './table-provisioner';
import { CloudResourceClient, ProvisionerOptions, ProvisionerSet } from './types';

export * from './types';
export * from './retry';
export * from './base-provisioner';
export * from './storage-provisioner';
export * from './table-provisioner';
export * from './function-provisioner';
export * from './api-provisioner';
export * from './in-memory-client';
export * from './aws-resource-client';
export * from './s3-manager';
export * from './dynamodb-manager';
export * from './lambda-manager';
export * from './api-gateway-manager';
export * from './iam-manager';

/**
 * One provisioner per resource kind, all talking to the same client
 */
export function createProvisioners(client: CloudResourceClient, options: ProvisionerOptions = {}): ProvisionerSet {
  return {
    storage: new StorageProvisioner(client, options),
    table: new TableProvisioner(client, options),
    function: new FunctionProvisioner(client, options),
    api: new ApiProvisioner(client, options)
  };
}
