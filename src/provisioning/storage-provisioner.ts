import { DeploymentConfig, ProvisionResult } from '../types';
import { BaseProvisioner } from './base-provisioner';

/**
 * Ensures the stack's object-storage bucket exists. Has no inputs from other steps.
 */
export class StorageProvisioner extends BaseProvisioner {
  readonly kind = 'storage' as const;

  async ensure(config: DeploymentConfig): Promise<ProvisionResult> {
    const { storage_bucket_name: bucketName } = this.requireFields(config, ['storage_bucket_name']);

    const existing = await this.call('findResource', () => this.client.findResource('storage', bucketName));
    if (existing) {
      this.logger.log(`Bucket ${bucketName} already exists`);
      return this.result(existing, true);
    }

    this.logger.log(`Bucket ${bucketName} not found, creating a new one`);
    const identifier = await this.call('createResource', () => this.client.createResource({
      kind: 'storage',
      name: bucketName,
      region: config.region,
      tags: config.tags
    }));

    return this.result(identifier, false);
  }

  private result(identifier: string, alreadyExisted: boolean): ProvisionResult {
    return {
      resourceKind: this.kind,
      identifier,
      alreadyExisted,
      outputs: { storage_bucket_arn: identifier }
    };
  }
}
