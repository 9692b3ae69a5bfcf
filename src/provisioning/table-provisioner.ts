import { DeploymentConfig, ProvisionResult } from '../types';
import { BaseProvisioner } from './base-provisioner';
import { TableKeySchema } from './types';

/** Key schema of the application table */
export const TABLE_KEY_SCHEMA: TableKeySchema = {
  partitionKey: { name: 'id', type: 'S' }
};

/**
 * Ensures the stack's key-value table exists.
 *
 * The existence check always goes to the provider, so a table deleted out of
 * band is re-created even when the configuration still carries its ARN.
 */
export class TableProvisioner extends BaseProvisioner {
  readonly kind = 'table' as const;

  async ensure(config: DeploymentConfig): Promise<ProvisionResult> {
    const { table_name: tableName } = this.requireFields(config, ['table_name']);

    const existing = await this.call('findResource', () => this.client.findResource('table', tableName));
    if (existing) {
      this.logger.log(`Table ${tableName} already exists`);
      return this.result(existing, true);
    }

    this.logger.log(`Table ${tableName} not found, creating a new one`);
    const identifier = await this.call('createResource', () => this.client.createResource({
      kind: 'table',
      name: tableName,
      keySchema: TABLE_KEY_SCHEMA,
      tags: config.tags
    }));

    return this.result(identifier, false);
  }

  private result(identifier: string, alreadyExisted: boolean): ProvisionResult {
    return {
      resourceKind: this.kind,
      identifier,
      alreadyExisted,
      outputs: { table_arn: identifier }
    };
  }
}
