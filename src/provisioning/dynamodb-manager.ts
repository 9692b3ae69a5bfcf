import {
  DynamoDBClient,
  CreateTableCommand,
  DescribeTableCommand,
  AttributeDefinition,
  KeySchemaElement
} from '@aws-sdk/client-dynamodb';
import { PermanentProviderError, TransientProviderError, errorName } from '../errors';
import { TableKeySchema } from './types';

export interface DynamoDBConfig {
  tableName: string;
  keySchema: TableKeySchema;
  readCapacityUnits?: number;
  writeCapacityUnits?: number;
  tags?: Record<string, string>;
}

export interface TableDescription {
  tableArn: string;
  status: string;
}

export interface DynamoDBManagerOptions {
  /** Delay between table status checks. Default: 2000 */
  pollIntervalMs?: number;
  /** Give up waiting for the table after this long. Default: 300000 */
  maxWaitTimeMs?: number;
}

export class DynamoDBManager {
  private client: DynamoDBClient;
  private readonly pollIntervalMs: number;
  private readonly maxWaitTimeMs: number;

  constructor(region?: string, client?: DynamoDBClient, options: DynamoDBManagerOptions = {}) {
    this.client = client ?? new DynamoDBClient({ region });
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.maxWaitTimeMs = options.maxWaitTimeMs ?? 300_000;
  }

  /**
   * Create the table and wait until it is active. A table left by an earlier
   * attempt is waited on instead of created again.
   * @returns The table ARN
   */
  async createTable(config: DynamoDBConfig): Promise<string> {
    const { partitionKey, sortKey } = config.keySchema;

    const keySchema: KeySchemaElement[] = [{ AttributeName: partitionKey.name, KeyType: 'HASH' }];
    const attributeDefinitions: AttributeDefinition[] = [
      { AttributeName: partitionKey.name, AttributeType: partitionKey.type }
    ];
    if (sortKey) {
      keySchema.push({ AttributeName: sortKey.name, KeyType: 'RANGE' });
      attributeDefinitions.push({ AttributeName: sortKey.name, AttributeType: sortKey.type });
    }

    try {
      await this.client.send(new CreateTableCommand({
        TableName: config.tableName,
        KeySchema: keySchema,
        AttributeDefinitions: attributeDefinitions,
        ProvisionedThroughput: {
          ReadCapacityUnits: config.readCapacityUnits ?? 5,
          WriteCapacityUnits: config.writeCapacityUnits ?? 5
        },
        Tags: config.tags ? Object.entries(config.tags).map(([Key, Value]) => ({ Key, Value })) : undefined
      }));
    } catch (error) {
      // Created by an earlier attempt that failed while waiting: wait again
      if (errorName(error) !== 'ResourceInUseException') {
        throw error;
      }
    }

    const table = await this.waitForTableActive(config.tableName);
    return table.tableArn;
  }

  /**
   * Look the table up, settling any transition first: a table still being
   * created is waited on until active, one being deleted until it is gone.
   */
  async getTableIfExists(tableName: string): Promise<TableDescription | null> {
    const table = await this.describeTable(tableName);

    if (table?.status === 'DELETING') {
      await this.waitForTableDeleted(tableName);
      return null;
    }
    if (table?.status === 'CREATING') {
      return this.waitForTableActive(tableName);
    }
    return table;
  }

  private async describeTable(tableName: string): Promise<TableDescription | null> {
    try {
      const result = await this.client.send(new DescribeTableCommand({ TableName: tableName }));
      const table = result.Table;
      if (!table?.TableArn) {
        return null;
      }
      return { tableArn: table.TableArn, status: table.TableStatus ?? 'UNKNOWN' };
    } catch (error) {
      if (errorName(error) === 'ResourceNotFoundException') {
        return null;
      }
      throw error;
    }
  }

  private async waitForTableActive(tableName: string): Promise<TableDescription> {
    const startTime = Date.now();

    while (Date.now() - startTime < this.maxWaitTimeMs) {
      const table = await this.describeTable(tableName);

      if (table?.status === 'ACTIVE') {
        return table;
      }
      if (!table || table.status === 'DELETING') {
        throw new PermanentProviderError(`Table ${tableName} disappeared while being created`);
      }

      await this.sleep();
    }

    throw new TransientProviderError(`Table ${tableName} did not become active after ${this.maxWaitTimeMs / 1000} seconds`);
  }

  private async waitForTableDeleted(tableName: string): Promise<void> {
    const startTime = Date.now();

    while (Date.now() - startTime < this.maxWaitTimeMs) {
      if (!(await this.describeTable(tableName))) {
        return;
      }
      await this.sleep();
    }

    throw new TransientProviderError(`Table ${tableName} was still being deleted after ${this.maxWaitTimeMs / 1000} seconds`);
  }

  private sleep(): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, this.pollIntervalMs));
  }
}
