import {
  IAMClient,
  CreateRoleCommand,
  AttachRolePolicyCommand,
  GetRoleCommand,
  PutRolePolicyCommand
} from '@aws-sdk/client-iam';
import { PermanentProviderError, errorName } from '../errors';

export interface PolicyStatement {
  Effect: 'Allow' | 'Deny';
  Action: string | string[];
  /** Omitted in trust policies */
  Resource?: string | string[];
  Principal?: { Service: string };
}

export interface PolicyDocument {
  Version: '2012-10-17';
  Statement: PolicyStatement[];
}

export interface IAMConfig {
  roleName: string;
  servicePrincipal: string;
  policyArns?: string[];
  inlinePolicies?: { [key: string]: PolicyDocument };
  tags?: { [key: string]: string };
}

export interface IAMRoleResult {
  roleName: string;
  roleArn: string;
  status: 'created' | 'existing';
}

export interface LambdaRoleAccess {
  tableName: string;
  bucketName: string;
}

export const LAMBDA_BASIC_EXECUTION_POLICY_ARN = 'arn:aws:iam::aws:policy/service-role/AWSLambdaBasicExecutionRole';

export class IAMManager {
  private client: IAMClient;

  constructor(region?: string, client?: IAMClient) {
    this.client = client ?? new IAMClient({ region });
  }

  /**
   * Create the role when it is missing, then attach and put every policy.
   * Both policy calls overwrite, so a role left without its policies by an
   * interrupted run is completed on the next one.
   */
  async ensureRole(config: IAMConfig): Promise<IAMRoleResult> {
    const existingArn = await this.getRoleArnIfExists(config.roleName);
    const roleArn = existingArn ?? await this.createRole(config);

    for (const policyArn of config.policyArns ?? []) {
      await this.client.send(new AttachRolePolicyCommand({
        RoleName: config.roleName,
        PolicyArn: policyArn
      }));
    }

    for (const [policyName, policyDocument] of Object.entries(config.inlinePolicies ?? {})) {
      await this.client.send(new PutRolePolicyCommand({
        RoleName: config.roleName,
        PolicyName: policyName,
        PolicyDocument: JSON.stringify(policyDocument)
      }));
    }

    return {
      roleName: config.roleName,
      roleArn,
      status: existingArn ? 'existing' : 'created'
    };
  }

  /**
   * Execution role for the stack's function: logging plus access to its
   * table and bucket
   */
  async ensureLambdaExecutionRole(
    roleName: string,
    access: LambdaRoleAccess,
    tags?: { [key: string]: string }
  ): Promise<IAMRoleResult> {
    return this.ensureRole({
      roleName,
      servicePrincipal: 'lambda.amazonaws.com',
      policyArns: [LAMBDA_BASIC_EXECUTION_POLICY_ARN],
      inlinePolicies: {
        DynamoDBAccess: this.createDynamoDBPolicy([access.tableName]),
        S3Access: this.createS3BucketPolicy(access.bucketName)
      },
      tags: {
        Purpose: 'LambdaExecution',
        ...tags
      }
    });
  }

  createS3BucketPolicy(bucketName: string): PolicyDocument {
    return {
      Version: '2012-10-17',
      Statement: [
        {
          Effect: 'Allow',
          Action: [
            's3:GetObject',
            's3:PutObject',
            's3:DeleteObject'
          ],
          Resource: `arn:aws:s3:::${bucketName}/*`
        },
        {
          Effect: 'Allow',
          Action: ['s3:ListBucket'],
          Resource: `arn:aws:s3:::${bucketName}`
        }
      ]
    };
  }

  createDynamoDBPolicy(tableNames: string[]): PolicyDocument {
    const resources = tableNames.flatMap(tableName => [
      `arn:aws:dynamodb:*:*:table/${tableName}`,
      `arn:aws:dynamodb:*:*:table/${tableName}/index/*`
    ]);

    return {
      Version: '2012-10-17',
      Statement: [
        {
          Effect: 'Allow',
          Action: [
            'dynamodb:GetItem',
            'dynamodb:PutItem',
            'dynamodb:UpdateItem',
            'dynamodb:DeleteItem',
            'dynamodb:Query',
            'dynamodb:Scan'
          ],
          Resource: resources
        }
      ]
    };
  }

  private createTrustPolicy(servicePrincipal: string): PolicyDocument {
    return {
      Version: '2012-10-17',
      Statement: [
        {
          Effect: 'Allow',
          Principal: {
            Service: servicePrincipal
          },
          Action: 'sts:AssumeRole'
        }
      ]
    };
  }

  private async createRole(config: IAMConfig): Promise<string> {
    try {
      const roleResult = await this.client.send(new CreateRoleCommand({
        RoleName: config.roleName,
        AssumeRolePolicyDocument: JSON.stringify(this.createTrustPolicy(config.servicePrincipal)),
        Tags: config.tags ? Object.entries(config.tags).map(([Key, Value]) => ({ Key, Value })) : undefined
      }));

      const roleArn = roleResult.Role?.Arn;
      if (!roleArn) {
        throw new PermanentProviderError(`IAM did not return an ARN for role ${config.roleName}`);
      }
      return roleArn;
    } catch (error) {
      // A retried create whose first attempt went through
      if (errorName(error) === 'EntityAlreadyExistsException') {
        const roleArn = await this.getRoleArnIfExists(config.roleName);
        if (roleArn) {
          return roleArn;
        }
      }
      throw error;
    }
  }

  private async getRoleArnIfExists(roleName: string): Promise<string | null> {
    try {
      const result = await this.client.send(new GetRoleCommand({ RoleName: roleName }));
      return result.Role?.Arn ?? null;
    } catch (error) {
      if (errorName(error) === 'NoSuchEntityException') {
        return null;
      }
      throw error;
    }
  }
}
