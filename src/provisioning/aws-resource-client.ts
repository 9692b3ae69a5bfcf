import { ResourceNamingService } from '../config/naming';
import { PermanentProviderError } from '../errors';
import { Logger, ResourceKind } from '../types';
import { APIGatewayManager } from './api-gateway-manager';
import { DynamoDBManager } from './dynamodb-manager';
import { IAMManager } from './iam-manager';
import { LambdaConfig, LambdaManager, apiInvokeStatementId } from './lambda-manager';
import { S3Manager, bucketArn } from './s3-manager';
import { CloudResourceClient, FunctionSpec, ResourceSpec, RouteSpec } from './types';

export interface AwsManagers {
  s3: S3Manager;
  dynamodb: DynamoDBManager;
  lambda: LambdaManager;
  apiGateway: APIGatewayManager;
  iam: IAMManager;
}

interface ParsedFunctionArn {
  region: string;
  accountId: string;
  functionName: string;
}

/**
 * Split arn:aws:lambda:<region>:<account>:function:<name>[:<qualifier>]
 */
export function parseFunctionArn(arn: string): ParsedFunctionArn {
  const parts = arn.split(':');
  if (parts.length < 7 || parts[2] !== 'lambda' || parts[5] !== 'function') {
    throw new PermanentProviderError(`Not a Lambda function ARN: ${arn}`);
  }
  return { region: parts[3], accountId: parts[4], functionName: parts[6] };
}

/**
 * CloudResourceClient backed by the AWS SDK v3 service managers
 */
export class AwsResourceClient implements CloudResourceClient {
  private readonly managers: AwsManagers;
  private readonly naming = new ResourceNamingService();

  constructor(
    region: string,
    managers: Partial<AwsManagers> = {},
    private readonly logger: Logger = console
  ) {
    this.managers = {
      s3: managers.s3 ?? new S3Manager(region),
      dynamodb: managers.dynamodb ?? new DynamoDBManager(region),
      lambda: managers.lambda ?? new LambdaManager(region),
      apiGateway: managers.apiGateway ?? new APIGatewayManager(region),
      iam: managers.iam ?? new IAMManager(region)
    };
  }

  async findResource(kind: ResourceKind, name: string): Promise<string | null> {
    switch (kind) {
      case 'storage':
        return (await this.managers.s3.bucketExists(name)) ? bucketArn(name) : null;
      case 'table':
        return (await this.managers.dynamodb.getTableIfExists(name))?.tableArn ?? null;
      case 'function':
        return (await this.managers.lambda.getFunctionIfExists(name))?.functionArn ?? null;
      case 'api':
        return this.managers.apiGateway.getApiIdIfExists(name);
    }
  }

  async createResource(spec: ResourceSpec): Promise<string> {
    switch (spec.kind) {
      case 'storage':
        return this.managers.s3.createBucket({ bucketName: spec.name, region: spec.region, tags: spec.tags });
      case 'table':
        return this.managers.dynamodb.createTable({ tableName: spec.name, keySchema: spec.keySchema, tags: spec.tags });
      case 'api':
        return this.managers.apiGateway.createApi({ apiName: spec.name, description: spec.description, tags: spec.tags });
    }
  }

  async createFunction(spec: FunctionSpec): Promise<string> {
    return this.managers.lambda.createFunction(await this.lambdaConfig(spec));
  }

  async updateFunction(spec: FunctionSpec): Promise<string> {
    return this.managers.lambda.updateFunction(await this.lambdaConfig(spec));
  }

  async createRoute(apiId: string, route: RouteSpec, targetIdentifier: string): Promise<void> {
    const target = parseFunctionArn(targetIdentifier);

    await this.managers.apiGateway.putLambdaRoute(apiId, {
      path: route.path,
      method: route.method,
      lambdaFunctionArn: targetIdentifier
    });

    // One statement covers every stage, method and path of the API
    const sourceArn = `arn:aws:execute-api:${target.region}:${target.accountId}:${apiId}/*/*`;
    await this.managers.lambda.addApiGatewayPermission(target.functionName, apiInvokeStatementId(apiId), sourceArn);
  }

  async publishApi(apiId: string, stageName: string): Promise<string> {
    return this.managers.apiGateway.deployApi(apiId, stageName);
  }

  async uploadObject(bucket: string, key: string, filePath: string): Promise<void> {
    await this.managers.s3.uploadFile(bucket, key, filePath);
  }

  /**
   * Resolve the execution role (ensuring the stack's own role when none is
   * configured) and map the spec onto the Lambda manager's settings
   */
  private async lambdaConfig(spec: FunctionSpec): Promise<LambdaConfig> {
    let roleArn = spec.roleArn;
    if (!roleArn) {
      const role = await this.managers.iam.ensureLambdaExecutionRole(
        this.naming.executionRoleName(spec.name),
        spec.access,
        spec.tags
      );
      if (role.status === 'created') {
        this.logger.log(`Created execution role ${role.roleName}`);
      }
      roleArn = role.roleArn;
    }

    return {
      functionName: spec.name,
      runtime: spec.runtime,
      handler: spec.handler,
      role: roleArn,
      code: { s3Bucket: spec.code.bucket, s3Key: spec.code.key },
      timeout: spec.timeout,
      memorySize: spec.memorySize,
      environment: { variables: spec.environment },
      tags: spec.tags
    };
  }
}

export function createAwsResourceClient(region: string, logger?: Logger): AwsResourceClient {
  return new AwsResourceClient(region, {}, logger);
}
