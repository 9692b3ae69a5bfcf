import {
  LambdaClient,
  CreateFunctionCommand,
  GetFunctionCommand,
  UpdateFunctionCodeCommand,
  UpdateFunctionConfigurationCommand,
  AddPermissionCommand,
  Runtime
} from '@aws-sdk/client-lambda';
import { PermanentProviderError, TransientProviderError, errorName } from '../errors';

export interface LambdaConfig {
  functionName: string;
  runtime: string;
  handler: string;
  role: string;
  code: {
    s3Bucket: string;
    s3Key: string;
  };
  description?: string;
  timeout?: number;
  memorySize?: number;
  environment?: {
    variables: { [key: string]: string };
  };
  tags?: { [key: string]: string };
}

export interface FunctionDescription {
  functionArn: string;
  state?: string;
  lastUpdateStatus?: string;
}

export interface LambdaManagerOptions {
  /** Delay between function state checks. Default: 2000 */
  pollIntervalMs?: number;
  /** Give up waiting for the function after this long. Default: 300000 */
  maxWaitTimeMs?: number;
}

const RUNTIMES: readonly string[] = Object.values(Runtime);

function isRuntime(runtime: string): runtime is Runtime {
  return RUNTIMES.includes(runtime);
}

/**
 * Statement id of the permission letting an API invoke the function
 */
export function apiInvokeStatementId(apiId: string): string {
  return `${apiId}-invoke`;
}

export class LambdaManager {
  private client: LambdaClient;
  private readonly pollIntervalMs: number;
  private readonly maxWaitTimeMs: number;

  constructor(region?: string, client?: LambdaClient, options: LambdaManagerOptions = {}) {
    this.client = client ?? new LambdaClient({ region });
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.maxWaitTimeMs = options.maxWaitTimeMs ?? 300_000;
  }

  /**
   * Create the function from a package in S3 and wait until it is active.
   * A function left by an earlier attempt is waited on instead of created again.
   * @returns The function ARN
   */
  async createFunction(config: LambdaConfig): Promise<string> {
    const runtime = this.checkRuntime(config.runtime);

    let functionArn: string | undefined;
    try {
      const functionResult = await this.client.send(new CreateFunctionCommand({
        FunctionName: config.functionName,
        Runtime: runtime,
        Role: config.role,
        Handler: config.handler,
        Code: {
          S3Bucket: config.code.s3Bucket,
          S3Key: config.code.s3Key
        },
        Description: config.description,
        Timeout: config.timeout || 30,
        MemorySize: config.memorySize || 128,
        Environment: config.environment ? {
          Variables: config.environment.variables
        } : undefined,
        Tags: config.tags
      }));

      if (!functionResult.FunctionArn) {
        throw new PermanentProviderError(`Lambda did not return an ARN for ${config.functionName}`);
      }
      if (functionResult.State === 'Active') {
        return functionResult.FunctionArn;
      }
      functionArn = functionResult.FunctionArn;
    } catch (error) {
      if (errorName(error) !== 'ResourceConflictException') {
        throw error;
      }
    }

    const fn = await this.waitForFunctionReady(config.functionName);
    return functionArn ?? fn.functionArn;
  }

  /**
   * Bring an existing function in line with the configuration, then point it
   * at the package in S3. Each update waits for the previous one to settle.
   * @returns The function ARN
   */
  async updateFunction(config: LambdaConfig): Promise<string> {
    const runtime = this.checkRuntime(config.runtime);

    await this.waitForFunctionReady(config.functionName);
    await this.client.send(new UpdateFunctionConfigurationCommand({
      FunctionName: config.functionName,
      Runtime: runtime,
      Role: config.role,
      Handler: config.handler,
      Description: config.description,
      Timeout: config.timeout || 30,
      MemorySize: config.memorySize || 128,
      Environment: config.environment ? {
        Variables: config.environment.variables
      } : undefined
    }));

    await this.waitForFunctionReady(config.functionName, true);
    await this.client.send(new UpdateFunctionCodeCommand({
      FunctionName: config.functionName,
      S3Bucket: config.code.s3Bucket,
      S3Key: config.code.s3Key
    }));

    const fn = await this.waitForFunctionReady(config.functionName, true);
    return fn.functionArn;
  }

  async getFunctionIfExists(functionName: string): Promise<FunctionDescription | null> {
    try {
      const result = await this.client.send(new GetFunctionCommand({ FunctionName: functionName }));
      const functionArn = result.Configuration?.FunctionArn;
      if (!functionArn) {
        return null;
      }
      return {
        functionArn,
        state: result.Configuration?.State,
        lastUpdateStatus: result.Configuration?.LastUpdateStatus
      };
    } catch (error) {
      if (errorName(error) === 'ResourceNotFoundException') {
        return null;
      }
      throw error;
    }
  }

  /**
   * Permission management for API Gateway integration
   * @returns false when the permission was already granted
   */
  async addApiGatewayPermission(functionName: string, statementId: string, sourceArn: string): Promise<boolean> {
    try {
      await this.client.send(new AddPermissionCommand({
        FunctionName: functionName,
        StatementId: statementId,
        Action: 'lambda:InvokeFunction',
        Principal: 'apigateway.amazonaws.com',
        SourceArn: sourceArn
      }));
      return true;
    } catch (error) {
      if (errorName(error) === 'ResourceConflictException') {
        return false;
      }
      throw error;
    }
  }

  private checkRuntime(runtime: string): Runtime {
    if (!isRuntime(runtime)) {
      throw new PermanentProviderError(`Unsupported Lambda runtime: ${runtime}`);
    }
    return runtime;
  }

  /**
   * Wait until the function is active with no update in progress.
   * With `afterUpdate`, a failed last update is an error.
   */
  private async waitForFunctionReady(functionName: string, afterUpdate = false): Promise<FunctionDescription> {
    const startTime = Date.now();

    while (Date.now() - startTime < this.maxWaitTimeMs) {
      const fn = await this.getFunctionIfExists(functionName);

      if (!fn) {
        throw new PermanentProviderError(`Function ${functionName} disappeared while being deployed`);
      }
      if (fn.state === 'Failed') {
        throw new PermanentProviderError(`Function ${functionName} failed to become active`);
      }
      if (afterUpdate && fn.lastUpdateStatus === 'Failed') {
        throw new PermanentProviderError(`Last update of function ${functionName} failed`);
      }
      if (fn.state === 'Active' && fn.lastUpdateStatus !== 'InProgress') {
        return fn;
      }

      await new Promise(resolve => setTimeout(resolve, this.pollIntervalMs));
    }

    throw new TransientProviderError(`Function ${functionName} did not become ready after ${this.maxWaitTimeMs / 1000} seconds`);
  }
}
