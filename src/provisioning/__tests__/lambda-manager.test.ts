import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  LambdaClient,
  AddPermissionCommand,
  CreateFunctionCommand,
  GetFunctionCommand,
  UpdateFunctionCodeCommand,
  UpdateFunctionConfigurationCommand
} from '@aws-sdk/client-lambda';
import { PermanentProviderError } from '../../errors';
import { LambdaConfig, LambdaManager, apiInvokeStatementId } from '../lambda-manager';

const FUNCTION_ARN = 'arn:aws:lambda:us-east-1:000000000000:function:demo-function';

describe('LambdaManager', () => {
  let lambdaManager: LambdaManager;
  let mockClient: { send: ReturnType<typeof vi.fn> };
  let config: LambdaConfig;

  beforeEach(() => {
    mockClient = {
      send: vi.fn()
    };
    lambdaManager = new LambdaManager('us-east-1', mockClient as unknown as LambdaClient, { pollIntervalMs: 0 });
    config = {
      functionName: 'demo-function',
      runtime: 'nodejs20.x',
      handler: 'index.handler',
      role: 'arn:aws:iam::000000000000:role/demo-function-role',
      code: { s3Bucket: 'demo-storage-4u48yv', s3Key: 'functions/demo-function/app.zip' },
      environment: { variables: { TABLE_NAME: 'demo-table' } }
    };
  });

  describe('createFunction', () => {
    it('should create the function from the uploaded package', async () => {
      mockClient.send.mockResolvedValueOnce({ FunctionArn: FUNCTION_ARN, State: 'Active' });

      const arn = await lambdaManager.createFunction(config);

      expect(arn).toBe(FUNCTION_ARN);
      expect(mockClient.send).toHaveBeenCalledTimes(1);
      const command = mockClient.send.mock.calls[0][0];
      expect(command).toBeInstanceOf(CreateFunctionCommand);
      expect(command.input).toEqual({
        FunctionName: 'demo-function',
        Runtime: 'nodejs20.x',
        Role: 'arn:aws:iam::000000000000:role/demo-function-role',
        Handler: 'index.handler',
        Code: { S3Bucket: 'demo-storage-4u48yv', S3Key: 'functions/demo-function/app.zip' },
        Timeout: 30,
        MemorySize: 128,
        Environment: { Variables: { TABLE_NAME: 'demo-table' } }
      });
    });

    it('should wait for a pending function to become active', async () => {
      mockClient.send
        .mockResolvedValueOnce({ FunctionArn: FUNCTION_ARN, State: 'Pending' })
        .mockResolvedValueOnce({ Configuration: { FunctionArn: FUNCTION_ARN, State: 'Pending' } })
        .mockResolvedValueOnce({ Configuration: { FunctionArn: FUNCTION_ARN, State: 'Active' } });

      expect(await lambdaManager.createFunction(config)).toBe(FUNCTION_ARN);
      expect(mockClient.send).toHaveBeenCalledTimes(3);
      expect(mockClient.send.mock.calls[1][0]).toBeInstanceOf(GetFunctionCommand);
    });

    it('should fail when the function ends up in the Failed state', async () => {
      mockClient.send
        .mockResolvedValueOnce({ FunctionArn: FUNCTION_ARN, State: 'Pending' })
        .mockResolvedValueOnce({ Configuration: { FunctionArn: FUNCTION_ARN, State: 'Failed' } });

      await expect(lambdaManager.createFunction(config)).rejects.toThrow('Function demo-function failed to become active');
    });

    it('should reject an unknown runtime before calling Lambda', async () => {
      config.runtime = 'cobol85';

      await expect(lambdaManager.createFunction(config)).rejects.toThrow(PermanentProviderError);
      expect(mockClient.send).not.toHaveBeenCalled();
    });

    it('should adopt a function an earlier attempt already created', async () => {
      mockClient.send
        .mockRejectedValueOnce(Object.assign(new Error('Function already exist: demo-function'), { name: 'ResourceConflictException' }))
        .mockResolvedValueOnce({ Configuration: { FunctionArn: FUNCTION_ARN, State: 'Pending' } })
        .mockResolvedValueOnce({ Configuration: { FunctionArn: FUNCTION_ARN, State: 'Active' } });

      expect(await lambdaManager.createFunction(config)).toBe(FUNCTION_ARN);
      expect(mockClient.send).toHaveBeenCalledTimes(3);
      expect(mockClient.send.mock.calls[2][0]).toBeInstanceOf(GetFunctionCommand);
    });
  });

  describe('updateFunction', () => {
    it('should update the configuration, then the code, waiting between the two', async () => {
      mockClient.send
        .mockResolvedValueOnce({ Configuration: { FunctionArn: FUNCTION_ARN, State: 'Active', LastUpdateStatus: 'Successful' } })
        .mockResolvedValueOnce({})
        .mockResolvedValueOnce({ Configuration: { FunctionArn: FUNCTION_ARN, State: 'Active', LastUpdateStatus: 'InProgress' } })
        .mockResolvedValueOnce({ Configuration: { FunctionArn: FUNCTION_ARN, State: 'Active', LastUpdateStatus: 'Successful' } })
        .mockResolvedValueOnce({})
        .mockResolvedValueOnce({ Configuration: { FunctionArn: FUNCTION_ARN, State: 'Active', LastUpdateStatus: 'Successful' } });

      const arn = await lambdaManager.updateFunction(config);

      expect(arn).toBe(FUNCTION_ARN);
      const commands = mockClient.send.mock.calls.map(call => call[0]);
      expect(commands).toHaveLength(6);

      expect(commands[1]).toBeInstanceOf(UpdateFunctionConfigurationCommand);
      expect(commands[1].input).toEqual({
        FunctionName: 'demo-function',
        Runtime: 'nodejs20.x',
        Role: 'arn:aws:iam::000000000000:role/demo-function-role',
        Handler: 'index.handler',
        Timeout: 30,
        MemorySize: 128,
        Environment: { Variables: { TABLE_NAME: 'demo-table' } }
      });

      expect(commands[4]).toBeInstanceOf(UpdateFunctionCodeCommand);
      expect(commands[4].input).toEqual({
        FunctionName: 'demo-function',
        S3Bucket: 'demo-storage-4u48yv',
        S3Key: 'functions/demo-function/app.zip'
      });
    });

    it('should stop when the configuration update fails', async () => {
      mockClient.send
        .mockResolvedValueOnce({ Configuration: { FunctionArn: FUNCTION_ARN, State: 'Active' } })
        .mockResolvedValueOnce({})
        .mockResolvedValueOnce({ Configuration: { FunctionArn: FUNCTION_ARN, State: 'Active', LastUpdateStatus: 'Failed' } });

      await expect(lambdaManager.updateFunction(config)).rejects.toThrow('Last update of function demo-function failed');
      expect(mockClient.send).toHaveBeenCalledTimes(3);
    });
  });

  describe('getFunctionIfExists', () => {
    it('should return the ARN and state', async () => {
      mockClient.send.mockResolvedValueOnce({ Configuration: { FunctionArn: FUNCTION_ARN, State: 'Active' } });

      expect(await lambdaManager.getFunctionIfExists('demo-function')).toEqual({ functionArn: FUNCTION_ARN, state: 'Active' });
    });

    it('should return null for a missing function', async () => {
      mockClient.send.mockRejectedValueOnce({ name: 'ResourceNotFoundException' });

      expect(await lambdaManager.getFunctionIfExists('demo-function')).toBeNull();
    });
  });

  describe('addApiGatewayPermission', () => {
    it('should grant API Gateway the right to invoke the function', async () => {
      mockClient.send.mockResolvedValueOnce({});

      const added = await lambdaManager.addApiGatewayPermission(
        'demo-function',
        'abc123-invoke',
        'arn:aws:execute-api:us-east-1:000000000000:abc123/*/*'
      );

      expect(added).toBe(true);
      const command = mockClient.send.mock.calls[0][0];
      expect(command).toBeInstanceOf(AddPermissionCommand);
      expect(command.input).toEqual({
        FunctionName: 'demo-function',
        StatementId: 'abc123-invoke',
        Action: 'lambda:InvokeFunction',
        Principal: 'apigateway.amazonaws.com',
        SourceArn: 'arn:aws:execute-api:us-east-1:000000000000:abc123/*/*'
      });
    });

    it('should report an already granted permission', async () => {
      mockClient.send.mockRejectedValueOnce({ name: 'ResourceConflictException' });

      expect(await lambdaManager.addApiGatewayPermission('demo-function', 'abc123-invoke', 'arn')).toBe(false);
    });
  });

  it('should derive the invoke statement id from the API id', () => {
    expect(apiInvokeStatementId('abc123')).toBe('abc123-invoke');
  });
});
