import { describe, it, expect, vi, beforeEach } from 'vitest';
import { APIGatewayClient } from '@aws-sdk/client-api-gateway';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { IAMClient } from '@aws-sdk/client-iam';
import { LambdaClient } from '@aws-sdk/client-lambda';
import { S3Client } from '@aws-sdk/client-s3';
import { PermanentProviderError } from '../../errors';
import { Logger } from '../../types';
import { APIGatewayManager } from '../api-gateway-manager';
import { AwsResourceClient, parseFunctionArn } from '../aws-resource-client';
import { DynamoDBManager } from '../dynamodb-manager';
import { IAMManager } from '../iam-manager';
import { LambdaManager } from '../lambda-manager';
import { S3Manager } from '../s3-manager';
import { FunctionSpec } from '../types';

const FUNCTION_ARN = 'arn:aws:lambda:us-east-1:000000000000:function:demo-function';
const ROLE_ARN = 'arn:aws:iam::000000000000:role/demo-function-role';

describe('AwsResourceClient', () => {
  let s3Send: ReturnType<typeof vi.fn>;
  let dynamoSend: ReturnType<typeof vi.fn>;
  let lambdaSend: ReturnType<typeof vi.fn>;
  let apiSend: ReturnType<typeof vi.fn>;
  let iamSend: ReturnType<typeof vi.fn>;
  let s3: S3Manager;
  let logger: Logger;
  let client: AwsResourceClient;
  let functionSpec: FunctionSpec;

  beforeEach(() => {
    s3Send = vi.fn();
    dynamoSend = vi.fn();
    lambdaSend = vi.fn();
    apiSend = vi.fn();
    iamSend = vi.fn();
    s3 = new S3Manager('us-east-1', { send: s3Send } as unknown as S3Client);
    logger = { log: vi.fn(), warn: vi.fn() };

    client = new AwsResourceClient('us-east-1', {
      s3,
      dynamodb: new DynamoDBManager('us-east-1', { send: dynamoSend } as unknown as DynamoDBClient, { pollIntervalMs: 0 }),
      lambda: new LambdaManager('us-east-1', { send: lambdaSend } as unknown as LambdaClient, { pollIntervalMs: 0 }),
      apiGateway: new APIGatewayManager('us-east-1', { send: apiSend } as unknown as APIGatewayClient),
      iam: new IAMManager('us-east-1', { send: iamSend } as unknown as IAMClient)
    }, logger);

    functionSpec = {
      name: 'demo-function',
      runtime: 'nodejs20.x',
      handler: 'index.handler',
      timeout: 30,
      memorySize: 128,
      code: { bucket: 'demo-storage-4u48yv', key: 'functions/demo-function/app.zip' },
      environment: { TABLE_NAME: 'demo-table', STORAGE_BUCKET_NAME: 'demo-storage-4u48yv' },
      access: { tableName: 'demo-table', bucketName: 'demo-storage-4u48yv' }
    };
  });

  describe('findResource', () => {
    it('should map an existing bucket to its ARN', async () => {
      s3Send.mockResolvedValueOnce({});

      expect(await client.findResource('storage', 'demo-storage-4u48yv')).toBe('arn:aws:s3:::demo-storage-4u48yv');
    });

    it('should return null for a missing bucket', async () => {
      s3Send.mockRejectedValueOnce({ name: 'NotFound', $metadata: { httpStatusCode: 404 } });

      expect(await client.findResource('storage', 'demo-storage-4u48yv')).toBeNull();
    });

    it('should look tables, functions and APIs up by name', async () => {
      dynamoSend.mockResolvedValueOnce({
        Table: { TableArn: 'arn:aws:dynamodb:us-east-1:000000000000:table/demo-table', TableStatus: 'ACTIVE' }
      });
      lambdaSend.mockResolvedValueOnce({ Configuration: { FunctionArn: FUNCTION_ARN, State: 'Active' } });
      apiSend.mockResolvedValueOnce({ items: [{ id: 'abc123', name: 'demo-api' }] });

      expect(await client.findResource('table', 'demo-table')).toBe('arn:aws:dynamodb:us-east-1:000000000000:table/demo-table');
      expect(await client.findResource('function', 'demo-function')).toBe(FUNCTION_ARN);
      expect(await client.findResource('api', 'demo-api')).toBe('abc123');
    });
  });

  describe('createResource', () => {
    it('should dispatch on the resource kind', async () => {
      s3Send.mockResolvedValueOnce({});
      apiSend.mockResolvedValueOnce({ id: 'abc123' });

      expect(await client.createResource({ kind: 'storage', name: 'demo-storage-4u48yv', region: 'us-east-1' }))
        .toBe('arn:aws:s3:::demo-storage-4u48yv');
      expect(await client.createResource({ kind: 'api', name: 'demo-api' })).toBe('abc123');
    });
  });

  describe('createFunction', () => {
    it('should create an execution role when none is configured', async () => {
      iamSend
        .mockRejectedValueOnce({ name: 'NoSuchEntityException' })
        .mockResolvedValueOnce({ Role: { Arn: ROLE_ARN } })
        .mockResolvedValue({});
      lambdaSend.mockResolvedValueOnce({ FunctionArn: FUNCTION_ARN, State: 'Active' });

      expect(await client.createFunction(functionSpec)).toBe(FUNCTION_ARN);
      expect(iamSend.mock.calls[1][0].input.RoleName).toBe('demo-function-role');
      expect(lambdaSend.mock.calls[0][0].input.Role).toBe(ROLE_ARN);
      expect(lambdaSend.mock.calls[0][0].input.Environment).toEqual({
        Variables: { TABLE_NAME: 'demo-table', STORAGE_BUCKET_NAME: 'demo-storage-4u48yv' }
      });
      expect(logger.log).toHaveBeenCalledWith('Created execution role demo-function-role');
    });

    it('should use the configured role as is', async () => {
      lambdaSend.mockResolvedValueOnce({ FunctionArn: FUNCTION_ARN, State: 'Active' });

      await client.createFunction({ ...functionSpec, roleArn: 'arn:aws:iam::000000000000:role/existing' });

      expect(iamSend).not.toHaveBeenCalled();
      expect(lambdaSend.mock.calls[0][0].input.Role).toBe('arn:aws:iam::000000000000:role/existing');
    });
  });

  describe('updateFunction', () => {
    it('should refresh the execution role and update the existing function', async () => {
      iamSend
        .mockResolvedValueOnce({ Role: { Arn: ROLE_ARN } })
        .mockResolvedValue({});
      lambdaSend
        .mockResolvedValueOnce({ Configuration: { FunctionArn: FUNCTION_ARN, State: 'Active' } })
        .mockResolvedValueOnce({})
        .mockResolvedValueOnce({ Configuration: { FunctionArn: FUNCTION_ARN, State: 'Active', LastUpdateStatus: 'Successful' } })
        .mockResolvedValueOnce({})
        .mockResolvedValueOnce({ Configuration: { FunctionArn: FUNCTION_ARN, State: 'Active', LastUpdateStatus: 'Successful' } });

      expect(await client.updateFunction(functionSpec)).toBe(FUNCTION_ARN);
      expect(iamSend).toHaveBeenCalledTimes(4);
      expect(lambdaSend.mock.calls[1][0].input.Role).toBe(ROLE_ARN);
      expect(lambdaSend.mock.calls[3][0].input).toEqual({
        FunctionName: 'demo-function',
        S3Bucket: 'demo-storage-4u48yv',
        S3Key: 'functions/demo-function/app.zip'
      });
      expect(logger.log).not.toHaveBeenCalled();
    });
  });

  describe('createRoute', () => {
    it('should integrate the route and let the API invoke the function', async () => {
      apiSend
        .mockResolvedValueOnce({ items: [{ id: 'root', path: '/' }] })
        .mockResolvedValueOnce({ httpMethod: 'ANY' })
        .mockResolvedValueOnce({});
      lambdaSend.mockResolvedValueOnce({});

      await client.createRoute('abc123', { method: 'ANY', path: '/' }, FUNCTION_ARN);

      expect(apiSend).toHaveBeenCalledTimes(3);
      expect(lambdaSend.mock.calls[0][0].input).toEqual({
        FunctionName: 'demo-function',
        StatementId: 'abc123-invoke',
        Action: 'lambda:InvokeFunction',
        Principal: 'apigateway.amazonaws.com',
        SourceArn: 'arn:aws:execute-api:us-east-1:000000000000:abc123/*/*'
      });
    });

    it('should reject a target that is not a function ARN', async () => {
      await expect(client.createRoute('abc123', { method: 'ANY', path: '/' }, 'demo-function'))
        .rejects.toThrow(PermanentProviderError);
      expect(apiSend).not.toHaveBeenCalled();
    });
  });

  describe('publishApi and uploadObject', () => {
    it('should deploy the stage', async () => {
      apiSend.mockResolvedValueOnce({ id: 'deployment1' });

      expect(await client.publishApi('abc123', 'prod')).toBe('https://abc123.execute-api.us-east-1.amazonaws.com/prod');
    });

    it('should upload through the S3 manager', async () => {
      const upload = vi.spyOn(s3, 'uploadFile').mockResolvedValueOnce({ key: 'k', etag: '', url: 'u' });

      await client.uploadObject('demo-storage-4u48yv', 'functions/demo-function/app.zip', './build/app.zip');

      expect(upload).toHaveBeenCalledWith('demo-storage-4u48yv', 'functions/demo-function/app.zip', './build/app.zip');
    });
  });
});

describe('parseFunctionArn', () => {
  it('should split a function ARN', () => {
    expect(parseFunctionArn(`${FUNCTION_ARN}:live`)).toEqual({
      region: 'us-east-1',
      accountId: '000000000000',
      functionName: 'demo-function'
    });
  });
});
