import {
  APIGatewayClient,
  CreateRestApiCommand,
  CreateResourceCommand,
  PutMethodCommand,
  PutIntegrationCommand,
  CreateDeploymentCommand,
  GetRestApisCommand,
  GetResourcesCommand,
  GetMethodCommand,
  Resource
} from '@aws-sdk/client-api-gateway';
import { PermanentProviderError, errorName } from '../errors';

export interface APIGatewayConfig {
  apiName: string;
  description?: string;
  tags?: { [key: string]: string };
}

export interface LambdaRouteConfig {
  path: string;
  method: string;
  lambdaFunctionArn: string;
  authorizationType?: 'NONE' | 'AWS_IAM' | 'CUSTOM' | 'COGNITO_USER_POOLS';
}

export class APIGatewayManager {
  private client: APIGatewayClient;
  private region: string;

  constructor(region: string = 'us-east-1', client?: APIGatewayClient) {
    this.region = region;
    this.client = client ?? new APIGatewayClient({ region });
  }

  /**
   * Create a regional REST API
   * @returns The API id
   */
  async createApi(config: APIGatewayConfig): Promise<string> {
    const apiResult = await this.client.send(new CreateRestApiCommand({
      name: config.apiName,
      description: config.description,
      endpointConfiguration: {
        types: ['REGIONAL']
      },
      tags: config.tags
    }));

    if (!apiResult.id) {
      throw new PermanentProviderError(`API Gateway did not return an id for ${config.apiName}`);
    }
    return apiResult.id;
  }

  async getApiIdIfExists(apiName: string): Promise<string | null> {
    let position: string | undefined;

    do {
      const result = await this.client.send(new GetRestApisCommand({ limit: 500, position }));
      const api = result.items?.find(item => item.name === apiName);
      if (api?.id) {
        return api.id;
      }
      position = result.position;
    } while (position);

    return null;
  }

  /**
   * Bind a method on a path to a Lambda proxy integration.
   * Missing path resources are created; an existing method is kept and its
   * integration overwritten.
   */
  async putLambdaRoute(apiId: string, route: LambdaRouteConfig): Promise<string> {
    const resourceId = await this.ensureResourcePath(apiId, route.path);
    const httpMethod = route.method.toUpperCase();

    if (!(await this.methodExists(apiId, resourceId, httpMethod))) {
      await this.client.send(new PutMethodCommand({
        restApiId: apiId,
        resourceId,
        httpMethod,
        authorizationType: route.authorizationType || 'NONE'
      }));
    }

    await this.client.send(new PutIntegrationCommand({
      restApiId: apiId,
      resourceId,
      httpMethod,
      type: 'AWS_PROXY',
      integrationHttpMethod: 'POST',
      uri: this.buildIntegrationUri(route.lambdaFunctionArn),
      passthroughBehavior: 'WHEN_NO_MATCH',
      timeoutInMillis: 29000
    }));

    return resourceId;
  }

  /**
   * Deploy the API to a stage
   * @returns The stage invoke URL
   */
  async deployApi(apiId: string, stageName: string, description?: string): Promise<string> {
    await this.client.send(new CreateDeploymentCommand({
      restApiId: apiId,
      stageName,
      description: description || `Deployment to ${stageName}`
    }));

    return this.invokeUrl(apiId, stageName);
  }

  invokeUrl(apiId: string, stageName: string): string {
    return `https://${apiId}.execute-api.${this.region}.amazonaws.com/${stageName}`;
  }

  /**
   * Find or create every resource along the path
   * @returns The id of the resource at the end of the path
   */
  async ensureResourcePath(apiId: string, path: string): Promise<string> {
    const resources = await this.getResources(apiId);
    const root = resources.find(resource => resource.path === '/');
    if (!root?.id) {
      throw new PermanentProviderError(`API ${apiId} has no root resource`);
    }

    let currentResourceId = root.id;
    let currentPath = '';

    for (const part of path.split('/').filter(segment => segment)) {
      currentPath += `/${part}`;
      const existingResource = resources.find(resource => resource.path === currentPath);

      if (existingResource?.id) {
        currentResourceId = existingResource.id;
        continue;
      }

      const resourceResult = await this.client.send(new CreateResourceCommand({
        restApiId: apiId,
        parentId: currentResourceId,
        pathPart: part
      }));
      if (!resourceResult.id) {
        throw new PermanentProviderError(`API Gateway did not return an id for resource ${currentPath}`);
      }
      currentResourceId = resourceResult.id;
      resources.push({ id: resourceResult.id, path: currentPath });
    }

    return currentResourceId;
  }

  private async getResources(apiId: string): Promise<Resource[]> {
    const resources: Resource[] = [];
    let position: string | undefined;

    do {
      const result = await this.client.send(new GetResourcesCommand({ restApiId: apiId, limit: 500, position }));
      resources.push(...(result.items ?? []));
      position = result.position;
    } while (position);

    return resources;
  }

  private async methodExists(apiId: string, resourceId: string, httpMethod: string): Promise<boolean> {
    try {
      await this.client.send(new GetMethodCommand({ restApiId: apiId, resourceId, httpMethod }));
      return true;
    } catch (error) {
      if (errorName(error) === 'NotFoundException') {
        return false;
      }
      throw error;
    }
  }

  private buildIntegrationUri(lambdaFunctionArn: string): string {
    const region = this.extractRegionFromArn(lambdaFunctionArn);
    return `arn:aws:apigateway:${region}:lambda:path/2015-03-31/functions/${lambdaFunctionArn}/invocations`;
  }

  private extractRegionFromArn(arn: string): string {
    const parts = arn.split(':');
    return parts[3] || this.region;
  }
}
