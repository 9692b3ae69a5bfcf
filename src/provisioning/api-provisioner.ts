import { ConfigInvalidError } from '../errors';
import { DeploymentConfig, ProvisionResult } from '../types';
import { BaseProvisioner } from './base-provisioner';
import { RouteSpec } from './types';

export const DEFAULT_API_ROUTES = ['ANY /', 'ANY /{proxy+}'];
export const DEFAULT_API_STAGE = 'prod';

/**
 * Parse a route written as "METHOD /path"
 */
export function parseRoute(route: string): RouteSpec {
  const match = /^([A-Za-z]+)\s+(\/\S*)$/.exec(route.trim());
  if (!match) {
    throw new ConfigInvalidError('api_routes', [`Invalid route "${route}": expected "METHOD /path"`]);
  }
  return { method: match[1].toUpperCase(), path: match[2] };
}

/**
 * Ensures the HTTP API exists and routes to the stack's function.
 *
 * Route binding and stage deployment run on every call: both are idempotent
 * on the provider side, and a previous run may have stopped half-way through
 * wiring the routes.
 */
export class ApiProvisioner extends BaseProvisioner {
  readonly kind = 'api' as const;

  async ensure(config: DeploymentConfig): Promise<ProvisionResult> {
    const {
      api_name: apiName,
      function_arn_or_id: functionIdentifier
    } = this.requireFields(config, ['api_name', 'function_arn_or_id']);
    const routes = (config.api_routes ?? DEFAULT_API_ROUTES).map(parseRoute);
    const stageName = config.api_stage ?? DEFAULT_API_STAGE;

    let apiId = await this.call('findResource', () => this.client.findResource('api', apiName));
    const alreadyExisted = apiId !== null;
    if (apiId === null) {
      this.logger.log(`API ${apiName} not found, creating a new one`);
      apiId = await this.call('createResource', () => this.client.createResource({
        kind: 'api',
        name: apiName,
        description: `HTTP API for ${config.stack_name}`,
        tags: config.tags
      }));
    } else {
      this.logger.log(`API ${apiName} already exists`);
    }
    const id = apiId;

    for (const route of routes) {
      this.logger.log(`Binding ${route.method} ${route.path} to ${functionIdentifier}`);
      await this.call('createRoute', () => this.client.createRoute(id, route, functionIdentifier));
    }

    const url = await this.call('publishApi', () => this.client.publishApi(id, stageName));

    return {
      resourceKind: this.kind,
      identifier: id,
      alreadyExisted,
      outputs: { api_id: id, api_endpoint: url },
      endpoint: {
        type: 'api',
        url,
        description: `API Gateway stage ${stageName}`
      }
    };
  }
}
