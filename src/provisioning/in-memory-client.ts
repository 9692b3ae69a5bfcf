import { PermanentProviderError } from '../errors';
import { ResourceKind } from '../types';
import { CloudResourceClient, FunctionSpec, ResourceSpec, RouteSpec } from './types';

export type ClientOperation = keyof CloudResourceClient;

export interface RecordedCall {
  operation: ClientOperation;
  args: unknown[];
}

export interface BoundRoute {
  route: RouteSpec;
  targetIdentifier: string;
}

const PLACEHOLDER_ACCOUNT = '000000000000';

/**
 * CloudResourceClient that keeps every resource in process memory.
 * Used by `deploy --dry-run` and by the tests; records every call and can be
 * told to fail the next calls of an operation.
 */
export class InMemoryResourceClient implements CloudResourceClient {
  readonly calls: RecordedCall[] = [];
  readonly functions = new Map<string, FunctionSpec>();
  readonly routes = new Map<string, BoundRoute[]>();
  readonly objects = new Map<string, string>();
  readonly stages = new Map<string, string[]>();

  private readonly resources: Record<ResourceKind, Map<string, string>> = {
    storage: new Map(),
    table: new Map(),
    function: new Map(),
    api: new Map()
  };
  private readonly failures = new Map<ClientOperation, unknown[]>();
  private apiCounter = 0;

  constructor(private readonly region: string = 'us-east-1') {}

  /**
   * Make the next `times` calls of an operation throw the given error
   */
  failNext(operation: ClientOperation, error: unknown, times = 1): void {
    const queue = this.failures.get(operation) ?? [];
    for (let i = 0; i < times; i++) {
      queue.push(error);
    }
    this.failures.set(operation, queue);
  }

  /** Remove a resource behind the provisioners' back, as an out-of-band deletion would */
  deleteResource(kind: ResourceKind, name: string): void {
    this.resources[kind].delete(name);
  }

  callsTo(operation: ClientOperation): RecordedCall[] {
    return this.calls.filter(call => call.operation === operation);
  }

  async findResource(kind: ResourceKind, name: string): Promise<string | null> {
    this.record('findResource', [kind, name]);
    return this.resources[kind].get(name) ?? null;
  }

  async createResource(spec: ResourceSpec): Promise<string> {
    this.record('createResource', [spec]);
    const identifier = spec.kind === 'storage'
      ? `arn:aws:s3:::${spec.name}`
      : spec.kind === 'table'
        ? `arn:aws:dynamodb:${this.region}:${PLACEHOLDER_ACCOUNT}:table/${spec.name}`
        : `api${++this.apiCounter}`;
    return this.store(spec.kind, spec.name, identifier);
  }

  async createFunction(spec: FunctionSpec): Promise<string> {
    this.record('createFunction', [spec]);
    if (!this.objects.has(`${spec.code.bucket}/${spec.code.key}`)) {
      throw new PermanentProviderError(`Function code s3://${spec.code.bucket}/${spec.code.key} does not exist`);
    }
    const identifier = `arn:aws:lambda:${this.region}:${PLACEHOLDER_ACCOUNT}:function:${spec.name}`;
    this.functions.set(spec.name, spec);
    return this.store('function', spec.name, identifier);
  }

  async updateFunction(spec: FunctionSpec): Promise<string> {
    this.record('updateFunction', [spec]);
    const identifier = this.resources.function.get(spec.name);
    if (!identifier) {
      throw new PermanentProviderError(`Function ${spec.name} does not exist`);
    }
    if (!this.objects.has(`${spec.code.bucket}/${spec.code.key}`)) {
      throw new PermanentProviderError(`Function code s3://${spec.code.bucket}/${spec.code.key} does not exist`);
    }
    this.functions.set(spec.name, spec);
    return identifier;
  }

  async createRoute(apiId: string, route: RouteSpec, targetIdentifier: string): Promise<void> {
    this.record('createRoute', [apiId, route, targetIdentifier]);
    if (!this.routes.has(apiId)) {
      throw new PermanentProviderError(`API ${apiId} does not exist`);
    }
    const bound = (this.routes.get(apiId) ?? [])
      .filter(entry => entry.route.method !== route.method || entry.route.path !== route.path);
    bound.push({ route, targetIdentifier });
    this.routes.set(apiId, bound);
  }

  async publishApi(apiId: string, stageName: string): Promise<string> {
    this.record('publishApi', [apiId, stageName]);
    if (!this.routes.has(apiId)) {
      throw new PermanentProviderError(`API ${apiId} does not exist`);
    }
    const stages = this.stages.get(apiId) ?? [];
    if (!stages.includes(stageName)) {
      stages.push(stageName);
    }
    this.stages.set(apiId, stages);
    return `https://${apiId}.execute-api.${this.region}.amazonaws.com/${stageName}`;
  }

  async uploadObject(bucket: string, key: string, filePath: string): Promise<void> {
    this.record('uploadObject', [bucket, key, filePath]);
    if (!this.resources.storage.has(bucket)) {
      throw new PermanentProviderError(`Bucket ${bucket} does not exist`);
    }
    this.objects.set(`${bucket}/${key}`, filePath);
  }

  private record(operation: ClientOperation, args: unknown[]): void {
    this.calls.push({ operation, args });
    const queue = this.failures.get(operation);
    if (queue && queue.length > 0) {
      throw queue.shift();
    }
  }

  private store(kind: ResourceKind, name: string, identifier: string): string {
    if (this.resources[kind].has(name)) {
      throw new PermanentProviderError(`A ${kind} named ${name} already exists`);
    }
    this.resources[kind].set(name, identifier);
    if (kind === 'api') {
      this.routes.set(identifier, []);
    }
    return identifier;
  }
}
