import { v4 as uuidv4 } from 'uuid';
import { createConfigStore } from '../config/loader';
import { MemoryConfigStore } from '../config/memory-store';
import { ResourceNamingService } from '../config/naming';
import { ConfigStore } from '../config/types';
import { ConfigSaveError, ProvisioningError, asProvisioningError } from '../errors';
import { createProvisioners } from '../provisioning';
import { AwsResourceClient } from '../provisioning/aws-resource-client';
import { InMemoryResourceClient } from '../provisioning/in-memory-client';
import { RetryOptions } from '../provisioning/retry';
import { ProvisionerSet } from '../provisioning/types';
import {
  DEPLOYMENT_STEPS,
  DeploymentConfig,
  DeploymentError,
  DeploymentMetadata,
  Endpoint,
  Logger,
  ProvisionResult,
  ResourceKind
} from '../types';
import { DeploymentResult, DeploymentState, DeployOptions, StateChangeListener, StepFailure } from './types';

/** Config field whose presence marks a step as completed */
export const STEP_OUTPUT_FIELD = {
  storage: 'storage_bucket_arn',
  table: 'table_arn',
  function: 'function_arn_or_id',
  api: 'api_id'
} as const satisfies Record<ResourceKind, keyof DeploymentConfig>;

/**
 * First step whose output identifier is not in the configuration yet,
 * or null when every step has completed
 */
export function resumePoint(config: DeploymentConfig): ResourceKind | null {
  return DEPLOYMENT_STEPS.find(step => !config[STEP_OUTPUT_FIELD[step]]) ?? null;
}

const IDENTIFIER_FIELDS = [
  'storage_bucket_arn',
  'table_arn',
  'function_arn_or_id',
  'api_id',
  'api_endpoint'
] as const satisfies readonly (keyof DeploymentConfig)[];

export interface OrchestratorOptions {
  naming?: ResourceNamingService;
  onStateChange?: StateChangeListener;
}

/**
 * Runs the provisioning steps in dependency order, feeding each step the
 * outputs of the previous ones and persisting the configuration after every
 * successful step. A failed step halts the run; nothing is rolled back.
 */
export class DeploymentOrchestrator {
  private readonly naming: ResourceNamingService;
  private readonly onStateChange?: StateChangeListener;
  private currentState: DeploymentState = { status: 'pending', step: DEPLOYMENT_STEPS[0] };

  constructor(
    private readonly store: ConfigStore,
    private readonly provisioners: ProvisionerSet,
    options: OrchestratorOptions = {}
  ) {
    this.naming = options.naming ?? new ResourceNamingService();
    this.onStateChange = options.onStateChange;
  }

  get state(): DeploymentState {
    return this.currentState;
  }

  resumePoint(config: DeploymentConfig): ResourceKind | null {
    return resumePoint(config);
  }

  /**
   * Run every step from the resume point (or `fromStep`) through the API
   */
  async deploy(config: DeploymentConfig, options: DeployOptions = {}): Promise<DeploymentResult> {
    const startTime = Date.now();
    const working = await this.prepare(config);

    const start = options.fromStep ?? this.resumePoint(working);
    const steps = start === null ? [] : DEPLOYMENT_STEPS.slice(DEPLOYMENT_STEPS.indexOf(start));

    return this.execute(working, steps, startTime);
  }

  /**
   * Run a single step, whatever the completion state of the configuration
   */
  async runStep(step: ResourceKind, config: DeploymentConfig): Promise<DeploymentResult> {
    const startTime = Date.now();
    const working = await this.prepare(config);
    return this.execute(working, [step], startTime);
  }

  /**
   * Take a private copy of the configuration and fill in derived names,
   * persisting them before any resource is created
   */
  private async prepare(config: DeploymentConfig): Promise<DeploymentConfig> {
    const working = structuredClone(config);
    if (!this.naming.hasMissingNames(working)) {
      return working;
    }

    const named = this.naming.deriveNames(working);
    await this.persist(named);
    return named;
  }

  private async persist(config: DeploymentConfig): Promise<void> {
    try {
      await this.store.save(config);
    } catch (error) {
      throw new ConfigSaveError(this.store.path, error);
    }
  }

  private async execute(config: DeploymentConfig, steps: readonly ResourceKind[], startTime: number): Promise<DeploymentResult> {
    const metadata: DeploymentMetadata = {
      deploymentId: uuidv4(),
      timestamp: new Date(startTime),
      region: config.region,
      stackName: config.stack_name
    };
    const results: ProvisionResult[] = [];
    const endpoints: Endpoint[] = [];
    let working = config;

    for (const step of steps) {
      this.transition({ status: 'pending', step }, working);
      this.transition({ status: 'running', step }, working);

      try {
        const result = await this.provisioners[step].ensure(working);
        const updated = { ...working, ...result.outputs };
        await this.persist(updated);
        working = updated;

        results.push(result);
        if (result.endpoint) {
          endpoints.push(result.endpoint);
        }
      } catch (error) {
        const provisioningError = asProvisioningError(error, `${step} step`);
        this.transition({ status: 'step_failed', step, error: provisioningError }, working);
        metadata.duration = Date.now() - startTime;

        return {
          success: false,
          state: this.currentState,
          config: working,
          results,
          endpoints,
          failure: this.describeFailure(step, provisioningError, working),
          metadata
        };
      }
    }

    const lastStep = steps.length > 0 ? steps[steps.length - 1] : null;
    const next = lastStep === null ? null : DEPLOYMENT_STEPS[DEPLOYMENT_STEPS.indexOf(lastStep) + 1];
    this.transition(next ? { status: 'pending', step: next } : { status: 'completed' }, working);
    metadata.duration = Date.now() - startTime;

    return {
      success: true,
      state: this.currentState,
      config: working,
      results,
      endpoints,
      metadata
    };
  }

  private transition(state: DeploymentState, config: DeploymentConfig): void {
    this.currentState = state;
    this.onStateChange?.(state, config);
  }

  private describeFailure(step: ResourceKind, error: ProvisioningError, config: DeploymentConfig): StepFailure {
    const persisted: StepFailure['persisted'] = {};
    for (const field of IDENTIFIER_FIELDS) {
      const value = config[field];
      if (value) {
        persisted[field] = value;
      }
    }

    const deploymentError: DeploymentError = {
      code: error.code,
      message: error.message,
      details: error.cause,
      remediation: error.remediation
    };

    return { step, error: deploymentError, persisted };
  }
}

export interface CreateOrchestratorOptions {
  /** Provision against an in-memory client and never write the config file */
  dryRun?: boolean;
  logger?: Logger;
  retry?: RetryOptions;
  onStateChange?: StateChangeListener;
}

/**
 * Wire an orchestrator to AWS (or to the in-memory client for dry runs)
 */
export function createDeploymentOrchestrator(
  config: DeploymentConfig,
  store: ConfigStore,
  options: CreateOrchestratorOptions = {}
): DeploymentOrchestrator {
  const logger = options.logger ?? console;

  if (config.aws_profile && !options.dryRun) {
    // The SDK's default credential chain reads the profile from the environment
    process.env.AWS_PROFILE = config.aws_profile;
  }

  const client = options.dryRun
    ? new InMemoryResourceClient(config.region)
    : new AwsResourceClient(config.region, {}, logger);
  const provisioners = createProvisioners(client, { logger, retry: options.retry });

  return new DeploymentOrchestrator(
    options.dryRun ? new MemoryConfigStore(config, store.path) : store,
    provisioners,
    { onStateChange: options.onStateChange }
  );
}

// Convenience function: load the configuration file and deploy everything
export async function deploy(configPath: string, options: CreateOrchestratorOptions = {}): Promise<DeploymentResult> {
  const store = createConfigStore(configPath);
  const config = await store.load();
  const orchestrator = createDeploymentOrchestrator(config, store, options);
  return orchestrator.deploy(config);
}
