// Orchestration-specific types
import { ProvisioningError } from '../errors';
import {
  DeploymentConfig,
  DeploymentError,
  DeploymentMetadata,
  Endpoint,
  ProvisionResult,
  ResourceKind
} from '../types';

export type DeploymentState =
  | { status: 'pending'; step: ResourceKind }
  | { status: 'running'; step: ResourceKind }
  | { status: 'step_failed'; step: ResourceKind; error: ProvisioningError }
  | { status: 'completed' };

export type StateChangeListener = (state: DeploymentState, config: DeploymentConfig) => void;

export interface StepFailure {
  step: ResourceKind;
  error: DeploymentError;
  /** Identifiers already persisted when the step failed */
  persisted: Partial<Record<keyof DeploymentConfig, string>>;
}

export interface DeploymentResult {
  success: boolean;
  state: DeploymentState;
  config: DeploymentConfig;
  results: ProvisionResult[];
  endpoints: Endpoint[];
  failure?: StepFailure;
  metadata: DeploymentMetadata;
}

export interface DeployOptions {
  /** Re-run from this step even if it already completed */
  fromStep?: ResourceKind;
}
