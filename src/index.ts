// Main entry point for hackstack
export * from './types';
export * from './errors';
export * from './config';
export * from './provisioning';
export * from './orchestration';

// Main deployment function
export { deploy } from './orchestration/deployment-orchestrator';
