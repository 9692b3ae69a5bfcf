export * from './types';
export * from './deployment-orchestrator';
