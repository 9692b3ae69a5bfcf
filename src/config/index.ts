export * from './types';
export * from './loader';
export * from './memory-store';
export * from './init';
export * from './naming';
export * from './validator';
