export * from './types.js';
export * from './base.js';
export * from './discovery.js';
export * from './common-yaml.js';
export * from './implementations.js';
export * from './module-registry.js';
export * from './resolver.js';
export * from './loader.js';
export * from './walker.js';
