/**
 * Registry Module
 * Exports the country specification registry and its loaders
 */

export * from './spec-registry.js';
export * from './loader.js';
