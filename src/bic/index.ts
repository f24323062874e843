/**
 * BIC Module
 * Exports the BIC value and the bank registry
 */

export * from './bic.js';
export * from './bank-registry.js';
