/**
 * IBAN Module
 */

export * from './iban.js';
export * from './validate.js';
