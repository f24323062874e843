/**
 * IBAN structure, checksum and BIC derivation
 *
 * @example
 * import { Iban } from 'iban-structure';
 *
 * const iban = Iban.generate('DE', '37040044', '532013000');
 * iban.compact;        // 'DE89370400440532013000'
 * iban.bic.compact;    // 'COBADEFFXXX'
 */

export * from './types/index.js';
export * from './utils/bban-pattern.js';
export * from './utils/iban-checksum.js';
export * from './registry/index.js';
export * from './bic/index.js';
export * from './iban/index.js';
