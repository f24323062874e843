/**
 * BIC (ISO 9362)
 * Bank Identifier Code value
 *
 * Format: AAAA BB CC DDD (8 or 11 characters)
 * - AAAA: Bank code (4 letters)
 * - BB: Country code (2 letters, ISO 3166-1)
 * - CC: Location code (2 alphanumeric)
 * - DDD: Branch code (3 alphanumeric, optional)
 */

import { InvalidBicError } from '../types/index.js';

/**
 * Normalizes a BIC by removing whitespace and converting to uppercase
 */
export function normalizeBIC(bic: string): string {
  return bic.replace(/\s/g, '').toUpperCase();
}

/**
 * Checks the structure of a normalized BIC
 * @returns the reason it is malformed, or undefined if it is well-formed
 */
function checkStructure(bic: string): string | undefined {
  if (bic.length !== 8 && bic.length !== 11) {
    return `expected 8 or 11 characters, got ${bic.length}`;
  }
  if (!/^[A-Z]{4}$/.test(bic.slice(0, 4))) {
    return 'bank code must be 4 letters';
  }
  if (!/^[A-Z]{2}$/.test(bic.slice(4, 6))) {
    return 'country code must be 2 letters';
  }
  if (!/^[A-Z0-9]{2}$/.test(bic.slice(6, 8))) {
    return 'location code must be 2 alphanumeric characters';
  }
  if (bic.length === 11 && !/^[A-Z0-9]{3}$/.test(bic.slice(8, 11))) {
    return 'branch code must be 3 alphanumeric characters';
  }
  return undefined;
}

/**
 * Checks if a string is a structurally valid BIC
 */
export function isValidBIC(bic: string): boolean {
  return checkStructure(normalizeBIC(bic)) === undefined;
}

/**
 * Immutable BIC value
 */
export class Bic {
  readonly compact: string;

  /**
   * @throws {InvalidBicError} if the code is not a well-formed BIC
   */
  constructor(value: string) {
    const compact = normalizeBIC(value);
    const reason = checkStructure(compact);
    if (reason !== undefined) {
      throw new InvalidBicError(value, reason);
    }
    this.compact = compact;
  }

  get bankCode(): string {
    return this.compact.slice(0, 4);
  }

  get countryCode(): string {
    return this.compact.slice(4, 6);
  }

  get locationCode(): string {
    return this.compact.slice(6, 8);
  }

  /** Empty for 8-character codes */
  get branchCode(): string {
    return this.compact.slice(8, 11);
  }

  /** "COBA DE FF XXX" */
  get formatted(): string {
    return [this.bankCode, this.countryCode, this.locationCode, this.branchCode]
      .filter((part) => part.length > 0)
      .join(' ');
  }

  equals(other: Bic | string): boolean {
    const compact = typeof other === 'string' ? normalizeBIC(other) : other.compact;
    return compact === this.compact;
  }

  toString(): string {
    return this.compact;
  }
}
