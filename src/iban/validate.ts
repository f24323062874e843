/**
 * Non-throwing IBAN validation
 */

import {
  InvalidCharacterError,
  UnknownCountryError,
  isValidationError,
  type IbanValidationError,
} from '../types/index.js';
import { Iban, type IbanOptions } from './iban.js';

/**
 * Validation result
 */
export interface IbanValidationResult {
  /** Whether validation passed */
  valid: boolean;
  /** The parsed IBAN (if valid) */
  iban?: Iban;
  /** First failure (if invalid) */
  error?: IbanValidationError | UnknownCountryError | InvalidCharacterError;
}

/**
 * Validates an IBAN and reports the first failure instead of throwing
 * Only failures caused by the input are reported; specification and lookup
 * errors propagate.
 */
export function validateIBAN(
  value: string,
  options: Partial<Omit<IbanOptions, 'allowInvalid'>> = {}
): IbanValidationResult {
  try {
    const iban = new Iban(value, { ...options, allowInvalid: false });
    return { valid: true, iban };
  } catch (error) {
    if (
      isValidationError(error) ||
      error instanceof UnknownCountryError ||
      error instanceof InvalidCharacterError
    ) {
      return { valid: false, error };
    }
    throw error;
  }
}

/**
 * Checks if a string is a valid IBAN
 */
export function isValidIBAN(
  value: string,
  options: Partial<Omit<IbanOptions, 'allowInvalid'>> = {}
): boolean {
  return validateIBAN(value, options).valid;
}
