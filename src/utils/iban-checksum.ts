/**
 * IBAN Checksum (ISO 7064 MOD 97-10)
 * Numeric transform, check digit computation and verification
 */

import { InvalidCharacterError } from '../types/index.js';

/**
 * Character values for the numeric transform: 0-9 map to themselves, A=10 ... Z=35
 */
const ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ';

const MODULUS = 97n;

/**
 * Converts an alphanumeric string to the integer formed by concatenating
 * each character's value in decimal
 *
 * @example
 * numerify('DE'); // 1314n
 * @throws {InvalidCharacterError} for any character outside [0-9A-Z]
 */
export function numerify(value: string): bigint {
  let digits = '';

  for (const char of value) {
    const index = ALPHABET.indexOf(char);
    if (index === -1) {
      throw new InvalidCharacterError(value, char);
    }
    digits += index.toString();
  }

  return BigInt(digits);
}

/**
 * Calculates the two check digits for a BBAN in the given country
 * @returns Always two characters, zero-padded ("02" to "98")
 */
export function computeChecksumDigits(bban: string, countryCode: string): string {
  const remainder = (numerify(bban + countryCode) * 100n) % MODULUS;
  return (98n - remainder).toString().padStart(2, '0');
}

/**
 * Verifies the check digits of a compact IBAN:
 * moves the first 4 chars to the end and tests for remainder 1
 */
export function validateChecksum(compact: string): boolean {
  return numerify(compact.slice(4) + compact.slice(0, 4)) % MODULUS === 1n;
}

/**
 * Normalizes an IBAN by removing whitespace and converting to uppercase
 */
export function normalizeIBAN(iban: string): string {
  return iban.replace(/\s/g, '').toUpperCase();
}

/**
 * Formats an IBAN with spaces every 4 characters for readability
 */
export function formatIBAN(iban: string): string {
  const normalized = normalizeIBAN(iban);
  return normalized.replace(/(.{4})/g, '$1 ').trim();
}
