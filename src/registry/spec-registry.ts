/**
 * Country Specification Registry
 * Read-only table of prepared IBAN country specifications
 */

import {
  IbanComponent,
  InvalidSpecificationError,
  UnknownCountryError,
  type CountrySpec,
  type CountrySpecEntry,
  type PositionRange,
} from '../types/index.js';
import { bbanPatternLength, compileBbanPattern } from '../utils/bban-pattern.js';

/** Country code + 2 checksum digits */
const IBAN_PREFIX_LENGTH = 4;

/**
 * Registry for prepared country specifications
 */
export class SpecRegistry {
  private specs: Map<string, CountrySpec> = new Map();
  private sealed = false;

  /**
   * Prepares and registers the specification for a country
   * Replaces any earlier entry for the same country.
   * @throws {InvalidSpecificationError} if the entry is malformed
   * @throws {Error} if the registry is sealed
   */
  register(countryCode: string, entry: CountrySpecEntry): CountrySpec {
    if (this.sealed) {
      throw new Error(`Registry is sealed, cannot register ${countryCode}`);
    }
    const spec = prepareCountrySpec(countryCode, entry);
    this.specs.set(spec.countryCode, spec);
    return spec;
  }

  /**
   * Registers multiple entries keyed by country code
   */
  registerAll(entries: Record<string, CountrySpecEntry>): void {
    for (const [countryCode, entry] of Object.entries(entries)) {
      this.register(countryCode, entry);
    }
  }

  /**
   * Gets the specification for a country
   * @throws {UnknownCountryError} if the country is not registered
   */
  get(countryCode: string): CountrySpec {
    const spec = this.find(countryCode);
    if (spec === undefined) {
      throw new UnknownCountryError(countryCode);
    }
    return spec;
  }

  /**
   * Gets the specification for a country, or undefined
   */
  find(countryCode: string): CountrySpec | undefined {
    return this.specs.get(countryCode.toUpperCase());
  }

  /**
   * Checks if a country is registered
   */
  has(countryCode: string): boolean {
    return this.specs.has(countryCode.toUpperCase());
  }

  /**
   * Gets all registered country codes, sorted
   */
  getCountryCodes(): string[] {
    return Array.from(this.specs.keys()).sort();
  }

  /**
   * Rejects any further registration
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.specs.size;
  }
}

/**
 * Validates a raw entry, compiles its BBAN pattern and freezes the result
 */
export function prepareCountrySpec(countryCode: string, entry: CountrySpecEntry): CountrySpec {
  const code = countryCode.toUpperCase();
  if (!/^[A-Z]{2}$/.test(code)) {
    throw new InvalidSpecificationError(countryCode, 'country code must be two letters');
  }

  const { bban_spec: bbanPattern, iban_length: ibanLength } = entry;
  if (!Number.isInteger(ibanLength) || ibanLength <= IBAN_PREFIX_LENGTH) {
    throw new InvalidSpecificationError(code, `invalid IBAN length ${ibanLength}`);
  }

  const bbanLength = ibanLength - IBAN_PREFIX_LENGTH;
  const matcher = compileBbanPattern(bbanPattern);
  if (bbanPatternLength(bbanPattern) < bbanLength) {
    throw new InvalidSpecificationError(
      code,
      `BBAN pattern ${bbanPattern} is shorter than ${bbanLength} characters`
    );
  }

  const positions = {
    [IbanComponent.BANK_CODE]: readRange(code, entry, IbanComponent.BANK_CODE, bbanLength),
    [IbanComponent.BRANCH_CODE]: readRange(code, entry, IbanComponent.BRANCH_CODE, bbanLength),
    [IbanComponent.ACCOUNT_CODE]: readRange(code, entry, IbanComponent.ACCOUNT_CODE, bbanLength),
  };

  return Object.freeze({
    countryCode: code,
    ibanLength,
    bbanPattern,
    matcher,
    positions: Object.freeze(positions),
  });
}

function readRange(
  countryCode: string,
  entry: CountrySpecEntry,
  component: IbanComponent,
  bbanLength: number
): PositionRange {
  const range = entry.positions[component];
  if (range === undefined) {
    throw new InvalidSpecificationError(countryCode, `missing position for ${component}`);
  }

  const [start, end] = range;
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start || end > bbanLength) {
    throw new InvalidSpecificationError(
      countryCode,
      `position ${component} [${start}, ${end}) outside BBAN of length ${bbanLength}`
    );
  }

  return Object.freeze([start, end] as const);
}

/**
 * Creates a new isolated registry, optionally pre-populated
 */
export function createSpecRegistry(entries: Record<string, CountrySpecEntry> = {}): SpecRegistry {
  const registry = new SpecRegistry();
  registry.registerAll(entries);
  return registry;
}
