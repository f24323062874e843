/**
 * Registry Loading
 * Reads the bundled country specification table
 */

import { readFileSync } from 'node:fs';
import { InvalidSpecificationError, type CountrySpecEntry } from '../types/index.js';
import { createSpecRegistry, type SpecRegistry } from './spec-registry.js';

/**
 * Location of the bundled IBAN registry
 */
export const DEFAULT_IBAN_REGISTRY_URL = new URL('../../data/iban-registry.json', import.meta.url);

/**
 * Loads a specification registry from a JSON file
 */
export function loadSpecRegistryFromFile(path: string | URL): SpecRegistry {
  const content = readFileSync(path, 'utf-8');
  return createSpecRegistry(parseSpecEntries(content));
}

/**
 * Parses registry JSON content into raw entries keyed by country code
 * @throws {InvalidSpecificationError} if the content is not a registry table
 */
export function parseSpecEntries(content: string): Record<string, CountrySpecEntry> {
  const data: unknown = JSON.parse(content);
  if (!isRecord(data)) {
    throw new InvalidSpecificationError('iban-registry', 'expected an object keyed by country code');
  }

  const entries: Record<string, CountrySpecEntry> = {};
  for (const [countryCode, value] of Object.entries(data)) {
    if (!isSpecEntry(value)) {
      throw new InvalidSpecificationError(countryCode, 'entry needs bban_spec, iban_length and positions');
    }
    entries[countryCode] = value;
  }

  return entries;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRange(value: unknown): value is [number, number] {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'number' &&
    typeof value[1] === 'number'
  );
}

function isSpecEntry(value: unknown): value is CountrySpecEntry {
  if (!isRecord(value)) return false;
  const { bban_spec, iban_length, positions } = value;
  return (
    typeof bban_spec === 'string' &&
    typeof iban_length === 'number' &&
    isRecord(positions) &&
    Object.values(positions).every(isRange)
  );
}

/**
 * Global singleton registry instance
 */
let defaultRegistry: SpecRegistry | null = null;

/**
 * Gets the registry loaded from the bundled data (loaded once, on first use, then sealed)
 */
export function getDefaultSpecRegistry(): SpecRegistry {
  if (defaultRegistry === null) {
    defaultRegistry = loadSpecRegistryFromFile(DEFAULT_IBAN_REGISTRY_URL).seal();
  }
  return defaultRegistry;
}
