/**
 * Bank Registry
 * Resolves a BIC from a country code and a domestic bank code
 */

import { readFileSync } from 'node:fs';
import { BicNotFoundError, InvalidSpecificationError, type BankEntry } from '../types/index.js';
import { Bic } from './bic.js';

/**
 * Location of the bundled bank registry
 */
export const DEFAULT_BANK_REGISTRY_URL = new URL('../../data/bank-registry.json', import.meta.url);

/**
 * Registered bank with its parsed BIC
 */
export interface Bank {
  readonly countryCode: string;
  readonly bankCode: string;
  readonly bic: Bic;
  readonly name: string;
  readonly shortName: string;
  readonly primary: boolean;
}

/**
 * Registry of banks keyed by (country code, bank code)
 */
export class BankRegistry {
  private banks: Map<string, Bank[]> = new Map();
  private sealed = false;

  /**
   * Registers a bank entry
   * @throws {InvalidBicError} if the entry's BIC is malformed
   * @throws {Error} if the registry is sealed
   */
  register(entry: BankEntry): Bank {
    if (this.sealed) {
      throw new Error(`Registry is sealed, cannot register bank ${entry.bank_code}`);
    }
    const bank: Bank = Object.freeze({
      countryCode: entry.country_code.toUpperCase(),
      bankCode: entry.bank_code,
      bic: new Bic(entry.bic),
      name: entry.name,
      shortName: entry.short_name ?? entry.name,
      primary: entry.primary ?? false,
    });

    const key = bankKey(bank.countryCode, bank.bankCode);
    const existing = this.banks.get(key) ?? [];
    existing.push(bank);
    this.banks.set(key, existing);
    return bank;
  }

  /**
   * Registers multiple bank entries
   */
  registerAll(entries: BankEntry[]): void {
    for (const entry of entries) {
      this.register(entry);
    }
  }

  /**
   * Gets all banks registered under a bank code, primary entries first
   */
  getBanks(countryCode: string, bankCode: string): Bank[] {
    const banks = this.banks.get(bankKey(countryCode, bankCode)) ?? [];
    return [...banks].sort((a, b) => Number(b.primary) - Number(a.primary));
  }

  /**
   * Finds the BIC for a bank code, or undefined
   */
  findByBankCode(countryCode: string, bankCode: string): Bic | undefined {
    return this.getBanks(countryCode, bankCode)[0]?.bic;
  }

  /**
   * Gets the BIC for a bank code
   * @throws {BicNotFoundError} if no bank is registered under the code
   */
  lookupByBankCode(countryCode: string, bankCode: string): Bic {
    const bic = this.findByBankCode(countryCode, bankCode);
    if (bic === undefined) {
      throw new BicNotFoundError(countryCode, bankCode);
    }
    return bic;
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
    let total = 0;
    for (const banks of this.banks.values()) {
      total += banks.length;
    }
    return total;
  }
}

function bankKey(countryCode: string, bankCode: string): string {
  return `${countryCode.toUpperCase()}:${bankCode}`;
}

/**
 * Creates a new isolated bank registry, optionally pre-populated
 */
export function createBankRegistry(entries: BankEntry[] = []): BankRegistry {
  const registry = new BankRegistry();
  registry.registerAll(entries);
  return registry;
}

/**
 * Loads a bank registry from a JSON file
 */
export function loadBankRegistryFromFile(path: string | URL): BankRegistry {
  const content = readFileSync(path, 'utf-8');
  return createBankRegistry(parseBankEntries(content));
}

/**
 * Parses bank registry JSON content (an array of bank entries)
 * @throws {InvalidSpecificationError} if the content is not a list of bank entries
 */
export function parseBankEntries(content: string): BankEntry[] {
  const data: unknown = JSON.parse(content);
  if (!Array.isArray(data)) {
    throw new InvalidSpecificationError('bank-registry', 'expected an array of bank entries');
  }

  return data.map((value: unknown, index) => {
    if (!isBankEntry(value)) {
      throw new InvalidSpecificationError('bank-registry', `malformed bank entry at index ${index}`);
    }
    return value;
  });
}

function isBankEntry(value: unknown): value is BankEntry {
  if (typeof value !== 'object' || value === null) return false;
  const entry: Record<string, unknown> = { ...value };
  return (
    typeof entry['country_code'] === 'string' &&
    typeof entry['bank_code'] === 'string' &&
    typeof entry['bic'] === 'string' &&
    typeof entry['name'] === 'string' &&
    (entry['short_name'] === undefined || typeof entry['short_name'] === 'string') &&
    (entry['primary'] === undefined || typeof entry['primary'] === 'boolean')
  );
}

let defaultBankRegistry: BankRegistry | null = null;

/**
 * Gets the bank registry loaded from the bundled data (loaded once, on first use, then sealed)
 */
export function getDefaultBankRegistry(): BankRegistry {
  if (defaultBankRegistry === null) {
    defaultBankRegistry = loadBankRegistryFromFile(DEFAULT_BANK_REGISTRY_URL).seal();
  }
  return defaultBankRegistry;
}
