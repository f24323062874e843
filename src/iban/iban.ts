/**
 * IBAN (ISO 13616)
 * Parsing, validation and generation against per-country BBAN structures
 */

import {
  CodeTooLongError,
  IbanComponent,
  InvalidBbanStructureError,
  InvalidChecksumError,
  InvalidCharactersError,
  InvalidLengthError,
  rangeLength,
  type CountrySpec,
} from '../types/index.js';
import { getDefaultSpecRegistry, type SpecRegistry } from '../registry/index.js';
import { getDefaultBankRegistry, type BankRegistry, type Bic } from '../bic/index.js';
import {
  computeChecksumDigits,
  formatIBAN,
  normalizeIBAN,
  numerify,
  validateChecksum,
} from '../utils/iban-checksum.js';

/**
 * Placeholder for check digits that are still to be computed
 */
export const CHECKSUM_PLACEHOLDER = '??';

/**
 * IBAN construction options
 */
export interface IbanOptions {
  /** Skip validation on construction */
  allowInvalid: boolean;
  /** Country specifications (default: bundled registry) */
  registry?: SpecRegistry;
  /** Bank code to BIC lookup (default: bundled bank registry) */
  bankRegistry?: BankRegistry;
}

/**
 * Default construction options
 */
export const DEFAULT_IBAN_OPTIONS: IbanOptions = {
  allowInvalid: false,
};

/**
 * Immutable IBAN value
 *
 * @example
 * const iban = new Iban('DE89 3704 0044 0532 0130 00');
 * iban.bankCode;  // '37040044'
 * iban.formatted; // 'DE89 3704 0044 0532 0130 00'
 */
export class Iban {
  /** Uppercase IBAN without whitespace */
  readonly compact: string;

  private readonly registry: SpecRegistry;
  private readonly bankRegistry: BankRegistry | undefined;

  /**
   * @param value - IBAN text, whitespace and case are ignored; "??" as check
   *   digits asks for them to be computed
   * @throws {IbanValidationError} unless allowInvalid is set
   * @throws {UnknownCountryError} if the country is not registered (unless allowInvalid is set)
   * @throws {InvalidCharacterError} if "??" check digits cannot be computed
   */
  constructor(value: string, options: Partial<IbanOptions> = {}) {
    const opts = { ...DEFAULT_IBAN_OPTIONS, ...options };
    this.registry = opts.registry ?? getDefaultSpecRegistry();
    this.bankRegistry = opts.bankRegistry;

    const compact = normalizeIBAN(value);
    if (compact.slice(2, 4) === CHECKSUM_PLACEHOLDER) {
      const countryCode = compact.slice(0, 2);
      const bban = compact.slice(4);
      this.compact = countryCode + computeChecksumDigits(bban, countryCode) + bban;
    } else {
      this.compact = compact;
    }

    if (!opts.allowInvalid) {
      this.validate();
    }
  }

  /**
   * Builds an IBAN from a bank code and an account code
   * Both codes are left-padded with zeros; the bank code covers the bank and
   * branch segments together.
   * @throws {UnknownCountryError} if the country is not registered
   * @throws {CodeTooLongError} if a code exceeds its field width
   */
  static generate(
    countryCode: string,
    bankCode: string,
    accountCode: string,
    options: Partial<Omit<IbanOptions, 'allowInvalid'>> = {}
  ): Iban {
    const registry = options.registry ?? getDefaultSpecRegistry();
    const spec = registry.get(countryCode);

    const bankAndBranchLength =
      rangeLength(spec.positions[IbanComponent.BANK_CODE]) +
      rangeLength(spec.positions[IbanComponent.BRANCH_CODE]);
    const accountLength = rangeLength(spec.positions[IbanComponent.ACCOUNT_CODE]);

    if (bankCode.length > bankAndBranchLength) {
      throw new CodeTooLongError('bank_code', bankCode, bankAndBranchLength);
    }
    if (accountCode.length > accountLength) {
      throw new CodeTooLongError('account_code', accountCode, accountLength);
    }

    const skeleton =
      spec.countryCode +
      CHECKSUM_PLACEHOLDER +
      bankCode.padStart(bankAndBranchLength, '0') +
      accountCode.padStart(accountLength, '0');

    return new Iban(skeleton, { ...options, allowInvalid: false });
  }

  get length(): number {
    return this.compact.length;
  }

  get countryCode(): string {
    return this.compact.slice(0, 2);
  }

  get checksumDigits(): string {
    return this.compact.slice(2, 4);
  }

  get bban(): string {
    return this.compact.slice(4);
  }

  /**
   * Specification of this IBAN's country
   * @throws {UnknownCountryError}
   */
  get spec(): CountrySpec {
    return this.registry.get(this.countryCode);
  }

  /**
   * Extracts a BBAN component by its position in the country specification
   */
  getComponent(component: IbanComponent): string {
    const [start, end] = this.spec.positions[component];
    return this.bban.slice(start, end);
  }

  get bankCode(): string {
    return this.getComponent(IbanComponent.BANK_CODE);
  }

  get branchCode(): string {
    return this.getComponent(IbanComponent.BRANCH_CODE);
  }

  get accountCode(): string {
    return this.getComponent(IbanComponent.ACCOUNT_CODE);
  }

  /**
   * BBAN followed by country code and check digits, as an integer
   */
  get numeric(): bigint {
    return numerify(this.bban + this.compact.slice(0, 4));
  }

  /** Groups of 4 characters separated by spaces */
  get formatted(): string {
    return formatIBAN(this.compact);
  }

  /**
   * BIC of the bank identified by the bank code
   * @throws {BicNotFoundError} if no bank is registered under the code
   */
  get bic(): Bic {
    const bankRegistry = this.bankRegistry ?? getDefaultBankRegistry();
    return bankRegistry.lookupByBankCode(this.countryCode, this.bankCode);
  }

  /**
   * Runs all checks in order, stopping at the first failure
   * @throws {IbanValidationError}
   */
  validate(): true {
    this.validateCharacters();
    this.validateLength();
    this.validateFormat();
    this.validateChecksum();
    return true;
  }

  validateCharacters(): void {
    if (!/^[A-Z]{2}\d{2}[A-Z0-9]*$/.test(this.compact)) {
      throw new InvalidCharactersError(this.compact);
    }
  }

  validateLength(): void {
    const expected = this.spec.ibanLength;
    if (this.length !== expected) {
      throw new InvalidLengthError(this.compact, expected, this.length);
    }
  }

  validateFormat(): void {
    const { matcher } = this.spec;
    if (!matcher.test(this.bban)) {
      throw new InvalidBbanStructureError(this.bban, matcher.source);
    }
  }

  validateChecksum(): void {
    if (!validateChecksum(this.compact)) {
      throw new InvalidChecksumError(this.compact, this.checksumDigits);
    }
  }

  equals(other: Iban | string): boolean {
    const compact = typeof other === 'string' ? normalizeIBAN(other) : other.compact;
    return compact === this.compact;
  }

  toString(): string {
    return this.compact;
  }
}
