export * from './errors.js';

/**
 * Positional components of a BBAN
 */
export enum IbanComponent {
  BANK_CODE = 'bank_code',
  BRANCH_CODE = 'branch_code',
  ACCOUNT_CODE = 'account_code',
}

/**
 * Half-open character range [start, end) within the BBAN
 */
export type PositionRange = readonly [start: number, end: number];

/**
 * Compiled BBAN structure matcher
 */
export interface BbanMatcher {
  /** Pattern-language source, e.g. "8!n10!n" */
  readonly source: string;
  /** Anchored regular expression compiled from the source */
  readonly regex: RegExp;
  /** Tests whether the value satisfies the full pattern */
  test(value: string): boolean;
}

/**
 * Raw country entry as stored in the bundled registry file
 */
export interface CountrySpecEntry {
  bban_spec: string;
  iban_length: number;
  positions: Record<string, [number, number] | undefined>;
}

/**
 * Prepared, immutable country specification
 */
export interface CountrySpec {
  /** ISO 3166-1 alpha-2 country code (uppercase) */
  readonly countryCode: string;
  /** Total compact IBAN length */
  readonly ibanLength: number;
  /** Pattern-language source of the BBAN structure */
  readonly bbanPattern: string;
  /** Matcher compiled from bbanPattern at ingestion */
  readonly matcher: BbanMatcher;
  /** Component ranges within the BBAN */
  readonly positions: Readonly<Record<IbanComponent, PositionRange>>;
}

/**
 * Raw bank entry as stored in the bundled bank registry file
 */
export interface BankEntry {
  country_code: string;
  bank_code: string;
  bic: string;
  name: string;
  short_name?: string;
  primary?: boolean;
}

/**
 * Gets the width of a position range
 */
export function rangeLength(range: PositionRange): number {
  return range[1] - range[0];
}
