/**
 * Error Taxonomy
 * Every failure the library raises is an IbanError with a stable code
 */

/**
 * Error codes
 */
export enum IbanErrorCode {
  UNKNOWN_COUNTRY = 'UNKNOWN_COUNTRY',
  INVALID_SPECIFICATION = 'INVALID_SPECIFICATION',
  CODE_TOO_LONG = 'CODE_TOO_LONG',
  INVALID_CHARACTER = 'INVALID_CHARACTER',
  INVALID_CHARACTERS = 'INVALID_CHARACTERS',
  INVALID_LENGTH = 'INVALID_LENGTH',
  INVALID_BBAN_STRUCTURE = 'INVALID_BBAN_STRUCTURE',
  INVALID_CHECKSUM = 'INVALID_CHECKSUM',
  INVALID_BIC = 'INVALID_BIC',
  BIC_NOT_FOUND = 'BIC_NOT_FOUND',
}

/**
 * Base class for all library errors
 */
export class IbanError extends Error {
  /** Error code */
  readonly code: IbanErrorCode;
  /** Additional details */
  readonly details: Readonly<Record<string, unknown>>;

  constructor(code: IbanErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'IbanError';
    this.code = code;
    this.details = details;
  }
}

export class UnknownCountryError extends IbanError {
  constructor(readonly countryCode: string) {
    super(IbanErrorCode.UNKNOWN_COUNTRY, `Unknown country-code ${countryCode}`, { countryCode });
    this.name = 'UnknownCountryError';
  }
}

/**
 * Raised for malformed specification data, never for end-user input
 */
export class InvalidSpecificationError extends IbanError {
  constructor(readonly source: string, reason: string) {
    super(IbanErrorCode.INVALID_SPECIFICATION, `Invalid specification '${source}': ${reason}`, {
      source,
      reason,
    });
    this.name = 'InvalidSpecificationError';
  }
}

export class CodeTooLongError extends IbanError {
  constructor(
    readonly field: 'bank_code' | 'account_code',
    readonly value: string,
    readonly maxLength: number
  ) {
    const label = field === 'bank_code' ? 'Bank code' : 'Account code';
    super(IbanErrorCode.CODE_TOO_LONG, `${label} exceeds maximum size ${maxLength}`, {
      field,
      value,
      maxLength,
    });
    this.name = 'CodeTooLongError';
  }
}

/**
 * Raised by numerify for a character outside [0-9A-Z]
 */
export class InvalidCharacterError extends IbanError {
  constructor(readonly value: string, readonly character: string) {
    super(IbanErrorCode.INVALID_CHARACTER, `Invalid character '${character}' in '${value}'`, {
      value,
      character,
    });
    this.name = 'InvalidCharacterError';
  }
}

export class InvalidCharactersError extends IbanError {
  constructor(readonly iban: string) {
    super(IbanErrorCode.INVALID_CHARACTERS, `Invalid characters in IBAN '${iban}'`, { iban });
    this.name = 'InvalidCharactersError';
  }
}

export class InvalidLengthError extends IbanError {
  constructor(
    readonly iban: string,
    readonly expected: number,
    readonly actual: number
  ) {
    super(
      IbanErrorCode.INVALID_LENGTH,
      `Invalid IBAN length: expected ${expected} characters, got ${actual}`,
      { iban, expected, actual }
    );
    this.name = 'InvalidLengthError';
  }
}

export class InvalidBbanStructureError extends IbanError {
  constructor(readonly bban: string, readonly pattern: string) {
    super(
      IbanErrorCode.INVALID_BBAN_STRUCTURE,
      `Invalid BBAN structure: '${bban}' doesn't match ${pattern}`,
      { bban, pattern }
    );
    this.name = 'InvalidBbanStructureError';
  }
}

export class InvalidChecksumError extends IbanError {
  constructor(readonly iban: string, readonly checksumDigits: string) {
    super(IbanErrorCode.INVALID_CHECKSUM, `Invalid checksum digits '${checksumDigits}'`, {
      iban,
      checksumDigits,
    });
    this.name = 'InvalidChecksumError';
  }
}

export class InvalidBicError extends IbanError {
  constructor(readonly bic: string, reason: string) {
    super(IbanErrorCode.INVALID_BIC, `Invalid BIC '${bic}': ${reason}`, { bic, reason });
    this.name = 'InvalidBicError';
  }
}

export class BicNotFoundError extends IbanError {
  constructor(readonly countryCode: string, readonly bankCode: string) {
    super(
      IbanErrorCode.BIC_NOT_FOUND,
      `No BIC found for bank code '${bankCode}' in country ${countryCode}`,
      { countryCode, bankCode }
    );
    this.name = 'BicNotFoundError';
  }
}

/**
 * The four failures that allowInvalid suppresses
 */
export type IbanValidationError =
  | InvalidCharactersError
  | InvalidLengthError
  | InvalidBbanStructureError
  | InvalidChecksumError;

/**
 * Checks if an error is one of the IBAN validation failures
 */
export function isValidationError(error: unknown): error is IbanValidationError {
  return (
    error instanceof InvalidCharactersError ||
    error instanceof InvalidLengthError ||
    error instanceof InvalidBbanStructureError ||
    error instanceof InvalidChecksumError
  );
}
