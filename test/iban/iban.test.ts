import { describe, it, expect } from 'vitest';
import { Iban } from '../../src/iban/iban.js';
import { validateIBAN, isValidIBAN } from '../../src/iban/validate.js';
import { createSpecRegistry, getDefaultSpecRegistry, SpecRegistry } from '../../src/registry/index.js';
import { createBankRegistry } from '../../src/bic/index.js';
import {
  BicNotFoundError,
  CodeTooLongError,
  IbanComponent,
  IbanErrorCode,
  InvalidBbanStructureError,
  InvalidCharacterError,
  InvalidCharactersError,
  InvalidChecksumError,
  InvalidLengthError,
  InvalidSpecificationError,
  UnknownCountryError,
  isValidationError,
} from '../../src/types/index.js';

describe('Iban', () => {
  describe('construction', () => {
    it('should parse a German IBAN', () => {
      const iban = new Iban('DE89370400440532013000');

      expect(iban.validate()).toBe(true);
      expect(iban.compact).toBe('DE89370400440532013000');
      expect(iban.length).toBe(22);
      expect(iban.countryCode).toBe('DE');
      expect(iban.checksumDigits).toBe('89');
      expect(iban.bban).toBe('370400440532013000');
      expect(iban.bankCode).toBe('37040044');
      expect(iban.branchCode).toBe('');
      expect(iban.accountCode).toBe('0532013000');
      expect(iban.formatted).toBe('DE89 3704 0044 0532 0130 00');
    });

    it('should accept formatted and lowercase input', () => {
      const iban = new Iban('de89 3704 0044 0532 0130 00');

      expect(iban.compact).toBe('DE89370400440532013000');
    });

    it('should extract bank, branch and account codes', () => {
      const gb = new Iban('GB82WEST12345698765432');
      expect(gb.bankCode).toBe('WEST');
      expect(gb.branchCode).toBe('123456');
      expect(gb.accountCode).toBe('98765432');

      const italian = new Iban('IT60X0542811101000000123456');
      expect(italian.getComponent(IbanComponent.BANK_CODE)).toBe('05428');
      expect(italian.getComponent(IbanComponent.BRANCH_CODE)).toBe('11101');
      expect(italian.getComponent(IbanComponent.ACCOUNT_CODE)).toBe('000000123456');
    });

    it('should compute check digits for a ?? placeholder', () => {
      const iban = new Iban('DE??370400440532013000');

      expect(iban.checksumDigits).toBe('89');
      expect(iban.equals('DE89370400440532013000')).toBe(true);
      expect(iban.equals(new Iban('DE89370400440532013000'))).toBe(true);
    });

    it('should zero-pad computed check digits', () => {
      expect(new Iban('DE??100000430000012345').compact).toBe('DE07100000430000012345');
    });

    it('should expose the rearranged numeric value', () => {
      const iban = new Iban('DE89370400440532013000');

      expect(iban.numeric).toBe(370400440532013000131489n);
      expect(iban.numeric % 97n).toBe(1n);
    });

    it('should render as the compact string', () => {
      expect(String(new Iban('NL91 ABNA 0417 1643 00'))).toBe('NL91ABNA0417164300');
    });
  });

  describe('validation', () => {
    it('should fail with InvalidLengthError when truncated', () => {
      expect(() => new Iban('DE8937040044053201300')).toThrow(InvalidLengthError);
      expect(() => new Iban('DE8937040044053201300')).toThrow(
        'Invalid IBAN length: expected 22 characters, got 21'
      );
    });

    it('should fail with InvalidBbanStructureError for a letter in a numeric field', () => {
      expect(() => new Iban('DE89370400440532013A00')).toThrow(InvalidBbanStructureError);
      expect(() => new Iban('DE89370400440532013A00')).toThrow(
        "Invalid BBAN structure: '370400440532013A00' doesn't match 8!n10!n"
      );
    });

    it('should fail with InvalidChecksumError for wrong check digits', () => {
      expect(() => new Iban('DE88370400440532013000')).toThrow(InvalidChecksumError);
      expect(() => new Iban('DE88370400440532013000')).toThrow("Invalid checksum digits '88'");
    });

    it('should fail with InvalidCharactersError for malformed input', () => {
      expect(() => new Iban('DE89-3704-0044-0532-0130-00')).toThrow(InvalidCharactersError);
      expect(() => new Iban('D189370400440532013000')).toThrow(InvalidCharactersError);
      expect(() => new Iban('DEXX370400440532013000')).toThrow(InvalidCharactersError);
    });

    it('should stop at the first failing check', () => {
      // wrong length and wrong checksum: length is checked first
      expect(() => new Iban('DE0037040044')).toThrow(InvalidLengthError);
      // wrong structure and wrong checksum: structure is checked first
      expect(() => new Iban('DE00370400440532013A00')).toThrow(InvalidBbanStructureError);
    });

    it('should fail with UnknownCountryError for an unregistered country', () => {
      expect(() => new Iban('XX00123456')).toThrow(UnknownCountryError);
    });

    it('should skip validation when allowInvalid is set', () => {
      const iban = new Iban('DE00370400440532013000', { allowInvalid: true });

      expect(iban.checksumDigits).toBe('00');
      expect(iban.bankCode).toBe('37040044');
      expect(() => iban.validate()).toThrow(InvalidChecksumError);
      expect(() => iban.validateLength()).not.toThrow();
    });

    it('should still fail on an unknown country when accessing the spec of an unchecked IBAN', () => {
      const iban = new Iban('XX00123456', { allowInvalid: true });

      expect(iban.countryCode).toBe('XX');
      expect(() => iban.bankCode).toThrow(UnknownCountryError);
    });

    it('should still fail on invalid characters when computing check digits', () => {
      expect(() => new Iban('DE??3704-0044', { allowInvalid: true })).toThrow(InvalidCharacterError);
    });

    it('should use an injected registry', () => {
      const registry = createSpecRegistry({
        ZZ: {
          bban_spec: '2!a4n',
          iban_length: 10,
          positions: { bank_code: [0, 2], branch_code: [2, 2], account_code: [2, 6] },
        },
      });
      const iban = new Iban('ZZ??AB1234', { registry });

      expect(iban.bankCode).toBe('AB');
      expect(iban.accountCode).toBe('1234');
      expect(iban.validate()).toBe(true);
      expect(() => new Iban('DE89370400440532013000', { registry })).toThrow(UnknownCountryError);
    });
  });

  describe('generate', () => {
    it('should build a German IBAN from bank and account code', () => {
      const iban = Iban.generate('DE', '37040044', '532013000');

      expect(iban.compact).toBe('DE89370400440532013000');
      expect(iban.accountCode).toBe('0532013000');
    });

    it('should zero-pad the check digits', () => {
      expect(Iban.generate('DE', '10000043', '12345').compact).toBe('DE07100000430000012345');
    });

    it('should fill bank and branch segments from the bank code', () => {
      const iban = Iban.generate('GB', 'NWBK601613', '31926819');

      expect(iban.compact).toBe('GB29NWBK60161331926819');
      expect(iban.bankCode).toBe('NWBK');
      expect(iban.branchCode).toBe('601613');
    });

    it('should accept a lowercase country code', () => {
      expect(Iban.generate('de', '37040044', '0532013000').countryCode).toBe('DE');
    });

    it('should accept a bank code of exactly the bank and branch width', () => {
      expect(Iban.generate('DE', '12345678', '1').bankCode).toBe('12345678');
    });

    it('should reject a bank code one character too long', () => {
      expect(() => Iban.generate('DE', '123456789', '1')).toThrow(CodeTooLongError);
      expect(() => Iban.generate('DE', '123456789', '1')).toThrow('Bank code exceeds maximum size 8');
    });

    it('should reject an account code that is too long', () => {
      expect(() => Iban.generate('DE', '37040044', '12345678901')).toThrow(
        'Account code exceeds maximum size 10'
      );
    });

    it('should reject an unknown country', () => {
      expect(() => Iban.generate('XX', '1', '1')).toThrow(UnknownCountryError);
    });

    it('should produce valid IBANs for numeric layouts', () => {
      const countries = ['AT', 'CZ', 'DE', 'DK', 'FI', 'HR', 'LT', 'NO', 'PL', 'SK'];

      for (const countryCode of countries) {
        const iban = Iban.generate(countryCode, '1', '42');

        expect(iban.validate()).toBe(true);
        expect(iban.length).toBe(iban.spec.ibanLength);
        expect(iban.accountCode.endsWith('42')).toBe(true);
      }
    });
  });

  describe('bic', () => {
    it('should resolve the BIC from the bundled bank registry', () => {
      const iban = new Iban('DE89370400440532013000');

      expect(iban.bic.compact).toBe('COBADEFFXXX');
    });

    it('should use an injected bank registry', () => {
      const bankRegistry = createBankRegistry([
        { country_code: 'DE', bank_code: '12345678', bic: 'TESTDEFFXXX', name: 'Test Bank' },
      ]);
      const iban = Iban.generate('DE', '12345678', '1', { bankRegistry });

      expect(iban.bic.formatted).toBe('TEST DE FF XXX');
    });

    it('should propagate lookup failures', () => {
      const iban = Iban.generate('DE', '99999999', '1');

      expect(() => iban.bic).toThrow(BicNotFoundError);
    });
  });
});

describe('validateIBAN', () => {
  it('should return the parsed IBAN for valid input', () => {
    const result = validateIBAN('GB82 WEST 1234 5698 7654 32');

    expect(result.valid).toBe(true);
    expect(result.iban?.compact).toBe('GB82WEST12345698765432');
    expect(result.error).toBeUndefined();
  });

  it('should report the first failure', () => {
    const result = validateIBAN('DE8937040044053201300');

    expect(result.valid).toBe(false);
    expect(result.error).toBeInstanceOf(InvalidLengthError);
    expect(result.error?.code).toBe(IbanErrorCode.INVALID_LENGTH);
    expect(isValidationError(result.error)).toBe(true);
  });

  it('should report unknown countries', () => {
    const result = validateIBAN('XX00123456');

    expect(result.error).toBeInstanceOf(UnknownCountryError);
    expect(isValidationError(result.error)).toBe(false);
  });

  it('should report invalid characters in computed check digits', () => {
    const result = validateIBAN('DE??3704-0044');

    expect(result.valid).toBe(false);
    expect(result.error).toBeInstanceOf(InvalidCharacterError);
  });

  it('should rethrow errors that do not come from the input', () => {
    class CorruptRegistry extends SpecRegistry {
      override get(countryCode: string): never {
        throw new InvalidSpecificationError(countryCode, 'corrupt table');
      }
    }

    expect(() => validateIBAN('DE89370400440532013000', { registry: new CorruptRegistry() })).toThrow(
      InvalidSpecificationError
    );
  });

  it('should not change validation after the default registry is loaded', () => {
    expect(() => getDefaultSpecRegistry().register('DE', {
      bban_spec: '18!n',
      iban_length: 22,
      positions: { bank_code: [0, 2], branch_code: [2, 2], account_code: [2, 18] },
    })).toThrow('Registry is sealed');
    expect(new Iban('DE89370400440532013000').bankCode).toBe('37040044');
  });

  it('should check validity as a boolean', () => {
    expect(isValidIBAN('FR7630006000011234567890189')).toBe(true);
    expect(isValidIBAN('ES9121000418450200051332')).toBe(true);
    expect(isValidIBAN('DE00370400440532013000')).toBe(false);
  });
});
