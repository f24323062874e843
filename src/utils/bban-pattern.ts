/**
 * BBAN Pattern Compiler
 * Compiles the compact structure notation used by the IBAN registry
 * (e.g. "4!a6!n8!n") into an anchored matcher
 *
 * Each clause is <count>[!]<type>:
 * - n: digit
 * - a: uppercase letter
 * - c: alphanumeric
 * - e: space
 * Without "!" a clause matches 1 to count characters, with "!" exactly count.
 */

import { InvalidSpecificationError, type BbanMatcher } from '../types/index.js';

/**
 * Character class per type symbol
 */
const CLAUSE_TYPES: Record<string, string> = {
  n: '\\d',
  a: '[A-Z]',
  c: '[A-Za-z0-9]',
  e: ' ',
};

/**
 * A single parsed clause
 */
export interface BbanClause {
  count: number;
  exact: boolean;
  type: string;
}

/**
 * Parses a pattern into its clauses
 * @throws {InvalidSpecificationError} on an empty pattern or a malformed clause
 */
export function parseBbanPattern(pattern: string): BbanClause[] {
  if (pattern.length === 0) {
    throw new InvalidSpecificationError(pattern, 'pattern is empty');
  }

  const clauses: BbanClause[] = [];
  const clausePattern = /(\d*)(!?)(\D?)/y;
  let offset = 0;

  while (offset < pattern.length) {
    clausePattern.lastIndex = offset;
    const match = clausePattern.exec(pattern);
    const [clause = '', countText = '', exact = '', type = ''] = match ?? [];

    if (type === '') {
      throw new InvalidSpecificationError(pattern, `incomplete clause '${clause}' at offset ${offset}`);
    }

    const count = countText === '' ? 0 : parseInt(countText, 10);
    if (!Number.isSafeInteger(count) || count <= 0) {
      throw new InvalidSpecificationError(pattern, `count must be a positive integer in clause '${clause}'`);
    }

    if (CLAUSE_TYPES[type] === undefined) {
      throw new InvalidSpecificationError(pattern, `unknown type character '${type}'`);
    }

    clauses.push({ count, exact: exact === '!', type });
    offset += clause.length;
  }

  return clauses;
}

/**
 * Compiles a pattern into an anchored matcher
 */
export function compileBbanPattern(pattern: string): BbanMatcher {
  const body = parseBbanPattern(pattern)
    .map(({ count, exact, type }) => {
      const quantifier = exact ? `{${count}}` : `{1,${count}}`;
      return `${CLAUSE_TYPES[type] ?? ''}${quantifier}`;
    })
    .join('');

  const regex = new RegExp(`^${body}$`);

  return {
    source: pattern,
    regex,
    test(value: string): boolean {
      return regex.test(value);
    },
  };
}

/**
 * Maximum number of characters a pattern admits
 */
export function bbanPatternLength(pattern: string): number {
  return parseBbanPattern(pattern).reduce((total, clause) => total + clause.count, 0);
}
