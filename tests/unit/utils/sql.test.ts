/**
 * SQL Escaping Tests
 */

import { describe, it, expect } from 'vitest';
import { escapeSqlString, inFilter } from '../../../src/utils/sql.js';

describe('SQL Utilities', () => {
  describe('escapeSqlString', () => {
    it('should double single quotes', () => {
      expect(escapeSqlString("it's")).toBe("it''s");
    });

    it('should double backslashes', () => {
      expect(escapeSqlString('a\\b')).toBe('a\\\\b');
    });

    it('should strip control characters but keep tabs and newlines', () => {
      expect(escapeSqlString('a\x00b\x07c\td\ne')).toBe('abc\td\ne');
    });

    it('should leave plain identifiers untouched', () => {
      expect(escapeSqlString('3b241101-e2bb-4255-8caf-4136c566a962')).toBe(
        '3b241101-e2bb-4255-8caf-4136c566a962'
      );
    });
  });

  describe('inFilter', () => {
    it('should build an IN list of escaped literals', () => {
      expect(inFilter('id', ['a', "b'c"])).toBe("id IN ('a', 'b''c')");
    });

    it('should neutralize an injection attempt', () => {
      expect(inFilter('id', ["x') OR 1=1 --"])).toBe("id IN ('x'') OR 1=1 --')");
    });

    it('should reject an empty list', () => {
      expect(() => inFilter('id', [])).toThrow('inFilter requires at least one value');
    });
  });
});
