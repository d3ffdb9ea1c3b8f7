/**
 * SQL Identifier Utilities Tests
 */

import { describe, test, expect } from 'vitest';
import {
  escapeIdentifier,
  isPlainIdentifier,
  qualifiedName,
  quoteLiteral,
  stripQuotes,
} from '../../src/utils/identifier.js';

describe('SQL Identifier Utilities', () => {
  describe('isPlainIdentifier()', () => {
    test('accepts letters, digits and underscores', () => {
      expect(isPlainIdentifier('users')).toBe(true);
      expect(isPlainIdentifier('role_id')).toBe(true);
      expect(isPlainIdentifier('_private')).toBe(true);
      expect(isPlainIdentifier('table123')).toBe(true);
    });

    test('rejects everything else', () => {
      expect(isPlainIdentifier('')).toBe(false);
      expect(isPlainIdentifier('1st')).toBe(false);
      expect(isPlainIdentifier('user name')).toBe(false);
      expect(isPlainIdentifier('schema.table')).toBe(false);
      expect(isPlainIdentifier('name"; DROP TABLE users; --')).toBe(false);
      expect(isPlainIdentifier('müller')).toBe(false);
    });
  });

  describe('escapeIdentifier()', () => {
    test('wraps simple identifier in double quotes', () => {
      expect(escapeIdentifier('users')).toBe('"users"');
    });

    test('escapes internal double quotes by doubling them', () => {
      expect(escapeIdentifier('user"s')).toBe('"user""s"');
    });

    test('handles SQL keywords', () => {
      expect(escapeIdentifier('select')).toBe('"select"');
    });
  });

  describe('quoteLiteral()', () => {
    test('wraps the value in single quotes', () => {
      expect(quoteLiteral('title')).toBe("'title'");
    });

    test('doubles internal single quotes', () => {
      expect(quoteLiteral("it's")).toBe("'it''s'");
    });
  });

  describe('qualifiedName()', () => {
    test('quotes schema and table', () => {
      expect(qualifiedName('main', 'users')).toBe('"main"."users"');
    });
  });

  describe('stripQuotes()', () => {
    test('removes double quotes from both ends', () => {
      expect(stripQuotes('"users"')).toBe('users');
    });

    test('removes single quotes and backticks', () => {
      expect(stripQuotes("'users'")).toBe('users');
      expect(stripQuotes('`users`')).toBe('users');
    });

    test('handles unquoted identifiers', () => {
      expect(stripQuotes('users')).toBe('users');
    });

    test('does not remove internal quotes', () => {
      expect(stripQuotes('"user"s"')).toBe('user"s');
    });
  });
});
