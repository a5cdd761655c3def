import { describe, it, expect } from 'vitest';
import { serializeForLog, truncateString, errorToLog } from '../logging.js';
import { ExtractionError, ValidationError } from '../../errors/index.js';
import type { ExtractionFailure } from '../../types/index.js';

describe('Logging Utilities', () => {
  describe('serializeForLog', () => {
    it('should return primitives unchanged', () => {
      expect(serializeForLog(null)).toBe(null);
      expect(serializeForLog(undefined)).toBe(undefined);
      expect(serializeForLog(42)).toBe(42);
      expect(serializeForLog('hello')).toBe('hello');
      expect(serializeForLog(true)).toBe(true);
    });

    it('should safely serialize objects', () => {
      const obj = { raw: '42.50 USD', amount: { amount: 4250, currency: 'USD' } };
      expect(serializeForLog(obj)).toEqual(obj);
    });

    it('should handle circular references', () => {
      const obj: Record<string, unknown> = { name: 'test' };
      obj.self = obj;

      const result = serializeForLog(obj);
      expect(typeof result).toBe('string');
      expect(result).toContain('Unserializable object');
    });

    it('should drop undefined values', () => {
      const obj = { keyword: 'TOTAL', currency: undefined };
      expect(serializeForLog(obj)).toEqual({ keyword: 'TOTAL' });
    });
  });

  describe('truncateString', () => {
    it('should return string unchanged if below max length', () => {
      expect(truncateString('TOTAL 42.50 USD', 50)).toBe('TOTAL 42.50 USD');
    });

    it('should truncate string at max length with ellipsis', () => {
      expect(truncateString('TOTAL 42.50 USD', 5)).toBe('TOTAL...');
    });

    it('should default to 500 characters', () => {
      const long = 'x'.repeat(600);
      const result = truncateString(long);
      expect(result.length).toBe(503);
      expect(result.endsWith('...')).toBe(true);
    });

    it('should keep a string of exactly max length', () => {
      expect(truncateString('12345', 5)).toBe('12345');
    });
  });

  describe('errorToLog', () => {
    it('should convert Error instances', () => {
      const log = errorToLog(new TypeError('bad token'));
      expect(log.type).toBe('TypeError');
      expect(log.message).toBe('bad token');
      expect(typeof log.stack).toBe('string');
    });

    it('should keep the category of an ExtractionError', () => {
      const failure: ExtractionFailure = {
        ok: false,
        reason: 'Ambiguous',
        message: 'Found 2 conflicting totals: 42.50 USD, 40.00 USD',
        candidates: [],
        rejected: [],
      };
      expect(errorToLog(new ExtractionError(failure))).toEqual({
        type: 'ExtractionError',
        message: 'Found 2 conflicting totals: 42.50 USD, 40.00 USD',
        category: 'Ambiguous',
        candidates: 0,
        rejected: 0,
      });
    });

    it('should keep the details of a ValidationError', () => {
      const error = new ValidationError('Invalid extractor configuration', {
        issues: ['windowLines: Too big'],
      });
      expect(errorToLog(error)).toEqual({
        type: 'ValidationError',
        message: 'Invalid extractor configuration',
        details: { issues: ['windowLines: Too big'] },
      });
    });

    it('should serialize plain objects', () => {
      expect(errorToLog({ code: 'E_TOTAL', line: 3 })).toEqual({ code: 'E_TOTAL', line: 3 });
    });

    it('should describe primitives', () => {
      expect(errorToLog('boom')).toEqual({ type: 'string', message: 'boom' });
      expect(errorToLog(404)).toEqual({ type: 'number', message: '404' });
    });
  });
});
