import { describe, it, expect } from 'vitest';
import { ExtractionError, ValidationError } from '../index.js';
import type { ExtractionFailure } from '../../types/index.js';

function failure(reason: ExtractionFailure['reason'], message: string): ExtractionFailure {
  return { ok: false, reason, message, candidates: [], rejected: [] };
}

describe('ExtractionError', () => {
  it('should carry the failed result and its category', () => {
    const result = failure('Ambiguous', 'Found 2 conflicting totals: 42.50 USD, 40.00 USD');
    const error = new ExtractionError(result);

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ExtractionError);
    expect(error.name).toBe('ExtractionError');
    expect(error.message).toBe('Found 2 conflicting totals: 42.50 USD, 40.00 USD');
    expect(error.category).toBe('Ambiguous');
    expect(error.result).toBe(result);
  });

  it('should ask for review only when the text had no single total', () => {
    expect(new ExtractionError(failure('NotFound', 'No total keyword found')).needsReview()).toBe(true);
    expect(new ExtractionError(failure('Ambiguous', 'Found 2 conflicting totals')).needsReview()).toBe(true);
    expect(new ExtractionError(failure('InvalidInput', 'Invalid input: text: text is empty')).needsReview()).toBe(
      false
    );
  });
});

describe('ValidationError', () => {
  it('should keep its details', () => {
    const error = new ValidationError('Invalid extractor configuration', { issues: ['windowLines: too small'] });

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.name).toBe('ValidationError');
    expect(error.details).toEqual({ issues: ['windowLines: too small'] });
  });
});
