import { describe, expect, it } from 'vitest';
import { redactSecrets, sanitizeError } from './sanitize.js';

describe('sanitizeError', () => {
  it('redacts bot tokens embedded in request urls', () => {
    const error = new Error('request to https://api.telegram.org/bot123456789:AAtesttesttesttesttesttesttesttest/getMe failed');
    expect(sanitizeError(error)).toBe('Error: request to https://api.telegram.org/bot[REDACTED_TOKEN]/getMe failed');
  });

  it('stringifies non-errors', () => {
    expect(sanitizeError('plain')).toBe('plain');
    expect(sanitizeError(404)).toBe('404');
  });

  it('leaves ordinary text alone', () => {
    expect(redactSecrets('skipped 3 items')).toBe('skipped 3 items');
  });
});
