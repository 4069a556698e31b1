import { describe, expect, it } from 'vitest';
import { isPgError, mapPgErrorToHttp } from './pgErrors';

describe('isPgError', () => {
  it('recognises five-character SQLSTATE codes only', () => {
    expect(isPgError({ code: '23505' })).toBe(true);
    expect(isPgError({ code: '40P01' })).toBe(true);
    expect(isPgError({ code: 'ECONNREFUSED' })).toBe(false);
    expect(isPgError({ code: 23505 })).toBe(false);
    expect(isPgError(null)).toBe(false);
    expect(isPgError(new Error('boom'))).toBe(false);
  });
});

describe('mapPgErrorToHttp', () => {
  const mapping = {
    unique: () => ({ status: 409, body: { error: 'duplicate' } }),
    check: (err: { constraint?: string }) => ({ status: 400, body: { error: 'check', details: err.constraint } })
  };

  it('routes each code to its callback', () => {
    expect(mapPgErrorToHttp({ code: '23505' }, mapping)).toEqual({ status: 409, body: { error: 'duplicate' } });
    expect(mapPgErrorToHttp({ code: '23514', constraint: 'itembatch_reserved_qty_check' }, mapping)).toEqual({
      status: 400,
      body: { error: 'check', details: 'itembatch_reserved_qty_check' }
    });
  });

  it('returns null when no callback applies', () => {
    expect(mapPgErrorToHttp({ code: '23503' }, mapping)).toBeNull();
    expect(mapPgErrorToHttp({ code: '40001' }, mapping)).toBeNull();
    expect(mapPgErrorToHttp(new Error('not pg'), mapping)).toBeNull();
  });
});
