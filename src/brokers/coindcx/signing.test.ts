import { describe, expect, it } from 'vitest';
import { signBody, signPayload } from './signing.js';

describe('signBody', () => {
  it('produces the hex HMAC-SHA256 of the body', () => {
    expect(signBody('test-secret', '{"timestamp":1700000000000}')).toBe(
      '67332dd108edaf5183991cfff880ca9b30de11e502b1a6914b1c100431868cd1',
    );
  });
});

describe('signPayload', () => {
  it('signs the exact compact JSON it returns', () => {
    const signed = signPayload({ apiKey: 'test-key', apiSecret: 'test-secret' }, { timestamp: 1700000000000 });

    expect(signed.body).toBe('{"timestamp":1700000000000}');
    expect(signed.headers).toEqual({
      'Content-Type': 'application/json',
      'X-AUTH-APIKEY': 'test-key',
      'X-AUTH-SIGNATURE': '67332dd108edaf5183991cfff880ca9b30de11e502b1a6914b1c100431868cd1',
    });
  });

  it('changes the signature when the body changes', () => {
    const creds = { apiKey: 'test-key', apiSecret: 'test-secret' };
    const a = signPayload(creds, { timestamp: 1 });
    const b = signPayload(creds, { timestamp: 2 });
    expect(a.headers['X-AUTH-SIGNATURE']).not.toBe(b.headers['X-AUTH-SIGNATURE']);
  });
});
