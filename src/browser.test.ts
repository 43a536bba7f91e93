import { describe, expect, it } from 'vitest';
import { observerUrl } from './browser.js';
import { makeAccount } from './testing/fakes.js';

describe('observerUrl', () => {
  it('appends the account as query parameters', () => {
    expect(observerUrl('https://pool.example/observer', makeAccount())).toBe(
      'https://pool.example/observer?accessKey=test-secret&coinType=BTC&observerUserId=user-1'
    );
  });

  it('keeps existing parameters and encodes values', () => {
    const account = makeAccount({ external_user_id: 'farm a&b', coin_type: 'LTC' });
    expect(observerUrl('https://pool.example/observer?lang=en', account)).toBe(
      'https://pool.example/observer?lang=en&accessKey=test-secret&coinType=LTC&observerUserId=farm+a%26b'
    );
  });
});
