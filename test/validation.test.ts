import { describe, test, expect } from 'vitest';
import {
  getCustomerRequestFromParams,
  parseIntegerMemo,
  putCustomerCallbackRequestFromParams,
  putCustomerRequestFromParams,
  putCustomerVerificationRequestFromParams,
  tokenAccountMemo,
  validateBase,
} from '../src/sep12/validation';
import { InvalidSepRequest } from '../src/sep12/errors';
import type { AuthToken } from '../src/sep12/types';
import { UploadedFile } from '../src/sep12/uploaded-file';
import { muxedAddress, randomAccountId } from './helpers/fixtures';

const ACCOUNT = randomAccountId();
const plainToken: AuthToken = { accountId: ACCOUNT };
const memoToken: AuthToken = { accountId: ACCOUNT, accountMemo: '9876' };

describe('parseIntegerMemo', () => {
  test('accepts base-10 integers', () => {
    expect(parseIntegerMemo('0')).toBe(0n);
    expect(parseIntegerMemo('123')).toBe(123n);
    expect(parseIntegerMemo(' 42 ')).toBe(42n);
    expect(parseIntegerMemo('18446744073709551615')).toBe(18446744073709551615n);
  });

  test('rejects everything else', () => {
    for (const value of ['', 'abc', '1.5', '1e3', '0x10', '12abc']) {
      expect(parseIntegerMemo(value)).toBeNull();
    }
  });
});

describe('validateBase', () => {
  test('extracts the shared fields', () => {
    expect(validateBase({ id: 'c1', account: ACCOUNT, memo: '7', memo_type: 'id', type: 'sep31-sender' })).toEqual({
      id: 'c1',
      account: ACCOUNT,
      memo: 7n,
      type: 'sep31-sender',
    });
  });

  test('null values count as absent', () => {
    expect(validateBase({ id: null, memo: null })).toEqual({
      id: undefined,
      account: undefined,
      memo: undefined,
      type: undefined,
    });
  });

  test('memo type other than id is rejected', () => {
    expect(() => validateBase({ memo_type: 'text' })).toThrow('only memo type id supported.');
    expect(() => validateBase({ memo_type: 'hash', memo: '1' })).toThrow(InvalidSepRequest);
  });

  test('non-integer memo is rejected', () => {
    expect(() => validateBase({ memo: 'abc' })).toThrow('invalid memo value: abc');
    expect(() => validateBase({ memo: '1.5' })).toThrow('invalid memo value: 1.5');
  });

  test('non-string fields are rejected', () => {
    expect(() => validateBase({ id: 5 })).toThrow('id must be a string');
    expect(() => validateBase({ account: ['x'] })).toThrow('account must be a string');
    expect(() => validateBase({ memo: 12 })).toThrow('memo must be a string');
  });

  test('errors carry message keys', () => {
    try {
      validateBase({ memo: 'abc' });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidSepRequest);
      if (e instanceof InvalidSepRequest) {
        expect(e.messageKey).toBe('sep12.error.invalid_memo');
        expect(e.messageParams).toEqual({ memo: 'abc' });
      }
    }
  });
});

describe('tokenAccountMemo', () => {
  test('reads the memo of a memo token', () => {
    expect(tokenAccountMemo(memoToken)).toBe(9876n);
    expect(tokenAccountMemo(plainToken)).toBeNull();
  });

  test('rejects a non-integer token memo', () => {
    expect(() => tokenAccountMemo({ accountId: ACCOUNT, accountMemo: 'x1' })).toThrow(
      'invalid jwt token memo value: x1'
    );
  });
});

describe('getCustomerRequestFromParams', () => {
  test('defaults the account to the token account', () => {
    expect(getCustomerRequestFromParams({ type: 'sep6', lang: 'de' }, plainToken)).toEqual({
      account: ACCOUNT,
      memo: null,
      id: undefined,
      type: 'sep6',
      lang: 'de',
    });
  });

  test('prefers the muxed account of the token', () => {
    const muxed = muxedAddress(ACCOUNT, '42');
    const request = getCustomerRequestFromParams({}, { accountId: ACCOUNT, muxedAccountId: muxed, muxedId: 42n });
    expect(request.account).toBe(muxed);
  });

  test('keeps the submitted account and memo', () => {
    const request = getCustomerRequestFromParams({ account: ACCOUNT, memo: '5' }, plainToken);
    expect(request.account).toBe(ACCOUNT);
    expect(request.memo).toBe(5n);
  });
});

describe('putCustomerRequestFromParams', () => {
  test('forwards every non-reserved key as KYC field', () => {
    const params = {
      id: 'c1',
      account: ACCOUNT,
      memo: '1',
      memoType: 'id',
      type: 'sep31-receiver',
      first_name: 'John',
      email_address: 'john@example.com',
      birth_date: '1990-01-01',
      nested: { a: 1 },
    };

    const request = putCustomerRequestFromParams(params, plainToken);

    expect(request.kycFields).toEqual({
      first_name: 'John',
      email_address: 'john@example.com',
      birth_date: '1990-01-01',
      nested: { a: 1 },
    });
    expect(request.id).toBe('c1');
    expect(request.memo).toBe(1n);
    expect(request.type).toBe('sep31-receiver');
    expect(request.kycUploadedFiles).toBeUndefined();
  });

  test('memo_type is forwarded, only memoType is reserved', () => {
    const request = putCustomerRequestFromParams({ memo_type: 'id', first_name: 'Jane' }, plainToken);
    expect(request.kycFields).toEqual({ memo_type: 'id', first_name: 'Jane' });
  });

  test('attaches uploaded files', () => {
    const file = new UploadedFile('photo_id_front', 'front.png', 'image/png', 3, 'OK', Buffer.from('abc'));
    const request = putCustomerRequestFromParams({}, plainToken, { photo_id_front: file });
    expect(request.kycUploadedFiles).toEqual({ photo_id_front: file });
    expect(request.account).toBe(ACCOUNT);
  });
});

describe('putCustomerCallbackRequestFromParams', () => {
  test('accepts an absolute url', () => {
    expect(putCustomerCallbackRequestFromParams({ url: 'https://wallet.example.com/kyc' }, plainToken)).toEqual({
      account: ACCOUNT,
      memo: null,
      id: undefined,
      url: 'https://wallet.example.com/kyc',
    });
  });

  test('url is optional', () => {
    expect(putCustomerCallbackRequestFromParams({ id: 'c1' }, plainToken).url).toBeUndefined();
  });

  test('rejects malformed urls', () => {
    expect(() => putCustomerCallbackRequestFromParams({ url: 'not a url' }, plainToken)).toThrow('invalid url');
    expect(() => putCustomerCallbackRequestFromParams({ url: '/relative/path' }, plainToken)).toThrow('invalid url');
  });

  test('rejects urls without host', () => {
    for (const url of ['javascript:alert(1)', 'foo:bar', 'file:///etc/passwd', 'mailto:kyc@example.com', 'http://']) {
      expect(() => putCustomerCallbackRequestFromParams({ url }, plainToken)).toThrow('invalid url');
    }
  });
});

describe('putCustomerVerificationRequestFromParams', () => {
  test('collects verification fields', () => {
    const request = putCustomerVerificationRequestFromParams(
      { id: 'abc', mobile_number_verification: '123' },
      memoToken
    );

    expect(request).toEqual({
      id: 'abc',
      verificationFields: { mobile_number_verification: '123' },
      account: ACCOUNT,
      memo: 9876n,
    });
  });

  test('id is required and must be a string', () => {
    expect(() => putCustomerVerificationRequestFromParams({ email_address_verification: '1' }, plainToken)).toThrow(
      'missing id'
    );
    expect(() => putCustomerVerificationRequestFromParams({ id: 7 }, plainToken)).toThrow('id must be a string');
  });

  test('rejects keys that are not verification fields', () => {
    expect(() =>
      putCustomerVerificationRequestFromParams({ id: 'abc', mobile_number: '123' }, plainToken)
    ).toThrow('invalid key mobile_number');
  });

  test('rejects non-string verification values', () => {
    expect(() =>
      putCustomerVerificationRequestFromParams({ id: 'abc', mobile_number_verification: 123 }, plainToken)
    ).toThrow('invalid value for mobile_number_verification. Must be string');
  });
});
