/**
 * validation.ts
 *
 * Request field validation for the SEP-12 customer endpoints.
 * Turns normalized body or query parameters into typed customer requests.
 */

import { RESERVED_CUSTOMER_KEYS, VERIFICATION_SUFFIX } from './constants';
import { InvalidSepRequest } from './errors';
import type {
  AuthToken,
  CustomerRequestBase,
  GetCustomerRequest,
  PutCustomerCallbackRequest,
  PutCustomerRequest,
  PutCustomerVerificationRequest,
} from './types';
import type { UploadedFile } from './uploaded-file';
import { emptyRecord } from './util';

type Params = Record<string, unknown>;

const INTEGER = /^\s*[+-]?\d+\s*$/;

function isPresent(params: Params, key: string): boolean {
  return params[key] !== undefined && params[key] !== null;
}

function optionalString(params: Params, key: string): string | undefined {
  if (!isPresent(params, key)) {
    return undefined;
  }
  const value = params[key];
  if (typeof value !== 'string') {
    throw new InvalidSepRequest(`${key} must be a string`, {
      messageKey: 'sep12.error.field_not_string',
      messageParams: { field: key },
    });
  }
  return value;
}

/**
 * Parses a base-10 integer memo. Returns null for anything else, including
 * fractional or exponent notation.
 */
export function parseIntegerMemo(value: string): bigint | null {
  return INTEGER.test(value) ? BigInt(value.trim()) : null;
}

/**
 * Validates `memo_type` and `memo`. Only memos of type id are supported.
 */
export function parseMemoFields(params: Params): bigint | undefined {
  const memoType = optionalString(params, 'memo_type');
  if (memoType !== undefined && memoType !== 'id') {
    throw new InvalidSepRequest('only memo type id supported.', {
      messageKey: 'sep12.error.unsupported_memo_type',
      messageParams: { memo_type: memoType },
    });
  }
  const memoStr = optionalString(params, 'memo');
  if (memoStr === undefined) {
    return undefined;
  }
  const memo = parseIntegerMemo(memoStr);
  if (memo === null) {
    throw new InvalidSepRequest(`invalid memo value: ${memoStr}`, {
      messageKey: 'sep12.error.invalid_memo',
      messageParams: { memo: memoStr },
    });
  }
  return memo;
}

/**
 * Extracts the fields every customer endpoint shares.
 *
 * @throws {InvalidSepRequest} Non-string values, unsupported memo type or non-integer memo
 */
export function validateBase(params: Params): CustomerRequestBase {
  const id = optionalString(params, 'id');
  const account = optionalString(params, 'account');
  const memo = parseMemoFields(params);
  const type = optionalString(params, 'type');
  return { id, account, memo, type };
}

/**
 * The token memo as integer, or null if the token carries none.
 */
export function tokenAccountMemo(token: AuthToken): bigint | null {
  if (token.accountMemo === undefined || token.accountMemo === null) {
    return null;
  }
  const memo = parseIntegerMemo(token.accountMemo);
  if (memo === null) {
    throw new InvalidSepRequest(`invalid jwt token memo value: ${token.accountMemo}`, {
      messageKey: 'shared.error.invalid_jwt_memo',
      messageParams: { memo: token.accountMemo },
    });
  }
  return memo;
}

function tokenAccount(token: AuthToken): string {
  const account = token.muxedAccountId || token.accountId;
  if (!account) {
    throw new InvalidSepRequest('invalid jwt token', { messageKey: 'shared.error.invalid_jwt' });
  }
  return account;
}

export function getCustomerRequestFromParams(params: Params, token: AuthToken): GetCustomerRequest {
  const base = validateBase(params);
  const lang = optionalString(params, 'lang');
  return {
    account: base.account ?? tokenAccount(token),
    memo: base.memo ?? null,
    id: base.id,
    type: base.type,
    lang,
  };
}

/**
 * Every key other than the reserved ones ends up unmodified in `kycFields`.
 */
export function putCustomerRequestFromParams(
  params: Params,
  token: AuthToken,
  uploadedFiles?: Record<string, UploadedFile>
): PutCustomerRequest {
  const base = validateBase(params);
  const kycFields = emptyRecord<unknown>();
  for (const [key, value] of Object.entries(params)) {
    if (!RESERVED_CUSTOMER_KEYS.includes(key)) {
      kycFields[key] = value;
    }
  }
  return {
    account: base.account ?? tokenAccount(token),
    memo: base.memo ?? null,
    id: base.id,
    type: base.type,
    kycFields,
    kycUploadedFiles: uploadedFiles,
  };
}

/**
 * Absolute url with a host. Host-less schemes such as `javascript:`,
 * `mailto:` or `file:///` are rejected.
 */
function isAbsoluteUrl(value: string): boolean {
  if (!URL.canParse(value)) {
    return false;
  }
  return new URL(value).hostname !== '';
}

export function putCustomerCallbackRequestFromParams(params: Params, token: AuthToken): PutCustomerCallbackRequest {
  const base = validateBase(params);
  const url = optionalString(params, 'url');
  if (url !== undefined && !isAbsoluteUrl(url)) {
    throw new InvalidSepRequest('invalid url', {
      messageKey: 'sep12.error.invalid_url',
      messageParams: { url },
    });
  }
  return {
    account: base.account ?? tokenAccount(token),
    memo: base.memo ?? null,
    id: base.id,
    url,
  };
}

/**
 * `id` is required and every other key must be a `*_verification` field with
 * a string value. Account and memo always come from the token.
 */
export function putCustomerVerificationRequestFromParams(
  params: Params,
  token: AuthToken
): PutCustomerVerificationRequest {
  if (!('id' in params)) {
    throw new InvalidSepRequest('missing id', { messageKey: 'sep12.error.missing_id' });
  }
  const id = params.id;
  if (typeof id !== 'string') {
    throw new InvalidSepRequest('id must be a string', {
      messageKey: 'sep12.error.field_not_string',
      messageParams: { field: 'id' },
    });
  }

  const verificationFields = emptyRecord<string>();
  for (const [key, value] of Object.entries(params)) {
    if (key === 'id') continue;
    if (!key.endsWith(VERIFICATION_SUFFIX)) {
      throw new InvalidSepRequest(`invalid key ${key}`, {
        messageKey: 'sep12.error.invalid_verification_key',
        messageParams: { key },
      });
    }
    if (typeof value !== 'string') {
      throw new InvalidSepRequest(`invalid value for ${key}. Must be string`, {
        messageKey: 'sep12.error.invalid_verification_value',
        messageParams: { key },
      });
    }
    verificationFields[key] = value;
  }

  return {
    id,
    verificationFields,
    account: tokenAccount(token),
    memo: tokenAccountMemo(token),
  };
}
