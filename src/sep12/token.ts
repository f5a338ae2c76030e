/**
 * token.ts
 *
 * Builds the identity claims of a verified SEP-10 JWT from its `sub` value.
 */

import { MuxedAccount, StrKey } from '@stellar/stellar-sdk';
import { InvalidSepRequest } from './errors';
import type { AuthToken } from './types';

/**
 * `sub` is either `G...`, `G...:memo` or a muxed `M...` address.
 *
 * @throws {InvalidSepRequest} Subject is none of these
 */
export function authTokenFromSubject(sub: string): AuthToken {
  const parts = sub.split(':');
  if (parts.length === 2) {
    return { accountId: parts[0], accountMemo: parts[1], muxedAccountId: null, muxedId: null };
  }
  if (StrKey.isValidMed25519PublicKey(sub)) {
    const muxed = MuxedAccount.fromAddress(sub, '0');
    return {
      accountId: muxed.baseAccount().accountId(),
      muxedAccountId: sub,
      muxedId: BigInt(muxed.id()),
      accountMemo: null,
    };
  }
  if (StrKey.isValidEd25519PublicKey(sub)) {
    return { accountId: sub, accountMemo: null, muxedAccountId: null, muxedId: null };
  }
  throw new InvalidSepRequest('invalid jwt token', {
    messageKey: 'shared.error.invalid_jwt',
  });
}
