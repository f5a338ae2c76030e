/**
 * authorization.ts
 *
 * Reconciles the account and memo a request claims with the identity of the
 * SEP-10 token (plain account, muxed account, or account plus memo).
 */

import { StrKey } from '@stellar/stellar-sdk';
import { InvalidSepRequest, SepNotAuthorized } from './errors';
import type { AuthToken } from './types';
import { tokenAccountMemo } from './validation';

function matchesTokenAccount(account: string, token: AuthToken): boolean {
  return account === token.accountId || account === token.muxedAccountId;
}

/**
 * The sub-account identity of the token: the muxed id when the subject is a
 * muxed account, else the memo of a `G...:memo` subject.
 */
export function tokenEffectiveMemo(token: AuthToken): bigint | null {
  if (token.muxedId !== undefined && token.muxedId !== null) {
    return token.muxedId;
  }
  return tokenAccountMemo(token);
}

/**
 * Authorizes GET /customer, PUT /customer and PUT /customer/callback.
 *
 * If the token carries no memo or muxed id, any request memo is accepted.
 *
 * @throws {SepNotAuthorized} Account or memo does not match the token
 */
export function authorizeCustomerRequest(request: { account?: string; memo?: bigint | null }, token: AuthToken): void {
  if (request.account !== undefined && !matchesTokenAccount(request.account, token)) {
    throw new SepNotAuthorized('The account specified does not match authorization token', {
      messageKey: 'sep12.error.account_mismatch',
    });
  }
  const tokenMemo = tokenEffectiveMemo(token);
  if (tokenMemo === null) {
    return;
  }
  if (request.memo !== undefined && request.memo !== null && request.memo !== tokenMemo) {
    throw new SepNotAuthorized('The memo specified does not match the memo ID authorized via SEP-10', {
      messageKey: 'sep12.error.memo_mismatch',
    });
  }
}

/**
 * Validates the account id taken from a DELETE /customer/:account target.
 *
 * @throws {InvalidSepRequest} Not a G... or M... address
 */
export function parseDeleteAccount(account: string): string {
  if (account.trim() === '') {
    throw new InvalidSepRequest('missing account in request', { messageKey: 'sep12.error.missing_account' });
  }
  if (!StrKey.isValidEd25519PublicKey(account) && !StrKey.isValidMed25519PublicKey(account)) {
    throw new InvalidSepRequest(`invalid account id ${account}`, {
      messageKey: 'sep12.error.invalid_account',
      messageParams: { account },
    });
  }
  return account;
}

/**
 * Authorizes DELETE /customer/:account.
 *
 * A muxed token addressing its base account must name the muxed id as memo;
 * a memo token must name its memo.
 *
 * @throws {SepNotAuthorized}
 */
export function authorizeDeleteRequest(account: string, memo: bigint | null, token: AuthToken): void {
  const isAccountAuthenticated = matchesTokenAccount(account, token);

  let isMemoMissingAuthentication = false;
  if (token.muxedId !== undefined && token.muxedId !== null) {
    if (token.muxedAccountId !== account) {
      isMemoMissingAuthentication = token.muxedId !== memo;
    }
  } else if (token.accountMemo !== undefined && token.accountMemo !== null) {
    isMemoMissingAuthentication = tokenAccountMemo(token) !== memo;
  }

  if (!isAccountAuthenticated || isMemoMissingAuthentication) {
    throw new SepNotAuthorized('Not authorized to delete account.', { messageKey: 'sep12.error.delete_unauthorized' });
  }
}
