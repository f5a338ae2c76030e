import { HTTP_STATUS } from './constants';

export type MessageParams = Record<string, string>;

export type AnchorErrorKind =
  | 'invalid-request-data'
  | 'invalid-sep-request'
  | 'not-authorized'
  | 'customer-not-found'
  | 'anchor-failure';

export interface AnchorErrorOptions {
  messageKey?: string;
  messageParams?: MessageParams;
  cause?: unknown;
}

/**
 * Base class for all errors raised while handling a SEP-12 request.
 *
 * `messageKey` and `messageParams` identify the message independently of the
 * English text so that it can be localized at the dispatch boundary.
 */
export abstract class AnchorError extends Error {
  abstract readonly kind: AnchorErrorKind;
  readonly messageKey?: string;
  readonly messageParams: MessageParams;

  protected constructor(message: string, options: AnchorErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.messageKey = options.messageKey;
    this.messageParams = options.messageParams ?? {};
  }
}

/**
 * Malformed transport-level body
 *
 * Thrown when the body cannot be read as any supported content type:
 * - Unsupported Content-Type
 * - Multipart body without boundary or parts
 * - JSON body whose top-level value is a scalar
 */
export class InvalidRequestData extends AnchorError {
  readonly kind = 'invalid-request-data';

  constructor(message: string, options?: AnchorErrorOptions) {
    super(message, options);
    this.name = 'InvalidRequestData';
  }
}

/**
 * Semantically invalid request fields (wrong type, bad memo, malformed url, missing id).
 */
export class InvalidSepRequest extends AnchorError {
  readonly kind = 'invalid-sep-request';

  constructor(message: string, options?: AnchorErrorOptions) {
    super(message, options);
    this.name = 'InvalidSepRequest';
  }
}

/**
 * The identity claimed by the request does not match the SEP-10 token.
 */
export class SepNotAuthorized extends AnchorError {
  readonly kind = 'not-authorized';

  constructor(message: string, options?: AnchorErrorOptions) {
    super(message, { messageKey: 'shared.error.unauthorized', ...options });
    this.name = 'SepNotAuthorized';
  }
}

/**
 * Generic failure reported by the anchor's business logic.
 */
export class AnchorFailure extends AnchorError {
  readonly kind: AnchorErrorKind = 'anchor-failure';

  constructor(message: string, options?: AnchorErrorOptions) {
    super(message, options);
    this.name = 'AnchorFailure';
  }
}

/**
 * Must be thrown by integrations when a customer id does not exist or belongs
 * to someone else.
 */
export class CustomerNotFoundForId extends AnchorFailure {
  readonly kind = 'customer-not-found';

  constructor(
    public readonly id: string,
    options?: AnchorErrorOptions
  ) {
    super(`customer not found for id: ${id}`, {
      messageKey: 'sep12.error.customer_not_found',
      messageParams: { id },
      ...options,
    });
    this.name = 'CustomerNotFoundForId';
  }
}

export function isAnchorError(error: unknown): error is AnchorError {
  return error instanceof AnchorError;
}

/**
 * HTTP status for a typed failure.
 */
export function errorStatus(error: AnchorError): number {
  switch (error.kind) {
    case 'invalid-request-data':
    case 'invalid-sep-request':
    case 'anchor-failure':
      return HTTP_STATUS.BAD_REQUEST;
    case 'not-authorized':
      return HTTP_STATUS.UNAUTHORIZED;
    case 'customer-not-found':
      return HTTP_STATUS.NOT_FOUND;
  }
}

/**
 * Resolves a localized message for an error. Receives the English message as fallback.
 */
export type Translator = (key: string, lang: string, fallback: string, params: MessageParams) => string;

export function localizedErrorMessage(error: AnchorError, lang: string, translate?: Translator): string {
  if (!translate || error.messageKey === undefined) {
    return error.message;
  }
  const params = { ...error.messageParams };
  const cause = error.cause;
  if (cause instanceof AnchorError && cause.messageKey !== undefined) {
    params.previous_exception = translate(cause.messageKey, lang, cause.message, cause.messageParams);
  }
  return translate(error.messageKey, lang, error.message, params);
}
