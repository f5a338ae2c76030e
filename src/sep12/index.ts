/**
 * SEP-12 customer endpoints
 */

export { Sep12Service } from './service';
export type { Sep12ServiceOptions } from './service';
export type { CustomerIntegration } from './integration';
export { loadSep12Config, getUploadLimits } from './config';
export type { Sep12Config } from './config';
export { getParsedBodyData } from './body';
export { parseBoundary, parseMultipartFormData } from './multipart';
export type { MultipartFormData } from './multipart';
export { sniffImageType } from './image';
export {
  validateBase,
  parseMemoFields,
  parseIntegerMemo,
  tokenAccountMemo,
  getCustomerRequestFromParams,
  putCustomerRequestFromParams,
  putCustomerCallbackRequestFromParams,
  putCustomerVerificationRequestFromParams,
} from './validation';
export { authorizeCustomerRequest, authorizeDeleteRequest, parseDeleteAccount, tokenEffectiveMemo } from './authorization';
export { authTokenFromSubject } from './token';
export {
  CUSTOMER_STATUS,
  PROVIDED_FIELD_STATUS,
  CUSTOMER_FIELD_TYPE,
  customerFieldToJson,
  providedCustomerFieldToJson,
  getCustomerResponseToJson,
  putCustomerResponseToJson,
} from './responses';
export {
  AnchorError,
  InvalidRequestData,
  InvalidSepRequest,
  SepNotAuthorized,
  AnchorFailure,
  CustomerNotFoundForId,
  isAnchorError,
  errorStatus,
  localizedErrorMessage,
} from './errors';
export type { AnchorErrorKind, AnchorErrorOptions, MessageParams, Translator } from './errors';
export { createConsoleLogger, nullLogger } from './logger';
export type { Logger, LogContext } from './logger';
export { UploadedFile } from './uploaded-file';
export type { UploadErrorCode } from './uploaded-file';
export { HTTP_STATUS, KNOWN_FILE_FIELDS } from './constants';
export type * from './types';
