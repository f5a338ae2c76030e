/**
 * constants.ts
 *
 * Centralized constants for the SEP-12 customer endpoints.
 */

// HTTP Status Codes
export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  INTERNAL_SERVER_ERROR: 500,
} as const;

// Upload limits
export const UPLOADS = {
  DEFAULT_MAX_FILE_SIZE_MB: 2,
  DEFAULT_MAX_FILE_COUNT: 6,
  BYTES_PER_MB: 1_048_576,
} as const;

// Outbound customer callbacks
export const CALLBACK = {
  DEFAULT_TIMEOUT_MS: 10_000,
  MIN_TIMEOUT_MS: 1_000,
  MAX_TIMEOUT_MS: 60_000,
} as const;

export const CONTENT_TYPE = {
  URL_ENCODED: 'application/x-www-form-urlencoded',
  MULTIPART: 'multipart/form-data',
  JSON: 'application/json',
  OCTET_STREAM: 'application/octet-stream',
} as const;

/**
 * SEP-9 field names whose value is an image. Clients sometimes send these
 * without a `filename` attribute, so the parser sniffs their content.
 */
export const KNOWN_FILE_FIELDS: readonly string[] = [
  'photo_id_front',
  'photo_id_back',
  'notary_approval_of_photo_id',
  'photo_proof_residence',
  'proof_of_income',
  'proof_of_liveness',
  'organization.photo_incorporation_doc',
  'organization.photo_proof_address',
];

// Keys of a PUT /customer body that are not forwarded as KYC fields
export const RESERVED_CUSTOMER_KEYS: readonly string[] = ['id', 'account', 'memo', 'memoType', 'type'];

export const VERIFICATION_SUFFIX = '_verification';

export const DEFAULT_LANG = 'en';
