/**
 * types.ts
 *
 * Type definitions for the SEP-12 customer endpoints.
 */

import type { UploadedFile } from './uploaded-file';

/**
 * Identity claims of an already verified SEP-10 token.
 *
 * At most one of `muxedAccountId`/`muxedId` or `accountMemo` identifies a
 * sub-account; the muxed identity wins when both are set.
 */
export interface AuthToken {
  accountId: string;
  muxedAccountId?: string | null;
  muxedId?: bigint | null;
  /** Decimal memo from a `G...:memo` subject */
  accountMemo?: string | null;
}

/**
 * Body of a request after content negotiation.
 */
export type ParsedBody =
  | { kind: 'params'; params: Record<string, unknown> }
  | { kind: 'multipart'; bodyParams: Record<string, string>; uploadedFiles: Record<string, UploadedFile> };

export interface UploadLimits {
  /** Bytes */
  maxFileSize: number;
  maxFileCount: number;
}

/**
 * Fields shared by every customer request after validation.
 */
export interface CustomerRequestBase {
  id?: string;
  account?: string;
  memo?: bigint;
  type?: string;
}

export interface GetCustomerRequest {
  account: string;
  memo: bigint | null;
  id?: string;
  type?: string;
  /** ISO 639-1 code for human readable texts in the response */
  lang?: string;
}

export interface PutCustomerRequest {
  account: string;
  memo: bigint | null;
  id?: string;
  type?: string;
  /** SEP-9 fields submitted by the client */
  kycFields: Record<string, unknown>;
  /** Present only for multipart bodies */
  kycUploadedFiles?: Record<string, UploadedFile>;
}

export interface PutCustomerCallbackRequest {
  account: string;
  memo: bigint | null;
  id?: string;
  /** Absent means the currently registered url should be removed */
  url?: string;
}

export interface PutCustomerVerificationRequest {
  id: string;
  /** e.g. `{ mobile_number_verification: '2735021' }` */
  verificationFields: Record<string, string>;
  account: string;
  memo: bigint | null;
}

export type CustomerStatus = 'ACCEPTED' | 'PROCESSING' | 'NEEDS_INFO' | 'REJECTED';

export type ProvidedCustomerFieldStatus = 'ACCEPTED' | 'PROCESSING' | 'REJECTED' | 'VERIFICATION_REQUIRED';

export type CustomerFieldType = 'string' | 'binary' | 'number' | 'date';

/**
 * A field the anchor has not yet received for the customer.
 */
export interface CustomerField {
  fieldName: string;
  type: CustomerFieldType;
  description: string;
  choices?: string[];
  optional?: boolean;
}

/**
 * A field the anchor has received for the customer.
 */
export interface ProvidedCustomerField extends CustomerField {
  status?: ProvidedCustomerFieldStatus;
  /** Why the field was rejected */
  error?: string;
}

export interface GetCustomerResponse {
  id?: string;
  status: CustomerStatus;
  message?: string;
  fields?: CustomerField[];
  providedFields?: ProvidedCustomerField[];
}

export interface PutCustomerResponse {
  id: string;
}

/**
 * Incoming HTTP request as seen by the service.
 */
export interface Sep12HttpRequest {
  method: string;
  /** Request target, e.g. `/customer/verification` */
  target: string;
  contentType?: string;
  body?: Buffer | string;
  /** Parsed query parameters (GET) */
  query?: Record<string, unknown>;
}

export interface Sep12HttpResponse {
  status: number;
  body?: Record<string, unknown>;
}
