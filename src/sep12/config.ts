/**
 * config.ts
 *
 * Environment-driven configuration for the SEP-12 service.
 */

import { StrKey } from '@stellar/stellar-sdk';
import { CALLBACK, UPLOADS } from './constants';
import { AnchorFailure } from './errors';
import type { UploadLimits } from './types';

export interface Sep12Config {
  uploadFileMaxSizeMb: number;
  uploadFileMaxCount: number;
  callbackTimeoutMs: number;
  /** Secret seed used to sign customer callbacks */
  signingSecret?: string;
}

function parseOptionalString(name: string): string | undefined {
  const v = process.env[name];
  if (!v) return undefined;
  const t = v.trim();
  return t.length ? t : undefined;
}

function parseUploadFileMaxSizeMb(): number {
  const raw = process.env.SEP12_UPLOAD_FILE_MAX_SIZE_MB;
  if (!raw) return UPLOADS.DEFAULT_MAX_FILE_SIZE_MB;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 1 ? Math.floor(n) : UPLOADS.DEFAULT_MAX_FILE_SIZE_MB;
}

function parseUploadFileMaxCount(): number {
  const raw = process.env.SEP12_UPLOAD_FILE_MAX_COUNT;
  if (!raw) return UPLOADS.DEFAULT_MAX_FILE_COUNT;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : UPLOADS.DEFAULT_MAX_FILE_COUNT;
}

function parseCallbackTimeout(): number {
  const raw = process.env.CALLBACK_TIMEOUT_MS;
  if (!raw) return CALLBACK.DEFAULT_TIMEOUT_MS;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < CALLBACK.MIN_TIMEOUT_MS || n > CALLBACK.MAX_TIMEOUT_MS) {
    return CALLBACK.DEFAULT_TIMEOUT_MS;
  }
  return Math.floor(n);
}

function parseSigningSecret(): string | undefined {
  const secret = parseOptionalString('SERVER_SIGNING_SECRET');
  if (secret !== undefined && !StrKey.isValidEd25519SecretSeed(secret)) {
    throw new AnchorFailure('SERVER_SIGNING_SECRET must be a Stellar secret seed', {
      messageKey: 'config.invalid_signing_secret',
      messageParams: { name: 'SERVER_SIGNING_SECRET' },
    });
  }
  return secret;
}

/**
 * Load configuration from environment variables
 */
export function loadSep12Config(): Sep12Config {
  return {
    uploadFileMaxSizeMb: parseUploadFileMaxSizeMb(),
    uploadFileMaxCount: parseUploadFileMaxCount(),
    callbackTimeoutMs: parseCallbackTimeout(),
    signingSecret: parseSigningSecret(),
  };
}

/**
 * Upload limits in bytes for the body parser.
 */
export function getUploadLimits(config: Pick<Sep12Config, 'uploadFileMaxSizeMb' | 'uploadFileMaxCount'>): UploadLimits {
  return {
    maxFileSize: config.uploadFileMaxSizeMb * UPLOADS.BYTES_PER_MB,
    maxFileCount: config.uploadFileMaxCount,
  };
}
