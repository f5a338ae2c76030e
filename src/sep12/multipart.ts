/**
 * multipart.ts
 *
 * multipart/form-data parser for SEP-12 customer bodies.
 * Splits the raw body on the boundary, separates plain fields from uploaded
 * files and sniffs known SEP-9 image fields sent without a filename.
 */

import { CONTENT_TYPE, KNOWN_FILE_FIELDS } from './constants';
import { InvalidRequestData } from './errors';
import { sniffImageType } from './image';
import { nullLogger } from './logger';
import type { Logger } from './logger';
import type { ParsedBody, UploadLimits } from './types';
import { UploadedFile } from './uploaded-file';
import type { UploadErrorCode } from './uploaded-file';
import { emptyRecord, errorMessage, escapeRegExp, trimValue } from './util';

export type MultipartFormData = Extract<ParsedBody, { kind: 'multipart' }>;

/**
 * A part header. `attributes` is set when the value carries `;`-separated
 * parameters, e.g. `form-data; name="photo_id_front"; filename="id.png"`.
 */
interface PartHeader {
  value: string;
  attributes?: Record<string, string>;
}

const LINE_BREAK = /\r\n|\n|\r/;
const LEADING_LINE_BREAK = /^(?:\r\n|\n|\r)/;
const HEADER_BODY_SEPARATOR = /\r\n\r\n|\n\n|\r\r/;

function stripQuotes(value: string): string {
  return value.replace(/^"+|"+$/g, '');
}

/**
 * Extracts the boundary parameter of a multipart Content-Type header.
 */
export function parseBoundary(contentType: string): string {
  const match = /boundary=([^;]*)/i.exec(contentType);
  const boundary = match ? stripQuotes(match[1].trim()) : '';
  if (boundary === '') {
    throw new InvalidRequestData('could not parse boundary from header', {
      messageKey: 'sep12.error.multipart_boundary',
    });
  }
  return boundary;
}

function parseHeaders(block: string): Record<string, PartHeader> {
  const headers = emptyRecord<PartHeader>();
  for (const line of block.split(LINE_BREAK)) {
    const colon = line.indexOf(':');
    if (colon < 0) continue;
    const name = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();
    if (!value.includes(';')) {
      headers[name] = { value };
      continue;
    }
    const attributes = emptyRecord<string>();
    for (const rawPart of value.split(';')) {
      const eq = rawPart.indexOf('=');
      if (eq < 0) continue;
      const attrName = rawPart.slice(0, eq).trim().toLowerCase();
      attributes[attrName] = stripQuotes(rawPart.slice(eq + 1).trim());
    }
    headers[name] = { value, attributes };
  }
  return headers;
}

/**
 * `organization[photo_proof_address]` → `['organization', 'photo_proof_address']`
 */
export function parseNameParts(name: string): string[] {
  return name
    .split(/\]\[|\[/)
    .map((part) => part.replace(/\]+$/, ''))
    .filter((part) => part !== '');
}

function splitPart(segment: string): { headers: string; value: string } | null {
  const part = segment.replace(LEADING_LINE_BREAK, '');
  const separator = HEADER_BODY_SEPARATOR.exec(part);
  if (!separator) {
    return null;
  }
  return {
    headers: part.slice(0, separator.index),
    value: part.slice(separator.index + separator[0].length),
  };
}

function copyContent(binary: string): { content: Buffer; error: UploadErrorCode; reason?: string } {
  try {
    return { content: Buffer.from(binary, 'latin1'), error: 'OK' };
  } catch (e) {
    return { content: Buffer.alloc(0), error: 'WRITE_FAILED', reason: errorMessage(e) };
  }
}

/**
 * Parses a multipart/form-data body.
 *
 * Fields are stored under every segment of their decoded name, files likewise.
 * Files beyond `maxFileCount` are dropped; files larger than `maxFileSize` are
 * kept with error `TOO_LARGE` and no content.
 *
 * @throws {InvalidRequestData} Empty body or no part delimited by the boundary
 */
export async function parseMultipartFormData(
  boundary: string,
  rawBody: Buffer | string,
  limits: UploadLimits,
  logger: Logger = nullLogger
): Promise<MultipartFormData> {
  const body = typeof rawBody === 'string' ? Buffer.from(rawBody, 'utf8') : rawBody;
  if (body.length === 0) {
    throw new InvalidRequestData('body is empty', { messageKey: 'sep12.error.multipart_empty' });
  }

  // latin1 maps every byte to one char, so file content survives the string round trip
  const binary = body.toString('latin1');
  const segments = binary.split(new RegExp(`(?:\\r\\n|\\n|\\r)?-+${escapeRegExp(boundary)}`));
  if (segments.length < 2) {
    throw new InvalidRequestData('body parts not found', { messageKey: 'sep12.error.multipart_no_parts' });
  }

  const bodyParams = emptyRecord<string>();
  const uploadedFiles = emptyRecord<UploadedFile>();
  let filesCount = 0;

  for (const segment of segments) {
    if (segment.length === 0 || segment.startsWith('--')) continue;
    const part = splitPart(segment);
    if (!part) continue;

    const headers = parseHeaders(Buffer.from(part.headers, 'latin1').toString('utf8'));
    const name = headers['content-disposition']?.attributes?.name;
    if (name === undefined) {
      logger.debug('Skipping multipart part without name', { headers: part.headers });
      continue;
    }
    const nameParts = parseNameParts(name);

    let clientFilename = headers['content-disposition']?.attributes?.filename;
    let imageMediaType: string | undefined;
    if (clientFilename === undefined) {
      const knownField = nameParts.find((p) => KNOWN_FILE_FIELDS.includes(p));
      if (knownField !== undefined) {
        const imageType = await sniffImageType(Buffer.from(part.value, 'latin1'));
        if (imageType !== null) {
          clientFilename = `${knownField}.${imageType}`;
          imageMediaType = `image/${imageType}`;
        }
      }
    }

    if (clientFilename === undefined) {
      const value = trimValue(Buffer.from(part.value, 'latin1').toString('utf8'));
      for (const key of nameParts) {
        bodyParams[key] = value;
      }
      continue;
    }

    if (filesCount >= limits.maxFileCount) {
      logger.debug('Dropping uploaded file above max count', { name, maxFileCount: limits.maxFileCount });
      continue;
    }

    const partContentType = headers['content-type'];
    const mediaType =
      partContentType !== undefined && partContentType.attributes === undefined
        ? partContentType.value
        : (imageMediaType ?? CONTENT_TYPE.OCTET_STREAM);

    const size = part.value.length;
    let stored: { content: Buffer; error: UploadErrorCode; reason?: string };
    if (size > limits.maxFileSize) {
      stored = { content: Buffer.alloc(0), error: 'TOO_LARGE' };
      logger.debug('Uploaded file exceeds max size', { name, size, maxFileSize: limits.maxFileSize });
    } else {
      stored = copyContent(part.value);
      if (stored.reason !== undefined) {
        logger.warn('Could not store uploaded file', { name, reason: stored.reason });
      }
    }

    const file = new UploadedFile(name, clientFilename, mediaType, size, stored.error, stored.content);
    for (const key of nameParts) {
      uploadedFiles[key] = file;
    }
    filesCount++;
  }

  return { kind: 'multipart', bodyParams, uploadedFiles };
}
