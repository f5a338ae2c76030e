/**
 * body.ts
 *
 * Content negotiation for request bodies: url-encoded, multipart or JSON
 * bodies become a uniform parsed body.
 */

import { CONTENT_TYPE } from './constants';
import { InvalidRequestData, isAnchorError } from './errors';
import { nullLogger } from './logger';
import type { Logger } from './logger';
import { parseBoundary, parseMultipartFormData } from './multipart';
import type { ParsedBody, UploadLimits } from './types';
import { emptyRecord, errorMessage } from './util';

function emptyParams(): ParsedBody {
  return { kind: 'params', params: emptyRecord<unknown>() };
}

function mediaTypeOf(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase();
}

function parseUrlEncoded(content: string): ParsedBody {
  const params = emptyRecord<unknown>();
  for (const [key, value] of new URLSearchParams(content)) {
    params[key] = value;
  }
  return { kind: 'params', params };
}

/**
 * Invalid JSON and a JSON `null` both yield empty params; a scalar top-level
 * value is rejected.
 */
function parseJson(content: string, logger: Logger): ParsedBody {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (e) {
    logger.debug('Ignoring unparsable JSON body', { error: errorMessage(e) });
    return emptyParams();
  }
  if (data === null) {
    return emptyParams();
  }
  if (typeof data !== 'object') {
    throw new InvalidRequestData('Invalid body.', { messageKey: 'shared.error.invalid_body' });
  }
  const params = emptyRecord<unknown>();
  for (const [key, value] of Object.entries(data)) {
    params[key] = value;
  }
  return { kind: 'params', params };
}

/**
 * Parses a request body according to its Content-Type.
 *
 * @throws {InvalidRequestData} Unsupported content type or malformed multipart body
 */
export async function getParsedBodyData(
  contentType: string | undefined,
  rawBody: Buffer | string | undefined,
  limits: UploadLimits,
  logger: Logger = nullLogger
): Promise<ParsedBody> {
  if (rawBody === undefined || rawBody.length === 0) {
    return emptyParams();
  }

  const declared = contentType ?? '';
  const mediaType = mediaTypeOf(declared);
  const content = () => (typeof rawBody === 'string' ? rawBody : rawBody.toString('utf8'));

  switch (mediaType) {
    case CONTENT_TYPE.URL_ENCODED:
      return parseUrlEncoded(content());
    case CONTENT_TYPE.MULTIPART:
      try {
        return await parseMultipartFormData(parseBoundary(declared), rawBody, limits, logger);
      } catch (e) {
        if (isAnchorError(e) && e.kind === 'invalid-request-data') {
          throw new InvalidRequestData(`Could not parse multipart/form-data : ${e.message}`, {
            messageKey: 'sep12.error.multipart_parse',
            cause: e,
          });
        }
        throw e;
      }
    case CONTENT_TYPE.JSON:
      return parseJson(content(), logger);
    default:
      throw new InvalidRequestData(`Invalid request type ${declared}`, {
        messageKey: 'shared.error.invalid_request_type',
        messageParams: { type: declared },
      });
  }
}
