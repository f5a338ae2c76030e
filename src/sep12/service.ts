/**
 * service.ts
 *
 * Dispatcher for the SEP-12 customer endpoints.
 * Runs each request through body negotiation, field validation and identity
 * authorization before handing it to the anchor's integration, and maps
 * failures to HTTP responses.
 */

import { authorizeCustomerRequest, authorizeDeleteRequest, parseDeleteAccount } from './authorization';
import { getParsedBodyData } from './body';
import { getUploadLimits, loadSep12Config } from './config';
import type { Sep12Config } from './config';
import { DEFAULT_LANG, HTTP_STATUS } from './constants';
import { CustomerNotFoundForId, errorStatus, isAnchorError, localizedErrorMessage } from './errors';
import type { Translator } from './errors';
import type { CustomerIntegration } from './integration';
import { createConsoleLogger } from './logger';
import type { Logger } from './logger';
import { getCustomerResponseToJson, putCustomerResponseToJson } from './responses';
import type { AuthToken, ParsedBody, Sep12HttpRequest, Sep12HttpResponse, UploadLimits } from './types';
import { emptyRecord, errorMessage } from './util';
import {
  getCustomerRequestFromParams,
  parseMemoFields,
  putCustomerCallbackRequestFromParams,
  putCustomerRequestFromParams,
  putCustomerVerificationRequestFromParams,
  tokenAccountMemo,
} from './validation';

export interface Sep12ServiceOptions {
  /** Defaults to `loadSep12Config()` */
  config?: Sep12Config;
  logger?: Logger;
  /** Localizes error messages; without it the English message is returned */
  translate?: Translator;
}

type Operation = 'get customer' | 'put customer' | 'put customer verification' | 'put customer callback' | 'delete customer';

function unknownEndpoint(): Sep12HttpResponse {
  return { status: HTTP_STATUS.NOT_FOUND, body: { error: 'Invalid request. Unknown endpoint.' } };
}

function pathOf(target: string): string {
  const q = target.indexOf('?');
  return q === -1 ? target : target.slice(0, q);
}

function queryOf(request: Sep12HttpRequest): Record<string, unknown> {
  if (request.query) {
    return request.query;
  }
  const params = emptyRecord<unknown>();
  const q = request.target.indexOf('?');
  if (q !== -1) {
    for (const [key, value] of new URLSearchParams(request.target.slice(q + 1))) {
      params[key] = value;
    }
  }
  return params;
}

function bodyParams(parsed: ParsedBody): Record<string, unknown> {
  return parsed.kind === 'multipart' ? parsed.bodyParams : parsed.params;
}

export class Sep12Service {
  private readonly limits: UploadLimits;
  private readonly logger: Logger;
  private readonly translate?: Translator;

  constructor(
    private readonly integration: CustomerIntegration,
    options: Sep12ServiceOptions = {}
  ) {
    const config = options.config ?? loadSep12Config();
    this.limits = getUploadLimits(config);
    this.logger = options.logger ?? createConsoleLogger('sep12');
    this.translate = options.translate;
    this.logger.debug('Configuration loaded', {
      file_max_size_in_mb: config.uploadFileMaxSizeMb,
      file_max_count: config.uploadFileMaxCount,
    });
  }

  /**
   * Handles one SEP-12 request on behalf of an already verified SEP-10 token.
   * Never throws: every failure becomes an `{ error }` response.
   */
  async handleRequest(request: Sep12HttpRequest, token: AuthToken): Promise<Sep12HttpResponse> {
    const method = request.method.toUpperCase();
    const path = pathOf(request.target);
    this.logger.info('Handling incoming request', { method, target: path });

    if (method === 'GET') {
      return this.handleGetCustomer(request, token);
    }
    if (method === 'PUT') {
      if (path.includes('/customer/verification')) {
        return this.handlePutCustomerVerification(request, token);
      }
      if (path.includes('/customer/callback')) {
        return this.handlePutCustomerCallback(request, token);
      }
      if (path.includes('/customer')) {
        return this.handlePutCustomer(request, token);
      }
    } else if (method === 'DELETE') {
      return this.handleDeleteCustomer(request, token, path);
    }

    this.logger.warn('Invalid request, unknown endpoint', { method, target: path });
    return unknownEndpoint();
  }

  private async handleGetCustomer(request: Sep12HttpRequest, token: AuthToken): Promise<Sep12HttpResponse> {
    let lang = DEFAULT_LANG;
    try {
      const customerRequest = getCustomerRequestFromParams(queryOf(request), token);
      lang = customerRequest.lang ?? DEFAULT_LANG;
      authorizeCustomerRequest(customerRequest, token);
      // The token memo is authoritative once the request memo matched it
      customerRequest.memo = tokenAccountMemo(token);
      const response = await this.integration.getCustomer(customerRequest);
      this.logger.info('Request executed successfully', { operation: 'get customer' });
      return { status: HTTP_STATUS.OK, body: getCustomerResponseToJson(response) };
    } catch (e) {
      return this.failure('get customer', e, lang);
    }
  }

  private async handlePutCustomer(request: Sep12HttpRequest, token: AuthToken): Promise<Sep12HttpResponse> {
    try {
      const parsed = await this.parseBody(request);
      const putRequest = putCustomerRequestFromParams(
        bodyParams(parsed),
        token,
        parsed.kind === 'multipart' ? parsed.uploadedFiles : undefined
      );
      authorizeCustomerRequest(putRequest, token);
      putRequest.memo = tokenAccountMemo(token);
      const response = await this.integration.putCustomer(putRequest);
      this.logger.info('Request executed successfully', { operation: 'put customer', id: response.id });
      return { status: HTTP_STATUS.OK, body: putCustomerResponseToJson(response) };
    } catch (e) {
      return this.failure('put customer', e);
    }
  }

  private async handlePutCustomerVerification(request: Sep12HttpRequest, token: AuthToken): Promise<Sep12HttpResponse> {
    try {
      const parsed = await this.parseBody(request);
      const verificationRequest = putCustomerVerificationRequestFromParams(bodyParams(parsed), token);
      const response = await this.integration.putCustomerVerification(verificationRequest);
      this.logger.info('Request executed successfully', { operation: 'put customer verification' });
      return { status: HTTP_STATUS.OK, body: getCustomerResponseToJson(response) };
    } catch (e) {
      return this.failure('put customer verification', e);
    }
  }

  private async handlePutCustomerCallback(request: Sep12HttpRequest, token: AuthToken): Promise<Sep12HttpResponse> {
    try {
      const parsed = await this.parseBody(request);
      const callbackRequest = putCustomerCallbackRequestFromParams(bodyParams(parsed), token);
      authorizeCustomerRequest(callbackRequest, token);
      callbackRequest.memo = tokenAccountMemo(token);
      await this.integration.putCustomerCallback(callbackRequest);
      this.logger.info('Request executed successfully', { operation: 'put customer callback' });
      return { status: HTTP_STATUS.OK };
    } catch (e) {
      return this.failure('put customer callback', e);
    }
  }

  private async handleDeleteCustomer(
    request: Sep12HttpRequest,
    token: AuthToken,
    path: string
  ): Promise<Sep12HttpResponse> {
    try {
      const parsed = await this.parseBody(request);
      const memo = parseMemoFields(bodyParams(parsed)) ?? null;
      const segments = path.split('/');
      const account = parseDeleteAccount(segments[segments.length - 1]);
      authorizeDeleteRequest(account, memo, token);

      // TODO: delete the customer for every type once types other than the default get their own ids
      const customer = await this.integration.getCustomer({ account, memo });
      if (customer.id === undefined) {
        throw new CustomerNotFoundForId(account);
      }
      await this.integration.deleteCustomer(customer.id);
      this.logger.info('Request executed successfully', { operation: 'delete customer', id: customer.id });
      return { status: HTTP_STATUS.OK };
    } catch (e) {
      return this.failure('delete customer', e);
    }
  }

  private parseBody(request: Sep12HttpRequest): Promise<ParsedBody> {
    return getParsedBodyData(request.contentType, request.body, this.limits, this.logger);
  }

  private failure(operation: Operation, error: unknown, lang: string = DEFAULT_LANG): Sep12HttpResponse {
    if (isAnchorError(error)) {
      const status = errorStatus(error);
      this.logger.error('Failed to execute the request', {
        operation,
        error: error.message,
        http_status_code: status,
        ...(error instanceof CustomerNotFoundForId ? { customer_id: error.id } : {}),
      });
      return { status, body: { error: localizedErrorMessage(error, lang, this.translate) } };
    }

    const message = `Failed to ${operation}. ${errorMessage(error)}`;
    this.logger.error(message, { operation, http_status_code: HTTP_STATUS.INTERNAL_SERVER_ERROR });
    return { status: HTTP_STATUS.INTERNAL_SERVER_ERROR, body: { error: message } };
  }
}
