import axios from 'axios';
import type { AxiosRequestConfig } from 'axios';
import { Keypair } from '@stellar/stellar-sdk';
import { CALLBACK } from '../sep12/constants';
import type { Sep12Config } from '../sep12/config';
import { AnchorFailure } from '../sep12/errors';
import { nullLogger } from '../sep12/logger';
import type { Logger } from '../sep12/logger';
import { getCustomerResponseToJson } from '../sep12/responses';
import type { GetCustomerResponse } from '../sep12/types';
import { errorMessage } from '../sep12/util';

/**
 * The part of an axios instance the sender needs.
 */
export interface CallbackHttpClient {
  post(url: string, data: string, config: AxiosRequestConfig<string>): Promise<{ status: number }>;
}

export interface CustomerCallbackSenderConfig {
  /** Secret seed of the anchor's SEP-10 signing key */
  signingSecret: string;
  timeoutMs?: number;
  logger?: Logger;
  /** Replaces the axios instance created from `timeoutMs` */
  client?: CallbackHttpClient;
  /** Clock in milliseconds, used for the signature timestamp */
  now?: () => number;
}

export interface CallbackDeliveryResult {
  delivered: boolean;
  /** HTTP status of the callback endpoint, if it answered */
  status?: number;
  error?: string;
}

/**
 * Builds the `Signature` header value for a callback request.
 *
 * The signed payload is `<timestamp>.<url>.<body>`; the signature is base64 encoded.
 */
export function signCallback(keypair: Keypair, timestamp: number, url: string, body: string): string {
  const payload = `${timestamp}.${url}.${body}`;
  const signature = keypair.sign(Buffer.from(payload, 'utf8')).toString('base64');
  return `t=${timestamp}, s=${signature}`;
}

/**
 * Posts customer status changes to the callback url a client registered via
 * PUT /customer/callback.
 *
 * @example
 * const sender = CustomerCallbackSender.fromConfig(loadSep12Config());
 * await sender.send('https://wallet.example.com/kyc', customer);
 */
export class CustomerCallbackSender {
  private readonly keypair: Keypair;
  private readonly client: CallbackHttpClient;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(config: CustomerCallbackSenderConfig) {
    this.keypair = Keypair.fromSecret(config.signingSecret);
    this.client =
      config.client ??
      axios.create({
        timeout: config.timeoutMs ?? CALLBACK.DEFAULT_TIMEOUT_MS,
        headers: { 'Content-Type': 'application/json' },
      });
    this.logger = config.logger ?? nullLogger;
    this.now = config.now ?? Date.now;
  }

  /**
   * @throws {AnchorFailure} `SERVER_SIGNING_SECRET` is not configured
   */
  static fromConfig(config: Sep12Config, logger?: Logger): CustomerCallbackSender {
    if (config.signingSecret === undefined) {
      throw new AnchorFailure('SERVER_SIGNING_SECRET is required to send customer callbacks', {
        messageKey: 'config.missing_signing_secret',
        messageParams: { name: 'SERVER_SIGNING_SECRET' },
      });
    }
    return new CustomerCallbackSender({
      signingSecret: config.signingSecret,
      timeoutMs: config.callbackTimeoutMs,
      logger,
    });
  }

  /**
   * Sends the current customer state to `url`. Failures are reported in the
   * result, never thrown.
   */
  async send(url: string | undefined, customer: GetCustomerResponse): Promise<CallbackDeliveryResult> {
    if (!url) {
      this.logger.debug('No callback url registered, skipping', { customer_id: customer.id });
      return { delivered: false };
    }

    const body = JSON.stringify(getCustomerResponseToJson(customer));
    const timestamp = Math.floor(this.now() / 1000);
    const signature = signCallback(this.keypair, timestamp, url, body);

    try {
      const response = await this.client.post(url, body, {
        headers: {
          'Content-Type': 'application/json',
          Signature: signature,
          // Deprecated, still read by older wallets
          'X-Stellar-Signature': signature,
        },
      });
      this.logger.info('Customer callback delivered', { url, status: response.status, customer_id: customer.id });
      return { delivered: true, status: response.status };
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      const message = errorMessage(error);
      this.logger.warn('Customer callback failed', { url, status, error: message, customer_id: customer.id });
      return { delivered: false, status, error: message };
    }
  }
}
