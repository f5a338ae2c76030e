import type {
  GetCustomerRequest,
  GetCustomerResponse,
  PutCustomerCallbackRequest,
  PutCustomerRequest,
  PutCustomerResponse,
  PutCustomerVerificationRequest,
} from './types';

/**
 * Business logic the anchor implements to load and store customers.
 *
 * Requests arrive validated and authorized; their `memo` is the memo of the
 * SEP-10 token. Implementations signal failures with `AnchorFailure`, and with
 * `CustomerNotFoundForId` for an id that does not exist or belongs to another
 * account.
 */
export interface CustomerIntegration {
  getCustomer(request: GetCustomerRequest): Promise<GetCustomerResponse>;

  putCustomer(request: PutCustomerRequest): Promise<PutCustomerResponse>;

  putCustomerVerification(request: PutCustomerVerificationRequest): Promise<GetCustomerResponse>;

  /**
   * Stores (or, without `url`, removes) the callback url of the customer.
   * When `id` is given, the customer must belong to `account`/`memo`.
   */
  putCustomerCallback(request: PutCustomerCallbackRequest): Promise<void>;

  deleteCustomer(id: string): Promise<void>;
}
