/**
 * Customer callbacks
 *
 * Signed notifications of customer status changes to wallets.
 */

export { CustomerCallbackSender, signCallback } from './customer-callback';
export type { CallbackDeliveryResult, CallbackHttpClient, CustomerCallbackSenderConfig } from './customer-callback';
