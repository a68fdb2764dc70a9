export { LndWallet, DEFAULT_PAYMENT_TIMEOUT_SECONDS } from "./lnd-wallet.js";
export type { LndWalletOptions } from "./lnd-wallet.js";
export { LndClient, LndResponseError } from "./lnd.js";
export type { LndConfig } from "./lnd.js";
export type { Wallet } from "./wallet.js";
export type * from "./node-client.js";
export {
  PaymentPoller,
  DEFAULT_PAYMENT_PAGE_SIZE,
  DEFAULT_PAYMENT_POLL_INTERVAL_MS,
} from "./payment-poller.js";
export type { PaymentPollerOptions } from "./payment-poller.js";
export { InvoiceListener } from "./invoice-listener.js";
export type { InvoiceListenerOptions } from "./invoice-listener.js";
export { Broadcaster } from "./broadcaster.js";
export { Subscription } from "./subscription.js";
export {
  toInvoiceStatus,
  toPaidInvoiceStatus,
  toPaymentStatus,
} from "./translate.js";
export {
  PaymentState,
  invoiceParamsSchema,
  isTerminal,
  paymentParamsSchema,
} from "./types.js";
export type {
  InvoiceData,
  InvoiceParams,
  InvoiceStatus,
  PaymentData,
  PaymentParams,
  PaymentStatus,
  WalletInfo,
} from "./types.js";
export { loadConfig } from "./config.js";
export type { Config } from "./config.js";
export { default as logger, parseLogLevel } from "./logger.js";
export {
  ConfigError,
  InvalidCheckingIdError,
  InvalidParamsError,
  InvoiceStreamClosedError,
  PaymentNotFoundError,
  WalletTransportError,
} from "./errors.js";
