import type { Subscription } from "./subscription.js";
import type {
  InvoiceData,
  InvoiceParams,
  InvoiceStatus,
  PaymentData,
  PaymentParams,
  PaymentStatus,
  WalletInfo,
} from "./types.js";

/**
 * Interface for any Lightning node backend.
 * Implement this to put a node other than LND behind the same API.
 */
export interface Wallet {
  /** Backend identifier, e.g. "lnd" */
  readonly kind: string;

  getInfo(): Promise<WalletInfo>;

  /** Either resolves with a complete invoice or rejects; never a partial result */
  createInvoice(params: InvoiceParams): Promise<InvoiceData>;

  /**
   * Resolves `exists: false` for an ID the node does not know. Rejects only
   * for transport failures and IDs outside the backend's key space.
   */
  getInvoiceStatus(checkingID: string): Promise<InvoiceStatus>;

  /** A new, independent subscription to invoice settlements */
  paidInvoicesStream(): Subscription<InvoiceStatus>;

  /** Resolves once the node has accepted the attempt, not when it completes */
  makePayment(params: PaymentParams): Promise<PaymentData>;

  getPaymentStatus(checkingID: string): Promise<PaymentStatus>;

  /** A new, independent subscription to outgoing payment status changes (at-least-once) */
  paymentsStream(): Subscription<PaymentStatus>;
}
