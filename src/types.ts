import { z } from "zod";

export interface WalletInfo {
  /** Spendable channel balance in millisatoshis */
  readonly balance: number;
}

export interface InvoiceParams {
  /** Invoice amount in millisatoshis (0 = any amount) */
  readonly msatoshi: number;
  readonly description: string;
  /** SHA-256 of the long description; backends prefer it over `description` when present */
  readonly descriptionHash?: Uint8Array;
  /** Expiry in seconds. Omit for the backend default. */
  readonly expiry?: number;
}

export interface InvoiceData {
  /** Hex-encoded payment hash, used for every later lookup */
  readonly checkingID: string;
  /** Hex-encoded preimage. May be empty until settlement. */
  readonly preimage: string;
  /** BOLT11 payment request */
  readonly invoice: string;
}

/**
 * Point-in-time view of an invoice. `exists: false` means the backend has
 * never heard of the checking ID; in that case `paid` is false and
 * `msatoshiReceived` is 0.
 */
export interface InvoiceStatus {
  readonly checkingID: string;
  readonly exists: boolean;
  readonly paid: boolean;
  readonly msatoshiReceived: number;
}

export interface PaymentParams {
  /** BOLT11 payment request */
  readonly invoice: string;
  /** Amount override in millisatoshis for zero-amount invoices. 0 uses the invoice amount. */
  readonly customAmount: number;
}

export interface PaymentData {
  /** The backend's payment index as a decimal string, not a payment hash */
  readonly checkingID: string;
}

export const PaymentState = {
  Unknown: "unknown",
  NeverTried: "never-tried",
  Pending: "pending",
  Failed: "failed",
  Complete: "complete",
} as const;

export type PaymentState = (typeof PaymentState)[keyof typeof PaymentState];

export interface PaymentStatus {
  readonly checkingID: string;
  readonly status: PaymentState;
  /** Routing fee in millisatoshis. 0 unless complete. */
  readonly feePaid: number;
  /** Hex-encoded preimage. Empty unless complete. */
  readonly preimage: string;
}

/** Terminal states never go back to pending for the same attempt */
export function isTerminal(state: PaymentState): boolean {
  return (
    state === PaymentState.Complete ||
    state === PaymentState.Failed ||
    state === PaymentState.NeverTried
  );
}

const msatAmount = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const invoiceParamsSchema = z.object({
  msatoshi: msatAmount,
  description: z.string(),
  descriptionHash: z
    .instanceof(Uint8Array)
    .refine((hash) => hash.length === 32, "descriptionHash must be 32 bytes")
    .optional(),
  expiry: z.number().int().positive().optional(),
});

export const paymentParamsSchema = z.object({
  invoice: z.string().min(1, "invoice is required"),
  customAmount: msatAmount,
});
