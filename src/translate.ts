import type { NodeInvoice, NodePayment } from "./node-client.js";
import {
  PaymentState,
  type InvoiceStatus,
  type PaymentStatus,
} from "./types.js";

/**
 * Maps a node payment record to the shared payment status.
 * `checkingID` is always the record's own index, whatever the caller asked for.
 */
export function toPaymentStatus(payment: NodePayment): PaymentStatus {
  const checkingID = String(payment.paymentIndex);

  switch (payment.status) {
    case "IN_FLIGHT":
      return { checkingID, status: PaymentState.Pending, feePaid: 0, preimage: "" };
    case "FAILED":
      return {
        checkingID,
        // No HTLC was ever dispatched, e.g. no route was found
        status:
          payment.htlcs.length === 0
            ? PaymentState.NeverTried
            : PaymentState.Failed,
        feePaid: 0,
        preimage: "",
      };
    case "SUCCEEDED":
      return {
        checkingID,
        status: PaymentState.Complete,
        feePaid: payment.feeMsat,
        preimage: payment.paymentPreimage,
      };
    default:
      return { checkingID, status: PaymentState.Unknown, feePaid: 0, preimage: "" };
  }
}

/** Status for an invoice lookup. `null` means the node does not know the hash. */
export function toInvoiceStatus(
  checkingID: string,
  invoice: NodeInvoice | null,
): InvoiceStatus {
  if (!invoice) {
    return { checkingID, exists: false, paid: false, msatoshiReceived: 0 };
  }
  return {
    checkingID,
    exists: true,
    paid: invoice.state === "SETTLED",
    msatoshiReceived: invoice.amtPaidMsat,
  };
}

/** Status for a settlement seen on the invoice stream, or `null` for any other state change */
export function toPaidInvoiceStatus(invoice: NodeInvoice): InvoiceStatus | null {
  if (invoice.state !== "SETTLED") return null;
  return {
    checkingID: invoice.rHash,
    exists: true,
    paid: true,
    msatoshiReceived: invoice.amtPaidMsat,
  };
}
