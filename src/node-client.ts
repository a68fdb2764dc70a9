/**
 * The RPC surface a Lightning node must offer for {@link LndWallet} to sit on top of it.
 * Byte fields are hex strings and 64-bit integers are plain numbers;
 * transport encoding is the implementation's business.
 */

export interface ChannelBalance {
  localBalanceMsat: number;
}

export interface AddInvoiceRequest {
  memo: string;
  /** Hex-encoded 32-byte description hash */
  descriptionHash?: string;
  valueMsat: number;
  expirySeconds?: number;
}

export interface AddedInvoice {
  /** Hex-encoded payment hash */
  rHash: string;
  paymentRequest: string;
}

export type NodeInvoiceState = "OPEN" | "SETTLED" | "CANCELED" | "ACCEPTED";

export interface NodeInvoice {
  rHash: string;
  rPreimage: string;
  paymentRequest: string;
  /** Unrecognized states are passed through as-is */
  state: NodeInvoiceState | (string & {});
  amtPaidMsat: number;
}

/**
 * One item read from the invoice subscription. An `error` item is a
 * recoverable read problem; the subscription itself ending is signalled by
 * the iterator completing.
 */
export type InvoiceStreamMessage =
  | { type: "invoice"; invoice: NodeInvoice }
  | { type: "error"; error: Error };

export interface InvoiceSubscription extends AsyncIterable<InvoiceStreamMessage> {
  /** Tears down the underlying connection. The iterator then completes. */
  cancel(): void;
}

export type NodePaymentStatus =
  | "UNKNOWN"
  | "IN_FLIGHT"
  | "SUCCEEDED"
  | "FAILED"
  | "INITIATED";

/** A single routing attempt */
export interface NodeHtlcAttempt {
  attemptId: number;
  status: string;
}

export interface NodePayment {
  paymentIndex: number;
  paymentHash: string;
  status: NodePaymentStatus | (string & {});
  feeMsat: number;
  /** Hex-encoded, empty until the payment succeeds */
  paymentPreimage: string;
  htlcs: NodeHtlcAttempt[];
}

export interface SendPaymentRequest {
  paymentRequest: string;
  /** Only for zero-amount invoices */
  amtMsat?: number;
  timeoutSeconds: number;
  feeLimitMsat?: number;
}

export interface ListPaymentsRequest {
  /** Exclusive: records with an index strictly greater are returned (strictly smaller when reversed) */
  indexOffset: number;
  maxPayments: number;
  includeIncomplete: boolean;
  reversed: boolean;
}

export interface ListPaymentsResponse {
  payments: NodePayment[];
  /** Where the next forward query should resume */
  lastIndexOffset: number;
}

export interface NodeClient {
  channelBalance(): Promise<ChannelBalance>;
  addInvoice(request: AddInvoiceRequest): Promise<AddedInvoice>;
  /** Resolves `null` when the node does not know the hash */
  lookupInvoice(rHash: string): Promise<NodeInvoice | null>;
  subscribeInvoices(): InvoiceSubscription;
  /** Resolves with the first update of the send, as soon as the node has registered the attempt */
  sendPayment(request: SendPaymentRequest): Promise<NodePayment>;
  listPayments(request: ListPaymentsRequest): Promise<ListPaymentsResponse>;
}
