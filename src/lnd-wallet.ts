import { Broadcaster } from "./broadcaster.js";
import {
  InvalidCheckingIdError,
  InvalidParamsError,
  PaymentNotFoundError,
  WalletTransportError,
  describeError,
  type InvoiceStreamClosedError,
} from "./errors.js";
import { InvoiceListener } from "./invoice-listener.js";
import { LndClient, type LndConfig } from "./lnd.js";
import defaultLogger, { type Logger } from "./logger.js";
import type { NodeClient } from "./node-client.js";
import { PaymentPoller } from "./payment-poller.js";
import type { Subscription } from "./subscription.js";
import { toInvoiceStatus, toPaymentStatus } from "./translate.js";
import {
  invoiceParamsSchema,
  paymentParamsSchema,
  type InvoiceData,
  type InvoiceParams,
  type InvoiceStatus,
  type PaymentData,
  type PaymentParams,
  type PaymentStatus,
  type WalletInfo,
} from "./types.js";
import type { Wallet } from "./wallet.js";

export const DEFAULT_PAYMENT_TIMEOUT_SECONDS = 60;

export interface LndWalletOptions {
  /** Delay between payment listings (default: 3000) */
  paymentPollIntervalMs?: number;
  /** Records per payment listing call (default: 100) */
  paymentPageSize?: number;
  /** How long LND keeps trying to route a payment (default: 60) */
  paymentTimeoutSeconds?: number;
  /** Routing fee cap in millisatoshis. LND's own default applies when omitted. */
  feeLimitMsat?: number;
  /**
   * Called when the invoice subscription ends. The subscription is not
   * reopened, so settlements stop arriving. Default: exit the process.
   */
  onFatal?: (error: InvoiceStreamClosedError) => void;
  logger?: Logger;
}

const PAYMENT_HASH = /^[0-9a-f]{64}$/i;
const PAYMENT_INDEX = /^\d+$/;

function exitProcess(): void {
  process.exit(1);
}

/** Runs a node call and wraps any failure with the RPC's name */
async function call<T>(rpc: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new WalletTransportError(
      `error calling ${rpc}: ${describeError(error)}`,
      { cause: error },
    );
  }
}

function validationMessage(issues: { path: (string | number)[]; message: string }[]): string {
  return issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * {@link Wallet} on top of an LND node.
 *
 * Invoices are keyed by their hex payment hash, payments by LND's payment
 * index. Settlements come from LND's invoice subscription; payment status
 * changes come from polling the payment list, since LND offers no payment
 * subscription.
 */
export class LndWallet implements Wallet {
  readonly kind = "lnd";

  private invoices = new Broadcaster<InvoiceStatus>();
  private payments = new Broadcaster<PaymentStatus>();
  private invoiceListener: InvoiceListener;
  private paymentPoller: PaymentPoller;
  private paymentTimeoutSeconds: number;
  private feeLimitMsat: number | undefined;
  private log: Logger;
  private started = false;

  constructor(
    private client: NodeClient,
    options: LndWalletOptions = {},
  ) {
    this.log = options.logger ?? defaultLogger;
    this.paymentTimeoutSeconds =
      options.paymentTimeoutSeconds ?? DEFAULT_PAYMENT_TIMEOUT_SECONDS;
    this.feeLimitMsat = options.feeLimitMsat;

    this.invoiceListener = new InvoiceListener(client, this.invoices, {
      onFatal: options.onFatal ?? exitProcess,
      logger: this.log,
    });
    this.paymentPoller = new PaymentPoller(client, this.payments, {
      intervalMs: options.paymentPollIntervalMs,
      pageSize: options.paymentPageSize,
      logger: this.log,
    });
  }

  /** Connects to LND over REST and starts the background loops */
  static async connect(
    config: LndConfig,
    options: LndWalletOptions = {},
  ): Promise<LndWallet> {
    const wallet = new LndWallet(new LndClient(config), options);
    await wallet.start();
    return wallet;
  }

  /**
   * Opens the invoice subscription and starts polling payments.
   * Resolves once the payment checkpoint is known.
   */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    this.invoiceListener.start();
    await this.paymentPoller.start();
  }

  /** Stops both loops and ends every open subscription. The wallet cannot be restarted. */
  async stop(): Promise<void> {
    await Promise.all([this.invoiceListener.stop(), this.paymentPoller.stop()]);
    this.invoices.close();
    this.payments.close();
    this.log.info("Wallet stopped");
  }

  async getInfo(): Promise<WalletInfo> {
    const res = await call("ChannelBalance", () => this.client.channelBalance());
    return { balance: res.localBalanceMsat };
  }

  async createInvoice(params: InvoiceParams): Promise<InvoiceData> {
    const parsed = invoiceParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new InvalidParamsError(
        `invalid invoice params: ${validationMessage(parsed.error.issues)}`,
      );
    }

    const added = await call("AddInvoice", () =>
      this.client.addInvoice({
        memo: params.description,
        descriptionHash: params.descriptionHash
          ? Buffer.from(params.descriptionHash).toString("hex")
          : undefined,
        valueMsat: params.msatoshi,
        expirySeconds: params.expiry,
      }),
    );

    // AddInvoice only returns the hash; the preimage needs a lookup
    const invoice = await call("LookupInvoice", () =>
      this.client.lookupInvoice(added.rHash),
    );
    if (!invoice) {
      throw new WalletTransportError(
        `error calling LookupInvoice: invoice ${added.rHash} not found right after AddInvoice`,
      );
    }

    return {
      checkingID: invoice.rHash,
      preimage: invoice.rPreimage,
      invoice: invoice.paymentRequest,
    };
  }

  async getInvoiceStatus(checkingID: string): Promise<InvoiceStatus> {
    if (!PAYMENT_HASH.test(checkingID)) {
      throw new InvalidCheckingIdError(
        `invalid checkingID: ${checkingID} is not a hex payment hash`,
      );
    }

    const invoice = await call("LookupInvoice", () =>
      this.client.lookupInvoice(checkingID.toLowerCase()),
    );
    return toInvoiceStatus(checkingID, invoice);
  }

  paidInvoicesStream(): Subscription<InvoiceStatus> {
    return this.invoices.subscribe();
  }

  async makePayment(params: PaymentParams): Promise<PaymentData> {
    const parsed = paymentParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new InvalidParamsError(
        `invalid payment params: ${validationMessage(parsed.error.issues)}`,
      );
    }

    const payment = await call("SendPaymentV2", () =>
      this.client.sendPayment({
        paymentRequest: params.invoice,
        amtMsat: params.customAmount !== 0 ? params.customAmount : undefined,
        timeoutSeconds: this.paymentTimeoutSeconds,
        feeLimitMsat: this.feeLimitMsat,
      }),
    );

    return { checkingID: String(payment.paymentIndex) };
  }

  async getPaymentStatus(checkingID: string): Promise<PaymentStatus> {
    const index = Number(checkingID);
    if (!PAYMENT_INDEX.test(checkingID) || !Number.isSafeInteger(index)) {
      throw new InvalidCheckingIdError(
        `invalid checkingID: ${checkingID} is not a payment index`,
      );
    }
    // Payment indexes start at 1
    if (index === 0) {
      throw new PaymentNotFoundError(`payment with ID ${checkingID} not found`);
    }

    const { payments } = await call("ListPayments", () =>
      this.client.listPayments({
        indexOffset: index - 1,
        maxPayments: 1,
        includeIncomplete: true,
        reversed: false,
      }),
    );

    // A deleted record makes the listing skip ahead to the next index
    const payment = payments[0];
    if (!payment || payment.paymentIndex !== index) {
      throw new PaymentNotFoundError(`payment with ID ${checkingID} not found`);
    }

    return toPaymentStatus(payment);
  }

  paymentsStream(): Subscription<PaymentStatus> {
    return this.payments.subscribe();
  }
}
