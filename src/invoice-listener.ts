import type { Broadcaster } from "./broadcaster.js";
import { InvoiceStreamClosedError, describeError } from "./errors.js";
import defaultLogger, { type Logger } from "./logger.js";
import type { InvoiceSubscription, NodeClient } from "./node-client.js";
import { toPaidInvoiceStatus } from "./translate.js";
import type { InvoiceStatus } from "./types.js";

export interface InvoiceListenerOptions {
  /** Called once if the node's subscription ends or breaks. It is not reopened. */
  onFatal: (error: InvoiceStreamClosedError) => void;
  logger?: Logger;
}

/**
 * Holds the single invoice subscription of a wallet and broadcasts every
 * settlement seen on it. Other invoice state changes are dropped.
 */
export class InvoiceListener {
  private subscription: InvoiceSubscription | undefined;
  private loop: Promise<void> | undefined;
  private stopping = false;
  private log: Logger;

  constructor(
    private client: NodeClient,
    private broadcaster: Broadcaster<InvoiceStatus>,
    private options: InvoiceListenerOptions,
  ) {
    this.log = options.logger ?? defaultLogger;
  }

  get isRunning(): boolean {
    return this.loop !== undefined;
  }

  start(): void {
    if (this.loop) return;
    this.stopping = false;

    const subscription = this.client.subscribeInvoices();
    this.subscription = subscription;
    this.loop = this.consume(subscription);
    this.log.info("Invoice listener subscribed");
  }

  /** Cancels the subscription and waits for the read loop to finish. Not treated as fatal. */
  async stop(): Promise<void> {
    this.stopping = true;
    this.subscription?.cancel();
    await this.loop;
    this.subscription = undefined;
    this.loop = undefined;
  }

  private async consume(subscription: InvoiceSubscription): Promise<void> {
    try {
      for await (const message of subscription) {
        if (message.type === "error") {
          this.log.warn(`Error receiving invoice event: ${message.error.message}`);
          continue;
        }

        const status = toPaidInvoiceStatus(message.invoice);
        if (status) {
          this.log.debug(`Invoice ${status.checkingID} settled`);
          this.broadcaster.broadcast(status);
        }
      }
    } catch (error) {
      if (!this.stopping) {
        this.fail(
          new InvoiceStreamClosedError(
            `Invoice subscription failed: ${describeError(error)}`,
            { cause: error },
          ),
        );
      }
      return;
    }

    if (!this.stopping) {
      this.fail(new InvoiceStreamClosedError("Invoice subscription ended"));
    }
  }

  private fail(error: InvoiceStreamClosedError): void {
    this.log.error(error.message);
    this.options.onFatal(error);
  }
}
