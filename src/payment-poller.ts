import type { Broadcaster } from "./broadcaster.js";
import { describeError } from "./errors.js";
import defaultLogger, { type Logger } from "./logger.js";
import type { NodeClient, NodePayment } from "./node-client.js";
import { toPaymentStatus } from "./translate.js";
import { isTerminal, type PaymentState, type PaymentStatus } from "./types.js";

export const DEFAULT_PAYMENT_POLL_INTERVAL_MS = 3_000;
export const DEFAULT_PAYMENT_PAGE_SIZE = 100;

export interface PaymentPollerOptions {
  /** Delay between two listings (default: 3000) */
  intervalMs?: number;
  /** Records requested per listing call (default: 100) */
  pageSize?: number;
  logger?: Logger;
}

/**
 * Turns the node's payment listing into a stream of status changes.
 *
 * The node has no payment subscription, so every tick lists the records
 * above a checkpoint and broadcasts their statuses. The checkpoint follows
 * the node's `lastIndexOffset`, except that it stays below the earliest
 * record that is not yet terminal so that record is read again next tick.
 * A re-read record is only broadcast again when its status changed.
 * Delivery is at-least-once: subscribers must tolerate repeats of the same
 * checkingID and status.
 */
export class PaymentPoller {
  private checkpoint = 0;
  /** Last broadcast status of each record above the checkpoint */
  private lastSent = new Map<number, PaymentState>();
  private intervalMs: number;
  private pageSize: number;
  private log: Logger;
  private running = false;
  private timer: NodeJS.Timeout | undefined;
  private inflight: Promise<void> | undefined;

  constructor(
    private client: NodeClient,
    private broadcaster: Broadcaster<PaymentStatus>,
    options: PaymentPollerOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_PAYMENT_POLL_INTERVAL_MS;
    this.pageSize = options.pageSize ?? DEFAULT_PAYMENT_PAGE_SIZE;
    this.log = options.logger ?? defaultLogger;
  }

  get currentCheckpoint(): number {
    return this.checkpoint;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Sets the checkpoint to the latest completed payment, then starts ticking. */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;

    const checkpoint = await this.latestCompletedIndex();
    this.checkpoint = Math.max(this.checkpoint, checkpoint);
    this.log.info(`Payment poller starting after index ${this.checkpoint}`);

    this.schedule();
  }

  /** Stops ticking and waits for a tick that is already running. */
  async stop(): Promise<void> {
    this.running = false;
    clearTimeout(this.timer);
    this.timer = undefined;
    await this.inflight;
  }

  /**
   * Runs a single tick. A failed listing is logged and leaves the
   * checkpoint untouched. Resolves with the number of statuses broadcast.
   */
  async pollOnce(): Promise<number> {
    let batch: { payments: NodePayment[]; lastIndexOffset: number };
    try {
      batch = await this.listSince(this.checkpoint);
    } catch (error) {
      this.log.error(
        `Error listing payments after index ${this.checkpoint}: ${describeError(error)}`,
      );
      return 0;
    }

    if (batch.payments.length === 0) return 0;

    let sent = 0;
    let firstOpenIndex: number | undefined;

    for (const payment of batch.payments) {
      const status = toPaymentStatus(payment);

      if (
        !isTerminal(status.status) &&
        (firstOpenIndex === undefined || payment.paymentIndex < firstOpenIndex)
      ) {
        firstOpenIndex = payment.paymentIndex;
      }

      if (this.lastSent.get(payment.paymentIndex) === status.status) continue;
      this.lastSent.set(payment.paymentIndex, status.status);
      this.broadcaster.broadcast(status);
      sent++;
    }

    const next =
      firstOpenIndex === undefined
        ? batch.lastIndexOffset
        : Math.min(batch.lastIndexOffset, firstOpenIndex - 1);
    this.advanceTo(next);

    this.log.debug(
      `Payment poll: ${batch.payments.length} records, ${sent} broadcast, checkpoint ${this.checkpoint}`,
    );
    return sent;
  }

  private schedule(): void {
    if (!this.running) return;

    this.timer = setTimeout(() => {
      this.inflight = this.pollOnce()
        .then(() => undefined)
        .catch((error: unknown) => {
          this.log.error(`Payment poll failed: ${describeError(error)}`);
        })
        .finally(() => {
          this.inflight = undefined;
          this.schedule();
        });
    }, this.intervalMs);
  }

  private advanceTo(index: number): void {
    if (index <= this.checkpoint) return;
    this.checkpoint = index;
    for (const seen of this.lastSent.keys()) {
      if (seen <= index) this.lastSent.delete(seen);
    }
  }

  /** Every record above `offset`, in-flight ones included, across as many pages as needed */
  private async listSince(
    offset: number,
  ): Promise<{ payments: NodePayment[]; lastIndexOffset: number }> {
    const payments: NodePayment[] = [];
    let cursor = offset;

    for (;;) {
      const page = await this.client.listPayments({
        indexOffset: cursor,
        maxPayments: this.pageSize,
        includeIncomplete: true,
        reversed: false,
      });
      payments.push(...page.payments);

      // An empty page reports offset 0, so keep the cursor instead
      if (page.payments.length === 0) {
        return { payments, lastIndexOffset: cursor };
      }
      if (page.payments.length < this.pageSize || page.lastIndexOffset <= cursor) {
        return { payments, lastIndexOffset: page.lastIndexOffset };
      }
      cursor = page.lastIndexOffset;
    }
  }

  private async latestCompletedIndex(): Promise<number> {
    try {
      const { payments } = await this.client.listPayments({
        indexOffset: 0,
        maxPayments: 1,
        includeIncomplete: false,
        reversed: true,
      });
      return payments[0]?.paymentIndex ?? 0;
    } catch (error) {
      this.log.warn(
        `Could not read the latest payment, polling from index 0: ${describeError(error)}`,
      );
      return 0;
    }
  }
}
