import { z } from "zod";

/*
 * Shapes of LND REST gateway responses. The gateway renders int64/uint64 as
 * decimal strings and `bytes` fields as base64; both are normalized here.
 */

const uint64 = z
  .union([z.string().regex(/^\d+$/), z.number().int().nonnegative()])
  .transform((value) => Number(value))
  .refine(Number.isSafeInteger, "integer exceeds the safe range");

const base64Bytes = z
  .string()
  .transform((value) => Buffer.from(value, "base64").toString("hex"));

export const channelBalanceSchema = z
  .object({
    /** sats, deprecated in newer LND but still sent */
    balance: uint64.default(0),
    local_balance: z.object({ msat: uint64.default(0) }).optional(),
  })
  .transform((res) => ({
    localBalanceMsat: res.local_balance?.msat ?? res.balance * 1000,
  }));

export const addInvoiceSchema = z
  .object({
    r_hash: base64Bytes,
    payment_request: z.string(),
  })
  .transform((res) => ({
    rHash: res.r_hash,
    paymentRequest: res.payment_request,
  }));

export const invoiceSchema = z
  .object({
    r_hash: base64Bytes,
    r_preimage: base64Bytes.default(""),
    payment_request: z.string().default(""),
    state: z.string().default("OPEN"),
    amt_paid_msat: uint64.default(0),
  })
  .transform((res) => ({
    rHash: res.r_hash,
    rPreimage: res.r_preimage,
    paymentRequest: res.payment_request,
    state: res.state,
    amtPaidMsat: res.amt_paid_msat,
  }));

const htlcSchema = z
  .object({
    attempt_id: uint64.default(0),
    status: z.string().default(""),
  })
  .transform((res) => ({ attemptId: res.attempt_id, status: res.status }));

export const paymentSchema = z
  .object({
    payment_hash: z.string().default(""),
    /** Already hex: a string field in the proto, not bytes */
    payment_preimage: z.string().default(""),
    status: z.string().default("UNKNOWN"),
    fee_msat: uint64.default(0),
    payment_index: uint64,
    htlcs: z.array(htlcSchema).default([]),
  })
  .transform((res) => ({
    paymentIndex: res.payment_index,
    paymentHash: res.payment_hash,
    status: res.status,
    feeMsat: res.fee_msat,
    paymentPreimage: res.payment_preimage,
    htlcs: res.htlcs,
  }));

export const listPaymentsSchema = z
  .object({
    payments: z.array(paymentSchema).default([]),
    last_index_offset: uint64.default(0),
  })
  .transform((res) => ({
    payments: res.payments,
    lastIndexOffset: res.last_index_offset,
  }));

/** Error body of a failed call, and of an `error` line on a stream */
export const apiErrorSchema = z.object({
  code: z.number().optional(),
  message: z.string().default(""),
});

/** One line of a server-streaming endpoint: `{"result": ...}` or `{"error": ...}` */
export function streamLineSchema<T extends z.ZodTypeAny>(result: T) {
  return z.union([
    z.object({ result }),
    z.object({ error: apiErrorSchema }),
  ]);
}
