import fs from "node:fs";
import http from "node:http";
import https from "node:https";

import type { z } from "zod";

import {
  addInvoiceSchema,
  apiErrorSchema,
  channelBalanceSchema,
  invoiceSchema,
  listPaymentsSchema,
  paymentSchema,
  streamLineSchema,
} from "./lnd-schemas.js";
import type {
  AddInvoiceRequest,
  AddedInvoice,
  ChannelBalance,
  InvoiceStreamMessage,
  InvoiceSubscription,
  ListPaymentsRequest,
  ListPaymentsResponse,
  NodeClient,
  NodeInvoice,
  NodePayment,
  SendPaymentRequest,
} from "./node-client.js";

export interface LndConfig {
  /** Hostname or IP of the LND REST API */
  host: string;
  /** REST API port (default LND: 8080) */
  port: number;
  /**
   * Path to LND's TLS certificate (tls.cert). When omitted the client talks
   * plain HTTP, which only suits a local REST proxy.
   */
  tlsCertPath?: string;
  /** Path to a macaroon file for authentication (e.g. admin.macaroon) */
  macaroonPath: string;
  /** Timeout for non-streaming requests in milliseconds. No timeout when omitted. */
  timeoutMs?: number;
}

/** A non-2xx answer from the REST gateway */
export class LndResponseError extends Error {
  override name = "LndResponseError" as const;

  constructor(
    readonly statusCode: number,
    readonly body: string,
  ) {
    super(`LND API error ${statusCode}: ${errorMessage(body)}`);
  }
}

function errorMessage(body: string): string {
  try {
    const parsed = apiErrorSchema.safeParse(JSON.parse(body));
    if (parsed.success && parsed.data.message) return parsed.data.message;
  } catch {
    // not JSON, fall through to the raw body
  }
  return body;
}

function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  path: string,
): z.output<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Unexpected LND response from ${path}: ${issues}`);
  }
  return parsed.data;
}

function parseJson(text: string, path: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`LND response from ${path} is not valid JSON`);
  }
}

/** Splits a chunked body into non-empty lines */
async function* readLines(
  body: AsyncIterable<Buffer | string>,
): AsyncGenerator<string> {
  let buffered = "";
  for await (const chunk of body) {
    buffered += chunk.toString();
    let newline = buffered.indexOf("\n");
    while (newline >= 0) {
      const line = buffered.slice(0, newline).trim();
      buffered = buffered.slice(newline + 1);
      if (line) yield line;
      newline = buffered.indexOf("\n");
    }
  }
  const rest = buffered.trim();
  if (rest) yield rest;
}

function readBody(res: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    res.on("data", (chunk: Buffer) => {
      data += chunk.toString();
    });
    res.on("end", () => resolve(data));
    res.on("error", reject);
  });
}

const invoiceLineSchema = streamLineSchema(invoiceSchema);
const paymentLineSchema = streamLineSchema(paymentSchema);

/**
 * Connects to an LND node via its REST API.
 * Reads the TLS cert and macaroon from disk once at construction.
 * The macaroon is sent as a hex-encoded header on every request.
 */
export class LndClient implements NodeClient {
  private tlsCert: Buffer | undefined;
  private macaroon: string;
  private baseUrl: string;
  private timeoutMs: number | undefined;

  constructor(config: LndConfig) {
    this.tlsCert = config.tlsCertPath
      ? fs.readFileSync(config.tlsCertPath)
      : undefined;
    this.macaroon = fs.readFileSync(config.macaroonPath).toString("hex");
    const scheme = this.tlsCert ? "https" : "http";
    this.baseUrl = `${scheme}://${config.host}:${config.port}`;
    this.timeoutMs = config.timeoutMs;
  }

  /**
   * Sends an authenticated request and resolves with the response head.
   * The TLS cert is used as a CA to verify the self-signed certificate.
   */
  private send(
    method: string,
    path: string,
    body: unknown,
    options: { signal?: AbortSignal; timeoutMs?: number } = {},
  ): Promise<http.IncomingMessage> {
    const url = new URL(path, this.baseUrl);

    const requestOptions: https.RequestOptions = {
      method,
      headers: {
        "Grpc-Metadata-macaroon": this.macaroon,
        "Content-Type": "application/json",
      },
    };
    if (this.tlsCert) requestOptions.ca = this.tlsCert;
    if (options.signal) requestOptions.signal = options.signal;

    return new Promise((resolve, reject) => {
      const req = this.tlsCert
        ? https.request(url, requestOptions, resolve)
        : http.request(url, requestOptions, resolve);

      const { timeoutMs } = options;
      if (timeoutMs !== undefined) {
        req.setTimeout(timeoutMs, () => {
          req.destroy();
          reject(new Error(`LND request timed out after ${timeoutMs}ms`));
        });
      }

      req.on("error", reject);

      if (body !== undefined) {
        req.write(JSON.stringify(body));
      }

      req.end();
    });
  }

  /** Unary call: the whole body is read and validated against `schema` */
  private async request<S extends z.ZodTypeAny>(
    method: string,
    path: string,
    schema: S,
    body?: unknown,
  ): Promise<z.output<S>> {
    const res = await this.send(method, path, body, {
      timeoutMs: this.timeoutMs,
    });
    const data = await readBody(res);

    if (!res.statusCode || res.statusCode < 200 || res.statusCode >= 300) {
      throw new LndResponseError(res.statusCode ?? 0, data);
    }

    return parseWith(schema, parseJson(data, path), path);
  }

  /** Server-streaming call: yields one raw line per message. Never times out. */
  private async *stream(
    method: string,
    path: string,
    body: unknown,
    signal: AbortSignal,
  ): AsyncGenerator<string> {
    const res = await this.send(method, path, body, { signal });

    if (!res.statusCode || res.statusCode < 200 || res.statusCode >= 300) {
      throw new LndResponseError(res.statusCode ?? 0, await readBody(res));
    }

    yield* readLines(res);
  }

  async channelBalance(): Promise<ChannelBalance> {
    return this.request("GET", "/v1/balance/channels", channelBalanceSchema);
  }

  async addInvoice(request: AddInvoiceRequest): Promise<AddedInvoice> {
    const body: Record<string, string> = {
      memo: request.memo,
      value_msat: String(request.valueMsat),
    };
    if (request.descriptionHash) {
      body["description_hash"] = Buffer.from(
        request.descriptionHash,
        "hex",
      ).toString("base64");
    }
    if (request.expirySeconds !== undefined) {
      body["expiry"] = String(request.expirySeconds);
    }

    return this.request("POST", "/v1/invoices", addInvoiceSchema, body);
  }

  /** Resolves `null` when LND does not know the hash */
  async lookupInvoice(rHash: string): Promise<NodeInvoice | null> {
    try {
      return await this.request(
        "GET",
        `/v1/invoice/${encodeURIComponent(rHash)}`,
        invoiceSchema,
      );
    } catch (error) {
      // Older LND answers 500 with "unable to locate invoice" instead of 404
      if (
        error instanceof LndResponseError &&
        (error.statusCode === 404 ||
          error.message.includes("unable to locate invoice"))
      ) {
        return null;
      }
      throw error;
    }
  }

  subscribeInvoices(): InvoiceSubscription {
    const controller = new AbortController();
    const messages = this.invoiceMessages(controller.signal);

    return {
      cancel: () => controller.abort(),
      [Symbol.asyncIterator]: () => messages,
    };
  }

  private async *invoiceMessages(
    signal: AbortSignal,
  ): AsyncGenerator<InvoiceStreamMessage> {
    const path = "/v1/invoices/subscribe";
    try {
      for await (const line of this.stream("GET", path, undefined, signal)) {
        let message: z.output<typeof invoiceLineSchema>;
        try {
          message = parseWith(invoiceLineSchema, parseJson(line, path), path);
        } catch (error) {
          yield {
            type: "error",
            error: error instanceof Error ? error : new Error(String(error)),
          };
          continue;
        }

        if ("error" in message) {
          yield {
            type: "error",
            error: new Error(`LND stream error: ${message.error.message}`),
          };
        } else {
          yield { type: "invoice", invoice: message.result };
        }
      }
    } catch (error) {
      // Cancelled by the caller: finish quietly
      if (signal.aborted) return;
      throw error;
    }
  }

  /** Starts a payment and resolves with LND's first update, then lets go of the stream */
  async sendPayment(request: SendPaymentRequest): Promise<NodePayment> {
    const path = "/v2/router/send";
    const body: Record<string, string | number> = {
      payment_request: request.paymentRequest,
      timeout_seconds: request.timeoutSeconds,
    };
    if (request.amtMsat !== undefined) {
      body["amt_msat"] = String(request.amtMsat);
    }
    if (request.feeLimitMsat !== undefined) {
      body["fee_limit_msat"] = String(request.feeLimitMsat);
    }

    const controller = new AbortController();
    try {
      for await (const line of this.stream("POST", path, body, controller.signal)) {
        const message = parseWith(paymentLineSchema, parseJson(line, path), path);
        if ("error" in message) {
          throw new Error(`LND stream error: ${message.error.message}`);
        }
        return message.result;
      }
    } finally {
      controller.abort();
    }

    throw new Error(`${path} closed before the first payment update`);
  }

  async listPayments(request: ListPaymentsRequest): Promise<ListPaymentsResponse> {
    const query = new URLSearchParams({
      index_offset: String(request.indexOffset),
      max_payments: String(request.maxPayments),
      include_incomplete: String(request.includeIncomplete),
      reversed: String(request.reversed),
    });

    return this.request("GET", `/v1/payments?${query.toString()}`, listPaymentsSchema);
  }
}
