import http from "node:http";

export const ADDED_HASH = "01".repeat(32);
export const KNOWN_HASH = "0a".repeat(32);
export const KNOWN_PREIMAGE = "02".repeat(32);
/** Answered the way LND before 0.16 did: HTTP 500 instead of 404 */
export const LEGACY_MISSING_HASH = "0b".repeat(32);
export const UNAVAILABLE_HASH = "0c".repeat(32);
export const PAYMENT_PREIMAGE = "03".repeat(32);
export const BAD_INVOICE = "lnbcrt1expired";

const b64 = (hex: string) => Buffer.from(hex, "hex").toString("base64");

export interface RecordedRequest {
  method: string;
  url: string;
  macaroon: string | undefined;
  body: unknown;
}

export interface MockLnd {
  server: http.Server;
  port: number;
  requests: RecordedRequest[];
  /** Lines written to every invoice subscription, one JSON document each */
  invoiceLines: string[];
  /** Whether the invoice subscription is closed after the lines are written */
  endInvoiceStream: boolean;
  close(): Promise<void>;
}

function invoiceJson(state: string, amtPaidMsat: string) {
  return {
    memo: "",
    r_preimage: b64(KNOWN_PREIMAGE),
    r_hash: b64(KNOWN_HASH),
    value_msat: "1000",
    settled: state === "SETTLED",
    payment_request: "lnbcrt10n1known",
    state,
    amt_paid_msat: amtPaidMsat,
  };
}

export const OPEN_INVOICE_LINE = JSON.stringify({ result: invoiceJson("OPEN", "0") });
export const SETTLED_INVOICE_LINE = JSON.stringify({
  result: invoiceJson("SETTLED", "1000"),
});

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function readJson(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let data = "";
    req.on("data", (chunk: Buffer) => {
      data += chunk.toString();
    });
    req.on("end", () => {
      try {
        resolve(data ? JSON.parse(data) : undefined);
      } catch (error) {
        reject(error);
      }
    });
    req.on("error", reject);
  });
}

/** A stand-in for LND's REST gateway, over plain HTTP on a random port */
export async function startMockLnd(): Promise<MockLnd> {
  const mock: Omit<MockLnd, "server" | "port" | "close"> = {
    requests: [],
    invoiceLines: [],
    endInvoiceStream: true,
  };

  const server = http.createServer((req, res) => {
    void handle(req, res).catch((error: unknown) => {
      sendJson(res, 500, { code: 2, message: String(error) });
    });
  });

  async function handle(req: http.IncomingMessage, res: http.ServerResponse) {
    const url = new URL(req.url ?? "/", "http://localhost");
    const body = await readJson(req);
    const macaroon = req.headers["grpc-metadata-macaroon"];
    mock.requests.push({
      method: req.method ?? "",
      url: `${url.pathname}${url.search}`,
      macaroon: typeof macaroon === "string" ? macaroon : undefined,
      body,
    });

    if (url.pathname === "/v1/balance/channels") {
      sendJson(res, 200, {
        balance: "5000",
        local_balance: { sat: "5000", msat: "5000000" },
        remote_balance: { sat: "0", msat: "0" },
      });
      return;
    }

    if (url.pathname === "/v1/invoices" && req.method === "POST") {
      sendJson(res, 200, {
        r_hash: b64(ADDED_HASH),
        payment_request: "lnbcrt10n1added",
        add_index: "1",
      });
      return;
    }

    if (url.pathname.startsWith("/v1/invoice/")) {
      const hash = url.pathname.slice("/v1/invoice/".length);
      if (hash === KNOWN_HASH) {
        sendJson(res, 200, invoiceJson("SETTLED", "1000"));
      } else if (hash === LEGACY_MISSING_HASH) {
        sendJson(res, 500, { code: 2, message: "unable to locate invoice" });
      } else if (hash === UNAVAILABLE_HASH) {
        sendJson(res, 503, { code: 14, message: "node is shutting down" });
      } else {
        sendJson(res, 404, { code: 5, message: "there are no existing invoices" });
      }
      return;
    }

    if (url.pathname === "/v1/invoices/subscribe") {
      res.writeHead(200, { "Content-Type": "application/json" });
      for (const line of mock.invoiceLines) {
        res.write(`${line}\n`);
      }
      if (mock.endInvoiceStream) res.end();
      return;
    }

    if (url.pathname === "/v2/router/send" && req.method === "POST") {
      res.writeHead(200, { "Content-Type": "application/json" });
      if (
        typeof body === "object" &&
        body !== null &&
        "payment_request" in body &&
        body.payment_request === BAD_INVOICE
      ) {
        res.end(`${JSON.stringify({ error: { code: 2, message: "invoice expired" } })}\n`);
        return;
      }
      // First update only; the stream stays open like a real send in flight
      res.write(
        `${JSON.stringify({
          result: {
            payment_hash: "04".repeat(32),
            value_msat: "5000",
            payment_preimage: "",
            status: "IN_FLIGHT",
            fee_msat: "0",
            payment_index: "17",
            htlcs: [],
          },
        })}\n`,
      );
      return;
    }

    if (url.pathname === "/v1/payments") {
      sendJson(res, 200, {
        payments: [
          {
            payment_hash: "05".repeat(32),
            value_msat: "20000",
            payment_preimage: PAYMENT_PREIMAGE,
            status: "SUCCEEDED",
            fee_msat: "1000",
            payment_index: "5",
            htlcs: [{ attempt_id: "1", status: "SUCCEEDED" }],
          },
        ],
        first_index_offset: "5",
        last_index_offset: "5",
        total_num_payments: "0",
      });
      return;
    }

    sendJson(res, 404, { code: 5, message: "Not Found" });
  }

  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", resolve);
  });
  const address = server.address();
  const port = typeof address === "object" && address ? address.port : 0;

  return Object.assign(mock, {
    server,
    port,
    close: () =>
      new Promise<void>((resolve) => {
        server.closeAllConnections();
        server.close(() => resolve());
      }),
  });
}
