import { describe, expect, it } from "vitest";

import { loadConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";
import { parseLogLevel } from "../src/logger.js";

describe("loadConfig", () => {
  it("applies defaults for everything but host and macaroon", () => {
    expect(
      loadConfig({ LND_HOST: "127.0.0.1", LND_MACAROON_PATH: "./creds/admin.macaroon" }),
    ).toEqual({
      lnd: {
        host: "127.0.0.1",
        port: 8080,
        tlsCertPath: undefined,
        macaroonPath: "./creds/admin.macaroon",
        timeoutMs: undefined,
      },
      wallet: {
        paymentPollIntervalMs: 3000,
        paymentPageSize: 100,
        paymentTimeoutSeconds: 60,
        feeLimitMsat: undefined,
      },
    });
  });

  it("parses every variable", () => {
    const config = loadConfig({
      LND_HOST: "lnd.internal",
      LND_PORT: "8081",
      LND_TLS_CERT_PATH: "/creds/tls.cert",
      LND_MACAROON_PATH: "/creds/admin.macaroon",
      LND_TIMEOUT_MS: "15000",
      PAYMENT_POLL_INTERVAL_MS: "1000",
      PAYMENT_PAGE_SIZE: "50",
      PAYMENT_TIMEOUT_SECONDS: "30",
      PAYMENT_FEE_LIMIT_MSAT: "0",
    });

    expect(config.lnd).toEqual({
      host: "lnd.internal",
      port: 8081,
      tlsCertPath: "/creds/tls.cert",
      macaroonPath: "/creds/admin.macaroon",
      timeoutMs: 15000,
    });
    expect(config.wallet).toEqual({
      paymentPollIntervalMs: 1000,
      paymentPageSize: 50,
      paymentTimeoutSeconds: 30,
      feeLimitMsat: 0,
    });
  });

  it("treats blank variables as unset", () => {
    const config = loadConfig({
      LND_HOST: "127.0.0.1",
      LND_MACAROON_PATH: "m",
      LND_TLS_CERT_PATH: "  ",
      LND_PORT: "",
    });
    expect(config.lnd.tlsCertPath).toBeUndefined();
    expect(config.lnd.port).toBe(8080);
  });

  it("lists every problem in one error", () => {
    const error = (() => {
      try {
        loadConfig({ LND_PORT: "http", PAYMENT_POLL_INTERVAL_MS: "-5" });
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    const message = error instanceof Error ? error.message : "";
    expect(message).toContain("LND_HOST: Required");
    expect(message).toContain("LND_MACAROON_PATH: Required");
    expect(message).toContain("LND_PORT: Expected number, received nan");
    expect(message).toContain("PAYMENT_POLL_INTERVAL_MS: Number must be greater than 0");
  });
});

describe("parseLogLevel", () => {
  it("accepts loglevel's level names in any case", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel("silent")).toBe("silent");
  });

  it("falls back to info", () => {
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("verbose")).toBe("info");
  });
});
