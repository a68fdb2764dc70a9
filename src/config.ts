import { z } from "zod";

import { ConfigError } from "./errors.js";
import type { LndConfig } from "./lnd.js";
import {
  DEFAULT_PAYMENT_TIMEOUT_SECONDS,
  type LndWalletOptions,
} from "./lnd-wallet.js";
import {
  DEFAULT_PAYMENT_PAGE_SIZE,
  DEFAULT_PAYMENT_POLL_INTERVAL_MS,
} from "./payment-poller.js";

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  LND_HOST: z.string().min(1),
  LND_PORT: positiveInt.max(65535).default(8080),
  LND_TLS_CERT_PATH: z.string().min(1).optional(),
  LND_MACAROON_PATH: z.string().min(1),
  LND_TIMEOUT_MS: positiveInt.optional(),
  PAYMENT_POLL_INTERVAL_MS: positiveInt.default(DEFAULT_PAYMENT_POLL_INTERVAL_MS),
  PAYMENT_PAGE_SIZE: positiveInt.default(DEFAULT_PAYMENT_PAGE_SIZE),
  PAYMENT_TIMEOUT_SECONDS: positiveInt.default(DEFAULT_PAYMENT_TIMEOUT_SECONDS),
  PAYMENT_FEE_LIMIT_MSAT: z.coerce.number().int().nonnegative().optional(),
});

export interface Config {
  lnd: LndConfig;
  wallet: LndWalletOptions;
}

/** Blank variables count as unset */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const entries = Object.entries(env).filter(
    (entry): entry is [string, string] =>
      entry[1] !== undefined && entry[1].trim() !== "",
  );
  return Object.fromEntries(entries);
}

/** Reads the LND connection and wallet settings from environment variables */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    lnd: {
      host: vars.LND_HOST,
      port: vars.LND_PORT,
      tlsCertPath: vars.LND_TLS_CERT_PATH,
      macaroonPath: vars.LND_MACAROON_PATH,
      timeoutMs: vars.LND_TIMEOUT_MS,
    },
    wallet: {
      paymentPollIntervalMs: vars.PAYMENT_POLL_INTERVAL_MS,
      paymentPageSize: vars.PAYMENT_PAGE_SIZE,
      paymentTimeoutSeconds: vars.PAYMENT_TIMEOUT_SECONDS,
      feeLimitMsat: vars.PAYMENT_FEE_LIMIT_MSAT,
    },
  };
}
