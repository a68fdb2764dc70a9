/** A call to the node failed: connection, HTTP status, timeout or an unexpected response shape */
export class WalletTransportError extends Error {
  override name = "WalletTransportError" as const;
}

/** The checking ID does not parse into the backend's key space (hash or payment index) */
export class InvalidCheckingIdError extends Error {
  override name = "InvalidCheckingIdError" as const;
}

/** The payment index parsed, but the node holds no payment at that index */
export class PaymentNotFoundError extends Error {
  override name = "PaymentNotFoundError" as const;
}

/** Invoice or payment parameters were rejected before reaching the node */
export class InvalidParamsError extends Error {
  override name = "InvalidParamsError" as const;
}

/** The node's invoice subscription ended or could not be opened. Requires a restart. */
export class InvoiceStreamClosedError extends Error {
  override name = "InvoiceStreamClosedError" as const;
}

/** Configuration read from the environment is missing or invalid */
export class ConfigError extends Error {
  override name = "ConfigError" as const;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
