import type { ProviderError } from "../invoice-provider/errors.js";

export type CheckoutErrorCode =
  | "INVALID_CHECKOUT_REQUEST"
  | "UNSUPPORTED_CURRENCY"
  | "INVALID_REFERENCE"
  | "ALREADY_SETTLED"
  | "PROVIDER_UNAVAILABLE"
  | "UNKNOWN_TOKEN";

export class CheckoutError extends Error {
  readonly code: CheckoutErrorCode;

  constructor(code: CheckoutErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidCheckoutRequestError extends CheckoutError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(
      "INVALID_CHECKOUT_REQUEST",
      `Invalid checkout request: ${issues.join("; ")}`
    );
    this.issues = issues;
  }
}

export class UnsupportedCurrencyError extends CheckoutError {
  readonly currency: string;

  constructor(currency: string, supported: readonly string[]) {
    super(
      "UNSUPPORTED_CURRENCY",
      `Please select another payment method. This gateway does not support transactions in currency '${currency}' (supported: ${supported.join(", ")})`
    );
    this.currency = currency;
  }
}

export class InvalidReferenceError extends CheckoutError {
  constructor(message: string) {
    super("INVALID_REFERENCE", message);
  }
}

export class AlreadySettledError extends CheckoutError {
  readonly token: string;

  constructor(token: string) {
    super("ALREADY_SETTLED", `Checkout '${token}' has already been paid`);
    this.token = token;
  }
}

export class ProviderUnavailableError extends CheckoutError {
  constructor(cause: ProviderError) {
    super(
      "PROVIDER_UNAVAILABLE",
      `Failed to create invoice, please check the gateway settings (${cause.kind}: ${cause.message})`,
      { cause }
    );
  }
}

export class UnknownTokenError extends CheckoutError {
  readonly token: string;

  constructor(token: string) {
    super("UNKNOWN_TOKEN", `No checkout found for token '${token}'`);
    this.token = token;
  }
}
