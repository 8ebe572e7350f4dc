/**
 * Centralized configuration for the hosted checkout service.
 *
 * Reads environment variables into a typed config object. Nothing is cached
 * at module level: callers load the config once at startup and pass the
 * pieces they need (notably `checkout`) into the services they construct.
 */

import type { FeeSchedule } from "./services/checkout/fee.js";
import type { CheckoutSettings } from "./services/checkout/types.js";
import type {
  InvoiceProviderConfig,
  InvoiceStatusMapping,
} from "./services/invoice-provider/types.js";

export interface Config {
  port: number;
  baseUrl: string;
  dbPath: string;
  provider: InvoiceProviderConfig;
  checkout: CheckoutSettings;
}

const DEFAULT_PORT = 3141;
const DEFAULT_DB_PATH = "data/hosted-checkout.db";
const DEFAULT_GATEWAY_NAME = "Xendit";
const DEFAULT_PROVIDER = "xendit" as const;
const DEFAULT_XENDIT_API_URL = "https://api.xendit.co";
const DEFAULT_PROVIDER_TIMEOUT_MS = 15_000;
const DEFAULT_SUPPORTED_CURRENCIES = ["IDR"];
const DEFAULT_BASE_FEE_MINOR = 2000;
const DEFAULT_FEE_RATE_BPS = 290;
const DEFAULT_FEE_ROUNDING_STEP_MINOR = 1000;
const DEFAULT_INVOICE_DURATION_SECONDS = 600;
const DEFAULT_PAID_STATUSES = ["PAID", "SETTLED"];
const DEFAULT_FAILED_STATUSES = ["EXPIRED"];
const DEFAULT_CONFIRM_PATH = "/confirm_payment";
const DEFAULT_SUCCESS_PATH = "payment-success";
const DEFAULT_FAILURE_PATH = "payment-failed";
const DEFAULT_PAYMENT_REQUEST_DOCTYPE = "Payment Request";
const MAX_FEE_RATE_BPS = 10_000;

function parsePositiveInteger(
  rawValue: string | undefined,
  envName: string,
  defaultValue: number
): number {
  if (!rawValue) return defaultValue;

  const parsed = Number(rawValue);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${envName} must be a positive integer`);
  }

  return parsed;
}

function parseNonNegativeInteger(
  rawValue: string | undefined,
  envName: string,
  defaultValue: number
): number {
  if (!rawValue) return defaultValue;

  const parsed = Number(rawValue);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${envName} must be a non-negative integer`);
  }

  return parsed;
}

function parseFeeRateBps(rawValue: string | undefined): number {
  const parsed = parseNonNegativeInteger(
    rawValue,
    "CHECKOUT_FEE_RATE_BPS",
    DEFAULT_FEE_RATE_BPS
  );
  if (parsed > MAX_FEE_RATE_BPS) {
    throw new Error(
      `CHECKOUT_FEE_RATE_BPS must be an integer between 0 and ${MAX_FEE_RATE_BPS}`
    );
  }
  return parsed;
}

function parseList(
  rawValue: string | undefined,
  envName: string,
  defaultValue: string[]
): string[] {
  if (!rawValue) return defaultValue;

  const values = rawValue
    .split(",")
    .map((value) => value.trim().toUpperCase())
    .filter((value) => value.length > 0);
  if (values.length === 0) {
    throw new Error(`${envName} must list at least one value`);
  }

  return [...new Set(values)];
}

function parseBoolean(
  rawValue: string | undefined,
  envName: string,
  defaultValue: boolean
): boolean {
  if (!rawValue) return defaultValue;

  const normalized = rawValue.trim().toLowerCase();
  if (["1", "true", "yes"].includes(normalized)) return true;
  if (["0", "false", "no"].includes(normalized)) return false;

  throw new Error(`${envName} must be true or false`);
}

function parseProviderKind(
  rawValue: string | undefined
): InvoiceProviderConfig["provider"] {
  if (!rawValue) return DEFAULT_PROVIDER;

  const normalized = rawValue.trim().toLowerCase();
  if (normalized === "xendit") return "xendit";
  if (normalized === "simulated") return "simulated";

  throw new Error("CHECKOUT_PROVIDER must be one of: xendit, simulated");
}

function parseBaseUrl(rawValue: string | undefined, port: number): string {
  const value = rawValue?.trim() || `http://localhost:${port}`;
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`CHECKOUT_SERVER_URL must be an absolute URL, got '${value}'`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error("CHECKOUT_SERVER_URL must use http or https");
  }
  return parsed.toString().replace(/\/+$/, "");
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const port = parsePositiveInteger(
    env.CHECKOUT_SERVER_PORT,
    "CHECKOUT_SERVER_PORT",
    DEFAULT_PORT
  );
  const baseUrl = parseBaseUrl(env.CHECKOUT_SERVER_URL, port);
  const providerKind = parseProviderKind(env.CHECKOUT_PROVIDER);
  const secretKey = env.XENDIT_SECRET_KEY?.trim() || undefined;

  if (providerKind === "xendit" && !secretKey) {
    throw new Error("XENDIT_SECRET_KEY is required when CHECKOUT_PROVIDER=xendit");
  }

  const fees: FeeSchedule = {
    supportedCurrencies: parseList(
      env.CHECKOUT_SUPPORTED_CURRENCIES,
      "CHECKOUT_SUPPORTED_CURRENCIES",
      DEFAULT_SUPPORTED_CURRENCIES
    ),
    baseFeeMinor: parseNonNegativeInteger(
      env.CHECKOUT_BASE_FEE_MINOR,
      "CHECKOUT_BASE_FEE_MINOR",
      DEFAULT_BASE_FEE_MINOR
    ),
    rateBps: parseFeeRateBps(env.CHECKOUT_FEE_RATE_BPS),
    roundingStepMinor: parsePositiveInteger(
      env.CHECKOUT_FEE_ROUNDING_STEP_MINOR,
      "CHECKOUT_FEE_ROUNDING_STEP_MINOR",
      DEFAULT_FEE_ROUNDING_STEP_MINOR
    ),
  };

  const statusMapping: InvoiceStatusMapping = {
    paidStatuses: parseList(
      env.CHECKOUT_PAID_STATUSES,
      "CHECKOUT_PAID_STATUSES",
      DEFAULT_PAID_STATUSES
    ),
    failedStatuses: parseList(
      env.CHECKOUT_FAILED_STATUSES,
      "CHECKOUT_FAILED_STATUSES",
      DEFAULT_FAILED_STATUSES
    ),
  };

  return {
    port,
    baseUrl,
    dbPath: env.CHECKOUT_DB_PATH?.trim() || DEFAULT_DB_PATH,
    provider: {
      provider: providerKind,
      apiUrl: (env.XENDIT_API_URL?.trim() || DEFAULT_XENDIT_API_URL).replace(/\/+$/, ""),
      secretKey,
      timeoutMs: parsePositiveInteger(
        env.CHECKOUT_PROVIDER_TIMEOUT_MS,
        "CHECKOUT_PROVIDER_TIMEOUT_MS",
        DEFAULT_PROVIDER_TIMEOUT_MS
      ),
      simulatedCheckoutUrl: `${baseUrl}/simulated-invoices`,
    },
    checkout: {
      gatewayName: env.CHECKOUT_GATEWAY_NAME?.trim() || DEFAULT_GATEWAY_NAME,
      baseUrl,
      confirmPath: DEFAULT_CONFIRM_PATH,
      successPath: env.CHECKOUT_SUCCESS_PATH?.trim() || DEFAULT_SUCCESS_PATH,
      failurePath: env.CHECKOUT_FAILURE_PATH?.trim() || DEFAULT_FAILURE_PATH,
      paymentRequestDoctype:
        env.CHECKOUT_PAYMENT_REQUEST_DOCTYPE?.trim() ||
        DEFAULT_PAYMENT_REQUEST_DOCTYPE,
      fees,
      statusMapping,
      invoiceDurationSeconds: parsePositiveInteger(
        env.CHECKOUT_INVOICE_DURATION_SECONDS,
        "CHECKOUT_INVOICE_DURATION_SECONDS",
        DEFAULT_INVOICE_DURATION_SECONDS
      ),
      sendInvoiceEmail: parseBoolean(
        env.CHECKOUT_SEND_INVOICE_EMAIL,
        "CHECKOUT_SEND_INVOICE_EMAIL",
        true
      ),
    },
  };
}
