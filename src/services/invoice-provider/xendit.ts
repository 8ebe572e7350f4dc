/**
 * Xendit invoice API client.
 *
 * Creates hosted invoices and looks them up again for reconciliation.
 * Authentication is HTTP Basic with the secret API key as user name and an
 * empty password. Every failure surfaces as a ProviderError; nothing is
 * retried here.
 *
 * API base: https://api.xendit.co
 * Docs: https://developers.xendit.co/api-reference/#invoices
 */

import { z } from "zod";
import { ProviderError, providerErrorKindForStatus } from "./errors.js";
import type {
  CreateInvoiceInput,
  Invoice,
  InvoiceProvider,
} from "./types.js";

const invoicePayloadSchema = z
  .object({
    id: z.string().min(1),
    external_id: z.string(),
    status: z.string().min(1),
    invoice_url: z.string().url(),
    amount: z.number(),
    currency: z.string().optional(),
  })
  .passthrough();

const errorPayloadSchema = z
  .object({
    error_code: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

export interface XenditInvoiceProviderOptions {
  apiUrl: string;
  secretKey: string;
  timeoutMs: number;
}

function toInvoice(payload: z.infer<typeof invoicePayloadSchema>): Invoice {
  return {
    id: payload.id,
    externalId: payload.external_id,
    status: payload.status,
    invoiceUrl: payload.invoice_url,
    amount: payload.amount,
    ...(payload.currency ? { currency: payload.currency } : {}),
    raw: payload,
  };
}

function parseBody(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function describeFailure(status: number, statusText: string, body: unknown): string {
  const parsed = errorPayloadSchema.safeParse(body);
  if (parsed.success && (parsed.data.error_code || parsed.data.message)) {
    return [parsed.data.error_code, parsed.data.message].filter(Boolean).join(": ");
  }
  return `${status} ${statusText}`.trim();
}

export function toCreateInvoicePayload(input: CreateInvoiceInput): Record<string, unknown> {
  return {
    external_id: input.externalId,
    payer_email: input.payerEmail,
    description: input.description,
    amount: input.amount,
    currency: input.currency,
    customer: {
      given_names: input.customer.givenNames,
      email: input.customer.email,
      ...(input.customer.mobileNumber
        ? { mobile_number: input.customer.mobileNumber }
        : {}),
    },
    fees: input.fees.map((fee) => ({ type: fee.type, value: fee.value })),
    items: input.items.map((item) => ({
      name: item.name,
      price: item.price,
      quantity: item.quantity,
    })),
    success_redirect_url: input.successRedirectUrl,
    failure_redirect_url: input.failureRedirectUrl,
    should_send_email: input.shouldSendEmail,
    invoice_duration: input.invoiceDurationSeconds,
  };
}

export class XenditInvoiceProvider implements InvoiceProvider {
  name = "xendit";
  private readonly authorization: string;

  constructor(private readonly options: XenditInvoiceProviderOptions) {
    const secretKey = options.secretKey.trim();
    if (!secretKey) {
      throw new Error("A Xendit secret key is required");
    }
    this.authorization = `Basic ${Buffer.from(`${secretKey}:`).toString("base64")}`;
  }

  private async request(path: string, init: { method: "GET" | "POST"; body?: unknown }): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.options.apiUrl}${path}`, {
        method: init.method,
        headers: {
          Authorization: this.authorization,
          Accept: "application/json",
          ...(init.body !== undefined ? { "Content-Type": "application/json" } : {}),
        },
        ...(init.body !== undefined ? { body: JSON.stringify(init.body) } : {}),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      const isTimeout = err instanceof Error && err.name === "TimeoutError";
      throw new ProviderError(
        isTimeout ? "timeout" : "network",
        isTimeout
          ? `Xendit did not respond within ${this.options.timeoutMs}ms`
          : `Could not reach Xendit: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }

    const body = parseBody(await response.text());
    if (!response.ok) {
      throw new ProviderError(
        providerErrorKindForStatus(response.status),
        `Xendit API error: ${describeFailure(response.status, response.statusText, body)}`,
        { statusCode: response.status }
      );
    }
    if (body === undefined) {
      throw new ProviderError(
        "malformed_response",
        "Xendit returned an empty or non-JSON response",
        { statusCode: response.status }
      );
    }
    return body;
  }

  private parseInvoice(body: unknown): Invoice {
    const parsed = invoicePayloadSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(
        "malformed_response",
        `Unexpected invoice payload from Xendit: ${parsed.error.issues[0]?.message ?? "invalid"}`
      );
    }
    return toInvoice(parsed.data);
  }

  async createInvoice(input: CreateInvoiceInput): Promise<Invoice> {
    const body = await this.request("/v2/invoices", {
      method: "POST",
      body: toCreateInvoicePayload(input),
    });
    return this.parseInvoice(body);
  }

  async getInvoice(invoiceId: string): Promise<Invoice> {
    const body = await this.request(`/v2/invoices/${encodeURIComponent(invoiceId)}`, {
      method: "GET",
    });
    return this.parseInvoice(body);
  }

  async listInvoices(): Promise<Invoice[]> {
    const body = await this.request("/v2/invoices", { method: "GET" });
    if (!Array.isArray(body)) {
      throw new ProviderError("malformed_response", "Expected a list of invoices from Xendit");
    }
    return body.map((entry) => this.parseInvoice(entry));
  }
}
