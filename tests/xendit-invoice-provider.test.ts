import { afterEach, describe, expect, it, vi } from "vitest";
import { ProviderError } from "../src/services/invoice-provider/errors.js";
import type { CreateInvoiceInput } from "../src/services/invoice-provider/types.js";
import {
  toCreateInvoicePayload,
  XenditInvoiceProvider,
} from "../src/services/invoice-provider/xendit.js";

const originalFetch = globalThis.fetch;

function textResponse(status: number, payload: unknown, statusText = "") {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: async () => (typeof payload === "string" ? payload : JSON.stringify(payload)),
  };
}

const INVOICE_PAYLOAD = {
  id: "inv_579c8d61f23fa4ca35e52da4",
  external_id: "PR-0001",
  status: "PENDING",
  invoice_url: "https://checkout.xendit.test/web/inv_579c8d61f23fa4ca35e52da4",
  amount: 100_000,
  currency: "IDR",
  expiry_date: "2026-03-01T12:10:00.000Z",
};

const INVOICE_INPUT: CreateInvoiceInput = {
  externalId: "PR-0001",
  payerEmail: "ayu@example.com",
  description: "Payment for SO-0001",
  amount: 100_000,
  currency: "IDR",
  customer: { givenNames: "Ayu Lestari", email: "ayu@example.com" },
  fees: [{ type: "GATEWAY", value: 4000 }],
  items: [{ name: "COFFEE-BEANS", price: 50_000, quantity: 2 }],
  successRedirectUrl: "https://shop.example.com/confirm_payment?token=PR-0001",
  failureRedirectUrl: "https://shop.example.com/confirm_payment?token=PR-0001",
  shouldSendEmail: true,
  invoiceDurationSeconds: 600,
};

function createProvider() {
  return new XenditInvoiceProvider({
    apiUrl: "https://api.xendit.test",
    secretKey: "test-secret",
    timeoutMs: 1000,
  });
}

function installFetch(impl: (url: string, init?: RequestInit) => Promise<unknown>) {
  const fetchMock = vi.fn(impl);
  globalThis.fetch = fetchMock as unknown as typeof fetch;
  return fetchMock;
}

afterEach(() => {
  vi.restoreAllMocks();
  globalThis.fetch = originalFetch;
});

describe("toCreateInvoicePayload", () => {
  it("maps the invoice input onto the API field names", () => {
    expect(toCreateInvoicePayload(INVOICE_INPUT)).toEqual({
      external_id: "PR-0001",
      payer_email: "ayu@example.com",
      description: "Payment for SO-0001",
      amount: 100_000,
      currency: "IDR",
      customer: { given_names: "Ayu Lestari", email: "ayu@example.com" },
      fees: [{ type: "GATEWAY", value: 4000 }],
      items: [{ name: "COFFEE-BEANS", price: 50_000, quantity: 2 }],
      success_redirect_url: "https://shop.example.com/confirm_payment?token=PR-0001",
      failure_redirect_url: "https://shop.example.com/confirm_payment?token=PR-0001",
      should_send_email: true,
      invoice_duration: 600,
    });
  });

  it("includes the mobile number only when present", () => {
    const payload = toCreateInvoicePayload({
      ...INVOICE_INPUT,
      customer: { ...INVOICE_INPUT.customer, mobileNumber: "+628123456789" },
    });

    expect(payload.customer).toEqual({
      given_names: "Ayu Lestari",
      email: "ayu@example.com",
      mobile_number: "+628123456789",
    });
  });
});

describe("XenditInvoiceProvider", () => {
  it("creates invoices with basic auth", async () => {
    const fetchMock = installFetch(async () => textResponse(200, INVOICE_PAYLOAD));

    const invoice = await createProvider().createInvoice(INVOICE_INPUT);

    expect(invoice).toEqual({
      id: "inv_579c8d61f23fa4ca35e52da4",
      externalId: "PR-0001",
      status: "PENDING",
      invoiceUrl: "https://checkout.xendit.test/web/inv_579c8d61f23fa4ca35e52da4",
      amount: 100_000,
      currency: "IDR",
      raw: INVOICE_PAYLOAD,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const call = fetchMock.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe("https://api.xendit.test/v2/invoices");
    expect(init?.method).toBe("POST");
    expect(new Headers(init?.headers).get("Authorization")).toBe("Basic dGVzdC1zZWNyZXQ6");
    expect(JSON.parse(String(init?.body))).toEqual(toCreateInvoicePayload(INVOICE_INPUT));
  });

  it("fetches a single invoice by id", async () => {
    const fetchMock = installFetch(async () =>
      textResponse(200, { ...INVOICE_PAYLOAD, status: "PAID" })
    );

    const invoice = await createProvider().getInvoice("inv/579");

    expect(invoice.status).toBe("PAID");
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://api.xendit.test/v2/invoices/inv%2F579");
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe("GET");
  });

  it("lists invoices", async () => {
    installFetch(async () =>
      textResponse(200, [INVOICE_PAYLOAD, { ...INVOICE_PAYLOAD, id: "inv_2", external_id: "PR-0002" }])
    );

    const invoices = await createProvider().listInvoices();

    expect(invoices.map((invoice) => invoice.id)).toEqual(["inv_579c8d61f23fa4ca35e52da4", "inv_2"]);
  });

  it("classifies rejected credentials as auth errors", async () => {
    installFetch(async () =>
      textResponse(401, { error_code: "INVALID_API_KEY", message: "API key is invalid" }, "Unauthorized")
    );

    const error = await createProvider().listInvoices().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      kind: "auth",
      statusCode: 401,
      message: "Xendit API error: INVALID_API_KEY: API key is invalid",
    });
  });

  it("falls back to the HTTP status when the error body is not JSON", async () => {
    installFetch(async () => textResponse(503, "<html>down</html>", "Service Unavailable"));

    await expect(createProvider().getInvoice("inv_1")).rejects.toMatchObject({
      kind: "unavailable",
      statusCode: 503,
      message: "Xendit API error: 503 Service Unavailable",
    });
  });

  it("classifies validation failures as rejected", async () => {
    installFetch(async () =>
      textResponse(400, { error_code: "API_VALIDATION_ERROR", message: "amount is required" })
    );

    await expect(createProvider().createInvoice(INVOICE_INPUT)).rejects.toMatchObject({
      kind: "rejected",
      statusCode: 400,
    });
  });

  it("reports network failures", async () => {
    installFetch(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(createProvider().getInvoice("inv_1")).rejects.toMatchObject({
      kind: "network",
      message: "Could not reach Xendit: fetch failed",
    });
  });

  it("reports timeouts", async () => {
    installFetch(async () => {
      const err = new Error("The operation was aborted due to timeout");
      err.name = "TimeoutError";
      throw err;
    });

    await expect(createProvider().getInvoice("inv_1")).rejects.toMatchObject({
      kind: "timeout",
      message: "Xendit did not respond within 1000ms",
    });
  });

  it("rejects invoice payloads missing required fields", async () => {
    installFetch(async () => textResponse(200, { id: "inv_1", status: "PENDING" }));

    await expect(createProvider().getInvoice("inv_1")).rejects.toMatchObject({
      kind: "malformed_response",
    });
  });

  it("rejects empty success bodies", async () => {
    installFetch(async () => textResponse(200, ""));

    await expect(createProvider().getInvoice("inv_1")).rejects.toMatchObject({
      kind: "malformed_response",
      message: "Xendit returned an empty or non-JSON response",
    });
  });

  it("requires a secret key", () => {
    expect(
      () => new XenditInvoiceProvider({ apiUrl: "https://api.xendit.test", secretKey: " ", timeoutMs: 1000 })
    ).toThrow("A Xendit secret key is required");
  });
});
