import type { Server } from "node:http";
import type { Express } from "express";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../src/server/index.js";
import { ProviderError } from "../src/services/invoice-provider/errors.js";
import {
  checkoutRequest,
  checkoutSettings,
  createCheckoutHarness,
  FAILURE_URL,
  SUCCESS_URL,
} from "./checkout-fixtures.js";

const servers: Server[] = [];

function listen(app: Express): Promise<string> {
  return new Promise((resolve) => {
    const server = app.listen(0, "127.0.0.1", () => {
      const address = server.address();
      const port = typeof address === "object" && address ? address.port : 0;
      resolve(`http://127.0.0.1:${port}`);
    });
    servers.push(server);
  });
}

async function startHarness() {
  const harness = createCheckoutHarness();
  const app = createApp(harness.orchestrator, { checkout: checkoutSettings() }, harness.provider);
  return { ...harness, url: await listen(app) };
}

function postCheckout(url: string, body: unknown) {
  return fetch(`${url}/checkout`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await Promise.all(
    servers.splice(0).map(
      (server) =>
        new Promise<void>((resolve, reject) => {
          server.close((err) => (err ? reject(err) : resolve()));
        })
    )
  );
});

describe("GET /health", () => {
  it("reports the gateway and provider", async () => {
    const { url } = await startHarness();

    const res = await fetch(`${url}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "ok",
      version: "0.1.0",
      gateway: "Xendit",
      provider: "simulated",
    });
  });
});

describe("POST /checkout", () => {
  it("returns the hosted invoice URL", async () => {
    const { url, store } = await startHarness();

    const res = await postCheckout(url, checkoutRequest());

    expect(res.status).toBe(200);
    const record = store.get("PR-0001");
    expect(record?.status).toBe("Pending");
    expect(await res.json()).toMatchObject({
      token: "PR-0001",
      url: `https://shop.example.com/simulated-invoices/${record?.providerInvoiceId}/pay`,
      providerInvoiceId: record?.providerInvoiceId,
      fee: { currency: "IDR", totalFeeMinor: 4000 },
    });
  });

  it("answers 400 for an unsupported currency", async () => {
    const { url } = await startHarness();

    const res = await postCheckout(url, checkoutRequest({ currency: "USD" }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "UNSUPPORTED_CURRENCY",
      message:
        "Please select another payment method. This gateway does not support transactions in currency 'USD' (supported: IDR)",
    });
  });

  it("answers 400 for an invalid payload", async () => {
    const { url } = await startHarness();

    const res = await postCheckout(url, { amount: 100_000 });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: "INVALID_CHECKOUT_REQUEST" });
  });

  it("answers 422 for an unknown reference", async () => {
    const { url } = await startHarness();

    const res = await postCheckout(url, checkoutRequest({ referenceId: "PR-0404" }));

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: "INVALID_REFERENCE",
      message: "Payment Request 'PR-0404' was not found",
    });
  });

  it("answers 502 when the provider fails", async () => {
    const { url, provider } = await startHarness();
    vi.spyOn(provider, "createInvoice").mockRejectedValue(
      new ProviderError("auth", "Xendit API error: INVALID_API_KEY", { statusCode: 401 })
    );

    const res = await postCheckout(url, checkoutRequest());

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: "PROVIDER_UNAVAILABLE",
      message:
        "Failed to create invoice, please check the gateway settings (auth: Xendit API error: INVALID_API_KEY)",
    });
  });

  it("answers 409 once the checkout is paid", async () => {
    const { url, provider, orchestrator } = await startHarness();
    const session = await orchestrator.requestCheckout(checkoutRequest());
    provider.markPaid(session.providerInvoiceId);
    await orchestrator.confirm("PR-0001");

    const res = await postCheckout(url, checkoutRequest());

    expect(res.status).toBe(409);
    expect(await res.json()).toMatchObject({ error: "ALREADY_SETTLED" });
  });

  it("hides unexpected errors", async () => {
    const { url, provider } = await startHarness();
    vi.spyOn(provider, "createInvoice").mockRejectedValue(new Error("disk full"));

    const res = await postCheckout(url, checkoutRequest());

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "INTERNAL_ERROR",
      message: "An unexpected error occurred",
    });
  });
});

describe("GET /confirm_payment", () => {
  it("walks the simulated pay flow through to the success page", async () => {
    const { url, orchestrator, documents } = await startHarness();
    const session = await orchestrator.requestCheckout(checkoutRequest());

    const pay = await fetch(`${url}/simulated-invoices/${session.providerInvoiceId}/pay`, {
      redirect: "manual",
    });
    expect(pay.status).toBe(302);
    expect(pay.headers.get("location")).toBe(
      "https://shop.example.com/confirm_payment?token=PR-0001"
    );

    const confirm = await fetch(`${url}/confirm_payment?token=PR-0001`, { redirect: "manual" });
    expect(confirm.status).toBe(302);
    expect(confirm.headers.get("location")).toBe(SUCCESS_URL);
    expect(documents.get("Payment Request", "PR-0001")).toMatchObject({
      status: "Paid",
      paid_via_checkout: "PR-0001",
    });
  });

  it("redirects an unpaid checkout to the failure page", async () => {
    const { url, orchestrator } = await startHarness();
    await orchestrator.requestCheckout(checkoutRequest());

    const res = await fetch(`${url}/confirm_payment?token=PR-0001`, { redirect: "manual" });

    expect(res.status).toBe(302);
    expect(res.headers.get("location")).toBe(FAILURE_URL);
  });

  it("redirects missing and unknown tokens to the failure page", async () => {
    const { url } = await startHarness();

    const missing = await fetch(`${url}/confirm_payment`, { redirect: "manual" });
    const unknown = await fetch(`${url}/confirm_payment?token=PR-0404`, { redirect: "manual" });

    expect(missing.status).toBe(302);
    expect(missing.headers.get("location")).toBe(FAILURE_URL);
    expect(unknown.status).toBe(302);
    expect(unknown.headers.get("location")).toBe(FAILURE_URL);
  });

  it("answers 404 for an unknown simulated invoice", async () => {
    const { url } = await startHarness();

    const res = await fetch(`${url}/simulated-invoices/sim_inv_missing/pay`, { redirect: "manual" });

    expect(res.status).toBe(404);
    expect(await res.text()).toBe("Invoice not found");
  });
});

describe("result pages", () => {
  it("renders the success page with an escaped message and a continue link", async () => {
    const { url } = await startHarness();

    const res = await fetch(
      `${url}/payment-success?reference_id=PR-0001&redirect_message=%3Cb%3Ehi%3C%2Fb%3E&redirect_to=%2Forders%2FSO-0001`
    );
    const html = await res.text();

    expect(res.status).toBe(200);
    expect(html).toContain("<p>Your payment for PR-0001 was received.</p>");
    expect(html).toContain('<p class="message">&lt;b&gt;hi&lt;/b&gt;</p>');
    expect(html).toContain(
      '<p><a href="https://shop.example.com/orders/SO-0001">Continue</a></p>'
    );
  });

  it("drops off-site continue links on the failure page", async () => {
    const { url } = await startHarness();

    const res = await fetch(
      `${url}/payment-failed?redirect_to=${encodeURIComponent("https://evil.example.net/")}`
    );
    const html = await res.text();

    expect(res.status).toBe(200);
    expect(html).toContain("<h1>Payment Not Completed</h1>");
    expect(html).not.toContain("<a href=");
  });
});
