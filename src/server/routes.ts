/**
 * Express routes for the hosted checkout service.
 *
 * POST /checkout                    — Create a provider invoice, returns its hosted URL
 * GET  /confirm_payment?token=...   — Provider redirect-back; always answers with a redirect
 * GET  /payment-success             — Result page after a confirmed payment
 * GET  /payment-failed              — Result page when payment is missing or failed
 * GET  /simulated-invoices/:id/pay  — Pays a simulated invoice (simulated provider only)
 */

import { Router, Request, Response } from "express";
import { CheckoutError, type CheckoutErrorCode } from "../services/checkout/errors.js";
import type { CheckoutOrchestrator } from "../services/checkout/orchestrator.js";
import { buildRedirectUrl, isSameOriginTarget } from "../services/checkout/redirect.js";
import { ProviderError } from "../services/invoice-provider/errors.js";
import type { SimulatedInvoiceProvider } from "../services/invoice-provider/simulated.js";

export interface CheckoutRouteOptions {
  baseUrl: string;
  confirmPath: string;
  successPath: string;
  failurePath: string;
  simulatedProvider?: SimulatedInvoiceProvider;
}

const STATUS_BY_CODE: Record<CheckoutErrorCode, number> = {
  INVALID_CHECKOUT_REQUEST: 400,
  UNSUPPORTED_CURRENCY: 400,
  INVALID_REFERENCE: 422,
  ALREADY_SETTLED: 409,
  PROVIDER_UNAVAILABLE: 502,
  UNKNOWN_TOKEN: 404,
};

function escapeHtml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function routePath(path: string): string {
  const withoutQuery = path.split("?")[0] ?? path;
  return withoutQuery.startsWith("/") ? withoutQuery : `/${withoutQuery}`;
}

function renderResultPage(input: {
  title: string;
  heading: string;
  body: string;
  color: string;
  message?: string;
  continueUrl?: string;
}): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(input.title)}</title>
  <style>
    body { font-family: -apple-system, system-ui, sans-serif; max-width: 640px; margin: 60px auto; padding: 0 20px; color: #1a1a1a; line-height: 1.6; }
    h1 { color: ${input.color}; }
    .message { background: #f4f4f4; border-radius: 8px; padding: 12px 16px; }
  </style>
</head>
<body>
  <h1>${escapeHtml(input.heading)}</h1>
  <p>${escapeHtml(input.body)}</p>
  ${input.message ? `<p class="message">${escapeHtml(input.message)}</p>` : ""}
  ${input.continueUrl ? `<p><a href="${escapeHtml(input.continueUrl)}">Continue</a></p>` : ""}
</body>
</html>`;
}

export function createRoutes(
  orchestrator: CheckoutOrchestrator,
  options: CheckoutRouteOptions
): Router {
  const router = Router();

  function continueUrl(req: Request): string | undefined {
    const redirectTo = queryString(req.query.redirect_to);
    if (!redirectTo || !isSameOriginTarget(options.baseUrl, redirectTo)) {
      return undefined;
    }
    return buildRedirectUrl({ baseUrl: options.baseUrl, path: redirectTo });
  }

  /**
   * POST /checkout
   * Body: CheckoutRequest JSON
   * Returns: { token, url, providerInvoiceId, fee }
   */
  router.post("/checkout", async (req: Request, res: Response) => {
    try {
      const session = await orchestrator.requestCheckout(req.body);
      res.json({
        token: session.token,
        url: session.invoiceUrl,
        providerInvoiceId: session.providerInvoiceId,
        fee: session.fee,
      });
    } catch (err) {
      if (err instanceof CheckoutError) {
        res.status(STATUS_BY_CODE[err.code]).json({ error: err.code, message: err.message });
        return;
      }
      const msg = err instanceof Error ? err.message : String(err);
      console.error("Checkout error:", msg);
      res.status(500).json({ error: "INTERNAL_ERROR", message: "An unexpected error occurred" });
    }
  });

  /**
   * GET /confirm_payment?token=...
   * Guest-accessible. Payers only ever see a redirect from here.
   */
  router.get(routePath(options.confirmPath), async (req: Request, res: Response) => {
    const result = await orchestrator.confirm(queryString(req.query.token));
    res.redirect(302, result.redirectUrl);
  });

  router.get(routePath(options.successPath), (req: Request, res: Response) => {
    const referenceId = queryString(req.query.reference_id);
    res.setHeader("Content-Type", "text/html");
    res.send(
      renderResultPage({
        title: "Payment Successful",
        heading: "Payment Successful",
        body: referenceId
          ? `Your payment for ${referenceId} was received.`
          : "Your payment was received.",
        color: "#2d6a4f",
        message: queryString(req.query.redirect_message),
        continueUrl: continueUrl(req),
      })
    );
  });

  router.get(routePath(options.failurePath), (req: Request, res: Response) => {
    res.setHeader("Content-Type", "text/html");
    res.send(
      renderResultPage({
        title: "Payment Not Completed",
        heading: "Payment Not Completed",
        body: "We could not confirm your payment. If you were charged, it will be reconciled shortly.",
        color: "#9b2226",
        message: queryString(req.query.redirect_message),
        continueUrl: continueUrl(req),
      })
    );
  });

  const simulated = options.simulatedProvider;
  if (simulated) {
    router.get("/simulated-invoices/:id/pay", (req: Request, res: Response) => {
      try {
        res.redirect(302, simulated.markPaid(String(req.params.id)));
      } catch (err) {
        if (err instanceof ProviderError && err.kind === "not_found") {
          res.status(404).type("text/plain").send("Invoice not found");
          return;
        }
        throw err;
      }
    });
  }

  return router;
}
