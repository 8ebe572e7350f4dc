/**
 * Hosted checkout HTTP server.
 *
 * A small Express server that handles:
 * - Invoice creation for payment requests (POST /checkout)
 * - The provider's redirect-back confirmation (GET /confirm_payment)
 * - Payment success / failure result pages
 *
 * Run: npx hosted-checkout serve [--port 3141]
 */

import express, { type Express } from "express";
import type { Config } from "../config.js";
import { CheckoutOrchestrator } from "../services/checkout/orchestrator.js";
import { createDocumentPaymentHandler } from "../services/checkout/payment-handler.js";
import { SqliteCheckoutTokenStore } from "../services/checkout/store.js";
import { SqliteDocumentStore } from "../services/documents/store.js";
import { createInvoiceProvider } from "../services/invoice-provider/provider.js";
import { SimulatedInvoiceProvider } from "../services/invoice-provider/simulated.js";
import { openDatabase } from "./db.js";
import { createRoutes } from "./routes.js";

export const VERSION = "0.1.0";

export function createApp(
  orchestrator: CheckoutOrchestrator,
  config: Pick<Config, "checkout">,
  simulatedProvider?: SimulatedInvoiceProvider
): Express {
  const app = express();

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      version: VERSION,
      gateway: orchestrator.gatewayName,
      provider: orchestrator.providerName,
    });
  });

  app.use(express.json());
  app.use(
    createRoutes(orchestrator, {
      baseUrl: config.checkout.baseUrl,
      confirmPath: config.checkout.confirmPath,
      successPath: config.checkout.successPath,
      failurePath: config.checkout.failurePath,
      ...(simulatedProvider ? { simulatedProvider } : {}),
    })
  );

  return app;
}

export function createOrchestrator(config: Config): {
  orchestrator: CheckoutOrchestrator;
  simulatedProvider?: SimulatedInvoiceProvider;
} {
  const db = openDatabase(config.dbPath);
  const documents = new SqliteDocumentStore(db);
  const provider = createInvoiceProvider(config.provider);

  const orchestrator = new CheckoutOrchestrator({
    settings: config.checkout,
    store: new SqliteCheckoutTokenStore(db),
    provider,
    documents,
    onPaymentAuthorized: createDocumentPaymentHandler(documents),
  });

  return provider instanceof SimulatedInvoiceProvider
    ? { orchestrator, simulatedProvider: provider }
    : { orchestrator };
}

export function startServer(config: Config, options: { port?: number } = {}) {
  const port = options.port ?? config.port;
  const { orchestrator, simulatedProvider } = createOrchestrator(config);
  const app = createApp(orchestrator, config, simulatedProvider);

  return app.listen(port, () => {
    console.log(`Hosted checkout server running on ${config.baseUrl}`);
    console.log(`  Gateway: ${config.checkout.gatewayName} (provider: ${orchestrator.providerName})`);
    console.log(`  Confirm endpoint: ${config.baseUrl}${config.checkout.confirmPath}?token=<token>`);
    console.log(`  Currencies: ${config.checkout.fees.supportedCurrencies.join(", ")}`);
    console.log(`  Database: ${config.dbPath}`);
  });
}
