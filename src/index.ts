#!/usr/bin/env node
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { loadConfig } from "./config.js";
import { createOrchestrator, startServer, VERSION } from "./server/index.js";

const HELP = `hosted-checkout — Hosted invoice checkout and payment reconciliation

USAGE:
  hosted-checkout serve [--port N]     Start the HTTP server
  hosted-checkout verify-credentials   Check the provider API key with a cheap list call
  hosted-checkout --help               Show this help message
  hosted-checkout --version            Show version

CONFIGURATION (environment):
  XENDIT_SECRET_KEY                 Provider secret key (required for CHECKOUT_PROVIDER=xendit)
  CHECKOUT_PROVIDER                 xendit | simulated (default: xendit)
  CHECKOUT_SERVER_URL               Public base URL used for redirects
  CHECKOUT_SERVER_PORT              Port to listen on (default: 3141)
  CHECKOUT_DB_PATH                  SQLite database path (default: data/hosted-checkout.db)
  CHECKOUT_SUPPORTED_CURRENCIES     Comma-separated allow-list (default: IDR)
  CHECKOUT_BASE_FEE_MINOR           Flat gateway fee (default: 2000)
  CHECKOUT_FEE_RATE_BPS             Percentage fee in basis points (default: 290)
  CHECKOUT_PAID_STATUSES            Provider statuses treated as paid (default: PAID,SETTLED)
  CHECKOUT_FAILED_STATUSES          Provider statuses treated as failed (default: EXPIRED)`;

function readVersion(): string {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = dirname(__filename);
    const pkg: unknown = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf8"));
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return VERSION;
  } catch {
    return VERSION;
  }
}

function parsePort(args: string[]): number | undefined {
  const index = args.indexOf("--port");
  if (index === -1) return undefined;

  const port = Number(args[index + 1]);
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error("--port must be a positive integer");
  }
  return port;
}

async function verifyCredentials(): Promise<number> {
  const { orchestrator } = createOrchestrator(loadConfig());
  const check = await orchestrator.verifyCredentials();
  if (check.ok) {
    console.log(`${orchestrator.gatewayName} credentials OK (${check.invoiceCount} invoices visible)`);
    return 0;
  }
  console.error(
    `Something went wrong in validating ${orchestrator.gatewayName} credentials: ${check.kind}: ${check.message}`
  );
  return 1;
}

async function main(args: string[]): Promise<number> {
  if (args.includes("--help") || args.includes("-h")) {
    console.log(HELP);
    return 0;
  }
  if (args.includes("--version") || args.includes("-v")) {
    console.log(readVersion());
    return 0;
  }

  const [command = "serve"] = args;
  if (command === "serve") {
    const port = parsePort(args);
    startServer(loadConfig(), port ? { port } : {});
    return 0;
  }
  if (command === "verify-credentials") {
    return verifyCredentials();
  }

  console.error(`Unknown command '${command}'. Run hosted-checkout --help for usage.`);
  return 1;
}

main(process.argv.slice(2))
  .then((code) => {
    if (code !== 0) process.exit(code);
  })
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
