/**
 * SQLite database for checkout tokens and the documents they settle.
 *
 * Tables:
 * - checkout_tokens: one row per reference record, linking it to the
 *   provider invoice and tracking Pending/Completed/Failed
 * - checkout_request_log: every invoice created, kept after a token row is
 *   superseded by a newer checkout
 * - documents: generic JSON documents (payment requests, sales orders,
 *   customers) owned by the merchant's record system
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";

export const IN_MEMORY_DB_PATH = ":memory:";

export function openDatabase(dbPath = "data/hosted-checkout.db"): Database.Database {
  if (dbPath !== IN_MEMORY_DB_PATH) {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  db.exec(`
    CREATE TABLE IF NOT EXISTS checkout_tokens (
      token TEXT PRIMARY KEY,
      provider_invoice_id TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'Pending' CHECK(status IN ('Pending', 'Completed', 'Failed')),
      raw_output TEXT NOT NULL,
      reference_type TEXT NOT NULL,
      reference_id TEXT NOT NULL,
      redirect_to TEXT,
      redirect_message TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_checkout_tokens_reference ON checkout_tokens(reference_type, reference_id);
    CREATE INDEX IF NOT EXISTS idx_checkout_tokens_status ON checkout_tokens(status);

    CREATE TABLE IF NOT EXISTS checkout_request_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      token TEXT NOT NULL,
      service_name TEXT NOT NULL,
      request_data TEXT NOT NULL,
      output TEXT NOT NULL,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_checkout_request_log_token ON checkout_request_log(token);

    CREATE TABLE IF NOT EXISTS documents (
      doctype TEXT NOT NULL,
      name TEXT NOT NULL,
      data TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (doctype, name)
    );
  `);

  return db;
}
