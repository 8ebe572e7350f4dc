import type Database from "better-sqlite3";
import type {
  CheckoutRequestLogEntry,
  CheckoutStatus,
  CheckoutTokenRecord,
  NewCheckoutToken,
} from "./types.js";

export interface CheckoutTokenStore {
  get(token: string): CheckoutTokenRecord | undefined;
  /** Inserts a Pending token, replacing any previous checkout for the same token. */
  save(record: NewCheckoutToken): CheckoutTokenRecord;
  recordObservation(token: string, rawOutput: Record<string, unknown>): void;
  /**
   * Conditional update: only moves the token when it is currently in `from`.
   * Returns false when another confirmation got there first.
   */
  transitionStatus(
    token: string,
    from: CheckoutStatus,
    to: CheckoutStatus,
    rawOutput?: Record<string, unknown>
  ): boolean;
  logRequest(entry: Omit<CheckoutRequestLogEntry, "id" | "createdAt">): CheckoutRequestLogEntry;
  listRequests(token: string): CheckoutRequestLogEntry[];
}

interface CheckoutTokenRow {
  token: string;
  provider_invoice_id: string;
  status: CheckoutStatus;
  raw_output: string;
  reference_type: string;
  reference_id: string;
  redirect_to: string | null;
  redirect_message: string | null;
  created_at: string;
  updated_at: string;
}

interface CheckoutRequestLogRow {
  id: number;
  token: string;
  service_name: string;
  request_data: string;
  output: string;
  created_at: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function parseJsonObject(raw: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error("Stored checkout payload is not a JSON object");
  }
  return parsed;
}

function toRecord(row: CheckoutTokenRow): CheckoutTokenRecord {
  return {
    token: row.token,
    providerInvoiceId: row.provider_invoice_id,
    status: row.status,
    rawOutput: parseJsonObject(row.raw_output),
    referenceType: row.reference_type,
    referenceId: row.reference_id,
    ...(row.redirect_to ? { redirectTo: row.redirect_to } : {}),
    ...(row.redirect_message ? { redirectMessage: row.redirect_message } : {}),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toLogEntry(row: CheckoutRequestLogRow): CheckoutRequestLogEntry {
  return {
    id: row.id,
    token: row.token,
    serviceName: row.service_name,
    requestData: parseJsonObject(row.request_data),
    output: parseJsonObject(row.output),
    createdAt: row.created_at,
  };
}

export class SqliteCheckoutTokenStore implements CheckoutTokenStore {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => Date = () => new Date()
  ) {}

  get(token: string): CheckoutTokenRecord | undefined {
    const row = this.db
      .prepare("SELECT * FROM checkout_tokens WHERE token = ?")
      .get(token) as CheckoutTokenRow | undefined;
    return row ? toRecord(row) : undefined;
  }

  save(record: NewCheckoutToken): CheckoutTokenRecord {
    const timestamp = this.now().toISOString();
    this.db
      .prepare(
        `INSERT INTO checkout_tokens (
           token, provider_invoice_id, status, raw_output, reference_type, reference_id,
           redirect_to, redirect_message, created_at, updated_at
         ) VALUES (?, ?, 'Pending', ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(token) DO UPDATE SET
           provider_invoice_id = excluded.provider_invoice_id,
           status = 'Pending',
           raw_output = excluded.raw_output,
           reference_type = excluded.reference_type,
           reference_id = excluded.reference_id,
           redirect_to = excluded.redirect_to,
           redirect_message = excluded.redirect_message,
           created_at = excluded.created_at,
           updated_at = excluded.updated_at`
      )
      .run(
        record.token,
        record.providerInvoiceId,
        JSON.stringify(record.rawOutput),
        record.referenceType,
        record.referenceId,
        record.redirectTo ?? null,
        record.redirectMessage ?? null,
        timestamp,
        timestamp
      );

    const saved = this.get(record.token);
    if (!saved) {
      throw new Error(`Checkout token '${record.token}' was not persisted`);
    }
    return saved;
  }

  recordObservation(token: string, rawOutput: Record<string, unknown>): void {
    this.db
      .prepare("UPDATE checkout_tokens SET raw_output = ?, updated_at = ? WHERE token = ?")
      .run(JSON.stringify(rawOutput), this.now().toISOString(), token);
  }

  transitionStatus(
    token: string,
    from: CheckoutStatus,
    to: CheckoutStatus,
    rawOutput?: Record<string, unknown>
  ): boolean {
    const timestamp = this.now().toISOString();
    const result = rawOutput
      ? this.db
          .prepare(
            "UPDATE checkout_tokens SET status = ?, raw_output = ?, updated_at = ? WHERE token = ? AND status = ?"
          )
          .run(to, JSON.stringify(rawOutput), timestamp, token, from)
      : this.db
          .prepare(
            "UPDATE checkout_tokens SET status = ?, updated_at = ? WHERE token = ? AND status = ?"
          )
          .run(to, timestamp, token, from);
    return result.changes === 1;
  }

  logRequest(
    entry: Omit<CheckoutRequestLogEntry, "id" | "createdAt">
  ): CheckoutRequestLogEntry {
    const result = this.db
      .prepare(
        "INSERT INTO checkout_request_log (token, service_name, request_data, output, created_at) VALUES (?, ?, ?, ?, ?)"
      )
      .run(
        entry.token,
        entry.serviceName,
        JSON.stringify(entry.requestData),
        JSON.stringify(entry.output),
        this.now().toISOString()
      );
    const row = this.db
      .prepare("SELECT * FROM checkout_request_log WHERE id = ?")
      .get(result.lastInsertRowid) as CheckoutRequestLogRow;
    return toLogEntry(row);
  }

  listRequests(token: string): CheckoutRequestLogEntry[] {
    const rows = this.db
      .prepare("SELECT * FROM checkout_request_log WHERE token = ? ORDER BY id ASC")
      .all(token) as CheckoutRequestLogRow[];
    return rows.map(toLogEntry);
  }
}
