/**
 * Generic document persistence for the merchant's business records.
 *
 * Payment requests, sales orders and customers live here as JSON keyed by
 * (doctype, name). The checkout flow only reads them, plus one status update
 * when a payment is authorized.
 */

import type Database from "better-sqlite3";

export type DocumentData = Record<string, unknown>;

export interface DocumentStore {
  get(doctype: string, name: string): DocumentData | undefined;
  put(doctype: string, name: string, data: DocumentData): void;
  /** Shallow-merges `patch` into an existing document. Returns false when it does not exist. */
  update(doctype: string, name: string, patch: DocumentData): boolean;
}

interface DocumentRow {
  data: string;
}

function isDocumentData(value: unknown): value is DocumentData {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export class SqliteDocumentStore implements DocumentStore {
  constructor(private readonly db: Database.Database) {}

  get(doctype: string, name: string): DocumentData | undefined {
    const row = this.db
      .prepare("SELECT data FROM documents WHERE doctype = ? AND name = ?")
      .get(doctype, name) as DocumentRow | undefined;
    if (!row) return undefined;

    const parsed: unknown = JSON.parse(row.data);
    if (!isDocumentData(parsed)) {
      throw new Error(`Document ${doctype}/${name} is not a JSON object`);
    }
    return parsed;
  }

  put(doctype: string, name: string, data: DocumentData): void {
    this.db
      .prepare(
        `INSERT INTO documents (doctype, name, data, updated_at) VALUES (?, ?, ?, datetime('now'))
         ON CONFLICT(doctype, name) DO UPDATE SET data = excluded.data, updated_at = excluded.updated_at`
      )
      .run(doctype, name, JSON.stringify({ ...data, name }));
  }

  update(doctype: string, name: string, patch: DocumentData): boolean {
    const txn = this.db.transaction(() => {
      const existing = this.get(doctype, name);
      if (!existing) return false;
      this.put(doctype, name, { ...existing, ...patch });
      return true;
    });
    return txn();
  }
}
