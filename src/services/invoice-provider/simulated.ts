import { randomUUID } from "node:crypto";
import { ProviderError } from "./errors.js";
import type {
  CreateInvoiceInput,
  Invoice,
  InvoiceProvider,
} from "./types.js";

interface SimulatedInvoice {
  invoice: Invoice;
  input: CreateInvoiceInput;
}

/**
 * In-memory invoice provider for local runs and tests. Invoices start
 * PENDING and only change when `markPaid` or `expire` is called.
 */
export class SimulatedInvoiceProvider implements InvoiceProvider {
  name = "simulated";
  private readonly invoices = new Map<string, SimulatedInvoice>();

  constructor(private readonly checkoutUrl = "http://localhost:3141/simulated-invoices") {}

  async createInvoice(input: CreateInvoiceInput): Promise<Invoice> {
    const id = `sim_inv_${randomUUID()}`;
    const invoiceUrl = `${this.checkoutUrl}/${id}/pay`;
    const raw: Record<string, unknown> = {
      id,
      external_id: input.externalId,
      status: "PENDING",
      invoice_url: invoiceUrl,
      amount: input.amount,
      currency: input.currency,
      payer_email: input.payerEmail,
      description: input.description,
      success_redirect_url: input.successRedirectUrl,
      failure_redirect_url: input.failureRedirectUrl,
    };
    const invoice: Invoice = {
      id,
      externalId: input.externalId,
      status: "PENDING",
      invoiceUrl,
      amount: input.amount,
      currency: input.currency,
      raw,
    };
    this.invoices.set(id, { invoice, input });
    return invoice;
  }

  async getInvoice(invoiceId: string): Promise<Invoice> {
    return this.require(invoiceId).invoice;
  }

  async listInvoices(): Promise<Invoice[]> {
    return [...this.invoices.values()].map((entry) => entry.invoice);
  }

  /** Marks the invoice paid and returns the URL the payer is sent back to. */
  markPaid(invoiceId: string): string {
    const entry = this.setStatus(invoiceId, "PAID");
    return entry.input.successRedirectUrl;
  }

  expire(invoiceId: string): string {
    const entry = this.setStatus(invoiceId, "EXPIRED");
    return entry.input.failureRedirectUrl;
  }

  private require(invoiceId: string): SimulatedInvoice {
    const entry = this.invoices.get(invoiceId);
    if (!entry) {
      throw new ProviderError("not_found", `Simulated invoice '${invoiceId}' not found`, {
        statusCode: 404,
      });
    }
    return entry;
  }

  private setStatus(invoiceId: string, status: string): SimulatedInvoice {
    const entry = this.require(invoiceId);
    const updated: SimulatedInvoice = {
      input: entry.input,
      invoice: {
        ...entry.invoice,
        status,
        raw: { ...entry.invoice.raw, status },
      },
    };
    this.invoices.set(invoiceId, updated);
    return updated;
  }
}
