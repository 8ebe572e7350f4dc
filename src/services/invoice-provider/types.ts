/**
 * Invoice provider interface for hosted-checkout payments.
 *
 * The provider hosts the payment page: we create an invoice, send the payer
 * to its `invoiceUrl`, and later look the invoice up again to learn whether
 * it was paid. Status strings are provider-defined and mapped locally.
 */

export interface InvoiceCustomer {
  givenNames: string;
  email: string;
  mobileNumber?: string;
}

export interface InvoiceFee {
  type: "GATEWAY";
  value: number;
}

export interface InvoiceItem {
  name: string;
  price: number;
  quantity: number;
}

export interface CreateInvoiceInput {
  /** Must equal the local checkout token so the invoice can be traced back. */
  externalId: string;
  payerEmail: string;
  description: string;
  amount: number;
  currency: string;
  customer: InvoiceCustomer;
  fees: InvoiceFee[];
  items: InvoiceItem[];
  successRedirectUrl: string;
  failureRedirectUrl: string;
  shouldSendEmail: boolean;
  invoiceDurationSeconds: number;
}

export interface Invoice {
  id: string;
  externalId: string;
  status: string;
  invoiceUrl: string;
  amount: number;
  currency?: string;
  raw: Record<string, unknown>;
}

export interface InvoiceProvider {
  name: string;
  createInvoice(input: CreateInvoiceInput): Promise<Invoice>;
  getInvoice(invoiceId: string): Promise<Invoice>;
  /** Cheap probe used to validate credentials; not part of the checkout path. */
  listInvoices(): Promise<Invoice[]>;
}

export interface InvoiceProviderConfig {
  provider: "xendit" | "simulated";
  apiUrl: string;
  secretKey: string | undefined;
  timeoutMs: number;
  simulatedCheckoutUrl: string;
}

export interface InvoiceStatusMapping {
  paidStatuses: string[];
  failedStatuses: string[];
}
