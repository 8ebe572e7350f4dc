import type { GatewayFeeBreakdown, FeeSchedule } from "./fee.js";
import type { InvoiceStatusMapping } from "../invoice-provider/types.js";

export type CheckoutStatus = "Pending" | "Completed" | "Failed";

export interface CheckoutRequest {
  amount: number;
  currency: string;
  payerName: string;
  payerEmail: string;
  payerMobile?: string;
  title: string;
  description: string;
  referenceType: string;
  referenceId: string;
  redirectTo?: string;
  redirectMessage?: string;
}

export interface CheckoutTokenRecord {
  token: string;
  providerInvoiceId: string;
  status: CheckoutStatus;
  rawOutput: Record<string, unknown>;
  referenceType: string;
  referenceId: string;
  redirectTo?: string;
  redirectMessage?: string;
  createdAt: string;
  updatedAt: string;
}

export type NewCheckoutToken = Omit<
  CheckoutTokenRecord,
  "status" | "createdAt" | "updatedAt"
>;

export interface CheckoutRequestLogEntry {
  id: number;
  token: string;
  serviceName: string;
  requestData: Record<string, unknown>;
  output: Record<string, unknown>;
  createdAt: string;
}

export interface CheckoutSettings {
  gatewayName: string;
  baseUrl: string;
  confirmPath: string;
  successPath: string;
  failurePath: string;
  paymentRequestDoctype: string;
  fees: FeeSchedule;
  statusMapping: InvoiceStatusMapping;
  invoiceDurationSeconds: number;
  sendInvoiceEmail: boolean;
}

export interface CheckoutSession {
  token: string;
  invoiceUrl: string;
  providerInvoiceId: string;
  fee: GatewayFeeBreakdown;
}

export interface PaymentAuthorizedEvent {
  token: string;
  referenceType: string;
  referenceId: string;
  status: "Completed";
}

/** Hints a reference record owner may return to steer the final redirect. */
export interface PaymentAuthorizedResult {
  redirectTo?: string;
  redirectMessage?: string;
}

export type PaymentAuthorizedHandler = (
  event: PaymentAuthorizedEvent
) =>
  | Promise<PaymentAuthorizedResult | undefined>
  | PaymentAuthorizedResult
  | undefined;

export type ConfirmationOutcome =
  | "completed"
  | "already_completed"
  | "pending"
  | "failed"
  | "unknown_token"
  | "provider_error"
  | "error";

export interface ConfirmationResult {
  outcome: ConfirmationOutcome;
  status?: CheckoutStatus;
  redirectUrl: string;
}

export type CredentialCheck =
  | { ok: true; invoiceCount: number }
  | { ok: false; kind: string; message: string };
