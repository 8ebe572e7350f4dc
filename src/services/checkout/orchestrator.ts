/**
 * Checkout lifecycle for hosted invoices.
 *
 * requestCheckout: validate → resolve the payment request chain → compute the
 * gateway fee → create the provider invoice → persist a Pending token.
 *
 * confirm: called when the provider redirects the payer back. The invoice is
 * always re-fetched from the provider; the redirect itself carries no trust.
 * Pending → Completed happens at most once per checkout and is the only
 * transition that notifies the reference record owner.
 */

import type { DocumentStore } from "../documents/store.js";
import { ProviderError } from "../invoice-provider/errors.js";
import { mapInvoiceStatus } from "../invoice-provider/provider.js";
import type { CreateInvoiceInput, Invoice, InvoiceProvider } from "../invoice-provider/types.js";
import {
  AlreadySettledError,
  ProviderUnavailableError,
  UnknownTokenError,
} from "./errors.js";
import { assertSupportedCurrency, calculateGatewayFee } from "./fee.js";
import { TokenLocks } from "./lock.js";
import { resolveCheckoutReference } from "./reference.js";
import { buildRedirectUrl } from "./redirect.js";
import { parseCheckoutRequest } from "./request.js";
import type { CheckoutTokenStore } from "./store.js";
import type {
  CheckoutSession,
  CheckoutSettings,
  CheckoutTokenRecord,
  ConfirmationResult,
  CredentialCheck,
  PaymentAuthorizedHandler,
  PaymentAuthorizedResult,
} from "./types.js";

export interface CheckoutOrchestratorOptions {
  settings: CheckoutSettings;
  store: CheckoutTokenStore;
  provider: InvoiceProvider;
  documents: DocumentStore;
  onPaymentAuthorized: PaymentAuthorizedHandler;
  locks?: TokenLocks;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class CheckoutOrchestrator {
  private readonly settings: CheckoutSettings;
  private readonly store: CheckoutTokenStore;
  private readonly provider: InvoiceProvider;
  private readonly documents: DocumentStore;
  private readonly onPaymentAuthorized: PaymentAuthorizedHandler;
  private readonly locks: TokenLocks;

  constructor(options: CheckoutOrchestratorOptions) {
    this.settings = options.settings;
    this.store = options.store;
    this.provider = options.provider;
    this.documents = options.documents;
    this.onPaymentAuthorized = options.onPaymentAuthorized;
    this.locks = options.locks ?? new TokenLocks();
  }

  get gatewayName(): string {
    return this.settings.gatewayName;
  }

  get providerName(): string {
    return this.provider.name;
  }

  confirmationUrl(token: string): string {
    const url = new URL(this.settings.confirmPath, `${this.settings.baseUrl}/`);
    url.searchParams.set("token", token);
    return url.toString();
  }

  async requestCheckout(input: unknown): Promise<CheckoutSession> {
    const request = parseCheckoutRequest(input);
    const currency = assertSupportedCurrency(request.currency, this.settings.fees);
    const token = request.referenceId;

    return this.locks.run(token, async () => {
      const existing = this.store.get(token);
      if (existing?.status === "Completed") {
        throw new AlreadySettledError(token);
      }
      if (existing) {
        console.log(
          `Superseding ${existing.status} checkout ${token} (invoice ${existing.providerInvoiceId})`
        );
      }

      const reference = resolveCheckoutReference(
        this.documents,
        request,
        this.settings.paymentRequestDoctype
      );
      const fee = calculateGatewayFee({
        amount: request.amount,
        currency,
        schedule: this.settings.fees,
      });
      const mobileNumber = reference.customerMobile ?? request.payerMobile;
      const confirmationUrl = this.confirmationUrl(token);

      const invoiceInput: CreateInvoiceInput = {
        externalId: token,
        payerEmail: request.payerEmail,
        description: request.description,
        amount: request.amount,
        currency,
        customer: {
          givenNames: request.payerName,
          email: request.payerEmail,
          ...(mobileNumber ? { mobileNumber } : {}),
        },
        fees: [{ type: "GATEWAY", value: fee.totalFeeMinor }],
        items: reference.items,
        successRedirectUrl: confirmationUrl,
        failureRedirectUrl: confirmationUrl,
        shouldSendEmail: this.settings.sendInvoiceEmail,
        invoiceDurationSeconds: this.settings.invoiceDurationSeconds,
      };

      let invoice: Invoice;
      try {
        invoice = await this.provider.createInvoice(invoiceInput);
      } catch (err) {
        if (err instanceof ProviderError) {
          console.error(`Invoice creation failed for ${token}: ${err.kind}: ${err.message}`);
          throw new ProviderUnavailableError(err);
        }
        throw err;
      }

      this.store.save({
        token,
        providerInvoiceId: invoice.id,
        rawOutput: invoice.raw,
        referenceType: request.referenceType,
        referenceId: request.referenceId,
        ...(request.redirectTo ? { redirectTo: request.redirectTo } : {}),
        ...(request.redirectMessage ? { redirectMessage: request.redirectMessage } : {}),
      });
      this.store.logRequest({
        token,
        serviceName: this.settings.gatewayName,
        requestData: {
          title: request.title,
          payerName: request.payerName,
          ...invoiceInput,
          isRemoteRequest: true,
        },
        output: invoice.raw,
      });

      console.log(
        `Checkout created: token=${token} invoice=${invoice.id} amount=${request.amount} ${currency} fee=${fee.totalFeeMinor}`
      );

      return {
        token,
        invoiceUrl: invoice.invoiceUrl,
        providerInvoiceId: invoice.id,
        fee,
      };
    });
  }

  /**
   * Reconciles a checkout with the provider and decides where the payer goes
   * next. Never throws: every failure becomes a failure redirect.
   */
  async confirm(token: string | undefined): Promise<ConfirmationResult> {
    const trimmed = token?.trim();
    if (!trimmed) {
      console.warn("Payment confirmation called without a token");
      return this.genericFailure("unknown_token");
    }

    try {
      return await this.locks.run(trimmed, () => this.reconcile(trimmed));
    } catch (err) {
      console.error(`Payment confirmation failed for ${trimmed}:`, errorMessage(err));
      return this.genericFailure("error");
    }
  }

  async verifyCredentials(): Promise<CredentialCheck> {
    try {
      const invoices = await this.provider.listInvoices();
      return { ok: true, invoiceCount: invoices.length };
    } catch (err) {
      if (err instanceof ProviderError) {
        return { ok: false, kind: err.kind, message: err.message };
      }
      throw err;
    }
  }

  private async reconcile(token: string): Promise<ConfirmationResult> {
    const record = this.store.get(token);
    if (!record) {
      console.warn(new UnknownTokenError(token).message);
      return this.genericFailure("unknown_token");
    }

    let invoice: Invoice;
    try {
      invoice = await this.provider.getInvoice(record.providerInvoiceId);
    } catch (err) {
      if (err instanceof ProviderError) {
        console.error(
          `Failed to fetch invoice ${record.providerInvoiceId} for ${token}: ${err.kind}: ${err.message}`
        );
        return this.genericFailure("provider_error");
      }
      throw err;
    }

    const mapped = mapInvoiceStatus(invoice.status, this.settings.statusMapping);

    if (mapped === "Completed") {
      return this.settlePaid(record, invoice);
    }

    if (mapped === "Failed") {
      if (this.store.transitionStatus(token, "Pending", "Failed", invoice.raw)) {
        console.log(`Checkout failed: token=${token} invoice=${invoice.id} status=${invoice.status}`);
      } else {
        this.store.recordObservation(token, invoice.raw);
      }
      const current = this.store.get(token)?.status ?? record.status;
      return {
        outcome: current === "Completed" ? "already_completed" : "failed",
        status: current,
        redirectUrl:
          current === "Completed" ? this.successRedirect(record) : this.failureRedirect(record),
      };
    }

    this.store.recordObservation(token, invoice.raw);
    return {
      outcome: "pending",
      status: record.status,
      redirectUrl: this.failureRedirect(record),
    };
  }

  private async settlePaid(
    record: CheckoutTokenRecord,
    invoice: Invoice
  ): Promise<ConfirmationResult> {
    const { token } = record;

    if (record.status === "Completed") {
      this.store.recordObservation(token, invoice.raw);
      return {
        outcome: "already_completed",
        status: "Completed",
        redirectUrl: this.successRedirect(record),
      };
    }

    if (record.status === "Failed") {
      this.store.recordObservation(token, invoice.raw);
      console.error(
        `Invoice ${invoice.id} reports ${invoice.status} but checkout ${token} is already Failed; needs manual reconciliation`
      );
      return {
        outcome: "failed",
        status: "Failed",
        redirectUrl: this.failureRedirect(record),
      };
    }

    // Claim first: only the confirmation whose update moves the row out of
    // Pending notifies, including across processes sharing the database.
    if (!this.store.transitionStatus(token, "Pending", "Completed", invoice.raw)) {
      return this.afterLostClaim(record, invoice);
    }

    let hints: PaymentAuthorizedResult | undefined;
    try {
      hints = await this.onPaymentAuthorized({
        token,
        referenceType: record.referenceType,
        referenceId: record.referenceId,
        status: "Completed",
      });
    } catch (err) {
      console.error(
        `Payment authorized handler failed for ${record.referenceType} ${record.referenceId}:`,
        errorMessage(err)
      );
      this.store.transitionStatus(token, "Completed", "Pending");
      return {
        outcome: "error",
        status: "Pending",
        redirectUrl: this.failureRedirect(record),
      };
    }

    console.log(`Checkout completed: token=${token} invoice=${invoice.id}`);
    return {
      outcome: "completed",
      status: "Completed",
      redirectUrl: this.successRedirect(record, hints),
    };
  }

  private afterLostClaim(record: CheckoutTokenRecord, invoice: Invoice): ConfirmationResult {
    const current = this.store.get(record.token);
    console.warn(
      `Checkout ${record.token} left Pending before invoice ${invoice.id} could be settled (now ${current?.status ?? "missing"})`
    );
    if (current?.status === "Completed") {
      return {
        outcome: "already_completed",
        status: "Completed",
        redirectUrl: this.successRedirect(current),
      };
    }
    return {
      outcome: current?.status === "Failed" ? "failed" : "pending",
      ...(current ? { status: current.status } : {}),
      redirectUrl: this.failureRedirect(current ?? record),
    };
  }

  private successRedirect(
    record: CheckoutTokenRecord,
    hints?: PaymentAuthorizedResult
  ): string {
    const query = new URLSearchParams({
      reference_type: record.referenceType,
      reference_id: record.referenceId,
    });
    const override = hints?.redirectTo;
    const redirectMessage = hints?.redirectMessage ?? record.redirectMessage;
    return buildRedirectUrl({
      baseUrl: this.settings.baseUrl,
      path: `${this.settings.successPath}?${query.toString()}`,
      ...(override ? { overrideTarget: override } : {}),
      ...(!override && record.redirectTo ? { redirectTo: record.redirectTo } : {}),
      ...(redirectMessage ? { redirectMessage } : {}),
    });
  }

  private failureRedirect(record: CheckoutTokenRecord): string {
    return buildRedirectUrl({
      baseUrl: this.settings.baseUrl,
      path: this.settings.failurePath,
      ...(record.redirectTo ? { redirectTo: record.redirectTo } : {}),
      ...(record.redirectMessage ? { redirectMessage: record.redirectMessage } : {}),
    });
  }

  private genericFailure(outcome: ConfirmationResult["outcome"]): ConfirmationResult {
    return {
      outcome,
      redirectUrl: buildRedirectUrl({
        baseUrl: this.settings.baseUrl,
        path: this.settings.failurePath,
      }),
    };
  }
}
