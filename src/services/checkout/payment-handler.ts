import type { DocumentStore } from "../documents/store.js";
import type { PaymentAuthorizedHandler } from "./types.js";

/**
 * Default owner callback: marks the payment request as paid in the document
 * store. It steers no redirect, so the payer lands on the standard success
 * page.
 */
export function createDocumentPaymentHandler(
  documents: DocumentStore
): PaymentAuthorizedHandler {
  return (event) => {
    const updated = documents.update(event.referenceType, event.referenceId, {
      status: "Paid",
      paid_via_checkout: event.token,
    });
    if (!updated) {
      throw new Error(`${event.referenceType} '${event.referenceId}' not found`);
    }
    console.log(`${event.referenceType} ${event.referenceId} marked Paid`);
    return undefined;
  };
}
