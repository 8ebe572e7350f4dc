import { z } from "zod";
import type { DocumentStore } from "../documents/store.js";
import type { InvoiceItem } from "../invoice-provider/types.js";
import { InvalidReferenceError } from "./errors.js";

export const SALES_ORDER_DOCTYPE = "Sales Order";
export const CUSTOMER_DOCTYPE = "Customer";

const paymentRequestSchema = z.object({
  name: z.string().min(1),
  reference_doctype: z.string(),
  reference_name: z.string().min(1),
  grand_total: z.number().nonnegative().optional(),
});

const salesOrderSchema = z.object({
  name: z.string().min(1),
  customer: z.string().min(1),
  items: z
    .array(
      z.object({
        item_code: z.string().min(1),
        rate: z.number().nonnegative(),
        qty: z.number().positive(),
      })
    )
    .min(1),
});

const customerSchema = z.object({
  name: z.string().min(1),
  mobile_no: z.string().nullish(),
});

export interface ResolvedReference {
  paymentRequestName: string;
  salesOrderName: string;
  customerName: string;
  items: InvoiceItem[];
  customerMobile?: string;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Walks payment request → sales order → customer and collects what the
 * invoice needs. Any broken link fails with InvalidReferenceError.
 */
export function resolveCheckoutReference(
  documents: DocumentStore,
  reference: { referenceType: string; referenceId: string },
  paymentRequestDoctype: string
): ResolvedReference {
  if (reference.referenceType !== paymentRequestDoctype) {
    throw new InvalidReferenceError(
      `Referenced doctype for checkout is not a ${paymentRequestDoctype} (got '${reference.referenceType}')`
    );
  }

  const paymentRequestDoc = documents.get(paymentRequestDoctype, reference.referenceId);
  if (!paymentRequestDoc) {
    throw new InvalidReferenceError(
      `${paymentRequestDoctype} '${reference.referenceId}' was not found`
    );
  }
  const paymentRequest = paymentRequestSchema.safeParse(paymentRequestDoc);
  if (!paymentRequest.success) {
    throw new InvalidReferenceError(
      `${paymentRequestDoctype} '${reference.referenceId}' is malformed: ${describeIssues(paymentRequest.error)}`
    );
  }
  if (paymentRequest.data.reference_doctype !== SALES_ORDER_DOCTYPE) {
    throw new InvalidReferenceError(
      `Doctype referenced by ${paymentRequestDoctype} is not a ${SALES_ORDER_DOCTYPE}`
    );
  }

  const salesOrderName = paymentRequest.data.reference_name;
  const salesOrderDoc = documents.get(SALES_ORDER_DOCTYPE, salesOrderName);
  if (!salesOrderDoc) {
    throw new InvalidReferenceError(`${SALES_ORDER_DOCTYPE} '${salesOrderName}' was not found`);
  }
  const salesOrder = salesOrderSchema.safeParse(salesOrderDoc);
  if (!salesOrder.success) {
    throw new InvalidReferenceError(
      `${SALES_ORDER_DOCTYPE} '${salesOrderName}' is malformed: ${describeIssues(salesOrder.error)}`
    );
  }

  const customerName = salesOrder.data.customer;
  const customerDoc = documents.get(CUSTOMER_DOCTYPE, customerName);
  if (!customerDoc) {
    throw new InvalidReferenceError(`${CUSTOMER_DOCTYPE} '${customerName}' was not found`);
  }
  const customer = customerSchema.safeParse(customerDoc);
  if (!customer.success) {
    throw new InvalidReferenceError(
      `${CUSTOMER_DOCTYPE} '${customerName}' is malformed: ${describeIssues(customer.error)}`
    );
  }

  const mobile = customer.data.mobile_no?.trim();

  return {
    paymentRequestName: paymentRequest.data.name,
    salesOrderName: salesOrder.data.name,
    customerName,
    items: salesOrder.data.items.map((item) => ({
      name: item.item_code,
      price: item.rate,
      quantity: item.qty,
    })),
    ...(mobile ? { customerMobile: mobile } : {}),
  };
}
