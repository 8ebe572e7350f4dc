import { z } from "zod";
import { InvalidCheckoutRequestError } from "./errors.js";
import type { CheckoutRequest } from "./types.js";

const requiredText = z.string().trim().min(1);
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const checkoutRequestSchema = z.object({
  amount: z.number().finite().positive().multipleOf(0.01),
  currency: z.string().trim().length(3).toUpperCase(),
  payerName: requiredText,
  payerEmail: z.string().trim().email(),
  payerMobile: optionalText,
  title: requiredText,
  description: requiredText,
  referenceType: requiredText,
  referenceId: requiredText,
  redirectTo: optionalText,
  redirectMessage: optionalText,
});

export function parseCheckoutRequest(input: unknown): CheckoutRequest {
  const parsed = checkoutRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidCheckoutRequestError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
      )
    );
  }

  const { payerMobile, redirectTo, redirectMessage, ...required } = parsed.data;
  return {
    ...required,
    ...(payerMobile ? { payerMobile } : {}),
    ...(redirectTo ? { redirectTo } : {}),
    ...(redirectMessage ? { redirectMessage } : {}),
  };
}
