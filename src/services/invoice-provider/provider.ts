import type { CheckoutStatus } from "../checkout/types.js";
import { SimulatedInvoiceProvider } from "./simulated.js";
import type {
  InvoiceProvider,
  InvoiceProviderConfig,
  InvoiceStatusMapping,
} from "./types.js";
import { XenditInvoiceProvider } from "./xendit.js";

export function createInvoiceProvider(config: InvoiceProviderConfig): InvoiceProvider {
  if (config.provider === "simulated") {
    return new SimulatedInvoiceProvider(config.simulatedCheckoutUrl);
  }
  if (!config.secretKey) {
    throw new Error("XENDIT_SECRET_KEY is required when CHECKOUT_PROVIDER=xendit");
  }
  return new XenditInvoiceProvider({
    apiUrl: config.apiUrl,
    secretKey: config.secretKey,
    timeoutMs: config.timeoutMs,
  });
}

/**
 * Maps a provider status onto the local lifecycle. Anything not explicitly
 * listed as paid is not paid; unknown strings stay Pending.
 */
export function mapInvoiceStatus(
  providerStatus: string,
  mapping: InvoiceStatusMapping
): CheckoutStatus {
  const normalized = providerStatus.trim().toUpperCase();
  if (mapping.paidStatuses.some((status) => status.toUpperCase() === normalized)) {
    return "Completed";
  }
  if (mapping.failedStatuses.some((status) => status.toUpperCase() === normalized)) {
    return "Failed";
  }
  return "Pending";
}
