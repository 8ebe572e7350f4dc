export type ProviderErrorKind =
  | "network"
  | "timeout"
  | "auth"
  | "not_found"
  | "rejected"
  | "unavailable"
  | "malformed_response";

export class ProviderError extends Error {
  readonly code = "PROVIDER_ERROR";
  readonly kind: ProviderErrorKind;
  readonly statusCode?: number;

  constructor(
    kind: ProviderErrorKind,
    message: string,
    options: { statusCode?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.kind = kind;
    this.statusCode = options.statusCode;
  }
}

export function providerErrorKindForStatus(statusCode: number): ProviderErrorKind {
  if (statusCode === 401 || statusCode === 403) return "auth";
  if (statusCode === 404) return "not_found";
  if (statusCode >= 500) return "unavailable";
  return "rejected";
}
