export interface RedirectOptions {
  /** Absolute base URL of this service; relative targets resolve against it. */
  baseUrl: string;
  /** Default target, e.g. `payment-success?reference_id=...`. */
  path: string;
  /** Replaces `path` entirely when it resolves to the same origin. */
  overrideTarget?: string;
  redirectTo?: string;
  redirectMessage?: string;
}

function directoryBase(baseUrl: string): URL {
  const base = new URL(baseUrl);
  if (!base.pathname.endsWith("/")) {
    base.pathname = `${base.pathname}/`;
  }
  return base;
}

function appendParam(target: string, name: string, value: string): string {
  const hashIndex = target.indexOf("#");
  const head = hashIndex === -1 ? target : target.slice(0, hashIndex);
  const fragment = hashIndex === -1 ? "" : target.slice(hashIndex);
  const separator = head.includes("?") ? "&" : "?";
  return `${head}${separator}${name}=${encodeURIComponent(value)}${fragment}`;
}

function withCarriedParams(target: string, options: RedirectOptions): string {
  let result = target;
  if (options.redirectTo) {
    result = appendParam(result, "redirect_to", options.redirectTo);
  }
  if (options.redirectMessage) {
    result = appendParam(result, "redirect_message", options.redirectMessage);
  }
  return result;
}

export function isSameOriginTarget(baseUrl: string, target: string): boolean {
  try {
    const base = directoryBase(baseUrl);
    return new URL(target, base).origin === base.origin;
  } catch {
    return false;
  }
}

export function buildRedirectUrl(options: RedirectOptions): string {
  const base = directoryBase(options.baseUrl);
  let target = options.path;

  if (options.overrideTarget) {
    if (isSameOriginTarget(options.baseUrl, options.overrideTarget)) {
      target = options.overrideTarget;
    } else {
      console.warn(
        `Ignoring off-site redirect target '${options.overrideTarget}', using '${options.path}'`
      );
    }
  }

  return new URL(withCarriedParams(target, options), base).toString();
}
