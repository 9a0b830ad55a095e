export const FLOW_ERROR_KINDS = [
  "not_authorized",
  "timeout",
  "internal_error",
] as const;

export type FlowErrorKind = (typeof FLOW_ERROR_KINDS)[number];

/**
 * A classified flow failure. Only `kind` is ever sent to the failure endpoint;
 * `message` is for the logs.
 */
export type FlowError = {
  kind: FlowErrorKind;
  message: string;
};

export type FlowResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: FlowError };

export function ok<T>(value: T): FlowResult<T> {
  return { ok: true, value };
}

export function fail(kind: FlowErrorKind, message: string): FlowResult<never> {
  return { ok: false, error: { kind, message } };
}

/** The user declined access, or the provider rejected our credentials. */
export class AuthorizationDeniedError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AuthorizationDeniedError";
  }
}

export class ProviderTimeoutError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ProviderTimeoutError";
  }
}

/** Any other failure while talking to a contacts provider. */
export class ProviderError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ProviderError";
  }
}

/** Not caught by the flow; reaches the server's error handler. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

const TIMEOUT_ERROR_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

// undici's fetch rejects with `TypeError("fetch failed")` and keeps the
// socket-level error in `cause`, so the whole chain is inspected.
export function isTimeoutError(error: unknown): boolean {
  const seen = new Set<unknown>();
  let current = error;
  while (current instanceof Error && !seen.has(current)) {
    seen.add(current);
    if (current instanceof ProviderTimeoutError) {
      return true;
    }
    if (current.name === "TimeoutError") {
      return true;
    }
    if ("code" in current && typeof current.code === "string") {
      if (TIMEOUT_ERROR_CODES.has(current.code)) {
        return true;
      }
    }
    current = current.cause;
  }
  return false;
}

/**
 * Maps a thrown failure to a flow error kind. Returns `undefined` for errors
 * the flow does not handle, which the caller must rethrow.
 */
export function classifyFailure(error: unknown): FlowError | undefined {
  if (error instanceof AuthorizationDeniedError) {
    return { kind: "not_authorized", message: error.message };
  }
  if (error instanceof Error && isTimeoutError(error)) {
    return { kind: "timeout", message: error.message };
  }
  if (error instanceof ProviderError) {
    return { kind: "internal_error", message: error.message };
  }
  return undefined;
}

export async function settle<T>(
  operation: () => Promise<FlowResult<T>>,
): Promise<FlowResult<T>> {
  try {
    return await operation();
  } catch (error) {
    const flowError = classifyFailure(error);
    if (!flowError) {
      throw error;
    }
    return { ok: false, error: flowError };
  }
}
