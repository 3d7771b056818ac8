/**
 * Error taxonomy shared by the engine, the policy layer and the adapters.
 *
 * Transport errors are turned into failed outcomes for the file they hit, and
 * a blocked transfer is an outcome with `conflict` set rather than a thrown
 * error. Configuration and policy errors propagate and abort the command.
 */

/**
 * A remote call failed (network, authentication, HTTP status >= 400).
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "TransportError";
  }
}

/**
 * Missing credentials, unreadable settings or sidecar files, unknown names.
 */
export class ConfigurationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ConfigurationError";
  }
}

/**
 * A push was aimed at a read-only reference root.
 */
export class PolicyError extends Error {
  constructor(message: string, public readonly referenceName: string) {
    super(message);
    this.name = "PolicyError";
  }
}

/**
 * Render an unknown thrown value as a single-line message.
 */
export function describeError(error: unknown): string {
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}
