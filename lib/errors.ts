/** Malformed input: payloads, ids, model fields. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Neither a fresh fetch nor the cache could produce a catalog. */
export class CatalogUnavailableError extends Error {
  constructor(message = "Failed to fetch beer catalog and no cache available") {
    super(message);
    this.name = "CatalogUnavailableError";
  }
}

export type RuntimeErrorCode =
  | "THROTTLED"
  | "VALIDATION"
  | "NOT_FOUND"
  | "TIMEOUT"
  | "UNAVAILABLE"
  | "BAD_RESPONSE";

/** A front-end call to the agent runtime endpoint failed. */
export class RuntimeClientError extends Error {
  constructor(
    public readonly code: RuntimeErrorCode,
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = "RuntimeClientError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "Unknown error";
}
