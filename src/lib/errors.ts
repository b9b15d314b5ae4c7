export type WikiErrorCode = "not_found" | "conflict" | "invalid" | "noop" | "partial_failure";

export interface WikiFailure {
  ok: false;
  code: WikiErrorCode;
  error: string;
}

export type WikiResult<T extends object = Record<never, never>> = ({ ok: true } & T) | WikiFailure;

export const fail = (code: WikiErrorCode, error: string): WikiFailure => ({ ok: false, code, error });

export class StorageUnavailableError extends Error {
  readonly statusCode = 503;

  constructor(message = "Storage backend is not available.") {
    super(message);
    this.name = "StorageUnavailableError";
  }
}

/** The in-memory commit succeeded but the database file could not be written. */
export class PersistenceError extends Error {
  readonly statusCode = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export const statusCodeForFailure = (code: WikiErrorCode): number => {
  switch (code) {
    case "invalid":
      return 400;
    case "not_found":
      return 404;
    case "conflict":
    case "noop":
      return 409;
    case "partial_failure":
      return 500;
  }
};

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : "unknown");
