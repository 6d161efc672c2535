/**
 * Error taxonomy shared by the REST client and the webhook pipeline.
 *
 * Every SDK operation hands back a `Result`; failures carry one of the
 * `TwilioError` subclasses below so callers can branch on `kind` and ask
 * whether a retry makes sense.
 */

export type TwilioErrorKind = "network" | "http" | "parsing" | "auth" | "bad_request";

export abstract class TwilioError extends Error {
  abstract readonly kind: TwilioErrorKind;

  /** Whether repeating the same request could succeed. */
  isRetryable(): boolean {
    return false;
  }
}

/** Transport failure: connection, TLS, aborted request or unreadable body. */
export class NetworkError extends TwilioError {
  readonly kind = "network";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NetworkError";
  }

  override isRetryable(): boolean {
    return true;
  }
}

/** Error payload Twilio returns alongside a non-success status. */
export interface TwilioApiErrorDetails {
  code?: number;
  message?: string;
  moreInfo?: string;
}

export class HttpError extends TwilioError {
  readonly kind = "http";
  readonly status: number;
  readonly details?: TwilioApiErrorDetails;

  constructor(status: number, details?: TwilioApiErrorDetails) {
    super(
      details?.message
        ? `Invalid HTTP status code: ${status} (${details.message})`
        : `Invalid HTTP status code: ${status}`,
    );
    this.name = "HttpError";
    this.status = status;
    this.details = details;
  }

  /** Server-side failures are worth retrying; client errors are not. */
  override isRetryable(): boolean {
    return this.status >= 500 && this.status <= 599;
  }
}

export class ParsingError extends TwilioError {
  readonly kind = "parsing";

  constructor(message = "Parsing error") {
    super(message);
    this.name = "ParsingError";
  }
}

/** Missing or wrong webhook signature. Never says which check failed. */
export class AuthError extends TwilioError {
  readonly kind = "auth";

  constructor() {
    super("Unauthorized");
    this.name = "AuthError";
  }
}

export class BadRequestError extends TwilioError {
  readonly kind = "bad_request";

  constructor(message = "Bad request") {
    super(message);
    this.name = "BadRequestError";
  }
}

// ─── Result ──────────────────────────────────────────────────────────────────

export type Result<T> = { ok: true; value: T } | { ok: false; error: TwilioError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: TwilioError): Result<T> {
  return { ok: false, error };
}
