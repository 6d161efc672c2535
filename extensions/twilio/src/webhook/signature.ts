/**
 * Twilio request validation.
 *
 * Twilio signs every webhook with HMAC-SHA1 keyed by the account's auth
 * token and sends the base64 digest in `X-Twilio-Signature`. The signed
 * string is the full https URL it called, followed for POSTs by each form
 * parameter's name and value in the order the body carried them:
 *
 *   https://example.com/sms/inbound?x=1 + "Body" + "Hi" + "From" + "+1555..."
 *
 * Any difference in scheme, host casing, trailing slash or field order
 * changes the digest, so the URL is rebuilt exactly from what arrived.
 *
 * @see https://www.twilio.com/docs/usage/webhooks/webhooks-security
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import { HEADERS, HTTP_METHODS } from "../constants.js";
import { AuthError, BadRequestError, fail, ok, type Result } from "../errors.js";
import {
  concatenateFields,
  fieldsFromTarget,
  fieldsFromUrlEncoded,
  sortFields,
  type FieldMapping,
  type FieldOrder,
} from "./fields.js";
import { decodeInbound, type InboundEventOf, type InboundKind } from "./inbound.js";
import type { HeaderValue, WebhookRequest } from "./types.js";

export interface VerifyOptions {
  /**
   * Public origin Twilio was configured with (e.g. "https://abc.ngrok.app"),
   * for servers behind a proxy or tunnel. Replaces `https://{Host}` when
   * rebuilding the signed URL.
   */
  publicUrl?: string;
  /** POST suffix order; defaults to `"received"`. */
  fieldOrder?: FieldOrder;
}

export interface CanonicalUriParts {
  /** Hostname as sent in the Host header, without port. */
  host: string;
  /** Request target: path plus query string. */
  target: string;
  /** POST form fields; omit for GET. */
  fields?: FieldMapping;
  publicUrl?: string;
}

export function buildCanonicalUri(parts: CanonicalUriParts): string {
  const origin = parts.publicUrl ? parts.publicUrl.replace(/\/+$/, "") : `https://${parts.host}`;
  const suffix = parts.fields ? concatenateFields(parts.fields) : "";
  return `${origin}${parts.target}${suffix}`;
}

/** Base64 HMAC-SHA1 of the canonical URI, as Twilio puts it in the header. */
export function computeSignature(authToken: string, canonicalUri: string): string {
  return createHmac("sha1", authToken).update(Buffer.from(canonicalUri, "utf8")).digest("base64");
}

// ─── Request parts ───────────────────────────────────────────────────────────

function getHeader(headers: Record<string, HeaderValue>, name: string): HeaderValue {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name) return value;
  }
  return undefined;
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** Strict base64: Buffer.from would silently skip invalid characters. */
export function decodeBase64(value: string): Buffer | null {
  return BASE64_PATTERN.test(value) ? Buffer.from(value, "base64") : null;
}

const HOST_PATTERN = /^(\[[0-9A-Fa-f:.]+\]|[^\s:/?#@[\]]+)(?::(\d*))?$/;

/** Hostname from a Host header value, port dropped, casing kept. */
export function parseHostHeader(value: string): string | null {
  const match = HOST_PATTERN.exec(value);
  return match?.[1] ?? null;
}

// ─── Verification ────────────────────────────────────────────────────────────

/**
 * Check a request's signature against `authToken`. On success returns the
 * decoded fields (query string for GET, form body for POST).
 */
export function verifyWebhookRequest(
  request: WebhookRequest,
  authToken: string,
  options: VerifyOptions = {},
): Result<FieldMapping> {
  const signatureHeader = getHeader(request.headers, HEADERS.SIGNATURE);
  if (signatureHeader === undefined) {
    return fail(new AuthError());
  }
  if (typeof signatureHeader !== "string") {
    return fail(new BadRequestError("Repeated X-Twilio-Signature header"));
  }
  const expected = decodeBase64(signatureHeader);
  if (!expected) {
    return fail(new BadRequestError("X-Twilio-Signature is not valid base64"));
  }

  let host = "";
  if (!options.publicUrl) {
    const hostHeader = getHeader(request.headers, HEADERS.HOST);
    if (typeof hostHeader !== "string") {
      return fail(new BadRequestError("Missing Host header"));
    }
    const parsedHost = parseHostHeader(hostHeader);
    if (!parsedHost) {
      return fail(new BadRequestError("Malformed Host header"));
    }
    host = parsedHost;
  }

  const target = request.url;
  if (target === "*" || !target.startsWith("/")) {
    return fail(new BadRequestError("Unsupported request target"));
  }

  let fields: FieldMapping;
  let canonical: string;
  switch (request.method) {
    case HTTP_METHODS.GET:
      fields = fieldsFromTarget(target);
      canonical = buildCanonicalUri({ host, target, publicUrl: options.publicUrl });
      break;
    case HTTP_METHODS.POST:
      fields = fieldsFromUrlEncoded(request.body);
      canonical = buildCanonicalUri({
        host,
        target,
        fields: options.fieldOrder === "sorted" ? sortFields(fields) : fields,
        publicUrl: options.publicUrl,
      });
      break;
    default:
      return fail(new BadRequestError(`Unsupported method ${request.method}`));
  }

  const actual = createHmac("sha1", authToken).update(Buffer.from(canonical, "utf8")).digest();
  if (actual.length !== expected.length || !timingSafeEqual(actual, expected)) {
    return fail(new AuthError());
  }
  return ok(fields);
}

/** Verify, then decode the fields into the requested event kind. */
export function parseWebhookRequest<K extends InboundKind>(
  request: WebhookRequest,
  kind: K,
  authToken: string,
  options: VerifyOptions = {},
): Result<InboundEventOf<K>> {
  const verified = verifyWebhookRequest(request, authToken, options);
  if (!verified.ok) return verified;
  return decodeInbound(kind, verified.value);
}
