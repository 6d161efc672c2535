/**
 * Webhook responder: verify, decode, run caller logic, render TwiML.
 *
 * Always produces a response. Verification or decoding failures become a
 * plain-text 400 without calling the logic; a throwing logic becomes an
 * empty TwiML document so Twilio does not retry against a broken handler.
 */

import { CONTENT_TYPES, HEADERS } from "../constants.js";
import { silentLogger, type Logger } from "../logger.js";
import { Twiml } from "../twiml.js";
import type { InboundEventOf, InboundKind } from "./inbound.js";
import { parseWebhookRequest, type VerifyOptions } from "./signature.js";
import type { WebhookRequest, WebhookResponse } from "./types.js";

export type WebhookLogic<K extends InboundKind> = (event: InboundEventOf<K>) => Twiml | Promise<Twiml>;

export interface RespondOptions extends VerifyOptions {
  authToken: string;
  logger?: Logger;
}

export function twimlResponse(twiml: Twiml): WebhookResponse {
  const body = twiml.toXml();
  return {
    status: 200,
    headers: {
      [HEADERS.CONTENT_TYPE]: CONTENT_TYPES.XML,
      [HEADERS.CONTENT_LENGTH]: String(Buffer.byteLength(body, "utf8")),
    },
    body,
  };
}

export function badRequestResponse(): WebhookResponse {
  const body = "Bad Request";
  return {
    status: 400,
    headers: {
      [HEADERS.CONTENT_TYPE]: CONTENT_TYPES.TEXT,
      [HEADERS.CONTENT_LENGTH]: String(Buffer.byteLength(body, "utf8")),
    },
    body,
  };
}

export async function respondToWebhook<K extends InboundKind>(
  request: WebhookRequest,
  kind: K,
  logic: WebhookLogic<K>,
  options: RespondOptions,
): Promise<WebhookResponse> {
  const logger = options.logger ?? silentLogger;
  const parsed = parseWebhookRequest(request, kind, options.authToken, options);
  if (!parsed.ok) {
    logger.warn(`[twilio] Rejected ${kind} webhook ${request.method} ${request.url}: ${parsed.error.kind}`);
    return badRequestResponse();
  }

  try {
    return twimlResponse(await logic(parsed.value));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    logger.error(`[twilio] ${kind} webhook handler failed: ${msg}`);
    return twimlResponse(new Twiml());
  }
}
