/**
 * Fastify server answering Twilio webhooks.
 *
 *   Sender ──► Twilio ──► GET|POST /message ──► verify + decode ──► <Message>
 *   Caller ──► Twilio ──► GET|POST /call    ──► verify + decode ──► <Say>
 *
 * Bodies of every content type are kept as raw strings so the signature
 * check sees exactly what Twilio signed. Unverifiable requests, and bodies
 * Fastify refuses before the handler runs, get a plain-text 400.
 */

import {
  TwilioClient,
  Twiml,
  badRequestResponse,
  type InboundKind,
  type Logger,
  type WebhookLogic,
  type WebhookRequest,
  type WebhookResponse,
} from "@callwire/twilio";
import Fastify, {
  type FastifyError,
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest,
} from "fastify";
import type { WebhookServerConfig } from "./config.js";

export interface WebhookServerDeps {
  /** Defaults to a client built from the config's credentials. */
  client?: TwilioClient;
}

// ─── Replies ─────────────────────────────────────────────────────────────────

export const replyToMessage: WebhookLogic<"message"> = ({ message }) =>
  new Twiml().message(`You told me: '${message.body ?? ""}'`);

export const replyToCall: WebhookLogic<"call"> = () =>
  new Twiml().say("Thanks for calling. Bye!", "woman", "en");

// ─── Fastify adapter ─────────────────────────────────────────────────────────

export function toWebhookRequest(request: FastifyRequest): WebhookRequest {
  return {
    method: request.method,
    url: request.url,
    headers: request.headers,
    body: typeof request.body === "string" ? request.body : "",
  };
}

function sendWebhookResponse(reply: FastifyReply, response: WebhookResponse): FastifyReply {
  return reply.status(response.status).headers(response.headers).send(response.body);
}

export function createWebhookServer(
  config: WebhookServerConfig,
  deps: WebhookServerDeps = {},
): FastifyInstance {
  const fastify = Fastify({ logger: { level: config.logLevel }, bodyLimit: config.bodyLimit });

  // Bridge Fastify's logger to the shape the SDK expects
  const logBridge: Logger = {
    info: (...args: unknown[]) => fastify.log.info(args.map(String).join(" ")),
    warn: (...args: unknown[]) => fastify.log.warn(args.map(String).join(" ")),
    error: (...args: unknown[]) => fastify.log.error(args.map(String).join(" ")),
  };

  const client =
    deps.client ??
    new TwilioClient(
      { accountSid: config.accountSid, authToken: config.authToken },
      { logger: logBridge },
    );
  const verifyOptions = { publicUrl: config.publicUrl, fieldOrder: config.fieldOrder };
  const webhookPaths = new Set<string>();

  // One catch-all parser: no JSON or text parsing, no 415 for odd content types
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser(
    "*",
    { parseAs: "string" },
    (_request: FastifyRequest, body: string | Buffer, done: (err: Error | null, body?: unknown) => void) => {
      done(null, typeof body === "string" ? body : body.toString("utf8"));
    },
  );

  // Oversized or truncated bodies fail before the handler; answer them like any other bad webhook
  fastify.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const route = request.routeOptions.url;
    if (route !== undefined && webhookPaths.has(route)) {
      logBridge.warn(`[webhook] Rejected ${request.method} ${request.url}: ${error.code ?? error.message}`);
      return sendWebhookResponse(reply, badRequestResponse());
    }
    return reply.send(error);
  });

  const webhookRoute = <K extends InboundKind>(url: string, kind: K, logic: WebhookLogic<K>) => {
    webhookPaths.add(url);
    fastify.route({
      method: ["GET", "POST"],
      url,
      handler: async (request: FastifyRequest, reply: FastifyReply) => {
        const response = await client.respondToWebhook(
          toWebhookRequest(request),
          kind,
          logic,
          verifyOptions,
        );
        return sendWebhookResponse(reply, response);
      },
    });
  };

  // ── GET|POST /message ─────────────────────────────────────────────────────
  //
  //   1. Twilio receives an SMS and calls the Messaging webhook
  //   2. We validate X-Twilio-Signature against the rebuilt URL
  //   3. Decode From/To/Body/MessageSid into an inbound message
  //   4. Reply inline with a <Message> echoing the text

  webhookRoute("/message", "message", replyToMessage);

  // ── GET|POST /call ────────────────────────────────────────────────────────

  webhookRoute("/call", "call", replyToCall);

  fastify.get("/health", async () => ({ status: "ok" }));

  return fastify;
}
