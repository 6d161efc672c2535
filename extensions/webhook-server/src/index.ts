/**
 * @callwire/webhook-server: Fastify host for the Twilio webhook responder.
 */

export { LOG_LEVELS, WebhookServerConfigSchema, loadServerConfig } from "./config.js";
export type { WebhookServerConfig, WebhookServerConfigInput } from "./config.js";
export {
  createWebhookServer,
  replyToCall,
  replyToMessage,
  toWebhookRequest,
} from "./server.js";
export type { WebhookServerDeps } from "./server.js";
