/**
 * Start the webhook server from environment config.
 *
 *   TWILIO_ACCOUNT_SID=AC... TWILIO_AUTH_TOKEN=... npm start
 */

import { loadServerConfig } from "./config.js";
import { createWebhookServer } from "./server.js";

const config = loadServerConfig();
const fastify = createWebhookServer(config);

await fastify.listen({ port: config.port, host: config.host });
fastify.log.info(`[webhook] Message endpoint: http://${config.host}:${config.port}/message`);
fastify.log.info(`[webhook] Call endpoint: http://${config.host}:${config.port}/call`);
if (config.publicUrl) {
  fastify.log.info(`[webhook] Verifying signatures against ${config.publicUrl}`);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    fastify.log.info(`[webhook] ${signal} received, shutting down`);
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error(`[webhook] Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      },
    );
  });
}
