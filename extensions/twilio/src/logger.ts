/**
 * Logger shape the SDK writes to. Hosts bridge their own logger into it
 * (the webhook server bridges Fastify's pino instance).
 */

export interface Logger {
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
