import { formatConfigIssues } from "@callwire/twilio";
import { z } from "zod";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const WebhookServerConfigSchema = z
  .object({
    accountSid: z.string().min(1),
    authToken: z.string().min(1),
    /** Public origin Twilio calls (tunnel or proxy); signatures are checked against it. */
    publicUrl: z.string().url().optional(),
    /** POST suffix order for signatures; "sorted" matches Twilio's hosted signer. */
    fieldOrder: z.enum(["received", "sorted"]).default("received"),
    /** Largest accepted request body, in bytes. */
    bodyLimit: z.coerce.number().int().positive().default(1_048_576),
    host: z.string().min(1).default("127.0.0.1"),
    port: z.coerce.number().int().min(0).max(65535).default(3000),
    logLevel: z.enum(LOG_LEVELS).default("info"),
  })
  .strict();

export type WebhookServerConfigInput = z.input<typeof WebhookServerConfigSchema>;
export type WebhookServerConfig = z.output<typeof WebhookServerConfigSchema>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read the server config from the environment:
 * TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN, TWILIO_PUBLIC_URL, TWILIO_FIELD_ORDER,
 * WEBHOOK_HOST, WEBHOOK_PORT, WEBHOOK_BODY_LIMIT, LOG_LEVEL.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): WebhookServerConfig {
  const parsed = WebhookServerConfigSchema.safeParse({
    accountSid: nonEmpty(env.TWILIO_ACCOUNT_SID),
    authToken: nonEmpty(env.TWILIO_AUTH_TOKEN),
    publicUrl: nonEmpty(env.TWILIO_PUBLIC_URL),
    fieldOrder: nonEmpty(env.TWILIO_FIELD_ORDER),
    bodyLimit: nonEmpty(env.WEBHOOK_BODY_LIMIT),
    host: nonEmpty(env.WEBHOOK_HOST),
    port: nonEmpty(env.WEBHOOK_PORT),
    logLevel: nonEmpty(env.LOG_LEVEL),
  });
  if (!parsed.success) {
    throw new Error(`Invalid webhook server config: ${formatConfigIssues(parsed.error)}`);
  }
  return parsed.data;
}
