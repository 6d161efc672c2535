import { z } from "zod";

export const DEFAULT_API_BASE_URL = "https://api.twilio.com";
export const DEFAULT_LOOKUP_BASE_URL = "https://lookups.twilio.com";

const baseUrl = (fallback: string) =>
  z
    .string()
    .url()
    .default(fallback)
    .transform((v) => v.replace(/\/+$/, ""));

export const TwilioClientConfigSchema = z
  .object({
    /** Account SID used as the Basic auth username. */
    accountSid: z.string().min(1),
    authToken: z.string().min(1),
    /** SID placed in resource URLs when it differs from the auth SID (sub-accounts). */
    urlAccountSid: z.string().min(1).optional(),
    apiBaseUrl: baseUrl(DEFAULT_API_BASE_URL),
    lookupBaseUrl: baseUrl(DEFAULT_LOOKUP_BASE_URL),
  })
  .strict();

export type TwilioClientConfigInput = z.input<typeof TwilioClientConfigSchema>;
export type TwilioClientConfig = z.output<typeof TwilioClientConfigSchema>;

/** Joins zod issues into "path: message" lines for startup errors. */
export function formatConfigIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseClientConfig(value: unknown): TwilioClientConfig {
  const parsed = TwilioClientConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid Twilio client config: ${formatConfigIssues(parsed.error)}`);
  }
  return parsed.data;
}
