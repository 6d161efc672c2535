/**
 * Transport-neutral view of a webhook exchange. Server adapters (Fastify,
 * node:http, ...) translate to and from these.
 */

export type HeaderValue = string | string[] | undefined;

export interface WebhookRequest {
  method: string;
  /** Request target as received: path plus any query string. */
  url: string;
  /** Header names are matched case-insensitively. */
  headers: Record<string, HeaderValue>;
  /** Raw body; form posts arrive as application/x-www-form-urlencoded text. */
  body: string | Uint8Array;
}

export interface WebhookResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}
