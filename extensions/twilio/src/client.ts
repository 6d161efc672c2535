/**
 * Twilio REST client.
 *
 * Talks to the 2010-04-01 API over HTTPS with Basic auth
 * (account_sid:auth_token). Writes are form-urlencoded, answers are JSON.
 * Every call resolves to a `Result`; nothing here rejects.
 *
 *   POST {api}/2010-04-01/Accounts/{AccountSid}/Messages.json
 *   GET  {api}/2010-04-01/Accounts/{AccountSid}/Messages/{Sid}.json
 *   POST {api}/2010-04-01/Accounts/{AccountSid}/Calls.json
 *   GET  {api}/2010-04-01/Accounts/{AccountSid}/Calls/{Sid}.json
 *   GET  {lookups}/v2/PhoneNumbers/{E.164}?Fields=...
 */

import type { z } from "zod";
import { parseClientConfig, type TwilioClientConfig, type TwilioClientConfigInput } from "./config-schema.js";
import { CONTENT_TYPES, HTTP_METHODS, type HttpMethod } from "./constants.js";
import {
  BadRequestError,
  HttpError,
  NetworkError,
  ParsingError,
  fail,
  ok,
  type Result,
  type TwilioApiErrorDetails,
} from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import {
  DEFAULT_LOOKUP_FIELDS,
  PhoneNumberInfoSchema,
  buildLookupPath,
  normalizeLookupNumber,
  type LookupOptions,
  type PhoneNumberInfo,
} from "./lookup.js";
import {
  ApiErrorSchema,
  CallSchema,
  MessageSchema,
  type Call,
  type Message,
  type MessageStatus,
  type OutboundCall,
  type OutboundMessage,
} from "./resources.js";
import type { InboundEventOf, InboundKind } from "./webhook/inbound.js";
import { respondToWebhook, type WebhookLogic } from "./webhook/respond.js";
import { parseWebhookRequest, type VerifyOptions } from "./webhook/signature.js";
import type { WebhookRequest, WebhookResponse } from "./webhook/types.js";

/** The slice of `fetch` the client needs; tests pass a stub. */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface TwilioClientDeps {
  fetch?: FetchFn;
  logger?: Logger;
}

export interface RequestOptions {
  /** Aborting cancels the in-flight HTTP request. */
  signal?: AbortSignal;
}

type FormParams = Array<[string, string]>;

export class TwilioClient {
  private config: TwilioClientConfig;
  private urlAccountSid: string;
  private authHeader: string;
  private fetchFn: FetchFn;
  private logger: Logger;

  constructor(config: TwilioClientConfigInput, deps: TwilioClientDeps = {}) {
    this.config = parseClientConfig(config);
    this.urlAccountSid = this.config.urlAccountSid ?? this.config.accountSid;
    const credentials = Buffer.from(`${this.config.accountSid}:${this.config.authToken}`).toString(
      "base64",
    );
    this.authHeader = `Basic ${credentials}`;
    this.fetchFn = deps.fetch ?? ((url, init) => fetch(url, init));
    this.logger = deps.logger ?? silentLogger;
  }

  /** SID used in resource URLs. */
  get accountSid(): string {
    return this.urlAccountSid;
  }

  /**
   * Override the SID placed in resource URLs without touching the
   * Authorization header, for accounts that authenticate as a parent
   * account but act on a sub-account.
   */
  setAccountSid(accountSid: string): void {
    this.urlAccountSid = accountSid;
  }

  // ─── Messages ──────────────────────────────────────────────────────────────

  async sendMessage(message: OutboundMessage, options: RequestOptions = {}): Promise<Result<Message>> {
    const params: FormParams = [
      ["From", message.from],
      ["To", message.to],
      ["Body", message.body],
    ];
    const mediaUrls =
      message.mediaUrl === undefined
        ? []
        : Array.isArray(message.mediaUrl)
          ? message.mediaUrl
          : [message.mediaUrl];
    for (const url of mediaUrls) {
      params.push(["MediaUrl", url]);
    }
    if (message.statusCallback) {
      params.push(["StatusCallback", message.statusCallback]);
    }

    const result = await this.send(
      HTTP_METHODS.POST,
      this.resourceUrl("Messages"),
      MessageSchema,
      options,
      params,
    );
    if (result.ok) {
      this.logger.info(`[twilio] Message sent: ${result.value.sid} -> ${message.to}`);
    }
    return result;
  }

  async getMessage(messageSid: string, options: RequestOptions = {}): Promise<Result<Message>> {
    return this.send(
      HTTP_METHODS.GET,
      this.resourceUrl(`Messages/${encodeURIComponent(messageSid)}`),
      MessageSchema,
      options,
    );
  }

  /** Current delivery status of a message; `null` when Twilio omits it. */
  async getMessageStatus(
    messageSid: string,
    options: RequestOptions = {},
  ): Promise<Result<MessageStatus | null>> {
    const result = await this.getMessage(messageSid, options);
    return result.ok ? ok(result.value.status) : result;
  }

  // ─── Calls ─────────────────────────────────────────────────────────────────

  async makeCall(call: OutboundCall, options: RequestOptions = {}): Promise<Result<Call>> {
    const params: FormParams = [
      ["To", call.to],
      ["From", call.from],
      ["Url", call.url],
    ];
    if (call.method) {
      params.push(["Method", call.method]);
    }
    if (call.statusCallback) {
      params.push(["StatusCallback", call.statusCallback]);
    }

    const result = await this.send(
      HTTP_METHODS.POST,
      this.resourceUrl("Calls"),
      CallSchema,
      options,
      params,
    );
    if (result.ok) {
      this.logger.info(`[twilio] Call initiated: ${result.value.sid} -> ${call.to}`);
    }
    return result;
  }

  async getCall(callSid: string, options: RequestOptions = {}): Promise<Result<Call>> {
    return this.send(
      HTTP_METHODS.GET,
      this.resourceUrl(`Calls/${encodeURIComponent(callSid)}`),
      CallSchema,
      options,
    );
  }

  // ─── Lookup ────────────────────────────────────────────────────────────────

  async lookupPhoneNumber(
    number: string | number,
    options: LookupOptions = {},
  ): Promise<Result<PhoneNumberInfo>> {
    if (!/\d/.test(normalizeLookupNumber(number))) {
      return fail(new BadRequestError(`Not a phone number: '${number}'`));
    }
    const fields = options.fields ?? DEFAULT_LOOKUP_FIELDS;
    const url = `${this.config.lookupBaseUrl}${buildLookupPath(number, fields)}`;
    return this.send(HTTP_METHODS.GET, url, PhoneNumberInfoSchema, { signal: options.signal });
  }

  // ─── Webhooks ──────────────────────────────────────────────────────────────

  /** Verify a webhook with this account's auth token and decode it. */
  parseRequest<K extends InboundKind>(
    request: WebhookRequest,
    kind: K,
    options: VerifyOptions = {},
  ): Result<InboundEventOf<K>> {
    return parseWebhookRequest(request, kind, this.config.authToken, options);
  }

  async respondToWebhook<K extends InboundKind>(
    request: WebhookRequest,
    kind: K,
    logic: WebhookLogic<K>,
    options: VerifyOptions = {},
  ): Promise<WebhookResponse> {
    return respondToWebhook(request, kind, logic, {
      ...options,
      authToken: this.config.authToken,
      logger: this.logger,
    });
  }

  // ─── Transport ─────────────────────────────────────────────────────────────

  private resourceUrl(resource: string): string {
    return `${this.config.apiBaseUrl}/2010-04-01/Accounts/${encodeURIComponent(this.urlAccountSid)}/${resource}.json`;
  }

  private async send<T>(
    method: HttpMethod,
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions,
    params?: FormParams,
  ): Promise<Result<T>> {
    const headers: Record<string, string> = {
      Authorization: this.authHeader,
      Accept: "application/json",
    };
    let body: string | undefined;
    if (params) {
      headers["Content-Type"] = CONTENT_TYPES.FORM;
      body = new URLSearchParams(params).toString();
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, { method, headers, body, signal: options.signal });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.error(`[twilio] ${method} ${url} failed: ${msg}`);
      return fail(new NetworkError(`${method} ${url} failed: ${msg}`, { cause: err }));
    }

    if (response.status !== 200 && response.status !== 201) {
      const details = await this.readErrorDetails(response);
      this.logger.error(`[twilio] ${method} ${url} -> HTTP ${response.status}`);
      return fail(new HttpError(response.status, details));
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      return fail(new NetworkError(`Reading response of ${method} ${url} failed: ${msg}`, { cause: err }));
    }

    return decodeJson(text, schema);
  }

  private async readErrorDetails(response: Response): Promise<TwilioApiErrorDetails | undefined> {
    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      this.logger.warn(`[twilio] Could not read error body: ${err instanceof Error ? err.message : String(err)}`);
      return undefined;
    }
    const decoded = decodeJson(text, ApiErrorSchema);
    return decoded.ok ? decoded.value : undefined;
  }
}

/** JSON.parse then schema validation; both failures become ParsingError. */
export function decodeJson<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Result<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return fail(new ParsingError("Response body is not valid JSON"));
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return fail(new ParsingError(`Unexpected response shape (${where}${issue?.message ?? "invalid"})`));
  }
  return ok(parsed.data);
}
