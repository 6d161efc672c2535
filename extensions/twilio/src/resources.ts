/**
 * REST resources returned by the 2010-04-01 API.
 *
 * Twilio answers in snake_case JSON; the schemas below validate the fields
 * we care about and hand back camelCase records. Anything else in the
 * payload is ignored.
 */

import { z } from "zod";

// ─── Statuses ────────────────────────────────────────────────────────────────

export const MESSAGE_STATUSES = [
  "queued",
  "sending",
  "sent",
  "failed",
  "delivered",
  "undelivered",
  "receiving",
  "received",
  "accepted",
  "scheduled",
  "read",
  "partially_delivered",
  "canceled",
] as const;

export type MessageStatus = (typeof MESSAGE_STATUSES)[number];

export const MessageStatusSchema = z.enum(MESSAGE_STATUSES);

export function isMessageStatus(value: string): value is MessageStatus {
  return MessageStatusSchema.safeParse(value).success;
}

export const CALL_STATUSES = [
  "queued",
  "ringing",
  "in-progress",
  "canceled",
  "completed",
  "failed",
  "busy",
  "no-answer",
] as const;

export type CallStatus = (typeof CALL_STATUSES)[number];

export const CallStatusSchema = z.enum(CALL_STATUSES);

export function isCallStatus(value: string): value is CallStatus {
  return CallStatusSchema.safeParse(value).success;
}

// ─── Message ─────────────────────────────────────────────────────────────────

const nullableString = z.string().nullish().transform((v) => v ?? null);

/** Twilio sends some counters as strings ("1") and some as numbers. */
const nullableCount = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v, ctx) => {
    if (v === null || v === undefined) return null;
    const n = typeof v === "number" ? v : Number(v);
    if (!Number.isInteger(n) || n < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid count '${v}'` });
      return z.NEVER;
    }
    return n;
  });

export const MessageSchema = z
  .object({
    sid: z.string(),
    account_sid: nullableString,
    from: nullableString,
    to: nullableString,
    body: nullableString,
    status: MessageStatusSchema.nullish().transform((v) => v ?? null),
    direction: nullableString,
    num_segments: nullableCount,
    num_media: nullableCount,
    error_code: z.number().int().nullish().transform((v) => v ?? null),
    error_message: nullableString,
    date_created: nullableString,
    date_sent: nullableString,
    date_updated: nullableString,
    price: nullableString,
    price_unit: nullableString,
  })
  .transform((m) => ({
    sid: m.sid,
    accountSid: m.account_sid,
    from: m.from,
    to: m.to,
    body: m.body,
    status: m.status,
    direction: m.direction,
    numSegments: m.num_segments,
    numMedia: m.num_media,
    errorCode: m.error_code,
    errorMessage: m.error_message,
    dateCreated: m.date_created,
    dateSent: m.date_sent,
    dateUpdated: m.date_updated,
    price: m.price,
    priceUnit: m.price_unit,
  }));

export type Message = z.output<typeof MessageSchema>;

/** Parameters for POST /Messages.json. */
export interface OutboundMessage {
  from: string;
  to: string;
  body: string;
  /** One URL or several; each becomes its own MediaUrl field. */
  mediaUrl?: string | string[];
  statusCallback?: string;
}

// ─── Call ────────────────────────────────────────────────────────────────────

export const CallSchema = z
  .object({
    sid: z.string(),
    account_sid: nullableString,
    from: nullableString,
    to: nullableString,
    status: CallStatusSchema.nullish().transform((v) => v ?? null),
    direction: nullableString,
    duration: nullableCount,
    start_time: nullableString,
    end_time: nullableString,
  })
  .transform((c) => ({
    sid: c.sid,
    accountSid: c.account_sid,
    from: c.from,
    to: c.to,
    status: c.status,
    direction: c.direction,
    duration: c.duration,
    startTime: c.start_time,
    endTime: c.end_time,
  }));

export type Call = z.output<typeof CallSchema>;

/** Parameters for POST /Calls.json. `url` must answer with TwiML. */
export interface OutboundCall {
  from: string;
  to: string;
  url: string;
  method?: "GET" | "POST";
  statusCallback?: string;
}

// ─── Provider error payload ──────────────────────────────────────────────────

export const ApiErrorSchema = z
  .object({
    code: z.number().int().optional(),
    message: z.string().optional(),
    more_info: z.string().optional(),
  })
  .transform((e) => ({ code: e.code, message: e.message, moreInfo: e.more_info }));
