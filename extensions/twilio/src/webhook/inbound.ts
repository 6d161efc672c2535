/**
 * Typed inbound webhook events.
 *
 * Twilio posts the same flat form for every event; which fields matter
 * depends on what the URL was configured for. Each kind has a pure decoder
 * from a field mapping; adding a kind means adding a decoder to the table.
 */

import { ParsingError, fail, ok, type Result } from "../errors.js";
import { isCallStatus, isMessageStatus, type CallStatus, type MessageStatus } from "../resources.js";
import type { FieldMapping } from "./fields.js";

export interface InboundMedia {
  url: string;
  contentType: string | null;
}

/**
 * Incoming SMS/MMS (Messaging webhook). Every field is optional on the wire;
 * a form carrying only `Body` still decodes.
 */
export interface InboundMessage {
  sid: string | null;
  from: string | null;
  to: string | null;
  body: string | null;
  accountSid: string | null;
  status: MessageStatus | null;
  media: InboundMedia[];
}

/** Incoming or status-updated voice call (Voice webhook). */
export interface InboundCall {
  sid: string;
  from: string;
  to: string;
  status: CallStatus;
  accountSid: string | null;
  direction: string | null;
  /** DTMF digits collected by <Gather>. */
  digits: string | null;
  speechResult: string | null;
}

export type InboundEvent =
  | { kind: "message"; message: InboundMessage }
  | { kind: "call"; call: InboundCall };

export type InboundKind = InboundEvent["kind"];

export type InboundEventOf<K extends InboundKind> = Extract<InboundEvent, { kind: K }>;

// ─── Field helpers ───────────────────────────────────────────────────────────

function required(fields: FieldMapping, name: string): Result<string> {
  const value = fields.get(name);
  return value === undefined ? fail(new ParsingError(`Missing required field '${name}'`)) : ok(value);
}

function optional(fields: FieldMapping, name: string): string | null {
  return fields.get(name) ?? null;
}

function collectMedia(fields: FieldMapping): Result<InboundMedia[]> {
  const raw = fields.get("NumMedia");
  if (raw === undefined) return ok([]);
  const count = /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(count)) {
    return fail(new ParsingError(`Invalid NumMedia '${raw}'`));
  }
  const media: InboundMedia[] = [];
  for (let i = 0; i < count; i++) {
    const url = fields.get(`MediaUrl${i}`);
    if (url === undefined) {
      return fail(new ParsingError(`Missing required field 'MediaUrl${i}'`));
    }
    media.push({ url, contentType: optional(fields, `MediaContentType${i}`) });
  }
  return ok(media);
}

// ─── Decoders ────────────────────────────────────────────────────────────────

export function decodeInboundMessage(fields: FieldMapping): Result<InboundMessage> {
  const rawStatus = optional(fields, "SmsStatus");
  let status: MessageStatus | null = null;
  if (rawStatus !== null) {
    if (!isMessageStatus(rawStatus)) {
      return fail(new ParsingError(`Invalid SmsStatus '${rawStatus}'`));
    }
    status = rawStatus;
  }

  const media = collectMedia(fields);
  if (!media.ok) return media;

  return ok({
    sid: optional(fields, "MessageSid"),
    from: optional(fields, "From"),
    to: optional(fields, "To"),
    body: optional(fields, "Body"),
    accountSid: optional(fields, "AccountSid"),
    status,
    media: media.value,
  });
}

export function decodeInboundCall(fields: FieldMapping): Result<InboundCall> {
  const sid = required(fields, "CallSid");
  if (!sid.ok) return sid;
  const from = required(fields, "From");
  if (!from.ok) return from;
  const to = required(fields, "To");
  if (!to.ok) return to;
  const status = required(fields, "CallStatus");
  if (!status.ok) return status;
  if (!isCallStatus(status.value)) {
    return fail(new ParsingError(`Invalid CallStatus '${status.value}'`));
  }

  return ok({
    sid: sid.value,
    from: from.value,
    to: to.value,
    status: status.value,
    accountSid: optional(fields, "AccountSid"),
    direction: optional(fields, "Direction"),
    digits: optional(fields, "Digits"),
    speechResult: optional(fields, "SpeechResult"),
  });
}

type InboundDecoders = {
  [K in InboundKind]: (fields: FieldMapping) => Result<InboundEventOf<K>>;
};

const inboundDecoders: InboundDecoders = {
  message: (fields) => {
    const message = decodeInboundMessage(fields);
    return message.ok ? ok<InboundEventOf<"message">>({ kind: "message", message: message.value }) : message;
  },
  call: (fields) => {
    const call = decodeInboundCall(fields);
    return call.ok ? ok<InboundEventOf<"call">>({ kind: "call", call: call.value }) : call;
  },
};

export function decodeInbound<K extends InboundKind>(kind: K, fields: FieldMapping): Result<InboundEventOf<K>> {
  const decoder: InboundDecoders[K] = inboundDecoders[kind];
  return decoder(fields);
}
