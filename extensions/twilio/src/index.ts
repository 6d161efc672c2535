/**
 * @callwire/twilio: Twilio REST client, webhook verification and TwiML.
 *
 * Architecture:
 *
 *   Twilio ──► webhook ──► verifyWebhookRequest ──► decodeInbound ──► logic
 *                                                                       │
 *   Twilio ◄── 200 text/xml ◄──────────── Twiml.toXml() ◄───────────────┘
 *
 *   caller ──► TwilioClient ──► fetch ──► api.twilio.com / lookups.twilio.com
 */

export { TwilioClient, decodeJson } from "./client.js";
export type { FetchFn, RequestOptions, TwilioClientDeps } from "./client.js";
export {
  DEFAULT_API_BASE_URL,
  DEFAULT_LOOKUP_BASE_URL,
  TwilioClientConfigSchema,
  formatConfigIssues,
  parseClientConfig,
} from "./config-schema.js";
export type { TwilioClientConfig, TwilioClientConfigInput } from "./config-schema.js";
export { CONTENT_TYPES, HEADERS, HTTP_METHODS } from "./constants.js";
export type { HttpMethod } from "./constants.js";
export {
  AuthError,
  BadRequestError,
  HttpError,
  NetworkError,
  ParsingError,
  TwilioError,
  fail,
  ok,
} from "./errors.js";
export type { Result, TwilioApiErrorDetails, TwilioErrorKind } from "./errors.js";
export { silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export {
  DEFAULT_LOOKUP_FIELDS,
  NUMBER_TYPES,
  PhoneNumberInfoSchema,
  VALIDATION_ERRORS,
  normalizeLookupNumber,
} from "./lookup.js";
export type {
  LineTypeIntelligence,
  LookupField,
  LookupOptions,
  NumberType,
  PhoneNumberInfo,
  ValidationError,
} from "./lookup.js";
export {
  CALL_STATUSES,
  CallSchema,
  MESSAGE_STATUSES,
  MessageSchema,
  isCallStatus,
  isMessageStatus,
} from "./resources.js";
export type {
  Call,
  CallStatus,
  Message,
  MessageStatus,
  OutboundCall,
  OutboundMessage,
} from "./resources.js";
export { Twiml, escapeXmlAttribute, escapeXmlText, renderVerb } from "./twiml.js";
export type { TwimlVerb, Voice } from "./twiml.js";
export {
  concatenateFields,
  fieldsFromEntries,
  fieldsFromTarget,
  fieldsFromUrlEncoded,
  sortFields,
} from "./webhook/fields.js";
export type { FieldMapping, FieldOrder } from "./webhook/fields.js";
export { decodeInbound, decodeInboundCall, decodeInboundMessage } from "./webhook/inbound.js";
export type {
  InboundCall,
  InboundEvent,
  InboundEventOf,
  InboundKind,
  InboundMedia,
  InboundMessage,
} from "./webhook/inbound.js";
export {
  badRequestResponse,
  respondToWebhook,
  twimlResponse,
} from "./webhook/respond.js";
export type { RespondOptions, WebhookLogic } from "./webhook/respond.js";
export {
  buildCanonicalUri,
  computeSignature,
  parseHostHeader,
  parseWebhookRequest,
  verifyWebhookRequest,
} from "./webhook/signature.js";
export type { CanonicalUriParts, VerifyOptions } from "./webhook/signature.js";
export type { HeaderValue, WebhookRequest, WebhookResponse } from "./webhook/types.js";
