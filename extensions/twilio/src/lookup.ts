/**
 * Lookup v2 phone number records.
 *
 * GET https://lookups.twilio.com/v2/PhoneNumbers/{E.164}?Fields=...
 */

import { z } from "zod";

export const NUMBER_TYPES = [
  "landline",
  "mobile",
  "fixedVoip",
  "nonFixedVoip",
  "personal",
  "tollFree",
  "premium",
  "sharedCost",
  "uan",
  "voicemail",
  "pager",
  "unknown",
] as const;

export type NumberType = (typeof NUMBER_TYPES)[number];

export const VALIDATION_ERRORS = [
  "TOO_SHORT",
  "TOO_LONG",
  "INVALID_BUT_POSSIBLE",
  "INVALID_COUNTRY_CODE",
  "INVALID_LENGTH",
  "NOT_A_NUMBER",
] as const;

export type ValidationError = (typeof VALIDATION_ERRORS)[number];

/** Data packages the Lookup API can add to a record. */
export type LookupField =
  | "caller_name"
  | "sim_swap"
  | "call_forwarding"
  | "line_status"
  | "line_type_intelligence"
  | "identity_match"
  | "reassigned_number"
  | "sms_pumping_risk"
  | "phone_number_quality_score"
  | "pre_fill";

export const DEFAULT_LOOKUP_FIELDS: readonly LookupField[] = ["line_type_intelligence"];

const LineTypeIntelligenceSchema = z
  .object({
    carrier_name: z.string().nullable(),
    error_code: z.number().int().positive().nullable(),
    mobile_country_code: z.string().max(3).nullable(),
    mobile_network_code: z.string().max(6).nullable(),
    type: z.enum(NUMBER_TYPES).nullable(),
  })
  .transform((l) => ({
    carrierName: l.carrier_name,
    errorCode: l.error_code,
    mobileCountryCode: l.mobile_country_code,
    mobileNetworkCode: l.mobile_network_code,
    type: l.type,
  }));

export type LineTypeIntelligence = z.output<typeof LineTypeIntelligenceSchema>;

export const PhoneNumberInfoSchema = z
  .object({
    calling_country_code: z.string().max(3),
    country_code: z.string().regex(/^[A-Z]{2}$/, "expected an ISO 3166 alpha-2 code"),
    line_type_intelligence: LineTypeIntelligenceSchema.nullish().transform((v) => v ?? null),
    national_format: z.string(),
    phone_number: z.string(),
    valid: z.boolean(),
    validation_errors: z
      .array(z.enum(VALIDATION_ERRORS))
      .nullish()
      .transform((v) => v ?? []),
  })
  .transform((p) => ({
    callingCountryCode: p.calling_country_code,
    countryCode: p.country_code,
    lineTypeIntelligence: p.line_type_intelligence,
    nationalFormat: p.national_format,
    phoneNumber: p.phone_number,
    valid: p.valid,
    validationErrors: p.validation_errors,
  }));

export type PhoneNumberInfo = z.output<typeof PhoneNumberInfoSchema>;

export interface LookupOptions {
  fields?: readonly LookupField[];
  signal?: AbortSignal;
}

/**
 * "+1 (555) 010-0000", "15550100000" and 15550100000 all become "+15550100000".
 * A `+` anywhere but the front is dropped.
 */
export function normalizeLookupNumber(number: string | number): string {
  return `+${String(number).replace(/\D/g, "")}`;
}

export function buildLookupPath(number: string | number, fields: readonly LookupField[]): string {
  const path = `/v2/PhoneNumbers/${normalizeLookupNumber(number)}`;
  if (fields.length === 0) return path;
  return `${path}?Fields=${fields.join(",")}`;
}
