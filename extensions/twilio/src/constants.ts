export const HTTP_METHODS = Object.freeze({
  GET: "GET",
  POST: "POST",
} as const);

export type HttpMethod = (typeof HTTP_METHODS)[keyof typeof HTTP_METHODS];

export const HEADERS = Object.freeze({
  SIGNATURE: "x-twilio-signature",
  HOST: "host",
  CONTENT_TYPE: "content-type",
  CONTENT_LENGTH: "content-length",
} as const);

export const CONTENT_TYPES = Object.freeze({
  XML: "text/xml",
  TEXT: "text/plain; charset=utf-8",
  FORM: "application/x-www-form-urlencoded",
} as const);
