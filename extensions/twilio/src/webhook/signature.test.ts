import { createHmac } from "node:crypto";
import { describe, expect, it } from "vitest";
import {
  buildCanonicalUri,
  computeSignature,
  parseHostHeader,
  parseWebhookRequest,
  verifyWebhookRequest,
} from "./signature.js";
import type { WebhookRequest } from "./types.js";

const AUTH_TOKEN = "test-auth-token";

function sign(uri: string, token = AUTH_TOKEN): string {
  return createHmac("sha1", token).update(uri).digest("base64");
}

const FORM_BODY = "To=%2B15550100002&From=%2B15550100001&Body=Hello&MessageSid=SM123";
const SIGNED_POST_URI =
  "https://example.com/message" +
  "To+15550100002" +
  "From+15550100001" +
  "BodyHello" +
  "MessageSidSM123";
const SORTED_POST_URI =
  "https://example.com/message" +
  "BodyHello" +
  "From+15550100001" +
  "MessageSidSM123" +
  "To+15550100002";

function postRequest(overrides: Partial<WebhookRequest> = {}): WebhookRequest {
  return {
    method: "POST",
    url: "/message",
    headers: {
      host: "example.com",
      "content-type": "application/x-www-form-urlencoded",
      "x-twilio-signature": sign(SIGNED_POST_URI),
    },
    body: FORM_BODY,
    ...overrides,
  };
}

function errorKind(request: WebhookRequest): string | undefined {
  const result = verifyWebhookRequest(request, AUTH_TOKEN);
  return result.ok ? undefined : result.error.kind;
}

describe("computeSignature", () => {
  it("matches an independently computed HMAC-SHA1 and is deterministic", () => {
    const uri = "https://example.com/message?a=1";
    expect(computeSignature(AUTH_TOKEN, uri)).toBe(sign(uri));
    expect(computeSignature(AUTH_TOKEN, uri)).toBe(computeSignature(AUTH_TOKEN, uri));
  });

  it("depends on the key", () => {
    const uri = "https://example.com/message";
    expect(computeSignature("other-token", uri)).not.toBe(computeSignature(AUTH_TOKEN, uri));
  });
});

describe("buildCanonicalUri", () => {
  it("appends form fields after the target in mapping order", () => {
    const fields = new Map([
      ["From", "+1"],
      ["Body", "Hi"],
    ]);
    expect(buildCanonicalUri({ host: "example.com", target: "/sms?x=1", fields })).toBe(
      "https://example.com/sms?x=1From+1BodyHi",
    );
  });

  it("uses the public url instead of the host when given", () => {
    expect(
      buildCanonicalUri({ host: "ignored", target: "/call", publicUrl: "https://abc.ngrok.app//" }),
    ).toBe("https://abc.ngrok.app/call");
  });
});

describe("parseHostHeader", () => {
  it("drops the port and keeps casing", () => {
    expect(parseHostHeader("Example.com:3000")).toBe("Example.com");
  });

  it("keeps IPv6 brackets", () => {
    expect(parseHostHeader("[::1]:8080")).toBe("[::1]");
  });

  it("rejects empty or malformed values", () => {
    expect(parseHostHeader("")).toBeNull();
    expect(parseHostHeader("exa mple.com")).toBeNull();
    expect(parseHostHeader("example.com/path")).toBeNull();
  });
});

describe("verifyWebhookRequest", () => {
  it("accepts a correctly signed POST and returns its fields", () => {
    const result = verifyWebhookRequest(postRequest(), AUTH_TOKEN);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.get("Body")).toBe("Hello");
      expect([...result.value.keys()]).toEqual(["To", "From", "Body", "MessageSid"]);
    }
  });

  it("ignores the port in the Host header", () => {
    const request = postRequest();
    request.headers.host = "example.com:3000";
    expect(verifyWebhookRequest(request, AUTH_TOKEN).ok).toBe(true);
  });

  it("verifies a body signed in wire order", () => {
    const request = postRequest({ body: "To=x&Body=y" });
    request.headers["x-twilio-signature"] = sign("https://example.com/messageToxBodyy");
    expect(verifyWebhookRequest(request, AUTH_TOKEN).ok).toBe(true);
  });

  it("fails with auth when the fields are reordered", () => {
    const request = postRequest({ body: "MessageSid=SM123&Body=Hello&To=%2B15550100002&From=%2B15550100001" });
    expect(errorKind(request)).toBe("auth");
  });

  it("fails with auth when the body is signed in sorted order", () => {
    const request = postRequest();
    request.headers["x-twilio-signature"] = sign(SORTED_POST_URI);
    expect(errorKind(request)).toBe("auth");
  });

  it("accepts sorted signing when fieldOrder is sorted", () => {
    const request = postRequest({ body: "MessageSid=SM123&Body=Hello&To=%2B15550100002&From=%2B15550100001" });
    request.headers["x-twilio-signature"] = sign(SORTED_POST_URI);
    expect(verifyWebhookRequest(request, AUTH_TOKEN, { fieldOrder: "sorted" }).ok).toBe(true);
    expect(verifyWebhookRequest(postRequest(), AUTH_TOKEN, { fieldOrder: "sorted" }).ok).toBe(false);
  });

  it("accepts a correctly signed GET including its query string", () => {
    const url = "/message?Body=Hi&From=%2B15550100001";
    const request: WebhookRequest = {
      method: "GET",
      url,
      headers: { Host: "example.com", "X-Twilio-Signature": sign(`https://example.com${url}`) },
      body: "",
    };
    const result = verifyWebhookRequest(request, AUTH_TOKEN);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.get("From")).toBe("+15550100001");
    }
  });

  it("verifies against the public url when configured", () => {
    const request = postRequest();
    request.headers = {
      "x-twilio-signature": sign(SIGNED_POST_URI.replace("https://example.com", "https://abc.ngrok.app")),
    };
    const result = verifyWebhookRequest(request, AUTH_TOKEN, { publicUrl: "https://abc.ngrok.app" });
    expect(result.ok).toBe(true);
  });

  it("fails with auth when the header is missing", () => {
    const request = postRequest();
    delete request.headers["x-twilio-signature"];
    expect(errorKind(request)).toBe("auth");
  });

  it("fails with bad_request, not auth, on malformed base64", () => {
    const request = postRequest();
    request.headers["x-twilio-signature"] = "not base64!";
    expect(errorKind(request)).toBe("bad_request");
  });

  it("fails with bad_request on unpadded base64", () => {
    const request = postRequest();
    request.headers["x-twilio-signature"] = "abc";
    expect(errorKind(request)).toBe("bad_request");
  });

  it("fails with bad_request on a repeated signature header", () => {
    const request = postRequest();
    request.headers["x-twilio-signature"] = [sign(SIGNED_POST_URI), sign(SIGNED_POST_URI)];
    expect(errorKind(request)).toBe("bad_request");
  });

  it("fails with bad_request when the Host header is missing", () => {
    const request = postRequest();
    delete request.headers.host;
    expect(errorKind(request)).toBe("bad_request");
  });

  it("fails with bad_request on a wildcard target", () => {
    expect(errorKind(postRequest({ url: "*" }))).toBe("bad_request");
  });

  it("fails with bad_request on other methods", () => {
    expect(errorKind(postRequest({ method: "PUT" }))).toBe("bad_request");
  });

  it("fails with auth when the host casing differs", () => {
    const request = postRequest();
    request.headers.host = "Example.com";
    expect(errorKind(request)).toBe("auth");
  });

  it("fails with auth on a trailing slash", () => {
    expect(errorKind(postRequest({ url: "/message/" }))).toBe("auth");
  });

  it("fails with auth when a field value changes by one byte", () => {
    expect(errorKind(postRequest({ body: FORM_BODY.replace("Hello", "Hellp") }))).toBe("auth");
  });

  it("fails with auth when a field name changes", () => {
    expect(errorKind(postRequest({ body: FORM_BODY.replace("Body=", "Bode=") }))).toBe("auth");
  });

  it("fails with auth when the method changes", () => {
    expect(errorKind(postRequest({ method: "GET" }))).toBe("auth");
  });

  it("fails with auth when signed with another token", () => {
    const request = postRequest();
    request.headers["x-twilio-signature"] = sign(SIGNED_POST_URI, "other-token");
    expect(errorKind(request)).toBe("auth");
  });

  it("fails with auth on an empty signature", () => {
    const request = postRequest();
    request.headers["x-twilio-signature"] = "";
    expect(errorKind(request)).toBe("auth");
  });
});

describe("parseWebhookRequest", () => {
  it("decodes a verified request into the requested kind", () => {
    const result = parseWebhookRequest(postRequest(), "message", AUTH_TOKEN);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.kind).toBe("message");
      expect(result.value.message.body).toBe("Hello");
      expect(result.value.message.sid).toBe("SM123");
    }
  });

  it("reports parsing when a verified request lacks the kind's fields", () => {
    const result = parseWebhookRequest(postRequest(), "call", AUTH_TOKEN);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("parsing");
    }
  });
});
