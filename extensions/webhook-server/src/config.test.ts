import { describe, expect, it } from "vitest";
import { loadServerConfig } from "./config.js";

describe("loadServerConfig", () => {
  it("applies defaults", () => {
    const config = loadServerConfig({
      TWILIO_ACCOUNT_SID: "ACtest",
      TWILIO_AUTH_TOKEN: "test-auth-token",
    });
    expect(config).toEqual({
      accountSid: "ACtest",
      authToken: "test-auth-token",
      fieldOrder: "received",
      bodyLimit: 1_048_576,
      host: "127.0.0.1",
      port: 3000,
      logLevel: "info",
    });
  });

  it("reads every variable", () => {
    const config = loadServerConfig({
      TWILIO_ACCOUNT_SID: "ACtest",
      TWILIO_AUTH_TOKEN: "test-auth-token",
      TWILIO_PUBLIC_URL: "https://abc.example.net",
      TWILIO_FIELD_ORDER: "sorted",
      WEBHOOK_BODY_LIMIT: "4096",
      WEBHOOK_HOST: "0.0.0.0",
      WEBHOOK_PORT: "8080",
      LOG_LEVEL: "debug",
    });
    expect(config.publicUrl).toBe("https://abc.example.net");
    expect(config.host).toBe("0.0.0.0");
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe("debug");
    expect(config.fieldOrder).toBe("sorted");
    expect(config.bodyLimit).toBe(4096);
  });

  it("treats blank values as unset", () => {
    const config = loadServerConfig({
      TWILIO_ACCOUNT_SID: "ACtest",
      TWILIO_AUTH_TOKEN: "test-auth-token",
      WEBHOOK_PORT: "  ",
    });
    expect(config.port).toBe(3000);
  });

  it("names missing credentials", () => {
    expect(() => loadServerConfig({ TWILIO_ACCOUNT_SID: "ACtest" })).toThrow(
      "Invalid webhook server config: authToken: Required",
    );
  });

  it("rejects an out-of-range port", () => {
    expect(() =>
      loadServerConfig({
        TWILIO_ACCOUNT_SID: "ACtest",
        TWILIO_AUTH_TOKEN: "test-auth-token",
        WEBHOOK_PORT: "70000",
      }),
    ).toThrow(/^Invalid webhook server config: port: /);
  });

  it("rejects an unknown log level", () => {
    expect(() =>
      loadServerConfig({
        TWILIO_ACCOUNT_SID: "ACtest",
        TWILIO_AUTH_TOKEN: "test-auth-token",
        LOG_LEVEL: "loud",
      }),
    ).toThrow(/logLevel/);
  });
});
