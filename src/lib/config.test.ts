import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      env: "development",
      port: 9028,
      basePath: "/lookup-address",
      redisUrl: "redis://redis:6379",
      keystore: { prefix: "alf:journey:", ttlSeconds: 3600 },
      addressLookup: { baseUrl: "http://address-lookup:9022", timeoutMs: 5000, retries: 0 },
      api: { user: undefined, pass: undefined },
      cookieSecret: undefined,
    });
  });

  it("reads and coerces values", () => {
    const config = loadConfig({
      PORT: "8080",
      KEYSTORE_TTL_SECONDS: "60",
      ADDRESS_LOOKUP_URL: "http://lookup.test/",
      ADDRESS_LOOKUP_RETRIES: "2",
      API_USER: " svc ",
      API_PASS: "test-secret",
      COOKIE_SECRET: "",
    });
    expect(config.port).toBe(8080);
    expect(config.keystore.ttlSeconds).toBe(60);
    expect(config.addressLookup).toEqual({ baseUrl: "http://lookup.test", timeoutMs: 5000, retries: 2 });
    expect(config.api).toEqual({ user: "svc", pass: "test-secret" });
    expect(config.cookieSecret).toBeUndefined();
  });

  it("names the keys that are out of range", () => {
    expect(() => loadConfig({ PORT: "0", ADDRESS_LOOKUP_RETRIES: "9" })).toThrow(
      "Invalid environment configuration: PORT, ADDRESS_LOOKUP_RETRIES"
    );
  });
});
