import { describe, it, expect } from "vitest";
import { isValidPostcode, normalizePostcode } from "./postcode.js";

describe("normalizePostcode", () => {
  it("uppercases and puts a single space before the inward code", () => {
    expect(normalizePostcode("zz111zz")).toEqual({ ok: true, value: "ZZ11 1ZZ" });
    expect(normalizePostcode("zz11zz")).toEqual({ ok: true, value: "ZZ1 1ZZ" });
    expect(normalizePostcode("  Zz1   1zZ ")).toEqual({ ok: true, value: "ZZ1 1ZZ" });
  });

  it("is idempotent", () => {
    const once = normalizePostcode("zz11zz");
    expect(once.ok).toBe(true);
    if (once.ok) expect(normalizePostcode(once.value)).toEqual(once);
  });

  it.each(["A1 1AA", "A11 1AA", "AA1 1AA", "AA11 1AA", "A1A 1AA", "AA1A 1AA", "EC1A 1BB", "BF1 3AA"])(
    "accepts %s",
    (raw) => {
      expect(isValidPostcode(raw)).toBe(true);
    }
  );

  it.each(["AAA1 1AA", "1A 1AA", "AA1 AAA", "AA1 11A", "AA1", "AA1 1A"])("rejects %s as malformed", (raw) => {
    const result = normalizePostcode(raw, true);
    expect(result).toEqual({
      ok: false,
      error: { code: "MalformedPostcode", message: "Enter a real UK postcode, like AA1 1AA" },
    });
  });

  it("reports empty input with a message that depends on uk mode", () => {
    expect(normalizePostcode("   ", true)).toEqual({
      ok: false,
      error: { code: "EmptyPostcode", message: "Enter a UK postcode" },
    });
    expect(normalizePostcode("", false)).toEqual({
      ok: false,
      error: { code: "EmptyPostcode", message: "Enter a postcode" },
    });
  });

  it("rejects punctuation before checking the shape", () => {
    const result = normalizePostcode("ZZ1-1ZZ");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("InvalidCharacters");
      expect(result.error.message).toBe("Enter a real postcode, using only letters and numbers");
    }
  });
});
