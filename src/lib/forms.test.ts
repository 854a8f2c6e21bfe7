import { describe, it, expect } from "vitest";
import { bindBfpoForm, bindCountryForm, bindLookupForm, bindSelectForm, validateEdit, valuesOf } from "./forms.js";

const uk = { ukMode: true };
const intl = { ukMode: false };

describe("valuesOf", () => {
  it("takes the first of repeated fields and skips non-strings", () => {
    expect(valuesOf(["a", "b", "c"], { a: ["x", "y"], b: 3, c: "z" })).toEqual({ a: "x", c: "z" });
    expect(valuesOf(["a"], "not a body")).toEqual({});
  });
});

describe("bindLookupForm", () => {
  it("normalizes the postcode and keeps a filter", () => {
    expect(bindLookupForm({ postcode: "zz11zz", filter: " 5 " }, true)).toEqual({
      ok: true,
      value: { postcode: "ZZ1 1ZZ", filter: "5" },
    });
  });

  it("reports the postcode and an oversized filter together", () => {
    const result = bindLookupForm({ postcode: "", filter: "x".repeat(256) }, true);
    expect(result).toEqual({
      ok: false,
      error: [
        { field: "filter", code: "FieldTooLong", message: "Enter 255 characters or less" },
        { field: "postcode", code: "EmptyPostcode", message: "Enter a UK postcode" },
      ],
    });
  });
});

describe("bindBfpoForm", () => {
  it("needs a postcode or a number", () => {
    expect(bindBfpoForm({ postcode: " ", number: "-" })).toEqual({
      ok: false,
      error: [{ field: "postcode", code: "BfpoRequired", message: "Enter a postcode or a BFPO number" }],
    });
  });

  it("prefers the postcode", () => {
    expect(bindBfpoForm({ postcode: "bf13aa", number: "123" })).toEqual({
      ok: true,
      value: { kind: "postcode", postcode: "BF1 3AA" },
    });
  });

  it("accepts a prefixed number and rejects a non-numeric one", () => {
    expect(bindBfpoForm({ number: "BFPO 123" })).toEqual({ ok: true, value: { kind: "number", number: "123" } });
    expect(bindBfpoForm({ number: "12a" })).toEqual({
      ok: false,
      error: [{ field: "number", code: "InvalidBfpoNumber", message: "Enter a BFPO number, like 123" }],
    });
  });
});

describe("bindSelectForm", () => {
  it("requires a non-blank id of at most 255 characters", () => {
    const invalid = { ok: false, error: [{ field: "addressId", code: "InvalidSelection", message: "Select an address" }] };
    expect(bindSelectForm({ addressId: "  " })).toEqual(invalid);
    expect(bindSelectForm({ addressId: "a".repeat(256) })).toEqual(invalid);
    expect(bindSelectForm({ addressId: "a".repeat(255) })).toEqual({ ok: true, value: "a".repeat(255) });
  });
});

describe("bindCountryForm", () => {
  it("looks the code up case-insensitively", () => {
    expect(bindCountryForm({ countryCode: "fr" })).toEqual({ ok: true, value: { code: "FR", name: "France" } });
    expect(bindCountryForm({ countryCode: "XX" }).ok).toBe(false);
  });
});

describe("validateEdit", () => {
  it("requires at least one line or a town", () => {
    const result = validateEdit({ line1: " ", postcode: "ZZ1 1ZZ" }, uk);
    expect(result).toEqual({
      ok: false,
      error: [{ field: "line1", code: "AtLeastOneLineRequired", message: "Enter at least one address line or a town" }],
    });
  });

  it.each(["line1", "line2", "line3", "town"])("accepts %s on its own", (key) => {
    const result = validateEdit({ [key]: "Somewhere" }, uk);
    expect(result).toEqual({ ok: true, value: { [key]: "Somewhere", country: { code: "GB", name: "United Kingdom" } } });
  });

  it("accepts 255 characters and rejects 256", () => {
    expect(validateEdit({ line1: "a".repeat(255) }, uk).ok).toBe(true);
    expect(validateEdit({ line1: "a".repeat(256) }, uk)).toEqual({
      ok: false,
      error: [{ field: "line1", code: "FieldTooLong", message: "Address line 1 must be 255 characters or less" }],
    });
  });

  it("normalizes a GB postcode and rejects a bad one", () => {
    expect(validateEdit({ line1: "1 Road", postcode: "zz11zz" }, uk)).toEqual({
      ok: true,
      value: { line1: "1 Road", postcode: "ZZ1 1ZZ", country: { code: "GB", name: "United Kingdom" } },
    });
    expect(validateEdit({ line1: "1 Road", postcode: "NOPE" }, uk)).toEqual({
      ok: false,
      error: [{ field: "postcode", code: "InvalidPostcode", message: "Enter a real UK postcode, like AA1 1AA" }],
    });
  });

  it("forces GB in uk mode whatever the form says", () => {
    const result = validateEdit({ line1: "1 Road", countryCode: "FR" }, uk);
    expect(result.ok && result.value.country.code).toBe("GB");
  });

  it("uses the form country, then the picked country, then GB", () => {
    const country = (values: Record<string, string>, countryCode?: string) => {
      const result = validateEdit({ line1: "1 Road", ...values }, { ...intl, countryCode });
      return result.ok ? result.value.country.code : undefined;
    };
    expect(country({ countryCode: "DE" }, "FR")).toBe("DE");
    expect(country({}, "FR")).toBe("FR");
    expect(country({})).toBe("GB");
  });

  it("leaves foreign postcodes as typed", () => {
    const result = validateEdit({ town: "Paris", postcode: "75001", countryCode: "FR" }, intl);
    expect(result).toEqual({
      ok: true,
      value: { town: "Paris", postcode: "75001", country: { code: "FR", name: "France" } },
    });
  });

  it("rejects an unknown country", () => {
    expect(validateEdit({ line1: "1 Road", countryCode: "XX" }, intl)).toEqual({
      ok: false,
      error: [{ field: "countryCode", code: "InvalidCountry", message: "Select a country" }],
    });
  });

  it("keeps the organisation", () => {
    const result = validateEdit({ organisation: "Acme Ltd", line1: "1 Road" }, uk);
    expect(result.ok && result.value.organisation).toBe("Acme Ltd");
  });
});
