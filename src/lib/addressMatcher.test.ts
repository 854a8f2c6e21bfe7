import { describe, it, expect } from "vitest";
import { candidate, FakeAddressProvider } from "../testing/fakes.js";
import { AddressMatcher, normalizeBfpoNumber } from "./addressMatcher.js";
import { LookupUnavailableError } from "./errors.js";

const mixed = [
  candidate("1", ["1 Foreign Street"], "ZZ11 1ZZ", "foo"),
  candidate("2", ["2 Home Street"], "ZZ11 1ZZ", "UK"),
  candidate("3", ["3 Home Street"], "ZZ11 1ZZ", "UK"),
];

describe("AddressMatcher.find", () => {
  it("keeps only GB addresses in uk mode, mapping the UK alias", async () => {
    const matcher = new AddressMatcher(new FakeAddressProvider({ "ZZ11 1ZZ": mixed }));
    const found = await matcher.find("ZZ11 1ZZ", undefined, true);
    expect(found.map((c) => c.country)).toEqual([
      { code: "GB", name: "United Kingdom" },
      { code: "GB", name: "United Kingdom" },
    ]);
    expect(found.map((c) => c.id)).toEqual(["2", "3"]);
  });

  it("returns everything outside uk mode", async () => {
    const matcher = new AddressMatcher(new FakeAddressProvider({ "ZZ11 1ZZ": mixed }));
    const found = await matcher.find("ZZ11 1ZZ", undefined, false);
    expect(found.map((c) => c.country.code)).toEqual(["foo", "GB", "GB"]);
  });

  it("returns an empty list when uk mode filters out every candidate", async () => {
    const foreign = [candidate("1", ["1 Rue"], "ZZ11 1ZZ", "FR")];
    const matcher = new AddressMatcher(new FakeAddressProvider({ "ZZ11 1ZZ": foreign }));
    await expect(matcher.find("ZZ11 1ZZ", undefined, true)).resolves.toEqual([]);
  });

  it("returns an empty list when nothing is known at the postcode", async () => {
    const matcher = new AddressMatcher(new FakeAddressProvider());
    await expect(matcher.find("ZZ1 1ZZ", undefined, false)).resolves.toEqual([]);
  });

  it("passes the filter to the provider and drops a blank one", async () => {
    const provider = new FakeAddressProvider();
    const matcher = new AddressMatcher(provider);
    await matcher.find("ZZ1 1ZZ", "Home", false);
    await matcher.find("ZZ1 1ZZ", "", false);
    expect(provider.calls).toEqual([
      { op: "queryByPostcode", postcode: "ZZ1 1ZZ", filter: "Home" },
      { op: "queryByPostcode", postcode: "ZZ1 1ZZ" },
    ]);
  });

  it("turns provider failures into LookupUnavailableError", async () => {
    const provider = new FakeAddressProvider();
    provider.failWith = new Error("connection refused");
    const matcher = new AddressMatcher(provider);
    const err = await matcher.find("ZZ1 1ZZ", undefined, true).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LookupUnavailableError);
    expect(err).toHaveProperty("message", "Address lookup failed during queryByPostcode");
    expect(provider.calls).toHaveLength(1);
  });
});

describe("AddressMatcher.findBfpo", () => {
  it("queries the BF1 outcode with the number", async () => {
    const provider = new FakeAddressProvider({ BF1: [candidate("b1", ["Unit 4", "BFPO 123"], "BF1 3AA", "UK")] });
    const found = await new AddressMatcher(provider).findBfpo("123");
    expect(provider.calls).toEqual([{ op: "queryByOutcodeAndNumber", outcode: "BF1", number: "123" }]);
    expect(found.map((c) => [c.id, c.country.code])).toEqual([["b1", "GB"]]);
  });
});

describe("AddressMatcher.findById", () => {
  it("returns one address with the UK alias mapped, or null", async () => {
    const provider = new FakeAddressProvider({ "ZZ11 1ZZ": mixed });
    const matcher = new AddressMatcher(provider);
    await expect(matcher.findById("2")).resolves.toMatchObject({ id: "2", country: { code: "GB", name: "United Kingdom" } });
    await expect(matcher.findById("missing")).resolves.toBeNull();
    expect(provider.calls).toEqual([
      { op: "queryById", id: "2" },
      { op: "queryById", id: "missing" },
    ]);
  });

  it("turns provider failures into LookupUnavailableError", async () => {
    const provider = new FakeAddressProvider();
    provider.failWith = new Error("timeout");
    await expect(new AddressMatcher(provider).findById("2")).rejects.toBeInstanceOf(LookupUnavailableError);
  });
});

describe("normalizeBfpoNumber", () => {
  it("strips a BFPO prefix and whitespace", () => {
    expect(normalizeBfpoNumber(" BFPO 123 ")).toBe("123");
    expect(normalizeBfpoNumber("bfpo 45")).toBe("45");
    expect(normalizeBfpoNumber("678")).toBe("678");
  });

  it("treats blank and dash as no number", () => {
    expect(normalizeBfpoNumber("")).toBeUndefined();
    expect(normalizeBfpoNumber("  -  ")).toBeUndefined();
    expect(normalizeBfpoNumber(undefined)).toBeUndefined();
  });
});
