import { describe, it, expect } from "vitest";
import { journeyRecord } from "../testing/records.js";
import { parseJourneyRecord, UnsupportedRecordError } from "./journeyRecord.js";

describe("parseJourneyRecord", () => {
  it("reads back a stored record", () => {
    const record = journeyRecord(
      { ukMode: true },
      {
        step: "confirm",
        selectedAddress: {
          kind: "manual",
          address: { line1: "1 Road", country: { code: "GB", name: "United Kingdom" } },
        },
      }
    );
    expect(parseJourneyRecord(JSON.parse(JSON.stringify(record)))).toEqual(record);
  });

  it("starts new records at begin with nothing staged", () => {
    const record = journeyRecord();
    expect(record.step).toBe("begin");
    expect(record.createdAt).toBe("2024-01-01T00:00:00.000Z");
    expect(record.selectedAddress).toBeUndefined();
    expect(record.confirmedAddress).toBeUndefined();
  });

  it("rejects other schema versions", () => {
    const stored = { ...journeyRecord(), schemaVersion: 2 };
    expect(() => parseJourneyRecord(stored)).toThrow("Unsupported journey record schema version: 2");
    expect(() => parseJourneyRecord(null)).toThrow(UnsupportedRecordError);
  });

  it("rejects a record of the right version but the wrong shape", () => {
    const stored = { ...journeyRecord(), step: "somewhere" };
    expect(() => parseJourneyRecord(stored)).toThrow(UnsupportedRecordError);
  });
});
