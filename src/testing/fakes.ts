import type { AddressProvider } from "../lib/addressProvider.js";
import type { Keystore } from "../lib/keystore.js";
import type { JourneyRecord } from "../lib/journeyRecord.js";
import type { AddressCandidate } from "../lib/types.js";

export class MemoryKeystore implements Keystore {
  readonly records = new Map<string, JourneyRecord>();
  puts = 0;

  async get(journeyId: string): Promise<JourneyRecord | null> {
    return this.records.get(journeyId) ?? null;
  }

  async put(journeyId: string, record: JourneyRecord): Promise<void> {
    this.puts++;
    this.records.set(journeyId, record);
  }
}

export type ProviderCall =
  | { op: "queryByPostcode"; postcode: string; filter?: string }
  | { op: "queryByOutcodeAndNumber"; outcode: string; number: string }
  | { op: "queryById"; id: string };

/** Serves a fixed list of candidates, keyed by postcode or outcode. */
export class FakeAddressProvider implements AddressProvider {
  readonly calls: ProviderCall[] = [];
  failWith: Error | undefined;
  /** Addresses whose by-id copy differs from the one the postcode search returns. */
  readonly updated = new Map<string, AddressCandidate>();

  constructor(private readonly byPostcode: Record<string, AddressCandidate[]> = {}) {}

  async queryByPostcode(postcode: string, filter?: string): Promise<AddressCandidate[]> {
    this.calls.push({ op: "queryByPostcode", postcode, ...(filter ? { filter } : {}) });
    if (this.failWith) throw this.failWith;
    const all = this.byPostcode[postcode] ?? [];
    return filter ? all.filter((c) => c.lines.join(" ").toLowerCase().includes(filter.toLowerCase())) : all;
  }

  async queryByOutcodeAndNumber(outcode: string, number: string): Promise<AddressCandidate[]> {
    this.calls.push({ op: "queryByOutcodeAndNumber", outcode, number });
    if (this.failWith) throw this.failWith;
    return (this.byPostcode[outcode] ?? []).filter((c) => c.lines.some((l) => l.includes(`BFPO ${number}`)));
  }

  async queryById(id: string): Promise<AddressCandidate | null> {
    this.calls.push({ op: "queryById", id });
    if (this.failWith) throw this.failWith;
    return this.updated.get(id) ?? Object.values(this.byPostcode).flat().find((c) => c.id === id) ?? null;
  }
}

export function candidate(id: string, lines: string[], postcode = "ZZ1 1ZZ", code = "GB"): AddressCandidate {
  return {
    id,
    lines,
    town: "Testtown",
    postcode,
    country: { code, name: code === "GB" ? "United Kingdom" : "" },
  };
}
