import type { AddressProvider } from "./addressProvider.js";
import { UK } from "./countries.js";
import { LookupUnavailableError } from "./errors.js";
import { logger } from "./logger.js";
import type { Postcode } from "./postcode.js";
import type { AddressCandidate } from "./types.js";

// Every BFPO address sits under this outcode.
export const BFPO_OUTCODE = "BF1";

/** "BFPO 123" and " 123 " both become "123"; blank or "-" means no number. */
export function normalizeBfpoNumber(raw: string | undefined): string | undefined {
  const t = (raw || "").trim();
  if (!t || t === "-") return undefined;
  if (t.toUpperCase().startsWith("BFPO ")) return t.substring(5).trim() || undefined;
  return t;
}

function withGbAlias(candidate: AddressCandidate): AddressCandidate {
  const code = candidate.country.code.trim().toUpperCase();
  if (code !== "UK") return candidate;
  return { ...candidate, country: UK };
}

export class AddressMatcher {
  constructor(private readonly provider: AddressProvider) {}

  /**
   * Candidates at the given postcode. In uk mode only GB addresses survive;
   * an empty array means the provider knows nothing at that postcode.
   */
  async find(postcode: Postcode, filter: string | undefined, ukMode: boolean): Promise<AddressCandidate[]> {
    const found = await this.call("queryByPostcode", () => this.provider.queryByPostcode(postcode, filter || undefined));
    const mapped = found.map(withGbAlias);
    return ukMode ? mapped.filter((c) => c.country.code === UK.code) : mapped;
  }

  async findBfpo(number: string): Promise<AddressCandidate[]> {
    const found = await this.call("queryByOutcodeAndNumber", () =>
      this.provider.queryByOutcodeAndNumber(BFPO_OUTCODE, number)
    );
    return found.map(withGbAlias);
  }

  /** The provider's current copy of one address, or null when it no longer has it. */
  async findById(id: string): Promise<AddressCandidate | null> {
    const found = await this.call("queryById", () => this.provider.queryById(id));
    return found ? withGbAlias(found) : null;
  }

  private async call<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (err) {
      if (err instanceof LookupUnavailableError) throw err;
      logger.warn({ operation, err: String(err) }, "Address provider call failed");
      throw new LookupUnavailableError(`Address lookup failed during ${operation}`, { cause: err });
    }
  }
}
