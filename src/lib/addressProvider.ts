import { z } from "zod";
import type { Dispatcher } from "undici";
import { httpGetJson, HttpError } from "./http.js";
import type { AddressCandidate } from "./types.js";

/**
 * Source of candidate addresses. Implementations return country codes as the
 * upstream service reports them; alias clean-up happens in the matcher.
 */
export interface AddressProvider {
  queryByPostcode(postcode: string, filter?: string): Promise<AddressCandidate[]>;
  queryByOutcodeAndNumber(outcode: string, number: string): Promise<AddressCandidate[]>;
  queryById(id: string): Promise<AddressCandidate | null>;
}

const MAX_LINES = 4;

const addressRecordSchema = z.object({
  id: z.string().min(1),
  address: z.object({
    lines: z.array(z.string()).default([]),
    town: z.string().nullish(),
    postcode: z.string().default(""),
    country: z.object({
      code: z.string(),
      name: z.string().default(""),
    }),
  }),
});

type AddressRecord = z.infer<typeof addressRecordSchema>;

export function toCandidate(record: AddressRecord): AddressCandidate {
  const { address } = record;
  return {
    id: record.id,
    lines: address.lines.map((l) => l.trim()).filter(Boolean).slice(0, MAX_LINES),
    ...(address.town ? { town: address.town } : {}),
    postcode: address.postcode,
    country: { code: address.country.code, name: address.country.name },
  };
}

export type HttpAddressProviderOpts = {
  baseUrl: string;
  timeoutMs?: number;
  retries?: number;
  userAgent?: string;
  dispatcher?: Dispatcher;
};

export class HttpAddressProvider implements AddressProvider {
  constructor(private readonly opts: HttpAddressProviderOpts) {}

  async queryByPostcode(postcode: string, filter?: string): Promise<AddressCandidate[]> {
    const params = new URLSearchParams({ postcode });
    if (filter) params.set("filter", filter);
    return this.list(`/v2/uk/addresses?${params.toString()}`);
  }

  async queryByOutcodeAndNumber(outcode: string, number: string): Promise<AddressCandidate[]> {
    const params = new URLSearchParams({ outcode, filter: number });
    return this.list(`/v2/uk/addresses?${params.toString()}`);
  }

  async queryById(id: string): Promise<AddressCandidate | null> {
    try {
      const body = await this.get(`/v2/uk/addresses/${encodeURIComponent(id)}`);
      return toCandidate(addressRecordSchema.parse(body));
    } catch (err) {
      if (err instanceof HttpError && err.status === 404) return null;
      throw err;
    }
  }

  private async list(endpoint: string): Promise<AddressCandidate[]> {
    const body = await this.get(endpoint);
    return z.array(addressRecordSchema).parse(body).map(toCandidate);
  }

  private get(endpoint: string): Promise<unknown> {
    const { baseUrl, timeoutMs, retries, userAgent = "address-lookup-journey", dispatcher } = this.opts;
    return httpGetJson(`${baseUrl.replace(/\/$/, "")}${endpoint}`, {
      headers: { "User-Agent": userAgent },
      timeoutMs,
      retries,
      dispatcher,
    });
  }
}
