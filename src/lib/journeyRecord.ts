import { z } from "zod";
import { journeySteps, resolvedJourneyConfigSchema, type JourneyStep, type ResolvedJourneyConfig } from "./journeyConfig.js";
import type { AddressCandidate, LookupQuery, SelectedAddress } from "./types.js";

export const JOURNEY_RECORD_SCHEMA_VERSION = 1;

const countrySchema = z.object({ code: z.string(), name: z.string() });

const candidateSchema = z.object({
  id: z.string(),
  lines: z.array(z.string()).max(4),
  town: z.string().optional(),
  postcode: z.string(),
  country: countrySchema,
});

const manualAddressSchema = z.object({
  organisation: z.string().optional(),
  line1: z.string().optional(),
  line2: z.string().optional(),
  line3: z.string().optional(),
  town: z.string().optional(),
  postcode: z.string().optional(),
  country: countrySchema,
});

const selectedAddressSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("candidate"), candidate: candidateSchema }),
  z.object({ kind: z.literal("manual"), address: manualAddressSchema }),
]);

const journeyRecordSchema = z.object({
  schemaVersion: z.literal(JOURNEY_RECORD_SCHEMA_VERSION),
  journeyId: z.string().min(1),
  auditRef: z.string().min(1),
  createdAt: z.string(),
  config: resolvedJourneyConfigSchema,
  step: z.enum(journeySteps),
  countryCode: z.string().optional(),
  lookup: z.object({ postcode: z.string(), filter: z.string().optional() }).optional(),
  proposals: z.array(candidateSchema).optional(),
  selectedAddress: selectedAddressSchema.optional(),
  confirmedAddress: selectedAddressSchema.optional(),
});

export type JourneyRecord = {
  schemaVersion: typeof JOURNEY_RECORD_SCHEMA_VERSION;
  journeyId: string;
  auditRef: string;
  createdAt: string;
  config: ResolvedJourneyConfig;
  step: JourneyStep;
  /** Country chosen on the country picker, international journeys only. */
  countryCode?: string;
  lookup?: LookupQuery;
  proposals?: AddressCandidate[];
  selectedAddress?: SelectedAddress;
  confirmedAddress?: SelectedAddress;
};

export class UnsupportedRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedRecordError";
    Object.setPrototypeOf(this, UnsupportedRecordError.prototype);
  }
}

export function newJourneyRecord(args: {
  journeyId: string;
  auditRef: string;
  config: ResolvedJourneyConfig;
  now?: Date;
}): JourneyRecord {
  return {
    schemaVersion: JOURNEY_RECORD_SCHEMA_VERSION,
    journeyId: args.journeyId,
    auditRef: args.auditRef,
    createdAt: (args.now ?? new Date()).toISOString(),
    config: args.config,
    step: "begin",
  };
}

/**
 * Reads a stored record. Records written under another schema version are
 * rejected rather than guessed at; there is no earlier version to migrate.
 */
export function parseJourneyRecord(raw: unknown): JourneyRecord {
  const versioned = z.object({ schemaVersion: z.unknown() }).safeParse(raw);
  if (!versioned.success) throw new UnsupportedRecordError("Journey record is not an object");
  if (versioned.data.schemaVersion !== JOURNEY_RECORD_SCHEMA_VERSION) {
    throw new UnsupportedRecordError(
      `Unsupported journey record schema version: ${String(versioned.data.schemaVersion)}`
    );
  }
  const parsed = journeyRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UnsupportedRecordError(`Invalid journey record: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  return parsed.data;
}
