import { randomUUID } from "crypto";
import { toConfirmedResponse, type ConfirmedResponse } from "./address.js";
import { AddressMatcher, BFPO_OUTCODE } from "./addressMatcher.js";
import { rankAddresses } from "./addressRanker.js";
import { StaleJourneyError } from "./errors.js";
import { bindBfpoForm, bindCountryForm, bindLookupForm, editValuesOf, valuesOf } from "./forms.js";
import { parseJourneyConfig } from "./journeyConfig.js";
import { isComplete, transition, type JourneyEvent, type JourneyEffect, type ViewStep } from "./journeyMachine.js";
import { newJourneyRecord, type JourneyRecord } from "./journeyRecord.js";
import type { Keystore } from "./keystore.js";
import { logger as rootLogger, type Logger } from "./logger.js";

export type JourneyOutcome = {
  record: JourneyRecord;
  effect: JourneyEffect;
};

export type JourneyServiceDeps = {
  keystore: Keystore;
  matcher: AddressMatcher;
  logger?: Logger;
  newId?: () => string;
  now?: () => Date;
};

/**
 * Runs one request's worth of a journey: reads the record, does any lookups
 * the step needs, feeds the result through the state machine and writes the
 * record back when it changed.
 */
export class JourneyService {
  private readonly keystore: Keystore;
  private readonly matcher: AddressMatcher;
  private readonly logger: Logger;
  private readonly newId: () => string;
  private readonly now: () => Date;

  constructor(deps: JourneyServiceDeps) {
    this.keystore = deps.keystore;
    this.matcher = deps.matcher;
    this.logger = deps.logger ?? rootLogger;
    this.newId = deps.newId ?? randomUUID;
    this.now = deps.now ?? (() => new Date());
  }

  /** Creates a journey from a calling service's config. Throws ConfigError on a bad payload. */
  async init(rawConfig: unknown): Promise<JourneyRecord> {
    const config = parseJourneyConfig(rawConfig);
    const record = newJourneyRecord({ journeyId: this.newId(), auditRef: this.newId(), config, now: this.now() });
    await this.keystore.put(record.journeyId, record);
    this.logger.info({ journeyId: record.journeyId, ukMode: config.options.ukMode }, "Journey created");
    return record;
  }

  async begin(journeyId: string): Promise<JourneyOutcome> {
    return this.dispatch(await this.load(journeyId), { type: "begin" });
  }

  async view(journeyId: string, step: ViewStep): Promise<JourneyOutcome> {
    return this.dispatch(await this.load(journeyId), { type: "view", step });
  }

  async pickCountry(journeyId: string, body: unknown): Promise<JourneyOutcome> {
    const record = await this.load(journeyId);
    const bound = bindCountryForm(body);
    if (!bound.ok) {
      const values = valuesOf(["countryCode"], body);
      return this.dispatch(record, { type: "formInvalid", step: "countryPicker", errors: bound.error, values });
    }
    return this.dispatch(record, { type: "countryPicked", country: bound.value });
  }

  async lookup(journeyId: string, body: unknown): Promise<JourneyOutcome> {
    const record = await this.load(journeyId);
    if (isComplete(record)) return this.dispatch(record, { type: "view", step: "lookup" });
    const ukMode = record.config.options.ukMode || record.countryCode === "GB";
    const bound = bindLookupForm(body, ukMode);
    if (!bound.ok) {
      const values = valuesOf(["postcode", "filter"], body);
      return this.dispatch(record, { type: "formInvalid", step: "lookup", errors: bound.error, values });
    }
    const { postcode, filter } = bound.value;
    const found = await this.matcher.find(postcode, filter, ukMode);
    this.logger.debug({ journeyId, count: found.length }, "Address lookup completed");
    return this.dispatch(record, { type: "lookupCompleted", query: bound.value, candidates: rankAddresses(found) });
  }

  async lookupBfpo(journeyId: string, body: unknown): Promise<JourneyOutcome> {
    const record = await this.load(journeyId);
    if (isComplete(record)) return this.dispatch(record, { type: "view", step: "lookup" });
    const bound = bindBfpoForm(body);
    if (!bound.ok) {
      const values = valuesOf(["postcode", "number"], body);
      return this.dispatch(record, { type: "formInvalid", step: "lookup", errors: bound.error, values });
    }
    const form = bound.value;
    const found =
      form.kind === "postcode"
        ? await this.matcher.find(form.postcode, undefined, true)
        : await this.matcher.findBfpo(form.number);
    const query = form.kind === "postcode" ? { postcode: form.postcode } : { postcode: BFPO_OUTCODE, filter: form.number };
    return this.dispatch(record, { type: "lookupCompleted", query, candidates: rankAddresses(found) });
  }

  async select(journeyId: string, body: unknown): Promise<JourneyOutcome> {
    const { addressId = "" } = valuesOf(["addressId"], body);
    const record = await this.load(journeyId);
    const id = addressId.trim();
    const offered = !isComplete(record) && Boolean(record.proposals?.some((c) => c.id === id));
    // Re-read the chosen address so the staged copy is the provider's latest.
    const current = offered ? await this.matcher.findById(id) : null;
    return this.dispatch(record, { type: "addressSelected", addressId, ...(current ? { current } : {}) });
  }

  async edit(journeyId: string, body: unknown): Promise<JourneyOutcome> {
    return this.dispatch(await this.load(journeyId), { type: "addressEdited", values: editValuesOf(body) });
  }

  async confirm(journeyId: string): Promise<JourneyOutcome> {
    return this.dispatch(await this.load(journeyId), { type: "confirmSubmitted" });
  }

  /** The confirmed address for the calling service, or null while there is none. */
  async confirmedAddress(journeyId: string): Promise<ConfirmedResponse | null> {
    const record = await this.keystore.get(journeyId);
    return record ? toConfirmedResponse(record) : null;
  }

  private async load(journeyId: string): Promise<JourneyRecord> {
    const record = await this.keystore.get(journeyId);
    if (!record) throw new StaleJourneyError(journeyId);
    return record;
  }

  private async dispatch(record: JourneyRecord, event: JourneyEvent): Promise<JourneyOutcome> {
    const next = transition(record, event);
    if (next.record !== record) {
      await this.keystore.put(record.journeyId, next.record);
    }
    this.logger.info(
      { journeyId: record.journeyId, event: event.type, from: record.step, to: next.record.step, effect: next.effect.type },
      "Journey step"
    );
    return next;
  }
}
