import type { FieldError } from "./errors.js";
import { bindSelectForm, validateEdit, type FormValues } from "./forms.js";
import { initialStep, type JourneyStep } from "./journeyConfig.js";
import type { JourneyRecord } from "./journeyRecord.js";
import type { AddressCandidate, Country, LookupQuery } from "./types.js";

/** Steps that have a page of their own. */
export type ViewStep = Exclude<JourneyStep, "begin" | "done">;

export type Notice = "tooManyResults";

export type JourneyEvent =
  | { type: "begin" }
  | { type: "view"; step: ViewStep }
  | { type: "countryPicked"; country: Country }
  | { type: "lookupCompleted"; query: LookupQuery; candidates: AddressCandidate[] }
  | { type: "formInvalid"; step: ViewStep; errors: FieldError[]; values: FormValues }
  /** `current` is the provider's latest copy of the chosen address, when it still has one. */
  | { type: "addressSelected"; addressId: string; current?: AddressCandidate }
  | { type: "addressEdited"; values: FormValues }
  | { type: "confirmSubmitted" };

export type JourneyEffect =
  | { type: "render"; step: ViewStep; notice?: Notice }
  | { type: "redirect"; step: ViewStep }
  | { type: "invalid"; step: ViewStep; errors: FieldError[]; values: FormValues }
  | { type: "complete"; url: string };

export type Transition = {
  record: JourneyRecord;
  effect: JourneyEffect;
};

export function continueUrlFor(record: JourneyRecord): string {
  return `${record.config.options.continueUrl}?id=${record.journeyId}`;
}

export function isComplete(record: JourneyRecord): boolean {
  return record.step === "done" || record.confirmedAddress !== undefined;
}

function firstStep(record: JourneyRecord): ViewStep {
  return initialStep(record.config) === "lookup" ? "lookup" : "countryPicker";
}

function allows(record: JourneyRecord, step: ViewStep): boolean {
  return record.config.allowedSteps.includes(step);
}

function at(record: JourneyRecord, step: JourneyStep): JourneyRecord {
  return record.step === step ? record : { ...record, step };
}

function withoutSelection(record: JourneyRecord): JourneyRecord {
  if (record.selectedAddress === undefined) return record;
  const { selectedAddress: _dropped, ...rest } = record;
  return rest;
}

function withoutStagedData(record: JourneyRecord): JourneyRecord {
  const { countryCode: _c, lookup: _l, proposals: _p, selectedAddress: _s, ...rest } = record;
  return rest;
}

const redirect = (record: JourneyRecord, step: ViewStep): Transition => ({ record, effect: { type: "redirect", step } });
const render = (record: JourneyRecord, step: ViewStep): Transition => ({ record: at(record, step), effect: { type: "render", step } });

function view(record: JourneyRecord, step: ViewStep): Transition {
  if (!allows(record, step)) return redirect(record, firstStep(record));
  switch (step) {
    case "lookup":
      // Coming back to the search starts the choice again.
      return render(withoutSelection(record), "lookup");
    case "select":
      return record.proposals ? render(record, "select") : redirect(record, "lookup");
    case "confirm":
      return record.selectedAddress ? render(record, "confirm") : redirect(record, "lookup");
    case "countryPicker":
    case "edit":
      return render(record, step);
  }
}

/**
 * The whole journey as a pure function: given the stored record and what the
 * user just did, returns the record to store and what to show next. A record
 * that is handed back unchanged (same reference) needs no write.
 */
export function transition(record: JourneyRecord, event: JourneyEvent): Transition {
  if (isComplete(record)) {
    return { record, effect: { type: "complete", url: continueUrlFor(record) } };
  }

  switch (event.type) {
    case "begin": {
      const step = firstStep(record);
      return redirect({ ...withoutStagedData(record), step }, step);
    }

    case "view":
      return view(record, event.step);

    case "countryPicked": {
      if (!allows(record, "countryPicker")) return redirect(record, firstStep(record));
      const countryCode = event.country.code;
      if (countryCode === "GB") {
        return redirect({ ...withoutSelection(record), countryCode, step: "lookup" }, "lookup");
      }
      return redirect({ ...withoutSelection(record), countryCode, step: "edit" }, "edit");
    }

    case "lookupCompleted": {
      const limit = record.config.options.selectPageConfig.proposalListLimit;
      const { proposals: _p, ...rest } = withoutSelection(record);
      if (limit !== undefined && event.candidates.length > limit) {
        return {
          record: { ...rest, lookup: event.query, step: "lookup" },
          effect: { type: "render", step: "lookup", notice: "tooManyResults" },
        };
      }
      // An empty list still goes to select, which then offers manual entry.
      return redirect({ ...rest, lookup: event.query, proposals: event.candidates, step: "select" }, "select");
    }

    case "formInvalid":
      return {
        record: at(record, event.step),
        effect: { type: "invalid", step: event.step, errors: event.errors, values: event.values },
      };

    case "addressSelected": {
      const proposals = record.proposals;
      if (!proposals) return redirect(record, "lookup");
      const values = { addressId: event.addressId };
      const bound = bindSelectForm(values);
      if (!bound.ok) return transition(record, { type: "formInvalid", step: "select", errors: bound.error, values });
      const candidate = proposals.find((c) => c.id === bound.value);
      if (!candidate) {
        const errors = [{ field: "addressId", code: "InvalidSelection", message: "Select an address" }];
        return transition(record, { type: "formInvalid", step: "select", errors, values });
      }
      const { current } = event;
      const chosen = current && current.id === candidate.id ? current : candidate;
      return redirect({ ...record, selectedAddress: { kind: "candidate", candidate: chosen }, step: "confirm" }, "confirm");
    }

    case "addressEdited": {
      if (!allows(record, "edit")) return redirect(record, "lookup");
      const edited = validateEdit(event.values, {
        ukMode: record.config.options.ukMode,
        countryCode: record.countryCode,
      });
      if (!edited.ok) {
        return transition(record, { type: "formInvalid", step: "edit", errors: edited.error, values: event.values });
      }
      return redirect({ ...record, selectedAddress: { kind: "manual", address: edited.value }, step: "confirm" }, "confirm");
    }

    case "confirmSubmitted": {
      const selected = record.selectedAddress;
      if (!selected) return redirect(record, "lookup");
      const done: JourneyRecord = { ...record, confirmedAddress: selected, step: "done" };
      return { record: done, effect: { type: "complete", url: continueUrlFor(done) } };
    }
  }
}
