import { z } from "zod";
import { normalizeBfpoNumber } from "./addressMatcher.js";
import { findCountry, UK } from "./countries.js";
import type { FieldError } from "./errors.js";
import { normalizePostcode } from "./postcode.js";
import type { Result } from "./postcode.js";
import type { Country, LookupQuery, ManualAddress } from "./types.js";

export const MAX_FIELD_LENGTH = 255;

export type FormValues = Record<string, string>;
export type FormResult<T> = Result<T, FieldError[]>;

// Form posts arrive as strings, repeated fields as arrays; anything else counts as absent.
const field = z.preprocess(
  (v) => (Array.isArray(v) ? v[0] : v),
  z.string().optional().catch(undefined)
);

export function valuesOf(shape: string[], body: unknown): FormValues {
  const parsed = z.record(z.unknown()).catch({}).parse(body ?? {});
  const out: FormValues = {};
  for (const key of shape) {
    const v = field.parse(parsed[key]);
    if (v !== undefined) out[key] = v;
  }
  return out;
}

function tooLong(value: string | undefined): boolean {
  return (value ?? "").length > MAX_FIELD_LENGTH;
}

function blankToUndefined(value: string | undefined): string | undefined {
  const t = (value ?? "").trim();
  return t === "" ? undefined : t;
}

// ---------------------------------------------------------------------------

export type LookupForm = LookupQuery;

export function bindLookupForm(body: unknown, ukMode: boolean): FormResult<LookupForm> {
  const values = valuesOf(["postcode", "filter"], body);
  const errors: FieldError[] = [];
  const filter = blankToUndefined(values.filter);
  if (tooLong(filter)) {
    errors.push({ field: "filter", code: "FieldTooLong", message: "Enter 255 characters or less" });
  }
  const postcode = normalizePostcode(values.postcode ?? "", ukMode);
  if (!postcode.ok) {
    errors.push({ field: "postcode", code: postcode.error.code, message: postcode.error.message });
  }
  if (errors.length || !postcode.ok) return { ok: false, error: errors };
  return { ok: true, value: { postcode: postcode.value, ...(filter ? { filter } : {}) } };
}

// ---------------------------------------------------------------------------

export type BfpoForm = { kind: "postcode"; postcode: string } | { kind: "number"; number: string };

/** Either a BFPO number or a postcode; a postcode takes precedence when both are given. */
export function bindBfpoForm(body: unknown): FormResult<BfpoForm> {
  const values = valuesOf(["postcode", "number"], body);
  const rawPostcode = blankToUndefined(values.postcode);
  const number = normalizeBfpoNumber(values.number);
  if (!rawPostcode && !number) {
    return {
      ok: false,
      error: [{ field: "postcode", code: "BfpoRequired", message: "Enter a postcode or a BFPO number" }],
    };
  }
  if (rawPostcode) {
    const postcode = normalizePostcode(rawPostcode, true);
    if (!postcode.ok) {
      return { ok: false, error: [{ field: "postcode", code: postcode.error.code, message: postcode.error.message }] };
    }
    return { ok: true, value: { kind: "postcode", postcode: postcode.value } };
  }
  if (number && (tooLong(number) || !/^\d+$/.test(number))) {
    return { ok: false, error: [{ field: "number", code: "InvalidBfpoNumber", message: "Enter a BFPO number, like 123" }] };
  }
  return { ok: true, value: { kind: "number", number: number ?? "" } };
}

// ---------------------------------------------------------------------------

export function bindSelectForm(body: unknown): FormResult<string> {
  const { addressId = "" } = valuesOf(["addressId"], body);
  const id = addressId.trim();
  if (!id || tooLong(id)) {
    return { ok: false, error: [{ field: "addressId", code: "InvalidSelection", message: "Select an address" }] };
  }
  return { ok: true, value: id };
}

// ---------------------------------------------------------------------------

export function bindCountryForm(body: unknown): FormResult<Country> {
  const { countryCode } = valuesOf(["countryCode"], body);
  const country = findCountry(countryCode);
  if (!country) {
    return { ok: false, error: [{ field: "countryCode", code: "InvalidCountry", message: "Select a country" }] };
  }
  return { ok: true, value: country };
}

// ---------------------------------------------------------------------------

export const editFields = ["organisation", "line1", "line2", "line3", "town", "postcode", "countryCode"] as const;

export function editValuesOf(body: unknown): FormValues {
  return valuesOf([...editFields], body);
}

const lengthChecked = ["organisation", "line1", "line2", "line3", "town", "postcode"] as const;

const LENGTH_MESSAGES: Record<(typeof lengthChecked)[number], string> = {
  organisation: "Organisation must be 255 characters or less",
  line1: "Address line 1 must be 255 characters or less",
  line2: "Address line 2 must be 255 characters or less",
  line3: "Address line 3 must be 255 characters or less",
  town: "Town or city must be 255 characters or less",
  postcode: "Postcode must be 255 characters or less",
};

export type EditContext = {
  ukMode: boolean;
  /** Country picked earlier in the journey, used when the form sends none. */
  countryCode?: string;
};

/**
 * Validates a manually entered address. At least one of the address lines or
 * the town must be given; a GB address with a postcode needs a real one. In
 * uk mode the country is always GB.
 */
export function validateEdit(values: FormValues, ctx: EditContext): FormResult<ManualAddress> {
  const errors: FieldError[] = [];
  const v = {
    organisation: blankToUndefined(values.organisation),
    line1: blankToUndefined(values.line1),
    line2: blankToUndefined(values.line2),
    line3: blankToUndefined(values.line3),
    town: blankToUndefined(values.town),
    postcode: blankToUndefined(values.postcode),
  };

  if (!v.line1 && !v.line2 && !v.line3 && !v.town) {
    errors.push({
      field: "line1",
      code: "AtLeastOneLineRequired",
      message: "Enter at least one address line or a town",
    });
  }

  for (const key of lengthChecked) {
    if (tooLong(v[key])) errors.push({ field: key, code: "FieldTooLong", message: LENGTH_MESSAGES[key] });
  }

  let country: Country | undefined = UK;
  if (!ctx.ukMode) {
    const code = blankToUndefined(values.countryCode) ?? ctx.countryCode;
    country = code ? findCountry(code) : UK;
    if (!country) errors.push({ field: "countryCode", code: "InvalidCountry", message: "Select a country" });
  }

  let postcode = v.postcode;
  if (postcode && country?.code === UK.code && !tooLong(postcode)) {
    const normalized = normalizePostcode(postcode, true);
    if (normalized.ok) {
      postcode = normalized.value;
    } else {
      errors.push({ field: "postcode", code: "InvalidPostcode", message: "Enter a real UK postcode, like AA1 1AA" });
    }
  }

  if (errors.length || !country) return { ok: false, error: errors };
  return {
    ok: true,
    value: {
      ...(v.organisation ? { organisation: v.organisation } : {}),
      ...(v.line1 ? { line1: v.line1 } : {}),
      ...(v.line2 ? { line2: v.line2 } : {}),
      ...(v.line3 ? { line3: v.line3 } : {}),
      ...(v.town ? { town: v.town } : {}),
      ...(postcode ? { postcode } : {}),
      country,
    },
  };
}
