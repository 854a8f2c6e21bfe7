export type Postcode = string;

export type PostcodeErrorCode = "EmptyPostcode" | "InvalidCharacters" | "MalformedPostcode";

export type PostcodeError = {
  code: PostcodeErrorCode;
  message: string;
};

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

const OUTWARD = "[A-Z]{1,2}[0-9][0-9A-Z]?";
const INWARD = "[0-9][A-Z]{2}";
const UK_POSTCODE_RE = new RegExp(`^(${OUTWARD})(${INWARD})$`);
const LETTERS_AND_DIGITS_RE = /^[\p{L}\p{N}]*$/u;

const MESSAGES: Record<PostcodeErrorCode, { uk: string; any: string }> = {
  EmptyPostcode: {
    uk: "Enter a UK postcode",
    any: "Enter a postcode",
  },
  InvalidCharacters: {
    uk: "Enter a real UK postcode, like AA1 1AA, using only letters and numbers",
    any: "Enter a real postcode, using only letters and numbers",
  },
  MalformedPostcode: {
    uk: "Enter a real UK postcode, like AA1 1AA",
    any: "Enter a real postcode",
  },
};

function fail(code: PostcodeErrorCode, ukMode: boolean): Result<Postcode, PostcodeError> {
  return { ok: false, error: { code, message: ukMode ? MESSAGES[code].uk : MESSAGES[code].any } };
}

function compact(raw: string): string {
  return (raw || "").replace(/\s+/g, "");
}

/**
 * Cleans a raw UK postcode into its canonical form, e.g. `"zz11zz"` becomes
 * `"ZZ1 1ZZ"`. Re-normalizing a canonical postcode returns it unchanged.
 */
export function normalizePostcode(raw: string, ukMode = false): Result<Postcode, PostcodeError> {
  const stripped = compact(raw);
  if (!stripped) return fail("EmptyPostcode", ukMode);
  if (!LETTERS_AND_DIGITS_RE.test(stripped)) return fail("InvalidCharacters", ukMode);
  const match = stripped.toUpperCase().match(UK_POSTCODE_RE);
  if (!match) return fail("MalformedPostcode", ukMode);
  return { ok: true, value: `${match[1]} ${match[2]}` };
}

export function isValidPostcode(raw: string): boolean {
  return normalizePostcode(raw).ok;
}
