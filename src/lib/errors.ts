export type FieldError = {
  field: string;
  code: string;
  message: string;
};

export class JourneyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JourneyError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Bad input on a single request. Journey steps re-render; the API answers 400. */
export class ValidationError extends JourneyError {
  constructor(public readonly errors: FieldError[]) {
    super(errors.map((e) => `${e.field}: ${e.code}`).join(", ") || "Validation failed");
    this.name = "ValidationError";
  }
}

export class ConfigError extends JourneyError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export class LookupUnavailableError extends JourneyError {
  constructor(message = "Address lookup is unavailable", options?: { cause?: unknown }) {
    super(message);
    this.name = "LookupUnavailableError";
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class KeystoreUnavailableError extends JourneyError {
  constructor(message = "Keystore is unavailable", options?: { cause?: unknown }) {
    super(message);
    this.name = "KeystoreUnavailableError";
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/** The journey record is missing, expired or unreadable. */
export class StaleJourneyError extends JourneyError {
  constructor(public readonly journeyId: string, message?: string) {
    super(message ?? `No journey found for id ${journeyId}`);
    this.name = "StaleJourneyError";
  }
}
