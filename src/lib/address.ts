import type { FormValues } from "./forms.js";
import type { JourneyRecord } from "./journeyRecord.js";
import type { Country, SelectedAddress } from "./types.js";

export function addressLines(selected: SelectedAddress): string[] {
  if (selected.kind === "candidate") {
    const { lines, town } = selected.candidate;
    return [...lines, town].filter((l): l is string => Boolean(l));
  }
  const a = selected.address;
  return [a.line1, a.line2, a.line3, a.town].filter((l): l is string => Boolean(l));
}

export function postcodeOf(selected: SelectedAddress): string | undefined {
  const postcode = selected.kind === "candidate" ? selected.candidate.postcode : selected.address.postcode;
  return postcode || undefined;
}

export function countryOf(selected: SelectedAddress): Country {
  return selected.kind === "candidate" ? selected.candidate.country : selected.address.country;
}

export function organisationOf(selected: SelectedAddress): string | undefined {
  return selected.kind === "manual" ? selected.address.organisation : undefined;
}

/** Values to pre-fill the edit page with when the user changes a staged address. */
export function editValuesFrom(selected: SelectedAddress | undefined, countryCode?: string): FormValues {
  if (!selected) return countryCode ? { countryCode } : {};
  if (selected.kind === "manual") {
    const { country, ...fields } = selected.address;
    const values: FormValues = { countryCode: country.code };
    for (const [key, value] of Object.entries(fields)) {
      if (value) values[key] = value;
    }
    return values;
  }
  const { lines, town, postcode, country } = selected.candidate;
  const values: FormValues = { countryCode: country.code, postcode };
  if (lines[0]) values.line1 = lines[0];
  if (lines[1]) values.line2 = lines[1];
  // The edit page has three line fields; extra lines fold into the third.
  if (lines.length > 2) values.line3 = lines.slice(2).join(", ");
  if (town) values.town = town;
  return values;
}

export type ConfirmedResponse = {
  auditRef: string;
  id?: string;
  address: {
    organisation?: string;
    lines: string[];
    postcode?: string;
    country: Country;
  };
};

export function toConfirmedResponse(record: JourneyRecord): ConfirmedResponse | null {
  const confirmed = record.confirmedAddress;
  if (!confirmed) return null;
  const organisation = organisationOf(confirmed);
  const postcode = postcodeOf(confirmed);
  return {
    auditRef: record.auditRef,
    ...(confirmed.kind === "candidate" ? { id: confirmed.candidate.id } : {}),
    address: {
      ...(organisation ? { organisation } : {}),
      lines: addressLines(confirmed),
      ...(postcode ? { postcode } : {}),
      country: countryOf(confirmed),
    },
  };
}
