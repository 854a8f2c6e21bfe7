export type Country = {
  code: string;
  name: string;
};

/** An address returned by the lookup provider, before the user picks one. */
export type AddressCandidate = {
  id: string;
  lines: string[];
  town?: string;
  postcode: string;
  country: Country;
};

export type ManualAddress = {
  organisation?: string;
  line1?: string;
  line2?: string;
  line3?: string;
  town?: string;
  postcode?: string;
  country: Country;
};

export type SelectedAddress =
  | { kind: "candidate"; candidate: AddressCandidate }
  | { kind: "manual"; address: ManualAddress };

export type LookupQuery = {
  postcode: string;
  filter?: string;
};
