import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const JOURNEY_CONFIG_VERSION = 2;

export const journeySteps = ["begin", "countryPicker", "lookup", "select", "edit", "confirm", "done"] as const;
export type JourneyStep = (typeof journeySteps)[number];

export const locales = ["en", "cy"] as const;
export type Locale = (typeof locales)[number];

const text = z.string();

export const labelsSchema = z.object({
  appLevelLabels: z.object({
    navTitle: text,
    phaseBannerHtml: text,
  }),
  countryPickerLabels: z.object({
    title: text,
    heading: text,
    countryLabel: text,
    submitLabel: text,
  }),
  lookupPageLabels: z.object({
    title: text,
    heading: text,
    filterLabel: text,
    postcodeLabel: text,
    submitLabel: text,
    resultLimitExceededMessage: text,
    manualAddressLinkText: text,
    bfpoHeading: text,
    bfpoNumberLabel: text,
    bfpoSubmitLabel: text,
  }),
  selectPageLabels: z.object({
    title: text,
    heading: text,
    headingWithPostcode: text,
    proposalListLabel: text,
    submitLabel: text,
    noResultsFoundMessage: text,
    searchAgainLinkText: text,
    editAddressLinkText: text,
  }),
  editPageLabels: z.object({
    title: text,
    heading: text,
    organisationLabel: text,
    line1Label: text,
    line2Label: text,
    line3Label: text,
    townLabel: text,
    postcodeLabel: text,
    countryLabel: text,
    submitLabel: text,
  }),
  confirmPageLabels: z.object({
    title: text,
    heading: text,
    infoSubheading: text,
    infoMessage: text,
    submitLabel: text,
    searchAgainLinkText: text,
    changeLinkText: text,
    confirmChangeText: text,
  }),
});

export type Labels = z.infer<typeof labelsSchema>;

const labelOverridesSchema = labelsSchema.deepPartial().strict();
type LabelOverrides = z.infer<typeof labelOverridesSchema>;

function loadDefaultLabels(): Labels {
  const p = path.join(process.cwd(), "config", "labels.json");
  return labelsSchema.parse(JSON.parse(fs.readFileSync(p, "utf-8")));
}

export const defaultLabels: Labels = loadDefaultLabels();

const continueUrlSchema = z
  .string()
  .trim()
  .min(1)
  .max(2048)
  .refine((url) => url.startsWith("/") || /^https?:\/\//i.test(url), {
    message: "continueUrl must be a relative path or an http(s) URL",
  });

export const pageHeadingStyles = ["govuk-heading-xl", "govuk-heading-l", "govuk-heading-m"] as const;

const optionsSchema = z.object({
  continueUrl: continueUrlSchema,
  ukMode: z.boolean().default(false),
  allowManualEntry: z.boolean().default(true),
  showBackButtons: z.boolean().default(true),
  pageHeadingStyle: z.enum(pageHeadingStyles).default("govuk-heading-xl"),
  selectPageConfig: z
    .object({
      proposalListLimit: z.number().int().positive().optional(),
      showSearchAgainLink: z.boolean().default(false),
    })
    .default({}),
  confirmPageConfig: z
    .object({
      showSearchAgainLink: z.boolean().default(false),
      showSubHeadingAndInfo: z.boolean().default(false),
      showChangeLink: z.boolean().default(true),
      showConfirmChangeText: z.boolean().default(false),
    })
    .default({}),
});

export type JourneyOptions = z.infer<typeof optionsSchema>;

const journeyConfigSchema = z.object({
  version: z.literal(JOURNEY_CONFIG_VERSION),
  options: optionsSchema,
  labels: z
    .object({
      en: labelOverridesSchema.optional(),
      cy: labelOverridesSchema.optional(),
    })
    .strict()
    .optional(),
});

export type JourneyConfigInput = z.input<typeof journeyConfigSchema>;

/** Shape kept in the journey record: every option and label already filled in. */
export const resolvedJourneyConfigSchema = z.object({
  version: z.literal(JOURNEY_CONFIG_VERSION),
  options: optionsSchema,
  labels: z.object({ en: labelsSchema, cy: labelsSchema }),
  allowedSteps: z.array(z.enum(journeySteps)),
});

export type ResolvedJourneyConfig = z.infer<typeof resolvedJourneyConfigSchema>;

function mergeSection<T extends object>(base: T, override: Partial<T> | undefined): T {
  if (!override) return base;
  const present = Object.entries(override).filter(([, value]) => value !== undefined);
  return { ...base, ...Object.fromEntries(present) };
}

export function resolveLabels(overrides: LabelOverrides | undefined, base: Labels = defaultLabels): Labels {
  const o = overrides ?? {};
  return {
    appLevelLabels: mergeSection(base.appLevelLabels, o.appLevelLabels),
    countryPickerLabels: mergeSection(base.countryPickerLabels, o.countryPickerLabels),
    lookupPageLabels: mergeSection(base.lookupPageLabels, o.lookupPageLabels),
    selectPageLabels: mergeSection(base.selectPageLabels, o.selectPageLabels),
    editPageLabels: mergeSection(base.editPageLabels, o.editPageLabels),
    confirmPageLabels: mergeSection(base.confirmPageLabels, o.confirmPageLabels),
  };
}

export function allowedStepsFor(options: JourneyOptions): JourneyStep[] {
  const steps: JourneyStep[] = [];
  if (!options.ukMode) steps.push("countryPicker");
  steps.push("lookup", "select");
  // International journeys always need the edit page for non-UK countries.
  if (options.allowManualEntry || !options.ukMode) steps.push("edit");
  steps.push("confirm");
  return steps;
}

export function initialStep(config: ResolvedJourneyConfig): JourneyStep {
  return config.options.ukMode ? "lookup" : "countryPicker";
}

/**
 * Validates a calling service's journey config and resolves it once: option
 * defaults applied, labels merged over the defaults for each locale, the
 * reachable steps computed.
 */
export function parseJourneyConfig(raw: unknown): ResolvedJourneyConfig {
  const versioned = z.object({ version: z.unknown() }).safeParse(raw);
  if (!versioned.success) throw new ConfigError("Journey config must be an object with a version");
  if (versioned.data.version !== JOURNEY_CONFIG_VERSION) {
    throw new ConfigError(`Unsupported journey config version: ${String(versioned.data.version)}`);
  }

  const parsed = journeyConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError("Invalid journey config", issues);
  }

  const { options, labels } = parsed.data;
  // Welsh falls back to the English defaults, not to the English overrides.
  return {
    version: JOURNEY_CONFIG_VERSION,
    options,
    labels: {
      en: resolveLabels(labels?.en),
      cy: resolveLabels(labels?.cy),
    },
    allowedSteps: allowedStepsFor(options),
  };
}
