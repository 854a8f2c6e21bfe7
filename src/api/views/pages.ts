import { addressText } from "../../lib/addressRanker.js";
import { countryOf, editValuesFrom, organisationOf, addressLines, postcodeOf } from "../../lib/address.js";
import { countries } from "../../lib/countries.js";
import type { FieldError } from "../../lib/errors.js";
import type { FormValues } from "../../lib/forms.js";
import type { Labels, Locale } from "../../lib/journeyConfig.js";
import type { Notice, ViewStep } from "../../lib/journeyMachine.js";
import type { JourneyRecord } from "../../lib/journeyRecord.js";
import { escapeHtml, fieldError, layout, textInput } from "./layout.js";

export type PageContext = {
  record: JourneyRecord;
  locale: Locale;
  basePath: string;
  errors?: FieldError[];
  values?: FormValues;
  notice?: Notice;
};

export function stepPath(basePath: string, journeyId: string, step: ViewStep): string {
  const slug: Record<ViewStep, string> = {
    countryPicker: "country-picker",
    lookup: "lookup",
    select: "select",
    edit: "edit",
    confirm: "confirm",
  };
  return `${basePath}/${encodeURIComponent(journeyId)}/${slug[step]}`;
}

function labelsFor(ctx: PageContext): Labels {
  return ctx.record.config.labels[ctx.locale];
}

function page(ctx: PageContext, title: string, heading: string, body: string[]): string {
  const { appLevelLabels } = labelsFor(ctx);
  const { options } = ctx.record.config;
  return layout({
    locale: ctx.locale,
    title,
    navTitle: appLevelLabels.navTitle,
    phaseBannerHtml: appLevelLabels.phaseBannerHtml,
    showBackLink: options.showBackButtons,
    errors: ctx.errors,
    body: [`<h1 class="${escapeHtml(options.pageHeadingStyle)}">${escapeHtml(heading)}</h1>`, ...body],
  });
}

function link(id: string, href: string, text: string): string {
  return `<p><a class="govuk-link" id="${id}" href="${escapeHtml(href)}">${escapeHtml(text)}</a></p>`;
}

function withPostcode(template: string, postcode: string | undefined): string {
  return template.replace(/\{postcode\}/g, postcode ?? "");
}

export function renderCountryPicker(ctx: PageContext): string {
  const l = labelsFor(ctx).countryPickerLabels;
  const selected = ctx.values?.countryCode ?? ctx.record.countryCode ?? "";
  const action = stepPath(ctx.basePath, ctx.record.journeyId, "countryPicker");
  return page(ctx, l.title, l.heading, [
    `<form method="post" action="${escapeHtml(action)}" novalidate>`,
    `  <label class="govuk-label" for="countryCode">${escapeHtml(l.countryLabel)}</label>`,
    `  ${fieldError(ctx.errors, "countryCode")}`,
    '  <select class="govuk-select" id="countryCode" name="countryCode">',
    '    <option value=""></option>',
    ...countries.map(
      (c) =>
        `    <option value="${escapeHtml(c.code)}"${c.code === selected ? " selected" : ""}>${escapeHtml(c.name)}</option>`
    ),
    "  </select>",
    `  <button class="govuk-button" type="submit">${escapeHtml(l.submitLabel)}</button>`,
    "</form>",
  ]);
}

export function renderLookup(ctx: PageContext): string {
  const l = labelsFor(ctx).lookupPageLabels;
  const { record } = ctx;
  const values = ctx.values ?? {};
  const postcode = values.postcode ?? record.lookup?.postcode ?? "";
  const filter = values.filter ?? record.lookup?.filter ?? "";
  const base = `${ctx.basePath}/${encodeURIComponent(record.journeyId)}`;
  const body = [
    ctx.notice === "tooManyResults" ? `<p class="govuk-inset-text" id="tooManyResults">${escapeHtml(l.resultLimitExceededMessage)}</p>` : "",
    `<form method="post" action="${escapeHtml(`${base}/lookup`)}" novalidate>`,
    textInput({ id: "postcode", label: l.postcodeLabel, value: postcode, errors: ctx.errors, autocomplete: "postal-code" }),
    textInput({ id: "filter", label: l.filterLabel, value: filter, errors: ctx.errors }),
    `  <button class="govuk-button" type="submit">${escapeHtml(l.submitLabel)}</button>`,
    "</form>",
    record.config.allowedSteps.includes("edit") ? link("manualAddress", `${base}/edit`, l.manualAddressLinkText) : "",
    `<h2 class="govuk-heading-m">${escapeHtml(l.bfpoHeading)}</h2>`,
    `<form method="post" action="${escapeHtml(`${base}/bfpo`)}" novalidate>`,
    textInput({ id: "number", label: l.bfpoNumberLabel, value: values.number, errors: ctx.errors }),
    `  <button class="govuk-button govuk-button--secondary" type="submit">${escapeHtml(l.bfpoSubmitLabel)}</button>`,
    "</form>",
  ];
  return page(ctx, l.title, l.heading, body.filter(Boolean));
}

export function renderSelect(ctx: PageContext): string {
  const l = labelsFor(ctx).selectPageLabels;
  const { record } = ctx;
  const proposals = record.proposals ?? [];
  const base = `${ctx.basePath}/${encodeURIComponent(record.journeyId)}`;
  const postcode = record.lookup?.postcode;
  const manual = record.config.allowedSteps.includes("edit") ? link("editAddress", `${base}/edit`, l.editAddressLinkText) : "";

  if (!proposals.length) {
    return page(ctx, l.title, withPostcode(l.noResultsFoundMessage, postcode), [
      link("searchAgainLink", `${base}/lookup`, l.searchAgainLinkText),
      manual,
    ].filter(Boolean));
  }

  const chosen = ctx.values?.addressId ?? (record.selectedAddress?.kind === "candidate" ? record.selectedAddress.candidate.id : "");
  const body = [
    `<p id="postcodeHeading">${escapeHtml(withPostcode(l.headingWithPostcode, postcode))}</p>`,
    `<form method="post" action="${escapeHtml(`${base}/select`)}" novalidate>`,
    `  <fieldset class="govuk-fieldset"><legend class="govuk-fieldset__legend">${escapeHtml(l.proposalListLabel)}</legend>`,
    `  ${fieldError(ctx.errors, "addressId")}`,
    ...proposals.map((c, i) =>
      [
        '  <div class="govuk-radios__item">',
        `    <input class="govuk-radios__input" id="addressId-${i}" name="addressId" type="radio" value="${escapeHtml(c.id)}"${c.id === chosen ? " checked" : ""} />`,
        `    <label class="govuk-label govuk-radios__label" for="addressId-${i}">${escapeHtml([addressText(c), c.town, c.postcode].filter(Boolean).join(", "))}</label>`,
        "  </div>",
      ].join("\n")
    ),
    "  </fieldset>",
    `  <button class="govuk-button" type="submit">${escapeHtml(l.submitLabel)}</button>`,
    "</form>",
    manual,
    record.config.options.selectPageConfig.showSearchAgainLink ? link("searchAgainLink", `${base}/lookup`, l.searchAgainLinkText) : "",
  ];
  return page(ctx, l.title, l.heading, body.filter(Boolean));
}

export function renderEdit(ctx: PageContext): string {
  const l = labelsFor(ctx).editPageLabels;
  const { record } = ctx;
  const values = ctx.values ?? editValuesFrom(record.selectedAddress, record.countryCode);
  const action = stepPath(ctx.basePath, record.journeyId, "edit");
  const countryCode = values.countryCode ?? record.countryCode ?? "GB";
  const country = record.config.options.ukMode
    ? ""
    : [
        '<div class="govuk-form-group">',
        `  <label class="govuk-label" for="countryCode">${escapeHtml(l.countryLabel)}</label>`,
        `  ${fieldError(ctx.errors, "countryCode")}`,
        '  <select class="govuk-select" id="countryCode" name="countryCode">',
        ...countries.map(
          (c) =>
            `    <option value="${escapeHtml(c.code)}"${c.code === countryCode ? " selected" : ""}>${escapeHtml(c.name)}</option>`
        ),
        "  </select>",
        "</div>",
      ].join("\n");
  return page(ctx, l.title, l.heading, [
    `<form method="post" action="${escapeHtml(action)}" novalidate>`,
    textInput({ id: "organisation", label: l.organisationLabel, value: values.organisation, errors: ctx.errors }),
    textInput({ id: "line1", label: l.line1Label, value: values.line1, errors: ctx.errors, autocomplete: "address-line1" }),
    textInput({ id: "line2", label: l.line2Label, value: values.line2, errors: ctx.errors, autocomplete: "address-line2" }),
    textInput({ id: "line3", label: l.line3Label, value: values.line3, errors: ctx.errors, autocomplete: "address-line3" }),
    textInput({ id: "town", label: l.townLabel, value: values.town, errors: ctx.errors, autocomplete: "address-level2" }),
    textInput({ id: "postcode", label: l.postcodeLabel, value: values.postcode, errors: ctx.errors, autocomplete: "postal-code" }),
    country,
    `  <button class="govuk-button" type="submit">${escapeHtml(l.submitLabel)}</button>`,
    "</form>",
  ].filter(Boolean));
}

export function renderConfirm(ctx: PageContext): string {
  const l = labelsFor(ctx).confirmPageLabels;
  const { record } = ctx;
  const selected = record.selectedAddress;
  const cfg = record.config.options.confirmPageConfig;
  const base = `${ctx.basePath}/${encodeURIComponent(record.journeyId)}`;
  const rows: [string, string | undefined][] = [];
  if (selected) {
    rows.push(["organisation", organisationOf(selected)]);
    addressLines(selected).forEach((line, i) => rows.push([`line${i + 1}`, line]));
    rows.push(["postCode", postcodeOf(selected)]);
    rows.push(["country", countryOf(selected).name]);
  }
  const body = [
    cfg.showSubHeadingAndInfo ? `<h2 class="govuk-heading-m">${escapeHtml(l.infoSubheading)}</h2>` : "",
    cfg.showSubHeadingAndInfo ? `<p class="govuk-body">${escapeHtml(l.infoMessage)}</p>` : "",
    '<div class="govuk-body" id="address">',
    ...rows
      .filter(([, value]) => Boolean(value))
      .map(([id, value]) => `  <span id="${id}">${escapeHtml(value)}</span><br />`),
    "</div>",
    cfg.showChangeLink && record.config.allowedSteps.includes("edit") ? link("changeLink", `${base}/edit`, l.changeLinkText) : "",
    cfg.showSearchAgainLink ? link("searchAgainLink", `${base}/lookup`, l.searchAgainLinkText) : "",
    cfg.showConfirmChangeText ? `<p class="govuk-body" id="confirmChangeText">${escapeHtml(l.confirmChangeText)}</p>` : "",
    `<form method="post" action="${escapeHtml(`${base}/confirm`)}" novalidate>`,
    `  <button class="govuk-button" id="continue" type="submit">${escapeHtml(l.submitLabel)}</button>`,
    "</form>",
  ];
  return page(ctx, l.title, l.heading, body.filter(Boolean));
}

const renderers: Record<ViewStep, (ctx: PageContext) => string> = {
  countryPicker: renderCountryPicker,
  lookup: renderLookup,
  select: renderSelect,
  edit: renderEdit,
  confirm: renderConfirm,
};

export function renderStep(step: ViewStep, ctx: PageContext): string {
  return renderers[step](ctx);
}

export function renderErrorPage(locale: Locale, title: string, message: string): string {
  return layout({ locale, title, body: [`<h1 class="govuk-heading-xl">${escapeHtml(title)}</h1>`, `<p class="govuk-body">${escapeHtml(message)}</p>`] });
}
