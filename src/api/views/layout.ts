import type { FieldError } from "../../lib/errors.js";
import type { Locale } from "../../lib/journeyConfig.js";

export function escapeHtml(value: string | undefined | null): string {
  return (value ?? "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export type LayoutOpts = {
  locale: Locale;
  title: string;
  navTitle?: string;
  phaseBannerHtml?: string;
  showBackLink?: boolean;
  errors?: FieldError[];
  body: string[];
};

export function errorSummary(errors: FieldError[] | undefined): string {
  if (!errors || !errors.length) return "";
  return [
    '<div class="govuk-error-summary" role="alert" id="error-summary">',
    '  <h2 class="govuk-error-summary__title">There is a problem</h2>',
    '  <ul class="govuk-error-summary__list">',
    ...errors.map((e) => `    <li><a href="#${escapeHtml(e.field)}">${escapeHtml(e.message)}</a></li>`),
    "  </ul>",
    "</div>",
  ].join("\n");
}

export function fieldError(errors: FieldError[] | undefined, field: string): string {
  const found = (errors || []).find((e) => e.field === field);
  return found ? `<p class="govuk-error-message" id="${escapeHtml(field)}-error">${escapeHtml(found.message)}</p>` : "";
}

export function textInput(opts: {
  id: string;
  label: string;
  value?: string;
  errors?: FieldError[];
  autocomplete?: string;
}): string {
  const ac = opts.autocomplete ? ` autocomplete="${escapeHtml(opts.autocomplete)}"` : "";
  return [
    '<div class="govuk-form-group">',
    `  <label class="govuk-label" for="${escapeHtml(opts.id)}">${escapeHtml(opts.label)}</label>`,
    `  ${fieldError(opts.errors, opts.id)}`,
    `  <input class="govuk-input" id="${escapeHtml(opts.id)}" name="${escapeHtml(opts.id)}" type="text" value="${escapeHtml(opts.value)}"${ac} />`,
    "</div>",
  ].join("\n");
}

export function layout(opts: LayoutOpts): string {
  const title = opts.navTitle ? `${opts.title} - ${opts.navTitle}` : opts.title;
  const prefix = opts.errors && opts.errors.length ? "Error: " : "";
  return [
    "<!doctype html>",
    `<html lang="${opts.locale}">`,
    "<head>",
    '  <meta charset="utf-8" />',
    '  <meta name="viewport" content="width=device-width, initial-scale=1" />',
    `  <title>${escapeHtml(prefix + title)}</title>`,
    "</head>",
    "<body>",
    opts.navTitle ? `  <header><span class="nav-title">${escapeHtml(opts.navTitle)}</span></header>` : "",
    // Supplied by the calling service as markup.
    opts.phaseBannerHtml ? `  <div class="govuk-phase-banner">${opts.phaseBannerHtml}</div>` : "",
    '  <main class="govuk-main-wrapper" id="main-content">',
    opts.showBackLink ? '    <a href="javascript:history.back()" class="govuk-back-link">Back</a>' : "",
    errorSummary(opts.errors),
    ...opts.body,
    "  </main>",
    "</body>",
    "</html>",
  ]
    .filter(Boolean)
    .join("\n");
}
