import type { Request, Response, NextFunction } from "express";
import { locales, type Locale } from "../../lib/journeyConfig.js";

export const LANGUAGE_COOKIE = "alf_lang";

function isLocale(value: unknown): value is Locale {
  return typeof value === "string" && locales.some((l) => l === value);
}

export function localeOf(req: Request): Locale {
  const fromCookie: unknown = req.signedCookies?.[LANGUAGE_COOKIE] ?? req.cookies?.[LANGUAGE_COOKIE];
  return isLocale(fromCookie) ? fromCookie : "en";
}

// A path on this host only: browsers read a backslash as a slash, so "/\host" leaves the site.
function isLocalPath(value: unknown): value is string {
  return typeof value === "string" && /^\/(?![/\\])/.test(value) && !value.includes("\\") && !/[\r\n]/.test(value);
}

/** Switches the page language and returns the user to where they were. */
export function handleLanguage(req: Request, res: Response, _next: NextFunction) {
  const lang = req.params.lang;
  const ret = isLocalPath(req.query.return) ? req.query.return : "/";
  if (!isLocale(lang)) {
    res.status(404).send("Unknown language");
    return;
  }
  res.cookie(LANGUAGE_COOKIE, lang, {
    httpOnly: true,
    secure: process.env.NODE_ENV === "production",
    signed: Boolean(req.secret),
    sameSite: "lax",
    maxAge: 365 * 24 * 60 * 60 * 1000,
  });
  res.redirect(ret);
}
