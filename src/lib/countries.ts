import fs from "fs";
import path from "path";
import { z } from "zod";
import type { Country } from "./types.js";

export const UK: Country = { code: "GB", name: "United Kingdom" };

const countryListSchema = z.array(z.object({ code: z.string().length(2), name: z.string().min(1) }));

function loadCountries(): Country[] {
  const p = path.join(process.cwd(), "config", "countries.json");
  return countryListSchema.parse(JSON.parse(fs.readFileSync(p, "utf-8")));
}

export const countries: readonly Country[] = loadCountries();

const byCode = new Map(countries.map((c) => [c.code, c]));

export function findCountry(code: string | undefined): Country | undefined {
  if (!code) return undefined;
  return byCode.get(code.trim().toUpperCase());
}
