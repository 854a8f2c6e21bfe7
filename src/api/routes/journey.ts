import { Router, type Request, type Response, type NextFunction, type RequestHandler } from "express";
import { KeystoreUnavailableError, LookupUnavailableError, StaleJourneyError } from "../../lib/errors.js";
import type { FormValues } from "../../lib/forms.js";
import type { ViewStep } from "../../lib/journeyMachine.js";
import type { JourneyOutcome, JourneyService } from "../../lib/journeyService.js";
import { logger } from "../../lib/logger.js";
import { handleLanguage, localeOf } from "../middleware/language.js";
import { renderErrorPage, renderStep, stepPath } from "../views/pages.js";

export type JourneyRouterDeps = {
  journeys: JourneyService;
  basePath: string;
};

type Handler = (req: Request, res: Response) => Promise<void>;

function handle(fn: Handler): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

function queryValues(req: Request, keys: string[]): FormValues | undefined {
  const out: FormValues = {};
  for (const key of keys) {
    const v = req.query[key];
    if (typeof v === "string" && v.trim()) out[key] = v.trim();
  }
  return Object.keys(out).length ? out : undefined;
}

export function createJourneyRouter({ journeys, basePath }: JourneyRouterDeps): Router {
  const router = Router();

  function respond(req: Request, res: Response, outcome: JourneyOutcome, values?: FormValues) {
    const { record, effect } = outcome;
    const locale = localeOf(req);
    switch (effect.type) {
      case "redirect":
        res.redirect(303, stepPath(basePath, record.journeyId, effect.step));
        return;
      case "complete":
        res.redirect(303, effect.url);
        return;
      case "render":
        res.status(200).type("html").send(renderStep(effect.step, { record, locale, basePath, notice: effect.notice, values }));
        return;
      case "invalid":
        res
          .status(400)
          .type("html")
          .send(renderStep(effect.step, { record, locale, basePath, errors: effect.errors, values: effect.values }));
        return;
    }
  }

  const show = (step: ViewStep, prefill?: string[]) =>
    handle(async (req, res) => {
      const outcome = await journeys.view(req.params.id, step);
      respond(req, res, outcome, prefill ? queryValues(req, prefill) : undefined);
    });

  router.get("/language/:lang", handleLanguage);

  router.get("/:id/begin", handle(async (req, res) => respond(req, res, await journeys.begin(req.params.id))));

  router.get("/:id/country-picker", show("countryPicker"));
  router.post("/:id/country-picker", handle(async (req, res) => respond(req, res, await journeys.pickCountry(req.params.id, req.body))));

  router.get("/:id/lookup", show("lookup", ["postcode", "filter"]));
  router.post("/:id/lookup", handle(async (req, res) => respond(req, res, await journeys.lookup(req.params.id, req.body))));
  router.post("/:id/bfpo", handle(async (req, res) => respond(req, res, await journeys.lookupBfpo(req.params.id, req.body))));

  router.get("/:id/select", show("select"));
  router.post("/:id/select", handle(async (req, res) => respond(req, res, await journeys.select(req.params.id, req.body))));

  router.get("/:id/edit", show("edit"));
  router.post("/:id/edit", handle(async (req, res) => respond(req, res, await journeys.edit(req.params.id, req.body))));

  router.get("/:id/confirm", show("confirm"));
  router.post("/:id/confirm", handle(async (req, res) => respond(req, res, await journeys.confirm(req.params.id))));

  router.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    const locale = localeOf(req);
    if (err instanceof StaleJourneyError) {
      if (req.path.endsWith("/begin")) {
        res.status(404).type("html").send(renderErrorPage(locale, "Journey not found", "This address lookup has expired or does not exist. Go back to the service you came from and start again."));
        return;
      }
      res.redirect(303, `${basePath}/${encodeURIComponent(err.journeyId)}/begin`);
      return;
    }
    if (err instanceof LookupUnavailableError || err instanceof KeystoreUnavailableError) {
      logger.error({ err: String(err), path: req.path }, "Journey dependency unavailable");
      res.status(503).type("html").send(renderErrorPage(locale, "Sorry, there is a problem with the service", "Try again later."));
      return;
    }
    next(err);
  });

  return router;
}
