import { Router, type Request, type Response, type NextFunction, type RequestHandler } from "express";
import { ConfigError, KeystoreUnavailableError, ValidationError } from "../../lib/errors.js";
import type { JourneyService } from "../../lib/journeyService.js";

export type ApiRouterDeps = {
  journeys: JourneyService;
  basePath: string;
};

function journeyIdOf(req: Request): string {
  const id = req.query.id;
  if (typeof id !== "string" || !id.trim()) {
    throw new ValidationError([{ field: "id", code: "Required", message: "A journey id is required" }]);
  }
  return id.trim();
}

export function createApiRouter({ journeys, basePath }: ApiRouterDeps): Router {
  const router = Router();

  const init: RequestHandler = async (req, res, next) => {
    try {
      const record = await journeys.init(req.body);
      res
        .status(202)
        .location(`${basePath}/${encodeURIComponent(record.journeyId)}/begin`)
        .end();
    } catch (err) {
      next(err);
    }
  };

  const confirmed: RequestHandler = async (req, res, next) => {
    try {
      const address = await journeys.confirmedAddress(journeyIdOf(req));
      if (!address) {
        res.status(404).json({ error: "not_found" });
        return;
      }
      res.json(address);
    } catch (err) {
      next(err);
    }
  };

  router.post("/v2/init", init);
  router.get("/v2/confirmed", confirmed);

  router.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (err instanceof ConfigError) {
      res.status(400).json({ error: "invalid_config", message: err.message, issues: err.issues });
      return;
    }
    if (err instanceof ValidationError) {
      res.status(400).json({ error: "invalid_request", issues: err.errors });
      return;
    }
    if (err instanceof KeystoreUnavailableError) {
      res.status(503).json({ error: "keystore_unavailable" });
      return;
    }
    next(err);
  });

  return router;
}
