import express, { type Express, type Request, type Response, type NextFunction } from "express";
import cookieParser from "cookie-parser";
import { z } from "zod";
import type { AppConfig } from "../lib/config.js";
import type { JourneyService } from "../lib/journeyService.js";
import { logger } from "../lib/logger.js";
import { basicAuth } from "./middleware/basic_auth.js";
import { localeOf } from "./middleware/language.js";
import { createApiRouter } from "./routes/api.js";
import { createJourneyRouter } from "./routes/journey.js";
import { renderErrorPage } from "./views/pages.js";

export type AppDeps = {
  journeys: JourneyService;
  config: Pick<AppConfig, "basePath" | "api" | "cookieSecret">;
};

const httpErrorShape = z.object({ status: z.number().int() }).or(z.object({ statusCode: z.number().int() }));

// Body parser failures carry a 4xx status of their own.
function clientStatusOf(err: unknown): number | undefined {
  const parsed = httpErrorShape.safeParse(err);
  if (!parsed.success) return undefined;
  const status = "status" in parsed.data ? parsed.data.status : parsed.data.statusCode;
  return status >= 400 && status < 500 ? status : undefined;
}

export function createApp({ journeys, config }: AppDeps): Express {
  const app = express();
  app.use(cookieParser(config.cookieSecret));
  app.use(express.urlencoded({ extended: true }));
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => res.json({ ok: true }));

  app.use("/api", basicAuth(config.api), createApiRouter({ journeys, basePath: config.basePath }));
  app.use(config.basePath, createJourneyRouter({ journeys, basePath: config.basePath }));

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = clientStatusOf(err);
    if (status !== undefined) {
      logger.info({ status, method: req.method, path: req.originalUrl, err: String(err) }, "Rejected request");
      if (req.originalUrl.startsWith("/api")) {
        res.status(status).json({ error: "invalid_request" });
        return;
      }
      res
        .status(status)
        .type("html")
        .send(renderErrorPage(localeOf(req), "Sorry, there is a problem with your request", "Go back and try again."));
      return;
    }
    logger.error({ err: String(err), method: req.method, path: req.originalUrl }, "Unhandled request error");
    if (req.originalUrl.startsWith("/api")) {
      res.status(500).json({ error: "internal_error" });
      return;
    }
    res
      .status(500)
      .type("html")
      .send(renderErrorPage(localeOf(req), "Sorry, there is a problem with the service", "Try again later."));
  });

  return app;
}
