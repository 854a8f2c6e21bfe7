import { timingSafeEqual } from "crypto";
import type { Request, Response, NextFunction, RequestHandler } from "express";

function sameSecret(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

function credentialsOf(req: Request): { user: string; pass: string } | null {
  const header = req.headers.authorization || "";
  if (!header.startsWith("Basic ")) return null;
  const decoded = Buffer.from(header.slice(6), "base64").toString("utf-8");
  const idx = decoded.indexOf(":");
  if (idx < 0) return null;
  return { user: decoded.slice(0, idx), pass: decoded.slice(idx + 1) };
}

/** HTTP Basic auth for the calling-service API. */
export function basicAuth(creds: { user?: string; pass?: string }): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const { user, pass } = creds;
    if (!user || !pass) {
      res.status(500).json({ error: "auth_not_configured" });
      return;
    }
    const given = credentialsOf(req);
    if (given && sameSecret(given.user, user) && sameSecret(given.pass, pass)) {
      next();
      return;
    }
    res.set("WWW-Authenticate", 'Basic realm="address-lookup"');
    res.status(401).json({ error: "unauthorized" });
  };
}
