import { setTimeout as delay } from "timers/promises";
import { fetch, type Dispatcher } from "undici";
import { logger } from "./logger.js";

export type HttpOpts = {
  headers?: Record<string, string>;
  retries?: number;
  backoffBaseMs?: number;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
};

export class HttpError extends Error {
  constructor(
    public readonly url: string,
    public readonly status: number,
    message?: string
  ) {
    super(message ?? `HTTP ${status} from ${url}`);
    this.name = "HttpError";
    Object.setPrototypeOf(this, HttpError.prototype);
  }

  get transient(): boolean {
    return this.status === 429 || (this.status >= 500 && this.status < 600);
  }
}

export async function httpGetJson(url: string, opts: HttpOpts = {}): Promise<unknown> {
  const { headers = {}, retries = 0, backoffBaseMs = 250, timeoutMs = 5000, dispatcher } = opts;
  let attempt = 0;
  while (true) {
    try {
      const res = await fetch(url, {
        headers: { Accept: "application/json", ...headers },
        signal: AbortSignal.timeout(timeoutMs),
        dispatcher,
      });
      if (res.status >= 200 && res.status < 300) return await res.json();
      const txt = await res.text();
      throw new HttpError(url, res.status, `HTTP ${res.status}: ${txt.slice(0, 200)}`);
    } catch (err) {
      // Client errors are final; 404 in particular carries meaning for callers.
      if (err instanceof HttpError && !err.transient) throw err;
      attempt++;
      if (attempt > retries) {
        logger.error({ url, err: String(err) }, "HTTP failed");
        throw err;
      }
      const wait = backoffBaseMs * Math.pow(2, attempt - 1);
      logger.warn({ url, attempt, wait }, "HTTP retry");
      await delay(wait);
    }
  }
}
