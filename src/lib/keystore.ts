import { Redis } from "ioredis";
import { KeystoreUnavailableError } from "./errors.js";
import { parseJourneyRecord, UnsupportedRecordError, type JourneyRecord } from "./journeyRecord.js";
import { logger } from "./logger.js";

export interface Keystore {
  /** Null when the journey is unknown, expired or stored in a shape this service cannot read. */
  get(journeyId: string): Promise<JourneyRecord | null>;
  put(journeyId: string, record: JourneyRecord): Promise<void>;
}

/** The slice of an ioredis client the keystore needs. */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, secondsToken: "EX", seconds: number): Promise<unknown>;
}

export type RedisKeystoreOpts = {
  prefix: string;
  ttlSeconds: number;
};

export function createRedisConnection(url: string): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: 1,
  });
}

export class RedisKeystore implements Keystore {
  constructor(
    private readonly redis: RedisLike,
    private readonly opts: RedisKeystoreOpts
  ) {}

  private key(journeyId: string) {
    return `${this.opts.prefix}${journeyId}`;
  }

  async get(journeyId: string): Promise<JourneyRecord | null> {
    let raw: string | null;
    try {
      raw = await this.redis.get(this.key(journeyId));
    } catch (err) {
      throw new KeystoreUnavailableError(`Keystore read failed for ${journeyId}`, { cause: err });
    }
    if (raw === null) return null;
    try {
      return parseJourneyRecord(JSON.parse(raw));
    } catch (err) {
      if (err instanceof UnsupportedRecordError || err instanceof SyntaxError) {
        logger.warn({ journeyId, err: String(err) }, "Discarding unreadable journey record");
        return null;
      }
      throw err;
    }
  }

  async put(journeyId: string, record: JourneyRecord): Promise<void> {
    try {
      await this.redis.set(this.key(journeyId), JSON.stringify(record), "EX", this.opts.ttlSeconds);
    } catch (err) {
      throw new KeystoreUnavailableError(`Keystore write failed for ${journeyId}`, { cause: err });
    }
  }
}
