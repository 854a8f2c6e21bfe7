import "dotenv/config";
import { AddressMatcher } from "../lib/addressMatcher.js";
import { HttpAddressProvider } from "../lib/addressProvider.js";
import { loadConfig } from "../lib/config.js";
import { JourneyService } from "../lib/journeyService.js";
import { createRedisConnection, RedisKeystore } from "../lib/keystore.js";
import { logger } from "../lib/logger.js";
import { createApp } from "./app.js";

const config = loadConfig();
const redis = createRedisConnection(config.redisUrl);
redis.on("error", (err) => logger.warn({ err: String(err) }, "Redis connection error"));

const journeys = new JourneyService({
  keystore: new RedisKeystore(redis, config.keystore),
  matcher: new AddressMatcher(
    new HttpAddressProvider({
      baseUrl: config.addressLookup.baseUrl,
      timeoutMs: config.addressLookup.timeoutMs,
      retries: config.addressLookup.retries,
    })
  ),
});

const app = createApp({ journeys, config });
app.listen(config.port, () => logger.info({ port: config.port, basePath: config.basePath }, "API listening"));
