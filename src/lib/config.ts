import { z } from "zod";

const optionalTrimmed = z.string().trim().transform((val) => (val === "" ? undefined : val)).optional();

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(9028),
  REDIS_URL: z.string().default("redis://redis:6379"),
  KEYSTORE_PREFIX: z.string().default("alf:journey:"),
  KEYSTORE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  ADDRESS_LOOKUP_URL: z.string().url().default("http://address-lookup:9022"),
  ADDRESS_LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  ADDRESS_LOOKUP_RETRIES: z.coerce.number().int().min(0).max(5).default(0),
  API_USER: optionalTrimmed,
  API_PASS: optionalTrimmed,
  COOKIE_SECRET: optionalTrimmed,
});

export type AppConfig = {
  env: string;
  port: number;
  basePath: string;
  redisUrl: string;
  keystore: { prefix: string; ttlSeconds: number };
  addressLookup: { baseUrl: string; timeoutMs: number; retries: number };
  api: { user?: string; pass?: string };
  cookieSecret?: string;
};

/**
 * Reads the service configuration from environment variables. Throws with the
 * list of offending keys when any value is out of range.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new Error(`Invalid environment configuration: ${keys}`);
  }
  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    basePath: "/lookup-address",
    redisUrl: e.REDIS_URL,
    keystore: { prefix: e.KEYSTORE_PREFIX, ttlSeconds: e.KEYSTORE_TTL_SECONDS },
    addressLookup: {
      baseUrl: e.ADDRESS_LOOKUP_URL.replace(/\/$/, ""),
      timeoutMs: e.ADDRESS_LOOKUP_TIMEOUT_MS,
      retries: e.ADDRESS_LOOKUP_RETRIES,
    },
    api: { user: e.API_USER, pass: e.API_PASS },
    cookieSecret: e.COOKIE_SECRET,
  };
}
