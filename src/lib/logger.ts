import pino, { type TransportSingleOptions } from "pino";
import { createRequire } from "module";

const env = process.env.NODE_ENV || "development";
const level = process.env.LOG_LEVEL || (env === "production" ? "info" : "debug");

let transport: TransportSingleOptions | undefined;
if (env !== "production" && env !== "test") {
  try {
    const require = createRequire(import.meta.url);
    require.resolve("pino-pretty");
    transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
      },
    };
  } catch {
    transport = undefined;
  }
}

export const logger = pino({ name: "address-lookup", level, transport });

export type Logger = typeof logger;
