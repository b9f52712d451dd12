import * as v from "valibot";
import { makeLogger, type ILogger } from "./logging";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const envSchema = v.object({
  LOG_LEVEL: v.optional(v.picklist(LOG_LEVELS), "info"),
  LOG_PRETTY: v.optional(
    v.pipe(
      v.picklist(["true", "false"]),
      v.transform((flag) => flag === "true"),
    ),
    "false",
  ),
  CHAIN_ID: v.optional(
    v.pipe(
      v.string(),
      v.regex(/^[1-9][0-9]*$/, "CHAIN_ID must be a positive integer"),
      v.transform((id) => BigInt(id)),
    ),
    "1",
  ),
});

export interface Config {
  logLevel: (typeof LOG_LEVELS)[number];
  logPretty: boolean;
  chainId: bigint;
}

export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): Config => {
  const parsed = v.parse(envSchema, {
    LOG_LEVEL: env.LOG_LEVEL,
    LOG_PRETTY: env.LOG_PRETTY,
    CHAIN_ID: env.CHAIN_ID,
  });
  return {
    logLevel: parsed.LOG_LEVEL,
    logPretty: parsed.LOG_PRETTY,
    chainId: parsed.CHAIN_ID,
  };
};

export const loggerFromConfig = (config: Config): ILogger =>
  makeLogger(config.logLevel, config.logPretty);
