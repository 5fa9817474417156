import { object, optional, parse, picklist, pipe, transform } from "valibot";
import type pino from "pino";

const envSchema = object({
  LOG_LEVEL: optional(
    picklist(["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const),
    "info",
  ),
  LOG_PRETTY: optional(
    pipe(
      picklist(["true", "false"] as const),
      transform((v) => v === "true"),
    ),
    "false",
  ),
});

export type Config = {
  logLevel: pino.LevelWithSilent;
  logPretty: boolean;
};

/** Reads LOG_LEVEL and LOG_PRETTY; throws a ValiError on unknown values. */
export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): Config => {
  const parsed = parse(envSchema, env);
  return { logLevel: parsed.LOG_LEVEL, logPretty: parsed.LOG_PRETTY };
};
