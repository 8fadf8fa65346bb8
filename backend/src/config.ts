import path from "path";
import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5050),
  ALGORITHM_CONFIG: z
    .string()
    .min(1)
    .default(path.resolve(__dirname, "data", "algorithm_config.csv")),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Config = {
  port: number;
  tablePath: string;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
};

export class ConfigError extends Error {
  constructor(readonly issues: Record<string, string[] | undefined>) {
    const detail = Object.entries(issues)
      .map(([key, msgs]) => `${key}: ${(msgs ?? []).join(", ")}`)
      .join("; ");
    super(`Invalid environment: ${detail}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.flatten().fieldErrors);
  }
  return {
    port: parsed.data.PORT,
    tablePath: parsed.data.ALGORITHM_CONFIG,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
