import * as path from "path";
import { z } from "zod";
import { DEFAULT_ID_PREFIX, DEFAULT_ROOT_ID } from "@ontoscope/core";

export const LOG_LEVELS = ["error", "warn", "info", "verbose", "debug", "silly"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ServerConfig {
  port: number;
  host: string;
  ontologyPath: string;
  rootTermId: string;
  idPrefix: string;
  allowedOrigins: string[];
  webDir: string | null;
  logLevel: LogLevel;
  logFile: string | null;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().default("0.0.0.0"),
  ONTOLOGY_PATH: z.string().default("hp.json"),
  ROOT_TERM_ID: z.string().default(DEFAULT_ROOT_ID),
  ID_PREFIX: z.string().default(DEFAULT_ID_PREFIX),
  ALLOWED_ORIGINS: z.string().default("*"),
  WEB_DIR: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOG_FILE: z.string().optional(),
});

/**
 * Reads server settings from the environment. Empty variables count as unset.
 * Relative paths resolve against `cwd`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): ServerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }

  const vars = parsed.data;
  const origins = vars.ALLOWED_ORIGINS.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    port: vars.PORT,
    host: vars.HOST,
    ontologyPath: path.resolve(cwd, vars.ONTOLOGY_PATH),
    rootTermId: vars.ROOT_TERM_ID,
    idPrefix: vars.ID_PREFIX,
    allowedOrigins: origins.length > 0 ? origins : ["*"],
    webDir: vars.WEB_DIR ? path.resolve(cwd, vars.WEB_DIR) : null,
    logLevel: vars.LOG_LEVEL,
    logFile: vars.LOG_FILE ? path.resolve(cwd, vars.LOG_FILE) : null,
  };
}
