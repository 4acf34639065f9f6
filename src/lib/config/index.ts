/**
 * Environment configuration.
 *
 * Variables (set in .env, see .env.example):
 *   SUPABASE_URL      - project URL, only needed by the Supabase adapter
 *   SUPABASE_ANON_KEY - public anon key; RLS still applies to every query
 *   LOG_LEVEL         - error | warn | info | debug (default info)
 *   LOCAL_DB_NAME     - IndexedDB database name for the local store
 *
 * NEVER put the service_role key here: it bypasses RLS.
 */

import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../errors";

dotenv.config();

const emptyAsUndefined = (value: unknown) => (value === "" ? undefined : value);

const envSchema = z.object({
  SUPABASE_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  SUPABASE_ANON_KEY: z.preprocess(emptyAsUndefined, z.string().min(1).optional()),
  LOG_LEVEL: z.preprocess(
    emptyAsUndefined,
    z.enum(["error", "warn", "info", "debug"]).default("info"),
  ),
  LOCAL_DB_NAME: z.preprocess(emptyAsUndefined, z.string().min(1).default("field-timelog-db")),
});

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface AppConfig {
  supabaseUrl: string | undefined;
  supabaseAnonKey: string | undefined;
  logLevel: LogLevel;
  localDbName: string;
}

/**
 * Parse configuration from an environment map.
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${problems}`);
  }

  return {
    supabaseUrl: result.data.SUPABASE_URL,
    supabaseAnonKey: result.data.SUPABASE_ANON_KEY,
    logLevel: result.data.LOG_LEVEL,
    localDbName: result.data.LOCAL_DB_NAME,
  };
}

let config: AppConfig | null = null;

/** Configuration from process.env, parsed once. */
export function getConfig(): AppConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}
