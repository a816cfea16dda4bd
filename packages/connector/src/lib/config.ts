/**
 * Application configuration
 *
 * Loaded from environment variables (.env for local development)
 * and validated with zod.
 */

import { config } from "dotenv";
import { z } from "zod";

const EnvSchema = z.object({
  FITBIT_CLIENT_ID: z.string().min(1).optional(),
  FITBIT_CLIENT_SECRET: z.string().min(1).optional(),
  FITBIT_REDIRECT_URI: z.string().url().default("http://localhost:8000"),
  FITBIT_ACCOUNT: z.string().min(1).default("default"),
  FITBIT_DATA_DIR: z.string().min(1).default("data"),
  FITBIT_TOKEN_DIR: z.string().min(1).default("tokens"),
  FITBIT_MAX_DAYS: z.coerce.number().int().positive().default(30),
  FITBIT_API_BASE: z.string().url().default("https://api.fitbit.com"),
});

export interface AppConfig {
  clientId: string | null;
  clientSecret: string | null;
  redirectUri: string;
  /** Local callback port, taken from the redirect URI */
  port: number;
  account: string;
  dataDir: string;
  tokenDir: string;
  maxDays: number;
  apiBase: string;
}

function portOf(uri: string): number {
  const url = new URL(uri);
  if (url.port) {
    return parseInt(url.port, 10);
  }
  return url.protocol === "https:" ? 443 : 80;
}

/**
 * Build the configuration from an environment map.
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    clientId: values.FITBIT_CLIENT_ID ?? null,
    clientSecret: values.FITBIT_CLIENT_SECRET ?? null,
    redirectUri: values.FITBIT_REDIRECT_URI,
    port: portOf(values.FITBIT_REDIRECT_URI),
    account: values.FITBIT_ACCOUNT,
    dataDir: values.FITBIT_DATA_DIR,
    tokenDir: values.FITBIT_TOKEN_DIR,
    maxDays: values.FITBIT_MAX_DAYS,
    apiBase: values.FITBIT_API_BASE.replace(/\/+$/, ""),
  };
}

/**
 * Load .env into process.env, then build the configuration.
 */
export function loadConfigFromEnv(): AppConfig {
  config();
  return loadConfig(process.env);
}
