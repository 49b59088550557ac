import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_MODEL = "mistralai/mistral-small-3.2-24b-instruct:free";
export const DEFAULT_API_URL = "https://openrouter.ai/api/v1/chat/completions";

const EnvSchema = z.object({
  OPENROUTER_API_KEY: z
    .string({ required_error: "OPENROUTER_API_KEY is not set (use .env or the environment)" })
    .trim()
    .min(1, "OPENROUTER_API_KEY is empty"),
  SORTER_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL),
  SORTER_API_URL: z.string().url().default(DEFAULT_API_URL),
  SORTER_INTAKE_DIR: z.string().min(1).default("in"),
  SORTER_OUTPUT_DIR: z.string().min(1).default("sorted"),
  SORTER_AUDIT_LOG: z.string().min(1).default("logs/audit.jsonl"),
  SORTER_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
});

export type SorterConfig = {
  apiKey: string;
  model: string;
  apiUrl: string;
  intakeDir: string;
  outputDir: string;
  auditLog: string;
  timeoutMs: number;
  port: number;
};

/**
 * Reads the sorter settings from the environment. A `.env` file in the
 * working directory is loaded first; variables already set win over it.
 *
 * Relative directories are resolved against `cwd`.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): SorterConfig {
  if (env === process.env) {
    dotenv.config({ path: path.join(cwd, ".env") });
  }

  // Blank values count as unset so the defaults apply
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value;
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const key = issue.path.join(".");
        return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
      }),
    );
  }

  const data = parsed.data;
  return {
    apiKey: data.OPENROUTER_API_KEY,
    model: data.SORTER_MODEL,
    apiUrl: data.SORTER_API_URL,
    intakeDir: path.resolve(cwd, data.SORTER_INTAKE_DIR),
    outputDir: path.resolve(cwd, data.SORTER_OUTPUT_DIR),
    auditLog: path.resolve(cwd, data.SORTER_AUDIT_LOG),
    timeoutMs: data.SORTER_TIMEOUT_MS,
    port: data.PORT,
  };
}
