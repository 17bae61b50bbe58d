/**
 * Environment Configuration
 *
 * Reads .env (when present) and validates the process environment once at
 * start-up. API keys are not part of this object: the LLM client reads them
 * lazily so a missing key degrades classification instead of blocking boot.
 */

import { config } from "dotenv";
import { z } from "zod";
import { MODEL_ASSIGNMENTS } from "./models";
import { TIMEOUT_CONSTANTS } from "./constants";
import { ConfigurationError, getErrorMessage } from "../utils/errorHandler";

const environmentSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  ORGS_DIR: z.string().min(1).default("orgs"),
  CLASSIFICATION_MODEL: z.string().min(1).default(MODEL_ASSIGNMENTS.PROGRAM_CLASSIFICATION),
  CHAT_MODEL: z.string().min(1).default(MODEL_ASSIGNMENTS.INTAKE_CHAT_STREAMING),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(TIMEOUT_CONSTANTS.CLASSIFICATION_TIMEOUT_MS),
  CHAT_STREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(TIMEOUT_CONSTANTS.CHAT_STREAM_TIMEOUT_MS),
  CORS_ORIGIN: z.string().min(1).default("*"),
});

export type Environment = z.infer<typeof environmentSchema>;

/**
 * @throws ConfigurationError naming every invalid variable
 */
export function parseEnvironment(source: NodeJS.ProcessEnv): Environment {
  // Empty strings in .env mean "unset".
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = environmentSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError("environment", getErrorMessage(parsed.error));
  }
  return parsed.data;
}

export function loadEnvironment(): Environment {
  config();
  const env = parseEnvironment(process.env);

  console.log(`[Config] Loaded configuration:`);
  console.log(`  - Port: ${env.PORT}`);
  console.log(`  - Organizations dir: ${env.ORGS_DIR}`);
  console.log(`  - Classification model: ${env.CLASSIFICATION_MODEL} (timeout ${env.LLM_TIMEOUT_MS}ms)`);
  console.log(`  - Chat model: ${env.CHAT_MODEL} (timeout ${env.CHAT_STREAM_TIMEOUT_MS}ms)`);
  console.log(`  - CORS origin: ${env.CORS_ORIGIN}`);

  return env;
}
