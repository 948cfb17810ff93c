import * as dotenv from "dotenv";
import { z } from "zod";

import { LOG_LEVELS } from "../chain/logger.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// `KEY=` in .env leaves an empty string behind
const optionalUrl = z.preprocess(
  (value) => (value === "" ? undefined : value),
  z.string().url().optional()
);

export const EnvSchema = z.object({
  NETWORK: z.string().min(1).default("hardhat"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  SEPOLIA_RPC_URL: optionalUrl,
  MAINNET_RPC_URL: optionalUrl,
});

export type Env = z.infer<typeof EnvSchema>;

/** Validates `source`; by default `.env` is loaded into process.env first. */
export function loadEnv(source?: NodeJS.ProcessEnv): Env {
  if (source === undefined) {
    dotenv.config();
  }
  const parsed = EnvSchema.safeParse(source ?? process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join("; ")}`);
  }
  return parsed.data;
}
