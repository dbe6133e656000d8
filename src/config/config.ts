import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../errors/sync.errors";

dotenv.config();

const TRUTHY_FLAGS = ["1", "true", "yes"];

export const parseFlag = (value: unknown): boolean =>
  typeof value === "string" && TRUTHY_FLAGS.includes(value.trim().toLowerCase());

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  DEBUG: z.string().optional().transform(parseFlag),
  CORS_ORIGIN: z.string().default("*"),

  // ShotGrid
  SG_URL: z.string().url(),
  SG_SCRIPT_NAME: z.string().min(1),
  SG_SCRIPT_KEY: z.string().min(1),
  SHOTGRID_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // FileMaker Data API
  FMP_BASE_URL: z.string().url(),
  FMP_DATABASE: z.string().min(1),
  FMP_LAYOUT: z.string().min(1),
  FMP_USER: z.string().optional(),
  FMP_PASSWORD: z.string().optional(),
  FILEMAKER_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // Logging
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
});

export type Env = z.infer<typeof envSchema>;

export const parseEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  try {
    return envSchema.parse(env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const invalid = error.issues
        .map((issue) => issue.path.join("."))
        .join(", ");

      throw new ConfigurationError(
        `Missing or invalid environment variables: ${invalid}`,
      );
    }
    throw error;
  }
};
