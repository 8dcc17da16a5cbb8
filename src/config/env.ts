import dotenv from "dotenv";
import { z } from "zod";

// Load environment variables from .env files
// Priority: .env.<env>.local > .env.<env> > .env.local > .env
const env = process.env.NODE_ENV || "development";
const envFiles = [
  `.env.${env}.local`,
  `.env.${env}`,
  ".env.local",
  ".env",
];

for (const file of envFiles) {
  dotenv.config({ path: file });
}

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((v) => v === "true");

// Define the environment variable schema
const envSchema = z
  .object({
    // Application
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),

    // Execution
    MAX_PARALLEL: z.coerce.number().int().positive().optional(),
    PROCESS_DRAIN_TIMEOUT: z.coerce.number().int().positive().default(30000),

    // Automation server
    APPIUM_PATH: z.string().min(1).default("appium"),
    APPIUM_HOST: z.string().min(1).default("127.0.0.1"),
    APPIUM_STARTUP_TIMEOUT: z.coerce.number().int().positive().default(60000),
    APPIUM_DEBUG_OUTPUT: booleanFlag("false"),

    // Device tooling
    ANDROID_HOME: z.string().optional(),

    // Logging
    LOG_LEVEL: z
      .enum(["trace", "debug", "info", "warn", "error", "silent"])
      .default("info"),
    LOG_FILE: z.string().optional(),
    LOG_FORMAT: z.enum(["json", "text"]).default("text"),
  })
  .passthrough();

// Type for validated environment variables
export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate a set of environment variables
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const formattedErrors: string[] = [];

    for (const issue of result.error.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "unknown";
      formattedErrors.push(`  - ${path}: ${issue.message}`);
    }

    const errors = formattedErrors.length > 0 ? formattedErrors.join("\n") : "  - Unknown validation error";

    throw new Error(
      `Environment variable validation failed:\n${errors}\n\n` +
        `Please check your .env file or set the required environment variables.`
    );
  }

  return result.data;
}

let cached: Env | undefined;

/**
 * Validated configuration, parsed on first use
 */
export function getConfig(): Env {
  if (!cached) {
    cached = parseEnv();
  }
  return cached;
}
