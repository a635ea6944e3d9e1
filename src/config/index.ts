import { z } from "zod";

// Environment schema validation
const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().default(3001),
  HOST: z.string().default("localhost"),
  FRONTEND_URL: z.url().default("http://localhost:3000"),

  // Database
  DATABASE_URL: z.string().min(1),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),

  // Logging
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),

  // API Documentation
  ENABLE_API_DOCS: z.stringbool().optional(), // Defaults based on NODE_ENV
  API_DOCS_PATH: z.string().default("/api-docs"),
});

export type AppConfig = z.infer<typeof envSchema>;

// Parse and validate environment
function loadConfig(): AppConfig {
  const parsed = envSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error("❌ Invalid environment variables:");
    console.error(z.treeifyError(parsed.error));
    process.exit(1);
  }

  return parsed.data;
}

export const config = loadConfig();

// Derived config
export const isDev = config.NODE_ENV === "development";
export const isProd = config.NODE_ENV === "production";

// API docs enabled by default outside production
export const isApiDocsEnabled = config.ENABLE_API_DOCS ?? !isProd;
