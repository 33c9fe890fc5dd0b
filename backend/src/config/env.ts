import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().min(1).max(65535).default(8080),

  // HTTP
  CORS_ORIGIN: z.string().default("*"),
  REQUEST_BODY_LIMIT: z.string().default("5mb"),
  PROCESS_RATE_WINDOW_MS: z.coerce.number().default(60_000),
  PROCESS_RATE_MAX: z.coerce.number().default(60),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LOG_PRETTY: z.string().transform((val) => val === "true").default("false"),

  // Records
  RECORD_SCHEMA: z.enum(["canonical", "cocktaildb"]).default("canonical"),

  // Document store
  STORE_DB_PATH: z.string().default("data/drink-store.sqlite"),
  STORE_COLLECTION: z.string().min(1).default("cocktails"),

  // Blob storage
  BLOB_BACKEND: z.enum(["local", "s3"]).default("local"),
  LOCAL_BLOB_ROOT: z.string().default("data/blobs"),
  RAW_CONTAINER: z.string().min(1).default("raw"),
  PROCESSED_CONTAINER: z.string().min(1).default("processed"),
  AWS_REGION: z.string().optional(),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  AWS_S3_BUCKET_NAME: z.string().optional(),

  // Blob trigger
  BLOB_TRIGGER_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(5),
  BLOB_TRIGGER_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2_000),
});

export type Env = z.infer<typeof envSchema>;

let env: Env | undefined;

export function getEnv(): Env {
  if (env) {
    return env;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }

  env = result.data;
  return env;
}

export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

export function initEnv(): Env {
  const e = getEnv();

  if (e.NODE_ENV === "development") {
    console.log("Running in development mode");
    console.log("Port:", e.PORT);
    console.log("Blob backend:", e.BLOB_BACKEND);
  }

  return e;
}
