// 🛠️ MAINTAINABILITY: Single source of truth for configuration values

/**
 * Buckets e credenciais de banco são opcionais no schema: cada operação verifica
 * o que precisa no momento da chamada, então a ausência de um valor derruba apenas
 * o endpoint que depende dele, não o processo inteiro.
 */

import { z } from "zod";

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((v) => v === "true");

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.string().regex(/^\d+$/).default("3000").transform(Number),
  ENVIRONMENT: z.string().default("dev"),
  LOG_LEVEL: optionalText,

  // PostgreSQL
  DB_HOST: optionalText,
  DB_PORT: z.string().regex(/^\d+$/).default("5432").transform(Number),
  DB_USER: optionalText,
  DB_PASS: optionalText,
  DB_NAME: z.string().default("applicant_intake"),
  DB_SSL: booleanFlag("false"),

  // S3 / MinIO
  UPLOADS_BUCKET_NAME: optionalText,
  USER_DOCUMENTS_BUCKET: optionalText,
  AWS_REGION: z.string().default("us-east-1"),
  S3_ENDPOINT: optionalText,
  S3_ACCESS_KEY: optionalText,
  S3_SECRET_KEY: optionalText,
  S3_FORCE_PATH_STYLE: booleanFlag("false"),

  // Upload policy
  UPLOAD_URL_EXPIRATION_SECONDS: z.string().regex(/^\d+$/).default("3600").transform(Number),
  MAX_UPLOAD_FILE_BYTES: z.string().regex(/^\d+$/).default(String(10 * 1024 * 1024)).transform(Number),
  REGISTRATION_UPLOAD_MODE: z.enum(["inline", "deferred"]).default("inline"),
});

export type Env = z.infer<typeof envSchema>;

export const parseEnv = (source: Record<string, string | undefined>): Env => envSchema.parse(source);

const parsed = envSchema.safeParse(process.env);

const loadEnv = (): Env => {
  if (parsed.success) {
    return parsed.data;
  }

  if (process.env.NODE_ENV === "test") {
    return envSchema.parse({ NODE_ENV: "test", ENVIRONMENT: process.env.ENVIRONMENT });
  }

  console.error("❌ Invalid environment variables: ", parsed.error.format());
  process.exit(1);
};

export const env = loadEnv();
