import { Pool } from "pg";
import { Env } from "../../config/env";
import { logger } from "../logger";

export const isDatabaseConfigured = (env: Env): boolean =>
  Boolean(env.DB_HOST && env.DB_USER && env.DB_PASS);

/**
 * Pool único por processo. Retorna null sem credenciais: o cadastro falha com
 * DATABASE_NOT_CONFIGURED, mas o restante da API continua de pé.
 */
export const createPgPool = (env: Env): Pool | null => {
  if (!isDatabaseConfigured(env)) {
    logger.warn({
      type: "DATABASE",
      message: "Database credentials not configured; registration endpoint will be unavailable",
    });
    return null;
  }

  const pool = new Pool({
    host: env.DB_HOST,
    port: env.DB_PORT,
    user: env.DB_USER,
    password: env.DB_PASS,
    database: env.DB_NAME,
    ssl: env.DB_SSL ? { rejectUnauthorized: false } : undefined,
    connectionTimeoutMillis: 5000,
  });

  pool.on("error", (error) => {
    logger.error({ type: "DATABASE", message: "Idle PostgreSQL client error", error });
  });

  return pool;
};
