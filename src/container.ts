import { S3Client } from "@aws-sdk/client-s3";
import { Pool } from "pg";
import { GenerateUploadUrls } from "./application/use-cases/GenerateUploadUrls";
import { RegisterUser } from "./application/use-cases/RegisterUser";
import { Env } from "./config/env";
import { S3StorageAdapter, createS3Client } from "./infrastructure/adapters/storage/S3StorageAdapter";
import { PgUserRepository } from "./infrastructure/database/PgUserRepository";
import { createPgPool } from "./infrastructure/database/pgPool";
import { RegistrationController } from "./infrastructure/http/controllers/RegistrationController";
import { UploadUrlController } from "./infrastructure/http/controllers/UploadUrlController";
import { Logger } from "./infrastructure/logger";

export interface Container {
  s3Client: S3Client;
  pool: Pool | null;
  uploadUrlController: UploadUrlController;
  registrationController: RegistrationController;
}

/**
 * Singletons do processo: cliente S3, pool do Postgres e logger são criados uma vez e
 * injetados. Bucket ausente vira adapter nulo; o endpoint que depende dele responde 500.
 */
export const createContainer = (env: Env, logger: Logger): Container => {
  const s3Client = createS3Client(env);
  const pool = createPgPool(env);

  const uploadsStorage = env.UPLOADS_BUCKET_NAME
    ? new S3StorageAdapter(s3Client, env.UPLOADS_BUCKET_NAME)
    : null;
  const documentsStorage = env.USER_DOCUMENTS_BUCKET
    ? new S3StorageAdapter(s3Client, env.USER_DOCUMENTS_BUCKET)
    : null;

  if (!uploadsStorage) {
    logger.warn({ type: "CONFIG", message: "UPLOADS_BUCKET_NAME not set; presigned URL issuing disabled" });
  }
  if (!documentsStorage) {
    logger.warn({ type: "CONFIG", message: "USER_DOCUMENTS_BUCKET not set; inline document upload disabled" });
  }

  const generateUploadUrls = new GenerateUploadUrls(uploadsStorage, {
    logger,
    expiresInSeconds: env.UPLOAD_URL_EXPIRATION_SECONDS,
  });
  const registerUser = new RegisterUser(new PgUserRepository(pool), documentsStorage, {
    logger,
    uploadMode: env.REGISTRATION_UPLOAD_MODE,
  });

  return {
    s3Client,
    pool,
    uploadUrlController: new UploadUrlController(generateUploadUrls, {
      environment: env.ENVIRONMENT,
      maxFileSize: env.MAX_UPLOAD_FILE_BYTES,
      logger,
    }),
    registrationController: new RegistrationController(registerUser, {
      environment: env.ENVIRONMENT,
      logger,
    }),
  };
};
