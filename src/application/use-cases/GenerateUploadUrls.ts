import { randomUUID } from "crypto";
import { FileUploadRequest, UploadGrant } from "../../domain/entities/UploadGrant";
import { BackendUnavailableError } from "../../domain/errors/AppError";
import { buildUploadKey } from "../../domain/services/DocumentNaming";
import { Logger } from "../../infrastructure/logger";
import { StoragePort } from "../../ports/StoragePort";

export const DEFAULT_UPLOAD_URL_EXPIRATION_SECONDS = 3600;

export interface GenerateUploadUrlsInput {
  files: FileUploadRequest[];
  /** Devolve as URLs já emitidas quando o storage falha num arquivo posterior. */
  allowPartialBatch?: boolean;
}

export interface GenerateUploadUrlsOutput {
  bucketName: string;
  grants: UploadGrant[];
  partial: boolean;
  failedFileIndex?: number;
}

export interface GenerateUploadUrlsOptions {
  logger: Logger;
  expiresInSeconds?: number;
  now?: () => Date;
  generateId?: () => string;
}

const presignFailure = (cause: unknown) =>
  new BackendUnavailableError({
    backend: "storage",
    code: "S3_PRESIGN_ERROR",
    message: "Failed to generate presigned URL",
    cause,
  });

/**
 * Emite uma URL prefirmada de PUT por arquivo já validado. Não toca no banco e não
 * reserva a chave; a unicidade vem do timestamp + UUID.
 */
export class GenerateUploadUrls {
  private readonly logger: Logger;
  private readonly expiresInSeconds: number;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly storage: StoragePort | null,
    options: GenerateUploadUrlsOptions
  ) {
    this.logger = options.logger;
    this.expiresInSeconds = options.expiresInSeconds ?? DEFAULT_UPLOAD_URL_EXPIRATION_SECONDS;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /** Falha antes de olhar o corpo da requisição quando não há bucket de uploads. */
  requireStorage(): StoragePort {
    if (!this.storage) {
      throw new BackendUnavailableError({
        backend: "storage",
        code: "BUCKET_NOT_CONFIGURED",
        message: "Upload bucket is not configured",
      });
    }
    return this.storage;
  }

  async execute(input: GenerateUploadUrlsInput): Promise<GenerateUploadUrlsOutput> {
    const storage = this.requireStorage();
    const grants: UploadGrant[] = [];

    for (const [index, file] of input.files.entries()) {
      const issuedAt = this.now();
      const objectKey = buildUploadKey({
        fieldName: file.fieldName,
        fileName: file.fileName,
        date: issuedAt,
        uniqueId: this.generateId(),
      });

      let uploadUrl: string;
      try {
        uploadUrl = await storage.generatePresignedUploadUrl(objectKey, {
          contentType: file.contentType,
          contentLength: file.fileSize,
          expiresInSeconds: this.expiresInSeconds,
        });
      } catch (error) {
        this.logger.error({
          type: "PRESIGN",
          message: "Failed to generate presigned URL",
          payload: { fileIndex: index, objectKey, issuedBefore: grants.length },
          error,
        });

        if (input.allowPartialBatch && grants.length > 0) {
          return { bucketName: storage.bucketName, grants, partial: true, failedFileIndex: index };
        }
        throw presignFailure(error);
      }

      grants.push({
        fieldName: file.fieldName,
        fileName: file.fileName,
        objectKey,
        uploadUrl,
        expiresIn: this.expiresInSeconds,
        expiresAt: new Date(issuedAt.getTime() + this.expiresInSeconds * 1000),
        contentType: file.contentType,
        maxSize: file.fileSize,
      });
    }

    this.logger.info({
      type: "PRESIGN",
      message: "Upload URLs generated",
      payload: { bucket: storage.bucketName, total: grants.length },
    });

    return { bucketName: storage.bucketName, grants, partial: false };
  }
}
