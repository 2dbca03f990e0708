import { Request, Response } from "express";
import { GenerateUploadUrls } from "../../../application/use-cases/GenerateUploadUrls";
import { UploadGrant } from "../../../domain/entities/UploadGrant";
import { ValidationError } from "../../../domain/errors/AppError";
import { validateFileUploadBatch } from "../../../domain/validators/FileUploadValidator";
import { isPlainObject } from "../../../utils/isPlainObject";
import { Logger } from "../../logger";
import { createSuccessResponse, sendApiResponse } from "../utils/apiResponse";
import { handleControllerError } from "../utils/handleControllerError";

export interface UploadUrlControllerOptions {
  environment: string;
  maxFileSize: number;
  logger: Logger;
}

const toGrantResponse = (grant: UploadGrant) => ({
  field_name: grant.fieldName,
  file_name: grant.fileName,
  object_key: grant.objectKey,
  upload_url: grant.uploadUrl,
  expires_in: grant.expiresIn,
  expires_at: grant.expiresAt.toISOString(),
  content_type: grant.contentType,
  max_size: grant.maxSize,
});

export class UploadUrlController {
  constructor(
    private readonly generateUploadUrls: GenerateUploadUrls,
    private readonly options: UploadUrlControllerOptions
  ) {}

  async create(req: Request, res: Response) {
    const { environment, logger, maxFileSize } = this.options;

    try {
      this.generateUploadUrls.requireStorage();

      const body: unknown = req.body;
      if (!isPlainObject(body) || Object.keys(body).length === 0) {
        throw new ValidationError({ code: "MISSING_BODY", message: "Request body is required" });
      }

      const files = validateFileUploadBatch(body.files, maxFileSize);
      const result = await this.generateUploadUrls.execute({
        files,
        allowPartialBatch: body.allow_partial === true,
      });

      const data = {
        upload_urls: result.grants.map(toGrantResponse),
        bucket_name: result.bucketName,
        total_files: result.grants.length,
        ...(result.partial ? { partial: true, failed_file_index: result.failedFileIndex } : {}),
      };

      return sendApiResponse(
        res,
        createSuccessResponse({
          message: result.partial ? "Upload URLs partially generated" : "Upload URLs generated successfully",
          data,
          environment,
        })
      );
    } catch (error) {
      return handleControllerError(res, error, { environment, logger, operation: "Presigned URL generation" });
    }
  }
}
