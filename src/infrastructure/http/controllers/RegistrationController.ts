import { Request, Response } from "express";
import { RegisterUser, RegisterUserOutput } from "../../../application/use-cases/RegisterUser";
import { ValidationError } from "../../../domain/errors/AppError";
import { validateRegistrationPayload } from "../../../domain/validators/RegistrationValidator";
import { isPlainObject } from "../../../utils/isPlainObject";
import { Logger } from "../../logger";
import { createSuccessResponse, sendApiResponse } from "../utils/apiResponse";
import { handleControllerError } from "../utils/handleControllerError";

export interface RegistrationControllerOptions {
  environment: string;
  logger: Logger;
}

const toRegistrationResponse = (output: RegisterUserOutput) => ({
  user_id: output.userId,
  email: output.email,
  national_id: output.nationalId,
  storage_folder: output.storageFolder,
  documents: output.documentPaths,
  failed_documents: output.failedDocuments.map((failure) => ({
    field: failure.formField,
    reason: failure.reason,
  })),
  files_uploaded: output.filesUploaded,
});

export class RegistrationController {
  constructor(
    private readonly registerUser: RegisterUser,
    private readonly options: RegistrationControllerOptions
  ) {}

  async register(req: Request, res: Response) {
    const { environment, logger } = this.options;

    try {
      const body: unknown = req.body;
      if (!isPlainObject(body) || Object.keys(body).length === 0) {
        throw new ValidationError({ code: "MISSING_BODY", message: "Request body is required" });
      }

      const payload = validateRegistrationPayload(body);
      const output = await this.registerUser.execute(payload);

      return sendApiResponse(
        res,
        createSuccessResponse({
          message: "User registered successfully",
          data: toRegistrationResponse(output),
          environment,
          statusCode: 201,
        })
      );
    } catch (error) {
      return handleControllerError(res, error, { environment, logger, operation: "User registration" });
    }
  }
}
