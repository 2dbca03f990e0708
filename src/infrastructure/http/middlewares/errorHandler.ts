import { NextFunction, Request, Response } from "express";
import { ValidationError } from "../../../domain/errors/AppError";
import { Logger } from "../../logger";
import { createErrorResponse, sendApiResponse } from "../utils/apiResponse";
import { handleControllerError } from "../utils/handleControllerError";

// body-parser marca o erro com `type`; JSON malformado chega aqui antes de qualquer rota
const isJsonParseError = (error: unknown): boolean =>
  error instanceof SyntaxError && "type" in error && error.type === "entity.parse.failed";

const isPayloadTooLarge = (error: unknown): boolean =>
  error instanceof Error && "type" in error && error.type === "entity.too.large";

export const notFoundHandler =
  (environment: string) =>
  (_req: Request, res: Response): Response =>
    sendApiResponse(
      res,
      createErrorResponse({ message: "Route not found", errorCode: "NOT_FOUND", statusCode: 404, environment })
    );

export const errorHandler =
  (environment: string, logger: Logger) =>
  (error: unknown, _req: Request, res: Response, _next: NextFunction): Response => {
    if (isJsonParseError(error)) {
      return handleControllerError(
        res,
        new ValidationError({ code: "INVALID_JSON", message: "Invalid JSON in request body" }),
        { environment, logger, operation: "Request parsing" }
      );
    }

    if (isPayloadTooLarge(error)) {
      return sendApiResponse(
        res,
        createErrorResponse({
          message: "Request body too large",
          errorCode: "PAYLOAD_TOO_LARGE",
          statusCode: 413,
          environment,
        })
      );
    }

    return handleControllerError(res, error, { environment, logger, operation: "Request" });
  };
