import { Response } from "express";
import { AppError } from "../../../domain/errors/AppError";
import { Logger } from "../../logger";
import { errorToResponse, sendApiResponse } from "./apiResponse";

/**
 * Converte qualquer erro no envelope padrão. 5xx são logados com a causa completa;
 * 4xx apenas como aviso.
 */
export const handleControllerError = (
  res: Response,
  error: unknown,
  context: { environment: string; logger: Logger; operation: string }
): Response => {
  const response = errorToResponse(error, context.environment);

  if (response.statusCode >= 500) {
    context.logger.error({
      type: "HTTP",
      message: `${context.operation} failed`,
      payload: { errorCode: error instanceof AppError ? error.code : "INTERNAL_ERROR" },
      error,
    });
  } else {
    context.logger.warn({
      type: "HTTP",
      message: `${context.operation} rejected`,
      payload: { errorCode: error instanceof AppError ? error.code : undefined, statusCode: response.statusCode },
    });
  }

  return sendApiResponse(res, response);
};
