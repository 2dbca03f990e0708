/**
 * Envelope padrão de resposta
 *
 * Sucesso: { success, message, data, environment, timestamp }
 * Erro:    { success, message, error_code, environment, timestamp, details? }
 *
 * Erros de backend (5xx) nunca carregam `details`: a causa vai só para o log.
 */

import { Response } from "express";
import { AppError, ConflictError, ValidationError } from "../../../domain/errors/AppError";

export const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "POST, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type, Authorization",
} as const;

export const RESPONSE_HEADERS: Record<string, string> = {
  "Content-Type": "application/json",
  ...CORS_HEADERS,
};

export interface SuccessEnvelope<T> {
  success: true;
  message: string;
  data: T;
  environment: string;
  timestamp: string;
}

export interface ErrorEnvelope {
  success: false;
  message: string;
  error_code: string;
  environment: string;
  timestamp: string;
  details?: Record<string, unknown>;
}

export interface ApiResponse<T = unknown> {
  statusCode: number;
  headers: Record<string, string>;
  body: SuccessEnvelope<T> | ErrorEnvelope;
}

export const createSuccessResponse = <T>(params: {
  message: string;
  data: T;
  environment: string;
  statusCode?: number;
  now?: Date;
}): ApiResponse<T> => ({
  statusCode: params.statusCode ?? 200,
  headers: { ...RESPONSE_HEADERS },
  body: {
    success: true,
    message: params.message,
    data: params.data,
    environment: params.environment,
    timestamp: (params.now ?? new Date()).toISOString(),
  },
});

export const createErrorResponse = (params: {
  message: string;
  errorCode: string;
  statusCode: number;
  environment: string;
  details?: Record<string, unknown>;
  now?: Date;
}): ApiResponse<never> => {
  const body: ErrorEnvelope = {
    success: false,
    message: params.message,
    error_code: params.errorCode,
    environment: params.environment,
    timestamp: (params.now ?? new Date()).toISOString(),
  };

  if (params.details && Object.keys(params.details).length > 0) {
    body.details = params.details;
  }

  return { statusCode: params.statusCode, headers: { ...RESPONSE_HEADERS }, body };
};

export const errorToResponse = (error: unknown, environment: string, now?: Date): ApiResponse<never> => {
  if (error instanceof ValidationError || error instanceof ConflictError) {
    return createErrorResponse({
      message: error.message,
      errorCode: error.code,
      statusCode: error.statusCode,
      environment,
      details: error.details,
      now,
    });
  }

  if (error instanceof AppError) {
    return createErrorResponse({
      message: error.message,
      errorCode: error.code,
      statusCode: error.statusCode,
      environment,
      details: error.statusCode >= 500 ? undefined : error.details,
      now,
    });
  }

  return createErrorResponse({
    message: "Internal server error",
    errorCode: "INTERNAL_ERROR",
    statusCode: 500,
    environment,
    now,
  });
};

export const sendApiResponse = <T>(res: Response, response: ApiResponse<T>): Response =>
  res.status(response.statusCode).set(response.headers).json(response.body);
