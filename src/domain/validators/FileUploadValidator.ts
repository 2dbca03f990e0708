/**
 * Validação das solicitações de URL prefirmada
 *
 * Regras por arquivo, nesta ordem (a primeira violação encerra o arquivo):
 * campos obrigatórios, tamanho inteiro positivo, extensão presente, extensão permitida,
 * tamanho máximo, content type canônico da extensão.
 *
 * Qualquer violação no lote invalida o lote inteiro.
 */

import { z } from "zod";
import { FileUploadRequest } from "../entities/UploadGrant";
import { FieldViolation, ValidationError } from "../errors/AppError";
import { isPlainObject } from "../../utils/isPlainObject";

export const ALLOWED_FILE_TYPES: Record<string, string> = {
  pdf: "application/pdf",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  doc: "application/msword",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
};

export const MAX_FILES_PER_REQUEST = 5;
export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

const REQUIRED_FILE_FIELDS = ["field_name", "file_name", "file_size", "content_type"] as const;

const SIZE_MESSAGE = "File size must be a positive integer";

const nonEmptyString = (field: string) =>
  z
    .string({ invalid_type_error: `Field '${field}' must be a string` })
    .min(1, `Field '${field}' must not be empty`);

const fileUploadRequestSchema = z.object({
  field_name: nonEmptyString("field_name"),
  file_name: nonEmptyString("file_name"),
  file_size: z.number({ invalid_type_error: SIZE_MESSAGE }).int(SIZE_MESSAGE).positive(SIZE_MESSAGE),
  content_type: nonEmptyString("content_type"),
});

export type FileValidationResult =
  | { valid: true; request: FileUploadRequest }
  | { valid: false; violation: FieldViolation };

const invalid = (file_index: number, field: string, message: string): FileValidationResult => ({
  valid: false,
  violation: { file_index, field, message },
});

export const validateFileUploadRequest = (
  raw: unknown,
  index: number,
  maxFileSize: number = DEFAULT_MAX_FILE_SIZE
): FileValidationResult => {
  const record = isPlainObject(raw) ? raw : {};

  const missing = REQUIRED_FILE_FIELDS.find((field) => record[field] === undefined || record[field] === null);
  if (missing) {
    return invalid(index, missing, `Field '${missing}' is required`);
  }

  const parsed = fileUploadRequestSchema.safeParse(record);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    return invalid(index, String(issue.path[0] ?? "file"), issue.message);
  }

  const { field_name, file_name, file_size, content_type } = parsed.data;

  if (!file_name.includes(".")) {
    return invalid(index, "file_name", "File name must include file extension");
  }

  const extension = (file_name.split(".").pop() ?? "").toLowerCase();
  const expectedContentType = ALLOWED_FILE_TYPES[extension];
  if (!expectedContentType) {
    return invalid(
      index,
      "file_name",
      `File type '${extension}' not allowed. Allowed types: ${Object.keys(ALLOWED_FILE_TYPES).join(", ")}`
    );
  }

  if (file_size > maxFileSize) {
    return invalid(index, "file_size", `File size exceeds maximum allowed size of ${maxFileSize} bytes`);
  }

  if (content_type !== expectedContentType) {
    return invalid(
      index,
      "content_type",
      `Invalid content type. Expected '${expectedContentType}' for .${extension} files`
    );
  }

  return {
    valid: true,
    request: { fieldName: field_name, fileName: file_name, fileSize: file_size, contentType: content_type },
  };
};

/**
 * Valida o lote completo. Lança `ValidationError` com todas as violações encontradas;
 * o limite de arquivos é verificado antes de qualquer validação individual.
 */
export const validateFileUploadBatch = (
  files: unknown,
  maxFileSize: number = DEFAULT_MAX_FILE_SIZE
): FileUploadRequest[] => {
  if (!Array.isArray(files) || files.length === 0) {
    throw new ValidationError({
      code: "INVALID_FILES_ARRAY",
      message: "Files array is required and must contain at least one file",
    });
  }

  if (files.length > MAX_FILES_PER_REQUEST) {
    throw new ValidationError({
      code: "TOO_MANY_FILES",
      message: `Maximum ${MAX_FILES_PER_REQUEST} files allowed per request`,
    });
  }

  const requests: FileUploadRequest[] = [];
  const violations: FieldViolation[] = [];

  files.forEach((raw: unknown, index) => {
    const result = validateFileUploadRequest(raw, index, maxFileSize);
    if (result.valid) {
      requests.push(result.request);
    } else {
      violations.push(result.violation);
    }
  });

  if (violations.length > 0) {
    throw new ValidationError({ message: "Validation errors found", violations });
  }

  return requests;
};
