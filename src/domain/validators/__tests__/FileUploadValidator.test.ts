import { describe, expect, it } from "@jest/globals";
import { ValidationError } from "../../errors/AppError";
import {
  MAX_FILES_PER_REQUEST,
  validateFileUploadBatch,
  validateFileUploadRequest,
} from "../FileUploadValidator";

const pdf = (overrides: Record<string, unknown> = {}) => ({
  field_name: "id_file",
  file_name: "cedula.pdf",
  file_size: 2048,
  content_type: "application/pdf",
  ...overrides,
});

const captureValidationError = (fn: () => unknown): ValidationError => {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ValidationError");
};

describe("validateFileUploadRequest", () => {
  it("accepts a well-formed request and converts it to camelCase", () => {
    expect(validateFileUploadRequest(pdf(), 0)).toEqual({
      valid: true,
      request: { fieldName: "id_file", fileName: "cedula.pdf", fileSize: 2048, contentType: "application/pdf" },
    });
  });

  it("accepts uppercase extensions", () => {
    const result = validateFileUploadRequest(pdf({ file_name: "FOTO.JPG", content_type: "image/jpeg" }), 0);
    expect(result.valid).toBe(true);
  });

  it("reports the first missing field", () => {
    const { field_name: _omitted, ...rest } = pdf();
    expect(validateFileUploadRequest(rest, 2)).toEqual({
      valid: false,
      violation: { file_index: 2, field: "field_name", message: "Field 'field_name' is required" },
    });
  });

  it.each([0, -5, 1.5, "2048"])("rejects file_size %p", (size) => {
    expect(validateFileUploadRequest(pdf({ file_size: size }), 0)).toEqual({
      valid: false,
      violation: { file_index: 0, field: "file_size", message: "File size must be a positive integer" },
    });
  });

  it("requires an extension", () => {
    expect(validateFileUploadRequest(pdf({ file_name: "cedula" }), 0)).toEqual({
      valid: false,
      violation: { file_index: 0, field: "file_name", message: "File name must include file extension" },
    });
  });

  it("rejects extensions outside the allow list", () => {
    expect(validateFileUploadRequest(pdf({ file_name: "script.exe" }), 1)).toEqual({
      valid: false,
      violation: {
        file_index: 1,
        field: "file_name",
        message: "File type 'exe' not allowed. Allowed types: pdf, jpg, jpeg, png, doc, docx",
      },
    });
  });

  it("enforces the maximum size", () => {
    expect(validateFileUploadRequest(pdf({ file_size: 1001 }), 0, 1000)).toEqual({
      valid: false,
      violation: { file_index: 0, field: "file_size", message: "File size exceeds maximum allowed size of 1000 bytes" },
    });
    expect(validateFileUploadRequest(pdf({ file_size: 1000 }), 0, 1000).valid).toBe(true);
  });

  it("requires the canonical content type of the extension", () => {
    expect(validateFileUploadRequest(pdf({ file_name: "foto.png", content_type: "image/jpeg" }), 0)).toEqual({
      valid: false,
      violation: {
        file_index: 0,
        field: "content_type",
        message: "Invalid content type. Expected 'image/png' for .png files",
      },
    });
  });
});

describe("validateFileUploadBatch", () => {
  it("returns every request when the batch is valid", () => {
    const requests = validateFileUploadBatch([
      pdf(),
      pdf({ field_name: "rif_file", file_name: "rif.png", content_type: "image/png" }),
    ]);

    expect(requests.map((request) => request.fieldName)).toEqual(["id_file", "rif_file"]);
  });

  it.each([undefined, null, [], "files"])("rejects %p as files", (files) => {
    const error = captureValidationError(() => validateFileUploadBatch(files));

    expect(error.code).toBe("INVALID_FILES_ARRAY");
    expect(error.message).toBe("Files array is required and must contain at least one file");
  });

  it("rejects more than five files before validating any of them", () => {
    const files = Array.from({ length: MAX_FILES_PER_REQUEST + 1 }, () => ({}));
    const error = captureValidationError(() => validateFileUploadBatch(files));

    expect(error.code).toBe("TOO_MANY_FILES");
    expect(error.message).toBe("Maximum 5 files allowed per request");
  });

  it("collects violations from every file with their index", () => {
    const error = captureValidationError(() =>
      validateFileUploadBatch([pdf(), pdf({ file_name: "x.exe" }), pdf({ file_size: 0 })])
    );

    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.statusCode).toBe(400);
    expect(error.details).toEqual({
      validation_errors: [
        {
          file_index: 1,
          field: "file_name",
          message: "File type 'exe' not allowed. Allowed types: pdf, jpg, jpeg, png, doc, docx",
        },
        { file_index: 2, field: "file_size", message: "File size must be a positive integer" },
      ],
    });
  });
});
