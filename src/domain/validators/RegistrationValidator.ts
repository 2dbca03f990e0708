/**
 * Validação do payload de cadastro
 *
 * 1. Campos obrigatórios ausentes são reportados juntos, num único erro.
 * 2. E-mail precisa conter "@".
 * 3. Formato dos campos opcionais e dos documentos embutidos.
 */

import { z } from "zod";
import {
  DOCUMENT_FIELDS,
  DocumentBlob,
  DocumentField,
  RegistrationPayload,
} from "../entities/Registration";
import { FieldViolation, ValidationError } from "../errors/AppError";
import { isPlainObject } from "../../utils/isPlainObject";

export const REQUIRED_REGISTRATION_FIELDS = ["email", "full_name", "national_id", "phone1"] as const;

const BIRTH_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const NUMERIC_PATTERN = /^\d+(\.\d+)?$/;

// NUMERIC(14,2) na tabela users
const MAX_MONTHLY_INCOME = 999_999_999_999.99;

// Date.parse aceita "2023-02-30" e rola para março; o DATE do PostgreSQL não
const isCalendarDate = (value: string): boolean => {
  const [year, month, day] = value.split("-").map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  date.setUTCFullYear(year);
  return year > 0 && date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
};

const isBlank = (value: unknown): boolean =>
  value === undefined || value === null || (typeof value === "string" && value.trim().length === 0);

const INCOME_MESSAGE = "Monthly income must be a non-negative number";

const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : null));

const registrationSchema = z.object({
  email: z.string().trim().toLowerCase(),
  full_name: z.string().trim(),
  national_id: z.string().trim(),
  phone1: z.string().trim(),
  phone2: optionalText,
  address: optionalText,
  instagram: optionalText,
  facebook: optionalText,
  tiktok: optionalText,
  ref1_name: optionalText,
  ref1_relation: optionalText,
  ref2_name: optionalText,
  ref2_relation: optionalText,
  monthly_income: z.preprocess(
    (value) => {
      if (isBlank(value)) return 0;
      if (typeof value === "string" && NUMERIC_PATTERN.test(value.trim())) return Number(value.trim());
      return value;
    },
    z
      .number({ invalid_type_error: INCOME_MESSAGE })
      .nonnegative(INCOME_MESSAGE)
      .finite(INCOME_MESSAGE)
      .max(MAX_MONTHLY_INCOME, "Monthly income exceeds the maximum allowed")
  ),
  activity_type: optionalText,
  position: optionalText,
  birth_date: z.preprocess(
    (value) => (isBlank(value) ? null : value),
    z
      .string({ invalid_type_error: "Birth date must be a string" })
      .trim()
      .regex(BIRTH_DATE_PATTERN, "Birth date must use the YYYY-MM-DD format")
      .refine(isCalendarDate, "Birth date is not a valid date")
      .nullable()
  ),
});

const documentBlobSchema = z.object({
  data: z.string({ required_error: "Document 'data' is required", invalid_type_error: "Document 'data' must be a base64 string" }),
  content_type: z.string().trim().optional(),
});

const parseDocuments = (
  body: Record<string, unknown>,
  violations: FieldViolation[]
): Partial<Record<DocumentField, DocumentBlob>> => {
  const documents: Partial<Record<DocumentField, DocumentBlob>> = {};

  for (const field of DOCUMENT_FIELDS) {
    const raw = body[field];
    if (isBlank(raw)) {
      continue;
    }

    const parsed = documentBlobSchema.safeParse(raw);
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      violations.push({
        field,
        message: issue.code === "invalid_type" && issue.path.length === 0
          ? "Document must be an object with a base64 'data' string"
          : issue.message,
      });
      continue;
    }

    if (parsed.data.data.trim().length === 0) {
      continue;
    }

    documents[field] = {
      data: parsed.data.data,
      contentType: parsed.data.content_type || undefined,
    };
  }

  return documents;
};

export const validateRegistrationPayload = (body: unknown): RegistrationPayload => {
  const record = isPlainObject(body) ? body : {};

  const missingFields = REQUIRED_REGISTRATION_FIELDS.filter((field) => isBlank(record[field]));
  if (missingFields.length > 0) {
    throw new ValidationError({
      code: "MISSING_REQUIRED_FIELDS",
      message: `Missing required fields: ${missingFields.join(", ")}`,
      details: { missing_fields: missingFields },
    });
  }

  if (typeof record.email === "string" && !record.email.includes("@")) {
    throw new ValidationError({
      code: "INVALID_EMAIL",
      message: "Email must contain '@'",
      violations: [{ field: "email", message: "Email must contain '@'" }],
    });
  }

  const violations: FieldViolation[] = [];
  const parsed = registrationSchema.safeParse(record);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      violations.push({ field: issue.path.join("."), message: issue.message });
    }
  }

  const documents = parseDocuments(record, violations);

  if (!parsed.success || violations.length > 0) {
    throw new ValidationError({ message: "Validation errors found", violations });
  }

  const data = parsed.data;
  return {
    email: data.email,
    fullName: data.full_name,
    nationalId: data.national_id,
    phone1: data.phone1,
    phone2: data.phone2,
    address: data.address,
    instagram: data.instagram,
    facebook: data.facebook,
    tiktok: data.tiktok,
    reference1: { name: data.ref1_name, relation: data.ref1_relation },
    reference2: { name: data.ref2_name, relation: data.ref2_relation },
    monthlyIncome: data.monthly_income,
    activityType: data.activity_type,
    position: data.position,
    birthDate: data.birth_date,
    documents,
  };
};
