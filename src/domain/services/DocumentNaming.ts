/**
 * Convenções de nomes de objetos no storage.
 *
 * Dois esquemas independentes:
 * - Upload via URL prefirmada: `uploads/{field}/{YYYYMMDD_HHMMSS}_{uuid}_{arquivo}`
 * - Documentos do cadastro: `{ddmmyyyy}-{cedula}-{Nome_Limpo}/{ddmmyyyy}-{cedula}-{tipo}.{ext}`
 *
 * Todas as datas são formatadas em UTC para que uma nova tentativa no mesmo dia gere
 * exatamente as mesmas chaves.
 */

import { DOCUMENT_TYPES, DocumentField } from "../entities/Registration";

const DEFAULT_EXTENSION = "pdf";
const EMPTY_NAME_FALLBACK = "Applicant";

const EXTENSION_BY_CONTENT_TYPE: Record<string, string> = {
  "application/pdf": "pdf",
  "image/jpeg": "jpg",
  "image/png": "png",
  "application/msword": "doc",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document": "docx",
};

const pad = (value: number): string => String(value).padStart(2, "0");

export const formatFolderDate = (date: Date): string =>
  `${pad(date.getUTCDate())}${pad(date.getUTCMonth() + 1)}${date.getUTCFullYear()}`;

export const formatUploadTimestamp = (date: Date): string =>
  `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
  `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;

/**
 * Remove acentos e tudo que não for letra latina básica ou espaço, capitaliza cada
 * palavra e junta com "_". "José Martínez!" -> "Jose_Martinez".
 */
export const sanitizeFullName = (fullName: string): string => {
  const lettersOnly = fullName
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^A-Za-z\s]/g, "");

  const words = lettersOnly
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());

  return words.length > 0 ? words.join("_") : EMPTY_NAME_FALLBACK;
};

export const extensionForContentType = (contentType?: string): string => {
  if (!contentType) {
    return DEFAULT_EXTENSION;
  }
  const normalized = contentType.split(";")[0].trim().toLowerCase();
  return EXTENSION_BY_CONTENT_TYPE[normalized] ?? DEFAULT_EXTENSION;
};

export const buildUserFolder = (input: { date: Date; nationalId: string; fullName: string }): string =>
  `${formatFolderDate(input.date)}-${input.nationalId}-${sanitizeFullName(input.fullName)}`;

export const buildDocumentKey = (input: {
  folder: string;
  date: Date;
  nationalId: string;
  field: DocumentField;
  contentType?: string;
}): string => {
  const fileName = `${formatFolderDate(input.date)}-${input.nationalId}-${DOCUMENT_TYPES[input.field]}`;
  return `${input.folder}/${fileName}.${extensionForContentType(input.contentType)}`;
};

export const buildUploadKey = (input: {
  fieldName: string;
  fileName: string;
  date: Date;
  uniqueId: string;
}): string => `uploads/${input.fieldName}/${formatUploadTimestamp(input.date)}_${input.uniqueId}_${input.fileName}`;
