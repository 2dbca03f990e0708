import {
  DOCUMENT_FIELDS,
  DocumentBlob,
  DocumentField,
  DocumentPaths,
  RegistrationPayload,
  UploadedObjectRecord,
  emptyDocumentPaths,
} from "../../domain/entities/Registration";
import { buildDocumentKey, buildUserFolder } from "../../domain/services/DocumentNaming";
import { Logger } from "../../infrastructure/logger";
import { StoragePort } from "../../ports/StoragePort";
import { CompensationLog } from "./CompensationLog";

const DEFAULT_CONTENT_TYPE = "application/pdf";
const DATA_URL_PREFIX = /^data:[^;,]+;base64,/;
const BASE64_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

export type DocumentFailureReason = "invalid_base64" | "upload_failed";

export interface FailedDocument {
  formField: DocumentField;
  reason: DocumentFailureReason;
}

export interface DocumentUploadResult {
  folder: string;
  uploaded: UploadedObjectRecord[];
  failed: FailedDocument[];
  documentPaths: DocumentPaths;
}

export const decodeBase64Document = (data: string): Buffer | null => {
  const cleaned = data.replace(DATA_URL_PREFIX, "").replace(/\s+/g, "");
  if (!BASE64_PATTERN.test(cleaned)) {
    return null;
  }
  const buffer = Buffer.from(cleaned, "base64");
  return buffer.length > 0 ? buffer : null;
};

/**
 * Envia os documentos embutidos do cadastro, um por vez.
 *
 * Uploads são independentes entre si: uma falha fica registrada em `failed` e o
 * caminho daquele documento permanece nulo. Cada objeto gravado registra sua
 * exclusão no `CompensationLog` da tentativa.
 */
export class DocumentUploadOrchestrator {
  constructor(
    private readonly storage: StoragePort,
    private readonly logger: Logger
  ) {}

  async uploadAll(input: {
    payload: RegistrationPayload;
    date: Date;
    compensation: CompensationLog;
  }): Promise<DocumentUploadResult> {
    const { payload, date, compensation } = input;
    const folder = buildUserFolder({ date, nationalId: payload.nationalId, fullName: payload.fullName });
    const uploaded: UploadedObjectRecord[] = [];
    const failed: FailedDocument[] = [];
    const documentPaths = emptyDocumentPaths();

    for (const field of DOCUMENT_FIELDS) {
      const blob = payload.documents[field];
      if (!blob) {
        continue;
      }

      const result = await this.uploadOne({ field, blob, folder, date, nationalId: payload.nationalId });
      if ("reason" in result) {
        failed.push(result);
        continue;
      }

      compensation.register(`delete ${result.objectKey}`, () => this.storage.deleteObject(result.objectKey));
      uploaded.push(result);
      documentPaths[field] = result.storageUrl;
    }

    this.logger.info({
      type: "DOCUMENT_UPLOAD",
      message: "Document uploads finished",
      payload: {
        folder,
        uploaded: uploaded.map((record) => record.formField),
        failed: failed.map((failure) => failure.formField),
      },
    });

    return { folder, uploaded, failed, documentPaths };
  }

  private async uploadOne(input: {
    field: DocumentField;
    blob: DocumentBlob;
    folder: string;
    date: Date;
    nationalId: string;
  }): Promise<UploadedObjectRecord | FailedDocument> {
    const { field, blob, folder, date, nationalId } = input;

    const body = decodeBase64Document(blob.data);
    if (!body) {
      this.logger.warn({ type: "DOCUMENT_UPLOAD", message: "Document is not valid base64", payload: { field } });
      return { formField: field, reason: "invalid_base64" };
    }

    const contentType = blob.contentType ?? DEFAULT_CONTENT_TYPE;
    const objectKey = buildDocumentKey({ folder, date, nationalId, field, contentType });

    try {
      await this.storage.putObject(objectKey, body, contentType);
    } catch (error) {
      this.logger.error({
        type: "DOCUMENT_UPLOAD",
        message: "Document upload failed",
        payload: { field, objectKey },
        error,
      });
      return { formField: field, reason: "upload_failed" };
    }

    return { formField: field, objectKey, storageUrl: this.storage.objectUrl(objectKey) };
  }
}
