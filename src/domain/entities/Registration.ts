/**
 * Cadastro de solicitante: dados pessoais + documentos embutidos em base64.
 */

export const DOCUMENT_FIELDS = ["id_file", "rif_file", "ref1_id", "ref2_id", "work_cert"] as const;

export type DocumentField = (typeof DOCUMENT_FIELDS)[number];

// Nome do documento usado na chave do objeto
export const DOCUMENT_TYPES: Record<DocumentField, string> = {
  id_file: "id_card",
  rif_file: "tax_id",
  ref1_id: "ref1_id_card",
  ref2_id: "ref2_id_card",
  work_cert: "work_certificate",
};

export interface DocumentBlob {
  data: string;
  contentType?: string;
}

export interface ReferenceContact {
  name: string | null;
  relation: string | null;
}

export interface ApplicantData {
  email: string;
  fullName: string;
  nationalId: string;
  phone1: string;
  phone2: string | null;
  address: string | null;
  instagram: string | null;
  facebook: string | null;
  tiktok: string | null;
  reference1: ReferenceContact;
  reference2: ReferenceContact;
  monthlyIncome: number;
  activityType: string | null;
  position: string | null;
  birthDate: string | null;
}

export interface RegistrationPayload extends ApplicantData {
  documents: Partial<Record<DocumentField, DocumentBlob>>;
}

export interface UploadedObjectRecord {
  formField: DocumentField;
  objectKey: string;
  storageUrl: string;
}

export type DocumentPaths = Record<DocumentField, string | null>;

export const emptyDocumentPaths = (): DocumentPaths => ({
  id_file: null,
  rif_file: null,
  ref1_id: null,
  ref2_id: null,
  work_cert: null,
});

export interface UserRecord extends ApplicantData {
  id: string;
  documentPaths: DocumentPaths;
  filesUploaded: boolean;
  filesUploadedAt: Date | null;
  createdAt: Date;
}
