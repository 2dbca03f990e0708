import { RegistrationPayload, UserRecord, emptyDocumentPaths } from "../../domain/entities/Registration";

// "%PDF-1.4\n" e o cabeçalho de um PNG
export const PDF_BASE64 = "JVBERi0xLjQK";
export const PNG_BASE64 = "iVBORw0KGgo=";

export const FIXED_DATE = new Date("2024-03-05T09:07:03Z");

export const registrationPayload = (overrides: Partial<RegistrationPayload> = {}): RegistrationPayload => ({
  email: "jose.martinez@example.com",
  fullName: "José Martínez!",
  nationalId: "V-12345678",
  phone1: "04141234567",
  phone2: null,
  address: null,
  instagram: null,
  facebook: null,
  tiktok: null,
  reference1: { name: null, relation: null },
  reference2: { name: null, relation: null },
  monthlyIncome: 0,
  activityType: null,
  position: null,
  birthDate: null,
  documents: {},
  ...overrides,
});

export const existingUser = (overrides: Partial<UserRecord> = {}): UserRecord => {
  const { documents: _documents, ...applicant } = registrationPayload();
  return {
    ...applicant,
    id: "existing-user",
    documentPaths: emptyDocumentPaths(),
    filesUploaded: false,
    filesUploadedAt: null,
    createdAt: FIXED_DATE,
    ...overrides,
  };
};
