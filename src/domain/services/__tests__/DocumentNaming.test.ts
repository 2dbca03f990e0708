import { describe, expect, it } from "@jest/globals";
import {
  buildDocumentKey,
  buildUploadKey,
  buildUserFolder,
  extensionForContentType,
  formatFolderDate,
  formatUploadTimestamp,
  sanitizeFullName,
} from "../DocumentNaming";

describe("DocumentNaming", () => {
  const date = new Date("2024-03-05T09:07:03Z");

  describe("datas", () => {
    it("formats the folder date as ddmmyyyy in UTC", () => {
      expect(formatFolderDate(date)).toBe("05032024");
      expect(formatFolderDate(new Date("2024-12-31T23:59:59Z"))).toBe("31122024");
    });

    it("formats the upload timestamp as YYYYMMDD_HHMMSS in UTC", () => {
      expect(formatUploadTimestamp(date)).toBe("20240305_090703");
    });
  });

  describe("sanitizeFullName", () => {
    it("strips accents and punctuation and joins capitalized words", () => {
      expect(sanitizeFullName("José Martínez!")).toBe("Jose_Martinez");
    });

    it("collapses whitespace and normalizes case", () => {
      expect(sanitizeFullName("  maría   de la  CRUZ ")).toBe("Maria_De_La_Cruz");
    });

    it("keeps the base letter of composed characters", () => {
      expect(sanitizeFullName("Ñandú Pérez")).toBe("Nandu_Perez");
    });

    it("drops digits and symbols inside words", () => {
      expect(sanitizeFullName("O'Brien-Smith 3rd")).toBe("Obriensmith_Rd");
    });

    it("falls back to a fixed token when nothing is left", () => {
      expect(sanitizeFullName("123 !!")).toBe("Applicant");
      expect(sanitizeFullName("")).toBe("Applicant");
    });

    it("only ever produces letters and underscores", () => {
      const samples = ["Łukasz Żółć", "Zoë  d'Arc", "\t李 Wei", "ANA-MARÍA  ruiz"];
      for (const sample of samples) {
        expect(sanitizeFullName(sample)).toMatch(/^[A-Za-z_]+$/);
      }
    });
  });

  describe("extensionForContentType", () => {
    it("maps known content types", () => {
      expect(extensionForContentType("application/pdf")).toBe("pdf");
      expect(extensionForContentType("image/jpeg")).toBe("jpg");
      expect(extensionForContentType("IMAGE/PNG; charset=binary")).toBe("png");
      expect(extensionForContentType("application/msword")).toBe("doc");
      expect(
        extensionForContentType("application/vnd.openxmlformats-officedocument.wordprocessingml.document")
      ).toBe("docx");
    });

    it("defaults to pdf", () => {
      expect(extensionForContentType(undefined)).toBe("pdf");
      expect(extensionForContentType("text/plain")).toBe("pdf");
    });
  });

  describe("chaves", () => {
    it("builds the applicant folder from date, national id and cleaned name", () => {
      expect(buildUserFolder({ date, nationalId: "V-12345678", fullName: "José Martínez!" })).toBe(
        "05032024-V-12345678-Jose_Martinez"
      );
    });

    it("builds document keys inside the folder with the document type", () => {
      const folder = "05032024-V-12345678-Jose_Martinez";

      expect(
        buildDocumentKey({ folder, date, nationalId: "V-12345678", field: "rif_file", contentType: "image/png" })
      ).toBe("05032024-V-12345678-Jose_Martinez/05032024-V-12345678-tax_id.png");
      expect(buildDocumentKey({ folder, date, nationalId: "V-12345678", field: "work_cert" })).toBe(
        "05032024-V-12345678-Jose_Martinez/05032024-V-12345678-work_certificate.pdf"
      );
    });

    it("derives the same keys for the same input", () => {
      const input = { date, nationalId: "E-87654321", fullName: "Ana Ruiz" };
      const first = buildDocumentKey({ folder: buildUserFolder(input), date, nationalId: input.nationalId, field: "id_file" });
      const second = buildDocumentKey({ folder: buildUserFolder(input), date, nationalId: input.nationalId, field: "id_file" });

      expect(first).toBe(second);
    });

    it("builds presigned upload keys under uploads/", () => {
      expect(buildUploadKey({ fieldName: "id_file", fileName: "cedula.pdf", date, uniqueId: "abc-123" })).toBe(
        "uploads/id_file/20240305_090703_abc-123_cedula.pdf"
      );
    });
  });
});
