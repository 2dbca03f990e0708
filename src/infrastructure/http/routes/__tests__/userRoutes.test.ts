import { describe, expect, it } from "@jest/globals";
import request from "supertest";
import { PDF_BASE64, existingUser } from "../../../../__tests__/support/fixtures";
import { createTestApp } from "../../../../__tests__/support/testApp";

const FOLDER = "05032024-V-12345678-Jose_Martinez";

const registrationBody = (overrides: Record<string, unknown> = {}) => ({
  email: "Jose.Martinez@example.com",
  full_name: "José Martínez!",
  national_id: "V-12345678",
  phone1: "04141234567",
  monthly_income: "850",
  id_file: { data: PDF_BASE64, content_type: "application/pdf" },
  ...overrides,
});

describe("POST /users/register", () => {
  it("registers the applicant and stores the documents", async () => {
    const { app, documents, repository } = createTestApp();

    const response = await request(app).post("/users/register").send(registrationBody());

    expect(response.status).toBe(201);
    expect(response.body).toMatchObject({
      success: true,
      message: "User registered successfully",
      data: {
        user_id: "id-1",
        email: "jose.martinez@example.com",
        national_id: "V-12345678",
        storage_folder: `s3://user-documents/${FOLDER}/`,
        documents: {
          id_file: `s3://user-documents/${FOLDER}/05032024-V-12345678-id_card.pdf`,
          rif_file: null,
          ref1_id: null,
          ref2_id: null,
          work_cert: null,
        },
        failed_documents: [],
        files_uploaded: true,
      },
    });
    expect(documents.keys()).toEqual([`${FOLDER}/05032024-V-12345678-id_card.pdf`]);
    expect(repository.rows).toHaveLength(1);
    expect(repository.rows[0].monthlyIncome).toBe(850);
  });

  it("lists missing required fields", async () => {
    const { app } = createTestApp();

    const response = await request(app).post("/users/register").send({ email: "a@example.com" });

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({
      error_code: "MISSING_REQUIRED_FIELDS",
      message: "Missing required fields: full_name, national_id, phone1",
      details: { missing_fields: ["full_name", "national_id", "phone1"] },
    });
  });

  it("answers 400 for values the users table cannot store, before any upload", async () => {
    const { app, documents, repository } = createTestApp();

    const response = await request(app)
      .post("/users/register")
      .send(registrationBody({ birth_date: "2023-02-30", monthly_income: "99999999999999999" }));

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({
      error_code: "VALIDATION_ERROR",
      details: {
        validation_errors: [
          { field: "monthly_income", message: "Monthly income exceeds the maximum allowed" },
          { field: "birth_date", message: "Birth date is not a valid date" },
        ],
      },
    });
    expect(documents.keys()).toEqual([]);
    expect(repository.rows).toEqual([]);
  });

  it("answers 409 for an email already registered and stores nothing", async () => {
    const { app, documents, repository } = createTestApp();
    repository.seed(existingUser({ nationalId: "E-11111111" }));

    const response = await request(app).post("/users/register").send(registrationBody());

    expect(response.status).toBe(409);
    expect(response.body).toMatchObject({
      message: "Email is already registered",
      error_code: "EMAIL_ALREADY_REGISTERED",
      details: { field: "email" },
    });
    expect(documents.keys()).toEqual([]);
  });

  it("reports documents that could not be decoded without failing the registration", async () => {
    const { app } = createTestApp();

    const response = await request(app)
      .post("/users/register")
      .send(registrationBody({ rif_file: { data: "@@@" } }));

    expect(response.status).toBe(201);
    expect(response.body.data.failed_documents).toEqual([{ field: "rif_file", reason: "invalid_base64" }]);
    expect(response.body.data.documents.rif_file).toBeNull();
  });

  it("answers 500 without internals when the database fails after the uploads", async () => {
    const { app, documents, repository } = createTestApp();
    repository.failInsert = new Error("could not write block 42 of relation users");

    const response = await request(app).post("/users/register").send(registrationBody());

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      success: false,
      message: "User registration failed",
      error_code: "REGISTRATION_FAILED",
      environment: "test",
      timestamp: expect.any(String),
    });
    expect(documents.keys()).toEqual([]);
    expect(repository.rows).toEqual([]);
  });
});
