import { S3Client } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { beforeEach, describe, expect, it, jest } from "@jest/globals";
import { parseEnv } from "../../../../config/env";
import { S3StorageAdapter, createS3Client } from "../S3StorageAdapter";

const mockSend = jest.fn(async (_command: unknown) => ({}));

jest.mock("@aws-sdk/client-s3", () => ({
  S3Client: jest.fn().mockImplementation(() => ({ send: (command: unknown) => mockSend(command) })),
  PutObjectCommand: jest.fn().mockImplementation((input: unknown) => ({ name: "PutObject", input })),
  DeleteObjectCommand: jest.fn().mockImplementation((input: unknown) => ({ name: "DeleteObject", input })),
}));

jest.mock("@aws-sdk/s3-request-presigner", () => ({
  getSignedUrl: jest.fn(),
}));

const mockedGetSignedUrl = jest.mocked(getSignedUrl);
const MockedS3Client = jest.mocked(S3Client);

describe("S3StorageAdapter", () => {
  let client: S3Client;

  beforeEach(() => {
    jest.clearAllMocks();
    client = new S3Client({ region: "us-east-1" });
  });

  it("signs content type and length into the upload URL", async () => {
    mockedGetSignedUrl.mockResolvedValue("https://uploads-bucket.s3.amazonaws.com/k?X-Amz-Signature=abc");
    const adapter = new S3StorageAdapter(client, "uploads-bucket");

    const url = await adapter.generatePresignedUploadUrl("uploads/id_file/k.pdf", {
      contentType: "application/pdf",
      contentLength: 2048,
      expiresInSeconds: 900,
    });

    expect(url).toBe("https://uploads-bucket.s3.amazonaws.com/k?X-Amz-Signature=abc");
    const [signingClient, command, options] = mockedGetSignedUrl.mock.calls[0];
    expect(signingClient).toBe(client);
    expect(command).toEqual({
      name: "PutObject",
      input: {
        Bucket: "uploads-bucket",
        Key: "uploads/id_file/k.pdf",
        ContentType: "application/pdf",
        ContentLength: 2048,
      },
    });
    expect(options?.expiresIn).toBe(900);
    expect([...(options?.signableHeaders ?? [])].sort()).toEqual(["content-length", "content-type"]);
  });

  it("writes objects with server-side encryption", async () => {
    const adapter = new S3StorageAdapter(client, "user-documents");
    const body = Buffer.from("%PDF-1.4\n");

    await adapter.putObject("folder/doc.pdf", body, "application/pdf");

    expect(mockSend).toHaveBeenCalledTimes(1);
    expect(mockSend.mock.calls[0][0]).toEqual({
      name: "PutObject",
      input: {
        Bucket: "user-documents",
        Key: "folder/doc.pdf",
        Body: body,
        ContentType: "application/pdf",
        ServerSideEncryption: "AES256",
      },
    });
  });

  it("deletes objects by key", async () => {
    const adapter = new S3StorageAdapter(client, "user-documents");

    await adapter.deleteObject("folder/doc.pdf");

    expect(mockSend.mock.calls[0][0]).toEqual({
      name: "DeleteObject",
      input: { Bucket: "user-documents", Key: "folder/doc.pdf" },
    });
  });

  it("propagates storage errors", async () => {
    mockSend.mockRejectedValueOnce(new Error("AccessDenied"));
    const adapter = new S3StorageAdapter(client, "user-documents");

    await expect(adapter.putObject("k", Buffer.from("x"), "application/pdf")).rejects.toThrow("AccessDenied");
  });

  it("formats object URLs", () => {
    expect(new S3StorageAdapter(client, "user-documents").objectUrl("a/b.pdf")).toBe("s3://user-documents/a/b.pdf");
  });
});

describe("createS3Client", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it("uses path-style addressing and static credentials against a custom endpoint", () => {
    createS3Client(
      parseEnv({
        NODE_ENV: "test",
        S3_ENDPOINT: "http://localhost:9000",
        S3_ACCESS_KEY: "test-access",
        S3_SECRET_KEY: "test-secret",
        AWS_REGION: "sa-east-1",
      })
    );

    expect(MockedS3Client.mock.calls[0][0]).toEqual({
      region: "sa-east-1",
      endpoint: "http://localhost:9000",
      forcePathStyle: true,
      credentials: { accessKeyId: "test-access", secretAccessKey: "test-secret" },
    });
  });

  it("relies on the default credential chain when no keys are set", () => {
    createS3Client(parseEnv({ NODE_ENV: "test" }));

    expect(MockedS3Client.mock.calls[0][0]).toEqual({ region: "us-east-1" });
  });
});
