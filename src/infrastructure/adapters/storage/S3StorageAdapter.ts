import {
  DeleteObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ClientConfig,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { Env } from "../../../config/env";
import { PresignedUploadOptions, StoragePort } from "../../../ports/StoragePort";

// Headers assinados na URL: o S3 recusa o PUT se o cliente mandar outro tipo ou tamanho
const SIGNED_UPLOAD_HEADERS = new Set(["content-type", "content-length"]);

/**
 * Um único S3Client por processo, compartilhado pelos dois buckets.
 */
export const createS3Client = (env: Env): S3Client => {
  const config: S3ClientConfig = {
    region: env.AWS_REGION,
  };

  if (env.S3_ENDPOINT) {
    config.endpoint = env.S3_ENDPOINT;
    config.forcePathStyle = true;
  } else if (env.S3_FORCE_PATH_STYLE) {
    config.forcePathStyle = true;
  }

  if (env.S3_ACCESS_KEY && env.S3_SECRET_KEY) {
    config.credentials = {
      accessKeyId: env.S3_ACCESS_KEY,
      secretAccessKey: env.S3_SECRET_KEY,
    };
  }

  return new S3Client(config);
};

export class S3StorageAdapter implements StoragePort {
  constructor(
    private readonly client: S3Client,
    readonly bucketName: string
  ) {}

  async generatePresignedUploadUrl(key: string, options: PresignedUploadOptions): Promise<string> {
    const command = new PutObjectCommand({
      Bucket: this.bucketName,
      Key: key,
      ContentType: options.contentType,
      ContentLength: options.contentLength,
    });
    return getSignedUrl(this.client, command, {
      expiresIn: options.expiresInSeconds,
      signableHeaders: SIGNED_UPLOAD_HEADERS,
    });
  }

  async putObject(key: string, body: Buffer, contentType: string): Promise<void> {
    const command = new PutObjectCommand({
      Bucket: this.bucketName,
      Key: key,
      Body: body,
      ContentType: contentType,
      ServerSideEncryption: "AES256",
    });
    await this.client.send(command);
  }

  async deleteObject(key: string): Promise<void> {
    const command = new DeleteObjectCommand({
      Bucket: this.bucketName,
      Key: key,
    });
    await this.client.send(command);
  }

  objectUrl(key: string): string {
    return `s3://${this.bucketName}/${key}`;
  }
}
