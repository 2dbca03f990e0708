export interface PresignedUploadOptions {
  contentType: string;
  contentLength: number;
  expiresInSeconds: number;
}

export interface StoragePort {
  readonly bucketName: string;
  /** URL de PUT válida só para esta chave, este content type e este tamanho. */
  generatePresignedUploadUrl(key: string, options: PresignedUploadOptions): Promise<string>;
  /** Grava com criptografia no servidor habilitada. */
  putObject(key: string, body: Buffer, contentType: string): Promise<void>;
  deleteObject(key: string): Promise<void>;
  objectUrl(key: string): string;
}
