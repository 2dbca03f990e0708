export interface FileUploadRequest {
  fieldName: string;
  fileName: string;
  fileSize: number;
  contentType: string;
}

export interface UploadGrant {
  fieldName: string;
  fileName: string;
  objectKey: string;
  uploadUrl: string;
  expiresIn: number;
  expiresAt: Date;
  contentType: string;
  maxSize: number;
}
