import { randomUUID } from "crypto";
import {
  DocumentPaths,
  RegistrationPayload,
  UploadedObjectRecord,
  UserRecord,
  emptyDocumentPaths,
} from "../../domain/entities/Registration";
import { AppError, BackendUnavailableError, ConflictError } from "../../domain/errors/AppError";
import { Logger } from "../../infrastructure/logger";
import { StoragePort } from "../../ports/StoragePort";
import { UserRepositoryPort, UserTransaction } from "../../ports/UserRepositoryPort";
import { CompensationLog } from "../services/CompensationLog";
import { DocumentUploadOrchestrator, FailedDocument } from "../services/DocumentUploadOrchestrator";

export type RegistrationUploadMode = "inline" | "deferred";

export type RegistrationState =
  | "START"
  | "UNIQUENESS_CHECKED"
  | "INSERTED"
  | "COMMITTED"
  | "FAILED"
  | "COMPENSATED";

export interface RegisterUserOptions {
  logger: Logger;
  uploadMode?: RegistrationUploadMode;
  now?: () => Date;
  generateId?: () => string;
}

export interface RegisterUserOutput {
  userId: string;
  email: string;
  nationalId: string;
  storageFolder: string | null;
  documentPaths: DocumentPaths;
  uploaded: UploadedObjectRecord[];
  failedDocuments: FailedDocument[];
  filesUploaded: boolean;
}

/**
 * Cadastro transacional com compensação no storage
 *
 * START → UNIQUENESS_CHECKED → INSERTED → COMMITTED
 * START → UNIQUENESS_CHECKED → FAILED → COMPENSATED
 *
 * Os documentos são gravados depois da checagem de unicidade e antes do insert. Se
 * qualquer passo falhar a transação é desfeita e todo objeto gravado nesta tentativa
 * é apagado antes de a falha ser reportada. Uma nova tentativa com o mesmo payload
 * gera as mesmas chaves e sobrescreve.
 */
export class RegisterUser {
  private readonly logger: Logger;
  private readonly uploadMode: RegistrationUploadMode;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly orchestrator: DocumentUploadOrchestrator | null;

  constructor(
    private readonly userRepository: UserRepositoryPort,
    private readonly storage: StoragePort | null,
    options: RegisterUserOptions
  ) {
    this.logger = options.logger;
    this.uploadMode = options.uploadMode ?? "inline";
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.orchestrator = storage ? new DocumentUploadOrchestrator(storage, options.logger) : null;
  }

  async execute(payload: RegistrationPayload): Promise<RegisterUserOutput> {
    const orchestrator = this.resolveOrchestrator(payload);
    const startedAt = this.now();
    const userId = this.generateId();
    const compensation = new CompensationLog(this.logger);
    const context = { userId, nationalId: payload.nationalId };

    let state: RegistrationState = "START";
    const transaction = await this.userRepository.begin();

    try {
      const conflicts = await transaction.findConflicts(payload.email, payload.nationalId);
      state = "UNIQUENESS_CHECKED";
      if (conflicts.email) {
        throw new ConflictError("email");
      }
      if (conflicts.nationalId) {
        throw new ConflictError("national_id");
      }

      const uploads = orchestrator
        ? await orchestrator.uploadAll({ payload, date: startedAt, compensation })
        : null;

      const documentPaths = uploads?.documentPaths ?? emptyDocumentPaths();
      const filesUploaded = (uploads?.uploaded.length ?? 0) > 0;
      const user: UserRecord = {
        ...this.applicantData(payload),
        id: userId,
        documentPaths,
        filesUploaded,
        filesUploadedAt: filesUploaded ? startedAt : null,
        createdAt: startedAt,
      };

      await transaction.insert(user);
      state = "INSERTED";

      await transaction.commit();
      state = "COMMITTED";

      this.logger.info({ type: "REGISTRATION", message: "User registered", payload: { ...context, state } });

      return {
        userId,
        email: user.email,
        nationalId: user.nationalId,
        storageFolder: uploads && this.storage ? this.storage.objectUrl(`${uploads.folder}/`) : null,
        documentPaths,
        uploaded: uploads?.uploaded ?? [],
        failedDocuments: uploads?.failed ?? [],
        filesUploaded,
      };
    } catch (error) {
      const failedAt: RegistrationState = state;
      state = "FAILED";
      this.logger.warn({
        type: "REGISTRATION",
        message: "Registration attempt failed, rolling back",
        payload: { ...context, failedAt, pendingCompensations: compensation.size },
        error,
      });

      await this.rollbackQuietly(transaction, userId);
      const report = await compensation.compensate();
      state = "COMPENSATED";

      this.logger.info({
        type: "REGISTRATION",
        message: "Registration compensated",
        payload: { ...context, state, deleted: report.attempted - report.failed.length, failedDeletes: report.failed },
      });

      throw this.toRegistrationError(error);
    }
  }

  private resolveOrchestrator(payload: RegistrationPayload): DocumentUploadOrchestrator | null {
    const hasDocuments = Object.keys(payload.documents).length > 0;
    if (!hasDocuments) {
      return null;
    }

    if (this.uploadMode === "deferred") {
      this.logger.warn({
        type: "REGISTRATION",
        message: "Deferred upload mode: embedded documents ignored",
        payload: { nationalId: payload.nationalId, fields: Object.keys(payload.documents) },
      });
      return null;
    }

    if (!this.orchestrator) {
      throw new BackendUnavailableError({
        backend: "storage",
        code: "BUCKET_NOT_CONFIGURED",
        message: "User documents bucket is not configured",
      });
    }

    return this.orchestrator;
  }

  private applicantData(payload: RegistrationPayload) {
    const { documents: _documents, ...applicant } = payload;
    return applicant;
  }

  private async rollbackQuietly(transaction: UserTransaction, userId: string): Promise<void> {
    try {
      await transaction.rollback();
    } catch (error) {
      this.logger.error({
        type: "REGISTRATION",
        message: "Transaction rollback failed",
        payload: { userId },
        error,
      });
    }
  }

  private toRegistrationError(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }
    return new BackendUnavailableError({
      backend: "database",
      code: "REGISTRATION_FAILED",
      message: "User registration failed",
      cause: error,
    });
  }
}
