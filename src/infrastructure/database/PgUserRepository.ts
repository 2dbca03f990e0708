import { z } from "zod";
import { UserRecord } from "../../domain/entities/Registration";
import { BackendUnavailableError, ConflictError, ConflictField } from "../../domain/errors/AppError";
import {
  UniquenessConflicts,
  UserRepositoryPort,
  UserTransaction,
} from "../../ports/UserRepositoryPort";

const UNIQUE_VIOLATION = "23505";

const COUNT_CONFLICTS_SQL = `
  SELECT
    COUNT(*) FILTER (WHERE email = $1) AS email_count,
    COUNT(*) FILTER (WHERE national_id = $2) AS national_id_count
  FROM users
  WHERE email = $1 OR national_id = $2
`;

const INSERT_USER_SQL = `
  INSERT INTO users (
    id, email, full_name, national_id, phone1, phone2, address,
    instagram, facebook, tiktok, ref1_name, ref1_relation, ref2_name, ref2_relation,
    monthly_income, activity_type, position, birth_date,
    id_file_path, rif_file_path, ref1_id_path, ref2_id_path, work_cert_path,
    files_uploaded, files_uploaded_at, created_at
  ) VALUES (
    $1, $2, $3, $4, $5, $6, $7,
    $8, $9, $10, $11, $12, $13, $14,
    $15, $16, $17, $18,
    $19, $20, $21, $22, $23,
    $24, $25, $26
  )
`;

// COUNT(*) chega como string (bigint)
const conflictCountRowSchema = z.object({
  email_count: z.coerce.number(),
  national_id_count: z.coerce.number(),
});

/** O que o repositório usa de `pg.PoolClient`. */
export interface PgClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  release(error?: Error | boolean): void;
}

/** O que o repositório usa de `pg.Pool`. */
export interface PgPool {
  connect(): Promise<PgClient>;
}

export const toInsertValues = (user: UserRecord): unknown[] => [
  user.id,
  user.email,
  user.fullName,
  user.nationalId,
  user.phone1,
  user.phone2,
  user.address,
  user.instagram,
  user.facebook,
  user.tiktok,
  user.reference1.name,
  user.reference1.relation,
  user.reference2.name,
  user.reference2.relation,
  user.monthlyIncome,
  user.activityType,
  user.position,
  user.birthDate,
  user.documentPaths.id_file,
  user.documentPaths.rif_file,
  user.documentPaths.ref1_id,
  user.documentPaths.ref2_id,
  user.documentPaths.work_cert,
  user.filesUploaded,
  user.filesUploadedAt,
  user.createdAt,
];

const conflictFieldFromError = (error: unknown): ConflictField | null => {
  if (!(error instanceof Error) || !("code" in error) || error.code !== UNIQUE_VIOLATION) {
    return null;
  }
  const constraint = "constraint" in error && typeof error.constraint === "string" ? error.constraint : "";
  if (constraint.includes("email")) return "email";
  if (constraint.includes("national_id")) return "national_id";
  return null;
};

class PgUserTransaction implements UserTransaction {
  private finished = false;

  constructor(private readonly client: PgClient) {}

  async findConflicts(email: string, nationalId: string): Promise<UniquenessConflicts> {
    const result = await this.client.query(COUNT_CONFLICTS_SQL, [email, nationalId]);
    const row = conflictCountRowSchema.parse(result.rows[0] ?? { email_count: 0, national_id_count: 0 });
    return {
      email: row.email_count > 0,
      nationalId: row.national_id_count > 0,
    };
  }

  async insert(user: UserRecord): Promise<void> {
    try {
      await this.client.query(INSERT_USER_SQL, toInsertValues(user));
    } catch (error) {
      const field = conflictFieldFromError(error);
      if (field) {
        throw new ConflictError(field);
      }
      throw error;
    }
  }

  async commit(): Promise<void> {
    await this.finish("COMMIT");
  }

  async rollback(): Promise<void> {
    if (this.finished) {
      return;
    }
    await this.finish("ROLLBACK");
  }

  private async finish(statement: "COMMIT" | "ROLLBACK"): Promise<void> {
    this.finished = true;
    try {
      await this.client.query(statement);
      this.client.release();
    } catch (error) {
      // conexão em estado incerto: descartada em vez de devolvida ao pool
      this.client.release(error instanceof Error ? error : true);
      throw error;
    }
  }
}

export class PgUserRepository implements UserRepositoryPort {
  constructor(private readonly pool: PgPool | null) {}

  async begin(): Promise<UserTransaction> {
    if (!this.pool) {
      throw new BackendUnavailableError({
        backend: "database",
        code: "DATABASE_NOT_CONFIGURED",
        message: "Database connection is not configured",
      });
    }

    let client: PgClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new BackendUnavailableError({
        backend: "database",
        code: "DATABASE_UNAVAILABLE",
        message: "Could not connect to the database",
        cause: error,
      });
    }

    try {
      await client.query("BEGIN");
    } catch (error) {
      client.release(error instanceof Error ? error : true);
      throw new BackendUnavailableError({
        backend: "database",
        code: "DATABASE_UNAVAILABLE",
        message: "Could not start a database transaction",
        cause: error,
      });
    }

    return new PgUserTransaction(client);
  }
}
