import { UserRecord } from "../domain/entities/Registration";

export interface UniquenessConflicts {
  email: boolean;
  nationalId: boolean;
}

/**
 * Transação explícita sobre a tabela `users`. `commit` e `rollback` liberam a conexão;
 * depois de qualquer um dos dois a transação não pode mais ser usada.
 */
export interface UserTransaction {
  findConflicts(email: string, nationalId: string): Promise<UniquenessConflicts>;
  /** Lança `ConflictError` quando o banco rejeita o insert por chave única. */
  insert(user: UserRecord): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface UserRepositoryPort {
  begin(): Promise<UserTransaction>;
}
