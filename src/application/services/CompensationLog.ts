/**
 * Saga manual: ações de desfazer acumuladas no caminho de ida e executadas em
 * sequência quando a operação aborta. Cada ação roda de forma independente; uma
 * falha é registrada no log e não impede as seguintes.
 */

import { Logger } from "../../infrastructure/logger";

export interface CompensationAction {
  description: string;
  undo: () => Promise<void>;
}

export interface CompensationReport {
  attempted: number;
  failed: string[];
}

export class CompensationLog {
  private readonly actions: CompensationAction[] = [];

  constructor(private readonly logger: Logger) {}

  register(description: string, undo: () => Promise<void>): void {
    this.actions.push({ description, undo });
  }

  get size(): number {
    return this.actions.length;
  }

  get descriptions(): string[] {
    return this.actions.map((action) => action.description);
  }

  async compensate(): Promise<CompensationReport> {
    const failed: string[] = [];
    const pending = this.actions.splice(0, this.actions.length);

    for (const action of pending) {
      try {
        await action.undo();
        this.logger.info({ type: "COMPENSATION", message: "Compensation step completed", payload: { step: action.description } });
      } catch (error) {
        failed.push(action.description);
        this.logger.error({
          type: "COMPENSATION",
          message: "Compensation step failed",
          payload: { step: action.description },
          error,
        });
      }
    }

    return { attempted: pending.length, failed };
  }
}
