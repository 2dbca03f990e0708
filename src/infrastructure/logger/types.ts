export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogData<T> {
  /** Categoria do evento, ex.: "REGISTRATION", "PRESIGN", "COMPENSATION". */
  type?: string;
  message?: string;
  payload?: T | Record<string, unknown>;
  error?: unknown;
  file?: string;
  [key: string]: unknown;
}

export type LogMethod = {
  <T>(logData: LogData<T>): void;
  (message: string): void;
  <T>(payload: Partial<LogData<T>>, message: string): void;
};

export type Logger = Record<LogLevel, LogMethod>;
