import path from "path";
import pino from "pino";
import { LogData, LogLevel, Logger } from "./types";

type LogArgs<T> = [LogData<T>] | [Partial<LogData<T>>, string] | [string];

const SERVICE_NAME = "applicant-intake-api";
const PROJECT_ROOT = process.cwd();
const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";

const resolveLevel = (): string => {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  if (isTest) {
    return "silent";
  }
  return isProduction ? "info" : "debug";
};

// pino-pretty roda num worker thread; nos testes ele manteria o processo do Jest vivo
const transport =
  isProduction || isTest
    ? undefined
    : {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          messageFormat: "{file} {type} {msg}",
          customColors: "info:blue,warn:yellow,error:red,debug:magenta",
          levelFirst: true,
        },
      };

const pinoLogger = pino({
  level: resolveLevel(),
  base: {
    service: SERVICE_NAME,
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport,
});

const resolveCallerFile = (): string | undefined => {
  // Avoid stack parsing overhead in production hot paths
  if (isProduction || isTest) {
    return undefined;
  }

  const stack = new Error().stack?.split("\n").slice(3);
  if (!stack) return undefined;

  for (const line of stack) {
    const match = line.match(/\((.*):\d+:\d+\)/) ?? line.match(/at (.*):\d+:\d+/);
    const filePath = match?.[1];
    if (filePath && filePath.startsWith(PROJECT_ROOT) && !filePath.includes(`${path.sep}logger${path.sep}`)) {
      const relative = path.relative(PROJECT_ROOT, filePath);
      if (!relative.startsWith("node_modules")) {
        return relative.replace(/\\/g, "/");
      }
    }
  }

  return undefined;
};

const normalizeLogInput = <T>(args: LogArgs<T>): LogData<T> => {
  if (args.length === 2) {
    const [partial, message] = args;
    const { type, payload, error, file, message: _ignored, ...context } = partial;
    return {
      type: type ?? "GENERAL",
      message,
      payload: payload ?? (Object.keys(context).length > 0 ? context : undefined),
      error,
      file,
    };
  }

  const [first] = args;
  if (typeof first === "string") {
    return { type: "GENERAL", message: first };
  }

  return {
    ...first,
    type: first.type ?? "GENERAL",
    message: first.message ?? "Log",
  };
};

const serializeError = (error: unknown): unknown => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      ...(error.cause === undefined ? {} : { cause: serializeError(error.cause) }),
    };
  }
  return error;
};

const formatLogData = <T>({ message, error, type, payload, file }: LogData<T>) => {
  const resolvedFile = file ?? resolveCallerFile();
  const resolvedType = type ?? "GENERAL";

  const formattedFile = resolvedFile ? `[${resolvedFile}]` : "";
  const formattedType = `[${resolvedType}]`;

  return {
    msg: message,
    type: formattedType,
    file: formattedFile,
    payload,
    err: error === undefined ? undefined : serializeError(error),
  };
};

const logWithLevel = <T>(level: LogLevel, ...args: LogArgs<T>) => {
  const structured = normalizeLogInput<T>(args);
  pinoLogger[level](formatLogData(structured));
};

const AppLogger: Logger = {
  debug: <T>(...args: LogArgs<T>) => logWithLevel<T>("debug", ...args),
  info: <T>(...args: LogArgs<T>) => logWithLevel<T>("info", ...args),
  warn: <T>(...args: LogArgs<T>) => logWithLevel<T>("warn", ...args),
  error: <T>(...args: LogArgs<T>) => logWithLevel<T>("error", ...args),
};

export default (): Logger => AppLogger;
export { pinoLogger };
