import cors from "cors";
import express, { Express } from "express";
import helmet from "helmet";
import pinoHttp from "pino-http";
import { RegistrationController } from "./infrastructure/http/controllers/RegistrationController";
import { UploadUrlController } from "./infrastructure/http/controllers/UploadUrlController";
import { errorHandler, notFoundHandler } from "./infrastructure/http/middlewares/errorHandler";
import { createHealthRouter } from "./infrastructure/http/routes/healthRoutes";
import { createUploadUrlRouter } from "./infrastructure/http/routes/uploadUrlRoutes";
import { createUserRouter } from "./infrastructure/http/routes/userRoutes";
import { CORS_HEADERS } from "./infrastructure/http/utils/apiResponse";
import { Logger, pinoLogger } from "./infrastructure/logger";

export interface AppDependencies {
  environment: string;
  logger: Logger;
  uploadUrlController: UploadUrlController;
  registrationController: RegistrationController;
  /** Limite do corpo JSON; precisa comportar os documentos em base64. */
  bodyLimit?: string;
  httpLogging?: boolean;
}

export const buildApp = (deps: AppDependencies): Express => {
  const app = express();

  app.disable("x-powered-by");

  app.use(
    helmet({
      crossOriginResourcePolicy: false,
      crossOriginEmbedderPolicy: false,
      crossOriginOpenerPolicy: false,
    })
  );

  // Preflight responde 200 aqui mesmo, antes de qualquer parsing ou validação
  app.use(
    cors({
      origin: CORS_HEADERS["Access-Control-Allow-Origin"],
      methods: CORS_HEADERS["Access-Control-Allow-Methods"],
      allowedHeaders: CORS_HEADERS["Access-Control-Allow-Headers"],
      optionsSuccessStatus: 200,
    })
  );

  app.use(express.json({ limit: deps.bodyLimit ?? "15mb" }));

  if (deps.httpLogging ?? true) {
    app.use(
      pinoHttp({
        logger: pinoLogger,
        autoLogging: {
          ignore: (req) => req.url === "/health",
        },
        customLogLevel: (_req, res, err) => {
          if (err || res.statusCode >= 500) return "error";
          if (res.statusCode >= 400) return "warn";
          return "info";
        },
      })
    );
  }

  app.use("/health", createHealthRouter(deps.environment));
  app.use("/uploads", createUploadUrlRouter(deps.uploadUrlController));
  app.use("/users", createUserRouter(deps.registrationController));

  app.use(notFoundHandler(deps.environment));
  app.use(errorHandler(deps.environment, deps.logger));

  return app;
};
