import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import type { Config } from "./config.js";
import { createAuthMiddleware } from "./auth.js";
import type { Services } from "./services.js";
import { createHealthRouter } from "./routes/health.js";
import { createAuthRouter } from "./routes/auth.js";
import { createUsersRouter } from "./routes/users.js";
import { createTasksRouter } from "./routes/tasks.js";
import { sendError } from "./routes/respond.js";

export const API_PREFIX = "/api/v1";

function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on("finish", () => {
    console.log(`[http] ${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - start}ms`);
  });
  next();
}

/**
 * Build the REST application. Listening is left to the caller so tests can
 * bind an ephemeral port.
 */
export function createApp(config: Readonly<Config>, services: Services): Express {
  const app = express();
  const timeoutMs = config.requestTimeoutMs;

  app.disable("x-powered-by");
  app.use(requestLogger);
  app.use(
    cors({
      origin: config.allowedOrigins.includes("*") ? "*" : config.allowedOrigins,
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
    })
  );
  app.use(express.json({ limit: "1mb" }));

  const api = express.Router();

  // ---- Public ----
  api.use("/health", createHealthRouter());
  api.use(
    "/auth",
    createAuthRouter(services.auth, services.users, {
      timeoutMs,
      loginRateLimit: config.auth.loginRateLimit,
    })
  );

  // ---- Authenticated ----
  const requireAuth = createAuthMiddleware(services.auth);
  api.use("/tasks", requireAuth, createTasksRouter(services.tasks, timeoutMs));
  api.use(["/me", "/users"], requireAuth);
  api.use(createUsersRouter(services.users, services.tasks, timeoutMs));

  app.use(API_PREFIX, api);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  // Body parser failures (malformed JSON, oversized payload) land here
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (isBodyParserError(err)) {
      res.status(err.status).json({ error: "Invalid request body" });
      return;
    }
    sendError(res, err, "request");
  });

  return app;
}

function isBodyParserError(err: unknown): err is { status: number; type: string } {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500
  );
}
