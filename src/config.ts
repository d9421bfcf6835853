import { z } from "zod";

export interface Config {
  app: {
    name: string;
    env: string;
  };
  host: string;
  httpPort: number;
  grpcPort: number;
  store: {
    driver: "mongodb" | "memory";
    uri: string;
    database: string;
    /** Per-operation server-side limit (maxTimeMS) and client connect timeout */
    timeoutMs: number;
  };
  auth: {
    jwtSecret: string;
    /** Lifetime of issued access tokens */
    jwtExpiryMs: number;
    bcryptCost: number;
    /** Failed login attempts allowed per IP per 15 minutes */
    loginRateLimit: number;
  };
  /** Deadline attached to every service call made by a transport adapter */
  requestTimeoutMs: number;
  allowedOrigins: string[];
}

const DAY_MS = 24 * 60 * 60 * 1000;

const intFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v === "" ? String(fallback) : v))
    .pipe(z.coerce.number().int());

const EnvSchema = z.object({
  APP_NAME: z.string().default("task-service"),
  APP_ENV: z.string().default("development"),
  HOST: z.string().default("0.0.0.0"),
  HTTP_PORT: intFromEnv(8080).pipe(z.number().min(0).max(65535)),
  GRPC_PORT: intFromEnv(50051).pipe(z.number().min(0).max(65535)),
  STORE_DRIVER: z.enum(["mongodb", "memory"]).default("mongodb"),
  MONGODB_URI: z.string().default("mongodb://localhost:27017"),
  MONGODB_DATABASE: z.string().min(1).default("task_management"),
  MONGODB_TIMEOUT_MS: intFromEnv(10_000).pipe(z.number().positive()),
  JWT_SECRET: z.string({ required_error: "JWT_SECRET is required" }).min(1, "JWT_SECRET must not be empty"),
  JWT_EXPIRY_MS: intFromEnv(DAY_MS).pipe(z.number().positive()),
  BCRYPT_COST: intFromEnv(10).pipe(z.number().min(4).max(15)),
  LOGIN_RATE_LIMIT: intFromEnv(5).pipe(z.number().positive()),
  REQUEST_TIMEOUT_MS: intFromEnv(5000).pipe(z.number().positive()),
  ALLOWED_ORIGINS: z.string().default("*"),
});

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  • ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value && typeof value === "object") deepFreeze(value);
  }
  return Object.freeze(obj);
}

/**
 * Build the process configuration from environment variables. The result is
 * frozen and is meant to be created once at start-up and handed to the
 * constructors that need it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<Config> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  const e = parsed.data;

  return deepFreeze({
    app: { name: e.APP_NAME, env: e.APP_ENV },
    host: e.HOST,
    httpPort: e.HTTP_PORT,
    grpcPort: e.GRPC_PORT,
    store: {
      driver: e.STORE_DRIVER,
      uri: e.MONGODB_URI,
      database: e.MONGODB_DATABASE,
      timeoutMs: e.MONGODB_TIMEOUT_MS,
    },
    auth: {
      jwtSecret: e.JWT_SECRET,
      jwtExpiryMs: e.JWT_EXPIRY_MS,
      bcryptCost: e.BCRYPT_COST,
      loginRateLimit: e.LOGIN_RATE_LIMIT,
    },
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    allowedOrigins: e.ALLOWED_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean),
  });
}
