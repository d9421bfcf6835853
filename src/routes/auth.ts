import { Router } from "express";
import rateLimit from "express-rate-limit";
import { z } from "zod";
import type { AuthService, LoginResult } from "../auth/service.js";
import { bearerToken } from "../auth.js";
import { InvalidTokenError } from "../domain/errors.js";
import { toPublicUser } from "../domain/user.js";
import type { UserDirectory } from "../users/service.js";
import { created, ok, parseRequest, route } from "./respond.js";

const RegisterSchema = z.object({
  username: z.string(),
  email: z.string(),
  password: z.string(),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
});

const LoginSchema = z.object({
  // username or email
  login: z.string().min(1, "login is required"),
  password: z.string().min(1, "password is required"),
});

const RefreshSchema = z.object({
  token: z.string().optional(),
});

export function toLoginResponse(result: LoginResult) {
  return {
    accessToken: result.accessToken,
    expiresAt: result.expiresAt.toISOString(),
    userId: result.userId,
    username: result.username,
  };
}

/**
 * POST /register       { username, email, password, firstName?, lastName? }
 * POST /login          { login, password }  login is a username or an email
 * POST /refresh-token  { token } or Authorization: Bearer <token>
 */
export function createAuthRouter(
  auth: AuthService,
  users: UserDirectory,
  options: { timeoutMs: number; loginRateLimit: number }
): Router {
  const router = Router();
  const { timeoutMs } = options;

  // Only failed attempts count, so a user who logs in correctly is never locked out
  const loginRateLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: options.loginRateLimit,
    skipSuccessfulRequests: true,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    message: { error: "Too many login attempts, try again in 15 minutes" },
  });

  router.post(
    "/register",
    route("register", timeoutMs, async (req) => {
      const body = parseRequest(RegisterSchema, req.body);
      const user = await users.register(body);
      console.log(`[auth] Registered user ${user.id} (${user.username})`);
      return created(toPublicUser(user));
    })
  );

  router.post(
    "/login",
    loginRateLimiter,
    route("login", timeoutMs, async (req) => {
      const { login, password } = parseRequest(LoginSchema, req.body);
      return ok(toLoginResponse(await auth.login(login, password)));
    })
  );

  router.post(
    "/refresh-token",
    route("refresh-token", timeoutMs, async (req) => {
      const { token } = parseRequest(RefreshSchema, req.body ?? {});
      const oldToken = token || bearerToken(req.headers.authorization);
      if (!oldToken) throw new InvalidTokenError();
      return ok(toLoginResponse(await auth.refreshToken(oldToken)));
    })
  );

  return router;
}
