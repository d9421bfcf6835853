import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { AuthService } from "./auth/service.js";
import { InvalidTokenError } from "./domain/errors.js";
import { sendError } from "./routes/respond.js";

declare global {
  namespace Express {
    interface Request {
      /** Set by the auth middleware once the bearer token checks out */
      userId?: string;
    }
  }
}

/**
 * Pull the token out of an `Authorization: Bearer <token>` header.
 * Returns null when the header is absent or not in that form.
 */
export function bearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const parts = header.split(" ");
  if (parts.length !== 2 || parts[0] !== "Bearer" || !parts[1]) return null;
  return parts[1];
}

/**
 * Express middleware that requires a valid bearer token and records the
 * caller's user id on the request. Token validation happens here, once per
 * request, before any route handler runs.
 */
export function createAuthMiddleware(auth: AuthService): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization;
    if (!header) {
      res.status(401).json({ error: "Authorization header is required" });
      return;
    }

    const token = bearerToken(header);
    if (!token) {
      res.status(401).json({ error: "Invalid Authorization header format" });
      return;
    }

    try {
      req.userId = auth.validateToken(token);
    } catch (err) {
      sendError(res, err, "authenticate");
      return;
    }
    next();
  };
}

/** The authenticated caller; only valid behind createAuthMiddleware. */
export function callerId(req: Request): string {
  if (!req.userId) throw new InvalidTokenError();
  return req.userId;
}
