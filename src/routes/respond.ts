import type { Request, RequestHandler, Response } from "express";
import type { z } from "zod";
import { InvalidInputError } from "../domain/errors.js";
import { mapError } from "../errors/status.js";
import { withDeadline } from "../utils/with-deadline.js";

export interface Reply {
  status: number;
  body?: unknown;
}

export const ok = (body: unknown): Reply => ({ status: 200, body });
export const created = (body: unknown): Reply => ({ status: 201, body });
export const noContent = (): Reply => ({ status: 204 });

/** A request body or query that did not match its schema. */
export class RequestValidationError extends InvalidInputError {
  constructor(
    message: string,
    public readonly details: Record<string, string[] | undefined>
  ) {
    super(message);
    this.name = "RequestValidationError";
  }
}

export function parseRequest<S extends z.ZodTypeAny>(schema: S, value: unknown, what = "request body"): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new RequestValidationError(`Invalid ${what}`, parsed.error.flatten().fieldErrors);
  }
  return parsed.data;
}

export function sendError(res: Response, err: unknown, operation: string): void {
  const mapped = mapError(err);
  if (mapped.kind === "internal") {
    console.error(`[http] ${operation} failed:`, err);
  }
  res.status(mapped.http).json({
    error: mapped.message,
    ...(err instanceof RequestValidationError ? { details: err.details } : {}),
  });
}

/**
 * Adapt a handler that returns a Reply into an Express handler. The handler
 * runs under the request deadline; any error it throws is mapped through the
 * shared status table.
 */
export function route(
  operation: string,
  timeoutMs: number,
  handler: (req: Request, res: Response) => Promise<Reply>
): RequestHandler {
  return (req, res) => {
    withDeadline(operation, timeoutMs, () => handler(req, res))
      .then((reply) => {
        if (reply.body === undefined) {
          res.status(reply.status).end();
        } else {
          res.status(reply.status).json(reply.body);
        }
      })
      .catch((err: unknown) => sendError(res, err, operation));
  };
}
