import type * as grpc from "@grpc/grpc-js";
import type { AuthService } from "../auth/service.js";
import { InvalidTokenError, UnauthorizedError } from "../domain/errors.js";
import { mapError } from "../errors/status.js";
import { withDeadline } from "../utils/with-deadline.js";

/**
 * Adapt a promise-returning handler to grpc-js. Each call runs under the
 * request deadline and any failure is mapped to its gRPC status.
 */
export function unary<Req, Res>(
  operation: string,
  timeoutMs: number,
  handler: (request: Req, call: grpc.ServerUnaryCall<Req, Res>) => Promise<Res>
): grpc.handleUnaryCall<Req, Res> {
  return (call, callback) => {
    withDeadline(operation, timeoutMs, () => handler(call.request, call))
      .then((response) => callback(null, response))
      .catch((err: unknown) => {
        const mapped = mapError(err);
        if (mapped.kind === "internal") {
          console.error(`[grpc] ${operation} failed:`, err);
        }
        callback({ code: mapped.grpc, details: mapped.message });
      });
  };
}

/** Token from the "authorization" metadata entry, bare or "Bearer <token>". */
export function metadataToken(metadata: grpc.Metadata): string | null {
  const [value] = metadata.get("authorization");
  if (value === undefined) return null;

  const raw = (typeof value === "string" ? value : value.toString("utf8")).trim();
  const token = raw.startsWith("Bearer ") ? raw.slice("Bearer ".length).trim() : raw;
  return token || null;
}

/** Resolve the calling user's id or throw InvalidTokenError. */
export function authenticate(auth: AuthService, metadata: grpc.Metadata): string {
  const token = metadataToken(metadata);
  if (!token) throw new InvalidTokenError("authorization metadata is required");
  return auth.validateToken(token);
}

/**
 * Acting-user fields in request messages may be left empty, in which case the
 * caller acts. Naming anyone else is refused.
 */
export function actingUser(claimed: string | undefined, callerId: string): string {
  if (claimed && claimed !== callerId) {
    throw new UnauthorizedError("cannot act on behalf of another user", { claimed, callerId });
  }
  return callerId;
}
