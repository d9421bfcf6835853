import { status as GrpcStatus } from "@grpc/grpc-js";
import { DomainError, errorKindOf, type ErrorKind } from "../domain/errors.js";

interface TransportStatus {
  http: number;
  grpc: GrpcStatus;
}

export const STATUS_BY_KIND: Record<ErrorKind, TransportStatus> = {
  not_found: { http: 404, grpc: GrpcStatus.NOT_FOUND },
  invalid_input: { http: 400, grpc: GrpcStatus.INVALID_ARGUMENT },
  unauthorized: { http: 403, grpc: GrpcStatus.PERMISSION_DENIED },
  duplicate_key: { http: 409, grpc: GrpcStatus.ALREADY_EXISTS },
  invalid_credentials: { http: 401, grpc: GrpcStatus.UNAUTHENTICATED },
  invalid_token: { http: 401, grpc: GrpcStatus.UNAUTHENTICATED },
  invalid_transition: { http: 422, grpc: GrpcStatus.FAILED_PRECONDITION },
  timeout: { http: 504, grpc: GrpcStatus.DEADLINE_EXCEEDED },
  internal: { http: 500, grpc: GrpcStatus.INTERNAL },
};

export const INTERNAL_ERROR_MESSAGE = "Internal server error";

export interface MappedError {
  kind: ErrorKind;
  http: number;
  grpc: GrpcStatus;
  /** Safe to send to the client */
  message: string;
}

/**
 * Resolve any thrown value to the status pair and the message a client may
 * see. Internal errors never expose their own message.
 */
export function mapError(err: unknown): MappedError {
  const kind = errorKindOf(err);
  const { http, grpc } = STATUS_BY_KIND[kind];
  const message = kind !== "internal" && err instanceof DomainError ? err.message : INTERNAL_ERROR_MESSAGE;
  return { kind, http, grpc, message };
}
