import type * as grpc from "@grpc/grpc-js";
import type { AuthService } from "../auth/service.js";
import type { TokenService } from "../auth/tokens.js";
import { InvalidInputError, InvalidTokenError } from "../domain/errors.js";
import type { UserDirectory } from "../users/service.js";
import { authenticate, unary } from "./call.js";
import {
  toUserMessage,
  type GetUserRequest,
  type UserMessage,
  type ValidateTokenMessage,
  type ValidateTokenRequest,
} from "./messages.js";

export function createUserServiceHandlers(
  auth: AuthService,
  tokens: TokenService,
  users: UserDirectory,
  timeoutMs: number
): grpc.UntypedServiceImplementation {
  const GetUser = unary<GetUserRequest, UserMessage>("GetUser", timeoutMs, async (req, call) => {
    authenticate(auth, call.metadata);
    if (!req.id) throw new InvalidInputError("id is required");
    return toUserMessage(await users.getById(req.id));
  });

  // A bad token is an answer here, not a failure
  const ValidateToken = unary<ValidateTokenRequest, ValidateTokenMessage>(
    "ValidateToken",
    timeoutMs,
    async (req) => {
      if (!req.token) throw new InvalidInputError("token is required");
      try {
        const claims = tokens.inspectToken(req.token);
        return { user_id: claims.userId, username: claims.username, valid: true };
      } catch (err) {
        if (err instanceof InvalidTokenError) {
          return { user_id: "", username: "", valid: false };
        }
        throw err;
      }
    }
  );

  return { GetUser, ValidateToken };
}
