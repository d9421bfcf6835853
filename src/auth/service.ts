import { NotFoundError, UnauthorizedError, UnknownResourceKindError, UserNotFoundError } from "../domain/errors.js";
import type { Task } from "../domain/task.js";
import type { User, UserRepository } from "../domain/user.js";
import type { UserDirectory } from "../users/service.js";
import type { TokenService } from "./tokens.js";

export interface LoginResult {
  accessToken: string;
  expiresAt: Date;
  userId: string;
  username: string;
}

export type OwnedResource = { kind: "task"; task: Task } | { kind: "user"; user: Pick<User, "id"> };

export class AuthService {
  constructor(
    private readonly tokens: TokenService,
    private readonly directory: UserDirectory,
    private readonly users: UserRepository
  ) {}

  async login(login: string, password: string): Promise<LoginResult> {
    const user = await this.directory.validateCredentials(login, password);
    return this.issueFor(user);
  }

  validateToken(token: string): string {
    return this.tokens.validateToken(token);
  }

  /**
   * Swap a still-valid token for a new one. The user is read again so a
   * deleted account cannot keep itself alive by refreshing.
   */
  async refreshToken(oldToken: string): Promise<LoginResult> {
    const userId = this.tokens.validateToken(oldToken);

    let user: User;
    try {
      user = await this.users.findById(userId);
    } catch (err) {
      if (err instanceof NotFoundError) throw new UserNotFoundError(userId);
      throw err;
    }
    return this.issueFor(user);
  }

  private issueFor(user: User): LoginResult {
    const { token, expiresAt } = this.tokens.issueToken(user.id, user.username);
    return { accessToken: token, expiresAt, userId: user.id, username: user.username };
  }
}

/**
 * Single-owner check: a user owns their own profile and the tasks they
 * created. Task updates use the richer creator/assignee rule in TaskService.
 */
export function authorizeResourceAccess(userId: string, resource: OwnedResource): void {
  const ownerId = ownerOf(resource);
  if (ownerId !== userId) {
    throw new UnauthorizedError(`not the owner of this ${resource.kind}`, { userId, ownerId });
  }
}

function ownerOf(resource: OwnedResource): string {
  switch (resource.kind) {
    case "task":
      return resource.task.createdBy;
    case "user":
      return resource.user.id;
    default: {
      const unknown: { kind: string } = resource;
      throw new UnknownResourceKindError(unknown.kind);
    }
  }
}
