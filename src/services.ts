import type { Config } from "./config.js";
import { AuthService } from "./auth/service.js";
import { TokenService } from "./auth/tokens.js";
import type { TaskRepository } from "./domain/task.js";
import type { UserRepository } from "./domain/user.js";
import { TaskService } from "./tasks/service.js";
import { UserDirectory } from "./users/service.js";

export interface Repositories {
  users: UserRepository;
  tasks: TaskRepository;
}

export interface Services {
  tokens: TokenService;
  auth: AuthService;
  users: UserDirectory;
  tasks: TaskService;
}

export function createServices(config: Readonly<Config>, repos: Repositories, now?: () => Date): Services {
  const tokens = new TokenService({
    secret: config.auth.jwtSecret,
    ttlMs: config.auth.jwtExpiryMs,
    ...(now ? { now } : {}),
  });
  const users = new UserDirectory(repos.users, { bcryptCost: config.auth.bcryptCost });
  const auth = new AuthService(tokens, users, repos.users);
  const tasks = new TaskService(repos.tasks, repos.users);
  return { tokens, auth, users, tasks };
}
