import { v4 as uuidv4 } from "uuid";
import { DuplicateKeyError, NotFoundError } from "../domain/errors.js";
import type { NewTask, Task, TaskFilter, TaskRepository, TaskStatus } from "../domain/task.js";
import type { NewUser, User, UserRepository } from "../domain/user.js";
import { byDueDate } from "./ordering.js";

function cloneUser(user: User): User {
  return { ...user, createdAt: new Date(user.createdAt), updatedAt: new Date(user.updatedAt) };
}

function cloneTask(task: Task): Task {
  return {
    ...task,
    ...(task.dueDate ? { dueDate: new Date(task.dueDate) } : {}),
    createdAt: new Date(task.createdAt),
    updatedAt: new Date(task.updatedAt),
  };
}

/**
 * Map-backed UserRepository with the same unique-key behaviour as the
 * MongoDB collection. Values are copied in and out, so callers never hold a
 * reference into the store.
 */
export class InMemoryUserRepository implements UserRepository {
  private users = new Map<string, User>();

  async findById(id: string): Promise<User> {
    const user = this.users.get(id);
    if (!user) throw new NotFoundError("user not found", { id });
    return cloneUser(user);
  }

  async findByEmail(email: string): Promise<User> {
    return this.findOne((u) => u.email === email, { email });
  }

  async findByUsername(username: string): Promise<User> {
    return this.findOne((u) => u.username === username, { username });
  }

  async create(data: NewUser): Promise<User> {
    this.assertUnique(data);
    const now = new Date();
    const user: User = { ...data, id: uuidv4(), createdAt: now, updatedAt: now };
    this.users.set(user.id, user);
    return cloneUser(user);
  }

  async update(user: User): Promise<User> {
    if (!this.users.has(user.id)) throw new NotFoundError("user not found", { id: user.id });
    this.assertUnique(user, user.id);
    const stored: User = { ...cloneUser(user), updatedAt: new Date() };
    this.users.set(user.id, stored);
    return cloneUser(stored);
  }

  async delete(id: string): Promise<void> {
    if (!this.users.delete(id)) throw new NotFoundError("user not found", { id });
  }

  clear(): void {
    this.users.clear();
  }

  size(): number {
    return this.users.size;
  }

  private findOne(match: (u: User) => boolean, context: Record<string, unknown>): User {
    for (const user of this.users.values()) {
      if (match(user)) return cloneUser(user);
    }
    throw new NotFoundError("user not found", context);
  }

  private assertUnique(candidate: Pick<User, "username" | "email">, selfId?: string): void {
    for (const user of this.users.values()) {
      if (user.id === selfId) continue;
      if (user.username === candidate.username) throw new DuplicateKeyError("username");
      if (user.email === candidate.email) throw new DuplicateKeyError("email");
    }
  }
}

export class InMemoryTaskRepository implements TaskRepository {
  private tasks = new Map<string, Task>();

  async findById(id: string): Promise<Task> {
    const task = this.tasks.get(id);
    if (!task) throw new NotFoundError("task not found", { id });
    return cloneTask(task);
  }

  async findAll(filter: TaskFilter = {}): Promise<Task[]> {
    return this.query(
      (t) =>
        (filter.status === undefined || t.status === filter.status) &&
        (filter.createdBy === undefined || t.createdBy === filter.createdBy) &&
        (filter.assignedTo === undefined || t.assignedTo === filter.assignedTo)
    );
  }

  async create(data: NewTask): Promise<Task> {
    const now = new Date();
    const task: Task = { ...data, id: uuidv4(), createdAt: now, updatedAt: now };
    this.tasks.set(task.id, task);
    return cloneTask(task);
  }

  async update(task: Task): Promise<Task> {
    const existing = this.tasks.get(task.id);
    if (!existing) throw new NotFoundError("task not found", { id: task.id });
    // created_by and created_at are never rewritten, matching the $set in the Mongo repository
    const stored: Task = {
      ...cloneTask(task),
      createdBy: existing.createdBy,
      createdAt: existing.createdAt,
      updatedAt: new Date(),
    };
    this.tasks.set(task.id, stored);
    return cloneTask(stored);
  }

  async delete(id: string): Promise<void> {
    if (!this.tasks.delete(id)) throw new NotFoundError("task not found", { id });
  }

  async findByUser(userId: string): Promise<Task[]> {
    return this.query((t) => t.createdBy === userId || t.assignedTo === userId);
  }

  async findByStatus(status: TaskStatus): Promise<Task[]> {
    return this.query((t) => t.status === status);
  }

  clear(): void {
    this.tasks.clear();
  }

  size(): number {
    return this.tasks.size;
  }

  private query(match: (t: Task) => boolean): Task[] {
    return Array.from(this.tasks.values()).filter(match).sort(byDueDate).map(cloneTask);
  }
}
