import {
  AssigneeNotFoundError,
  CreatorNotFoundError,
  InvalidInputError,
  InvalidTransitionError,
  NotFoundError,
  UnauthorizedError,
} from "../domain/errors.js";
import {
  MAX_PRIORITY,
  MIN_PRIORITY,
  canTransition,
  isValidPriority,
  type Task,
  type TaskRepository,
  type TaskStatus,
} from "../domain/task.js";
import type { UserRepository } from "../domain/user.js";

export interface CreateTaskInput {
  title: string;
  description?: string;
  priority: number;
  dueDate?: Date;
  createdBy: string;
}

/**
 * Partial update. `undefined` leaves a field as it is; an empty description
 * clears it and `dueDate: null` removes the due date.
 */
export interface UpdateTaskInput {
  title?: string;
  description?: string;
  status?: TaskStatus;
  priority?: number;
  dueDate?: Date | null;
}

const PRIORITY_MESSAGE = `priority must be between ${MIN_PRIORITY} and ${MAX_PRIORITY}`;

export class TaskService {
  constructor(
    private readonly tasks: TaskRepository,
    private readonly users: UserRepository
  ) {}

  async create(input: CreateTaskInput): Promise<Task> {
    const title = input.title.trim();
    if (!title) throw new InvalidInputError("title is required");
    if (!isValidPriority(input.priority)) throw new InvalidInputError(PRIORITY_MESSAGE);

    await this.requireUser(input.createdBy, () => new CreatorNotFoundError(input.createdBy));

    return this.tasks.create({
      title,
      description: input.description ?? "",
      status: "pending",
      priority: input.priority,
      ...(input.dueDate ? { dueDate: input.dueDate } : {}),
      createdBy: input.createdBy,
    });
  }

  getById(id: string): Promise<Task> {
    return this.tasks.findById(id);
  }

  /** Creator and assignee may both edit. */
  async update(id: string, input: UpdateTaskInput, updatedBy: string): Promise<Task> {
    const current = await this.tasks.findById(id);

    if (current.createdBy !== updatedBy && current.assignedTo !== updatedBy) {
      throw new UnauthorizedError("only the creator or the assignee may update this task", {
        taskId: id,
        userId: updatedBy,
      });
    }

    const next: Task = { ...current };

    if (input.title !== undefined) {
      const title = input.title.trim();
      if (!title) throw new InvalidInputError("title must not be empty");
      next.title = title;
    }

    if (input.description !== undefined) next.description = input.description;

    if (input.status !== undefined) {
      if (!canTransition(current.status, input.status)) {
        throw new InvalidTransitionError(current.status, input.status);
      }
      next.status = input.status;
    }

    if (input.priority !== undefined) {
      if (!isValidPriority(input.priority)) throw new InvalidInputError(PRIORITY_MESSAGE);
      next.priority = input.priority;
    }

    if (input.dueDate === null) {
      delete next.dueDate;
    } else if (input.dueDate !== undefined) {
      next.dueDate = input.dueDate;
    }

    // No version check: a concurrent update of the same task wins or loses
    // as a whole, last writer wins.
    return this.tasks.update(next);
  }

  async delete(id: string, requesterId: string): Promise<void> {
    const task = await this.tasks.findById(id);
    if (task.createdBy !== requesterId) {
      throw new UnauthorizedError("only the creator may delete this task", { taskId: id, userId: requesterId });
    }
    await this.tasks.delete(id);
  }

  /**
   * Hand a task to another user. Only the creator may assign, and assigning a
   * pending task starts it.
   */
  async assign(taskId: string, assigneeId: string, assignerId: string): Promise<Task> {
    const task = await this.tasks.findById(taskId);
    if (task.createdBy !== assignerId) {
      throw new UnauthorizedError("only the creator may assign this task", { taskId, userId: assignerId });
    }

    await this.requireUser(assigneeId, () => new AssigneeNotFoundError(assigneeId));

    return this.tasks.update({
      ...task,
      assignedTo: assigneeId,
      status: task.status === "pending" ? "in_progress" : task.status,
    });
  }

  listAll(): Promise<Task[]> {
    return this.tasks.findAll();
  }

  listByStatus(status: TaskStatus): Promise<Task[]> {
    return this.tasks.findByStatus(status);
  }

  listByUser(userId: string): Promise<Task[]> {
    return this.tasks.findByUser(userId);
  }

  private async requireUser(userId: string, onMissing: () => NotFoundError): Promise<void> {
    try {
      await this.users.findById(userId);
    } catch (err) {
      if (err instanceof NotFoundError) throw onMissing();
      throw err;
    }
  }
}
