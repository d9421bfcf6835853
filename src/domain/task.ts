import { z } from "zod";

export const TASK_STATUSES = ["pending", "in_progress", "completed"] as const;

export const TaskStatusSchema = z.enum(TASK_STATUSES);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 5;

export interface Task {
  id: string;
  title: string;
  description: string;
  status: TaskStatus;
  priority: number;
  dueDate?: Date;
  assignedTo?: string;
  createdBy: string;
  createdAt: Date;
  updatedAt: Date;
}

export type NewTask = Omit<Task, "id" | "createdAt" | "updatedAt">;

export interface TaskView {
  id: string;
  title: string;
  description: string;
  status: TaskStatus;
  priority: number;
  dueDate: string | null;
  assignedTo: string | null;
  createdBy: string;
  createdAt: string;
  updatedAt: string;
}

export function toTaskView(task: Task): TaskView {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    status: task.status,
    priority: task.priority,
    dueDate: task.dueDate ? task.dueDate.toISOString() : null,
    assignedTo: task.assignedTo ?? null,
    createdBy: task.createdBy,
    createdAt: task.createdAt.toISOString(),
    updatedAt: task.updatedAt.toISOString(),
  };
}

// current -> statuses it may move to; a same-state move is never legal
const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["in_progress", "completed"],
  in_progress: ["completed"],
  completed: ["in_progress"],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isValidPriority(priority: number): boolean {
  return Number.isInteger(priority) && priority >= MIN_PRIORITY && priority <= MAX_PRIORITY;
}

export interface TaskFilter {
  status?: TaskStatus;
  createdBy?: string;
  assignedTo?: string;
}

/**
 * Storage contract for tasks. List methods return tasks ordered by due date
 * ascending, tasks without a due date first.
 */
export interface TaskRepository {
  findById(id: string): Promise<Task>;
  findAll(filter?: TaskFilter): Promise<Task[]>;
  create(task: NewTask): Promise<Task>;
  update(task: Task): Promise<Task>;
  delete(id: string): Promise<void>;
  /** Tasks the user created or is assigned to. */
  findByUser(userId: string): Promise<Task[]>;
  findByStatus(status: TaskStatus): Promise<Task[]>;
}
