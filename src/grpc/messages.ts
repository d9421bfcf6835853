import { z } from "zod";
import { InvalidInputError } from "../domain/errors.js";
import type { Task, TaskStatus } from "../domain/task.js";
import type { User } from "../domain/user.js";

// Shapes as produced by @grpc/proto-loader with keepCase, longs: String,
// enums: String and defaults. Unset message fields arrive as null.

export const TimestampSchema = z.object({
  seconds: z.union([z.string(), z.number()]),
  nanos: z.number(),
});
export type Timestamp = z.infer<typeof TimestampSchema>;

export const WIRE_STATUSES = [
  "TASK_STATUS_UNSPECIFIED",
  "TASK_STATUS_PENDING",
  "TASK_STATUS_IN_PROGRESS",
  "TASK_STATUS_COMPLETED",
] as const;
export const WireStatusSchema = z.enum(WIRE_STATUSES);
export type WireStatus = z.infer<typeof WireStatusSchema>;

export const TaskMessageSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string(),
  status: WireStatusSchema,
  priority: z.number(),
  due_date: TimestampSchema.nullable(),
  assigned_to: z.string(),
  created_by: z.string(),
  created_at: TimestampSchema.nullable(),
  updated_at: TimestampSchema.nullable(),
});
export type TaskMessage = z.infer<typeof TaskMessageSchema>;

export const ListTasksMessageSchema = z.object({
  tasks: z.array(TaskMessageSchema),
});
export type ListTasksMessage = z.infer<typeof ListTasksMessageSchema>;

export const UserMessageSchema = z.object({
  id: z.string(),
  username: z.string(),
  email: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  created_at: TimestampSchema.nullable(),
});
export type UserMessage = z.infer<typeof UserMessageSchema>;

export const ValidateTokenMessageSchema = z.object({
  user_id: z.string(),
  username: z.string(),
  valid: z.boolean(),
});
export type ValidateTokenMessage = z.infer<typeof ValidateTokenMessageSchema>;

export const EmptySchema = z.object({});
export type Empty = z.infer<typeof EmptySchema>;

// Requests. Fields are optional on the way in since a client may leave any
// of them out; the server side reads them through the helpers below.

export interface CreateTaskRequest {
  title?: string;
  description?: string;
  priority?: number;
  due_date?: Timestamp | null;
  created_by?: string;
}

export interface GetTaskRequest {
  id?: string;
}

export interface UpdateTaskRequest {
  id?: string;
  title?: string;
  description?: string;
  status?: WireStatus;
  priority?: number;
  due_date?: Timestamp | null;
  updated_by?: string;
}

export interface DeleteTaskRequest {
  id?: string;
  user_id?: string;
}

export interface ListTasksRequest {
  status?: WireStatus;
}

export interface AssignTaskRequest {
  task_id?: string;
  assignee_id?: string;
  assigned_by?: string;
}

export interface GetUserTasksRequest {
  user_id?: string;
}

export interface GetUserRequest {
  id?: string;
}

export interface ValidateTokenRequest {
  token?: string;
}

const STATUS_TO_WIRE: Record<TaskStatus, WireStatus> = {
  pending: "TASK_STATUS_PENDING",
  in_progress: "TASK_STATUS_IN_PROGRESS",
  completed: "TASK_STATUS_COMPLETED",
};

export function toWireStatus(status: TaskStatus): WireStatus {
  return STATUS_TO_WIRE[status];
}

/** `undefined` for TASK_STATUS_UNSPECIFIED or a missing value. */
export function fromWireStatus(status: WireStatus | undefined): TaskStatus | undefined {
  switch (status) {
    case "TASK_STATUS_PENDING":
      return "pending";
    case "TASK_STATUS_IN_PROGRESS":
      return "in_progress";
    case "TASK_STATUS_COMPLETED":
      return "completed";
    default:
      return undefined;
  }
}

export function toTimestamp(date: Date): Timestamp {
  const ms = date.getTime();
  const seconds = Math.floor(ms / 1000);
  return { seconds: String(seconds), nanos: (ms - seconds * 1000) * 1_000_000 };
}

// google.protobuf.Timestamp range: 0001-01-01T00:00:00Z to 9999-12-31T23:59:59Z
const MIN_TIMESTAMP_SECONDS = -62_135_596_800;
const MAX_TIMESTAMP_SECONDS = 253_402_300_799;

/**
 * `undefined` for an unset timestamp. A set one outside the protobuf range,
 * or with nanos outside [0, 1e9), is an InvalidInputError naming `field`.
 */
export function fromTimestamp(ts: Timestamp | null | undefined, field = "timestamp"): Date | undefined {
  if (!ts) return undefined;
  const seconds = Number(ts.seconds);
  if (
    !Number.isInteger(seconds) ||
    seconds < MIN_TIMESTAMP_SECONDS ||
    seconds > MAX_TIMESTAMP_SECONDS ||
    !Number.isInteger(ts.nanos) ||
    ts.nanos < 0 ||
    ts.nanos >= 1_000_000_000
  ) {
    throw new InvalidInputError(`invalid ${field}`);
  }
  return new Date(seconds * 1000 + Math.floor(ts.nanos / 1_000_000));
}

export function toTaskMessage(task: Task): TaskMessage {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    status: toWireStatus(task.status),
    priority: task.priority,
    due_date: task.dueDate ? toTimestamp(task.dueDate) : null,
    assigned_to: task.assignedTo ?? "",
    created_by: task.createdBy,
    created_at: toTimestamp(task.createdAt),
    updated_at: toTimestamp(task.updatedAt),
  };
}

export function toUserMessage(user: User): UserMessage {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    first_name: user.firstName ?? "",
    last_name: user.lastName ?? "",
    created_at: toTimestamp(user.createdAt),
  };
}
