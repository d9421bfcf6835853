import type * as grpc from "@grpc/grpc-js";
import type { AuthService } from "../auth/service.js";
import { InvalidInputError } from "../domain/errors.js";
import type { TaskService, UpdateTaskInput } from "../tasks/service.js";
import { actingUser, authenticate, unary } from "./call.js";
import {
  fromTimestamp,
  fromWireStatus,
  toTaskMessage,
  type AssignTaskRequest,
  type CreateTaskRequest,
  type DeleteTaskRequest,
  type Empty,
  type GetTaskRequest,
  type GetUserTasksRequest,
  type ListTasksMessage,
  type ListTasksRequest,
  type TaskMessage,
  type UpdateTaskRequest,
} from "./messages.js";

function required(value: string | undefined, field: string): string {
  if (!value) throw new InvalidInputError(`${field} is required`);
  return value;
}

/**
 * proto3 scalars carry no presence, so the zero value of every field in
 * UpdateTaskRequest means "leave unchanged".
 */
export function toUpdateInput(request: UpdateTaskRequest): UpdateTaskInput {
  const input: UpdateTaskInput = {};
  if (request.title) input.title = request.title;
  if (request.description) input.description = request.description;

  const status = fromWireStatus(request.status);
  if (status) input.status = status;
  if (request.priority) input.priority = request.priority;

  const dueDate = fromTimestamp(request.due_date, "due_date");
  if (dueDate) input.dueDate = dueDate;
  return input;
}

export function createTaskServiceHandlers(
  auth: AuthService,
  tasks: TaskService,
  timeoutMs: number
): grpc.UntypedServiceImplementation {
  const CreateTask = unary<CreateTaskRequest, TaskMessage>("CreateTask", timeoutMs, async (req, call) => {
    const callerId = authenticate(auth, call.metadata);
    const dueDate = fromTimestamp(req.due_date, "due_date");
    const task = await tasks.create({
      title: req.title ?? "",
      ...(req.description ? { description: req.description } : {}),
      priority: req.priority ?? 0,
      ...(dueDate ? { dueDate } : {}),
      createdBy: actingUser(req.created_by, callerId),
    });
    return toTaskMessage(task);
  });

  const GetTask = unary<GetTaskRequest, TaskMessage>("GetTask", timeoutMs, async (req, call) => {
    authenticate(auth, call.metadata);
    return toTaskMessage(await tasks.getById(required(req.id, "id")));
  });

  const UpdateTask = unary<UpdateTaskRequest, TaskMessage>("UpdateTask", timeoutMs, async (req, call) => {
    const callerId = authenticate(auth, call.metadata);
    const id = required(req.id, "id");
    const task = await tasks.update(id, toUpdateInput(req), actingUser(req.updated_by, callerId));
    return toTaskMessage(task);
  });

  const DeleteTask = unary<DeleteTaskRequest, Empty>("DeleteTask", timeoutMs, async (req, call) => {
    const callerId = authenticate(auth, call.metadata);
    await tasks.delete(required(req.id, "id"), actingUser(req.user_id, callerId));
    return {};
  });

  const ListTasks = unary<ListTasksRequest, ListTasksMessage>("ListTasks", timeoutMs, async (req, call) => {
    authenticate(auth, call.metadata);
    const status = fromWireStatus(req.status);
    const list = status ? await tasks.listByStatus(status) : await tasks.listAll();
    return { tasks: list.map(toTaskMessage) };
  });

  const AssignTask = unary<AssignTaskRequest, TaskMessage>("AssignTask", timeoutMs, async (req, call) => {
    const callerId = authenticate(auth, call.metadata);
    const task = await tasks.assign(
      required(req.task_id, "task_id"),
      required(req.assignee_id, "assignee_id"),
      actingUser(req.assigned_by, callerId)
    );
    return toTaskMessage(task);
  });

  const GetUserTasks = unary<GetUserTasksRequest, ListTasksMessage>(
    "GetUserTasks",
    timeoutMs,
    async (req, call) => {
      const callerId = authenticate(auth, call.metadata);
      const list = await tasks.listByUser(req.user_id || callerId);
      return { tasks: list.map(toTaskMessage) };
    }
  );

  return { CreateTask, GetTask, UpdateTask, DeleteTask, ListTasks, AssignTask, GetUserTasks };
}
