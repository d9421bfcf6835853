import * as grpc from "@grpc/grpc-js";
import type { ZodType, ZodTypeDef } from "zod";
import { loadTaskProto } from "./proto.js";
import {
  EmptySchema,
  ListTasksMessageSchema,
  TaskMessageSchema,
  UserMessageSchema,
  ValidateTokenMessageSchema,
  type AssignTaskRequest,
  type CreateTaskRequest,
  type DeleteTaskRequest,
  type Empty,
  type GetTaskRequest,
  type GetUserRequest,
  type GetUserTasksRequest,
  type ListTasksMessage,
  type ListTasksRequest,
  type TaskMessage,
  type UpdateTaskRequest,
  type UserMessage,
  type ValidateTokenMessage,
  type ValidateTokenRequest,
} from "./messages.js";

export interface TaskClientOptions {
  credentials?: grpc.ChannelCredentials;
  /** Per-call deadline in milliseconds; unset means none. */
  deadlineMs?: number;
}

/**
 * Typed client for TaskService and UserService. Responses are checked
 * against the message schemas; the token set with `setToken` travels as
 * "authorization: Bearer <token>" metadata on every call.
 */
export class TaskClient {
  private readonly client: grpc.Client;
  private readonly proto = loadTaskProto();
  private readonly deadlineMs: number | undefined;
  private token = "";

  constructor(address: string, options: TaskClientOptions = {}) {
    this.client = new grpc.Client(address, options.credentials ?? grpc.credentials.createInsecure());
    this.deadlineMs = options.deadlineMs;
  }

  setToken(token: string): void {
    this.token = token;
  }

  close(): void {
    this.client.close();
  }

  createTask(request: CreateTaskRequest): Promise<TaskMessage> {
    return this.call(this.proto.taskService, "CreateTask", request, TaskMessageSchema);
  }

  getTask(request: GetTaskRequest): Promise<TaskMessage> {
    return this.call(this.proto.taskService, "GetTask", request, TaskMessageSchema);
  }

  updateTask(request: UpdateTaskRequest): Promise<TaskMessage> {
    return this.call(this.proto.taskService, "UpdateTask", request, TaskMessageSchema);
  }

  deleteTask(request: DeleteTaskRequest): Promise<Empty> {
    return this.call(this.proto.taskService, "DeleteTask", request, EmptySchema);
  }

  listTasks(request: ListTasksRequest = {}): Promise<ListTasksMessage> {
    return this.call(this.proto.taskService, "ListTasks", request, ListTasksMessageSchema);
  }

  assignTask(request: AssignTaskRequest): Promise<TaskMessage> {
    return this.call(this.proto.taskService, "AssignTask", request, TaskMessageSchema);
  }

  getUserTasks(request: GetUserTasksRequest = {}): Promise<ListTasksMessage> {
    return this.call(this.proto.taskService, "GetUserTasks", request, ListTasksMessageSchema);
  }

  getUser(request: GetUserRequest): Promise<UserMessage> {
    return this.call(this.proto.userService, "GetUser", request, UserMessageSchema);
  }

  validateToken(request: ValidateTokenRequest): Promise<ValidateTokenMessage> {
    return this.call(this.proto.userService, "ValidateToken", request, ValidateTokenMessageSchema);
  }

  private call<Req extends object, Res>(
    service: grpc.ServiceDefinition,
    method: string,
    request: Req,
    schema: ZodType<Res, ZodTypeDef, unknown>
  ): Promise<Res> {
    const definition = service[method];
    if (!definition) {
      return Promise.reject(new Error(`unknown method ${method}`));
    }

    const metadata = new grpc.Metadata();
    if (this.token) metadata.set("authorization", `Bearer ${this.token}`);

    const options: grpc.CallOptions = {};
    if (this.deadlineMs !== undefined) options.deadline = Date.now() + this.deadlineMs;

    return new Promise((resolve, reject) => {
      this.client.makeUnaryRequest<Req, Res>(
        definition.path,
        (value) => definition.requestSerialize(value),
        (buffer) => schema.parse(definition.responseDeserialize(buffer)),
        request,
        metadata,
        options,
        (err, response) => {
          if (err) {
            reject(err);
            return;
          }
          if (response === undefined) {
            reject(new Error(`${method} returned no response`));
            return;
          }
          resolve(response);
        }
      );
    });
  }
}
