import * as grpc from "@grpc/grpc-js";
import type { Services } from "../services.js";
import { loadTaskProto } from "./proto.js";
import { createTaskServiceHandlers } from "./task-service.js";
import { createUserServiceHandlers } from "./user-service.js";

const MAX_MESSAGE_BYTES = 4 * 1024 * 1024;

/** TaskService and UserService over one grpc-js server. */
export class GrpcServer {
  private readonly server: grpc.Server;

  constructor(services: Services, timeoutMs: number) {
    const proto = loadTaskProto();
    this.server = new grpc.Server({
      "grpc.max_receive_message_length": MAX_MESSAGE_BYTES,
      "grpc.max_send_message_length": MAX_MESSAGE_BYTES,
    });
    this.server.addService(
      proto.taskService,
      createTaskServiceHandlers(services.auth, services.tasks, timeoutMs)
    );
    this.server.addService(
      proto.userService,
      createUserServiceHandlers(services.auth, services.tokens, services.users, timeoutMs)
    );
  }

  /** Bind and serve. Resolves with the bound port, useful when `port` is 0. */
  start(host: string, port: number): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.bindAsync(`${host}:${port}`, grpc.ServerCredentials.createInsecure(), (err, boundPort) => {
        if (err) {
          reject(err);
          return;
        }
        console.log(`[grpc] Server listening on ${host}:${boundPort}`);
        resolve(boundPort);
      });
    });
  }

  /**
   * Let in-flight calls finish, then close. Falls back to a hard shutdown if
   * they have not finished within `graceMs`.
   */
  stop(graceMs = 5000): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        console.warn(`[grpc] Graceful stop exceeded ${graceMs}ms, forcing shutdown`);
        this.server.forceShutdown();
        resolve();
      }, graceMs);

      this.server.tryShutdown((err) => {
        clearTimeout(timer);
        if (err) {
          console.warn("[grpc] tryShutdown failed, forcing shutdown:", err);
          this.server.forceShutdown();
        }
        resolve();
      });
    });
  }
}
