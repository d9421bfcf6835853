import path from "path";
import { fileURLToPath } from "url";
import type { ServiceDefinition } from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// src/grpc and dist/grpc both sit two levels below the project root
export const PROTO_PATH = path.resolve(__dirname, "../../proto/task.proto");

const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

export interface TaskProto {
  taskService: ServiceDefinition;
  userService: ServiceDefinition;
}

let cached: TaskProto | undefined;

/** Parse task.proto once per process. */
export function loadTaskProto(): TaskProto {
  if (cached) return cached;

  const definition = protoLoader.loadSync(PROTO_PATH, LOADER_OPTIONS);
  cached = {
    taskService: serviceDefinition(definition, "task.TaskService"),
    userService: serviceDefinition(definition, "task.UserService"),
  };
  return cached;
}

function serviceDefinition(definition: protoLoader.PackageDefinition, name: string): ServiceDefinition {
  const entry = definition[name];
  // Message and enum definitions carry a `format`; services do not
  if (!entry || "format" in entry) {
    throw new Error(`${name} is not a service in ${PROTO_PATH}`);
  }
  return entry;
}
