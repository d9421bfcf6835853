import type { Config } from "../config.js";
import type { Repositories } from "../services.js";
import { InMemoryTaskRepository, InMemoryUserRepository } from "./memory.js";
import { connectMongo } from "./mongo.js";
import { MongoTaskRepository } from "./mongo-tasks.js";
import { MongoUserRepository } from "./mongo-users.js";

export interface Store extends Repositories {
  close(): Promise<void>;
}

/** Repositories for the configured driver, indexes in place. */
export async function openStore(config: Readonly<Config>): Promise<Store> {
  const { store } = config;

  if (store.driver === "memory") {
    console.log("[store] Using in-memory repositories; data is lost on exit");
    return {
      users: new InMemoryUserRepository(),
      tasks: new InMemoryTaskRepository(),
      close: async () => {},
    };
  }

  const connection = await connectMongo({
    uri: store.uri,
    database: store.database,
    timeoutMs: store.timeoutMs,
    appName: config.app.name,
  });

  const users = new MongoUserRepository(connection.db, store.timeoutMs);
  const tasks = new MongoTaskRepository(connection.db, store.timeoutMs);
  try {
    await users.ensureIndexes();
    await tasks.ensureIndexes();
  } catch (err) {
    await connection.close();
    throw err;
  }

  return { users, tasks, close: connection.close };
}
