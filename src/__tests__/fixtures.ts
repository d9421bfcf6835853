import { loadConfig, type Config } from "../config.js";
import { createServices, type Services } from "../services.js";
import { InMemoryTaskRepository, InMemoryUserRepository } from "../store/memory.js";

export const TEST_SECRET = "test-secret";

/** Memory store, cheap bcrypt and a login limit tests will not hit. */
export function testConfig(env: Record<string, string> = {}): Readonly<Config> {
  return loadConfig({
    JWT_SECRET: TEST_SECRET,
    STORE_DRIVER: "memory",
    BCRYPT_COST: "4",
    LOGIN_RATE_LIMIT: "1000",
    ...env,
  });
}

export interface TestContext {
  config: Readonly<Config>;
  users: InMemoryUserRepository;
  tasks: InMemoryTaskRepository;
  services: Services;
}

export function createTestContext(env: Record<string, string> = {}, now?: () => Date): TestContext {
  const config = testConfig(env);
  const users = new InMemoryUserRepository();
  const tasks = new InMemoryTaskRepository();
  return { config, users, tasks, services: createServices(config, { users, tasks }, now) };
}
