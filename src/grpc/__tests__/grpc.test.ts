import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import { status } from "@grpc/grpc-js";
import type { User } from "../../domain/user.js";
import { createTestContext, type TestContext } from "../../__tests__/fixtures.js";
import { TaskClient } from "../client.js";
import { GrpcServer } from "../server.js";

// 2026-01-01T00:00:00Z
const NEW_YEAR = { seconds: "1767225600", nanos: 0 };

describe("gRPC services", () => {
  let ctx: TestContext;
  let server: GrpcServer;
  let alice: User;
  let bob: User;
  let asAlice: TaskClient;
  let asBob: TaskClient;
  let anonymous: TaskClient;
  let address = "";

  beforeAll(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    ctx = createTestContext();
    server = new GrpcServer(ctx.services, ctx.config.requestTimeoutMs);
    const port = await server.start("127.0.0.1", 0);
    address = `127.0.0.1:${port}`;

    alice = await ctx.services.users.register({ username: "alice", email: "alice@example.com", password: "secret123" });
    bob = await ctx.services.users.register({ username: "bob", email: "bob@example.com", password: "secret123" });

    asAlice = new TaskClient(address);
    asAlice.setToken((await ctx.services.auth.login("alice", "secret123")).accessToken);
    asBob = new TaskClient(address);
    asBob.setToken((await ctx.services.auth.login("bob", "secret123")).accessToken);
    anonymous = new TaskClient(address);
  });

  afterAll(async () => {
    asAlice.close();
    asBob.close();
    anonymous.close();
    await server.stop(1000);
    vi.restoreAllMocks();
  });

  describe("TaskService", () => {
    it("requires authorization metadata", async () => {
      await expect(anonymous.createTask({ title: "t", priority: 1 })).rejects.toMatchObject({
        code: status.UNAUTHENTICATED,
        details: "authorization metadata is required",
      });
    });

    it("rejects a bad token", async () => {
      const client = new TaskClient(address);
      client.setToken("not-a-token");
      await expect(client.listTasks()).rejects.toMatchObject({
        code: status.UNAUTHENTICATED,
        details: "invalid or expired token",
      });
      client.close();
    });

    it("creates a pending task for the caller", async () => {
      const task = await asAlice.createTask({ title: "Report", description: "Q1", priority: 2, due_date: NEW_YEAR });

      expect(task).toMatchObject({
        title: "Report",
        description: "Q1",
        status: "TASK_STATUS_PENDING",
        priority: 2,
        due_date: NEW_YEAR,
        assigned_to: "",
        created_by: alice.id,
      });
      expect(task.created_at).not.toBeNull();
    });

    it("leaves due_date null when none was given", async () => {
      const task = await asAlice.createTask({ title: "Undated", priority: 1 });
      expect(task.due_date).toBeNull();
    });

    it("refuses to create on behalf of someone else", async () => {
      await expect(asAlice.createTask({ title: "t", priority: 1, created_by: bob.id })).rejects.toMatchObject({
        code: status.PERMISSION_DENIED,
        details: "cannot act on behalf of another user",
      });
    });

    it("maps validation failures to INVALID_ARGUMENT", async () => {
      await expect(asAlice.createTask({ title: "t", priority: 0 })).rejects.toMatchObject({
        code: status.INVALID_ARGUMENT,
        details: "priority must be between 1 and 5",
      });
      await expect(asAlice.getTask({ id: "" })).rejects.toMatchObject({
        code: status.INVALID_ARGUMENT,
        details: "id is required",
      });
    });

    it("rejects a due_date outside the timestamp range", async () => {
      const farFuture = { seconds: "99999999999999999", nanos: 0 };
      await expect(asAlice.createTask({ title: "Far", priority: 1, due_date: farFuture })).rejects.toMatchObject({
        code: status.INVALID_ARGUMENT,
        details: "invalid due_date",
      });

      const task = await asAlice.createTask({ title: "Near", priority: 1 });
      await expect(asAlice.updateTask({ id: task.id, due_date: farFuture })).rejects.toMatchObject({
        code: status.INVALID_ARGUMENT,
        details: "invalid due_date",
      });
      await expect(asAlice.getTask({ id: task.id })).resolves.toMatchObject({ due_date: null });
    });

    it("answers NOT_FOUND for unknown tasks", async () => {
      await expect(asAlice.getTask({ id: "missing" })).rejects.toMatchObject({
        code: status.NOT_FOUND,
        details: "task not found",
      });
    });

    it("treats zero values in an update as unchanged", async () => {
      const task = await asAlice.createTask({ title: "Keep", description: "body", priority: 3 });
      const updated = await asAlice.updateTask({ id: task.id, priority: 5 });

      expect(updated).toMatchObject({ title: "Keep", description: "body", priority: 5, status: "TASK_STATUS_PENDING" });
    });

    it("enforces the status machine", async () => {
      const task = await asAlice.createTask({ title: "Flow", priority: 1 });
      await asAlice.updateTask({ id: task.id, status: "TASK_STATUS_COMPLETED" });

      await expect(asAlice.updateTask({ id: task.id, status: "TASK_STATUS_PENDING" })).rejects.toMatchObject({
        code: status.FAILED_PRECONDITION,
        details: "invalid status transition from completed to pending",
      });
    });

    it("assigns, lists and deletes", async () => {
      const task = await asAlice.createTask({ title: "Handoff", priority: 4 });

      const assigned = await asAlice.assignTask({ task_id: task.id, assignee_id: bob.id });
      expect(assigned).toMatchObject({ status: "TASK_STATUS_IN_PROGRESS", assigned_to: bob.id });

      const bobs = await asBob.getUserTasks();
      expect(bobs.tasks.map((t) => t.id)).toEqual([task.id]);

      const inProgress = await asAlice.listTasks({ status: "TASK_STATUS_IN_PROGRESS" });
      expect(inProgress.tasks.map((t) => t.id)).toEqual([task.id]);

      await expect(asBob.deleteTask({ id: task.id })).rejects.toMatchObject({ code: status.PERMISSION_DENIED });
      await expect(asAlice.deleteTask({ id: task.id })).resolves.toEqual({});
      await expect(asAlice.getTask({ id: task.id })).rejects.toMatchObject({ code: status.NOT_FOUND });
    });

    it("lists every task when no status is given", async () => {
      const all = await asBob.listTasks();
      expect(all.tasks.length).toBe((await ctx.services.tasks.listAll()).length);
    });
  });

  describe("UserService", () => {
    it("returns a user without the password hash", async () => {
      const user = await asBob.getUser({ id: alice.id });
      expect(user).toMatchObject({
        id: alice.id,
        username: "alice",
        email: "alice@example.com",
        first_name: "",
        last_name: "",
      });
      expect(user).not.toHaveProperty("password");
    });

    it("validates tokens without authorization metadata", async () => {
      const { accessToken } = await ctx.services.auth.login("alice", "secret123");

      await expect(anonymous.validateToken({ token: accessToken })).resolves.toEqual({
        user_id: alice.id,
        username: "alice",
        valid: true,
      });
      await expect(anonymous.validateToken({ token: "not-a-token" })).resolves.toEqual({
        user_id: "",
        username: "",
        valid: false,
      });
      await expect(anonymous.validateToken({ token: "" })).rejects.toMatchObject({
        code: status.INVALID_ARGUMENT,
        details: "token is required",
      });
    });
  });
});
