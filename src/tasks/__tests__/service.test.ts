import { describe, it, expect, beforeEach } from "vitest";
import {
  AssigneeNotFoundError,
  CreatorNotFoundError,
  InvalidInputError,
  InvalidTransitionError,
  NotFoundError,
  UnauthorizedError,
} from "../../domain/errors.js";
import type { User } from "../../domain/user.js";
import { InMemoryTaskRepository, InMemoryUserRepository } from "../../store/memory.js";
import { TaskService } from "../service.js";

describe("TaskService", () => {
  let taskRepo: InMemoryTaskRepository;
  let tasks: TaskService;
  let alice: User;
  let bob: User;

  beforeEach(async () => {
    const userRepo = new InMemoryUserRepository();
    taskRepo = new InMemoryTaskRepository();
    tasks = new TaskService(taskRepo, userRepo);
    alice = await userRepo.create({ username: "alice", email: "alice@example.com", passwordHash: "x" });
    bob = await userRepo.create({ username: "bob", email: "bob@example.com", passwordHash: "x" });
  });

  describe("create()", () => {
    it("starts every task as pending", async () => {
      const task = await tasks.create({ title: "  Write report  ", priority: 3, createdBy: alice.id });

      expect(task.status).toBe("pending");
      expect(task.title).toBe("Write report");
      expect(task.description).toBe("");
      expect(task.dueDate).toBeUndefined();
      expect(task.assignedTo).toBeUndefined();
      expect(task.createdBy).toBe(alice.id);
    });

    it("requires a title", async () => {
      await expect(tasks.create({ title: "   ", priority: 3, createdBy: alice.id })).rejects.toThrow(
        "title is required"
      );
    });

    it.each([0, 6, 2.5])("rejects priority %s", async (priority) => {
      await expect(tasks.create({ title: "t", priority, createdBy: alice.id })).rejects.toThrow(
        "priority must be between 1 and 5"
      );
    });

    it("requires an existing creator", async () => {
      await expect(tasks.create({ title: "t", priority: 1, createdBy: "ghost" })).rejects.toBeInstanceOf(
        CreatorNotFoundError
      );
      expect(taskRepo.size()).toBe(0);
    });
  });

  describe("update()", () => {
    it("lets the creator change fields one at a time", async () => {
      const task = await tasks.create({ title: "t", description: "d", priority: 1, createdBy: alice.id });
      const updated = await tasks.update(task.id, { priority: 4 }, alice.id);

      expect(updated.priority).toBe(4);
      expect(updated.title).toBe("t");
      expect(updated.description).toBe("d");
      expect(updated.createdAt).toEqual(task.createdAt);
    });

    it("sets and clears the due date", async () => {
      const task = await tasks.create({ title: "t", priority: 1, createdBy: alice.id });
      const due = new Date("2026-03-01T00:00:00Z");

      expect((await tasks.update(task.id, { dueDate: due }, alice.id)).dueDate).toEqual(due);
      expect((await tasks.update(task.id, { dueDate: null }, alice.id)).dueDate).toBeUndefined();
    });

    it("clears the description with an empty string", async () => {
      const task = await tasks.create({ title: "t", description: "d", priority: 1, createdBy: alice.id });
      expect((await tasks.update(task.id, { description: "" }, alice.id)).description).toBe("");
    });

    it("rejects an empty title and a bad priority", async () => {
      const task = await tasks.create({ title: "t", priority: 1, createdBy: alice.id });
      await expect(tasks.update(task.id, { title: " " }, alice.id)).rejects.toThrow("title must not be empty");
      await expect(tasks.update(task.id, { priority: 9 }, alice.id)).rejects.toBeInstanceOf(InvalidInputError);
    });

    it("follows the status machine", async () => {
      const task = await tasks.create({ title: "t", priority: 1, createdBy: alice.id });

      await tasks.update(task.id, { status: "completed" }, alice.id);
      await expect(tasks.update(task.id, { status: "pending" }, alice.id)).rejects.toThrow(
        "invalid status transition from completed to pending"
      );
      await expect(tasks.update(task.id, { status: "completed" }, alice.id)).rejects.toBeInstanceOf(
        InvalidTransitionError
      );
      expect((await tasks.update(task.id, { status: "in_progress" }, alice.id)).status).toBe("in_progress");
    });

    it("refuses users who neither created nor were assigned the task", async () => {
      const task = await tasks.create({ title: "t", priority: 1, createdBy: alice.id });
      await expect(tasks.update(task.id, { title: "mine" }, bob.id)).rejects.toBeInstanceOf(UnauthorizedError);
      expect((await tasks.getById(task.id)).title).toBe("t");
    });

    it("lets the assignee edit", async () => {
      const task = await tasks.create({ title: "t", priority: 1, createdBy: alice.id });
      await tasks.assign(task.id, bob.id, alice.id);

      const updated = await tasks.update(task.id, { status: "completed" }, bob.id);
      expect(updated.status).toBe("completed");
      expect(updated.createdBy).toBe(alice.id);
    });

    it("raises NotFoundError for an unknown task", async () => {
      await expect(tasks.update("missing", { title: "x" }, alice.id)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("delete()", () => {
    it("is reserved to the creator", async () => {
      const task = await tasks.create({ title: "t", priority: 1, createdBy: alice.id });
      await tasks.assign(task.id, bob.id, alice.id);

      await expect(tasks.delete(task.id, bob.id)).rejects.toThrow("only the creator may delete this task");
      await tasks.delete(task.id, alice.id);
      await expect(tasks.getById(task.id)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("assign()", () => {
    it("starts a pending task", async () => {
      const task = await tasks.create({ title: "t", priority: 1, createdBy: alice.id });
      const assigned = await tasks.assign(task.id, bob.id, alice.id);

      expect(assigned.assignedTo).toBe(bob.id);
      expect(assigned.status).toBe("in_progress");
    });

    it("leaves a completed task completed", async () => {
      const task = await tasks.create({ title: "t", priority: 1, createdBy: alice.id });
      await tasks.update(task.id, { status: "completed" }, alice.id);
      expect((await tasks.assign(task.id, bob.id, alice.id)).status).toBe("completed");
    });

    it("is reserved to the creator", async () => {
      const task = await tasks.create({ title: "t", priority: 1, createdBy: alice.id });
      await expect(tasks.assign(task.id, bob.id, bob.id)).rejects.toThrow("only the creator may assign this task");
    });

    it("requires an existing assignee", async () => {
      const task = await tasks.create({ title: "t", priority: 1, createdBy: alice.id });
      await expect(tasks.assign(task.id, "ghost", alice.id)).rejects.toBeInstanceOf(AssigneeNotFoundError);
      expect((await tasks.getById(task.id)).status).toBe("pending");
    });
  });

  describe("listing", () => {
    it("orders by due date with undated tasks first", async () => {
      const late = await tasks.create({
        title: "late",
        priority: 1,
        dueDate: new Date("2026-03-01T00:00:00Z"),
        createdBy: alice.id,
      });
      const undated = await tasks.create({ title: "undated", priority: 1, createdBy: alice.id });
      const early = await tasks.create({
        title: "early",
        priority: 1,
        dueDate: new Date("2026-01-01T00:00:00Z"),
        createdBy: alice.id,
      });

      expect((await tasks.listAll()).map((t) => t.id)).toEqual([undated.id, early.id, late.id]);
    });

    it("filters by status", async () => {
      const a = await tasks.create({ title: "a", priority: 1, createdBy: alice.id });
      await tasks.create({ title: "b", priority: 1, createdBy: alice.id });
      await tasks.update(a.id, { status: "in_progress" }, alice.id);

      expect((await tasks.listByStatus("in_progress")).map((t) => t.id)).toEqual([a.id]);
      expect(await tasks.listByStatus("completed")).toEqual([]);
    });

    it("lists tasks a user created or was assigned", async () => {
      const own = await tasks.create({ title: "own", priority: 1, createdBy: alice.id });
      const handed = await tasks.create({ title: "handed", priority: 1, createdBy: bob.id });
      await tasks.create({ title: "bob only", priority: 1, createdBy: bob.id });
      await tasks.assign(handed.id, alice.id, bob.id);

      expect((await tasks.listByUser(alice.id)).map((t) => t.id)).toEqual([own.id, handed.id]);
      expect(await tasks.listByUser("nobody")).toEqual([]);
    });
  });
});
