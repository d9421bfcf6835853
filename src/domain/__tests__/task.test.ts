import { describe, it, expect } from "vitest";
import { canTransition, isValidPriority, toTaskView, type Task, type TaskStatus } from "../task.js";
import { isValidEmail, toPublicUser, type User } from "../user.js";

describe("canTransition()", () => {
  const cases: Array<[TaskStatus, TaskStatus, boolean]> = [
    ["pending", "pending", false],
    ["pending", "in_progress", true],
    ["pending", "completed", true],
    ["in_progress", "pending", false],
    ["in_progress", "in_progress", false],
    ["in_progress", "completed", true],
    ["completed", "pending", false],
    ["completed", "in_progress", true],
    ["completed", "completed", false],
  ];

  for (const [from, to, allowed] of cases) {
    it(`${from} -> ${to} is ${allowed ? "allowed" : "refused"}`, () => {
      expect(canTransition(from, to)).toBe(allowed);
    });
  }
});

describe("isValidPriority()", () => {
  it("accepts integers from 1 to 5", () => {
    expect([1, 2, 3, 4, 5].every(isValidPriority)).toBe(true);
  });

  it("rejects out-of-range and fractional values", () => {
    expect(isValidPriority(0)).toBe(false);
    expect(isValidPriority(6)).toBe(false);
    expect(isValidPriority(2.5)).toBe(false);
    expect(isValidPriority(Number.NaN)).toBe(false);
  });
});

describe("toTaskView()", () => {
  const base: Task = {
    id: "t1",
    title: "Write report",
    description: "",
    status: "pending",
    priority: 2,
    createdBy: "u1",
    createdAt: new Date("2026-01-01T00:00:00Z"),
    updatedAt: new Date("2026-01-02T00:00:00Z"),
  };

  it("renders absent due date and assignee as null", () => {
    expect(toTaskView(base)).toEqual({
      id: "t1",
      title: "Write report",
      description: "",
      status: "pending",
      priority: 2,
      dueDate: null,
      assignedTo: null,
      createdBy: "u1",
      createdAt: "2026-01-01T00:00:00.000Z",
      updatedAt: "2026-01-02T00:00:00.000Z",
    });
  });

  it("renders dates as ISO strings", () => {
    const view = toTaskView({ ...base, dueDate: new Date("2026-02-01T12:00:00Z"), assignedTo: "u2" });
    expect(view.dueDate).toBe("2026-02-01T12:00:00.000Z");
    expect(view.assignedTo).toBe("u2");
  });
});

describe("users", () => {
  it("validates email addresses", () => {
    expect(isValidEmail("alice@example.com")).toBe(true);
    expect(isValidEmail("a.b+c@sub.example.org")).toBe(true);
    expect(isValidEmail("alice@example")).toBe(false);
    expect(isValidEmail("alice.example.com")).toBe(false);
    expect(isValidEmail("")).toBe(false);
  });

  it("never exposes the password hash", () => {
    const user: User = {
      id: "u1",
      username: "alice",
      email: "alice@example.com",
      passwordHash: "$2a$04$hash",
      firstName: "Alice",
      createdAt: new Date("2026-01-01T00:00:00Z"),
      updatedAt: new Date("2026-01-01T00:00:00Z"),
    };
    expect(toPublicUser(user)).toEqual({
      id: "u1",
      username: "alice",
      email: "alice@example.com",
      firstName: "Alice",
      createdAt: "2026-01-01T00:00:00.000Z",
      updatedAt: "2026-01-01T00:00:00.000Z",
    });
  });
});
