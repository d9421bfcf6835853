import { Router } from "express";
import { z } from "zod";
import { callerId } from "../auth.js";
import { TaskStatusSchema, toTaskView } from "../domain/task.js";
import type { TaskService } from "../tasks/service.js";
import { created, noContent, ok, parseRequest, route } from "./respond.js";

const IsoDate = z
  .string()
  .datetime({ offset: true, message: "must be an ISO-8601 date-time" })
  .transform((s) => new Date(s));

const CreateTaskSchema = z.object({
  title: z.string(),
  description: z.string().optional(),
  priority: z.number({ required_error: "priority is required" }),
  dueDate: IsoDate.optional(),
});

// Absent keys mean "leave unchanged"; dueDate: null clears the due date
const UpdateTaskSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  status: TaskStatusSchema.optional(),
  priority: z.number().optional(),
  dueDate: IsoDate.nullable().optional(),
});

const AssignTaskSchema = z.object({
  assigneeId: z.string().min(1, "assigneeId is required"),
});

const ListQuerySchema = z.object({
  status: TaskStatusSchema.optional(),
});

/**
 * Mounted at /tasks behind the auth middleware. The acting user is always
 * the authenticated caller.
 */
export function createTasksRouter(tasks: TaskService, timeoutMs: number): Router {
  const router = Router();

  // GET / — all tasks, or only those in ?status=
  router.get(
    "/",
    route("list-tasks", timeoutMs, async (req) => {
      const { status } = parseRequest(ListQuerySchema, req.query, "query");
      const list = status ? await tasks.listByStatus(status) : await tasks.listAll();
      return ok(list.map(toTaskView));
    })
  );

  // POST / — create a task owned by the caller
  router.post(
    "/",
    route("create-task", timeoutMs, async (req) => {
      const body = parseRequest(CreateTaskSchema, req.body);
      const task = await tasks.create({ ...body, createdBy: callerId(req) });
      return created(toTaskView(task));
    })
  );

  router.get(
    "/:id",
    route("get-task", timeoutMs, async (req) => ok(toTaskView(await tasks.getById(req.params.id))))
  );

  // PUT /:id — partial update by the creator or the assignee
  router.put(
    "/:id",
    route("update-task", timeoutMs, async (req) => {
      const body = parseRequest(UpdateTaskSchema, req.body);
      const task = await tasks.update(req.params.id, body, callerId(req));
      return ok(toTaskView(task));
    })
  );

  router.delete(
    "/:id",
    route("delete-task", timeoutMs, async (req) => {
      await tasks.delete(req.params.id, callerId(req));
      return noContent();
    })
  );

  // POST /:id/assign — creator hands the task to another user
  router.post(
    "/:id/assign",
    route("assign-task", timeoutMs, async (req) => {
      const { assigneeId } = parseRequest(AssignTaskSchema, req.body);
      const task = await tasks.assign(req.params.id, assigneeId, callerId(req));
      return ok(toTaskView(task));
    })
  );

  return router;
}
