import { Router } from "express";
import { z } from "zod";
import { authorizeResourceAccess } from "../auth/service.js";
import { callerId } from "../auth.js";
import { toPublicUser } from "../domain/user.js";
import { toTaskView } from "../domain/task.js";
import type { TaskService } from "../tasks/service.js";
import type { UserDirectory } from "../users/service.js";
import { noContent, ok, parseRequest, route } from "./respond.js";

const UpdateUserSchema = z.object({
  email: z.string().optional(),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
  password: z.string().optional(),
});

/**
 * Mounted behind the auth middleware.
 *
 * GET    /me
 * GET    /users/:id
 * PUT    /users/:id        self only
 * DELETE /users/:id        self only
 * GET    /users/:id/tasks  tasks the user created or is assigned to
 */
export function createUsersRouter(users: UserDirectory, tasks: TaskService, timeoutMs: number): Router {
  const router = Router();

  router.get(
    "/me",
    route("get-profile", timeoutMs, async (req) => ok(toPublicUser(await users.getById(callerId(req)))))
  );

  router.get(
    "/users/:id",
    route("get-user", timeoutMs, async (req) => ok(toPublicUser(await users.getById(req.params.id))))
  );

  router.put(
    "/users/:id",
    route("update-user", timeoutMs, async (req) => {
      authorizeResourceAccess(callerId(req), { kind: "user", user: { id: req.params.id } });

      const body = parseRequest(UpdateUserSchema, req.body);
      return ok(toPublicUser(await users.update(req.params.id, body)));
    })
  );

  router.delete(
    "/users/:id",
    route("delete-user", timeoutMs, async (req) => {
      authorizeResourceAccess(callerId(req), { kind: "user", user: { id: req.params.id } });

      await users.delete(req.params.id);
      console.log(`[users] Deleted user ${req.params.id}`);
      return noContent();
    })
  );

  router.get(
    "/users/:id/tasks",
    route("list-user-tasks", timeoutMs, async (req) => {
      const list = await tasks.listByUser(req.params.id);
      return ok(list.map(toTaskView));
    })
  );

  return router;
}
