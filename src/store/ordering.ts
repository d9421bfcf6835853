import type { Task } from "../domain/task.js";

/**
 * Due date ascending, tasks without one first (MongoDB sorts a missing
 * field before any date). Ties keep their existing order.
 */
export function byDueDate(a: Task, b: Task): number {
  const left = a.dueDate ? a.dueDate.getTime() : Number.NEGATIVE_INFINITY;
  const right = b.dueDate ? b.dueDate.getTime() : Number.NEGATIVE_INFINITY;
  if (left === right) return 0;
  return left < right ? -1 : 1;
}
