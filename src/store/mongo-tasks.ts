import { ObjectId, type Collection, type Db, type Filter } from "mongodb";
import { NotFoundError } from "../domain/errors.js";
import type { NewTask, Task, TaskFilter, TaskRepository, TaskStatus } from "../domain/task.js";
import { normalizeWriteError, toObjectId } from "./mongo.js";

interface TaskDocument {
  _id: ObjectId;
  title: string;
  description: string;
  status: TaskStatus;
  priority: number;
  due_date?: Date;
  assigned_to?: ObjectId;
  created_by: ObjectId;
  created_at: Date;
  updated_at: Date;
}

function toTask(doc: TaskDocument): Task {
  return {
    id: doc._id.toHexString(),
    title: doc.title,
    description: doc.description,
    status: doc.status,
    priority: doc.priority,
    ...(doc.due_date ? { dueDate: doc.due_date } : {}),
    ...(doc.assigned_to ? { assignedTo: doc.assigned_to.toHexString() } : {}),
    createdBy: doc.created_by.toHexString(),
    createdAt: doc.created_at,
    updatedAt: doc.updated_at,
  };
}

const SORT_BY_DUE_DATE = { due_date: 1 } as const;

export class MongoTaskRepository implements TaskRepository {
  private readonly collection: Collection<TaskDocument>;

  constructor(
    db: Db,
    private readonly timeoutMs: number
  ) {
    this.collection = db.collection<TaskDocument>("tasks");
  }

  /** Query indexes only; the service works without them, just slower. */
  async ensureIndexes(): Promise<void> {
    try {
      await this.collection.createIndexes([
        { key: { created_by: 1 } },
        { key: { assigned_to: 1 } },
        { key: { status: 1 } },
        { key: { due_date: 1 } },
      ]);
    } catch (err) {
      console.warn("[store] Failed to ensure task indexes (continuing):", err);
    }
  }

  async findById(id: string): Promise<Task> {
    const _id = toObjectId(id);
    if (!_id) throw new NotFoundError("task not found", { id });

    const doc = await this.collection.findOne({ _id }, { maxTimeMS: this.timeoutMs });
    if (!doc) throw new NotFoundError("task not found", { id });
    return toTask(doc);
  }

  async findAll(filter: TaskFilter = {}): Promise<Task[]> {
    const query: Filter<TaskDocument> = {};
    if (filter.status !== undefined) query.status = filter.status;
    if (filter.createdBy !== undefined) {
      const createdBy = toObjectId(filter.createdBy);
      if (!createdBy) return [];
      query.created_by = createdBy;
    }
    if (filter.assignedTo !== undefined) {
      const assignedTo = toObjectId(filter.assignedTo);
      if (!assignedTo) return [];
      query.assigned_to = assignedTo;
    }
    return this.find(query);
  }

  async create(data: NewTask): Promise<Task> {
    const createdBy = toObjectId(data.createdBy);
    if (!createdBy) throw new NotFoundError("creator user not found", { id: data.createdBy });
    const assignedTo = data.assignedTo ? toObjectId(data.assignedTo) : null;

    const now = new Date();
    const doc: TaskDocument = {
      _id: new ObjectId(),
      title: data.title,
      description: data.description,
      status: data.status,
      priority: data.priority,
      ...(data.dueDate ? { due_date: data.dueDate } : {}),
      ...(assignedTo ? { assigned_to: assignedTo } : {}),
      created_by: createdBy,
      created_at: now,
      updated_at: now,
    };

    try {
      await this.collection.insertOne(doc, { maxTimeMS: this.timeoutMs });
    } catch (err) {
      throw normalizeWriteError(err);
    }
    return toTask(doc);
  }

  /**
   * Writes every mutable field of `task`. created_by and created_at are left
   * out of the $set so they can never change.
   */
  async update(task: Task): Promise<Task> {
    const _id = toObjectId(task.id);
    if (!_id) throw new NotFoundError("task not found", { id: task.id });
    const assignedTo = task.assignedTo ? toObjectId(task.assignedTo) : null;

    const unset: Partial<Record<"due_date" | "assigned_to", "">> = {};
    if (!task.dueDate) unset.due_date = "";
    if (!assignedTo) unset.assigned_to = "";

    const doc = await this.collection.findOneAndUpdate(
      { _id },
      {
        $set: {
          title: task.title,
          description: task.description,
          status: task.status,
          priority: task.priority,
          ...(task.dueDate ? { due_date: task.dueDate } : {}),
          ...(assignedTo ? { assigned_to: assignedTo } : {}),
          updated_at: new Date(),
        },
        ...(Object.keys(unset).length > 0 ? { $unset: unset } : {}),
      },
      { returnDocument: "after", maxTimeMS: this.timeoutMs }
    );

    if (!doc) throw new NotFoundError("task not found", { id: task.id });
    return toTask(doc);
  }

  async delete(id: string): Promise<void> {
    const _id = toObjectId(id);
    if (!_id) throw new NotFoundError("task not found", { id });

    const result = await this.collection.deleteOne({ _id }, { maxTimeMS: this.timeoutMs });
    if (result.deletedCount === 0) throw new NotFoundError("task not found", { id });
  }

  async findByUser(userId: string): Promise<Task[]> {
    const id = toObjectId(userId);
    if (!id) return [];
    return this.find({ $or: [{ created_by: id }, { assigned_to: id }] });
  }

  async findByStatus(status: TaskStatus): Promise<Task[]> {
    return this.find({ status });
  }

  private async find(query: Filter<TaskDocument>): Promise<Task[]> {
    const docs = await this.collection
      .find(query, { maxTimeMS: this.timeoutMs })
      .sort(SORT_BY_DUE_DATE)
      .toArray();
    return docs.map(toTask);
  }
}
