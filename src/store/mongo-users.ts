import { ObjectId, type Collection, type Db, type Filter } from "mongodb";
import { NotFoundError } from "../domain/errors.js";
import type { NewUser, User, UserRepository } from "../domain/user.js";
import { normalizeWriteError, toObjectId } from "./mongo.js";

interface UserDocument {
  _id: ObjectId;
  username: string;
  email: string;
  password: string;
  first_name?: string;
  last_name?: string;
  created_at: Date;
  updated_at: Date;
}

function toUser(doc: UserDocument): User {
  return {
    id: doc._id.toHexString(),
    username: doc.username,
    email: doc.email,
    passwordHash: doc.password,
    ...(doc.first_name ? { firstName: doc.first_name } : {}),
    ...(doc.last_name ? { lastName: doc.last_name } : {}),
    createdAt: doc.created_at,
    updatedAt: doc.updated_at,
  };
}

export class MongoUserRepository implements UserRepository {
  private readonly collection: Collection<UserDocument>;

  constructor(
    db: Db,
    private readonly timeoutMs: number
  ) {
    this.collection = db.collection<UserDocument>("users");
  }

  /**
   * The unique indexes are what keeps usernames and emails unique under
   * concurrent registration, so failing to create them is fatal.
   */
  async ensureIndexes(): Promise<void> {
    await this.collection.createIndex({ username: 1 }, { unique: true });
    await this.collection.createIndex({ email: 1 }, { unique: true });
  }

  async findById(id: string): Promise<User> {
    const _id = toObjectId(id);
    if (!_id) throw new NotFoundError("user not found", { id });
    return this.findOne({ _id }, { id });
  }

  async findByEmail(email: string): Promise<User> {
    return this.findOne({ email }, { email });
  }

  async findByUsername(username: string): Promise<User> {
    return this.findOne({ username }, { username });
  }

  async create(data: NewUser): Promise<User> {
    const now = new Date();
    const doc: UserDocument = {
      _id: new ObjectId(),
      username: data.username,
      email: data.email,
      password: data.passwordHash,
      ...(data.firstName ? { first_name: data.firstName } : {}),
      ...(data.lastName ? { last_name: data.lastName } : {}),
      created_at: now,
      updated_at: now,
    };

    try {
      await this.collection.insertOne(doc, { maxTimeMS: this.timeoutMs });
    } catch (err) {
      throw normalizeWriteError(err);
    }
    return toUser(doc);
  }

  async update(user: User): Promise<User> {
    const _id = toObjectId(user.id);
    if (!_id) throw new NotFoundError("user not found", { id: user.id });

    const unset: Partial<Record<"first_name" | "last_name", "">> = {};
    if (!user.firstName) unset.first_name = "";
    if (!user.lastName) unset.last_name = "";

    let doc: UserDocument | null;
    try {
      doc = await this.collection.findOneAndUpdate(
        { _id },
        {
          $set: {
            email: user.email,
            password: user.passwordHash,
            ...(user.firstName ? { first_name: user.firstName } : {}),
            ...(user.lastName ? { last_name: user.lastName } : {}),
            updated_at: new Date(),
          },
          ...(Object.keys(unset).length > 0 ? { $unset: unset } : {}),
        },
        { returnDocument: "after", maxTimeMS: this.timeoutMs }
      );
    } catch (err) {
      throw normalizeWriteError(err);
    }

    if (!doc) throw new NotFoundError("user not found", { id: user.id });
    return toUser(doc);
  }

  async delete(id: string): Promise<void> {
    const _id = toObjectId(id);
    if (!_id) throw new NotFoundError("user not found", { id });

    const result = await this.collection.deleteOne({ _id }, { maxTimeMS: this.timeoutMs });
    if (result.deletedCount === 0) throw new NotFoundError("user not found", { id });
  }

  private async findOne(filter: Filter<UserDocument>, context: Record<string, unknown>): Promise<User> {
    const doc = await this.collection.findOne(filter, { maxTimeMS: this.timeoutMs });
    if (!doc) throw new NotFoundError("user not found", context);
    return toUser(doc);
  }
}
