import { z } from "zod";

export interface User {
  id: string;
  username: string;
  email: string;
  /** bcrypt hash; never leaves the process, see toPublicUser */
  passwordHash: string;
  firstName?: string;
  lastName?: string;
  createdAt: Date;
  updatedAt: Date;
}

export type NewUser = Omit<User, "id" | "createdAt" | "updatedAt">;

export interface PublicUser {
  id: string;
  username: string;
  email: string;
  firstName?: string;
  lastName?: string;
  createdAt: string;
  updatedAt: string;
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    ...(user.firstName ? { firstName: user.firstName } : {}),
    ...(user.lastName ? { lastName: user.lastName } : {}),
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
}

export const MIN_USERNAME_LENGTH = 3;
export const MIN_PASSWORD_LENGTH = 6;

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+\-]+@[a-zA-Z0-9.\-]+\.[a-zA-Z]{2,}$/;

export const EmailSchema = z.string().regex(EMAIL_PATTERN, "invalid email format");

export function isValidEmail(value: string): boolean {
  return EmailSchema.safeParse(value).success;
}

/**
 * Storage contract for users. Lookups raise NotFoundError for absent keys;
 * create/update raise DuplicateKeyError when username or email collide.
 */
export interface UserRepository {
  findById(id: string): Promise<User>;
  findByEmail(email: string): Promise<User>;
  findByUsername(username: string): Promise<User>;
  create(user: NewUser): Promise<User>;
  update(user: User): Promise<User>;
  delete(id: string): Promise<void>;
}
