import {
  DuplicateEmailError,
  DuplicateKeyError,
  DuplicateUsernameError,
  InvalidCredentialsError,
  InvalidInputError,
  NotFoundError,
} from "../domain/errors.js";
import {
  MIN_PASSWORD_LENGTH,
  MIN_USERNAME_LENGTH,
  isValidEmail,
  type User,
  type UserRepository,
} from "../domain/user.js";
import { DEFAULT_BCRYPT_COST, hashPassword, verifyPassword } from "../auth/passwords.js";

export interface RegisterInput {
  username: string;
  email: string;
  password: string;
  firstName?: string;
  lastName?: string;
}

/** Fields left undefined are not touched. */
export interface UpdateUserInput {
  email?: string;
  firstName?: string;
  lastName?: string;
  password?: string;
}

export interface UserDirectoryOptions {
  bcryptCost?: number;
}

export class UserDirectory {
  private readonly bcryptCost: number;

  constructor(
    private readonly users: UserRepository,
    options: UserDirectoryOptions = {}
  ) {
    this.bcryptCost = options.bcryptCost ?? DEFAULT_BCRYPT_COST;
  }

  async register(input: RegisterInput): Promise<User> {
    validateRegistration(input);

    // Fast path only. The unique indexes in the store settle a race between
    // two registrations; that surfaces below as a DuplicateKeyError.
    if (await this.exists(() => this.users.findByEmail(input.email))) {
      throw new DuplicateEmailError();
    }
    if (await this.exists(() => this.users.findByUsername(input.username))) {
      throw new DuplicateUsernameError();
    }

    const passwordHash = await hashPassword(input.password, this.bcryptCost);

    try {
      return await this.users.create({
        username: input.username,
        email: input.email,
        passwordHash,
        ...(input.firstName ? { firstName: input.firstName } : {}),
        ...(input.lastName ? { lastName: input.lastName } : {}),
      });
    } catch (err) {
      throw normalizeDuplicate(err);
    }
  }

  getById(id: string): Promise<User> {
    return this.users.findById(id);
  }

  async getByEmail(email: string): Promise<User> {
    if (!isValidEmail(email)) throw new InvalidInputError("invalid email format");
    return this.users.findByEmail(email);
  }

  async getByUsername(username: string): Promise<User> {
    if (username.length < MIN_USERNAME_LENGTH) {
      throw new InvalidInputError(`username must be at least ${MIN_USERNAME_LENGTH} characters long`);
    }
    return this.users.findByUsername(username);
  }

  /**
   * Update a user's profile. The caller is expected to have checked that the
   * authenticated user is the one being updated.
   */
  async update(id: string, input: UpdateUserInput): Promise<User> {
    const current = await this.users.findById(id);
    const next: User = { ...current };

    const email = input.email;
    if (email !== undefined && email !== current.email) {
      if (!isValidEmail(email)) throw new InvalidInputError("invalid email format");

      const other = await this.findOrNull(() => this.users.findByEmail(email));
      if (other && other.id !== current.id) throw new DuplicateEmailError();

      next.email = email;
    }

    // an empty string clears the name
    if (input.firstName !== undefined) next.firstName = input.firstName || undefined;
    if (input.lastName !== undefined) next.lastName = input.lastName || undefined;

    if (input.password !== undefined) {
      if (input.password.length < MIN_PASSWORD_LENGTH) {
        throw new InvalidInputError(`password must be at least ${MIN_PASSWORD_LENGTH} characters long`);
      }
      next.passwordHash = await hashPassword(input.password, this.bcryptCost);
    }

    try {
      return await this.users.update(next);
    } catch (err) {
      throw normalizeDuplicate(err);
    }
  }

  delete(id: string): Promise<void> {
    return this.users.delete(id);
  }

  /**
   * Resolve a login (email when it looks like one, username otherwise) and
   * check the password. Unknown login and wrong password fail identically.
   */
  async validateCredentials(login: string, password: string): Promise<User> {
    const user = await this.findOrNull(() =>
      isValidEmail(login) ? this.users.findByEmail(login) : this.users.findByUsername(login)
    );
    if (!user) throw new InvalidCredentialsError();

    if (!(await verifyPassword(user.passwordHash, password))) {
      throw new InvalidCredentialsError();
    }
    return user;
  }

  private async findOrNull(lookup: () => Promise<User>): Promise<User | null> {
    try {
      return await lookup();
    } catch (err) {
      if (err instanceof NotFoundError) return null;
      throw err;
    }
  }

  private async exists(lookup: () => Promise<User>): Promise<boolean> {
    return (await this.findOrNull(lookup)) !== null;
  }
}

function validateRegistration(input: RegisterInput): void {
  if (input.username.length < MIN_USERNAME_LENGTH) {
    throw new InvalidInputError(`username must be at least ${MIN_USERNAME_LENGTH} characters long`);
  }
  if (!isValidEmail(input.email)) {
    throw new InvalidInputError("invalid email format");
  }
  if (input.password.length < MIN_PASSWORD_LENGTH) {
    throw new InvalidInputError(`password must be at least ${MIN_PASSWORD_LENGTH} characters long`);
  }
}

function normalizeDuplicate(err: unknown): unknown {
  if (err instanceof DuplicateKeyError && !(err instanceof DuplicateEmailError || err instanceof DuplicateUsernameError)) {
    if (err.field === "email") return new DuplicateEmailError();
    if (err.field === "username") return new DuplicateUsernameError();
  }
  return err;
}
