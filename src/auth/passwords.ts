import bcrypt from "bcryptjs";
import { HashingError } from "../domain/errors.js";

/** bcrypt's own default work factor */
export const DEFAULT_BCRYPT_COST = 10;

export async function hashPassword(plaintext: string, cost: number = DEFAULT_BCRYPT_COST): Promise<string> {
  try {
    return await bcrypt.hash(plaintext, cost);
  } catch (err) {
    throw new HashingError(err);
  }
}

/**
 * Compare a plaintext password against a stored hash. A mismatch, or a hash
 * that bcrypt cannot parse, yields false.
 */
export async function verifyPassword(hash: string, plaintext: string): Promise<boolean> {
  try {
    return await bcrypt.compare(plaintext, hash);
  } catch (err) {
    console.warn("[auth] Password comparison failed:", err instanceof Error ? err.message : err);
    return false;
  }
}
