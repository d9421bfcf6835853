import { describe, it, expect, vi } from "vitest";
import { hashPassword, verifyPassword } from "../passwords.js";

describe("hashPassword()", () => {
  it("produces a bcrypt hash that is not the plaintext", async () => {
    const hash = await hashPassword("secret123", 4);
    expect(hash).not.toBe("secret123");
    expect(hash.startsWith("$2")).toBe(true);
  });

  it("salts every hash", async () => {
    const [a, b] = await Promise.all([hashPassword("secret123", 4), hashPassword("secret123", 4)]);
    expect(a).not.toBe(b);
  });
});

describe("verifyPassword()", () => {
  it("accepts the matching password", async () => {
    const hash = await hashPassword("secret123", 4);
    expect(await verifyPassword(hash, "secret123")).toBe(true);
  });

  it("rejects a different password", async () => {
    const hash = await hashPassword("secret123", 4);
    expect(await verifyPassword(hash, "secret124")).toBe(false);
  });

  it("returns false for a hash bcrypt cannot parse", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(await verifyPassword("not-a-hash", "secret123")).toBe(false);
    warn.mockRestore();
  });
});
