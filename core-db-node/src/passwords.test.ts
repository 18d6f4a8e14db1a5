import bcrypt from "bcryptjs";
import { describe, expect, it } from "vitest";
import { hashPassword } from "./passwords";

describe("hashPassword", () => {
  it("produces a bcrypt hash of the password", async () => {
    const password_hash = await hashPassword("test-password", 4);

    expect(password_hash).not.toBe("test-password");
    expect(password_hash.startsWith("$2")).toBe(true);
    await expect(bcrypt.compare("test-password", password_hash)).resolves.toBe(true);
    await expect(bcrypt.compare("test-passwor", password_hash)).resolves.toBe(false);
  });
});
