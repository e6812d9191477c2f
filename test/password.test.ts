import { describe, expect, it } from "vitest";
import { createBcryptPasswordHasher } from "../src/security/password";

describe("createBcryptPasswordHasher", () => {
  const hasher = createBcryptPasswordHasher(4);

  it("produces a bcrypt digest with the configured cost", async () => {
    const digest = await hasher.hash("Str0ng!pass");

    expect(digest.startsWith("$2a$04$")).toBe(true);
    expect(digest).not.toContain("Str0ng!pass");
  });

  it("verifies the matching password only", async () => {
    const digest = await hasher.hash("Str0ng!pass");

    await expect(hasher.verify("Str0ng!pass", digest)).resolves.toBe(true);
    await expect(hasher.verify("Wr0ng!pass", digest)).resolves.toBe(false);
  });
});
