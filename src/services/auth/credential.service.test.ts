import { describe, expect, it } from "vitest";
import { ValidationError } from "@utils/errors.util";
import { CredentialService, MAX_PASSWORD_BYTES } from "./credential.service";

describe("CredentialService", () => {
  const credentials = new CredentialService(4);

  it("salts every hash so the same password hashes differently", async () => {
    const first = await credentials.hash("correct horse");
    const second = await credentials.hash("correct horse");

    expect(first).not.toBe(second);
    expect(await credentials.verify("correct horse", first)).toBe(true);
    expect(await credentials.verify("correct horse", second)).toBe(true);
  });

  it("rejects a wrong password", async () => {
    const hash = await credentials.hash("correct horse");

    expect(await credentials.verify("battery staple", hash)).toBe(false);
  });

  it("never stores the password in the hash", async () => {
    const hash = await credentials.hash("correct horse");

    expect(hash).not.toContain("correct horse");
  });

  it("returns false for a hash of the wrong length", async () => {
    expect(await credentials.verify("anything", "not-a-hash")).toBe(false);
  });

  it("returns false for a 60-character hash with a broken salt", async () => {
    expect(await credentials.verify("anything", "x".repeat(60))).toBe(false);
  });

  it("refuses to hash a password longer than 72 UTF-8 bytes", async () => {
    // 25 characters, 73 bytes
    const password = "密".repeat(24) + "A";

    await expect(credentials.hash(password)).rejects.toBeInstanceOf(ValidationError);
  });

  it("accepts a multibyte password of exactly the limit", async () => {
    const password = "密".repeat(MAX_PASSWORD_BYTES / 3);
    const hash = await credentials.hash(password);

    expect(await credentials.verify(password, hash)).toBe(true);
  });

  it("does not match a longer password that shares the first 72 bytes", async () => {
    const hash = await credentials.hash("密".repeat(24));

    expect(await credentials.verify("密".repeat(24) + "totally-different", hash)).toBe(false);
  });
});
