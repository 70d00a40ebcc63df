import jwt from "jsonwebtoken";
import { describe, expect, it } from "vitest";
import { FIXED_NOW, TEST_SECRET } from "../../testing/fixtures";
import { TOKEN_TTL_SECONDS, TokenService } from "./token.service";

const TTL_MS = TOKEN_TTL_SECONDS * 1000;

describe("TokenService", () => {
  const tokens = new TokenService(TEST_SECRET);

  it("round-trips the subject", () => {
    const token = tokens.issue("alice", FIXED_NOW);

    expect(tokens.validate(token, FIXED_NOW)).toEqual({ valid: true, subject: "alice" });
  });

  it("sets expiry thirty minutes after issuance", () => {
    const token = tokens.issue("alice", FIXED_NOW);
    const decoded = jwt.decode(token);

    expect(decoded).toMatchObject({
      sub: "alice",
      iat: FIXED_NOW / 1000,
      exp: FIXED_NOW / 1000 + 1800,
    });
  });

  it("is valid up to the last millisecond before expiry", () => {
    const token = tokens.issue("alice", FIXED_NOW);

    expect(tokens.validate(token, FIXED_NOW + TTL_MS - 1)).toEqual({ valid: true, subject: "alice" });
  });

  it("counts the lifetime from the start of the issuing second", () => {
    const token = tokens.issue("alice", FIXED_NOW + 900);

    expect(tokens.validate(token, FIXED_NOW + TTL_MS - 1)).toEqual({ valid: true, subject: "alice" });
    expect(tokens.validate(token, FIXED_NOW + TTL_MS)).toEqual({ valid: false });
  });

  it("is invalid at and after expiry", () => {
    const token = tokens.issue("alice", FIXED_NOW);

    expect(tokens.validate(token, FIXED_NOW + TTL_MS)).toEqual({ valid: false });
    expect(tokens.validate(token, FIXED_NOW + TTL_MS + 60_000)).toEqual({ valid: false });
  });

  it("rejects a token signed with another secret", () => {
    const foreign = new TokenService("other-secret").issue("alice", FIXED_NOW);

    expect(tokens.validate(foreign, FIXED_NOW)).toEqual({ valid: false });
  });

  it("rejects a payload spliced onto another token's signature", () => {
    const [header, payload] = tokens.issue("mallory", FIXED_NOW).split(".");
    const signature = tokens.issue("alice", FIXED_NOW).split(".")[2];

    expect(tokens.validate(`${header}.${payload}.${signature}`, FIXED_NOW)).toEqual({ valid: false });
  });

  it("rejects malformed input without throwing", () => {
    expect(tokens.validate("not-a-token", FIXED_NOW)).toEqual({ valid: false });
    expect(tokens.validate("", FIXED_NOW)).toEqual({ valid: false });
  });

  it("rejects a correctly signed token without a subject", () => {
    const token = jwt.sign({ role: "admin" }, TEST_SECRET, { expiresIn: TOKEN_TTL_SECONDS });

    expect(tokens.validate(token)).toEqual({ valid: false });
  });

  it("refuses an empty secret", () => {
    expect(() => new TokenService("")).toThrow("Token secret must not be empty");
  });
});
