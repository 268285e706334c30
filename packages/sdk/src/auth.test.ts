import { describe, it, expect, beforeEach } from "vitest";
import * as jose from "jose";
import { AccessControl, UserDirectory, hashPassword, isRole, verifyPassword } from "./auth.js";
import type { Actor } from "./auth.js";
import { MemoryAuditSink, MutationLog } from "./audit.js";
import { InvalidInputError } from "./errors.js";

const SECRET = "test-secret";

describe("password hashing", () => {
  it("should verify the original password only", async () => {
    const stored = await hashPassword("test-password");

    expect(stored.startsWith("scrypt$")).toBe(true);
    expect(await verifyPassword("test-password", stored)).toBe(true);
    expect(await verifyPassword("wrong-password", stored)).toBe(false);
  });

  it("should salt each hash", async () => {
    expect(await hashPassword("same")).not.toBe(await hashPassword("same"));
  });

  it("should reject malformed hashes", async () => {
    expect(await verifyPassword("x", "plain")).toBe(false);
    expect(await verifyPassword("x", "scrypt$$")).toBe(false);
  });
});

describe("isRole", () => {
  it("should accept the three roles", () => {
    expect(["admin", "analyst", "viewer"].every(isRole)).toBe(true);
    expect(isRole("owner")).toBe(false);
    expect(isRole(1)).toBe(false);
  });
});

describe("UserDirectory", () => {
  it("should seed an admin account", async () => {
    const directory = await UserDirectory.withAdmin("test-password");

    expect(directory.get("admin")).toMatchObject({ username: "admin", role: "admin", active: true });
    expect(await directory.verify("admin", "test-password")).toEqual({ ok: true, role: "admin" });
  });

  it("should default new accounts to viewer", async () => {
    const directory = new UserDirectory();
    const account = await directory.add({ username: "staff1", password: "test-password" });

    expect(account.role).toBe("viewer");
    expect(account.email).toBe("");
  });

  it("should reject duplicate or malformed usernames", async () => {
    const directory = new UserDirectory();
    await directory.add({ username: "staff1", password: "p" });

    await expect(directory.add({ username: "staff1", password: "p" })).rejects.toThrow(InvalidInputError);
    await expect(directory.add({ username: "has space", password: "p" })).rejects.toThrow(InvalidInputError);
    await expect(directory.add({ username: "staff2", password: "" })).rejects.toThrow("Invalid password: must not be empty");
  });

  it("should not verify deactivated accounts", async () => {
    const directory = new UserDirectory();
    await directory.add({ username: "staff1", password: "test-password" });
    directory.deactivate("staff1", "admin");

    expect(await directory.verify("staff1", "test-password")).toEqual({ ok: false });
  });

  it("should never expose password hashes", async () => {
    const directory = await UserDirectory.withAdmin("test-password");

    expect(Object.keys(directory.list()[0] ?? {})).not.toContain("passwordHash");
  });
});

describe("AccessControl", () => {
  let clock: Date;
  let directory: UserDirectory;
  let sink: MemoryAuditSink;
  let access: AccessControl;
  const admin: Actor = { username: "admin", role: "admin" };

  beforeEach(async () => {
    clock = new Date("2024-05-01T12:00:00.000Z");
    directory = new UserDirectory(() => clock);
    await directory.add({ username: "admin", password: "test-admin", role: "admin" });
    await directory.add({ username: "analyst1", password: "test-analyst", role: "analyst" });
    sink = new MemoryAuditSink();
    access = new AccessControl({
      directory,
      secret: SECRET,
      audit: new MutationLog(sink, () => clock),
      now: () => clock,
    });
  });

  it("should reject an empty secret", () => {
    expect(() => new AccessControl({ directory, secret: "" })).toThrow(InvalidInputError);
  });

  describe("authenticate()", () => {
    it("should issue an HS256 token valid for 24 hours", async () => {
      const result = await access.authenticate("analyst1", "test-analyst");

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.role).toBe("analyst");
      expect(result.value.expiresAt).toBe("2024-05-02T12:00:00.000Z");
      expect(jose.decodeProtectedHeader(result.value.token).alg).toBe("HS256");
      expect(jose.decodeJwt(result.value.token)).toMatchObject({ username: "analyst1", role: "analyst" });
      expect(sink.byAction("LOGIN_SUCCESS")).toMatchObject([{ actor: "analyst1" }]);
    });

    it("should fail on a wrong password and audit the attempt", async () => {
      const result = await access.authenticate("analyst1", "nope");

      expect(result).toEqual({ ok: false, error: { kind: "invalid_credentials", message: "Invalid credentials" } });
      expect(sink.byAction("LOGIN_FAILED")).toMatchObject([{ actor: "analyst1", detail: "Failed login attempt" }]);
    });

    it("should fail for an unknown user", async () => {
      const result = await access.authenticate("ghost", "test-admin");
      expect(result.ok).toBe(false);
    });
  });

  describe("verifyToken()", () => {
    async function tokenFor(username: string, password: string): Promise<string> {
      const result = await access.authenticate(username, password);
      if (!result.ok) throw new Error(result.error.message);
      return result.value.token;
    }

    it("should round-trip a token to its actor", async () => {
      const token = await tokenFor("analyst1", "test-analyst");

      expect(await access.verifyToken(token)).toEqual({ ok: true, value: { username: "analyst1", role: "analyst" } });
    });

    it("should reject an expired token", async () => {
      const token = await tokenFor("analyst1", "test-analyst");
      clock = new Date("2024-05-02T12:00:01.000Z");

      const result = await access.verifyToken(token);
      expect(result.ok ? undefined : result.error.kind).toBe("token_expired");
    });

    it("should reject a token signed with another secret", async () => {
      const forged = await new jose.SignJWT({ username: "admin", role: "admin" })
        .setProtectedHeader({ alg: "HS256" })
        .setIssuedAt(Math.floor(clock.getTime() / 1000))
        .setExpirationTime(Math.floor(clock.getTime() / 1000) + 60)
        .sign(new TextEncoder().encode("other-secret"));

      const result = await access.verifyToken(forged);
      expect(result.ok ? undefined : result.error.kind).toBe("invalid_token");
    });

    it("should reject garbage", async () => {
      const result = await access.verifyToken("not-a-token");
      expect(result.ok ? undefined : result.error.kind).toBe("invalid_token");
    });

    it("should reject tokens of deactivated users", async () => {
      const token = await tokenFor("analyst1", "test-analyst");
      access.deactivateUser(admin, "analyst1");

      const result = await access.verifyToken(token);
      expect(result.ok ? undefined : result.error.kind).toBe("inactive_user");
    });
  });

  describe("account management", () => {
    it("should let an admin create users and audit it", async () => {
      const result = await access.createUser(admin, { username: "staff1", password: "test-staff", role: "viewer", email: "staff1@example.org" });

      expect(result.ok).toBe(true);
      expect(directory.get("staff1")).toMatchObject({ createdBy: "admin", email: "staff1@example.org" });
      expect(sink.byAction("USER_CREATED")).toMatchObject([{ actor: "admin", detail: "Created user staff1 with role viewer" }]);
    });

    it("should refuse non-admins", async () => {
      const analyst: Actor = { username: "analyst1", role: "analyst" };

      const created = await access.createUser(analyst, { username: "staff1", password: "p" });
      expect(created.ok ? undefined : created.error.kind).toBe("forbidden");
      const listed = access.listUsers(analyst);
      expect(listed.ok ? undefined : listed.error.message).toBe("Insufficient privileges: Admin role required");
      expect(access.deactivateUser(analyst, "admin").ok).toBe(false);
    });

    it("should refuse an actor claiming admin without an admin account", () => {
      const impostor: Actor = { username: "analyst1", role: "admin" };
      expect(access.listUsers(impostor).ok).toBe(false);
    });

    it("should refuse duplicate and malformed usernames", async () => {
      const duplicate = await access.createUser(admin, { username: "analyst1", password: "p" });
      expect(duplicate.ok ? undefined : duplicate.error.kind).toBe("user_exists");

      const malformed = await access.createUser(admin, { username: "bad name", password: "p" });
      expect(malformed.ok ? undefined : malformed.error.kind).toBe("invalid_user");
    });

    it("should list accounts in creation order", () => {
      const result = access.listUsers(admin);
      expect(result.ok ? result.value.map((u) => u.username) : []).toEqual(["admin", "analyst1"]);
    });

    it("should deactivate another account once", () => {
      const first = access.deactivateUser(admin, "analyst1");

      expect(first.ok ? first.value : undefined).toMatchObject({
        active: false,
        deactivatedBy: "admin",
        deactivatedAt: "2024-05-01T12:00:00.000Z",
      });
      const second = access.deactivateUser(admin, "analyst1");
      expect(second.ok ? undefined : second.error.kind).toBe("user_not_found");
      expect(sink.byAction("USER_DEACTIVATED")).toHaveLength(1);
    });

    it("should not let admins deactivate themselves", () => {
      const result = access.deactivateUser(admin, "admin");

      expect(result.ok ? undefined : result.error.message).toBe("Cannot deactivate your own account");
      expect(directory.get("admin")?.active).toBe(true);
    });
  });
});
