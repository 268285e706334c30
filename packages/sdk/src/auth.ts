/**
 * Accounts, password verification and signed access tokens
 */

import { randomBytes, scrypt, timingSafeEqual } from "node:crypto";
import * as jose from "jose";
import { z } from "zod";
import { MutationLog } from "./audit.js";
import { InvalidInputError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { err, ok } from "./result.js";
import type { Result } from "./result.js";
import { validateUsername } from "./validation.js";

export const ROLES = ["admin", "analyst", "viewer"] as const;
export type Role = (typeof ROLES)[number];

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLES.some((role) => role === value);
}

export interface UserAccount {
  username: string;
  role: Role;
  email: string;
  /** ISO-8601 */
  createdAt: string;
  active: boolean;
  createdBy?: string;
  deactivatedAt?: string;
  deactivatedBy?: string;
}

/**
 * An authenticated caller
 */
export interface Actor {
  username: string;
  role: Role;
}

export type Verification = { ok: true; role: Role } | { ok: false };

/**
 * Checks a username/password pair
 */
export interface CredentialVerifier {
  verify(username: string, password: string): Promise<Verification>;
}

const KEY_LENGTH = 64;

function deriveKey(password: string, salt: Buffer, length: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, length, (error, key) => (error ? reject(error) : resolve(key)));
  });
}

/**
 * Hash a password with scrypt and a random salt
 * @returns `scrypt$<salt>$<hash>`, base64 encoded
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(16);
  const hash = await deriveKey(password, salt, KEY_LENGTH);
  return `scrypt$${salt.toString("base64")}$${hash.toString("base64")}`;
}

/**
 * Check a password against a hash from {@link hashPassword}
 */
export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const [scheme, saltText, hashText] = stored.split("$");
  if (scheme !== "scrypt" || !saltText || !hashText) {
    return false;
  }
  const expected = Buffer.from(hashText, "base64");
  if (expected.length === 0) {
    return false;
  }
  const actual = await deriveKey(password, Buffer.from(saltText, "base64"), expected.length);
  return timingSafeEqual(actual, expected);
}

export interface NewUser {
  username: string;
  password: string;
  role?: Role;
  email?: string;
}

/**
 * In-memory account directory
 *
 * Password hashes stay inside the directory; every account handed out is a copy.
 */
export class UserDirectory implements CredentialVerifier {
  readonly #users = new Map<string, { account: UserAccount; passwordHash: string }>();
  readonly #now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.#now = now;
  }

  /**
   * Directory seeded with one admin account
   */
  static async withAdmin(password: string, username = "admin"): Promise<UserDirectory> {
    const directory = new UserDirectory();
    await directory.add({ username, password, role: "admin" });
    return directory;
  }

  has(username: string): boolean {
    return this.#users.has(username);
  }

  get(username: string): UserAccount | undefined {
    const entry = this.#users.get(username);
    return entry ? { ...entry.account } : undefined;
  }

  /**
   * @throws {InvalidInputError} If the username is malformed or taken, or the password is empty
   */
  async add(user: NewUser, createdBy?: string): Promise<UserAccount> {
    validateUsername(user.username);
    if (this.#users.has(user.username)) {
      throw new InvalidInputError("username", `"${user.username}" already exists`);
    }
    if (user.password.length === 0) {
      throw new InvalidInputError("password", "must not be empty");
    }

    const account: UserAccount = {
      username: user.username,
      role: user.role ?? "viewer",
      email: user.email ?? "",
      createdAt: this.#now().toISOString(),
      active: true,
      ...(createdBy ? { createdBy } : {}),
    };
    this.#users.set(user.username, { account, passwordHash: await hashPassword(user.password) });
    return { ...account };
  }

  /**
   * All accounts in creation order
   */
  list(): UserAccount[] {
    return [...this.#users.values()].map(({ account }) => ({ ...account }));
  }

  /**
   * @returns The updated account, or undefined if it does not exist or is already inactive
   */
  deactivate(username: string, by: string): UserAccount | undefined {
    const entry = this.#users.get(username);
    if (!entry || !entry.account.active) {
      return undefined;
    }
    entry.account = {
      ...entry.account,
      active: false,
      deactivatedAt: this.#now().toISOString(),
      deactivatedBy: by,
    };
    return { ...entry.account };
  }

  async verify(username: string, password: string): Promise<Verification> {
    const entry = this.#users.get(username);
    if (!entry || !entry.account.active) {
      return { ok: false };
    }
    const valid = await verifyPassword(password, entry.passwordHash);
    return valid ? { ok: true, role: entry.account.role } : { ok: false };
  }
}

export type AuthFailureKind =
  | "invalid_credentials"
  | "token_expired"
  | "invalid_token"
  | "inactive_user"
  | "forbidden"
  | "user_exists"
  | "invalid_user"
  | "user_not_found"
  | "self_deactivation";

export interface AuthFailure {
  kind: AuthFailureKind;
  message: string;
}

function failure(kind: AuthFailureKind, message: string): Result<never, AuthFailure> {
  return err({ kind, message });
}

export interface IssuedToken {
  token: string;
  role: Role;
  /** ISO-8601 */
  expiresAt: string;
}

export interface AccessControlOptions {
  directory: UserDirectory;
  /** HMAC secret for HS256 tokens */
  secret: string;
  audit?: MutationLog;
  /** Token lifetime in seconds (default: 24 hours) */
  tokenTtlSeconds?: number;
  now?: () => Date;
}

const tokenClaimsSchema = z.object({
  username: z.string().min(1),
  role: z.enum(ROLES),
});

/**
 * Login, token verification and admin-gated account management
 *
 * Outcomes are Result values; only malformed arguments throw.
 *
 * @example
 * ```typescript
 * const access = new AccessControl({ directory, secret: process.env.SHELTER_TOKEN_SECRET ?? "" });
 * const login = await access.authenticate("admin", password);
 * if (login.ok) {
 *   const actor = await access.verifyToken(login.value.token);
 * }
 * ```
 */
export class AccessControl {
  readonly #directory: UserDirectory;
  readonly #key: Uint8Array;
  readonly #audit: MutationLog;
  readonly #ttlSeconds: number;
  readonly #now: () => Date;

  constructor(options: AccessControlOptions) {
    if (options.secret.length === 0) {
      throw new InvalidInputError("secret", "token secret must not be empty");
    }
    this.#directory = options.directory;
    this.#key = new TextEncoder().encode(options.secret);
    this.#audit = options.audit ?? new MutationLog();
    this.#ttlSeconds = options.tokenTtlSeconds ?? 24 * 60 * 60;
    this.#now = options.now ?? (() => new Date());
  }

  async authenticate(username: string, password: string): Promise<Result<IssuedToken, AuthFailure>> {
    const verification = await this.#directory.verify(username, password);
    if (!verification.ok) {
      this.#audit.record(username, "LOGIN_FAILED", "Failed login attempt");
      logger.info("auth.login_failed", { actor: username });
      return failure("invalid_credentials", "Invalid credentials");
    }

    const issuedAt = Math.floor(this.#now().getTime() / 1000);
    const expiresAt = issuedAt + this.#ttlSeconds;
    const token = await new jose.SignJWT({ username, role: verification.role })
      .setProtectedHeader({ alg: "HS256" })
      .setIssuedAt(issuedAt)
      .setExpirationTime(expiresAt)
      .sign(this.#key);

    this.#audit.record(username, "LOGIN_SUCCESS", "User logged in successfully");
    return ok({ token, role: verification.role, expiresAt: new Date(expiresAt * 1000).toISOString() });
  }

  /**
   * Resolve a token to its actor. The account must still exist and be active.
   */
  async verifyToken(token: string): Promise<Result<Actor, AuthFailure>> {
    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(token, this.#key, {
        algorithms: ["HS256"],
        currentDate: this.#now(),
      }));
    } catch (error) {
      if (error instanceof jose.errors.JWTExpired) {
        return failure("token_expired", "Token expired");
      }
      logger.debug("auth.token_rejected", {
        message: error instanceof Error ? error.message : String(error),
      });
      return failure("invalid_token", "Invalid token");
    }

    const claims = tokenClaimsSchema.safeParse(payload);
    if (!claims.success) {
      return failure("invalid_token", "Invalid token");
    }
    const account = this.#directory.get(claims.data.username);
    if (!account || !account.active) {
      return failure("inactive_user", "User no longer active");
    }
    return ok({ username: account.username, role: account.role });
  }

  async createUser(actor: Actor, user: NewUser): Promise<Result<UserAccount, AuthFailure>> {
    const denied = this.#requireAdmin(actor);
    if (denied) return denied;
    if (this.#directory.has(user.username)) {
      return failure("user_exists", "User already exists");
    }

    let account: UserAccount;
    try {
      account = await this.#directory.add(user, actor.username);
    } catch (error) {
      if (error instanceof InvalidInputError) {
        return failure("invalid_user", error.message);
      }
      throw error;
    }
    this.#audit.record(actor.username, "USER_CREATED", `Created user ${account.username} with role ${account.role}`);
    return ok(account);
  }

  listUsers(actor: Actor): Result<UserAccount[], AuthFailure> {
    const denied = this.#requireAdmin(actor);
    if (denied) return denied;
    return ok(this.#directory.list());
  }

  deactivateUser(actor: Actor, username: string): Result<UserAccount, AuthFailure> {
    const denied = this.#requireAdmin(actor);
    if (denied) return denied;
    if (username === actor.username) {
      return failure("self_deactivation", "Cannot deactivate your own account");
    }

    const account = this.#directory.deactivate(username, actor.username);
    if (!account) {
      return failure("user_not_found", "User not found or already deactivated");
    }
    this.#audit.record(actor.username, "USER_DEACTIVATED", `Deactivated user ${username}`);
    return ok(account);
  }

  #requireAdmin(actor: Actor): Result<never, AuthFailure> | undefined {
    const current = this.#directory.get(actor.username);
    if (!current || !current.active || current.role !== "admin") {
      return failure("forbidden", "Insufficient privileges: Admin role required");
    }
    return undefined;
  }
}
