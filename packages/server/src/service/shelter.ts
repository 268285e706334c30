/**
 * Shelter service adapter
 * Wraps the SDK record store, analytics engine and access control with
 * token checks and safety limits for tool callers
 */

import {
  AccessControl,
  AnalyticsEngine,
  MutationLog,
  JsonLinesAuditSink,
  UserDirectory,
  computeExportStats,
  openShelterStore,
  type Actor,
  type AnimalRecord,
  type AuthFailure,
  type AuthFailureKind,
  type BreedPerformance,
  type DemographicSummary,
  type ExportStats,
  type IssuedToken,
  type MonthlyAdoptionTrend,
  type RecordStore,
  type RescueTypeAnalytics,
  type Result,
  type Role,
  type StoreMode,
  type UserAccount,
} from "@shelter-records/sdk";
import type { ServerConfig } from "../config.js";
import type { CreateUserInput } from "../schemas.js";
import { logger } from "../observability/logger.js";

// Maximum record size in bytes (64KB)
const MAX_RECORD_SIZE = 64 * 1024;

/** Roles allowed to create, update and delete records */
export const EDITOR_ROLES: readonly Role[] = ["admin", "analyst"];

/**
 * A tool call was refused by access control
 */
export class AccessDeniedError extends Error {
  readonly code = "ACCESS_DENIED";

  constructor(
    public readonly kind: AuthFailureKind,
    message: string
  ) {
    super(message);
    this.name = "AccessDeniedError";
  }
}

function unwrap<T>(result: Result<T, AuthFailure>): T {
  if (!result.ok) {
    throw new AccessDeniedError(result.error.kind, result.error.message);
  }
  return result.value;
}

export interface QueryResult {
  records: AnimalRecord[];
  /** Matches before the limit was applied */
  total: number;
}

export interface ShelterServiceOptions {
  store: RecordStore;
  access: AccessControl;
  /** Access-control audit trail, settled on close */
  accessAudit?: MutationLog;
}

export class ShelterService {
  readonly #store: RecordStore;
  readonly #analytics: AnalyticsEngine;
  readonly #access: AccessControl;
  readonly #accessAudit: MutationLog | undefined;

  constructor(options: ShelterServiceOptions) {
    this.#store = options.store;
    this.#analytics = new AnalyticsEngine(options.store);
    this.#access = options.access;
    this.#accessAudit = options.accessAudit;
  }

  get mode(): StoreMode {
    return this.#store.mode;
  }

  /**
   * Exchange credentials for a token
   * @throws {AccessDeniedError} On invalid credentials
   */
  async login(username: string, password: string): Promise<IssuedToken> {
    return unwrap(await this.#access.authenticate(username, password));
  }

  /**
   * Records matching a query; any signed-in role may read
   */
  async query(token: string, query: unknown, limit: number): Promise<QueryResult> {
    const actor = await this.#actor(token);
    const records = this.#store.read(query, { actor: actor.username });
    if (records.length > limit) {
      logger.debug("service.query.capped", { total: records.length, returned: limit });
    }
    return { records: records.slice(0, limit), total: records.length };
  }

  /**
   * @returns false when the store is in demo mode
   */
  async create(token: string, record: AnimalRecord): Promise<boolean> {
    const actor = await this.#actor(token, EDITOR_ROLES);

    // Reject oversized records
    const byteLength = Buffer.byteLength(JSON.stringify(record), "utf8");
    if (byteLength > MAX_RECORD_SIZE) {
      throw new Error(`Record too large: ${byteLength} bytes exceeds limit of ${MAX_RECORD_SIZE} bytes`);
    }

    const created = this.#store.create(record, { actor: actor.username });
    await this.#persist();
    return created;
  }

  async update(token: string, query: unknown, patch: unknown, multiple: boolean): Promise<number> {
    const actor = await this.#actor(token, EDITOR_ROLES);
    const modified = this.#store.update(query, patch, { actor: actor.username, multiple });
    await this.#persist();
    return modified;
  }

  async delete(token: string, query: unknown, multiple: boolean): Promise<number> {
    const actor = await this.#actor(token, EDITOR_ROLES);
    const removed = this.#store.delete(query, { actor: actor.username, multiple });
    await this.#persist();
    return removed;
  }

  breedPerformance(): BreedPerformance[] {
    return this.#analytics.breedPerformance();
  }

  rescueAnalytics(applyAgeWindow: boolean): RescueTypeAnalytics {
    return this.#analytics.rescueTypeAnalytics({ applyAgeWindow });
  }

  adoptionTrends(months: number): MonthlyAdoptionTrend[] {
    return this.#analytics.monthlyAdoptionTrends(months);
  }

  demographics(): DemographicSummary[] {
    return this.#analytics.demographics();
  }

  exportStats(query: unknown): ExportStats {
    return computeExportStats(this.#store.snapshot(query));
  }

  async createUser(token: string, input: CreateUserInput): Promise<UserAccount> {
    const actor = await this.#actor(token);
    return unwrap(
      await this.#access.createUser(actor, {
        username: input.username,
        password: input.password,
        role: input.role,
        email: input.email,
      })
    );
  }

  async listUsers(token: string): Promise<UserAccount[]> {
    const actor = await this.#actor(token);
    return unwrap(this.#access.listUsers(actor));
  }

  async deactivateUser(token: string, username: string): Promise<UserAccount> {
    const actor = await this.#actor(token);
    return unwrap(this.#access.deactivateUser(actor, username));
  }

  /**
   * Flush the data file and pending audit entries
   */
  async close(): Promise<void> {
    await this.#store.close();
    await this.#accessAudit?.settle();
  }

  async #actor(token: string, roles?: readonly Role[]): Promise<Actor> {
    const actor = unwrap(await this.#access.verifyToken(token));
    if (roles && !roles.includes(actor.role)) {
      throw new AccessDeniedError("forbidden", `Insufficient privileges: requires ${roles.join(" or ")} role`);
    }
    return actor;
  }

  // Write mutations through to the data file
  async #persist(): Promise<void> {
    await this.#store.close();
  }
}

/**
 * Open the store and access control described by the server configuration
 */
export async function createShelterService(config: ServerConfig): Promise<ShelterService> {
  const auditSink = config.auditLog ? new JsonLinesAuditSink(config.auditLog) : undefined;
  const store = await openShelterStore({ dataFile: config.dataFile, createIfMissing: true, auditSink });

  const directory = config.adminPassword
    ? await UserDirectory.withAdmin(config.adminPassword)
    : new UserDirectory();
  if (!config.adminPassword) {
    logger.warn("service.no_admin", { message: "SHELTER_ADMIN_PASSWORD is not set; nobody can sign in" });
  }

  const accessAudit = new MutationLog(auditSink);
  const access = new AccessControl({ directory, secret: config.tokenSecret, audit: accessAudit });
  logger.info("service.init", { data_file: config.dataFile, mode: store.mode });
  return new ShelterService({ store, access, accessAudit });
}
