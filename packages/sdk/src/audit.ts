/**
 * Append-only audit trail of record and account actions
 */

import { AuditFailureError, errorMessage } from "./errors.js";
import { appendLine } from "./io.js";
import { logger } from "./observability/logs.js";

export type AuditAction =
  | "CREATE_RECORD"
  | "READ_RECORDS"
  | "UPDATE_RECORD"
  | "UPDATE_RECORDS"
  | "DELETE_RECORD"
  | "DELETE_RECORDS"
  | "USER_CREATED"
  | "LOGIN_SUCCESS"
  | "LOGIN_FAILED"
  | "USER_DEACTIVATED";

export interface AuditEntry {
  readonly actor: string;
  readonly action: AuditAction;
  readonly detail: string;
  /** ISO-8601 */
  readonly timestamp: string;
}

/**
 * Destination for audit entries. A sink may accept entries synchronously
 * or return a promise that settles once the entry is stored.
 */
export interface AuditSink {
  append(entry: AuditEntry): void | Promise<void>;
}

/**
 * Keeps entries in memory, in append order
 */
export class MemoryAuditSink implements AuditSink {
  readonly #entries: AuditEntry[] = [];

  append(entry: AuditEntry): void {
    this.#entries.push(entry);
  }

  get entries(): readonly AuditEntry[] {
    return [...this.#entries];
  }

  /** Entries for one action, in append order */
  byAction(action: AuditAction): AuditEntry[] {
    return this.#entries.filter((entry) => entry.action === action);
  }
}

/**
 * Appends one JSON object per line to a file, in call order
 */
export class JsonLinesAuditSink implements AuditSink {
  #tail: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  append(entry: AuditEntry): Promise<void> {
    const line = JSON.stringify(entry);
    const written = this.#tail.then(() => appendLine(this.filePath, line));
    // A failed append is reported through `written`; later appends still run
    this.#tail = written.catch(() => undefined);
    return written;
  }
}

/**
 * Discards every entry
 */
export const nullAuditSink: AuditSink = {
  append: () => undefined,
};

/**
 * Best-effort mutation log
 *
 * `record` never throws and never waits: a sink failure, synchronous or not,
 * becomes an AuditFailureError that is logged and dropped. Call {@link settle}
 * to wait for asynchronous appends, e.g. before exiting.
 */
export class MutationLog {
  readonly #sink: AuditSink;
  readonly #now: () => Date;
  #pending = new Set<Promise<void>>();

  constructor(sink: AuditSink = nullAuditSink, now: () => Date = () => new Date()) {
    this.#sink = sink;
    this.#now = now;
  }

  record(actor: string, action: AuditAction, detail: string): void {
    const entry: AuditEntry = Object.freeze({
      actor,
      action,
      detail,
      timestamp: this.#now().toISOString(),
    });

    try {
      const result = this.#sink.append(entry);
      if (result instanceof Promise) {
        const pending = result
          .catch((cause: unknown) => this.#report(action, cause))
          .finally(() => this.#pending.delete(pending));
        this.#pending.add(pending);
      }
    } catch (cause) {
      this.#report(action, cause);
    }
  }

  /**
   * Wait for in-flight asynchronous appends
   */
  async settle(): Promise<void> {
    await Promise.all([...this.#pending]);
  }

  #report(action: AuditAction, cause: unknown): void {
    const failure = new AuditFailureError(action, { cause });
    logger.warn("audit.append_failed", {
      message: failure.message,
      details: { code: failure.code, cause: errorMessage(cause) },
    });
  }
}
