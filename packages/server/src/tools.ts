/**
 * MCP tool implementations for shelter records
 * Every tool returns a text content array: a one-line summary followed by the JSON payload
 */

import {
  AdoptionTrendsInputSchema,
  CreateRecordInputSchema,
  CreateUserInputSchema,
  DeactivateUserInputSchema,
  DeleteRecordsInputSchema,
  EmptyInputSchema,
  ExportStatsInputSchema,
  ListUsersInputSchema,
  LoginInputSchema,
  QueryRecordsInputSchema,
  RescueAnalyticsInputSchema,
  UpdateRecordsInputSchema,
} from "./schemas.js";
import type { ShelterService } from "./service/shelter.js";
import { logger } from "./observability/logger.js";
import { recordToolExecution } from "./observability/metrics.js";
import { errorCode } from "@shelter-records/sdk";

export const DEFAULT_TOOL_TIMEOUT_MS = 5000;

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
};

export type ToolHandler = (args: unknown) => Promise<ToolResult>;

export class ToolTimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(
    public readonly tool: string,
    timeoutMs: number
  ) {
    super(`Tool execution timeout after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

// Helper to wrap tool execution with timeout, logging, and metrics
async function executeTool<T>(
  toolName: string,
  timeoutMs: number,
  handler: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();
  let success = false;
  let error: Error | undefined;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new ToolTimeoutError(toolName, timeoutMs)), timeoutMs);
    });

    // Race between handler and timeout
    const result = await Promise.race([handler(), timeoutPromise]);
    success = true;
    return result;
  } catch (err) {
    error = err instanceof Error ? err : new Error(String(err));
    throw error;
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
    const duration = Date.now() - startTime;
    logger.toolCall(toolName, duration, success, error);
    recordToolExecution(toolName, duration, success, errorCode(error));
  }
}

function result(summary: string, payload: unknown): ToolResult {
  return {
    content: [
      { type: "text", text: summary },
      { type: "text", text: JSON.stringify(payload, null, 2) },
    ],
  };
}

export interface ToolHandlerOptions {
  /** Per-call timeout (default: 5000) */
  timeoutMs?: number;
}

/**
 * Bind every tool to a service instance
 */
export function createToolHandlers(
  service: ShelterService,
  options: ToolHandlerOptions = {}
): Record<ToolName, ToolHandler> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;

  return {
    login: async (args) => {
      const { username, password } = LoginInputSchema.parse(args);
      return executeTool("login", timeoutMs, async () => {
        const issued = await service.login(username, password);
        return result(`Logged in as ${username} (${issued.role})`, issued);
      });
    },

    query_records: async (args) => {
      const { token, query, limit } = QueryRecordsInputSchema.parse(args);
      return executeTool("query_records", timeoutMs, async () => {
        const { records, total } = await service.query(token, query, limit);
        const summary =
          total > records.length
            ? `Found ${total} matching records (showing ${records.length})`
            : `Found ${total} matching records`;
        return result(summary, { records, count: records.length, total, mode: service.mode });
      });
    },

    create_record: async (args) => {
      const { token, record } = CreateRecordInputSchema.parse(args);
      return executeTool("create_record", timeoutMs, async () => {
        const created = await service.create(token, record);
        const summary = created ? "Record created" : "Record not stored: store is in demo mode";
        return result(summary, { created, mode: service.mode });
      });
    },

    update_records: async (args) => {
      const { token, query, patch, multiple } = UpdateRecordsInputSchema.parse(args);
      return executeTool("update_records", timeoutMs, async () => {
        const modified = await service.update(token, query, patch, multiple);
        return result(`Updated ${modified} record(s)`, { modified, mode: service.mode });
      });
    },

    delete_records: async (args) => {
      const { token, query, multiple } = DeleteRecordsInputSchema.parse(args);
      return executeTool("delete_records", timeoutMs, async () => {
        const deleted = await service.delete(token, query, multiple);
        return result(`Deleted ${deleted} record(s)`, { deleted, mode: service.mode });
      });
    },

    breed_performance: async (args) => {
      EmptyInputSchema.parse(args ?? {});
      return executeTool("breed_performance", timeoutMs, async () => {
        const breeds = service.breedPerformance();
        return result(`Breed performance for ${breeds.length} breeds`, breeds);
      });
    },

    rescue_analytics: async (args) => {
      const { applyAgeWindow } = RescueAnalyticsInputSchema.parse(args ?? {});
      return executeTool("rescue_analytics", timeoutMs, async () => {
        return result("Rescue suitability by rescue type", service.rescueAnalytics(applyAgeWindow));
      });
    },

    adoption_trends: async (args) => {
      const { months } = AdoptionTrendsInputSchema.parse(args ?? {});
      return executeTool("adoption_trends", timeoutMs, async () => {
        const trends = service.adoptionTrends(months);
        return result(`Adoption trends for ${trends.length} month(s)`, trends);
      });
    },

    demographics: async (args) => {
      EmptyInputSchema.parse(args ?? {});
      return executeTool("demographics", timeoutMs, async () => {
        const groups = service.demographics();
        return result(`Demographics for ${groups.length} animal type(s)`, groups);
      });
    },

    export_stats: async (args) => {
      const { query } = ExportStatsInputSchema.parse(args ?? {});
      return executeTool("export_stats", timeoutMs, async () => {
        const stats = service.exportStats(query);
        return result(`Statistics over ${stats.totalRecords} record(s)`, stats);
      });
    },

    create_user: async (args) => {
      const input = CreateUserInputSchema.parse(args);
      return executeTool("create_user", timeoutMs, async () => {
        const account = await service.createUser(input.token, input);
        return result(`Created user ${account.username} with role ${account.role}`, account);
      });
    },

    list_users: async (args) => {
      const { token } = ListUsersInputSchema.parse(args);
      return executeTool("list_users", timeoutMs, async () => {
        const users = await service.listUsers(token);
        return result(`Found ${users.length} user(s)`, users);
      });
    },

    deactivate_user: async (args) => {
      const { token, username } = DeactivateUserInputSchema.parse(args);
      return executeTool("deactivate_user", timeoutMs, async () => {
        const account = await service.deactivateUser(token, username);
        return result(`Deactivated user ${account.username}`, account);
      });
    },
  };
}

const TOKEN_PROPERTY = {
  type: "string",
  description: "Session token from the login tool",
} as const;

const QUERY_PROPERTY = {
  type: "object",
  description:
    "Field-to-value query; a value may be an operator object ($in, $gte, $lte)",
} as const;

export type ToolName =
  | "login"
  | "query_records"
  | "create_record"
  | "update_records"
  | "delete_records"
  | "breed_performance"
  | "rescue_analytics"
  | "adoption_trends"
  | "demographics"
  | "export_stats"
  | "create_user"
  | "list_users"
  | "deactivate_user";

export type ToolDefinition = {
  name: ToolName;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, object>;
    required?: string[];
  };
};

/**
 * Tool definitions for MCP server
 * Maps tool names to their JSON schemas
 */
export const toolDefinitions: ToolDefinition[] = [
  {
    name: "login",
    description: "Exchange a username and password for a session token",
    inputSchema: {
      type: "object",
      properties: {
        username: { type: "string", description: "Account username" },
        password: { type: "string", description: "Account password" },
      },
      required: ["username", "password"],
    },
  },
  {
    name: "query_records",
    description: "Find records matching a query (limit max 1000, default 100)",
    inputSchema: {
      type: "object",
      properties: {
        token: TOKEN_PROPERTY,
        query: QUERY_PROPERTY,
        limit: { type: "number", description: "Maximum number of records (max 1000, default 100)" },
      },
      required: ["token"],
    },
  },
  {
    name: "create_record",
    description: "Add an animal record (admin or analyst)",
    inputSchema: {
      type: "object",
      properties: {
        token: TOKEN_PROPERTY,
        record: { type: "object", description: "Record fields, e.g. animal_id, animal_type, breed" },
      },
      required: ["token", "record"],
    },
  },
  {
    name: "update_records",
    description: "Merge fields into the first matching record, or every match with multiple (admin or analyst)",
    inputSchema: {
      type: "object",
      properties: {
        token: TOKEN_PROPERTY,
        query: QUERY_PROPERTY,
        patch: { type: "object", description: "Fields to set on matching records" },
        multiple: { type: "boolean", description: "Update every match (default false)" },
      },
      required: ["token", "query", "patch"],
    },
  },
  {
    name: "delete_records",
    description: "Remove the first matching record, or every match with multiple (admin or analyst)",
    inputSchema: {
      type: "object",
      properties: {
        token: TOKEN_PROPERTY,
        query: QUERY_PROPERTY,
        multiple: { type: "boolean", description: "Delete every match (default false)" },
      },
      required: ["token", "query"],
    },
  },
  {
    name: "breed_performance",
    description: "Adoption rate and average stay for breeds with at least five animals (top 15)",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "rescue_analytics",
    description: "Rescue suitability by rescue type (water, mountain, disaster)",
    inputSchema: {
      type: "object",
      properties: {
        applyAgeWindow: {
          type: "boolean",
          description: "Restrict to each rescue type's training age window (default true)",
        },
      },
    },
  },
  {
    name: "adoption_trends",
    description: "Adoptions per month over the most recent months",
    inputSchema: {
      type: "object",
      properties: {
        months: { type: "number", description: "Months to include (max 120, default 12)" },
      },
    },
  },
  {
    name: "demographics",
    description: "Record counts, average age and sex breakdown per animal type",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "export_stats",
    description: "Counts by animal type and outcome, with the most common breeds",
    inputSchema: {
      type: "object",
      properties: { query: QUERY_PROPERTY },
    },
  },
  {
    name: "create_user",
    description: "Create a user account (admin)",
    inputSchema: {
      type: "object",
      properties: {
        token: TOKEN_PROPERTY,
        username: { type: "string", description: "New username" },
        password: { type: "string", description: "Initial password" },
        role: { type: "string", enum: ["admin", "analyst", "viewer"], description: "Role (default viewer)" },
        email: { type: "string", description: "Optional contact email" },
      },
      required: ["token", "username", "password"],
    },
  },
  {
    name: "list_users",
    description: "List user accounts (admin)",
    inputSchema: {
      type: "object",
      properties: { token: TOKEN_PROPERTY },
      required: ["token"],
    },
  },
  {
    name: "deactivate_user",
    description: "Deactivate a user account (admin)",
    inputSchema: {
      type: "object",
      properties: {
        token: TOKEN_PROPERTY,
        username: { type: "string", description: "Account to deactivate" },
      },
      required: ["token", "username"],
    },
  },
];

/** Tools hidden and refused in read-only mode */
export const MUTATING_TOOLS: ReadonlySet<string> = new Set<ToolName>([
  "create_record",
  "update_records",
  "delete_records",
  "create_user",
  "deactivate_user",
]);

export function isToolName(name: string): name is ToolName {
  return toolDefinitions.some((tool) => tool.name === name);
}
