/**
 * MCP server wiring: tool listing, dispatch and error mapping
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { DataFileError, InvalidInputError, errorCode } from "@shelter-records/sdk";
import {
  MUTATING_TOOLS,
  ToolTimeoutError,
  createToolHandlers,
  isToolName,
  toolDefinitions,
} from "./tools.js";
import { AccessDeniedError, type ShelterService } from "./service/shelter.js";
import { logger } from "./observability/logger.js";

export const SERVER_NAME = "shelter-records";
export const SERVER_VERSION = "0.1.0";

export interface McpServerOptions {
  /** Hide and refuse tools that change records or accounts */
  readOnly?: boolean;
  toolTimeoutMs?: number;
}

/**
 * Map validation, access and store errors to MCP error codes
 */
export function mapErrorToMcp(error: unknown): { code: number; message: string } {
  if (error instanceof z.ZodError) {
    return {
      code: ErrorCode.InvalidParams,
      message: `Validation error: ${error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join(", ")}`,
    };
  }

  if (error instanceof InvalidInputError) {
    return { code: ErrorCode.InvalidParams, message: error.message };
  }

  if (error instanceof AccessDeniedError) {
    return { code: ErrorCode.InvalidRequest, message: `Access denied: ${error.message}` };
  }

  if (error instanceof ToolTimeoutError) {
    return { code: ErrorCode.RequestTimeout, message: error.message };
  }

  if (error instanceof DataFileError) {
    return { code: ErrorCode.InternalError, message: error.message };
  }

  if (error instanceof Error) {
    const errCode = errorCode(error);
    if (errCode === "EACCES" || errCode === "EPERM") {
      return { code: ErrorCode.InternalError, message: `Permission denied: ${error.message}` };
    }
    return { code: ErrorCode.InternalError, message: error.message };
  }

  return { code: ErrorCode.InternalError, message: String(error) };
}

/**
 * Create an MCP server exposing the service as tools
 */
export function createMcpServer(service: ShelterService, options: McpServerOptions = {}): Server {
  const readOnly = options.readOnly ?? false;
  const handlers = createToolHandlers(service, { timeoutMs: options.toolTimeoutMs });

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const tools = readOnly
      ? toolDefinitions.filter((tool) => !MUTATING_TOOLS.has(tool.name))
      : toolDefinitions;
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (!isToolName(name)) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }
      if (readOnly && MUTATING_TOOLS.has(name)) {
        throw new McpError(ErrorCode.InvalidRequest, `Tool '${name}' not available in read-only mode`);
      }

      return await handlers[name](args);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error("server.tool.error", {
        tool: name,
        err_code: errorCode(err),
        err_message: err.message,
      });

      if (error instanceof McpError) {
        throw error;
      }

      const { code, message } = mapErrorToMcp(error);
      throw new McpError(code, message);
    }
  });

  return server;
}
