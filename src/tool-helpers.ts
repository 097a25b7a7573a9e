/**
 * Shared helpers for MCP tool registration: response shaping,
 * error results and the logging wrapper every tool goes through.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AnalyticsThresholds } from "./config.js";
import type { TaskSource } from "./kanboard.js";
import { withLogging } from "./logger.js";

/** Re-export McpServer type for tool group files */
export type { McpServer };

export interface ToolContext {
  source: TaskSource;
  thresholds: AnalyticsThresholds;
}

/** Resolves the Kanboard client and configured thresholds on first use */
export type ContextProvider = () => Promise<ToolContext>;

/**
 * Serialize a response payload exactly as it is sent to the client.
 * Also used to measure listings against the response size ceiling.
 */
export function serializePayload(data: unknown): string {
  try {
    return JSON.stringify(data, null, 2);
  } catch (error) {
    throw new Error(
      `failed to serialize response: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}

/** Byte length of the serialized payload */
export function payloadSize(data: unknown): number {
  return Buffer.byteLength(serializePayload(data), "utf-8");
}

/** Standard MCP tool response wrapping data as JSON */
export function toolResponse(data: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: typeof data === "string" ? data : serializePayload(data),
      },
    ],
  };
}

/** Standard MCP tool error response */
export function toolError(error: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: `Error: ${error instanceof Error ? error.message : String(error)}`,
      },
    ],
    isError: true as const,
  };
}

/**
 * Wrap an async tool handler with error handling and logging.
 * A thrown error becomes an MCP error result instead of a protocol error.
 */
export function wrapTool<T>(
  toolName: string,
  handler: (params: T) => Promise<ReturnType<typeof toolResponse>>
): (params: T) => Promise<ReturnType<typeof toolResponse> | ReturnType<typeof toolError>> {
  return async (params: T) => {
    try {
      return await withLogging(toolName, () => handler(params));
    } catch (error) {
      return toolError(error);
    }
  };
}

/** Split a comma-separated id list, dropping blanks */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
