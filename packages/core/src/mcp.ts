/**
 * MCP (Model Context Protocol) response helpers.
 * Every tool answers with a short text block for the agent plus
 * structured content that callers can check programmatically.
 */

import type { Result } from "./result.js";

/**
 * MCP text content block.
 */
export type TextContent = {
  type: "text";
  text: string;
};

/**
 * MCP tool response structure.
 * The index signature keeps it assignable to the SDK's CallToolResult.
 */
export type ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
};

export type ErrorContent = {
  success: false;
  error: string;
  code?: string;
};

/**
 * Create an error response. `code` is the machine-checkable error kind.
 */
export function errorResponse(message: string, code?: string): ToolResponse<ErrorContent> {
  const structuredContent: ErrorContent = { success: false, error: message };
  if (code !== undefined) {
    structuredContent.code = code;
  }
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent,
    isError: true,
  };
}

/**
 * Create a success response with text and optional structured content.
 */
export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data?: T
): ToolResponse<T & { success: true }> | ToolResponse<{ success: true }> {
  if (data === undefined) {
    return { content: [{ type: "text", text }], structuredContent: { success: true } };
  }
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true },
  };
}

/**
 * Read the `code` property of an error, when it carries a string one.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Convert a Result to an MCP tool response with structured data.
 * On success, calls the formatter to generate text and structured content.
 * On error, returns an error response carrying the error's code, if any.
 */
export function resultToStructuredResponse<T, E extends string | Error, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse<S & { success: true }> | ToolResponse<ErrorContent> {
  if (result.ok) {
    const { text, data } = formatter(result.value);
    return {
      content: [{ type: "text", text }],
      structuredContent: { ...data, success: true },
    };
  }
  const message = result.error instanceof Error ? result.error.message : String(result.error);
  return errorResponse(message, errorCode(result.error));
}
