import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { SmartApiError, type ErrorKind } from "@/constants";
import type { Logger } from "@/utils";

export interface ToolError {
  kind: ErrorKind;
  code: string;
  message: string;
}

export type ToolResult<T> = { ok: true; data: T } | { ok: false; error: ToolError };

export function toToolError(error: unknown): ToolError {
  if (error instanceof SmartApiError) {
    return { kind: error.kind, code: error.code, message: error.message };
  }
  const message = error instanceof Error ? error.message : "Unknown error";
  return { kind: "vendor", code: "UNEXPECTED_ERROR", message };
}

/** Run one tool operation. Failures are logged and returned, never thrown. */
export async function settle<T>(tool: string, log: Logger, operation: () => Promise<T>): Promise<ToolResult<T>> {
  try {
    return { ok: true, data: await operation() };
  } catch (error: unknown) {
    const failure = toToolError(error);
    log.error({ tool, code: failure.code, kind: failure.kind }, failure.message);
    return { ok: false, error: failure };
  }
}

export function formatToolError(error: ToolError): string {
  return `${error.kind} error [${error.code}]: ${error.message}`;
}

export function toCallToolResult(result: ToolResult<unknown>): CallToolResult {
  if (!result.ok) {
    return { isError: true, content: [{ type: "text", text: formatToolError(result.error) }] };
  }
  return { content: [{ type: "text", text: JSON.stringify(result.data, null, 2) }] };
}
