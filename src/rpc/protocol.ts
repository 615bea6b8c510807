import type { ImageMimeType } from "../feedback-types.js";

export const JSON_RPC_VERSION = "2.0" as const;
export const PROTOCOL_VERSION = "2024-11-05";
export const FEEDBACK_TOOL_NAME = "interactive_feedback";

export const JSON_RPC_ERROR = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  SERVER_ERROR: -32000,
} as const;

export type JsonRpcId = string | number | null;

export type JsonRpcRequest = {
  jsonrpc: typeof JSON_RPC_VERSION;
  id: JsonRpcId;
  method: string;
  params?: unknown;
};

export type JsonRpcError = {
  code: number;
  message: string;
  data?: unknown;
};

export type JsonRpcResponse =
  | { jsonrpc: typeof JSON_RPC_VERSION; id: JsonRpcId; result: unknown }
  | { jsonrpc: typeof JSON_RPC_VERSION; id: JsonRpcId; error: JsonRpcError };

/** What one decoded stdin line turned out to be. */
export type IncomingFrame =
  | { kind: "request"; request: JsonRpcRequest }
  | { kind: "notification"; method: string }
  | { kind: "batch" }
  | { kind: "invalid" };

export type ServerInfo = {
  name: string;
  version: string;
};

export type InitializeResult = {
  protocolVersion: string;
  capabilities: { tools: Record<string, never> };
  serverInfo: ServerInfo;
};

export type TextContent = {
  type: "text";
  text: string;
};

export type ImageContent = {
  type: "image";
  data: string;
  mimeType: ImageMimeType;
};

export type ToolCallResult = {
  content: Array<TextContent | ImageContent>;
  isError: boolean;
};

/** `interactive_feedback` arguments after validation, in camelCase. */
export type FeedbackToolArguments = {
  message: string;
  predefinedOptions?: string[];
  contextInfo?: string;
};

export type ToolCallParams = {
  name: typeof FEEDBACK_TOOL_NAME;
  arguments: FeedbackToolArguments;
};

export class RpcMethodError extends Error {
  constructor(
    readonly code: number,
    message: string,
    readonly data?: unknown,
  ) {
    super(message);
    this.name = "RpcMethodError";
  }
}

export function classifyFrame(value: unknown): IncomingFrame {
  if (Array.isArray(value)) {
    return { kind: "batch" };
  }
  if (!isRecord(value) || value.jsonrpc !== JSON_RPC_VERSION) {
    return { kind: "invalid" };
  }

  const method = value.method;
  if (typeof method !== "string" || !method.trim()) {
    return { kind: "invalid" };
  }
  if (!("id" in value)) {
    return { kind: "notification", method };
  }

  const id = value.id;
  if (!isJsonRpcId(id)) {
    return { kind: "invalid" };
  }
  return { kind: "request", request: { jsonrpc: JSON_RPC_VERSION, id, method, params: value.params } };
}

export function rpcResult(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: JSON_RPC_VERSION, id, result };
}

export function rpcError(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  return { jsonrpc: JSON_RPC_VERSION, id, error: { code, message, data } };
}

/** Anything that is not an RpcMethodError answers as an internal error. */
export function rpcFailure(id: JsonRpcId, error: unknown): JsonRpcResponse {
  if (error instanceof RpcMethodError) {
    return rpcError(id, error.code, error.message, error.data);
  }
  const message = error instanceof Error ? error.message : String(error);
  return rpcError(id, JSON_RPC_ERROR.INTERNAL_ERROR, message, { reason: "internal_error" });
}

export function buildToolCallResult(text: string, images: readonly ImageContent[]): ToolCallResult {
  return {
    content: [{ type: "text", text }, ...images],
    isError: false,
  };
}

/**
 * Validates `tools/call` params for the feedback tool. The wire names are
 * snake_case; blank optional strings are treated as absent.
 */
export function parseToolCallParams(params: unknown): ToolCallParams {
  if (!isRecord(params)) {
    throw invalidToolCall("expected object");
  }

  const name = typeof params.name === "string" ? params.name.trim() : "";
  if (!name) {
    throw invalidToolCall("`name` must be a non-empty string", "name");
  }
  if (name !== FEEDBACK_TOOL_NAME) {
    throw new RpcMethodError(JSON_RPC_ERROR.INVALID_PARAMS, `unknown tool: ${name}`, {
      reason: "unknown_tool",
      field: "name",
    });
  }

  return { name: FEEDBACK_TOOL_NAME, arguments: parseFeedbackToolArguments(params.arguments ?? {}) };
}

function parseFeedbackToolArguments(args: unknown): FeedbackToolArguments {
  if (!isRecord(args)) {
    throw invalidToolCall("`arguments` must be an object", "arguments");
  }

  const message = typeof args.message === "string" ? args.message.trim() : "";
  if (!message) {
    throw invalidToolCall("`message` must be a non-empty string", "message");
  }
  const parsed: FeedbackToolArguments = { message };

  const options = args.predefined_options;
  if (options !== undefined && options !== null) {
    if (!Array.isArray(options) || !options.every((entry): entry is string => typeof entry === "string")) {
      throw invalidToolCall("`predefined_options` must be an array of strings", "predefined_options");
    }
    parsed.predefinedOptions = options;
  }

  const context = args.context_info;
  if (context !== undefined && context !== null) {
    if (typeof context !== "string") {
      throw invalidToolCall("`context_info` must be a string", "context_info");
    }
    if (context.trim()) {
      parsed.contextInfo = context.trim();
    }
  }

  return parsed;
}

function invalidToolCall(problem: string, field?: string): RpcMethodError {
  return new RpcMethodError(
    JSON_RPC_ERROR.INVALID_PARAMS,
    `invalid params for tools/call: ${problem}`,
    field ? { reason: "invalid_params", field } : { reason: "invalid_params" },
  );
}

function isJsonRpcId(value: unknown): value is JsonRpcId {
  return value === null || typeof value === "string" || typeof value === "number";
}

export function safeJsonParse(raw: string): { ok: true; value: unknown } | { ok: false; error: Error } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
