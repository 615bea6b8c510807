import { isFeedbackError } from "../errors.js";
import type { FeedbackToolService } from "../server/feedback-tool.js";
import {
  FEEDBACK_TOOL_NAME,
  JSON_RPC_ERROR,
  PROTOCOL_VERSION,
  RpcMethodError,
  buildToolCallResult,
  parseToolCallParams,
  type InitializeResult,
  type JsonRpcRequest,
  type ServerInfo,
  type ToolCallResult,
} from "./protocol.js";

export type FeedbackToolHandler = Pick<FeedbackToolService, "requestFeedback">;

const DEFAULT_SERVER_INFO: ServerInfo = {
  name: "interactive-feedback",
  version: "0.1.0",
};

export const FEEDBACK_TOOL_DEFINITION = {
  name: FEEDBACK_TOOL_NAME,
  description:
    "Ask the user for feedback in an interactive terminal window. The user can pick predefined options, " +
    "write free text, optionally enhance it, and choose whether the session should continue or terminate.",
  inputSchema: {
    type: "object",
    properties: {
      message: {
        type: "string",
        description: "The specific question for the user",
      },
      predefined_options: {
        type: "array",
        items: { type: "string" },
        description: "Predefined options for the user to choose from (optional)",
      },
      context_info: {
        type: "string",
        description: "Context information including project goals, current progress, tech stack, etc. (optional)",
      },
    },
    required: ["message"],
  },
} as const;

export class RpcRouter {
  constructor(
    private readonly tool: FeedbackToolHandler,
    private readonly serverInfo: ServerInfo = DEFAULT_SERVER_INFO,
  ) {}

  async dispatch(request: JsonRpcRequest): Promise<unknown> {
    switch (request.method) {
      case "initialize":
        return this.initialize();
      case "ping":
        return {};
      case "tools/list":
        return { tools: [FEEDBACK_TOOL_DEFINITION] };
      case "tools/call":
        return this.callTool(request.params);
      default:
        throw new RpcMethodError(JSON_RPC_ERROR.METHOD_NOT_FOUND, `method not found: ${request.method}`, {
          reason: "method_not_found",
        });
    }
  }

  private initialize(): InitializeResult {
    return {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: { tools: {} },
      serverInfo: this.serverInfo,
    };
  }

  private async callTool(rawParams: unknown): Promise<ToolCallResult> {
    const { arguments: args } = parseToolCallParams(rawParams);

    try {
      const response = await this.tool.requestFeedback(args.message, args.predefinedOptions, args.contextInfo);
      return buildToolCallResult(response.text, response.images);
    } catch (error) {
      if (isFeedbackError(error)) {
        throw new RpcMethodError(JSON_RPC_ERROR.SERVER_ERROR, error.message, {
          reason: error.code,
          ...error.data,
        });
      }
      throw error;
    }
  }
}
