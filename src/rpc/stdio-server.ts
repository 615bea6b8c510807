import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { feedbackConfig } from "../config.js";
import { createScopedLogger } from "../logging.js";
import { createFeedbackToolService } from "../server/feedback-tool.js";
import {
  JSON_RPC_ERROR,
  classifyFrame,
  rpcError,
  rpcFailure,
  rpcResult,
  safeJsonParse,
  type JsonRpcRequest,
} from "./protocol.js";
import { RpcRouter, type FeedbackToolHandler } from "./router.js";

const log = createScopedLogger("rpc");

export type RpcStdioServerOptions = {
  input?: Readable;
  output?: Writable;
  tool?: FeedbackToolHandler;
  /** Listen for SIGINT/SIGTERM; off when embedded in tests. */
  handleSignals?: boolean;
};

export async function startRpcStdioServer(options: RpcStdioServerOptions = {}): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const router = new RpcRouter(options.tool ?? createFeedbackToolService(feedbackConfig));
  const inFlight = new Set<Promise<void>>();

  const rl = readline.createInterface({
    input,
    crlfDelay: Infinity,
  });

  const writeJsonLine = (payload: unknown): void => {
    output.write(`${JSON.stringify(payload)}\n`);
  };

  const onRequest = async (request: JsonRpcRequest) => {
    try {
      const result = await router.dispatch(request);
      writeJsonLine(rpcResult(request.id, result));
    } catch (error) {
      log(`request ${request.method} failed: ${error instanceof Error ? error.message : String(error)}`);
      writeJsonLine(rpcFailure(request.id, error));
    }
  };

  rl.on("line", (line) => {
    const trimmed = line.trim();
    if (!trimmed) {
      return;
    }

    const parsed = safeJsonParse(trimmed);
    if (!parsed.ok) {
      writeJsonLine(
        rpcError(null, JSON_RPC_ERROR.PARSE_ERROR, `parse error: ${parsed.error.message}`, { reason: "parse_error" }),
      );
      return;
    }

    const frame = classifyFrame(parsed.value);
    switch (frame.kind) {
      case "request": {
        const pending = onRequest(frame.request);
        inFlight.add(pending);
        void pending.finally(() => inFlight.delete(pending));
        return;
      }
      case "notification":
        log(`notification ${frame.method} ignored`);
        return;
      case "batch":
        writeJsonLine(
          rpcError(null, JSON_RPC_ERROR.INVALID_REQUEST, "batch requests are not supported", {
            reason: "batch_not_supported",
          }),
        );
        return;
      case "invalid":
        writeJsonLine(rpcError(null, JSON_RPC_ERROR.INVALID_REQUEST, "invalid request", { reason: "invalid_request" }));
        return;
    }
  });

  log("json-rpc server listening on stdio");
  await new Promise<void>((resolve) => {
    rl.once("close", () => {
      resolve();
    });

    if (options.handleSignals ?? true) {
      process.once("SIGINT", () => {
        rl.close();
      });
      process.once("SIGTERM", () => {
        rl.close();
      });
    }
  });

  // answer requests that were already accepted before input ended
  await Promise.all(inFlight);
  log("json-rpc server stopped");
}
