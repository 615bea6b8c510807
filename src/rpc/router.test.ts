import { describe, expect, it, vi } from "vitest";
import { LaunchFailure } from "../errors.js";
import type { FeedbackToolHandler } from "./router.js";
import { RpcRouter } from "./router.js";
import { JSON_RPC_ERROR, RpcMethodError } from "./protocol.js";

function buildToolStub() {
  return {
    requestFeedback: vi.fn<FeedbackToolHandler["requestFeedback"]>(async () => ({
      text: "looks good\n\n[会话控制: continue]",
      directive: "continue",
      images: [{ type: "image", data: "iVBORw0KGgo=", mimeType: "image/png" }],
    })),
  };
}

function call(router: RpcRouter, params: unknown) {
  return router.dispatch({ jsonrpc: "2.0", id: 1, method: "tools/call", params });
}

describe("rpc router", () => {
  it("answers the handshake and ping", async () => {
    const router = new RpcRouter(buildToolStub());

    await expect(router.dispatch({ jsonrpc: "2.0", id: 1, method: "initialize", params: {} })).resolves.toEqual({
      protocolVersion: "2024-11-05",
      capabilities: { tools: {} },
      serverInfo: { name: "interactive-feedback", version: "0.1.0" },
    });
    await expect(router.dispatch({ jsonrpc: "2.0", id: 2, method: "ping" })).resolves.toEqual({});
  });

  it("lists the feedback tool", async () => {
    const router = new RpcRouter(buildToolStub());
    const result = await router.dispatch({ jsonrpc: "2.0", id: 1, method: "tools/list" });

    expect(result).toMatchObject({
      tools: [{ name: "interactive_feedback", inputSchema: { required: ["message"] } }],
    });
  });

  it("forwards tool calls and returns text plus images", async () => {
    const tool = buildToolStub();
    const router = new RpcRouter(tool);

    const result = await call(router, {
      name: "interactive_feedback",
      arguments: { message: "ready?", predefined_options: ["yes", "no"], context_info: "cli repo" },
    });

    expect(tool.requestFeedback).toHaveBeenCalledWith("ready?", ["yes", "no"], "cli repo");
    expect(result).toEqual({
      content: [
        { type: "text", text: "looks good\n\n[会话控制: continue]" },
        { type: "image", data: "iVBORw0KGgo=", mimeType: "image/png" },
      ],
      isError: false,
    });
  });

  it("throws method not found for unknown methods", async () => {
    const router = new RpcRouter(buildToolStub());

    await expect(
      router.dispatch({
        jsonrpc: "2.0",
        id: 1,
        method: "nope.method",
        params: {},
      }),
    ).rejects.toMatchObject({
      code: JSON_RPC_ERROR.METHOD_NOT_FOUND,
    } satisfies Partial<RpcMethodError>);
  });

  it("validates tool arguments", async () => {
    const tool = buildToolStub();
    const router = new RpcRouter(tool);

    await expect(call(router, { name: "interactive_feedback", arguments: {} })).rejects.toMatchObject({
      code: JSON_RPC_ERROR.INVALID_PARAMS,
      data: { reason: "invalid_params", field: "message" },
    });
    await expect(
      call(router, { name: "interactive_feedback", arguments: { message: "x", predefined_options: [1] } }),
    ).rejects.toMatchObject({
      code: JSON_RPC_ERROR.INVALID_PARAMS,
      data: { field: "predefined_options" },
    });
    await expect(call(router, { name: "other_tool", arguments: { message: "x" } })).rejects.toMatchObject({
      code: JSON_RPC_ERROR.INVALID_PARAMS,
      data: { reason: "unknown_tool" },
    });
    expect(tool.requestFeedback).not.toHaveBeenCalled();
  });

  it("maps exchange failures to server errors", async () => {
    const tool = buildToolStub();
    tool.requestFeedback.mockRejectedValueOnce(
      new LaunchFailure("feedback ui failed with exit code 1", { exitCode: 1, signal: null, stderrTail: "" }),
    );
    const router = new RpcRouter(tool);

    await expect(call(router, { name: "interactive_feedback", arguments: { message: "x" } })).rejects.toMatchObject({
      code: JSON_RPC_ERROR.SERVER_ERROR,
      message: "feedback ui failed with exit code 1",
      data: { reason: "launch_failure", exit_code: 1, signal: null, stderr_tail: "" },
    });
  });
});
