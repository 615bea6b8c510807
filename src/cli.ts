#!/usr/bin/env node
import { parseUiArgs } from "./cli-args.js";
import { feedbackConfig } from "./config.js";
import { writeResultStream } from "./exchange/result-file.js";
import { startRpcStdioServer } from "./rpc/stdio-server.js";
import { runFeedbackUi } from "./ui/run.js";

const argv = process.argv.slice(2);

void main(argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[feedback] fatal: ${message}`);
  process.exitCode = 1;
});

async function main(args: string[]): Promise<void> {
  const first = (args[0] ?? "").trim().toLowerCase();

  if (!first || first === "serve") {
    await startRpcStdioServer();
    return;
  }

  if (first === "ui") {
    const parsed = parseUiArgs(args.slice(1));
    const result = await runFeedbackUi({
      request: parsed.request,
      imagesEnabled: parsed.imagesEnabled ?? feedbackConfig.imagesEnabled,
      outputFile: parsed.outputFile,
    });
    if (!parsed.outputFile) {
      await writeResultStream(process.stdout, result);
    }
    // stdout is flushed by now; an abandoned rewrite stream must not keep the window open
    process.exit(0);
  }

  console.error(`unknown subcommand: ${args[0]}`);
  console.error("usage:");
  console.error("  interactive-feedback [serve]    # start json-rpc stdio server");
  console.error("  interactive-feedback ui [--prompt <text>] [--predefined-options a|||b] [--context-info <text>]");
  console.error("                          [--output-file <path>] [--enable-images | --disable-image-upload]");
  process.exitCode = 1;
}
