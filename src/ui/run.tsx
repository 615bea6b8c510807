import React from "react";
import { render } from "ink";
import { feedbackConfig, type FeedbackConfig } from "../config.js";
import { FeedbackSession } from "../core/feedback-session.js";
import { createRewriteCapability } from "../enhancer/index.js";
import type { RewriteCapability } from "../enhancer/types.js";
import { writeResultFile } from "../exchange/result-file.js";
import type { FeedbackRequest, FeedbackResult } from "../feedback-types.js";
import { createScopedLogger } from "../logging.js";
import { FeedbackApp } from "./feedback-app.js";
import { openTerminal } from "./terminal.js";

const log = createScopedLogger("ui");

export type RunFeedbackUiOptions = {
  request: FeedbackRequest;
  imagesEnabled: boolean;
  outputFile?: string;
  config?: FeedbackConfig;
  capability?: RewriteCapability;
};

/** Shows the feedback ui until the user submits or closes it. */
export async function runFeedbackUi(options: RunFeedbackUiOptions): Promise<FeedbackResult> {
  const config = options.config ?? feedbackConfig;
  const capability = options.capability ?? createRewriteCapability(config);
  if (!capability.isAvailable()) {
    log(capability.unavailableReason() ?? "prompt enhancement unavailable");
  }

  const session = new FeedbackSession({
    request: options.request,
    imagesEnabled: options.imagesEnabled,
    maxImages: config.maxImages,
    capability,
    systemInstruction: config.rewriteSystemInstruction,
    streaming: config.rewriteStreaming,
  });

  const result = await renderUntilExit(session);
  if (options.outputFile) {
    writeResultFile(options.outputFile, result);
    log(`result written to ${options.outputFile}`);
  }
  return result;
}

async function renderUntilExit(session: FeedbackSession): Promise<FeedbackResult> {
  const terminal = openTerminal();
  try {
    const instance = render(<FeedbackApp session={session} />, {
      stdin: terminal.stdin,
      stdout: terminal.stdout,
      exitOnCtrlC: false,
      patchConsole: false,
    });
    await instance.waitUntilExit();
    // an app that exits without a decision counts as closing the window
    return session.close();
  } finally {
    terminal.close();
  }
}
