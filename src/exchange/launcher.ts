import { spawn } from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { LaunchFailure, errorMessage } from "../errors.js";
import type { FeedbackRequest, FeedbackResult } from "../feedback-types.js";
import { joinPredefinedOptions } from "../core/submission.js";
import { createScopedLogger } from "../logging.js";
import { consumeResultFile } from "./result-file.js";

const log = createScopedLogger("launcher");

const RESULT_FILE_NAME = "feedback-result.json";
const MAX_STDERR_TAIL_CHARS = 4_000;

export type LaunchOptions = {
  imagesEnabled: boolean;
  /** Program that runs the ui; defaults to this CLI under the current node binary. */
  command?: string;
  args?: string[];
  /** Optional wrapper, e.g. a terminal emulator, placed before the ui command. */
  terminalCommand?: string[];
  tmpRoot?: string;
  env?: NodeJS.ProcessEnv;
};

type ExitStatus = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  spawnError: Error | null;
};

export function buildUiArguments(request: FeedbackRequest, outputFile: string, imagesEnabled: boolean): string[] {
  return [
    "--prompt",
    request.prompt,
    "--output-file",
    outputFile,
    "--predefined-options",
    joinPredefinedOptions(request.predefinedOptions),
    "--context-info",
    request.contextInfo,
    imagesEnabled ? "--enable-images" : "--disable-image-upload",
  ];
}

function defaultUiInvocation(): { command: string; args: string[] } {
  return {
    command: process.execPath,
    args: [...process.execArgv, ...process.argv.slice(1, 2), "ui"],
  };
}

/**
 * Runs the ui as a separate process and waits for the result file it leaves
 * behind. The private temp directory is removed however the run ends.
 */
export async function launchFeedbackUi(request: FeedbackRequest, options: LaunchOptions): Promise<FeedbackResult> {
  const tmpRoot = options.tmpRoot ?? os.tmpdir();
  const workDir = await fs.promises.mkdtemp(path.join(tmpRoot, "feedback-"));
  const outputFile = path.join(workDir, RESULT_FILE_NAME);

  try {
    const invocation = options.command
      ? { command: options.command, args: options.args ?? [] }
      : defaultUiInvocation();
    const uiArgs = [...invocation.args, ...buildUiArguments(request, outputFile, options.imagesEnabled)];
    const [wrapper, ...wrapperArgs] = options.terminalCommand ?? [];
    const command = wrapper ?? invocation.command;
    const args = wrapper ? [...wrapperArgs, invocation.command, ...uiArgs] : uiArgs;

    log(`spawning ${command} (${args.length} args)`);
    let stderrTail = "";
    const child = spawn(command, args, {
      env: options.env ?? process.env,
      stdio: ["ignore", "ignore", "pipe"],
      windowsHide: true,
    });
    child.stderr?.on("data", (chunk) => {
      stderrTail = `${stderrTail}${String(chunk)}`.slice(-MAX_STDERR_TAIL_CHARS);
    });

    const status = await new Promise<ExitStatus>((resolve) => {
      child.on("close", (exitCode, signal) => {
        resolve({ exitCode, signal, spawnError: null });
      });
      child.on("error", (error) => {
        resolve({ exitCode: null, signal: null, spawnError: error });
      });
    });
    log(`ui exited (code=${status.exitCode ?? "null"}, signal=${status.signal ?? "null"})`);

    if (status.spawnError) {
      throw new LaunchFailure(`unable to start feedback ui: ${errorMessage(status.spawnError)}`, {
        exitCode: null,
        signal: null,
        stderrTail,
      });
    }
    if (status.exitCode !== 0) {
      const how = status.signal ? `signal ${status.signal}` : `exit code ${status.exitCode ?? "null"}`;
      throw new LaunchFailure(`feedback ui failed with ${how}`, {
        exitCode: status.exitCode,
        signal: status.signal,
        stderrTail,
      });
    }

    return consumeResultFile(outputFile);
  } finally {
    await fs.promises.rm(workDir, { recursive: true, force: true });
  }
}
