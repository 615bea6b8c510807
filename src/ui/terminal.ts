import fs from "node:fs";
import tty from "node:tty";
import { errorMessage } from "../errors.js";
import { createScopedLogger } from "../logging.js";

const log = createScopedLogger("terminal");

const CONTROLLING_TERMINAL = "/dev/tty";

export type TerminalStreams = {
  stdin: NodeJS.ReadStream;
  stdout: NodeJS.WriteStream;
  close: () => void;
};

/**
 * The ui usually runs as a child of the stdio server with stdin and stdout
 * redirected, so it talks to the controlling terminal directly.
 */
export function openTerminal(): TerminalStreams {
  if (process.stdin.isTTY && process.stdout.isTTY) {
    return { stdin: process.stdin, stdout: process.stdout, close: () => undefined };
  }

  const stdin = new tty.ReadStream(openControllingTerminal("r"));
  const stdout = new tty.WriteStream(openControllingTerminal("w"));
  log(`attached to ${CONTROLLING_TERMINAL}`);
  return {
    stdin,
    stdout,
    close: () => {
      stdin.destroy();
      stdout.destroy();
    },
  };
}

function openControllingTerminal(flags: "r" | "w"): number {
  try {
    return fs.openSync(CONTROLLING_TERMINAL, flags);
  } catch (error) {
    throw new Error(`no terminal available for the feedback ui: ${errorMessage(error)}`);
  }
}
