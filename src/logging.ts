import fs from "node:fs";
import path from "node:path";
import { feedbackConfig } from "./config.js";

type LogSink = {
  debug: boolean;
  logFile: string;
};

let sink: LogSink = {
  debug: feedbackConfig.debug,
  logFile: feedbackConfig.logFile,
};
let logFileFailureReported = false;

export function configureLogging(next: Partial<LogSink>): void {
  sink = { ...sink, ...next };
  logFileFailureReported = false;
}

/**
 * Debug output never goes to stdout: stdout carries json-rpc frames in the
 * server and the ink frame in the ui.
 */
export function debugLog(scope: string, message: string): void {
  const line = `[feedback:${scope}] ${message}`;
  if (sink.debug) {
    process.stderr.write(`${line}\n`);
  }
  if (!sink.logFile) {
    return;
  }

  try {
    fs.mkdirSync(path.dirname(path.resolve(sink.logFile)), { recursive: true });
    fs.appendFileSync(sink.logFile, `[${new Date().toISOString()}] ${line}\n`, "utf8");
  } catch (error) {
    if (!logFileFailureReported) {
      logFileFailureReported = true;
      const reason = error instanceof Error ? error.message : String(error);
      process.stderr.write(`[feedback] unable to write log file ${sink.logFile}: ${reason}\n`);
    }
  }
}

export function createScopedLogger(scope: string): (message: string) => void {
  return (message) => debugLog(scope, message);
}
