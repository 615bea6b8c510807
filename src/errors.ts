export type FeedbackErrorCode =
  | "empty_input"
  | "service_unavailable"
  | "upstream_error"
  | "empty_response"
  | "launch_failure"
  | "missing_result_file"
  | "result_read_failure"
  | "selector_frozen"
  | "reserved_directive"
  | "session_closed";

export class FeedbackError extends Error {
  readonly code: FeedbackErrorCode;
  readonly data?: Record<string, unknown>;

  constructor(code: FeedbackErrorCode, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = "FeedbackError";
    this.code = code;
    this.data = data;
  }
}

export function isFeedbackError(value: unknown): value is FeedbackError {
  return value instanceof FeedbackError;
}

export class EmptyInputError extends FeedbackError {
  constructor(message = "enter some text before enhancing it") {
    super("empty_input", message);
    this.name = "EmptyInputError";
  }
}

export class ServiceUnavailableError extends FeedbackError {
  constructor(message: string) {
    super("service_unavailable", message);
    this.name = "ServiceUnavailableError";
  }
}

export class UpstreamError extends FeedbackError {
  constructor(message: string, data?: Record<string, unknown>) {
    super("upstream_error", message, data);
    this.name = "UpstreamError";
  }
}

export class EmptyResponseError extends FeedbackError {
  constructor(message = "rewrite service returned an empty response") {
    super("empty_response", message);
    this.name = "EmptyResponseError";
  }
}

export class LaunchFailure extends FeedbackError {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stderrTail: string;

  constructor(
    message: string,
    details: { exitCode: number | null; signal: NodeJS.Signals | null; stderrTail: string },
  ) {
    super("launch_failure", message, {
      exit_code: details.exitCode,
      signal: details.signal,
      stderr_tail: details.stderrTail,
    });
    this.name = "LaunchFailure";
    this.exitCode = details.exitCode;
    this.signal = details.signal;
    this.stderrTail = details.stderrTail;
  }
}

export class MissingResultFile extends FeedbackError {
  readonly filePath: string;

  constructor(filePath: string) {
    super("missing_result_file", `result file does not exist: ${filePath}`, { file_path: filePath });
    this.name = "MissingResultFile";
    this.filePath = filePath;
  }
}

export class ResultReadFailure extends FeedbackError {
  readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super("result_read_failure", `unable to read result file ${filePath}: ${reason}`, {
      file_path: filePath,
    });
    this.name = "ResultReadFailure";
    this.filePath = filePath;
  }
}

export class SelectorFrozenError extends FeedbackError {
  constructor() {
    super("selector_frozen", "session directive is frozen after submission");
    this.name = "SelectorFrozenError";
  }
}

export class ReservedDirectiveError extends FeedbackError {
  constructor(directive: string) {
    super("reserved_directive", `session directive "${directive}" is reserved and cannot be selected`);
    this.name = "ReservedDirectiveError";
  }
}

export class SessionClosedError extends FeedbackError {
  constructor(operation: string) {
    super("session_closed", `feedback session already ended; cannot ${operation}`);
    this.name = "SessionClosedError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
