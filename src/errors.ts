export class ExtractionError extends Error {
  readonly stderrTail: string;

  constructor(message: string, stderrTail = "") {
    super(message);
    this.name = "ExtractionError";
    this.stderrTail = stderrTail;
  }
}

export class TranscodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TranscodeError";
  }
}

export class DeliveryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DeliveryError";
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}

export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  return error.name === "AbortError" || /\baborted\b/i.test(error.message);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ProcessExitError extends Error {
  readonly exitCode: number | null;
  readonly stderrTail: string;

  constructor(command: string, exitCode: number | null, stderrTail: string) {
    super(`${command} exited with code ${exitCode ?? "null"}`);
    this.name = "ProcessExitError";
    this.exitCode = exitCode;
    this.stderrTail = stderrTail;
  }
}

export class OperationAbortedError extends Error {
  readonly reason: unknown;

  constructor(reason: unknown) {
    super(`Operation aborted: ${String(reason)}`);
    this.name = "AbortError";
    this.reason = reason;
  }
}

export function isProcessExitError(error: unknown): error is ProcessExitError {
  return error instanceof ProcessExitError;
}
