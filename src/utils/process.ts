import { spawn, type ChildProcess } from "node:child_process";

import { OperationAbortedError, ProcessExitError } from "../errors.js";
import { logger } from "../logger.js";

export type OutputStream = "stdout" | "stderr";

export interface RunProcessOptions {
  signal?: AbortSignal;
  onLine?: (line: string, stream: OutputStream) => void;
  tailLength?: number;
  /** Time between SIGTERM and SIGKILL once `signal` aborts. */
  killGraceMs?: number;
}

export interface ProcessOutput {
  stdoutTail: string;
  stderrTail: string;
}

const DEFAULT_TAIL_LENGTH = 4000;
const DEFAULT_KILL_GRACE_MS = 2000;
const USE_PROCESS_GROUPS = process.platform !== "win32";

function lineSplitter(emit: (line: string) => void): {
  push(chunk: string): void;
  flush(): void;
} {
  let buffer = "";
  return {
    push(chunk) {
      buffer += chunk;
      const lines = buffer.split(/\r?\n|\r/);
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (line.length > 0) {
          emit(line);
        }
      }
    },
    flush() {
      if (buffer.length > 0) {
        emit(buffer);
      }
      buffer = "";
    },
  };
}

/** Signals the child's whole process group, so helpers it spawned die with it. */
function signalTree(child: ChildProcess, signal: NodeJS.Signals): void {
  if (USE_PROCESS_GROUPS && child.pid !== undefined) {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch (error) {
      logger.debug({ err: error, pid: child.pid, signal }, "Process group signal failed");
    }
  }
  child.kill(signal);
}

export function runProcess(
  command: string,
  args: string[],
  options: RunProcessOptions = {},
): Promise<ProcessOutput> {
  const tailLength = options.tailLength ?? DEFAULT_TAIL_LENGTH;
  const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  const signal = options.signal;

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationAbortedError(signal.reason));
      return;
    }

    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      detached: USE_PROCESS_GROUPS,
    });
    let stdoutTail = "";
    let stderrTail = "";
    let settled = false;

    const stdoutLines = lineSplitter((line) => options.onLine?.(line, "stdout"));
    const stderrLines = lineSplitter((line) => options.onLine?.(line, "stderr"));

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdoutTail = (stdoutTail + chunk).slice(-tailLength);
      stdoutLines.push(chunk);
    });
    child.stderr.on("data", (chunk: string) => {
      stderrTail = (stderrTail + chunk).slice(-tailLength);
      stderrLines.push(chunk);
    });

    let killTimer: NodeJS.Timeout | null = null;
    const onAbort = (): void => {
      signalTree(child, "SIGTERM");
      killTimer = setTimeout(() => {
        logger.warn({ command, pid: child.pid, killGraceMs }, "Process ignored SIGTERM, killing");
        signalTree(child, "SIGKILL");
      }, killGraceMs);
      killTimer.unref();
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    const settle = (error: Error | null): void => {
      if (settled) {
        return;
      }
      settled = true;
      signal?.removeEventListener("abort", onAbort);
      if (killTimer) {
        clearTimeout(killTimer);
      }
      if (error) {
        reject(error);
      } else {
        resolve({ stdoutTail: stdoutTail.trim(), stderrTail: stderrTail.trim() });
      }
    };

    child.on("error", (error) => {
      settle(error);
    });

    child.on("close", (code) => {
      stdoutLines.flush();
      stderrLines.flush();

      if (signal?.aborted) {
        settle(new OperationAbortedError(signal.reason));
        return;
      }

      if (code === 0) {
        settle(null);
        return;
      }

      settle(new ProcessExitError(command, code, stderrTail.trim()));
    });
  });
}
