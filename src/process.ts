import { spawn } from "node:child_process";
import { TimeoutError, TransportError } from "./core/errors.js";

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

export interface RunOptions {
  input?: string;
  timeoutMs: number;
  cwd?: string;
}

/**
 * Run an external tool to completion. Rejects with TimeoutError when it
 * outlives `timeoutMs` (the process is killed) and with TransportError when
 * it cannot be started. A non-zero exit code is returned, not thrown.
 */
export function runProcess(command: string, args: string[], options: RunOptions): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd: options.cwd, stdio: ["pipe", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, options.timeoutMs);

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (err) => {
      clearTimeout(timer);
      reject(new TransportError(`Failed to start ${command}: ${err.message}`, { cause: err }));
    });

    child.on("close", (code) => {
      clearTimeout(timer);
      if (timedOut) {
        reject(new TimeoutError(command, options.timeoutMs));
        return;
      }
      resolve({
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
        exitCode: code,
      });
    });

    // EPIPE when the tool exits without reading its input.
    child.stdin.on("error", (err) => stderr.push(Buffer.from(`stdin: ${err.message}\n`)));
    child.stdin.end(options.input ?? "");
  });
}
