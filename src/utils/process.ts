/**
 * Run a short-lived child process (ffprobe, ffplay, one-shot ffmpeg decode) and collect its output.
 */

import { spawn } from "child_process";
import { TimeoutError } from "./async";

export interface ProcessResult {
  code: number | null;
  stdout: Buffer;
  stderr: string;
}

export interface RunProcessOptions {
  timeoutMs: number;
  /** Label used in timeout errors. */
  label?: string;
}

export function runProcess(command: string, args: string[], options: RunProcessOptions): Promise<ProcessResult> {
  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    let stderr = "";
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      child.kill("SIGKILL");
      reject(new TimeoutError(options.label ?? command, options.timeoutMs));
    }, options.timeoutMs);

    child.stdout.on("data", (buf: Buffer) => stdout.push(buf));
    child.stderr.on("data", (buf: Buffer) => {
      // Keep only the tail; ffmpeg tools are chatty.
      stderr = (stderr + buf.toString("utf8")).slice(-4000);
    });
    child.on("error", (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(err);
    });
    child.on("close", (code) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({ code, stdout: Buffer.concat(stdout), stderr });
    });
  });
}
