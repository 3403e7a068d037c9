// src/executors/shell.ts
import { exec as cpExec } from "node:child_process";
import { promisify } from "node:util";
const exec = promisify(cpExec);

export interface ShellOptions {
  cwd: string;
  /** default 15s */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ShellResult {
  stdout: string;
  stderr: string;
  exit_code: number | string;
}

export async function runShell(cmd: string, opts: ShellOptions): Promise<ShellResult> {
  // POSIX: bash for the usual utilities; Windows keeps the platform default shell
  const shell = process.platform === "win32" ? undefined : "/bin/bash";
  try {
    const { stdout, stderr } = await exec(cmd, {
      cwd: opts.cwd,
      timeout: opts.timeoutMs ?? 15_000,
      shell,
      signal: opts.signal
    });
    return { stdout, stderr, exit_code: 0 };
  } catch (e) {
    if (!(e instanceof Error)) throw e;
    return {
      stdout: "stdout" in e && typeof e.stdout === "string" ? e.stdout : "",
      stderr: "stderr" in e && typeof e.stderr === "string" && e.stderr ? e.stderr : e.message,
      exit_code: exitCodeOf(e)
    };
  }
}

function exitCodeOf(e: Error): number | string {
  if ("code" in e && (typeof e.code === "number" || typeof e.code === "string")) return e.code;
  return "ERR";
}
