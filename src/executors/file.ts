import { z } from "zod";
import type { Executor } from "../types/executors.js";
import { completeStep, type LLMExecutorOptions } from "./llm.js";
import { runShell } from "./shell.js";

export interface FileExecutorOptions extends LLMExecutorOptions {
  workDir: string;
  commandTimeoutMs?: number;
}

const commandSchema = z.object({ cmd: z.string().min(1) });

const PERSONA = [
  "You operate on files through a single shell command.",
  "Reply with strict JSON only: {\"cmd\": \"<one shell command>\"}.",
  "Never delete or overwrite files the task does not name."
].join("\n");

/**
 * Asks the model for one shell command and runs it in the working
 * directory. stdout is the step result; a non-zero exit fails the step.
 */
export function fileExecutor(opts: FileExecutorOptions): Executor {
  return {
    name: "file",
    async execute(task, context, signal) {
      const answer = await completeStep(opts, {
        persona: PERSONA,
        task,
        context,
        instructions: [`The working directory is ${opts.workDir}.`, "Use relative paths."],
        temperature: 0,
        max_tokens: 300,
        response_format: { type: "json_object" },
        signal
      });
      if (!answer.ok) return answer;

      const cmd = parseCommand(answer.output);
      if (!cmd) return { ok: false, error: `expected {"cmd": "..."} from the model, got: ${answer.output.slice(0, 200)}` };

      const res = await runShell(cmd, { cwd: opts.workDir, timeoutMs: opts.commandTimeoutMs, signal });
      if (res.exit_code !== 0) {
        return { ok: false, error: `\`${cmd}\` exited with ${res.exit_code}: ${res.stderr.trim()}` };
      }
      return { ok: true, output: res.stdout.trim() || `ran \`${cmd}\` (no output)` };
    }
  };
}

export function parseCommand(text: string): string | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = commandSchema.safeParse(raw);
  return parsed.success ? parsed.data.cmd.trim() || undefined : undefined;
}
