import type { Executor } from "../types/executors.js";
import { completeStep, type LLMExecutorOptions } from "./llm.js";

const PERSONA = [
  "You are a senior software engineer.",
  "Write complete, working code for the task, in a single fenced code block per file,",
  "followed by at most three sentences on how to run it."
].join("\n");

export function coderExecutor(opts: LLMExecutorOptions): Executor {
  return {
    name: "coder",
    execute(task, context, signal) {
      return completeStep(opts, {
        persona: PERSONA,
        task,
        context,
        instructions: ["Use the INPUTS when they contain requirements, data or earlier code."],
        max_tokens: 1600,
        signal
      });
    }
  };
}
