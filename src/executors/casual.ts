import type { Executor } from "../types/executors.js";
import { completeStep, type LLMExecutorOptions } from "./llm.js";

const PERSONA = "You are a helpful assistant. Answer plainly and concisely; when given earlier results, summarise what matters for the task.";

export function casualExecutor(opts: LLMExecutorOptions): Executor {
  return {
    name: "casual",
    execute(task, context, signal) {
      return completeStep(opts, { persona: PERSONA, task, context, temperature: 0.5, max_tokens: 800, signal });
    }
  };
}
