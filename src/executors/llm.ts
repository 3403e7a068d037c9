import type { ExecutionContext } from "../types/contracts.js";
import type { ExecutorResult } from "../types/executors.js";
import type { CompletionArgs, LLMProvider } from "../types/llm.js";
import { renderStepPrompt } from "../prompt/renderer.js";

export interface LLMExecutorOptions {
  provider: LLMProvider;
  model: string;
}

export interface CompletionRequest {
  persona: string;
  task: string;
  context: ExecutionContext;
  instructions?: string[];
  temperature?: number;
  max_tokens?: number;
  response_format?: CompletionArgs["response_format"];
  signal: AbortSignal;
}

export async function completeStep(opts: LLMExecutorOptions, req: CompletionRequest): Promise<ExecutorResult> {
  const out = await opts.provider.complete({
    model: opts.model,
    messages: renderStepPrompt({ persona: req.persona, task: req.task, context: req.context, instructions: req.instructions }),
    temperature: req.temperature ?? 0.2,
    max_tokens: req.max_tokens,
    response_format: req.response_format,
    signal: req.signal
  });
  const text = out.content.trim();
  if (!text) return { ok: false, error: "model returned an empty answer" };
  return { ok: true, output: text };
}
