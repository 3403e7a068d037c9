import type { Message } from "../types/llm.js";
import type { ExecutionContext } from "../types/contracts.js";

export interface PromptParts {
  /** who the model is acting as */
  persona: string;
  task: string;
  context: ExecutionContext;
  /** extra lines appended under INSTRUCTIONS */
  instructions?: string[];
}

export function renderStepPrompt(parts: PromptParts): Message[] {
  const sys: Message = {
    role: "system",
    content: parts.persona
  };

  const inputLines: string[] = [];
  for (const [id, value] of Object.entries(parts.context)) {
    inputLines.push(`- step ${id}: ${value}`);
  }

  const user: Message = {
    role: "user",
    content: [
      `TASK: ${parts.task}`,
      "",
      "INPUTS:",
      ...(inputLines.length ? inputLines : ["(none)"]),
      ...(parts.instructions?.length ? ["", "INSTRUCTIONS:", ...parts.instructions.map(l => `- ${l}`)] : [])
    ].join("\n")
  };

  return [sys, user];
}
