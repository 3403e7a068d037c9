import { z } from "zod";
import type { CompletionArgs, CompletionOut, LLMProvider } from "../types/llm.js";

const responseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullish() }).optional(),
    finish_reason: z.enum(["stop", "length", "tool_calls", "content_filter"]).nullish()
  })).default([]),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
    total_tokens: z.number()
  }).optional()
});

export class OpenAIChatCompletions implements LLMProvider {
  constructor(
    private apiKey: string,
    private baseUrl: string = 'https://api.openai.com/v1'
  ) {}

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/chat/completions`;

    const body = {
      model: args.model,
      messages: args.messages.map(m => ({ role: m.role, content: m.content })),
      temperature: args.temperature ?? 0,
      max_tokens: args.max_tokens ?? 800,
      stop: args.stop,
      top_p: args.top_p,
      response_format: args.response_format
    };

    const res = await fetch(url, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'authorization': `Bearer ${this.apiKey}`
      },
      body: JSON.stringify(body),
      signal: args.signal
    });
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`LLM HTTP ${res.status}: ${text}`);
    }
    const data = responseSchema.parse(await res.json());
    const choice = data.choices[0];

    const out: CompletionOut = { content: choice?.message?.content ?? '' };
    if (choice?.finish_reason) out.finish_reason = choice.finish_reason;
    if (data.usage) out.usage = data.usage;
    return out;
  }
}
