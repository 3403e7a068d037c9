import type { ExecutorRegistry } from "../types/executors.js";
import type { LLMProvider } from "../types/llm.js";
import { casualExecutor } from "./casual.js";
import { coderExecutor } from "./coder.js";
import { fileExecutor } from "./file.js";
import { webExecutor, type WebSearchOptions } from "./web.js";

export interface ExecutorSetup {
  provider: LLMProvider;
  model: string;
  workDir: string;
  search: WebSearchOptions;
}

export function buildExecutorRegistry(setup: ExecutorSetup): ExecutorRegistry {
  const llm = { provider: setup.provider, model: setup.model };
  return {
    coder: coderExecutor(llm),
    file: fileExecutor({ ...llm, workDir: setup.workDir }),
    web: webExecutor(setup.search),
    casual: casualExecutor(llm)
  };
}
