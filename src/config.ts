import { z } from "zod";
import { CAPABILITIES, type Capability, type FailurePolicy } from "./types/contracts.js";
import type { CapabilityOptions } from "./orchestrator/policy.js";
import { ConfigError } from "./errors.js";

export interface EngineConfig {
  maxWorkers: number;
  failurePolicy: FailurePolicy;
  timeoutMs: number;
  retries: number;
  backoffMs: number;
  capabilities: Partial<Record<Capability, CapabilityOptions>>;
  model: string;
  openai: { apiKey?: string; baseUrl: string };
  tavily: { apiKey?: string; baseUrl?: string };
  workDir: string;
}

type Env = Record<string, string | undefined>;

const count = z.coerce.number().int().min(0);
const positive = z.coerce.number().int().min(1);

const baseSchema = z.object({
  MAX_WORKERS: positive.default(4),
  FAILURE_POLICY: z.enum(["best-effort", "fail-fast"]).default("best-effort"),
  STEP_TIMEOUT_MS: count.default(120_000),
  RETRIES: count.default(0),
  RETRY_BACKOFF_MS: count.default(1000),
  MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  TAVILY_API_KEY: z.string().optional(),
  TAVILY_BASE_URL: z.string().url().optional(),
  WORK_DIR: z.string().optional()
});

/** `<CAP>_CONCURRENCY=0` lifts the limit. */
const capabilitySchema = z.object({
  CONCURRENCY: count.optional(),
  TIMEOUT_MS: count.optional(),
  RETRIES: count.optional(),
  RETRY_BACKOFF_MS: count.optional()
});

/** Empty strings count as unset, as they do in most .env files. */
function clean(env: Env): Env {
  const out: Env = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== "") out[k] = v.trim();
  }
  return out;
}

export function loadConfig(env: Env = process.env): EngineConfig {
  const vars = clean(env);
  const problems: string[] = [];

  const base = baseSchema.safeParse(vars);
  if (!base.success) {
    for (const issue of base.error.issues) problems.push(`${issue.path.join(".")}: ${issue.message}`);
  }

  const capabilities: Partial<Record<Capability, CapabilityOptions>> = {};
  for (const cap of CAPABILITIES) {
    const prefix = `${cap.toUpperCase()}_`;
    const scoped: Env = {};
    for (const [k, v] of Object.entries(vars)) {
      if (k.startsWith(prefix)) scoped[k.slice(prefix.length)] = v;
    }
    const parsed = capabilitySchema.safeParse(scoped);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) problems.push(`${prefix}${issue.path.join(".")}: ${issue.message}`);
      continue;
    }
    const c = parsed.data;
    const opts: CapabilityOptions = {};
    if (c.CONCURRENCY !== undefined) opts.concurrency = c.CONCURRENCY === 0 ? Number.POSITIVE_INFINITY : c.CONCURRENCY;
    if (c.TIMEOUT_MS !== undefined) opts.timeoutMs = c.TIMEOUT_MS;
    if (c.RETRIES !== undefined) opts.retries = c.RETRIES;
    if (c.RETRY_BACKOFF_MS !== undefined) opts.backoffMs = c.RETRY_BACKOFF_MS;
    if (Object.keys(opts).length) capabilities[cap] = opts;
  }

  if (!base.success || problems.length) throw new ConfigError(problems);
  const b = base.data;
  return {
    maxWorkers: b.MAX_WORKERS,
    failurePolicy: b.FAILURE_POLICY,
    timeoutMs: b.STEP_TIMEOUT_MS,
    retries: b.RETRIES,
    backoffMs: b.RETRY_BACKOFF_MS,
    capabilities,
    model: b.MODEL,
    openai: { apiKey: b.OPENAI_API_KEY, baseUrl: b.OPENAI_BASE_URL },
    tavily: { apiKey: b.TAVILY_API_KEY, baseUrl: b.TAVILY_BASE_URL },
    workDir: b.WORK_DIR ?? process.cwd()
  };
}
