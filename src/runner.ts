#!/usr/bin/env node
// src/runner.ts
// Command-line runner:
// - loads a { plan: [...] } document from --plan
// - validates it and prints every issue (exit 2) before anything runs
// - --dry-run prints a topological order and stops
// - otherwise runs the plan with the bundled executors and prints the report
//   (--json for the raw report); exit 0 only when every step completed
import 'dotenv/config';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, type EngineConfig } from './config.js';
import { ConfigError, PlanValidationError, errorMessage } from './errors.js';
import { buildExecutorRegistry } from './executors/index.js';
import { OpenAIChatCompletions } from './llm/openai.js';
import { createDispatcher } from './orchestrator/dispatch.js';
import { COLOR, fmtMs, logWarn, preview } from './orchestrator/log.js';
import { parsePlanJson } from './orchestrator/parse.js';
import { runPlan } from './orchestrator/run.js';
import { buildGraph, topoOrder } from './orchestrator/topo.js';
import { assertValidPlan } from './orchestrator/validate.js';
import type { ExecutionReport, Plan } from './types/contracts.js';
import type { ExecutorRegistry } from './types/executors.js';

type Env = Record<string, string | undefined>;

export interface CliFlags {
  planPath?: string;
  dryRun?: boolean;
  json?: boolean;
  policy?: string;
  maxWorkers?: string;
  timeoutMs?: string;
}

const USAGE = 'Usage: node dist/runner.js --plan path/to/plan.json [--dry-run] [--json] [--policy best-effort|fail-fast] [--max-workers N] [--timeout-ms N]';

const VALUE_FLAGS = {
  '--plan': 'planPath',
  '--policy': 'policy',
  '--max-workers': 'maxWorkers',
  '--timeout-ms': 'timeoutMs'
} as const satisfies Record<string, keyof CliFlags>;

function isValueFlag(name: string): name is keyof typeof VALUE_FLAGS {
  return Object.hasOwn(VALUE_FLAGS, name);
}

/** Throws on unknown flags and on value flags given without a value. */
export function parseArgs(argv: string[]): CliFlags {
  const out: CliFlags = {};
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    const eq = a.indexOf('=');
    const name = eq >= 0 ? a.slice(0, eq) : a;

    if (eq < 0 && name === '--dry-run') out.dryRun = true;
    else if (eq < 0 && name === '--json') out.json = true;
    else if (isValueFlag(name)) {
      let value: string | undefined;
      if (eq >= 0) value = a.slice(eq + 1);
      else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) value = argv[++i];
      if (!value) throw new Error(`${name} needs a value`);
      out[VALUE_FLAGS[name]] = value;
    } else {
      throw new Error(`unknown option ${a}`);
    }
  }
  return out;
}

/** Flags win over the environment; both go through loadConfig's checks. */
function withFlags(env: Env, flags: CliFlags): Env {
  const merged: Env = { ...env };
  if (flags.policy !== undefined) merged.FAILURE_POLICY = flags.policy;
  if (flags.maxWorkers !== undefined) merged.MAX_WORKERS = flags.maxWorkers;
  if (flags.timeoutMs !== undefined) merged.STEP_TIMEOUT_MS = flags.timeoutMs;
  return merged;
}

export function formatReport(report: ExecutionReport): string[] {
  const lines = report.steps.map(s => {
    const head = `• ${s.id} [${s.capability}] ${s.status}`;
    const took = s.duration_ms !== undefined ? ` (${fmtMs(s.duration_ms)})` : '';
    if (s.status === 'completed') return `${head}${took}: ${preview(s.result ?? '', 120)}`;
    if (s.status === 'failed') return `${head}${took}: ${s.error?.kind ?? 'failed'}: ${preview(s.error?.message ?? '', 120)}`;
    if (s.status === 'blocked') return `${head} (needs ${s.blocked_by ?? '?'})`;
    return head;
  });
  lines.push(`outcome: ${report.outcome}`);
  return lines;
}

function executorsFor(config: EngineConfig): ExecutorRegistry {
  if (!config.openai.apiKey) {
    logWarn('[warn] OPENAI_API_KEY not set. Steps using the LLM will fail.');
  }
  const provider = new OpenAIChatCompletions(config.openai.apiKey || 'DUMMY', config.openai.baseUrl);
  return buildExecutorRegistry({ provider, model: config.model, workDir: config.workDir, search: config.tavily });
}

/** Config and plan, or the exit code when either is rejected. */
function prepare(planPath: string, flags: CliFlags, env: Env): { config: EngineConfig; plan: Plan } | number {
  try {
    const config = loadConfig(withFlags(env, flags));
    const plan = assertValidPlan(parsePlanJson(fs.readFileSync(planPath, 'utf8')));
    return { config, plan };
  } catch (e) {
    if (e instanceof PlanValidationError) {
      console.error(COLOR.red(`[invalid plan] ${planPath}`));
      for (const issue of e.issues) console.error(`  • [${issue.code}] ${issue.message}`);
      return 2;
    }
    if (e instanceof ConfigError) {
      console.error(COLOR.red(`[config] ${e.message}`));
      return 2;
    }
    throw e;
  }
}

/**
 * Returns the process exit code. `registry` replaces the bundled
 * executors (used by tests and embedders).
 */
export async function runPlanFile(flags: CliFlags, env: Env = process.env, registry?: ExecutorRegistry): Promise<number> {
  if (!flags.planPath) throw new Error('--plan is required');
  const prepared = prepare(flags.planPath, flags, env);
  if (typeof prepared === 'number') return prepared;
  const { config, plan } = prepared;

  if (flags.dryRun) {
    const order = topoOrder(buildGraph(plan));
    order.forEach((id, i) => {
      const s = plan.index.get(id);
      console.log(`${i + 1}. ${id} [${s?.capability}] ${s ? preview(s.description) : ''}`.trimEnd());
    });
    return 0;
  }

  const report = await runPlan(plan, createDispatcher(registry ?? executorsFor(config)), {
    maxWorkers: config.maxWorkers,
    failurePolicy: config.failurePolicy,
    timeoutMs: config.timeoutMs,
    retries: config.retries,
    backoffMs: config.backoffMs,
    capabilities: config.capabilities,
    runId: env.RUN_ID
  });

  if (flags.json) console.log(JSON.stringify(report, null, 2));
  else for (const line of formatReport(report)) console.log(line);
  return report.outcome === 'AllCompleted' ? 0 : 1;
}

const entry = process.argv[1] ? path.basename(process.argv[1]).replace(/\.[cm]?[jt]s$/, '') : '';
if (entry === 'runner' || entry === 'taskweave') {
  (async () => {
    let flags: CliFlags;
    try {
      flags = parseArgs(process.argv);
    } catch (e) {
      console.error(COLOR.red(errorMessage(e)));
      console.error(USAGE);
      process.exit(2);
    }
    if (!flags.planPath) {
      console.error(USAGE);
      process.exit(2);
    }
    process.exitCode = await runPlanFile(flags);
  })().catch(e => { console.error('[fatal]', e); process.exit(1); });
}
