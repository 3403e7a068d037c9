export * from './types/contracts.js';
export type { Executor, ExecutorRegistry, ExecutorResult } from './types/executors.js';
export type { CompletionArgs, CompletionOut, LLMProvider, Message } from './types/llm.js';
export { PlanValidationError, ExecutionError, ConfigError, type ValidationIssue, type IssueCode } from './errors.js';
export { parsePlanDocument, parsePlanJson, planDocumentSchema, type PlanDocument } from './orchestrator/parse.js';
export { validatePlan, assertValidPlan, type ValidationResult } from './orchestrator/validate.js';
export { buildGraph, topoOrder, type StepGraph, type GraphNode } from './orchestrator/topo.js';
export { createDispatcher, type Dispatcher, type DispatchOutcome } from './orchestrator/dispatch.js';
export { CapabilityGate, DEFAULT_CONCURRENCY, type ConcurrencyLimits } from './orchestrator/gate.js';
export { resolvePolicy, dispatchWithPolicy, type StepPolicy, type CapabilityOptions, type PolicyDefaults } from './orchestrator/policy.js';
export { runPlan, DEFAULT_MAX_WORKERS, type RunOptions } from './orchestrator/run.js';
export { aggregate } from './orchestrator/aggregate.js';
export { createBlackboard, record, read, snapshot, type Blackboard } from './blackboard/index.js';
export { loadConfig, type EngineConfig } from './config.js';
export { OpenAIChatCompletions } from './llm/openai.js';
export { buildExecutorRegistry, type ExecutorSetup } from './executors/index.js';
