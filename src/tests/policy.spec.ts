import { describe, it, expect } from 'vitest';
import { backoffFor, dispatchWithPolicy, resolvePolicy } from '../orchestrator/policy.js';
import { createDispatcher } from '../orchestrator/dispatch.js';
import type { ExecutorResult } from '../types/executors.js';
import { makePlan, sleep, uniformRegistry } from './helpers.js';

describe('step policy', () => {
  it('prefers capability overrides over run defaults', () => {
    const defaults = { timeoutMs: 1000, retries: 1, capabilities: { web: { retries: 3, backoffMs: 50 } } };
    expect(resolvePolicy(defaults, 'web')).toEqual({ timeoutMs: 1000, retries: 3, backoffMs: 50 });
    expect(resolvePolicy(defaults, 'coder')).toEqual({ timeoutMs: 1000, retries: 1, backoffMs: 1000 });
    expect(resolvePolicy({}, 'file')).toEqual({ timeoutMs: 0, retries: 0, backoffMs: 1000 });
  });

  it('doubles the backoff per attempt', () => {
    const p = { timeoutMs: 0, retries: 3, backoffMs: 100 };
    expect([0, 1, 2].map(a => backoffFor(p, a))).toEqual([100, 200, 400]);
  });

  it('retries until an attempt succeeds', async () => {
    let calls = 0;
    const dispatcher = createDispatcher(uniformRegistry({
      name: 'flaky',
      execute: (): ExecutorResult => (++calls < 3 ? { ok: false, error: `attempt ${calls}` } : { ok: true, output: 'finally' })
    }));
    const step = makePlan([{ id: 'f' }]).steps[0];
    const retried: number[] = [];

    const out = await dispatchWithPolicy(dispatcher, step, {}, { timeoutMs: 0, retries: 2, backoffMs: 1 }, new AbortController().signal, {
      onRetry: attempt => retried.push(attempt)
    });

    expect(out).toEqual({ ok: true, result: 'finally' });
    expect(step.attempts).toBe(3);
    expect(retried).toEqual([1, 2]);
  });

  it('gives up after the last retry with the last error', async () => {
    const dispatcher = createDispatcher(uniformRegistry({ name: 'casual', execute: () => ({ ok: false, error: 'always' }) }));
    const step = makePlan([{ id: 'f' }]).steps[0];
    const out = await dispatchWithPolicy(dispatcher, step, {}, { timeoutMs: 0, retries: 1, backoffMs: 1 }, new AbortController().signal);
    expect(out).toMatchObject({ ok: false, error: { kind: 'failed', message: 'casual: always' } });
    expect(step.attempts).toBe(2);
  });

  it('fails an attempt that outlives its timeout and aborts the executor', async () => {
    let seen: AbortSignal | undefined;
    const dispatcher = createDispatcher(uniformRegistry({
      name: 'hang',
      execute: (_task, _ctx, signal) => {
        seen = signal;
        return new Promise<ExecutorResult>(resolve => {
          signal.addEventListener('abort', () => resolve({ ok: false, error: 'aborted' }), { once: true });
        });
      }
    }));
    const step = makePlan([{ id: 't' }]).steps[0];

    const out = await dispatchWithPolicy(dispatcher, step, {}, { timeoutMs: 20, retries: 0, backoffMs: 1 }, new AbortController().signal);

    expect(out.ok).toBe(false);
    if (out.ok) return;
    expect(out.error.kind).toBe('timeout');
    expect(out.error.message).toBe('step "t" timed out after 20ms');
    expect(seen?.aborted).toBe(true);
  });

  it('times out an executor that blocks past its deadline', async () => {
    const dispatcher = createDispatcher(uniformRegistry({
      name: 'busy',
      execute: (): ExecutorResult => {
        const until = Date.now() + 60;
        while (Date.now() < until) {
          // spin
        }
        return { ok: true, output: 'late' };
      }
    }));
    const step = makePlan([{ id: 's' }]).steps[0];

    const out = await dispatchWithPolicy(dispatcher, step, {}, { timeoutMs: 20, retries: 0, backoffMs: 1 }, new AbortController().signal);

    expect(out).toMatchObject({ ok: false, error: { kind: 'timeout', message: 'step "s" timed out after 20ms' } });
  });

  it('does not retry while a timed-out attempt is still running', async () => {
    const events: string[] = [];
    let n = 0;
    const dispatcher = createDispatcher(uniformRegistry({
      name: 'deaf',
      execute: async (): Promise<ExecutorResult> => {
        const attempt = ++n;
        events.push(`start ${attempt}`);
        await sleep(60);
        events.push(`end ${attempt}`);
        return { ok: true, output: 'too late' };
      }
    }));
    const step = makePlan([{ id: 'd' }]).steps[0];
    let running: Promise<void> | undefined;

    const out = await dispatchWithPolicy(dispatcher, step, {}, { timeoutMs: 20, retries: 1, backoffMs: 1 }, new AbortController().signal, {
      onOverrun: r => {
        running = r;
      }
    });

    expect(out).toMatchObject({ ok: false, error: { kind: 'timeout' } });
    expect(events).toEqual(['start 1', 'end 1', 'start 2']);
    expect(running).toBeDefined();
    await running;
    expect(events).toEqual(['start 1', 'end 1', 'start 2', 'end 2']);
  });

  it('does not dispatch once the run is cancelled', async () => {
    let calls = 0;
    const dispatcher = createDispatcher(uniformRegistry({ name: 'casual', execute: () => ({ ok: true, output: String(++calls) }) }));
    const controller = new AbortController();
    controller.abort();
    const out = await dispatchWithPolicy(dispatcher, makePlan([{ id: 'c' }]).steps[0], {}, { timeoutMs: 0, retries: 2, backoffMs: 1 }, controller.signal);
    expect(out).toMatchObject({ ok: false, error: { kind: 'cancelled' } });
    expect(calls).toBe(0);
  });
});
