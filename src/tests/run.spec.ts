import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, existsSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runTask, solvePlan } from '../orchestrator/run.js';
import { UnknownReferenceError, ToolExecutionError } from '../orchestrator/errors.js';
import { buildToolRegistry } from '../tools/registry.js';
import { ScriptedProvider, SALLY, tool, untilAborted, sleep } from './helpers.js';

const num = (v: unknown) => Number(v);
const QUESTION = 'Sally has 3 apples and buys 2 more, then triples them. How many?';

function mathTools(spy = vi.fn(([a, b]: unknown[]) => num(a) + num(b))) {
  return {
    spy,
    tools: buildToolRegistry([tool('add', spy), tool('multiply', ([a, b]) => num(a) * num(b))])
  };
}

describe('runTask', () => {
  const dirs: string[] = [];
  afterEach(() => {
    for (const d of dirs.splice(0)) rmSync(d, { recursive: true, force: true });
  });

  it('plans, executes, fills and refines', async () => {
    const provider = new ScriptedProvider([SALLY, '  Sally has 15 apples.  ']);
    const { tools } = mathTools();
    const out = await runTask({ provider, tools, question: QUESTION, model: 'test-model' });

    expect(out.ok).toBe(true);
    if (!out.ok) return;
    expect(out.answer).toBe('Sally has 15 apples.');
    expect(out.filled_plan).toBe('Sally has 5 apples... multiplies by 3, 15 apples.');
    expect(out.results).toEqual({ y1: 5, y2: 15 });
    expect(out.diagnostics).toEqual([]);

    expect(provider.calls).toHaveLength(2);
    expect(provider.calls[0].model).toBe('test-model');
    expect(provider.calls[0].messages[1].content.endsWith(`Question: ${QUESTION}\nPlan:`)).toBe(true);
    expect(provider.calls[1].messages[1].content).toBe(
      `QUESTION:\n${QUESTION}\n\nSOLUTION:\nSally has 5 apples... multiplies by 3, 15 apples.`
    );
  });

  it('passes a plan with no calls through unchanged', async () => {
    const provider = new ScriptedProvider(['No tools needed: the answer is 42.', '42']);
    const out = await runTask({ provider, tools: mathTools().tools, question: 'q', model: 'm' });
    expect(out.ok).toBe(true);
    if (!out.ok) return;
    expect(out.filled_plan).toBe('No tools needed: the answer is 42.');
    expect(out.results).toEqual({});
  });

  it('fails at graph construction on a cycle without invoking any tool', async () => {
    const provider = new ScriptedProvider(['[FUNC add(y3, 1) = y2] and [FUNC add(y2, 1) = y3]']);
    const { tools, spy } = mathTools();
    const out = await runTask({ provider, tools, question: 'q', model: 'm' });

    expect(out.ok).toBe(false);
    if (out.ok) return;
    expect(out.stage).toBe('graph');
    expect(out.reason).toBe('dependency cycle: y2 -> y3 -> y2');
    expect(spy).not.toHaveBeenCalled();
    expect(provider.calls).toHaveLength(1);
  });

  it('fails at graph construction on an unknown reference', async () => {
    const provider = new ScriptedProvider(['[FUNC add(y5, 1) = y1]']);
    const { tools, spy } = mathTools();
    const out = await runTask({ provider, tools, question: 'q', model: 'm' });

    expect(out.ok).toBe(false);
    if (out.ok) return;
    expect(out.stage).toBe('graph');
    expect(out.error).toBeInstanceOf(UnknownReferenceError);
    expect(spy).not.toHaveBeenCalled();
  });

  it('reports a failed tool and produces no answer', async () => {
    const provider = new ScriptedProvider(['[FUNC add(1, 2) = y1] [FUNC boom(y1) = y2]', 'unused']);
    const tools = buildToolRegistry([
      tool('add', ([a, b]) => num(a) + num(b)),
      tool('boom', () => { throw new Error('kaboom'); }, 1)
    ]);
    const out = await runTask({ provider, tools, question: 'q', model: 'm' });

    expect(out.ok).toBe(false);
    if (out.ok) return;
    expect(out.stage).toBe('execute');
    expect(out.reason).toBe('boom(3) = y2 failed: kaboom');
    expect(out.error).toBeInstanceOf(ToolExecutionError);
    expect(out.results).toEqual({ y1: 3 });
    expect('answer' in out).toBe(false);
    expect(provider.calls).toHaveLength(1);
  });

  it('reports a planning failure', async () => {
    const provider = new ScriptedProvider([new Error('LLM HTTP 503: busy')]);
    const out = await runTask({ provider, tools: mathTools().tools, question: 'q', model: 'm' });
    expect(out.ok).toBe(false);
    if (out.ok) return;
    expect(out.stage).toBe('plan');
    expect(out.reason).toBe('LLM HTTP 503: busy');
  });

  it('reports a refinement failure with the computed results', async () => {
    const provider = new ScriptedProvider([SALLY, new Error('timeout')]);
    const out = await runTask({ provider, tools: mathTools().tools, question: 'q', model: 'm' });
    expect(out.ok).toBe(false);
    if (out.ok) return;
    expect(out.stage).toBe('refine');
    expect(out.results).toEqual({ y1: 5, y2: 15 });
  });

  it('uses a supplied plan instead of asking for one', async () => {
    const provider = new ScriptedProvider(['15 apples']);
    const out = await runTask({ provider, tools: mathTools().tools, question: QUESTION, model: 'm', planText: SALLY });
    expect(out.ok).toBe(true);
    if (!out.ok) return;
    expect(out.answer).toBe('15 apples');
    expect(provider.calls).toHaveLength(1);
    expect(provider.calls[0].messages[1].content.startsWith('QUESTION:')).toBe(true);
  });

  it('stops before any model call when cancelled', async () => {
    const provider = new ScriptedProvider([SALLY, 'x']);
    const ctrl = new AbortController();
    ctrl.abort();
    const out = await runTask({ provider, tools: mathTools().tools, question: 'q', model: 'm', signal: ctrl.signal });
    expect(out.ok).toBe(false);
    if (out.ok) return;
    expect(out.stage).toBe('cancelled');
    expect(provider.calls).toHaveLength(0);
  });

  it('writes run artifacts when a run id is set', async () => {
    const root = mkdtempSync(join(tmpdir(), 'planfill-'));
    dirs.push(root);
    const provider = new ScriptedProvider([SALLY, '15']);
    const out = await runTask({
      provider, tools: mathTools().tools, question: 'q', model: 'm', runId: 'r1', artifactsRoot: root
    });
    expect(out.ok).toBe(true);
    expect(readFileSync(join(root, 'r1', 'plan.txt'), 'utf8')).toBe(SALLY);
    expect(readFileSync(join(root, 'r1', 'filled.txt'), 'utf8')).toBe('Sally has 5 apples... multiplies by 3, 15 apples.');
    expect(JSON.parse(readFileSync(join(root, 'r1', 'results.json'), 'utf8'))).toEqual({ y1: 5, y2: 15 });
    expect(readFileSync(join(root, 'r1', 'answer.txt'), 'utf8')).toBe('15');
    expect(existsSync(join(root, 'r1', 'failure.json'))).toBe(false);
  });
});

describe('solvePlan', () => {
  it('substitutes independent retrieval results regardless of completion order', async () => {
    const tools = buildToolRegistry([
      tool('uber_10k', async () => { await new Promise(r => setTimeout(r, 15)); return 'up 17%'; }, 1),
      tool('lyft_10k', async () => 'up 12%', 1)
    ]);
    const text = 'Uber revenue was [FUNC uber_10k("revenue growth") = y1]; Lyft was [FUNC lyft_10k("revenue growth") = y2].';
    const out = await solvePlan(text, tools);
    expect(out.ok).toBe(true);
    if (!out.ok) return;
    expect(out.filled_plan).toBe('Uber revenue was up 17%; Lyft was up 12%.');
  });

  it('passes quarter names through to the tool as text', async () => {
    const tools = buildToolRegistry([tool('lookup', ([q]) => `${String(q)} revenue: 12`, 1)]);
    const out = await solvePlan('Revenue was [FUNC lookup(Q3) = y1].', tools);
    expect(out.ok).toBe(true);
    if (!out.ok) return;
    expect(out.filled_plan).toBe('Revenue was Q3 revenue: 12.');
  });

  it('executes a call whose bare argument holds an apostrophe', async () => {
    const search = vi.fn(([q]: unknown[]) => `results for ${String(q)}`);
    const out = await solvePlan("Found [FUNC search(Uber's revenue) = y1].", buildToolRegistry([tool('search', search, 1)]));
    expect(out.ok).toBe(true);
    if (!out.ok) return;
    expect(out.filled_plan).toBe("Found results for Uber's revenue.");
    expect(search).toHaveBeenCalledTimes(1);
  });

  it('reports an abort while tools are running as cancelled', async () => {
    const ctrl = new AbortController();
    const pending = solvePlan('Revenue: [FUNC slow(1) = y1].', buildToolRegistry([untilAborted('slow')]), { signal: ctrl.signal });
    await sleep(10);
    ctrl.abort();
    const out = await pending;
    expect(out.ok).toBe(false);
    if (out.ok) return;
    expect(out.stage).toBe('cancelled');
    expect(out.reason).toBe('run cancelled during execution');
    expect(out.results).toEqual({});
  });

  it('keeps unknown calls inert and reports them as diagnostics', async () => {
    const out = await solvePlan('[FUNC teleport(1) = y1] then [FUNC add(1, 1) = y2]', mathTools().tools);
    expect(out.ok).toBe(true);
    if (!out.ok) return;
    expect(out.filled_plan).toBe('[FUNC teleport(1) = y1] then 2');
    expect(out.diagnostics.map(d => d.code)).toEqual(['unknown_function']);
  });
});
