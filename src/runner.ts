#!/usr/bin/env node
// src/runner.ts
// CLI for one task:
// - --question "..."           ask the model for a plan, execute it, and refine an answer
// - --plan-file path           execute a plan you already have (no planning call)
// - --stdin-to question|plan   read that input from stdin instead
// - --tools math,web,http      tool groups to expose (default: all)
// - --concurrency N, --run-id ID, --no-refine
import 'dotenv/config';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { loadConfig } from './config.js';
import { createProvider } from './llm/factory.js';
import { buildToolRegistry, defaultTools, isToolGroup, type ToolGroup } from './tools/registry.js';
import { runTask, solvePlan, type RunOutcome, type SolveOutcome } from './orchestrator/run.js';
import { COLOR } from './log.js';

export interface CliArgs {
  question?: string;
  planFile?: string;
  stdinTo?: 'question' | 'plan';
  groups: ToolGroup[];
  concurrency?: number;
  runId?: string;
  refine: boolean;
}

export class UsageError extends Error {}

export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = { groups: ['math', 'web', 'http'], refine: true };
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    const eq = a.indexOf('=');
    const flag = a.startsWith('--') && eq > 0 ? a.slice(0, eq) : a;
    const value = (): string => {
      if (a.startsWith('--') && eq > 0) return a.slice(eq + 1);
      const v = argv[++i];
      if (v === undefined) throw new UsageError(`${flag} needs a value`);
      return v;
    };
    switch (flag) {
      case '--question': out.question = value(); break;
      case '--plan-file': out.planFile = value(); break;
      case '--stdin-to': {
        const v = value();
        if (v !== 'question' && v !== 'plan') throw new UsageError(`--stdin-to must be question or plan, got ${v}`);
        out.stdinTo = v;
        break;
      }
      case '--tools': {
        const names = value().split(',').map(s => s.trim()).filter(Boolean);
        const bad = names.filter(n => !isToolGroup(n));
        if (bad.length) throw new UsageError(`unknown tool group(s): ${bad.join(', ')}`);
        out.groups = names.filter(isToolGroup);
        break;
      }
      case '--concurrency': {
        const n = Number(value());
        if (!Number.isInteger(n) || n < 1) throw new UsageError('--concurrency must be a positive integer');
        out.concurrency = n;
        break;
      }
      case '--run-id': out.runId = value(); break;
      case '--no-refine': out.refine = false; break;
      default: throw new UsageError(`unknown argument: ${a}`);
    }
  }
  return out;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const c of process.stdin) chunks.push(Buffer.from(c));
  return Buffer.concat(chunks).toString('utf8');
}

function report(outcome: RunOutcome | SolveOutcome): number {
  if (!outcome.ok) {
    console.error(`\n${COLOR.red('[failed]')} could not complete the plan (${outcome.stage}): ${outcome.reason}`);
    const done = Object.keys(outcome.results);
    if (done.length) console.error(COLOR.gray(`completed before failure: ${JSON.stringify(outcome.results)}`));
    return 1;
  }
  console.log('\n[Filled plan]\n' + outcome.filled_plan);
  if ('answer' in outcome) console.log('\n[Answer]\n' + outcome.answer);
  return 0;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (e: unknown) {
    if (e instanceof UsageError) {
      console.error(`${e.message}\nUsage: planfill (--question "..." | --plan-file plan.txt) [--stdin-to question|plan] [--tools math,web,http] [--concurrency N] [--run-id ID] [--no-refine]`);
      return 2;
    }
    throw e;
  }

  const config = loadConfig();
  const tools = buildToolRegistry(defaultTools(args.groups));
  const common = {
    maxConcurrency: args.concurrency ?? config.maxConcurrency,
    toolTimeoutMs: config.toolTimeoutMs,
    runId: args.runId ?? config.runId
  };

  const stdin = args.stdinTo && !process.stdin.isTTY ? await readStdin() : undefined;
  const question = args.stdinTo === 'question' ? stdin?.trim() : args.question;
  const planText = args.stdinTo === 'plan' ? stdin : args.planFile ? fs.readFileSync(args.planFile, 'utf8') : undefined;

  if (planText !== undefined && (!args.refine || !question)) {
    return report(await solvePlan(planText, tools, common));
  }

  if (!question) {
    console.error('Usage: planfill (--question "..." | --plan-file plan.txt) [options]');
    return 2;
  }
  const outcome = await runTask({
    ...common,
    provider: createProvider(config),
    tools,
    question,
    planText,
    model: config.model,
    temperature: config.temperature
  });
  return report(outcome);
}

const entry = process.argv[1] ? fs.realpathSync(process.argv[1]) : '';
if (entry === fs.realpathSync(fileURLToPath(import.meta.url))) {
  main().then(code => process.exit(code)).catch(e => { console.error(e); process.exit(1); });
}
