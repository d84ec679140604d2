import 'dotenv/config';
import { loadConfig } from '../../config.js';
import { createProvider } from '../../llm/factory.js';
import { buildToolRegistry, defaultTools } from '../../tools/registry.js';
import { runTask } from '../../orchestrator/run.js';

async function main() {
  const config = loadConfig();
  const question = process.env.QUESTION
    || 'Sally has 3 apples and buys 2 more. She then multiplies her apples by 3. How many apples does she have?';

  const outcome = await runTask({
    provider: createProvider(config),
    tools: buildToolRegistry(defaultTools(['math'])),
    question,
    model: config.model,
    temperature: config.temperature,
    maxConcurrency: config.maxConcurrency,
    toolTimeoutMs: config.toolTimeoutMs,
    runId: config.runId
  });

  if (!outcome.ok) {
    console.error(`[failed] ${outcome.stage}: ${outcome.reason}`);
    process.exit(1);
  }
  console.log('\n[Plan]\n' + outcome.plan_text);
  console.log('\n[Filled]\n' + outcome.filled_plan);
  console.log('\n[Answer]\n' + outcome.answer);
}

main().catch(e => { console.error(e); process.exit(1); });
