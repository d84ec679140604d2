// Two independent retrieval calls that the engine runs side by side.
import 'dotenv/config';
import type { ToolSpec } from '../../types/tools.js';
import { loadConfig } from '../../config.js';
import { createProvider } from '../../llm/factory.js';
import { buildToolRegistry } from '../../tools/registry.js';
import { webSearch } from '../../tools/web/search.js';
import { runTask } from '../../orchestrator/run.js';

function filingSearch(name: string, company: string): ToolSpec {
  return {
    name,
    description: `Look up facts in ${company}'s latest 10-K annual report.`,
    params: [{ name: 'query', type: 'string' }],
    returns: 'string',
    invoke: (args, ctx) => webSearch.invoke([`${company} 10-K ${String(args[0] ?? '')}`, 3], ctx)
  };
}

async function main() {
  const config = loadConfig();
  const tools = buildToolRegistry([
    filingSearch('uber_10k', 'Uber'),
    filingSearch('lyft_10k', 'Lyft')
  ]);
  const question = process.env.QUESTION || 'How did revenue growth compare between Uber and Lyft last fiscal year?';

  const outcome = await runTask({
    provider: createProvider(config),
    tools,
    question,
    model: config.model,
    maxConcurrency: config.maxConcurrency,
    toolTimeoutMs: config.toolTimeoutMs,
    runId: config.runId ?? 'filings-compare'
  });

  if (!outcome.ok) {
    console.error(`[failed] ${outcome.stage}: ${outcome.reason}`);
    process.exit(1);
  }
  console.log('\n[Answer]\n' + outcome.answer);
}

main().catch(e => { console.error(e); process.exit(1); });
