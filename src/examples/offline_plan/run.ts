// Executes a hand-written plan without any model call.
import { buildToolRegistry, defaultTools } from '../../tools/registry.js';
import { solvePlan } from '../../orchestrator/run.js';

const PLAN = [
  'A crate holds [FUNC multiply(12, 4) = y1] bottles.',
  'After 7 break, [FUNC subtract(y1, 7) = y2] are left,',
  'shared between 2 shops that is [FUNC divide(y2, 2) = y3] each.'
].join(' ');

async function main() {
  const outcome = await solvePlan(PLAN, buildToolRegistry(defaultTools(['math'])), { maxConcurrency: 2 });
  if (!outcome.ok) {
    console.error(`[failed] ${outcome.stage}: ${outcome.reason}`);
    process.exit(1);
  }
  console.log(outcome.filled_plan);
  console.log(JSON.stringify(outcome.results));
}

main().catch(e => { console.error(e); process.exit(1); });
