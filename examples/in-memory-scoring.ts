import { createScoringConfig, InMemoryRegistry, scoreAllTasks, type Grid } from '../src';
import path from 'path';

async function main() {
  console.log('Scoring candidates registered in code...\n');

  const config = createScoringConfig({
    dataDir: path.join(process.cwd(), 'data'),
    logsDir: path.join(process.cwd(), 'logs'),
  });

  // Sizes come from the source text passed alongside each candidate
  const registry = new InMemoryRegistry(config.maxTaskScore)
    .register(1, (g: Grid) => g.map((r) => [...r].reverse()), 'p=g=>g.map(r=>[...r].reverse())')
    .register(2, (g: Grid) => g.map((r) => r.map((c) => (c ? 5 : 0))), 'p=g=>g.map(r=>r.map(c=>c?5:0))');

  const { result, reportPaths } = await scoreAllTasks({
    config,
    registry,
    execution: { mode: 'parallel-limit', concurrency: 4 },
  });

  console.log(`\nCorrect tasks: ${result.partitions.correct.length}`);
  console.log(`Reports: ${reportPaths.join(', ')}`);
}

main().catch(console.error);
