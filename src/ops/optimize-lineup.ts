import { parseArgs } from 'util';
import { loadEnv } from './load-env';
import { createOptimizationService, formatRunSummary, loadConfigOrExit, parseCliArgs } from './runtime';

const run = async (): Promise<void> => {
  loadEnv();
  const config = loadConfigOrExit();

  const { values } = parseArgs({
    options: {
      week: { type: 'string' },
      strategy: { type: 'string' },
      'dry-run': { type: 'boolean' },
    },
  });

  try {
    const options = parseCliArgs(values);
    console.log('[Ops] Running weekly lineup optimization...');

    const result = await createOptimizationService(config).runWeeklyOptimization(options);
    for (const line of formatRunSummary(result)) console.log(`[Ops] ${line}`);

    if (!result.success) process.exit(1);
  } catch (error) {
    console.error('[Ops] Lineup optimization failed:', error);
    process.exit(1);
  }
};

void run();
