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
    },
  });

  try {
    const { week, strategy } = parseCliArgs(values);
    console.log('[Ops] Scanning the waiver wire (dry run)...');

    const result = await createOptimizationService(config).runWeeklyOptimization({
      week,
      strategy,
      includeWaivers: true,
      forceDryRun: true,
    });
    for (const line of formatRunSummary(result)) console.log(`[Ops] ${line}`);

    if (!result.success) process.exit(1);
    if (result.waiverSuggestions.length === 0) console.log('[Ops] No pickups clear the threshold this week.');
  } catch (error) {
    console.error('[Ops] Waiver scan failed:', error);
    process.exit(1);
  }
};

void run();
