import { z } from 'zod';
import { ConfigError } from '@/lib/errors';
import { OddsApiClient } from '@/lib/odds/client';
import { OddsNormalizer } from '@/lib/odds/normalizer';
import { loadConfig, type AppConfig } from '@/lib/settings';
import { createDecisionStore } from '@/services/decision-store.service';
import {
  OptimizationService,
  type OptimizationRunResult,
  type RunOptions,
} from '@/services/optimization.service';
import { RosterService } from '@/services/roster.service';

// ─── CLI arguments ────────────────────────────────────────────────────────────

const cliArgsSchema = z.object({
  week: z.coerce.number().int().min(1, 'Week must be 1-18.').max(18, 'Week must be 1-18.').optional(),
  strategy: z.enum(['market', 'projection']).default('market'),
  'dry-run': z.boolean().default(false),
});

export type CliArgs = Pick<RunOptions, 'week' | 'strategy' | 'forceDryRun'>;

/** Validates the raw `parseArgs` values shared by the ops scripts. */
export const parseCliArgs = (values: { week?: string; strategy?: string; 'dry-run'?: boolean }): CliArgs => {
  const parsed = cliArgsSchema.safeParse(values);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`));
  }
  return {
    week: parsed.data.week,
    strategy: parsed.data.strategy,
    forceDryRun: parsed.data['dry-run'],
  };
};

// ─── Wiring ───────────────────────────────────────────────────────────────────

/** Loads the config, printing every invalid field and exiting on failure. */
export const loadConfigOrExit = (env: Record<string, string | undefined> = process.env): AppConfig => {
  try {
    return loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('[Ops] Invalid configuration:');
      for (const issue of error.issues) console.error(`  - ${issue}`);
      process.exit(1);
    }
    throw error;
  }
};

export const createOptimizationService = (config: AppConfig): OptimizationService => {
  const { odds } = config;
  const feed = odds.apiKey
    ? new OddsApiClient(odds.apiKey, { regions: odds.regions, timeoutMs: odds.requestTimeoutMs })
    : null;

  return new OptimizationService(config, {
    roster: new RosterService(config.espn),
    odds: new OddsNormalizer(feed, { cacheTtlMs: odds.cacheTtlMs }),
    store: createDecisionStore(config.persistence),
  });
};

// ─── Output ───────────────────────────────────────────────────────────────────

export const formatRunSummary = (result: OptimizationRunResult): string[] => {
  const { lineup } = result;
  if (!result.success || !lineup) {
    return [`Optimization failed: ${result.error ?? 'unknown error'}`];
  }

  const scores = new Map(result.scores.map((entry) => [entry.player.id, entry.score]));
  const lines = [
    `Week ${lineup.week} lineup: ${lineup.totalProjectedPoints.toFixed(1)} projected, ${lineup.riskLevel} risk`,
  ];

  for (const slot of lineup.slots) {
    const label = slot.kind.padEnd(6);
    if (!slot.player) {
      lines.push(`  ${label} (empty)`);
      continue;
    }
    const score = scores.get(slot.player.id);
    const suffix = score === undefined ? '' : ` ${score.toFixed(1)}`;
    lines.push(`  ${label} ${slot.player.name} (${slot.player.position})${suffix}`);
  }

  if (result.waiverSuggestions.length > 0) {
    lines.push('Waiver suggestions:');
    for (const s of result.waiverSuggestions) {
      lines.push(`  Add ${s.add.name}, drop ${s.drop.name} (${s.position}, +${s.improvement.toFixed(1)})`);
    }
  }

  for (const { injured, replacement } of result.injuryReplacements) {
    lines.push(
      replacement
        ? `Injured: ${injured.name} -> ${replacement.player.name}`
        : `Injured: ${injured.name} (no replacement available)`
    );
  }

  lines.push(result.submitted ? 'Lineup submitted to ESPN.' : 'Lineup not submitted.');
  return lines;
};
