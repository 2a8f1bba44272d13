import { settingsSchema } from "@/lib/settings-schema";
import { ConfigError } from "@/lib/errors";

export type RiskTolerance = "conservative" | "moderate" | "aggressive";

export interface EspnConfig {
  leagueId: string;
  teamId: string;
  seasonId: string;
  swid?: string;
  s2?: string;
}

export interface OddsConfig {
  apiKey?: string;
  regions: string;
  cacheTtlMs: number;
  requestTimeoutMs: number;
}

export interface OptimizerConfig {
  autoSubmit: boolean;
  dryRun: boolean;
  waiverWireManagement: boolean;
  riskTolerance: RiskTolerance;
  weekOverride?: number;
  freeAgentsPerPosition: number;
  maxWaiverSuggestions: number;
}

/** Evaluator-path decision weights. All zero means base projection only. */
export interface DecisionWeights {
  matchup: number;
  injury: number;
  weather: number;
  trend: number;
}

export interface PersistenceConfig {
  supabaseUrl?: string;
  supabaseKey?: string;
}

export interface AppConfig {
  espn: EspnConfig;
  odds: OddsConfig;
  optimizer: OptimizerConfig;
  weights: DecisionWeights;
  persistence: PersistenceConfig;
}

export const ZERO_WEIGHTS: DecisionWeights = {
  matchup: 0,
  injury: 0,
  weather: 0,
  trend: 0,
};

/**
 * Builds the application config from an environment map.
 *
 * The result is a plain value handed to each component's constructor;
 * nothing in the codebase caches it globally.
 *
 * @throws ConfigError listing every invalid field
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = settingsSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  const s = parsed.data;

  return {
    espn: {
      leagueId: s.ESPN_LEAGUE_ID,
      teamId: s.ESPN_TEAM_ID,
      seasonId: s.ESPN_SEASON_ID,
      swid: s.ESPN_SWID,
      s2: s.ESPN_S2,
    },
    odds: {
      apiKey: s.ODDS_API_KEY,
      regions: s.ODDS_REGIONS,
      cacheTtlMs: s.ODDS_CACHE_TTL_MS,
      requestTimeoutMs: s.ODDS_REQUEST_TIMEOUT_MS,
    },
    optimizer: {
      autoSubmit: s.AUTO_SUBMIT,
      dryRun: s.DRY_RUN,
      waiverWireManagement: s.WAIVER_WIRE_MANAGEMENT,
      riskTolerance: s.RISK_TOLERANCE,
      weekOverride: s.WEEK_OVERRIDE,
      freeAgentsPerPosition: s.FREE_AGENTS_PER_POSITION,
      maxWaiverSuggestions: s.MAX_WAIVER_SUGGESTIONS,
    },
    weights: {
      matchup: s.MATCHUP_WEIGHT,
      injury: s.INJURY_WEIGHT,
      weather: s.WEATHER_WEIGHT,
      trend: s.RECENT_PERFORMANCE_WEIGHT,
    },
    persistence: {
      supabaseUrl: s.SUPABASE_URL,
      supabaseKey: s.SUPABASE_SERVICE_ROLE_KEY,
    },
  };
}
