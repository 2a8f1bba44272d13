import { z } from "zod";

const envBoolean = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .optional()
    .transform((val) => (val === undefined ? fallback : ["true", "1", "yes"].includes(val)));

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((val) => (val ? val : undefined));

const weight = z.coerce
  .number()
  .min(0, "Decision weights cannot be negative.")
  .max(1, "Decision weights must be between 0 and 1.")
  .default(0);

/**
 * Raw environment → validated settings. Every key is optional in the
 * environment except the league, team and season identifiers.
 */
export const settingsSchema = z.object({
  ESPN_LEAGUE_ID: z
    .string({ required_error: "ESPN League ID is required." })
    .trim()
    .regex(/^\d+$/, "ESPN League ID must contain only numbers."),
  ESPN_TEAM_ID: z
    .string({ required_error: "ESPN Team ID is required." })
    .trim()
    .regex(/^\d+$/, "ESPN Team ID must contain only numbers."),
  ESPN_SEASON_ID: z
    .string()
    .trim()
    .regex(/^\d{4}$/, "ESPN Season ID must be a four-digit year.")
    .default(String(new Date().getFullYear())),
  ESPN_SWID: optionalString,
  ESPN_S2: optionalString,

  ODDS_API_KEY: optionalString,
  ODDS_REGIONS: z.string().trim().default("us"),
  ODDS_CACHE_TTL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  ODDS_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

  AUTO_SUBMIT: envBoolean(false),
  DRY_RUN: envBoolean(true),
  WAIVER_WIRE_MANAGEMENT: envBoolean(true),
  RISK_TOLERANCE: z.enum(["conservative", "moderate", "aggressive"]).default("moderate"),
  WEEK_OVERRIDE: z.coerce.number().int().positive().max(18).optional(),
  FREE_AGENTS_PER_POSITION: z.coerce.number().int().positive().max(50).default(10),
  MAX_WAIVER_SUGGESTIONS: z.coerce.number().int().positive().default(5),

  MATCHUP_WEIGHT: weight,
  INJURY_WEIGHT: weight,
  WEATHER_WEIGHT: weight,
  RECENT_PERFORMANCE_WEIGHT: weight,

  SUPABASE_URL: z.string().trim().url("Supabase URL must be a valid URL.").optional(),
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
});

export type SettingsSchema = z.infer<typeof settingsSchema>;
