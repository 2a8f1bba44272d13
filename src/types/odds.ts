/**
 * Sportsbook Market Types
 *
 * Raw shapes returned by The Odds API (v4) and the normalized per-player
 * `OddsRecord` the scorer consumes.
 */

// ─── Raw Odds API payloads ────────────────────────────────────────────────────

export interface OddsApiOutcome {
  name: string;
  /** American odds, e.g. -150 or +210 */
  price?: number;
  point?: number;
  /** Player name for prop markets */
  description?: string;
}

export interface OddsApiMarket {
  key: string;
  last_update?: string;
  outcomes?: OddsApiOutcome[];
}

export interface OddsApiBookmaker {
  key: string;
  title: string;
  last_update?: string;
  markets?: OddsApiMarket[];
}

export interface OddsApiEvent {
  id: string;
  sport_key?: string;
  commence_time?: string;
  home_team: string;
  away_team: string;
  bookmakers?: OddsApiBookmaker[];
}

// ─── Normalized records ───────────────────────────────────────────────────────

export const PROP_MARKETS = [
  "player_pass_tds",
  "player_pass_yds",
  "player_rush_yds",
  "player_receptions",
  "player_anytime_td",
  "player_pass_completions",
  "player_pass_attempts",
] as const;

export type PropMarket = (typeof PROP_MARKETS)[number];

export const isPropMarket = (key: string): key is PropMarket =>
  (PROP_MARKETS as readonly string[]).includes(key);

/** First spread/total found for a matched game. */
export interface GameLineSnapshot {
  homeTeam: string;
  awayTeam: string;
  /** Home-team spread, positive favors the home team */
  spread: number | null;
  total: number | null;
  commenceTime: string | null;
}

export interface PropEntry {
  market: PropMarket;
  /** "Over" / "Under" / "Yes" / "No" */
  outcome: string;
  price: number | null;
  point: number | null;
  bookmaker: string;
}

export interface OddsRecord {
  playerName: string;
  /** Team name as resolved by the caller */
  team: string;
  gameLines: GameLineSnapshot | null;
  props: PropEntry[];
}

export const emptyOddsRecord = (playerName: string, team: string): OddsRecord => ({
  playerName,
  team,
  gameLines: null,
  props: [],
});
