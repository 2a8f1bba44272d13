/**
 * Scoring & Assembly Types
 *
 * Output shapes of the two scoring paths (market odds and projections) and the
 * common entry the lineup assembler consumes.
 */

import type { Player, Position } from "@/types/fantasy";

// ─── Market-odds path ─────────────────────────────────────────────────────────

/** Integer sub-scores accumulated by the market scorer. */
export interface MarketScoreBreakdown {
  gameTotal: number;
  spread: number;
  props: number;
  /** Position floor granted when no betting signal exists */
  fallback: number;
  /** Net effect of the injury overlay (an exclusion shows the full drop to -100) */
  injury: number;
}

export interface MarketScore {
  playerName: string;
  team: string;
  position: Position;
  score: number;
  insights: string[];
  hasBettingData: boolean;
  breakdown: MarketScoreBreakdown;
}

// ─── Projection path ──────────────────────────────────────────────────────────

export interface ScoreComponents {
  base: number;
  matchup: number;
  injury: number;
  weather: number;
  trend: number;
}

export interface PlayerScore {
  player: Player;
  totalScore: number;
  components: ScoreComponents;
  /** 0..1 */
  confidence: number;
  reasoning: string[];
}

// ─── Assembly ─────────────────────────────────────────────────────────────────

/** A scored player as the assembler sees it, independent of scoring path. */
export interface ScoredEntry {
  player: Player;
  score: number;
  /** True when the score rests on real sportsbook data */
  hasMarketData: boolean;
  /** 0..1, drives the lineup risk level */
  confidence: number;
}

export const NAMED_SLOTS = ["QB", "RB1", "RB2", "WR1", "WR2", "FLEX", "TE", "K", "DEF"] as const;

export type NamedSlot = (typeof NAMED_SLOTS)[number];

/** Categorized lineup: every named slot (possibly empty) plus an ordered bench. */
export interface LineupAssembly {
  starters: Record<NamedSlot, ScoredEntry | null>;
  bench: ScoredEntry[];
}

export interface WaiverSuggestion {
  position: Position;
  add: Player;
  addScore: number;
  drop: Player;
  dropScore: number;
  improvement: number;
}
