/**
 * Shared test builders. Every field has a neutral default so each test only
 * spells out what it asserts on.
 */

import type { Player, Position } from "@/types/fantasy";
import type { OddsRecord, PropEntry } from "@/types/odds";
import type { ScoredEntry } from "@/types/scoring";

export const makePlayer = (overrides: Partial<Player> & { name: string; position: Position }): Player => ({
  id: overrides.name.toLowerCase().replace(/\s+/g, "-"),
  team: "Kansas City Chiefs",
  eligiblePositions: [overrides.position],
  stats: [],
  isOnRoster: true,
  isStarting: false,
  ...overrides,
});

export const makeEntry = (
  player: Player,
  score: number,
  overrides: Partial<Omit<ScoredEntry, "player" | "score">> = {}
): ScoredEntry => ({
  player,
  score,
  hasMarketData: true,
  confidence: 1,
  ...overrides,
});

export const makeProp = (overrides: Partial<PropEntry> & Pick<PropEntry, "market" | "outcome">): PropEntry => ({
  price: null,
  point: null,
  bookmaker: "Book A",
  ...overrides,
});

export const makeOdds = (overrides: Partial<OddsRecord> = {}): OddsRecord => ({
  playerName: "Test Player",
  team: "Kansas City Chiefs",
  gameLines: null,
  props: [],
  ...overrides,
});
