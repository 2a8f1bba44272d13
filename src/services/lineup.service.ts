/**
 * LineupService: Greedy Lineup Assembly
 *
 * Turns a pool of scored players into a categorized lineup: one player per
 * named starting slot, a FLEX chosen from leftover RB/WR/TE, and a bench.
 *
 * The assembly is intentionally greedy. Slots are filled position by position
 * and never revisited, so a player needed in a starved required slot is not
 * rebalanced against the FLEX. Empty buckets leave their slots unfilled.
 *
 * @module services/lineup
 */

import type { RiskTolerance } from "@/lib/settings";
import type { Lineup, LineupSlot, Position, RiskLevel, SlotKind } from "@/types/fantasy";
import {
  NAMED_SLOTS,
  type LineupAssembly,
  type NamedSlot,
  type ScoredEntry,
} from "@/types/scoring";

// ─── Eligibility ──────────────────────────────────────────────────────────────

const FLEX_POSITIONS: readonly Position[] = ["RB", "WR", "TE"];
const SUPER_FLEX_POSITIONS: readonly Position[] = ["QB", "RB", "WR", "TE"];

/** Whether a player of `position` may occupy a slot of kind `slot`. */
export function isEligible(position: Position, slot: SlotKind): boolean {
  switch (slot) {
    case "BENCH":
      return true;
    case "FLEX":
      return FLEX_POSITIONS.includes(position);
    case "SUPER_FLEX":
      return SUPER_FLEX_POSITIONS.includes(position);
    default:
      return slot === position;
  }
}

/** Slot kind each named starting slot maps to. */
export const NAMED_SLOT_KINDS: Record<NamedSlot, SlotKind> = {
  QB: "QB",
  RB1: "RB",
  RB2: "RB",
  WR1: "WR",
  WR2: "WR",
  FLEX: "FLEX",
  TE: "TE",
  K: "K",
  DEF: "DEF",
};

// ─── Assembly ─────────────────────────────────────────────────────────────────

export interface AssembleOptions {
  /** "conservative" ranks by confidence before score within each position */
  riskTolerance?: RiskTolerance;
}

const byScoreDesc = (a: ScoredEntry, b: ScoredEntry) => b.score - a.score;

/**
 * Bucket order: score desc, real market data first, rostered players first,
 * then name ascending. Fully deterministic.
 */
export function compareEntries(
  a: ScoredEntry,
  b: ScoredEntry,
  riskTolerance: RiskTolerance = "moderate"
): number {
  if (riskTolerance === "conservative" && a.confidence !== b.confidence) {
    return b.confidence - a.confidence;
  }
  if (a.score !== b.score) return b.score - a.score;
  if (a.hasMarketData !== b.hasMarketData) return a.hasMarketData ? -1 : 1;
  if (a.player.isOnRoster !== b.player.isOnRoster) return a.player.isOnRoster ? -1 : 1;
  if (a.player.name < b.player.name) return -1;
  if (a.player.name > b.player.name) return 1;
  return 0;
}

const emptyStarters = (): Record<NamedSlot, ScoredEntry | null> => ({
  QB: null,
  RB1: null,
  RB2: null,
  WR1: null,
  WR2: null,
  FLEX: null,
  TE: null,
  K: null,
  DEF: null,
});

/**
 * Assembles a lineup from scored entries.
 *
 * Players with a negative score never enter a position bucket and can only
 * land on the bench. A player id appearing twice is counted once.
 */
export function assembleLineup(entries: ScoredEntry[], options: AssembleOptions = {}): LineupAssembly {
  const unique = new Map<string, ScoredEntry>();
  for (const entry of entries) {
    if (!unique.has(entry.player.id)) unique.set(entry.player.id, entry);
  }
  const pool = [...unique.values()];

  const buckets: Record<Position, ScoredEntry[]> = { QB: [], RB: [], WR: [], TE: [], K: [], DEF: [] };
  for (const entry of pool) {
    if (entry.score < 0) continue;
    buckets[entry.player.position].push(entry);
  }
  for (const bucket of Object.values(buckets)) {
    bucket.sort((a, b) => compareEntries(a, b, options.riskTolerance));
  }

  const starters = emptyStarters();
  starters.QB = buckets.QB[0] ?? null;
  starters.RB1 = buckets.RB[0] ?? null;
  starters.RB2 = buckets.RB[1] ?? null;
  starters.WR1 = buckets.WR[0] ?? null;
  starters.WR2 = buckets.WR[1] ?? null;
  starters.TE = buckets.TE[0] ?? null;
  starters.K = buckets.K[0] ?? null;
  starters.DEF = buckets.DEF[0] ?? null;

  const flexPool = [...buckets.RB.slice(2), ...buckets.WR.slice(2), ...buckets.TE.slice(1)];
  flexPool.sort(byScoreDesc);
  starters.FLEX = flexPool[0] ?? null;

  const used = new Set<string>();
  for (const slot of NAMED_SLOTS) {
    const entry = starters[slot];
    if (entry) used.add(entry.player.id);
  }

  const bench = pool.filter((entry) => !used.has(entry.player.id)).sort(byScoreDesc);

  return { starters, bench };
}

// ─── Lineup objects ───────────────────────────────────────────────────────────

const namedSlot = (slot: NamedSlot, entry: ScoredEntry | null): LineupSlot => ({
  kind: NAMED_SLOT_KINDS[slot],
  player: entry?.player ?? null,
  isFilled: entry !== null,
  isRequired: true,
});

/** Standard starting slots, all empty and required. */
export function createEmptyLineup(teamId: string, week: number, season: number): Lineup {
  return {
    teamId,
    week,
    season,
    slots: NAMED_SLOTS.map((slot) => namedSlot(slot, null)),
    totalProjectedPoints: 0,
    riskLevel: "high",
    lastUpdated: new Date().toISOString(),
  };
}

/**
 * Risk from starter confidences: low when the average is at least 0.8 with
 * at most 20% below 0.6, medium at 0.6 / 40%, otherwise high.
 */
export function assessRiskLevel(confidences: number[]): RiskLevel {
  if (confidences.length === 0) return "high";

  const average = confidences.reduce((sum, c) => sum + c, 0) / confidences.length;
  const lowRatio = confidences.filter((c) => c < 0.6).length / confidences.length;

  if (average >= 0.8 && lowRatio <= 0.2) return "low";
  if (average >= 0.6 && lowRatio <= 0.4) return "medium";
  return "high";
}

export interface LineupContext {
  teamId: string;
  week: number;
  season: number;
  /** Injected for tests */
  now?: Date;
}

/** Materializes an assembly as a Lineup with one BENCH slot per bench player. */
export function toLineup(assembly: LineupAssembly, context: LineupContext): Lineup {
  const starters = NAMED_SLOTS.map((slot) => assembly.starters[slot]).filter(
    (entry): entry is ScoredEntry => entry !== null
  );

  const slots: LineupSlot[] = [
    ...NAMED_SLOTS.map((slot) => namedSlot(slot, assembly.starters[slot])),
    ...assembly.bench.map((entry) => ({
      kind: "BENCH" as const,
      player: entry.player,
      isFilled: true,
      isRequired: false,
    })),
  ];

  return {
    teamId: context.teamId,
    week: context.week,
    season: context.season,
    slots,
    totalProjectedPoints: starters.reduce((sum, entry) => sum + entry.score, 0),
    riskLevel: assessRiskLevel(starters.map((entry) => entry.confidence)),
    lastUpdated: (context.now ?? new Date()).toISOString(),
  };
}

// ─── Validation ───────────────────────────────────────────────────────────────

export interface LineupValidation {
  isValid: boolean;
  errors: string[];
}

export interface ValidateOptions {
  /** Report nothing for unfilled required slots; the platform decides on gaps */
  allowEmptyRequired?: boolean;
}

/**
 * Checks slot legality: required slots filled, no player twice, every
 * occupant eligible, and (when scores are supplied) no excluded starter.
 */
export function validateLineup(
  lineup: Lineup,
  scores?: ReadonlyMap<string, number>,
  options: ValidateOptions = {}
): LineupValidation {
  const errors: string[] = [];
  const seen = new Set<string>();

  for (const slot of lineup.slots) {
    if (!slot.player) {
      if (slot.isRequired && !options.allowEmptyRequired) errors.push(`Empty required slot: ${slot.kind}`);
      continue;
    }

    const { player } = slot;
    if (seen.has(player.id)) {
      errors.push(`Player ${player.name} appears in more than one slot`);
    }
    seen.add(player.id);

    if (!isEligible(player.position, slot.kind)) {
      errors.push(`${player.name} (${player.position}) is not eligible for ${slot.kind}`);
    }

    const score = scores?.get(player.id);
    if (slot.kind !== "BENCH" && score !== undefined && score < 0) {
      errors.push(`${player.name} is starting with an excluded score (${score})`);
    }
  }

  return { isValid: errors.length === 0, errors };
}
