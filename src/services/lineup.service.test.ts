/**
 * Unit tests for LineupService
 *
 * Test categories:
 *  1. isEligible: slot/position compatibility
 *  2. assembleLineup: bucket ordering, FLEX selection, bench
 *  3. toLineup / assessRiskLevel: Lineup materialization
 *  4. validateLineup: legality checks
 */

import { describe, it, expect } from "vitest";
import {
  assembleLineup,
  assessRiskLevel,
  compareEntries,
  createEmptyLineup,
  isEligible,
  toLineup,
  validateLineup,
} from "./lineup.service";
import { makeEntry, makePlayer } from "@/test/fixtures";
import type { Lineup, Position } from "@/types/fantasy";
import type { ScoredEntry } from "@/types/scoring";

const entry = (name: string, position: Position, score: number, extra: Partial<ScoredEntry> = {}) =>
  makeEntry(makePlayer({ name, position }), score, extra);

const starterNames = (entries: ScoredEntry[]) => {
  const { starters } = assembleLineup(entries);
  return Object.fromEntries(Object.entries(starters).map(([slot, e]) => [slot, e?.player.name ?? null]));
};

// Full roster used by several tests
const roster = (): ScoredEntry[] => [
  entry("Patrick Mahomes", "QB", 9),
  entry("Backup Quarterback", "QB", 3),
  entry("Isiah Pacheco", "RB", 6),
  entry("Kareem Hunt", "RB", 4),
  entry("Samaje Perine", "RB", 3),
  entry("Rashee Rice", "WR", 7),
  entry("Xavier Worthy", "WR", 5),
  entry("Hollywood Brown", "WR", 4.5),
  entry("Travis Kelce", "TE", 8),
  entry("Noah Gray", "TE", 2),
  entry("Harrison Butker", "K", 0),
  entry("Chiefs D/ST", "DEF", 1),
];

// ─── Eligibility ─────────────────────────────────────────────────────────────

describe("isEligible", () => {
  it("matches concrete slots to the same position only", () => {
    expect(isEligible("QB", "QB")).toBe(true);
    expect(isEligible("RB", "WR")).toBe(false);
  });

  it("accepts RB/WR/TE in FLEX and adds QB for SUPER_FLEX", () => {
    expect((["RB", "WR", "TE"] as const).every((p) => isEligible(p, "FLEX"))).toBe(true);
    expect(isEligible("QB", "FLEX")).toBe(false);
    expect(isEligible("QB", "SUPER_FLEX")).toBe(true);
    expect(isEligible("K", "SUPER_FLEX")).toBe(false);
  });

  it("accepts any position on the bench", () => {
    expect(isEligible("DEF", "BENCH")).toBe(true);
  });
});

// ─── Assembly ────────────────────────────────────────────────────────────────

describe("assembleLineup", () => {
  it("fills each named slot with the best player at the position", () => {
    expect(starterNames(roster())).toEqual({
      QB: "Patrick Mahomes",
      RB1: "Isiah Pacheco",
      RB2: "Kareem Hunt",
      WR1: "Rashee Rice",
      WR2: "Xavier Worthy",
      FLEX: "Hollywood Brown",
      TE: "Travis Kelce",
      K: "Harrison Butker",
      DEF: "Chiefs D/ST",
    });
  });

  it("sends everything else to the bench by descending score", () => {
    const { bench } = assembleLineup(roster());
    expect(bench.map((e) => e.player.name)).toEqual(["Backup Quarterback", "Samaje Perine", "Noah Gray"]);
  });

  it("flexes the third RB when it outscores the WR/TE leftovers", () => {
    const entries = roster().map((e) => (e.player.name === "Hollywood Brown" ? { ...e, score: 2.5 } : e));
    expect(starterNames(entries).FLEX).toBe("Samaje Perine");
  });

  it("flexes the second TE when it outscores the other leftovers", () => {
    const entries = roster().map((e) => (e.player.name === "Noah Gray" ? { ...e, score: 6 } : e));
    expect(starterNames(entries).FLEX).toBe("Noah Gray");
  });

  it("keeps negative-score players out of starting slots", () => {
    const entries = [entry("Injured Back", "RB", -100), entry("Healthy Back", "RB", 1)];

    const { starters, bench } = assembleLineup(entries);

    expect(starters.RB1?.player.name).toBe("Healthy Back");
    expect(starters.RB2).toBeNull();
    expect(starters.FLEX).toBeNull();
    expect(bench.map((e) => e.player.name)).toEqual(["Injured Back"]);
  });

  it("leaves both RB slots empty and no RB flex without running backs", () => {
    const entries = roster().filter((e) => e.player.position !== "RB");

    const { starters } = assembleLineup(entries);

    expect(starters.RB1).toBeNull();
    expect(starters.RB2).toBeNull();
    expect(starters.FLEX?.player.position).toBe("WR");
  });

  it("fills only RB1 when a single running back is available", () => {
    const names = starterNames([entry("Only Back", "RB", 2)]);
    expect(names.RB1).toBe("Only Back");
    expect(names.RB2).toBeNull();
  });

  it("prefers data-backed rostered players on equal scores", () => {
    const freeAgent = makeEntry(
      makePlayer({ name: "Aaron Free", position: "WR", isOnRoster: false }),
      4,
      { hasMarketData: false }
    );
    const rostered = makeEntry(makePlayer({ name: "Zed Rostered", position: "WR" }), 4, {
      hasMarketData: true,
    });

    const { starters } = assembleLineup([freeAgent, rostered]);

    expect(starters.WR1?.player.name).toBe("Zed Rostered");
    expect(starters.WR2?.player.name).toBe("Aaron Free");
  });

  it("breaks remaining ties by name", () => {
    const a = entry("Bravo Receiver", "WR", 3);
    const b = entry("Alpha Receiver", "WR", 3);
    expect(compareEntries(a, b)).toBe(1);
    expect(assembleLineup([a, b]).starters.WR1?.player.name).toBe("Alpha Receiver");
  });

  it("ranks by confidence first for a conservative manager", () => {
    const steady = entry("Steady Back", "RB", 3, { confidence: 0.9 });
    const boom = entry("Boom Back", "RB", 8, { confidence: 0.5 });
    const third = entry("Third Back", "RB", 1, { confidence: 0.7 });

    const moderate = assembleLineup([boom, steady, third]);
    const conservative = assembleLineup([boom, steady, third], { riskTolerance: "conservative" });

    expect(moderate.starters.RB1?.player.name).toBe("Boom Back");
    expect(conservative.starters.RB1?.player.name).toBe("Steady Back");
    expect(conservative.starters.RB2?.player.name).toBe("Third Back");
  });

  it("never places a player twice", () => {
    const mahomes = entry("Patrick Mahomes", "QB", 9);
    const { starters, bench } = assembleLineup([mahomes, mahomes, ...roster()]);

    const ids = [...Object.values(starters), ...bench]
      .filter((e): e is ScoredEntry => e !== null)
      .map((e) => e.player.id);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it("is idempotent", () => {
    const entries = roster();
    expect(assembleLineup(entries)).toEqual(assembleLineup(entries));
  });
});

// ─── Lineup objects ──────────────────────────────────────────────────────────

describe("createEmptyLineup", () => {
  it("creates the nine required starting slots", () => {
    const lineup = createEmptyLineup("3", 7, 2026);
    expect(lineup.slots.map((s) => s.kind)).toEqual(["QB", "RB", "RB", "WR", "WR", "FLEX", "TE", "K", "DEF"]);
    expect(lineup.slots.every((s) => s.isRequired && !s.isFilled && s.player === null)).toBe(true);
  });
});

describe("assessRiskLevel", () => {
  it("classifies by average and share of low-confidence starters", () => {
    expect(assessRiskLevel([1, 1, 1, 1, 0.5])).toBe("low");
    expect(assessRiskLevel([1, 1, 1, 0.5, 0.5])).toBe("medium");
    expect(assessRiskLevel([0.5, 0.5, 1])).toBe("high");
    expect(assessRiskLevel([])).toBe("high");
  });
});

describe("toLineup", () => {
  it("materializes starters and one bench slot per bench player", () => {
    const now = new Date("2026-10-18T12:00:00.000Z");

    const lineup = toLineup(assembleLineup(roster()), { teamId: "3", week: 7, season: 2026, now });

    expect(lineup.slots).toHaveLength(12);
    expect(lineup.slots.slice(9).map((s) => [s.kind, s.player?.name, s.isRequired])).toEqual([
      ["BENCH", "Backup Quarterback", false],
      ["BENCH", "Samaje Perine", false],
      ["BENCH", "Noah Gray", false],
    ]);
    // 9 + 6 + 4 + 7 + 5 + 4.5 + 8 + 0 + 1
    expect(lineup.totalProjectedPoints).toBe(44.5);
    expect(lineup.riskLevel).toBe("low");
    expect(lineup.lastUpdated).toBe("2026-10-18T12:00:00.000Z");
  });

  it("marks unfilled named slots", () => {
    const lineup = toLineup(assembleLineup([entry("Patrick Mahomes", "QB", 9, { confidence: 0.5 })]), {
      teamId: "3",
      week: 7,
      season: 2026,
    });

    expect(lineup.slots.filter((s) => s.isFilled).map((s) => s.kind)).toEqual(["QB"]);
    expect(lineup.riskLevel).toBe("high");
  });
});

// ─── Validation ──────────────────────────────────────────────────────────────

describe("validateLineup", () => {
  const build = (): Lineup =>
    toLineup(assembleLineup(roster()), { teamId: "3", week: 7, season: 2026 });

  it("accepts a fully assembled lineup", () => {
    expect(validateLineup(build())).toEqual({ isValid: true, errors: [] });
  });

  it("reports empty required slots", () => {
    const result = validateLineup(createEmptyLineup("3", 7, 2026));
    expect(result.isValid).toBe(false);
    expect(result.errors[0]).toBe("Empty required slot: QB");
    expect(result.errors).toHaveLength(9);
  });

  it("lets empty required slots through when gaps are allowed", () => {
    expect(validateLineup(createEmptyLineup("3", 7, 2026), undefined, { allowEmptyRequired: true })).toEqual({
      isValid: true,
      errors: [],
    });
  });

  it("reports ineligible and duplicated players", () => {
    const lineup = build();
    const kicker = lineup.slots[7].player;
    lineup.slots[0] = { ...lineup.slots[0], player: kicker };

    expect(validateLineup(lineup).errors).toEqual([
      "Harrison Butker (K) is not eligible for QB",
      "Player Harrison Butker appears in more than one slot",
    ]);
  });

  it("reports a starter with an excluded score", () => {
    const lineup = build();
    const scores = new Map([["travis-kelce", -100]]);
    expect(validateLineup(lineup, scores).errors).toEqual([
      "Travis Kelce is starting with an excluded score (-100)",
    ]);
  });
});
