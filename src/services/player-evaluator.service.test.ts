import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { PlayerEvaluator, getTrend, toEvaluatorEntries } from "./player-evaluator.service";
import { makePlayer } from "@/test/fixtures";
import { ZERO_WEIGHTS } from "@/lib/settings";
import type {
  InjuryRecord,
  InjuryStatus,
  MatchupRecord,
  Player,
  PlayerProjection,
  PlayerWeekStats,
} from "@/types/fantasy";

const WEEK = 7;

const stats = (...points: number[]): PlayerWeekStats[] =>
  points.map((fantasyPoints, i) => ({ week: i + 1, season: 2026, fantasyPoints }));

const projection = (week: number, projectedPoints: number, timestamp: string): PlayerProjection => ({
  week,
  season: 2026,
  projectedPoints,
  confidence: 0.8,
  source: "test",
  timestamp,
});

const injury = (status: InjuryStatus, probabilityOfPlaying?: number): InjuryRecord => ({
  status,
  probabilityOfPlaying,
  description: "",
  source: "test",
  lastUpdated: "2026-10-14T12:00:00Z",
});

const matchup = (overrides: Partial<MatchupRecord> = {}): MatchupRecord => ({
  opponent: "Denver Broncos",
  isHome: true,
  ...overrides,
});

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Base projection ─────────────────────────────────────────────────────────

describe("PlayerEvaluator base projection", () => {
  const evaluator = new PlayerEvaluator();

  it("uses the projection for the requested week", () => {
    const player = makePlayer({
      name: "Rashee Rice",
      position: "WR",
      projections: [projection(WEEK, 15.3, "2026-10-12T00:00:00Z")],
    });

    const score = evaluator.evaluate(player, WEEK);

    expect(score.components.base).toBe(15.3);
    expect(score.totalScore).toBe(15.3);
    expect(score.reasoning).toEqual(["Base projection: 15.3 points"]);
  });

  it("ignores the latest projection when it is for another week", () => {
    const player = makePlayer({
      name: "Rashee Rice",
      position: "WR",
      projections: [
        projection(WEEK, 20, "2026-10-10T00:00:00Z"),
        projection(WEEK - 1, 14, "2026-10-12T00:00:00Z"),
      ],
    });

    // No stats, healthy WR: fallback to the WR average
    expect(evaluator.evaluate(player, WEEK).components.base).toBe(10);
  });

  it("averages the four most recent weeks", () => {
    const player = makePlayer({ name: "Xavier Worthy", position: "WR", stats: stats(2, 8, 10, 12, 14) });
    expect(evaluator.evaluate(player, WEEK).components.base).toBe(11);
  });

  it("blends a slumping average toward the position norm", () => {
    const player = makePlayer({ name: "Kareem Hunt", position: "RB", stats: stats(4, 4) });
    expect(evaluator.evaluate(player, WEEK).components.base).toBeCloseTo(7.2);
  });

  it("clamps and scales the no-data fallback by injury", () => {
    const qbOut = makePlayer({ name: "Out Quarterback", position: "QB", injury: injury("out") });
    const qbQuestionable = makePlayer({ name: "Q Quarterback", position: "QB", injury: injury("questionable") });
    const teDoubtful = makePlayer({ name: "D Tightend", position: "TE", injury: injury("doubtful") });
    const kicker = makePlayer({ name: "Harrison Butker", position: "K" });

    expect(evaluator.evaluate(qbOut, WEEK).components.base).toBe(8);
    expect(evaluator.evaluate(qbQuestionable, WEEK).components.base).toBeCloseTo(12.6);
    expect(evaluator.evaluate(teDoubtful, WEEK).components.base).toBeCloseTo(2.4);
    expect(evaluator.evaluate(kicker, WEEK).components.base).toBe(8);
  });
});

// ─── Adjustments ─────────────────────────────────────────────────────────────

describe("PlayerEvaluator adjustments", () => {
  const evaluator = new PlayerEvaluator();

  it("combines defense rank, total and spread into the matchup adjustment", () => {
    const player = makePlayer({
      name: "Isiah Pacheco",
      position: "RB",
      matchup: matchup({ opponentDefenseRanking: 5, gameTotal: 52, spread: 6 }),
    });

    const score = evaluator.evaluate(player, WEEK);

    expect(score.components.matchup).toBeCloseTo(-0.7);
    expect(score.reasoning).toContain("Tough matchup (-0.7)");
  });

  it("caps the matchup adjustment at +2", () => {
    const player = makePlayer({
      name: "Courtland Sutton",
      position: "WR",
      matchup: matchup({ opponentDefenseRanking: 30, gameTotal: 55, spread: -7, isHome: false }),
    });
    expect(evaluator.evaluate(player, WEEK).components.matchup).toBe(2);
  });

  it("skips the matchup without an opponent", () => {
    const player = makePlayer({
      name: "Courtland Sutton",
      position: "WR",
      matchup: matchup({ opponent: "", opponentDefenseRanking: 1 }),
    });
    expect(evaluator.evaluate(player, WEEK).components.matchup).toBe(0);
  });

  it.each([
    [injury("out"), -50],
    [injury("ir"), -50],
    [injury("doubtful"), -10],
    [injury("questionable", 0.4), -5],
    [injury("questionable", 0.6), -2],
    [injury("questionable", 0.9), -0.5],
    [injury("questionable"), -3],
    [injury("healthy"), 0],
  ])("maps %o to an injury adjustment of %d", (record, expected) => {
    const player = makePlayer({ name: "Test Player", position: "RB", injury: record });
    expect(evaluator.evaluate(player, WEEK).components.injury).toBe(expected);
  });

  it("penalizes passing and kicking in bad weather", () => {
    const weather = { windSpeed: 18, precipitationChance: 0.8, temperature: 15, isDome: false };
    const qb = makePlayer({ name: "Cold Quarterback", position: "QB", matchup: matchup({ weather }) });
    const kicker = makePlayer({
      name: "Windy Kicker",
      position: "K",
      matchup: matchup({ weather: { ...weather, windSpeed: 25 } }),
    });
    const rb = makePlayer({ name: "Snow Back", position: "RB", matchup: matchup({ weather }) });

    expect(evaluator.evaluate(qb, WEEK).components.weather).toBe(-3.5);
    expect(evaluator.evaluate(kicker, WEEK).components.weather).toBe(-5);
    expect(evaluator.evaluate(rb, WEEK).components.weather).toBe(0);
  });

  it("ignores weather in a dome", () => {
    const qb = makePlayer({
      name: "Dome Quarterback",
      position: "QB",
      matchup: matchup({ weather: { windSpeed: 30, isDome: true } }),
    });
    expect(evaluator.evaluate(qb, WEEK).components.weather).toBe(0);
  });

  it("buckets the recent trend", () => {
    const rising = makePlayer({ name: "Rising Receiver", position: "WR", stats: stats(2, 8, 10, 12, 14) });
    const falling = makePlayer({ name: "Falling Receiver", position: "WR", stats: stats(20, 18, 10) });

    expect(getTrend(rising)).toBe(1.5);
    expect(evaluator.evaluate(rising, WEEK).components.trend).toBe(1);
    // (10 - 20) / 3
    expect(evaluator.evaluate(falling, WEEK).components.trend).toBe(-2);
  });
});

// ─── Aggregation ─────────────────────────────────────────────────────────────

describe("PlayerEvaluator totals", () => {
  const projected = (overrides: Partial<Player> = {}) =>
    makePlayer({
      name: "Travis Kelce",
      position: "TE",
      projections: [projection(WEEK, 15, "2026-10-12T00:00:00Z")],
      ...overrides,
    });

  it("uses the base projection alone when every weight is zero", () => {
    const player = projected({ injury: injury("out") });
    expect(new PlayerEvaluator(ZERO_WEIGHTS).evaluate(player, WEEK).totalScore).toBe(15);
  });

  it("scales weighted adjustments", () => {
    const evaluator = new PlayerEvaluator({ ...ZERO_WEIGHTS, matchup: 0.3 });
    const player = projected({
      matchup: matchup({ opponentDefenseRanking: 30, gameTotal: 55, spread: 7 }),
    });

    // matchup +2 (capped) * 0.3 * 10
    expect(evaluator.evaluate(player, WEEK).totalScore).toBeCloseTo(21);
  });

  it("floors the total at zero", () => {
    const evaluator = new PlayerEvaluator({ ...ZERO_WEIGHTS, injury: 1 });
    expect(evaluator.evaluate(projected({ injury: injury("out") }), WEEK).totalScore).toBe(0);
  });

  it("builds confidence from data availability and caps it at 1", () => {
    const evaluator = new PlayerEvaluator();

    const bare = makePlayer({ name: "Bare Player", position: "WR" });
    const rich = projected({
      stats: stats(10, 11, 12),
      injury: injury("healthy"),
      matchup: matchup({ weather: { isDome: false } }),
    });
    const thin = makePlayer({ name: "Thin Player", position: "WR", stats: stats(9) });

    expect(evaluator.evaluate(bare, WEEK).confidence).toBe(0.5);
    expect(evaluator.evaluate(thin, WEEK).confidence).toBeCloseTo(0.6);
    expect(evaluator.evaluate(rich, WEEK).confidence).toBe(1);
  });

  it("returns a zero score when evaluation throws", () => {
    const broken: Player = {
      ...makePlayer({ name: "Broken Player", position: "WR" }),
      get stats(): PlayerWeekStats[] {
        throw new Error("broken stats");
      },
    };

    const score = new PlayerEvaluator().evaluate(broken, WEEK);

    expect(score.totalScore).toBe(0);
    expect(score.confidence).toBe(0);
    expect(score.reasoning).toEqual(["Error in evaluation: broken stats"]);
    expect(console.error).toHaveBeenCalledWith(
      "[PlayerEvaluator] Error evaluating player Broken Player: broken stats"
    );
  });
});

// ─── Batch helpers ───────────────────────────────────────────────────────────

describe("PlayerEvaluator rankings", () => {
  const evaluator = new PlayerEvaluator();
  const wrA = makePlayer({ name: "Receiver A", position: "WR", stats: stats(12) });
  const wrB = makePlayer({ name: "Receiver B", position: "WR", stats: stats(16) });
  const qb = makePlayer({ name: "Passer C", position: "QB", stats: stats(22) });

  it("ranks players within each position", () => {
    const rankings = evaluator.rankPlayersByPosition([wrA, qb, wrB], WEEK);

    expect([...rankings.keys()]).toEqual(["QB", "WR"]);
    expect(rankings.get("WR")?.map((s) => s.player.name)).toEqual(["Receiver B", "Receiver A"]);
  });

  it("returns the top players across positions", () => {
    const top = evaluator.getTopPlayers([wrA, qb, wrB], WEEK, 2);
    expect(top.map((s) => [s.player.name, s.totalScore])).toEqual([
      ["Passer C", 22],
      ["Receiver B", 16],
    ]);
  });

  it("finds the best free agent for each out or doubtful starter", () => {
    const injuredWr = makePlayer({ name: "Hurt Receiver", position: "WR", injury: injury("out") });
    const injuredTe = makePlayer({ name: "Hurt Tightend", position: "TE", injury: injury("doubtful") });
    const questionable = makePlayer({ name: "Iffy Back", position: "RB", injury: injury("questionable") });

    const replacements = evaluator.findInjuryReplacements(
      [injuredWr, injuredTe, questionable],
      [wrA, wrB, qb],
      WEEK
    );

    expect(replacements.map((r) => [r.injured.name, r.replacement?.player.name ?? null])).toEqual([
      ["Hurt Receiver", "Receiver B"],
      ["Hurt Tightend", null],
    ]);
  });

  it("adapts scores for the assembler without market data", () => {
    const [entry] = toEvaluatorEntries([evaluator.evaluate(wrB, WEEK)]);
    expect(entry).toMatchObject({ score: 16, hasMarketData: false, confidence: 0.6 });
  });
});
