/**
 * PlayerEvaluator: Projection Scoring Path
 *
 * Scores players from projections, recent stats, matchup, injury, weather and
 * trend instead of sportsbook markets. Produces a continuous total, a
 * confidence in [0, 1] and human-readable reasoning.
 *
 * Adjustments only reach the total when at least one decision weight is
 * configured; with the default all-zero weights the total is the base
 * projection.
 *
 * @module services/player-evaluator
 */

import { getErrorMessage } from "@/lib/errors";
import { ZERO_WEIGHTS, type DecisionWeights } from "@/lib/settings";
import {
  POSITIONS,
  type Player,
  type PlayerProjection,
  type PlayerWeekStats,
  type Position,
} from "@/types/fantasy";
import type { PlayerScore, ScoreComponents, ScoredEntry } from "@/types/scoring";

// ─── Constants ────────────────────────────────────────────────────────────────

/** Typical weekly fantasy points per position. */
export const POSITION_AVERAGES: Record<Position, number> = {
  QB: 18,
  RB: 12,
  WR: 10,
  TE: 8,
  K: 8,
  DEF: 7,
};

/** Plausible weekly range used to clamp the no-data fallback. */
export const FALLBACK_RANGES: Record<Position, readonly [number, number]> = {
  QB: [8, 25],
  RB: [3, 20],
  WR: [2, 18],
  TE: [1, 15],
  K: [5, 12],
  DEF: [2, 20],
};

const RECENT_WEEKS = 4;

export interface InjuryReplacement {
  injured: Player;
  replacement: PlayerScore | null;
}

// ─── Stat helpers ─────────────────────────────────────────────────────────────

/** Most recent weeks first. */
export const getRecentStats = (player: Player, weeks = RECENT_WEEKS): PlayerWeekStats[] =>
  [...player.stats].sort((a, b) => b.week - a.week).slice(0, weeks);

export const getAveragePoints = (player: Player, weeks = RECENT_WEEKS): number => {
  const recent = getRecentStats(player, weeks);
  if (recent.length === 0) return 0;
  return recent.reduce((sum, stat) => sum + stat.fantasyPoints, 0) / recent.length;
};

/** (newest - oldest) / count over the recent window; positive means improving. */
export const getTrend = (player: Player, weeks = RECENT_WEEKS): number => {
  const recent = getRecentStats(player, weeks);
  if (recent.length < 2) return 0;
  return (recent[0].fantasyPoints - recent[recent.length - 1].fantasyPoints) / recent.length;
};

export const getLatestProjection = (player: Player): PlayerProjection | undefined => {
  const projections = player.projections ?? [];
  return projections.reduce<PlayerProjection | undefined>(
    (latest, projection) =>
      !latest || Date.parse(projection.timestamp) > Date.parse(latest.timestamp) ? projection : latest,
    undefined
  );
};

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, value));

const signed = (value: number) => (value > 0 ? `+${value.toFixed(1)}` : value.toFixed(1));

// ─── Evaluator ────────────────────────────────────────────────────────────────

export class PlayerEvaluator {
  private weights: DecisionWeights;

  constructor(weights: DecisionWeights = ZERO_WEIGHTS) {
    this.weights = weights;
  }

  /**
   * Evaluates one player for a week. Never throws: a failure yields a zero
   * score with zero confidence and the error text as reasoning.
   */
  evaluate(player: Player, week: number, opponent?: string): PlayerScore {
    try {
      const components: ScoreComponents = {
        base: this.getBaseProjection(player, week),
        matchup: this.evaluateMatchup(player, opponent ?? player.matchup?.opponent),
        injury: this.evaluateInjury(player),
        weather: this.evaluateWeather(player),
        trend: this.evaluateTrend(player),
      };

      return {
        player,
        totalScore: this.calculateTotal(components),
        components,
        confidence: this.calculateConfidence(player),
        reasoning: this.buildReasoning(player, components),
      };
    } catch (error) {
      const message = getErrorMessage(error);
      console.error(`[PlayerEvaluator] Error evaluating player ${player.name}: ${message}`);
      return {
        player,
        totalScore: 0,
        components: { base: 0, matchup: 0, injury: 0, weather: 0, trend: 0 },
        confidence: 0,
        reasoning: [`Error in evaluation: ${message}`],
      };
    }
  }

  rankPlayersByPosition(players: Player[], week: number): Map<Position, PlayerScore[]> {
    const rankings = new Map<Position, PlayerScore[]>();

    for (const position of POSITIONS) {
      const atPosition = players.filter((p) => p.position === position);
      if (atPosition.length === 0) continue;

      const scores = atPosition.map((p) => this.evaluate(p, week));
      scores.sort((a, b) => b.totalScore - a.totalScore);
      rankings.set(position, scores);
    }

    return rankings;
  }

  getTopPlayers(players: Player[], week: number, count = 10): PlayerScore[] {
    return players
      .map((p) => this.evaluate(p, week))
      .sort((a, b) => b.totalScore - a.totalScore)
      .slice(0, count);
  }

  /**
   * For every rostered player who is OUT or DOUBTFUL, the best-scoring free
   * agent at the same position (null when none is available).
   */
  findInjuryReplacements(roster: Player[], freeAgents: Player[], week: number): InjuryReplacement[] {
    const injured = roster.filter(
      (p) => p.injury?.status === "out" || p.injury?.status === "doubtful"
    );
    if (injured.length === 0) return [];

    const rankings = this.rankPlayersByPosition(freeAgents, week);

    return injured.map((player) => ({
      injured: player,
      replacement: rankings.get(player.position)?.[0] ?? null,
    }));
  }

  // ─── Components ───────────────────────────────────────────────────────────

  private getBaseProjection(player: Player, week: number): number {
    const projection = getLatestProjection(player);
    if (projection && projection.week === week) {
      return projection.projectedPoints;
    }

    const recentAverage = getAveragePoints(player);
    if (recentAverage > 0) {
      const positionAverage = POSITION_AVERAGES[player.position];
      // Dampen slumps toward the position norm
      if (recentAverage < positionAverage * 0.5) {
        return Math.max(recentAverage, positionAverage * 0.6);
      }
      return recentAverage;
    }

    return this.getFallbackProjection(player);
  }

  private getFallbackProjection(player: Player): number {
    let score = POSITION_AVERAGES[player.position];

    switch (player.injury?.status) {
      case "out":
      case "ir":
        score = 0;
        break;
      case "doubtful":
        score *= 0.3;
        break;
      case "questionable":
        score *= 0.7;
        break;
    }

    const [min, max] = FALLBACK_RANGES[player.position];
    return Math.max(0, clamp(score, min, max));
  }

  private evaluateMatchup(player: Player, opponent: string | undefined): number {
    const matchup = player.matchup;
    if (!matchup || !opponent) return 0;

    let adjustment = 0;

    const ranking = matchup.opponentDefenseRanking;
    if (ranking !== undefined) {
      if (ranking <= 10) adjustment -= 2;
      else if (ranking <= 20) adjustment -= 0.5;
      else if (ranking >= 25) adjustment += 1;
    }

    const total = matchup.gameTotal;
    if (total !== undefined) {
      if (total >= 50) adjustment += 1;
      else if (total >= 45) adjustment += 0.3;
      else if (total <= 40) adjustment -= 0.5;
    }

    const spread = matchup.spread;
    if (spread !== undefined) {
      if (matchup.isHome) {
        if (spread > 3) adjustment += 0.3;
        else if (spread < -3) adjustment -= 0.5;
      } else {
        if (spread < -3) adjustment += 0.3;
        else if (spread > 3) adjustment -= 0.5;
      }
    }

    return clamp(adjustment, -2, 2);
  }

  private evaluateInjury(player: Player): number {
    const injury = player.injury;
    if (!injury) return 0;

    switch (injury.status) {
      case "out":
      case "ir":
        return -50;
      case "doubtful":
        return -10;
      case "questionable": {
        const probability = injury.probabilityOfPlaying;
        if (probability === undefined) return -3;
        if (probability < 0.5) return -5;
        if (probability < 0.75) return -2;
        return -0.5;
      }
      case "healthy":
        return 0;
    }
  }

  private evaluateWeather(player: Player): number {
    const weather = player.matchup?.weather;
    if (!weather || weather.isDome) return 0;

    const { position } = player;
    const passingGame = position === "QB" || position === "WR" || position === "TE";
    let adjustment = 0;

    const wind = weather.windSpeed;
    if (wind !== undefined && (position === "QB" || position === "K")) {
      if (wind > 20) adjustment -= 3;
      else if (wind > 15) adjustment -= 1.5;
      else if (wind > 10) adjustment -= 0.5;
    }

    const precipitation = weather.precipitationChance;
    if (precipitation !== undefined && precipitation > 0.7) {
      if (passingGame) adjustment -= 1;
      else if (position === "K") adjustment -= 2;
    }

    const temperature = weather.temperature;
    if (temperature !== undefined && temperature < 20 && passingGame) {
      adjustment -= 1;
    }

    return adjustment;
  }

  private evaluateTrend(player: Player): number {
    const trend = getTrend(player);

    if (trend > 2) return 2;
    if (trend > 1) return 1;
    if (trend > 0.5) return 0.5;
    if (trend < -2) return -2;
    if (trend < -1) return -1;
    if (trend < -0.5) return -0.5;
    return 0;
  }

  // ─── Aggregation ──────────────────────────────────────────────────────────

  private calculateTotal(components: ScoreComponents): number {
    const { matchup, injury, weather, trend } = this.weights;
    let total = components.base;

    if (matchup || injury || weather || trend) {
      total += components.matchup * matchup * 10;
      total += components.injury * injury;
      total += components.weather * weather * 10;
      total += components.trend * trend * 10;
    }

    return Math.max(0, total);
  }

  private calculateConfidence(player: Player): number {
    let confidence = 0.5;

    const recent = getRecentStats(player).length;
    if (recent >= 3) confidence += 0.2;
    else if (recent >= 1) confidence += 0.1;

    if (getLatestProjection(player)) confidence += 0.2;

    const status = player.injury?.status;
    if (status === "healthy" || status === "out") confidence += 0.1;

    if (player.matchup?.weather) confidence += 0.1;

    return Math.min(1, confidence);
  }

  private buildReasoning(player: Player, components: ScoreComponents): string[] {
    const reasons = [`Base projection: ${components.base.toFixed(1)} points`];

    if (components.matchup > 0) reasons.push(`Favorable matchup (${signed(components.matchup)})`);
    else if (components.matchup < 0) reasons.push(`Tough matchup (${signed(components.matchup)})`);

    if (components.injury !== 0 && player.injury) {
      reasons.push(`Injury concern: ${player.injury.status} (${signed(components.injury)})`);
    }

    if (components.weather > 0) reasons.push(`Favorable weather (${signed(components.weather)})`);
    else if (components.weather < 0) reasons.push(`Weather concern (${signed(components.weather)})`);

    if (components.trend > 0) reasons.push(`Positive trend (${signed(components.trend)})`);
    else if (components.trend < 0) reasons.push(`Declining trend (${signed(components.trend)})`);

    return reasons;
  }
}

/** Adapts evaluator output for the assembler; this path never has market data. */
export const toEvaluatorEntries = (scores: PlayerScore[]): ScoredEntry[] =>
  scores.map((score) => ({
    player: score.player,
    score: score.totalScore,
    hasMarketData: false,
    confidence: score.confidence,
  }));
