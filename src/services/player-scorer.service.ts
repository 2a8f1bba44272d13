/**
 * PlayerScorer: Market-Odds Scoring Path
 *
 * Converts a player's OddsRecord into an integer score plus ordered insight
 * strings. Every function here is pure; fetching happens before, in the
 * OddsNormalizer.
 *
 * Accumulation order:
 *  1. Game total
 *  2. Spread (relative to the player's home/away side)
 *  3. Position-specific props, deduplicated to the best line per market
 *  4. Week-window filter (suppresses everything when the game is out of range)
 *  5. No-data position floor
 *  6. Injury overlay
 *
 * @module services/player-scorer
 */

import { teamMatches } from "@/lib/odds/matching";
import { getErrorMessage } from "@/lib/errors";
import { isWithinWeekWindow, type WeekWindow } from "@/lib/time/week-window";
import { emptyOddsRecord, type OddsRecord, type PropEntry } from "@/types/odds";
import type { InjuryRecord, Player, Position } from "@/types/fantasy";
import type { MarketScore, ScoredEntry } from "@/types/scoring";

// ─── Constants ────────────────────────────────────────────────────────────────

/** Floor for players with no betting signal, so data-sparse starters stay in contention. */
export const NO_DATA_BASE_SCORES: Record<Position, number> = {
  QB: 3,
  RB: 2,
  WR: 2,
  TE: 1,
  K: 0,
  DEF: 0,
};

/** Score that removes a player from starting consideration. */
export const EXCLUDED_SCORE = -100;

/** Rush-yards lines above these are treated as a mismatched prop. */
const MAX_PLAUSIBLE_RUSH_LINE: Partial<Record<Position, number>> = {
  WR: 30,
  TE: 20,
};

// ─── Best-line selection ──────────────────────────────────────────────────────

/** Single most favorable over/yes line per market, across every bookmaker. */
export interface BestLines {
  anytimeTdPrice: number | null;
  receptionsLine: number | null;
  rushYardsLine: number | null;
  passTdsPrice: number | null;
  passYardsLine: number | null;
  completionsLine: number | null;
  attemptsLine: number | null;
}

const lowest = (current: number | null, next: number | null) =>
  next === null ? current : current === null ? next : Math.min(current, next);

const highest = (current: number | null, next: number | null) =>
  next === null ? current : current === null ? next : Math.max(current, next);

/**
 * Reduces the raw prop list to one line per market. Prices keep the lowest
 * (most favored) value; yardage and count lines keep the highest.
 * QB-only markets are ignored for other positions.
 */
export function selectBestLines(props: PropEntry[], position: Position): BestLines {
  const best: BestLines = {
    anytimeTdPrice: null,
    receptionsLine: null,
    rushYardsLine: null,
    passTdsPrice: null,
    passYardsLine: null,
    completionsLine: null,
    attemptsLine: null,
  };
  const isQb = position === "QB";

  for (const prop of props) {
    const isOver = prop.outcome === "Over";

    switch (prop.market) {
      case "player_anytime_td":
        if (prop.outcome === "Yes") best.anytimeTdPrice = lowest(best.anytimeTdPrice, prop.price);
        break;
      case "player_receptions":
        if (isOver) best.receptionsLine = highest(best.receptionsLine, prop.point);
        break;
      case "player_rush_yds":
        if (isOver) best.rushYardsLine = highest(best.rushYardsLine, prop.point);
        break;
      case "player_pass_tds":
        if (isQb && isOver) best.passTdsPrice = lowest(best.passTdsPrice, prop.price);
        break;
      case "player_pass_yds":
        if (isQb && isOver) best.passYardsLine = highest(best.passYardsLine, prop.point);
        break;
      case "player_pass_completions":
        if (isQb && isOver) best.completionsLine = highest(best.completionsLine, prop.point);
        break;
      case "player_pass_attempts":
        if (isQb && isOver) best.attemptsLine = highest(best.attemptsLine, prop.point);
        break;
    }
  }

  return best;
}

// ─── Market rules ─────────────────────────────────────────────────────────────

interface Contribution {
  points: number;
  insights: string[];
}

const scoreGameTotal = (total: number | null): Contribution => {
  if (total === null) return { points: 0, insights: [] };
  if (total >= 50) return { points: 3, insights: ["High-scoring game"] };
  if (total >= 45) return { points: 1, insights: ["Good scoring potential"] };
  if (total <= 40) return { points: -2, insights: ["Low-scoring game"] };
  return { points: 0, insights: [] };
};

/** Spread is home-relative: positive means the home team is favored. */
const scoreSpread = (spread: number | null, isHome: boolean): Contribution => {
  if (spread === null) return { points: 0, insights: [] };
  if (isHome && spread > 3) return { points: 2, insights: ["Home favorite"] };
  if (!isHome && spread < -3) return { points: 2, insights: ["Away favorite"] };
  if (isHome && spread < -3) return { points: -1, insights: ["Home underdog"] };
  if (!isHome && spread > 3) return { points: -1, insights: ["Away underdog"] };
  return { points: 0, insights: [] };
};

const scoreSkillProps = (best: BestLines, position: Position): Contribution => {
  let points = 0;
  const insights: string[] = [];

  if (best.anytimeTdPrice !== null) {
    if (best.anytimeTdPrice < 0) {
      points += 3;
      insights.push("TD favorite");
    } else if (best.anytimeTdPrice < 200) {
      points += 1;
      insights.push("TD contender");
    } else {
      insights.push("TD long shot");
    }
  }

  if (best.receptionsLine !== null) {
    if (best.receptionsLine >= 6) {
      points += 2;
      insights.push("High reception expectation");
    } else if (best.receptionsLine >= 4) {
      points += 1;
      insights.push("Good reception potential");
    }
  }

  const rushCap = MAX_PLAUSIBLE_RUSH_LINE[position];
  const rushLine = best.rushYardsLine;
  if (rushLine !== null && (rushCap === undefined || rushLine <= rushCap)) {
    if (rushLine >= 80) {
      points += 2;
      insights.push("High rush expectation");
    } else if (rushLine >= 50) {
      points += 1;
      insights.push("Good rush potential");
    }
  }

  return { points, insights };
};

const scoreQuarterbackProps = (best: BestLines): Contribution => {
  let points = 0;
  const insights: string[] = [];

  if (best.passTdsPrice !== null) {
    if (best.passTdsPrice < 0) {
      points += 3;
      insights.push("Pass TDs favored (o1.5)");
    } else {
      points += 1;
      insights.push("Pass TDs viable (o1.5)");
    }
  }

  if (best.passYardsLine !== null) {
    if (best.passYardsLine >= 275) {
      points += 3;
      insights.push("High pass yards expectation");
    } else if (best.passYardsLine >= 250) {
      points += 2;
      insights.push("Good pass yards expectation");
    } else if (best.passYardsLine >= 225) {
      points += 1;
      insights.push("Solid pass yards line");
    }
  }

  if (best.completionsLine !== null) {
    if (best.completionsLine >= 24.5) {
      points += 2;
      insights.push("High completions expectation");
    } else if (best.completionsLine >= 21.5) {
      points += 1;
      insights.push("Good completions line");
    }
  }

  if (best.attemptsLine !== null) {
    if (best.attemptsLine >= 36.5) {
      points += 2;
      insights.push("High attempts expectation");
    } else if (best.attemptsLine >= 33.5) {
      points += 1;
      insights.push("Good attempts line");
    }
  }

  if (best.rushYardsLine !== null) {
    if (best.rushYardsLine >= 35) {
      points += 2;
      insights.push("QB rushing upside");
    } else if (best.rushYardsLine >= 20) {
      points += 1;
      insights.push("QB rushing potential");
    }
  }

  return { points, insights };
};

// ─── Public scoring API ───────────────────────────────────────────────────────

/**
 * Market-derived score for one player, before the no-data floor and the
 * injury overlay.
 *
 * When a week window is given and the matched game kicks off outside it, the
 * whole market contribution is suppressed and `hasBettingData` is false. An
 * unparsable commence time applies no filter.
 */
export function scoreFromOdds(
  playerName: string,
  team: string,
  odds: OddsRecord,
  position: Position,
  weekWindow?: WeekWindow
): MarketScore {
  const result: MarketScore = {
    playerName,
    team,
    position,
    score: 0,
    insights: [],
    hasBettingData: false,
    breakdown: { gameTotal: 0, spread: 0, props: 0, fallback: 0, injury: 0 },
  };

  const lines = odds.gameLines;
  if (lines) {
    if (weekWindow && lines.commenceTime) {
      if (isWithinWeekWindow(lines.commenceTime, weekWindow) === false) {
        return result;
      }
    }

    const total = scoreGameTotal(lines.total);
    const spread = scoreSpread(lines.spread, teamMatches(lines.homeTeam, team));
    result.breakdown.gameTotal = total.points;
    result.breakdown.spread = spread.points;
    result.insights.push(...total.insights, ...spread.insights);
    result.hasBettingData = true;
  }

  if (odds.props.length > 0) {
    result.hasBettingData = true;
  }

  const best = selectBestLines(odds.props, position);
  const props = position === "QB" ? scoreQuarterbackProps(best) : scoreSkillProps(best, position);
  result.breakdown.props = props.points;
  result.insights.push(...props.insights);

  result.score = result.breakdown.gameTotal + result.breakdown.spread + result.breakdown.props;
  return result;
}

/** Grants the position floor when no betting signal was found at all. */
export function applyNoDataFallback(score: MarketScore): MarketScore {
  if (score.hasBettingData || score.score !== 0) return score;

  const fallback = NO_DATA_BASE_SCORES[score.position];
  return {
    ...score,
    score: fallback,
    insights: [...score.insights, "No betting data - using base score"],
    breakdown: { ...score.breakdown, fallback },
  };
}

const formatChance = (probability: number) => `${(probability * 100).toFixed(0)}% chance`;

/**
 * Applies injury status on top of the market score. OUT/IR always exclude;
 * DOUBTFUL and QUESTIONABLE exclude below a 50% chance of playing and
 * otherwise subtract a tiered penalty.
 */
export function applyInjuryOverlay(score: MarketScore, injury?: InjuryRecord): MarketScore {
  if (!injury) return score;

  const probability = injury.probabilityOfPlaying;
  const label = injury.status.toUpperCase();

  const exclude = (insight: string): MarketScore => ({
    ...score,
    score: EXCLUDED_SCORE,
    insights: [...score.insights, insight],
    breakdown: { ...score.breakdown, injury: EXCLUDED_SCORE - score.score },
  });
  const penalize = (penalty: number, insight: string): MarketScore => ({
    ...score,
    score: score.score - penalty,
    insights: [...score.insights, insight],
    breakdown: { ...score.breakdown, injury: -penalty },
  });

  switch (injury.status) {
    case "healthy":
      return score;
    case "out":
    case "ir":
      return exclude(`${label} - excluded`);
    case "doubtful":
      if (probability !== undefined && probability < 0.5) {
        return exclude(`${label} (${formatChance(probability)}) - excluded`);
      }
      return penalize(5, `${label} - heavy penalty`);
    case "questionable":
      if (probability === undefined) {
        return penalize(4, `${label} (probability unknown) - heavy penalty`);
      }
      if (probability < 0.5) return exclude(`${label} (${formatChance(probability)}) - excluded`);
      if (probability < 0.75) return penalize(5, `${label} (${formatChance(probability)}) - heavy penalty`);
      return penalize(2, `${label} (${formatChance(probability)}) - moderate penalty`);
  }
}

/** Full market-path score: odds, no-data floor, then injury overlay. */
export function scorePlayer(player: Player, odds: OddsRecord, weekWindow?: WeekWindow): MarketScore {
  const market = scoreFromOdds(player.name, player.team, odds, player.position, weekWindow);
  return applyInjuryOverlay(applyNoDataFallback(market), player.injury);
}

/** Odds lookup key; players sharing a name on different teams stay apart. */
export const oddsKey = (playerName: string, team: string): string => `${playerName}|${team}`;

/**
 * Scores a batch keyed by player id. Odds are looked up by `oddsKey`. A player whose scoring throws is logged
 * and rescored from an empty OddsRecord; the batch never aborts.
 */
export function scorePlayers(
  players: Player[],
  oddsByKey: ReadonlyMap<string, OddsRecord>,
  weekWindow?: WeekWindow
): Map<string, MarketScore> {
  const scores = new Map<string, MarketScore>();

  for (const player of players) {
    if (scores.has(player.id)) continue;

    const odds = oddsByKey.get(oddsKey(player.name, player.team)) ?? emptyOddsRecord(player.name, player.team);
    try {
      scores.set(player.id, scorePlayer(player, odds, weekWindow));
    } catch (error) {
      console.warn(`[PlayerScorer] Failed to score ${player.name}: ${getErrorMessage(error)}`);
      scores.set(player.id, scorePlayer(player, emptyOddsRecord(player.name, player.team)));
    }
  }

  return scores;
}

/**
 * Adapts market scores for the assembler. The odds path has no confidence of
 * its own: 1.0 with real betting data, 0.5 otherwise.
 */
export function toMarketEntries(
  players: Player[],
  scores: ReadonlyMap<string, MarketScore>
): ScoredEntry[] {
  const entries: ScoredEntry[] = [];
  for (const player of players) {
    const score = scores.get(player.id);
    if (!score) continue;
    entries.push({
      player,
      score: score.score,
      hasMarketData: score.hasBettingData,
      confidence: score.hasBettingData ? 1 : 0.5,
    });
  }
  return entries;
}
