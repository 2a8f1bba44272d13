/**
 * WaiverService: same-position add/drop suggestions
 *
 * Compares already-scored roster players against already-scored free agents.
 * Works for either scoring path; only the threshold differs.
 *
 * @module services/waiver
 */

import { POSITIONS } from "@/types/fantasy";
import type { ScoredEntry, WaiverSuggestion } from "@/types/scoring";

/** Minimum improvement on the market-odds path (strictly greater than). */
export const ODDS_WAIVER_THRESHOLD = 5;

/** Minimum improvement on the projection path (strictly greater than). */
export const EVALUATOR_WAIVER_THRESHOLD = 2;

export interface WaiverOptions {
  threshold?: number;
  maxSuggestions?: number;
  /** Only the best N free agents per position are considered */
  candidatesPerPosition?: number;
}

/**
 * For each position, pairs the weakest roster player with the strongest
 * remaining free agent. A pair qualifies when the free agent's score exceeds
 * the roster player's by more than the threshold; each free agent and each
 * roster player is used at most once. The first non-qualifying pair ends the
 * position, since later pairs can only be closer.
 *
 * Suggestions are sorted by improvement, largest first, and truncated.
 */
export function findWaiverSwaps(
  roster: ScoredEntry[],
  freeAgents: ScoredEntry[],
  options: WaiverOptions = {}
): WaiverSuggestion[] {
  const {
    threshold = ODDS_WAIVER_THRESHOLD,
    maxSuggestions = 5,
    candidatesPerPosition = 3,
  } = options;

  const suggestions: WaiverSuggestion[] = [];

  for (const position of POSITIONS) {
    const rostered = roster
      .filter((e) => e.player.position === position)
      .sort((a, b) => a.score - b.score);
    const available = freeAgents
      .filter((e) => e.player.position === position)
      .sort((a, b) => b.score - a.score)
      .slice(0, candidatesPerPosition);

    let next = 0;
    for (const drop of rostered) {
      const add = available[next];
      if (!add) break;

      const improvement = add.score - drop.score;
      if (improvement <= threshold) break;

      suggestions.push({
        position,
        add: add.player,
        addScore: add.score,
        drop: drop.player,
        dropScore: drop.score,
        improvement,
      });
      next++;
    }
  }

  return suggestions.sort((a, b) => b.improvement - a.improvement).slice(0, maxSuggestions);
}
