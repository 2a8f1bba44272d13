/**
 * OptimizationService: the weekly run
 *
 * Fetch everything first, then compute without I/O, then write:
 *  1. resolve the week and its kick-off window
 *  2. read the roster and the free agents at every position
 *  3. look up odds once per unique player name and team (market path only)
 *  4. score, assemble the lineup, compare waiver swaps
 *  5. submit when allowed, then record decisions and the lineup history
 *
 * Boundary failures (authentication, the roster read) end the run with a
 * failed result. Everything per player is absorbed further down.
 *
 * @module services/optimization
 */

import { AuthenticationError, getErrorMessage } from "@/lib/errors";
import type { AppConfig } from "@/lib/settings";
import type { OddsNormalizer } from "@/lib/odds/normalizer";
import type { WeekWindow } from "@/lib/time/week-window";
import type { DecisionLog, DecisionStore } from "@/services/decision-store.service";
import { assembleLineup, toLineup, validateLineup } from "@/services/lineup.service";
import {
  PlayerEvaluator,
  toEvaluatorEntries,
  type InjuryReplacement,
} from "@/services/player-evaluator.service";
import { oddsKey, scorePlayers, toMarketEntries } from "@/services/player-scorer.service";
import type { RosterService } from "@/services/roster.service";
import {
  EVALUATOR_WAIVER_THRESHOLD,
  ODDS_WAIVER_THRESHOLD,
  findWaiverSwaps,
} from "@/services/waiver.service";
import { POSITIONS, type Lineup, type Player } from "@/types/fantasy";
import type { OddsRecord } from "@/types/odds";
import {
  NAMED_SLOTS,
  type LineupAssembly,
  type ScoredEntry,
  type WaiverSuggestion,
} from "@/types/scoring";

// ─── Types ────────────────────────────────────────────────────────────────────

/** "market" scores from sportsbook lines; "projection" from stats and projections. */
export type ScoringStrategy = "market" | "projection";

export type RosterSource = Pick<
  RosterService,
  "getCurrentWeek" | "getWeekWindow" | "getRoster" | "getFreeAgents" | "submitLineup"
>;

export type OddsSource = Pick<OddsNormalizer, "getPlayerOdds">;

export interface OptimizationDeps {
  roster: RosterSource;
  odds: OddsSource;
  store: DecisionStore;
  /** Injected for tests */
  now?: () => Date;
}

export interface RunOptions {
  week?: number;
  strategy?: ScoringStrategy;
  /** Defaults to the configured waiver-wire management flag */
  includeWaivers?: boolean;
  /** Never submit, whatever the configuration says */
  forceDryRun?: boolean;
}

export interface OptimizationRunResult {
  success: boolean;
  week: number | null;
  lineup: Lineup | null;
  /** Roster entries first, then free agents */
  scores: ScoredEntry[];
  waiverSuggestions: WaiverSuggestion[];
  injuryReplacements: InjuryReplacement[];
  submitted: boolean;
  error?: string;
}

interface ScoredPool {
  roster: ScoredEntry[];
  freeAgents: ScoredEntry[];
  injuryReplacements: InjuryReplacement[];
}

const SUGGESTION_CONFIDENCE = 0.8;

// ─── Service ──────────────────────────────────────────────────────────────────

export class OptimizationService {
  private config: AppConfig;
  private roster: RosterSource;
  private odds: OddsSource;
  private store: DecisionStore;
  private now: () => Date;

  constructor(config: AppConfig, deps: OptimizationDeps) {
    this.config = config;
    this.roster = deps.roster;
    this.odds = deps.odds;
    this.store = deps.store;
    this.now = deps.now ?? (() => new Date());
  }

  async runWeeklyOptimization(options: RunOptions = {}): Promise<OptimizationRunResult> {
    const { optimizer } = this.config;
    const strategy = options.strategy ?? "market";
    const includeWaivers = options.includeWaivers ?? optimizer.waiverWireManagement;
    let week: number | null = null;

    try {
      // ─── Fetch ──────────────────────────────────────────────────────────
      week = options.week ?? optimizer.weekOverride ?? (await this.roster.getCurrentWeek());
      console.log(`[Optimizer] Starting ${strategy} optimization for week ${week}`);

      const weekWindow = await this.resolveWeekWindow(week);
      const rosterPlayers = await this.roster.getRoster(week);
      if (rosterPlayers.length === 0) {
        throw new Error(`Roster for team ${this.config.espn.teamId} is empty`);
      }
      const freeAgents = includeWaivers ? await this.fetchFreeAgents(week) : [];

      const oddsByKey =
        strategy === "market" ? await this.fetchOdds([...rosterPlayers, ...freeAgents]) : new Map<string, OddsRecord>();

      // ─── Compute ────────────────────────────────────────────────────────
      const pool =
        strategy === "market"
          ? this.scoreMarket(rosterPlayers, freeAgents, oddsByKey, weekWindow)
          : this.scoreProjections(rosterPlayers, freeAgents, week);

      // Market confidence only marks data presence, so it never reorders that path
      const assembly = assembleLineup(pool.roster, {
        riskTolerance: strategy === "projection" ? optimizer.riskTolerance : undefined,
      });
      const lineup = toLineup(assembly, {
        teamId: this.config.espn.teamId,
        week,
        season: parseInt(this.config.espn.seasonId, 10),
        now: this.now(),
      });

      const waiverSuggestions = includeWaivers
        ? findWaiverSwaps(pool.roster, pool.freeAgents, {
            threshold: strategy === "market" ? ODDS_WAIVER_THRESHOLD : EVALUATOR_WAIVER_THRESHOLD,
            maxSuggestions: optimizer.maxWaiverSuggestions,
          })
        : [];

      // ─── Submit & record ────────────────────────────────────────────────
      const shouldSubmit = optimizer.autoSubmit && !optimizer.dryRun && !options.forceDryRun;
      const submitted = shouldSubmit ? await this.submit(lineup, pool.roster) : false;

      await this.recordDecisions(lineup, assembly.starters, {
        shouldSubmit,
        submitted,
        waiverSuggestions,
        injuryReplacements: pool.injuryReplacements,
      });
      await this.store.saveLineupHistory(lineup);

      console.log(
        `[Optimizer] Week ${week}: ${lineup.totalProjectedPoints.toFixed(1)} projected, ` +
          `${waiverSuggestions.length} waiver suggestions, submitted=${submitted}`
      );

      return {
        success: true,
        week,
        lineup,
        scores: [...pool.roster, ...pool.freeAgents],
        waiverSuggestions,
        injuryReplacements: pool.injuryReplacements,
        submitted,
      };
    } catch (error) {
      const message = getErrorMessage(error);
      console.error(`[Optimizer] Weekly optimization failed: ${message}`);
      return {
        success: false,
        week,
        lineup: null,
        scores: [],
        waiverSuggestions: [],
        injuryReplacements: [],
        submitted: false,
        error: message,
      };
    }
  }

  // ─── Fetch helpers ──────────────────────────────────────────────────────────

  /** A missing schedule only disables the week filter. */
  private async resolveWeekWindow(week: number): Promise<WeekWindow | undefined> {
    try {
      const window = await this.roster.getWeekWindow(week);
      if (!window) console.warn(`[Optimizer] No kick-offs known for week ${week}; odds are not filtered by date`);
      return window ?? undefined;
    } catch (error) {
      if (error instanceof AuthenticationError) throw error;
      console.warn(`[Optimizer] Could not load the week ${week} schedule: ${getErrorMessage(error)}`);
      return undefined;
    }
  }

  private async fetchFreeAgents(week: number): Promise<Player[]> {
    const seen = new Set<string>();
    const players: Player[] = [];

    for (const position of POSITIONS) {
      try {
        const batch = await this.roster.getFreeAgents(position, this.config.optimizer.freeAgentsPerPosition, week);
        for (const player of batch) {
          if (seen.has(player.id)) continue;
          seen.add(player.id);
          players.push(player);
        }
      } catch (error) {
        if (error instanceof AuthenticationError) throw error;
        console.warn(`[Optimizer] Skipping ${position} free agents: ${getErrorMessage(error)}`);
      }
    }

    return players;
  }

  /** One lookup per unique name and team; the normalizer itself never throws. */
  private async fetchOdds(players: Player[]): Promise<Map<string, OddsRecord>> {
    const oddsByKey = new Map<string, OddsRecord>();
    for (const player of players) {
      const key = oddsKey(player.name, player.team);
      if (oddsByKey.has(key)) continue;
      oddsByKey.set(key, await this.odds.getPlayerOdds(player.name, player.team));
    }
    return oddsByKey;
  }

  // ─── Compute helpers ────────────────────────────────────────────────────────

  private scoreMarket(
    roster: Player[],
    freeAgents: Player[],
    oddsByKey: ReadonlyMap<string, OddsRecord>,
    weekWindow: WeekWindow | undefined
  ): ScoredPool {
    const scores = scorePlayers([...roster, ...freeAgents], oddsByKey, weekWindow);
    return {
      roster: toMarketEntries(roster, scores),
      freeAgents: toMarketEntries(freeAgents, scores),
      injuryReplacements: [],
    };
  }

  private scoreProjections(roster: Player[], freeAgents: Player[], week: number): ScoredPool {
    const evaluator = new PlayerEvaluator(this.config.weights);
    return {
      roster: toEvaluatorEntries(roster.map((player) => evaluator.evaluate(player, week))),
      freeAgents: toEvaluatorEntries(freeAgents.map((player) => evaluator.evaluate(player, week))),
      injuryReplacements: evaluator.findInjuryReplacements(roster, freeAgents, week),
    };
  }

  // ─── Write helpers ──────────────────────────────────────────────────────────

  /** Gaps are submitted as they are; duplicates, ineligible or excluded starters are not. */
  private async submit(lineup: Lineup, entries: ScoredEntry[]): Promise<boolean> {
    const scores = new Map(entries.map((entry) => [entry.player.id, entry.score]));
    const validation = validateLineup(lineup, scores, { allowEmptyRequired: true });
    if (!validation.isValid) {
      console.warn(`[Optimizer] Not submitting week ${lineup.week}: ${validation.errors.join("; ")}`);
      return false;
    }
    return this.roster.submitLineup(lineup);
  }

  private async recordDecisions(
    lineup: Lineup,
    starters: LineupAssembly["starters"],
    outcome: {
      shouldSubmit: boolean;
      submitted: boolean;
      waiverSuggestions: WaiverSuggestion[];
      injuryReplacements: InjuryReplacement[];
    }
  ): Promise<void> {
    const timestamp = this.now().toISOString();
    const base = { timestamp, week: lineup.week, season: lineup.season };

    const filled = NAMED_SLOTS.flatMap((slot) => {
      const entry = starters[slot];
      return entry ? [{ slot, entry }] : [];
    });
    const changes = filled.filter(({ entry }) => !entry.player.isStarting);
    const confidence = filled.length
      ? filled.reduce((sum, { entry }) => sum + entry.confidence, 0) / filled.length
      : 0;

    const decisions: DecisionLog[] = [
      {
        ...base,
        decisionType: "lineup_optimization",
        description: `Optimized lineup with ${changes.length} changes`,
        reasoning: filled.map(({ slot, entry }) => `${slot}: ${entry.player.name} (${entry.score.toFixed(1)})`).join(", "),
        confidence,
        playersInvolved: changes.map(({ entry }) => entry.player.name),
        wasExecuted: outcome.submitted,
        outcome: outcome.shouldSubmit ? (outcome.submitted ? "success" : "failure") : "pending",
      },
      ...outcome.waiverSuggestions.map(
        (s): DecisionLog => ({
          ...base,
          decisionType: "waiver_pickup",
          description: `Add ${s.add.name}, drop ${s.drop.name} (${s.position})`,
          reasoning: `${s.add.name} ${s.addScore.toFixed(1)} vs ${s.drop.name} ${s.dropScore.toFixed(1)} (+${s.improvement.toFixed(1)})`,
          confidence: SUGGESTION_CONFIDENCE,
          playersInvolved: [s.add.name, s.drop.name],
          wasExecuted: false,
          outcome: "pending",
        })
      ),
      ...outcome.injuryReplacements.flatMap(({ injured, replacement }): DecisionLog[] =>
        replacement
          ? [
              {
                ...base,
                decisionType: "injury_replacement",
                description: `Replacing injured ${injured.name} with ${replacement.player.name}`,
                reasoning: `${injured.name} is ${injured.injury?.status ?? "injured"}`,
                confidence: SUGGESTION_CONFIDENCE,
                playersInvolved: [injured.name, replacement.player.name],
                wasExecuted: false,
                outcome: "pending",
              },
            ]
          : []
      ),
    ];

    for (const decision of decisions) {
      await this.store.saveDecision(decision);
    }
  }
}
