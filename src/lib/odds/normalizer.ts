/**
 * OddsNormalizer: sportsbook payloads to per-player OddsRecord
 *
 * Fetches the two bulk payloads (game lines, player props) through
 * OddsFeed, caches each for a fixed TTL keyed by request type only, and
 * filters them client-side for one player at a time.
 *
 * Cache note: a plain Map with read-then-write access. The optimizer runs as
 * a single sequential batch job, so there is never more than one writer.
 *
 * @module lib/odds/normalizer
 */

import type { OddsFeed } from "@/lib/odds/client";
import { playerMatches, teamMatches } from "@/lib/odds/matching";
import { getErrorMessage } from "@/lib/errors";
import { withRetry, type RetryOptions } from "@/utils/retry";
import {
  emptyOddsRecord,
  isPropMarket,
  type GameLineSnapshot,
  type OddsApiBookmaker,
  type OddsApiEvent,
  type OddsRecord,
  type PropEntry,
} from "@/types/odds";

// ─── Types ────────────────────────────────────────────────────────────────────

type CacheKey = "game_odds" | "player_props";

interface CacheEntry {
  data: OddsApiEvent[];
  fetchedAt: number;
}

export interface OddsNormalizerOptions {
  cacheTtlMs?: number;
  /** Clock, injectable for cache tests */
  now?: () => number;
  retry?: RetryOptions;
}

/** Default cache lifetime for bulk odds payloads (5 minutes). */
export const DEFAULT_ODDS_CACHE_TTL_MS = 5 * 60 * 1000;

// ─── Pure extraction helpers ─────────────────────────────────────────────────

/**
 * Pulls the first spread and first total found across all bookmakers.
 * No averaging: the first book quoting a market wins.
 *
 * Sportsbooks quote the favorite with a negative handicap. The returned spread
 * is flipped so that a positive value means the home team is favored.
 */
export function extractLines(
  bookmakers: OddsApiBookmaker[],
  homeTeam: string
): { spread: number | null; total: number | null } {
  let spread: number | null = null;
  let total: number | null = null;

  for (const bookmaker of bookmakers) {
    for (const market of bookmaker.markets ?? []) {
      const outcomes = market.outcomes ?? [];

      if (market.key === "spreads" && spread === null) {
        const homeOutcome =
          outcomes.find((o) => o.name === homeTeam) ?? (outcomes.length >= 2 ? outcomes[1] : undefined);
        if (typeof homeOutcome?.point === "number") {
          spread = homeOutcome.point === 0 ? 0 : -homeOutcome.point;
        }
      } else if (market.key === "totals" && total === null) {
        const first = outcomes[0];
        if (typeof first?.point === "number") {
          total = first.point;
        }
      }
    }
    if (spread !== null && total !== null) break;
  }

  return { spread, total };
}

/** Structures one game-odds event into a line snapshot. */
export function toGameLineSnapshot(event: OddsApiEvent): GameLineSnapshot {
  const { spread, total } = extractLines(event.bookmakers ?? [], event.home_team);
  return {
    homeTeam: event.home_team,
    awayTeam: event.away_team,
    spread,
    total,
    commenceTime: event.commence_time ?? null,
  };
}

/** First game in which the team appears as home or away. */
export function findGameForTeam(events: OddsApiEvent[], team: string): OddsApiEvent | undefined {
  return events.find(
    (event) => teamMatches(event.home_team, team) || teamMatches(event.away_team, team)
  );
}

/**
 * Every prop outcome naming the player, across all events and bookmakers,
 * in payload order. Deduplication happens in the scorer.
 */
export function collectPlayerProps(events: OddsApiEvent[], playerName: string): PropEntry[] {
  const props: PropEntry[] = [];

  for (const event of events) {
    for (const bookmaker of event.bookmakers ?? []) {
      for (const market of bookmaker.markets ?? []) {
        if (!isPropMarket(market.key)) continue;

        for (const outcome of market.outcomes ?? []) {
          if (!playerMatches(outcome.description ?? "", playerName)) continue;

          props.push({
            market: market.key,
            outcome: outcome.name,
            price: typeof outcome.price === "number" ? outcome.price : null,
            point: typeof outcome.point === "number" ? outcome.point : null,
            bookmaker: bookmaker.title,
          });
        }
      }
    }
  }

  return props;
}

// ─── Service ─────────────────────────────────────────────────────────────────

export class OddsNormalizer {
  private client: OddsFeed | null;
  private cacheTtlMs: number;
  private now: () => number;
  private retry: RetryOptions;
  private cache = new Map<CacheKey, CacheEntry>();
  private warnedMissingKey = false;

  /**
   * @param client - null when no API key is configured; every lookup then
   *                 yields an empty record
   */
  constructor(client: OddsFeed | null, options: OddsNormalizerOptions = {}) {
    this.client = client;
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_ODDS_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
    this.retry = options.retry ?? {};
  }

  /**
   * Produces the OddsRecord for one player. Never throws: any upstream
   * failure is logged and an empty record is returned.
   */
  async getPlayerOdds(playerName: string, team: string): Promise<OddsRecord> {
    if (!this.client) {
      this.warnMissingKey();
      return emptyOddsRecord(playerName, team);
    }

    try {
      const propEvents = await this.getPlayerPropEvents();
      const props = collectPlayerProps(propEvents, playerName);

      const gameEvents = await this.getGameOddsEvents();
      const game = findGameForTeam(gameEvents, team);

      return {
        playerName,
        team,
        gameLines: game ? toGameLineSnapshot(game) : null,
        props,
      };
    } catch (error) {
      console.error(
        `[OddsNormalizer] Error getting odds for ${playerName} (${team}): ${getErrorMessage(error)}`
      );
      return emptyOddsRecord(playerName, team);
    }
  }

  /** Every current game with its first-found spread and total. */
  async getGameLines(): Promise<GameLineSnapshot[]> {
    if (!this.client) {
      this.warnMissingKey();
      return [];
    }
    const events = await this.getGameOddsEvents();
    return events.map(toGameLineSnapshot);
  }

  clearCache(): void {
    this.cache.clear();
  }

  private warnMissingKey(): void {
    if (this.warnedMissingKey) return;
    this.warnedMissingKey = true;
    console.warn("[OddsNormalizer] Odds API key not configured; betting data disabled.");
  }

  private readCache(key: CacheKey): OddsApiEvent[] | null {
    const entry = this.cache.get(key);
    if (!entry) return null;
    if (this.now() - entry.fetchedAt >= this.cacheTtlMs) return null;
    return entry.data;
  }

  private writeCache(key: CacheKey, data: OddsApiEvent[]): void {
    this.cache.set(key, { data, fetchedAt: this.now() });
  }

  private async getGameOddsEvents(): Promise<OddsApiEvent[]> {
    const cached = this.readCache("game_odds");
    if (cached) return cached;

    const client = this.requireClient();
    const events = await withRetry(() => client.getGameOdds(), this.retry);
    this.writeCache("game_odds", events);
    return events;
  }

  private async getPlayerPropEvents(): Promise<OddsApiEvent[]> {
    const cached = this.readCache("player_props");
    if (cached) return cached;

    const client = this.requireClient();
    const events = await withRetry(() => client.getEvents(), this.retry);
    if (events.length === 0) {
      console.warn("[OddsNormalizer] No NFL events found");
    }

    const withProps: OddsApiEvent[] = [];
    for (const event of events) {
      try {
        const eventProps = await withRetry(() => client.getEventProps(event.id), this.retry);
        if (eventProps) withProps.push(eventProps);
      } catch (error) {
        console.warn(
          `[OddsNormalizer] Skipping props for event ${event.id}: ${getErrorMessage(error)}`
        );
      }
    }

    this.writeCache("player_props", withProps);
    return withProps;
  }

  private requireClient(): OddsFeed {
    if (!this.client) {
      throw new Error("Odds API client is not configured");
    }
    return this.client;
  }
}
