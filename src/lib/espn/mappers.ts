/**
 * ESPN Data Mappers
 *
 * Utilities for transforming raw ESPN fantasy football payloads into domain
 * objects: players, per-week stats, projections, schedule kick-offs and
 * lineup transaction items.
 *
 * @module lib/espn/mappers
 */

import { getTeamNameByEspnId } from "@/lib/nfl/teams";
import type { InjuryRecord, Lineup, Player, PlayerProjection, PlayerWeekStats, Position } from "@/types/fantasy";
import {
    ESPN_SLOT_IDS,
    ESPN_STAT_IDS,
    SLOT_KIND_TO_ESPN_ID,
    STAT_SOURCE_ACTUAL,
    STAT_SOURCE_PROJECTED,
    STAT_SPLIT_SCORING_PERIOD,
    getInjuryStatus,
    getPositionName,
    getSlotPosition,
    isStartingSlot,
} from "./constants";
import type { EspnLeagueResponse, EspnLineupItem, EspnPlayer, EspnPlayerStats, EspnProTeam } from "./types";

/** Projections read from ESPN carry a fixed confidence; ESPN publishes none. */
export const ESPN_PROJECTION_CONFIDENCE = 0.7;

export interface MapPlayerOptions {
    season: number;
    /** Week being decided; actual stats are taken from earlier weeks only */
    week: number;
    isOnRoster: boolean;
    lineupSlotId?: number;
    now?: Date;
}

/** A rostered player together with the slot ESPN currently has them in. */
export interface EspnRosterSpot {
    player: Player;
    lineupSlotId: number;
}

export const resolvePlayerName = (player: EspnPlayer): string =>
    player.fullName || `${player.firstName ?? ""} ${player.lastName ?? ""}`.trim() || `Player ${player.id}`;

const isWeekSplit = (stat: EspnPlayerStats, source: number, season: number) =>
    stat.statSourceId === source &&
    stat.statSplitTypeId === STAT_SPLIT_SCORING_PERIOD &&
    (stat.seasonId === undefined || stat.seasonId === season) &&
    typeof stat.scoringPeriodId === "number" &&
    stat.scoringPeriodId > 0;

function toWeekStats(stat: EspnPlayerStats, season: number): PlayerWeekStats {
    const raw = stat.stats ?? {};
    const read = (id: number): number | undefined => raw[String(id)];

    return {
        week: stat.scoringPeriodId ?? 0,
        season,
        fantasyPoints: stat.appliedTotal ?? 0,
        passingYards: read(ESPN_STAT_IDS.passingYards),
        passingTouchdowns: read(ESPN_STAT_IDS.passingTouchdowns),
        rushingYards: read(ESPN_STAT_IDS.rushingYards),
        rushingTouchdowns: read(ESPN_STAT_IDS.rushingTouchdowns),
        receivingYards: read(ESPN_STAT_IDS.receivingYards),
        receivingTouchdowns: read(ESPN_STAT_IDS.receivingTouchdowns),
        receptions: read(ESPN_STAT_IDS.receptions),
    };
}

function toEligiblePositions(position: Position, slots: number[] = []): Position[] {
    const eligible: Position[] = [position];
    for (const slotId of slots) {
        const slotPosition = getSlotPosition(slotId);
        if (slotPosition && !eligible.includes(slotPosition)) eligible.push(slotPosition);
    }
    return eligible;
}

function toInjury(player: EspnPlayer, now: Date): InjuryRecord | undefined {
    if (!player.injuryStatus) return undefined;
    return {
        status: getInjuryStatus(player.injuryStatus),
        description: player.injuryStatus,
        source: "espn",
        lastUpdated: player.lastNewsDate ? new Date(player.lastNewsDate).toISOString() : now.toISOString(),
    };
}

/**
 * Maps one ESPN player. Returns null for positions the lineup never uses
 * (e.g. IDP players in custom leagues).
 */
export function mapEspnPlayer(raw: EspnPlayer, options: MapPlayerOptions): Player | null {
    const position = getPositionName(raw.defaultPositionId);
    if (!position) return null;

    const now = options.now ?? new Date();
    const stats = raw.stats ?? [];

    const weekStats = stats
        .filter((s) => isWeekSplit(s, STAT_SOURCE_ACTUAL, options.season))
        .map((s) => toWeekStats(s, options.season))
        .filter((s) => s.week < options.week)
        .sort((a, b) => a.week - b.week);

    const projections: PlayerProjection[] = stats
        .filter((s) => isWeekSplit(s, STAT_SOURCE_PROJECTED, options.season) && s.scoringPeriodId === options.week)
        .map((s) => ({
            week: options.week,
            season: options.season,
            projectedPoints: s.appliedTotal ?? 0,
            confidence: ESPN_PROJECTION_CONFIDENCE,
            source: "espn",
            timestamp: now.toISOString(),
        }));

    return {
        id: String(raw.id),
        name: resolvePlayerName(raw),
        position,
        team: getTeamNameByEspnId(raw.proTeamId),
        eligiblePositions: toEligiblePositions(position, raw.eligibleSlots),
        injury: toInjury(raw, now),
        stats: weekStats,
        projections: projections.length > 0 ? projections : undefined,
        isOnRoster: options.isOnRoster,
        isStarting: options.lineupSlotId !== undefined && isStartingSlot(options.lineupSlotId),
    };
}

/**
 * Players on one fantasy team, with their current lineup slot.
 *
 * @throws Error when the team id is not part of the league payload
 */
export function mapRosterEntries(
    league: EspnLeagueResponse,
    teamId: string,
    options: Omit<MapPlayerOptions, "isOnRoster" | "lineupSlotId">
): EspnRosterSpot[] {
    const team = (league.teams ?? []).find((t) => String(t.id) === teamId);
    if (!team) {
        throw new Error(`Team ${teamId} not found in league ${league.id ?? "?"}`);
    }

    const spots: EspnRosterSpot[] = [];
    for (const entry of team.roster?.entries ?? []) {
        const raw = entry.playerPoolEntry?.player;
        if (!raw) continue;

        const lineupSlotId = entry.lineupSlotId ?? ESPN_SLOT_IDS.BENCH;
        const player = mapEspnPlayer(raw, { ...options, isOnRoster: true, lineupSlotId });
        if (player) spots.push({ player, lineupSlotId });
    }
    return spots;
}

/** Kick-off timestamps (epoch ms) of every pro game scheduled in a week. */
export function collectKickoffs(proTeams: EspnProTeam[], week: number): number[] {
    const kickoffs = new Set<number>();
    for (const team of proTeams) {
        for (const game of team.proGamesByScoringPeriod?.[String(week)] ?? []) {
            kickoffs.add(game.date);
        }
    }
    return [...kickoffs];
}

/**
 * Lineup moves needed to turn the current ESPN slots into `lineup`.
 * Players already in the right slot, players not on the roster and players
 * parked on IR produce no item.
 */
export function buildLineupItems(lineup: Lineup, currentSlots: ReadonlyMap<string, number>): EspnLineupItem[] {
    const items: EspnLineupItem[] = [];

    for (const slot of lineup.slots) {
        if (!slot.player) continue;

        const from = currentSlots.get(slot.player.id);
        if (from === undefined || from === ESPN_SLOT_IDS.IR) continue;

        const to = SLOT_KIND_TO_ESPN_ID[slot.kind];
        if (from === to) continue;

        items.push({
            playerId: Number(slot.player.id),
            type: "LINEUP",
            fromLineupSlotId: from,
            toLineupSlotId: to,
        });
    }

    return items;
}
