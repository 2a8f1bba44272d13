/**
 * RosterService: the fantasy platform behind one team
 *
 * Reads the roster, free agents, current week and week window from ESPN and
 * writes lineup changes back. Remembers the slot each rostered player was in
 * when the roster was last read, so a submission only sends real moves.
 *
 * @module services/roster
 */

import { EspnClient, type EspnPlatform } from "@/lib/espn/client";
import { SLOT_KIND_TO_ESPN_ID } from "@/lib/espn/constants";
import { buildLineupItems, collectKickoffs, mapEspnPlayer, mapRosterEntries } from "@/lib/espn/mappers";
import type { EspnProTeam } from "@/lib/espn/types";
import { AuthenticationError, getErrorMessage } from "@/lib/errors";
import type { EspnConfig } from "@/lib/settings";
import { getWeekWindowFromKickoffs, type WeekWindow } from "@/lib/time/week-window";
import type { Lineup, Player, Position } from "@/types/fantasy";

export interface RosterServiceOptions {
    /** Clock for mapped timestamps, injectable for tests */
    now?: () => Date;
}

export class RosterService {
    private client: EspnPlatform;
    private config: EspnConfig;
    private season: number;
    private now: () => Date;
    private currentSlots = new Map<string, number>();
    private schedule: EspnProTeam[] | null = null;

    constructor(config: EspnConfig, client?: EspnPlatform, options: RosterServiceOptions = {}) {
        this.config = config;
        this.client = client ?? new EspnClient(config.leagueId, config.seasonId, config.swid, config.s2);
        this.season = parseInt(config.seasonId, 10);
        this.now = options.now ?? (() => new Date());
    }

    /** Current NFL scoring period as reported by the league. */
    async getCurrentWeek(): Promise<number> {
        const league = await this.client.getLeague(["mStatus"]);
        return league.scoringPeriodId || league.status?.currentMatchupPeriod || 1;
    }

    /** Players on the configured team, for the given (or current) week. */
    async getRoster(week?: number): Promise<Player[]> {
        const targetWeek = week ?? (await this.getCurrentWeek());
        const league = await this.client.getLeague(["mRoster", "mTeam"], targetWeek);

        const spots = mapRosterEntries(league, this.config.teamId, {
            season: this.season,
            week: targetWeek,
            now: this.now(),
        });
        this.currentSlots = new Map(spots.map((spot) => [spot.player.id, spot.lineupSlotId]));

        console.log(`[RosterService] Loaded ${spots.length} rostered players for week ${targetWeek}`);
        return spots.map((spot) => spot.player);
    }

    /** Best available free agents and waiver players at one position. */
    async getFreeAgents(position: Position, count: number, week?: number): Promise<Player[]> {
        const targetWeek = week ?? (await this.getCurrentWeek());
        const entries = await this.client.getFreeAgents(count, SLOT_KIND_TO_ESPN_ID[position], targetWeek);

        const now = this.now();
        const players: Player[] = [];
        for (const entry of entries) {
            const player = mapEspnPlayer(entry.player, {
                season: this.season,
                week: targetWeek,
                isOnRoster: false,
                now,
            });
            // The slot filter also returns players eligible elsewhere, e.g. a WR with RB eligibility.
            if (player && player.position === position) players.push(player);
        }
        return players;
    }

    /**
     * Window from the first to the last kick-off of the week.
     * The season schedule is fetched once per service instance.
     */
    async getWeekWindow(week: number): Promise<WeekWindow | null> {
        if (!this.schedule) {
            this.schedule = await this.client.getProTeamSchedules();
        }
        return getWeekWindowFromKickoffs(week, collectKickoffs(this.schedule, week));
    }

    /**
     * Applies the lineup on ESPN. Returns false when ESPN rejects it.
     *
     * @throws AuthenticationError when credentials are missing or rejected
     */
    async submitLineup(lineup: Lineup): Promise<boolean> {
        if (this.currentSlots.size === 0) {
            await this.getRoster(lineup.week);
        }

        const items = buildLineupItems(lineup, this.currentSlots);
        if (items.length === 0) {
            console.log(`[RosterService] Lineup for week ${lineup.week} already matches ESPN; nothing to submit`);
            return true;
        }

        try {
            await this.client.submitLineup(Number(this.config.teamId), lineup.week, items);
        } catch (error) {
            if (error instanceof AuthenticationError) throw error;
            console.error(`[RosterService] Lineup submission failed: ${getErrorMessage(error)}`);
            return false;
        }

        for (const item of items) {
            this.currentSlots.set(String(item.playerId), item.toLineupSlotId);
        }
        console.log(`[RosterService] Submitted ${items.length} lineup moves for week ${lineup.week}`);
        return true;
    }
}
