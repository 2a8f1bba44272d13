/**
 * Strict TypeScript definitions for the ESPN fantasy football API, limited
 * to the fields the roster, free-agent, schedule and lineup calls read.
 */

export interface EspnPlayerStats {
    id?: string;
    seasonId?: number;
    scoringPeriodId?: number;
    statSourceId?: number; // 0 = Actual, 1 = Projected
    statSplitTypeId?: number; // 0 = Season, 1 = Single scoring period
    appliedTotal?: number;
    appliedAverage?: number;
    stats?: Record<string, number>;
}

export interface EspnPlayerOwnership {
    percentOwned?: number;
    percentChange?: number;
    percentStarted?: number;
}

export interface EspnPlayer {
    id: number;
    fullName?: string;
    firstName?: string;
    lastName?: string;
    defaultPositionId?: number;
    /** Lineup slot ids the player may occupy */
    eligibleSlots?: number[];
    proTeamId?: number;
    injured?: boolean;
    injuryStatus?: string;
    stats?: EspnPlayerStats[];
    ownership?: EspnPlayerOwnership;
    lastNewsDate?: number;
}

export interface EspnKonaPlayerEntry {
    id: number;
    player: EspnPlayer;
    onTeamId?: number;
    status?: string; // FREEAGENT | WAIVERS | ONTEAM
}

export interface EspnPlayerPoolEntry {
    id: number;
    player: EspnPlayer;
    appliedStatTotal?: number;
}

export interface EspnRosterEntry {
    playerId: number;
    playerPoolEntry?: EspnPlayerPoolEntry;
    lineupSlotId?: number;
    injuryStatus?: string;
    status?: string;
}

export interface EspnRoster {
    entries?: EspnRosterEntry[];
}

export interface EspnTeam {
    id: number;
    abbrev?: string;
    location?: string;
    nickname?: string;
    name?: string;
    owners?: string[];
    roster?: EspnRoster;
}

export interface EspnProGame {
    id: number;
    homeProTeamId: number;
    awayProTeamId: number;
    date: number; // Epoch milliseconds
    scoringPeriodId: number | string;
}

export interface EspnProTeam {
    id: number;
    abbrev: string;
    location: string;
    name: string;
    byeWeek: number;
    proGamesByScoringPeriod?: Record<string, EspnProGame[]>;
}

export interface EspnLeagueResponse {
    id?: number;
    seasonId?: number;
    scoringPeriodId: number;
    status?: {
        isActive?: boolean;
        currentMatchupPeriod?: number;
        latestScoringPeriod?: number;
    };
    teams?: EspnTeam[];
}

/** One move inside a ROSTER transaction. */
export interface EspnLineupItem {
    playerId: number;
    type: "LINEUP";
    fromLineupSlotId: number;
    toLineupSlotId: number;
}

export interface EspnTransactionRequest {
    isLeagueManager: boolean;
    teamId: number;
    type: "ROSTER";
    memberId: string;
    scoringPeriodId: number;
    executionType: "EXECUTE";
    items: EspnLineupItem[];
}
