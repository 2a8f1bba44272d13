/**
 * Core Fantasy Football Domain Models
 *
 * Foundational types used across the application for players, injuries,
 * matchups and lineups.
 *
 * `Position` is a player's real position; `SlotKind` is a lineup slot's
 * identity. A player is never FLEX; FLEX is only ever a slot.
 */

export const POSITIONS = ["QB", "RB", "WR", "TE", "K", "DEF"] as const;

/** A player's concrete position. */
export type Position = (typeof POSITIONS)[number];

export const SLOT_KINDS = [...POSITIONS, "FLEX", "SUPER_FLEX", "BENCH"] as const;

/** Identity of a lineup slot, including the virtual FLEX/SUPER_FLEX/BENCH labels. */
export type SlotKind = (typeof SLOT_KINDS)[number];

export const isPosition = (value: string): value is Position =>
    (POSITIONS as readonly string[]).includes(value);

export type InjuryStatus = "healthy" | "questionable" | "doubtful" | "out" | "ir";

export type RiskLevel = "low" | "medium" | "high";

export interface InjuryRecord {
    status: InjuryStatus;
    /** Estimated likelihood of playing, 0..1 */
    probabilityOfPlaying?: number;
    description: string;
    source: string;
    lastUpdated: string; // ISO string
}

export interface WeatherRecord {
    /** Degrees Fahrenheit */
    temperature?: number;
    /** Miles per hour */
    windSpeed?: number;
    /** 0..1 */
    precipitationChance?: number;
    isDome: boolean;
    description?: string;
}

export interface MatchupRecord {
    opponent: string;
    /** 1 = best defense in the league */
    opponentDefenseRanking?: number;
    gameTotal?: number;
    /** Signed, home-team-relative: positive favors the home team */
    spread?: number;
    weather?: WeatherRecord;
    gameTime?: string; // ISO string
    isHome: boolean;
}

/**
 * Actual production for one scoring week.
 */
export interface PlayerWeekStats {
    week: number;
    season: number;
    fantasyPoints: number;
    passingYards?: number;
    passingTouchdowns?: number;
    rushingYards?: number;
    rushingTouchdowns?: number;
    receivingYards?: number;
    receivingTouchdowns?: number;
    receptions?: number;
}

export interface PlayerProjection {
    week: number;
    season: number;
    projectedPoints: number;
    /** 0..1 */
    confidence: number;
    source: string;
    timestamp: string; // ISO string
}

/**
 * Player metadata as supplied by the roster/free-agent source.
 */
export interface Player {
    id: string;
    name: string;
    position: Position;
    /** Full NFL team name, e.g. "Kansas City Chiefs" */
    team: string;
    eligiblePositions: Position[];
    injury?: InjuryRecord;
    stats: PlayerWeekStats[];
    projections?: PlayerProjection[];
    matchup?: MatchupRecord;
    byeWeek?: number;
    isOnRoster: boolean;
    isStarting: boolean;
}

export interface LineupSlot {
    kind: SlotKind;
    player: Player | null;
    isFilled: boolean;
    isRequired: boolean;
}

export interface Lineup {
    teamId: string;
    week: number;
    season: number;
    slots: LineupSlot[];
    totalProjectedPoints: number;
    riskLevel: RiskLevel;
    lastUpdated: string; // ISO string
}
