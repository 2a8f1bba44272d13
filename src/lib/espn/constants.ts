import type { InjuryStatus, Position, SlotKind } from "@/types/fantasy";

/** ESPN `defaultPositionId` → position. */
export const ESPN_POSITION_MAPPINGS: Record<number, Position> = {
    1: "QB",
    2: "RB",
    3: "WR",
    4: "TE",
    5: "K",
    16: "DEF",
};

/** Lineup slot ids used by ffl leagues. */
export const ESPN_SLOT_IDS = {
    QB: 0,
    RB: 2,
    WR: 4,
    TE: 6,
    SUPER_FLEX: 7, // OP
    DEF: 16,
    K: 17,
    BENCH: 20,
    IR: 21,
    FLEX: 23, // RB/WR/TE
} as const;

/** Slot ids that name a single concrete position. */
const SLOT_ID_TO_POSITION: Record<number, Position> = {
    [ESPN_SLOT_IDS.QB]: "QB",
    [ESPN_SLOT_IDS.RB]: "RB",
    [ESPN_SLOT_IDS.WR]: "WR",
    [ESPN_SLOT_IDS.TE]: "TE",
    [ESPN_SLOT_IDS.DEF]: "DEF",
    [ESPN_SLOT_IDS.K]: "K",
};

export const SLOT_KIND_TO_ESPN_ID: Record<SlotKind, number> = {
    QB: ESPN_SLOT_IDS.QB,
    RB: ESPN_SLOT_IDS.RB,
    WR: ESPN_SLOT_IDS.WR,
    TE: ESPN_SLOT_IDS.TE,
    K: ESPN_SLOT_IDS.K,
    DEF: ESPN_SLOT_IDS.DEF,
    FLEX: ESPN_SLOT_IDS.FLEX,
    SUPER_FLEX: ESPN_SLOT_IDS.SUPER_FLEX,
    BENCH: ESPN_SLOT_IDS.BENCH,
};

/** Per-week stat ids copied onto PlayerWeekStats. */
export const ESPN_STAT_IDS = {
    passingYards: 3,
    passingTouchdowns: 4,
    rushingYards: 24,
    rushingTouchdowns: 25,
    receivingYards: 42,
    receivingTouchdowns: 43,
    receptions: 53,
} as const;

export const STAT_SOURCE_ACTUAL = 0;
export const STAT_SOURCE_PROJECTED = 1;
export const STAT_SPLIT_SCORING_PERIOD = 1;

const ESPN_INJURY_MAPPINGS: Record<string, InjuryStatus> = {
    ACTIVE: "healthy",
    NORMAL: "healthy",
    PROBABLE: "healthy",
    QUESTIONABLE: "questionable",
    DOUBTFUL: "doubtful",
    OUT: "out",
    SUSPENSION: "out",
    INJURY_RESERVE: "ir",
};

export function getPositionName(id: number | undefined): Position | null {
    if (id === undefined) return null;
    return ESPN_POSITION_MAPPINGS[id] ?? null;
}

export function getSlotPosition(slotId: number): Position | null {
    return SLOT_ID_TO_POSITION[slotId] ?? null;
}

/** Unknown strings are treated as healthy; ESPN omits the field for most players. */
export function getInjuryStatus(raw: string | undefined): InjuryStatus {
    if (!raw) return "healthy";
    return ESPN_INJURY_MAPPINGS[raw.toUpperCase()] ?? "healthy";
}

export const isStartingSlot = (slotId: number): boolean =>
    slotId !== ESPN_SLOT_IDS.BENCH && slotId !== ESPN_SLOT_IDS.IR;
