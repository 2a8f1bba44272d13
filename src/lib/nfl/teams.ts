import teamsData from "./teams.json";

export interface NflTeam {
    espnId: number;
    abbrev: string;
    name: string;
    aliases: string[];
}

export const NFL_TEAMS: readonly NflTeam[] = teamsData;

const BY_ESPN_ID = new Map<number, NflTeam>(NFL_TEAMS.map((team) => [team.espnId, team]));

/** Lower-case abbreviation → lower-case full team name. */
export const TEAM_ALIASES: ReadonlyMap<string, string> = new Map(
    NFL_TEAMS.flatMap((team) => team.aliases.map((alias) => [alias, team.name.toLowerCase()] as const))
);

/** Team name of a player without a club. Never matches a sportsbook game. */
export const NO_TEAM = "";

/**
 * Resolves an ESPN pro-team id to the full team name used by sportsbooks.
 * Players without a team (id 0) resolve to NO_TEAM.
 */
export function getTeamNameByEspnId(proTeamId: number | undefined): string {
    if (!proTeamId) return NO_TEAM;
    return BY_ESPN_ID.get(proTeamId)?.name ?? String(proTeamId);
}
