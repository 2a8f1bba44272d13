/**
 * Fuzzy name matching between our roster data and sportsbook payloads.
 *
 * @module lib/odds/matching
 */

import { TEAM_ALIASES } from "@/lib/nfl/teams";

const NAME_SUFFIXES = new Set(["sr.", "jr.", "sr", "jr", "ii", "iii", "iv"]);

/** Abbreviations this short are matched by substring against full names. */
const ABBREVIATION_MAX_LENGTH = 4;

const aliasMatches = (abbrev: string, fullName: string): boolean => {
    const aliased = TEAM_ALIASES.get(abbrev);
    return aliased !== undefined && fullName.includes(aliased);
};

/**
 * True when a sportsbook team name and our team name refer to the same club.
 *
 * Rules, in order: exact (case-insensitive), a short abbreviation contained in
 * the other side's name, and the known abbreviation alias table.
 */
export function teamMatches(apiTeam: string, ourTeam: string): boolean {
    if (!apiTeam || !ourTeam) return false;

    const api = apiTeam.toLowerCase().trim();
    const ours = ourTeam.toLowerCase().trim();

    if (api === ours) return true;
    if (ourTeam.length <= ABBREVIATION_MAX_LENGTH && api.includes(ours)) return true;
    if (apiTeam.length <= ABBREVIATION_MAX_LENGTH && ours.includes(api)) return true;

    return aliasMatches(ours, api) || aliasMatches(api, ours);
}

/** Lower-cased name tokens with honorific suffixes removed. */
export function normalizePlayerName(name: string): string[] {
    return name
        .toLowerCase()
        .split(/\s+/)
        .filter((part) => part.length > 0 && !NAME_SUFFIXES.has(part));
}

/**
 * True when a prop outcome's player description names our player.
 *
 * Both names need a first and last token. The last name decides the match;
 * "Aaron Jones Sr." and "Aaron Jones" are the same player.
 */
export function playerMatches(apiPlayer: string, ourPlayer: string): boolean {
    if (!apiPlayer || !ourPlayer) return false;

    const api = normalizePlayerName(apiPlayer);
    const ours = normalizePlayerName(ourPlayer);

    if (api.length < 2 || ours.length < 2) return false;

    return api[api.length - 1] === ours[ours.length - 1];
}
