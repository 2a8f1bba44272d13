import { AuthenticationError, UpstreamApiError } from "@/lib/errors";
import type {
    EspnKonaPlayerEntry,
    EspnLeagueResponse,
    EspnLineupItem,
    EspnProTeam,
    EspnTransactionRequest,
} from "./types";

const READS_BASE = "https://lm-api-reads.fantasy.espn.com/apis/v3/games/ffl";
const WRITES_BASE = "https://lm-api-writes.fantasy.espn.com/apis/v3/games/ffl";

interface FetchInit {
    method?: "GET" | "POST";
    headers?: Record<string, string>;
    body?: string;
}

/** The calls RosterService makes against the fantasy platform. */
export interface EspnPlatform {
    getLeague(views: string[], scoringPeriodId?: number): Promise<EspnLeagueResponse>;
    getFreeAgents(limit: number, slotId?: number, scoringPeriodId?: number): Promise<EspnKonaPlayerEntry[]>;
    getProTeamSchedules(): Promise<EspnProTeam[]>;
    submitLineup(teamId: number, scoringPeriodId: number, items: EspnLineupItem[]): Promise<void>;
}

export class EspnClient implements EspnPlatform {
    private leagueId: string;
    private year: string;
    private swid?: string;
    private s2?: string;

    constructor(leagueId: string, year: string, swid?: string, s2?: string) {
        this.leagueId = leagueId;
        this.year = year;
        this.swid = swid;
        this.s2 = s2;
    }

    // Helper to construct headers with cookies
    private getHeaders(): Record<string, string> {
        const headers: Record<string, string> = {
            "User-Agent": "LineupAutopilot/1.0",
        };

        if (this.swid && this.s2) {
            headers["Cookie"] = `swid=${this.swid}; espn_s2=${this.s2};`;
        }

        return headers;
    }

    private leaguePath() {
        return `/seasons/${this.year}/segments/0/leagues/${this.leagueId}`;
    }

    private buildLeagueUrl(views: string[], params?: Record<string, string | number>) {
        const query = new URLSearchParams();

        for (const view of views) {
            query.append("view", view);
        }

        if (params) {
            for (const [key, value] of Object.entries(params)) {
                query.append(key, String(value));
            }
        }

        return `${READS_BASE}${this.leaguePath()}?${query.toString()}`;
    }

    private async fetchJson(url: string, label: string, init: FetchInit = {}): Promise<unknown> {
        console.log(`[EspnClient] Fetching ${label}: ${url}`);

        const response = await fetch(url, {
            ...init,
            headers: { ...this.getHeaders(), ...init.headers },
        });

        if (!response.ok) {
            const text = await response.text().catch(() => "");
            console.error(`[EspnClient] Error (${response.status}) for ${label}:`, text.substring(0, 500));
            if (response.status === 401 || response.status === 403) {
                throw new AuthenticationError(
                    `ESPN rejected the request for ${label} (${response.status}). Check ESPN_SWID and ESPN_S2.`
                );
            }
            throw new UpstreamApiError("espn", response.status, response.statusText);
        }

        const text = await response.text();
        if (!text) return null;
        try {
            return JSON.parse(text);
        } catch {
            console.error(`[EspnClient] Failed to parse response for ${label}:`, text.substring(0, 500));
            throw new Error(`Invalid JSON from ESPN: ${text.substring(0, 200)}...`);
        }
    }

    /** League payload for the given views, optionally pinned to a scoring period. */
    async getLeague(views: string[], scoringPeriodId?: number): Promise<EspnLeagueResponse> {
        const url = this.buildLeagueUrl(views, scoringPeriodId ? { scoringPeriodId } : undefined);
        const data = await this.fetchJson(url, `views [${views.join(", ")}]`);

        if (!isLeagueResponse(data)) {
            throw new Error(`Unexpected ESPN league payload for views [${views.join(", ")}]`);
        }
        return data;
    }

    /**
     * Fetches top free agents (waiver wire) for the league.
     * Use the slot id to narrow down by position.
     */
    async getFreeAgents(limit: number = 50, slotId?: number, scoringPeriodId?: number): Promise<EspnKonaPlayerEntry[]> {
        const url = this.buildLeagueUrl(
            ["kona_player_info"],
            scoringPeriodId ? { scoringPeriodId } : undefined
        );

        const filters = {
            players: {
                filterStatus: { value: ["FREEAGENT", "WAIVERS"] },
                filterSlotIds: slotId !== undefined ? { value: [slotId] } : undefined,
                limit,
                sortPercOwned: { sortPriority: 1, sortAsc: false },
                sortDraftRanks: { sortPriority: 100, sortAsc: true, value: "STANDARD" },
            },
        };

        const data = await this.fetchJson(url, "free agents", {
            headers: { "x-fantasy-filter": JSON.stringify(filters) },
        });

        if (!isRecord(data) || !Array.isArray(data.players)) return [];
        return data.players.filter(isKonaPlayerEntry);
    }

    /**
     * Fetches the professional team schedules (NFL schedule).
     * This is a season-level endpoint, not specific to the league instance.
     */
    async getProTeamSchedules(): Promise<EspnProTeam[]> {
        const url = `${READS_BASE}/seasons/${this.year}?view=proTeamSchedules_wl`;
        const data = await this.fetchJson(url, "pro schedule");

        if (!isRecord(data) || !isRecord(data.settings) || !Array.isArray(data.settings.proTeams)) {
            return [];
        }
        return data.settings.proTeams.filter(isProTeam);
    }

    /**
     * Moves players between lineup slots with a single ROSTER transaction.
     *
     * @throws AuthenticationError when the SWID/S2 cookies are missing or rejected
     */
    async submitLineup(teamId: number, scoringPeriodId: number, items: EspnLineupItem[]): Promise<void> {
        if (!this.swid || !this.s2) {
            throw new AuthenticationError("Lineup submission requires ESPN_SWID and ESPN_S2.");
        }

        const body: EspnTransactionRequest = {
            isLeagueManager: false,
            teamId,
            type: "ROSTER",
            memberId: this.swid,
            scoringPeriodId,
            executionType: "EXECUTE",
            items,
        };

        await this.fetchJson(`${WRITES_BASE}${this.leaguePath()}/transactions/`, "lineup transaction", {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify(body),
        });
    }
}

// ─── Payload guards ──────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLeagueResponse(value: unknown): value is EspnLeagueResponse {
    return isRecord(value) && typeof value.scoringPeriodId === "number";
}

function isKonaPlayerEntry(value: unknown): value is EspnKonaPlayerEntry {
    return isRecord(value) && typeof value.id === "number" && isRecord(value.player) && typeof value.player.id === "number";
}

function isProTeam(value: unknown): value is EspnProTeam {
    return isRecord(value) && typeof value.id === "number";
}
