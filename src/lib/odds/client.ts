import { UpstreamApiError } from "@/lib/errors";
import { PROP_MARKETS, type OddsApiEvent } from "@/types/odds";

const ODDS_API_BASE = "https://api.the-odds-api.com/v4";
const SPORT_KEY = "americanfootball_nfl";

export interface OddsApiClientOptions {
    regions?: string;
    timeoutMs?: number;
}

/** The bulk calls the normalizer depends on. */
export interface OddsFeed {
    getGameOdds(): Promise<OddsApiEvent[]>;
    getEvents(): Promise<OddsApiEvent[]>;
    getEventProps(eventId: string): Promise<OddsApiEvent | null>;
}

/**
 * Thin HTTP client for The Odds API v4 (NFL only).
 *
 * Every method is a bulk fetch; player/team filtering happens client-side
 * in the OddsNormalizer.
 */
export class OddsApiClient implements OddsFeed {
    private apiKey: string;
    private regions: string;
    private timeoutMs: number;

    constructor(apiKey: string, options: OddsApiClientOptions = {}) {
        this.apiKey = apiKey;
        this.regions = options.regions ?? "us";
        this.timeoutMs = options.timeoutMs ?? 15_000;
    }

    private buildUrl(path: string, params: Record<string, string> = {}) {
        const query = new URLSearchParams({
            apiKey: this.apiKey,
            regions: this.regions,
            dateFormat: "iso",
            ...params,
        });
        return `${ODDS_API_BASE}/sports/${SPORT_KEY}${path}?${query.toString()}`;
    }

    private async fetchJson(path: string, params?: Record<string, string>): Promise<unknown> {
        const url = this.buildUrl(path, params);
        console.log(`[OddsApi] Fetching ${path}`);

        const response = await fetch(url, {
            headers: { "User-Agent": "LineupAutopilot/1.0 (Odds API Integration)" },
            signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (!response.ok) {
            const text = await response.text().catch(() => "");
            console.error(`[OddsApi] Error (${response.status}) for ${path}:`, text.substring(0, 500));
            throw new UpstreamApiError("odds", response.status, response.statusText);
        }

        const text = await response.text();
        try {
            return JSON.parse(text);
        } catch {
            console.error(`[OddsApi] Failed to parse response for ${path}:`, text.substring(0, 500));
            throw new Error(`Invalid JSON from Odds API: ${text.substring(0, 200)}...`);
        }
    }

    /** Spreads and totals for every upcoming game. */
    async getGameOdds(): Promise<OddsApiEvent[]> {
        const data = await this.fetchJson("/odds", {
            markets: "spreads,totals",
            oddsFormat: "american",
        });
        return Array.isArray(data) ? data.filter(isOddsApiEvent) : [];
    }

    /** Upcoming events without markets, used to discover event ids for props. */
    async getEvents(): Promise<OddsApiEvent[]> {
        const data = await this.fetchJson("/events");
        return Array.isArray(data) ? data.filter(isOddsApiEvent) : [];
    }

    /** Player prop markets for a single event. */
    async getEventProps(eventId: string): Promise<OddsApiEvent | null> {
        const data = await this.fetchJson(`/events/${encodeURIComponent(eventId)}/odds`, {
            markets: PROP_MARKETS.join(","),
            oddsFormat: "american",
        });
        return isOddsApiEvent(data) ? data : null;
    }
}

function isOddsApiEvent(value: unknown): value is OddsApiEvent {
    return (
        typeof value === "object" &&
        value !== null &&
        "id" in value &&
        typeof value.id === "string" &&
        "home_team" in value &&
        "away_team" in value
    );
}
