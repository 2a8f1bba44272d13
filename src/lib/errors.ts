/**
 * Error taxonomy for the optimizer.
 *
 * Only boundary failures (configuration, authentication) are allowed to
 * abort a run. Per-player upstream errors are absorbed by the scoring loop
 * and never reach the caller.
 *
 * @module lib/errors
 */

export class ConfigError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join("; ")}`);
        this.name = "ConfigError";
        this.issues = issues;
    }
}

export class AuthenticationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "AuthenticationError";
    }
}

export type UpstreamSource = "espn" | "odds";

export class UpstreamApiError extends Error {
    readonly status: number;
    readonly source: UpstreamSource;

    constructor(source: UpstreamSource, status: number, statusText: string) {
        super(`${source === "espn" ? "ESPN" : "Odds"} API Error: ${status} ${statusText}`.trim());
        this.name = "UpstreamApiError";
        this.status = status;
        this.source = source;
    }
}

export const getErrorMessage = (error: unknown): string => {
    if (error instanceof Error) return error.message;
    if (typeof error === "string") return error;
    return "Unknown error";
};
