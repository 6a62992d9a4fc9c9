import type { Response } from "express";
import type { AppConfig } from "../config";
import { ConfigError, PanelNotFoundError, RetrievalError } from "../errors";
import type { HtmlSource } from "../scraping";
import { parseIsoDate } from "../utils";

export const MAX_WEEKS_PER_REQUEST = 12;

export interface TimetableDeps {
    config: Readonly<AppConfig>;
    /** Null when WIGOR_URL is not configured. */
    source: HtmlSource | null;
    now?: () => Date;
}

export function requireSource(deps: TimetableDeps): HtmlSource {
    if (!deps.source) {
        throw new ConfigError("WIGOR_URL is missing");
    }
    return deps.source;
}

export class RequestError extends Error {
    constructor(message: string, public status: number) {
        super(message);
        this.name = "RequestError";
    }
}

/**
 * `?date=YYYY-MM-DD`, defaulting to today.
 */
export function parseDateQuery(value: unknown): Date {
    if (value === undefined || value === "") return new Date();
    const date = typeof value === "string" ? parseIsoDate(value) : null;
    if (!date) {
        throw new RequestError("Invalid date parameter (expected YYYY-MM-DD)", 400);
    }
    return date;
}

/**
 * `?weeks=N` between 1 and MAX_WEEKS_PER_REQUEST.
 */
export function parseWeeksQuery(value: unknown, fallback: number): number {
    if (value === undefined || value === "") return Math.min(fallback, MAX_WEEKS_PER_REQUEST);
    const weeks = typeof value === "string" && /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
    if (!Number.isFinite(weeks) || weeks < 1 || weeks > MAX_WEEKS_PER_REQUEST) {
        throw new RequestError(`Invalid weeks parameter (1-${MAX_WEEKS_PER_REQUEST})`, 400);
    }
    return weeks;
}

/**
 * Map an error to a JSON error response.
 */
export function sendError(res: Response, error: unknown, context: string): void {
    if (error instanceof RequestError) {
        res.status(error.status).json({ error: error.message });
        return;
    }
    if (error instanceof PanelNotFoundError) {
        res.status(404).json({ error: error.message });
        return;
    }
    if (error instanceof RetrievalError) {
        console.error(`${context}:`, error);
        res.status(502).json({ error: "Failed to fetch the timetable page" });
        return;
    }
    if (error instanceof ConfigError) {
        res.status(503).json({ error: error.message });
        return;
    }
    console.error(`${context}:`, error);
    res.status(500).json({ error: context });
}
