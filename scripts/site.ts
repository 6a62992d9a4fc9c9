/**
 * Week JSON files and the published site (ical.ics + index.html).
 *
 * Week files are named after their Monday (`2025-09-15.json`) and hold the
 * WeeklySchedule mapping exactly as the parser produced it.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from "fs";
import path from "path";
import { countCalendarEvents, toIcs } from "../ics";
import { renderHtmlListing } from "../listing";
import type { CaseEvent, ScheduledWeek, WeeklySchedule } from "../types";
import { formatIsoDate, parseIsoDate } from "../utils";

const CASE_EVENT_KEYS = ["raw", "start", "end", "room", "site", "teacher", "title"] as const;

export const ICS_FILENAME = "ical.ics";
export const INDEX_FILENAME = "index.html";

export interface SiteOptions {
    calendarName: string;
    siteBase: string | null;
    now?: Date;
}

export interface SiteStats {
    weeks: number;
    events: number;
    icsPath: string;
    indexPath: string;
}

function ensureDir(dir: string): void {
    if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Older files may lack "site"; missing keys become empty strings
function isCaseEventLike(value: unknown): value is Record<string, unknown> {
    return (
        isRecord(value) &&
        CASE_EVENT_KEYS.every((key) => value[key] === undefined || typeof value[key] === "string")
    );
}

function normaliseCaseEvent(value: Record<string, unknown>): CaseEvent {
    const field = (key: (typeof CASE_EVENT_KEYS)[number]) => {
        const raw = value[key];
        return typeof raw === "string" ? raw : "";
    };
    return {
        raw: field("raw"),
        start: field("start"),
        end: field("end"),
        room: field("room"),
        site: field("site"),
        teacher: field("teacher"),
        title: field("title"),
    };
}

/**
 * Validate parsed JSON as a WeeklySchedule. Returns null when the shape is wrong.
 */
export function toWeeklySchedule(value: unknown): WeeklySchedule | null {
    if (!isRecord(value)) return null;

    const schedule: WeeklySchedule = {};
    for (const [label, events] of Object.entries(value)) {
        if (!Array.isArray(events) || !events.every(isCaseEventLike)) return null;
        schedule[label] = events.map((event) => normaliseCaseEvent(event));
    }
    return schedule;
}

export function writeWeekJson(dir: string, week: ScheduledWeek): string {
    ensureDir(dir);
    const filePath = path.join(dir, `${formatIsoDate(week.monday)}.json`);
    writeFileSync(filePath, JSON.stringify(week.schedule, null, 2) + "\n", "utf-8");
    return filePath;
}

/**
 * Load every `<YYYY-MM-DD>.json` week file of `dir`, oldest week first.
 * Files with another name or an unexpected shape are reported and skipped.
 */
export function loadWeeksFromJsonDir(dir: string): ScheduledWeek[] {
    if (!existsSync(dir)) return [];

    const weeks: ScheduledWeek[] = [];
    const files = readdirSync(dir)
        .filter((name) => name.endsWith(".json"))
        .sort();

    for (const name of files) {
        const monday = parseIsoDate(path.basename(name, ".json"));
        if (!monday) {
            console.warn(`[Site] Skipping ${name}: file name is not a YYYY-MM-DD date`);
            continue;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(readFileSync(path.join(dir, name), "utf-8"));
        } catch (error) {
            console.warn(`[Site] Skipping ${name}: invalid JSON (${error instanceof Error ? error.message : String(error)})`);
            continue;
        }

        const schedule = toWeeklySchedule(parsed);
        if (!schedule) {
            console.warn(`[Site] Skipping ${name}: not a week schedule`);
            continue;
        }
        weeks.push({ monday, schedule });
    }

    return weeks;
}

/**
 * Write ical.ics and index.html for `weeks` into `outDir`.
 */
export function publishSite(weeks: readonly ScheduledWeek[], outDir: string, options: SiteOptions): SiteStats {
    ensureDir(outDir);
    const now = options.now ?? new Date();
    const events = countCalendarEvents(weeks);

    const icsPath = path.join(outDir, ICS_FILENAME);
    writeFileSync(icsPath, toIcs(weeks, { calendarName: options.calendarName, now }), "utf-8");

    const indexPath = path.join(outDir, INDEX_FILENAME);
    const html = renderHtmlListing(weeks, {
        title: options.calendarName,
        icsHref: ICS_FILENAME,
        siteBase: options.siteBase,
        eventCount: events,
        generatedAt: now,
    });
    writeFileSync(indexPath, html, "utf-8");

    return { weeks: weeks.length, events, icsPath, indexPath };
}
