/**
 * Core Export Logic
 *
 * Shared by the export CLI, the scheduled publish and the HTTP routes:
 * fetch and rebuild consecutive weeks, then persist them.
 */

import { addWeeks } from "date-fns";
import path from "path";
import type { AppConfig } from "../config";
import { PanelNotFoundError, RetrievalError } from "../errors";
import { formatWeekListing } from "../listing";
import type { HtmlSource } from "../scraping";
import type { ScheduledWeek } from "../types";
import { formatIsoDate, isoMonday } from "../utils";
import { parseWeekHtml, type ParsedWeek } from "../week";
import { publishSite, writeWeekJson, type SiteStats } from "./site";

export interface CollectedWeek extends ScheduledWeek {
    parsed: ParsedWeek;
}

export interface CollectOptions {
    /** Called once per week, after it was fetched and parsed. */
    onWeek?: (week: CollectedWeek, index: number) => void;
}

/**
 * Fetch and parse `weekCount` consecutive weeks starting with the week of
 * `startDate`, one after another.
 *
 * The first week must succeed: a retrieval failure or a missing panel there
 * is thrown. Later weeks that fail the same way are reported and skipped.
 */
export async function collectWeeks(
    source: HtmlSource,
    startDate: Date,
    weekCount: number,
    options: CollectOptions = {}
): Promise<CollectedWeek[]> {
    const firstMonday = isoMonday(startDate);
    const weeks: CollectedWeek[] = [];

    for (let k = 0; k < Math.max(1, weekCount); k++) {
        const monday = addWeeks(firstMonday, k);
        try {
            const html = await source(monday);
            const parsed = parseWeekHtml(html, monday);
            const week = { monday, schedule: parsed.schedule, parsed };
            weeks.push(week);
            options.onWeek?.(week, k);
        } catch (error) {
            if (k === 0 || !(error instanceof RetrievalError || error instanceof PanelNotFoundError)) {
                throw error;
            }
            console.warn(`[Export] Skipping week of ${formatIsoDate(monday)}: ${error.message}`);
        }
    }

    return weeks;
}

export interface ExportOptions {
    source: HtmlSource;
    config: Readonly<AppConfig>;
    startDate?: Date;
    weekCount?: number;
    now?: Date;
}

export interface ExportStats extends SiteStats {
    jsonFiles: string[];
}

/**
 * Run a full export: week JSON files under `<outputDir>/json`, then the
 * calendar and listing page. The first week is printed to the console.
 */
export async function runExport(options: ExportOptions): Promise<ExportStats> {
    const { source, config, startDate = new Date(), weekCount = config.exportWeeks, now = new Date() } = options;

    console.log(`[Export] Starting export of ${weekCount} week(s) from ${formatIsoDate(isoMonday(startDate))}`);

    const weeks = await collectWeeks(source, startDate, weekCount, {
        onWeek: ({ monday, parsed }, index) => {
            console.log(
                `[Export] Week of ${formatIsoDate(monday)}: panel ${parsed.panel}, ` +
                    `${parsed.dayHeaders.length} day headers, ${parsed.caseCount} cases ` +
                    `(${parsed.casesWithTable} with a table)`
            );
            if (index === 0) {
                console.log(formatWeekListing(parsed.schedule));
            }
        },
    });

    const jsonDir = path.join(config.outputDir, "json");
    const jsonFiles = weeks.map((week) => writeWeekJson(jsonDir, week));

    const stats = publishSite(weeks, config.outputDir, {
        calendarName: config.calendarName,
        siteBase: config.siteBase,
        now,
    });

    console.log(`[Export] Wrote ${jsonFiles.length} week file(s), ${stats.events} calendar events to ${stats.icsPath}`);
    return { ...stats, jsonFiles };
}
