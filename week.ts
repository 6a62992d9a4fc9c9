import * as cheerio from "cheerio";
import { parseCase, toCaseEvent } from "./case-parser";
import { assignDay, extractCases } from "./cases";
import { collectDayHeaders } from "./day-headers";
import { PanelNotFoundError } from "./errors";
import { FRENCH_LOCALE, type TimetableLocale } from "./locale";
import { dayHeadersForPanel, panelScores, pickPanel } from "./panel";
import type { CaseEvent, DayHeader, WeeklySchedule } from "./types";
import { hasClassWord, textLines, timeToMinutes } from "./utils";

export const NO_CLASS_MESSAGE = "Pas de cours cette semaine";

/** Text lines and horizontal position of one event block. */
export interface CaseBlock {
    left: number;
    lines: string[];
}

export interface ParsedWeek {
    panel: number;
    dayHeaders: DayHeader[];
    caseCount: number;
    casesWithTable: number;
    schedule: WeeklySchedule;
}

function byStartTime(a: CaseEvent, b: CaseEvent): number {
    const aMinutes = timeToMinutes(a.start);
    const bMinutes = timeToMinutes(b.start);
    if (aMinutes === bMinutes) return 0;
    return aMinutes < bMinutes ? -1 : 1;
}

function noClassEvent(): CaseEvent {
    return { raw: NO_CLASS_MESSAGE, start: "", end: "", room: "", site: "", teacher: "", title: "" };
}

/**
 * Group event blocks under the day header of their column and sort each day
 * by start time. Every header of the panel becomes a key, even without events.
 *
 * "Pas de cours" blocks span the whole week with an unreliable offset, so
 * they always go to the first day.
 */
export function assembleWeek(blocks: readonly CaseBlock[], dayHeaders: readonly DayHeader[]): WeeklySchedule {
    if (dayHeaders.length === 0) return {};

    const firstLabel = dayHeaders[0].label;
    const schedule: WeeklySchedule = {};
    for (const header of dayHeaders) {
        schedule[header.label] = [];
    }

    for (const block of blocks) {
        if (block.lines.join(" ").toLowerCase().includes("pas de cours")) {
            schedule[firstLabel].push(noClassEvent());
            continue;
        }
        const label = assignDay(block.left, dayHeaders) ?? firstLabel;
        schedule[label].push(toCaseEvent(block.lines, parseCase(block.lines)));
    }

    for (const events of Object.values(schedule)) {
        events.sort(byStartTime);
    }
    return schedule;
}

/**
 * Rebuild the week starting at `monday` from a Wigor page.
 *
 * @throws PanelNotFoundError when no panel carries a date of that week
 */
export function parseWeekHtml(
    html: string,
    monday: Date,
    locale: TimetableLocale = FRENCH_LOCALE
): ParsedWeek {
    const $ = cheerio.load(html);

    const allHeaders = collectDayHeaders($, locale);
    const scores = panelScores(allHeaders, monday);
    const panel = pickPanel(scores);
    if (panel === null || !scores.get(panel)) {
        throw new PanelNotFoundError(monday);
    }

    const dayHeaders = dayHeadersForPanel(allHeaders, panel);
    const cases = extractCases($, panel);
    const casesWithTable = cases.filter(({ element }) =>
        $(element)
            .find("table")
            .toArray()
            .some((table) => hasClassWord($(table).attr("class"), "TCase"))
    ).length;

    const blocks = cases.map(({ element, left }) => ({ left, lines: textLines($, element) }));

    return {
        panel,
        dayHeaders,
        caseCount: cases.length,
        casesWithTable,
        schedule: assembleWeek(blocks, dayHeaders),
    };
}
