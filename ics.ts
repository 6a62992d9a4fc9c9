import { createHash } from "node:crypto";
import { addDays, format } from "date-fns";
import { FRENCH_LOCALE, stripAccents, weekdayIndexOfLabel, type TimetableLocale } from "./locale";
import type { CaseEvent, ScheduledWeek } from "./types";
import { pad, parseClockTime, type ClockTime } from "./utils";

const TZID = "Europe/Paris";
const PRODUCT_ID = "-//Wigor Timetable//Calendar Export//FR";
const UID_DOMAIN = "wigor-timetable";
const DEFAULT_TITLE = "Cours";
const MAX_LINE_OCTETS = 75;

// Fixed rules: last Sunday of March / October
const PARIS_TIMEZONE = [
    "BEGIN:VTIMEZONE",
    `TZID:${TZID}`,
    `X-LIC-LOCATION:${TZID}`,
    "BEGIN:DAYLIGHT",
    "TZOFFSETFROM:+0100",
    "TZOFFSETTO:+0200",
    "TZNAME:CEST",
    "DTSTART:19700329T020000",
    "RRULE:FREQ=YEARLY;BYMONTH=3;BYDAY=-1SU",
    "END:DAYLIGHT",
    "BEGIN:STANDARD",
    "TZOFFSETFROM:+0200",
    "TZOFFSETTO:+0100",
    "TZNAME:CET",
    "DTSTART:19701025T030000",
    "RRULE:FREQ=YEARLY;BYMONTH=10;BYDAY=-1SU",
    "END:STANDARD",
    "END:VTIMEZONE",
];

export interface IcsOptions {
    calendarName?: string;
    /** Clock used for DTSTAMP; pass a fixed date for byte-identical output. */
    now?: Date;
    locale?: TimetableLocale;
}

/**
 * Escape special characters for ICS text values
 */
export function escapeIcs(value: string | null | undefined): string {
    if (!value) return "";
    return value
        .replace(/\\/g, "\\\\")
        .replace(/;/g, "\\;")
        .replace(/,/g, "\\,")
        .replace(/\r\n|\r/g, "\n")
        .replace(/\n/g, "\\n");
}

/**
 * Split a content line into 75-octet chunks joined by CRLF + space, never
 * inside a UTF-8 sequence.
 */
export function foldLine(line: string): string {
    if (Buffer.byteLength(line, "utf8") <= MAX_LINE_OCTETS) return line;

    const chunks: string[] = [];
    let current = "";
    let currentOctets = 0;
    for (const char of line) {
        const octets = Buffer.byteLength(char, "utf8");
        // Continuation lines start with a space that counts toward the limit
        const limit = chunks.length === 0 ? MAX_LINE_OCTETS : MAX_LINE_OCTETS - 1;
        if (currentOctets + octets > limit) {
            chunks.push(current);
            current = "";
            currentOctets = 0;
        }
        current += char;
        currentOctets += octets;
    }
    chunks.push(current);
    return chunks.join("\r\n ");
}

/**
 * Calendar date of a day label within the week of `monday`.
 * "Mardi 16 septembre" -> monday + 1. Labels without a leading weekday fall
 * back to their day and month, in `monday`'s year; anything else is `monday`.
 */
export function dateForLabelInWeek(
    label: string,
    monday: Date,
    locale: TimetableLocale = FRENCH_LOCALE
): Date {
    const weekdayIndex = weekdayIndexOfLabel(label, locale);
    if (weekdayIndex >= 0) {
        return addDays(monday, weekdayIndex);
    }

    const monthNames = Object.keys(locale.months).join("|");
    const match = label.trim().toLowerCase().match(new RegExp(`(\\d{1,2}).+?(${monthNames})`));
    if (!match) return monday;

    const day = Number.parseInt(match[1], 10);
    const month = locale.months[match[2]] ?? locale.months[stripAccents(match[2], locale)];
    if (!month) return monday;

    const date = new Date(monday.getFullYear(), month - 1, day);
    return date.getMonth() === month - 1 && date.getDate() === day ? date : monday;
}

/**
 * Content-derived UID: the same event on the same day always gets the same
 * identifier, so calendar clients update it instead of duplicating it.
 */
export function eventUid(dtStart: string, dtEnd: string, title: string, location: string, description: string): string {
    const digest = createHash("md5")
        .update(`${dtStart}|${dtEnd}|${title}|${location}|${description}`, "utf8")
        .digest("hex");
    return `${digest}@${UID_DOMAIN}`;
}

export function formatLocation(event: Pick<CaseEvent, "room" | "site">): string {
    if (!event.site) return event.room;
    return event.room ? `${event.room} (${event.site})` : `(${event.site})`;
}

export function formatDescription(event: Pick<CaseEvent, "teacher" | "raw">): string {
    return [event.teacher, event.raw].filter(Boolean).join("\n");
}

function formatLocalDateTime(day: Date, time: ClockTime): string {
    return `${format(day, "yyyyMMdd")}T${pad(time.hours)}${pad(time.minutes)}00`;
}

function formatUtcStamp(date: Date): string {
    return date.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
}

function eventLines(event: CaseEvent, day: Date, stamp: string): string[] | null {
    const start = parseClockTime(event.start);
    const end = parseClockTime(event.end);
    if (!start || !end) return null;

    const dtStart = formatLocalDateTime(day, start);
    const dtEnd = formatLocalDateTime(day, end);
    const title = escapeIcs(event.title || DEFAULT_TITLE);
    const location = escapeIcs(formatLocation(event));
    const description = escapeIcs(formatDescription(event));

    return [
        "BEGIN:VEVENT",
        `UID:${eventUid(dtStart, dtEnd, title, location, description)}`,
        `DTSTAMP:${stamp}`,
        `DTSTART;TZID=${TZID}:${dtStart}`,
        `DTEND;TZID=${TZID}:${dtEnd}`,
        `SUMMARY:${title}`,
        `LOCATION:${location}`,
        `DESCRIPTION:${description}`,
        "END:VEVENT",
    ];
}

/**
 * Serialize weeks into one VCALENDAR document with CRLF line endings.
 * Events without a usable start and end time (e.g. "Pas de cours") are left out.
 */
export function toIcs(weeks: readonly ScheduledWeek[], options: IcsOptions = {}): string {
    const { calendarName = "EDT Wigor", now = new Date(), locale = FRENCH_LOCALE } = options;
    const stamp = formatUtcStamp(now);

    const lines: string[] = [
        "BEGIN:VCALENDAR",
        "VERSION:2.0",
        `PRODID:${PRODUCT_ID}`,
        "CALSCALE:GREGORIAN",
        "METHOD:PUBLISH",
        `X-WR-CALNAME:${escapeIcs(calendarName)}`,
        `X-WR-TIMEZONE:${TZID}`,
        ...PARIS_TIMEZONE,
    ];

    for (const { monday, schedule } of weeks) {
        for (const [label, events] of Object.entries(schedule)) {
            const day = dateForLabelInWeek(label, monday, locale);
            for (const event of events) {
                const vevent = eventLines(event, day, stamp);
                if (vevent) lines.push(...vevent);
            }
        }
    }

    lines.push("END:VCALENDAR");
    return lines.map(foldLine).join("\r\n") + "\r\n";
}

/**
 * Number of events `toIcs` would emit for these weeks.
 */
export function countCalendarEvents(weeks: readonly ScheduledWeek[]): number {
    return weeks.reduce(
        (total, { schedule }) =>
            total +
            Object.values(schedule)
                .flat()
                .filter((event) => parseClockTime(event.start) && parseClockTime(event.end)).length,
        0
    );
}
