import { addDays, format, isValid, parseISO, startOfISOWeek } from "date-fns";
import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";

/**
 * Collapse runs of horizontal whitespace and non-breaking spaces to a single
 * space and trim. Newlines are kept.
 * Example: "Lundi  15   septembre " -> "Lundi 15 septembre"
 */
export function normalizeText(value: string | null | undefined): string {
    if (!value) return "";
    return value
        .replace(/\u00a0/g, " ")
        .replace(/[ \t\r\f\v]+/g, " ")
        .trim();
}

/**
 * Text of an element as one line per text node, trimmed, empty lines dropped.
 */
export function textLines($: CheerioAPI, element: Element): string[] {
    const copy = $(element).clone();
    // Separate every element so adjacent cells never merge into one line
    copy.find("*").each((_, child) => {
        $(child).prepend("\n").append("\n");
    });
    return copy
        .text()
        .split("\n")
        .map((line) => normalizeText(line))
        .filter(Boolean);
}

/**
 * True when the space separated class list contains `className`, ignoring case.
 */
export function hasClassWord(classAttr: string | undefined, className: string): boolean {
    if (!classAttr) return false;
    const wanted = className.toLowerCase();
    return classAttr
        .split(/\s+/)
        .some((name) => name.toLowerCase() === wanted);
}

export interface ClockTime {
    hours: number;
    minutes: number;
}

/**
 * Strict "H:MM" / "HH:MM" / "HHhMM" parser. Out of range values are rejected.
 */
export function parseClockTime(value: string | null | undefined): ClockTime | null {
    if (!value) return null;
    const match = value.trim().replace(/h/i, ":").match(/^(\d{1,2}):(\d{2})$/);
    if (!match) return null;
    const hours = Number.parseInt(match[1], 10);
    const minutes = Number.parseInt(match[2], 10);
    if (hours > 23 || minutes > 59) return null;
    return { hours, minutes };
}

/**
 * Minutes since midnight, used as a sort key. Unparseable times sort last.
 */
export function timeToMinutes(value: string | null | undefined): number {
    const time = parseClockTime(value);
    return time ? time.hours * 60 + time.minutes : Number.POSITIVE_INFINITY;
}

export function pad(value: number): string {
    return value.toString().padStart(2, "0");
}

/**
 * Monday (local midnight) of the ISO week containing `date`.
 */
export function isoMonday(date: Date): Date {
    return startOfISOWeek(date);
}

/**
 * The 7 consecutive days starting at `monday`.
 */
export function weekDays(monday: Date): Date[] {
    return Array.from({ length: 7 }, (_, i) => addDays(monday, i));
}

/**
 * Parse a "YYYY-MM-DD" string as a local date, or null when invalid.
 */
export function parseIsoDate(value: string): Date | null {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
    const date = parseISO(value);
    return isValid(date) ? date : null;
}

export function formatIsoDate(date: Date): string {
    return format(date, "yyyy-MM-dd");
}
