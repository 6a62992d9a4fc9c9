import type { CaseEvent } from "./types";
import { pad } from "./utils";

// "9h00 - 10h30", "09:00-10:30"
const TIME_RANGE_PATTERN = /(\d{1,2}[:h]\d{2})\s*-\s*(\d{1,2}[:h]\d{2})/i;
// "Salle: B204 (Site Nord)", "SALLE : AMPHI A"
const ROOM_PATTERN = /^salle\s*:?\s*([A-Za-z0-9_\- ]+)(?:\(([^)]+)\))?$/i;
// Letters (accented too), spaces, hyphens, apostrophes and initials' periods
const TEACHER_PATTERN = /^[A-Za-zÀ-ÖØ-öø-ÿ'.\- ]{3,}$/;
const RESERVED_PREFIXES = ["salle", "site", "socle ", "promotion ", "groupe "];

/**
 * Fields recovered from one event block. Null means the heuristic found
 * nothing, which is never an error.
 */
export interface CaseFields {
    start: string | null;
    end: string | null;
    title: string | null;
    room: string | null;
    site: string | null;
    teacher: string | null;
}

function normalizeClock(value: string): string {
    const [hours, minutes] = value.replace(/h/i, ":").split(":");
    return `${pad(Number.parseInt(hours, 10))}:${minutes}`;
}

function isMetadataLine(line: string): boolean {
    const lower = line.toLowerCase();
    return TIME_RANGE_PATTERN.test(lower) || RESERVED_PREFIXES.some((prefix) => lower.startsWith(prefix));
}

/**
 * Best-effort split of an event block's lines into its fields. The page has
 * no field markup, so only line order and prefixes are available:
 *
 * - the time range is searched anywhere in the text
 * - the first `Salle: NAME(SITE)` line gives room and site
 * - the title is the first line that is neither a time range nor a labelled line
 * - the teacher is the first name-shaped line after the title line
 *
 * When the title is not a line of its own, no teacher is reported.
 */
export function parseCase(lines: readonly string[]): CaseFields {
    let start: string | null = null;
    let end: string | null = null;
    let title: string | null = null;
    let room: string | null = null;
    let site: string | null = null;
    let teacher: string | null = null;

    const timeMatch = lines.join("\n").match(TIME_RANGE_PATTERN);
    if (timeMatch) {
        start = normalizeClock(timeMatch[1]);
        end = normalizeClock(timeMatch[2]);
    }

    for (const line of lines) {
        const roomMatch = line.match(ROOM_PATTERN);
        if (roomMatch) {
            room = roomMatch[1].trim();
            site = roomMatch[2]?.trim() ?? null;
            break;
        }
    }

    title = lines.find((line) => !isMetadataLine(line)) ?? null;

    if (title !== null) {
        const titleIndex = lines.indexOf(title);
        for (const line of lines.slice(titleIndex + 1)) {
            if (isMetadataLine(line)) continue;
            if (TEACHER_PATTERN.test(line)) {
                teacher = line.trim();
                break;
            }
        }
    }

    return { start, end, title, room, site, teacher };
}

/**
 * Flatten parsed fields into the serializable event shape.
 */
export function toCaseEvent(lines: readonly string[], fields: CaseFields): CaseEvent {
    return {
        raw: lines.join("\n"),
        start: fields.start ?? "",
        end: fields.end ?? "",
        room: fields.room ?? "",
        site: fields.site ?? "",
        teacher: fields.teacher ?? "",
        title: fields.title ?? "",
    };
}
