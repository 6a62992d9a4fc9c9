/**
 * French calendar vocabulary used by the Wigor pages. Kept as one frozen
 * object so parsers can take it as a parameter.
 */
export interface TimetableLocale {
    /** Lower-case weekday names, Monday first. */
    weekdays: readonly string[];
    /** Lower-case month names, accented and unaccented, to 1-based month. */
    months: Readonly<Record<string, number>>;
    /** Accented letter to its plain counterpart, applied to month tokens. */
    accents: Readonly<Record<string, string>>;
}

export const FRENCH_LOCALE: TimetableLocale = Object.freeze({
    weekdays: Object.freeze(["lundi", "mardi", "mercredi", "jeudi", "vendredi", "samedi", "dimanche"]),
    months: Object.freeze({
        janvier: 1,
        février: 2,
        fevrier: 2,
        mars: 3,
        avril: 4,
        mai: 5,
        juin: 6,
        juillet: 7,
        août: 8,
        aout: 8,
        septembre: 9,
        octobre: 10,
        novembre: 11,
        décembre: 12,
        decembre: 12,
    }),
    accents: Object.freeze({
        é: "e",
        è: "e",
        ê: "e",
        à: "a",
        â: "a",
        î: "i",
        ô: "o",
        û: "u",
        ù: "u",
        ç: "c",
    }),
});

/**
 * Replace accented letters listed in the locale table.
 * Example: "décembre" -> "decembre"
 */
export function stripAccents(word: string, locale: TimetableLocale = FRENCH_LOCALE): string {
    return Array.from(word)
        .map((char) => locale.accents[char] ?? char)
        .join("");
}

/**
 * Index of the weekday a label starts with (0 = lundi), or -1.
 */
export function weekdayIndexOfLabel(label: string, locale: TimetableLocale = FRENCH_LOCALE): number {
    const lower = label.trim().toLowerCase();
    return locale.weekdays.findIndex((name) => lower.startsWith(name));
}
