import { getDaysInMonth } from "date-fns";
import type { CheerioAPI } from "cheerio";
import { offsetInPanel, parseLeftPercent } from "./grid";
import { FRENCH_LOCALE, stripAccents, type TimetableLocale } from "./locale";
import type { CalendarDay, DayHeader } from "./types";
import { hasClassWord, normalizeText, textLines } from "./utils";

// Any leap year, so "29 février" stays a valid header
const REFERENCE_LEAP_YEAR = 2000;

const dayLabelPatterns = new WeakMap<TimetableLocale, RegExp>();

function dayLabelPattern(locale: TimetableLocale): RegExp {
    let pattern = dayLabelPatterns.get(locale);
    if (!pattern) {
        pattern = new RegExp(`(${locale.weekdays.join("|")})\\s+(\\d{1,2})\\s+([a-zéèêàâîôûùç]+)`, "i");
        dayLabelPatterns.set(locale, pattern);
    }
    return pattern;
}

/**
 * Month and day written in a header label.
 * Example: "Lundi 15 Septembre" -> { month: 9, day: 15 }
 *
 * Labels without a weekday, day number and known month give null.
 */
export function resolveCalendarDay(
    label: string,
    locale: TimetableLocale = FRENCH_LOCALE
): CalendarDay | null {
    const lower = normalizeText(label).toLowerCase();
    const match = lower.match(dayLabelPattern(locale));
    if (!match) return null;

    const day = Number.parseInt(match[2], 10);
    const month = locale.months[stripAccents(match[3], locale)];
    if (!month) return null;

    if (day < 1 || day > getDaysInMonth(new Date(REFERENCE_LEAP_YEAR, month - 1, 1))) {
        return null;
    }
    return { month, day };
}

/**
 * Every `div.Jour` of the page that has a horizontal position, in document order.
 */
export function collectDayHeaders($: CheerioAPI, locale: TimetableLocale = FRENCH_LOCALE): DayHeader[] {
    const headers: DayHeader[] = [];

    $("div").each((_, element) => {
        const $div = $(element);
        if (!hasClassWord($div.attr("class"), "Jour")) return;

        const left = parseLeftPercent($div.attr("style"));
        if (left === null) return;

        const labelCell = $div
            .find("td")
            .filter((_, td) => hasClassWord($(td).attr("class"), "TCJour"))
            .first();
        const labelSource = labelCell.length > 0 ? labelCell.get(0) : element;
        const label = labelSource ? textLines($, labelSource).join(" ") : "";

        headers.push({
            label,
            left,
            offset: offsetInPanel(left),
            calendarDay: resolveCalendarDay(label, locale),
        });
    });

    return headers;
}
