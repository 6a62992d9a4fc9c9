import { toGridPosition } from "./grid";
import type { CalendarDay, DayHeader } from "./types";
import { weekDays } from "./utils";

const dayKey = ({ month, day }: CalendarDay) => `${month}-${day}`;

/**
 * Number of (month, day) pairs each panel shares with the week starting at
 * `targetMonday`, keyed by panel index in the order panels are met. Panels
 * without any dated header are absent.
 */
export function panelScores(dayHeaders: readonly DayHeader[], targetMonday: Date): Map<number, number> {
    const panels = new Map<number, Set<string>>();

    for (const header of dayHeaders) {
        if (!header.calendarDay) continue;
        const { panelIndex } = toGridPosition(header.left);
        const days = panels.get(panelIndex) ?? new Set<string>();
        days.add(dayKey(header.calendarDay));
        panels.set(panelIndex, days);
    }

    const targetDays = new Set(
        weekDays(targetMonday).map((date) => dayKey({ month: date.getMonth() + 1, day: date.getDate() }))
    );

    const scores = new Map<number, number>();
    for (const [panelIndex, days] of panels) {
        scores.set(panelIndex, [...days].filter((key) => targetDays.has(key)).length);
    }
    return scores;
}

/**
 * Best panel of a `panelScores` result. Ties go to the panel met first.
 * Returns null for an empty map.
 */
export function pickPanel(scores: ReadonlyMap<number, number>): number | null {
    let bestPanel: number | null = null;
    let bestScore = -1;
    for (const [panelIndex, score] of scores) {
        if (score > bestScore) {
            bestScore = score;
            bestPanel = panelIndex;
        }
    }
    return bestPanel;
}

/**
 * Pick the panel matching the requested week. Years never appear on the
 * page and offsets repeat across weeks, so panels are told apart by dates.
 *
 * Ties go to the panel met first. Returns null when no header has a date.
 */
export function selectPanel(dayHeaders: readonly DayHeader[], targetMonday: Date): number | null {
    return pickPanel(panelScores(dayHeaders, targetMonday));
}

/**
 * Headers of one panel ordered left to right, dated or not.
 */
export function dayHeadersForPanel(dayHeaders: readonly DayHeader[], panelIndex: number): DayHeader[] {
    return dayHeaders
        .filter((header) => toGridPosition(header.left).panelIndex === panelIndex)
        .sort((a, b) => a.left - b.left);
}
