import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { offsetInPanel, parseLeftPercent, toGridPosition } from "./grid";
import type { DayHeader } from "./types";
import { hasClassWord } from "./utils";

// Placeholders the vendor puts before/after the visible range
const SENTINEL_CASE_IDS = ["avant", "apres"];

export interface PositionedCase {
    element: Element;
    left: number;
}

/**
 * Event blocks (`div.Case`) positioned inside `panelIndex`, in document order.
 * Blocks without a table are kept: "Pas de cours" messages are rendered that way.
 */
export function extractCases($: CheerioAPI, panelIndex: number): PositionedCase[] {
    const cases: PositionedCase[] = [];

    $("div").each((_, element) => {
        const $div = $(element);
        if (!hasClassWord($div.attr("class"), "Case")) return;
        if (SENTINEL_CASE_IDS.includes(($div.attr("id") ?? "").toLowerCase())) return;

        const left = parseLeftPercent($div.attr("style"));
        if (left === null || toGridPosition(left).panelIndex !== panelIndex) return;

        cases.push({ element, left });
    });

    return cases;
}

/**
 * Label of the header whose column is closest to `left`. On equal distance the
 * earlier header wins. Null only when there are no headers.
 */
export function assignDay(left: number, dayHeaders: readonly DayHeader[]): string | null {
    const caseOffset = offsetInPanel(left);
    let best: string | null = null;
    let bestDelta = Number.POSITIVE_INFINITY;

    for (const header of dayHeaders) {
        const delta = Math.abs(caseOffset - header.offset);
        if (delta < bestDelta) {
            bestDelta = delta;
            best = header.label;
        }
    }
    return best;
}
