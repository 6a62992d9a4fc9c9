import type { GridPosition } from "./types";

const LEFT_PERCENT_PATTERN = /left\s*:\s*([-\d.]+)\s*%/i;

/**
 * Horizontal offset from an inline style such as "top:10%; left: 214.5%".
 * Returns null when there is no `left: N%` or N is not a number.
 */
export function parseLeftPercent(style: string | null | undefined): number | null {
    if (!style) return null;
    const match = style.match(LEFT_PERCENT_PATTERN);
    if (!match) return null;
    const value = Number(match[1]);
    return Number.isFinite(value) ? value : null;
}

/**
 * Every displayed week is shifted by 100%, so the hundreds give the panel
 * and the remainder the column inside it.
 * Example: 214.5 -> { panelIndex: 2, offsetInPanel: 14.5 }
 */
export function toGridPosition(left: number): GridPosition {
    return {
        panelIndex: Math.floor(left / 100),
        offsetInPanel: offsetInPanel(left),
    };
}

export function gridPosition(style: string | null | undefined): GridPosition | null {
    const left = parseLeftPercent(style);
    return left === null ? null : toGridPosition(left);
}

/** `left mod 100`, always in [0, 100). */
export function offsetInPanel(left: number): number {
    return ((left % 100) + 100) % 100;
}
