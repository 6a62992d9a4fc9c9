import * as cheerio from "cheerio";
import { format } from "date-fns";
import type { CaseEvent, ScheduledWeek, WeeklySchedule } from "./types";

export const MISSING_TIME_PLACEHOLDER = "(horaire n/d)";

export function formatTimeRange(event: Pick<CaseEvent, "start" | "end">): string {
    return event.start && event.end ? `${event.start}-${event.end}` : MISSING_TIME_PLACEHOLDER;
}

/**
 * "09:00-10:30 | Salle: B204 | Site: Site Nord | Prof: J. Martin"
 */
export function formatEventDetails(event: CaseEvent): string {
    return [
        formatTimeRange(event),
        event.room ? `Salle: ${event.room}` : "",
        event.site ? `Site: ${event.site}` : "",
        event.teacher ? `Prof: ${event.teacher}` : "",
    ]
        .filter(Boolean)
        .join(" | ");
}

/** Title, or the raw text for messages such as "Pas de cours". */
function displayTitle(event: CaseEvent): string {
    return event.title || event.raw;
}

/**
 * Plain text listing of one week, for the console.
 */
export function formatWeekListing(schedule: WeeklySchedule): string {
    const lines: string[] = [];
    for (const [label, events] of Object.entries(schedule)) {
        lines.push("", label);
        for (const event of events) {
            lines.push(`  • ${formatEventDetails(event)}`);
            const title = displayTitle(event);
            if (title) lines.push(`    ↳ ${title.replace(/\n/g, " / ")}`);
        }
    }
    return lines.join("\n");
}

export interface HtmlListingOptions {
    title?: string;
    icsHref?: string;
    /** Absolute site URL; adds a webcal:// subscription link when set. */
    siteBase?: string | null;
    eventCount?: number;
    generatedAt?: Date;
}

const PAGE_SKELETON = `<!doctype html>
<html lang="fr">
<head><meta charset="utf-8"><meta name="viewport" content="width=device-width,initial-scale=1"><title></title></head>
<body><h1></h1><p class="links"></p><p class="summary"></p><main></main></body>
</html>`;

/**
 * Static page listing the weeks' events. Scraped text only ever goes through
 * cheerio's `.text()`, so it is escaped in the output.
 */
export function renderHtmlListing(weeks: readonly ScheduledWeek[], options: HtmlListingOptions = {}): string {
    const { title = "Emploi du temps", icsHref = "ical.ics", siteBase = null, eventCount, generatedAt } = options;
    const $ = cheerio.load(PAGE_SKELETON);

    $("title").text(title);
    $("h1").text(title);

    const links = $("p.links");
    if (siteBase) {
        const host = siteBase.replace(/^[a-z]+:\/\//i, "").replace(/\/+$/, "");
        links.append($("<a>").attr("href", `webcal://${host}/${icsHref}`).text("S’abonner (Outlook/Apple)"));
        links.append(" · ");
    }
    links.append($("<a>").attr("href", icsHref).text("Télécharger l’ICS"));

    const summary: string[] = [];
    if (eventCount !== undefined) summary.push(`${eventCount} événements`);
    if (weeks.length > 0) {
        summary.push(`Semaines : ${weeks.map(({ monday }) => format(monday, "yyyy-MM-dd")).join(", ")}`);
    }
    if (generatedAt) summary.push(`Dernière mise à jour : ${format(generatedAt, "yyyy-MM-dd HH:mm")}`);
    $("p.summary").text(summary.join(" · "));

    const main = $("main");
    for (const { monday, schedule } of weeks) {
        const section = $("<section>");
        section.append($("<h2>").text(`Semaine du ${format(monday, "dd/MM/yyyy")}`));
        for (const [label, events] of Object.entries(schedule)) {
            section.append($("<h3>").text(label));
            const list = $("<ul>");
            for (const event of events) {
                list.append($("<li>").text(`${formatEventDetails(event)} – ${displayTitle(event)}`));
            }
            section.append(list);
        }
        main.append(section);
    }

    return $.html();
}
