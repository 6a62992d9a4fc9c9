import { describe, it, expect } from "vitest";
import * as cheerio from "cheerio";
import { formatEventDetails, formatTimeRange, formatWeekListing, renderHtmlListing } from "../listing";
import type { CaseEvent, ScheduledWeek } from "../types";
import { NO_CLASS_MESSAGE } from "../week";

const lesson: CaseEvent = {
    raw: "Réseaux\n9h00 - 10h30\nSalle: B204 (Site Nord)\nJ. Martin",
    start: "09:00",
    end: "10:30",
    room: "B204",
    site: "Site Nord",
    teacher: "J. Martin",
    title: "Réseaux",
};

const noClass: CaseEvent = { raw: NO_CLASS_MESSAGE, start: "", end: "", room: "", site: "", teacher: "", title: "" };

describe("formatTimeRange", () => {
    it("should join start and end", () => {
        expect(formatTimeRange(lesson)).toBe("09:00-10:30");
    });

    it("should show a placeholder when a time is missing", () => {
        expect(formatTimeRange({ start: "09:00", end: "" })).toBe("(horaire n/d)");
    });
});

describe("formatEventDetails", () => {
    it("should list every known field", () => {
        expect(formatEventDetails(lesson)).toBe("09:00-10:30 | Salle: B204 | Site: Site Nord | Prof: J. Martin");
    });

    it("should skip empty fields", () => {
        expect(formatEventDetails({ ...lesson, site: "", teacher: "" })).toBe("09:00-10:30 | Salle: B204");
        expect(formatEventDetails(noClass)).toBe("(horaire n/d)");
    });
});

describe("formatWeekListing", () => {
    it("should print each day with its events", () => {
        const listing = formatWeekListing({
            "Lundi 15 Septembre": [lesson],
            "Mardi 16 Septembre": [],
        });

        expect(listing.split("\n")).toEqual([
            "",
            "Lundi 15 Septembre",
            "  • 09:00-10:30 | Salle: B204 | Site: Site Nord | Prof: J. Martin",
            "    ↳ Réseaux",
            "",
            "Mardi 16 Septembre",
        ]);
    });

    it("should show the raw text of events without a title", () => {
        const listing = formatWeekListing({ "Lundi 15 Septembre": [noClass] });

        expect(listing.split("\n")).toEqual([
            "",
            "Lundi 15 Septembre",
            "  • (horaire n/d)",
            "    ↳ Pas de cours cette semaine",
        ]);
    });
});

describe("renderHtmlListing", () => {
    const weeks: ScheduledWeek[] = [
        { monday: new Date(2025, 8, 15), schedule: { "Lundi 15 Septembre": [lesson, noClass], "Mardi 16 Septembre": [] } },
    ];

    it("should list weeks, days and events", () => {
        const $ = cheerio.load(renderHtmlListing(weeks, { title: "EDT M1" }));

        expect($("title").text()).toBe("EDT M1");
        expect($("h1").text()).toBe("EDT M1");
        expect($("h2").text()).toBe("Semaine du 15/09/2025");
        expect($("h3").map((_, el) => $(el).text()).get()).toEqual(["Lundi 15 Septembre", "Mardi 16 Septembre"]);
        expect($("li").map((_, el) => $(el).text()).get()).toEqual([
            "09:00-10:30 | Salle: B204 | Site: Site Nord | Prof: J. Martin – Réseaux",
            "(horaire n/d) – Pas de cours cette semaine",
        ]);
    });

    it("should link the calendar file", () => {
        const $ = cheerio.load(renderHtmlListing(weeks));

        expect($("p.links a").length).toBe(1);
        expect($("p.links a").attr("href")).toBe("ical.ics");
        expect($("h1").text()).toBe("Emploi du temps");
    });

    it("should add a webcal link when the site address is known", () => {
        const $ = cheerio.load(renderHtmlListing(weeks, { siteBase: "https://example.org/edt/" }));

        const hrefs = $("p.links a")
            .map((_, el) => $(el).attr("href"))
            .get();
        expect(hrefs).toEqual(["webcal://example.org/edt/ical.ics", "ical.ics"]);
    });

    it("should summarise the export", () => {
        const $ = cheerio.load(
            renderHtmlListing(weeks, { eventCount: 1, generatedAt: new Date(2025, 8, 14, 8, 5) })
        );

        expect($("p.summary").text()).toBe(
            "1 événements · Semaines : 2025-09-15 · Dernière mise à jour : 2025-09-14 08:05"
        );
    });

    it("should escape scraped text", () => {
        const hostile: ScheduledWeek[] = [
            {
                monday: new Date(2025, 8, 15),
                schedule: { "Lundi <i>15</i>": [{ ...lesson, title: "<script>alert(1)</script>" }] },
            },
        ];

        const $ = cheerio.load(renderHtmlListing(hostile));

        expect($("script").length).toBe(0);
        expect($("h3 i").length).toBe(0);
        expect($("h3").text()).toBe("Lundi <i>15</i>");
        expect($("li").text()).toContain("<script>alert(1)</script>");
    });
});
