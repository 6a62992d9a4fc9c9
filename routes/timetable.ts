import { Router } from "express";
import { renderHtmlListing } from "../listing";
import { collectWeeks } from "../scripts/export-core";
import { countCalendarEvents } from "../ics";
import { formatIsoDate, isoMonday } from "../utils";
import { parseWeekHtml } from "../week";
import { parseDateQuery, parseWeeksQuery, requireSource, sendError, type TimetableDeps } from "./respond";

export function createTimetableRouter(deps: TimetableDeps): Router {
    const timetableRouter = Router();
    const now = deps.now ?? (() => new Date());

    /**
     * GET /timetable/week?date=YYYY-MM-DD
     * Rebuilt week containing `date` as JSON
     */
    timetableRouter.get("/timetable/week", async (req, res) => {
        try {
            const monday = isoMonday(parseDateQuery(req.query.date));
            const source = requireSource(deps);

            const html = await source(monday);
            const parsed = parseWeekHtml(html, monday);

            res.json({
                meta: {
                    monday: formatIsoDate(monday),
                    panel: parsed.panel,
                    dayHeaders: parsed.dayHeaders.map((header) => header.label),
                    caseCount: parsed.caseCount,
                    fetchedAt: now().toISOString(),
                },
                schedule: parsed.schedule,
            });
        } catch (error) {
            sendError(res, error, "Failed to load timetable week");
        }
    });

    /**
     * GET /timetable?date=YYYY-MM-DD&weeks=N
     * Human-readable listing with a link to the matching ICS feed
     */
    timetableRouter.get("/timetable", async (req, res) => {
        try {
            const startDate = parseDateQuery(req.query.date);
            const weekCount = parseWeeksQuery(req.query.weeks, deps.config.exportWeeks);
            const weeks = await collectWeeks(requireSource(deps), startDate, weekCount);

            const query = new URLSearchParams({
                date: formatIsoDate(isoMonday(startDate)),
                weeks: String(weekCount),
            });
            const html = renderHtmlListing(weeks, {
                title: deps.config.calendarName,
                icsHref: `/timetable/ics?${query.toString()}`,
                eventCount: countCalendarEvents(weeks),
                generatedAt: now(),
            });

            res.setHeader("Content-Type", "text/html; charset=utf-8");
            res.send(html);
        } catch (error) {
            sendError(res, error, "Failed to render timetable listing");
        }
    });

    return timetableRouter;
}
