import { Router } from "express";
import { toIcs } from "../ics";
import { collectWeeks } from "../scripts/export-core";
import { formatIsoDate, isoMonday } from "../utils";
import { parseDateQuery, parseWeeksQuery, requireSource, sendError, type TimetableDeps } from "./respond";

export function createIcsRouter(deps: TimetableDeps): Router {
    const icsRouter = Router();
    const now = deps.now ?? (() => new Date());

    /**
     * GET /timetable/ics?date=YYYY-MM-DD&weeks=N
     * Returns an ICS file for N weeks starting with the week of `date`.
     * UIDs are derived from event content, so re-subscribing updates events.
     */
    icsRouter.get("/timetable/ics", async (req, res) => {
        try {
            const startDate = parseDateQuery(req.query.date);
            const weekCount = parseWeeksQuery(req.query.weeks, deps.config.exportWeeks);
            const weeks = await collectWeeks(requireSource(deps), startDate, weekCount);

            const ics = toIcs(weeks, { calendarName: deps.config.calendarName, now: now() });

            // Set headers for ICS download/subscription
            res.setHeader("Content-Type", "text/calendar; charset=utf-8");
            res.setHeader(
                "Content-Disposition",
                `attachment; filename="edt-${formatIsoDate(isoMonday(startDate))}.ics"`
            );
            res.setHeader("Cache-Control", "public, max-age=3600");

            res.send(ics);
        } catch (error) {
            sendError(res, error, "Failed to generate ICS file");
        }
    });

    return icsRouter;
}
