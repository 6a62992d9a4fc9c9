import cors from "cors";
import express from "express";
import { createHealthRouter } from "./routes/health";
import { createIcsRouter } from "./routes/ics-timetable";
import type { TimetableDeps } from "./routes/respond";
import { createTimetableRouter } from "./routes/timetable";

export function createApp(deps: TimetableDeps): express.Express {
    const app = express();

    app.use(cors());

    app.get("/", (req, res) => {
        res.send("Welcome to the Wigor Timetable API!");
    });

    app.use(createHealthRouter(deps.config));

    app.use(createIcsRouter(deps));

    app.use(createTimetableRouter(deps));

    return app;
}
