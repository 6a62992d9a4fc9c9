/**
 * Export Script
 *
 * Fetches the timetable for EXPORT_WEEKS weeks (default 1) starting with the
 * week of the given date, then writes week JSON files, ical.ics and index.html
 * into OUTPUT_DIR.
 *
 * Run via: npm run export -- [YYYY-MM-DD]
 */

import "dotenv/config";
import { loadConfig, requireTimetableUrl } from "../config";
import { createWigorSource } from "../scraping";
import { parseIsoDate } from "../utils";
import { runExport } from "./export-core";

async function main(): Promise<void> {
    const config = loadConfig();
    const [dateArg] = process.argv.slice(2);

    const startDate = dateArg ? parseIsoDate(dateArg) : new Date();
    if (!startDate) {
        console.error(`Invalid date "${dateArg}": expected YYYY-MM-DD (e.g. 2025-09-22)`);
        process.exit(2);
    }

    const source = createWigorSource(requireTimetableUrl(config), {
        credentials: config.credentials,
        timeoutMs: config.requestTimeoutMs,
    });

    await runExport({ source, config, startDate });
}

main().catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
});
