/**
 * Site Build Script
 *
 * Rebuilds ical.ics and index.html from the week JSON files of a directory
 * (as written by the export), without fetching anything.
 *
 * Run via: npm run build-site -- [jsonDir] [outDir]
 */

import "dotenv/config";
import path from "path";
import { loadConfig } from "../config";
import { loadWeeksFromJsonDir, publishSite } from "./site";

function main(): void {
    const config = loadConfig();
    const [jsonDir = path.join(config.outputDir, "json"), outDir = config.outputDir] = process.argv.slice(2);

    const weeks = loadWeeksFromJsonDir(jsonDir);
    if (weeks.length === 0) {
        console.error(`No week JSON files found in ${jsonDir}`);
        process.exit(1);
    }

    const stats = publishSite(weeks, outDir, {
        calendarName: config.calendarName,
        siteBase: config.siteBase,
    });

    console.log(`Built ${stats.icsPath} and ${stats.indexPath} (${stats.weeks} weeks, ${stats.events} events)`);
}

try {
    main();
} catch (error) {
    console.error("Fatal error:", error);
    process.exit(1);
}
