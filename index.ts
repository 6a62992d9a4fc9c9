import "dotenv/config";
import cron from "node-cron";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { runExport } from "./scripts/export-core";
import { createWigorSource } from "./scraping";

const config = loadConfig();

const source = config.timetableUrl
    ? createWigorSource(config.timetableUrl, {
          credentials: config.credentials,
          timeoutMs: config.requestTimeoutMs,
      })
    : null;

const app = createApp({ config, source });

if (source) {
    // Publish ical.ics and index.html every morning, Paris time
    cron.schedule(
        config.publishCronSchedule,
        async () => {
            console.log(`[Cron] Scheduled publish triggered at ${new Date().toISOString()}`);
            try {
                await runExport({ source, config });
                console.log(`[Cron] Scheduled publish completed successfully at ${new Date().toISOString()}`);
            } catch (error) {
                console.error(`[Cron] Scheduled publish failed:`, error);
            }
        },
        {
            timezone: config.publishTimezone,
        }
    );

    console.log(`[Cron] Publish scheduled: "${config.publishCronSchedule}" (timezone: ${config.publishTimezone})`);
} else {
    console.warn("[Cron] WIGOR_URL is not set, scheduled publish disabled");
}

app.listen(config.port, () => {
    console.log(`Server running at http://localhost:${config.port}`);
});
