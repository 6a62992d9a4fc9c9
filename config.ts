import { ConfigError } from "./errors";
import type { CasCredentials } from "./types";

export interface AppConfig {
    /** WS-EDT page URL; its `date=` parameter is rewritten per week. */
    timetableUrl: string | null;
    credentials: CasCredentials | null;
    port: number;
    calendarName: string;
    exportWeeks: number;
    outputDir: string;
    siteBase: string | null;
    publishCronSchedule: string;
    publishTimezone: string;
    requestTimeoutMs: number;
}

function readInteger(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === "") return fallback;
    const value = Number.parseInt(raw, 10);
    if (!Number.isFinite(value) || value < min) {
        throw new ConfigError(`${key} must be an integer >= ${min} (got "${raw}")`);
    }
    return value;
}

function readString(env: NodeJS.ProcessEnv, key: string): string | null {
    const raw = env[key]?.trim();
    return raw ? raw : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
    const username = readString(env, "WIGOR_USER");
    const password = env.WIGOR_PASS ?? "";

    return Object.freeze({
        timetableUrl: readString(env, "WIGOR_URL"),
        credentials: username && password ? { username, password } : null,
        port: readInteger(env, "PORT", 8072, 1),
        calendarName: readString(env, "CALENDAR_NAME") ?? "EDT Wigor",
        exportWeeks: readInteger(env, "EXPORT_WEEKS", 1, 1),
        outputDir: readString(env, "OUTPUT_DIR") ?? "./public",
        siteBase: readString(env, "SITE_BASE"),
        publishCronSchedule: readString(env, "PUBLISH_CRON_SCHEDULE") ?? "0 6 * * *",
        publishTimezone: readString(env, "PUBLISH_TIMEZONE") ?? "Europe/Paris",
        requestTimeoutMs: readInteger(env, "REQUEST_TIMEOUT_MS", 30000, 1),
    });
}

export function requireTimetableUrl(config: Readonly<AppConfig>): string {
    if (!config.timetableUrl) {
        throw new ConfigError("WIGOR_URL is missing");
    }
    return config.timetableUrl;
}
