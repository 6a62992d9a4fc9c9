import { formatIsoDate } from "./utils";

/** Network, HTTP or CAS failure while obtaining the timetable page. */
export class RetrievalError extends Error {
    constructor(message: string, public readonly url: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "RetrievalError";
    }
}

/** No panel of the page carries day headers of the requested week. */
export class PanelNotFoundError extends Error {
    constructor(public readonly monday: Date) {
        super(`No timetable panel matches the week of ${formatIsoDate(monday)}`);
        this.name = "PanelNotFoundError";
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(`Configuration error: ${message}`);
        this.name = "ConfigError";
    }
}
