import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { format } from "date-fns";
import fetchCookie from "fetch-cookie";
import { CookieJar } from "tough-cookie";
import { RetrievalError } from "./errors";
import type { CasCredentials } from "./types";

const USER_AGENT =
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0 Safari/537.36";
const DEFAULT_TIMEOUT_MS = 30000;

/** Raw timetable HTML for the week containing `targetDate`. */
export type HtmlSource = (targetDate: Date) => Promise<string>;

export interface RetrievalOptions {
    credentials: CasCredentials | null;
    timeoutMs?: number;
}

/**
 * Point a WS-EDT URL at another date (its `date=MM/DD/YYYY` parameter).
 */
export function setUrlDate(url: string, targetDate: Date): string {
    const value = format(targetDate, "MM/dd/yyyy");
    if (url.includes("date=")) {
        return url.replace(/(date=)\d{2}\/\d{2}\/\d{4}/, `$1${value}`);
    }
    const separator = url.includes("?") ? "&" : "?";
    return `${url}${separator}date=${value}`;
}

/**
 * The CAS login form is `form#fm1` with an `execution` hidden field.
 */
export function isCasLoginPage(html: string): boolean {
    return (html.includes('id="fm1"') || html.includes("id='fm1'")) && html.includes('name="execution"');
}

/**
 * Name/value pairs a browser would submit for `form`. Unchecked checkboxes
 * and radios are left out.
 */
export function collectFormInputs($: CheerioAPI, form: Element): Record<string, string> {
    const data: Record<string, string> = {};
    $(form)
        .find("input")
        .each((_, input) => {
            const $input = $(input);
            const name = $input.attr("name");
            if (!name) return;
            const type = ($input.attr("type") ?? "").toLowerCase();
            if ((type === "checkbox" || type === "radio") && $input.attr("checked") === undefined) return;
            data[name] = $input.attr("value") ?? "";
        });
    return data;
}

/** fetch bound to one CAS session, following redirects and keeping cookies. */
type CookieFetch = (input: string, init: RequestInit) => Promise<Response>;

interface Page {
    html: string;
    status: number;
    ok: boolean;
    /** Address the page was finally served from, after redirects. */
    url: string;
}

/**
 * Request a page through the session and read its body. Transport, redirect
 * and body stream failures all surface as a RetrievalError for `url`.
 */
async function requestPage(
    client: CookieFetch,
    url: string,
    timeoutMs: number,
    form?: Record<string, string>
): Promise<Page> {
    const headers: Record<string, string> = {
        "User-Agent": USER_AGENT,
        "Accept-Language": "fr-FR,fr;q=0.9",
    };
    if (form) headers["Content-Type"] = "application/x-www-form-urlencoded";

    try {
        const response = await client(url, {
            method: form ? "POST" : "GET",
            headers,
            body: form ? new URLSearchParams(form).toString() : undefined,
            redirect: "follow",
            signal: AbortSignal.timeout(timeoutMs),
        });
        const html = await response.text();
        return { html, status: response.status, ok: response.ok, url: response.url || url };
    } catch (error) {
        throw new RetrievalError(`Request to ${url} failed`, url, { cause: error });
    }
}

function resolveFormAction(action: string, pageUrl: string): string {
    try {
        return new URL(action, pageUrl).toString();
    } catch (error) {
        throw new RetrievalError(`Invalid CAS form action "${action}"`, pageUrl, { cause: error });
    }
}

async function submitCasLogin(
    client: CookieFetch,
    loginPage: Page,
    credentials: CasCredentials,
    timeoutMs: number
): Promise<void> {
    const $ = cheerio.load(loginPage.html);
    const form = $("form#fm1").get(0);
    if (!form) {
        throw new RetrievalError("CAS login form not found", loginPage.url);
    }

    const loginUrl = resolveFormAction($(form).attr("action") ?? "", loginPage.url);
    const payload: Record<string, string> = {
        _eventId: "submit",
        geolocation: "",
        deviceFingerprint: "0",
        ...collectFormInputs($, form),
        username: credentials.username,
        password: credentials.password,
    };

    console.log("[CAS] Login page detected, submitting credentials...");
    const result = await requestPage(client, loginUrl, timeoutMs, payload);

    if (isCasLoginPage(result.html)) {
        throw new RetrievalError("CAS authentication failed (check username/password)", loginUrl);
    }
}

/**
 * Fetch a timetable page, logging in through CAS first when the request
 * lands on the login form. Each call uses a fresh session.
 */
export async function fetchTimetableHtml(url: string, options: RetrievalOptions): Promise<string> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const client: CookieFetch = fetchCookie(fetch, new CookieJar());

    const first = await requestPage(client, url, timeoutMs);

    if (!isCasLoginPage(first.html)) {
        if (!first.ok) {
            throw new RetrievalError(`Failed to fetch ${url}: Status ${first.status}`, url);
        }
        return first.html;
    }

    if (!options.credentials) {
        throw new RetrievalError("CAS credentials missing (set WIGOR_USER and WIGOR_PASS)", url);
    }
    await submitCasLogin(client, first, options.credentials, timeoutMs);

    // Reload the target so the service side of the session is initialised
    const final = await requestPage(client, url, timeoutMs);
    if (!final.ok) {
        throw new RetrievalError(`Failed to fetch ${url} after login: Status ${final.status}`, url);
    }
    return final.html;
}

/**
 * HtmlSource for a WS-EDT URL: each target date rewrites the URL's `date=`.
 */
export function createWigorSource(baseUrl: string, options: RetrievalOptions): HtmlSource {
    return (targetDate: Date) => fetchTimetableHtml(setUrlDate(baseUrl, targetDate), options);
}
