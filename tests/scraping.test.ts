/**
 * Tests for scraping.ts: URL dates, CAS form handling and the login flow.
 * fetch is stubbed, nothing leaves the process.
 */

import { readFileSync } from "fs";
import path from "path";
import { afterEach, describe, it, expect, vi } from "vitest";
import * as cheerio from "cheerio";
import { RetrievalError } from "../errors";
import { collectFormInputs, createWigorSource, fetchTimetableHtml, isCasLoginPage, setUrlDate } from "../scraping";
import { collectWeeks } from "../scripts/export-core";
import { formatIsoDate } from "../utils";

const TARGET = "https://edt.example.org/WebPsDyn.aspx?action=posEDTLMS&Tel=jdoe&date=09/15/2025";
const CAS_LOGIN = "https://cas.example.org/cas/login";
const GRID_HTML = "<html><body><div class=\"Jour\">Lundi 15 Septembre</div></body></html>";

const LOGIN_HTML = `<html><body>
<form id="fm1" action="/cas/login?service=edt" method="post">
  <input type="text" name="username" value="">
  <input type="password" name="password" value="">
  <input type="hidden" name="execution" value="e1s1">
  <input type="hidden" name="_eventId" value="submit">
  <input type="checkbox" name="rememberMe" value="true">
  <input type="checkbox" name="warn" value="on" checked>
  <input type="submit" value="Se connecter">
</form>
</body></html>`;

type FetchRoute = (url: string, init: RequestInit) => Response;

/** Stub the global fetch; responses carry the URL they answer, as real ones do. */
function stubFetch(route: FetchRoute) {
    const fetchMock = vi.fn(async (input: string | URL | Request, init: RequestInit = {}) => {
        const url = String(input);
        const response = route(url, init);
        Object.defineProperty(response, "url", { value: url });
        return response;
    });
    vi.stubGlobal("fetch", fetchMock);
    return fetchMock;
}

function redirect(location: string): Response {
    return new Response(null, { status: 302, headers: { location } });
}

function html(body: string, status = 200): Response {
    return new Response(body, { status, headers: { "content-type": "text/html; charset=utf-8" } });
}

function brokenBody(): Response {
    const body = new ReadableStream<Uint8Array>({
        pull(controller) {
            controller.error(new Error("socket reset"));
        },
    });
    return new Response(body, { status: 200 });
}

afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
});

describe("setUrlDate", () => {
    it("should replace an existing date parameter", () => {
        expect(setUrlDate(TARGET, new Date(2025, 8, 22))).toBe(
            "https://edt.example.org/WebPsDyn.aspx?action=posEDTLMS&Tel=jdoe&date=09/22/2025"
        );
    });

    it("should append a date parameter", () => {
        expect(setUrlDate("https://edt.example.org/edt?Tel=jdoe", new Date(2025, 0, 5))).toBe(
            "https://edt.example.org/edt?Tel=jdoe&date=01/05/2025"
        );
        expect(setUrlDate("https://edt.example.org/edt", new Date(2025, 0, 5))).toBe(
            "https://edt.example.org/edt?date=01/05/2025"
        );
    });
});

describe("CAS login form", () => {
    it("should recognise the login page", () => {
        expect(isCasLoginPage(LOGIN_HTML)).toBe(true);
        expect(isCasLoginPage(GRID_HTML)).toBe(false);
    });

    it("should collect what a browser would submit", () => {
        const $ = cheerio.load(LOGIN_HTML);
        const form = $("form#fm1").get(0);
        if (!form) throw new Error("fixture form missing");

        expect(collectFormInputs($, form)).toEqual({
            username: "",
            password: "",
            execution: "e1s1",
            _eventId: "submit",
            warn: "on",
        });
    });
});

describe("fetchTimetableHtml", () => {
    it("should return the page directly when no login is needed", async () => {
        const fetchMock = stubFetch(() => html(GRID_HTML));

        await expect(fetchTimetableHtml(TARGET, { credentials: null })).resolves.toBe(GRID_HTML);
        expect(fetchMock).toHaveBeenCalledTimes(1);
        expect(fetchMock.mock.calls[0][0]).toBe(TARGET);
    });

    it("should log in through CAS and reload the page", async () => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        let loggedIn = false;
        const fetchMock = stubFetch((url, init) => {
            if (url.startsWith(CAS_LOGIN) && init.method === "POST") {
                loggedIn = true;
                return redirect(`${TARGET}&ticket=ST-1`);
            }
            if (url.startsWith(CAS_LOGIN)) return html(LOGIN_HTML);
            return loggedIn ? html(GRID_HTML) : redirect(`${CAS_LOGIN}?service=edt`);
        });

        const page = await fetchTimetableHtml(TARGET, {
            credentials: { username: "jdoe", password: "test-secret" },
        });

        expect(page).toBe(GRID_HTML);
        expect(fetchMock.mock.calls.map(([url, init]) => `${init?.method} ${String(url)}`)).toEqual([
            `GET ${TARGET}`,
            `GET ${CAS_LOGIN}?service=edt`,
            `POST ${CAS_LOGIN}?service=edt`,
            `GET ${TARGET}&ticket=ST-1`,
            `GET ${TARGET}`,
        ]);

        const body = new URLSearchParams(String(fetchMock.mock.calls[2][1]?.body));
        expect(Object.fromEntries(body)).toEqual({
            _eventId: "submit",
            geolocation: "",
            deviceFingerprint: "0",
            username: "jdoe",
            password: "test-secret",
            execution: "e1s1",
            warn: "on",
        });
    });

    it("should fail when CAS shows the login form again", async () => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        stubFetch((url) => (url.startsWith(CAS_LOGIN) ? html(LOGIN_HTML) : redirect(`${CAS_LOGIN}?service=edt`)));

        await expect(
            fetchTimetableHtml(TARGET, { credentials: { username: "jdoe", password: "wrong-secret" } })
        ).rejects.toThrow("CAS authentication failed (check username/password)");
    });

    it("should fail on a login page without credentials", async () => {
        stubFetch(() => html(LOGIN_HTML));

        await expect(fetchTimetableHtml(TARGET, { credentials: null })).rejects.toThrow(
            "CAS credentials missing (set WIGOR_USER and WIGOR_PASS)"
        );
    });

    it("should fail on an HTTP error", async () => {
        stubFetch(() => html("<html>Erreur</html>", 500));

        await expect(fetchTimetableHtml(TARGET, { credentials: null })).rejects.toThrow(
            `Failed to fetch ${TARGET}: Status 500`
        );
    });

    it("should wrap network failures", async () => {
        stubFetch(() => {
            throw new TypeError("fetch failed");
        });

        const error = await fetchTimetableHtml(TARGET, { credentials: null }).catch((e: unknown) => e);

        if (!(error instanceof RetrievalError)) throw new Error("expected a RetrievalError");
        expect(error.url).toBe(TARGET);
        expect(error.message).toBe(`Request to ${TARGET} failed`);
        expect(error.cause).toBeInstanceOf(TypeError);
    });

    it("should wrap a body that fails while being read", async () => {
        stubFetch(() => brokenBody());

        const error = await fetchTimetableHtml(TARGET, { credentials: null }).catch((e: unknown) => e);

        if (!(error instanceof RetrievalError)) throw new Error("expected a RetrievalError");
        expect(error.url).toBe(TARGET);
        expect(error.message).toBe(`Request to ${TARGET} failed`);
    });

    it("should wrap an unusable CAS form action", async () => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        stubFetch(() => html(LOGIN_HTML.replace('action="/cas/login?service=edt"', 'action="https://[broken"')));

        const error = await fetchTimetableHtml(TARGET, {
            credentials: { username: "jdoe", password: "test-secret" },
        }).catch((e: unknown) => e);

        if (!(error instanceof RetrievalError)) throw new Error("expected a RetrievalError");
        expect(error.message).toBe('Invalid CAS form action "https://[broken"');
        expect(error.cause).toBeInstanceOf(TypeError);
    });

    it("should stop following a redirect loop", async () => {
        const fetchMock = stubFetch((url) => redirect(url));

        await expect(fetchTimetableHtml(TARGET, { credentials: null })).rejects.toBeInstanceOf(RetrievalError);
        expect(fetchMock.mock.calls.length).toBeLessThanOrEqual(21);
    });
});

describe("createWigorSource", () => {
    it("should request the week of the target date", async () => {
        const fetchMock = stubFetch(() => html(GRID_HTML));
        const source = createWigorSource(TARGET, { credentials: null });

        await source(new Date(2025, 8, 29));

        expect(fetchMock.mock.calls[0][0]).toBe(
            "https://edt.example.org/WebPsDyn.aspx?action=posEDTLMS&Tel=jdoe&date=09/29/2025"
        );
    });

    it("should let an export skip a later week whose body breaks off", async () => {
        vi.spyOn(console, "warn").mockImplementation(() => {});
        const twoWeeksHtml = readFileSync(path.join(__dirname, "fixtures", "two-weeks.html"), "utf-8");
        stubFetch((url) => (url.includes("date=09/15/2025") ? brokenBody() : html(twoWeeksHtml)));

        const weeks = await collectWeeks(createWigorSource(TARGET, { credentials: null }), new Date(2025, 8, 8), 2);

        expect(weeks.map((week) => formatIsoDate(week.monday))).toEqual(["2025-09-08"]);
        expect(console.warn).toHaveBeenCalledWith(
            "[Export] Skipping week of 2025-09-15: Request to https://edt.example.org/WebPsDyn.aspx?action=posEDTLMS&Tel=jdoe&date=09/15/2025 failed"
        );
    });
});
