import express from "express";
import type { AppConfig } from "../config";

interface UpstreamCheck {
    status: "healthy" | "unhealthy" | "unconfigured";
    url?: string;
    responseTime?: number;
    error?: string;
}

const checkWigorConnectivity = async (timetableUrl: string | null, timeoutMs: number): Promise<UpstreamCheck> => {
    if (!timetableUrl) {
        return { status: "unconfigured", error: "WIGOR_URL is not set" };
    }

    let origin: string;
    try {
        origin = new URL(timetableUrl).origin;
    } catch {
        return { status: "unhealthy", error: `Invalid WIGOR_URL: ${timetableUrl}` };
    }

    const startTime = Date.now();

    try {
        const response = await fetch(origin, {
            method: "HEAD",
            redirect: "manual",
            signal: AbortSignal.timeout(Math.min(timeoutMs, 10000)),
        });

        const responseTime = Date.now() - startTime;

        // The CAS-protected origin answers with a redirect to the login page
        if (response.status < 500) {
            return { status: "healthy", url: origin, responseTime };
        }
        return {
            status: "unhealthy",
            url: origin,
            responseTime,
            error: `HTTP ${response.status}: ${response.statusText}`,
        };
    } catch (error) {
        return {
            status: "unhealthy",
            url: origin,
            responseTime: Date.now() - startTime,
            error: error instanceof Error ? error.message : "Unknown error",
        };
    }
};

export function createHealthRouter(config: Readonly<AppConfig>): express.Router {
    const router = express.Router();

    router.get("/health", async (req, res) => {
        const wigor = await checkWigorConnectivity(config.timetableUrl, config.requestTimeoutMs);

        const healthStatus = {
            server: {
                status: "healthy",
                timestamp: new Date().toISOString(),
                uptime: process.uptime(),
            },
            wigor,
            overall: wigor.status === "healthy" ? "healthy" : "degraded",
        };

        const statusCode = healthStatus.overall === "healthy" ? 200 : 503;
        res.status(statusCode).json(healthStatus);
    });

    return router;
}
