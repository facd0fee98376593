// lib/api.ts - browser-side calls to the route handlers
import type { z } from "zod";
import type { Readiness } from "./session";
import { debug } from "./debug";
import {
    analyzeResponseSchema,
    errorResponseSchema,
    parseResponseSchema,
    sessionResponseSchema,
    type AnalyzeResponse,
    type ParseResponse,
    type SessionResponse,
} from "./types";

export class ApiError extends Error {
    constructor(message: string, readonly status: number) {
        super(message);
        this.name = "ApiError";
    }
}

async function readJson<S extends z.ZodTypeAny>(response: Response, schema: S): Promise<z.infer<S>> {
    let body: unknown;
    try {
        body = await response.json();
    } catch {
        throw new ApiError("Server error occurred. Please try again.", response.status);
    }

    if (!response.ok) {
        const failure = errorResponseSchema.safeParse(body);
        throw new ApiError(failure.success ? failure.data.error : `Request failed (${response.status})`, response.status);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        throw new ApiError("Unexpected response from the server.", response.status);
    }
    return parsed.data;
}

export async function parseResume(file: File, jobDescription: string): Promise<ParseResponse> {
    const formData = new FormData();
    formData.append("resume", file, file.name);
    formData.append("jobDescription", jobDescription);

    const response = await fetch("/api/parse", { method: "POST", body: formData, cache: "no-store" });
    return readJson(response, parseResponseSchema);
}

export async function analyzeResume(): Promise<AnalyzeResponse> {
    const response = await fetch("/api/analyze", { method: "POST", cache: "no-store" });
    return readJson(response, analyzeResponseSchema);
}

export async function fetchSession(): Promise<SessionResponse> {
    const response = await fetch("/api/session", { cache: "no-store" });
    return readJson(response, sessionResponseSchema);
}

/**
 * After a 409 the server-side session may be gone (idle expiry, restart) or
 * no longer READY; ask the server what it holds now. Null means no change.
 */
export async function readinessAfterFailure(error: unknown): Promise<Readiness | null> {
    if (!(error instanceof ApiError) || error.status !== 409) return null;
    try {
        return (await fetchSession()).readiness;
    } catch (lookupError) {
        debug("Session lookup failed:", lookupError);
        return null;
    }
}
