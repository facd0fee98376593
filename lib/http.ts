// lib/http.ts (server-only) - helpers shared by the API route handlers
import { NextRequest, NextResponse } from "next/server";
import { AppError, errorMessage } from "./errors";
import { logError } from "./debug";
import type { ErrorResponse } from "./types";

export const SESSION_COOKIE = "cc_session";

export function noStoreHeaders() {
    return { "Cache-Control": "no-store, max-age=0", Pragma: "no-cache", Expires: "0" };
}

export const sessionIdFrom = (req: NextRequest): string | undefined => req.cookies.get(SESSION_COOKIE)?.value;

export function withSessionCookie<T>(res: NextResponse<T>, sessionId: string): NextResponse<T> {
    res.cookies.set(SESSION_COOKIE, sessionId, {
        httpOnly: true,
        sameSite: "lax",
        secure: process.env.NODE_ENV === "production",
        path: "/",
    });
    return res;
}

export function json<T>(body: T, status = 200): NextResponse<T> {
    return NextResponse.json(body, { status, headers: noStoreHeaders() });
}

/**
 * Last line of defence for a route: every failure becomes a JSON error the
 * page can show. Known errors keep their status, anything else is a 500.
 */
export function errorResponse(error: unknown, prefix?: string): NextResponse<ErrorResponse> {
    if (error instanceof AppError) {
        if (error.status >= 500) logError(`❌ ${error.name}:`, error.message, error.cause ?? "");
        return json({ success: false as const, error: prefix ? `${prefix}: ${error.message}` : error.message }, error.status);
    }
    logError("❌ Unexpected error:", error);
    return json({ success: false as const, error: `Something went wrong: ${errorMessage(error)}` }, 500);
}
