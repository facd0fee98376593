// app/api/session/route.ts
import { NextRequest } from "next/server";
import { SESSION_COOKIE, errorResponse, json, sessionIdFrom } from "@/lib/http";
import { getServices } from "@/lib/services";
import { emptySessionState, readinessOf } from "@/lib/session";
import type { SessionResponse } from "@/lib/types";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

/** Readiness of the last parsed snapshot, so a reload can restore the page. */
export async function GET(request: NextRequest) {
    try {
        const session = getServices().sessions.get(sessionIdFrom(request));
        const state = session ? session.snapshot : emptySessionState();

        return json<SessionResponse>({
            success: true,
            readiness: readinessOf(state),
            fileName: state.fileName,
            parsedAt: state.parsedAt,
            verdict: state.verdict,
        });
    } catch (error) {
        return errorResponse(error);
    }
}

export async function DELETE(request: NextRequest) {
    try {
        const ended = getServices().sessions.end(sessionIdFrom(request));
        const res = json({ success: true as const, ended });
        res.cookies.delete(SESSION_COOKIE);
        return res;
    } catch (error) {
        return errorResponse(error);
    }
}
