// app/api/analyze/route.ts
import { NextRequest } from "next/server";
import { GenerationError, NotReadyError } from "@/lib/errors";
import { errorResponse, json, sessionIdFrom } from "@/lib/http";
import { analyzeSession } from "@/lib/pipeline";
import { getServices } from "@/lib/services";
import type { AnalyzeResponse } from "@/lib/types";

/** Next.js runtime flags */
export const dynamic = "force-dynamic";
export const revalidate = 0;
export const runtime = "nodejs";

export async function POST(request: NextRequest) {
    try {
        const { deps, sessions } = getServices();
        const session = sessions.get(sessionIdFrom(request));
        if (!session) {
            throw new NotReadyError("Upload a PDF, paste the job description, and click Continue → Parse Resume first.");
        }

        const outcome = await session.runExclusive(() => analyzeSession(deps, session, request.signal));
        return json<AnalyzeResponse>({ success: true, ...outcome });
    } catch (error) {
        return errorResponse(error, error instanceof GenerationError ? "AI analysis failed" : undefined);
    }
}
