// app/api/parse/route.ts
import { NextRequest } from "next/server";
import { ExtractionError, InputError } from "@/lib/errors";
import { errorResponse, json, sessionIdFrom, withSessionCookie } from "@/lib/http";
import { looksLikePdf } from "@/lib/utils";
import { parseInputs } from "@/lib/pipeline";
import { getServices } from "@/lib/services";
import type { ParseResponse } from "@/lib/types";
import { debug } from "@/lib/debug";

/** Next.js runtime flags */
export const dynamic = "force-dynamic";
export const revalidate = 0;
export const runtime = "nodejs";

export async function POST(request: NextRequest) {
    try {
        const { deps, sessions } = getServices();
        const session = sessions.open(sessionIdFrom(request));

        try {
            const formData = await request.formData().catch(() => {
                throw new InputError("Expected a multipart form with a resume and a job description.");
            });
            const resume = formData.get("resume");
            const jobDescription = String(formData.get("jobDescription") ?? "");
            const file = resume instanceof File && resume.size > 0 ? resume : null;

            debug("🔍 Parse requested:", {
                session: session.id,
                fileName: file?.name,
                fileSize: file?.size,
                jdLength: jobDescription.length,
            });

            if (file && !looksLikePdf(file)) {
                throw new InputError("Please upload a PDF file.");
            }

            const outcome = await session.runExclusive(async () =>
                parseInputs(
                    deps,
                    session,
                    {
                        bytes: file ? new Uint8Array(await file.arrayBuffer()) : null,
                        fileName: file?.name ?? "",
                        jobDescription,
                    },
                    request.signal
                )
            );

            return withSessionCookie(json<ParseResponse>({ success: true, ...outcome }), session.id);
        } catch (error) {
            const res = errorResponse(error, error instanceof ExtractionError ? "Resume parsing failed" : undefined);
            return withSessionCookie(res, session.id);
        }
    } catch (error) {
        return errorResponse(error);
    }
}
