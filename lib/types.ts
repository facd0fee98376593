// lib/types.ts - wire shapes shared by the route handlers and the page
import { z } from "zod";

export const readinessSchema = z.enum(["EMPTY", "PARSED", "READY"]);

export const verdictSchema = z.object({
    isValid: z.boolean(),
    reason: z.string(),
});

export const parseResponseSchema = z.object({
    success: z.literal(true),
    readiness: readinessSchema,
    verdict: verdictSchema,
    resume: z.object({
        fileName: z.string(),
        pages: z.number(),
        characters: z.number(),
        preview: z.string(),
    }),
    jobDescription: z.object({
        words: z.number(),
        characters: z.number(),
    }),
    warnings: z.array(
        z.object({
            kind: z.literal("empty-or-short-resume"),
            message: z.string(),
            characters: z.number(),
        })
    ),
});

export const analyzeResponseSchema = z.object({
    success: z.literal(true),
    markdown: z.string(),
    mode: z.enum(["resume-only", "comparison"]),
});

export const sessionResponseSchema = z.object({
    success: z.literal(true),
    readiness: readinessSchema,
    fileName: z.string().nullable(),
    parsedAt: z.string().nullable(),
    verdict: verdictSchema.nullable(),
});

export const errorResponseSchema = z.object({
    success: z.literal(false),
    error: z.string(),
});

export type ParseResponse = z.infer<typeof parseResponseSchema>;
export type AnalyzeResponse = z.infer<typeof analyzeResponseSchema>;
export type SessionResponse = z.infer<typeof sessionResponseSchema>;
export type ErrorResponse = z.infer<typeof errorResponseSchema>;
