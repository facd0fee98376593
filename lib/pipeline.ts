// lib/pipeline.ts
import type { TextClassifier, Verdict } from "./classifier";
import { GenerationError, InputError, NotReadyError } from "./errors";
import type { TextGenerator } from "./openai";
import { type AnalysisMode, buildAnalysisPrompt } from "./prompts";
import { type Readiness, type SessionContext, canAnalyze } from "./session";
import { RESUME_MIN_CHARS, countWords, normalizeResumeText, previewText, trimJobDescription } from "./text";
import type { ExtractedResume } from "./pdf";
import { debug, logWarning } from "./debug";

export type PipelineDeps = {
    extract: (bytes: Uint8Array) => Promise<ExtractedResume>;
    classifier: TextClassifier;
    generator: TextGenerator;
    analysisTemperature: number;
};

export type ParseInput = {
    bytes: Uint8Array | null;
    fileName: string;
    jobDescription: string;
};

/** Soft warning: the text is kept and the pipeline carries on. */
export type EmptyOrShortResumeWarning = {
    kind: "empty-or-short-resume";
    message: string;
    characters: number;
};

export const SHORT_RESUME_MESSAGE =
    "I could not extract much text from this PDF. If it's a scanned image, consider exporting a text-based PDF.";

export type ParseOutcome = {
    readiness: Readiness;
    verdict: Verdict;
    resume: {
        fileName: string;
        pages: number;
        characters: number;
        preview: string;
    };
    jobDescription: {
        words: number;
        characters: number;
    };
    warnings: EmptyOrShortResumeWarning[];
};

export type AnalysisOutcome = {
    markdown: string;
    mode: AnalysisMode;
};

/**
 * extract → normalize → classify, then publish everything into the session
 * in one step. An extraction failure or an aborted request throws before
 * anything is published, so the previous snapshot survives.
 */
export async function parseInputs(
    deps: PipelineDeps,
    session: SessionContext,
    input: ParseInput,
    signal?: AbortSignal
): Promise<ParseOutcome> {
    if (!input.bytes || input.bytes.byteLength === 0) {
        throw new InputError("Please upload a PDF resume first.");
    }
    const jobDescription = trimJobDescription(input.jobDescription);
    if (!jobDescription) {
        throw new InputError("Please paste the job description.");
    }

    const extracted = await deps.extract(input.bytes);
    const resumeText = normalizeResumeText(extracted.text);

    const warnings: EmptyOrShortResumeWarning[] = [];
    if (resumeText.length < RESUME_MIN_CHARS) {
        logWarning("Short resume text after extraction", { fileName: input.fileName, characters: resumeText.length });
        warnings.push({ kind: "empty-or-short-resume", message: SHORT_RESUME_MESSAGE, characters: resumeText.length });
    }

    const verdict = await deps.classifier.classify(jobDescription, { signal });
    // an abandoned parse must not replace the last complete one
    signal?.throwIfAborted();

    session.publish({ resumeText, jobDescription, verdict, fileName: input.fileName });
    debug("📄 Parsed inputs", {
        session: session.id,
        pages: extracted.pages,
        resumeChars: resumeText.length,
        jdWords: countWords(jobDescription),
        readiness: session.readiness,
    });

    return {
        readiness: session.readiness,
        verdict,
        resume: {
            fileName: input.fileName,
            pages: extracted.pages,
            characters: resumeText.length,
            preview: previewText(resumeText),
        },
        jobDescription: {
            words: countWords(jobDescription),
            characters: jobDescription.length,
        },
        warnings,
    };
}

export async function analyzeSession(
    deps: PipelineDeps,
    session: SessionContext,
    signal?: AbortSignal
): Promise<AnalysisOutcome> {
    const state = session.snapshot;
    if (!canAnalyze(state)) {
        throw new NotReadyError(
            state.verdict && !state.verdict.isValid
                ? `The job description didn't pass validation (${state.verdict.reason}). Fix it and parse again.`
                : "Upload a PDF, paste the job description, and click Continue → Parse Resume first."
        );
    }

    const prompt = buildAnalysisPrompt(state.resumeText, state.jobDescription);
    const markdown = await deps.generator.complete({
        system: prompt.system,
        user: prompt.user,
        temperature: deps.analysisTemperature,
        signal,
    });
    if (!markdown) {
        throw new GenerationError("The model returned an empty report.");
    }

    debug("🧭 Analysis ready", { session: session.id, mode: prompt.mode, chars: markdown.length });
    return { markdown, mode: prompt.mode };
}
