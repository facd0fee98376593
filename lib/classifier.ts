// lib/classifier.ts
import { z } from "zod";
import { ClassificationParseError, errorMessage } from "./errors";
import { debug, logWarning } from "./debug";
import type { TextGenerator } from "./openai";
import { buildValidationPrompt } from "./prompts";
import { JD_MIN_WORDS, countWords } from "./text";

export type Verdict = {
    isValid: boolean;
    reason: string;
};

export type ClassifyOptions = {
    signal?: AbortSignal;
};

export interface TextClassifier {
    classify(text: string, options?: ClassifyOptions): Promise<Verdict>;
}

/**
 * One step of the chain: either decides (returns a verdict) or passes the
 * text on to the next link (returns null).
 */
export interface ClassifierLink {
    readonly name: string;
    tryClassify(text: string, options?: ClassifyOptions): Promise<Verdict | null>;
}

export const TOO_SHORT_REASON = "too short";

/** Cheap local rejection: anything under JD_MIN_WORDS never reaches the model. */
export class LengthHeuristicClassifier implements ClassifierLink {
    readonly name = "length-heuristic";

    constructor(private readonly minWords = JD_MIN_WORDS) {}

    async tryClassify(text: string): Promise<Verdict | null> {
        if (countWords(text) < this.minWords) {
            return { isValid: false, reason: TOO_SHORT_REASON };
        }
        return null;
    }
}

const verdictSchema = z.object({
    is_valid: z.boolean(),
    reason: z.string().trim().min(1),
});

function extractJsonObject(raw: string): unknown {
    const cleaned = raw.replace(/```(?:json)?/g, "").replace(/```/g, "").trim();

    try {
        return JSON.parse(cleaned);
    } catch {
        // fall through to the brace scan
    }

    const first = cleaned.indexOf("{");
    const last = cleaned.lastIndexOf("}");
    if (first === -1 || last <= first) {
        throw new ClassificationParseError("Job description check returned something that is not JSON.");
    }
    try {
        return JSON.parse(cleaned.slice(first, last + 1));
    } catch {
        throw new ClassificationParseError("Job description check returned malformed JSON.");
    }
}

/** Model output → verdict. Anything unexpected throws ClassificationParseError. */
export function parseVerdict(raw: string | null | undefined): Verdict {
    if (!raw || !raw.trim()) {
        throw new ClassificationParseError("Job description check returned an empty response.");
    }
    const parsed = verdictSchema.safeParse(extractJsonObject(raw));
    if (!parsed.success) {
        const fields = parsed.error.issues.map((i) => i.path.join(".") || "root").join(", ");
        throw new ClassificationParseError(`Job description check response is missing or has invalid fields: ${fields}.`);
    }
    return { isValid: parsed.data.is_valid, reason: parsed.data.reason };
}

/**
 * Asks the generation service whether the text is a genuine job posting.
 * Always decides, and fails closed: a bad response or a failed call is a
 * rejection, never a pass.
 */
export class LlmJobDescriptionClassifier implements ClassifierLink {
    readonly name = "llm";

    constructor(private readonly generator: TextGenerator) {}

    async tryClassify(text: string, options: ClassifyOptions = {}): Promise<Verdict> {
        const { system, user } = buildValidationPrompt(text);

        let raw: string;
        try {
            raw = await this.generator.complete({ system, user, temperature: 0, json: true, signal: options.signal });
        } catch (error) {
            // a cancelled request has no verdict to report
            if (options.signal?.aborted) throw error;
            logWarning("Job description check failed:", errorMessage(error));
            return { isValid: false, reason: `Job description check failed: ${errorMessage(error)}` };
        }

        try {
            return parseVerdict(raw);
        } catch (error) {
            if (error instanceof ClassificationParseError) {
                logWarning("Unusable job description verdict:", { raw: raw.slice(0, 300) });
                return { isValid: false, reason: error.message };
            }
            throw error;
        }
    }
}

export class ClassifierChain implements TextClassifier {
    constructor(private readonly links: ClassifierLink[]) {}

    async classify(text: string, options?: ClassifyOptions): Promise<Verdict> {
        for (const link of this.links) {
            const verdict = await link.tryClassify(text, options);
            if (verdict) {
                debug("🔍 JD verdict", { by: link.name, ...verdict });
                return verdict;
            }
        }
        return { isValid: false, reason: "No classifier could decide whether this is a job description." };
    }
}

export const createJobDescriptionClassifier = (generator: TextGenerator): TextClassifier =>
    new ClassifierChain([new LengthHeuristicClassifier(), new LlmJobDescriptionClassifier(generator)]);
