// lib/prompts.ts
import { JD_MIN_WORDS, countWords } from "./text";

export type AnalysisMode = "resume-only" | "comparison";

export type PromptPair = {
    system: string;
    user: string;
};

export type AnalysisPrompt = PromptPair & { mode: AnalysisMode };

/** Section headers the comparison report must contain, in order. */
export const COMPARISON_SECTIONS = [
    "Strengths vs JD",
    "Skill/Experience Gaps",
    "Resume Bullet Rewrites (ATS-ready)",
    "Tailored Professional Summary",
    "Top Keywords to Add",
] as const;

export const RESUME_ONLY_SECTIONS = [
    "Resume Strengths",
    "Areas to Improve",
    "Resume Bullet Rewrites (ATS-ready)",
    "Professional Summary",
] as const;

const ANALYSIS_SYSTEM = [
    "You are a precise career advisor. Analyze a candidate's resume against a job description.",
    "Be specific, concise, and actionable. Use clear section headers and bullet points.",
    "Do not invent facts; use only provided text.",
].join(" ");

const RESUME_ONLY_SYSTEM = [
    "You are a precise career advisor reviewing a resume on its own.",
    "Be specific, concise, and actionable. Use clear section headers and bullet points.",
    "Do not invent facts; use only provided text.",
].join(" ");

const VALIDATION_SYSTEM = [
    "You are a strict recruiter judging whether a block of text is a genuine job posting.",
    "A genuine posting describes one role: its responsibilities, requirements or qualifications, and usually the employer.",
    "Resumes, cover letters, articles, chat messages, lorem ipsum and random text are NOT job postings.",
    "Reply with JSON only.",
].join(" ");

const embedInputs = (resumeText: string, jdText: string) =>
    ["--- RESUME ---", resumeText, "", "--- JOB DESCRIPTION ---", jdText].join("\n");

/**
 * Picks the template from the JD word count and embeds both texts verbatim.
 * Nothing is truncated; arbitrarily long inputs go out as they are.
 */
export function buildAnalysisPrompt(resumeText: string, jdText: string): AnalysisPrompt {
    if (countWords(jdText) < JD_MIN_WORDS) {
        const user = `
The job description below is missing or too short to compare against, so no resume-vs-job comparison is possible. Say so in one sentence, then review the resume on its own.

Return your answer in **Markdown** with these sections:

1) **${RESUME_ONLY_SECTIONS[0]}** — 3–6 bullets
2) **${RESUME_ONLY_SECTIONS[1]}** — 3–6 bullets
3) **${RESUME_ONLY_SECTIONS[2]}** — 3–6 bullets; use strong verbs + quantification placeholders if needed
4) **${RESUME_ONLY_SECTIONS[3]} (3–4 sentences)** — no fluff

${embedInputs(resumeText, jdText)}
`.trim();
        return { mode: "resume-only", system: RESUME_ONLY_SYSTEM, user };
    }

    const user = `
Return your answer in **Markdown** with these sections:

1) **${COMPARISON_SECTIONS[0]}** — 3–6 bullets
2) **${COMPARISON_SECTIONS[1]}** — 3–6 bullets (use verb–noun phrasing, e.g., "Hands-on Databricks pipelines")
3) **${COMPARISON_SECTIONS[2]}** — 3–6 bullets; use strong verbs + quantification placeholders if needed
4) **${COMPARISON_SECTIONS[3]} (3–4 sentences)** — role-aligned, no fluff
5) **${COMPARISON_SECTIONS[4]}** — comma-separated

${embedInputs(resumeText, jdText)}
`.trim();
    return { mode: "comparison", system: ANALYSIS_SYSTEM, user };
}

export function buildValidationPrompt(jdText: string): PromptPair {
    const user = `
Decide whether the text between the markers is a real job description.

Respond with exactly one JSON object and nothing else:
{"is_valid": true or false, "reason": "<one short sentence explaining the decision>"}

<<<TEXT_START>>>
${jdText}
<<<TEXT_END>>>
`.trim();
    return { system: VALIDATION_SYSTEM, user };
}
