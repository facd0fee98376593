// lib/text.ts

/** Below this many words a pasted text is never treated as a job description. */
export const JD_MIN_WORDS = 40;

/** Resumes shorter than this after cleanup were most likely scanned images. */
export const RESUME_MIN_CHARS = 200;

export const PREVIEW_CHARS = 2000;

/**
 * Light cleanup of extracted resume text.
 * Control characters go first so that removing them can't leave a fresh
 * whitespace run behind (keeps the function idempotent).
 */
export const normalizeResumeText = (text: string | null | undefined): string => {
    if (!text) return "";
    return text
        .replace(/[\u200b\ufeff]/g, "")
        .replace(/[ \t]+/g, " ")
        .replace(/\n{3,}/g, "\n\n")
        .trim();
};

export const trimJobDescription = (text: string | null | undefined): string => (text ?? "").trim();

export const countWords = (text: string | null | undefined): number => {
    const t = (text ?? "").trim();
    return t ? t.split(/\s+/).length : 0;
};

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;

/** Cuts at `limit` UTF-16 units, one less if the cut would split a surrogate pair. */
export const previewText = (text: string, limit = PREVIEW_CHARS): string => {
    if (text.length <= limit) return text;
    const end = limit > 0 && isHighSurrogate(text.charCodeAt(limit - 1)) ? limit - 1 : limit;
    return text.slice(0, end) + "…";
};
