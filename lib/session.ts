// lib/session.ts
import crypto from "crypto";
import type { Verdict } from "./classifier";
import { SessionBusyError } from "./errors";
import { JD_MIN_WORDS, countWords } from "./text";
import { debug } from "./debug";

export type Readiness = "EMPTY" | "PARSED" | "READY";

/** The last parsed snapshot. Form edits never touch this; only a parse does. */
export type SessionState = {
    resumeText: string;
    jobDescription: string;
    jobDescriptionValid: boolean;
    verdict: Verdict | null;
    fileName: string | null;
    parsedAt: string | null;
};

export type ParsedSnapshot = {
    resumeText: string;
    jobDescription: string;
    verdict: Verdict;
    fileName: string;
};

export const emptySessionState = (): SessionState => ({
    resumeText: "",
    jobDescription: "",
    jobDescriptionValid: false,
    verdict: null,
    fileName: null,
    parsedAt: null,
});

export function readinessOf(state: SessionState): Readiness {
    const hasResume = state.resumeText.length > 0;
    const hasJd = state.jobDescription.length > 0;
    if (hasResume && hasJd && state.jobDescriptionValid) return "READY";
    if (!hasResume && !hasJd) return "EMPTY";
    return "PARSED";
}

/**
 * READY plus a second, independent word-count check on the stored JD, so a
 * drifted flag can't let a short JD through to the analysis call.
 */
export const canAnalyze = (state: SessionState): boolean =>
    readinessOf(state) === "READY" && countWords(state.jobDescription) >= JD_MIN_WORDS;

export class SessionContext {
    private state: SessionState = emptySessionState();
    private inFlight = false;
    lastSeen: number;

    constructor(readonly id: string, now = Date.now()) {
        this.lastSeen = now;
    }

    get snapshot(): Readonly<SessionState> {
        return this.state;
    }

    get readiness(): Readiness {
        return readinessOf(this.state);
    }

    get busy(): boolean {
        return this.inFlight;
    }

    /** Replaces R, J and V together. */
    publish(parsed: ParsedSnapshot, now = new Date()): SessionState {
        this.state = {
            resumeText: parsed.resumeText,
            jobDescription: parsed.jobDescription,
            jobDescriptionValid: parsed.verdict.isValid,
            verdict: parsed.verdict,
            fileName: parsed.fileName,
            parsedAt: now.toISOString(),
        };
        return this.state;
    }

    /** Runs one parse/analyze at a time for this session. */
    async runExclusive<T>(action: () => Promise<T>): Promise<T> {
        if (this.inFlight) throw new SessionBusyError();
        this.inFlight = true;
        try {
            return await action();
        } finally {
            this.inFlight = false;
        }
    }
}

export type SessionStoreOptions = {
    idleMs: number;
    now?: () => number;
    newId?: () => string;
};

/** Per-user contexts keyed by the session cookie. Lives as long as the server process. */
export class SessionStore {
    private readonly sessions = new Map<string, SessionContext>();
    private readonly now: () => number;
    private readonly newId: () => string;

    constructor(private readonly options: SessionStoreOptions) {
        this.now = options.now ?? Date.now;
        this.newId = options.newId ?? (() => crypto.randomUUID());
    }

    get size(): number {
        return this.sessions.size;
    }

    get(id: string | undefined | null): SessionContext | undefined {
        this.evictIdle();
        if (!id) return undefined;
        const ctx = this.sessions.get(id);
        if (ctx) ctx.lastSeen = this.now();
        return ctx;
    }

    /** Existing context for `id`, or a fresh empty one under a new id. */
    open(id: string | undefined | null): SessionContext {
        const existing = this.get(id);
        if (existing) return existing;

        const ctx = new SessionContext(this.newId(), this.now());
        this.sessions.set(ctx.id, ctx);
        debug("🆕 Session opened", { id: ctx.id, open: this.sessions.size });
        return ctx;
    }

    end(id: string | undefined | null): boolean {
        if (!id) return false;
        return this.sessions.delete(id);
    }

    private evictIdle() {
        const cutoff = this.now() - this.options.idleMs;
        for (const [id, ctx] of this.sessions) {
            if (ctx.lastSeen < cutoff && !ctx.busy) {
                this.sessions.delete(id);
                debug("🧹 Session expired", { id });
            }
        }
    }
}
