// lib/config.ts (server-only)
import { z } from "zod";
import { StartupError } from "./errors";

const configSchema = z.object({
    OPENAI_API_KEY: z
        .string({ required_error: "required" })
        .trim()
        .min(1, "required"),
    OPENAI_MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
    ANALYSIS_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    SESSION_IDLE_MINUTES: z.coerce.number().int().positive().default(120),
});

export type AppConfig = {
    openaiApiKey: string;
    model: string;
    analysisTemperature: number;
    requestTimeoutMs: number;
    sessionIdleMs: number;
};

type Env = Record<string, string | undefined>;

/**
 * Reads and validates the environment. Empty strings count as unset so a
 * blank line in .env doesn't silently disable the defaults.
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const cleaned = Object.fromEntries(
        Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
    );
    const parsed = configSchema.safeParse(cleaned);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map((i) => `${i.path.join(".") || "env"}: ${i.message}`)
            .join("; ");
        throw new StartupError(`Invalid server configuration. ${problems}. Add it to .env.local, e.g. OPENAI_API_KEY=sk-...`);
    }

    const c = parsed.data;
    return {
        openaiApiKey: c.OPENAI_API_KEY,
        model: c.OPENAI_MODEL,
        analysisTemperature: c.ANALYSIS_TEMPERATURE,
        requestTimeoutMs: c.REQUEST_TIMEOUT_MS,
        sessionIdleMs: c.SESSION_IDLE_MINUTES * 60_000,
    };
}
