// lib/services.ts (server-only)
import { createJobDescriptionClassifier } from "./classifier";
import { type AppConfig, loadConfig } from "./config";
import { createOpenAIGenerator } from "./openai";
import { extractResumeText } from "./pdf";
import type { PipelineDeps } from "./pipeline";
import { SessionStore } from "./session";
import { logInfo } from "./debug";

export type Services = {
    config: AppConfig;
    deps: PipelineDeps;
    sessions: SessionStore;
};

// Survives dev-server module reloads, so sessions aren't dropped on every edit
const globalForServices = globalThis as typeof globalThis & { __careerCopilot?: Services };

export function getServices(): Services {
    if (globalForServices.__careerCopilot) return globalForServices.__careerCopilot;

    if (typeof window !== "undefined") throw new Error("server-only");

    const config = loadConfig();
    const generator = createOpenAIGenerator(config.openaiApiKey, {
        model: config.model,
        timeoutMs: config.requestTimeoutMs,
    });

    const services: Services = {
        config,
        deps: {
            extract: extractResumeText,
            classifier: createJobDescriptionClassifier(generator),
            generator,
            analysisTemperature: config.analysisTemperature,
        },
        sessions: new SessionStore({ idleMs: config.sessionIdleMs }),
    };
    globalForServices.__careerCopilot = services;
    logInfo("🚀 Services ready", { model: config.model, timeoutMs: config.requestTimeoutMs });
    return services;
}
