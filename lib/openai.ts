// lib/openai.ts (server-only)
import OpenAI from "openai";
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { GenerationError, errorMessage } from "./errors";
import { debug } from "./debug";

export type CompletionRequest = {
    system: string;
    user: string;
    temperature: number;
    /** Ask the model for a single JSON object instead of free text. */
    json?: boolean;
    signal?: AbortSignal;
};

export interface TextGenerator {
    complete(request: CompletionRequest): Promise<string>;
}

/** The slice of the SDK client this module talks to. */
export type ChatClient = {
    chat: {
        completions: {
            create(
                body: ChatCompletionCreateParamsNonStreaming,
                options?: { timeout?: number; maxRetries?: number; signal?: AbortSignal }
            ): Promise<ChatCompletion>;
        };
    };
};

export type OpenAIGeneratorOptions = {
    model: string;
    timeoutMs: number;
};

export class OpenAIGenerator implements TextGenerator {
    constructor(
        private readonly client: ChatClient,
        private readonly options: OpenAIGeneratorOptions
    ) {}

    async complete({ system, user, temperature, json, signal }: CompletionRequest): Promise<string> {
        const started = Date.now();
        try {
            const completion = await this.client.chat.completions.create(
                {
                    model: this.options.model,
                    temperature,
                    ...(json ? { response_format: { type: "json_object" as const } } : {}),
                    messages: [
                        { role: "system", content: system },
                        { role: "user", content: user },
                    ],
                },
                { timeout: this.options.timeoutMs, maxRetries: 0, signal }
            );

            debug("🤖 Completion finished", {
                model: this.options.model,
                ms: Date.now() - started,
                finish: completion.choices[0]?.finish_reason,
            });

            return (completion.choices[0]?.message?.content ?? "").trim();
        } catch (error) {
            throw new GenerationError(errorMessage(error), error);
        }
    }
}

export function createOpenAIGenerator(apiKey: string, options: OpenAIGeneratorOptions): OpenAIGenerator {
    // retries are the user's call, never the SDK's
    const client = new OpenAI({ apiKey, maxRetries: 0, timeout: options.timeoutMs });
    return new OpenAIGenerator(client, options);
}
