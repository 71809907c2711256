/**
 * Perplexity provider: web search answers from the Sonar models.
 *
 * Perplexity speaks the Chat Completions API, so search goes through
 * @ai-sdk/openai like the LLM presets. It is a search capability rather
 * than a text backend, so it never becomes the agent's LLM.
 */

import { generateText } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { z } from "zod";
import { ConfigurationError } from "../errors/RuntimeError.js";
import { BaseProvider } from "./base.js";
import type { ConfigureContext, ProviderConfig, ProviderFactory } from "./interface.js";
import { optionalStringParam, stringParam } from "./params.js";

export const PERPLEXITY_API_KEY = "PERPLEXITY_API_KEY";

const SEARCH_SYSTEM_PROMPT =
    "You are a search assistant. Provide detailed and accurate information based on the search query.";

const perplexityConfigSchema = z.object({
    name: z.string().optional(),
    model: z.string().min(1).default("sonar-reasoning-pro"),
    base_url: z.string().url().default("https://api.perplexity.ai"),
    timeout_ms: z.number().int().positive().default(60_000),
});

export type PerplexityConfig = z.infer<typeof perplexityConfigSchema>;

export class PerplexityProvider extends BaseProvider<PerplexityConfig> {
    readonly isLlmProvider = false;

    protected validateConfig(raw: ProviderConfig): PerplexityConfig {
        const parsed = perplexityConfigSchema.safeParse(raw);
        if (!parsed.success) {
            const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`).join("; ");
            throw new ConfigurationError(`Invalid perplexity config: ${detail}`);
        }
        return parsed.data;
    }

    protected registerActions(): void {
        this.defineOperation(
            "search",
            "Answer a search query with Perplexity's Sonar API",
            [
                { name: "query", required: true, kind: "string", description: "Search query" },
                { name: "model", required: false, kind: "string", description: "Model override" },
            ],
            async (params) => this.search(
                stringParam(params, "query"),
                optionalStringParam(params, "model") ?? this.config.model,
                await this.requireSecret(PERPLEXITY_API_KEY),
            ),
        );
    }

    /** Only checks for a key; every search request is billed */
    protected async checkConfigured(): Promise<void> {
        await this.requireSecret(PERPLEXITY_API_KEY);
    }

    protected override async acquireCredentials(ctx: ConfigureContext): Promise<void> {
        const apiKey = await this.obtain(ctx, PERPLEXITY_API_KEY, "Enter your Perplexity API key:");
        await this.search("test", this.config.model, apiKey);
        await this.secrets.set(PERPLEXITY_API_KEY, apiKey);
        this.log.info("Perplexity credentials saved");
    }

    async search(query: string, modelId: string, apiKey: string): Promise<string> {
        const fetchImpl = (input: string | URL | Request, init?: RequestInit) =>
            this.fetchFn(typeof input === "string" ? input : input instanceof URL ? input.href : input.url, init);
        const client = createOpenAI({ baseURL: this.config.base_url, apiKey, name: this.name, fetch: fetchImpl });

        const result = await generateText({
            model: client.chat(modelId),
            system: SEARCH_SYSTEM_PROMPT,
            prompt: query,
            maxRetries: 2,
            abortSignal: AbortSignal.timeout(this.config.timeout_ms),
        });
        return result.text;
    }
}

export function perplexityFactory(): ProviderFactory {
    return (config, deps) => new PerplexityProvider("perplexity", config, deps);
}
