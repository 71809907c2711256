/**
 * LLM providers: text generation over OpenAI-compatible chat APIs.
 *
 * One class covers every preset; presets differ only in base URL, the
 * secret holding the key, and which AI SDK provider builds the model.
 * DeepSeek goes through @ai-sdk/deepseek and Anthropic through
 * @ai-sdk/anthropic; everything else through @ai-sdk/openai in Chat
 * Completions mode.
 */

import { generateText, type LanguageModel } from "ai";
import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import { createDeepSeek } from "@ai-sdk/deepseek";
import { z } from "zod";
import { ConfigurationError, withRetry } from "../errors/RuntimeError.js";
import { BaseProvider } from "./base.js";
import type { ConfigureContext, OperationParams, ProviderConfig, ProviderFactory } from "./interface.js";
import { optionalStringParam, stringParam } from "./params.js";

// ═══════════════════════════════════════════════════════
//                  Presets
// ═══════════════════════════════════════════════════════

export interface LlmPreset {
    baseUrl: string;
    /** Secret holding the API key; absent for keyless local servers */
    apiKeyEnv?: string;
    /** Secret that may override the base URL */
    baseUrlEnv?: string;
    sdk: "openai" | "deepseek" | "anthropic";
    label: string;
}

export const LLM_PRESETS = {
    openai: { baseUrl: "https://api.openai.com/v1", apiKeyEnv: "OPENAI_API_KEY", sdk: "openai", label: "OpenAI" },
    groq: { baseUrl: "https://api.groq.com/openai/v1", apiKeyEnv: "GROQ_API_KEY", sdk: "openai", label: "Groq" },
    together: { baseUrl: "https://api.together.xyz/v1", apiKeyEnv: "TOGETHER_API_KEY", sdk: "openai", label: "Together AI" },
    xai: { baseUrl: "https://api.x.ai/v1", apiKeyEnv: "XAI_API_KEY", sdk: "openai", label: "xAI" },
    deepseek: { baseUrl: "https://api.deepseek.com/v1", apiKeyEnv: "DEEPSEEK_API_KEY", sdk: "deepseek", label: "DeepSeek" },
    anthropic: { baseUrl: "https://api.anthropic.com/v1", apiKeyEnv: "ANTHROPIC_API_KEY", sdk: "anthropic", label: "Anthropic" },
    ollama: { baseUrl: "http://localhost:11434/v1", baseUrlEnv: "OLLAMA_BASE_URL", sdk: "openai", label: "Ollama" },
} satisfies Record<string, LlmPreset>;

export type LlmPresetName = keyof typeof LLM_PRESETS;

function isPresetName(name: string): name is LlmPresetName {
    return Object.prototype.hasOwnProperty.call(LLM_PRESETS, name);
}

function presetFor(name: string): LlmPreset {
    if (!isPresetName(name)) throw new ConfigurationError(`Unknown LLM preset '${name}'`);
    return LLM_PRESETS[name];
}

// ═══════════════════════════════════════════════════════
//                  Config
// ═══════════════════════════════════════════════════════

const llmConfigSchema = z.object({
    name: z.string().optional(),
    model: z.string().min(1, "model is required"),
    base_url: z.string().url().optional(),
    max_tokens: z.number().int().positive().optional(),
    temperature: z.number().min(0).max(2).optional(),
    timeout_ms: z.number().int().positive().default(30_000),
});

export type LlmConfig = z.infer<typeof llmConfigSchema>;

const ANTHROPIC_VERSION = "2023-06-01";

const modelListSchema = z.object({
    data: z.array(z.object({ id: z.string() })),
});

// ═══════════════════════════════════════════════════════
//                  Provider
// ═══════════════════════════════════════════════════════

export class LlmProvider extends BaseProvider<LlmConfig> {
    readonly isLlmProvider = true;

    protected validateConfig(raw: ProviderConfig): LlmConfig {
        presetFor(this.name);
        const parsed = llmConfigSchema.safeParse(raw);
        if (!parsed.success) {
            const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`).join("; ");
            throw new ConfigurationError(`Invalid ${this.name} config: ${detail}`);
        }
        return parsed.data;
    }

    protected registerActions(): void {
        this.defineOperation(
            "generate-text",
            "Generate text from a prompt and a system prompt",
            [
                { name: "prompt", required: true, kind: "string", description: "User prompt" },
                { name: "system_prompt", required: true, kind: "string", description: "System prompt" },
                { name: "model", required: false, kind: "string", description: "Model override" },
            ],
            (params) => this.generate(params),
        );
        this.defineOperation(
            "check-model",
            "Check whether a model is available",
            [{ name: "model", required: true, kind: "string", description: "Model id" }],
            async (params) => (await this.listModels()).includes(stringParam(params, "model")),
        );
        this.defineOperation(
            "list-models",
            "List the models the API serves",
            [],
            () => this.listModels(),
        );
    }

    private get preset(): LlmPreset {
        return presetFor(this.name);
    }

    protected async checkConfigured(): Promise<void> {
        const apiKey = await this.resolveApiKey();
        await this.fetchModels(await this.resolveBaseUrl(), apiKey);
    }

    protected override async acquireCredentials(ctx: ConfigureContext): Promise<void> {
        const { apiKeyEnv, baseUrlEnv, label } = this.preset;

        if (baseUrlEnv && ctx.prompt) {
            const entered = await ctx.prompt.ask(`${label} base URL (blank for ${this.preset.baseUrl}):`);
            if (entered) {
                await this.fetchModels(entered, undefined);
                await this.secrets.set(baseUrlEnv, entered);
            }
        }
        if (apiKeyEnv) {
            const apiKey = await this.obtain(ctx, apiKeyEnv, `Enter your ${label} API key:`);
            await this.fetchModels(await this.resolveBaseUrl(), apiKey);
            await this.secrets.set(apiKeyEnv, apiKey);
        }
        this.log.info(`${label} credentials saved`);
    }

    // ═══════════════════════════════════════════════════════
    //                  Operations
    // ═══════════════════════════════════════════════════════

    private async generate(params: OperationParams): Promise<string> {
        const modelId = optionalStringParam(params, "model") ?? this.config.model;
        const model = this.languageModel(modelId, await this.resolveBaseUrl(), await this.resolveApiKey());

        const result = await generateText({
            model,
            system: stringParam(params, "system_prompt"),
            prompt: stringParam(params, "prompt"),
            maxOutputTokens: this.config.max_tokens,
            temperature: this.config.temperature,
            maxRetries: 2,
            abortSignal: AbortSignal.timeout(this.config.timeout_ms),
        });
        this.log.debug(`generate-text ${modelId}: ${result.finishReason}`);
        return result.text;
    }

    private async listModels(): Promise<string[]> {
        return this.fetchModels(await this.resolveBaseUrl(), await this.resolveApiKey());
    }

    // ═══════════════════════════════════════════════════════
    //                  Helpers
    // ═══════════════════════════════════════════════════════

    private languageModel(modelId: string, baseURL: string, apiKey: string | undefined): LanguageModel {
        const fetchImpl = (input: string | URL | Request, init?: RequestInit) =>
            this.fetchFn(typeof input === "string" ? input : input instanceof URL ? input.href : input.url, init);

        if (this.preset.sdk === "deepseek") {
            return createDeepSeek({ baseURL, apiKey, fetch: fetchImpl })(modelId);
        }
        if (this.preset.sdk === "anthropic") {
            return createAnthropic({ baseURL, apiKey, fetch: fetchImpl })(modelId);
        }
        // .chat() forces the Chat Completions API, which every compatible server speaks
        return createOpenAI({ baseURL, apiKey: apiKey ?? "ollama", name: this.name, fetch: fetchImpl }).chat(modelId);
    }

    private async fetchModels(baseUrl: string, apiKey: string | undefined): Promise<string[]> {
        return withRetry(async () => {
            const res = await this.fetchFn(`${baseUrl.replace(/\/+$/, "")}/models`, {
                headers: this.authHeaders(apiKey),
                signal: AbortSignal.timeout(this.config.timeout_ms),
            });
            if (!res.ok) {
                const text = await res.text().catch(() => "");
                throw new Error(`${this.preset.label} API ${res.status}: ${text.slice(0, 200)}`);
            }
            const parsed = modelListSchema.safeParse(await res.json());
            if (!parsed.success) throw new Error(`${this.preset.label} returned an unexpected model list`);
            return parsed.data.data.map((m) => m.id);
        }, {
            maxAttempts: 2,
            baseDelayMs: 500,
            onRetry: (attempt, delayMs) => this.log.warn(`Model list attempt ${attempt} failed, retrying in ${delayMs}ms`),
        });
    }

    private authHeaders(apiKey: string | undefined): Record<string, string> {
        if (!apiKey) return {};
        if (this.preset.sdk === "anthropic") {
            return { "x-api-key": apiKey, "anthropic-version": ANTHROPIC_VERSION };
        }
        return { Authorization: `Bearer ${apiKey}` };
    }

    private async resolveApiKey(): Promise<string | undefined> {
        const { apiKeyEnv } = this.preset;
        return apiKeyEnv ? this.requireSecret(apiKeyEnv) : undefined;
    }

    private async resolveBaseUrl(): Promise<string> {
        const { baseUrlEnv } = this.preset;
        const override = baseUrlEnv ? await this.secrets.get(baseUrlEnv) : undefined;
        return override ?? this.config.base_url ?? this.preset.baseUrl;
    }
}

export function llmFactory(preset: LlmPresetName): ProviderFactory {
    return (config, deps) => new LlmProvider(preset, config, deps);
}
