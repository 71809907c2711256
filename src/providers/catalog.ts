/**
 * Provider catalog: the explicit name → factory table the registry
 * constructs providers from. Configuration blocks select entries by name.
 */

import { echochambersFactory } from "./echochambers.js";
import { EVM_PRESETS, evmFactory, type EvmPresetName } from "./evm.js";
import type { ProviderCatalog, ProviderFactory } from "./interface.js";
import { LLM_PRESETS, llmFactory, type LlmPresetName } from "./llm.js";
import { perplexityFactory } from "./perplexity.js";
import { twitterFactory } from "./twitter.js";

export function createDefaultCatalog(): ProviderCatalog {
    const catalog = new Map<string, ProviderFactory>();

    for (const preset of Object.keys(LLM_PRESETS)) {
        if (isLlmPreset(preset)) catalog.set(preset, llmFactory(preset));
    }
    for (const preset of Object.keys(EVM_PRESETS)) {
        if (isEvmPreset(preset)) catalog.set(preset, evmFactory(preset));
    }
    catalog.set("echochambers", echochambersFactory());
    catalog.set("twitter", twitterFactory());
    catalog.set("perplexity", perplexityFactory());

    return catalog;
}

function isLlmPreset(name: string): name is LlmPresetName {
    return Object.prototype.hasOwnProperty.call(LLM_PRESETS, name);
}

function isEvmPreset(name: string): name is EvmPresetName {
    return Object.prototype.hasOwnProperty.call(EVM_PRESETS, name);
}
