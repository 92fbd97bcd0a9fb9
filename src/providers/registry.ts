/**
 * providers/registry.ts — Provider catalog + construction from config
 *
 * Supported provider IDs (all OpenAI-compatible):
 *   openai      gpt-4o-mini, gpt-4o, gpt-4.1, ...
 *   groq        llama-3.3-70b-versatile, llama-3.1-8b-instant, ...
 *   deepseek    deepseek-chat, ...
 */

import type { Config, ProviderId } from "../config.js";
import { ConfigError } from "../errors.js";
import { logger } from "../logger.js";
import type { LLMProvider } from "./types.js";
import { createDeepSeekProvider, createGroqProvider, createOpenAIProvider } from "./openai-provider.js";

/**
 * All known providers with their suggested models.
 * First model in the list is the default.
 */
export const PROVIDER_CATALOG: Record<ProviderId, { name: string; keyVar: string; models: string[] }> = {
    openai: {
        name: "OpenAI",
        keyVar: "OPENAI_API_KEY",
        models: ["gpt-4o-mini", "gpt-4o", "gpt-4.1", "gpt-4.1-mini"],
    },
    groq: {
        name: "Groq",
        keyVar: "GROQ_API_KEY",
        models: ["llama-3.3-70b-versatile", "llama-3.1-8b-instant"],
    },
    deepseek: {
        name: "DeepSeek",
        keyVar: "DEEPSEEK_API_KEY",
        models: ["deepseek-chat"],
    },
};

export function defaultModel(providerId: ProviderId): string {
    return PROVIDER_CATALOG[providerId].models[0] ?? "";
}

function apiKeyFor(config: Config): string {
    switch (config.LLM_PROVIDER) {
        case "openai":
            return config.OPENAI_API_KEY;
        case "groq":
            return config.GROQ_API_KEY;
        case "deepseek":
            return config.DEEPSEEK_API_KEY;
    }
}

function buildProvider(providerId: ProviderId, apiKey: string, model: string, temperature: number): LLMProvider {
    switch (providerId) {
        case "openai":
            return createOpenAIProvider(apiKey, model, temperature);
        case "groq":
            return createGroqProvider(apiKey, model, temperature);
        case "deepseek":
            return createDeepSeekProvider(apiKey, model, temperature);
    }
}

/** Build the provider selected by LLM_PROVIDER */
export function createProvider(config: Config): LLMProvider {
    const providerId = config.LLM_PROVIDER;
    const catalog = PROVIDER_CATALOG[providerId];
    const apiKey = apiKeyFor(config);
    if (!apiKey) throw new ConfigError(`${catalog.keyVar} is not set`, [`${catalog.keyVar}: required for ${catalog.name}`]);

    const model = config.LLM_MODEL || defaultModel(providerId);
    const temperature = config.LLM_TEMPERATURE;

    const provider = buildProvider(providerId, apiKey, model, temperature);
    logger.info("LLM provider initialised", { provider: providerId, model });
    return provider;
}

/** Returns a display string like "OpenAI · gpt-4o-mini" */
export function providerLabel(provider: LLMProvider): string {
    return `${provider.name} · ${provider.model}`;
}
