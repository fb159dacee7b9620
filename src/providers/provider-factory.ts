/**
 * Provider Factory - builds the primary provider and, when a key exists, its fallback
 */

import { AnalyzerSettings, ProviderSettings } from "../shared/types";
import { IModelProvider, ProviderConfig, ProviderError } from "./provider.interface";
import { AnthropicProvider } from "./anthropic-provider";
import { OpenAIProvider } from "./openai-provider";

export interface ProviderPair {
    primary: IModelProvider;
    fallback?: IModelProvider;
}

export type ProviderFactory = (settings: AnalyzerSettings) => ProviderPair;

function toProviderConfig(apiKey: string, settings: ProviderSettings): ProviderConfig {
    return {
        apiKey,
        baseUrl: settings.baseUrl,
        model: settings.model,
        timeout: settings.timeoutMs,
        maxRetries: settings.maxRetries,
        organization: settings.organization
    };
}

export const createProviders: ProviderFactory = (settings) => {
    const primaryKey = settings.primary.apiKey;
    if (!primaryKey) {
        throw new ProviderError("Anthropic API key is required", "anthropic");
    }

    const primary = new AnthropicProvider(toProviderConfig(primaryKey, settings.primary));

    const fallbackKey = settings.fallback.apiKey;
    if (!fallbackKey) {
        return { primary };
    }

    return {
        primary,
        fallback: new OpenAIProvider(toProviderConfig(fallbackKey, settings.fallback))
    };
};
