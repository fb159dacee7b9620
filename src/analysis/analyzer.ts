/**
 * Authorship-time analysis: primary provider with a single fallback.
 */

import { getLogger, Logger } from "../logger";
import { buildAuthorshipPrompt } from "../shared/prompts";
import {
    ChatCompletionRequest,
    IModelProvider,
    ProviderError,
    TokenUsage
} from "../providers/provider.interface";

export interface AnalysisError {
    provider: string;
    message: string;
    statusCode?: number;
}

export interface AnalysisResult {
    ok: boolean;
    text: string;
    provider: string;
    model?: string;
    usedFallback: boolean;
    errors: AnalysisError[];
    usage?: TokenUsage;
}

export interface DiffAnalyzerOptions {
    primary: IModelProvider;
    fallback?: IModelProvider;
    maxTokens?: number;
    fallbackMaxTokens?: number;
    logger?: Logger;
}

export const FALLBACK_NOT_CONFIGURED = "OpenAI API key not provided for fallback.";

const DEFAULT_MAX_TOKENS = 1000;

function describeError(provider: IModelProvider, error: unknown): AnalysisError {
    if (error instanceof ProviderError) {
        return { provider: provider.name, message: error.message, statusCode: error.statusCode };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { provider: provider.name, message };
}

export class DiffAnalyzer {
    private primary: IModelProvider;
    private fallback?: IModelProvider;
    private maxTokens: number;
    private fallbackMaxTokens: number;
    private logger: Logger;

    constructor(options: DiffAnalyzerOptions) {
        this.primary = options.primary;
        this.fallback = options.fallback;
        this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
        this.fallbackMaxTokens = options.fallbackMaxTokens ?? this.maxTokens;
        this.logger = options.logger ?? getLogger();
    }

    hasFallback(): boolean {
        return this.fallback !== undefined;
    }

    private buildRequest(diffText: string, maxTokens: number): ChatCompletionRequest {
        return {
            messages: [{ role: "user", content: buildAuthorshipPrompt(diffText) }],
            max_tokens: maxTokens
        };
    }

    /**
     * Ask the primary provider; on any failure hand the same diff to the fallback.
     */
    async analyze(diffText: string): Promise<AnalysisResult> {
        const log = this.logger.child({ provider: this.primary.name, model: this.primary.defaultModel });
        const started = Date.now();

        try {
            const response = await this.primary.chat(this.buildRequest(diffText, this.maxTokens));
            log.debug("Analysis completed", { durationMs: Date.now() - started, usage: response.usage });
            return {
                ok: true,
                text: response.content,
                provider: this.primary.name,
                model: response.model,
                usedFallback: false,
                errors: [],
                usage: response.usage
            };
        } catch (error) {
            const failure = describeError(this.primary, error);
            log.warn(`Error with Claude API: ${failure.message}`, { statusCode: failure.statusCode });

            if (this.fallback) {
                log.info("Falling back to ChatGPT...");
                const result = await this.analyzeWithFallback(diffText);
                return { ...result, errors: [failure, ...result.errors] };
            }

            return {
                ok: false,
                text: `Error analyzing diff: ${failure.message}`,
                provider: this.primary.name,
                usedFallback: false,
                errors: [failure]
            };
        }
    }

    /**
     * Second and final attempt; its failure is reported inline, not thrown.
     */
    async analyzeWithFallback(diffText: string): Promise<AnalysisResult> {
        if (!this.fallback) {
            return {
                ok: false,
                text: FALLBACK_NOT_CONFIGURED,
                provider: "openai",
                usedFallback: true,
                errors: []
            };
        }

        const fallback = this.fallback;
        const log = this.logger.child({ provider: fallback.name, model: fallback.defaultModel });
        const started = Date.now();

        try {
            const response = await fallback.chat(this.buildRequest(diffText, this.fallbackMaxTokens));
            log.debug("Fallback analysis completed", { durationMs: Date.now() - started, usage: response.usage });
            return {
                ok: true,
                text: response.content,
                provider: fallback.name,
                model: response.model,
                usedFallback: true,
                errors: [],
                usage: response.usage
            };
        } catch (error) {
            const failure = describeError(fallback, error);
            log.error(`Error with ChatGPT API: ${failure.message}`, { statusCode: failure.statusCode });
            return {
                ok: false,
                text: `Error analyzing diff with ChatGPT: ${failure.message}`,
                provider: fallback.name,
                usedFallback: true,
                errors: [failure]
            };
        }
    }
}
