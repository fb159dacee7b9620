/**
 * OpenAI Provider Implementation (Chat Completions API)
 */

import {
    IModelProvider,
    ChatCompletionRequest,
    ChatCompletionResponse,
    FinishReason,
    ProviderConfig,
    ProviderEnv,
    ProviderError,
    RateLimitError,
    AuthenticationError,
    ModelNotFoundError,
    extractErrorMessage,
    parseRetryAfter,
    toTransportError
} from "./provider.interface";
import { withRetry, isRetryableProviderError } from "./retry";

export const OPENAI_DEFAULT_BASE_URL = "https://api.openai.com/v1";
export const OPENAI_DEFAULT_MODEL = "gpt-4";
const DEFAULT_TIMEOUT = 120000;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_MAX_TOKENS = 1000;

const FINISH_REASONS: ReadonlyArray<Exclude<FinishReason, null>> = ["stop", "length", "tool_calls", "content_filter"];

interface OpenAIChatResponse {
    id: string;
    model: string;
    choices: Array<{
        message?: { content?: string | null };
        finish_reason?: string | null;
    }>;
    usage?: {
        prompt_tokens: number;
        completion_tokens: number;
        total_tokens: number;
    };
}

export class OpenAIProvider implements IModelProvider {
    readonly name = "openai";
    readonly defaultModel: string;

    private config: Required<Omit<ProviderConfig, "organization">> & Pick<ProviderConfig, "organization">;

    constructor(config: ProviderConfig) {
        this.config = {
            apiKey: config.apiKey,
            baseUrl: (config.baseUrl ?? OPENAI_DEFAULT_BASE_URL).replace(/\/+$/, ""),
            model: config.model ?? OPENAI_DEFAULT_MODEL,
            timeout: config.timeout ?? DEFAULT_TIMEOUT,
            maxRetries: config.maxRetries ?? DEFAULT_MAX_RETRIES,
            organization: config.organization
        };
        this.defaultModel = this.config.model;
    }

    static fromEnv(env: ProviderEnv = process.env): OpenAIProvider {
        const apiKey = env.OPENAI_API_KEY;
        if (!apiKey) {
            throw new Error("OPENAI_API_KEY environment variable is required");
        }
        return new OpenAIProvider({
            apiKey,
            organization: env.OPENAI_ORG_ID,
            baseUrl: env.OPENAI_BASE_URL
        });
    }

    private async request<T>(endpoint: string, body: Record<string, unknown>): Promise<T> {
        const url = `${this.config.baseUrl}${endpoint}`;
        const headers: Record<string, string> = {
            "Content-Type": "application/json",
            Authorization: `Bearer ${this.config.apiKey}`
        };

        if (this.config.organization) {
            headers["OpenAI-Organization"] = this.config.organization;
        }

        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.config.timeout);

        try {
            const response = await fetch(url, {
                method: "POST",
                headers,
                body: JSON.stringify(body),
                signal: controller.signal
            });

            if (!response.ok) {
                const errorBody = await response.text();
                this.handleError(response.status, errorBody, response.headers.get("retry-after"), body.model);
            }

            return await response.json() as T;
        } catch (error) {
            throw toTransportError(this.name, error, this.config.timeout);
        } finally {
            clearTimeout(timeout);
        }
    }

    private handleError(status: number, body: string, retryAfter: string | null, model: unknown): never {
        if (status === 429) {
            const match = body.match(/try again in (\d+(?:\.\d+)?)s/i);
            const fromBody = match ? Math.ceil(parseFloat(match[1]) * 1000) : undefined;
            throw new RateLimitError("openai", parseRetryAfter(retryAfter) ?? fromBody);
        }

        if (status === 401 || status === 403) {
            throw new AuthenticationError("openai", status);
        }

        if (status === 404) {
            throw new ModelNotFoundError("openai", String(model));
        }

        throw new ProviderError(
            `OpenAI API error (${status}): ${extractErrorMessage(body)}`,
            "openai",
            status,
            status >= 500
        );
    }

    async chat(request: ChatCompletionRequest): Promise<ChatCompletionResponse> {
        const model = request.model ?? this.config.model;

        const body: Record<string, unknown> = {
            model,
            messages: request.messages,
            max_tokens: request.max_tokens ?? DEFAULT_MAX_TOKENS
        };
        if (request.temperature !== undefined) {
            body.temperature = request.temperature;
        }
        if (request.stop && request.stop.length > 0) {
            body.stop = request.stop;
        }

        const fn = async (): Promise<ChatCompletionResponse> => {
            const response = await this.request<OpenAIChatResponse>("/chat/completions", body);
            const choice = response.choices[0];

            return {
                id: response.id,
                model: response.model,
                content: choice?.message?.content ?? "",
                finish_reason: this.mapFinishReason(choice?.finish_reason),
                usage: response.usage ?? { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 }
            };
        };

        return withRetry(fn, { maxRetries: this.config.maxRetries }, isRetryableProviderError);
    }

    private mapFinishReason(reason: string | null | undefined): FinishReason {
        return FINISH_REASONS.find((known) => known === reason) ?? null;
    }
}
