/**
 * Anthropic Provider Implementation (Messages API)
 */

import {
    IModelProvider,
    ChatCompletionRequest,
    ChatCompletionResponse,
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

export const ANTHROPIC_DEFAULT_BASE_URL = "https://api.anthropic.com";
export const ANTHROPIC_DEFAULT_MODEL = "claude-3-5-sonnet-20241022";
const DEFAULT_TIMEOUT = 120000;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_MAX_TOKENS = 1000;
const API_VERSION = "2023-06-01";

interface AnthropicMessagesResponse {
    id: string;
    model: string;
    content: Array<{ type: string; text?: string }>;
    stop_reason: string | null;
    usage?: {
        input_tokens: number;
        output_tokens: number;
    };
}

type ResolvedConfig = Required<Omit<ProviderConfig, "organization">>;

export class AnthropicProvider implements IModelProvider {
    readonly name = "anthropic";
    readonly defaultModel: string;

    private config: ResolvedConfig;

    constructor(config: ProviderConfig) {
        this.config = {
            apiKey: config.apiKey,
            baseUrl: (config.baseUrl ?? ANTHROPIC_DEFAULT_BASE_URL).replace(/\/+$/, ""),
            model: config.model ?? ANTHROPIC_DEFAULT_MODEL,
            timeout: config.timeout ?? DEFAULT_TIMEOUT,
            maxRetries: config.maxRetries ?? DEFAULT_MAX_RETRIES
        };
        this.defaultModel = this.config.model;
    }

    static fromEnv(env: ProviderEnv = process.env): AnthropicProvider {
        const apiKey = env.ANTHROPIC_API_KEY;
        if (!apiKey) {
            throw new Error("ANTHROPIC_API_KEY environment variable is required");
        }
        return new AnthropicProvider({
            apiKey,
            baseUrl: env.ANTHROPIC_BASE_URL
        });
    }

    private async request<T>(endpoint: string, body: Record<string, unknown>): Promise<T> {
        const url = `${this.config.baseUrl}${endpoint}`;
        const headers: Record<string, string> = {
            "Content-Type": "application/json",
            "x-api-key": this.config.apiKey,
            "anthropic-version": API_VERSION
        };

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
            throw new RateLimitError("anthropic", parseRetryAfter(retryAfter));
        }

        if (status === 401 || status === 403) {
            throw new AuthenticationError("anthropic", status);
        }

        if (status === 404) {
            throw new ModelNotFoundError("anthropic", String(model));
        }

        throw new ProviderError(
            `Anthropic API error (${status}): ${extractErrorMessage(body)}`,
            "anthropic",
            status,
            status >= 500
        );
    }

    async chat(request: ChatCompletionRequest): Promise<ChatCompletionResponse> {
        const model = request.model ?? this.config.model;

        // System prompts travel outside the message list in the Messages API
        const systemMessages = request.messages.filter((m) => m.role === "system");
        const conversation = request.messages.filter((m) => m.role !== "system");

        const body: Record<string, unknown> = {
            model,
            max_tokens: request.max_tokens ?? DEFAULT_MAX_TOKENS,
            messages: conversation.map((m) => ({
                role: m.role === "assistant" ? "assistant" : "user",
                content: m.content
            }))
        };
        if (systemMessages.length > 0) {
            body.system = systemMessages.map((m) => m.content).join("\n\n");
        }
        if (request.temperature !== undefined) {
            body.temperature = request.temperature;
        }
        if (request.stop && request.stop.length > 0) {
            body.stop_sequences = request.stop;
        }

        const fn = async (): Promise<ChatCompletionResponse> => {
            const response = await this.request<AnthropicMessagesResponse>("/v1/messages", body);

            const content = response.content
                .filter((c) => c.type === "text")
                .map((c) => c.text ?? "")
                .join("");
            const inputTokens = response.usage?.input_tokens ?? 0;
            const outputTokens = response.usage?.output_tokens ?? 0;

            return {
                id: response.id,
                model: response.model,
                content,
                finish_reason: this.mapStopReason(response.stop_reason),
                usage: {
                    prompt_tokens: inputTokens,
                    completion_tokens: outputTokens,
                    total_tokens: inputTokens + outputTokens
                }
            };
        };

        return withRetry(fn, { maxRetries: this.config.maxRetries }, isRetryableProviderError);
    }

    private mapStopReason(reason: string | null): ChatCompletionResponse["finish_reason"] {
        const reasonMap: Record<string, ChatCompletionResponse["finish_reason"]> = {
            end_turn: "stop",
            max_tokens: "length",
            stop_sequence: "stop",
            tool_use: "tool_calls"
        };
        return reason ? reasonMap[reason] ?? null : null;
    }
}
