/**
 * LLM Provider Interface
 *
 * Contract shared by the primary and fallback completion providers,
 * plus the error types they raise.
 */

export interface ChatMessage {
    role: "system" | "user" | "assistant";
    content: string;
}

export interface ChatCompletionRequest {
    messages: ChatMessage[];
    model?: string;
    temperature?: number;
    max_tokens?: number;
    stop?: string[];
}

export type FinishReason = "stop" | "length" | "tool_calls" | "content_filter" | null;

export interface TokenUsage {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
}

export interface ChatCompletionResponse {
    id: string;
    model: string;
    content: string;
    finish_reason: FinishReason;
    usage: TokenUsage;
}

export interface IModelProvider {
    readonly name: string;
    readonly defaultModel: string;

    /**
     * Send a chat completion request and get a response
     */
    chat(request: ChatCompletionRequest): Promise<ChatCompletionResponse>;
}

export interface ProviderConfig {
    apiKey: string;
    baseUrl?: string;
    model?: string;
    timeout?: number;
    maxRetries?: number;
    organization?: string;
}

export type ProviderEnv = Record<string, string | undefined>;

// Base error class for provider errors
export class ProviderError extends Error {
    constructor(
        message: string,
        public readonly provider: string,
        public readonly statusCode?: number,
        public readonly retryable: boolean = false,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = "ProviderError";
    }
}

export class RateLimitError extends ProviderError {
    constructor(
        provider: string,
        public readonly retryAfterMs?: number,
        cause?: Error
    ) {
        super(`Rate limit exceeded for ${provider}`, provider, 429, true, cause);
        this.name = "RateLimitError";
    }
}

export class AuthenticationError extends ProviderError {
    constructor(provider: string, statusCode = 401, cause?: Error) {
        super(`Authentication failed for ${provider}`, provider, statusCode, false, cause);
        this.name = "AuthenticationError";
    }
}

export class ModelNotFoundError extends ProviderError {
    constructor(provider: string, model: string, cause?: Error) {
        super(`Model ${model} not found for ${provider}`, provider, 404, false, cause);
        this.name = "ModelNotFoundError";
    }
}

/**
 * Parse a Retry-After header value (seconds) into milliseconds.
 */
export function parseRetryAfter(value: string | null): number | undefined {
    if (!value) return undefined;
    const seconds = Number(value);
    if (!Number.isFinite(seconds) || seconds < 0) return undefined;
    return seconds * 1000;
}

/**
 * Wrap a transport-level failure (DNS, reset, abort) as a retryable provider error.
 */
export function toTransportError(provider: string, error: unknown, timeoutMs: number): ProviderError {
    if (error instanceof ProviderError) return error;
    if (error instanceof Error) {
        const message = error.name === "AbortError"
            ? `${provider} request timed out after ${timeoutMs}ms`
            : `${provider} request failed: ${error.message}`;
        return new ProviderError(message, provider, undefined, true, error);
    }
    return new ProviderError(`${provider} request failed: ${String(error)}`, provider, undefined, true);
}

/**
 * Pull `error.message` out of a JSON error body, falling back to the raw text.
 */
export function extractErrorMessage(body: string): string {
    try {
        const parsed: unknown = JSON.parse(body);
        if (typeof parsed === "object" && parsed !== null && "error" in parsed) {
            const error = parsed.error;
            if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
                return error.message;
            }
            if (typeof error === "string") {
                return error;
            }
        }
    } catch {
        // not JSON
    }
    return body.trim() || "empty response body";
}
