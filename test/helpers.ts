import Fastify, { FastifyInstance } from "fastify";
import { IModelProvider, ChatCompletionRequest, ChatCompletionResponse } from "../src/providers/provider.interface";
import { LogEntry, LogSink } from "../src/logger";

export interface RecordedRequest {
  url: string;
  headers: Record<string, string | string[] | undefined>;
  body: unknown;
}

export interface StubReply {
  status: number;
  body: unknown;
  headers?: Record<string, string>;
}

export interface StubApi {
  baseUrl: string;
  requests: RecordedRequest[];
  close: () => Promise<void>;
}

/**
 * In-process stand-in for a provider HTTP API. Each route answers with its
 * replies in order and repeats the last one once the list runs out.
 */
export async function startStubApi(routes: Record<string, StubReply[]>): Promise<StubApi> {
  const app: FastifyInstance = Fastify();
  const requests: RecordedRequest[] = [];

  for (const [route, replies] of Object.entries(routes)) {
    let calls = 0;
    app.post(route, async (request, reply) => {
      requests.push({ url: request.url, headers: request.headers, body: request.body });
      const next = replies[Math.min(calls, replies.length - 1)];
      calls += 1;
      reply.code(next.status);
      if (next.headers) reply.headers(next.headers);
      return next.body;
    });
  }

  await app.listen({ port: 0, host: "127.0.0.1" });
  const address = app.server.address();
  if (!address || typeof address === "string") {
    throw new Error("Failed to bind stub server");
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    requests,
    close: () => app.close()
  };
}

export class FakeProvider implements IModelProvider {
  readonly requests: ChatCompletionRequest[] = [];

  constructor(
    readonly name: string,
    private outcome: string | Error,
    readonly defaultModel = `${name}-test-model`
  ) {}

  async chat(request: ChatCompletionRequest): Promise<ChatCompletionResponse> {
    this.requests.push(request);
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return {
      id: `${this.name}-1`,
      model: this.defaultModel,
      content: this.outcome,
      finish_reason: "stop",
      usage: { prompt_tokens: 12, completion_tokens: 8, total_tokens: 20 }
    };
  }
}

export function captureLogs(): { sink: LogSink; entries: LogEntry[]; messages: () => string[] } {
  const entries: LogEntry[] = [];
  return {
    sink: (_line, entry) => {
      entries.push(entry);
    },
    entries,
    messages: () => entries.map((entry) => entry.msg)
  };
}
