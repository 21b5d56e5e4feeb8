import { GoogleAuth } from "google-auth-library";
import { z } from "zod";

import { reduceChatCompletionStream } from "../streams/chat-stream.js";
import { decodeSseData, readableToIterable } from "../streams/sse.js";
import type { ChatCompletionRequest } from "../types/request.js";
import type { ChatCompletionResponse } from "../types/stream.js";
import { AdapterError, VertexApiError } from "./errors.js";
import type { Logger } from "./logger.js";

const CLOUD_PLATFORM_SCOPE = "https://www.googleapis.com/auth/cloud-platform";

const contentBlockSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("text"),
    text: z.string(),
  }),
  z.object({
    type: z.literal("tool_use"),
    id: z.string(),
    name: z.string(),
    input: z.record(z.string(), z.unknown()),
  }),
]);

const chatCompletionResponseSchema = z.object({
  id: z.string(),
  type: z.string(),
  role: z.string(),
  model: z.string(),
  content: z.array(contentBlockSchema),
  stop_reason: z.string().nullable(),
  stop_sequence: z.string().nullable().optional().default(null),
  usage: z.object({
    input_tokens: z.number().int().nonnegative(),
    output_tokens: z.number().int().nonnegative(),
  }),
});

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

export interface VertexAnthropicTransport {
  chatCompletion(
    request: ChatCompletionRequest,
    model: string,
    signal?: AbortSignal,
  ): Promise<ChatCompletionResponse>;
  chatCompletionStream(
    request: ChatCompletionRequest,
    model: string,
    signal?: AbortSignal,
  ): AsyncIterable<ChatCompletionResponse>;
}

export function staticAccessToken(token: string): AccessTokenProvider {
  return {
    async getAccessToken() {
      return token;
    },
  };
}

/** Application Default Credentials; the library refreshes expired tokens. */
export function createGoogleAccessTokenProvider(): AccessTokenProvider {
  const auth = new GoogleAuth({ scopes: [CLOUD_PLATFORM_SCOPE] });

  return {
    async getAccessToken() {
      const token = await auth.getAccessToken();
      if (!token) {
        throw new AdapterError("ACCESS_TOKEN_UNAVAILABLE", "Google credentials returned no access token");
      }
      return token;
    },
  };
}

export class VertexAnthropicApi implements VertexAnthropicTransport {
  private readonly projectId: string;
  private readonly location: string;
  private readonly baseUrl: string;
  private readonly tokenProvider: AccessTokenProvider;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: {
    projectId: string;
    location: string;
    tokenProvider: AccessTokenProvider;
    logger: Logger;
    baseUrl?: string;
    fetch?: typeof fetch;
  }) {
    this.projectId = options.projectId;
    this.location = options.location;
    this.baseUrl = (options.baseUrl ?? `https://${options.location}-aiplatform.googleapis.com`).replace(
      /\/+$/,
      "",
    );
    this.tokenProvider = options.tokenProvider;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger;
  }

  endpoint(model: string, method: "rawPredict" | "streamRawPredict"): string {
    return `${this.baseUrl}/v1/projects/${this.projectId}/locations/${this.location}/publishers/anthropic/models/${model}:${method}`;
  }

  async chatCompletion(
    request: ChatCompletionRequest,
    model: string,
    signal?: AbortSignal,
  ): Promise<ChatCompletionResponse> {
    if (request.stream) {
      throw new AdapterError("INVALID_REQUEST", "Request must set the stream property to false.");
    }

    const response = await this.post(this.endpoint(model, "rawPredict"), request, signal);
    const parsed = chatCompletionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new AdapterError("INVALID_RESPONSE", "Unexpected chat completion response shape", {
        context: { issues: parsed.error.issues },
      });
    }

    return parsed.data;
  }

  async *chatCompletionStream(
    request: ChatCompletionRequest,
    model: string,
    signal?: AbortSignal,
  ): AsyncGenerator<ChatCompletionResponse> {
    if (!request.stream) {
      throw new AdapterError("INVALID_REQUEST", "Request must set the stream property to true.");
    }

    const response = await this.post(this.endpoint(model, "streamRawPredict"), request, signal);
    if (!response.body) {
      throw new AdapterError("EMPTY_STREAM", "streamRawPredict did not return a readable stream");
    }

    yield* reduceChatCompletionStream(decodeSseData(readableToIterable(response.body)), {
      logger: this.logger,
    });
  }

  private async post(
    endpoint: string,
    request: ChatCompletionRequest,
    signal?: AbortSignal,
  ): Promise<Response> {
    const token = await this.tokenProvider.getAccessToken();

    this.logger.debug("Vertex AI request", {
      endpoint,
      stream: request.stream,
      messages: request.messages.length,
      tools: request.tools?.map((tool) => tool.name) ?? [],
    });

    const response = await this.fetchImpl(endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${token}`,
        ...(request.stream ? { Accept: "text/event-stream" } : {}),
      },
      body: JSON.stringify(request),
      ...(signal ? { signal } : {}),
    });

    if (!response.ok) {
      throw new VertexApiError(response.status, await this.readErrorBody(response), endpoint);
    }

    return response;
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      this.logger.debug("Unable to read error response body", { error });
      return "";
    }
  }
}
