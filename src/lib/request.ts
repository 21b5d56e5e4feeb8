import { DEFAULT_CHAT_OPTIONS } from "../config/models.js";
import type {
  AnthropicMessage,
  ChatCompletionRequest,
  ChatOptions,
  ToolDefinition,
} from "../types/request.js";

export interface ResolvedChatOptions extends ChatOptions {
  model: string;
  anthropicVersion: string;
  maxTokens: number;
}

export function defaultChatOptions(overrides?: ChatOptions): ResolvedChatOptions {
  return mergeChatOptions(overrides, { ...DEFAULT_CHAT_OPTIONS });
}

function mergeTools(
  runtime: ToolDefinition[] | undefined,
  defaults: ToolDefinition[] | undefined,
): ToolDefinition[] | undefined {
  if (!runtime?.length && !defaults?.length) {
    return undefined;
  }

  const byName = new Map<string, ToolDefinition>();
  for (const tool of [...(defaults ?? []), ...(runtime ?? [])]) {
    byName.set(tool.name, tool);
  }

  return Array.from(byName.values());
}

/**
 * Field-by-field merge: a runtime value wins when it is set. Tool lists are
 * united by name.
 */
export function mergeChatOptions(
  runtime: ChatOptions | undefined,
  defaults: ResolvedChatOptions,
): ResolvedChatOptions {
  const tools = mergeTools(runtime?.tools, defaults.tools);
  const temperature = runtime?.temperature ?? defaults.temperature;
  const topK = runtime?.topK ?? defaults.topK;
  const topP = runtime?.topP ?? defaults.topP;
  const stopSequences = runtime?.stopSequences ?? defaults.stopSequences;

  return {
    model: runtime?.model ?? defaults.model,
    anthropicVersion: runtime?.anthropicVersion ?? defaults.anthropicVersion,
    maxTokens: runtime?.maxTokens ?? defaults.maxTokens,
    ...(temperature !== undefined ? { temperature } : {}),
    ...(topK !== undefined ? { topK } : {}),
    ...(topP !== undefined ? { topP } : {}),
    ...(stopSequences ? { stopSequences } : {}),
    ...(tools ? { tools } : {}),
  };
}

export function buildChatCompletionRequest(options: {
  messages: AnthropicMessage[];
  chatOptions: ResolvedChatOptions;
  system?: string;
  stream: boolean;
}): ChatCompletionRequest {
  const { chatOptions } = options;

  return {
    anthropic_version: chatOptions.anthropicVersion,
    messages: options.messages,
    max_tokens: chatOptions.maxTokens,
    stream: options.stream,
    ...(options.system ? { system: options.system } : {}),
    ...(chatOptions.temperature !== undefined ? { temperature: chatOptions.temperature } : {}),
    ...(chatOptions.topK !== undefined ? { top_k: chatOptions.topK } : {}),
    ...(chatOptions.topP !== undefined ? { top_p: chatOptions.topP } : {}),
    ...(chatOptions.stopSequences?.length ? { stop_sequences: chatOptions.stopSequences } : {}),
    ...(chatOptions.tools?.length ? { tools: chatOptions.tools } : {}),
  };
}
