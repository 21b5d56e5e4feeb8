export interface ToolDefinition {
  name: string;
  description?: string;
  input_schema: Record<string, unknown>;
}

export type RequestContentBlock =
  | { type: "text"; text: string }
  | { type: "image"; source: { type: "base64"; media_type: string; data: string } }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; tool_use_id: string; content: string; is_error?: boolean };

export interface AnthropicMessage {
  role: "user" | "assistant";
  content: string | RequestContentBlock[];
}

export interface ChatCompletionRequest {
  anthropic_version: string;
  messages: AnthropicMessage[];
  max_tokens: number;
  stream: boolean;
  system?: string;
  temperature?: number;
  top_k?: number;
  top_p?: number;
  stop_sequences?: string[];
  tools?: ToolDefinition[];
}

export interface ChatOptions {
  model?: string;
  anthropicVersion?: string;
  maxTokens?: number;
  temperature?: number;
  topK?: number;
  topP?: number;
  stopSequences?: string[];
  tools?: ToolDefinition[];
}
