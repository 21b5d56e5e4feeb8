export const ChatModels = {
  CLAUDE_3_5_SONNET: "claude-3-5-sonnet@20240620",
  CLAUDE_3_OPUS: "claude-3-opus@20240229",
  CLAUDE_3_SONNET: "claude-3-sonnet@20240229",
  CLAUDE_3_HAIKU: "claude-3-haiku@20240307",
} as const;

export type ChatModelName = (typeof ChatModels)[keyof typeof ChatModels];

export const DEFAULT_ANTHROPIC_VERSION = "vertex-2023-10-16";

export const DEFAULT_CHAT_OPTIONS = {
  model: ChatModels.CLAUDE_3_5_SONNET,
  anthropicVersion: DEFAULT_ANTHROPIC_VERSION,
  maxTokens: 500,
  temperature: 0.8,
  topK: 10,
} as const;
