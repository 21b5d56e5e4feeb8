export interface ToolResultInput {
  toolUseId: string;
  content: string;
  isError?: boolean;
}

export interface ChatRequest {
  input?: string;
  toolResults?: ToolResultInput[];
  threadId?: string;
  system?: string;
  model?: string;
  metadata?: Record<string, unknown>;
}

export type ChatStreamEvent =
  | {
      type: "session";
      threadId: string;
    }
  | {
      type: "token";
      text: string;
    }
  | {
      type: "tool_use";
      id: string;
      name: string;
      input: Record<string, unknown>;
    }
  | {
      type: "usage";
      inputTokens: number;
      outputTokens: number;
    }
  | {
      type: "debug";
      message: string;
      data?: unknown;
    }
  | {
      type: "error";
      message: string;
      code?: string;
    }
  | {
      type: "done";
      finishReason: "stop" | "error" | "aborted" | "incomplete";
      stopReason?: string;
    };
