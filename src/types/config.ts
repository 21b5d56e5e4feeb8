import type { ChatOptions, ToolDefinition } from "./request.js";

export interface VertexAnthropicConfig {
  projectId: string;
  location: string;
  accessToken?: string;
  baseUrl?: string;
}

export interface AppConfig {
  debug: boolean;
  port: number;
  projectRoot: string;
  vertex: VertexAnthropicConfig;
  chatOptions: ChatOptions;
  toolsConfigPath: string;
  toolsEnabled: string[];
  toolsDisabled: string[];
  apiAuthToken?: string;
}

export interface ParsedToolsConfig {
  sourcePath: string;
  enabledTools: string[];
  tools: ToolDefinition[];
}
