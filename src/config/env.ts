import { resolve } from "node:path";

import dotenv from "dotenv";
import { z } from "zod";

import type { AppConfig } from "../types/config.js";
import { DEFAULT_CHAT_OPTIONS } from "./models.js";

dotenv.config();

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
}

const envSchema = z.object({
  VERTEX_AI_ANTHROPIC_PROJECT_ID: z.string().min(1),
  VERTEX_AI_ANTHROPIC_LOCATION: z.string().min(1),
  VERTEX_AI_ANTHROPIC_MODEL: z.string().min(1).optional(),
  VERTEX_AI_ANTHROPIC_ACCESS_TOKEN: z.string().optional(),
  VERTEX_AI_ANTHROPIC_BASE_URL: z.string().url().optional(),
  VERTEX_AI_ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().optional(),
  VERTEX_AI_ANTHROPIC_TEMPERATURE: z.coerce.number().min(0).max(1).optional(),
  VERTEX_AI_ANTHROPIC_TOP_K: z.coerce.number().int().positive().optional(),
  VERTEX_AI_ANTHROPIC_TOP_P: z.coerce.number().min(0).max(1).optional(),
  DEBUG: z.string().optional(),
  PORT: z.coerce.number().int().positive().optional(),
  TOOLS_CONFIG_PATH: z.string().optional(),
  TOOLS_ENABLED: z.string().optional(),
  TOOLS_DISABLED: z.string().optional(),
  API_AUTH_TOKEN: z.string().optional(),
});

function parseCsv(value: string | undefined): string[] {
  if (!value) {
    return [];
  }

  return value
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);
}

export function loadAppConfig(): AppConfig {
  const env = envSchema.parse(process.env);
  const projectRoot = process.cwd();

  const config: AppConfig = {
    debug: parseBoolean(env.DEBUG, false),
    port: env.PORT ?? 3000,
    projectRoot,
    vertex: {
      projectId: env.VERTEX_AI_ANTHROPIC_PROJECT_ID,
      location: env.VERTEX_AI_ANTHROPIC_LOCATION,
      ...(env.VERTEX_AI_ANTHROPIC_BASE_URL ? { baseUrl: env.VERTEX_AI_ANTHROPIC_BASE_URL } : {}),
    },
    chatOptions: {
      model: env.VERTEX_AI_ANTHROPIC_MODEL ?? DEFAULT_CHAT_OPTIONS.model,
      maxTokens: env.VERTEX_AI_ANTHROPIC_MAX_TOKENS ?? DEFAULT_CHAT_OPTIONS.maxTokens,
      temperature: env.VERTEX_AI_ANTHROPIC_TEMPERATURE ?? DEFAULT_CHAT_OPTIONS.temperature,
      topK: env.VERTEX_AI_ANTHROPIC_TOP_K ?? DEFAULT_CHAT_OPTIONS.topK,
      ...(env.VERTEX_AI_ANTHROPIC_TOP_P !== undefined ? { topP: env.VERTEX_AI_ANTHROPIC_TOP_P } : {}),
    },
    toolsConfigPath: resolve(projectRoot, env.TOOLS_CONFIG_PATH ?? "./tools.config.yaml"),
    toolsEnabled: parseCsv(env.TOOLS_ENABLED),
    toolsDisabled: parseCsv(env.TOOLS_DISABLED),
  };

  const accessToken = env.VERTEX_AI_ANTHROPIC_ACCESS_TOKEN?.trim();
  if (accessToken) {
    config.vertex.accessToken = accessToken;
  }

  const token = env.API_AUTH_TOKEN?.trim();
  if (token) {
    config.apiAuthToken = token;
  }

  return config;
}
