import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { loadAppConfig } from "../src/config/env.js";

const KEYS = [
  "VERTEX_AI_ANTHROPIC_PROJECT_ID",
  "VERTEX_AI_ANTHROPIC_LOCATION",
  "VERTEX_AI_ANTHROPIC_MODEL",
  "VERTEX_AI_ANTHROPIC_ACCESS_TOKEN",
  "VERTEX_AI_ANTHROPIC_BASE_URL",
  "VERTEX_AI_ANTHROPIC_MAX_TOKENS",
  "VERTEX_AI_ANTHROPIC_TEMPERATURE",
  "VERTEX_AI_ANTHROPIC_TOP_K",
  "VERTEX_AI_ANTHROPIC_TOP_P",
  "DEBUG",
  "PORT",
  "TOOLS_CONFIG_PATH",
  "TOOLS_ENABLED",
  "TOOLS_DISABLED",
  "API_AUTH_TOKEN",
];

describe("loadAppConfig", () => {
  let saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    saved = {};
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it("loads Vertex AI fields and request overrides", () => {
    process.env.VERTEX_AI_ANTHROPIC_PROJECT_ID = "test-project";
    process.env.VERTEX_AI_ANTHROPIC_LOCATION = "us-east5";
    process.env.VERTEX_AI_ANTHROPIC_MODEL = "claude-3-haiku@20240307";
    process.env.VERTEX_AI_ANTHROPIC_ACCESS_TOKEN = " test-token ";
    process.env.VERTEX_AI_ANTHROPIC_MAX_TOKENS = "1024";
    process.env.VERTEX_AI_ANTHROPIC_TOP_P = "0.9";
    process.env.DEBUG = "true";
    process.env.PORT = "4321";
    process.env.TOOLS_ENABLED = "weather, clock";

    const config = loadAppConfig();

    expect(config.vertex).toEqual({
      projectId: "test-project",
      location: "us-east5",
      accessToken: "test-token",
    });
    expect(config.chatOptions).toEqual({
      model: "claude-3-haiku@20240307",
      maxTokens: 1024,
      temperature: 0.8,
      topK: 10,
      topP: 0.9,
    });
    expect(config.debug).toBe(true);
    expect(config.port).toBe(4321);
    expect(config.toolsEnabled).toEqual(["weather", "clock"]);
    expect(config.toolsDisabled).toEqual([]);
  });

  it("falls back to the default model and sampling options", () => {
    process.env.VERTEX_AI_ANTHROPIC_PROJECT_ID = "test-project";
    process.env.VERTEX_AI_ANTHROPIC_LOCATION = "europe-west1";

    const config = loadAppConfig();

    expect(config.chatOptions).toEqual({
      model: "claude-3-5-sonnet@20240620",
      maxTokens: 500,
      temperature: 0.8,
      topK: 10,
    });
    expect(config.vertex.accessToken).toBeUndefined();
    expect(config.apiAuthToken).toBeUndefined();
    expect(config.port).toBe(3000);
    expect(config.toolsConfigPath.endsWith("tools.config.yaml")).toBe(true);
  });

  it("requires a project id and location", () => {
    process.env.VERTEX_AI_ANTHROPIC_LOCATION = "us-east5";

    expect(() => loadAppConfig()).toThrow();
  });
});
