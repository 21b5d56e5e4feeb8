import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import YAML from "yaml";
import { z } from "zod";

import type { Logger } from "../lib/logger.js";
import type { ParsedToolsConfig } from "../types/config.js";
import type { ToolDefinition } from "../types/request.js";

const toolSchema = z.object({
  name: z
    .string()
    .min(1)
    .regex(/^[a-zA-Z0-9_-]{1,64}$/, "Tool names may only use letters, digits, '_' and '-'"),
  description: z.string().optional(),
  enabled: z.boolean().optional().default(true),
  input_schema: z
    .record(z.string(), z.unknown())
    .optional()
    .default({ type: "object", properties: {} }),
});

const toolsFileSchema = z.object({
  tools: z.array(toolSchema).optional().default([]),
});

function parseToolsFile(path: string): z.infer<typeof toolsFileSchema> {
  const raw = readFileSync(path, "utf8");
  const parsed: unknown = YAML.parse(raw);
  return toolsFileSchema.parse(parsed ?? {});
}

function toDefinition(tool: z.infer<typeof toolSchema>): ToolDefinition {
  return {
    name: tool.name,
    input_schema: tool.input_schema,
    ...(tool.description ? { description: tool.description } : {}),
  };
}

/**
 * Loads the tool declarations sent with every request. Executing the tools is
 * up to the caller, which answers `tool_use` blocks with tool results.
 */
export function loadToolsConfig(options: {
  configPath: string;
  enabledTools: string[];
  disabledTools: string[];
  logger: Logger;
}): ParsedToolsConfig {
  const sourcePath = resolve(options.configPath);

  if (!existsSync(sourcePath)) {
    options.logger.warn("Tools config file does not exist, requests carry no tools", {
      sourcePath,
    });

    return {
      sourcePath,
      enabledTools: [],
      tools: [],
    };
  }

  const file = parseToolsFile(sourcePath);
  const enabledSet = new Set(options.enabledTools);
  const disabledSet = new Set(options.disabledTools);

  const tools: ToolDefinition[] = [];
  const seen = new Set<string>();

  for (const tool of file.tools) {
    if (!tool.enabled) {
      continue;
    }

    if (enabledSet.size > 0 && !enabledSet.has(tool.name)) {
      continue;
    }

    if (disabledSet.has(tool.name)) {
      continue;
    }

    if (seen.has(tool.name)) {
      options.logger.warn("Duplicate tool declaration, keeping the first one", { name: tool.name });
      continue;
    }

    seen.add(tool.name);
    tools.push(toDefinition(tool));
  }

  const enabledTools = tools.map((tool) => tool.name);

  options.logger.debug("Loaded tools config", {
    sourcePath,
    enabledTools,
  });

  return {
    sourcePath,
    enabledTools,
    tools,
  };
}
