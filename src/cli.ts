import { randomUUID } from "node:crypto";
import { createInterface } from "node:readline/promises";
import { stdin as input } from "node:process";

import { loadAppConfig } from "./config/env.js";
import { createLogger } from "./lib/logger.js";
import { createChatRuntime, type ChatRuntime } from "./lib/runtime.js";
import type { ChatStreamEvent } from "./types/api.js";

interface CliArgs {
  interactive: boolean;
  model?: string;
  system?: string;
  prompt: string;
}

/** Conversation state shared by every turn of one CLI invocation. */
interface ChatSession {
  threadId?: string;
  model?: string;
  system?: string;
}

const FLAG_VALUES: Record<string, "model" | "system"> = {
  "--model": "model",
  "-m": "model",
  "--system": "system",
  "-s": "system",
};

function parseCliArgs(args: string[]): CliArgs {
  const parsed: CliArgs = { interactive: false, prompt: "" };
  const promptParts: string[] = [];

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? "";
    if (arg === "--interactive" || arg === "-i") {
      parsed.interactive = true;
      continue;
    }

    const key = FLAG_VALUES[arg];
    if (key) {
      const value = args[i + 1]?.trim();
      if (value) {
        parsed[key] = value;
      }
      i += 1;
      continue;
    }

    promptParts.push(arg);
  }

  parsed.prompt = promptParts.join(" ").trim();
  return parsed;
}

async function readStdin(): Promise<string> {
  if (input.isTTY) {
    return "";
  }

  let content = "";
  for await (const chunk of input) {
    content += chunk.toString();
  }

  return content.trim();
}

function renderEvent(event: ChatStreamEvent, debug: boolean): void {
  switch (event.type) {
    case "token":
      process.stdout.write(event.text);
      return;
    case "tool_use":
      process.stderr.write(`\n[TOOL_USE] ${event.id} ${event.name} ${JSON.stringify(event.input)}\n`);
      return;
    case "usage":
      if (debug) {
        process.stderr.write(`\n[USAGE] input=${event.inputTokens} output=${event.outputTokens}\n`);
      }
      return;
    case "debug":
      if (debug) {
        process.stderr.write(`[DEBUG] ${event.message}\n`);
      }
      return;
    case "error":
      process.stderr.write(`\n[ERROR] ${event.code ? `${event.code}: ` : ""}${event.message}\n`);
      return;
    case "done":
      if (event.finishReason === "incomplete") {
        process.stderr.write("\n[INCOMPLETE] stream ended before the message was complete\n");
      } else if (debug && event.stopReason) {
        process.stderr.write(`\n[STOP] ${event.stopReason}\n`);
      }
      return;
    case "session":
      return;
  }
}

async function sendTurn(options: {
  runtime: ChatRuntime;
  session: ChatSession;
  prompt: string;
  debug: boolean;
  source: string;
}): Promise<void> {
  const { session } = options;

  for await (const event of options.runtime.run({
    input: options.prompt,
    metadata: { source: options.source },
    ...(session.threadId ? { threadId: session.threadId } : {}),
    ...(session.model ? { model: session.model } : {}),
    ...(session.system ? { system: session.system } : {}),
  })) {
    if (event.type === "session") {
      session.threadId = event.threadId;
    }
    renderEvent(event, options.debug);
  }

  process.stdout.write("\n");
}

/** Returns false when the REPL should stop. */
function handleCommand(line: string, session: ChatSession): boolean {
  const [command, ...rest] = line.split(/\s+/);
  const argument = rest.join(" ");

  switch (command) {
    case "/exit":
    case "/quit":
      return false;
    case "/thread":
      process.stderr.write(`${session.threadId ?? "(none yet)"}\n`);
      break;
    case "/reset":
      session.threadId = randomUUID();
      process.stderr.write(`threadId reset: ${session.threadId}\n`);
      break;
    case "/model":
      if (argument) {
        session.model = argument;
      }
      process.stderr.write(`model: ${session.model ?? "(default)"}\n`);
      break;
    default:
      process.stderr.write(`Unknown command ${command ?? ""}\n`);
  }

  return true;
}

async function runInteractive(options: {
  runtime: ChatRuntime;
  session: ChatSession;
  debug: boolean;
}): Promise<void> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: true,
  });

  const { session } = options;
  if (!session.threadId) {
    session.threadId = randomUUID();
  }
  process.stderr.write(
    [`REPL started. threadId=${session.threadId}`, "Commands: /exit, /quit, /reset, /thread, /model <id>"].join(
      "\n",
    ) + "\n",
  );

  try {
    while (true) {
      const line = (await rl.question("> ")).trim();
      if (!line) {
        continue;
      }

      if (line.startsWith("/")) {
        if (!handleCommand(line, session)) {
          break;
        }
        continue;
      }

      await sendTurn({
        runtime: options.runtime,
        session,
        prompt: line,
        debug: options.debug,
        source: "cli-repl",
      });
    }
  } finally {
    rl.close();
  }
}

async function run(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const config = loadAppConfig();
  const logger = createLogger(config.debug);
  const runtime = await createChatRuntime(config, logger);

  const threadId = process.env.THREAD_ID?.trim();
  const session: ChatSession = {
    ...(threadId ? { threadId } : {}),
    ...(args.model ? { model: args.model } : {}),
    ...(args.system ? { system: args.system } : {}),
  };

  try {
    if (args.interactive) {
      await runInteractive({ runtime, session, debug: config.debug });
      return;
    }

    const prompt = args.prompt || (await readStdin());
    if (!prompt) {
      console.error('Usage: npm run dev:cli -- [--model <id>] [--system <text>] "your prompt"');
      console.error("       npm run dev:cli -- --interactive");
      process.exitCode = 1;
      return;
    }

    await sendTurn({ runtime, session, prompt, debug: config.debug, source: "cli" });
  } finally {
    await runtime.close();
  }
}

void run();
