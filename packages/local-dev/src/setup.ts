/**
 * Interactive Setup for Local Development
 * Prompts for the LLM provider on first run, saves to .env.local
 */

import { createInterface } from "readline";
import { existsSync, readFileSync, writeFileSync } from "fs";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { config as loadDotenv, parse } from "dotenv";
import { DEFAULT_OPENAI_BASE_URL, DEFAULT_OPENAI_MODEL } from "@pump-advisor/functions";

const __dirname = dirname(fileURLToPath(import.meta.url));

// Path to the env file (in repo root)
export const ENV_FILE = resolve(__dirname, "../../../.env.local");

export interface LocalSettings {
  provider?: "bedrock" | "openai";
  modelId?: string;
  apiKey?: string;
  baseUrl?: string;
  awsRegion?: string;
}

/**
 * Read settings saved by a previous setup run
 */
export function readEnvFile(path: string = ENV_FILE): LocalSettings {
  if (!existsSync(path)) {
    return {};
  }

  const values = parse(readFileSync(path, "utf-8"));
  const provider = values.LLM_PROVIDER;
  return {
    provider: provider === "bedrock" || provider === "openai" ? provider : undefined,
    modelId: values.MODEL_ID || undefined,
    apiKey: values.LLM_API_KEY || undefined,
    baseUrl: values.LLM_BASE_URL || undefined,
    awsRegion: values.AWS_REGION || undefined,
  };
}

/**
 * Whether the saved settings are enough to start
 */
export function isComplete(settings: LocalSettings): boolean {
  switch (settings.provider) {
    case "bedrock":
      return Boolean(settings.modelId);
    case "openai":
      return Boolean(settings.apiKey) || isLocalBaseUrl(settings.baseUrl);
    default:
      return false;
  }
}

function isLocalBaseUrl(baseUrl: string | undefined): boolean {
  return baseUrl !== undefined && /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?(\/|$)/.test(baseUrl);
}

export function formatEnvFile(settings: LocalSettings): string {
  const lines: string[] = [
    "# Local Development Configuration",
    "# This file is gitignored - do not commit credentials",
    "",
  ];

  if (settings.provider) {
    lines.push(`LLM_PROVIDER=${settings.provider}`);
  }
  if (settings.modelId) {
    lines.push(`MODEL_ID=${settings.modelId}`);
  }
  if (settings.baseUrl) {
    lines.push(`LLM_BASE_URL=${settings.baseUrl}`);
  }
  if (settings.apiKey) {
    lines.push(`LLM_API_KEY=${settings.apiKey}`);
  }
  if (settings.awsRegion) {
    lines.push(`AWS_REGION=${settings.awsRegion}`);
  }

  lines.push(""); // Trailing newline
  return lines.join("\n");
}

/**
 * Create readline interface for prompts
 */
function createPrompt(): {
  ask: (question: string) => Promise<string>;
  askHidden: (question: string) => Promise<string>;
  close: () => void;
} {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return {
    ask: (question: string) =>
      new Promise((resolve) => {
        rl.question(question, (answer) => resolve(answer.trim()));
      }),
    askHidden: (question: string) =>
      new Promise((resolve) => {
        process.stdout.write(question);
        let input = "";

        const stdin = process.stdin;
        const wasRaw = stdin.isRaw;

        if (stdin.isTTY) {
          stdin.setRawMode(true);
        }
        stdin.resume();
        stdin.setEncoding("utf8");

        const onData = (char: string) => {
          switch (char) {
            case "\n":
            case "\r":
            case "\u0004": // Ctrl+D
              stdin.removeListener("data", onData);
              if (stdin.isTTY) {
                stdin.setRawMode(wasRaw ?? false);
              }
              process.stdout.write("\n");
              resolve(input.trim());
              break;
            case "\u0003": // Ctrl+C
              process.exit();
              break;
            case "\u007F": // Backspace
              if (input.length > 0) {
                input = input.slice(0, -1);
                process.stdout.write("\b \b");
              }
              break;
            default:
              input += char;
              process.stdout.write("*");
          }
        };

        stdin.on("data", onData);
      }),
    close: () => rl.close(),
  };
}

/**
 * Run interactive setup if needed
 */
export async function runSetup(path: string = ENV_FILE): Promise<LocalSettings> {
  const existing = readEnvFile(path);

  if (isComplete(existing)) {
    console.log("Loaded LLM settings from .env.local");
    return existing;
  }

  console.log("\n┌─────────────────────────────────────────┐");
  console.log("│     Local Development Setup             │");
  console.log("└─────────────────────────────────────────┘\n");

  if (!existsSync(path)) {
    console.log("No .env.local found. Let's choose a model provider.\n");
  } else {
    console.log("Some settings are missing. Let's complete the setup.\n");
  }

  const prompt = createPrompt();

  try {
    console.log("─── Model Provider ───");
    console.log("  1) OpenAI-compatible API (Groq, OpenAI, Ollama, ...)");
    console.log("  2) Amazon Bedrock (uses your AWS credentials)\n");

    const choice = await prompt.ask("Provider (1/2): ");
    const settings: LocalSettings = { ...existing };

    if (choice === "2" || choice.toLowerCase().startsWith("b")) {
      settings.provider = "bedrock";
      settings.modelId =
        (await prompt.ask("Bedrock model ID: ")) || existing.modelId;
      settings.awsRegion =
        (await prompt.ask("AWS region (blank for your default): ")) || existing.awsRegion;
    } else {
      settings.provider = "openai";
      settings.baseUrl =
        (await prompt.ask(`Base URL (${DEFAULT_OPENAI_BASE_URL}): `)) || existing.baseUrl;
      settings.modelId =
        (await prompt.ask(`Model (${DEFAULT_OPENAI_MODEL}): `)) || existing.modelId;
      console.log("\n(The API key is stored locally in .env.local and never committed)");
      settings.apiKey = (await prompt.askHidden("API key: ")) || existing.apiKey;
    }

    writeFileSync(path, formatEnvFile(settings));
    console.log(`\nConfiguration saved to .env.local`);
    console.log("You can edit this file directly or delete it to run setup again.\n");

    return settings;
  } finally {
    prompt.close();
  }
}

/**
 * Load .env.local into process.env; variables already set win
 */
export function loadEnvFile(path: string = ENV_FILE): void {
  if (existsSync(path)) {
    loadDotenv({ path });
  }
}

/**
 * Check if running in interactive terminal
 */
export function isInteractive(): boolean {
  return process.stdin.isTTY === true;
}
