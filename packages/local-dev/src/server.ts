#!/usr/bin/env node
/**
 * Local Development Server
 * Serves the analyze API over plain HTTP for the web dev server.
 *
 * Uses the SAME pipeline as the Lambda handler - only the transport differs.
 *
 * On first run, prompts for the LLM provider and saves to .env.local
 *
 * Usage:
 *   npm run dev:server      # From repo root
 */

import { createServer } from "http";
import { createCompletionClient, loadConfig } from "@pump-advisor/functions";
import { createRequestListener } from "./app.js";
import { isInteractive, loadEnvFile, runSetup } from "./setup.js";

const DEFAULT_PORT = 8787;

async function startServer(): Promise<void> {
  if (isInteractive()) {
    await runSetup();
  }
  loadEnvFile();

  const config = loadConfig();
  const client = createCompletionClient(config.llm);
  const listener = createRequestListener({ config, client });
  const port = Number(process.env.PORT) || DEFAULT_PORT;

  const server = createServer((req, res) => {
    listener(req, res).catch((error: unknown) => {
      console.error("Request failed:", error);
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "application/json" });
      }
      res.end(JSON.stringify({ error: "Internal error" }));
    });
  });

  server.listen(port, () => {
    console.log(`\n───────────────────────────────────────────`);
    console.log(`Local Development Server started!`);
    console.log(`API: http://localhost:${port}`);
    console.log(`Model: ${config.llm.provider} / ${client.model}`);
    console.log(`───────────────────────────────────────────`);
    console.log(`\nOpen http://localhost:5173 in your browser`);
    console.log(`(Run 'npm run dev:web' in another terminal if not already running)\n`);
    console.log(`To reconfigure, delete .env.local and restart`);
  });
}

startServer().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
