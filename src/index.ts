// Presence Guard - Entry point
// Wires the engine to OpenAI and the shell server, then starts sensing.

import "dotenv/config";
import OpenAI from "openai";
import { PushClassifierAdapter } from "./classifier-adapter.js";
import { loadGuardConfigFromEnv, loadObservationMaxAgeFromEnv } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { GuardEngine } from "./guard-engine.js";
import { OpenAIResponseGenerator } from "./response-generator.js";
import type { OpenAIChatClient } from "./response-generator.js";
import { createGuardServer } from "./server.js";
import type { GuardConfig } from "./types.js";
import { errorMessage } from "./utils.js";

export const APP_NAME = "Presence Guard";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

const port = parseInt(process.env.PORT || "3000", 10);

// ─── Validate configuration ─────────────────────────────────────────────────────

const openaiKey = process.env.OPENAI_API_KEY;
if (!openaiKey) {
  logFatal("OPENAI_API_KEY is not set. Add it to your .env file.");
  process.exit(1);
}

let config: GuardConfig;
try {
  config = loadGuardConfigFromEnv(process.env);
} catch (err) {
  logFatal(err instanceof ConfigurationError ? err.message : `Could not load configuration: ${errorMessage(err)}`);
  process.exit(1);
}

let observationMaxAge: number;
try {
  observationMaxAge = loadObservationMaxAgeFromEnv(config.cadenceSeconds, process.env);
} catch (err) {
  logFatal(errorMessage(err));
  process.exit(1);
}

logInit(
  `Config: window=${config.windowSeconds}s cadence=${config.cadenceSeconds}s ` +
    `threshold=${config.threshold} aggregation=${config.aggregation} tiers=${config.policies.tiers.length}`,
);

// ─── Initialize components ──────────────────────────────────────────────────────

logInit("Creating OpenAI client...");
const openaiClient = new OpenAI({ apiKey: openaiKey });

const responseGenerator = new OpenAIResponseGenerator(openaiClient as unknown as OpenAIChatClient, {
  model: process.env.OPENAI_MODEL || undefined,
});

logInit("Initializing push classifier adapter...");
const pushAdapter = new PushClassifierAdapter(observationMaxAge);

logInit("Initializing GuardEngine...");
const engine = new GuardEngine(config, { adapter: pushAdapter, responseGenerator });

const server = createGuardServer({ engine, pushAdapter });

// ─── Shutdown ───────────────────────────────────────────────────────────────────

async function shutdown(signal: string): Promise<void> {
  logInit(`${signal} received, shutting down`);
  const result = await engine.stop();
  logInit(`Sensing loop: ${result}`);
  await server.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logFatal(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    });
  });
}

// ─── Start ──────────────────────────────────────────────────────────────────────

server
  .listen(port)
  .then(() => {
    engine.start();
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);
    logInit("Pipeline: classifier → trust window → verification → escalation → OpenAI");
  })
  .catch((err: unknown) => {
    logFatal(`Server failed to start: ${errorMessage(err)}`);
    process.exit(1);
  });
