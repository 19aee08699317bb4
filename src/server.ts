// Presence Guard - HTTP and WebSocket surface for the UI/voice shell
//
// The shell only ever reads the verdict and forwards utterances:
//   GET  /api/verification  → current snapshot + escalation level
//   POST /api/utterances    → one chat turn through the engine
//   POST /api/observations  → label pushed by an out-of-process classifier
//   ws                      → verification flips and replies as they happen

import express, { type Express, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import type { PushClassifierAdapter } from "./classifier-adapter.js";
import type { GuardEngine } from "./guard-engine.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { acceptTranscript, DEFAULT_MAX_NO_SPEECH_PROBABILITY } from "./transcript-filter.js";
import { isTrustLabel, type ServerMessage, type VerificationSnapshot } from "./types.js";
import { errorMessage } from "./utils.js";

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateGuardServerOptions {
  engine: GuardEngine;
  /** Enables POST /api/observations. */
  pushAdapter?: PushClassifierAdapter;
  logger?: Logger;
  maxNoSpeechProbability?: number;
}

export interface GuardServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Close all WebSocket clients and the HTTP server. */
  close(): Promise<void>;
}

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

function verificationMessage(snapshot: VerificationSnapshot): ServerMessage {
  return { type: "verification", verified: snapshot.verified, lastChanged: snapshot.lastChanged };
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createGuardServer(options: CreateGuardServerOptions): GuardServer {
  const {
    engine,
    pushAdapter,
    logger = createConsoleLogger("Server"),
    maxNoSpeechProbability = DEFAULT_MAX_NO_SPEECH_PROBABILITY,
  } = options;

  const app = express();
  app.use(express.json());
  const httpServer = createServer(app);
  const wss = new WebSocketServer({ server: httpServer });

  const broadcast = (message: ServerMessage): void => {
    for (const client of wss.clients) {
      sendMessage(client, message);
    }
  };

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/api/verification", (_req, res) => {
    const snapshot = engine.getVerification();
    res.json({
      verified: snapshot.verified,
      lastChanged: snapshot.lastChanged,
      escalationLevel: engine.getEscalationLevel(),
    });
  });

  app.post("/api/utterances", (req: Request, res: Response) => {
    const body: unknown = req.body;
    const text = typeof body === "object" && body !== null && "text" in body ? body.text : undefined;
    const noSpeech =
      typeof body === "object" && body !== null && "noSpeechProbability" in body
        ? body.noSpeechProbability
        : undefined;

    if (typeof text !== "string") {
      res.status(400).json({ error: "text must be a string" });
      return;
    }

    const utterance = acceptTranscript(
      { text, noSpeechProbability: typeof noSpeech === "number" ? noSpeech : undefined },
      maxNoSpeechProbability,
    );
    if (utterance === null) {
      res.json({ ignored: true });
      return;
    }

    engine
      .handleUtterance(utterance)
      .then((reply) => {
        broadcast({ type: "reply", reply });
        res.json(reply);
      })
      .catch((err: unknown) => {
        logger.error(`Chat turn failed: ${errorMessage(err)}`);
        res.status(500).json({ error: "Chat turn failed" });
      });
  });

  app.post("/api/observations", (req: Request, res: Response) => {
    if (!pushAdapter) {
      res.status(404).json({ error: "Push observations are not enabled" });
      return;
    }
    const body: unknown = req.body;
    const label = typeof body === "object" && body !== null && "label" in body ? body.label : undefined;
    if (!isTrustLabel(label)) {
      res.status(400).json({ error: "label must be one of trusted, untrusted, no_signal" });
      return;
    }
    pushAdapter.submit(label);
    res.status(202).json({ accepted: true });
  });

  const unsubscribe = engine.onVerificationChange((snapshot) => {
    broadcast(verificationMessage(snapshot));
  });

  wss.on("connection", (ws: WebSocket) => {
    sendMessage(ws, verificationMessage(engine.getVerification()));
  });

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    close(): Promise<void> {
      unsubscribe();
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}
