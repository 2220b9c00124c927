/**
 * Control server: health probes, the JSON control API and the WebSocket observer gateway on one port.
 *
 * GET  /health                liveness
 * GET  /ready                 200 once the discussion loop runs, else 503; counts completed rounds
 * GET  /api/agents | /api/stats | /api/topic | /api/stream_status
 * POST /api/topic             { topic? }
 * POST /api/start_discussion | /api/stop_discussion
 * POST /api/start_stream      { stream_key?, title?, description? }
 * POST /api/stop_stream
 * POST /api/test_audio        { agent_id } | { text, voice? }
 */

import * as http from "http";
import type { WebSocketServer } from "ws";
import type { PersonaRegistry } from "./personas/registry";
import type { TurnScheduler } from "./scheduler/turn-scheduler";
import type { DiscussionLoop } from "./scheduler/discussion-loop";
import type { ISpeechSynthesizer } from "./scheduler/types";
import type { LiveStreamController } from "./egress/controller";
import type { IEgressSink } from "./egress/types";
import type { EventBroadcaster } from "./events/broadcaster";
import { attachWsGateway } from "./events/ws-gateway";
import { ExternalResourceMissingError, StateConflictError } from "./utils/errors";
import { errMessage, logError, logger } from "./logging";

export interface ControlServerDeps {
  registry: PersonaRegistry;
  scheduler: TurnScheduler;
  loop: DiscussionLoop;
  stream: LiveStreamController;
  synthesizer: ISpeechSynthesizer;
  egress: IEgressSink;
  broadcaster: EventBroadcaster;
  defaultVoiceId: string;
}

export interface ControlServer {
  server: http.Server;
  wss: WebSocketServer;
  /** Bound port (useful when listening on 0). */
  port(): number;
  close(): Promise<void>;
}

class BadRequestError extends Error {}

type Body = Map<string, unknown>;

function parseJsonBody(req: http.IncomingMessage): Promise<Body> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      const text = Buffer.concat(chunks).toString("utf8").trim();
      if (!text) {
        resolve(new Map());
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch {
        reject(new BadRequestError("Invalid JSON body"));
        return;
      }
      if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        reject(new BadRequestError("JSON body must be an object"));
        return;
      }
      resolve(new Map<string, unknown>(Object.entries(parsed)));
    });
    req.on("error", reject);
  });
}

/** Optional string field; anything other than a string or absence is a 400. */
function optionalString(body: Body, key: string): string | undefined {
  const v = body.get(key);
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") throw new BadRequestError(`"${key}" must be a string`);
  return v.trim() || undefined;
}

function sendJson(res: http.ServerResponse, status: number, data: unknown): void {
  res.setHeader("Content-Type", "application/json");
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.writeHead(status);
  res.end(JSON.stringify(data));
}

export function createControlServer(deps: ControlServerDeps): ControlServer {
  const { registry, scheduler, loop, stream, synthesizer, egress, broadcaster } = deps;

  async function handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method ?? "";
    const path = new URL(req.url ?? "/", "http://localhost").pathname;

    if (method === "OPTIONS") {
      res.setHeader("Access-Control-Allow-Origin", "*");
      res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
      res.setHeader("Access-Control-Allow-Headers", "Content-Type");
      res.writeHead(204);
      res.end();
      return;
    }

    if (method === "GET") {
      switch (path) {
        case "/health":
        case "/":
          sendJson(res, 200, { ok: true });
          return;
        case "/ready": {
          const ready = loop.isStarted;
          sendJson(res, ready ? 200 : 503, { ok: ready, ready, rounds_completed: loop.rounds });
          return;
        }
        case "/api/agents":
          sendJson(res, 200, { agents: broadcaster.snapshot().agents });
          return;
        case "/api/stats":
          sendJson(res, 200, broadcaster.snapshot().stats);
          return;
        case "/api/topic":
          sendJson(res, 200, { topic: scheduler.getSnapshot().topic });
          return;
        case "/api/stream_status":
          sendJson(res, 200, stream.status());
          return;
      }
    }

    if (method === "POST") {
      const body = await parseJsonBody(req);
      switch (path) {
        case "/api/topic": {
          const topic = scheduler.selectTopic(optionalString(body, "topic"));
          sendJson(res, 200, { success: true, topic });
          return;
        }
        case "/api/start_discussion": {
          if (!loop.enable()) {
            sendJson(res, 200, { success: false, message: "Discussion is already running" });
            return;
          }
          const state = scheduler.getSnapshot();
          broadcaster.publish("discussion_started", { topic: state.topic, round: state.round });
          sendJson(res, 200, { success: true, message: "Discussion started" });
          return;
        }
        case "/api/stop_discussion": {
          const wasEnabled = loop.disable();
          const stopping = scheduler.requestStop();
          sendJson(res, 200, {
            success: true,
            message: stopping ? "Discussion will stop after the current turn" : "Discussion stopped",
            was_active: wasEnabled || stopping,
          });
          return;
        }
        case "/api/start_stream": {
          const status = await stream.start({
            streamKey: optionalString(body, "stream_key"),
            title: optionalString(body, "title"),
            description: optionalString(body, "description"),
          });
          sendJson(res, 200, { success: true, message: "Stream started", status });
          return;
        }
        case "/api/stop_stream": {
          const stopped = await stream.stop();
          sendJson(res, 200, { success: stopped, message: stopped ? "Stream stopped" : "Stream is not running" });
          return;
        }
        case "/api/test_audio": {
          await testAudio(body, res);
          return;
        }
      }
    }

    sendJson(res, 404, { error: "Not found" });
  }

  async function testAudio(body: Body, res: http.ServerResponse): Promise<void> {
    const agentId = optionalString(body, "agent_id");
    let text = optionalString(body, "text");
    let voice = optionalString(body, "voice") ?? deps.defaultVoiceId;
    if (agentId) {
      const persona = registry.get(agentId);
      if (!persona) {
        sendJson(res, 404, { success: false, error: `Unknown agent: ${agentId}` });
        return;
      }
      voice = persona.voice;
      text = text ?? `Hello! I am ${persona.name}, an expert in ${persona.expertise.toLowerCase()}. This is a voice test.`;
    }
    if (!text) throw new BadRequestError('Provide "agent_id" or "text"');

    const artifact = await synthesizer.synthesize(text, voice);
    const result = await egress.emit(artifact, text);
    sendJson(res, 200, {
      success: artifact !== null,
      text,
      voice,
      cached: artifact?.cached ?? false,
      duration_sec: result.durationSec,
      outputs: result.outputs,
    });
  }

  const server = http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      if (err instanceof BadRequestError) {
        sendJson(res, 400, { success: false, error: err.message });
      } else if (err instanceof ExternalResourceMissingError) {
        sendJson(res, 400, { success: false, error: err.message });
      } else if (err instanceof StateConflictError) {
        sendJson(res, 409, { success: false, error: err.message });
      } else {
        logError(logger, err, { event: "CONTROL_REQUEST_FAILED", method: req.method, url: req.url });
        if (!res.headersSent) sendJson(res, 500, { success: false, error: errMessage(err) });
      }
    });
  });
  const wss = attachWsGateway(server, broadcaster);

  return {
    server,
    wss,
    port() {
      const addr = server.address();
      return addr !== null && typeof addr === "object" ? addr.port : 0;
    },
    close() {
      for (const client of wss.clients) client.terminate();
      return new Promise<void>((resolve, reject) => {
        wss.close();
        server.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}

export function startControlServer(deps: ControlServerDeps, port: number): Promise<ControlServer> {
  const control = createControlServer(deps);
  return new Promise((resolve, reject) => {
    control.server.once("error", reject);
    control.server.listen(port, () => {
      control.server.off("error", reject);
      logger.info({ event: "CONTROL_SERVER_STARTED", port: control.port() }, "Control server listening");
      resolve(control);
    });
  });
}
