/**
 * Observer gateway: WebSocket viewers attached to the control server.
 * On join a viewer gets `connected` with a snapshot; `{ "type": "request_update" }` returns `update`.
 * Every published event is forwarded as `{ event, data }`.
 */

import type * as http from "http";
import WebSocket, { WebSocketServer } from "ws";
import type { EventBroadcaster } from "./broadcaster";
import type { EventEnvelope } from "./types";
import { errMessage, logger } from "../logging";

export interface WsGatewayOptions {
  /** Upgrade path; defaults to "/ws". */
  path?: string;
}

function send(ws: WebSocket, envelope: EventEnvelope): void {
  if (ws.readyState !== WebSocket.OPEN) throw new Error("socket not open");
  ws.send(JSON.stringify(envelope));
}

function isUpdateRequest(raw: WebSocket.RawData): boolean {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.toString());
  } catch {
    return false;
  }
  return typeof parsed === "object" && parsed !== null && "type" in parsed && parsed.type === "request_update";
}

export function attachWsGateway(server: http.Server, broadcaster: EventBroadcaster, options: WsGatewayOptions = {}): WebSocketServer {
  const wss = new WebSocketServer({ server, path: options.path ?? "/ws" });

  wss.on("connection", (ws) => {
    logger.info({ event: "OBSERVER_CONNECTED", observers: broadcaster.observerCount + 1 }, "Observer connected");
    const unsubscribe = broadcaster.subscribe((envelope) => send(ws, envelope));
    send(ws, { event: "connected", data: broadcaster.snapshot() });

    ws.on("message", (raw) => {
      if (!isUpdateRequest(raw)) return;
      try {
        send(ws, { event: "update", data: broadcaster.snapshot() });
      } catch (err) {
        logger.warn({ event: "OBSERVER_SEND_FAILED", err: errMessage(err) }, "Failed to send update");
      }
    });
    ws.on("close", () => {
      unsubscribe();
      logger.info({ event: "OBSERVER_DISCONNECTED", observers: broadcaster.observerCount }, "Observer disconnected");
    });
    ws.on("error", (err) => {
      unsubscribe();
      logger.warn({ event: "OBSERVER_ERROR", err: err.message }, "Observer socket error");
    });
  });

  return wss;
}
