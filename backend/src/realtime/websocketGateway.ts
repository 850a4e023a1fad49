import type { IncomingMessage } from "node:http";
import type { WebSocket, WebSocketServer } from "ws";

import type { AuthService } from "../services/authService";
import type { MessageStore } from "../services/messageStore";
import { CLOSE_CODES, closeCodeForJoinError, type ChatConnection, type ChatGateway, type ChatSocket } from "./chatGateway";

// Auth, gateway and store errors pass through with their own codes.
export type ServiceError = {
  code: string;
  message: string;
  context?: Record<string, unknown>;
};

export type MessageEnvelope = Readonly<{
  type: string;
  payload?: unknown;
}>;

export type AuthHandshakePayload = Readonly<{
  jwt: string;
}>;

export type WebsocketGatewayDeps = Readonly<{
  wss: WebSocketServer;
  authService: Pick<AuthService, "verifyToken">;
  chatGateway: ChatGateway;
  messageStore: Pick<MessageStore, "markRead">;

  maxIncomingPayloadBytes?: number;
  heartbeatTimeoutMs?: number;
  nowMs?: () => number;
}>;

export type WebsocketGateway = Readonly<{
  close(): Promise<void>;
}>;

type SocketSession = {
  readonly bookingId: string;
  readonly openedAtMs: number;
  connection: ChatConnection | null;
  authenticating: boolean;
  closed: boolean;
  lastHeartbeatMs: number;
  // Frames from one socket are handled one at a time, in arrival order.
  queue: Promise<void>;
};

const DEFAULT_MAX_INCOMING_PAYLOAD_BYTES = 16 * 1024;
const DEFAULT_HEARTBEAT_TIMEOUT_MS = 45_000;
const CHAT_PATH = /^\/ws\/chat\/([^/]+)\/?$/;

function makeError(code: string, message: string, context?: Record<string, unknown>): ServiceError {
  return context ? { code, message, context } : { code, message };
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function safeJsonParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function isEnvelope(value: unknown): value is MessageEnvelope {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  return typeof v.type === "string";
}

function isAuthPayload(value: unknown): value is AuthHandshakePayload {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  return typeof v.jwt === "string";
}

function messageTextOf(payload: unknown): unknown {
  if (typeof payload !== "object" || payload === null) return undefined;
  const v = payload as Record<string, unknown>;
  return v.message;
}

export function bookingIdFromRequest(req: IncomingMessage): string | null {
  let pathname: string;
  try {
    pathname = new URL(req.url ?? "/", "http://localhost").pathname;
  } catch {
    return null;
  }
  const match = CHAT_PATH.exec(pathname);
  if (!match) return null;
  try {
    const bookingId = decodeURIComponent(match[1]).trim();
    return bookingId === "" ? null : bookingId;
  } catch {
    return null;
  }
}

function send(ws: WebSocket, type: string, payload: unknown): void {
  if (ws.readyState !== ws.OPEN) return;
  ws.send(JSON.stringify({ type, payload }));
}

function sendError(ws: WebSocket, error: ServiceError): void {
  send(ws, "error", error);
}

function closeWith(ws: WebSocket, code: number, reason: string): void {
  if (ws.readyState === ws.CLOSING || ws.readyState === ws.CLOSED) return;
  ws.close(code, reason);
}

function closePolicy(ws: WebSocket): void {
  closeWith(ws, CLOSE_CODES.POLICY_VIOLATION, "Policy violation");
}

function toChatSocket(ws: WebSocket): ChatSocket {
  return {
    send(data: string): Promise<void> {
      return new Promise<void>((resolve, reject) => {
        if (ws.readyState !== ws.OPEN) {
          reject(new Error("Socket is not open."));
          return;
        }
        ws.send(data, (error?: Error) => (error ? reject(error) : resolve()));
      });
    },
    close(code: number, reason: string): void {
      closeWith(ws, code, reason);
    }
  };
}

export function createWebsocketGateway(deps: WebsocketGatewayDeps): WebsocketGateway {
  const maxIncomingPayloadBytes = deps.maxIncomingPayloadBytes ?? DEFAULT_MAX_INCOMING_PAYLOAD_BYTES;
  const heartbeatTimeoutMs = deps.heartbeatTimeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT_MS;
  const nowMs = deps.nowMs ?? (() => Date.now());

  if (!Number.isFinite(maxIncomingPayloadBytes) || maxIncomingPayloadBytes <= 0) {
    throw new Error("websocketGateway requires a positive maxIncomingPayloadBytes.");
  }
  if (!Number.isFinite(heartbeatTimeoutMs) || heartbeatTimeoutMs <= 0) {
    throw new Error("websocketGateway requires a positive heartbeatTimeoutMs.");
  }

  const chatGateway = deps.chatGateway;
  const sessions = new Map<WebSocket, SocketSession>();

  function cleanup(ws: WebSocket): void {
    const session = sessions.get(ws);
    sessions.delete(ws);
    if (!session) return;
    session.closed = true;
    if (session.connection) chatGateway.leave(session.connection);
  }

  async function handleAuth(ws: WebSocket, session: SocketSession, payload: unknown): Promise<void> {
    if (!isAuthPayload(payload)) {
      sendError(ws, makeError("UNAUTHORIZED_ACTION", "Invalid auth payload."));
      closePolicy(ws);
      return;
    }

    const verified = deps.authService.verifyToken(payload.jwt);
    if (!verified.ok) {
      sendError(ws, verified.error);
      closePolicy(ws);
      return;
    }

    session.authenticating = true;
    const joined = await chatGateway.join(session.bookingId, verified.value, toChatSocket(ws));
    session.authenticating = false;
    if (!joined.ok) {
      sendError(ws, joined.error);
      closeWith(ws, closeCodeForJoinError(joined.error.code), joined.error.code);
      return;
    }
    if (session.closed) {
      // The socket went away while the join was in flight.
      chatGateway.leave(joined.value);
      return;
    }
    session.connection = joined.value;
    session.lastHeartbeatMs = nowMs();
  }

  async function handleEnvelope(ws: WebSocket, session: SocketSession, envelope: MessageEnvelope): Promise<void> {
    if (envelope.type === "auth") {
      if (session.connection || session.authenticating) {
        sendError(ws, makeError("UNAUTHORIZED_ACTION", "Already authenticated."));
        closePolicy(ws);
        return;
      }
      await handleAuth(ws, session, envelope.payload);
      return;
    }

    const connection = session.connection;
    if (!connection) {
      sendError(ws, makeError("INVALID_SESSION", "Authentication required."));
      closePolicy(ws);
      return;
    }

    if (envelope.type === "heartbeat") {
      session.lastHeartbeatMs = nowMs();
      send(ws, "heartbeat_ok", { nowMs: nowMs() });
      return;
    }

    if (envelope.type === "message") {
      const result = await chatGateway.send(connection, messageTextOf(envelope.payload));
      if (!result.ok) {
        send(ws, "message_rejected", { code: result.error.code, message: result.error.message });
      }
      return;
    }

    if (envelope.type === "mark_read") {
      const result = await deps.messageStore.markRead(connection.bookingId, connection.identity.participantId);
      if (!result.ok) {
        sendError(ws, result.error);
        return;
      }
      send(ws, "read_ok", { read_sequence: result.value.readSequence });
      return;
    }

    sendError(ws, makeError("UNAUTHORIZED_ACTION", "Unknown message type.", { type: envelope.type }));
    closePolicy(ws);
  }

  deps.wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    const bookingId = bookingIdFromRequest(req);
    if (!bookingId) {
      sendError(ws, makeError("BOOKING_NOT_FOUND", "Unknown chat endpoint."));
      closeWith(ws, CLOSE_CODES.BOOKING_NOT_FOUND, "BOOKING_NOT_FOUND");
      return;
    }

    const session: SocketSession = {
      bookingId,
      openedAtMs: nowMs(),
      connection: null,
      authenticating: false,
      closed: false,
      lastHeartbeatMs: nowMs(),
      queue: Promise.resolve()
    };
    sessions.set(ws, session);

    ws.on("close", () => cleanup(ws));
    ws.on("error", (e: Error) => {
      console.warn(`[Courierline] Chat socket error on booking ${bookingId}: ${e.message}`);
      cleanup(ws);
    });

    ws.on("message", (data: Buffer | ArrayBuffer | Buffer[]) => {
      const buffer = Array.isArray(data)
        ? Buffer.concat(data)
        : Buffer.isBuffer(data)
          ? data
          : Buffer.from(data);
      if (buffer.byteLength > maxIncomingPayloadBytes) {
        sendError(ws, makeError("VALIDATION_ERROR", "Payload too large.", { maxBytes: maxIncomingPayloadBytes }));
        closePolicy(ws);
        return;
      }

      const parsed = safeJsonParse(buffer.toString("utf8"));
      if (!parsed.ok || !isEnvelope(parsed.value)) {
        sendError(ws, makeError("UNAUTHORIZED_ACTION", "Invalid message envelope."));
        closePolicy(ws);
        return;
      }

      const envelope = parsed.value;
      session.queue = session.queue
        .then(() => handleEnvelope(ws, session, envelope))
        .catch((e: unknown) => {
          console.error(`[Courierline] Failed to handle "${envelope.type}" frame on booking ${bookingId}: ${errorMessage(e)}`);
          sendError(ws, makeError("PERSISTENCE_FAILURE", "Request failed."));
        });
    });
  });

  const heartbeatTimer = setInterval(() => {
    const now = nowMs();
    for (const [ws, session] of sessions) {
      if (!session.connection) {
        if (!session.authenticating && now - session.openedAtMs > heartbeatTimeoutMs) {
          sendError(ws, makeError("INVALID_SESSION", "Authentication timeout."));
          closePolicy(ws);
        }
        continue;
      }
      if (now - session.lastHeartbeatMs > heartbeatTimeoutMs) {
        // A silent client lost its link; it is expected to reconnect.
        sendError(ws, makeError("CONNECTION_LOST", "Heartbeat timeout."));
        closeWith(ws, CLOSE_CODES.CONNECTION_LOST, "CONNECTION_LOST");
      }
    }
  }, Math.min(heartbeatTimeoutMs, 5_000));

  return {
    async close(): Promise<void> {
      clearInterval(heartbeatTimer);
      await chatGateway.close();
      for (const ws of sessions.keys()) {
        closeWith(ws, CLOSE_CODES.GOING_AWAY, "Server shutting down");
      }
      await new Promise<void>((resolve) => deps.wss.close(() => resolve()));
    }
  };
}
