import {
  CLOSE_CODES,
  type BookingStatus,
  type ChatMessage,
  type ConnectionIndicator,
  type ParticipantRole,
  type ServiceError
} from "./chat.types";

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

export type ClientSocketHandlers = Readonly<{
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number, reason: string): void;
}>;

export type ClientSocket = Readonly<{
  send(data: string): void;
  close(code: number, reason: string): void;
}>;

export type SocketFactory = (url: string, handlers: ClientSocketHandlers) => ClientSocket;

export type ChatSessionListener = Readonly<{
  onMessages?(messages: ReadonlyArray<ChatMessage>): void;
  onIndicator?(indicator: ConnectionIndicator): void;
  onNotify?(message: ChatMessage): void;
  onScrollToLatest?(): void;
  onReloadRequired?(): void;
  onError?(error: ServiceError): void;
  onBookingStatus?(status: BookingStatus, readOnly: boolean): void;
}>;

export type ChatSessionOptions = Readonly<{
  url: string;
  token: string;
  currentUserId: string;
  socketFactory: SocketFactory;
  reconnectDelayMs?: number;
  maxReconnectAttempts?: number;
  heartbeatIntervalMs?: number;
  listener?: ChatSessionListener;
}>;

export type ChatSessionController = Readonly<{
  start(): void;
  send(text: string): Result<void>;
  markRead(): void;
  retry(): void;
  stop(): void;
  getIndicator(): ConnectionIndicator;
  getMessages(): ReadonlyArray<ChatMessage>;
  isReadOnly(): boolean;
  reconnectAttempts(): number;
}>;

type SocketState = "connecting" | "open" | "closing" | "closed";

const DEFAULT_RECONNECT_DELAY_MS = 3_000;
const DEFAULT_MAX_RECONNECT_ATTEMPTS = 5;
const DEFAULT_HEARTBEAT_INTERVAL_MS = 15_000;

// A join refused for one of these reasons will be refused again until something changes server-side.
const TERMINAL_CLOSE_CODES: ReadonlySet<number> = new Set<number>([
  CLOSE_CODES.POLICY_VIOLATION,
  CLOSE_CODES.REASSIGNED,
  CLOSE_CODES.NOT_A_PARTICIPANT,
  CLOSE_CODES.BOOKING_NOT_FOUND
]);

const CHAT_CLOSED_CODES: ReadonlySet<number> = new Set<number>([CLOSE_CODES.CHAT_CLOSED, CLOSE_CODES.CHAT_NOT_ACTIVE]);

// Reported when a terminal close arrives without an explaining error frame.
function closeError(code: number): ServiceError {
  switch (code) {
    case CLOSE_CODES.REASSIGNED:
      return { code: "REASSIGNED", message: "This booking was reassigned to another partner." };
    case CLOSE_CODES.NOT_A_PARTICIPANT:
      return { code: "NOT_A_PARTICIPANT", message: "You are not a participant of this booking." };
    case CLOSE_CODES.BOOKING_NOT_FOUND:
      return { code: "BOOKING_NOT_FOUND", message: "Booking not found." };
    default:
      return { code: "CONNECTION_CLOSED", message: "The server closed this chat connection." };
  }
}

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: string, message: string): ResultErr {
  return { ok: false, error: { code, message } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isParticipantRole(value: unknown): value is ParticipantRole {
  return value === "customer" || value === "delivery_partner" || value === "administrator";
}

function isBookingStatus(value: unknown): value is BookingStatus {
  return (
    value === "pending" ||
    value === "assigned" ||
    value === "started" ||
    value === "reached" ||
    value === "collected" ||
    value === "delivered" ||
    value === "cancelled"
  );
}

export function parseWireMessage(value: unknown): ChatMessage | null {
  if (!isRecord(value)) return null;
  const messageId = value.message_id;
  const senderId = value.sender_id;
  const senderName = value.sender_name;
  const senderRole = value.sender_role;
  const text = value.message;
  const timestamp = value.timestamp;
  const sequence = value.sequence;
  if (typeof messageId !== "string" || typeof senderId !== "string" || typeof text !== "string") return null;
  if (typeof timestamp !== "string" || typeof sequence !== "number" || !isParticipantRole(senderRole)) return null;
  const createdAtMs = Date.parse(timestamp);
  if (!Number.isFinite(createdAtMs)) return null;
  return {
    messageId,
    senderId,
    senderName: typeof senderName === "string" ? senderName : "",
    senderRole,
    text,
    createdAtMs,
    sequence
  };
}

function parseEnvelope(data: string): { type: string; payload: unknown } | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || typeof parsed.type !== "string") return null;
  return { type: parsed.type, payload: parsed.payload };
}

function errorFromPayload(payload: unknown): ServiceError {
  if (!isRecord(payload)) return { code: "UNKNOWN", message: "Request failed." };
  return {
    code: typeof payload.code === "string" ? payload.code : "UNKNOWN",
    message: typeof payload.message === "string" ? payload.message : "Request failed."
  };
}

/**
 * Participant-side connection lifecycle for one booking chat.
 *
 * An unexpected close schedules a reconnect after a fixed delay, up to a bounded number of attempts; after
 * that the indicator settles on "disconnected" and `onReloadRequired` fires. A chat closed by the server
 * (close code or `chat_closed` frame) is terminal and never retried.
 */
export function createChatSessionController(options: ChatSessionOptions): ChatSessionController {
  const reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
  const maxReconnectAttempts = options.maxReconnectAttempts ?? DEFAULT_MAX_RECONNECT_ATTEMPTS;
  const heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
  const listener = options.listener ?? {};

  if (!Number.isFinite(reconnectDelayMs) || reconnectDelayMs < 0) {
    throw new Error("chatSession requires a non-negative reconnectDelayMs.");
  }
  if (!Number.isInteger(maxReconnectAttempts) || maxReconnectAttempts < 0) {
    throw new Error("chatSession requires a non-negative integer maxReconnectAttempts.");
  }

  let indicator: ConnectionIndicator = "disconnected";
  let socket: ClientSocket | null = null;
  let socketState: SocketState = "closed";
  let generation = 0;
  let attempts = 0;
  let joined = false;
  let readOnly = false;
  let stopped = true;
  let chatClosed = false;
  let errorReceived = false;
  let cancelReconnect: (() => void) | null = null;
  let cancelHeartbeat: (() => void) | null = null;
  const messagesById = new Map<string, ChatMessage>();
  let ordered: ReadonlyArray<ChatMessage> = [];

  function setIndicator(next: ConnectionIndicator): void {
    if (indicator === next) return;
    indicator = next;
    listener.onIndicator?.(next);
  }

  function clearTimers(): void {
    if (cancelReconnect) {
      cancelReconnect();
      cancelReconnect = null;
    }
    if (cancelHeartbeat) {
      cancelHeartbeat();
      cancelHeartbeat = null;
    }
  }

  function transmit(type: string, payload: unknown): boolean {
    if (!socket || socketState !== "open") return false;
    socket.send(JSON.stringify({ type, payload }));
    return true;
  }

  // Returns the messages that were not seen before; reconnect replays overlap with what is already shown.
  function merge(incoming: ReadonlyArray<ChatMessage>): ReadonlyArray<ChatMessage> {
    const added: ChatMessage[] = [];
    for (const message of incoming) {
      if (messagesById.has(message.messageId)) continue;
      messagesById.set(message.messageId, message);
      added.push(message);
    }
    if (added.length > 0) {
      ordered = Array.from(messagesById.values()).sort((a, b) => a.sequence - b.sequence);
      listener.onMessages?.(ordered);
    }
    return added;
  }

  function closeChat(): void {
    chatClosed = true;
    joined = false;
    clearTimers();
    setIndicator("chat_closed");
  }

  function handleFrame(data: string): void {
    const envelope = parseEnvelope(data);
    if (!envelope) return;
    const payload = envelope.payload;

    switch (envelope.type) {
      case "chat_joined": {
        joined = true;
        attempts = 0;
        readOnly = isRecord(payload) && payload.read_only === true;
        setIndicator("connected");
        const status = isRecord(payload) ? payload.status : undefined;
        if (isBookingStatus(status)) listener.onBookingStatus?.(status, readOnly);
        return;
      }
      case "chat_replay": {
        const raw = isRecord(payload) && Array.isArray(payload.messages) ? payload.messages : [];
        const replayed: ChatMessage[] = [];
        for (const item of raw) {
          const message = parseWireMessage(item);
          if (message) replayed.push(message);
        }
        merge(replayed);
        listener.onScrollToLatest?.();
        return;
      }
      case "chat_message": {
        const message = parseWireMessage(payload);
        if (!message) return;
        const added = merge([message]);
        if (added.length === 0) return;
        listener.onScrollToLatest?.();
        if (message.senderId !== options.currentUserId) listener.onNotify?.(message);
        return;
      }
      case "booking_status": {
        const status = isRecord(payload) ? payload.status : undefined;
        if (isBookingStatus(status)) listener.onBookingStatus?.(status, readOnly);
        return;
      }
      case "chat_closed": {
        const status = isRecord(payload) ? payload.status : undefined;
        closeChat();
        if (isBookingStatus(status)) listener.onBookingStatus?.(status, true);
        return;
      }
      case "message_rejected":
        listener.onError?.(errorFromPayload(payload));
        return;
      case "error":
        errorReceived = true;
        listener.onError?.(errorFromPayload(payload));
        return;
      default:
        return;
    }
  }

  function handleClose(code: number): void {
    socket = null;
    socketState = "closed";
    joined = false;
    clearTimers();
    if (stopped) return;

    if (chatClosed || CHAT_CLOSED_CODES.has(code)) {
      closeChat();
      return;
    }
    if (TERMINAL_CLOSE_CODES.has(code)) {
      setIndicator("disconnected");
      if (!errorReceived) listener.onError?.(closeError(code));
      return;
    }
    if (attempts >= maxReconnectAttempts) {
      setIndicator("disconnected");
      listener.onReloadRequired?.();
      return;
    }

    attempts += 1;
    setIndicator("reconnecting");
    const handle = setTimeout(() => {
      cancelReconnect = null;
      connect("reconnecting");
    }, reconnectDelayMs);
    cancelReconnect = () => clearTimeout(handle);
  }

  function connect(phase: "connecting" | "reconnecting"): void {
    if (stopped) return;
    generation += 1;
    const current = generation;
    errorReceived = false;
    setIndicator(phase);
    socketState = "connecting";

    // Events from a socket this controller has already given up on are ignored.
    socket = options.socketFactory(options.url, {
      onOpen() {
        if (current !== generation) return;
        socketState = "open";
        transmit("auth", { jwt: options.token });
        const handle = setInterval(() => {
          transmit("heartbeat", {});
        }, heartbeatIntervalMs);
        cancelHeartbeat = () => clearInterval(handle);
      },
      onMessage(data: string) {
        if (current !== generation) return;
        handleFrame(data);
      },
      onClose(code: number) {
        if (current !== generation) return;
        handleClose(code);
      }
    });
  }

  return {
    start(): void {
      if (!stopped) return;
      stopped = false;
      chatClosed = false;
      attempts = 0;
      connect("connecting");
    },

    send(text: string): Result<void> {
      const trimmed = typeof text === "string" ? text.trim() : "";
      if (trimmed.length === 0) {
        return err("VALIDATION_ERROR", "Message text is required.");
      }
      if (chatClosed) {
        return err("CHAT_CLOSED", "Chat is closed for this booking.");
      }
      if (!joined) {
        return err("CONNECTION_LOST", "Not connected.");
      }
      if (readOnly) {
        return err("FORBIDDEN", "This chat is read-only.");
      }
      if (!transmit("message", { message: trimmed })) {
        return err("CONNECTION_LOST", "Not connected.");
      }
      return ok(undefined);
    },

    markRead(): void {
      if (joined) transmit("mark_read", {});
    },

    retry(): void {
      if (stopped || chatClosed || socket) return;
      clearTimers();
      attempts = 0;
      connect("connecting");
    },

    stop(): void {
      if (stopped) return;
      stopped = true;
      joined = false;
      clearTimers();
      generation += 1;
      const closing = socket;
      socket = null;
      if (closing) {
        socketState = "closing";
        closing.close(CLOSE_CODES.NORMAL, "Client closed");
      }
      socketState = "closed";
      if (!chatClosed) setIndicator("disconnected");
    },

    getIndicator(): ConnectionIndicator {
      return indicator;
    },

    getMessages(): ReadonlyArray<ChatMessage> {
      return ordered;
    },

    isReadOnly(): boolean {
      return readOnly;
    },

    reconnectAttempts(): number {
      return attempts;
    }
  };
}
