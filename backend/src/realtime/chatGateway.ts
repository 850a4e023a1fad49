import { randomUUID } from "node:crypto";

import type { Identity } from "../services/authService";
import { isChatActive, type BookingStatus } from "../services/bookingStateMachine";
import type { Booking, BookingLookup } from "../services/bookingService";
import type { ChatMessage, MessageStore } from "../services/messageStore";
import { createKeyedMutex } from "./keyedMutex";

export type ErrorCode =
  | "NOT_A_PARTICIPANT"
  | "CHAT_NOT_ACTIVE"
  | "BOOKING_NOT_FOUND"
  | "REASSIGNED"
  | "CHAT_CLOSED"
  | "CONNECTION_LOST"
  | "FORBIDDEN"
  | "VALIDATION_ERROR"
  | "PERSISTENCE_FAILURE"
  | "INVALID_INPUT";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

export const CLOSE_CODES = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  POLICY_VIOLATION: 1008,
  CONNECTION_LOST: 1011,
  CHAT_CLOSED: 4001,
  REASSIGNED: 4002,
  NOT_A_PARTICIPANT: 4003,
  CHAT_NOT_ACTIVE: 4004,
  BOOKING_NOT_FOUND: 4404
} as const;

/**
 * Transport-neutral view of one client socket. `send` settles once the frame has been handed to the
 * network (or rejects when it cannot be); `close` must not throw for an already closed socket.
 */
export type ChatSocket = Readonly<{
  send(data: string): Promise<void>;
  close(code: number, reason: string): void;
}>;

export type ConnectionState = "connecting" | "open" | "closing" | "closed";

export type ChatConnection = Readonly<{
  connectionId: string;
  bookingId: string;
  identity: Identity;
  readOnly: boolean;
}>;

export type AdminCapability = "observe" | "participate";

export type WireChatMessage = Readonly<{
  message_id: string;
  sender_id: string;
  sender_name: string;
  sender_role: string;
  message: string;
  timestamp: string;
  sequence: number;
}>;

export type ChatGatewayDeps = Readonly<{
  bookings: BookingLookup;
  messages: Pick<MessageStore, "append" | "listRecent">;
  replayLimit?: number;
  adminCapability?: AdminCapability;
  sendTimeoutMs?: number;
  generateId?: () => string;
}>;

export type ChatGateway = Readonly<{
  join(bookingId: string, identity: Identity, socket: ChatSocket): Promise<Result<ChatConnection>>;
  send(connection: ChatConnection, text: unknown): Promise<Result<ChatMessage>>;
  leave(connection: ChatConnection): void;
  onStatusTransition(bookingId: string, status: BookingStatus): Promise<void>;
  onPartnerReassigned(bookingId: string, previousPartnerId: string): Promise<void>;
  connectionState(connection: ChatConnection): ConnectionState;
  connectionCount(bookingId: string): number;
  close(): Promise<void>;
}>;

type ConnectionRecord = {
  readonly handle: ChatConnection;
  readonly socket: ChatSocket;
  state: ConnectionState;
  // Frames for one socket are written strictly in order; each socket has its own queue.
  outbox: Promise<void>;
};

const DEFAULT_REPLAY_LIMIT = 50;
const DEFAULT_SEND_TIMEOUT_MS = 10_000;

const CONNECTION_TRANSITIONS: Readonly<Record<ConnectionState, ReadonlyArray<ConnectionState>>> = {
  connecting: ["open", "closed"],
  open: ["closing", "closed"],
  closing: ["closed"],
  closed: []
};

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function frame(type: string, payload: unknown): string {
  return JSON.stringify({ type, payload });
}

function isBookingParticipant(identity: Identity, booking: Booking): boolean {
  if (identity.role === "customer") return booking.customerId === identity.participantId;
  if (identity.role === "delivery_partner") return booking.assignedPartnerId === identity.participantId;
  return false;
}

function withTimeout(task: Promise<void>, timeoutMs: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const handle = setTimeout(() => reject(new Error(`Delivery timed out after ${timeoutMs}ms.`)), timeoutMs);
    task.then(
      () => {
        clearTimeout(handle);
        resolve();
      },
      (e: unknown) => {
        clearTimeout(handle);
        reject(e);
      }
    );
  });
}

export function toWireMessage(message: ChatMessage): WireChatMessage {
  return {
    message_id: message.messageId,
    sender_id: message.senderId,
    sender_name: message.senderName,
    sender_role: message.senderRole,
    message: message.text,
    timestamp: new Date(message.createdAtMs).toISOString(),
    sequence: message.sequence
  };
}

/** Close code a client sees when its join attempt is refused. */
export function closeCodeForJoinError(code: ErrorCode): number {
  switch (code) {
    case "NOT_A_PARTICIPANT":
      return CLOSE_CODES.NOT_A_PARTICIPANT;
    case "CHAT_NOT_ACTIVE":
      return CLOSE_CODES.CHAT_NOT_ACTIVE;
    case "BOOKING_NOT_FOUND":
      return CLOSE_CODES.BOOKING_NOT_FOUND;
    case "PERSISTENCE_FAILURE":
      return CLOSE_CODES.CONNECTION_LOST;
    default:
      return CLOSE_CODES.POLICY_VIOLATION;
  }
}

/**
 * Per-booking connection registry. Joins, sends, evictions and broadcasts for one booking run inside that
 * booking's critical section, so a message is either part of a new connection's replay or broadcast to it,
 * never both and never neither.
 */
export function createChatGateway(deps: ChatGatewayDeps): ChatGateway {
  const replayLimit = deps.replayLimit ?? DEFAULT_REPLAY_LIMIT;
  const adminCapability = deps.adminCapability ?? "observe";
  const sendTimeoutMs = deps.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
  const generateId = deps.generateId ?? (() => randomUUID());

  if (!Number.isInteger(replayLimit) || replayLimit <= 0) {
    throw new Error("chatGateway requires a positive integer replayLimit.");
  }
  if (!Number.isFinite(sendTimeoutMs) || sendTimeoutMs <= 0) {
    throw new Error("chatGateway requires a positive sendTimeoutMs.");
  }
  if (adminCapability !== "observe" && adminCapability !== "participate") {
    throw new Error("chatGateway requires adminCapability to be observe or participate.");
  }

  const channelLocks = createKeyedMutex();
  const channels = new Map<string, Set<ConnectionRecord>>();
  const records = new Map<string, ConnectionRecord>();

  function advance(record: ConnectionRecord, next: ConnectionState): boolean {
    if (!CONNECTION_TRANSITIONS[record.state].includes(next)) return false;
    record.state = next;
    return true;
  }

  function unregister(record: ConnectionRecord): void {
    const bookingId = record.handle.bookingId;
    const channel = channels.get(bookingId);
    if (channel) {
      channel.delete(record);
      if (channel.size === 0) channels.delete(bookingId);
    }
  }

  function retire(record: ConnectionRecord): void {
    unregister(record);
    advance(record, "closed");
    records.delete(record.handle.connectionId);
  }

  function closeSocket(record: ConnectionRecord, code: number, reason: string): void {
    try {
      record.socket.close(code, reason);
    } catch (e: unknown) {
      console.warn(`[Courierline] Failed to close chat connection ${record.handle.connectionId}: ${errorMessage(e)}`);
    }
  }

  function drop(record: ConnectionRecord, e: unknown): void {
    if (record.state === "closed") return;
    console.warn(
      `[Courierline] CONNECTION_LOST for chat connection ${record.handle.connectionId} on booking ${record.handle.bookingId}: ${errorMessage(e)}`
    );
    retire(record);
    closeSocket(record, CLOSE_CODES.CONNECTION_LOST, "CONNECTION_LOST");
  }

  function deliver(record: ConnectionRecord, data: string): void {
    record.outbox = record.outbox
      .then(() => (record.state === "closed" ? undefined : withTimeout(record.socket.send(data), sendTimeoutMs)))
      .catch((e: unknown) => drop(record, e));
  }

  function broadcast(bookingId: string, data: string): void {
    const channel = channels.get(bookingId);
    if (!channel) return;
    for (const record of channel) {
      if (record.state === "open") deliver(record, data);
    }
  }

  function evict(record: ConnectionRecord, data: string, code: number, reason: string): void {
    if (!advance(record, "closing")) return;
    unregister(record);
    deliver(record, data);
    record.outbox = record.outbox.then(() => {
      if (record.state === "closed") return;
      retire(record);
      closeSocket(record, code, reason);
    });
  }

  return {
    async join(bookingId: string, identity: Identity, socket: ChatSocket): Promise<Result<ChatConnection>> {
      return channelLocks.runExclusive(bookingId, async (): Promise<Result<ChatConnection>> => {
        let booking: Booking | null;
        try {
          booking = await deps.bookings.getBooking(bookingId);
        } catch (e: unknown) {
          return err("PERSISTENCE_FAILURE", "Booking store unavailable.", { reason: errorMessage(e) });
        }
        if (!booking) {
          return err("BOOKING_NOT_FOUND", "Booking not found.", { bookingId });
        }

        const isAdministrator = identity.role === "administrator";
        if (!isAdministrator && !isBookingParticipant(identity, booking)) {
          return err("NOT_A_PARTICIPANT", "You are not a participant of this booking.", { bookingId });
        }
        const active = isChatActive(booking.status);
        if (!isAdministrator && !active) {
          return err("CHAT_NOT_ACTIVE", "Chat is not active for this booking.", { bookingId, status: booking.status });
        }

        const replay = await deps.messages.listRecent(bookingId, replayLimit);
        if (!replay.ok) return replay;

        const handle: ChatConnection = {
          connectionId: generateId(),
          bookingId,
          identity,
          readOnly: isAdministrator && adminCapability === "observe"
        };
        const record: ConnectionRecord = { handle, socket, state: "connecting", outbox: Promise.resolve() };
        records.set(handle.connectionId, record);
        const channel = channels.get(bookingId) ?? new Set<ConnectionRecord>();
        channel.add(record);
        channels.set(bookingId, channel);
        advance(record, "open");

        deliver(
          record,
          frame("chat_joined", { booking_id: bookingId, status: booking.status, read_only: handle.readOnly || !active })
        );
        deliver(record, frame("chat_replay", { messages: replay.value.map(toWireMessage) }));
        return ok(handle);
      });
    },

    async send(connection: ChatConnection, text: unknown): Promise<Result<ChatMessage>> {
      const record = records.get(connection.connectionId);
      if (!record || record.state !== "open") {
        return err("CONNECTION_LOST", "Connection is no longer open.");
      }
      if (record.handle.readOnly) {
        return err("FORBIDDEN", "Administrators observe this chat read-only.");
      }

      const bookingId = record.handle.bookingId;
      return channelLocks.runExclusive(bookingId, async (): Promise<Result<ChatMessage>> => {
        // An eviction may have run while this send waited for the lock.
        if (record.state !== "open") {
          return err("CONNECTION_LOST", "Connection is no longer open.");
        }
        const appended = await deps.messages.append(bookingId, record.handle.identity, text);
        if (!appended.ok) return appended;
        broadcast(bookingId, frame("chat_message", toWireMessage(appended.value)));
        return ok(appended.value);
      });
    },

    leave(connection: ChatConnection): void {
      const record = records.get(connection.connectionId);
      if (!record) return;
      retire(record);
    },

    async onStatusTransition(bookingId: string, status: BookingStatus): Promise<void> {
      await channelLocks.runExclusive(bookingId, async () => {
        const channel = channels.get(bookingId);
        if (!channel) return;
        if (isChatActive(status)) {
          broadcast(bookingId, frame("booking_status", { booking_id: bookingId, status }));
          return;
        }
        const closed = frame("chat_closed", { booking_id: bookingId, status });
        for (const record of [...channel]) {
          evict(record, closed, CLOSE_CODES.CHAT_CLOSED, "CHAT_CLOSED");
        }
      });
    },

    async onPartnerReassigned(bookingId: string, previousPartnerId: string): Promise<void> {
      await channelLocks.runExclusive(bookingId, async () => {
        const channel = channels.get(bookingId);
        if (!channel) return;
        const notice = frame("error", { code: "REASSIGNED", message: "This booking was reassigned to another partner." });
        for (const record of [...channel]) {
          const identity = record.handle.identity;
          if (identity.role !== "delivery_partner" || identity.participantId !== previousPartnerId) continue;
          evict(record, notice, CLOSE_CODES.REASSIGNED, "REASSIGNED");
        }
      });
    },

    connectionState(connection: ChatConnection): ConnectionState {
      return records.get(connection.connectionId)?.state ?? "closed";
    },

    connectionCount(bookingId: string): number {
      return channels.get(bookingId)?.size ?? 0;
    },

    async close(): Promise<void> {
      const pending: Promise<void>[] = [];
      for (const record of [...records.values()]) {
        if (!advance(record, "closing")) continue;
        unregister(record);
        record.outbox = record.outbox.then(() => {
          if (record.state === "closed") return;
          retire(record);
          closeSocket(record, CLOSE_CODES.GOING_AWAY, "Server shutting down");
        });
        pending.push(record.outbox);
      }
      await Promise.all(pending);
    }
  };
}
