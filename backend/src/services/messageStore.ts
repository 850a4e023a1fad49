import { randomUUID } from "node:crypto";

import { createKeyedMutex } from "../realtime/keyedMutex";
import type { Identity, ParticipantRole } from "./authService";
import { isChatActive } from "./bookingStateMachine";
import type { Booking, BookingLookup } from "./bookingService";

export type ErrorCode = "VALIDATION_ERROR" | "FORBIDDEN" | "BOOKING_NOT_FOUND" | "PERSISTENCE_FAILURE" | "INVALID_INPUT";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

export type ChatMessage = Readonly<{
  messageId: string;
  bookingId: string;
  // Strictly increasing per booking, starting at 1. Defines the one order every reader observes.
  sequence: number;
  senderId: string;
  senderRole: ParticipantRole;
  senderName: string;
  text: string;
  createdAtMs: number;
}>;

export type ChatMessageDraft = Omit<ChatMessage, "sequence">;

/**
 * Append-only storage for chat messages. `append` assigns the next sequence for the booking and
 * clamps `createdAtMs` so it never falls behind the booking's previous message.
 */
export type ChatMessageRepository = Readonly<{
  append(draft: ChatMessageDraft): Promise<ChatMessage>;
  findById(bookingId: string, messageId: string): Promise<ChatMessage | null>;
  listAfterSequence(bookingId: string, afterSequence: number, limit: number): Promise<ReadonlyArray<ChatMessage>>;
  listAfterTimestamp(bookingId: string, afterTimestampMs: number, limit: number): Promise<ReadonlyArray<ChatMessage>>;
  listLatest(bookingId: string, limit: number): Promise<ReadonlyArray<ChatMessage>>;
  latestSequence(bookingId: string): Promise<number>;
  getReadCursor(bookingId: string, participantId: string): Promise<number>;
  setReadCursor(bookingId: string, participantId: string, sequence: number): Promise<void>;
  countUnread(bookingId: string, participantId: string, afterSequence: number): Promise<number>;
}>;

export type ListCursor = Readonly<{
  afterMessageId?: string;
  afterTimestampMs?: number;
}>;

export type MessageStoreDeps = Readonly<{
  repo: ChatMessageRepository;
  bookings: BookingLookup;
  nowMs?: () => number;
  maxTextLength?: number;
  generateId?: () => string;
}>;

export type MessageStore = Readonly<{
  maxTextLength: number;
  append(bookingId: string, sender: Identity, text: unknown): Promise<Result<ChatMessage>>;
  listSince(bookingId: string, cursor: ListCursor, limit?: number): Promise<Result<ReadonlyArray<ChatMessage>>>;
  listRecent(bookingId: string, limit: number): Promise<Result<ReadonlyArray<ChatMessage>>>;
  markRead(bookingId: string, participantId: string): Promise<Result<{ readSequence: number }>>;
  countUnread(bookingId: string, participantId: string): Promise<Result<number>>;
}>;

const DEFAULT_MAX_TEXT_LENGTH = 2_000;
const DEFAULT_LIST_LIMIT = 50;
const MAX_LIST_LIMIT = 500;

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

function clampLimit(limit: number | undefined): number {
  if (typeof limit !== "number" || !Number.isFinite(limit)) return DEFAULT_LIST_LIMIT;
  return Math.min(MAX_LIST_LIMIT, Math.max(1, Math.floor(limit)));
}

function isCurrentParticipant(sender: Identity, booking: Booking): boolean {
  if (sender.role === "administrator") return true;
  if (sender.role === "customer") return booking.customerId === sender.participantId;
  return booking.assignedPartnerId === sender.participantId;
}

export function createMessageStore(deps: MessageStoreDeps): MessageStore {
  const repo = deps.repo;
  const bookings = deps.bookings;
  const nowMs = deps.nowMs ?? (() => Date.now());
  const maxTextLength = deps.maxTextLength ?? DEFAULT_MAX_TEXT_LENGTH;
  const generateId = deps.generateId ?? (() => randomUUID());

  if (!Number.isInteger(maxTextLength) || maxTextLength <= 0) {
    throw new Error("messageStore requires a positive integer maxTextLength.");
  }

  const appendLocks = createKeyedMutex();

  async function guard<T>(run: () => Promise<T>): Promise<Result<T>> {
    try {
      return ok(await run());
    } catch (e: unknown) {
      return err("PERSISTENCE_FAILURE", "Message store unavailable.", { reason: errorMessage(e) });
    }
  }

  return {
    maxTextLength,

    async append(bookingId: string, sender: Identity, text: unknown): Promise<Result<ChatMessage>> {
      if (typeof text !== "string") {
        return err("VALIDATION_ERROR", "Message text is required.");
      }
      const trimmed = text.trim();
      if (trimmed.length === 0) {
        return err("VALIDATION_ERROR", "Message text is required.");
      }
      if (trimmed.length > maxTextLength) {
        return err("VALIDATION_ERROR", "Message is too long.", { maxLength: maxTextLength });
      }

      return appendLocks.runExclusive(bookingId, async (): Promise<Result<ChatMessage>> => {
        // Read the booking again for every append; a status change between join and send must stop the write.
        const loaded = await guard(() => bookings.getBooking(bookingId));
        if (!loaded.ok) return loaded;
        const booking = loaded.value;
        if (!booking) {
          return err("BOOKING_NOT_FOUND", "Booking not found.", { bookingId });
        }
        if (!isChatActive(booking.status)) {
          return err("FORBIDDEN", "Chat is not active for this booking.", { status: booking.status });
        }
        if (!isCurrentParticipant(sender, booking)) {
          return err("FORBIDDEN", "You are not a participant of this booking.");
        }

        return guard(() =>
          repo.append({
            messageId: generateId(),
            bookingId,
            senderId: sender.participantId,
            senderRole: sender.role,
            senderName: sender.displayName,
            text: trimmed,
            createdAtMs: nowMs()
          })
        );
      });
    },

    async listSince(bookingId: string, cursor: ListCursor, limit?: number): Promise<Result<ReadonlyArray<ChatMessage>>> {
      const boundedLimit = clampLimit(limit);
      const afterMessageId = typeof cursor.afterMessageId === "string" ? cursor.afterMessageId.trim() : "";

      if (afterMessageId !== "") {
        const anchor = await guard(() => repo.findById(bookingId, afterMessageId));
        if (!anchor.ok) return anchor;
        const found = anchor.value;
        if (!found) {
          return err("INVALID_INPUT", "Unknown message cursor.", { afterMessageId });
        }
        return guard(() => repo.listAfterSequence(bookingId, found.sequence, boundedLimit));
      }

      const afterTimestampMs = cursor.afterTimestampMs;
      if (afterTimestampMs !== undefined) {
        if (!Number.isFinite(afterTimestampMs)) {
          return err("INVALID_INPUT", "Invalid timestamp cursor.");
        }
        return guard(() => repo.listAfterTimestamp(bookingId, afterTimestampMs, boundedLimit));
      }

      return guard(() => repo.listAfterSequence(bookingId, 0, boundedLimit));
    },

    async listRecent(bookingId: string, limit: number): Promise<Result<ReadonlyArray<ChatMessage>>> {
      return guard(() => repo.listLatest(bookingId, clampLimit(limit)));
    },

    async markRead(bookingId: string, participantId: string): Promise<Result<{ readSequence: number }>> {
      return guard(async () => {
        const latest = await repo.latestSequence(bookingId);
        const current = await repo.getReadCursor(bookingId, participantId);
        // Cursors only move forward.
        const readSequence = Math.max(latest, current);
        if (readSequence !== current) {
          await repo.setReadCursor(bookingId, participantId, readSequence);
        }
        return { readSequence };
      });
    },

    async countUnread(bookingId: string, participantId: string): Promise<Result<number>> {
      return guard(async () => {
        const cursor = await repo.getReadCursor(bookingId, participantId);
        return repo.countUnread(bookingId, participantId, cursor);
      });
    }
  };
}
