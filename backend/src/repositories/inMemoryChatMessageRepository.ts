import fs from "node:fs";
import path from "node:path";

import type { ChatMessage, ChatMessageDraft, ChatMessageRepository } from "../services/messageStore";

type ChatMessageRepoOptions = Readonly<{
  // When set, state is written through to this JSON file and reloaded from it at start-up.
  storeFilePath?: string;
}>;

function isChatMessageLike(value: unknown): value is ChatMessage {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.messageId === "string" &&
    typeof v.bookingId === "string" &&
    typeof v.sequence === "number" &&
    typeof v.senderId === "string" &&
    (v.senderRole === "customer" || v.senderRole === "delivery_partner" || v.senderRole === "administrator") &&
    typeof v.senderName === "string" &&
    typeof v.text === "string" &&
    typeof v.createdAtMs === "number"
  );
}

function cursorKey(bookingId: string, participantId: string): string {
  return `${bookingId}::${participantId}`;
}

export function createInMemoryChatMessageRepository(options: ChatMessageRepoOptions = {}): ChatMessageRepository {
  const storeFilePath = options.storeFilePath;
  const messagesByBooking = new Map<string, ChatMessage[]>();
  const readCursors = new Map<string, number>();

  function load(): void {
    if (!storeFilePath || !fs.existsSync(storeFilePath)) return;
    const raw = fs.readFileSync(storeFilePath, "utf8");
    if (!raw.trim()) return;
    const parsed = JSON.parse(raw) as { version?: unknown; messages?: unknown; readCursors?: unknown };
    if (parsed.version !== 1 || !Array.isArray(parsed.messages)) {
      throw new Error("Invalid chat message store format.");
    }
    for (const candidate of parsed.messages) {
      if (!isChatMessageLike(candidate)) continue;
      const list = messagesByBooking.get(candidate.bookingId) ?? [];
      list.push(candidate);
      messagesByBooking.set(candidate.bookingId, list);
    }
    for (const list of messagesByBooking.values()) {
      list.sort((a, b) => a.sequence - b.sequence);
    }
    if (Array.isArray(parsed.readCursors)) {
      for (const row of parsed.readCursors) {
        if (typeof row !== "object" || row === null) continue;
        const cursor = row as { key?: unknown; sequence?: unknown };
        if (typeof cursor.key !== "string" || typeof cursor.sequence !== "number") continue;
        readCursors.set(cursor.key, cursor.sequence);
      }
    }
  }

  function persist(): void {
    if (!storeFilePath) return;
    fs.mkdirSync(path.dirname(storeFilePath), { recursive: true });
    const payload = {
      version: 1,
      messages: Array.from(messagesByBooking.values()).flat(),
      readCursors: Array.from(readCursors.entries()).map(([key, sequence]) => ({ key, sequence }))
    };
    fs.writeFileSync(storeFilePath, JSON.stringify(payload), "utf8");
  }

  function listFor(bookingId: string): ReadonlyArray<ChatMessage> {
    return messagesByBooking.get(bookingId) ?? [];
  }

  load();

  return {
    async append(draft: ChatMessageDraft): Promise<ChatMessage> {
      const list = messagesByBooking.get(draft.bookingId) ?? [];
      const last = list.length > 0 ? list[list.length - 1] : undefined;
      const message: ChatMessage = {
        ...draft,
        sequence: (last?.sequence ?? 0) + 1,
        createdAtMs: Math.max(draft.createdAtMs, last?.createdAtMs ?? 0)
      };
      list.push(message);
      messagesByBooking.set(draft.bookingId, list);
      try {
        persist();
      } catch (e) {
        // Undo so a failed write never leaves an unsaved message visible.
        list.pop();
        if (list.length === 0) messagesByBooking.delete(draft.bookingId);
        throw e;
      }
      return message;
    },

    async findById(bookingId: string, messageId: string): Promise<ChatMessage | null> {
      return listFor(bookingId).find((m) => m.messageId === messageId) ?? null;
    },

    async listAfterSequence(bookingId: string, afterSequence: number, limit: number): Promise<ReadonlyArray<ChatMessage>> {
      return listFor(bookingId)
        .filter((m) => m.sequence > afterSequence)
        .slice(0, limit);
    },

    async listAfterTimestamp(bookingId: string, afterTimestampMs: number, limit: number): Promise<ReadonlyArray<ChatMessage>> {
      return listFor(bookingId)
        .filter((m) => m.createdAtMs > afterTimestampMs)
        .slice(0, limit);
    },

    async listLatest(bookingId: string, limit: number): Promise<ReadonlyArray<ChatMessage>> {
      const list = listFor(bookingId);
      return list.slice(Math.max(0, list.length - limit));
    },

    async latestSequence(bookingId: string): Promise<number> {
      const list = listFor(bookingId);
      return list.length > 0 ? list[list.length - 1].sequence : 0;
    },

    async getReadCursor(bookingId: string, participantId: string): Promise<number> {
      return readCursors.get(cursorKey(bookingId, participantId)) ?? 0;
    },

    async setReadCursor(bookingId: string, participantId: string, sequence: number): Promise<void> {
      const key = cursorKey(bookingId, participantId);
      const previous = readCursors.get(key);
      readCursors.set(key, sequence);
      try {
        persist();
      } catch (e) {
        if (previous === undefined) readCursors.delete(key);
        else readCursors.set(key, previous);
        throw e;
      }
    },

    async countUnread(bookingId: string, participantId: string, afterSequence: number): Promise<number> {
      return listFor(bookingId).filter((m) => m.sequence > afterSequence && m.senderId !== participantId).length;
    }
  };
}
