import type { Pool } from "pg";

import { isParticipantRole } from "../services/authService";
import type { ChatMessage, ChatMessageDraft, ChatMessageRepository } from "../services/messageStore";

const MESSAGE_COLUMNS =
  "message_id, booking_id, sequence, sender_id, sender_role, sender_name, text, created_at_ms";

function asString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function asNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return Number.NaN;
}

function parseMessage(row: Record<string, unknown>): ChatMessage | null {
  const messageId = asString(row.message_id);
  const bookingId = asString(row.booking_id);
  const sequence = asNumber(row.sequence);
  const senderId = asString(row.sender_id);
  const senderRole = row.sender_role;
  const senderName = asString(row.sender_name);
  const text = asString(row.text);
  const createdAtMs = asNumber(row.created_at_ms);

  if (!messageId || !bookingId || !senderId || !text) return null;
  if (!Number.isFinite(sequence) || !Number.isFinite(createdAtMs)) return null;
  if (!isParticipantRole(senderRole)) return null;

  return { messageId, bookingId, sequence, senderId, senderRole, senderName, text, createdAtMs };
}

function parseRows(rows: ReadonlyArray<unknown>): ReadonlyArray<ChatMessage> {
  const out: ChatMessage[] = [];
  for (const row of rows) {
    const msg = parseMessage(row as Record<string, unknown>);
    if (msg) out.push(msg);
  }
  return out;
}

export function createPostgresChatMessageRepository(pool: Pool): ChatMessageRepository {
  return {
    async append(draft: ChatMessageDraft): Promise<ChatMessage> {
      // Sequence and clamped timestamp are derived from the booking's latest row in the same statement;
      // the (booking_id, sequence) unique constraint rejects a concurrent writer that raced past the app lock.
      const res = await pool.query(
        `INSERT INTO chat_messages (${MESSAGE_COLUMNS})
         SELECT $1, $2, COALESCE(MAX(sequence), 0) + 1, $3, $4, $5, $6, GREATEST($7::bigint, COALESCE(MAX(created_at_ms), 0))
         FROM chat_messages
         WHERE booking_id = $2
         RETURNING ${MESSAGE_COLUMNS}`,
        [draft.messageId, draft.bookingId, draft.senderId, draft.senderRole, draft.senderName, draft.text, draft.createdAtMs]
      );
      const saved = res.rows.length > 0 ? parseMessage(res.rows[0] as Record<string, unknown>) : null;
      if (!saved) {
        throw new Error("Inserted chat message could not be read back.");
      }
      return saved;
    },

    async findById(bookingId: string, messageId: string): Promise<ChatMessage | null> {
      const res = await pool.query(
        `SELECT ${MESSAGE_COLUMNS} FROM chat_messages WHERE booking_id = $1 AND message_id = $2`,
        [bookingId, messageId]
      );
      return res.rows.length > 0 ? parseMessage(res.rows[0] as Record<string, unknown>) : null;
    },

    async listAfterSequence(bookingId: string, afterSequence: number, limit: number): Promise<ReadonlyArray<ChatMessage>> {
      const res = await pool.query(
        `SELECT ${MESSAGE_COLUMNS} FROM chat_messages
         WHERE booking_id = $1 AND sequence > $2
         ORDER BY sequence ASC
         LIMIT $3`,
        [bookingId, afterSequence, limit]
      );
      return parseRows(res.rows);
    },

    async listAfterTimestamp(bookingId: string, afterTimestampMs: number, limit: number): Promise<ReadonlyArray<ChatMessage>> {
      const res = await pool.query(
        `SELECT ${MESSAGE_COLUMNS} FROM chat_messages
         WHERE booking_id = $1 AND created_at_ms > $2
         ORDER BY sequence ASC
         LIMIT $3`,
        [bookingId, afterTimestampMs, limit]
      );
      return parseRows(res.rows);
    },

    async listLatest(bookingId: string, limit: number): Promise<ReadonlyArray<ChatMessage>> {
      const res = await pool.query(
        `SELECT ${MESSAGE_COLUMNS} FROM (
           SELECT ${MESSAGE_COLUMNS} FROM chat_messages
           WHERE booking_id = $1
           ORDER BY sequence DESC
           LIMIT $2
         ) latest
         ORDER BY sequence ASC`,
        [bookingId, limit]
      );
      return parseRows(res.rows);
    },

    async latestSequence(bookingId: string): Promise<number> {
      const res = await pool.query("SELECT COALESCE(MAX(sequence), 0) AS latest FROM chat_messages WHERE booking_id = $1", [
        bookingId
      ]);
      const latest = res.rows.length > 0 ? asNumber((res.rows[0] as Record<string, unknown>).latest) : 0;
      return Number.isFinite(latest) ? latest : 0;
    },

    async getReadCursor(bookingId: string, participantId: string): Promise<number> {
      const res = await pool.query(
        "SELECT read_sequence FROM chat_read_cursors WHERE booking_id = $1 AND participant_id = $2",
        [bookingId, participantId]
      );
      if (res.rows.length === 0) return 0;
      const value = asNumber((res.rows[0] as Record<string, unknown>).read_sequence);
      return Number.isFinite(value) ? value : 0;
    },

    async setReadCursor(bookingId: string, participantId: string, sequence: number): Promise<void> {
      await pool.query(
        `INSERT INTO chat_read_cursors (booking_id, participant_id, read_sequence)
         VALUES ($1, $2, $3)
         ON CONFLICT (booking_id, participant_id)
         DO UPDATE SET read_sequence = GREATEST(chat_read_cursors.read_sequence, EXCLUDED.read_sequence)`,
        [bookingId, participantId, sequence]
      );
    },

    async countUnread(bookingId: string, participantId: string, afterSequence: number): Promise<number> {
      const res = await pool.query(
        `SELECT COUNT(*) AS unread FROM chat_messages
         WHERE booking_id = $1 AND sequence > $2 AND sender_id <> $3`,
        [bookingId, afterSequence, participantId]
      );
      const unread = res.rows.length > 0 ? asNumber((res.rows[0] as Record<string, unknown>).unread) : 0;
      return Number.isFinite(unread) ? unread : 0;
    }
  };
}
