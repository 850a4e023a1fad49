export type ParticipantRole = "customer" | "delivery_partner" | "administrator";

export type BookingStatus = "pending" | "assigned" | "started" | "reached" | "collected" | "delivered" | "cancelled";

export type ChatMessage = Readonly<{
  messageId: string;
  senderId: string;
  senderName: string;
  senderRole: ParticipantRole;
  text: string;
  createdAtMs: number;
  sequence: number;
}>;

export type ServiceError = Readonly<{
  code: string;
  message: string;
  context?: Record<string, unknown>;
}>;

export type ConnectionIndicator = "connecting" | "connected" | "reconnecting" | "disconnected" | "chat_closed";

// Mirrors the server's close codes; 4xxx are application reasons a client must not retry blindly.
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
