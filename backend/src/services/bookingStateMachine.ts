export type BookingStatus = "pending" | "assigned" | "started" | "reached" | "collected" | "delivered" | "cancelled";

export type ErrorCode = "INVALID_TRANSITION";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

export type StatusHistoryEntry = Readonly<{
  bookingId: string;
  from: BookingStatus;
  to: BookingStatus;
  actorId: string;
  note?: string;
  timestampMs: number;
}>;

export type TransitionInput = Readonly<{
  bookingId: string;
  current: BookingStatus;
  target: BookingStatus;
  actorId: string;
  note?: string;
  timestampMs: number;
}>;

export type TransitionOutcome =
  | Readonly<{ changed: false; status: BookingStatus }>
  | Readonly<{ changed: true; status: BookingStatus; entry: StatusHistoryEntry }>;

export const BOOKING_STATUSES: ReadonlyArray<BookingStatus> = [
  "pending",
  "assigned",
  "started",
  "reached",
  "collected",
  "delivered",
  "cancelled"
];

// Single forward path with one side branch into "cancelled". Terminal states have no successors.
const TRANSITIONS: Readonly<Record<BookingStatus, ReadonlyArray<BookingStatus>>> = {
  pending: ["assigned", "cancelled"],
  assigned: ["started", "cancelled"],
  started: ["reached"],
  reached: ["collected"],
  collected: ["delivered"],
  delivered: [],
  cancelled: []
};

const CHAT_ACTIVE_STATUSES: ReadonlySet<BookingStatus> = new Set(["assigned", "started", "reached", "collected"]);
const CANCELLABLE_STATUSES: ReadonlySet<BookingStatus> = new Set(["pending", "assigned"]);

export function isBookingStatus(value: unknown): value is BookingStatus {
  return typeof value === "string" && (BOOKING_STATUSES as ReadonlyArray<string>).includes(value);
}

export function isChatActive(status: BookingStatus): boolean {
  return CHAT_ACTIVE_STATUSES.has(status);
}

export function isCancellable(status: BookingStatus): boolean {
  return CANCELLABLE_STATUSES.has(status);
}

export function isTerminal(status: BookingStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function nextValidStatuses(status: BookingStatus): ReadonlySet<BookingStatus> {
  return new Set(TRANSITIONS[status]);
}

/**
 * Validates a requested status change and produces the history entry for it.
 *
 * Re-sending the status a booking is already in is a no-op rather than an error, so duplicate
 * status-update requests from flaky clients are absorbed.
 */
export function applyTransition(input: TransitionInput): Result<TransitionOutcome> {
  if (input.target === input.current) {
    return { ok: true, value: { changed: false, status: input.current } };
  }

  if (!nextValidStatuses(input.current).has(input.target)) {
    return {
      ok: false,
      error: {
        code: "INVALID_TRANSITION",
        message: `Cannot move booking from ${input.current} to ${input.target}.`,
        context: { bookingId: input.bookingId, from: input.current, to: input.target }
      }
    };
  }

  const entry: StatusHistoryEntry = {
    bookingId: input.bookingId,
    from: input.current,
    to: input.target,
    actorId: input.actorId,
    ...(input.note ? { note: input.note } : {}),
    timestampMs: input.timestampMs
  };
  return { ok: true, value: { changed: true, status: input.target, entry } };
}
