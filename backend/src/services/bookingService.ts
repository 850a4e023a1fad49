import { randomUUID } from "node:crypto";

import { createKeyedMutex } from "../realtime/keyedMutex";
import type { Identity } from "./authService";
import {
  applyTransition,
  isBookingStatus,
  isChatActive,
  type BookingStatus,
  type StatusHistoryEntry
} from "./bookingStateMachine";

export type ErrorCode =
  | "BOOKING_NOT_FOUND"
  | "INVALID_TRANSITION"
  | "INVALID_INPUT"
  | "UNAUTHORIZED_ACTION"
  | "PERSISTENCE_FAILURE";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

export type Booking = Readonly<{
  bookingId: string;
  customerId: string;
  // Non-null for every status except "pending" and a "cancelled" reached straight from "pending".
  assignedPartnerId: string | null;
  status: BookingStatus;
  pickupAddress: string;
  deliveryAddress: string;
  customerNotes?: string;
  cancellationReason?: string;
  createdAtMs: number;
  updatedAtMs: number;
}>;

export type CreateBookingInput = Readonly<{
  pickupAddress: string;
  deliveryAddress: string;
  customerNotes?: string;
}>;

export type BookingRepository = Readonly<{
  getById(bookingId: string): Promise<Booking | null>;
  // Writes the booking and, when given, its history entry as one unit.
  save(booking: Booking, entry?: StatusHistoryEntry): Promise<void>;
  listHistory(bookingId: string): Promise<ReadonlyArray<StatusHistoryEntry>>;
}>;

export type BookingLookup = Readonly<{
  getBooking(bookingId: string): Promise<Booking | null>;
}>;

export type BookingEventListener = Readonly<{
  onStatusTransition?(bookingId: string, status: BookingStatus, entry: StatusHistoryEntry): Promise<unknown> | void;
  onPartnerReassigned?(bookingId: string, previousPartnerId: string, nextPartnerId: string): Promise<unknown> | void;
}>;

export type BookingServiceDeps = Readonly<{
  repo: BookingRepository;
  nowMs?: () => number;
  generateId?: () => string;
}>;

export type BookingService = Readonly<{
  createBooking(actor: Identity, input: CreateBookingInput): Promise<Result<Booking>>;
  assignPartner(actor: Identity, bookingId: string, partnerId: string): Promise<Result<Booking>>;
  updateStatus(actor: Identity, bookingId: string, target: unknown, note?: string): Promise<Result<Booking>>;
  cancel(actor: Identity, bookingId: string, reason?: string): Promise<Result<Booking>>;
  getBookingFor(actor: Identity, bookingId: string): Promise<Result<Booking>>;
  listStatusHistory(actor: Identity, bookingId: string): Promise<Result<ReadonlyArray<StatusHistoryEntry>>>;
  getBooking(bookingId: string): Promise<Booking | null>;
  subscribe(listener: BookingEventListener): () => void;
}>;

const MAX_ADDRESS_LENGTH = 500;
const MAX_NOTE_LENGTH = 1_000;

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

function normalizeOptionalText(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function canAccessBooking(actor: Identity, booking: Booking): boolean {
  if (actor.role === "administrator") return true;
  if (actor.role === "customer") return booking.customerId === actor.participantId;
  return booking.assignedPartnerId !== null && booking.assignedPartnerId === actor.participantId;
}

function authorizeStatusChange(actor: Identity, booking: Booking, target: BookingStatus): Result<void> {
  if (actor.role === "administrator") return ok(undefined);
  if (actor.role === "customer") {
    if (booking.customerId !== actor.participantId || target !== "cancelled") {
      return err("UNAUTHORIZED_ACTION", "You cannot update this booking status.");
    }
    return ok(undefined);
  }
  if (booking.assignedPartnerId !== actor.participantId || target === "cancelled" || target === "assigned") {
    return err("UNAUTHORIZED_ACTION", "You cannot update this booking status.");
  }
  return ok(undefined);
}

export function createBookingService(deps: BookingServiceDeps): BookingService {
  const repo = deps.repo;
  const nowMs = deps.nowMs ?? (() => Date.now());
  const generateId = deps.generateId ?? (() => randomUUID());
  const locks = createKeyedMutex();
  const listeners = new Set<BookingEventListener>();

  async function notify(run: (listener: BookingEventListener) => Promise<unknown> | void): Promise<void> {
    for (const listener of listeners) {
      try {
        await run(listener);
      } catch (e: unknown) {
        // Listeners react to a change that is already committed; they must not undo it.
        console.error(`[Courierline] Booking listener failed: ${errorMessage(e)}`);
      }
    }
  }

  async function load(bookingId: string): Promise<Result<Booking>> {
    if (!isNonEmptyString(bookingId)) {
      return err("BOOKING_NOT_FOUND", "Booking not found.");
    }
    try {
      const booking = await repo.getById(bookingId.trim());
      if (!booking) return err("BOOKING_NOT_FOUND", "Booking not found.", { bookingId });
      return ok(booking);
    } catch (e: unknown) {
      return err("PERSISTENCE_FAILURE", "Booking store unavailable.", { reason: errorMessage(e) });
    }
  }

  async function persist(booking: Booking, entry?: StatusHistoryEntry): Promise<Result<void>> {
    try {
      await repo.save(booking, entry);
      return ok(undefined);
    } catch (e: unknown) {
      return err("PERSISTENCE_FAILURE", "Booking store unavailable.", { reason: errorMessage(e) });
    }
  }

  async function transition(
    actor: Identity,
    bookingId: string,
    target: BookingStatus,
    note: string | undefined
  ): Promise<Result<Booking>> {
    return locks.runExclusive(bookingId, async (): Promise<Result<Booking>> => {
      const loaded = await load(bookingId);
      if (!loaded.ok) return loaded;
      const booking = loaded.value;

      const allowed = authorizeStatusChange(actor, booking, target);
      if (!allowed.ok) return allowed;

      if (target === "assigned" && booking.status === "pending") {
        return err("INVALID_INPUT", "Assign a delivery partner to move a booking to assigned.");
      }

      const now = nowMs();
      const applied = applyTransition({
        bookingId: booking.bookingId,
        current: booking.status,
        target,
        actorId: actor.participantId,
        note,
        timestampMs: now
      });
      if (!applied.ok) return applied;
      const outcome = applied.value;
      if (!outcome.changed) return ok(booking);
      const entry = outcome.entry;

      const next: Booking = {
        ...booking,
        status: outcome.status,
        ...(target === "cancelled" && note ? { cancellationReason: note } : {}),
        updatedAtMs: now
      };
      const saved = await persist(next, entry);
      if (!saved.ok) return saved;

      await notify((listener) => listener.onStatusTransition?.(next.bookingId, next.status, entry));
      return ok(next);
    });
  }

  return {
    async createBooking(actor: Identity, input: CreateBookingInput): Promise<Result<Booking>> {
      if (actor.role !== "customer") {
        return err("UNAUTHORIZED_ACTION", "Only customers can create bookings.");
      }
      if (typeof input !== "object" || input === null) {
        return err("INVALID_INPUT", "Invalid booking.");
      }
      if (!isNonEmptyString(input.pickupAddress) || !isNonEmptyString(input.deliveryAddress)) {
        return err("INVALID_INPUT", "Pickup and delivery addresses are required.");
      }
      const pickupAddress = input.pickupAddress.trim();
      const deliveryAddress = input.deliveryAddress.trim();
      const customerNotes = normalizeOptionalText(input.customerNotes);
      if (pickupAddress.length > MAX_ADDRESS_LENGTH || deliveryAddress.length > MAX_ADDRESS_LENGTH) {
        return err("INVALID_INPUT", "Address is too long.", { maxLength: MAX_ADDRESS_LENGTH });
      }
      if (customerNotes && customerNotes.length > MAX_NOTE_LENGTH) {
        return err("INVALID_INPUT", "Notes are too long.", { maxLength: MAX_NOTE_LENGTH });
      }

      const now = nowMs();
      const booking: Booking = {
        bookingId: generateId(),
        customerId: actor.participantId,
        assignedPartnerId: null,
        status: "pending",
        pickupAddress,
        deliveryAddress,
        ...(customerNotes ? { customerNotes } : {}),
        createdAtMs: now,
        updatedAtMs: now
      };
      const saved = await persist(booking);
      if (!saved.ok) return saved;
      return ok(booking);
    },

    async assignPartner(actor: Identity, bookingId: string, partnerId: string): Promise<Result<Booking>> {
      if (actor.role !== "administrator") {
        return err("UNAUTHORIZED_ACTION", "Only administrators can assign delivery partners.");
      }
      if (!isNonEmptyString(partnerId)) {
        return err("INVALID_INPUT", "A delivery partner is required.");
      }
      const nextPartnerId = partnerId.trim();

      return locks.runExclusive(bookingId, async (): Promise<Result<Booking>> => {
        const loaded = await load(bookingId);
        if (!loaded.ok) return loaded;
        const booking = loaded.value;
        const now = nowMs();

        if (booking.status === "pending") {
          const applied = applyTransition({
            bookingId: booking.bookingId,
            current: booking.status,
            target: "assigned",
            actorId: actor.participantId,
            timestampMs: now
          });
          if (!applied.ok) return applied;
          const outcome = applied.value;
          const entry = outcome.changed ? outcome.entry : undefined;
          const next: Booking = { ...booking, status: outcome.status, assignedPartnerId: nextPartnerId, updatedAtMs: now };
          const saved = await persist(next, entry);
          if (!saved.ok) return saved;
          if (entry) {
            await notify((listener) => listener.onStatusTransition?.(next.bookingId, next.status, entry));
          }
          return ok(next);
        }

        if (!isChatActive(booking.status)) {
          return err("INVALID_TRANSITION", "Booking can no longer be assigned.", {
            bookingId: booking.bookingId,
            from: booking.status,
            to: "assigned"
          });
        }

        const previousPartnerId = booking.assignedPartnerId;
        if (previousPartnerId === nextPartnerId) return ok(booking);

        const next: Booking = { ...booking, assignedPartnerId: nextPartnerId, updatedAtMs: now };
        const saved = await persist(next);
        if (!saved.ok) return saved;
        if (previousPartnerId !== null) {
          await notify((listener) => listener.onPartnerReassigned?.(next.bookingId, previousPartnerId, nextPartnerId));
        }
        return ok(next);
      });
    },

    async updateStatus(actor: Identity, bookingId: string, target: unknown, note?: string): Promise<Result<Booking>> {
      if (!isBookingStatus(target)) {
        return err("INVALID_INPUT", "Invalid status.", { status: target });
      }
      const normalizedNote = normalizeOptionalText(note);
      if (normalizedNote && normalizedNote.length > MAX_NOTE_LENGTH) {
        return err("INVALID_INPUT", "Note is too long.", { maxLength: MAX_NOTE_LENGTH });
      }
      return transition(actor, bookingId, target, normalizedNote);
    },

    async cancel(actor: Identity, bookingId: string, reason?: string): Promise<Result<Booking>> {
      const normalizedReason = normalizeOptionalText(reason);
      if (normalizedReason && normalizedReason.length > MAX_NOTE_LENGTH) {
        return err("INVALID_INPUT", "Cancellation reason is too long.", { maxLength: MAX_NOTE_LENGTH });
      }
      return transition(actor, bookingId, "cancelled", normalizedReason);
    },

    async getBookingFor(actor: Identity, bookingId: string): Promise<Result<Booking>> {
      const loaded = await load(bookingId);
      if (!loaded.ok) return loaded;
      if (!canAccessBooking(actor, loaded.value)) {
        return err("UNAUTHORIZED_ACTION", "Access denied.");
      }
      return loaded;
    },

    async listStatusHistory(actor: Identity, bookingId: string): Promise<Result<ReadonlyArray<StatusHistoryEntry>>> {
      const loaded = await load(bookingId);
      if (!loaded.ok) return loaded;
      if (!canAccessBooking(actor, loaded.value)) {
        return err("UNAUTHORIZED_ACTION", "Access denied.");
      }
      try {
        return ok(await repo.listHistory(loaded.value.bookingId));
      } catch (e: unknown) {
        return err("PERSISTENCE_FAILURE", "Booking store unavailable.", { reason: errorMessage(e) });
      }
    },

    async getBooking(bookingId: string): Promise<Booking | null> {
      return repo.getById(bookingId);
    },

    subscribe(listener: BookingEventListener): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    }
  };
}
