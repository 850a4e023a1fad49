import fs from "node:fs";
import path from "node:path";

import { isBookingStatus, type StatusHistoryEntry } from "../services/bookingStateMachine";
import type { Booking, BookingRepository } from "../services/bookingService";

type BookingRepoOptions = Readonly<{
  storeFilePath?: string;
}>;

function isBookingLike(value: unknown): value is Booking {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.bookingId === "string" &&
    typeof v.customerId === "string" &&
    (v.assignedPartnerId === null || typeof v.assignedPartnerId === "string") &&
    isBookingStatus(v.status) &&
    typeof v.pickupAddress === "string" &&
    typeof v.deliveryAddress === "string" &&
    typeof v.createdAtMs === "number" &&
    typeof v.updatedAtMs === "number"
  );
}

function isHistoryEntryLike(value: unknown): value is StatusHistoryEntry {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.bookingId === "string" &&
    isBookingStatus(v.from) &&
    isBookingStatus(v.to) &&
    typeof v.actorId === "string" &&
    typeof v.timestampMs === "number"
  );
}

export function createInMemoryBookingRepository(options: BookingRepoOptions = {}): BookingRepository {
  const storeFilePath = options.storeFilePath;
  const byId = new Map<string, Booking>();
  const historyByBooking = new Map<string, StatusHistoryEntry[]>();

  function load(): void {
    if (!storeFilePath || !fs.existsSync(storeFilePath)) return;
    const raw = fs.readFileSync(storeFilePath, "utf8");
    if (!raw.trim()) return;
    const parsed = JSON.parse(raw) as { version?: unknown; bookings?: unknown; history?: unknown };
    if (parsed.version !== 1 || !Array.isArray(parsed.bookings)) {
      throw new Error("Invalid booking store format.");
    }
    for (const candidate of parsed.bookings) {
      if (!isBookingLike(candidate)) continue;
      byId.set(candidate.bookingId, candidate);
    }
    if (Array.isArray(parsed.history)) {
      for (const candidate of parsed.history) {
        if (!isHistoryEntryLike(candidate)) continue;
        const list = historyByBooking.get(candidate.bookingId) ?? [];
        list.push(candidate);
        historyByBooking.set(candidate.bookingId, list);
      }
    }
  }

  function persist(): void {
    if (!storeFilePath) return;
    fs.mkdirSync(path.dirname(storeFilePath), { recursive: true });
    const payload = {
      version: 1,
      bookings: Array.from(byId.values()),
      history: Array.from(historyByBooking.values()).flat()
    };
    fs.writeFileSync(storeFilePath, JSON.stringify(payload), "utf8");
  }

  load();

  return {
    async getById(bookingId: string): Promise<Booking | null> {
      return byId.get(bookingId) ?? null;
    },

    async save(booking: Booking, entry?: StatusHistoryEntry): Promise<void> {
      const previous = byId.get(booking.bookingId);
      const list = historyByBooking.get(booking.bookingId) ?? [];
      byId.set(booking.bookingId, booking);
      if (entry) {
        list.push(entry);
        historyByBooking.set(booking.bookingId, list);
      }
      try {
        persist();
      } catch (e) {
        // Restore the last persisted state; callers see the save as not having happened.
        if (previous) byId.set(booking.bookingId, previous);
        else byId.delete(booking.bookingId);
        if (entry) {
          list.pop();
          if (list.length === 0) historyByBooking.delete(booking.bookingId);
        }
        throw e;
      }
    },

    async listHistory(bookingId: string): Promise<ReadonlyArray<StatusHistoryEntry>> {
      return [...(historyByBooking.get(bookingId) ?? [])];
    }
  };
}
