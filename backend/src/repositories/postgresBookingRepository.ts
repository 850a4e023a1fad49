import type { Pool } from "pg";

import { isBookingStatus, type StatusHistoryEntry } from "../services/bookingStateMachine";
import type { Booking, BookingRepository } from "../services/bookingService";

function asString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function asOptionalString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function asNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return Number.NaN;
}

function parseBooking(row: Record<string, unknown>): Booking | null {
  const bookingId = asString(row.booking_id);
  const customerId = asString(row.customer_id);
  const assignedRaw = row.assigned_partner_id;
  const status = row.status;
  const createdAtMs = asNumber(row.created_at_ms);
  const updatedAtMs = asNumber(row.updated_at_ms);
  if (!bookingId || !customerId || !isBookingStatus(status)) return null;
  if (!Number.isFinite(createdAtMs) || !Number.isFinite(updatedAtMs)) return null;

  const customerNotes = asOptionalString(row.customer_notes);
  const cancellationReason = asOptionalString(row.cancellation_reason);
  return {
    bookingId,
    customerId,
    assignedPartnerId: typeof assignedRaw === "string" && assignedRaw !== "" ? assignedRaw : null,
    status,
    pickupAddress: asString(row.pickup_address),
    deliveryAddress: asString(row.delivery_address),
    ...(customerNotes ? { customerNotes } : {}),
    ...(cancellationReason ? { cancellationReason } : {}),
    createdAtMs,
    updatedAtMs
  };
}

function parseHistoryEntry(row: Record<string, unknown>): StatusHistoryEntry | null {
  const bookingId = asString(row.booking_id);
  const from = row.from_status;
  const to = row.to_status;
  const actorId = asString(row.actor_id);
  const timestampMs = asNumber(row.timestamp_ms);
  if (!bookingId || !actorId || !isBookingStatus(from) || !isBookingStatus(to) || !Number.isFinite(timestampMs)) {
    return null;
  }
  const note = asOptionalString(row.note);
  return { bookingId, from, to, actorId, ...(note ? { note } : {}), timestampMs };
}

export function createPostgresBookingRepository(pool: Pool): BookingRepository {
  return {
    async getById(bookingId: string): Promise<Booking | null> {
      const res = await pool.query(
        `SELECT booking_id, customer_id, assigned_partner_id, status, pickup_address, delivery_address,
                customer_notes, cancellation_reason, created_at_ms, updated_at_ms
         FROM bookings
         WHERE booking_id = $1`,
        [bookingId]
      );
      return res.rows.length > 0 ? parseBooking(res.rows[0] as Record<string, unknown>) : null;
    },

    async save(booking: Booking, entry?: StatusHistoryEntry): Promise<void> {
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        await client.query(
          `INSERT INTO bookings (
            booking_id, customer_id, assigned_partner_id, status, pickup_address, delivery_address,
            customer_notes, cancellation_reason, created_at_ms, updated_at_ms
          ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
          ON CONFLICT (booking_id) DO UPDATE SET
            assigned_partner_id = EXCLUDED.assigned_partner_id,
            status = EXCLUDED.status,
            pickup_address = EXCLUDED.pickup_address,
            delivery_address = EXCLUDED.delivery_address,
            customer_notes = EXCLUDED.customer_notes,
            cancellation_reason = EXCLUDED.cancellation_reason,
            updated_at_ms = EXCLUDED.updated_at_ms`,
          [
            booking.bookingId,
            booking.customerId,
            booking.assignedPartnerId,
            booking.status,
            booking.pickupAddress,
            booking.deliveryAddress,
            booking.customerNotes ?? null,
            booking.cancellationReason ?? null,
            booking.createdAtMs,
            booking.updatedAtMs
          ]
        );
        if (entry) {
          await client.query(
            `INSERT INTO booking_status_history (booking_id, from_status, to_status, actor_id, note, timestamp_ms)
             VALUES ($1, $2, $3, $4, $5, $6)`,
            [entry.bookingId, entry.from, entry.to, entry.actorId, entry.note ?? null, entry.timestampMs]
          );
        }
        await client.query("COMMIT");
      } catch (e) {
        await client.query("ROLLBACK");
        throw e;
      } finally {
        client.release();
      }
    },

    async listHistory(bookingId: string): Promise<ReadonlyArray<StatusHistoryEntry>> {
      const res = await pool.query(
        `SELECT booking_id, from_status, to_status, actor_id, note, timestamp_ms
         FROM booking_status_history
         WHERE booking_id = $1
         ORDER BY id ASC`,
        [bookingId]
      );
      const out: StatusHistoryEntry[] = [];
      for (const row of res.rows) {
        const entry = parseHistoryEntry(row as Record<string, unknown>);
        if (entry) out.push(entry);
      }
      return out;
    }
  };
}
