import http from "node:http";

import { createApp, statusForError } from "../backend/src/app";
import { createInMemoryBookingRepository } from "../backend/src/repositories/inMemoryBookingRepository";
import { createInMemoryChatMessageRepository } from "../backend/src/repositories/inMemoryChatMessageRepository";
import { createAuthService, type Identity } from "../backend/src/services/authService";
import { createBookingService } from "../backend/src/services/bookingService";
import { createMessageStore } from "../backend/src/services/messageStore";

const customer: Identity = { participantId: "cust-1", role: "customer", displayName: "Casey" };
const partner: Identity = { participantId: "partner-1", role: "delivery_partner", displayName: "Pat" };
const stranger: Identity = { participantId: "cust-2", role: "customer", displayName: "Corey" };
const admin: Identity = { participantId: "admin-1", role: "administrator", displayName: "Ada" };

const T0 = 1_700_000_000_000;

type Harness = Readonly<{
  request(method: string, path: string, identity: Identity | null, body?: unknown): Promise<{ status: number; body: unknown }>;
  messageStore: ReturnType<typeof createMessageStore>;
  close(): Promise<void>;
}>;

async function createHarness(): Promise<Harness> {
  const authService = createAuthService({ jwtSecret: "test-secret" });
  let bookingSeq = 0;
  const bookingService = createBookingService({
    repo: createInMemoryBookingRepository(),
    nowMs: () => T0,
    generateId: () => {
      bookingSeq += 1;
      return `b${bookingSeq}`;
    }
  });
  let messageSeq = 0;
  const messageStore = createMessageStore({
    repo: createInMemoryChatMessageRepository(),
    bookings: bookingService,
    nowMs: () => T0,
    generateId: () => {
      messageSeq += 1;
      return `m${messageSeq}`;
    }
  });
  const app = createApp({ authService, bookingService, messageStore, corsAllowedOrigins: "http://localhost" });
  const server = http.createServer(app);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("unexpected address");
  const port = address.port;

  return {
    messageStore,
    async request(method, path, identity, body) {
      const headers: Record<string, string> = { "content-type": "application/json" };
      if (identity) {
        const token = authService.issueToken(identity);
        if (!token.ok) throw new Error("unreachable");
        headers.authorization = `Bearer ${token.value}`;
      }
      const res = await fetch(`http://127.0.0.1:${port}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body)
      });
      const text = await res.text();
      return { status: res.status, body: text ? JSON.parse(text) : null };
    },
    async close() {
      server.closeAllConnections();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  };
}

describe("http app", () => {
  let harness: Harness;

  beforeEach(async () => {
    harness = await createHarness();
  });

  afterEach(async () => {
    await harness.close();
  });

  async function assignedBooking(): Promise<void> {
    const created = await harness.request("POST", "/bookings", customer, {
      pickupAddress: "1 Dock Rd",
      deliveryAddress: "9 Hill St"
    });
    expect(created.status).toBe(201);
    const assigned = await harness.request("POST", "/bookings/b1/assign", admin, { partnerId: "partner-1" });
    expect(assigned.status).toBe(200);
  }

  it("Given error codes When mapped Then each gets its HTTP status", () => {
    expect(statusForError("INVALID_SESSION")).toBe(401);
    expect(statusForError("NOT_A_PARTICIPANT")).toBe(403);
    expect(statusForError("BOOKING_NOT_FOUND")).toBe(404);
    expect(statusForError("INVALID_TRANSITION")).toBe(409);
    expect(statusForError("CHAT_CLOSED")).toBe(410);
    expect(statusForError("PERSISTENCE_FAILURE")).toBe(503);
    expect(statusForError("VALIDATION_ERROR")).toBe(400);
  });

  it("Given the health route When called Then it answers ok without credentials", async () => {
    expect(await harness.request("GET", "/health", null)).toEqual({ status: 200, body: { ok: true } });
  });

  it("Given no bearer token When a booking is created Then it answers 401", async () => {
    const res = await harness.request("POST", "/bookings", null, { pickupAddress: "a", deliveryAddress: "b" });
    expect(res).toEqual({ status: 401, body: { code: "INVALID_SESSION", message: "Missing credentials." } });
  });

  it("Given a customer When a booking is created Then it answers 201 with the pending booking", async () => {
    const res = await harness.request("POST", "/bookings", customer, {
      pickupAddress: "1 Dock Rd",
      deliveryAddress: "9 Hill St"
    });

    expect(res).toEqual({
      status: 201,
      body: {
        booking: {
          bookingId: "b1",
          customerId: "cust-1",
          assignedPartnerId: null,
          status: "pending",
          pickupAddress: "1 Dock Rd",
          deliveryAddress: "9 Hill St",
          createdAtMs: T0,
          updatedAtMs: T0
        }
      }
    });
  });

  it("Given an assigned booking When its status is read Then chat and cancellation flags come back", async () => {
    await assignedBooking();

    expect(await harness.request("GET", "/bookings/b1/status", partner)).toEqual({
      status: 200,
      body: {
        bookingId: "b1",
        status: "assigned",
        chatActive: true,
        cancellable: true,
        nextStatuses: ["started", "cancelled"]
      }
    });
  });

  it("Given a stranger When the booking is read Then it answers 403", async () => {
    await assignedBooking();
    expect(await harness.request("GET", "/bookings/b1", stranger)).toEqual({
      status: 403,
      body: { code: "UNAUTHORIZED_ACTION", message: "Access denied." }
    });
  });

  it("Given an unknown booking When it is read Then it answers 404", async () => {
    const res = await harness.request("GET", "/bookings/nope", admin);
    expect(res.status).toBe(404);
  });

  it("Given a skipped step When the status is posted Then it answers 409", async () => {
    await assignedBooking();
    const res = await harness.request("POST", "/bookings/b1/status", admin, { status: "delivered" });
    expect(res).toEqual({
      status: 409,
      body: {
        code: "INVALID_TRANSITION",
        message: "Cannot move booking from assigned to delivered.",
        context: { bookingId: "b1", from: "assigned", to: "delivered" }
      }
    });
  });

  it("Given the partner walks the booking forward When history is read Then every step is listed", async () => {
    await assignedBooking();
    const started = await harness.request("POST", "/bookings/b1/status", partner, { status: "started", note: "on my way" });
    expect(started.status).toBe(200);

    const history = await harness.request("GET", "/bookings/b1/history", customer);

    expect(history).toEqual({
      status: 200,
      body: {
        history: [
          { bookingId: "b1", from: "pending", to: "assigned", actorId: "admin-1", timestampMs: T0 },
          { bookingId: "b1", from: "assigned", to: "started", actorId: "partner-1", note: "on my way", timestampMs: T0 }
        ]
      }
    });
  });

  it("Given the customer When the booking is cancelled Then the reason is kept", async () => {
    await assignedBooking();
    const res = await harness.request("POST", "/bookings/b1/cancel", customer, { reason: "No longer needed" });
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ booking: { status: "cancelled", cancellationReason: "No longer needed" } });
  });

  it("Given chat messages When history, unread count and read are requested Then they reflect the store", async () => {
    await assignedBooking();
    await harness.messageStore.append("b1", partner, "hello");
    await harness.messageStore.append("b1", partner, "at the door");

    const all = await harness.request("GET", "/bookings/b1/messages", customer);
    expect(all).toEqual({
      status: 200,
      body: {
        messages: [
          {
            message_id: "m1",
            sender_id: "partner-1",
            sender_name: "Pat",
            sender_role: "delivery_partner",
            message: "hello",
            timestamp: new Date(T0).toISOString(),
            sequence: 1
          },
          {
            message_id: "m2",
            sender_id: "partner-1",
            sender_name: "Pat",
            sender_role: "delivery_partner",
            message: "at the door",
            timestamp: new Date(T0).toISOString(),
            sequence: 2
          }
        ]
      }
    });

    const after = await harness.request("GET", "/bookings/b1/messages?afterMessageId=m1", customer);
    expect(after.body).toMatchObject({ messages: [{ message_id: "m2" }] });

    expect(await harness.request("GET", "/bookings/b1/messages/unread-count", customer)).toEqual({
      status: 200,
      body: { unreadCount: 2 }
    });
    expect(await harness.request("POST", "/bookings/b1/messages/read", customer)).toEqual({
      status: 200,
      body: { readSequence: 2 }
    });
    expect(await harness.request("GET", "/bookings/b1/messages/unread-count", customer)).toEqual({
      status: 200,
      body: { unreadCount: 0 }
    });
  });

  it("Given a stranger When chat history is requested Then it answers 403", async () => {
    await assignedBooking();
    const res = await harness.request("GET", "/bookings/b1/messages", stranger);
    expect(res.status).toBe(403);
  });
});
