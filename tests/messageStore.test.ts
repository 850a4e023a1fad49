import type { Identity } from "../backend/src/services/authService";
import type { Booking, BookingLookup } from "../backend/src/services/bookingService";
import { createMessageStore } from "../backend/src/services/messageStore";
import { createInMemoryChatMessageRepository } from "../backend/src/repositories/inMemoryChatMessageRepository";

const customer: Identity = { participantId: "cust-1", role: "customer", displayName: "Casey" };
const partner: Identity = { participantId: "partner-1", role: "delivery_partner", displayName: "Pat" };
const stranger: Identity = { participantId: "cust-2", role: "customer", displayName: "Corey" };
const admin: Identity = { participantId: "admin-1", role: "administrator", displayName: "Ada" };

const T0 = 1_700_000_000_000;

function booking(overrides: Partial<Booking> = {}): Booking {
  return {
    bookingId: "b1",
    customerId: "cust-1",
    assignedPartnerId: "partner-1",
    status: "started",
    pickupAddress: "1 Dock Rd",
    deliveryAddress: "9 Hill St",
    createdAtMs: T0,
    updatedAtMs: T0,
    ...overrides
  };
}

function setup(options: { maxTextLength?: number } = {}) {
  const bookings = new Map<string, Booking>([["b1", booking()]]);
  const lookup: BookingLookup = {
    async getBooking(bookingId: string) {
      return bookings.get(bookingId) ?? null;
    }
  };
  const clock = { now: T0 };
  let seq = 0;
  const store = createMessageStore({
    repo: createInMemoryChatMessageRepository(),
    bookings: lookup,
    nowMs: () => clock.now,
    maxTextLength: options.maxTextLength,
    generateId: () => {
      seq += 1;
      return `m${seq}`;
    }
  });
  return { store, bookings, clock };
}

describe("messageStore", () => {
  it("Given a non-positive maxTextLength When the store is created Then it throws", () => {
    expect(() =>
      createMessageStore({
        repo: createInMemoryChatMessageRepository(),
        bookings: { getBooking: async () => null },
        maxTextLength: 0
      })
    ).toThrow("messageStore requires a positive integer maxTextLength.");
  });

  it("Given an active booking When participants append Then messages get increasing sequences and trimmed text", async () => {
    const { store, clock } = setup();

    const first = await store.append("b1", customer, "  hello  ");
    clock.now = T0 + 2_000;
    const second = await store.append("b1", partner, "on my way");

    expect(first).toEqual({
      ok: true,
      value: {
        messageId: "m1",
        bookingId: "b1",
        sequence: 1,
        senderId: "cust-1",
        senderRole: "customer",
        senderName: "Casey",
        text: "hello",
        createdAtMs: T0
      }
    });
    if (!second.ok) throw new Error("unreachable");
    expect(second.value.sequence).toBe(2);
    expect(second.value.createdAtMs).toBe(T0 + 2_000);
  });

  it("Given a clock that moves backwards When a message is appended Then its timestamp does not fall behind the previous one", async () => {
    const { store, clock } = setup();
    await store.append("b1", customer, "first");
    clock.now = T0 - 5_000;

    const second = await store.append("b1", partner, "second");

    if (!second.ok) throw new Error("unreachable");
    expect(second.value.createdAtMs).toBe(T0);
    expect(second.value.sequence).toBe(2);
  });

  it("Given blank or non-string text When appended Then it fails with VALIDATION_ERROR", async () => {
    const { store } = setup();
    const expected = { ok: false, error: { code: "VALIDATION_ERROR", message: "Message text is required." } };
    expect(await store.append("b1", customer, "   ")).toEqual(expected);
    expect(await store.append("b1", customer, 42)).toEqual(expected);
  });

  it("Given a length limit When text is over it after trimming Then it is rejected, and text at the limit is kept", async () => {
    const { store } = setup({ maxTextLength: 5 });

    expect(await store.append("b1", customer, "abcdef")).toEqual({
      ok: false,
      error: { code: "VALIDATION_ERROR", message: "Message is too long.", context: { maxLength: 5 } }
    });
    const atLimit = await store.append("b1", customer, "  abcde  ");
    if (!atLimit.ok) throw new Error("unreachable");
    expect(atLimit.value.text).toBe("abcde");
    expect(store.maxTextLength).toBe(5);
  });

  it("Given an unknown booking When appending Then it fails with BOOKING_NOT_FOUND", async () => {
    const { store } = setup();
    expect(await store.append("nope", customer, "hi")).toEqual({
      ok: false,
      error: { code: "BOOKING_NOT_FOUND", message: "Booking not found.", context: { bookingId: "nope" } }
    });
  });

  it.each(["pending", "delivered", "cancelled"] as const)(
    "Given a booking in %s When appending Then the chat is not active",
    async (status) => {
      const { store, bookings } = setup();
      bookings.set("b1", booking({ status }));

      expect(await store.append("b1", customer, "hi")).toEqual({
        ok: false,
        error: { code: "FORBIDDEN", message: "Chat is not active for this booking.", context: { status } }
      });
    }
  );

  it("Given someone outside the booking When appending Then it is forbidden, while an administrator may append", async () => {
    const { store } = setup();

    expect(await store.append("b1", stranger, "hi")).toEqual({
      ok: false,
      error: { code: "FORBIDDEN", message: "You are not a participant of this booking." }
    });
    expect((await store.append("b1", admin, "support here")).ok).toBe(true);
  });

  it("Given a partner who was reassigned away When appending Then the write is refused", async () => {
    const { store, bookings } = setup();
    bookings.set("b1", booking({ assignedPartnerId: "partner-2" }));

    const result = await store.append("b1", partner, "still here?");

    if (result.ok) throw new Error("unreachable");
    expect(result.error.code).toBe("FORBIDDEN");
  });

  it("Given a failing booking lookup When appending Then it fails with PERSISTENCE_FAILURE", async () => {
    const store = createMessageStore({
      repo: createInMemoryChatMessageRepository(),
      bookings: {
        async getBooking() {
          throw new Error("connection reset");
        }
      }
    });

    expect(await store.append("b1", customer, "hi")).toEqual({
      ok: false,
      error: { code: "PERSISTENCE_FAILURE", message: "Message store unavailable.", context: { reason: "connection reset" } }
    });
  });

  it("Given many concurrent appends When they settle Then every sequence from 1 to n is used once", async () => {
    const { store } = setup();

    const results = await Promise.all(
      Array.from({ length: 10 }, (_, i) => store.append("b1", i % 2 === 0 ? customer : partner, `msg ${i}`))
    );

    const sequences = results.map((r) => (r.ok ? r.value.sequence : -1)).sort((a, b) => a - b);
    expect(sequences).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  describe("listing", () => {
    async function seeded() {
      const ctx = setup();
      for (let i = 1; i <= 4; i += 1) {
        ctx.clock.now = T0 + i * 1_000;
        await ctx.store.append("b1", i % 2 === 1 ? customer : partner, `msg ${i}`);
      }
      return ctx;
    }

    it("Given no cursor When listing Then every message comes back in sequence order", async () => {
      const { store } = await seeded();
      const result = await store.listSince("b1", {});
      if (!result.ok) throw new Error("unreachable");
      expect(result.value.map((m) => m.text)).toEqual(["msg 1", "msg 2", "msg 3", "msg 4"]);
    });

    it("Given a message id cursor When listing Then only later messages come back", async () => {
      const { store } = await seeded();
      const result = await store.listSince("b1", { afterMessageId: "m2" });
      if (!result.ok) throw new Error("unreachable");
      expect(result.value.map((m) => m.messageId)).toEqual(["m3", "m4"]);
    });

    it("Given an unknown message id cursor When listing Then it fails with INVALID_INPUT", async () => {
      const { store } = await seeded();
      expect(await store.listSince("b1", { afterMessageId: "m99" })).toEqual({
        ok: false,
        error: { code: "INVALID_INPUT", message: "Unknown message cursor.", context: { afterMessageId: "m99" } }
      });
    });

    it("Given a timestamp cursor When listing Then messages strictly after it come back", async () => {
      const { store } = await seeded();
      const result = await store.listSince("b1", { afterTimestampMs: T0 + 3_000 });
      if (!result.ok) throw new Error("unreachable");
      expect(result.value.map((m) => m.text)).toEqual(["msg 4"]);
    });

    it("Given a non-finite timestamp cursor When listing Then it fails with INVALID_INPUT", async () => {
      const { store } = await seeded();
      const result = await store.listSince("b1", { afterTimestampMs: Number.NaN });
      if (result.ok) throw new Error("unreachable");
      expect(result.error.message).toBe("Invalid timestamp cursor.");
    });

    it("Given a limit below one When listing Then a single message comes back", async () => {
      const { store } = await seeded();
      const result = await store.listSince("b1", {}, 0);
      if (!result.ok) throw new Error("unreachable");
      expect(result.value.map((m) => m.sequence)).toEqual([1]);
    });

    it("Given a replay limit When listing recent messages Then the latest ones come back oldest first", async () => {
      const { store } = await seeded();
      const result = await store.listRecent("b1", 2);
      if (!result.ok) throw new Error("unreachable");
      expect(result.value.map((m) => m.sequence)).toEqual([3, 4]);
    });
  });

  describe("read tracking", () => {
    it("Given messages from both sides When counting unread Then a participant's own messages are not counted", async () => {
      const { store } = setup();
      await store.append("b1", customer, "one");
      await store.append("b1", partner, "two");
      await store.append("b1", partner, "three");

      expect(await store.countUnread("b1", "cust-1")).toEqual({ ok: true, value: 2 });
      expect(await store.countUnread("b1", "partner-1")).toEqual({ ok: true, value: 1 });
    });

    it("Given unread messages When markRead is called Then the cursor moves to the latest sequence and unread drops to zero", async () => {
      const { store } = setup();
      await store.append("b1", customer, "one");
      await store.append("b1", partner, "two");

      expect(await store.markRead("b1", "cust-1")).toEqual({ ok: true, value: { readSequence: 2 } });
      expect(await store.countUnread("b1", "cust-1")).toEqual({ ok: true, value: 0 });

      await store.append("b1", partner, "three");
      expect(await store.countUnread("b1", "cust-1")).toEqual({ ok: true, value: 1 });
      expect(await store.markRead("b1", "cust-1")).toEqual({ ok: true, value: { readSequence: 3 } });
    });

    it("Given an empty chat When markRead is called Then the cursor stays at zero", async () => {
      const { store } = setup();
      expect(await store.markRead("b1", "cust-1")).toEqual({ ok: true, value: { readSequence: 0 } });
    });
  });
});
