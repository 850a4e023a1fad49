import {
  createChatSessionController,
  parseWireMessage,
  type ChatSessionListener,
  type ClientSocket,
  type ClientSocketHandlers,
  type SocketFactory
} from "../frontend/src/features/chat/chatSession";
import type { BookingStatus, ChatMessage, ConnectionIndicator, ServiceError } from "../frontend/src/features/chat/chat.types";

type Sent = { type: string; payload: unknown };

class FakeConnection implements ClientSocket {
  public readonly sent: Sent[] = [];
  public closedWith: { code: number; reason: string } | null = null;

  public constructor(
    public readonly url: string,
    private readonly handlers: ClientSocketHandlers
  ) {}

  public send(data: string): void {
    this.sent.push(JSON.parse(data));
  }

  public close(code: number, reason: string): void {
    this.closedWith = { code, reason };
  }

  public open(): void {
    this.handlers.onOpen();
  }

  public receive(type: string, payload: unknown): void {
    this.handlers.onMessage(JSON.stringify({ type, payload }));
  }

  public drop(code: number, reason = ""): void {
    this.handlers.onClose(code, reason);
  }
}

const T0 = 1_700_000_000_000;
const CHAT_URL = "ws://chat.test/ws/chat/b1";

function wire(id: string, sequence: number, senderId = "partner-1") {
  return {
    message_id: id,
    sender_id: senderId,
    sender_name: senderId === "cust-1" ? "Casey" : "Pat",
    sender_role: senderId === "cust-1" ? "customer" : "delivery_partner",
    message: `text ${sequence}`,
    timestamp: new Date(T0 + sequence * 1_000).toISOString(),
    sequence
  };
}

function setup(options: { maxReconnectAttempts?: number } = {}) {
  const sockets: FakeConnection[] = [];
  const factory: SocketFactory = (url, handlers) => {
    const socket = new FakeConnection(url, handlers);
    sockets.push(socket);
    return socket;
  };
  const indicators: ConnectionIndicator[] = [];
  const notified: ChatMessage[] = [];
  const errors: ServiceError[] = [];
  const statuses: Array<{ status: BookingStatus; readOnly: boolean }> = [];
  const snapshots: Array<ReadonlyArray<ChatMessage>> = [];
  const onReloadRequired = jest.fn();
  const onScrollToLatest = jest.fn();
  const listener: ChatSessionListener = {
    onIndicator: (indicator) => indicators.push(indicator),
    onNotify: (message) => notified.push(message),
    onError: (error) => errors.push(error),
    onBookingStatus: (status, readOnly) => statuses.push({ status, readOnly }),
    onMessages: (messages) => snapshots.push(messages),
    onReloadRequired,
    onScrollToLatest
  };
  const session = createChatSessionController({
    url: CHAT_URL,
    token: "test-token",
    currentUserId: "cust-1",
    socketFactory: factory,
    maxReconnectAttempts: options.maxReconnectAttempts,
    listener
  });
  const latest = (): FakeConnection => {
    const socket = sockets[sockets.length - 1];
    if (!socket) throw new Error("no socket yet");
    return socket;
  };
  return { session, sockets, latest, indicators, notified, errors, statuses, snapshots, onReloadRequired, onScrollToLatest };
}

function joinOn(socket: FakeConnection, status: BookingStatus = "assigned", readOnly = false): void {
  socket.open();
  socket.receive("chat_joined", { booking_id: "b1", status, read_only: readOnly });
  socket.receive("chat_replay", { messages: [] });
}

describe("chatSession", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it("Given invalid options When the controller is created Then it throws", () => {
    const socketFactory: SocketFactory = () => ({ send: jest.fn(), close: jest.fn() });
    expect(() =>
      createChatSessionController({ url: CHAT_URL, token: "t", currentUserId: "u", socketFactory, reconnectDelayMs: -1 })
    ).toThrow("chatSession requires a non-negative reconnectDelayMs.");
    expect(() =>
      createChatSessionController({ url: CHAT_URL, token: "t", currentUserId: "u", socketFactory, maxReconnectAttempts: 1.5 })
    ).toThrow("chatSession requires a non-negative integer maxReconnectAttempts.");
  });

  it("Given a started session When the socket opens and the join is confirmed Then it authenticates and shows connected", () => {
    const ctx = setup();

    ctx.session.start();
    expect(ctx.session.getIndicator()).toBe("connecting");
    expect(ctx.latest().url).toBe(CHAT_URL);

    ctx.latest().open();
    expect(ctx.latest().sent).toEqual([{ type: "auth", payload: { jwt: "test-token" } }]);

    ctx.latest().receive("chat_joined", { booking_id: "b1", status: "started", read_only: false });
    expect(ctx.indicators).toEqual(["connecting", "connected"]);
    expect(ctx.statuses).toEqual([{ status: "started", readOnly: false }]);
  });

  it("Given a replay out of order and a duplicate live message When they arrive Then messages are unique and sorted by sequence", () => {
    const ctx = setup();
    ctx.session.start();
    ctx.latest().open();
    ctx.latest().receive("chat_joined", { booking_id: "b1", status: "started", read_only: false });

    ctx.latest().receive("chat_replay", { messages: [wire("m2", 2), wire("m1", 1, "cust-1")] });
    ctx.latest().receive("chat_message", wire("m2", 2));
    ctx.latest().receive("chat_message", wire("m3", 3));
    ctx.latest().receive("chat_message", wire("m4", 4, "cust-1"));

    expect(ctx.session.getMessages().map((m) => m.messageId)).toEqual(["m1", "m2", "m3", "m4"]);
    expect(ctx.snapshots).toHaveLength(3);
    expect(ctx.notified.map((m) => m.messageId)).toEqual(["m3"]);
    expect(ctx.onScrollToLatest).toHaveBeenCalledTimes(3);
    expect(ctx.session.getMessages()[0]).toEqual({
      messageId: "m1",
      senderId: "cust-1",
      senderName: "Casey",
      senderRole: "customer",
      text: "text 1",
      createdAtMs: T0 + 1_000,
      sequence: 1
    });
  });

  it("Given each send precondition When send is called Then it reports the first one that fails", () => {
    const ctx = setup();
    ctx.session.start();

    expect(ctx.session.send("   ")).toEqual({
      ok: false,
      error: { code: "VALIDATION_ERROR", message: "Message text is required." }
    });
    expect(ctx.session.send("hi")).toEqual({ ok: false, error: { code: "CONNECTION_LOST", message: "Not connected." } });

    joinOn(ctx.latest());
    expect(ctx.session.send("  hi  ")).toEqual({ ok: true, value: undefined });
    expect(ctx.latest().sent[ctx.latest().sent.length - 1]).toEqual({ type: "message", payload: { message: "hi" } });
  });

  it("Given a read-only join When sending Then it is refused locally", () => {
    const ctx = setup();
    ctx.session.start();
    joinOn(ctx.latest(), "delivered", true);

    expect(ctx.session.isReadOnly()).toBe(true);
    expect(ctx.session.send("hi")).toEqual({ ok: false, error: { code: "FORBIDDEN", message: "This chat is read-only." } });
  });

  it("Given a joined session When markRead is called Then a mark_read frame is sent", () => {
    const ctx = setup();
    ctx.session.start();
    joinOn(ctx.latest());

    ctx.session.markRead();

    expect(ctx.latest().sent[ctx.latest().sent.length - 1]).toEqual({ type: "mark_read", payload: {} });
  });

  it("Given an open socket When the heartbeat interval passes Then a heartbeat frame is sent", () => {
    const ctx = setup();
    ctx.session.start();
    joinOn(ctx.latest());

    jest.advanceTimersByTime(15_000);

    expect(ctx.latest().sent.map((f) => f.type)).toEqual(["auth", "heartbeat"]);
  });

  it("Given a joined session When the connection drops Then it reconnects after the delay and keeps its messages", () => {
    const ctx = setup();
    ctx.session.start();
    joinOn(ctx.latest());
    ctx.latest().receive("chat_message", wire("m1", 1));

    ctx.latest().drop(1006);
    expect(ctx.session.getIndicator()).toBe("reconnecting");
    expect(ctx.session.reconnectAttempts()).toBe(1);
    expect(ctx.sockets).toHaveLength(1);

    jest.advanceTimersByTime(3_000);
    expect(ctx.sockets).toHaveLength(2);

    ctx.latest().open();
    ctx.latest().receive("chat_joined", { booking_id: "b1", status: "started", read_only: false });
    ctx.latest().receive("chat_replay", { messages: [wire("m1", 1), wire("m2", 2)] });

    expect(ctx.session.getIndicator()).toBe("connected");
    expect(ctx.session.reconnectAttempts()).toBe(0);
    expect(ctx.session.getMessages().map((m) => m.messageId)).toEqual(["m1", "m2"]);
    expect(ctx.indicators).toEqual(["connecting", "connected", "reconnecting", "connected"]);
  });

  it("Given reconnects keep failing When the attempts run out Then it settles on disconnected and asks for a reload", () => {
    const ctx = setup({ maxReconnectAttempts: 2 });
    ctx.session.start();

    ctx.latest().drop(1006);
    jest.advanceTimersByTime(3_000);
    ctx.latest().drop(1006);
    jest.advanceTimersByTime(3_000);
    ctx.latest().drop(1006);
    jest.advanceTimersByTime(3_000);

    expect(ctx.sockets).toHaveLength(3);
    expect(ctx.session.getIndicator()).toBe("disconnected");
    expect(ctx.onReloadRequired).toHaveBeenCalledTimes(1);

    ctx.session.retry();
    expect(ctx.sockets).toHaveLength(4);
    expect(ctx.session.getIndicator()).toBe("connecting");
    expect(ctx.session.reconnectAttempts()).toBe(0);
  });

  it("Given a chat_closed frame When the server then closes with 4001 Then the chat stays closed and is never retried", () => {
    const ctx = setup();
    ctx.session.start();
    joinOn(ctx.latest());

    ctx.latest().receive("chat_closed", { booking_id: "b1", status: "delivered" });
    ctx.latest().drop(4001, "CHAT_CLOSED");
    jest.advanceTimersByTime(60_000);

    expect(ctx.session.getIndicator()).toBe("chat_closed");
    expect(ctx.statuses[ctx.statuses.length - 1]).toEqual({ status: "delivered", readOnly: true });
    expect(ctx.sockets).toHaveLength(1);
    expect(ctx.session.send("hi")).toEqual({
      ok: false,
      error: { code: "CHAT_CLOSED", message: "Chat is closed for this booking." }
    });
    ctx.session.retry();
    expect(ctx.sockets).toHaveLength(1);
  });

  it("Given a join refused because the chat is not active When the socket closes with 4004 Then the chat is shown closed", () => {
    const ctx = setup();
    ctx.session.start();
    ctx.latest().open();
    ctx.latest().receive("error", { code: "CHAT_NOT_ACTIVE", message: "Chat is not active for this booking." });

    ctx.latest().drop(4004, "CHAT_NOT_ACTIVE");

    expect(ctx.session.getIndicator()).toBe("chat_closed");
    expect(ctx.errors).toEqual([{ code: "CHAT_NOT_ACTIVE", message: "Chat is not active for this booking." }]);
  });

  it.each([1008, 4002, 4003, 4404])(
    "Given a close with code %i When it arrives Then the session disconnects without retrying",
    (code) => {
      const ctx = setup();
      ctx.session.start();
      joinOn(ctx.latest());

      ctx.latest().drop(code);
      jest.advanceTimersByTime(60_000);

      expect(ctx.session.getIndicator()).toBe("disconnected");
      expect(ctx.sockets).toHaveLength(1);
      expect(ctx.onReloadRequired).not.toHaveBeenCalled();
    }
  );

  it("Given a joined session When the server closes with 1011 after a heartbeat timeout Then it reconnects", () => {
    const ctx = setup();
    ctx.session.start();
    joinOn(ctx.latest());

    ctx.latest().receive("error", { code: "CONNECTION_LOST", message: "Heartbeat timeout." });
    ctx.latest().drop(1011, "CONNECTION_LOST");
    expect(ctx.session.getIndicator()).toBe("reconnecting");
    expect(ctx.sockets).toHaveLength(1);

    jest.advanceTimersByTime(3_000);
    expect(ctx.sockets).toHaveLength(2);
    joinOn(ctx.latest());

    expect(ctx.session.getIndicator()).toBe("connected");
    expect(ctx.onReloadRequired).not.toHaveBeenCalled();
  });

  it("Given every reconnect ends with 1011 When the attempts run out Then it asks for a reload", () => {
    const ctx = setup({ maxReconnectAttempts: 1 });
    ctx.session.start();

    ctx.latest().drop(1011, "CONNECTION_LOST");
    jest.advanceTimersByTime(3_000);
    ctx.latest().drop(1011, "CONNECTION_LOST");

    expect(ctx.sockets).toHaveLength(2);
    expect(ctx.session.getIndicator()).toBe("disconnected");
    expect(ctx.onReloadRequired).toHaveBeenCalledTimes(1);
  });

  it.each([
    [4002, { code: "REASSIGNED", message: "This booking was reassigned to another partner." }],
    [4003, { code: "NOT_A_PARTICIPANT", message: "You are not a participant of this booking." }],
    [4404, { code: "BOOKING_NOT_FOUND", message: "Booking not found." }],
    [1008, { code: "CONNECTION_CLOSED", message: "The server closed this chat connection." }]
  ])("Given a close with code %i and no error frame When it arrives Then the listener hears why", (code, expected) => {
    const ctx = setup();
    ctx.session.start();
    joinOn(ctx.latest());

    ctx.latest().drop(code);

    expect(ctx.errors).toEqual([expected]);
  });

  it("Given an error frame before a 4002 close When the close arrives Then only the server error is reported", () => {
    const ctx = setup();
    ctx.session.start();
    joinOn(ctx.latest(), "started");

    ctx.latest().receive("error", { code: "REASSIGNED", message: "Booking was reassigned." });
    ctx.latest().drop(4002, "REASSIGNED");

    expect(ctx.errors).toEqual([{ code: "REASSIGNED", message: "Booking was reassigned." }]);
    expect(ctx.session.getIndicator()).toBe("disconnected");
  });

  it("Given an error frame on an earlier connection When a later connection closes with 4002 Then the close is still reported", () => {
    const ctx = setup();
    ctx.session.start();
    joinOn(ctx.latest());
    ctx.latest().receive("error", { code: "CONNECTION_LOST", message: "Heartbeat timeout." });
    ctx.latest().drop(1011, "CONNECTION_LOST");
    jest.advanceTimersByTime(3_000);
    joinOn(ctx.latest());

    ctx.latest().drop(4002, "REASSIGNED");

    expect(ctx.errors).toEqual([
      { code: "CONNECTION_LOST", message: "Heartbeat timeout." },
      { code: "REASSIGNED", message: "This booking was reassigned to another partner." }
    ]);
  });

  it("Given a running session When it is stopped Then the socket is closed normally and late events are ignored", () => {
    const ctx = setup();
    ctx.session.start();
    joinOn(ctx.latest());
    const socket = ctx.latest();

    ctx.session.stop();
    socket.drop(1006);
    jest.advanceTimersByTime(60_000);

    expect(socket.closedWith).toEqual({ code: 1000, reason: "Client closed" });
    expect(ctx.session.getIndicator()).toBe("disconnected");
    expect(ctx.sockets).toHaveLength(1);
  });

  it("Given a message_rejected frame When it arrives Then the listener hears the error", () => {
    const ctx = setup();
    ctx.session.start();
    joinOn(ctx.latest());

    ctx.latest().receive("message_rejected", { code: "VALIDATION_ERROR", message: "Message is too long." });

    expect(ctx.errors).toEqual([{ code: "VALIDATION_ERROR", message: "Message is too long." }]);
  });

  it("Given malformed wire messages When parsed Then they are rejected", () => {
    expect(parseWireMessage(null)).toBeNull();
    expect(parseWireMessage({ ...wire("m1", 1), sequence: "1" })).toBeNull();
    expect(parseWireMessage({ ...wire("m1", 1), sender_role: "guest" })).toBeNull();
    expect(parseWireMessage({ ...wire("m1", 1), timestamp: "yesterday" })).toBeNull();
  });
});
