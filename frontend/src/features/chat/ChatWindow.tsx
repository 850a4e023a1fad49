import React, { useEffect, useRef, useState } from "react";

import type { ConnectionIndicator } from "./chat.types";
import { useBookingChat } from "./useBookingChat";

const INDICATOR_LABELS: Readonly<Record<ConnectionIndicator, string>> = {
  connecting: "CONNECTING",
  connected: "CONNECTED",
  reconnecting: "RECONNECTING",
  disconnected: "DISCONNECTED",
  chat_closed: "CHAT CLOSED"
};

const INDICATOR_COLORS: Readonly<Record<ConnectionIndicator, string>> = {
  connecting: "#F2C94C",
  connected: "#27AE60",
  reconnecting: "#F2C94C",
  disconnected: "#F22F2F",
  chat_closed: "#AAAAAA"
};

function formatTime(ms: number): string {
  const d = new Date(ms);
  return d.toLocaleTimeString([], { hour: "2-digit", minute: "2-digit" });
}

function roleLabel(role: string): string {
  return role === "delivery_partner" ? "Partner" : role === "administrator" ? "Support" : "Customer";
}

export function ChatWindow({
  url,
  token,
  currentUserId,
  title
}: Readonly<{
  url: string;
  token: string;
  currentUserId: string;
  title: string;
}>): React.ReactElement {
  const [draft, setDraft] = useState<string>("");
  const listRef = useRef<HTMLDivElement | null>(null);

  const chat = useBookingChat({
    url,
    token,
    currentUserId,
    onScrollToLatest: () => {
      const el = listRef.current;
      if (el) el.scrollTop = el.scrollHeight;
    }
  });
  const { markRead } = chat;

  useEffect(() => {
    if (chat.indicator === "connected" && chat.messages.length > 0) markRead();
  }, [chat.indicator, chat.messages.length, markRead]);

  const canSend = chat.indicator === "connected" && !chat.readOnly;

  function onSend(): void {
    const result = chat.send(draft);
    // The authoritative copy arrives as the server echo; the input is cleared as soon as it is handed off.
    if (result.ok) setDraft("");
  }

  return (
    <section
      aria-label="Booking chat"
      style={{
        background: "#000000",
        color: "#FFFFFF",
        fontFamily: "Montserrat, sans-serif",
        padding: 16,
        display: "grid",
        gap: 12
      }}
    >
      <header style={{ height: 56, display: "grid", alignItems: "center", background: "#000000" }}>
        <div style={{ textAlign: "center", fontSize: 20, fontWeight: 600 }}>{title}</div>
        <div
          role="status"
          aria-live="polite"
          style={{ textAlign: "center", fontSize: 12, color: INDICATOR_COLORS[chat.indicator] }}
        >
          {INDICATOR_LABELS[chat.indicator]}
          {chat.bookingStatus ? ` · ${chat.bookingStatus.toUpperCase()}` : ""}
          {chat.readOnly && chat.indicator === "connected" ? " · READ ONLY" : ""}
        </div>
      </header>

      {chat.lastError ? (
        <div
          role="alert"
          aria-live="polite"
          style={{
            background: "#111111",
            border: "2px solid #C00000",
            borderRadius: 8,
            padding: 12,
            color: "#F22F2F",
            fontSize: 14,
            lineHeight: 1.4
          }}
        >
          {chat.lastError.message}
        </div>
      ) : null}

      {chat.reloadRequired ? (
        <div
          role="alert"
          style={{
            background: "#111111",
            border: "2px solid #C00000",
            borderRadius: 8,
            padding: 12,
            display: "flex",
            justifyContent: "space-between",
            alignItems: "center",
            gap: 12
          }}
        >
          <span style={{ fontSize: 14 }}>Connection lost. Reload to try again.</span>
          <button
            type="button"
            onClick={() => chat.retry()}
            style={{
              background: "#C00000",
              color: "#FFFFFF",
              border: "2px solid #C00000",
              borderRadius: 8,
              padding: "8px 16px",
              fontWeight: 600
            }}
          >
            RELOAD
          </button>
        </div>
      ) : null}

      {chat.indicator === "chat_closed" ? (
        <div style={{ color: "#AAAAAA", fontSize: 14, textAlign: "center" }}>
          This chat has been closed for the booking.
        </div>
      ) : null}

      {chat.lastNotice ? (
        <div aria-live="polite" style={{ position: "absolute", width: 1, height: 1, overflow: "hidden" }}>
          New message from {chat.lastNotice.senderName}
        </div>
      ) : null}

      <div
        ref={listRef}
        aria-label="Messages"
        style={{
          background: "#111111",
          border: "2px solid #C00000",
          borderRadius: 8,
          padding: 12,
          display: "grid",
          gap: 12,
          minHeight: 320,
          maxHeight: 480,
          overflowY: "auto"
        }}
      >
        {chat.messages.length === 0 ? (
          <div style={{ color: "#AAAAAA", fontSize: 14, lineHeight: 1.4 }}>No messages.</div>
        ) : (
          chat.messages.map((m) => {
            const mine = m.senderId === currentUserId;
            const bubbleBg = mine ? "#C00000" : "#444444";
            const align: React.CSSProperties = mine ? { justifySelf: "end" } : { justifySelf: "start" };
            return (
              <div key={m.messageId} style={{ display: "grid", gap: 4, ...align }}>
                {!mine ? (
                  <div style={{ fontSize: 11, color: "#AAAAAA", ...align }}>
                    {m.senderName} ({roleLabel(m.senderRole)})
                  </div>
                ) : null}
                <div
                  style={{
                    background: bubbleBg,
                    color: "#FFFFFF",
                    borderRadius: 18,
                    padding: "8px 12px",
                    maxWidth: "85%",
                    fontSize: 16,
                    lineHeight: 1.4,
                    whiteSpace: "pre-wrap"
                  }}
                >
                  {m.text}
                </div>
                <div style={{ fontSize: 10, color: "#AAAAAA", ...align }}>{formatTime(m.createdAtMs)}</div>
              </div>
            );
          })
        )}
      </div>

      <form
        onSubmit={(e) => {
          e.preventDefault();
          onSend();
        }}
        aria-label="Message input"
        style={{
          background: "#111111",
          border: "2px solid #C00000",
          borderRadius: 8,
          padding: 12,
          display: "grid",
          gridTemplateColumns: "1fr auto",
          gap: 12,
          alignItems: "end"
        }}
      >
        <label style={{ display: "grid", gap: 6 }}>
          <span style={{ fontSize: 12, color: "#AAAAAA" }}>MESSAGE</span>
          <input
            value={draft}
            onChange={(e) => setDraft(e.target.value)}
            placeholder={chat.readOnly ? "Read-only" : "Type a message"}
            disabled={!canSend}
            style={{
              width: "100%",
              background: "#111111",
              color: "#FFFFFF",
              border: "2px solid #444444",
              borderRadius: 8,
              padding: "10px 12px",
              fontSize: 16,
              lineHeight: 1.4,
              outline: "none"
            }}
            aria-label="Message text"
          />
        </label>
        <button
          type="submit"
          disabled={!canSend}
          style={{
            background: canSend ? "#C00000" : "#333333",
            color: canSend ? "#FFFFFF" : "#777777",
            border: "2px solid #C00000",
            borderRadius: 8,
            padding: "10px 20px",
            fontSize: 16,
            fontWeight: 600,
            cursor: canSend ? "pointer" : "not-allowed",
            height: 44
          }}
          aria-label="Send message"
        >
          SEND
        </button>
      </form>
    </section>
  );
}
