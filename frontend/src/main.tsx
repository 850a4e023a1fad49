import React from "react";
import { createRoot } from "react-dom/client";

import { ChatWindow } from "./features/chat/ChatWindow";
import { chatSocketUrl } from "./features/chat/useBookingChat";

type ErrorBoundaryState = Readonly<{ error: Error | null }>;

class ErrorBoundary extends React.Component<Readonly<{ children: React.ReactNode }>, ErrorBoundaryState> {
  public constructor(props: Readonly<{ children: React.ReactNode }>) {
    super(props);
    this.state = { error: null };
  }

  public static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error };
  }

  public render(): React.ReactNode {
    if (this.state.error) {
      return (
        <div
          role="alert"
          aria-live="polite"
          style={{
            background: "#111111",
            border: "2px solid #C00000",
            borderRadius: 8,
            margin: 16,
            padding: 12,
            color: "#F22F2F",
            fontSize: 14,
            lineHeight: 1.4,
            whiteSpace: "pre-wrap"
          }}
        >
          {this.state.error.name}: {this.state.error.message}
        </div>
      );
    }

    return this.props.children;
  }
}

// The host page passes the booking and the caller's identity token in the query string.
const params = new URLSearchParams(window.location.search);
const bookingId = params.get("booking") ?? "";
const token = params.get("token") ?? "";
const currentUserId = params.get("user") ?? "";

const el = document.getElementById("root");
if (!el) {
  throw new Error("Missing #root element.");
}

createRoot(el).render(
  <React.StrictMode>
    <ErrorBoundary>
      {bookingId && token && currentUserId ? (
        <ChatWindow
          url={chatSocketUrl(bookingId)}
          token={token}
          currentUserId={currentUserId}
          title={`Booking ${bookingId}`}
        />
      ) : (
        <div style={{ padding: 16, color: "#AAAAAA" }}>Missing booking, token or user.</div>
      )}
    </ErrorBoundary>
  </React.StrictMode>
);
