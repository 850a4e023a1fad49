import { useCallback, useEffect, useRef, useState } from "react";

import type { BookingStatus, ChatMessage, ConnectionIndicator, ServiceError } from "./chat.types";
import {
  createChatSessionController,
  type ChatSessionController,
  type ClientSocket,
  type ClientSocketHandlers,
  type Result
} from "./chatSession";

export function browserSocketFactory(url: string, handlers: ClientSocketHandlers): ClientSocket {
  const ws = new WebSocket(url);
  ws.onopen = () => handlers.onOpen();
  ws.onmessage = (event: MessageEvent) => handlers.onMessage(String(event.data));
  ws.onclose = (event: CloseEvent) => handlers.onClose(event.code, event.reason);
  return {
    send(data: string): void {
      if (ws.readyState === ws.OPEN) ws.send(data);
    },
    close(code: number, reason: string): void {
      if (ws.readyState === ws.CLOSING || ws.readyState === ws.CLOSED) return;
      ws.close(code, reason);
    }
  };
}

export function chatSocketUrl(bookingId: string, base?: string): string {
  const origin =
    base ?? `${window.location.protocol === "https:" ? "wss" : "ws"}://${window.location.host}`;
  return `${origin.replace(/\/+$/, "")}/ws/chat/${encodeURIComponent(bookingId)}`;
}

export type BookingChatState = Readonly<{
  messages: ReadonlyArray<ChatMessage>;
  indicator: ConnectionIndicator;
  bookingStatus: BookingStatus | null;
  readOnly: boolean;
  reloadRequired: boolean;
  lastError: ServiceError | null;
  lastNotice: ChatMessage | null;
  send(text: string): Result<void>;
  retry(): void;
  markRead(): void;
}>;

export function useBookingChat({
  url,
  token,
  currentUserId,
  onScrollToLatest
}: Readonly<{
  url: string;
  token: string;
  currentUserId: string;
  onScrollToLatest?: () => void;
}>): BookingChatState {
  const [messages, setMessages] = useState<ReadonlyArray<ChatMessage>>([]);
  const [indicator, setIndicator] = useState<ConnectionIndicator>("connecting");
  const [bookingStatus, setBookingStatus] = useState<BookingStatus | null>(null);
  const [readOnly, setReadOnly] = useState<boolean>(false);
  const [reloadRequired, setReloadRequired] = useState<boolean>(false);
  const [lastError, setLastError] = useState<ServiceError | null>(null);
  const [lastNotice, setLastNotice] = useState<ChatMessage | null>(null);
  const controllerRef = useRef<ChatSessionController | null>(null);
  const scrollRef = useRef<(() => void) | undefined>(onScrollToLatest);
  scrollRef.current = onScrollToLatest;

  useEffect(() => {
    const controller = createChatSessionController({
      url,
      token,
      currentUserId,
      socketFactory: browserSocketFactory,
      listener: {
        onMessages: (next) => setMessages(next),
        onIndicator: (next) => {
          setIndicator(next);
          if (next === "connected") setReloadRequired(false);
        },
        onNotify: (message) => setLastNotice(message),
        onScrollToLatest: () => scrollRef.current?.(),
        onReloadRequired: () => setReloadRequired(true),
        onError: (error) => setLastError(error),
        onBookingStatus: (status, isReadOnly) => {
          setBookingStatus(status);
          setReadOnly(isReadOnly);
        }
      }
    });
    controllerRef.current = controller;
    controller.start();
    return () => {
      controller.stop();
      controllerRef.current = null;
    };
  }, [url, token, currentUserId]);

  const send = useCallback((text: string): Result<void> => {
    const controller = controllerRef.current;
    if (!controller) return { ok: false, error: { code: "CONNECTION_LOST", message: "Not connected." } };
    const result = controller.send(text);
    setLastError(result.ok ? null : result.error);
    return result;
  }, []);

  const retry = useCallback((): void => {
    setReloadRequired(false);
    controllerRef.current?.retry();
  }, []);

  const markRead = useCallback((): void => {
    controllerRef.current?.markRead();
  }, []);

  return { messages, indicator, bookingStatus, readOnly, reloadRequired, lastError, lastNotice, send, retry, markRead };
}
