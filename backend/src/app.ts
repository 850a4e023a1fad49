import express, { type Express, type NextFunction, type Request, type Response } from "express";

import { toWireMessage, type ServiceError as ChatError } from "./realtime/chatGateway";
import type { AuthService, Identity, Result, ServiceError as AuthError } from "./services/authService";
import { isCancellable, isChatActive, nextValidStatuses } from "./services/bookingStateMachine";
import type { BookingService, ServiceError as BookingError } from "./services/bookingService";
import type { ListCursor, MessageStore, ServiceError as MessageError } from "./services/messageStore";

type AnyServiceError = AuthError | BookingError | MessageError | ChatError;

export type AppDeps = Readonly<{
  authService: Pick<AuthService, "verifyToken">;
  bookingService: BookingService;
  messageStore: MessageStore;
  corsAllowedOrigins?: string;
}>;

type AllowedOrigins = Readonly<{
  exact: ReadonlySet<string>;
  allowAny: boolean;
  wildcardSuffixes: ReadonlyArray<string>;
}>;

export function statusForError(code: AnyServiceError["code"]): number {
  return code === "INVALID_SESSION"
    ? 401
    : code === "UNAUTHORIZED_ACTION"
      ? 403
    : code === "FORBIDDEN"
      ? 403
    : code === "NOT_A_PARTICIPANT"
      ? 403
    : code === "BOOKING_NOT_FOUND"
      ? 404
    : code === "INVALID_TRANSITION"
      ? 409
    : code === "CHAT_NOT_ACTIVE"
      ? 409
    : code === "CHAT_CLOSED"
      ? 410
    : code === "PERSISTENCE_FAILURE"
      ? 503
    : 400;
}

function sendError(res: Response, error: AnyServiceError): void {
  res.status(statusForError(error.code)).json(error);
}

function bearerToken(req: Request): string {
  const header = req.header("authorization");
  if (typeof header !== "string") return "";
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match ? match[1].trim() : "";
}

function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null || Array.isArray(body)) return {};
  return { ...body };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

function parseAllowedOrigins(raw: string): AllowedOrigins {
  const exact = new Set<string>();
  const wildcardSuffixes: string[] = [];
  let allowAny = false;
  const values = raw
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
  for (const value of values) {
    if (value === "*") {
      allowAny = true;
      continue;
    }
    const protoSplit = value.indexOf("://");
    const wildcardIndex = value.indexOf("*.");
    if (protoSplit > 0 && wildcardIndex === protoSplit + 3) {
      const suffix = value.slice(wildcardIndex + 1).trim().toLowerCase();
      if (suffix.length > 2 && suffix.startsWith(".")) {
        wildcardSuffixes.push(suffix);
        continue;
      }
    }
    exact.add(value);
  }
  return { exact, allowAny, wildcardSuffixes };
}

function isOriginAllowed(origin: string, allowed: AllowedOrigins): boolean {
  if (allowed.allowAny) return true;
  if (allowed.exact.has(origin)) return true;
  let host = "";
  try {
    host = new URL(origin).hostname.toLowerCase();
  } catch {
    return false;
  }
  if (!host) return false;
  for (const suffix of allowed.wildcardSuffixes) {
    if (host.endsWith(suffix) && host !== suffix.slice(1)) {
      return true;
    }
  }
  return false;
}

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

// Express 4 does not route rejected promises to the error boundary on its own.
function route(handler: AsyncHandler): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function createApp(deps: AppDeps): Express {
  const { authService, bookingService, messageStore } = deps;

  function authenticate(req: Request): Result<Identity> {
    return authService.verifyToken(bearerToken(req));
  }

  const app = express();
  const allowedOrigins = parseAllowedOrigins(deps.corsAllowedOrigins ?? "");
  app.disable("x-powered-by");
  app.use((req, res, next) => {
    const originHeader = req.headers.origin;
    const origin = typeof originHeader === "string" ? originHeader.trim() : "";
    if (origin !== "" && isOriginAllowed(origin, allowedOrigins)) {
      res.setHeader("Access-Control-Allow-Origin", origin);
      res.setHeader("Vary", "Origin");
      res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
      res.setHeader("Access-Control-Allow-Headers", "Content-Type,Authorization");
    }
    if (req.method === "OPTIONS") {
      return res.status(204).end();
    }
    next();
  });
  app.use(express.json({ limit: "16kb" }));

  app.get("/health", (_req, res) => {
    res.status(200).json({ ok: true });
  });

  // Bookings
  app.post(
    "/bookings",
    route(async (req, res) => {
      const actor = authenticate(req);
      if (!actor.ok) return sendError(res, actor.error);
      const body = bodyOf(req);
      const result = await bookingService.createBooking(actor.value, {
        pickupAddress: optionalString(body.pickupAddress) ?? "",
        deliveryAddress: optionalString(body.deliveryAddress) ?? "",
        customerNotes: optionalString(body.customerNotes)
      });
      if (!result.ok) return sendError(res, result.error);
      return res.status(201).json({ booking: result.value });
    })
  );

  app.get(
    "/bookings/:id",
    route(async (req, res) => {
      const actor = authenticate(req);
      if (!actor.ok) return sendError(res, actor.error);
      const result = await bookingService.getBookingFor(actor.value, req.params.id);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ booking: result.value });
    })
  );

  app.get(
    "/bookings/:id/status",
    route(async (req, res) => {
      const actor = authenticate(req);
      if (!actor.ok) return sendError(res, actor.error);
      const result = await bookingService.getBookingFor(actor.value, req.params.id);
      if (!result.ok) return sendError(res, result.error);
      const status = result.value.status;
      return res.status(200).json({
        bookingId: result.value.bookingId,
        status,
        chatActive: isChatActive(status),
        cancellable: isCancellable(status),
        nextStatuses: Array.from(nextValidStatuses(status))
      });
    })
  );

  app.get(
    "/bookings/:id/history",
    route(async (req, res) => {
      const actor = authenticate(req);
      if (!actor.ok) return sendError(res, actor.error);
      const result = await bookingService.listStatusHistory(actor.value, req.params.id);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ history: result.value });
    })
  );

  app.post(
    "/bookings/:id/assign",
    route(async (req, res) => {
      const actor = authenticate(req);
      if (!actor.ok) return sendError(res, actor.error);
      const body = bodyOf(req);
      const result = await bookingService.assignPartner(actor.value, req.params.id, optionalString(body.partnerId) ?? "");
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ booking: result.value });
    })
  );

  app.post(
    "/bookings/:id/status",
    route(async (req, res) => {
      const actor = authenticate(req);
      if (!actor.ok) return sendError(res, actor.error);
      const body = bodyOf(req);
      const result = await bookingService.updateStatus(actor.value, req.params.id, body.status, optionalString(body.note));
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ booking: result.value });
    })
  );

  app.post(
    "/bookings/:id/cancel",
    route(async (req, res) => {
      const actor = authenticate(req);
      if (!actor.ok) return sendError(res, actor.error);
      const body = bodyOf(req);
      const result = await bookingService.cancel(actor.value, req.params.id, optionalString(body.reason));
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ booking: result.value });
    })
  );

  // Chat history and read tracking
  app.get(
    "/bookings/:id/messages",
    route(async (req, res) => {
      const actor = authenticate(req);
      if (!actor.ok) return sendError(res, actor.error);
      const booking = await bookingService.getBookingFor(actor.value, req.params.id);
      if (!booking.ok) return sendError(res, booking.error);

      const afterMessageId = queryString(req, "afterMessageId");
      const afterTimestampRaw = queryString(req, "afterTimestampMs");
      const limitRaw = queryString(req, "limit");
      const cursor: ListCursor = {
        ...(afterMessageId ? { afterMessageId } : {}),
        ...(afterTimestampRaw !== undefined ? { afterTimestampMs: Number(afterTimestampRaw) } : {})
      };
      const result = await messageStore.listSince(
        booking.value.bookingId,
        cursor,
        limitRaw !== undefined ? Number(limitRaw) : undefined
      );
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ messages: result.value.map(toWireMessage) });
    })
  );

  app.get(
    "/bookings/:id/messages/unread-count",
    route(async (req, res) => {
      const actor = authenticate(req);
      if (!actor.ok) return sendError(res, actor.error);
      const booking = await bookingService.getBookingFor(actor.value, req.params.id);
      if (!booking.ok) return sendError(res, booking.error);
      const result = await messageStore.countUnread(booking.value.bookingId, actor.value.participantId);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ unreadCount: result.value });
    })
  );

  app.post(
    "/bookings/:id/messages/read",
    route(async (req, res) => {
      const actor = authenticate(req);
      if (!actor.ok) return sendError(res, actor.error);
      const booking = await bookingService.getBookingFor(actor.value, req.params.id);
      if (!booking.ok) return sendError(res, booking.error);
      const result = await messageStore.markRead(booking.value.bookingId, actor.value.participantId);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ readSequence: result.value.readSequence });
    })
  );

  // Final error boundary.
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = error instanceof Error ? error.message : "Internal error.";
    console.error(`[Courierline] Unhandled request error: ${message}`);
    res.status(500).json({ code: "PERSISTENCE_FAILURE", message: "Internal error." });
  });

  return app;
}
