import http from "node:http";
import path from "node:path";

import { WebSocketServer } from "ws";

import { createApp } from "./app";
import { resolveServerConfig } from "./config";
import { createChatGateway } from "./realtime/chatGateway";
import { createWebsocketGateway } from "./realtime/websocketGateway";
import { createInMemoryBookingRepository } from "./repositories/inMemoryBookingRepository";
import { createInMemoryChatMessageRepository } from "./repositories/inMemoryChatMessageRepository";
import { createPostgresBookingRepository } from "./repositories/postgresBookingRepository";
import { createPostgresChatMessageRepository } from "./repositories/postgresChatMessageRepository";
import { createPostgresPool, ensurePostgresSchema } from "./repositories/postgresCore";
import { createAuthService } from "./services/authService";
import { createBookingService } from "./services/bookingService";
import { createMessageStore } from "./services/messageStore";

async function main(): Promise<void> {
  const config = resolveServerConfig();

  const postgresPool = config.postgres ? createPostgresPool(config.postgres) : null;
  if (postgresPool) {
    await ensurePostgresSchema(postgresPool);
    console.log("[Courierline] Persistence mode: PostgreSQL");
  } else {
    console.log("[Courierline] Persistence mode: local file storage");
  }

  const dataDir = path.resolve(process.cwd(), config.dataDir);
  const bookingRepo = postgresPool
    ? createPostgresBookingRepository(postgresPool)
    : createInMemoryBookingRepository({ storeFilePath: path.join(dataDir, "bookings.json") });
  const messageRepo = postgresPool
    ? createPostgresChatMessageRepository(postgresPool)
    : createInMemoryChatMessageRepository({ storeFilePath: path.join(dataDir, "chat.json") });

  const authService = createAuthService({ jwtSecret: config.jwtSecret });
  const bookingService = createBookingService({ repo: bookingRepo });
  const messageStore = createMessageStore({
    repo: messageRepo,
    bookings: bookingService,
    maxTextLength: config.chat.maxMessageLength
  });
  const chatGateway = createChatGateway({
    bookings: bookingService,
    messages: messageStore,
    replayLimit: config.chat.replayLimit,
    adminCapability: config.chat.adminCapability,
    sendTimeoutMs: config.chat.sendTimeoutMs
  });
  const unsubscribe = bookingService.subscribe(chatGateway);

  const app = createApp({
    authService,
    bookingService,
    messageStore,
    corsAllowedOrigins: config.corsAllowedOrigins
  });

  const server = http.createServer(app);
  const wss = new WebSocketServer({ server });
  const gateway = createWebsocketGateway({
    wss,
    authService,
    chatGateway,
    messageStore,
    heartbeatTimeoutMs: config.chat.heartbeatTimeoutMs
  });

  server.listen(config.port, () => {
    console.log(`[Courierline] Backend listening on http://localhost:${config.port}`);
  });

  const shutdown = async (): Promise<void> => {
    unsubscribe();
    await gateway.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (postgresPool) {
      await postgresPool.end();
    }
  };

  const onSignal = (): void => {
    shutdown()
      .catch((e: unknown) => {
        const message = e instanceof Error ? e.message : String(e);
        console.error(`[Courierline] Shutdown failed: ${message}`);
      })
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((e: unknown) => {
  const message = e instanceof Error ? e.message : String(e);
  console.error(`[Courierline] Failed to start: ${message}`);
  process.exit(1);
});
