import { Pool } from "pg";

export type PostgresSettings = Readonly<{
  connectionString: string;
  ssl?: boolean;
}>;

function asBoolean(value: string | undefined): boolean {
  return typeof value === "string" && value.trim().toLowerCase() === "true";
}

export function resolvePostgresSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): PostgresSettings | null {
  const dbUrl = env.DATABASE_URL;
  if (typeof dbUrl !== "string" || dbUrl.trim() === "") {
    return null;
  }
  return {
    connectionString: dbUrl.trim(),
    ssl: asBoolean(env.DATABASE_SSL)
  };
}

export function createPostgresPool(settings: PostgresSettings): Pool {
  return new Pool({
    connectionString: settings.connectionString,
    max: 20,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
    ssl: settings.ssl === true ? { rejectUnauthorized: false } : undefined
  });
}

export async function ensurePostgresSchema(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS bookings (
      booking_id TEXT PRIMARY KEY,
      customer_id TEXT NOT NULL,
      assigned_partner_id TEXT,
      status TEXT NOT NULL,
      pickup_address TEXT NOT NULL,
      delivery_address TEXT NOT NULL,
      customer_notes TEXT,
      cancellation_reason TEXT,
      created_at_ms BIGINT NOT NULL,
      updated_at_ms BIGINT NOT NULL
    )
  `);
  await pool.query("CREATE INDEX IF NOT EXISTS idx_bookings_customer_id ON bookings(customer_id)");
  await pool.query("CREATE INDEX IF NOT EXISTS idx_bookings_assigned_partner_id ON bookings(assigned_partner_id)");

  await pool.query(`
    CREATE TABLE IF NOT EXISTS booking_status_history (
      id BIGSERIAL PRIMARY KEY,
      booking_id TEXT NOT NULL REFERENCES bookings(booking_id),
      from_status TEXT NOT NULL,
      to_status TEXT NOT NULL,
      actor_id TEXT NOT NULL,
      note TEXT,
      timestamp_ms BIGINT NOT NULL
    )
  `);
  await pool.query(
    "CREATE INDEX IF NOT EXISTS idx_booking_status_history_booking_id ON booking_status_history(booking_id)"
  );

  await pool.query(`
    CREATE TABLE IF NOT EXISTS chat_messages (
      message_id TEXT PRIMARY KEY,
      booking_id TEXT NOT NULL,
      sequence BIGINT NOT NULL,
      sender_id TEXT NOT NULL,
      sender_role TEXT NOT NULL,
      sender_name TEXT NOT NULL,
      text TEXT NOT NULL,
      created_at_ms BIGINT NOT NULL,
      UNIQUE (booking_id, sequence)
    )
  `);
  await pool.query("CREATE INDEX IF NOT EXISTS idx_chat_messages_created_at_ms ON chat_messages(booking_id, created_at_ms)");

  await pool.query(`
    CREATE TABLE IF NOT EXISTS chat_read_cursors (
      booking_id TEXT NOT NULL,
      participant_id TEXT NOT NULL,
      read_sequence BIGINT NOT NULL,
      PRIMARY KEY (booking_id, participant_id)
    )
  `);
}
