import jwt from "jsonwebtoken";

export type ParticipantRole = "customer" | "delivery_partner" | "administrator";

export type ErrorCode = "INVALID_SESSION" | "UNAUTHORIZED_ACTION";

export type ServiceError = {
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
};

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

// The authenticated caller as the surrounding login system vouches for it. Immutable for the
// lifetime of a connection.
export type Identity = Readonly<{
  participantId: string;
  role: ParticipantRole;
  displayName: string;
}>;

export type AuthServiceDeps = Readonly<{
  jwtSecret: string;
  nowMs?: () => number;
  tokenLifetimeMinutes?: number;
}>;

export type AuthService = Readonly<{
  issueToken(identity: Identity): Result<string>;
  verifyToken(token: string): Result<Identity>;
}>;

const DEFAULT_TOKEN_LIFETIME_MINUTES = 12 * 60;

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

export function isParticipantRole(value: unknown): value is ParticipantRole {
  return value === "customer" || value === "delivery_partner" || value === "administrator";
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

export function createAuthService(deps: AuthServiceDeps): AuthService {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const tokenLifetimeMinutes = deps.tokenLifetimeMinutes ?? DEFAULT_TOKEN_LIFETIME_MINUTES;

  if (typeof deps.jwtSecret !== "string" || deps.jwtSecret.trim() === "") {
    throw new Error("authService requires a non-empty jwtSecret.");
  }
  if (!Number.isFinite(tokenLifetimeMinutes) || tokenLifetimeMinutes <= 0) {
    throw new Error("authService requires a positive tokenLifetimeMinutes.");
  }
  const jwtSecret = deps.jwtSecret;

  return {
    issueToken(identity: Identity): Result<string> {
      if (
        typeof identity !== "object" ||
        identity === null ||
        !isNonEmptyString(identity.participantId) ||
        !isParticipantRole(identity.role) ||
        !isNonEmptyString(identity.displayName)
      ) {
        return err("UNAUTHORIZED_ACTION", "Invalid identity.");
      }
      const issuedAtSeconds = Math.floor(nowMs() / 1000);
      const token = jwt.sign(
        {
          role: identity.role,
          name: identity.displayName.trim(),
          iat: issuedAtSeconds,
          exp: issuedAtSeconds + tokenLifetimeMinutes * 60
        },
        jwtSecret,
        {
          algorithm: "HS256",
          subject: identity.participantId.trim()
        }
      );
      return ok(token);
    },

    verifyToken(token: string): Result<Identity> {
      if (!isNonEmptyString(token)) {
        return err("INVALID_SESSION", "Missing credentials.");
      }
      try {
        const decoded = jwt.verify(token, jwtSecret, {
          algorithms: ["HS256"],
          clockTimestamp: Math.floor(nowMs() / 1000)
        });
        if (typeof decoded !== "object" || decoded === null) {
          return err("INVALID_SESSION", "Invalid credentials.");
        }
        const payload: Record<string, unknown> = { ...decoded };
        const participantId = payload.sub;
        const role = payload.role;
        const displayName = payload.name;
        if (!isNonEmptyString(participantId) || !isParticipantRole(role) || !isNonEmptyString(displayName)) {
          return err("INVALID_SESSION", "Invalid credentials.");
        }
        return ok({ participantId, role, displayName });
      } catch {
        return err("INVALID_SESSION", "Invalid credentials.");
      }
    }
  };
}
