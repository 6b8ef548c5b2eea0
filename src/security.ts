import { createHmac, randomUUID, timingSafeEqual } from "node:crypto";

import type { UserConfig } from "./config.js";
import type { DecisionReasonCode, Role } from "./types.js";

export type QueueOperation = "queue.list" | "queue.info" | "queue.create" | "queue.delete" | "message.push" | "message.pull";

export const OPERATION_SCOPES: Record<QueueOperation, readonly Role[]> = {
  "queue.list": ["admin", "agent", "user"],
  "queue.info": ["admin", "agent", "user"],
  "queue.create": ["admin"],
  "queue.delete": ["admin"],
  "message.push": ["admin", "agent"],
  "message.pull": ["admin", "agent"]
};

export function isOperationAllowed(role: Role, operation: QueueOperation): boolean {
  return OPERATION_SCOPES[operation].includes(role);
}

export interface AuthContext {
  headers: Record<string, string | undefined>;
}

export type AuthResult =
  | { ok: true; username: string; role: Role }
  | { ok: false; reason: DecisionReasonCode };

export interface IssuedToken {
  accessToken: string;
  tokenType: "bearer";
  expiresAt: string;
}

interface TokenPayload {
  sub: string;
  role: Role;
  exp: number;
  jti: string;
}

const ROLES: readonly Role[] = ["admin", "agent", "user"];

function encode(value: Buffer): string {
  return value.toString("base64url");
}

function parsePayload(encoded: string): TokenPayload | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(encoded, "base64url").toString("utf8"));
  } catch {
    return undefined;
  }
  if (typeof parsed !== "object" || parsed === null) {
    return undefined;
  }
  const sub: unknown = Reflect.get(parsed, "sub");
  const role: unknown = Reflect.get(parsed, "role");
  const exp: unknown = Reflect.get(parsed, "exp");
  const jti: unknown = Reflect.get(parsed, "jti");
  if (typeof sub !== "string" || typeof exp !== "number" || typeof jti !== "string") {
    return undefined;
  }
  const knownRole = ROLES.find((candidate) => candidate === role);
  if (!knownRole) {
    return undefined;
  }
  return { sub, role: knownRole, exp, jti };
}

function safeEqual(lhs: string, rhs: string): boolean {
  const a = Buffer.from(lhs);
  const b = Buffer.from(rhs);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Resolves callers to a role. Tokens are `<payload>.<signature>` in base64url,
 * signed with HMAC-SHA256 over the encoded payload.
 */
export class AuthService {
  constructor(
    private readonly options: {
      secret: string;
      tokenTtlMinutes: number;
      users: UserConfig[];
    }
  ) {}

  issueToken(username: string, password: string, now = Date.now()): IssuedToken | undefined {
    const user = this.options.users.find((candidate) => candidate.username === username);
    if (!user || !safeEqual(user.password, password)) {
      return undefined;
    }
    const exp = now + this.options.tokenTtlMinutes * 60_000;
    const payload: TokenPayload = { sub: user.username, role: user.role, exp, jti: randomUUID() };
    const encoded = encode(Buffer.from(JSON.stringify(payload), "utf8"));
    return {
      accessToken: `${encoded}.${this.sign(encoded)}`,
      tokenType: "bearer",
      expiresAt: new Date(exp).toISOString()
    };
  }

  verifyToken(token: string, now = Date.now()): AuthResult {
    const [encoded, signature, extra] = token.split(".");
    if (!encoded || !signature || extra !== undefined || !safeEqual(signature, this.sign(encoded))) {
      return { ok: false, reason: "AUTH_INVALID" };
    }
    const payload = parsePayload(encoded);
    if (!payload) {
      return { ok: false, reason: "AUTH_INVALID" };
    }
    if (payload.exp <= now) {
      return { ok: false, reason: "AUTH_EXPIRED" };
    }
    return { ok: true, username: payload.sub, role: payload.role };
  }

  authorize(context: AuthContext, now = Date.now()): AuthResult {
    const header = context.headers.authorization;
    if (!header) {
      return { ok: false, reason: "AUTH_MISSING" };
    }
    const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
    if (!match?.[1]) {
      return { ok: false, reason: "AUTH_INVALID" };
    }
    return this.verifyToken(match[1], now);
  }

  private sign(encoded: string): string {
    return encode(createHmac("sha256", this.options.secret).update(encoded).digest());
  }
}
