import bcrypt from "bcryptjs";
import jwt, { type JwtPayload } from "jsonwebtoken";

import { InvalidTokenError } from "../errors.js";

const DEFAULT_HASH_ROUNDS = 10;

export interface CredentialServiceConfig {
  jwtSecret: string;
  tokenExpiryMinutes: number;
  hashRounds?: number;
}

export interface TokenClaims {
  userId: string;
}

export interface CredentialService {
  hashPassword(password: string): Promise<string>;
  verifyPassword(password: string, hashedPassword: string): Promise<boolean>;
  issueToken(userId: string): string;
  /** Expired, malformed and wrongly signed tokens all fail with the same error. */
  verifyToken(token: string): TokenClaims;
}

export function createCredentialService(config: CredentialServiceConfig): CredentialService {
  const secret = config.jwtSecret;
  const expiresInSeconds = Math.max(60, Math.floor(config.tokenExpiryMinutes * 60));
  const hashRounds = config.hashRounds ?? DEFAULT_HASH_ROUNDS;

  return {
    hashPassword(password) {
      return bcrypt.hash(password, hashRounds);
    },

    verifyPassword(password, hashedPassword) {
      return bcrypt.compare(password, hashedPassword);
    },

    issueToken(userId) {
      return jwt.sign({ sub: userId }, secret, {
        algorithm: "HS256",
        expiresIn: expiresInSeconds
      });
    },

    verifyToken(token) {
      let payload: string | JwtPayload;
      try {
        payload = jwt.verify(token, secret, { algorithms: ["HS256"] });
      } catch {
        throw new InvalidTokenError();
      }

      if (typeof payload === "string" || typeof payload.sub !== "string" || payload.sub.length === 0) {
        throw new InvalidTokenError();
      }

      return { userId: payload.sub };
    }
  };
}

export function extractBearerToken(value: string | undefined): string {
  if (!value) {
    return "";
  }

  const trimmed = value.trim();
  const match = trimmed.match(/^bearer\s+(.+)$/i);
  return match?.[1] ? match[1].trim() : "";
}
