/**
 * Reset Token Service
 *
 * Issues and verifies stateless password-reset tokens: HS256 JWTs binding a
 * username and the account's credential version, valid for a fixed window.
 *
 * Verification pins the algorithm to HS256. A token whose header names any
 * other algorithm (including "none") is rejected before signature checking
 * and logged as a possible tampering attempt. Callers only ever see `null`
 * for a bad token, whatever the reason.
 */

import jwt from "jsonwebtoken";
import { z } from "zod";
import { authLogger } from "../../utils/logger";

export const RESET_TOKEN_ALGORITHM = "HS256";
export const RESET_TOKEN_PURPOSE = "password_reset";
export const DEFAULT_RESET_TOKEN_TTL_SECONDS = 30 * 60;

export interface ResetTokenServiceOptions {
  secret: string;
  ttlSeconds?: number;
  clock?: () => number;
}

export interface ResetTokenClaims {
  username: string;
  credentialVersion: number;
  expiresAt: Date;
}

const resetTokenPayloadSchema = z.object({
  sub: z.string().min(1),
  purpose: z.literal(RESET_TOKEN_PURPOSE),
  ver: z.number().int().nonnegative(),
  iat: z.number(),
  exp: z.number(),
});

export class ResetTokenService {
  private readonly secret: string;
  private readonly ttlSeconds: number;
  private readonly clock: () => number;

  constructor(options: ResetTokenServiceOptions) {
    if (!options.secret) {
      throw new Error("Reset token secret is required");
    }
    this.secret = options.secret;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_RESET_TOKEN_TTL_SECONDS;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Sign a token for `username`, expiring `ttlSeconds` from now
   */
  issue(username: string, credentialVersion = 0): string {
    const issuedAt = this.nowSeconds();

    return jwt.sign(
      {
        sub: username,
        purpose: RESET_TOKEN_PURPOSE,
        ver: credentialVersion,
        iat: issuedAt,
      },
      this.secret,
      { algorithm: RESET_TOKEN_ALGORITHM, expiresIn: this.ttlSeconds }
    );
  }

  /**
   * The bound username, or null for any invalid token
   */
  verify(token: string): string | null {
    return this.verifyClaims(token)?.username ?? null;
  }

  verifyClaims(token: string): ResetTokenClaims | null {
    const decoded = jwt.decode(token, { complete: true });
    if (!decoded) {
      authLogger.info("Reset token rejected: malformed");
      return null;
    }

    if (decoded.header.alg !== RESET_TOKEN_ALGORITHM) {
      authLogger.warn("Reset token rejected: unexpected algorithm, possible tampering", {
        alg: decoded.header.alg,
      });
      return null;
    }

    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: [RESET_TOKEN_ALGORITHM],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        authLogger.info("Reset token rejected: expired", {
          expiredAt: error.expiredAt.toISOString(),
        });
        return null;
      }
      if (error instanceof jwt.JsonWebTokenError || error instanceof jwt.NotBeforeError) {
        authLogger.warn("Reset token rejected: verification failed", {
          reason: error.message,
        });
        return null;
      }
      throw error;
    }

    const parsed = resetTokenPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      authLogger.warn("Reset token rejected: unexpected claims", {
        issues: parsed.error.issues.map((issue) => issue.path.join(".")),
      });
      return null;
    }

    return {
      username: parsed.data.sub,
      credentialVersion: parsed.data.ver,
      expiresAt: new Date(parsed.data.exp * 1000),
    };
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }
}
