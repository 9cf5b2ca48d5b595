import * as jose from 'jose';
import { z } from 'zod';
import type {
  TokenClaims,
  TokenClaimsInput,
  TokenKind,
  TokenPayload,
  VerifyResult,
} from '../types/token.js';
import {
  ROLES,
  TOKEN_KINDS,
  TOKEN_SIGNING_ALGORITHM,
  MIN_SIGNING_SECRET_BYTES,
} from '../config/constants.js';
import { generateJti } from './random.js';

/**
 * Signed token creation and verification using jose (HS256)
 *
 * Both access and refresh tokens go through the same codec; they differ only
 * in lifetime and in the `kind` claim. Callers must check the kind
 * explicitly, see `expectKind`.
 */

const tokenPayloadSchema = z.object({
  sub: z.string().min(1),
  uid: z.string().min(1),
  role: z.enum(ROLES),
  kind: z.enum(TOKEN_KINDS),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().min(1),
});

export interface TokenCodecOptions {
  secret: string;
  now?: () => Date;
}

function toEpochSeconds(ms: number): number {
  return Math.floor(ms / 1000);
}

function toClaims(payload: TokenPayload): TokenClaims {
  return {
    subject: payload.sub,
    identityId: payload.uid,
    role: payload.role,
    kind: payload.kind,
    issuedAt: new Date(payload.iat * 1000),
    expiresAt: new Date(payload.exp * 1000),
    tokenId: payload.jti,
  };
}

export class TokenCodec {
  private readonly key: Uint8Array;
  private readonly now: () => Date;

  constructor(options: TokenCodecOptions) {
    const key = new TextEncoder().encode(options.secret);
    if (key.byteLength < MIN_SIGNING_SECRET_BYTES) {
      throw new Error(`Signing secret must be at least ${MIN_SIGNING_SECRET_BYTES} bytes`);
    }

    this.key = key;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Sign claims into a compact JWS, valid for `lifetimeMs` from now
   */
  async issue(claims: TokenClaimsInput, lifetimeMs: number): Promise<string> {
    const { token } = await this.mint(claims, lifetimeMs);
    return token;
  }

  /**
   * Sign claims and also return the claims as stamped
   */
  async mint(
    claims: TokenClaimsInput,
    lifetimeMs: number
  ): Promise<{ token: string; claims: TokenClaims }> {
    const nowMs = this.now().getTime();

    const payload: TokenPayload = {
      sub: claims.subject,
      uid: claims.identityId,
      role: claims.role,
      kind: claims.kind,
      iat: toEpochSeconds(nowMs),
      exp: toEpochSeconds(nowMs + lifetimeMs),
      jti: generateJti(),
    };

    const token = await new jose.SignJWT({ ...payload })
      .setProtectedHeader({
        alg: TOKEN_SIGNING_ALGORITHM,
        typ: 'JWT',
      })
      .sign(this.key);

    return { token, claims: toClaims(payload) };
  }

  /**
   * Verify signature, then expiry, then payload shape. Never throws for a
   * bad token.
   */
  async verify(token: string): Promise<VerifyResult> {
    let payload: jose.JWTPayload;
    try {
      const verified = await jose.jwtVerify(token, this.key, {
        algorithms: [TOKEN_SIGNING_ALGORITHM],
        currentDate: this.now(),
        clockTolerance: 0,
      });
      payload = verified.payload;
    } catch (error) {
      if (
        error instanceof jose.errors.JWSSignatureVerificationFailed ||
        error instanceof jose.errors.JOSEAlgNotAllowed
      ) {
        return { valid: false, reason: 'signature_invalid' };
      }
      if (error instanceof jose.errors.JWTExpired) {
        return { valid: false, reason: 'expired' };
      }
      if (error instanceof jose.errors.JOSEError) {
        return { valid: false, reason: 'malformed' };
      }
      throw error;
    }

    const parsed = tokenPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      return { valid: false, reason: 'malformed' };
    }

    return { valid: true, claims: toClaims(parsed.data) };
  }
}

/**
 * Narrow a verification result to a specific token kind
 */
export function expectKind(result: VerifyResult, kind: TokenKind): TokenClaims | null {
  if (!result.valid || result.claims.kind !== kind) {
    return null;
  }
  return result.claims;
}
