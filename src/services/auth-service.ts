import type { Identity, IdentitySnapshot } from '../types/identity.js';
import type { IssuedToken, LoginResponse, TokenResponse } from '../types/token.js';
import type { IStorage } from '../storage/interfaces/index.js';
import { UniqueConstraintError } from '../storage/interfaces/errors.js';
import type { IPasswordHasher } from '../crypto/hash.js';
import { ScryptPasswordHasher } from '../crypto/hash.js';
import type { TokenCodec } from '../crypto/token-codec.js';
import { generateRandomBase64Url } from '../crypto/random.js';
import { AuthError, type AuthResult, success, failure } from '../errors/auth-error.js';
import { getLogger, type Logger } from '../logging/index.js';
import { toIdentitySnapshot } from './identity-mapper.js';
import {
  DEFAULT_ACCESS_TOKEN_TTL_MS,
  DEFAULT_REFRESH_TOKEN_TTL_MS,
  MIN_PASSWORD_LENGTH,
  ROLE_STANDARD_USER,
  STATUS_ACTIVE,
  TOKEN_KIND_ACCESS,
  TOKEN_KIND_REFRESH,
} from '../config/constants.js';

const MAX_HANDLE_ATTEMPTS = 3;

export interface AuthServiceOptions {
  storage: IStorage;
  codec: TokenCodec;
  passwordHasher?: IPasswordHasher;
  accessTokenTtlMs?: number;
  refreshTokenTtlMs?: number;
  now?: () => Date;
  logger?: Logger;
}

export interface LoginInput {
  email: string;
  password: string;
}

export interface RegisterInput {
  firstName: string;
  lastName: string;
  email: string;
  password: string;
}

interface UsableSession {
  issuedToken: IssuedToken;
  identity: Identity;
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function isBlank(value: string | undefined | null): boolean {
  return value == null || value.trim().length === 0;
}

/**
 * Session lifecycle: login, registration, refresh, logout and session restore
 *
 * Stateless; all durable state lives in the storage. Every operation returns
 * an `AuthResult` and performs no write before its last validation step.
 * Refresh tokens are not rotated: a refresh token stays valid until it
 * expires or is revoked.
 */
export class AuthService {
  private readonly storage: IStorage;
  private readonly codec: TokenCodec;
  private readonly passwordHasher: IPasswordHasher;
  private readonly accessTokenTtlMs: number;
  private readonly refreshTokenTtlMs: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: AuthServiceOptions) {
    this.storage = options.storage;
    this.codec = options.codec;
    this.passwordHasher = options.passwordHasher ?? new ScryptPasswordHasher();
    this.accessTokenTtlMs = options.accessTokenTtlMs ?? DEFAULT_ACCESS_TOKEN_TTL_MS;
    this.refreshTokenTtlMs = options.refreshTokenTtlMs ?? DEFAULT_REFRESH_TOKEN_TTL_MS;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? getLogger('auth-service');
  }

  /**
   * Authenticate with email and password
   *
   * Unknown email and wrong password are reported as `not_found` and
   * `invalid_credentials`; the HTTP layer collapses both into one response.
   */
  async login(input: LoginInput): Promise<AuthResult<LoginResponse>> {
    if (isBlank(input.email)) {
      this.logger.warn('Login attempt with blank email');
      return failure(AuthError.validationFailed('Email and password are required'));
    }

    const email = normalizeEmail(input.email);
    this.logger.info({ email }, 'Login attempt');

    const identity = await this.storage.identities.findByEmail(email);
    if (!identity) {
      this.logger.warn({ email }, 'Login failed: identity not found');
      return failure(AuthError.notFound('User not found'));
    }

    if (identity.status !== STATUS_ACTIVE) {
      this.logger.warn(
        { identityId: identity.id, status: identity.status },
        'Login failed: account not active'
      );
      return failure(AuthError.accountNotActive(identity.status));
    }

    const passwordMatches = await this.passwordHasher.verify(input.password, identity.passwordHash);
    if (!passwordMatches) {
      this.logger.warn({ identityId: identity.id }, 'Login failed: invalid password');
      return failure(AuthError.invalidCredentials());
    }

    const response = await this.startSession(identity);
    this.logger.info({ identityId: identity.id }, 'Login successful');

    return success(response);
  }

  /**
   * Create a standard user account and sign it in
   */
  async register(input: RegisterInput): Promise<AuthResult<LoginResponse>> {
    if (isBlank(input.email)) {
      return failure(AuthError.validationFailed('Email is required'));
    }
    const email = normalizeEmail(input.email);
    const atIndex = email.indexOf('@');
    if (atIndex <= 0 || atIndex === email.length - 1) {
      return failure(AuthError.validationFailed('Valid email is required'));
    }
    if (input.password.length < MIN_PASSWORD_LENGTH) {
      return failure(
        AuthError.validationFailed(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`)
      );
    }

    this.logger.info({ email }, 'Registration attempt');

    if (await this.storage.identities.existsByEmail(email)) {
      this.logger.warn({ email }, 'Registration failed: email already registered');
      return failure(AuthError.duplicateResource('Email already registered'));
    }

    const passwordHash = await this.passwordHasher.hash(input.password);
    const baseHandle = email.slice(0, atIndex);
    let handle = await this.deriveHandle(baseHandle);

    let identity: Identity | null = null;
    for (let attempt = 0; attempt < MAX_HANDLE_ATTEMPTS && !identity; attempt++) {
      try {
        identity = await this.storage.identities.create({
          email,
          handle,
          passwordHash,
          firstName: input.firstName.trim(),
          lastName: input.lastName.trim(),
          role: ROLE_STANDARD_USER,
          status: STATUS_ACTIVE,
          permissions: {
            manageIdentities: false,
            viewReports: false,
            manageSettings: false,
          },
        });
      } catch (error) {
        if (!(error instanceof UniqueConstraintError)) {
          throw error;
        }
        if (error.field === 'email') {
          this.logger.warn({ email }, 'Registration failed: email taken concurrently');
          return failure(AuthError.duplicateResource('Email already registered'));
        }
        // Another registration claimed the handle in the meantime
        handle = `${baseHandle}_${this.now().getTime()}_${generateRandomBase64Url(3)}`;
      }
    }

    if (!identity) {
      return failure(AuthError.duplicateResource('Could not allocate a unique handle'));
    }

    const response = await this.startSession(identity);
    this.logger.info({ identityId: identity.id, handle: identity.handle }, 'Registration successful');

    return success(response);
  }

  /**
   * Mint a new access token from a stored refresh token
   *
   * The refresh token record is left untouched.
   */
  async refresh(refreshToken: string): Promise<AuthResult<TokenResponse>> {
    const session = await this.loadUsableSession(refreshToken);
    if (!session.ok) {
      return session;
    }

    const { identity } = session.value;
    const accessToken = await this.codec.issue(
      {
        subject: identity.handle,
        identityId: identity.id,
        role: identity.role,
        kind: TOKEN_KIND_ACCESS,
      },
      this.accessTokenTtlMs
    );

    this.logger.debug({ identityId: identity.id }, 'Access token refreshed');

    return success({ accessToken, expiresIn: this.accessTokenTtlMs });
  }

  /**
   * Revoke one refresh token of the calling identity
   *
   * Idempotent: a blank, unknown or already revoked token is a success.
   * A token owned by someone else is a failure.
   */
  async logout(identityId: string, refreshToken: string | undefined): Promise<AuthResult<void>> {
    this.logger.info({ identityId }, 'Logout attempt');

    if (refreshToken === undefined || isBlank(refreshToken)) {
      this.logger.debug('Logout called without refresh token');
      return success(undefined);
    }

    const issuedToken = await this.storage.issuedTokens.findByTokenString(refreshToken);
    if (!issuedToken) {
      this.logger.debug('Refresh token not found, already removed');
      return success(undefined);
    }

    if (issuedToken.identityId !== identityId) {
      this.logger.warn(
        { identityId, ownerId: issuedToken.identityId },
        'Attempt to revoke a token owned by another identity'
      );
      return failure(AuthError.tokenOwnership());
    }

    if (issuedToken.revokedAt) {
      return success(undefined);
    }

    await this.storage.issuedTokens.save({ ...issuedToken, revokedAt: this.now() });
    this.logger.info({ identityId, tokenId: issuedToken.id }, 'Refresh token revoked');

    return success(undefined);
  }

  /**
   * Resolve a refresh token to its identity, for session restore
   */
  async validateSession(refreshToken: string): Promise<AuthResult<IdentitySnapshot>> {
    const session = await this.loadUsableSession(refreshToken);
    if (!session.ok) {
      return session;
    }
    return success(toIdentitySnapshot(session.value.identity));
  }

  /**
   * Revoke every refresh token an identity holds
   */
  async revokeAllSessions(identityId: string): Promise<AuthResult<number>> {
    const identity = await this.storage.identities.findById(identityId);
    if (!identity) {
      return failure(AuthError.notFound('User not found'));
    }

    const revoked = await this.storage.issuedTokens.revokeAllForIdentity(identityId, this.now());
    this.logger.info({ identityId, revoked }, 'All sessions revoked');

    return success(revoked);
  }

  /**
   * Email local-part, with a timestamp suffix when already taken.
   * Best effort only; `create` is the final arbiter.
   */
  private async deriveHandle(baseHandle: string): Promise<string> {
    if (!(await this.storage.identities.existsByHandle(baseHandle))) {
      return baseHandle;
    }
    return `${baseHandle}_${this.now().getTime()}`;
  }

  /**
   * Look up a refresh token and check it against the store, which is
   * authoritative for expiry and revocation
   */
  private async loadUsableSession(refreshToken: string): Promise<AuthResult<UsableSession>> {
    if (isBlank(refreshToken)) {
      return failure(AuthError.validationFailed('Refresh token is required'));
    }

    const issuedToken = await this.storage.issuedTokens.findByTokenString(refreshToken);
    if (!issuedToken) {
      this.logger.warn('Refresh token not found');
      return failure(AuthError.invalidToken());
    }

    if (!(this.now() < issuedToken.expiresAt)) {
      this.logger.warn({ tokenId: issuedToken.id }, 'Refresh token expired');
      return failure(AuthError.tokenExpired());
    }

    if (issuedToken.revokedAt) {
      this.logger.warn({ tokenId: issuedToken.id }, 'Refresh token revoked');
      return failure(AuthError.tokenRevoked());
    }

    const identity = await this.storage.identities.findById(issuedToken.identityId);
    if (!identity || identity.status !== STATUS_ACTIVE) {
      this.logger.warn({ identityId: issuedToken.identityId }, 'Identity missing or not active');
      return failure(AuthError.accountNotActive());
    }

    return success({ issuedToken, identity });
  }

  /**
   * Mint the token pair, persist the refresh token and stamp the login time
   */
  private async startSession(identity: Identity): Promise<LoginResponse> {
    const baseClaims = {
      subject: identity.handle,
      identityId: identity.id,
      role: identity.role,
    };

    const accessToken = await this.codec.issue(
      { ...baseClaims, kind: TOKEN_KIND_ACCESS },
      this.accessTokenTtlMs
    );
    const refresh = await this.codec.mint(
      { ...baseClaims, kind: TOKEN_KIND_REFRESH },
      this.refreshTokenTtlMs
    );

    await this.storage.issuedTokens.create({
      identityId: identity.id,
      token: refresh.token,
      expiresAt: refresh.claims.expiresAt,
    });

    // Timestamps only: status and flags may have changed since the read
    const updated = await this.storage.identities.touchLastAuthenticated(identity.id, this.now());

    return {
      accessToken,
      refreshToken: refresh.token,
      expiresIn: this.accessTokenTtlMs,
      identity: toIdentitySnapshot(updated),
    };
  }
}
