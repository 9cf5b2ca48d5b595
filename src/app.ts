import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AuthEnv } from './types/hono.js';
import type { IStorage } from './storage/interfaces/index.js';
import type { IPasswordHasher } from './crypto/hash.js';
import { TokenCodec } from './crypto/token-codec.js';
import { AuthService } from './services/auth-service.js';
import { AuthorizationGate } from './services/authorization-gate.js';
import { TokenMaintenance } from './services/token-maintenance.js';
import { authErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { sessionAuth } from './middleware/session-auth.js';
import { createAuthRoutes } from './routes/auth/index.js';

export interface AuthServerOptions {
  storage: IStorage;
  jwtSecret: string;
  accessTokenTtlMs?: number;
  refreshTokenTtlMs?: number;
  passwordHasher?: IPasswordHasher;
  /**
   * Clock shared by the codec, the auth service and the sweep
   */
  now?: () => Date;
  /**
   * Allowed CORS origins. Empty allows any origin.
   */
  corsOrigins?: string[];
  enableCors?: boolean;
  enableLogging?: boolean;
  production?: boolean;
}

export interface AuthServer {
  app: Hono<AuthEnv>;
  authService: AuthService;
  gate: AuthorizationGate;
  maintenance: TokenMaintenance;
}

/**
 * Wire the auth core and mount it on a Hono application
 */
export function createAuthServer(options: AuthServerOptions): AuthServer {
  const {
    storage,
    jwtSecret,
    accessTokenTtlMs,
    refreshTokenTtlMs,
    passwordHasher,
    now,
    corsOrigins = [],
    enableCors = true,
    enableLogging = true,
    production,
  } = options;

  const codec = new TokenCodec({ secret: jwtSecret, now });
  const authService = new AuthService({
    storage,
    codec,
    passwordHasher,
    accessTokenTtlMs,
    refreshTokenTtlMs,
    now,
  });
  const gate = new AuthorizationGate({ codec, identities: storage.identities });
  const maintenance = new TokenMaintenance({ issuedTokens: storage.issuedTokens, now });

  const app = new Hono<AuthEnv>();

  // Global error handler
  app.onError(authErrorHandler({ production }));

  // Security headers
  app.use('*', securityHeaders());

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger());
  }

  if (enableCors) {
    app.use(
      '*',
      cors({
        origin: corsOrigins.length > 0 ? corsOrigins : '*',
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type'],
        exposeHeaders: ['WWW-Authenticate'],
        maxAge: 86400,
      })
    );
  }

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.use('/auth/*', sessionAuth(gate));
  app.route(
    '/auth',
    createAuthRoutes({ authService, gate, maintenance, identities: storage.identities })
  );

  return { app, authService, gate, maintenance };
}
