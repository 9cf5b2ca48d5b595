// Programmatic API. `server.ts` is the runnable entry point.
export { createAuthServer, type AuthServer, type AuthServerOptions } from './app.js';
export { createMemoryStorage } from './storage/memory/index.js';
export * from './types/index.js';
export * from './storage/interfaces/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './crypto/index.js';
export * from './logging/index.js';
export { AuthService, type AuthServiceOptions, type LoginInput, type RegisterInput } from './services/auth-service.js';
export * from './services/authorization-gate.js';
export * from './services/token-maintenance.js';
export { toIdentitySnapshot } from './services/identity-mapper.js';
export * from './middleware/session-auth.js';
export { authErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
export { createAuthRoutes } from './routes/auth/index.js';
