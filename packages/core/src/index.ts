/**
 * @keygate/core
 *
 * OIDC bearer-token gateway: signing-key cache, token validation,
 * role-based route guards and request correlation.
 */

// Main entry point
export {
  KeyGate,
  createKeyGate,
  type KeyGateOptions,
  type KeyGateState,
} from './keygate.js';

export { VERSION } from './version.js';

// Configuration
export {
  loadConfig,
  loadEnvConfig,
  mergeConfigs,
  parseCorsOrigins,
  assertAuthConfigured,
  type LoadConfigOptions,
} from './config/loader.js';

// Logging
export {
  createLogger,
  createNoopLogger,
  wrapPino,
  type SecureLogger,
  type LogContext,
  type LogLevel,
} from './logging/logger.js';

// Security
export { AuthError, statusForKind } from './security/auth-error.js';

export {
  KeyCache,
  inferAlgorithm,
  type SigningKey,
  type KeyCacheOptions,
  type KeyCacheStatus,
} from './security/key-cache.js';

export {
  TokenValidator,
  audienceContains,
  type KeyResolver,
  type TokenValidatorOptions,
} from './security/token-validator.js';

export { extractRoles } from './security/roles.js';
export { buildPrincipal } from './security/principal.js';
export { authorize, type AuthorizationDecision } from './security/authorization.js';

export {
  Authenticator,
  parseBearer,
  type ClaimsValidator,
  type AuthenticatorOptions,
} from './security/authenticator.js';

// Gateway
export {
  GatewayServer,
  createGatewayServer,
  type GatewayServerOptions,
} from './gateway/server.js';

export {
  CORRELATION_HEADER,
  resolveCorrelationId,
  createCorrelationHook,
  createCorrelationEchoHook,
} from './gateway/correlation.js';

export {
  createAuthHook,
  createRoleGuardHook,
  type AuthHookOptions,
  type RoleGuardHookOptions,
} from './gateway/auth-middleware.js';

export { registerApiRoutes, ADMIN_ROLES, type ApiRoutesOptions } from './gateway/api-routes.js';

// Utilities
export { uuidv7, sanitizeForLogging } from './utils/crypto.js';
export { sendError, toErrorMessage, httpStatusName } from './utils/errors.js';

// Re-export shared types
export type {
  Config,
  PartialConfig,
  AuthenticatedPrincipal,
  ValidatedClaims,
  TokenClaims,
  RequestContext,
  ErrorResponse,
} from '@keygate/shared';
export { AuthErrorKind } from '@keygate/shared';
