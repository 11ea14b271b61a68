/**
 * Shared Types - Main Export
 *
 * Re-exports all shared types for convenient importing
 */

// Security types
export {
  AuthErrorKind,
  AuthErrorKindSchema,
  RoleContainerSchema,
  TokenClaimsSchema,
  ErrorResponseSchema,
  type RoleContainer,
  type TokenClaims,
  type ValidatedClaims,
  type AuthenticatedPrincipal,
  type RequestContext,
  type ErrorResponse,
} from './security.js';

// Config types
export {
  CoreConfigSchema,
  LoggingConfigSchema,
  GatewayConfigSchema,
  OidcConfigSchema,
  ConfigSchema,
  type CoreConfig,
  type LoggingConfig,
  type GatewayConfig,
  type OidcConfig,
  type Config,
  type PartialConfig,
} from './config.js';
