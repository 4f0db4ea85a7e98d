/**
 * loopback-oauth-desktop - OAuth2 authorization code + PKCE sign-in for desktop apps
 */

// Auth - flow building blocks and orchestration
export * from './auth/index.ts';
// Browser - default launcher for the authorization URL
export { getLaunchCommand, type LaunchCommand, SystemBrowserLauncher } from './browser/browser-launcher.ts';
// Config - Configuration validation
export { assertSignInConfig, resolveProviderEndpoints, type SignInConfigValidation, validateSignInConfig } from './config/validate-config.ts';
// Entry point
export { DesktopAuth } from './desktop-auth.ts';
export { type SignInFlow, WebAuthorizationCodeFlow } from './flows/sign-in-flow.ts';
export type { FlowType, RefreshTokenRequest, SignInRequest, SignOutRequest } from './types.ts';
// Utils - Shared utilities
export { createSanitizedLogger, getLogLevel, type Logger, type LogLevel, logger, setLogLevel } from './utils/logger.ts';
export { type LogMetadata, redactText, sanitizeForLogging } from './utils/sanitizer.ts';
